import type {
  DailyRecapRecord,
  RecapAppendResult,
  RecapRepositoryPort,
  RecapStoreMode,
  RecapStorePort,
} from '@ops-recap/domain';

/**
 * Record store that prefers a remote backend and falls back to a local one.
 *
 *   remote_preferred ──(first failed remote call)──▶ local_fallback
 *   local_only            (no remote configured)
 *
 * Once in `local_fallback` the store stays there for the life of the process.
 */
export class FallbackRecapStore implements RecapStorePort {
  private mode: RecapStoreMode;
  private fallbackReason: string | null = null;

  constructor(
    private readonly remote: RecapRepositoryPort | null,
    private readonly local: RecapRepositoryPort,
  ) {
    this.mode = remote ? 'remote_preferred' : 'local_only';
  }

  getMode(): RecapStoreMode {
    return this.mode;
  }

  getFallbackReason(): string | null {
    return this.fallbackReason;
  }

  /** Switch to the local backend. No-op unless currently on the remote. */
  markRemoteFailed(err: unknown): void {
    if (this.mode !== 'remote_preferred') return;
    this.fallbackReason = err instanceof Error ? err.message : String(err);
    this.mode = 'local_fallback';
    console.warn(`[recap-store] remote store unavailable, falling back to local file: ${this.fallbackReason}`);
  }

  async append(record: DailyRecapRecord): Promise<RecapAppendResult> {
    if (this.mode === 'remote_preferred' && this.remote) {
      try {
        await this.remote.append(record);
        return { mode: this.mode };
      } catch (err) {
        this.markRemoteFailed(err);
      }
    }

    await this.local.append(record);
    if (this.mode === 'local_fallback') {
      return { mode: this.mode, warning: this.fallbackWarning() };
    }
    return { mode: this.mode };
  }

  async readAll(): Promise<DailyRecapRecord[]> {
    if (this.mode === 'remote_preferred' && this.remote) {
      try {
        return await this.remote.readAll();
      } catch (err) {
        this.markRemoteFailed(err);
      }
    }
    return this.local.readAll();
  }

  private fallbackWarning(): string {
    return `Remote record store unavailable (${this.fallbackReason ?? 'unknown error'}); saved to the local file instead.`;
  }
}
