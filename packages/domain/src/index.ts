// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/daily-recap.js';

// ─── Engine ───────────────────────────────────────────────────────────────────
export * from './engine/numeric-coercion.js';
export * from './engine/ratio.js';
export * from './engine/metrics-engine.js';
export * from './engine/report-renderer.js';
export * from './engine/record-validator.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/recap-usecase.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/recap-repository.port.js';
export * from './ports/outbound/recap-exporter.port.js';
