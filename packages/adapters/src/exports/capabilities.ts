import type { CapabilityStatus, ExportCapabilities, ExportKind, RecapExporterPort } from '@ops-recap/domain';
import { EXPORT_KINDS } from '@ops-recap/domain';
import { CsvRecapExporter } from './csv.exporter.js';
import { XlsxRecapExporter } from './xlsx.exporter.js';
import { PdfRecapExporter } from './pdf.exporter.js';

/** Libraries each export kind needs at run time. CSV needs none beyond the core stack. */
export const EXPORT_LIBRARIES: Readonly<Record<ExportKind, string | null>> = {
  csv: null,
  xlsx: 'exceljs',
  pdf: 'pdf-lib',
};

export type ModuleProbe = (moduleName: string) => boolean;

export const resolveModule: ModuleProbe = (moduleName) => {
  try {
    require.resolve(moduleName);
    return true;
  } catch {
    return false;
  }
};

/** Check once, at startup, which export kinds this runtime can serve. */
export function detectExportCapabilities(probe: ModuleProbe = resolveModule): ExportCapabilities {
  const status = (kind: ExportKind): CapabilityStatus => {
    const lib = EXPORT_LIBRARIES[kind];
    return lib === null || probe(lib) ? 'available' : 'unavailable';
  };
  return { csv: status('csv'), xlsx: status('xlsx'), pdf: status('pdf') };
}

/** Exporters for the available kinds only. */
export function createRecapExporters(
  capabilities: ExportCapabilities,
): Map<ExportKind, RecapExporterPort> {
  const factories: Record<ExportKind, () => RecapExporterPort> = {
    csv: () => new CsvRecapExporter(),
    xlsx: () => new XlsxRecapExporter(),
    pdf: () => new PdfRecapExporter(),
  };

  const exporters = new Map<ExportKind, RecapExporterPort>();
  for (const kind of EXPORT_KINDS) {
    if (capabilities[kind] === 'available') exporters.set(kind, factories[kind]());
  }
  return exporters;
}
