import type { ExportFormat } from '../types/config.js';
import type { PruneReport } from '../types/pdf.js';

export const BRAND = 'CamScanner PDF Watermark Remover';
export const RULE = '═'.repeat(70);

export function formatSummary(report: PruneReport, format: ExportFormat, dpi: number): string {
  const total = report.annotations + report.images + report.textBlocks + report.metadata;
  const lines = [
    RULE,
    '  SUMMARY',
    RULE,
    `  Pages processed:       ${report.pages}`,
    `  Annotations removed:   ${report.annotations}`,
    `  Images removed:        ${report.images}`,
    `  Text blocks removed:   ${report.textBlocks}`,
    `  Metadata cleaned:      ${report.metadata}`,
    '  ───────────────────────',
    `  TOTAL REMOVED:         ${total}`,
    `  Export format:         ${format.toUpperCase()}`
  ];
  if (format !== 'pdf') lines.push(`  Resolution:            ${dpi} DPI`);
  lines.push(RULE);
  return lines.join('\n');
}
