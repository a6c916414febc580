import type { RemoverConfig } from '../types/config.js';
import { DEFAULT_DPI, parseExportFormat, validateDpi } from '../config.js';
import { ConfigError } from '../errors.js';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'run'; input: string; config: RemoverConfig };

export const USAGE = `Usage:
  cs-watermark-remover input.pdf
  cs-watermark-remover input.pdf --format pdf
  cs-watermark-remover input.pdf --format png --dpi 600
  cs-watermark-remover input.pdf --format tif
  cs-watermark-remover input.pdf --output custom.pdf
  cs-watermark-remover input.pdf --debug

Export formats:
  pdf  - Clean PDF (default)
  png  - PNG images (one per page)
  tif  - Multi-page TIFF

Options:
  --format FORMAT   Output format (pdf/png/tif)
  --dpi DPI         Resolution for PNG/TIF, 72-1200 (default: ${DEFAULT_DPI})
  --output PATH     Custom output path
  --debug, -d       Show debug info
  --help, -h        Show this help`;

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new ConfigError(`Missing value for ${flag}`);
  }
  return value;
}

/** Parses argv (without the node and script entries). Throws `ConfigError` on bad input. */
export function parseArgs(argv: string[]): CliCommand {
  const config: RemoverConfig = { format: 'pdf', dpi: DEFAULT_DPI, debug: false };
  let input: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--help' || a === '-h') return { kind: 'help' };
    else if (a === '--format') {
      config.format = parseExportFormat(requireValue(argv, i, a));
      i++;
    } else if (a === '--dpi') {
      const raw = requireValue(argv, i, a);
      if (!/^\d+$/.test(raw)) throw new ConfigError(`Invalid DPI "${raw}"`);
      config.dpi = validateDpi(Number(raw));
      i++;
    } else if (a === '--output') {
      config.output = requireValue(argv, i, a);
      i++;
    } else if (a === '--debug' || a === '-d') config.debug = true;
    else if (a.startsWith('-')) throw new ConfigError(`Unknown option: ${a}`);
    else if (input === undefined) input = a;
  }

  if (input === undefined) return { kind: 'help' };
  return { kind: 'run', input, config };
}
