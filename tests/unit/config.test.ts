import { describe, it, expect } from 'vitest';
import { DEFAULT_SIGNATURES, parseExportFormat, resolveConfig, validateDpi } from '../../src/config.js';
import { ConfigError, WatermarkErrorCode } from '../../src/errors.js';
import { parseArgs } from '../../src/cli/args.js';
import { RULE, formatSummary } from '../../src/cli/summary.js';
import { defaultOutputPath, pngPagePath, resolveOutputPath } from '../../src/export/output-paths.js';

describe('resolveConfig', () => {
  it('fills in defaults', () => {
    expect(resolveConfig()).toEqual({
      format: 'pdf',
      dpi: 300,
      output: undefined,
      debug: false,
      signatures: DEFAULT_SIGNATURES,
      mainContentThreshold: 1000
    });
  });

  it('treats explicit undefined like a missing field', () => {
    expect(resolveConfig({ dpi: undefined, format: undefined }).dpi).toBe(300);
  });

  it('normalises the tiff alias', () => {
    expect(resolveConfig({ format: 'tif', dpi: 72 }).format).toBe('tif');
    expect(parseExportFormat(' TIFF ')).toBe('tif');
    expect(parseExportFormat('PNG')).toBe('png');
  });

  it('rejects unknown formats with a ConfigError', () => {
    expect(() => parseExportFormat('jpeg')).toThrow(ConfigError);
    expect(() => parseExportFormat('jpeg')).toThrow('Invalid format "jpeg". Use: pdf, png, tif');
  });

  it('only accepts integer DPI between 72 and 1200', () => {
    expect(validateDpi(72)).toBe(72);
    expect(validateDpi(1200)).toBe(1200);
    expect(() => validateDpi(71)).toThrow('DPI must be an integer between 72 and 1200, got 71');
    expect(() => validateDpi(1201)).toThrow(ConfigError);
    expect(() => validateDpi(150.5)).toThrow(ConfigError);
  });

  it('rejects a non-positive main-content threshold', () => {
    try {
      resolveConfig({ mainContentThreshold: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ code: WatermarkErrorCode.INVALID_CONFIG });
    }
  });
});

describe('parseArgs', () => {
  it('returns help with no input or with --help', () => {
    expect(parseArgs([])).toEqual({ kind: 'help' });
    expect(parseArgs(['scan.pdf', '-h'])).toEqual({ kind: 'help' });
  });

  it('parses every option', () => {
    expect(parseArgs(['scan.pdf', '--format', 'tiff', '--dpi', '600', '--output', 'out.tif', '-d'])).toEqual({
      kind: 'run',
      input: 'scan.pdf',
      config: { format: 'tif', dpi: 600, debug: true, output: 'out.tif' }
    });
  });

  it('defaults to PDF at 300 DPI', () => {
    expect(parseArgs(['scan.pdf'])).toEqual({
      kind: 'run',
      input: 'scan.pdf',
      config: { format: 'pdf', dpi: 300, debug: false }
    });
  });

  it('reports bad arguments as ConfigError', () => {
    expect(() => parseArgs(['scan.pdf', '--dpi'])).toThrow('Missing value for --dpi');
    expect(() => parseArgs(['scan.pdf', '--dpi', '-5'])).toThrow('Missing value for --dpi');
    expect(() => parseArgs(['scan.pdf', '--dpi', '1.5'])).toThrow('Invalid DPI "1.5"');
    expect(() => parseArgs(['scan.pdf', '--dpi', '50'])).toThrow('DPI must be an integer between 72 and 1200, got 50');
    expect(() => parseArgs(['scan.pdf', '--format', 'gif'])).toThrow(ConfigError);
    expect(() => parseArgs(['scan.pdf', '--quiet'])).toThrow('Unknown option: --quiet');
  });
});

describe('output paths', () => {
  it('derives <stem>_cleaned next to the input', () => {
    expect(defaultOutputPath('/data/in/scan.pdf', 'pdf')).toBe('/data/in/scan_cleaned.pdf');
    expect(defaultOutputPath('/data/in/scan.pdf', 'tif')).toBe('/data/in/scan_cleaned.tif');
    expect(defaultOutputPath('/data/in/scan.pdf', 'png')).toBe('/data/in/scan_cleaned');
  });

  it('uses an override as given, minus a .png extension in PNG mode', () => {
    expect(resolveOutputPath('/a/scan.pdf', 'pdf', '/b/clean.pdf')).toBe('/b/clean.pdf');
    expect(resolveOutputPath('/a/scan.pdf', 'png', '/b/page.PNG')).toBe('/b/page');
    expect(resolveOutputPath('/a/scan.pdf', 'png', '/b/pages')).toBe('/b/pages');
    expect(resolveOutputPath('/a/scan.pdf', 'tif')).toBe('/a/scan_cleaned.tif');
  });

  it('names PNG pages by count', () => {
    expect(pngPagePath('/b/scan_cleaned', 0, 1)).toBe('/b/scan_cleaned.png');
    expect(pngPagePath('/b/scan_cleaned', 1, 3)).toBe('/b/scan_cleaned_page_2.png');
  });
});

describe('formatSummary', () => {
  const report = { pages: 2, annotations: 1, images: 2, textBlocks: 0, metadata: 1, passes: [] };

  it('lists counts, the total and the resolution for raster formats', () => {
    expect(formatSummary(report, 'png', 150).split('\n')).toEqual([
      RULE,
      '  SUMMARY',
      RULE,
      '  Pages processed:       2',
      '  Annotations removed:   1',
      '  Images removed:        2',
      '  Text blocks removed:   0',
      '  Metadata cleaned:      1',
      '  ───────────────────────',
      '  TOTAL REMOVED:         4',
      '  Export format:         PNG',
      '  Resolution:            150 DPI',
      RULE
    ]);
  });

  it('omits the resolution for PDF', () => {
    expect(formatSummary(report, 'pdf', 300)).not.toContain('Resolution');
  });
});
