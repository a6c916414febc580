// @vitest-environment node
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DocumentOpenError,
  InputNotFoundError,
  WatermarkRemover,
  silentLogger,
  type RemoverProgress
} from '../../src/index.js';
import { FakeRasterizer } from '../helpers/fake-rasterizer.js';
import { annotationArray, buildPdf, pageContentText, xobjectNames, type PageSpec } from '../helpers/pdf-fixtures.js';
import { PDFDocument } from 'pdf-lib';

describe('Watermark removal end-to-end', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'watermark-e2e-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeScan(pages: PageSpec[], producer?: string): Promise<string> {
    const document = await buildPdf(pages, producer === undefined ? {} : { Producer: producer });
    const path = join(dir, 'scan.pdf');
    await writeFile(path, await document.save());
    return path;
  }

  const blankPages = (count: number): PageSpec[] => Array.from({ length: count }, () => ({}));

  it('cleans a scanned page and writes <stem>_cleaned.pdf', async () => {
    const input = await writeScan(
      [
        {
          images: [
            { name: 'Scan', width: 2480, height: 3508 },
            { name: 'Logo', width: 300, height: 80 }
          ],
          contents: [
            'q\n612 0 0 792 0 0 cm\n/Scan Do\nQ\n' +
              'q\n90 0 0 24 510 8 cm\n/Logo Do\nQ\n' +
              'BT\n/F1 7 Tf\n(Scanned with CamScanner) Tj\nET\n'
          ],
          annotations: [{ uri: 'https://www.camscanner.com/l/abc' }]
        }
      ],
      'CamScanner'
    );
    const stages: RemoverProgress['stage'][] = [];

    const result = await new WatermarkRemover({}, { logger: silentLogger }).process(input, (progress) =>
      stages.push(progress.stage)
    );

    const output = join(dir, 'scan_cleaned.pdf');
    expect(result.files).toEqual([output]);
    expect(stages).toEqual(['loading', 'pruning', 'exporting', 'complete']);
    expect(result.report).toMatchObject({ pages: 1, annotations: 1, images: 1, textBlocks: 1, metadata: 1 });

    const cleaned = await PDFDocument.load(await readFile(output), { updateMetadata: false });
    expect(xobjectNames(cleaned)).toEqual(['Scan']);
    expect(pageContentText(cleaned)).toEqual(['q\n612 0 0 792 0 0 cm\n/Scan Do\nQ\n\n']);
    expect(annotationArray(cleaned)?.size()).toBe(0);
    expect(cleaned.getProducer()).toBeUndefined();
  });

  it('leaves a document without watermarks alone', async () => {
    const input = await writeScan([
      { images: [{ name: 'Scan', width: 1200, height: 1600 }], contents: ['q\n612 0 0 792 0 0 cm\n/Scan Do\nQ\n'] }
    ]);

    const { report } = await new WatermarkRemover({}, { logger: silentLogger }).process(input);

    expect(report).toMatchObject({ annotations: 0, images: 0, textBlocks: 0, metadata: 0 });
  });

  it('rejects a missing input file', async () => {
    const remover = new WatermarkRemover({}, { logger: silentLogger });
    await expect(remover.process(join(dir, 'nope.pdf'))).rejects.toBeInstanceOf(InputNotFoundError);
  });

  it('rejects a file that is not a PDF', async () => {
    const input = join(dir, 'broken.pdf');
    await writeFile(input, 'just some text');

    const remover = new WatermarkRemover({}, { logger: silentLogger });
    await expect(remover.process(input)).rejects.toBeInstanceOf(DocumentOpenError);
    expect(await readdir(dir)).toEqual(['broken.pdf']);
  });

  it('names a single PNG page <stem>_cleaned.png', async () => {
    const input = await writeScan(blankPages(1));
    const remover = new WatermarkRemover({ format: 'png', dpi: 72 }, { logger: silentLogger, rasterizer: new FakeRasterizer() });

    const { files } = await remover.process(input);

    expect(files).toEqual([join(dir, 'scan_cleaned.png')]);
  });

  it('numbers PNG pages and honours an output override', async () => {
    const input = await writeScan(blankPages(2));
    const rasterizer = new FakeRasterizer();
    const remover = new WatermarkRemover(
      { format: 'png', dpi: 144, output: join(dir, 'pages.png') },
      { logger: silentLogger, rasterizer }
    );

    const { files } = await remover.process(input);

    expect(files).toEqual([join(dir, 'pages_page_1.png'), join(dir, 'pages_page_2.png')]);
    expect(rasterizer.calls.map((call) => call.scale)).toEqual([2, 2]);
    expect((await readdir(dir)).sort()).toEqual(['pages_page_1.png', 'pages_page_2.png', 'scan.pdf']);
  });

  it('writes a multi-page TIF', async () => {
    const input = await writeScan(blankPages(2));
    const remover = new WatermarkRemover({ format: 'tif' }, { logger: silentLogger, rasterizer: new FakeRasterizer() });

    const { files, export: exported } = await remover.process(input);

    expect(files).toEqual([join(dir, 'scan_cleaned.tif')]);
    expect(exported.pages.map((page) => page.state)).toEqual(['accumulated', 'accumulated']);
  });
});
