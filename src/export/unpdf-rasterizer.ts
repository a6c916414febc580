import { readFile } from 'fs/promises';
import { PNG } from 'pngjs';
import type { PageRasterizer, Raster, RasterSession } from '../types/output.js';

type UnpdfDocumentProxy = {
  numPages: number;
  destroy?: () => Promise<void>;
};

type UnpdfModule = {
  getDocumentProxy: (data: Uint8Array) => Promise<UnpdfDocumentProxy>;
  renderPageAsImage: (
    data: Uint8Array,
    pageNumber: number,
    options: { canvasImport: () => Promise<unknown>; scale: number }
  ) => Promise<ArrayBuffer | string>;
};

// Keeps test runners and bundlers from rewriting the specifier at build time.
const importModule = new Function('specifier', 'return import(specifier)') as (specifier: string) => Promise<unknown>;

let cachedUnpdf: Promise<UnpdfModule> | null = null;

async function loadUnpdf(): Promise<UnpdfModule> {
  if (!cachedUnpdf) {
    cachedUnpdf = importModule('unpdf').then((mod) => {
      const candidate = mod as Partial<UnpdfModule>;
      if (typeof candidate.getDocumentProxy !== 'function' || typeof candidate.renderPageAsImage !== 'function') {
        throw new Error('unpdf does not provide getDocumentProxy/renderPageAsImage');
      }
      return mod as unknown as UnpdfModule;
    });
    void cachedUnpdf.catch(() => {
      cachedUnpdf = null;
    });
  }
  return await cachedUnpdf;
}

/** Accepts the raw PNG bytes or a `data:image/png;base64,` URL. */
export function decodePng(image: ArrayBuffer | string): Raster {
  const bytes =
    typeof image === 'string'
      ? Buffer.from(image.slice(image.indexOf(',') + 1), 'base64')
      : Buffer.from(new Uint8Array(image));
  const png = PNG.sync.read(bytes);
  return { width: png.width, height: png.height, data: png.data };
}

/**
 * Renders pages with the pdf.js build bundled in `unpdf`, drawing on
 * `@napi-rs/canvas`. Every render gets its own copy of the file bytes since
 * pdf.js may take ownership of the buffer it is given.
 */
export class UnpdfRasterizer implements PageRasterizer {
  async open(pdfPath: string): Promise<RasterSession> {
    const unpdf = await loadUnpdf();
    const bytes = new Uint8Array(await readFile(pdfPath));

    const probe = await unpdf.getDocumentProxy(new Uint8Array(bytes));
    const pageCount = probe.numPages;
    if (probe.destroy) await probe.destroy();

    return {
      pageCount,
      render: async (pageIndex: number, scale: number): Promise<Raster> => {
        const image = await unpdf.renderPageAsImage(new Uint8Array(bytes), pageIndex + 1, {
          canvasImport: () => importModule('@napi-rs/canvas'),
          scale
        });
        return decodePng(image);
      },
      close: async () => {}
    };
  }
}
