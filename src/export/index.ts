export { ExportAdapter, encodePng, type ExportAdapterOptions, type ExportTarget } from './export-adapter.js';
export { UnpdfRasterizer, decodePng } from './unpdf-rasterizer.js';
export { encodeTiff, flattenToRgb, type TiffEncodeOptions } from './tiff-encoder.js';
export { defaultOutputPath, resolveOutputPath, pngPagePath } from './output-paths.js';
