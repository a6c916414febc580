export * from './config.js';
export * from './pdf.js';
export * from './output.js';
