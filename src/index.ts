export * from './lib/bom';
export * from './lib/feedback';
export { PdfJsPrimitiveProvider } from './lib/pdf/extractPdfPrimitives';
export type * from './types/pdf';
export type * from './types/bom';
export type * from './types/feedback';
