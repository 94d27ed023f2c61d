export { DEFAULT_CONFIG, loadConfig } from './config';
export type { BomExtractorConfig } from './config';
export {
  BomExtractionError,
  InvalidInputError,
  UnreadablePageError,
  NoExtractableContentError,
} from './errors';
export type { ErrorStage } from './errors';
export { normalizeHeaderToken, classifyHeaderToken, analyzeHeaderRow, classifyHeaderRow } from './headerClassifier';
export { parseLocaleNumber, parseQuantity } from './numbers';
export { detectTables } from './tableDetector';
export { interpretAnnotations, parseCallout } from './annotationInterpreter';
export { clusterGeometry, shapeSignature, categoryForSignature, CATEGORY_LABELS } from './geometryClusterer';
export { classifyPartType, matchPartKeywords } from './partTypeClassifier';
export { reconcileCandidates } from './reconcile';
export { computeItemKey } from './itemKey';
export { extractBom, extractBomFromProvider, readPdfSource } from './pipeline';
export type { ExtractBomOptions, PdfSource } from './pipeline';
