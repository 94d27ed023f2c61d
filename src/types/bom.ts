import type { BoundingBox, PageTableRow } from './pdf';

export type ColumnRole =
  | 'position'
  | 'part_number'
  | 'description'
  | 'quantity'
  | 'unit'
  | 'material'
  | 'unknown';

export type KnownColumnRole = Exclude<ColumnRole, 'unknown'>;

export type ExtractionSource = 'table' | 'annotation' | 'geometry';

export type ExtractionMode = 'table' | 'interpreted';

export type ComponentCategory =
  | 'pipe_end'
  | 'pipe_run'
  | 'elbow'
  | 'plate'
  | 'flange'
  | 'other'
  | 'none';

export type CategorySource = 'lexical' | 'geometry';

/**
 * How a candidate's quantity came about. Only two single placements of the
 * same part add up when merged; stated and counted quantities keep the maximum.
 */
export type QuantityKind = 'explicit' | 'placement' | 'count';

export type SignalName =
  | 'header_match_strength'
  | 'column_alignment'
  | 'callout_numeric_prefix'
  | 'listing_structure'
  | 'geometry_cluster_size'
  | 'geometry_cluster_tightness'
  | 'lexical_keyword_strength'
  | 'source_agreement'
  | 'extraction_prior';

export type SignalVector = Partial<Record<SignalName, number>>;

export type Verdict = 'correct' | 'needs_review';

export type ItemVerdict = Verdict | 'unrated';

export interface CandidateItem {
  source: ExtractionSource;
  page: number;
  position?: string;
  partNumber?: string;
  description?: string;
  quantity: number;
  unit?: string;
  material?: string;
  comment?: string;
  componentCategory?: ComponentCategory;
  categorySource?: CategorySource;
  quantityKind: QuantityKind;
  extras: Record<string, string>;
  evidence: string[];
  bbox: BoundingBox;
  order: number;
  baseScore: number;
  signals: SignalVector;
}

export interface BomItem {
  itemKey: string;
  page: number;
  pages: number[];
  position?: string;
  partNumber?: string;
  description?: string;
  quantity: number;
  unit?: string;
  material?: string;
  comment?: string;
  componentCategory: ComponentCategory;
  categorySource?: CategorySource;
  extras: Record<string, string>;
  evidence: string[];
  bbox: BoundingBox;
  baseScore: number;
  signals: SignalVector;
  provenance: ExtractionSource[];
  confidence: number;
  verdict: ItemVerdict;
}

export type ReconciledItem = Omit<BomItem, 'confidence' | 'verdict'>;

export interface TableRegion {
  page: number;
  headerRow: PageTableRow;
  dataRows: PageTableRow[];
  roles: ColumnRole[];
  headerStrength: number;
  alignment: number;
  score: number;
  bbox: BoundingBox;
}

export interface PageFailure {
  page: number;
  reason: string;
}

export interface ExtractionDiagnostics {
  tablesChecked: number;
  linesChecked: number;
  shapesConsidered: number;
}

export interface FeedbackSummary {
  count: number;
  correctRatio: number;
}

export interface BomExtractionResult {
  items: BomItem[];
  columnsFound: KnownColumnRole[];
  mode: ExtractionMode;
  tableItemCount: number;
  annotationItemCount: number;
  geometryItemCount: number;
  pageCount: number;
  pagesProcessed: number[];
  pagesSkipped: PageFailure[];
  warnings: string[];
  diagnostics: ExtractionDiagnostics;
  feedback: FeedbackSummary;
  source?: string;
}

export type PipelineStage =
  | 'LOAD'
  | 'PRIMITIVES'
  | 'TABLE_DETECT'
  | 'ANNOTATIONS'
  | 'GEOMETRY'
  | 'RECONCILE'
  | 'SCORE'
  | 'DONE';

export interface PipelineProgress {
  stage: PipelineStage;
  message: string;
  pct: number;
  currentPage?: number;
  totalPages?: number;
}
