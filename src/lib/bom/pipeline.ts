import { readFile } from 'node:fs/promises';
import type { PagePrimitives, PrimitiveProvider } from '../../types/pdf';
import type {
  BomExtractionResult,
  CandidateItem,
  PageFailure,
  PipelineProgress,
  TableRegion,
} from '../../types/bom';
import { PdfJsPrimitiveProvider } from '../pdf/extractPdfPrimitives';
import { getFeedbackEngine, type FeedbackEngine } from '../feedback/engine';
import { loadConfig, type BomExtractorConfig } from './config';
import {
  InvalidInputError,
  NoExtractableContentError,
  UnreadablePageError,
  getErrorMessage,
} from './errors';
import { detectTables } from './tableDetector';
import { interpretAnnotations } from './annotationInterpreter';
import { clusterGeometry } from './geometryClusterer';
import { classifyPartType } from './partTypeClassifier';
import { reconcileCandidates } from './reconcile';
import { computeFingerprint } from './itemKey';

export type PdfSource = Uint8Array | ArrayBuffer | string;

export interface ExtractBomOptions {
  config?: Partial<BomExtractorConfig>;
  engine?: FeedbackEngine;
  onProgress?: (progress: PipelineProgress) => void;
  source?: string;
}

const PDF_MAGIC = '%PDF-';
const HEADER_WINDOW = 1024;

function emit(options: ExtractBomOptions, progress: PipelineProgress) {
  options.onProgress?.(progress);
}

function withTimeout<T>(promise: Promise<T>, ms: number, page: number): Promise<T> {
  if (!(ms > 0)) return promise;
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new UnreadablePageError(page, 'timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export async function readPdfSource(source: PdfSource): Promise<{ data: Uint8Array; label?: string }> {
  let data: Uint8Array;
  let label: string | undefined;

  if (typeof source === 'string') {
    try {
      data = await readFile(source);
    } catch (err) {
      throw new InvalidInputError(`Cannot read ${source}: ${getErrorMessage(err)}`, err);
    }
    label = source;
  } else if (source instanceof ArrayBuffer) {
    data = new Uint8Array(source);
  } else {
    data = source;
  }

  if (data.byteLength === 0) {
    throw new InvalidInputError('PDF data is empty');
  }
  const head = Buffer.from(data.subarray(0, HEADER_WINDOW)).toString('latin1');
  if (!head.includes(PDF_MAGIC)) {
    throw new InvalidInputError('Not a PDF document: missing %PDF- header');
  }
  return { data, label };
}

async function readPages(
  provider: PrimitiveProvider,
  config: BomExtractorConfig,
  options: ExtractBomOptions
): Promise<{ pages: PagePrimitives[]; skipped: PageFailure[] }> {
  const pages: PagePrimitives[] = [];
  const skipped: PageFailure[] = [];
  const total = provider.pageCount;

  for (let page = 1; page <= total; page++) {
    emit(options, {
      stage: 'PRIMITIVES',
      message: `Reading page ${page} of ${total}...`,
      pct: 5 + Math.round((page / total) * 45),
      currentPage: page,
      totalPages: total,
    });
    try {
      pages.push(await withTimeout(provider.getPagePrimitives(page), config.pageTimeoutMs, page));
    } catch (err) {
      const failure = err instanceof UnreadablePageError ? err : new UnreadablePageError(page, getErrorMessage(err), err);
      console.warn(`[bom-extract] Skipping page ${page}: ${failure.reason}`);
      skipped.push({ page, reason: failure.reason });
    }
  }
  return { pages, skipped };
}

export async function extractBomFromProvider(
  provider: PrimitiveProvider,
  options: ExtractBomOptions = {}
): Promise<BomExtractionResult> {
  const config = loadConfig(options.config);
  const engine = options.engine ?? (await getFeedbackEngine(config));

  const { pages, skipped } = await readPages(provider, config, options);
  const hasPrimitives = pages.some((p) => p.textTokens.length > 0 || p.geometries.length > 0);
  if (!hasPrimitives) {
    throw new NoExtractableContentError(
      `No page yielded any primitives (${skipped.length} of ${provider.pageCount} skipped)`,
      'primitives'
    );
  }

  const warnings: string[] = skipped.map((s) => `Page ${s.page} skipped: ${s.reason}`);
  const tableCandidates: CandidateItem[] = [];
  const annotationCandidates: CandidateItem[] = [];
  const geometryCandidates: CandidateItem[] = [];
  const regions: TableRegion[] = [];
  const consumed = new Map<number, Set<string>>();
  const diagnostics = { tablesChecked: 0, linesChecked: 0, shapesConsidered: 0 };

  emit(options, { stage: 'TABLE_DETECT', message: 'Looking for parts lists...', pct: 55 });
  for (const page of pages) {
    const detection = detectTables(page, config);
    tableCandidates.push(...detection.candidates);
    regions.push(...detection.regions);
    for (const w of detection.warnings) {
      console.warn(`[bom-extract] ${w}`);
      warnings.push(w);
    }
    consumed.set(page.page, detection.consumedTokenIds);
    diagnostics.tablesChecked += detection.tablesChecked;
  }

  emit(options, { stage: 'ANNOTATIONS', message: 'Reading callouts and notes...', pct: 65 });
  for (const page of pages) {
    const result = interpretAnnotations(page, consumed.get(page.page) ?? new Set(), config);
    annotationCandidates.push(...result.candidates);
    diagnostics.linesChecked += result.linesChecked;
  }

  emit(options, { stage: 'GEOMETRY', message: 'Grouping repeated shapes...', pct: 75 });
  for (const page of pages) {
    const result = clusterGeometry(page, regions, config);
    geometryCandidates.push(...result.candidates);
    diagnostics.shapesConsidered += result.shapesConsidered;
  }

  const candidateCount = tableCandidates.length + annotationCandidates.length + geometryCandidates.length;
  if (candidateCount === 0) {
    throw new NoExtractableContentError('No table, callout or shape cluster produced an item', 'reconcile');
  }

  emit(options, { stage: 'RECONCILE', message: `Reconciling ${candidateCount} candidates...`, pct: 85 });
  const classify = (items: CandidateItem[]) => items.map((item) => classifyPartType(item, config));
  const reconciled = reconcileCandidates(
    {
      table: classify(tableCandidates),
      annotation: classify(annotationCandidates),
      geometry: classify(geometryCandidates),
      tableRegions: regions,
    },
    config
  );

  emit(options, { stage: 'SCORE', message: 'Scoring items...', pct: 95 });
  const items = await engine.scoreItems(reconciled.items);

  const result: BomExtractionResult = {
    items,
    columnsFound: reconciled.columnsFound,
    mode: reconciled.mode,
    tableItemCount: items.filter((i) => i.provenance.includes('table')).length,
    annotationItemCount: items.filter((i) => i.provenance.includes('annotation')).length,
    geometryItemCount: items.filter((i) => i.provenance.includes('geometry')).length,
    pageCount: provider.pageCount,
    pagesProcessed: pages.map((p) => p.page),
    pagesSkipped: skipped,
    warnings,
    diagnostics,
    feedback: engine.summary(),
  };
  if (options.source) result.source = options.source;

  emit(options, { stage: 'DONE', message: `Extracted ${items.length} items`, pct: 100 });
  return result;
}

export async function extractBom(source: PdfSource, options: ExtractBomOptions = {}): Promise<BomExtractionResult> {
  emit(options, { stage: 'LOAD', message: 'Loading PDF...', pct: 0 });
  const { data, label } = await readPdfSource(source);
  const provider = await PdfJsPrimitiveProvider.open(data);
  try {
    return await extractBomFromProvider(provider, {
      ...options,
      source: options.source ?? label ?? `sha256:${computeFingerprint(data)}`,
    });
  } finally {
    await provider.close();
  }
}
