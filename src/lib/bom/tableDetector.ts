import type { BoundingBox, PagePrimitives, PageTableRow, TableCell } from '../../types/pdf';
import type { CandidateItem, ColumnRole, TableRegion } from '../../types/bom';
import { layoutTokens, tokenBox } from '../pdf/layout';
import { boxesOverlap, intervalOverlap, unionBoxes } from '../pdf/bbox';
import { analyzeHeaderRow, type HeaderAnalysis } from './headerClassifier';
import { DEFAULT_CONFIG, type BomExtractorConfig } from './config';
import { parseQuantity } from './numbers';
import { cleanCellText } from './normalize';

export interface TableDetection {
  regions: TableRegion[];
  candidates: CandidateItem[];
  consumedTokenIds: Set<string>;
  warnings: string[];
  tablesChecked: number;
}

interface ColumnSpan {
  x0: number;
  x1: number;
}

interface AlignedRow {
  row: PageTableRow;
  alignment: number;
  columns: (number | null)[];
}

interface RegionCandidate {
  region: TableRegion;
  analysis: HeaderAnalysis;
  rows: AlignedRow[];
}

function isHeaderCandidate(row: PageTableRow): HeaderAnalysis | null {
  if (row.cells.length < 2) return null;
  const analysis = analyzeHeaderRow(row.cells.map((c) => c.text));
  return analysis.distinctRoles >= 2 ? analysis : null;
}

/**
 * A row inside a table only opens a new one when it reads as a header on its
 * own: most cells name a role, and every named role is an exact synonym.
 */
function isStrongHeader(row: PageTableRow): boolean {
  const analysis = isHeaderCandidate(row);
  if (!analysis) return false;
  const known = analysis.roles.filter((r) => r !== 'unknown').length;
  return (
    known * 2 > analysis.roles.length &&
    analysis.roles.every((role, k) => role === 'unknown' || analysis.strengths[k] === 1)
  );
}

function columnFor(cell: TableCell, spans: ColumnSpan[]): number | null {
  let best: number | null = null;
  let bestOverlap = 0;
  for (let index = 0; index < spans.length; index++) {
    const overlap = intervalOverlap(cell.x0, cell.x1, spans[index].x0, spans[index].x1);
    if (overlap > bestOverlap) {
      bestOverlap = overlap;
      best = index;
    }
  }
  return best;
}

function alignRow(row: PageTableRow, spans: ColumnSpan[]): AlignedRow {
  const columns = row.cells.map((cell) => columnFor(cell, spans));
  const aligned = columns.filter((c) => c !== null).length;
  return { row, columns, alignment: row.cells.length > 0 ? aligned / row.cells.length : 0 };
}

function rowBox(rows: PageTableRow[]): BoundingBox {
  return unionBoxes(rows.flatMap((r) => r.cells.flatMap((c) => c.items.map(tokenBox))));
}

function findRegionCandidates(
  rows: PageTableRow[],
  page: number,
  yTol: number,
  xGapTol: number
): { found: RegionCandidate[]; checked: number } {
  const found: RegionCandidate[] = [];
  let checked = 0;

  for (let i = 0; i < rows.length; i++) {
    const analysis = isHeaderCandidate(rows[i]);
    if (!analysis) continue;
    checked++;

    const headerRow = rows[i];
    const spans: ColumnSpan[] = headerRow.cells.map((c) => ({
      x0: c.x0 - xGapTol,
      x1: c.x1 + xGapTol,
    }));

    const firstGap = i + 1 < rows.length ? Math.abs(headerRow.y - rows[i + 1].y) : 0;
    const baseRowSpacing = firstGap > 0 ? firstGap : yTol * 2;
    const gapThreshold = Math.max(baseRowSpacing * 2.5, yTol * 4);

    const dataRows: AlignedRow[] = [];
    for (let j = i + 1; j < rows.length; j++) {
      if (isStrongHeader(rows[j])) break;
      if (Math.abs(rows[j - 1].y - rows[j].y) > gapThreshold) break;
      const aligned = alignRow(rows[j], spans);
      if (aligned.alignment < 0.5) break;
      dataRows.push(aligned);
    }

    if (dataRows.length < 2) continue;

    const strengthSum = analysis.strengths.reduce((s, v) => s + v, 0);
    const headerStrength = Math.min(1, strengthSum / 3);
    const alignment = dataRows.reduce((s, r) => s + r.alignment, 0) / dataRows.length;
    const rowFactor = Math.min(1, dataRows.length / 5);
    const score = 0.5 * headerStrength + 0.3 * alignment + 0.2 * rowFactor;

    found.push({
      analysis,
      rows: dataRows,
      region: {
        page,
        headerRow,
        dataRows: dataRows.map((r) => r.row),
        roles: analysis.roles,
        headerStrength,
        alignment,
        score,
        bbox: rowBox([headerRow, ...dataRows.map((r) => r.row)]),
      },
    });
  }

  return { found, checked };
}

function selectRegions(found: RegionCandidate[], minScore: number): RegionCandidate[] {
  const ranked = found
    .filter((f) => f.region.score >= minScore)
    .map((f, index) => ({ f, index }))
    .sort((a, b) => b.f.region.score - a.f.region.score || a.index - b.index);

  const accepted: RegionCandidate[] = [];
  for (const { f } of ranked) {
    if (accepted.some((a) => boxesOverlap(a.region.bbox, f.region.bbox))) continue;
    accepted.push(f);
  }
  return accepted.sort((a, b) => b.region.headerRow.y - a.region.headerRow.y);
}

function rowToCandidate(
  aligned: AlignedRow,
  region: RegionCandidate,
  order: number,
  config: BomExtractorConfig
): CandidateItem | null {
  const { roles, labels } = region.analysis;
  const byColumn = new Map<number, string[]>();
  const unassigned: string[] = [];

  aligned.row.cells.forEach((cell, k) => {
    const column = aligned.columns[k];
    if (column === null) {
      unassigned.push(cell.text);
      return;
    }
    const texts = byColumn.get(column) ?? [];
    texts.push(cell.text);
    byColumn.set(column, texts);
  });

  const valueFor = (role: ColumnRole): string | undefined => {
    const column = roles.indexOf(role);
    if (column < 0) return undefined;
    const text = cleanCellText((byColumn.get(column) ?? []).join(' '));
    return text || undefined;
  };

  const extras: Record<string, string> = {};
  roles.forEach((role, column) => {
    if (role !== 'unknown') return;
    const text = cleanCellText((byColumn.get(column) ?? []).join(' '));
    if (text) extras[cleanCellText(labels[column]) || `column_${column + 1}`] = text;
  });
  if (unassigned.length > 0) extras.unassigned = unassigned.join(' ');

  const position = valueFor('position')?.replace(/\.$/, '');
  const partNumber = valueFor('part_number');
  const description = valueFor('description');
  if (!position && !partNumber && !description) return null;

  let unit = valueFor('unit');
  let quantity = 1;
  let baseScore = config.tableBaseScore;
  const quantityText = valueFor('quantity');
  if (quantityText) {
    const parsed = parseQuantity(quantityText);
    if (parsed) {
      quantity = parsed.value;
      if (!unit && parsed.unit) unit = parsed.unit;
    } else {
      extras.quantity_raw = quantityText;
      baseScore *= config.unparsableQuantityPenalty;
    }
  }

  const tokens = aligned.row.cells.flatMap((c) => c.items);
  const candidate: CandidateItem = {
    source: 'table',
    page: region.region.page,
    quantity,
    quantityKind: 'explicit',
    extras,
    evidence: tokens.map((t) => t.id),
    bbox: unionBoxes(tokens.map(tokenBox)),
    order,
    baseScore,
    signals: {
      header_match_strength: region.region.headerStrength,
      column_alignment: aligned.alignment,
      extraction_prior: baseScore,
    },
  };
  if (position) candidate.position = position;
  if (partNumber) candidate.partNumber = partNumber;
  if (description) candidate.description = description;
  if (unit) candidate.unit = unit;
  const material = valueFor('material');
  if (material) candidate.material = material;
  return candidate;
}

export function detectTables(
  page: PagePrimitives,
  config: BomExtractorConfig = DEFAULT_CONFIG
): TableDetection {
  const tokens = page.textTokens.filter((t) => t.str.trim().length > 0);
  const empty: TableDetection = {
    regions: [],
    candidates: [],
    consumedTokenIds: new Set(),
    warnings: [],
    tablesChecked: 0,
  };
  if (tokens.length === 0) return empty;

  const { rows, tolerances } = layoutTokens(tokens, page.page);
  const { found, checked } = findRegionCandidates(rows, page.page, tolerances.line, tolerances.cell);
  const accepted = selectRegions(found, config.minTableScore);

  const candidates: CandidateItem[] = [];
  const consumedTokenIds = new Set<string>();
  const warnings: string[] = [];

  for (const region of accepted) {
    warnings.push(...region.analysis.warnings.map((w) => `Page ${page.page}: ${w}`));
    for (const row of [region.region.headerRow, ...region.region.dataRows]) {
      for (const cell of row.cells) {
        for (const token of cell.items) consumedTokenIds.add(token.id);
      }
    }
    for (const aligned of region.rows) {
      const candidate = rowToCandidate(aligned, region, candidates.length, config);
      if (candidate) candidates.push(candidate);
    }
  }

  return {
    regions: accepted.map((r) => r.region),
    candidates,
    consumedTokenIds,
    warnings,
    tablesChecked: checked,
  };
}
