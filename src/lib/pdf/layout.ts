import type { BoundingBox, PageLine, PageTableRow, TableCell, TextToken } from '../../types/pdf';

export interface LayoutTolerances {
  /** Largest baseline distance between tokens of one line. */
  line: number;
  /** Smallest horizontal gap that opens a new cell. */
  cell: number;
}

export interface PageLayout {
  tolerances: LayoutTolerances;
  lines: PageLine[];
  rows: PageTableRow[];
}

const MIN_LINE_TOLERANCE = 2;
const MIN_CELL_GAP = 10;
const LINE_HEIGHT_SHARE = 0.6;
const CELL_GAP_CHARS = 2.2;
const WORD_GAP = 1;

function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = sorted.length >> 1;
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function measureTolerances(tokens: TextToken[]): LayoutTolerances {
  const heights: number[] = [];
  const advances: number[] = [];
  for (const t of tokens) {
    if (t.height > 0) heights.push(t.height);
    if (t.width > 0 && t.str.length > 0) advances.push(t.width / t.str.length);
  }
  return {
    line: Math.max(MIN_LINE_TOLERANCE, median(heights) * LINE_HEIGHT_SHARE),
    cell: Math.max(MIN_CELL_GAP, median(advances) * CELL_GAP_CHARS),
  };
}

export function tokenBox(token: TextToken): BoundingBox {
  return { x0: token.x, y0: token.y, x1: token.x + token.width, y1: token.y + token.height };
}

function rightEdge(token: TextToken): number {
  return token.x + token.width;
}

function byX(a: TextToken, b: TextToken): number {
  return a.x - b.x;
}

/** Tokens already in reading order; touching runs are glued, separated ones get a space. */
function readText(tokens: TextToken[], separator: (gap: number) => string): string {
  let text = '';
  tokens.forEach((t, i) => {
    if (i > 0) text += separator(t.x - rightEdge(tokens[i - 1]));
    text += t.str;
  });
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Lines from the top of the page down. A token joins the open line while its
 * baseline stays within `tolerance` of the line's mean baseline.
 */
export function groupIntoLines(tokens: TextToken[], page: number, tolerance: number): PageLine[] {
  const lines: PageLine[] = [];
  let members: TextToken[] = [];
  let baselineSum = 0;

  const closeLine = () => {
    if (members.length === 0) return;
    const ordered = [...members].sort(byX);
    lines.push({
      y: baselineSum / members.length,
      items: ordered,
      text: readText(ordered, (gap) => (gap > WORD_GAP ? ' ' : '')),
      page,
    });
    members = [];
    baselineSum = 0;
  };

  for (const token of [...tokens].sort((a, b) => b.y - a.y || a.x - b.x)) {
    if (members.length > 0 && Math.abs(token.y - baselineSum / members.length) > tolerance) {
      closeLine();
    }
    members.push(token);
    baselineSum += token.y;
  }
  closeLine();
  return lines;
}

function toCell(tokens: TextToken[]): TableCell {
  return {
    text: readText(tokens, () => ' '),
    x0: tokens[0].x,
    x1: tokens.reduce((edge, t) => Math.max(edge, rightEdge(t)), -Infinity),
    items: tokens,
  };
}

/** Splits one line's tokens wherever the horizontal gap exceeds `gap`. */
export function splitIntoCells(lineTokens: TextToken[], gap: number): TableCell[] {
  const cells: TableCell[] = [];
  let run: TextToken[] = [];
  let runEdge = -Infinity;

  for (const token of [...lineTokens].sort(byX)) {
    if (run.length > 0 && token.x - runEdge > gap) {
      cells.push(toCell(run));
      run = [];
    }
    run.push(token);
    runEdge = run.length === 1 ? rightEdge(token) : Math.max(runEdge, rightEdge(token));
  }
  if (run.length > 0) cells.push(toCell(run));
  return cells;
}

export function buildRows(lines: PageLine[], gap: number): PageTableRow[] {
  return lines.map((line) => ({
    cells: splitIntoCells(line.items, gap),
    rowText: line.text,
    y: line.y,
    page: line.page,
  }));
}

export function layoutTokens(tokens: TextToken[], page: number): PageLayout {
  const tolerances = measureTolerances(tokens);
  const lines = groupIntoLines(tokens, page, tolerances.line);
  return { tolerances, lines, rows: buildRows(lines, tolerances.cell) };
}
