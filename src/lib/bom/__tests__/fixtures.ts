import type { GeometryKind, GeometryPrimitive, PagePrimitives, TextToken } from '../../../types/pdf';
import type { CandidateItem } from '../../../types/bom';

export const PAGE_WIDTH = 595;
export const PAGE_HEIGHT = 842;

export function item(str: string, x: number, y: number, page = 1): TextToken {
  return { id: `p${page}-${x}-${y}-${str}`, str, x, y, width: str.length * 7, height: 12, page };
}

export function shape(
  id: string,
  kind: GeometryKind,
  x0: number,
  y0: number,
  w: number,
  h: number,
  opts: { closed?: boolean; filled?: boolean; page?: number } = {}
): GeometryPrimitive {
  return {
    id,
    kind,
    bbox: { x0, y0, x1: x0 + w, y1: y0 + h },
    page: opts.page ?? 1,
    stroked: true,
    filled: opts.filled ?? false,
    closed: opts.closed ?? kind !== 'line',
  };
}

export function ring(id: string, x0: number, y0: number, d = 20, page = 1): GeometryPrimitive {
  return shape(id, 'curve', x0, y0, d, d, { closed: true, page });
}

export function makePage(textTokens: TextToken[], geometries: GeometryPrimitive[] = [], page = 1): PagePrimitives {
  return { page, width: PAGE_WIDTH, height: PAGE_HEIGHT, textTokens, geometries };
}

/** Header Pos / Teil / Menge with two rows: Flansch DN50 x2, Rohrbogen 90° x1. */
export function partsListTokens(page = 1): TextToken[] {
  return [
    item('Pos', 50, 700, page),
    item('Teil', 100, 700, page),
    item('Menge', 250, 700, page),
    item('1', 50, 685, page),
    item('Flansch DN50', 100, 685, page),
    item('2', 250, 685, page),
    item('2', 50, 670, page),
    item('Rohrbogen 90°', 100, 670, page),
    item('1', 250, 670, page),
  ];
}

export function candidate(overrides: Partial<CandidateItem> & Pick<CandidateItem, 'source'>): CandidateItem {
  return {
    page: 1,
    quantity: 1,
    quantityKind: 'explicit',
    extras: {},
    evidence: [],
    bbox: { x0: 0, y0: 0, x1: 10, y1: 10 },
    order: 0,
    baseScore: 0.5,
    signals: {},
    ...overrides,
  };
}
