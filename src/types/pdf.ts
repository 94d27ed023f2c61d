export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface TextToken {
  id: string;
  str: string;
  x: number;
  y: number;
  width: number;
  height: number;
  page: number;
}

export type GeometryKind = 'line' | 'rect' | 'curve';

export interface GeometryPrimitive {
  id: string;
  kind: GeometryKind;
  bbox: BoundingBox;
  page: number;
  stroked: boolean;
  filled: boolean;
  closed: boolean;
}

export interface PagePrimitives {
  page: number;
  width: number;
  height: number;
  textTokens: TextToken[];
  geometries: GeometryPrimitive[];
}

export interface PrimitiveProvider {
  readonly pageCount: number;
  getPagePrimitives(page: number): Promise<PagePrimitives>;
  close?(): Promise<void>;
}

export interface PageLine {
  y: number;
  items: TextToken[];
  text: string;
  page: number;
}

export interface TableCell {
  text: string;
  x0: number;
  x1: number;
  items: TextToken[];
}

export interface PageTableRow {
  cells: TableCell[];
  rowText: string;
  y: number;
  page: number;
}
