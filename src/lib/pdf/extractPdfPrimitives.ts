import type { PDFDocumentProxy, TextItem, TextMarkedContent } from 'pdfjs-dist/types/src/display/api';
import type {
  BoundingBox,
  GeometryPrimitive,
  PagePrimitives,
  PrimitiveProvider,
  TextToken,
} from '../../types/pdf';
import { unionBoxes } from './bbox';
import { InvalidInputError, UnreadablePageError, getErrorMessage } from '../bom/errors';

type PdfJsModule = typeof import('pdfjs-dist/legacy/build/pdf.mjs');
type OpsTable = PdfJsModule['OPS'];
type Matrix = [number, number, number, number, number, number];
type Point = [number, number];

interface SubPath {
  points: Point[];
  hasCurve: boolean;
  closed: boolean;
  isRect: boolean;
}

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];
const AXIS_EPS = 0.5;

let pdfjsModule: Promise<PdfJsModule> | null = null;

function loadPdfJs(): Promise<PdfJsModule> {
  if (!pdfjsModule) {
    pdfjsModule = import('pdfjs-dist/legacy/build/pdf.mjs');
  }
  return pdfjsModule;
}

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return 'str' in item;
}

function numberList(value: unknown): number[] {
  if (Array.isArray(value)) return value.filter((v): v is number => typeof v === 'number');
  if (value instanceof Float32Array || value instanceof Float64Array) return Array.from(value);
  return [];
}

function isMatrix(values: number[]): values is Matrix {
  return values.length === 6;
}

function multiply(ctm: Matrix, m: Matrix): Matrix {
  return [
    ctm[0] * m[0] + ctm[2] * m[1],
    ctm[1] * m[0] + ctm[3] * m[1],
    ctm[0] * m[2] + ctm[2] * m[3],
    ctm[1] * m[2] + ctm[3] * m[3],
    ctm[0] * m[4] + ctm[2] * m[5] + ctm[4],
    ctm[1] * m[4] + ctm[3] * m[5] + ctm[5],
  ];
}

function apply(ctm: Matrix, x: number, y: number): Point {
  return [ctm[0] * x + ctm[2] * y + ctm[4], ctm[1] * x + ctm[3] * y + ctm[5]];
}

function boxOf(points: Point[]): BoundingBox {
  return unionBoxes(points.map(([x, y]) => ({ x0: x, y0: y, x1: x, y1: y })));
}

function samePoint(a: Point, b: Point): boolean {
  return Math.abs(a[0] - b[0]) <= AXIS_EPS && Math.abs(a[1] - b[1]) <= AXIS_EPS;
}

function isAxisAlignedQuad(points: Point[]): boolean {
  const corners = samePoint(points[0], points[points.length - 1]) ? points.slice(0, -1) : points;
  if (corners.length !== 4) return false;
  return corners.every((p, i) => {
    const q = corners[(i + 1) % 4];
    return Math.abs(p[0] - q[0]) <= AXIS_EPS || Math.abs(p[1] - q[1]) <= AXIS_EPS;
  });
}

/** Walks a constructPath argument triple into subpaths in page space. */
function readPath(ops: OpsTable, pathOps: number[], coords: number[], ctm: Matrix): SubPath[] {
  const subpaths: SubPath[] = [];
  let current: SubPath | null = null;
  let c = 0;

  const take = (n: number): Point[] => {
    const pts: Point[] = [];
    for (let k = 0; k + 1 < n; k += 2) pts.push(apply(ctm, coords[c + k], coords[c + k + 1]));
    c += n;
    return pts;
  };

  for (const op of pathOps) {
    switch (op) {
      case ops.moveTo:
        current = { points: take(2), hasCurve: false, closed: false, isRect: false };
        subpaths.push(current);
        break;
      case ops.lineTo:
        if (current) current.points.push(...take(2));
        else c += 2;
        break;
      case ops.curveTo:
        if (current) {
          current.points.push(...take(6));
          current.hasCurve = true;
        } else c += 6;
        break;
      case ops.curveTo2:
      case ops.curveTo3:
        if (current) {
          current.points.push(...take(4));
          current.hasCurve = true;
        } else c += 4;
        break;
      case ops.closePath:
        if (current) current.closed = true;
        break;
      case ops.rectangle: {
        const [x, y, w, h] = coords.slice(c, c + 4);
        c += 4;
        subpaths.push({
          points: [apply(ctm, x, y), apply(ctm, x + w, y), apply(ctm, x + w, y + h), apply(ctm, x, y + h)],
          hasCurve: false,
          closed: true,
          isRect: true,
        });
        current = null;
        break;
      }
      default:
        break;
    }
  }
  return subpaths.filter((s) => s.points.length > 0 && s.points.every((p) => Number.isFinite(p[0]) && Number.isFinite(p[1])));
}

function toPrimitives(
  subpaths: SubPath[],
  page: number,
  paint: { stroked: boolean; filled: boolean; close: boolean },
  nextId: () => string
): GeometryPrimitive[] {
  const out: GeometryPrimitive[] = [];
  for (const sub of subpaths) {
    const closed = sub.closed || paint.close || (sub.points.length > 2 && samePoint(sub.points[0], sub.points[sub.points.length - 1]));
    const base = { page, stroked: paint.stroked, filled: paint.filled };

    if (sub.isRect || (!sub.hasCurve && closed && isAxisAlignedQuad(sub.points))) {
      out.push({ id: nextId(), kind: 'rect', bbox: boxOf(sub.points), closed: true, ...base });
    } else if (sub.hasCurve) {
      out.push({ id: nextId(), kind: 'curve', bbox: boxOf(sub.points), closed, ...base });
    } else {
      const pts = closed && !samePoint(sub.points[0], sub.points[sub.points.length - 1])
        ? [...sub.points, sub.points[0]]
        : sub.points;
      for (let i = 1; i < pts.length; i++) {
        out.push({ id: nextId(), kind: 'line', bbox: boxOf([pts[i - 1], pts[i]]), closed: false, ...base });
      }
    }
  }
  return out;
}

export class PdfJsPrimitiveProvider implements PrimitiveProvider {
  private readonly doc: PDFDocumentProxy;
  private readonly ops: OpsTable;

  private constructor(doc: PDFDocumentProxy, ops: OpsTable) {
    this.doc = doc;
    this.ops = ops;
  }

  static async open(data: Uint8Array): Promise<PdfJsPrimitiveProvider> {
    const pdfjs = await loadPdfJs();
    try {
      // pdfjs takes ownership of the buffer it is given
      const doc = await pdfjs.getDocument({
        data: new Uint8Array(data),
        useSystemFonts: true,
        isEvalSupported: false,
        disableFontFace: true,
        verbosity: 0,
      }).promise;
      return new PdfJsPrimitiveProvider(doc, pdfjs.OPS);
    } catch (err) {
      const msg = getErrorMessage(err);
      if (msg.includes('password') || msg.includes('encrypted')) {
        throw new InvalidInputError('PDF is password-protected', err);
      }
      throw new InvalidInputError(`PDF could not be opened: ${msg}`, err);
    }
  }

  get pageCount(): number {
    return this.doc.numPages;
  }

  async getPagePrimitives(pageNumber: number): Promise<PagePrimitives> {
    try {
      const page = await this.doc.getPage(pageNumber);
      const [x0, y0, x1, y1] = page.view;

      const content = await page.getTextContent();
      const textTokens: TextToken[] = [];
      content.items.forEach((item, i) => {
        if (!isTextItem(item) || !item.str.trim()) return;
        const transform = numberList(item.transform);
        textTokens.push({
          id: `p${pageNumber}-t${i}`,
          str: item.str,
          x: transform[4] ?? 0,
          y: transform[5] ?? 0,
          width: item.width,
          height: item.height,
          page: pageNumber,
        });
      });

      const geometries = await this.readGeometry(pageNumber);
      page.cleanup();

      return { page: pageNumber, width: x1 - x0, height: y1 - y0, textTokens, geometries };
    } catch (err) {
      throw new UnreadablePageError(pageNumber, getErrorMessage(err), err);
    }
  }

  private async readGeometry(pageNumber: number): Promise<GeometryPrimitive[]> {
    const page = await this.doc.getPage(pageNumber);
    const opList = await page.getOperatorList();
    const ops = this.ops;

    const geometries: GeometryPrimitive[] = [];
    const stack: Matrix[] = [];
    let ctm: Matrix = IDENTITY;
    let pending: SubPath[] = [];
    let counter = 0;
    const nextId = () => `p${pageNumber}-g${counter++}`;

    const paint = (stroked: boolean, filled: boolean, close: boolean) => {
      geometries.push(...toPrimitives(pending, pageNumber, { stroked, filled, close }, nextId));
      pending = [];
    };

    for (let i = 0; i < opList.fnArray.length; i++) {
      const fn = opList.fnArray[i];
      const args: unknown = opList.argsArray[i];

      switch (fn) {
        case ops.save:
          stack.push(ctm);
          break;
        case ops.restore:
          ctm = stack.pop() ?? IDENTITY;
          break;
        case ops.transform: {
          const m = numberList(args);
          if (isMatrix(m)) ctm = multiply(ctm, m);
          break;
        }
        case ops.constructPath: {
          if (!Array.isArray(args)) break;
          pending.push(...readPath(ops, numberList(args[0]), numberList(args[1]), ctm));
          break;
        }
        case ops.stroke:
          paint(true, false, false);
          break;
        case ops.closeStroke:
          paint(true, false, true);
          break;
        case ops.fill:
        case ops.eoFill:
          paint(false, true, false);
          break;
        case ops.fillStroke:
        case ops.eoFillStroke:
          paint(true, true, false);
          break;
        case ops.closeFillStroke:
        case ops.closeEOFillStroke:
          paint(true, true, true);
          break;
        case ops.endPath:
          pending = [];
          break;
        default:
          break;
      }
    }
    return geometries;
  }

  async close(): Promise<void> {
    await this.doc.destroy();
  }
}
