import type { BoundingBox, GeometryKind, GeometryPrimitive, PagePrimitives } from '../../types/pdf';
import type { CandidateItem, ComponentCategory, TableRegion } from '../../types/bom';
import {
  boxHeight,
  boxWidth,
  boxesOverlap,
  centerX,
  centerY,
  containsPoint,
  expandBox,
  unionBoxes,
} from '../pdf/bbox';
import { DEFAULT_CONFIG, type BomExtractorConfig } from './config';

export type AspectBucket = 'square' | 'oblong' | 'elongated' | 'linear';
export type SizeBucket = 'tiny' | 'small' | 'medium' | 'large';
export type CurvatureBucket = 'ring' | 'loop' | 'arc' | 'none';
export type Arrangement = 'single' | 'corner_pair';

export interface ShapeSignature {
  kind: GeometryKind;
  aspect: AspectBucket;
  size: SizeBucket;
  curvature: CurvatureBucket;
  filled: boolean;
  arrangement: Arrangement;
}

export interface Shape {
  kind: GeometryKind;
  bbox: BoundingBox;
  filled: boolean;
  closed: boolean;
  arrangement: Arrangement;
  memberIds: string[];
}

export interface GeometryClustering {
  candidates: CandidateItem[];
  shapesConsidered: number;
}

export const CATEGORY_LABELS: Record<ComponentCategory, string> = {
  pipe_end: 'Rohrende',
  pipe_run: 'Rohr',
  elbow: 'Rohrbogen',
  plate: 'Blech',
  flange: 'Flansch',
  other: 'Bauteil',
  none: 'Bauteil',
};

export const POINT_TO_MM = 25.4 / 72;

const REGION_MARGIN = 2;
const FRAME_FRACTION = 0.9;
const CORNER_TOUCH = 1;

function longSide(box: BoundingBox): number {
  return Math.max(boxWidth(box), boxHeight(box));
}

function shortSide(box: BoundingBox): number {
  return Math.min(boxWidth(box), boxHeight(box));
}

export function aspectBucket(shape: Pick<Shape, 'kind' | 'bbox'>): AspectBucket {
  if (shape.kind === 'line') return 'linear';
  const short = shortSide(shape.bbox);
  if (short <= 0) return 'linear';
  const ratio = longSide(shape.bbox) / short;
  if (ratio < 1.25) return 'square';
  if (ratio < 3) return 'oblong';
  if (ratio < 8) return 'elongated';
  return 'linear';
}

export function sizeBucket(box: BoundingBox, pageWidth: number, pageHeight: number): SizeBucket {
  const diagonal = Math.hypot(pageWidth, pageHeight);
  const rel = diagonal > 0 ? longSide(box) / diagonal : 0;
  if (rel < 0.02) return 'tiny';
  if (rel < 0.06) return 'small';
  if (rel < 0.15) return 'medium';
  return 'large';
}

export function curvatureBucket(shape: Pick<Shape, 'kind' | 'bbox' | 'closed'>): CurvatureBucket {
  if (shape.kind !== 'curve') return 'none';
  if (!shape.closed) return 'arc';
  return aspectBucket(shape) === 'square' ? 'ring' : 'loop';
}

export function shapeSignature(shape: Shape, pageWidth: number, pageHeight: number): ShapeSignature {
  return {
    kind: shape.kind,
    aspect: aspectBucket(shape),
    size: sizeBucket(shape.bbox, pageWidth, pageHeight),
    curvature: curvatureBucket(shape),
    filled: shape.filled,
    arrangement: shape.arrangement,
  };
}

export function signatureKey(sig: ShapeSignature): string {
  return [sig.kind, sig.aspect, sig.size, sig.curvature, sig.filled ? 'filled' : 'open', sig.arrangement].join('|');
}

export function categoryForSignature(sig: ShapeSignature): ComponentCategory | null {
  if (sig.arrangement === 'corner_pair') return 'elbow';
  switch (sig.curvature) {
    case 'arc':
      return 'elbow';
    case 'ring':
      return 'flange';
    case 'loop':
      return 'other';
    default:
      break;
  }
  if (sig.kind === 'rect') {
    if (sig.aspect === 'elongated' || sig.aspect === 'linear') return 'pipe_run';
    // open boxes of some size are frames and title-block cells
    const small = sig.size === 'tiny' || sig.size === 'small';
    return small || (sig.filled && sig.size === 'medium') ? 'plate' : null;
  }
  if (sig.kind === 'line') {
    return sig.size === 'tiny' || sig.size === 'small' ? 'pipe_end' : null;
  }
  return null;
}

function toShape(g: GeometryPrimitive): Shape {
  return {
    kind: g.kind,
    bbox: g.bbox,
    filled: g.filled,
    closed: g.closed,
    arrangement: 'single',
    memberIds: [g.id],
  };
}

function isNoise(g: GeometryPrimitive, page: PagePrimitives, minShapeSize: number): boolean {
  if (longSide(g.bbox) < minShapeSize) return true;
  return (
    boxWidth(g.bbox) >= page.width * FRAME_FRACTION ||
    boxHeight(g.bbox) >= page.height * FRAME_FRACTION
  );
}

/** Two short bars meeting at a corner read as one elbow symbol. */
export function fuseCornerPairs(shapes: Shape[], pageWidth: number, pageHeight: number): Shape[] {
  const isBar = (s: Shape) => {
    if (s.kind !== 'rect') return false;
    const aspect = aspectBucket(s);
    const size = sizeBucket(s.bbox, pageWidth, pageHeight);
    return (aspect === 'oblong' || aspect === 'elongated') && (size === 'small' || size === 'tiny' || size === 'medium');
  };

  const used = new Set<number>();
  const fused: Shape[] = [];

  shapes.forEach((h, i) => {
    if (used.has(i) || !isBar(h) || boxWidth(h.bbox) <= boxHeight(h.bbox)) return;
    const j = shapes.findIndex(
      (v, k) =>
        !used.has(k) &&
        k !== i &&
        isBar(v) &&
        boxHeight(v.bbox) > boxWidth(v.bbox) &&
        boxesOverlap(expandBox(h.bbox, CORNER_TOUCH), v.bbox)
    );
    if (j < 0) return;
    used.add(i);
    used.add(j);
    const v = shapes[j];
    fused.push({
      kind: 'rect',
      bbox: unionBoxes([h.bbox, v.bbox]),
      filled: h.filled && v.filled,
      closed: true,
      arrangement: 'corner_pair',
      memberIds: [...h.memberIds, ...v.memberIds],
    });
  });

  return [...shapes.filter((_, i) => !used.has(i)), ...fused];
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((s, v) => s + v, 0) / values.length;
}

function coefficientOfVariation(values: number[]): number {
  const m = mean(values);
  if (m <= 0) return 0;
  const variance = mean(values.map((v) => (v - m) ** 2));
  return Math.sqrt(variance) / m;
}

function mm(points: number): string {
  return (points * POINT_TO_MM).toFixed(1);
}

export function describeCluster(category: ComponentCategory, shapes: Shape[]): string {
  const label = CATEGORY_LABELS[category];
  const longMean = mean(shapes.map((s) => longSide(s.bbox)));
  const shortMean = mean(shapes.map((s) => shortSide(s.bbox)));

  if (category === 'flange') {
    const diameter = mean(shapes.map((s) => (boxWidth(s.bbox) + boxHeight(s.bbox)) / 2));
    return `${label} Ø ${mm(diameter)} mm`;
  }
  if (shapes.every((s) => s.kind === 'line')) {
    return `${label} ${mm(longMean)} mm`;
  }
  return `${label} ${mm(longMean)} × ${mm(shortMean)} mm`;
}

export function clusterGeometry(
  page: PagePrimitives,
  tableRegions: TableRegion[],
  config: BomExtractorConfig = DEFAULT_CONFIG
): GeometryClustering {
  const regions = tableRegions
    .filter((r) => r.page === page.page)
    .map((r) => expandBox(r.bbox, REGION_MARGIN));

  const kept = page.geometries.filter(
    (g) =>
      !regions.some((box) => containsPoint(box, centerX(g.bbox), centerY(g.bbox))) &&
      !isNoise(g, page, config.minShapeSize)
  );

  const shapes = fuseCornerPairs(kept.map(toShape), page.width, page.height);

  const groups = new Map<string, { signature: ShapeSignature; shapes: Shape[] }>();
  for (const shape of shapes) {
    const signature = shapeSignature(shape, page.width, page.height);
    const key = signatureKey(signature);
    const group = groups.get(key);
    if (group) group.shapes.push(shape);
    else groups.set(key, { signature, shapes: [shape] });
  }

  const candidates: CandidateItem[] = [];
  for (const [key, group] of groups) {
    if (group.shapes.length < config.minClusterSize) continue;
    const category = categoryForSignature(group.signature);
    if (!category) continue;

    const n = group.shapes.length;
    const size = Math.min(1, n / config.clusterSizeSaturation);
    const tightness = Math.min(1, Math.max(0, 1 - coefficientOfVariation(group.shapes.map((s) => longSide(s.bbox)))));
    const baseScore = config.geometryMaxBaseScore * (0.5 * size + 0.5 * tightness);

    candidates.push({
      source: 'geometry',
      page: page.page,
      description: describeCluster(category, group.shapes),
      quantity: n,
      unit: 'Stk',
      componentCategory: category,
      categorySource: 'geometry',
      quantityKind: 'count',
      extras: { signature: key },
      evidence: group.shapes.flatMap((s) => s.memberIds),
      bbox: unionBoxes(group.shapes.map((s) => s.bbox)),
      order: candidates.length,
      baseScore,
      signals: {
        geometry_cluster_size: size,
        geometry_cluster_tightness: tightness,
        extraction_prior: baseScore,
      },
    });
  }

  return { candidates, shapesConsidered: shapes.length };
}
