import type { BoundingBox } from '../../types/pdf';

export const EMPTY_BOX: BoundingBox = { x0: 0, y0: 0, x1: 0, y1: 0 };

export function boxWidth(box: BoundingBox): number {
  return box.x1 - box.x0;
}

export function boxHeight(box: BoundingBox): number {
  return box.y1 - box.y0;
}

export function centerX(box: BoundingBox): number {
  return box.x0 + boxWidth(box) / 2;
}

export function centerY(box: BoundingBox): number {
  return box.y0 + boxHeight(box) / 2;
}

export function unionBoxes(boxes: BoundingBox[]): BoundingBox {
  if (boxes.length === 0) return { ...EMPTY_BOX };
  const union = { ...boxes[0] };
  for (const b of boxes) {
    if (b.x0 < union.x0) union.x0 = b.x0;
    if (b.y0 < union.y0) union.y0 = b.y0;
    if (b.x1 > union.x1) union.x1 = b.x1;
    if (b.y1 > union.y1) union.y1 = b.y1;
  }
  return union;
}

export function expandBox(box: BoundingBox, margin: number): BoundingBox {
  return {
    x0: box.x0 - margin,
    y0: box.y0 - margin,
    x1: box.x1 + margin,
    y1: box.y1 + margin,
  };
}

export function overlapArea(a: BoundingBox, b: BoundingBox): number {
  const w = Math.min(a.x1, b.x1) - Math.max(a.x0, b.x0);
  const h = Math.min(a.y1, b.y1) - Math.max(a.y0, b.y0);
  if (w < 0 || h < 0) return 0;
  return w * h;
}

/** Touching edges count as overlap; zero-height boxes (lines) still intersect. */
export function boxesOverlap(a: BoundingBox, b: BoundingBox): boolean {
  return a.x0 <= b.x1 && b.x0 <= a.x1 && a.y0 <= b.y1 && b.y0 <= a.y1;
}

export function containsPoint(box: BoundingBox, x: number, y: number): boolean {
  return x >= box.x0 && x <= box.x1 && y >= box.y0 && y <= box.y1;
}

export function intervalOverlap(a0: number, a1: number, b0: number, b1: number): number {
  return Math.max(0, Math.min(a1, b1) - Math.max(a0, b0));
}
