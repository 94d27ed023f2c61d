import { describe, it, expect } from 'vitest';
import { aspectBucket, categoryForSignature, clusterGeometry, sizeBucket } from '../geometryClusterer';
import { detectTables } from '../tableDetector';
import { PAGE_HEIGHT, PAGE_WIDTH, makePage, partsListTokens, ring, shape } from './fixtures';

describe('shape buckets', () => {
  it('buckets aspect ratios', () => {
    expect(aspectBucket({ kind: 'rect', bbox: { x0: 0, y0: 0, x1: 10, y1: 11 } })).toBe('square');
    expect(aspectBucket({ kind: 'rect', bbox: { x0: 0, y0: 0, x1: 20, y1: 10 } })).toBe('oblong');
    expect(aspectBucket({ kind: 'rect', bbox: { x0: 0, y0: 0, x1: 50, y1: 10 } })).toBe('elongated');
    expect(aspectBucket({ kind: 'rect', bbox: { x0: 0, y0: 0, x1: 100, y1: 10 } })).toBe('linear');
    expect(aspectBucket({ kind: 'line', bbox: { x0: 0, y0: 0, x1: 10, y1: 10 } })).toBe('linear');
  });

  it('buckets size relative to the page diagonal', () => {
    const box = (side: number) => ({ x0: 0, y0: 0, x1: side, y1: side });
    expect(sizeBucket(box(20), PAGE_WIDTH, PAGE_HEIGHT)).toBe('tiny');
    expect(sizeBucket(box(30), PAGE_WIDTH, PAGE_HEIGHT)).toBe('small');
    expect(sizeBucket(box(100), PAGE_WIDTH, PAGE_HEIGHT)).toBe('medium');
    expect(sizeBucket(box(200), PAGE_WIDTH, PAGE_HEIGHT)).toBe('large');
  });
});

describe('clusterGeometry', () => {
  it('counts repeated rings as flanges', () => {
    const page = makePage([], [ring('g1', 100, 300), ring('g2', 140, 300), ring('g3', 180, 300)]);
    const { candidates, shapesConsidered } = clusterGeometry(page, []);

    expect(shapesConsidered).toBe(3);
    expect(candidates).toHaveLength(1);
    const flange = candidates[0];
    expect(flange.description).toBe('Flansch Ø 7.1 mm');
    expect(flange.quantity).toBe(3);
    expect(flange.unit).toBe('Stk');
    expect(flange.componentCategory).toBe('flange');
    expect(flange.categorySource).toBe('geometry');
    expect(flange.quantityKind).toBe('count');
    expect(flange.evidence).toEqual(['g1', 'g2', 'g3']);
    expect(flange.bbox).toEqual({ x0: 100, y0: 300, x1: 200, y1: 320 });
    expect(flange.signals.geometry_cluster_size).toBeCloseTo(0.3);
    expect(flange.signals.geometry_cluster_tightness).toBe(1);
    expect(flange.baseScore).toBeCloseTo(0.325);
  });

  it('needs at least two matching shapes', () => {
    const page = makePage([], [ring('g1', 100, 300)]);
    expect(clusterGeometry(page, []).candidates).toEqual([]);
  });

  it('lowers tightness for uneven sizes', () => {
    const page = makePage([], [ring('g1', 100, 300, 20), ring('g2', 140, 300, 16)]);
    const [flange] = clusterGeometry(page, []).candidates;
    expect(flange.signals.geometry_cluster_tightness).toBeCloseTo(0.8889, 3);
  });

  it('fuses corner bars into elbows', () => {
    const page = makePage(
      [],
      [
        shape('h1', 'rect', 100, 100, 20, 4),
        shape('v1', 'rect', 100, 100, 4, 20),
        shape('h2', 'rect', 300, 100, 20, 4),
        shape('v2', 'rect', 300, 100, 4, 20),
      ]
    );
    const { candidates, shapesConsidered } = clusterGeometry(page, []);

    expect(shapesConsidered).toBe(2);
    expect(candidates).toHaveLength(1);
    expect(candidates[0].componentCategory).toBe('elbow');
    expect(candidates[0].description).toBe('Rohrbogen 7.1 × 7.1 mm');
    expect(candidates[0].quantity).toBe(2);
    expect(candidates[0].evidence).toEqual(['h1', 'v1', 'h2', 'v2']);
  });

  it('reads short strokes as pipe ends', () => {
    const page = makePage(
      [],
      [shape('l1', 'line', 100, 300, 15, 0), shape('l2', 'line', 200, 300, 15, 0)]
    );
    const [ends] = clusterGeometry(page, []).candidates;
    expect(ends.componentCategory).toBe('pipe_end');
    expect(ends.description).toBe('Rohrende 5.3 mm');
  });

  it('ignores shapes inside a parts list and the page frame', () => {
    const tokens = partsListTokens();
    const page = makePage(tokens, [
      ring('g1', 120, 675),
      ring('g2', 160, 675),
      shape('frame', 'rect', 5, 5, 585, 832),
    ]);
    const { regions } = detectTables(page);
    const result = clusterGeometry(page, regions);

    expect(result.shapesConsidered).toBe(0);
    expect(result.candidates).toEqual([]);
  });

  it('drops specks below the minimum size', () => {
    const page = makePage([], [ring('g1', 100, 300, 2), ring('g2', 140, 300, 2)]);
    expect(clusterGeometry(page, []).shapesConsidered).toBe(0);
  });

  it('reads small boxes and filled medium boxes as plates', () => {
    const page = makePage(
      [],
      [
        shape('s1', 'rect', 100, 100, 20, 15),
        shape('s2', 'rect', 200, 100, 20, 15),
        shape('f1', 'rect', 50, 400, 100, 80, { filled: true }),
        shape('f2', 'rect', 300, 400, 100, 80, { filled: true }),
      ]
    );
    const { candidates } = clusterGeometry(page, []);
    expect(candidates.map((c) => c.componentCategory)).toEqual(['plate', 'plate']);
    expect(candidates[0].description).toBe('Blech 7.1 × 5.3 mm');
    expect(candidates[0].evidence).toEqual(['s1', 's2']);
    expect(candidates[1].evidence).toEqual(['f1', 'f2']);
  });

  it('leaves open frames and title-block cells alone', () => {
    const page = makePage(
      [],
      [
        shape('c1', 'rect', 50, 400, 100, 80),
        shape('c2', 'rect', 300, 400, 100, 80),
        shape('b1', 'rect', 20, 20, 200, 200),
        shape('b2', 'rect', 300, 20, 200, 200),
      ]
    );
    const result = clusterGeometry(page, []);
    expect(result.shapesConsidered).toBe(4);
    expect(result.candidates).toEqual([]);
  });

  it('counts a very large number of identical symbols', () => {
    const rings = Array.from({ length: 200_000 }, (_, i) => ring(`g${i}`, 100, 300));
    const [flange] = clusterGeometry(makePage([], rings), []).candidates;
    expect(flange.quantity).toBe(200_000);
    expect(flange.bbox).toEqual({ x0: 100, y0: 300, x1: 120, y1: 320 });
    expect(flange.signals.geometry_cluster_size).toBe(1);
    expect(flange.signals.geometry_cluster_tightness).toBe(1);
  });
});

describe('categoryForSignature', () => {
  const rect = { kind: 'rect', curvature: 'none', arrangement: 'single' } as const;

  it('maps boxes by size and fill', () => {
    expect(categoryForSignature({ ...rect, aspect: 'square', size: 'tiny', filled: false })).toBe('plate');
    expect(categoryForSignature({ ...rect, aspect: 'oblong', size: 'medium', filled: true })).toBe('plate');
    expect(categoryForSignature({ ...rect, aspect: 'oblong', size: 'medium', filled: false })).toBeNull();
    expect(categoryForSignature({ ...rect, aspect: 'square', size: 'large', filled: true })).toBeNull();
    expect(categoryForSignature({ ...rect, aspect: 'elongated', size: 'large', filled: false })).toBe('pipe_run');
  });
});
