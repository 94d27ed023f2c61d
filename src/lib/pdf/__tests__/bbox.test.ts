import { describe, it, expect } from 'vitest';
import { EMPTY_BOX, unionBoxes } from '../bbox';

describe('unionBoxes', () => {
  it('spans every box', () => {
    expect(
      unionBoxes([
        { x0: 10, y0: 20, x1: 30, y1: 40 },
        { x0: 5, y0: 25, x1: 35, y1: 30 },
      ])
    ).toEqual({ x0: 5, y0: 20, x1: 35, y1: 40 });
  });

  it('returns a fresh empty box for no boxes', () => {
    const union = unionBoxes([]);
    expect(union).toEqual(EMPTY_BOX);
    expect(union).not.toBe(EMPTY_BOX);
  });

  it('handles very long box lists', () => {
    const boxes = Array.from({ length: 200_000 }, (_, i) => ({ x0: i, y0: 0, x1: i + 1, y1: 1 }));
    expect(unionBoxes(boxes)).toEqual({ x0: 0, y0: 0, x1: 200_000, y1: 1 });
  });
});
