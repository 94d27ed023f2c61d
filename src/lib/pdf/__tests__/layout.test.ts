import { describe, it, expect } from 'vitest';
import {
  buildRows,
  groupIntoLines,
  layoutTokens,
  measureTolerances,
  splitIntoCells,
  tokenBox,
} from '../layout';
import type { TextToken } from '../../../types/pdf';

function item(str: string, x: number, y: number, page = 1): TextToken {
  return { id: `${x}-${y}-${str}`, str, x, y, width: str.length * 7, height: 12, page };
}

describe('measureTolerances', () => {
  it('derives the line tolerance from the median token height', () => {
    expect(measureTolerances([item('A', 0, 0), item('B', 0, 0)]).line).toBeCloseTo(7.2);
  });

  it('never drops below the minimum gaps', () => {
    expect(measureTolerances([])).toEqual({ line: 2, cell: 10 });
  });

  it('scales the cell gap with character width', () => {
    expect(measureTolerances([item('Flansch', 0, 0)]).cell).toBeCloseTo(15.4);
  });
});

describe('groupIntoLines', () => {
  it('groups tokens into lines from the top of the page down', () => {
    const lines = groupIntoLines([item('1', 50, 685), item('Teil', 100, 700), item('Pos', 50, 700)], 1, 7.2);
    expect(lines).toHaveLength(2);
    expect(lines[0].text).toBe('Pos Teil');
    expect(lines[0].y).toBe(700);
    expect(lines[1].text).toBe('1');
  });

  it('places a line at the mean baseline of its tokens', () => {
    const lines = groupIntoLines([item('A', 10, 100), item('B', 50, 103)], 1, 7.2);
    expect(lines).toHaveLength(1);
    expect(lines[0].y).toBe(101.5);
  });

  it('does not let a line drift down a column of slanted text', () => {
    const lines = groupIntoLines(
      [item('A', 10, 100), item('B', 30, 95), item('C', 50, 90), item('D', 70, 85)],
      1,
      7.2
    );
    expect(lines.map((l) => l.text)).toEqual(['A B', 'C D']);
  });

  it('returns no lines for no tokens', () => {
    expect(groupIntoLines([], 1, 7.2)).toEqual([]);
  });
});

describe('splitIntoCells', () => {
  it('splits cells where the gap exceeds the tolerance', () => {
    const cells = splitIntoCells([item('Teil', 100, 700), item('Pos', 50, 700)], 15.4);
    expect(cells.map((c) => c.text)).toEqual(['Pos', 'Teil']);
    expect(cells[0].x0).toBe(50);
    expect(cells[0].x1).toBe(71);
  });

  it('joins close tokens into one cell', () => {
    const cells = splitIntoCells([item('Flansch', 100, 700), item('DN50', 153, 700)], 15.4);
    expect(cells).toHaveLength(1);
    expect(cells[0].text).toBe('Flansch DN50');
    expect(cells[0].x1).toBe(181);
    expect(cells[0].items).toHaveLength(2);
  });
});

describe('buildRows and layoutTokens', () => {
  it('keeps row text and cells together', () => {
    const rows = buildRows(groupIntoLines([item('Pos', 50, 700), item('Menge', 250, 700)], 1, 7.2), 15.4);
    expect(rows).toHaveLength(1);
    expect(rows[0].cells).toHaveLength(2);
    expect(rows[0].rowText).toBe('Pos Menge');
  });

  it('lays out a page with measured tolerances', () => {
    const layout = layoutTokens([item('Pos', 50, 700), item('Menge', 250, 700), item('1', 50, 685)], 1);
    expect(layout.tolerances.line).toBeCloseTo(7.2);
    expect(layout.lines.map((l) => l.text)).toEqual(['Pos Menge', '1']);
    expect(layout.rows[0].cells.map((c) => c.text)).toEqual(['Pos', 'Menge']);
  });
});

describe('tokenBox', () => {
  it('spans the token from its baseline up by its height', () => {
    expect(tokenBox(item('AB', 10, 20))).toEqual({ x0: 10, y0: 20, x1: 24, y1: 32 });
  });
});
