import { describe, it, expect } from 'vitest';
import { classifyPartType, matchPartKeywords } from '../partTypeClassifier';
import { candidate } from './fixtures';

describe('matchPartKeywords', () => {
  it('prefers the longest whole-word keyword', () => {
    expect(matchPartKeywords('Rohrbogen 90°')).toEqual({ category: 'elbow', keyword: 'rohrbogen', strength: 1 });
    expect(matchPartKeywords('End Cap')).toEqual({ category: 'pipe_end', keyword: 'end cap', strength: 1 });
  });

  it('scores keywords inside compounds lower', () => {
    expect(matchPartKeywords('Stahlrohrleitung')).toEqual({ category: 'pipe_run', keyword: 'stahlrohr', strength: 0.8 });
    expect(matchPartKeywords('Tiefbogenstück')).toEqual({ category: 'elbow', keyword: 'bogen', strength: 0.6 });
  });

  it('returns null without a keyword', () => {
    expect(matchPartKeywords('Schraube')).toBeNull();
    expect(matchPartKeywords('')).toBeNull();
  });
});

describe('classifyPartType', () => {
  it('classifies text candidates by keyword', () => {
    const classified = classifyPartType(candidate({ source: 'table', description: 'Flansch DN50' }));
    expect(classified.componentCategory).toBe('flange');
    expect(classified.categorySource).toBe('lexical');
    expect(classified.signals.lexical_keyword_strength).toBe(1);
  });

  it('leaves unmatched text uncategorized', () => {
    const classified = classifyPartType(candidate({ source: 'annotation', description: 'Schraube M8' }));
    expect(classified.componentCategory).toBe('none');
    expect(classified.categorySource).toBeUndefined();
    expect(classified.signals.lexical_keyword_strength).toBeUndefined();
  });

  it('keeps a geometry category against a weak cue', () => {
    const classified = classifyPartType(
      candidate({
        source: 'geometry',
        description: 'Tiefbogenstück',
        componentCategory: 'flange',
        categorySource: 'geometry',
      })
    );
    expect(classified.componentCategory).toBe('flange');
    expect(classified.categorySource).toBe('geometry');
    expect(classified.signals.lexical_keyword_strength).toBe(0.6);
    expect(classified.extras).toEqual({});
  });

  it('overrides a geometry category on a strong contrary cue', () => {
    const classified = classifyPartType(
      candidate({
        source: 'geometry',
        description: 'Blech 10 mm',
        componentCategory: 'flange',
        categorySource: 'geometry',
      })
    );
    expect(classified.componentCategory).toBe('plate');
    expect(classified.categorySource).toBe('lexical');
    expect(classified.extras.category_conflict).toBe('flange');
  });

  it('finds the keyword in the part number when there is no description', () => {
    const classified = classifyPartType(candidate({ source: 'table', partNumber: 'Rohrbogen-90-123' }));
    expect(classified.componentCategory).toBe('elbow');
    expect(classified.categorySource).toBe('lexical');
    expect(classified.signals.lexical_keyword_strength).toBe(1);
  });

  it('prefers the description when both name a part equally well', () => {
    const classified = classifyPartType(
      candidate({ source: 'table', partNumber: 'Rohrbogen-90-123', description: 'Flansch DN50' })
    );
    expect(classified.componentCategory).toBe('flange');
  });
});
