import type { CandidateItem, ComponentCategory } from '../../types/bom';
import keywordData from './data/partKeywords.json';
import { DEFAULT_CONFIG, type BomExtractorConfig } from './config';
import { normalizeText } from './normalize';

type KeywordCategory = keyof typeof keywordData;

export interface KeywordMatch {
  category: ComponentCategory;
  keyword: string;
  strength: number;
}

const WHOLE_WORD = 1.0;
const WORD_PREFIX = 0.8;
const IN_COMPOUND = 0.6;
const MIN_PARTIAL_LENGTH = 4;

const CATEGORY_ORDER: KeywordCategory[] = ['elbow', 'pipe_end', 'flange', 'plate', 'pipe_run'];

const KEYWORDS = CATEGORY_ORDER.flatMap((category) =>
  keywordData[category].map((keyword) => ({ category, keyword: normalizeText(keyword) }))
);

function strengthOf(text: string, words: string[], keyword: string): number {
  if (` ${text} `.includes(` ${keyword} `)) return WHOLE_WORD;
  if (keyword.length < MIN_PARTIAL_LENGTH || keyword.includes(' ')) return 0;
  if (words.some((w) => w.startsWith(keyword))) return WORD_PREFIX;
  if (words.some((w) => w.includes(keyword))) return IN_COMPOUND;
  return 0;
}

export function matchPartKeywords(raw: string): KeywordMatch | null {
  const text = normalizeText(raw);
  if (!text) return null;
  const words = text.split(' ');

  let best: KeywordMatch | null = null;
  for (const { category, keyword } of KEYWORDS) {
    const strength = strengthOf(text, words, keyword);
    if (strength === 0) continue;
    if (
      !best ||
      strength > best.strength ||
      (strength === best.strength && keyword.length > best.keyword.length)
    ) {
      best = { category, keyword, strength };
    }
  }
  return best;
}

function strongerMatch(a: KeywordMatch | null, b: KeywordMatch | null): KeywordMatch | null {
  if (!a) return b;
  if (!b) return a;
  return b.strength > a.strength ? b : a;
}

/** Keywords are looked up in the description and the part number; the description wins ties. */
export function classifyPartType(
  item: CandidateItem,
  config: BomExtractorConfig = DEFAULT_CONFIG
): CandidateItem {
  const match = strongerMatch(matchPartKeywords(item.description ?? ''), matchPartKeywords(item.partNumber ?? ''));
  const signals = match ? { ...item.signals, lexical_keyword_strength: match.strength } : item.signals;

  if (item.componentCategory && item.categorySource === 'geometry') {
    if (match && match.strength >= config.strongLexicalCue && match.category !== item.componentCategory) {
      return {
        ...item,
        signals,
        componentCategory: match.category,
        categorySource: 'lexical',
        extras: { ...item.extras, category_conflict: item.componentCategory },
      };
    }
    return { ...item, signals };
  }

  if (!match) return { ...item, signals, componentCategory: 'none' };
  return { ...item, signals, componentCategory: match.category, categorySource: 'lexical' };
}
