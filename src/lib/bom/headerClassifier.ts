import type { ColumnRole, KnownColumnRole } from '../../types/bom';
import synonymData from './data/headerSynonyms.json';
import { normalizeHeaderToken } from './normalize';

export { normalizeHeaderToken };

export const ROLE_PRIORITY: KnownColumnRole[] = [
  'part_number',
  'position',
  'description',
  'quantity',
  'unit',
  'material',
];

const EXACT_STRENGTH = 1.0;
const PREFIX_STRENGTH = 0.75;
const MIN_PREFIX_LENGTH = 4;

export interface HeaderMatch {
  role: ColumnRole;
  strength: number;
  synonym?: string;
}

export interface HeaderAnalysis {
  labels: string[];
  roles: ColumnRole[];
  strengths: number[];
  distinctRoles: number;
  warnings: string[];
}

const SYNONYMS: { role: KnownColumnRole; synonym: string }[] = ROLE_PRIORITY.flatMap(
  (role) => synonymData[role].map((synonym) => ({ role, synonym: normalizeHeaderToken(synonym) }))
);

export function classifyHeaderToken(raw: string): HeaderMatch {
  const token = normalizeHeaderToken(raw);
  if (!token) return { role: 'unknown', strength: 0 };

  let best: HeaderMatch & { priority: number } = { role: 'unknown', strength: 0, priority: Infinity };

  for (const entry of SYNONYMS) {
    let strength = 0;
    if (token === entry.synonym) {
      strength = EXACT_STRENGTH;
    } else if (entry.synonym.length >= MIN_PREFIX_LENGTH && token.startsWith(entry.synonym)) {
      strength = PREFIX_STRENGTH;
    }
    if (strength === 0) continue;

    const priority = ROLE_PRIORITY.indexOf(entry.role);
    const bestLength = best.synonym?.length ?? 0;
    const better =
      strength > best.strength ||
      (strength === best.strength && entry.synonym.length > bestLength) ||
      (strength === best.strength && entry.synonym.length === bestLength && priority < best.priority);

    if (better) {
      best = { role: entry.role, strength, synonym: entry.synonym, priority };
    }
  }

  if (best.role === 'unknown') return { role: 'unknown', strength: 0 };
  return { role: best.role, strength: best.strength, synonym: best.synonym };
}

export function analyzeHeaderRow(labels: string[]): HeaderAnalysis {
  const roles: ColumnRole[] = [];
  const strengths: number[] = [];
  const warnings: string[] = [];
  const seen = new Set<ColumnRole>();

  labels.forEach((label, index) => {
    const match = classifyHeaderToken(label);
    if (match.role !== 'unknown' && seen.has(match.role)) {
      warnings.push(
        `AmbiguousHeader: column ${index + 1} "${label}" repeats role ${match.role}; treated as unknown`
      );
      roles.push('unknown');
      strengths.push(0);
      return;
    }
    if (match.role !== 'unknown') seen.add(match.role);
    roles.push(match.role);
    strengths.push(match.strength);
  });

  return { labels, roles, strengths, distinctRoles: seen.size, warnings };
}

export function classifyHeaderRow(labels: string[]): ColumnRole[] {
  return analyzeHeaderRow(labels).roles;
}
