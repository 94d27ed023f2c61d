import { createHash } from 'node:crypto';
import { normalizeText } from './normalize';

export interface ItemKeyFields {
  partNumber?: string;
  description?: string;
  position?: string;
}

export function itemKeyBasis(fields: ItemKeyFields): string {
  return [fields.partNumber, fields.description, fields.position]
    .map((v) => normalizeText(v ?? ''))
    .join('|');
}

/** Stable across runs: same normalized part number, description and position give the same key. */
export function computeItemKey(fields: ItemKeyFields, occurrence = 0): string {
  const basis = occurrence > 0 ? `${itemKeyBasis(fields)}#${occurrence}` : itemKeyBasis(fields);
  return createHash('sha256').update(basis).digest('hex').slice(0, 16);
}

export function computeFingerprint(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}
