import type {
  CandidateItem,
  ComponentCategory,
  ExtractionMode,
  ExtractionSource,
  KnownColumnRole,
  QuantityKind,
  ReconciledItem,
  SignalVector,
  TableRegion,
} from '../../types/bom';
import { boxesOverlap, expandBox, overlapArea, unionBoxes } from '../pdf/bbox';
import { SIGNAL_NAMES } from '../feedback/weights';
import { DEFAULT_CONFIG, type BomExtractorConfig } from './config';
import { computeItemKey, itemKeyBasis } from './itemKey';
import { normalizeText } from './normalize';
import { positionOrdinal } from './numbers';

export const SOURCE_ORDER: ExtractionSource[] = ['table', 'annotation', 'geometry'];

export const COLUMN_ORDER: KnownColumnRole[] = [
  'position',
  'part_number',
  'description',
  'quantity',
  'unit',
  'material',
];

export interface ReconcileInput {
  table: CandidateItem[];
  annotation: CandidateItem[];
  geometry: CandidateItem[];
  tableRegions: TableRegion[];
}

export interface Reconciliation {
  items: ReconciledItem[];
  mode: ExtractionMode;
  columnsFound: KnownColumnRole[];
}

interface Group {
  members: CandidateItem[];
  keys: Set<string>;
  hasGeometry: boolean;
  appearance: number;
}

/** A part number and a description each identify a part; either one, paired with the position, can join a group. */
function textKeys(item: CandidateItem): string[] {
  const position = normalizeText(item.position ?? '');
  const keys: string[] = [];
  const partNumber = normalizeText(item.partNumber ?? '');
  const description = normalizeText(item.description ?? '');
  if (partNumber) keys.push(`pn:${partNumber}|${position}`);
  if (description) keys.push(`desc:${description}|${position}`);
  return keys;
}

function canJoinByKey(group: Group, item: CandidateItem): boolean {
  const sameSource = group.members.filter((m) => m.source === item.source);
  const crossPage =
    item.source === 'annotation' &&
    sameSource.length > 0 &&
    sameSource.every((m) => m.page !== item.page);
  if (sameSource.length > 0 && !crossPage) return false;
  if (item.position || crossPage) return true;
  return group.members.some((m) => m.page === item.page);
}

function groupCategory(group: Group): ComponentCategory | undefined {
  return group.members.find((m) => m.componentCategory && m.componentCategory !== 'none')
    ?.componentCategory;
}

function contradicts(a: ComponentCategory | undefined, b: ComponentCategory | undefined): boolean {
  if (!a || !b) return false;
  if (a === 'none' || a === 'other' || b === 'none' || b === 'other') return false;
  return a !== b;
}

function spatialMatch(groups: Group[], item: CandidateItem, margin: number): Group | null {
  let best: Group | null = null;
  let bestOverlap = -1;

  for (const group of groups) {
    if (group.hasGeometry) continue;
    if (contradicts(groupCategory(group), item.componentCategory)) continue;

    for (const member of group.members) {
      if (member.page !== item.page) continue;
      const widened = expandBox(member.bbox, margin);
      if (!boxesOverlap(widened, item.bbox)) continue;
      const overlap = overlapArea(widened, item.bbox);
      if (overlap > bestOverlap) {
        bestOverlap = overlap;
        best = group;
      }
    }
  }
  return best;
}

function bySourcePriority(a: CandidateItem, b: CandidateItem): number {
  return SOURCE_ORDER.indexOf(a.source) - SOURCE_ORDER.indexOf(b.source);
}

function mergeQuantity(members: CandidateItem[]): number {
  let quantity = members[0].quantity;
  let kind: QuantityKind = members[0].quantityKind;
  for (const m of members.slice(1)) {
    if (kind === 'placement' && m.quantityKind === 'placement') {
      quantity += m.quantity;
    } else {
      quantity = Math.max(quantity, m.quantity);
      kind = 'explicit';
    }
  }
  return quantity;
}

function mergeSignals(members: CandidateItem[], sourceCount: number): SignalVector {
  const signals: SignalVector = {};
  for (const m of members) {
    for (const name of SIGNAL_NAMES) {
      const value = m.signals[name];
      if (value === undefined) continue;
      signals[name] = Math.max(signals[name] ?? 0, value);
    }
  }
  signals.source_agreement = 0.5 + 0.25 * (sourceCount - 1);
  return signals;
}

function firstDefined<K extends keyof CandidateItem>(members: CandidateItem[], field: K): CandidateItem[K] | undefined {
  return members.find((m) => m[field] !== undefined)?.[field];
}

function mergeGroup(group: Group): Omit<ReconciledItem, 'itemKey'> {
  const members = [...group.members].sort(bySourcePriority);
  const provenance = SOURCE_ORDER.filter((s) => members.some((m) => m.source === s));
  const pages = [...new Set(members.map((m) => m.page))].sort((a, b) => a - b);

  const categorized = members.find((m) => m.componentCategory && m.componentCategory !== 'none');
  const extras = members.reduceRight<Record<string, string>>((acc, m) => ({ ...acc, ...m.extras }), {});
  const evidence = [...new Set(members.flatMap((m) => m.evidence))];

  const item: Omit<ReconciledItem, 'itemKey'> = {
    page: pages[0],
    pages,
    quantity: mergeQuantity(members),
    componentCategory: categorized?.componentCategory ?? 'none',
    extras,
    evidence,
    bbox: unionBoxes(members.filter((m) => m.page === pages[0]).map((m) => m.bbox)),
    baseScore: members.reduce((best, m) => Math.max(best, m.baseScore), 0),
    signals: mergeSignals(members, provenance.length),
    provenance,
  };

  const position = firstDefined(members, 'position');
  const partNumber = firstDefined(members, 'partNumber');
  const description = firstDefined(members, 'description');
  const unit = firstDefined(members, 'unit');
  const material = firstDefined(members, 'material');
  const comment = firstDefined(members, 'comment');
  if (position !== undefined) item.position = position;
  if (partNumber !== undefined) item.partNumber = partNumber;
  if (description !== undefined) item.description = description;
  if (unit !== undefined) item.unit = unit;
  if (material !== undefined) item.material = material;
  if (comment !== undefined) item.comment = comment;
  if (categorized?.categorySource) item.categorySource = categorized.categorySource;
  return item;
}

function positionRank(position: string | undefined): [number, number] {
  if (!position) return [2, 0];
  const ordinal = positionOrdinal(position);
  return ordinal === null ? [1, 0] : [0, ordinal];
}

function compareGroups(a: { item: Omit<ReconciledItem, 'itemKey'>; appearance: number }, b: typeof a): number {
  if (a.item.page !== b.item.page) return a.item.page - b.item.page;
  const [ra, va] = positionRank(a.item.position);
  const [rb, vb] = positionRank(b.item.position);
  if (ra !== rb) return ra - rb;
  if (va !== vb) return va - vb;
  return a.appearance - b.appearance;
}

function columnsFor(mode: ExtractionMode, regions: TableRegion[], items: ReconciledItem[]): KnownColumnRole[] {
  if (mode === 'table') {
    const roles = new Set(regions.flatMap((r) => r.roles));
    return COLUMN_ORDER.filter((role) => roles.has(role));
  }
  const populated: Record<KnownColumnRole, boolean> = {
    position: items.some((i) => i.position !== undefined),
    part_number: items.some((i) => i.partNumber !== undefined),
    description: items.some((i) => i.description !== undefined),
    quantity: items.length > 0,
    unit: items.some((i) => i.unit !== undefined),
    material: items.some((i) => i.material !== undefined),
  };
  return COLUMN_ORDER.filter((role) => populated[role]);
}

export function reconcileCandidates(
  input: ReconcileInput,
  config: BomExtractorConfig = DEFAULT_CONFIG
): Reconciliation {
  const mode: ExtractionMode = input.tableRegions.length > 0 ? 'table' : 'interpreted';
  const groups: Group[] = [];

  for (const item of [...input.table, ...input.annotation]) {
    const keys = textKeys(item);
    const group = groups.find((g) => keys.some((k) => g.keys.has(k)) && canJoinByKey(g, item));
    if (group) {
      group.members.push(item);
      for (const k of keys) group.keys.add(k);
      continue;
    }
    groups.push({ members: [item], keys: new Set(keys), hasGeometry: false, appearance: groups.length });
  }

  for (const item of input.geometry) {
    const group = spatialMatch(groups, item, config.spatialMergeMargin);
    if (group) {
      group.members.push(item);
      group.hasGeometry = true;
      continue;
    }
    groups.push({ members: [item], keys: new Set(), hasGeometry: true, appearance: groups.length });
  }

  const merged = groups
    .map((g) => ({ item: mergeGroup(g), appearance: g.appearance }))
    .sort(compareGroups);

  const seen = new Map<string, number>();
  const items: ReconciledItem[] = merged.map(({ item }) => {
    const basis = itemKeyBasis(item);
    const occurrence = seen.get(basis) ?? 0;
    seen.set(basis, occurrence + 1);
    return { itemKey: computeItemKey(item, occurrence), ...item };
  });

  return { items, mode, columnsFound: columnsFor(mode, input.tableRegions, items) };
}
