import type { PagePrimitives, TableCell, TextToken } from '../../types/pdf';
import type { CandidateItem, QuantityKind } from '../../types/bom';
import { layoutTokens, tokenBox } from '../pdf/layout';
import { unionBoxes } from '../pdf/bbox';
import { DEFAULT_CONFIG, type BomExtractorConfig } from './config';
import { cleanCellText, hasLetter, normalizeText, wordCount } from './normalize';

export interface AnnotationInterpretation {
  candidates: CandidateItem[];
  linesChecked: number;
}

interface Fragment {
  text: string;
  tokens: TextToken[];
  x0: number;
  y: number;
}

interface ParsedCallout {
  position?: string;
  description: string;
  partNumber?: string;
  comment?: string;
  quantity: number;
  quantityKind: QuantityKind;
  tagStrength: number;
}

const QUANTITY_PREFIX_RE = /^(\d{1,4})\s*(?:x|×|stk\.?|st\.?|stück|pcs\.?)\s+(.+)$/i;
const NUMERIC_CALLOUT_RE =
  /^(?:[•·*\-–]\s*)?(?:(?:pos(?:ition)?|item|nr|no|#)\.?\s*)?(\d{1,3}[A-Za-z]?)\s*[.:)\-]?\s+(.+)$/i;
const ALPHA_CALLOUT_RE =
  /^(?:[•·*\-–]\s*)?(?:(?:pos(?:ition)?|item|nr|no|#)\.?\s*)?([A-Za-z]\d{1,3})\s*[:\-]\s*(.+)$/i;
const LEADING_UNIT_RE = /^(?:mm|cm|m|kg|bar|°)(?:\s|$)/i;

const QUANTITY_PHRASES: RegExp[] = [
  /\s*\((\d{1,4})\s*(?:x|×|stk\.?|pcs\.?)\)/i,
  /\s*\b(?:qty|menge|anzahl|stk|pcs)\.?\s*[:=]?\s*(\d{1,4})\b/i,
  /\s+(\d{1,4})\s*(?:x|×|stk\.?|pcs\.?)$/i,
];
const TRAILING_COMMENT_RE = /\s*\(([^()]*)\)\s*$/;

const NOMINAL_SIZE_RE = /^(?:DN|PN|NW|M)\d+/i;
const DIMENSION_RE = /^\d+(?:[.,]\d+)?(?:mm|cm|m|°)$/i;

const NUMERIC_TAG_STRENGTH = 1.0;
const ALPHA_TAG_STRENGTH = 0.7;
const QUANTITY_PREFIX_STRENGTH = 0.5;

const MAX_LISTING_WORDS = 8;
const MAX_LISTING_CHARS = 60;

export function isPartNumberToken(token: string): boolean {
  const t = token.replace(/[,;]$/, '');
  if (NOMINAL_SIZE_RE.test(t) || DIMENSION_RE.test(t)) return false;
  const digits = (t.match(/\d/g) ?? []).length;
  if (digits === 0) return false;
  if (/^[A-Za-z0-9]+(?:[-./][A-Za-z0-9]+)+$/.test(t) && digits >= 3) return true;
  if (/^\d{4,}$/.test(t)) return true;
  return /^(?=.*[A-Za-z])[A-Za-z0-9]{4,}$/.test(t) && digits >= 2;
}

function extractQuantity(text: string): { rest: string; quantity?: number } {
  for (const re of QUANTITY_PHRASES) {
    const m = re.exec(text);
    if (m) {
      const rest = cleanCellText(text.slice(0, m.index) + ' ' + text.slice(m.index + m[0].length));
      return { rest, quantity: Number(m[1]) };
    }
  }
  return { rest: text };
}

function splitDescription(text: string): Pick<ParsedCallout, 'description' | 'partNumber' | 'comment'> {
  let description = text;
  let comment: string | undefined;
  const c = TRAILING_COMMENT_RE.exec(description);
  if (c && c.index > 0) {
    comment = cleanCellText(c[1]) || undefined;
    description = cleanCellText(description.slice(0, c.index));
  }

  const words = description.split(' ');
  const partIndex = words.findIndex(isPartNumberToken);
  let partNumber: string | undefined;
  if (partIndex >= 0) {
    partNumber = words[partIndex].replace(/[,;]$/, '');
    const remainder = words.filter((_, i) => i !== partIndex).join(' ');
    if (hasLetter(remainder)) description = remainder;
  }

  return { description, partNumber, comment };
}

export function parseCallout(text: string, maxWords: number = DEFAULT_CONFIG.maxCalloutWords): ParsedCallout | null {
  const line = cleanCellText(text);

  const prefixed = QUANTITY_PREFIX_RE.exec(line);
  if (prefixed && hasLetter(prefixed[2]) && wordCount(prefixed[2]) <= maxWords) {
    const { description, partNumber, comment } = splitDescription(prefixed[2]);
    return {
      description,
      partNumber,
      comment,
      quantity: Number(prefixed[1]),
      quantityKind: 'explicit',
      tagStrength: QUANTITY_PREFIX_STRENGTH,
    };
  }

  let tagStrength = NUMERIC_TAG_STRENGTH;
  let m = NUMERIC_CALLOUT_RE.exec(line);
  if (!m) {
    m = ALPHA_CALLOUT_RE.exec(line);
    tagStrength = ALPHA_TAG_STRENGTH;
  }
  if (!m) return null;

  const body = m[2];
  if (!hasLetter(body) || LEADING_UNIT_RE.test(body)) return null;

  const { rest, quantity } = extractQuantity(body);
  if (!hasLetter(rest) || wordCount(rest) > maxWords) return null;

  const { description, partNumber, comment } = splitDescription(rest);
  return {
    position: m[1],
    description,
    partNumber,
    comment,
    quantity: quantity ?? 1,
    quantityKind: quantity === undefined ? 'placement' : 'explicit',
    tagStrength,
  };
}

function toFragments(page: PagePrimitives, tokens: TextToken[]): Fragment[] {
  return layoutTokens(tokens, page.page).rows.flatMap((row) =>
    row.cells.map((cell: TableCell) => ({
      text: cleanCellText(cell.text),
      tokens: cell.items,
      x0: cell.x0,
      y: row.y,
    }))
  );
}

function fragmentCandidate(
  fragment: Fragment | Fragment[],
  page: number,
  fields: Partial<CandidateItem> & Pick<CandidateItem, 'quantity' | 'quantityKind' | 'baseScore' | 'signals'>
): CandidateItem {
  const frags = Array.isArray(fragment) ? fragment : [fragment];
  const tokens = frags.flatMap((f) => f.tokens);
  return {
    source: 'annotation',
    page,
    extras: {},
    evidence: tokens.map((t) => t.id),
    bbox: unionBoxes(tokens.map(tokenBox)),
    order: 0,
    ...fields,
  };
}

function isListingLine(text: string): boolean {
  return hasLetter(text) && wordCount(text) <= MAX_LISTING_WORDS && text.length <= MAX_LISTING_CHARS;
}

function findListingRuns(fragments: Fragment[], config: BomExtractorConfig, lineHeight: number): Fragment[][] {
  const short = fragments.filter((f) => isListingLine(f.text));
  const margins: Fragment[][] = [];
  for (const f of [...short].sort((a, b) => a.x0 - b.x0 || b.y - a.y)) {
    const group = margins.find((g) => Math.abs(g[0].x0 - f.x0) <= config.listingMarginTolerance);
    if (group) group.push(f);
    else margins.push([f]);
  }

  const maxGap = lineHeight * 3;
  const runs: Fragment[][] = [];
  for (const group of margins) {
    group.sort((a, b) => b.y - a.y);
    let run: Fragment[] = [group[0]];
    let refGap: number | null = null;

    const flush = () => {
      if (run.length >= config.minListingLines) runs.push(run);
    };

    for (let i = 1; i < group.length; i++) {
      const gap = run[run.length - 1].y - group[i].y;
      const regular =
        gap > 0 &&
        (refGap === null ? gap <= maxGap : gap >= refGap * 0.5 && gap <= refGap * 1.5);
      if (regular) {
        if (refGap === null) refGap = gap;
        run.push(group[i]);
      } else {
        flush();
        run = [group[i]];
        refGap = null;
      }
    }
    flush();
  }

  return runs.sort((a, b) => b[0].y - a[0].y || a[0].x0 - b[0].x0);
}

function dedupeKey(item: CandidateItem): string {
  return `${normalizeText(item.description ?? '')}|${normalizeText(item.position ?? '')}`;
}

function mergeInto(target: CandidateItem, other: CandidateItem, quantity: number): CandidateItem {
  return {
    ...target,
    quantity,
    evidence: [...target.evidence, ...other.evidence],
    bbox: unionBoxes([target.bbox, other.bbox]),
  };
}

function suppressDuplicates(items: CandidateItem[]): CandidateItem[] {
  const byKey = new Map<string, number>();
  const out: CandidateItem[] = [];
  for (const item of items) {
    const key = dedupeKey(item);
    const existing = byKey.get(key);
    if (existing === undefined) {
      byKey.set(key, out.length);
      out.push(item);
      continue;
    }
    out[existing] = mergeInto(out[existing], item, Math.max(out[existing].quantity, item.quantity));
  }
  return out;
}

/** Same part called out at several positions with stated quantities: one item, quantities summed. */
function foldExplicitRepeats(items: CandidateItem[]): CandidateItem[] {
  const byDescription = new Map<string, number>();
  const out: CandidateItem[] = [];
  for (const item of items) {
    const key = normalizeText(item.description ?? '');
    const existing = item.quantityKind === 'explicit' && item.position ? byDescription.get(key) : undefined;
    if (existing === undefined) {
      if (item.quantityKind === 'explicit' && item.position) byDescription.set(key, out.length);
      out.push(item);
      continue;
    }
    const target = out[existing];
    const positions = target.extras.positions ?? target.position ?? '';
    out[existing] = {
      ...mergeInto(target, item, target.quantity + item.quantity),
      extras: { ...target.extras, positions: `${positions}, ${item.position ?? ''}` },
    };
  }
  return out;
}

export function interpretAnnotations(
  page: PagePrimitives,
  consumedTokenIds: ReadonlySet<string>,
  config: BomExtractorConfig = DEFAULT_CONFIG
): AnnotationInterpretation {
  const tokens = page.textTokens.filter((t) => t.str.trim().length > 0 && !consumedTokenIds.has(t.id));
  if (tokens.length === 0) return { candidates: [], linesChecked: 0 };

  const fragments = toFragments(page, tokens).filter((f) => f.text.length > 0);
  const calloutScore = config.tableBaseScore - config.annotationDiscount;
  const listingScore = calloutScore - config.listingDiscount;

  const callouts: CandidateItem[] = [];
  const plain: Fragment[] = [];

  for (const fragment of fragments) {
    const parsed = parseCallout(fragment.text, config.maxCalloutWords);
    if (!parsed) {
      plain.push(fragment);
      continue;
    }
    const candidate = fragmentCandidate(fragment, page.page, {
      quantity: parsed.quantity,
      quantityKind: parsed.quantityKind,
      baseScore: calloutScore,
      signals: { callout_numeric_prefix: parsed.tagStrength, extraction_prior: calloutScore },
      description: parsed.description,
    });
    if (parsed.position) candidate.position = parsed.position;
    if (parsed.partNumber) candidate.partNumber = parsed.partNumber;
    if (parsed.comment) candidate.comment = parsed.comment;
    callouts.push(candidate);
  }

  const lineHeight = tokens.reduce((h, t) => Math.max(h, t.height), 1);
  const listings = findListingRuns(plain, config, lineHeight).flatMap((run) =>
    run.map((fragment) =>
      fragmentCandidate(fragment, page.page, {
        description: fragment.text,
        quantity: 1,
        quantityKind: 'placement',
        baseScore: listingScore,
        signals: {
          listing_structure: Math.min(1, run.length / 5),
          extraction_prior: listingScore,
        },
      })
    )
  );

  const merged = foldExplicitRepeats(suppressDuplicates([...callouts, ...listings]));
  return {
    candidates: merged.map((item, order) => ({ ...item, order })),
    linesChecked: fragments.length,
  };
}
