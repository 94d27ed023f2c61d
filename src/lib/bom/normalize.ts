export function foldDiacritics(raw: string): string {
  return raw
    .replace(/ß/g, 'ss')
    .replace(/ẞ/g, 'SS')
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '');
}

/** Header cells compare on bare alphanumerics: "Art.-Nr." and "artnr" are the same token. */
export function normalizeHeaderToken(raw: string): string {
  return foldDiacritics(raw).toLowerCase().replace(/[^a-z0-9]+/g, '');
}

export function normalizeText(raw: string): string {
  return foldDiacritics(raw)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function cleanCellText(raw: string): string {
  return raw.replace(/\s+/g, ' ').trim();
}

export function hasLetter(text: string): boolean {
  return /\p{L}/u.test(text);
}

export function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}
