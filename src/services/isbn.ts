/**
 * ISBN syntax checks and ISBN-13 normalization.
 * Canonical form: digits only, with an upper-case X allowed as the last character of an ISBN-10.
 */

export type IsbnCheckLevel = 'strict' | 'loose';

// placeholder values that pass the check-digit arithmetic
const ALL_ZERO_ISBNS = new Set(['0000000000', '0000000000000', '000000000X']);

/** Strip separators; empty string when the value cannot be an ISBN at all. */
export function canonicalIsbn(raw: string): string {
  const cleaned = raw.replace(/[^0-9xX]/g, '').toUpperCase();
  if(ALL_ZERO_ISBNS.has(cleaned)) return '';
  const xAt = cleaned.indexOf('X');
  if(xAt !== -1 && (xAt !== cleaned.length - 1 || cleaned.length !== 10)) return '';
  return cleaned;
}

function computeIsbn13Check(base12: string): string {
  let sum = 0;
  for (let i = 0; i < base12.length; i += 1) {
    const digit = Number(base12[i]);
    if (!Number.isInteger(digit)) return '';
    sum += i % 2 === 0 ? digit : digit * 3;
  }
  return String((10 - (sum % 10)) % 10);
}

function computeIsbn10Check(base9: string): string {
  let sum = 0;
  for (let i = 0; i < base9.length; i += 1) {
    const digit = Number(base9[i]);
    if (!Number.isInteger(digit)) return '';
    sum += digit * (10 - i);
  }
  const check = (11 - (sum % 11)) % 11;
  return check === 10 ? 'X' : String(check);
}

export function isIsbn10(raw: string): boolean {
  const isbn = canonicalIsbn(raw);
  if(!/^[0-9]{9}[0-9X]$/.test(isbn)) return false;
  return computeIsbn10Check(isbn.slice(0, 9)) === isbn[9];
}

export function isIsbn13(raw: string): boolean {
  const isbn = canonicalIsbn(raw);
  if(!/^97[89][0-9]{10}$/.test(isbn)) return false;
  return computeIsbn13Check(isbn.slice(0, 12)) === isbn[12];
}

/**
 * True when value is *not* an ISBN. 'loose' only rejects values of the wrong length;
 * 'strict' also requires a correct check digit (and a 978/979 prefix for ISBN-13).
 */
export function notIsbn(raw: string, level: IsbnCheckLevel = 'strict'): boolean {
  const isbn = canonicalIsbn(raw);
  if(isbn.length !== 10 && isbn.length !== 13) return true;
  if(level === 'loose') return false;
  return isbn.length === 10 ? !isIsbn10(isbn) : !isIsbn13(isbn);
}

/** ISBN-13 form of a valid ISBN-10 or ISBN-13; undefined otherwise. */
export function toIsbn13(raw: string): string | undefined {
  const isbn = canonicalIsbn(raw);
  if(isbn.length === 13) return isIsbn13(isbn) ? isbn : undefined;
  if(isbn.length === 10 && isIsbn10(isbn)){
    const base = `978${isbn.slice(0, 9)}`;
    return `${base}${computeIsbn13Check(base)}`;
  }
  return undefined;
}
