import crypto from 'crypto';
import basex from 'base-x';
import { getRuntimeConfig } from '../config/runtimeConfig';
import { InvalidCitekeyError, describeError } from './errors';
import { notIsbn, toIsbn13 } from './isbn';
import { logError, logWarn } from './logger';
import { getShortDoiExpander, onShortDoiExpanderChange } from './shortDoi';

/** Sources whose metadata can be retrieved from the identifier alone. */
export const RETRIEVABLE_SOURCES = ['doi', 'pmid', 'pmcid', 'arxiv', 'isbn', 'wikidata', 'url'] as const;
export type RetrievableSource = typeof RETRIEVABLE_SOURCES[number];
export type CitekeySource = RetrievableSource | 'raw' | 'tag';

// pandoc-fignos / tablenos / eqnos cross-references share the @key syntax
const PANDOC_XNOS_SOURCES = new Set(['fig', 'tbl', 'eq']);

const ID_PATTERNS = {
  pmid: /^[1-9][0-9]{0,7}$/,
  pmcid: /^PMC[0-9]+$/,
  doi: /^10\.[0-9]{4,9}\/\S+$/,
  shortdoi: /^10\/[a-zA-Z0-9]+$/,
  wikidata: /^Q[0-9]+$/,
};

/**
 * Citekeys referenced as `@source:identifier` in Markdown. Same rules as pandoc except that the
 * final character may be a slash and underscores may appear inside.
 */
export const CITEKEY_PATTERN = /(?<!\w)@([a-zA-Z0-9][\w:.#$%&\-+?<>~/]*[a-zA-Z0-9/])/g;

export interface ParsedCitekey { source: string; identifier: string }

export interface CitekeyValidationOptions {
  allowTag?: boolean;
  allowRaw?: boolean;
  allowPandocXnos?: boolean;
}

export interface CitekeyDiagnosis {
  valid: boolean;
  /** Present whenever an invalid citekey deserves a log line. */
  message?: string;
}

export function isRetrievableSource(source: string): source is RetrievableSource {
  return RETRIEVABLE_SOURCES.some(s => s === source);
}

/** Split on the first colon; identifiers (URLs) may contain further colons. */
export function splitCitekey(citekey: string): ParsedCitekey | undefined {
  const i = citekey.indexOf(':');
  if(i === -1) return undefined;
  return { source: citekey.slice(0, i), identifier: citekey.slice(i + 1) };
}

export function extractCitekeys(text: string): string[] {
  const found = new Set<string>();
  for(const m of text.matchAll(CITEKEY_PATTERN)) found.add(m[1]);
  return [...found];
}

/**
 * Source-specific syntax check. Returns a description of the problem, or undefined when the
 * identifier looks fine. No external resources are consulted.
 */
export function inspectCitekey(citekey: string): string | undefined {
  const parsed = splitCitekey(citekey);
  if(!parsed) return 'citekey must have the form `source:identifier`.';
  const { source, identifier } = parsed;
  switch(source){
    case 'pmid':
      if(identifier.startsWith('PMC')){
        return `PubMed Identifiers should start with digits rather than PMC. Should ${citekey} switch the citation source to \`pmcid\`?`;
      }
      if(!ID_PATTERNS.pmid.test(identifier)) return 'PubMed Identifiers should be 1-8 digits with no leading zeros.';
      return undefined;
    case 'pmcid':
      if(!identifier.startsWith('PMC')) return 'PubMed Central Identifiers must start with `PMC`.';
      if(!ID_PATTERNS.pmcid.test(identifier)) return 'Identifier does not conform to the PMCID regex. Double check the PMCID.';
      return undefined;
    case 'doi':
      if(identifier.startsWith('10.')){
        if(!ID_PATTERNS.doi.test(identifier)) return 'Identifier does not conform to the DOI regex. Double check the DOI.';
        return undefined;
      }
      if(identifier.startsWith('10/')){
        if(!ID_PATTERNS.shortdoi.test(identifier)) return 'Identifier does not conform to the shortDOI regex. Double check the shortDOI.';
        return undefined;
      }
      return 'DOIs must start with `10.` (or `10/` for shortDOIs).';
    case 'isbn':
      if(notIsbn(identifier, 'strict')) return 'identifier violates the ISBN syntax (length or check digit).';
      return undefined;
    case 'wikidata':
      if(!identifier.startsWith('Q')) return 'Wikidata item IDs must start with `Q`.';
      if(!ID_PATTERNS.wikidata.test(identifier)) return 'Identifier does not conform to the Wikidata regex. Double check the entity ID.';
      return undefined;
    default:
      return undefined;
  }
}

export function diagnoseCitekey(citekey: unknown, options: CitekeyValidationOptions = {}): CitekeyDiagnosis {
  if(typeof citekey !== 'string'){
    return { valid: false, message: `citekey should be a string not ${citekey === null ? 'null' : typeof citekey}: ${String(citekey)}` };
  }
  if(citekey.startsWith('@')) return { valid: false, message: `invalid citekey: ${citekey}\nstarts with '@'` };
  const parsed = splitCitekey(citekey);
  if(!parsed){
    return { valid: false, message: `citekey not splittable via a single colon: ${citekey}. Citekeys must be in the format of \`source:identifier\`.` };
  }
  const { source, identifier } = parsed;
  if(!source || !identifier) return { valid: false, message: `invalid citekey: ${citekey}\nblank source or identifier` };

  if(options.allowPandocXnos){
    if(PANDOC_XNOS_SOURCES.has(source)) return { valid: false };
    if(PANDOC_XNOS_SOURCES.has(source.toLowerCase())){
      return { valid: false, message: `pandoc-xnos reference types should be all lowercase.\nShould ${citekey} use "${source.toLowerCase()}" rather than "${source}"?` };
    }
  }

  const sources = new Set<string>(RETRIEVABLE_SOURCES);
  if(options.allowRaw) sources.add('raw');
  if(options.allowTag) sources.add('tag');
  if(!sources.has(source)){
    if(sources.has(source.toLowerCase())){
      return { valid: false, message: `citekey sources should be all lowercase.\nShould ${citekey} use "${source.toLowerCase()}" rather than "${source}"?` };
    }
    return { valid: false, message: `invalid citekey: ${citekey}\nSource "${source}" is not valid.\nValid citation sources are {${[...sources].sort().join(', ')}}` };
  }

  const inspection = inspectCitekey(citekey);
  if(inspection) return { valid: false, message: `invalid ${source} citekey: ${citekey}\n${inspection}` };
  return { valid: true };
}

/** Cursory syntax validation; problems are logged, never thrown. */
export function isValidCitekey(citekey: unknown, options: CitekeyValidationOptions = {}): boolean {
  const diagnosis = diagnoseCitekey(citekey, options);
  if(diagnosis.message) logError('citekey_invalid', { citekey, reason: diagnosis.message });
  return diagnosis.valid;
}

// Memo of standardizeCitekey, keyed by input and warn flag; oldest entry evicted first.
const standardizeCache = new Map<string, string>();

export function clearStandardizeCache(){ standardizeCache.clear(); }
onShortDoiExpanderChange(clearStandardizeCache);

function computeStandardCitekey(citekey: string, warnIfChanged: boolean): string {
  const parsed = splitCitekey(citekey);
  if(!parsed) throw new InvalidCitekeyError(citekey, 'citekey must have the form `source:identifier`.');
  const { source } = parsed;
  let { identifier } = parsed;

  if(source === 'doi'){
    if(identifier.startsWith('10/')){
      try {
        identifier = getShortDoiExpander().expand(identifier);
      } catch(e){
        // Left unexpanded; metadata retrieval reports the failure later.
        logError('short_doi_expand_failed', { shortDoi: identifier, error: describeError(e) });
      }
    }
    identifier = identifier.toLowerCase();
  }

  if(source === 'isbn'){
    const isbn13 = toIsbn13(identifier);
    if(isbn13) identifier = isbn13;
    else logWarn('isbn_normalize_failed', { citekey });
  }

  const standard = `${source}:${identifier}`;
  if(warnIfChanged && standard !== citekey){
    logWarn('citekey_not_standard', { msg: 'expected citekey to already be standardized', from: citekey, to: standard });
  }
  return standard;
}

/** Canonical form: shortDOIs expanded, DOIs lower-cased, ISBNs as ISBN-13. Memoized. */
export function standardizeCitekey(citekey: string, options: { warnIfChanged?: boolean } = {}): string {
  const warnIfChanged = options.warnIfChanged === true;
  const key = `${warnIfChanged ? 1 : 0}|${citekey}`;
  const hit = standardizeCache.get(key);
  if(hit !== undefined) return hit;
  const standard = computeStandardCitekey(citekey, warnIfChanged);
  standardizeCache.set(key, standard);
  const max = getRuntimeConfig().standardize.cacheSize;
  while(standardizeCache.size > max){
    const oldest = standardizeCache.keys().next();
    if(oldest.done) break;
    standardizeCache.delete(oldest.value);
  }
  return standard;
}

export function standardizeCacheSize(): number { return standardizeCache.size; }

/**
 * Passthrough when the citekey already has a supported prefix, lower-case a prefix that only
 * differs by case, otherwise treat the value as a raw citekey.
 */
export function inferCitekeyPrefix(citekey: string): string {
  const prefixes = [...RETRIEVABLE_SOURCES, 'raw'].map(s => `${s}:`);
  for(const prefix of prefixes){
    if(citekey.startsWith(prefix)) return citekey;
    if(citekey.toLowerCase().startsWith(prefix)) return prefix + citekey.slice(prefix.length);
  }
  return `raw:${citekey}`;
}

const BASE62 = basex('0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz');
export const SHORT_CITEKEY_LENGTH = 9; // ceil(48 bits / log2(62))

/**
 * Short citekey: first 6 bytes of the BLAKE2b-512 digest of the standard citekey, base62
 * encoded and zero padded. Standardize first; different spellings give different keys.
 */
export function shortenCitekey(standardCitekey: string): string {
  if(standardCitekey.includes('@')){
    throw new InvalidCitekeyError(standardCitekey, 'short citekeys are derived from citekeys without "@"');
  }
  const digest = crypto.createHash('blake2b512').update(standardCitekey, 'utf8').digest().subarray(0, 6);
  return BASE62.encode(digest).padStart(SHORT_CITEKEY_LENGTH, '0');
}
