import { getRuntimeConfig } from '../config/runtimeConfig';
import { CslItem, JsonValue, NoteDictionary } from '../models/cslItem';
import { inferCitekeyPrefix, isValidCitekey, standardizeCitekey } from './citekey';
import { getCslValidator } from './cslSchema';
import { CitekeyIntegrityError, CslValidationError, MissingStandardIdError } from './errors';
import { logWarn } from './logger';
import { appendToNote, parseNote } from './noteCodec';
import { pruneInstance } from './schemaPruner';

/** Item types emitted by metadata providers that CSL spells differently. */
export const CSL_TYPE_FIXES: Readonly<Record<string, string>> = {
  'journal-article': 'article-journal',
  'book-chapter': 'chapter',
  'posted-content': 'manuscript',
  'proceedings-article': 'paper-conference',
  'standard': 'entry',
  'reference-entry': 'entry',
};

export const DEFAULT_CSL_TYPE = 'entry';

export interface CleanOptions {
  /** Prune schema violations and require a valid result. Defaults to !CITE_ALLOW_INVALID_CSL. */
  prune?: boolean;
}

export interface ReconcileOptions extends CleanOptions {
  id?: string;
}

/** Missing and empty notes both read as ''. Other values are stringified, structured ones as JSON. */
function noteText(item: CslItem): string {
  const note = item.note;
  if(note === undefined || note === null) return '';
  if(typeof note === 'string') return note;
  if(typeof note === 'number' || typeof note === 'boolean') return String(note);
  logWarn('note_not_text', { id: item.id ?? null, type: Array.isArray(note) ? 'array' : 'object' });
  return JSON.stringify(note);
}

function writeNote(item: CslItem, note: string | undefined){
  if(note === undefined) delete item.note;
  else item.note = note;
}

export function noteDict(item: CslItem): NoteDictionary {
  return parseNote(noteText(item));
}

export function noteAppendText(item: CslItem, text: string): CslItem {
  writeNote(item, appendToNote(noteText(item), text));
  return item;
}

export function noteAppendDict(item: CslItem, dictionary: NoteDictionary): CslItem {
  writeNote(item, appendToNote(noteText(item), '', dictionary));
  return item;
}

export function setCslId(item: CslItem, id: string): CslItem {
  item.id = id;
  return item;
}

export function fixCslType(item: CslItem): CslItem {
  const type = item.type;
  if(typeof type === 'string' && Object.prototype.hasOwnProperty.call(CSL_TYPE_FIXES, type)){
    item.type = CSL_TYPE_FIXES[type];
  }
  return item;
}

/**
 * Remap provider types, optionally prune schema violations, and default the type.
 * With pruning on, an item that still fails the schema is an error rather than output.
 */
export function cleanCslItem(item: CslItem, options: CleanOptions = {}): CslItem {
  const prune = options.prune ?? getRuntimeConfig().prune.enabled;
  fixCslType(item);
  if(prune){
    const collection: JsonValue[] = [item];
    pruneInstance(collection, { inPlace: true });
    if(collection[0] !== item) throw new CslValidationError('CSL item was removed while pruning');
  }
  if(item.type === undefined) item.type = DEFAULT_CSL_TYPE;
  if(prune) getCslValidator().validate([item]);
  return item;
}

/** Mutates and returns item. */
export function reconcileCslItem(item: CslItem, options: ReconcileOptions = {}): CslItem {
  if(options.id !== undefined) setCslId(item, options.id);
  return cleanCslItem(item, options);
}

function nonEmptyString(value: JsonValue | undefined): string | undefined {
  if(typeof value === 'string') return value === '' ? undefined : value;
  if(typeof value === 'number') return String(value);
  return undefined;
}

/**
 * Set item.id to its standard citekey and record provenance in the note.
 *
 * The original standard id comes from, in priority order, a `standard_citation` field (removed
 * from the item), a `standard_id` note entry, or the current id with its prefix inferred.
 * Only provenance entries that differ from what the note already records are appended, so
 * repeated calls leave the item unchanged.
 */
export function setStandardId(item: CslItem): CslItem {
  const note = noteDict(item);
  const originalId = nonEmptyString(item.id);
  let originalStandardId = originalId === undefined ? undefined : inferCitekeyPrefix(originalId);
  if(note.standard_id) originalStandardId = note.standard_id;
  if(Object.prototype.hasOwnProperty.call(item, 'standard_citation')){
    const fromField = nonEmptyString(item.standard_citation);
    delete item.standard_citation;
    if(fromField !== undefined) originalStandardId = fromField;
  }
  if(originalStandardId === undefined) throw new MissingStandardIdError(item);
  if(!isValidCitekey(originalStandardId, { allowRaw: true })) throw new CitekeyIntegrityError(originalStandardId);

  const standardId = standardizeCitekey(originalStandardId);
  const additions: NoteDictionary = {};
  if(originalId !== undefined && originalId !== standardId && originalId !== note.original_id){
    additions.original_id = originalId;
  }
  if(originalStandardId !== standardId && originalStandardId !== note.original_standard_id){
    additions.original_standard_id = originalStandardId;
  }
  if(standardId !== note.standard_id) additions.standard_id = standardId;
  noteAppendDict(item, additions);
  item.id = standardId;
  return item;
}
