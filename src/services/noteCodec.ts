/**
 * Key/value pairs embedded in a CSL item's free-text note ("cheater syntax" of citeproc-js):
 *
 *   key: value          on a line of its own, or
 *   {:key: value}       inline anywhere in the text.
 *
 * Keys are either all upper-case letters or lower-case letters, hyphens and underscores.
 */
import { NoteDictionary } from '../models/cslItem';
import { logWarn } from './logger';

const KEY_PATTERN = /^(?:[A-Z]+|[-_a-z]+)$/;
const LINE_ENTRY = /^([A-Z]+|[-_a-z]+): *(.+?) *$/gm;
const BRACED_ENTRY = /{:([A-Z]+|[-_a-z]+): *(.+?) *}/g;

export function isNoteKey(key: string): boolean {
  return KEY_PATTERN.test(key);
}

/**
 * Append free text and then `key: value` lines to a note. Existing content is never rewritten.
 * Entries whose key breaks the key syntax, or whose value contains a newline, are skipped with
 * a warning. Returns undefined when the resulting note is empty.
 */
export function appendToNote(note: string | undefined, text = '', dictionary: NoteDictionary = {}): string | undefined {
  let out = note ?? '';
  if(text){
    if(out && !out.endsWith('\n')) out += '\n';
    out += text;
  }
  for(const [key, value] of Object.entries(dictionary)){
    if(!isNoteKey(key)){
      logWarn('note_entry_skipped', { key, reason: 'key does not conform to the variable name syntax' });
      continue;
    }
    if(value.includes('\n')){
      logWarn('note_entry_skipped', { key, value, reason: 'value contains a newline' });
      continue;
    }
    if(out && !out.endsWith('\n')) out += '\n';
    out += `${key}: ${value}`;
  }
  return out === '' ? undefined : out;
}

/**
 * Decode both entry forms. Line entries are read first and braced entries after them, so a
 * braced entry wins when both forms use the same key; within a form the last occurrence wins.
 */
export function parseNote(note: string | undefined): NoteDictionary {
  const text = note ?? '';
  const entries = new Map<string, string>();
  for(const m of text.matchAll(LINE_ENTRY)) entries.set(m[1], m[2]);
  for(const m of text.matchAll(BRACED_ENTRY)) entries.set(m[1], m[2]);
  return Object.fromEntries(entries);
}
