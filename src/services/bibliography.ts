import fs from 'fs';
import path from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { getRuntimeConfig } from '../config/runtimeConfig';
import { CslItem, isJsonObject } from '../models/cslItem';
import { PACKAGE_NAME, PACKAGE_VERSION } from '../versioning/packageVersion';
import { shortenCitekey } from './citekey';
import { cleanCslItem, noteAppendDict, noteAppendText, setCslId, setStandardId } from './cslItem';
import { describeError } from './errors';
import { logError, logInfo, logWarn } from './logger';

/**
 * Converts bibliography formats other than CSL JSON / YAML (BibTeX, RIS, ...) into CSL items,
 * typically by running an external tool. Throws on failure.
 */
export interface BibliographyConverter {
  convert(file: string): unknown;
}

export interface LoadBibliographyOptions {
  converter?: BibliographyConverter;
}

export interface LoadManualReferencesOptions extends LoadBibliographyOptions {
  /** Prune and validate each reference. Defaults to !CITE_ALLOW_INVALID_CSL. */
  prune?: boolean;
}

const zRecordList = z.array(z.unknown());

const CSL_EXTENSIONS: Record<string, 'json' | 'yaml'> = { '.json': 'json', '.yaml': 'yaml', '.yml': 'yaml' };

function readRecords(file: string, options: LoadBibliographyOptions): unknown {
  const format = CSL_EXTENSIONS[path.extname(file).toLowerCase()];
  if(format === 'json') return JSON.parse(fs.readFileSync(file, 'utf8'));
  if(format === 'yaml') return YAML.parse(fs.readFileSync(file, 'utf8'));
  if(options.converter) return options.converter.convert(file);
  throw new Error(`no converter for ${path.extname(file) || 'extensionless'} bibliography files`);
}

/**
 * Load CSL items from a bibliography file. Unreadable files and files that do not hold a list
 * are logged and yield no items; list elements that are not objects are dropped.
 */
export function loadBibliography(file: string, options: LoadBibliographyOptions = {}): CslItem[] {
  let data: unknown;
  try {
    data = readRecords(file, options);
  } catch(e){
    logError('bibliography_read_failed', { file, error: describeError(e) });
    return [];
  }
  const parsed = zRecordList.safeParse(data);
  if(!parsed.success){
    logError('bibliography_not_a_list', { file, type: data === null ? 'null' : typeof data });
    return [];
  }
  const items: CslItem[] = [];
  parsed.data.forEach((rec, index) => {
    if(isJsonObject(rec)) items.push(rec);
    else logWarn('bibliography_item_skipped', { file, index, reason: 'not an object' });
  });
  return items;
}

export function manualReferenceNoteText(): string {
  return `This CSL JSON Item was loaded by ${PACKAGE_NAME} v${PACKAGE_VERSION} from a manual reference file.`;
}

/**
 * Build the standard citekey -> CSL item map of manual references (overrides). Files are read
 * in order (duplicates ignored), then extraItems; for the same standard citekey a later item
 * replaces an earlier one. Items whose standard id cannot be set, or that fail cleaning, are
 * logged and skipped. Each stored item carries its short citekey as id.
 */
export function loadManualReferences(
  paths: readonly string[] = [],
  extraItems: readonly unknown[] = [],
  options: LoadManualReferencesOptions = {}
): Map<string, CslItem> {
  const prune = options.prune ?? getRuntimeConfig().prune.enabled;
  const items: CslItem[] = [];
  for(const file of new Set(paths)){
    for(const item of loadBibliography(file, options)){
      noteAppendText(item, manualReferenceNoteText());
      noteAppendDict(item, { manual_reference_filename: path.basename(file) });
      items.push(item);
    }
  }
  extraItems.forEach((rec, index) => {
    if(isJsonObject(rec)) items.push(structuredClone(rec));
    else logWarn('manual_reference_skipped', { index, reason: 'extra item is not an object' });
  });

  const refs = new Map<string, CslItem>();
  for(const item of items){
    let standardId: string;
    try {
      setStandardId(item);
      standardId = String(item.id);
      setCslId(item, shortenCitekey(standardId));
      cleanCslItem(item, { prune });
    } catch(e){
      logInfo('manual_reference_skipped', { item, error: describeError(e) });
      continue;
    }
    refs.set(standardId, item);
  }
  return refs;
}

/** CSL JSON text: 2-space indent, non-ASCII kept verbatim, trailing newline. */
export function writeCslJson(items: readonly CslItem[]): string {
  return JSON.stringify(items, null, 2) + '\n';
}
