import { CslItem, isJsonObject } from '../models/cslItem';
import { PACKAGE_NAME, PACKAGE_VERSION } from '../versioning/packageVersion';
import { RetrievableSource, isRetrievableSource, shortenCitekey, splitCitekey, standardizeCitekey } from './citekey';
import { CleanOptions, noteAppendDict, noteAppendText, reconcileCslItem } from './cslItem';
import { CslValidationError, InvalidCitekeyError, UnsupportedSourceError } from './errors';
import { logDebug } from './logger';

/**
 * Retrieves CSL-like metadata for one identifier of a given source (DOI content negotiation,
 * PubMed E-utilities, arXiv API, ...). Rejects on not-found or transport failure.
 */
export interface MetadataProvider {
  retrieve(identifier: string): Promise<unknown>;
}

/** Closed set of sources, each optionally bound to a provider. */
export type ProviderRegistry = Partial<Record<RetrievableSource, MetadataProvider>>;

export function generatedNoteText(): string {
  return `This CSL JSON Item was automatically generated by ${PACKAGE_NAME} v${PACKAGE_VERSION} using citation-by-identifier.`;
}

/**
 * Retrieve and reconcile metadata for one standard citekey. The returned item's id is the
 * short citekey and its note records the standard_id. Provider failures propagate.
 */
export async function citekeyToCslItem(citekey: string, providers: ProviderRegistry, options: CleanOptions = {}): Promise<CslItem> {
  const standardId = standardizeCitekey(citekey, { warnIfChanged: true });
  const parsed = splitCitekey(standardId);
  if(!parsed) throw new InvalidCitekeyError(citekey);
  const { source, identifier } = parsed;
  const provider = isRetrievableSource(source) ? providers[source] : undefined;
  if(!provider) throw new UnsupportedSourceError(source, standardId);

  logDebug('citeproc_retrieve', { citekey: standardId });
  const raw = await provider.retrieve(identifier);
  if(!isJsonObject(raw)) throw new CslValidationError(`metadata provider for ${source} returned a non-object for ${standardId}`);

  const item: CslItem = raw;
  noteAppendText(item, generatedNoteText());
  noteAppendDict(item, { standard_id: standardId });
  return reconcileCslItem(item, { ...options, id: shortenCitekey(standardId) });
}

/** Retrieve several citekeys concurrently; results keep input order, the first failure rejects. */
export function citekeysToCslItems(citekeys: readonly string[], providers: ProviderRegistry, options: CleanOptions = {}): Promise<CslItem[]> {
  return Promise.all(citekeys.map(c => citekeyToCslItem(c, providers, options)));
}
