import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { citekeyToCslItem, citekeysToCslItems, generatedNoteText, MetadataProvider, ProviderRegistry } from '../services/citeproc';
import { shortenCitekey } from '../services/citekey';
import { CslValidationError, UnsupportedSourceError } from '../services/errors';

function fakeProvider(records: Record<string, unknown>): MetadataProvider & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    retrieve(identifier: string){
      calls.push(identifier);
      if(!(identifier in records)) return Promise.reject(new Error(`not found: ${identifier}`));
      return Promise.resolve(structuredClone(records[identifier]));
    }
  };
}

describe('citeproc retrieval', () => {
  let errSpy: MockInstance<typeof console.error>;
  beforeAll(() => { errSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined); });
  afterAll(() => { errSpy.mockRestore(); });

  const doi = fakeProvider({
    '10.1234/abc': { type: 'journal-article', title: 'Fake Article', DOI: '10.1234/abc', unknown_field: 1 },
    '10.1234/bare': 'not an object',
  });
  const pmid = fakeProvider({ '12345': { type: 'article-journal', title: 'From PubMed', PMID: '12345' } });
  const providers: ProviderRegistry = { doi, pmid };

  it('retrieves, standardizes and reconciles one citekey', async () => {
    const item = await citekeyToCslItem('doi:10.1234/ABC', providers, { prune: true });
    expect(doi.calls).toContain('10.1234/abc');
    expect(item).toEqual({
      id: shortenCitekey('doi:10.1234/abc'),
      type: 'article-journal',
      title: 'Fake Article',
      DOI: '10.1234/abc',
      note: `${generatedNoteText()}\nstandard_id: doi:10.1234/abc`,
    });
  });

  it('keeps input order for batches', async () => {
    const items = await citekeysToCslItems(['pmid:12345', 'doi:10.1234/abc'], providers, { prune: true });
    expect(items.map(i => i.title)).toEqual(['From PubMed', 'Fake Article']);
    expect(items[0].id).toBe(shortenCitekey('pmid:12345'));
  });

  it('rejects sources without a provider', async () => {
    await expect(citekeyToCslItem('arxiv:2101.00001', providers)).rejects.toBeInstanceOf(UnsupportedSourceError);
    await expect(citekeyToCslItem('raw:local', providers)).rejects.toBeInstanceOf(UnsupportedSourceError);
  });

  it('propagates provider failures', async () => {
    await expect(citekeyToCslItem('doi:10.1234/missing', providers)).rejects.toThrow('not found: 10.1234/missing');
  });

  it('rejects non-object metadata', async () => {
    await expect(citekeyToCslItem('doi:10.1234/bare', providers)).rejects.toBeInstanceOf(CslValidationError);
  });
});
