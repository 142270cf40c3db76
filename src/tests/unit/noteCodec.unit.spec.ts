import { describe, it, expect, vi } from 'vitest';
import fc from 'fast-check';
import { appendToNote, isNoteKey, parseNote } from '../../services/noteCodec';

describe('noteCodec (unit)', () => {
  it('recognizes note keys', () => {
    expect(isNoteKey('standard_id')).toBe(true);
    expect(isNoteKey('ISSN')).toBe(true);
    expect(isNoteKey('container-title')).toBe(true);
    expect(isNoteKey('Mixed')).toBe(false);
    expect(isNoteKey('ISSN2')).toBe(false);
    expect(isNoteKey('')).toBe(false);
  });

  it('returns undefined for an empty note', () => {
    expect(appendToNote(undefined)).toBeUndefined();
    expect(appendToNote('', '', {})).toBeUndefined();
  });

  it('appends text then entries on their own lines', () => {
    expect(appendToNote('', 'text')).toBe('text');
    expect(appendToNote('ends\n', '', { k: 'v' })).toBe('ends\nk: v');
    expect(appendToNote('existing', 'More text', { a_b: 'x', ISSN: '1234' })).toBe('existing\nMore text\na_b: x\nISSN: 1234');
  });

  it('skips entries with bad keys or multi-line values', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      expect(appendToNote('n', '', { BAD1: 'y', multi: 'l1\nl2', ok: 'yes' })).toBe('n\nok: yes');
      const skipped = spy.mock.calls.filter(c => String(c[0]).includes('note_entry_skipped'));
      expect(skipped).toHaveLength(2);
    } finally {
      spy.mockRestore();
    }
  });

  it('parses line and braced entries', () => {
    const note = 'standard_id: doi:10.1234/x\nfree text {:original_id: abc} more\nPMID: 123\nNot an: entry';
    expect(parseNote(note)).toEqual({ standard_id: 'doi:10.1234/x', PMID: '123', original_id: 'abc' });
    expect(parseNote(undefined)).toEqual({});
    expect(parseNote('key:    spaced value   ')).toEqual({ key: 'spaced value' });
  });

  it('lets braced entries win over line entries and later entries win within a form', () => {
    expect(parseNote('key: line\n{:key: braced}')).toEqual({ key: 'braced' });
    expect(parseNote('{:key: braced}\nkey: line')).toEqual({ key: 'braced' });
    expect(parseNote('key: first\nkey: second')).toEqual({ key: 'second' });
  });

  it('round-trips dictionaries written by appendToNote', () => {
    const key = fc.oneof(fc.stringMatching(/^[A-Z]{1,8}$/), fc.stringMatching(/^[-_a-z]{1,12}$/));
    const value = fc.stringMatching(/^[A-Za-z0-9.,:/-]([A-Za-z0-9 .,:/-]{0,20}[A-Za-z0-9.,:/-])?$/);
    const entries = fc.uniqueArray(fc.tuple(key, value), { selector: t => t[0], maxLength: 6 });
    fc.assert(fc.property(entries, (pairs) => {
      const dict = Object.fromEntries(pairs);
      const note = appendToNote('Free text.', '', dict);
      expect(parseNote(note)).toEqual(dict);
    }));
  });
});
