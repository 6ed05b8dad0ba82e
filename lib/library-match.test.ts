import { describe, expect, it } from 'vitest';
import { classifyEntries, createLibraryIndex, matchEntry, normalizeMatchKey } from './library-match';
import { makeEntry } from './testing/catalog-fixtures';

const library = createLibraryIndex([
  { id: '11', title: 'The Winter Garden', authors: ['Ada Lovelace', 'Charles Babbage'] },
  { id: '12', title: 'Salt  and Stone', authors: ['Mira Holt'], identifiers: ['9780000000042'] },
  { id: '13', title: 'Harbour Lights', authors: ['Jonas Berg'], identifiers: ['6f1c2a3e-0000-4000-8000-000000000099'] },
]);

describe('normalizeMatchKey', () => {
  it('case-folds, trims and collapses whitespace', () => {
    expect(normalizeMatchKey('  The   Winter\tGARDEN \n')).toBe('the winter garden');
  });
});

describe('matchEntry', () => {
  it('matches on identifier whatever the title and author say', () => {
    const entry = makeEntry('urn:uuid:6f1c2a3e-0000-4000-8000-000000000099', {
      title: 'HARBOUR LIGHTS (revised)',
      authors: ['Someone Else'],
      identifiers: ['urn:uuid:6f1c2a3e-0000-4000-8000-000000000099', '6f1c2a3e-0000-4000-8000-000000000099'],
    });

    expect(matchEntry(entry, library)).toEqual({
      by: 'identifier',
      book: { id: '13', title: 'Harbour Lights', authors: ['Jonas Berg'], identifiers: ['6f1c2a3e-0000-4000-8000-000000000099'] },
    });
  });

  it('never matches on the local database key', () => {
    const entry = makeEntry('12', { title: 'Another Book', authors: ['Other Writer'], identifiers: ['12'] });

    expect(matchEntry(entry, library)).toBeNull();
  });

  it('matches on normalized title and author', () => {
    const entry = makeEntry('remote-1', { title: 'salt and  STONE ', authors: ['mira holt'], identifiers: ['remote-1'] });

    expect(matchEntry(entry, library)?.book.id).toBe('12');
    expect(matchEntry(entry, library)?.by).toBe('title-author');
  });

  it('matches multi-author books on the full author list or a single author', () => {
    const both = makeEntry('remote-2', { title: 'The Winter Garden', authors: ['Ada Lovelace', 'Charles Babbage'], identifiers: [] });
    const one = makeEntry('remote-3', { title: 'The Winter Garden', authors: ['Charles Babbage'], identifiers: [] });

    expect(matchEntry(both, library)?.book.id).toBe('11');
    expect(matchEntry(one, library)?.book.id).toBe('11');
  });

  it('requires both title and author to be equal', () => {
    const sameTitle = makeEntry('remote-4', { title: 'Salt and Stone', authors: ['Other Writer'], identifiers: [] });
    const noAuthor = makeEntry('remote-5', { title: 'Salt and Stone', authors: [], identifiers: [] });

    expect(matchEntry(sameTitle, library)).toBeNull();
    expect(matchEntry(noAuthor, library)).toBeNull();
  });
});

describe('classifyEntries', () => {
  const entries = [
    makeEntry('a', { title: 'Harbour Lights', authors: ['Jonas Berg'] }),
    makeEntry('b', { title: 'Unknown Shores', authors: ['Jonas Berg'] }),
    makeEntry('c', { identifiers: ['9780000000042'] }),
  ];

  it('flags each entry and keeps the input order', () => {
    expect(classifyEntries(entries, library).map((row) => [row.entry.id, row.inLibrary])).toEqual([
      ['a', true],
      ['b', false],
      ['c', true],
    ]);
  });

  it('is deterministic', () => {
    expect(classifyEntries(entries, library)).toEqual(classifyEntries(entries, library));
  });
});
