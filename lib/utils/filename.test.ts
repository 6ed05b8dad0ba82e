import { describe, expect, it } from 'vitest';
import { createReadableFilename } from './filename';

describe('createReadableFilename', () => {
  it('joins title and authors', () => {
    expect(createReadableFilename('The Winter Garden', ['Ada Lovelace', 'Charles Babbage'], 'EPUB')).toBe(
      'The Winter Garden - Ada Lovelace & Charles Babbage.epub'
    );
  });

  it('drops characters that are not allowed in file names', () => {
    expect(createReadableFilename('What: A <Story>?', [], 'pdf')).toBe('What A Story.pdf');
    expect(createReadableFilename('Tabs\tand\nlines', ['A/B'], 'txt')).toBe('Tabs and lines - AB.txt');
  });

  it('never produces an empty or hidden name', () => {
    expect(createReadableFilename('   ', [], 'txt')).toBe('Untitled.txt');
    expect(createReadableFilename('...hidden', ['X'], 'epub')).toBe('hidden - X.epub');
  });

  it('limits the length', () => {
    expect(createReadableFilename('a'.repeat(200), [], 'epub')).toBe(`${'a'.repeat(150)}.epub`);
  });
});
