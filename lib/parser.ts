import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { ParseError } from './errors';
import { baseMimeType, isDownloadableMimeType } from './formats';
import type { AcquisitionLink, AcquisitionRelation, Entry, Page, Pagination, RawDocument, SubcatalogLink } from './types';

const ACQUISITION_REL = 'http://opds-spec.org/acquisition';
const IMAGE_REL_PREFIX = 'http://opds-spec.org/image';

// Feed-level links that never point at a book file
const NON_BOOK_RELS = new Set(['self', 'search', 'start', 'up', 'next', 'previous', 'prev', 'first', 'last', 'related']);

/**
 * Parses an OPDS (Atom) document into a Page.
 * Only throws when the document is not an Atom feed at all; missing
 * fields degrade to empty values.
 */
export function parseFeed(raw: RawDocument): Page {
  const body = raw.body.replace(/^\uFEFF/, '').trim();
  if (!body) {
    throw new ParseError(`Empty document received from ${raw.url}`);
  }
  if (!body.startsWith('<')) {
    throw new ParseError(`Document from ${raw.url} is not XML`);
  }

  let $: CheerioAPI;
  try {
    $ = cheerio.load(body, { xml: true });
  } catch (error) {
    throw new ParseError(`Could not decode document from ${raw.url}`, error);
  }

  const topLevel = $.root().children();
  const feed = topLevel.filter((_, el) => isAtom(el, 'feed')).first();
  if (feed.length === 0) {
    const rootName = topLevel.first().prop('tagName');
    const found = typeof rootName === 'string' ? rootName.toLowerCase() : 'nothing';
    throw new ParseError(`Expected an Atom <feed> from ${raw.url} but found ${found}`);
  }

  const baseUrl = raw.url;
  const entries: Entry[] = [];
  const subcatalogs: SubcatalogLink[] = [];

  childElements(feed, 'entry').each((_, el) => {
    const parsed = parseEntry($(el), baseUrl);
    if (parsed.kind === 'subcatalog') {
      subcatalogs.push(parsed.link);
    } else {
      entries.push(parsed.entry);
    }
  });

  return {
    url: raw.url,
    id: childText(feed, 'id'),
    title: childText(feed, 'title'),
    updated: parseDate(childText(feed, 'updated')),
    entries,
    subcatalogs,
    pagination: parsePagination(feed, baseUrl),
    server: raw.server,
  };
}

type ParsedEntry =
  | { kind: 'entry'; entry: Entry }
  | { kind: 'subcatalog'; link: SubcatalogLink };

function parseEntry($entry: Cheerio<Element>, baseUrl: string): ParsedEntry {
  const title = childText($entry, 'title');
  const authors = parseAuthors($entry);
  const acquisitionLinks: AcquisitionLink[] = [];
  let catalogLink: SubcatalogLink | null = null;
  let firstHref = '';

  for (const el of childElements($entry, 'link').toArray()) {
    const href = resolveHref(el.attribs.href, baseUrl);
    if (!href) continue;
    firstHref = firstHref || href;

    const rel = (el.attribs.rel || 'alternate').trim();
    const type = el.attribs.type || '';
    const mime = baseMimeType(type);

    // Covers and thumbnails
    if (rel.startsWith(IMAGE_REL_PREFIX) || (mime.startsWith('image/') && mime !== 'image/vnd.djvu')) continue;

    // Nested catalog: only the first one counts
    if (mime === 'application/atom+xml') {
      if (!catalogLink) {
        catalogLink = { href, title: title || href, kind: /kind=acquisition/i.test(type) ? 'acquisition' : 'navigation' };
      }
      continue;
    }

    const relation = acquisitionRelation(rel);
    if (relation) {
      acquisitionLinks.push({ href, mimeType: mime, relation });
    } else if (!NON_BOOK_RELS.has(rel) && isDownloadableMimeType(mime)) {
      acquisitionLinks.push({ href, mimeType: mime, relation: 'generic' });
    }
  }

  if (acquisitionLinks.length === 0 && catalogLink) {
    return { kind: 'subcatalog', link: catalogLink };
  }

  const summary = parseSummary($entry);
  const rawId = childText($entry, 'id');
  const id = rawId || `generated:${firstHref || `${title}|${authors.join('&')}`}`;

  return {
    kind: 'entry',
    entry: {
      id,
      title,
      authors,
      acquisitionLinks,
      summary: summary.text,
      updated: parseDate(childText($entry, 'updated') || childText($entry, 'published')),
      tags: parseTags($entry, summary.lines),
      identifiers: parseIdentifiers($entry, rawId),
    },
  };
}

function acquisitionRelation(rel: string): AcquisitionRelation | null {
  if (rel === ACQUISITION_REL) return 'acquisition';
  if (!rel.startsWith(`${ACQUISITION_REL}/`)) return null;

  switch (rel.slice(ACQUISITION_REL.length + 1)) {
    case 'open-access':
      return 'open-access';
    case 'borrow':
      return 'borrow';
    case 'buy':
      return 'buy';
    case 'sample':
    case 'preview':
      return 'sample';
    case 'subscribe':
      return 'subscribe';
    default:
      return 'acquisition';
  }
}

/**
 * calibre packs several people into one <name> joined with "&"
 */
function parseAuthors($entry: Cheerio<Element>): string[] {
  const authors: string[] = [];
  childElements($entry, 'author').each((_, el) => {
    const $author = $entry.find(el);
    const name = childText($author, 'name') || $author.text().trim();
    for (const part of name.split('&')) {
      const author = part.replace(/\s+/g, ' ').trim();
      if (author) authors.push(author);
    }
  });
  return authors;
}

function parseSummary($entry: Cheerio<Element>): { text: string; lines: string[] } {
  const $summary = childElements($entry, 'summary').first();
  const $source = $summary.length > 0 ? $summary : childElements($entry, 'content').first();
  if ($source.length === 0) return { text: '', lines: [] };

  // xhtml content keeps its markup; line breaks only survive as elements
  const raw = $source.attr('type') === 'xhtml' ? $source.html() || '' : $source.text();
  const lines = raw
    .split(/\r?\n|<br\s*\/?>|<\/(?:p|div)>/i)
    .map((line) => line.replace(/<[^>]*>/g, '').replace(/\s+/g, ' ').trim())
    .filter(Boolean);

  return { text: lines.join('\n'), lines };
}

function parseTags($entry: Cheerio<Element>, summaryLines: string[]): string[] {
  const tags: string[] = [];

  childElements($entry, 'category').each((_, el) => {
    const tag = (el.attribs.label || el.attribs.term || '').trim();
    if (tag) tags.push(tag);
  });

  for (const line of summaryLines) {
    const match = line.match(/^TAGS:\s*(.*)$/);
    if (!match) continue;
    for (const tag of match[1].split(',')) {
      const trimmed = tag.trim();
      if (trimmed) tags.push(trimmed);
    }
  }

  return [...new Set(tags)];
}

function parseIdentifiers($entry: Cheerio<Element>, rawId: string): string[] {
  const identifiers = [rawId, stripUrnPrefix(rawId)];

  $entry.children().each((_, el) => {
    if (/^(dc|dcterms):identifier$/i.test(el.name)) {
      const value = $entry.find(el).text().trim();
      identifiers.push(value, stripUrnPrefix(value));
    }
  });

  return [...new Set(identifiers.filter(Boolean))];
}

function stripUrnPrefix(identifier: string): string {
  return identifier.replace(/^urn:(uuid|isbn):/i, '');
}

function parsePagination($feed: Cheerio<Element>, baseUrl: string): Pagination {
  const pagination: Pagination = {};

  childElements($feed, 'link').each((_, el) => {
    const href = resolveHref(el.attribs.href, baseUrl);
    if (!href) return;

    switch ((el.attribs.rel || '').trim()) {
      case 'next':
        pagination.next ??= href;
        break;
      case 'previous':
      case 'prev':
        pagination.previous ??= href;
        break;
      case 'first':
        pagination.first ??= href;
        break;
      case 'last':
        pagination.last ??= href;
        break;
    }
  });

  return pagination;
}

function isAtom(el: Element, localName: string): boolean {
  return el.name === localName || el.name === `atom:${localName}`;
}

function childElements($parent: Cheerio<Element>, localName: string): Cheerio<Element> {
  return $parent.children().filter((_, el) => isAtom(el, localName));
}

function childText($parent: Cheerio<Element>, localName: string): string {
  return childElements($parent, localName).first().text().replace(/\s+/g, ' ').trim();
}

function resolveHref(href: string | undefined, baseUrl: string): string {
  const trimmed = href?.trim();
  if (!trimmed) return '';
  try {
    return new URL(trimmed, baseUrl).toString();
  } catch {
    return '';
  }
}

function parseDate(value: string): Date | null {
  if (!value) return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time);
}
