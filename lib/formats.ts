import type { AcquisitionLink } from './types';

const MIME_BY_FORMAT: Record<string, string> = {
  epub: 'application/epub+zip',
  kepub: 'application/kepub+zip',
  mobi: 'application/x-mobipocket-ebook',
  azw3: 'application/vnd.amazon.ebook',
  azw: 'application/vnd.amazon.ebook',
  pdf: 'application/pdf',
  fb2: 'application/x-fictionbook+xml',
  cbz: 'application/vnd.comicbook+zip',
  cbr: 'application/vnd.comicbook-rar',
  djvu: 'image/vnd.djvu',
  rtf: 'application/rtf',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  txt: 'text/plain',
  zip: 'application/zip',
};

/**
 * Strips parameters (";profile=...") and lowercases a MIME type
 */
export function baseMimeType(mimeType: string): string {
  return mimeType.split(';')[0].trim().toLowerCase();
}

/**
 * Extension of the last path segment of a URL, without the dot
 */
export function extensionFromHref(href: string): string {
  let pathname = href;
  try {
    pathname = new URL(href).pathname;
  } catch {
    pathname = href.split(/[?#]/)[0];
  }
  const lastSegment = pathname.split('/').pop() || '';
  const dot = lastSegment.lastIndexOf('.');
  return dot > 0 ? lastSegment.slice(dot + 1).toLowerCase() : '';
}

/**
 * Picks a file extension for a downloaded book.
 * MIME type wins; the href extension covers servers that send octet-stream.
 */
export function extensionFor(link: Pick<AcquisitionLink, 'href' | 'mimeType'>): string {
  const mime = baseMimeType(link.mimeType);
  for (const [format, formatMime] of Object.entries(MIME_BY_FORMAT)) {
    if (formatMime === mime) return format;
  }
  return extensionFromHref(link.href) || 'bin';
}

/**
 * True when the link satisfies a format preference given either as a
 * format name ("epub") or as a MIME type ("application/epub+zip").
 */
export function matchesFormat(link: Pick<AcquisitionLink, 'href' | 'mimeType'>, preference: string): boolean {
  const wanted = preference.trim().toLowerCase();
  if (!wanted) return false;

  const mime = baseMimeType(link.mimeType);
  if (wanted.includes('/')) return mime === baseMimeType(wanted);

  if (MIME_BY_FORMAT[wanted] && MIME_BY_FORMAT[wanted] === mime) return true;
  return extensionFromHref(link.href) === wanted;
}

/**
 * Ebook MIME types and everything the server offers as a plain file download.
 * Images, Atom feeds, HTML pages and OpenSearch descriptions are not books.
 */
export function isDownloadableMimeType(mimeType: string): boolean {
  const mime = baseMimeType(mimeType);
  if (!mime) return false;
  if (mime.startsWith('image/') && mime !== 'image/vnd.djvu') return false;
  if (mime === 'application/atom+xml') return false;
  if (mime === 'text/html' || mime === 'application/xhtml+xml') return false;
  if (mime === 'application/opensearchdescription+xml') return false;
  return true;
}
