/**
 * Creates a readable filename from book title and authors
 * Format: "Title - Author & Author.extension"
 */
export function createReadableFilename(
  title: string,
  authors: readonly string[],
  extension: string
): string {
  const clean = (value: string) =>
    value
      .replace(/[<>:"/\\|?*]/g, '') // Remove invalid filename characters
      .replace(/[\s\u0000-\u001f]+/g, ' ')
      .trim();

  const cleanTitle = clean(title) || 'Untitled';
  const cleanAuthor = clean(authors.join(' & '));

  const combined = cleanAuthor ? `${cleanTitle} - ${cleanAuthor}` : cleanTitle;

  // Limit total length to 150 chars (leaving room for extension)
  const truncated = combined.length > 150
    ? combined.substring(0, 150).trim()
    : combined;

  // Leading dots would hide the file on unix systems
  const visible = truncated.replace(/^\.+/, '') || 'Untitled';

  return `${visible}.${extension.toLowerCase()}`;
}
