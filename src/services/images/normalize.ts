/**
 * @fileoverview Turns malformed image markup back into placeholders.
 *
 * Models sometimes ignore the placeholder instruction and emit real `<img>`
 * tags, or, on updates, echo back HTML that a browser already escaped. Each
 * pattern below captures the alt text of one of those shapes so it can be
 * rewritten as `{{image: alt}}`.
 */

const REWRITES: RegExp[] = [
  // <img src="<img src="https://..." alt="x">">
  /<img\s+src="<img\s+src="[^"]*"\s+alt="([^"]*)"[^>]*>"[^>]*>/g,
  // <img src="&lt;img src="https://..." alt="x"&gt;" alt="y">
  /<img\s+src="&lt;img\s+src="[^"]*"\s+alt="([^"]+)"&gt;"\s+alt="[^"]+">/g,
  // <img src="&lt;img src="https://...&amp;...&quot;...&gt;" alt="x">
  /<img\s+src="&lt;img\s+src="[^"]*&quot;[^>]*&gt;"\s+alt="([^"]+)">/g,
  // &lt;img src="https://..." alt="x"&gt;
  /&lt;img\s+src="[^"]+"\s+alt="([^"]+)"&gt;/g,
  // &lt;img src=&quot;https://...&quot; alt=&quot;x&quot;&gt;
  /&lt;img\s+src=&quot;https?:\/\/[^&]*&quot;(?:\s+alt=&quot;([^&]*)&quot;)?[^<]*?&gt;/g,
  // <img src="https://..." alt="x">
  /<img\s+src="https?:\/\/[^"]*"\s+alt="([^"]*)">/g,
];

function toPlaceholder(_match: string, label: string | undefined): string {
  return `{{image: ${label?.trim() || 'image'}}}`;
}

/**
 * Rewrite malformed or real-URL `<img>` tags into `{{image: label}}`.
 */
export function normalizeImageMarkup(html: string): string {
  return REWRITES.reduce((result, pattern) => result.replace(pattern, toPlaceholder), html);
}
