// src/core/normalize/text.ts

/**
 * Truncates to at most `maxLength` code points. Surrogate pairs are never split.
 */
export function truncateText(text: string, maxLength: number): string {
  if (maxLength <= 0) return '';
  if (text.length <= maxLength) return text;

  const codePoints = Array.from(text);
  if (codePoints.length <= maxLength) return text;

  return codePoints.slice(0, maxLength).join('');
}

export function cleanText(text: string): string {
  return text
    .replace(/[ \t\u00a0]+/g, ' ')
    .replace(/\n[ \t]+\n/g, '\n\n')
    .replace(/\n{3,}/g, '\n\n')
    .replace(/^ | $/gm, '')
    .trim();
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
