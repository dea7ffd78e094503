// src/core/extract/strategies/page-text.ts
import type { CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template', 'svg', 'iframe']);

/**
 * Visible text of the page body in document order, one text node per line.
 */
export function extractPageText($: CheerioAPI): string {
  const body = $('body');
  const roots = body.length > 0 ? body.toArray() : $.root().toArray();
  const lines: string[] = [];

  for (const root of roots) {
    collectText(root, lines);
  }

  return lines.join('\n');
}

function collectText(node: AnyNode, lines: string[]): void {
  if (isText(node)) {
    const line = node.data.replace(/\s+/g, ' ').trim();
    if (line) lines.push(line);
    return;
  }

  if (isTag(node) && SKIPPED_TAGS.has(node.name)) {
    return;
  }

  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, lines);
    }
  }
}
