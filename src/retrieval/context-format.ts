/**
 * Context block formatting.
 *
 * Each result becomes one block; blocks are concatenated with no separator.
 * Downstream prompt templates depend on this layout byte for byte:
 *
 * ```
 * \n<document>\n{sectionHeader}\n\nText:\n{content}\n\nSummary:\n{summary}\n</document>\n
 * ```
 */

import type { PassagePayload } from '../storage/types.js';

const OPEN = '\n<document>\n';
const TEXT_MARKER = '\n\nText:\n';
const SUMMARY_MARKER = '\n\nSummary:\n';
const CLOSE = '\n</document>\n';

type ContextFields = Pick<PassagePayload, 'sectionHeader' | 'content' | 'summary'>;

export function formatDocument(result: ContextFields): string {
  return `${OPEN}${result.sectionHeader}${TEXT_MARKER}${result.content}${SUMMARY_MARKER}${result.summary}${CLOSE}`;
}

/**
 * Assemble context in result order. Empty string for no results.
 */
export function formatContext(results: readonly ContextFields[]): string {
  return results.map(formatDocument).join('');
}

/**
 * Split a context string back into its blocks.
 *
 * Section headers are single-line. A block ends at the first close marker
 * that is followed by another block or by the end of the string.
 *
 * @throws Error if the string is not a sequence of well-formed blocks
 */
export function parseContext(context: string): ContextFields[] {
  const blocks: ContextFields[] = [];
  let pos = 0;

  while (pos < context.length) {
    if (!context.startsWith(OPEN, pos)) {
      throw new Error(`Malformed context: expected <document> at offset ${pos}`);
    }
    const bodyStart = pos + OPEN.length;

    let end = context.indexOf(CLOSE, bodyStart);
    while (end !== -1) {
      const after = end + CLOSE.length;
      if (after === context.length || context.startsWith(OPEN, after)) break;
      end = context.indexOf(CLOSE, end + 1);
    }
    if (end === -1) {
      throw new Error(`Malformed context: unterminated <document> at offset ${pos}`);
    }

    const body = context.slice(bodyStart, end);
    const textAt = body.indexOf(TEXT_MARKER);
    const summaryAt = body.lastIndexOf(SUMMARY_MARKER);
    if (textAt === -1 || summaryAt === -1 || summaryAt < textAt + TEXT_MARKER.length) {
      throw new Error(`Malformed context: missing Text/Summary in block at offset ${pos}`);
    }

    blocks.push({
      sectionHeader: body.slice(0, textAt),
      content: body.slice(textAt + TEXT_MARKER.length, summaryAt),
      summary: body.slice(summaryAt + SUMMARY_MARKER.length),
    });
    pos = end + CLOSE.length;
  }

  return blocks;
}
