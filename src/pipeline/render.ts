import type { CommentThreadResult } from '../scrapers/comments.js';
import type { ExtractionResult, ItemReference } from './types.js';

const NONE = 'none';

// Render one item's metadata and comments into a text block
export function renderItem(itemRef: ItemReference, extraction: ExtractionResult, comments: CommentThreadResult): string {
  const commentLines = comments.items.length > 0
    ? comments.items.map(comment => `- ${comment}`).join('\n')
    : '(no comments)';

  return [
    `Source: ${itemRef}`,
    '',
    '##### Title',
    extraction.title,
    '',
    '##### Description',
    extraction.description,
    '',
    '##### Tags',
    extraction.tags.join(', '),
    '',
    '##### Transcript',
    extraction.transcript,
    '',
    '##### Comments',
    commentLines,
    '',
    '##### Errors',
    `Item info error: ${extraction.error || NONE}`,
    `Comment error: ${comments.error || NONE}`,
  ].join('\n');
}

export function concatenateItems(texts: readonly string[]): string {
  return texts.map((text, i) => `#### Item ${i + 1}\n${text}`).join('\n\n');
}

export function completeText(query: string, texts: readonly string[]): string {
  return `Results for "${query}" from ${texts.length} items:\n\n${concatenateItems(texts)}`;
}

export function summarizedText(query: string, summaries: readonly string[]): string {
  const body = summaries.map((summary, i) => `--- Item ${i + 1} ---\n${summary}`).join('\n\n');
  return `Summaries for "${query}" across ${summaries.length} items:\n\n${body}`;
}

export function truncatedText(query: string, deadlineMs: number, texts: readonly string[], discovered: number): string {
  return `Query "${query}" timed out after ${deadlineMs / 1000}s. ` +
    `Partial results for ${texts.length} of ${discovered} items (not summarized):\n\n${concatenateItems(texts)}`;
}

export function noResultsText(query: string): string {
  return `No content found for "${query}".`;
}

export function nothingProcessedText(query: string, discovered: number, timedOutAfterMs?: number): string {
  if (timedOutAfterMs === undefined) {
    return `Found ${discovered} items for "${query}" but none could be processed.`;
  }
  const seconds = timedOutAfterMs / 1000;
  return discovered === 0
    ? `Query "${query}" timed out after ${seconds}s before discovery completed.`
    : `Query "${query}" timed out after ${seconds}s before any of ${discovered} items was processed.`;
}
