import { Highlight } from '../types';

const MAX_SUMMARY_LENGTH = 800;

/**
 * One numbered snippet per highlight, in retrieval order, for the answer prompt.
 */
export function buildHighlightContext(highlights: Highlight[]): string[] {
  return highlights.map((highlight, index) => {
    const summary = highlight.summary.length > MAX_SUMMARY_LENGTH
      ? highlight.summary.substring(0, MAX_SUMMARY_LENGTH) + '...'
      : highlight.summary;
    const priority = highlight.priorityFlag ? ' | Priority' : '';

    return `[${index + 1}] ${highlight.title}
Category: ${highlight.category} | Sources: ${highlight.sourceList.join(', ')} | Reports: ${highlight.frequency}${priority}
Summary: ${summary}`;
  });
}
