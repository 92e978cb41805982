import { ChatAnswer, Highlight } from '../types';
import { ArticleStore } from '../store/article-store';
import { SemanticIndex } from '../search/semantic-index';
import { buildHighlightContext } from '../search/context-builder';
import { validateChatMessage } from '../utils/sanitize';
import { InvalidArgument, errorMessage } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';
import { Summarizer } from './summarizer';

const FALLBACK_ANSWER_LENGTH = 400;

export interface ChatServiceDeps {
  index: SemanticIndex;
  store: ArticleStore;
  summarizer: Summarizer;
  categories: string[];
  topK: number;
  now?: () => Date;
}

function listCategories(categories: string[]): string {
  if (categories.length <= 1) return categories.join('');
  return `${categories.slice(0, -1).join(', ')}, or ${categories[categories.length - 1]}`;
}

export function noContextAnswer(categories: string[]): string {
  const topics = categories.length > 0 ? ` Please try asking about ${listCategories(categories)} news.` : '';
  return `I don't have enough information about recent news highlights to answer your question.${topics}`;
}

/**
 * Answer from the highlights alone: the first one sharing a word of more than
 * three letters with the question, else the best-ranked one.
 */
export function extractiveAnswer(question: string, highlights: Highlight[]): string {
  const [first] = highlights;
  if (!first) return '';

  const words = question.toLowerCase().split(/\s+/).filter(word => word.length > 3);
  const relevant = highlights.find(highlight => {
    const text = `${highlight.title}\n${highlight.category}\n${highlight.summary}\n${highlight.sourceList.join(', ')}`.toLowerCase();
    return words.some(word => text.includes(word));
  }) ?? first;

  const body = `Title: ${relevant.title}\nSummary: ${relevant.summary}`;
  const capped = body.length > FALLBACK_ANSWER_LENGTH
    ? `${body.substring(0, FALLBACK_ANSWER_LENGTH).trimEnd()}...`
    : body;
  return `Based on the news highlights:\n\n${capped}`;
}

export class ChatService {
  private readonly now: () => Date;

  constructor(private readonly deps: ChatServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async ask(input: unknown): Promise<ChatAnswer> {
    const validation = validateChatMessage(input);
    if (!validation.valid) {
      throw new InvalidArgument(validation.error ?? 'Invalid message');
    }
    if (validation.error) {
      debugLogger.warn('CHAT', validation.error);
    }
    const message = validation.sanitized;
    const stepId = debugLogger.stepStart('CHAT', 'Answering question', { length: message.length });

    const scored = await this.deps.index.query(message, this.deps.topK);
    const found = await this.deps.store.getHighlightsByIds(scored.map(s => s.highlightId));
    const byId = new Map(found.map(h => [h.id, h]));

    // Index order; ids superseded since indexing drop out here
    const context = scored.flatMap(({ highlightId, score }) => {
      const highlight = byId.get(highlightId);
      return highlight ? [{ highlight, score }] : [];
    });
    const highlights = context.map(c => c.highlight);
    const sources = context.map(({ highlight, score }) => ({
      highlightId: highlight.id,
      title: highlight.title,
      category: highlight.category,
      score,
    }));
    const timestamp = this.now().toISOString();

    if (highlights.length === 0) {
      debugLogger.stepFinish(stepId, { mode: 'empty' });
      return { message, answer: noContextAnswer(this.deps.categories), mode: 'empty', sources, timestamp };
    }

    if (this.deps.summarizer.available) {
      try {
        const answer = await this.deps.summarizer.answer(message, buildHighlightContext(highlights));
        debugLogger.stepFinish(stepId, { mode: 'generated', sources: sources.length });
        return { message, answer, mode: 'generated', sources, timestamp };
      } catch (error) {
        debugLogger.warn('CHAT', 'Generation failed, answering extractively', { error: errorMessage(error) });
      }
    }

    debugLogger.stepFinish(stepId, { mode: 'extractive', sources: sources.length });
    return { message, answer: extractiveAnswer(message, highlights), mode: 'extractive', sources, timestamp };
  }
}
