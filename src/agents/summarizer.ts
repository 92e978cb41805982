import { ChatOpenAI } from '@langchain/openai';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { createLangfuseHandler, createOpenRouterLLM } from './llm';
import { buildAnswerSystemPrompt, buildSummarySystemPrompt } from '../prompts/system-prompt';
import { buildAnswerUserPrompt, buildSummaryUserPrompt } from '../prompts/user-prompt';
import { GenerationUnavailable, errorMessage } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';

const SUMMARY_INPUT_CHARS = 2000;
const QUOTA_COOLDOWN_MS = 15 * 60 * 1000;

/**
 * Generative text capability. Both methods reject with GenerationUnavailable;
 * callers own the extractive fallback.
 */
export interface Summarizer {
  readonly available: boolean;
  summarize(text: string, maxLength: number): Promise<string>;
  answer(question: string, contextSnippets: string[]): Promise<string>;
}

/**
 * Used when generation is disabled by configuration or no API key is set.
 */
export const unavailableSummarizer: Summarizer = {
  available: false,
  async summarize() {
    throw new GenerationUnavailable('Text generation is disabled');
  },
  async answer() {
    throw new GenerationUnavailable('Text generation is disabled');
  },
};

function isQuotaError(error: unknown): boolean {
  const status = typeof error === 'object' && error !== null && 'status' in error
    ? error.status
    : undefined;
  if (status === 429) return true;
  const message = errorMessage(error).toLowerCase();
  return message.includes('429') || message.includes('quota') || message.includes('insufficient_quota');
}

export interface SummarizerOptions {
  /** How long to fail fast after a quota or rate-limit error */
  quotaCooldownMs?: number;
  now?: () => number;
}

/**
 * LLM-backed summarizer on OpenRouter. After a quota or rate-limit error every
 * call fails fast for `quotaCooldownMs`, then the model is tried again.
 */
export class OpenRouterSummarizer implements Summarizer {
  private blockedUntil: number | null = null;
  private readonly quotaCooldownMs: number;
  private readonly now: () => number;

  constructor(
    private readonly summaryLLM: ChatOpenAI = createOpenRouterLLM({ temperature: 0.3, maxTokens: 150 }),
    private readonly answerLLM: ChatOpenAI = createOpenRouterLLM({ temperature: 0.7, maxTokens: 300 }),
    options: SummarizerOptions = {}
  ) {
    this.quotaCooldownMs = options.quotaCooldownMs ?? QUOTA_COOLDOWN_MS;
    this.now = options.now ?? Date.now;
  }

  get available(): boolean {
    return this.blockedUntil === null || this.now() >= this.blockedUntil;
  }

  async summarize(text: string, maxLength: number): Promise<string> {
    const input = text.substring(0, SUMMARY_INPUT_CHARS);
    const output = await this.invoke(this.summaryLLM, 'summary', [
      new SystemMessage(buildSummarySystemPrompt()),
      new HumanMessage(buildSummaryUserPrompt(input, maxLength)),
    ]);
    return output.length > maxLength ? output.substring(0, maxLength).trimEnd() : output;
  }

  async answer(question: string, contextSnippets: string[]): Promise<string> {
    const context = contextSnippets.join('\n\n');
    return this.invoke(this.answerLLM, 'answer', [
      new SystemMessage(buildAnswerSystemPrompt(new Date())),
      new HumanMessage(buildAnswerUserPrompt(context, question)),
    ]);
  }

  private async invoke(
    llm: ChatOpenAI,
    purpose: 'summary' | 'answer',
    messages: Array<SystemMessage | HumanMessage>
  ): Promise<string> {
    if (!this.available) {
      throw new GenerationUnavailable('Generation quota exceeded');
    }
    this.blockedUntil = null;

    const stepId = debugLogger.stepStart('LLM', `Generating ${purpose}`);
    const handler = createLangfuseHandler(purpose);

    try {
      const response = await llm.invoke(messages, { callbacks: handler ? [handler] : undefined });
      const content = typeof response.content === 'string' ? response.content.trim() : '';
      if (!content) {
        throw new GenerationUnavailable(`Empty ${purpose} from model`);
      }
      debugLogger.stepFinish(stepId, { length: content.length });
      return content;
    } catch (error) {
      debugLogger.stepError(stepId, 'LLM', `${purpose} generation failed`, error);
      if (error instanceof GenerationUnavailable) throw error;

      if (isQuotaError(error)) {
        console.warn(
          `⚠️  LLM quota exceeded or rate limited; extractive summaries for the next ${Math.round(this.quotaCooldownMs / 60000)} min`
        );
        this.blockedUntil = this.now() + this.quotaCooldownMs;
      }
      throw new GenerationUnavailable(`LLM ${purpose} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

export function createSummarizer(config: { useGeneration: boolean }): Summarizer {
  return config.useGeneration ? new OpenRouterSummarizer() : unavailableSummarizer;
}
