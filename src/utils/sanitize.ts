/**
 * Sanitization for the untrusted text the service handles: feed HTML, chat
 * messages that end up in LLM prompts, and values written to logs.
 *
 * Every regex pass is bounded by input length, so a hostile feed item or
 * message cannot trigger catastrophic backtracking.
 */

const MAX_PATTERN_INPUT = 10000;
const MAX_MESSAGE_LENGTH = 500;
const MAX_LOG_LENGTH = 1000;

// Phrases and markers used to steer a model away from its instructions
const PROMPT_INJECTION_PATTERNS: RegExp[] = [
  /ignore\s+(all\s+)?(previous|above|prior)\s+(instructions?|prompts?|rules?)/i,
  /(disregard|forget)\s+(all\s+)?(previous|above|prior)/i,
  /you\s+are\s+now\s+/i,
  /new\s+instructions?:/i,
  /(system|assistant|user)\s*:\s*/i,
  /\[\s*\/?INST\s*\]/i,
  /<\|im_(start|end)\|>/i,
  /<<SYS>>|<\/SYS>/i,
];

const ROLE_MARKER = /\[\s*(system|user|assistant)\s*\]/gi;
const FENCED_ROLE = /```\s*(system|prompt|instruction)/gi;
const LOG_CONTROL_CHARS = /[\r\n\x00-\x08\x0b\x0c\x0e-\x1f]/g;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

const HTML_STRIP_STEPS: Array<[RegExp, string]> = [
  [/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, ''],
  [/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, ''],
  // inline event handlers, quoted or bare
  [/\s+on\w+\s*=\s*["'][^"']*["']/gi, ''],
  [/\s+on\w+\s*=\s*[^\s>]*/gi, ''],
  [/\b(href|src)\s*=\s*["']?\s*(javascript|data):[^"'\s>]*/gi, ''],
  [/<[^>]*>/g, ''],
];

function bounded(input: string): string {
  return input.length > MAX_PATTERN_INPUT ? input.substring(0, MAX_PATTERN_INPUT) : input;
}

function decodeEntity(entity: string, body: string): string {
  if (body.startsWith('#')) {
    const code = body[1] === 'x' || body[1] === 'X'
      ? parseInt(body.substring(2), 16)
      : parseInt(body.substring(1), 10);
    // printable ASCII only; anything else is dropped
    return code >= 32 && code <= 126 ? String.fromCharCode(code) : '';
  }
  return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
}

/**
 * Plain text of an HTML fragment from a feed: scripts, styles, handlers and
 * tags removed, entities decoded, whitespace collapsed.
 */
export function sanitizeHtml(html: string): string {
  if (!html) return '';

  let text = bounded(html);
  for (const [pattern, replacement] of HTML_STRIP_STEPS) {
    text = text.replace(pattern, replacement);
  }

  return text
    .replace(/&(#\d+|#x[0-9a-f]+|[a-z]+);/gi, (entity, body: string) => decodeEntity(entity, body))
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Neutralize prompt-injection markers before text is placed in a prompt.
 * `suspicious` reports whether any known injection phrase was present.
 */
export function sanitizeForLLM(input: string): { sanitized: string; suspicious: boolean } {
  if (!input) {
    return { sanitized: '', suspicious: false };
  }
  if (input.length > MAX_PATTERN_INPUT) {
    return { sanitized: input.substring(0, MAX_MESSAGE_LENGTH), suspicious: true };
  }

  const suspicious = PROMPT_INJECTION_PATTERNS.some(pattern => pattern.test(input));
  const sanitized = input
    .replace(ROLE_MARKER, '')
    .replace(FENCED_ROLE, '```')
    .replace(/</g, '＜')
    .replace(/>/g, '＞')
    .replace(/\0/g, '')
    .replace(/\s+/g, ' ')
    .trim();

  return { sanitized, suspicious };
}

/**
 * Single-line, length-capped form of a value for log output.
 */
export function sanitizeForLog(input: string): string {
  if (!input) return '';
  return input.replace(LOG_CONTROL_CHARS, '').substring(0, MAX_LOG_LENGTH);
}

export interface ChatMessageValidation {
  valid: boolean;
  sanitized: string;
  /** Rejection reason, or a warning on a valid message that was neutralized */
  error?: string;
}

export function validateChatMessage(input: unknown): ChatMessageValidation {
  if (typeof input !== 'string' || !input) {
    return { valid: false, sanitized: '', error: 'Message is required and must be a string' };
  }

  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return { valid: false, sanitized: '', error: 'Message cannot be empty' };
  }
  if (trimmed.length > MAX_MESSAGE_LENGTH) {
    return { valid: false, sanitized: '', error: `Message too long (max ${MAX_MESSAGE_LENGTH} characters)` };
  }

  const { sanitized, suspicious } = sanitizeForLLM(trimmed);
  return {
    valid: true,
    sanitized,
    error: suspicious ? 'Input contained suspicious patterns that were sanitized' : undefined,
  };
}

export function escapeRegex(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
