import { sanitizeHtml } from './sanitize';

/**
 * Text content of a feed title or body.
 */
export function stripHtml(html: string): string {
  return sanitizeHtml(html);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
