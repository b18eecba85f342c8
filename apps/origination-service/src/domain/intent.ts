export type Intent =
  | { kind: 'decline'; keyword: string }
  | { kind: 'continue' }
  | { kind: 'extractable'; text: string };

export const OFFER_DECLINE_KEYWORDS = [
  'no',
  'not interested',
  'decline',
  'cancel',
  "don't want",
  'nevermind',
  'forget it',
] as const;

export const DOCUMENT_DECLINE_KEYWORDS = ['no', "don't have", "can't provide", 'later', 'not now'] as const;

function normalizeForMatch(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’']/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsPhrase(haystack: string, phrase: string): boolean {
  const pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(normalizeForMatch(phrase))}(?![a-z0-9])`);
  return pattern.test(haystack);
}

/**
 * Whole-word keyword match, so "now" or "know" never read as "no".
 */
export function classifyIntent(text: string, declineKeywords: readonly string[]): Intent {
  const normalized = normalizeForMatch(text);
  if (normalized.length === 0) return { kind: 'continue' };

  const keyword = declineKeywords.find((phrase) => containsPhrase(normalized, phrase));
  if (keyword) return { kind: 'decline', keyword };

  return { kind: 'extractable', text: text.trim() };
}
