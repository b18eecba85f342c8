import { MessageRole } from '@lendwise/shared-kernel';
import type { ChatMessage } from '../domain/conversationState';
import type { ExtractedFields, FieldExtractor } from './types';

const AMOUNT_UNITS: Record<string, number> = {
  crore: 10_000_000,
  crores: 10_000_000,
  cr: 10_000_000,
  lakh: 100_000,
  lakhs: 100_000,
  lac: 100_000,
  lacs: 100_000,
  l: 100_000,
  k: 1_000,
  thousand: 1_000,
};

const PURPOSES: Array<[RegExp, string]> = [
  [/\bhome renovation\b|\brenovat/, 'home renovation'],
  [/\bwedding\b|\bmarriage\b/, 'wedding'],
  [/\bmedical\b|\bhospital\b|\bsurgery\b/, 'medical'],
  [/\beducation\b|\bstudies\b|\bcollege\b|\btuition\b/, 'education'],
  [/\btravel\b|\bvacation\b|\btrip\b/, 'travel'],
  [/\bcar\b|\bbike\b|\bvehicle\b/, 'vehicle'],
  [/\bbusiness\b/, 'business'],
  [/\bdebt consolidation\b|\bcredit card (?:debt|bills?)\b/, 'debt consolidation'],
  [/\bemergency\b/, 'emergency'],
];

const TENURE_PATTERN = /(\d+(?:\.\d+)?)\s*(months?|mos?|years?|yrs?|yr)\b/;
const UNIT_AMOUNT_PATTERN = /(\d+(?:\.\d+)?)\s*(crores?|cr|lakhs?|lacs?|l|k|thousand)\b/;
const PLAIN_AMOUNT_PATTERN = /(?<!\d)(\d{4,9})(?!\d)/;
const BARE_NUMBER_PATTERN = /^(\d{1,3})(?:\s*(?:months?|mo))?$/;

function normalize(text: string): string {
  return text.toLowerCase().replace(/(\d),(?=\d)/g, '$1').replace(/\s+/g, ' ').trim();
}

function lastAssistantMessage(context: readonly ChatMessage[]): string | undefined {
  for (let i = context.length - 1; i >= 0; i -= 1) {
    if (context[i].role === MessageRole.ASSISTANT) return context[i].content.toLowerCase();
  }
  return undefined;
}

function parseTenure(text: string): { months: number; rest: string } | undefined {
  const match = text.match(TENURE_PATTERN);
  if (!match || match.index === undefined) return undefined;

  const value = Number.parseFloat(match[1]);
  const months = match[2].startsWith('y') ? Math.round(value * 12) : Math.round(value);
  if (months <= 0) return undefined;

  const rest = `${text.slice(0, match.index)} ${text.slice(match.index + match[0].length)}`;
  return { months, rest };
}

function parseAmount(text: string): number | undefined {
  const withUnit = text.match(UNIT_AMOUNT_PATTERN);
  if (withUnit) {
    const amount = Number.parseFloat(withUnit[1]) * AMOUNT_UNITS[withUnit[2]];
    return amount > 0 ? Math.round(amount) : undefined;
  }

  const plain = text.match(PLAIN_AMOUNT_PATTERN);
  if (plain) return Number.parseInt(plain[1], 10);

  return undefined;
}

function parsePurpose(text: string): string | null {
  const hit = PURPOSES.find(([pattern]) => pattern.test(text));
  return hit ? hit[1] : null;
}

/**
 * Rule-based stand-in for the text-understanding service. It only reports
 * figures that appear in the message; a bare number counts as a tenure only
 * when the previous assistant turn asked for months.
 */
export class HeuristicFieldExtractor implements FieldExtractor {
  async extractFields(message: string, context: readonly ChatMessage[]): Promise<ExtractedFields> {
    const text = normalize(message);
    const fields: ExtractedFields = { requestedAmount: null, tenureMonths: null, purpose: parsePurpose(text) };

    const askedForMonths = lastAssistantMessage(context)?.includes('how many months') ?? false;
    const bare = text.match(BARE_NUMBER_PATTERN);
    if (askedForMonths && bare) {
      const months = Number.parseInt(bare[1], 10);
      fields.tenureMonths = months > 0 ? months : null;
      return fields;
    }

    const tenure = parseTenure(text);
    fields.tenureMonths = tenure?.months ?? null;
    fields.requestedAmount = parseAmount(tenure ? tenure.rest : text) ?? null;
    return fields;
  }
}
