import { z } from 'zod';
import type { ChatMessage } from '../domain/conversationState';
import { callCollaborator, type RemoteEndpoint } from './remote';
import type { ExtractedFields, FieldExtractor } from './types';

const positiveOrNull = z
  .number()
  .nullish()
  .transform((value) => (value !== null && value !== undefined && Number.isFinite(value) && value > 0 ? value : null));

const ExtractionResponseSchema = z.object({
  requestedAmount: positiveOrNull,
  tenureMonths: positiveOrNull.transform((value) => (value === null ? null : Math.round(value))),
  purpose: z
    .string()
    .nullish()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : null)),
});

export function formatContext(context: readonly ChatMessage[]): string {
  return context.map((message) => `${message.role}: ${message.content}`).join('\n');
}

export class HttpFieldExtractor implements FieldExtractor {
  constructor(private readonly endpoint: RemoteEndpoint) {}

  async extractFields(message: string, context: readonly ChatMessage[]): Promise<ExtractedFields> {
    return callCollaborator('FIELD_EXTRACTION', this.endpoint, '/v1/ai/extract-fields', {
      method: 'POST',
      body: { message, context: formatContext(context) },
    }, ExtractionResponseSchema);
  }
}
