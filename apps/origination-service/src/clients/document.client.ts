import { z } from 'zod';
import { callCollaborator, type RemoteEndpoint } from './remote';
import type { DocumentGenerator, GeneratedDocument, SanctionDocumentRequest } from './types';

const DocumentResponseSchema = z.object({
  documentId: z.string().default(''),
  success: z.boolean(),
  details: z.record(z.unknown()).optional(),
});

export class HttpDocumentGenerator implements DocumentGenerator {
  constructor(private readonly endpoint: RemoteEndpoint) {}

  async generateDocument(request: SanctionDocumentRequest): Promise<GeneratedDocument> {
    return callCollaborator('DOCUMENTS', this.endpoint, '/v1/documents/sanction-letters', {
      method: 'POST',
      body: request,
    }, DocumentResponseSchema);
  }
}
