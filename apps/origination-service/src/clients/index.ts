import type { Env } from '../config';
import { CustomerDirectory } from './customerDirectory';
import { HttpDocumentGenerator } from './document.client';
import { HttpFieldExtractor } from './extraction.client';
import { HeuristicFieldExtractor } from './heuristicExtractor';
import { HttpCustomerLookup } from './lookup.client';
import { LocalSanctionLetterGenerator } from './sanctionLetter';
import type { Collaborators } from './types';

type CollaboratorEnv = Pick<
  Env,
  | 'ORIG_COLLABORATOR_MODE'
  | 'ORIG_COLLABORATOR_TIMEOUT_MS'
  | 'ORIG_CUSTOMERS_FILE'
  | 'LOOKUP_SERVICE_URL'
  | 'EXTRACTION_SERVICE_URL'
  | 'DOCUMENT_SERVICE_URL'
>;

export function createCollaborators(env: CollaboratorEnv): Collaborators {
  if (env.ORIG_COLLABORATOR_MODE === 'remote') {
    const timeoutMs = env.ORIG_COLLABORATOR_TIMEOUT_MS;
    return {
      lookup: new HttpCustomerLookup({ baseUrl: env.LOOKUP_SERVICE_URL, timeoutMs }),
      extractor: new HttpFieldExtractor({ baseUrl: env.EXTRACTION_SERVICE_URL, timeoutMs }),
      documents: new HttpDocumentGenerator({ baseUrl: env.DOCUMENT_SERVICE_URL, timeoutMs }),
    };
  }

  return {
    lookup: CustomerDirectory.fromFile(env.ORIG_CUSTOMERS_FILE),
    extractor: new HeuristicFieldExtractor(),
    documents: new LocalSanctionLetterGenerator(),
  };
}

export * from './types';
export { CustomerDirectory, loadCustomerRecords, type CustomerRecord } from './customerDirectory';
export { HeuristicFieldExtractor } from './heuristicExtractor';
export { LocalSanctionLetterGenerator, generateSanctionId } from './sanctionLetter';
export { HttpCustomerLookup } from './lookup.client';
export { HttpFieldExtractor } from './extraction.client';
export { HttpDocumentGenerator } from './document.client';
