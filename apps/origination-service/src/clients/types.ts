import type { ChatMessage } from '../domain/conversationState';

export interface CustomerProfile {
  customerId: string;
  name: string;
  phone: string;
  email?: string;
  panNumber?: string;
  city?: string;
}

export type LookupResult =
  | { found: false; notFoundReason: string }
  | {
      found: true;
      profile: CustomerProfile;
      creditScore: number;
      preapprovedLimit: number;
      interestRate: number;
      maxTenureMonths: number;
      kycVerified: boolean;
      salary?: number;
      employer?: string;
    };

export interface CustomerLookup {
  lookup(phoneOrId: string): Promise<LookupResult>;
}

export interface ExtractedFields {
  requestedAmount: number | null;
  tenureMonths: number | null;
  purpose: string | null;
}

export interface FieldExtractor {
  extractFields(message: string, context: readonly ChatMessage[]): Promise<ExtractedFields>;
}

export interface SanctionDocumentRequest {
  customerName: string;
  customerId: string;
  approvedAmount: number;
  tenureMonths: number;
  interestRate: number;
  emi: number;
}

export interface GeneratedDocument {
  documentId: string;
  success: boolean;
  details?: Record<string, unknown>;
}

export interface DocumentGenerator {
  generateDocument(request: SanctionDocumentRequest): Promise<GeneratedDocument>;
}

export interface Collaborators {
  lookup: CustomerLookup;
  extractor: FieldExtractor;
  documents: DocumentGenerator;
}
