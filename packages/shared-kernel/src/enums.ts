// ─── Conversation stage ────────────────────────────
export enum Stage {
  INTRO = 'INTRO',
  NEED_DISCOVERY = 'NEED_DISCOVERY',
  OFFER_PRESENTATION = 'OFFER_PRESENTATION',
  KYC_VERIFICATION = 'KYC_VERIFICATION',
  UNDERWRITING = 'UNDERWRITING',
  DOCUMENT_COLLECTION = 'DOCUMENT_COLLECTION',
  SANCTION = 'SANCTION',
  REJECTION = 'REJECTION',
  END = 'END',
}

// ─── Underwriting decision ─────────────────────────
export enum Decision {
  APPROVED = 'APPROVED',
  REJECTED = 'REJECTED',
  NEED_SALARY_SLIP = 'NEED_SALARY_SLIP',
}

// ─── Conversation outcome ──────────────────────────
export enum TerminalState {
  LOAN_SANCTIONED = 'LOAN_SANCTIONED',
  LOAN_REJECTED = 'LOAN_REJECTED',
  ADDITIONAL_DOCUMENT_REQUIRED = 'ADDITIONAL_DOCUMENT_REQUIRED',
  CUSTOMER_DROPPED = 'CUSTOMER_DROPPED',
}

// ─── Message author ────────────────────────────────
export enum MessageRole {
  USER = 'user',
  ASSISTANT = 'assistant',
}
