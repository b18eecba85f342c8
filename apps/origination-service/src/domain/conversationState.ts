import { Decision, MessageRole, Stage, TerminalState } from '@lendwise/shared-kernel';
import type { CallLedger } from './safeguard';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface ConversationState extends CallLedger {
  conversationId: string;
  stage: Stage;

  customerId?: string;
  customerName?: string;
  phone?: string;
  panNumber?: string;

  requestedAmount?: number;
  tenureMonths?: number;
  purpose?: string;

  preapprovedLimit?: number;
  creditScore?: number;
  interestRate?: number;
  maxTenureMonths?: number;

  kycVerified: boolean;
  salary?: number;
  employer?: string;
  salarySlipReceived: boolean;

  emi?: number;
  decision?: Decision;
  rejectionReason?: string;
  suggestedAmount?: number;

  sanctionId?: string;
  sanctionDocumentAvailable?: boolean;
  terminalState?: TerminalState;

  messages: ChatMessage[];
  createdAt: number;
  updatedAt: number;
}

/** What a front end may see; call signatures stay internal. */
export interface ConversationStateView {
  conversationId: string;
  stage: Stage;
  customerId: string | null;
  customerName: string | null;
  requestedAmount: number | null;
  tenureMonths: number | null;
  purpose: string | null;
  preapprovedLimit: number | null;
  creditScore: number | null;
  interestRate: number | null;
  salary: number | null;
  employer: string | null;
  kycVerified: boolean;
  salarySlipReceived: boolean;
  emi: number | null;
  decision: Decision | null;
  rejectionReason: string | null;
  suggestedAmount: number | null;
  sanctionId: string | null;
  sanctionDocumentAvailable: boolean | null;
  terminalState: TerminalState | null;
  totalAgentCalls: number;
  lastAgentCalled: string | null;
  messageCount: number;
}

export type IdentityField = 'customerId' | 'customerName' | 'phone' | 'panNumber';
export type CreditField = 'preapprovedLimit' | 'creditScore' | 'interestRate' | 'maxTenureMonths';

export function createConversationState(conversationId: string, now = Date.now()): ConversationState {
  return {
    conversationId,
    stage: Stage.INTRO,
    kycVerified: false,
    salarySlipReceived: false,
    agentCallHistory: [],
    totalAgentCalls: 0,
    messages: [],
    createdAt: now,
    updatedAt: now,
  };
}

export function isTerminal(state: ConversationState): boolean {
  return state.terminalState !== undefined;
}

/** Identity is filled progressively and never retracted. */
export function fillIdentity(state: ConversationState, field: IdentityField, value: string | null | undefined): void {
  if (state[field] !== undefined || !value) return;
  state[field] = value;
}

/** Credit terms come from the first successful lookup and stay fixed. */
export function fillCreditTerm(state: ConversationState, field: CreditField, value: number | null | undefined): void {
  if (state[field] !== undefined || value === null || value === undefined) return;
  state[field] = value;
}

/**
 * Ends the conversation. The first outcome wins; a safeguard trip passes
 * `freezeStage` so the stage shows where the conversation halted.
 */
export function terminate(state: ConversationState, outcome: TerminalState, freezeStage = false): void {
  if (state.terminalState !== undefined) return;
  state.terminalState = outcome;
  if (!freezeStage) state.stage = Stage.END;
}

export function appendMessage(state: ConversationState, role: MessageRole, content: string): void {
  state.messages.push({ role, content });
}

export function toStateView(state: ConversationState): ConversationStateView {
  return {
    conversationId: state.conversationId,
    stage: state.stage,
    customerId: state.customerId ?? null,
    customerName: state.customerName ?? null,
    requestedAmount: state.requestedAmount ?? null,
    tenureMonths: state.tenureMonths ?? null,
    purpose: state.purpose ?? null,
    preapprovedLimit: state.preapprovedLimit ?? null,
    creditScore: state.creditScore ?? null,
    interestRate: state.interestRate ?? null,
    salary: state.salary ?? null,
    employer: state.employer ?? null,
    kycVerified: state.kycVerified,
    salarySlipReceived: state.salarySlipReceived,
    emi: state.emi ?? null,
    decision: state.decision ?? null,
    rejectionReason: state.rejectionReason ?? null,
    suggestedAmount: state.suggestedAmount ?? null,
    sanctionId: state.sanctionId ?? null,
    sanctionDocumentAvailable: state.sanctionDocumentAvailable ?? null,
    terminalState: state.terminalState ?? null,
    totalAgentCalls: state.totalAgentCalls,
    lastAgentCalled: state.lastAgentCalled ?? null,
    messageCount: state.messages.length,
  };
}
