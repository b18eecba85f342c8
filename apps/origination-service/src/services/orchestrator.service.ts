import { createLogger, type Logger } from '@lendwise/observability';
import { Decision, MessageRole, Stage, TerminalState } from '@lendwise/shared-kernel';
import { v4 as uuidv4 } from 'uuid';
import { env, type Env } from '../config';
import { createCollaborators, type Collaborators, type SanctionDocumentRequest } from '../clients';
import {
  appendMessage,
  fillCreditTerm,
  fillIdentity,
  isTerminal,
  terminate,
  toStateView,
  type ConversationState,
  type ConversationStateView,
} from '../domain/conversationState';
import { decide, type EligibilityInput, type EligibilityPolicy } from '../domain/eligibility';
import { classifyIntent, DOCUMENT_DECLINE_KEYWORDS, OFFER_DECLINE_KEYWORDS } from '../domain/intent';
import { extractPhoneNumber, extractSalary, hasUploadSignal } from '../domain/parsers';
import {
  canInvoke,
  checkInvocation,
  hashInput,
  isBudgetExhausted,
  recordInvocation,
  recordUncountedInvocation,
} from '../domain/safeguard';
import { ConversationStore } from './conversationStore';
import {
  ASK_AMOUNT_TEXT,
  ASK_PHONE_TEXT,
  BUDGET_EXHAUSTED_TEXT,
  DOCUMENT_MISSING_TEXT,
  EXTRACTION_REPEATED_TEXT,
  GREETING_TEXT,
  KYC_NOT_FOUND_TEXT,
  KYC_PENDING_TEXT,
  LOW_SCORE_TEXT,
  NO_OFFER_TEXT,
  NOT_REGISTERED_TEXT,
  OFFER_DECLINED_TEXT,
  askTenureText,
  closingText,
  documentDeclinedText,
  faultText,
  needIncomeText,
  offerText,
  processingText,
  rejectionText,
  repeatedCallText,
  sanctionText,
  tenureTooLongText,
} from './replies';

// ─── Agents tracked by the safeguard ─────────────────────────────────────────

export const AGENTS = {
  EXTRACTOR: 'FIELD_EXTRACTOR',
  VERIFIER: 'KYC_VERIFIER',
  UNDERWRITER: 'ELIGIBILITY_ENGINE',
  SANCTION: 'SANCTION_DOCUMENT',
} as const;

export type AgentName = (typeof AGENTS)[keyof typeof AGENTS];

// ─── Settings ───────────────────────────────────────────────────────────────

export type AutoContinueFlags = Record<Stage, boolean>;

/** Stages that run in the same turn when the previous handler advanced into them. */
export const DEFAULT_AUTO_CONTINUE: AutoContinueFlags = {
  [Stage.INTRO]: false,
  [Stage.NEED_DISCOVERY]: true,
  [Stage.OFFER_PRESENTATION]: false,
  [Stage.KYC_VERIFICATION]: true,
  [Stage.UNDERWRITING]: true,
  [Stage.DOCUMENT_COLLECTION]: false,
  [Stage.SANCTION]: true,
  [Stage.REJECTION]: true,
  [Stage.END]: false,
};

export interface OrchestratorSettings {
  maxAgentCalls: number;
  /** Trailing messages handed to the field extractor. */
  contextWindow: number;
  policy: EligibilityPolicy;
  autoContinue: AutoContinueFlags;
}

export function settingsFromEnv(source: Env): OrchestratorSettings {
  return {
    maxAgentCalls: source.ORIG_MAX_AGENT_CALLS,
    contextWindow: source.ORIG_CONTEXT_WINDOW,
    policy: {
      minCreditScore: source.ORIG_MIN_CREDIT_SCORE,
      maxEmiToSalaryRatio: source.ORIG_MAX_EMI_SALARY_RATIO,
      stretchMultiplier: source.ORIG_STRETCH_MULTIPLIER,
      defaultTenureMonths: source.ORIG_DEFAULT_TENURE_MONTHS,
    },
    autoContinue: { ...DEFAULT_AUTO_CONTINUE },
  };
}

export interface OrchestratorDeps extends Collaborators {
  store: ConversationStore;
  settings: OrchestratorSettings;
  logger?: Logger;
}

export interface TurnResult {
  conversationId: string;
  replyText: string;
  state: ConversationStateView;
}

export interface Orchestrator {
  processMessage(conversationId: string, text: string): Promise<TurnResult>;
  startConversation(): ConversationStateView;
  getState(conversationId: string): ConversationStateView | undefined;
  resetConversation(conversationId: string): Promise<boolean>;
}

// ─── Stage plumbing ─────────────────────────────────────────────────────────

interface StageOutcome {
  reply?: string;
  /** The handler moved the stage on; the next one may run in this turn. */
  advance: boolean;
}

type StageHandler = (state: ConversationState, text: string) => Promise<StageOutcome>;

type Guard = { allowed: true } | { allowed: false; outcome: StageOutcome };

const yieldWith = (reply?: string): StageOutcome => ({ reply, advance: false });
const continueWith = (reply?: string): StageOutcome => ({ reply, advance: true });

const MAX_STAGE_HOPS = Object.keys(Stage).length;

export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { lookup, extractor, documents, store, settings } = deps;
  const log = deps.logger ?? createLogger('origination-orchestrator');

  function acquire(state: ConversationState, agent: AgentName, input: object): Guard {
    const inputHash = hashInput(input);
    const check = checkInvocation(state, agent, inputHash, settings.maxAgentCalls);
    if (check === 'allowed') {
      recordInvocation(state, agent, inputHash);
      return { allowed: true };
    }

    log.warn(
      {
        conversationId: state.conversationId,
        stage: state.stage,
        agent,
        check,
        totalAgentCalls: state.totalAgentCalls,
      },
      'Safeguard blocked agent call',
    );
    const stage = state.stage;
    terminate(state, TerminalState.CUSTOMER_DROPPED, true);
    return {
      allowed: false,
      outcome: yieldWith(check === 'budget_exhausted' ? BUDGET_EXHAUSTED_TEXT : repeatedCallText(stage)),
    };
  }

  // ─── Handlers ─────────────────────────────────────────────────────────────

  async function intro(state: ConversationState, text: string): Promise<StageOutcome> {
    state.stage = Stage.NEED_DISCOVERY;
    const phone = extractPhoneNumber(text);
    if (!phone) return yieldWith(GREETING_TEXT);

    fillIdentity(state, 'phone', phone);
    return continueWith();
  }

  async function needDiscovery(state: ConversationState, text: string): Promise<StageOutcome> {
    const phone = state.phone ?? extractPhoneNumber(text);
    if (!phone) return yieldWith(ASK_PHONE_TEXT);
    fillIdentity(state, 'phone', phone);

    const result = await lookup.lookup(phone);
    if (!result.found) {
      state.rejectionReason = result.notFoundReason;
      terminate(state, TerminalState.CUSTOMER_DROPPED);
      return yieldWith(NOT_REGISTERED_TEXT);
    }

    fillIdentity(state, 'customerId', result.profile.customerId);
    fillIdentity(state, 'customerName', result.profile.name);

    if (result.creditScore < settings.policy.minCreditScore) {
      state.rejectionReason = `Credit score (${result.creditScore}/900) is below the minimum requirement (${settings.policy.minCreditScore})`;
      terminate(state, TerminalState.LOAN_REJECTED);
      return yieldWith(LOW_SCORE_TEXT);
    }

    if (result.preapprovedLimit <= 0) {
      state.rejectionReason = 'No pre-approved offer available';
      terminate(state, TerminalState.LOAN_REJECTED);
      return yieldWith(NO_OFFER_TEXT);
    }

    fillCreditTerm(state, 'creditScore', result.creditScore);
    fillCreditTerm(state, 'preapprovedLimit', result.preapprovedLimit);
    fillCreditTerm(state, 'interestRate', result.interestRate);
    fillCreditTerm(state, 'maxTenureMonths', result.maxTenureMonths);

    state.stage = Stage.OFFER_PRESENTATION;
    return yieldWith(
      offerText(result.profile.name, result.preapprovedLimit, result.interestRate, result.maxTenureMonths),
    );
  }

  function promptForMissingTerms(state: ConversationState): StageOutcome | undefined {
    if (state.requestedAmount === undefined) return yieldWith(ASK_AMOUNT_TEXT);
    if (state.tenureMonths === undefined) return yieldWith(askTenureText(state.requestedAmount));

    if (state.maxTenureMonths !== undefined && state.tenureMonths > state.maxTenureMonths) {
      const requested = state.tenureMonths;
      state.tenureMonths = undefined;
      return yieldWith(tenureTooLongText(requested, state.maxTenureMonths));
    }
    return undefined;
  }

  async function offerPresentation(state: ConversationState, text: string): Promise<StageOutcome> {
    const intent = classifyIntent(text, OFFER_DECLINE_KEYWORDS);

    if (intent.kind === 'decline') {
      terminate(state, TerminalState.CUSTOMER_DROPPED);
      return yieldWith(OFFER_DECLINED_TEXT);
    }

    if (intent.kind === 'extractable') {
      const input = { message: intent.text };
      if (!canInvoke(state, AGENTS.EXTRACTOR, hashInput(input))) return yieldWith(EXTRACTION_REPEATED_TEXT);

      const guard = acquire(state, AGENTS.EXTRACTOR, input);
      if (!guard.allowed) return guard.outcome;

      const context = state.messages.slice(-settings.contextWindow);
      const fields = await extractor.extractFields(intent.text, context);

      if (fields.requestedAmount !== null && fields.requestedAmount > 0) state.requestedAmount = fields.requestedAmount;
      if (fields.tenureMonths !== null && fields.tenureMonths > 0) state.tenureMonths = Math.round(fields.tenureMonths);
      if (fields.purpose) state.purpose = fields.purpose;
    }

    const prompt = promptForMissingTerms(state);
    if (prompt) return prompt;

    state.stage = Stage.KYC_VERIFICATION;
    return continueWith(processingText(state.requestedAmount ?? 0, state.tenureMonths ?? 0));
  }

  async function kycVerification(state: ConversationState): Promise<StageOutcome> {
    const phone = state.phone ?? '';
    const guard = acquire(state, AGENTS.VERIFIER, { phone });
    if (!guard.allowed) return guard.outcome;

    const result = await lookup.lookup(phone);
    if (!result.found) {
      state.rejectionReason = result.notFoundReason;
      terminate(state, TerminalState.LOAN_REJECTED);
      return yieldWith(KYC_NOT_FOUND_TEXT);
    }

    if (!result.kycVerified) {
      state.rejectionReason = 'KYC verification pending';
      terminate(state, TerminalState.LOAN_REJECTED);
      return yieldWith(KYC_PENDING_TEXT);
    }

    state.kycVerified = true;
    fillIdentity(state, 'panNumber', result.profile.panNumber);
    if (result.salary !== undefined && state.salary === undefined) state.salary = result.salary;
    if (result.employer !== undefined && state.employer === undefined) state.employer = result.employer;

    state.stage = Stage.UNDERWRITING;
    return continueWith();
  }

  async function underwriting(state: ConversationState): Promise<StageOutcome> {
    const input: EligibilityInput = {
      requestedAmount: state.requestedAmount ?? 0,
      tenureMonths: state.tenureMonths ?? 0,
      preapprovedLimit: state.preapprovedLimit ?? 0,
      creditScore: state.creditScore ?? 0,
      interestRate: state.interestRate ?? 0,
      salary: state.salarySlipReceived ? (state.salary ?? null) : null,
    };

    const guard = acquire(state, AGENTS.UNDERWRITER, input);
    if (!guard.allowed) return guard.outcome;

    const result = decide(input, settings.policy);
    state.decision = result.decision;
    state.emi = result.emi ?? undefined;
    state.tenureMonths = result.tenureMonths;
    state.suggestedAmount = result.suggestedAmount;

    switch (result.decision) {
      case Decision.APPROVED:
        state.rejectionReason = undefined;
        state.stage = Stage.SANCTION;
        return continueWith();
      case Decision.NEED_SALARY_SLIP:
        state.stage = Stage.DOCUMENT_COLLECTION;
        return yieldWith(needIncomeText(input.requestedAmount));
      case Decision.REJECTED:
        state.rejectionReason = result.reason;
        state.stage = Stage.REJECTION;
        return continueWith();
    }
  }

  async function documentCollection(state: ConversationState, text: string): Promise<StageOutcome> {
    const intent = classifyIntent(text, DOCUMENT_DECLINE_KEYWORDS);

    if (intent.kind === 'decline') {
      terminate(state, TerminalState.CUSTOMER_DROPPED);
      return yieldWith(documentDeclinedText(state.preapprovedLimit));
    }

    if (intent.kind === 'extractable') {
      const salary = extractSalary(intent.text);
      if (salary !== undefined && salary > 0) {
        state.salary = salary;
        state.salarySlipReceived = true;
        state.stage = Stage.UNDERWRITING;
        return continueWith();
      }

      if (hasUploadSignal(intent.text) && state.phone) {
        const result = await lookup.lookup(state.phone);
        if (result.found && result.salary !== undefined && result.salary > 0) {
          state.salary = result.salary;
          state.salarySlipReceived = true;
          state.stage = Stage.UNDERWRITING;
          return continueWith();
        }
      }
    }

    terminate(state, TerminalState.ADDITIONAL_DOCUMENT_REQUIRED);
    return yieldWith(DOCUMENT_MISSING_TEXT);
  }

  async function sanction(state: ConversationState): Promise<StageOutcome> {
    const request: SanctionDocumentRequest = {
      customerName: state.customerName ?? 'Customer',
      customerId: state.customerId ?? 'N/A',
      approvedAmount: state.requestedAmount ?? 0,
      tenureMonths: state.tenureMonths ?? 0,
      interestRate: state.interestRate ?? 0,
      emi: state.emi ?? 0,
    };

    // An approved loan is always sanctioned, whatever budget is left.
    recordUncountedInvocation(state, AGENTS.SANCTION, hashInput(request));

    const document = await documents.generateDocument(request);
    if (document.success && document.documentId) {
      state.sanctionId = document.documentId;
      state.sanctionDocumentAvailable = true;
    } else {
      state.sanctionDocumentAvailable = false;
      log.warn(
        { conversationId: state.conversationId, customerId: request.customerId },
        'Sanction letter generation failed',
      );
    }

    terminate(state, TerminalState.LOAN_SANCTIONED);
    return yieldWith(sanctionText(state));
  }

  async function rejection(state: ConversationState): Promise<StageOutcome> {
    terminate(state, TerminalState.LOAN_REJECTED);
    return yieldWith(rejectionText(state));
  }

  async function end(state: ConversationState): Promise<StageOutcome> {
    return yieldWith(closingText(state));
  }

  const handlers: Record<Stage, StageHandler> = {
    [Stage.INTRO]: intro,
    [Stage.NEED_DISCOVERY]: needDiscovery,
    [Stage.OFFER_PRESENTATION]: offerPresentation,
    [Stage.KYC_VERIFICATION]: kycVerification,
    [Stage.UNDERWRITING]: underwriting,
    [Stage.DOCUMENT_COLLECTION]: documentCollection,
    [Stage.SANCTION]: sanction,
    [Stage.REJECTION]: rejection,
    [Stage.END]: end,
  };

  // ─── Turn loop ────────────────────────────────────────────────────────────

  async function runTurn(state: ConversationState, text: string): Promise<string> {
    const fragments: string[] = [];
    let stage = state.stage;

    try {
      for (let hop = 0; hop < MAX_STAGE_HOPS; hop += 1) {
        stage = state.stage;
        const outcome = await handlers[stage](state, text);
        if (outcome.reply) fragments.push(outcome.reply);
        if (isTerminal(state) || !outcome.advance || !settings.autoContinue[state.stage]) break;
      }
    } catch (error) {
      log.warn(
        {
          conversationId: state.conversationId,
          stage,
          error: error instanceof Error ? error.message : String(error),
        },
        'Collaborator failed, dropping conversation',
      );
      terminate(state, TerminalState.CUSTOMER_DROPPED);
      fragments.push(faultText(stage));
    }

    return fragments.join('\n\n');
  }

  return {
    async processMessage(conversationId, text) {
      return store.runExclusive(conversationId, async () => {
        const state = store.getOrCreate(conversationId);

        if (isTerminal(state)) {
          return { conversationId, replyText: closingText(state), state: toStateView(state) };
        }

        const stageBefore = state.stage;
        appendMessage(state, MessageRole.USER, text);

        let replyText: string;
        if (isBudgetExhausted(state, settings.maxAgentCalls)) {
          terminate(state, TerminalState.CUSTOMER_DROPPED, true);
          replyText = BUDGET_EXHAUSTED_TEXT;
        } else {
          replyText = await runTurn(state, text);
        }

        appendMessage(state, MessageRole.ASSISTANT, replyText);
        store.set(conversationId, state);

        log.info(
          {
            conversationId,
            stageBefore,
            stageAfter: state.stage,
            terminalState: state.terminalState ?? null,
            totalAgentCalls: state.totalAgentCalls,
          },
          'Turn processed',
        );

        return { conversationId, replyText, state: toStateView(state) };
      });
    },

    startConversation() {
      const conversationId = uuidv4();
      return toStateView(store.getOrCreate(conversationId));
    },

    getState(conversationId) {
      const state = store.get(conversationId);
      return state ? toStateView(state) : undefined;
    },

    async resetConversation(conversationId) {
      return store.runExclusive(conversationId, async () => store.clear(conversationId));
    },
  };
}

export const orchestratorService: Orchestrator = createOrchestrator({
  ...createCollaborators(env),
  store: new ConversationStore(env.ORIG_CONV_TTL_MIN * 60_000),
  settings: settingsFromEnv(env),
});
