import { Decision, Stage, TerminalState } from '@lendwise/shared-kernel';
import {
  CustomerDirectory,
  HeuristicFieldExtractor,
  type Collaborators,
  type GeneratedDocument,
  type LookupResult,
} from '../../clients';
import { DEFAULT_POLICY } from '../../domain/eligibility';
import { hashInput, recordInvocation } from '../../domain/safeguard';
import { ConversationStore } from '../conversationStore';
import {
  createOrchestrator,
  DEFAULT_AUTO_CONTINUE,
  type OrchestratorSettings,
} from '../orchestrator.service';
import {
  ASK_AMOUNT_TEXT,
  ASK_PHONE_TEXT,
  BUDGET_EXHAUSTED_TEXT,
  CLOSING_SANCTIONED_TEXT,
  CLOSING_TEXT,
  DOCUMENT_MISSING_TEXT,
  EXTRACTION_REPEATED_TEXT,
  GREETING_TEXT,
  KYC_NOT_FOUND_TEXT,
  KYC_PENDING_TEXT,
  LOW_SCORE_TEXT,
  NO_OFFER_TEXT,
  NOT_REGISTERED_TEXT,
  OFFER_DECLINED_TEXT,
  processingText,
  repeatedCallText,
} from '../replies';

const SANCTION_ID = 'SL-20260101120000-ABC123';

function setup(overrides: Partial<Collaborators> = {}, settings: Partial<OrchestratorSettings> = {}) {
  const documents = {
    generateDocument: jest.fn(async (): Promise<GeneratedDocument> => ({ documentId: SANCTION_ID, success: true })),
  };
  const store = new ConversationStore(60_000);
  const orchestrator = createOrchestrator({
    lookup: CustomerDirectory.fromFile(),
    extractor: new HeuristicFieldExtractor(),
    documents,
    ...overrides,
    store,
    settings: {
      maxAgentCalls: 6,
      contextWindow: 4,
      policy: DEFAULT_POLICY,
      autoContinue: { ...DEFAULT_AUTO_CONTINUE },
      ...settings,
    },
  });
  return { orchestrator, documents, store };
}

describe('orchestrator', () => {
  describe('happy path', () => {
    it('presents the offer as soon as the phone number arrives', async () => {
      const { orchestrator } = setup();
      const turn = await orchestrator.processMessage('c1', 'Hi, my number is 9000000001');

      expect(turn.replyText).toContain('Great news, **Asha Verma**!');
      expect(turn.replyText).toContain('How much would you like to borrow, and for how many months?');
      expect(turn.state).toMatchObject({
        stage: Stage.OFFER_PRESENTATION,
        customerId: 'CUST101',
        preapprovedLimit: 500000,
        creditScore: 780,
        interestRate: 12.5,
        totalAgentCalls: 0,
        terminalState: null,
      });
    });

    it('runs verification, underwriting and sanction in the same turn', async () => {
      const { orchestrator, documents } = setup();
      await orchestrator.processMessage('c1', 'Hi, my number is 9000000001');
      const turn = await orchestrator.processMessage('c1', 'I need 3 lakh for 36 months');

      expect(turn.replyText.startsWith(`${processingText(300000, 36)}\n\n`)).toBe(true);
      expect(turn.replyText).toContain(`Sanction ID: \`${SANCTION_ID}\``);
      expect(turn.state).toMatchObject({
        stage: Stage.END,
        terminalState: TerminalState.LOAN_SANCTIONED,
        decision: Decision.APPROVED,
        requestedAmount: 300000,
        tenureMonths: 36,
        kycVerified: true,
        sanctionId: SANCTION_ID,
        sanctionDocumentAvailable: true,
        totalAgentCalls: 3,
        lastAgentCalled: 'SANCTION_DOCUMENT',
      });
      expect(turn.state.emi).toBeCloseTo(10036.09, 2);

      expect(documents.generateDocument).toHaveBeenCalledTimes(1);
      expect(documents.generateDocument).toHaveBeenCalledWith(
        expect.objectContaining({
          customerName: 'Asha Verma',
          customerId: 'CUST101',
          approvedAmount: 300000,
          tenureMonths: 36,
          interestRate: 12.5,
        }),
      );
    });

    it('answers with a closing message once the loan is sanctioned', async () => {
      const { orchestrator } = setup();
      await orchestrator.processMessage('c1', '9000000001');
      await orchestrator.processMessage('c1', 'I need 3 lakh for 36 months');
      const turn = await orchestrator.processMessage('c1', 'thanks');

      expect(turn.replyText).toBe(CLOSING_SANCTIONED_TEXT);
      expect(turn.state.messageCount).toBe(4);
    });

    it('asks for the amount and tenure one at a time', async () => {
      const { orchestrator } = setup();
      await orchestrator.processMessage('c1', '9000000001');

      const amountTurn = await orchestrator.processMessage('c1', '3 lakh');
      expect(amountTurn.replyText).toBe('Got it, ₹3,00,000. For **how many months** would you like the loan?');

      const tenureTurn = await orchestrator.processMessage('c1', '36');
      expect(tenureTurn.state).toMatchObject({
        requestedAmount: 300000,
        tenureMonths: 36,
        terminalState: TerminalState.LOAN_SANCTIONED,
      });
    });

    it('re-asks when the tenure is longer than the offer allows', async () => {
      const { orchestrator } = setup();
      await orchestrator.processMessage('c1', '9000000001');

      const tooLong = await orchestrator.processMessage('c1', '3 lakh for 72 months');
      expect(tooLong.replyText).toBe(
        '72 months is longer than your offer allows. The maximum tenure is **60 months**. For how many months would you like the loan?',
      );
      expect(tooLong.state.tenureMonths).toBeNull();
      expect(tooLong.state.stage).toBe(Stage.OFFER_PRESENTATION);

      const retry = await orchestrator.processMessage('c1', '48');
      expect(retry.state.tenureMonths).toBe(48);
      expect(retry.state.terminalState).toBe(TerminalState.LOAN_SANCTIONED);
    });
  });

  describe('greeting', () => {
    it('asks for the phone number until one is given', async () => {
      const { orchestrator } = setup();

      const first = await orchestrator.processMessage('c1', 'Hello');
      expect(first.replyText).toBe(GREETING_TEXT);
      expect(first.state.stage).toBe(Stage.NEED_DISCOVERY);

      const second = await orchestrator.processMessage('c1', 'not sure');
      expect(second.replyText).toBe(ASK_PHONE_TEXT);

      const third = await orchestrator.processMessage('c1', '9000000001');
      expect(third.state.stage).toBe(Stage.OFFER_PRESENTATION);
    });
  });

  describe('pre-approval lookup', () => {
    it('rejects a low credit score before any underwriting', async () => {
      const { orchestrator } = setup();
      const turn = await orchestrator.processMessage('c1', 'My number is 9000000004');

      expect(turn.replyText).toBe(LOW_SCORE_TEXT);
      expect(turn.state).toMatchObject({
        stage: Stage.END,
        terminalState: TerminalState.LOAN_REJECTED,
        decision: null,
        emi: null,
        totalAgentCalls: 0,
      });
    });

    it('rejects a profile without an offer', async () => {
      const { orchestrator } = setup();
      const turn = await orchestrator.processMessage('c1', '9000000008');
      expect(turn.replyText).toBe(NO_OFFER_TEXT);
      expect(turn.state.terminalState).toBe(TerminalState.LOAN_REJECTED);
    });

    it('drops an unknown customer', async () => {
      const { orchestrator } = setup();
      const turn = await orchestrator.processMessage('c1', '9123456789');
      expect(turn.replyText).toBe(NOT_REGISTERED_TEXT);
      expect(turn.state.terminalState).toBe(TerminalState.CUSTOMER_DROPPED);
    });
  });

  describe('offer response', () => {
    it('ends the conversation when the customer declines', async () => {
      const { orchestrator } = setup();
      await orchestrator.processMessage('c1', '9000000001');
      const turn = await orchestrator.processMessage('c1', 'No thanks, not interested');

      expect(turn.replyText).toBe(OFFER_DECLINED_TEXT);
      expect(turn.state).toMatchObject({
        stage: Stage.END,
        terminalState: TerminalState.CUSTOMER_DROPPED,
        totalAgentCalls: 0,
      });

      const after = await orchestrator.processMessage('c1', 'hello?');
      expect(after.replyText).toBe(CLOSING_TEXT);
    });

    it('re-prompts instead of extracting the same message twice', async () => {
      const { orchestrator } = setup();
      await orchestrator.processMessage('c1', '9000000001');

      const first = await orchestrator.processMessage('c1', 'I want a personal loan');
      expect(first.replyText).toBe(ASK_AMOUNT_TEXT);

      const second = await orchestrator.processMessage('c1', 'I want a personal loan');
      expect(second.replyText).toBe(EXTRACTION_REPEATED_TEXT);
      expect(second.state.totalAgentCalls).toBe(1);
      expect(second.state.terminalState).toBeNull();
    });
  });

  describe('verification', () => {
    it('rejects with its own message when the record is gone at verification', async () => {
      const directory = CustomerDirectory.fromFile();
      let lookups = 0;
      const lookup = {
        async lookup(phoneOrId: string): Promise<LookupResult> {
          lookups += 1;
          return lookups === 1 ? directory.lookup(phoneOrId) : { found: false, notFoundReason: 'Record archived' };
        },
      };
      const { orchestrator } = setup({ lookup });
      await orchestrator.processMessage('c1', '9000000001');
      const turn = await orchestrator.processMessage('c1', '3 lakh for 36 months');

      expect(turn.replyText).toBe(`${processingText(300000, 36)}\n\n${KYC_NOT_FOUND_TEXT}`);
      expect(turn.replyText).not.toContain(KYC_PENDING_TEXT);
      expect(turn.state).toMatchObject({
        stage: Stage.END,
        terminalState: TerminalState.LOAN_REJECTED,
        rejectionReason: 'Record archived',
        kycVerified: false,
        decision: null,
      });
    });

    it('rejects a customer whose KYC is pending', async () => {
      const { orchestrator } = setup();
      await orchestrator.processMessage('c1', '9000000005');
      const turn = await orchestrator.processMessage('c1', '2 lakh for 24 months');

      expect(turn.replyText).toBe(`${processingText(200000, 24)}\n\n${KYC_PENDING_TEXT}`);
      expect(turn.state).toMatchObject({
        terminalState: TerminalState.LOAN_REJECTED,
        kycVerified: false,
        decision: null,
        totalAgentCalls: 2,
      });
    });
  });

  describe('income verification', () => {
    async function reachDocumentCollection() {
      const ctx = setup();
      await ctx.orchestrator.processMessage('c1', '9000000003');
      const turn = await ctx.orchestrator.processMessage('c1', '5 lakh for 24 months');
      return { ...ctx, turn };
    }

    it('asks for a salary slip in the stretch zone', async () => {
      const { turn } = await reachDocumentCollection();

      expect(turn.replyText).toContain('Could you please **upload your latest salary slip**');
      expect(turn.state).toMatchObject({
        stage: Stage.DOCUMENT_COLLECTION,
        decision: Decision.NEED_SALARY_SLIP,
        salarySlipReceived: false,
        terminalState: null,
        totalAgentCalls: 3,
      });
      expect(turn.state.emi).toBeCloseTo(23888.51, 2);
    });

    it('rejects with a suggested amount when the EMI is too high for the salary', async () => {
      const { orchestrator } = await reachDocumentCollection();
      const turn = await orchestrator.processMessage('c1', 'My salary is 40000');

      expect(turn.replyText).toContain('Apply for up to **₹4,18,611**');
      expect(turn.state).toMatchObject({
        stage: Stage.END,
        terminalState: TerminalState.LOAN_REJECTED,
        decision: Decision.REJECTED,
        suggestedAmount: 418611,
        salary: 40000,
        salarySlipReceived: true,
        totalAgentCalls: 4,
        rejectionReason: 'EMI (₹23,889) exceeds 50% of monthly salary (₹40,000). Maximum affordable loan is ₹4,18,611',
      });
    });

    it('falls back to the salary on file when the customer says it was uploaded', async () => {
      const { orchestrator } = await reachDocumentCollection();
      const turn = await orchestrator.processMessage('c1', 'I have uploaded my salary slip');

      expect(turn.state.salarySlipReceived).toBe(true);
      expect(turn.state.suggestedAmount).toBe(418611);
    });

    it('does not mistake the month of an uploaded slip for a salary', async () => {
      const { orchestrator } = await reachDocumentCollection();
      const turn = await orchestrator.processMessage('c1', 'I have uploaded my salary slip for March 2025');

      expect(turn.state.salary).toBe(40000);
      expect(turn.state.suggestedAmount).toBe(418611);
    });

    it('drops the customer who declines to share income', async () => {
      const { orchestrator } = await reachDocumentCollection();
      const turn = await orchestrator.processMessage('c1', "I don't have it");

      expect(turn.state.terminalState).toBe(TerminalState.CUSTOMER_DROPPED);
      expect(turn.replyText).toContain('pre-approved limit of ₹3,00,000');
    });

    it('parks the application when no salary can be read', async () => {
      const { orchestrator } = await reachDocumentCollection();
      const turn = await orchestrator.processMessage('c1', 'let me check');

      expect(turn.replyText).toBe(DOCUMENT_MISSING_TEXT);
      expect(turn.state.terminalState).toBe(TerminalState.ADDITIONAL_DOCUMENT_REQUIRED);
    });
  });

  describe('safeguard', () => {
    it('sanctions a loan approved by the last call the budget allows', async () => {
      const { orchestrator, documents } = setup({}, { maxAgentCalls: 6 });
      await orchestrator.processMessage('c1', '9000000003');
      await orchestrator.processMessage('c1', 'I want a personal loan');
      await orchestrator.processMessage('c1', '5 lakh');
      const collecting = await orchestrator.processMessage('c1', '12 months');
      expect(collecting.state).toMatchObject({ stage: Stage.DOCUMENT_COLLECTION, totalAgentCalls: 5 });

      const turn = await orchestrator.processMessage('c1', 'my salary is 1 lakh');

      expect(turn.state).toMatchObject({
        stage: Stage.END,
        decision: Decision.APPROVED,
        terminalState: TerminalState.LOAN_SANCTIONED,
        sanctionId: SANCTION_ID,
        totalAgentCalls: 6,
        lastAgentCalled: 'SANCTION_DOCUMENT',
      });
      expect(turn.state.emi).toBeCloseTo(44776.01, 2);
      expect(documents.generateDocument).toHaveBeenCalledTimes(1);
    });

    it('stops on a call already made with the same input and keeps the stage', async () => {
      const { orchestrator, store } = setup();
      await orchestrator.processMessage('c1', '9000000001');
      recordInvocation(store.getOrCreate('c1'), 'KYC_VERIFIER', hashInput({ phone: '9000000001' }));

      const turn = await orchestrator.processMessage('c1', 'I need 3 lakh for 36 months');

      expect(turn.replyText).toBe(`${processingText(300000, 36)}\n\n${repeatedCallText(Stage.KYC_VERIFICATION)}`);
      expect(turn.state).toMatchObject({
        stage: Stage.KYC_VERIFICATION,
        terminalState: TerminalState.CUSTOMER_DROPPED,
        kycVerified: false,
        totalAgentCalls: 2,
      });
    });

    it('closes the conversation once the call budget is spent', async () => {
      const { orchestrator } = setup({}, { maxAgentCalls: 2 });
      await orchestrator.processMessage('c1', '9000000001');
      await orchestrator.processMessage('c1', 'I want a personal loan');
      await orchestrator.processMessage('c1', 'something reasonable');

      const exhausted = await orchestrator.processMessage('c1', 'anything works');
      expect(exhausted.replyText).toBe(BUDGET_EXHAUSTED_TEXT);
      expect(exhausted.state).toMatchObject({
        stage: Stage.OFFER_PRESENTATION,
        terminalState: TerminalState.CUSTOMER_DROPPED,
        totalAgentCalls: 2,
        messageCount: 8,
      });

      const after = await orchestrator.processMessage('c1', 'hello?');
      expect(after.replyText).toBe(CLOSING_TEXT);
      expect(after.state.messageCount).toBe(8);
    });

    it('stops mid-turn when the budget runs out and keeps the stage', async () => {
      const { orchestrator } = setup({}, { maxAgentCalls: 2 });
      await orchestrator.processMessage('c1', '9000000001');
      const turn = await orchestrator.processMessage('c1', 'I need 3 lakh for 36 months');

      expect(turn.replyText).toBe(`${processingText(300000, 36)}\n\n${BUDGET_EXHAUSTED_TEXT}`);
      expect(turn.state).toMatchObject({
        stage: Stage.UNDERWRITING,
        terminalState: TerminalState.CUSTOMER_DROPPED,
        kycVerified: true,
        decision: null,
      });
    });
  });

  describe('collaborator failures', () => {
    it('drops the conversation when a collaborator throws', async () => {
      const extractor = {
        extractFields: jest.fn(async () => {
          throw new Error('upstream down');
        }),
      };
      const { orchestrator } = setup({ extractor });
      await orchestrator.processMessage('c1', '9000000001');
      const turn = await orchestrator.processMessage('c1', '3 lakh for 36 months');

      expect(turn.replyText).toBe(
        "I'm sorry, something went wrong while reading your loan requirement. Your application has been closed; please start a new conversation to try again.",
      );
      expect(turn.state).toMatchObject({
        stage: Stage.END,
        terminalState: TerminalState.CUSTOMER_DROPPED,
        totalAgentCalls: 1,
      });
    });

    it('still sanctions the loan when the letter cannot be generated', async () => {
      const documents = {
        generateDocument: jest.fn(async (): Promise<GeneratedDocument> => ({ documentId: '', success: false })),
      };
      const { orchestrator } = setup({ documents });
      await orchestrator.processMessage('c1', '9000000001');
      const turn = await orchestrator.processMessage('c1', '3 lakh for 36 months');

      expect(turn.state).toMatchObject({
        terminalState: TerminalState.LOAN_SANCTIONED,
        sanctionId: null,
        sanctionDocumentAvailable: false,
      });
      expect(turn.replyText).toContain('- Sanction letter: will be shared with you separately');
    });
  });

  describe('turn control', () => {
    it('waits for the next message when a stage is not set to continue', async () => {
      const { orchestrator } = setup({}, {
        autoContinue: { ...DEFAULT_AUTO_CONTINUE, [Stage.KYC_VERIFICATION]: false },
      });
      await orchestrator.processMessage('c1', '9000000001');

      const paused = await orchestrator.processMessage('c1', '3 lakh for 36 months');
      expect(paused.replyText).toBe(processingText(300000, 36));
      expect(paused.state.stage).toBe(Stage.KYC_VERIFICATION);
      expect(paused.state.totalAgentCalls).toBe(1);

      const resumed = await orchestrator.processMessage('c1', 'ok');
      expect(resumed.state.terminalState).toBe(TerminalState.LOAN_SANCTIONED);
      expect(resumed.replyText).toContain('Your personal loan has been **APPROVED**!');
    });

    it('serialises concurrent messages on one conversation', async () => {
      const { orchestrator } = setup();
      const [first, second] = await Promise.all([
        orchestrator.processMessage('c1', 'Hello'),
        orchestrator.processMessage('c1', '9000000001'),
      ]);

      expect(first.replyText).toBe(GREETING_TEXT);
      expect(second.state.stage).toBe(Stage.OFFER_PRESENTATION);
      expect(second.state.messageCount).toBe(4);
    });

    it('starts, reads and resets conversations', async () => {
      const { orchestrator } = setup();
      const started = orchestrator.startConversation();

      expect(started.stage).toBe(Stage.INTRO);
      expect(started.messageCount).toBe(0);
      expect(orchestrator.getState(started.conversationId)).toEqual(started);
      await expect(orchestrator.resetConversation(started.conversationId)).resolves.toBe(true);
      expect(orchestrator.getState(started.conversationId)).toBeUndefined();
    });

    it('applies a reset only after the turn in flight', async () => {
      const { orchestrator } = setup();
      const turn = orchestrator.processMessage('c1', '9000000001');
      const cleared = orchestrator.resetConversation('c1');

      await expect(turn).resolves.toMatchObject({ state: { stage: Stage.OFFER_PRESENTATION } });
      await expect(cleared).resolves.toBe(true);
      expect(orchestrator.getState('c1')).toBeUndefined();
    });
  });
});
