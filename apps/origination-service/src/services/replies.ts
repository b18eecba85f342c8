import { Stage, TerminalState } from '@lendwise/shared-kernel';
import type { ConversationState } from '../domain/conversationState';
import { formatInr } from '../domain/emi';

export const GREETING_TEXT =
  "Hello! Welcome to Lendwise Personal Loans. I'm here to help you with a quick and easy loan today.\n\nMay I know your **mobile number** so I can check if you have a pre-approved offer waiting for you?";

export const ASK_PHONE_TEXT =
  "I didn't catch your mobile number. Could you please share your **10-digit mobile number**?";

export const NOT_REGISTERED_TEXT =
  "I'm sorry, but I couldn't find your profile in our system. You may need to register with us first. Thank you for your interest in Lendwise!";

export const LOW_SCORE_TEXT =
  "I'm sorry, but I wasn't able to find a pre-approved offer for you at this time. Our loan products require a minimum credit score. You may want to work on improving your credit score and try again in a few months. Thank you for your interest in Lendwise!";

export const NO_OFFER_TEXT =
  "I'm sorry, but there is no pre-approved loan offer on your profile right now. Please check back with us later. Thank you for your interest in Lendwise!";

export const OFFER_DECLINED_TEXT =
  'I understand. Thank you for considering Lendwise Personal Loans. If you change your mind, your pre-approved offer will be available for 30 days. Have a great day!';

export const EXTRACTION_REPEATED_TEXT =
  'I need to understand your loan requirement better. Could you please tell me:\n1. **How much** do you want to borrow? (in rupees)\n2. **How many months** would you like to repay it in?';

export const ASK_AMOUNT_TEXT = 'What **amount** would you like to borrow? Please specify in rupees.';

export const KYC_NOT_FOUND_TEXT =
  "I'm sorry, but we couldn't locate your customer record to complete the verification. Please contact customer support to update your details. Thank you!";

export const KYC_PENDING_TEXT =
  "I'm sorry, but your KYC verification is still pending, so we can't proceed with the loan yet. Please complete your KYC and try again. Thank you!";

export const DOCUMENT_MISSING_TEXT =
  'I still need your salary details to proceed. Please share your **monthly salary amount** or **upload your salary slip**. You can reply later when you have the document ready.';

export const BUDGET_EXHAUSTED_TEXT =
  'Maximum number of processing steps reached for this conversation. The conversation has ended; please start a new conversation to continue.';

export const CLOSING_TEXT =
  "This conversation has ended. If you'd like to start a new loan application, please start a new conversation. Thank you!";

export const CLOSING_SANCTIONED_TEXT =
  'Your loan has been sanctioned! Is there anything else I can help you with regarding your loan?';

const STAGE_ACTIVITY: Record<Stage, string> = {
  [Stage.INTRO]: 'starting your application',
  [Stage.NEED_DISCOVERY]: 'looking up your pre-approved offer',
  [Stage.OFFER_PRESENTATION]: 'reading your loan requirement',
  [Stage.KYC_VERIFICATION]: 'verifying your details',
  [Stage.UNDERWRITING]: 'assessing your application',
  [Stage.DOCUMENT_COLLECTION]: 'checking your income details',
  [Stage.SANCTION]: 'issuing your sanction letter',
  [Stage.REJECTION]: 'closing your application',
  [Stage.END]: 'closing your application',
};

export function offerText(name: string, limit: number, interestRate: number, maxTenureMonths: number): string {
  return [
    `Great news, **${name}**!`,
    `You have a **pre-approved personal loan offer** of up to **${formatInr(limit)}**!`,
    `**Your Offer Details:**\n- Maximum Amount: ${formatInr(limit)}\n- Interest Rate: ${interestRate}% per annum\n- Maximum Tenure: ${maxTenureMonths} months`,
    'How much would you like to borrow, and for how many months?',
  ].join('\n\n');
}

export function askTenureText(amount: number): string {
  return `Got it, ${formatInr(amount)}. For **how many months** would you like the loan?`;
}

export function tenureTooLongText(requested: number, maxTenureMonths: number): string {
  return `${requested} months is longer than your offer allows. The maximum tenure is **${maxTenureMonths} months**. For how many months would you like the loan?`;
}

export function processingText(amount: number, tenureMonths: number): string {
  return `Perfect! You want **${formatInr(amount)}** for **${tenureMonths} months**.\n\nLet me verify your details and process this request...`;
}

export function needIncomeText(amount: number): string {
  return `Almost there! Your requested amount of **${formatInr(amount)}** exceeds your pre-approved limit.\n\nTo process this, I need to verify your income. Could you please **upload your latest salary slip** or confirm your monthly salary?`;
}

export function documentDeclinedText(limit: number | undefined): string {
  const fallback = limit !== undefined
    ? `You can still apply for a loan within your pre-approved limit of ${formatInr(limit)}. `
    : '';
  return `I understand. Without income verification, I'm unable to process this loan amount. ${fallback}Thank you for your interest in Lendwise!`;
}

export function sanctionText(state: ConversationState): string {
  const reference = state.sanctionId
    ? `- Sanction ID: \`${state.sanctionId}\``
    : '- Sanction letter: will be shared with you separately';
  return [
    `**Congratulations, ${state.customerName ?? 'there'}!**`,
    'Your personal loan has been **APPROVED**!',
    [
      '**Loan Details:**',
      reference,
      `- Approved Amount: **${formatInr(state.requestedAmount ?? 0)}**`,
      `- Tenure: **${state.tenureMonths ?? 0} months**`,
      `- Interest Rate: **${state.interestRate ?? 0}% p.a.**`,
      `- Monthly EMI: **${formatInr(state.emi ?? 0)}**`,
    ].join('\n'),
    'The loan amount will be disbursed to your registered bank account within **24 hours**.',
    'Thank you for choosing **Lendwise Personal Loans**!',
  ].join('\n\n');
}

export function rejectionText(state: ConversationState): string {
  const reason = state.rejectionReason ?? 'your application did not meet our criteria';
  const suggestion = state.suggestedAmount !== undefined
    ? `\n- Apply for up to **${formatInr(state.suggestedAmount)}**, which fits your current income`
    : '';
  return [
    `I'm sorry${state.customerName ? `, ${state.customerName}` : ''}, we're unable to approve this loan at this time.`,
    `**Reason:** ${reason}`,
    `**What you can do:**${suggestion}\n- Try applying for a smaller amount within your pre-approved limit\n- Improve your credit score and reapply after 3-6 months\n- Contact our customer support for more options`,
    'Thank you for considering Lendwise Personal Loans.',
  ].join('\n\n');
}

export function repeatedCallText(stage: Stage): string {
  return `We could not make progress while ${STAGE_ACTIVITY[stage]}: the same request was already processed once with identical details. The conversation has ended; please start a new conversation to try again.`;
}

export function faultText(stage: Stage): string {
  return `I'm sorry, something went wrong while ${STAGE_ACTIVITY[stage]}. Your application has been closed; please start a new conversation to try again.`;
}

export function closingText(state: ConversationState): string {
  return state.terminalState === TerminalState.LOAN_SANCTIONED ? CLOSING_SANCTIONED_TEXT : CLOSING_TEXT;
}
