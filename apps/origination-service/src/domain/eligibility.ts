import { Decision } from '@lendwise/shared-kernel';
import { calculateEmi, formatInr, maxPrincipalForEmi } from './emi';

export interface EligibilityPolicy {
  minCreditScore: number;
  maxEmiToSalaryRatio: number;
  /** Multiple of the pre-approved limit above which a request is never approved. */
  stretchMultiplier: number;
  defaultTenureMonths: number;
}

export const DEFAULT_POLICY: EligibilityPolicy = {
  minCreditScore: 700,
  maxEmiToSalaryRatio: 0.5,
  stretchMultiplier: 2,
  defaultTenureMonths: 12,
};

export interface EligibilityInput {
  requestedAmount: number;
  tenureMonths: number;
  preapprovedLimit: number;
  creditScore: number;
  interestRate: number;
  salary?: number | null;
}

export interface EligibilityResult {
  decision: Decision;
  emi: number | null;
  reason: string;
  tenureMonths: number;
  approvedAmount?: number;
  suggestedAmount?: number;
  maxEligibleAmount?: number;
}

/**
 * Underwriting rules, evaluated in order:
 * credit-score floor, within-limit approval, income check in the stretch zone
 * (limit < amount <= limit x multiplier), hard ceiling above it.
 */
export function decide(input: EligibilityInput, policy: EligibilityPolicy = DEFAULT_POLICY): EligibilityResult {
  const { requestedAmount, preapprovedLimit, creditScore, interestRate } = input;
  const tenureMonths =
    Number.isFinite(input.tenureMonths) && input.tenureMonths > 0
      ? Math.round(input.tenureMonths)
      : policy.defaultTenureMonths;

  if (!Number.isFinite(requestedAmount) || requestedAmount <= 0) {
    return { decision: Decision.REJECTED, emi: null, reason: 'Invalid amount requested', tenureMonths };
  }

  if (creditScore < policy.minCreditScore) {
    return {
      decision: Decision.REJECTED,
      emi: null,
      reason: `Credit score (${creditScore}/900) is below the minimum requirement (${policy.minCreditScore})`,
      tenureMonths,
    };
  }

  const emi = calculateEmi(requestedAmount, interestRate, tenureMonths);

  if (requestedAmount <= preapprovedLimit) {
    return {
      decision: Decision.APPROVED,
      emi,
      reason: `Approved within the pre-approved limit of ${formatInr(preapprovedLimit)}. Credit score: ${creditScore}/900`,
      tenureMonths,
      approvedAmount: requestedAmount,
    };
  }

  const ceiling = preapprovedLimit * policy.stretchMultiplier;

  if (requestedAmount > ceiling) {
    return {
      decision: Decision.REJECTED,
      emi,
      reason: `Requested amount (${formatInr(requestedAmount)}) exceeds the maximum eligible limit (${formatInr(ceiling)})`,
      tenureMonths,
      maxEligibleAmount: ceiling,
    };
  }

  const salary = input.salary ?? undefined;
  if (salary === undefined || salary <= 0) {
    return {
      decision: Decision.NEED_SALARY_SLIP,
      emi,
      reason: `Requested amount (${formatInr(requestedAmount)}) exceeds the pre-approved limit (${formatInr(preapprovedLimit)}). Income verification required`,
      tenureMonths,
    };
  }

  const maxEmiAllowed = salary * policy.maxEmiToSalaryRatio;
  const share = ((emi / salary) * 100).toFixed(1);

  if (emi <= maxEmiAllowed) {
    return {
      decision: Decision.APPROVED,
      emi,
      reason: `Approved after income verification. Monthly salary: ${formatInr(salary)}, EMI: ${formatInr(emi)} (${share}% of salary)`,
      tenureMonths,
      approvedAmount: requestedAmount,
    };
  }

  const suggestedAmount = maxPrincipalForEmi(maxEmiAllowed, interestRate, tenureMonths);
  const ratioPercent = Math.round(policy.maxEmiToSalaryRatio * 100);
  return {
    decision: Decision.REJECTED,
    emi,
    reason: `EMI (${formatInr(emi)}) exceeds ${ratioPercent}% of monthly salary (${formatInr(salary)}). Maximum affordable loan is ${formatInr(suggestedAmount)}`,
    tenureMonths,
    suggestedAmount,
  };
}
