export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

function monthlyRate(annualRatePercent: number): number {
  return annualRatePercent / 12 / 100;
}

/**
 * Reducing-balance annuity instalment, rounded to paise.
 * A zero rate degrades to straight-line repayment.
 */
export function calculateEmi(principal: number, annualRatePercent: number, tenureMonths: number): number {
  const r = monthlyRate(annualRatePercent);
  if (r === 0) return roundTo2(principal / tenureMonths);

  const growth = Math.pow(1 + r, tenureMonths);
  return roundTo2((principal * r * growth) / (growth - 1));
}

/** Largest principal whose instalment does not exceed `maxEmi`, to the nearest rupee. */
export function maxPrincipalForEmi(maxEmi: number, annualRatePercent: number, tenureMonths: number): number {
  const r = monthlyRate(annualRatePercent);
  if (r === 0) return maxEmi * tenureMonths;

  const growth = Math.pow(1 + r, tenureMonths);
  return Math.round((maxEmi * (growth - 1)) / (r * growth));
}

export function formatInr(amount: number): string {
  return `₹${Math.round(amount).toLocaleString('en-IN')}`;
}
