const UPLOAD_SIGNALS = ['uploaded', 'attached', 'salary slip', 'payslip', 'pay slip'];

function stripDigitGrouping(text: string): string {
  return text.replace(/(\d),(?=\d)/g, '$1');
}

/** 10 contiguous digits once `+91`, dashes and spaces are removed. */
export function extractPhoneNumber(text: string): string | undefined {
  const cleaned = text.replace(/\+91/g, '').replace(/[-\s]/g, '');
  const match = cleaned.match(/\d{10}/);
  return match ? match[0] : undefined;
}

export function normalizePhone(phone: string): string {
  let digits = phone.trim().replace(/[\s-]/g, '');
  if (digits.startsWith('+91')) digits = digits.slice(3);
  if (digits.startsWith('91') && digits.length === 12) digits = digits.slice(2);
  return digits;
}

/**
 * Monthly salary from free text: "1.2 lakh", "45k", "Rs. 40,000".
 * A four-digit figure counts only after a currency marker, so "March 2025"
 * is not a salary.
 */
export function extractSalary(text: string): number | undefined {
  const lowered = stripDigitGrouping(text.toLowerCase());

  const lakh = lowered.match(/(\d+(?:\.\d+)?)\s*(?:lakhs?|lacs?|l)\b/);
  if (lakh) return Number.parseFloat(lakh[1]) * 100_000;

  const thousands = lowered.match(/(\d+(?:\.\d+)?)\s*k\b/);
  if (thousands) return Number.parseFloat(thousands[1]) * 1_000;

  const marked = lowered.match(/(?:(?<![a-z])rs\.?|₹|(?<![a-z])inr)\s*(\d{4,7})(?!\d)/);
  if (marked) return Number.parseFloat(marked[1]);

  const plain = lowered.match(/(?<!\d)(\d{5,7})(?!\d)/);
  if (plain) return Number.parseFloat(plain[1]);

  return undefined;
}

export function hasUploadSignal(text: string): boolean {
  const lowered = text.toLowerCase();
  return UPLOAD_SIGNALS.some((signal) => lowered.includes(signal));
}
