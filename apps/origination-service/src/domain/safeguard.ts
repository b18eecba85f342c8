import { createHash } from 'crypto';

/** Per-conversation call bookkeeping. Lives inside the conversation state. */
export interface CallLedger {
  agentCallHistory: string[];
  totalAgentCalls: number;
  lastAgentCalled?: string;
}

export type InvocationCheck = 'allowed' | 'budget_exhausted' | 'repeated_call';

function normalize(value: unknown): unknown {
  if (value === undefined) return null;
  if (Array.isArray(value)) return value.map(normalize);
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'object' && value !== null) {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries.map(([key, item]) => [key, normalize(item)]));
  }
  return value;
}

/** Key-order independent digest of a call's input map. */
export function hashInput(input: object): string {
  return createHash('sha256').update(JSON.stringify(normalize(input))).digest('hex').slice(0, 16);
}

function signature(name: string, inputHash: string): string {
  return `${name}:${inputHash}`;
}

export function canInvoke(ledger: CallLedger, name: string, inputHash: string): boolean {
  return !ledger.agentCallHistory.includes(signature(name, inputHash));
}

export function recordInvocation(ledger: CallLedger, name: string, inputHash: string): void {
  ledger.agentCallHistory.push(signature(name, inputHash));
  ledger.lastAgentCalled = name;
  ledger.totalAgentCalls += 1;
}

export function isBudgetExhausted(ledger: CallLedger, maxCalls: number): boolean {
  return ledger.totalAgentCalls >= maxCalls;
}

/**
 * Logs a call that the budget never blocks. The signature lands in the
 * history; `totalAgentCalls` stays put, so it never passes the maximum.
 */
export function recordUncountedInvocation(ledger: CallLedger, name: string, inputHash: string): void {
  ledger.agentCallHistory.push(signature(name, inputHash));
  ledger.lastAgentCalled = name;
}

/** Budget first, then signature. */
export function checkInvocation(
  ledger: CallLedger,
  name: string,
  inputHash: string,
  maxCalls: number,
): InvocationCheck {
  if (isBudgetExhausted(ledger, maxCalls)) return 'budget_exhausted';
  if (!canInvoke(ledger, name, inputHash)) return 'repeated_call';
  return 'allowed';
}
