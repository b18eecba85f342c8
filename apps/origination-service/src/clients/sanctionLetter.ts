import { v4 as uuidv4 } from 'uuid';
import { roundTo2 } from '../domain/emi';
import type { DocumentGenerator, GeneratedDocument, SanctionDocumentRequest } from './types';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function compactTimestamp(date: Date): string {
  return [
    date.getFullYear(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join('');
}

export function generateSanctionId(now: Date = new Date(), suffix: string = uuidv4()): string {
  const code = suffix.replace(/-/g, '').slice(0, 6).toUpperCase();
  return `SL-${compactTimestamp(now)}-${code}`;
}

/** Issues sanction ids locally; rendering the letter itself is another service's job. */
export class LocalSanctionLetterGenerator implements DocumentGenerator {
  constructor(private readonly clock: () => Date = () => new Date()) {}

  async generateDocument(request: SanctionDocumentRequest): Promise<GeneratedDocument> {
    const issuedAt = this.clock();
    return {
      documentId: generateSanctionId(issuedAt),
      success: true,
      details: {
        ...request,
        totalRepayment: roundTo2(request.emi * request.tenureMonths),
        sanctionDate: issuedAt.toISOString(),
      },
    };
  }
}
