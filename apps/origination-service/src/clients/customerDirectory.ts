import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { normalizePhone } from '../domain/parsers';
import type { CustomerLookup, LookupResult } from './types';

export const CustomerRecordSchema = z.object({
  customerId: z.string().min(1),
  fullName: z.string().min(1),
  phone: z.string().regex(/^\d{10}$/),
  email: z.string().email().optional(),
  city: z.string().optional(),
  panNumber: z.string().regex(/^[A-Z]{5}\d{4}[A-Z]$/).optional(),
  kycVerified: z.boolean(),
  employer: z.string().optional(),
  monthlySalary: z.number().positive().optional(),
  creditScore: z.number().int().min(300).max(900),
  preapprovedLimit: z.number().min(0),
  interestRate: z.number().min(0),
  maxTenureMonths: z.number().int().positive(),
});

export type CustomerRecord = z.infer<typeof CustomerRecordSchema>;

export const DEFAULT_CUSTOMERS_FILE = path.resolve(__dirname, '../../data/customers.json');

export function loadCustomerRecords(file: string = DEFAULT_CUSTOMERS_FILE): CustomerRecord[] {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
  return z.array(CustomerRecordSchema).parse(raw);
}

/**
 * In-process customer, KYC and offer directory.
 */
export class CustomerDirectory implements CustomerLookup {
  private readonly byPhone = new Map<string, CustomerRecord>();
  private readonly byId = new Map<string, CustomerRecord>();

  constructor(records: readonly CustomerRecord[]) {
    for (const record of records) {
      this.byPhone.set(record.phone, record);
      this.byId.set(record.customerId, record);
    }
  }

  static fromFile(file?: string): CustomerDirectory {
    return new CustomerDirectory(loadCustomerRecords(file));
  }

  async lookup(phoneOrId: string): Promise<LookupResult> {
    const record = this.byId.get(phoneOrId.trim()) ?? this.byPhone.get(normalizePhone(phoneOrId));
    if (!record) {
      return { found: false, notFoundReason: 'No customer record found for this phone number' };
    }

    return {
      found: true,
      profile: {
        customerId: record.customerId,
        name: record.fullName,
        phone: record.phone,
        email: record.email,
        panNumber: record.panNumber,
        city: record.city,
      },
      creditScore: record.creditScore,
      preapprovedLimit: record.preapprovedLimit,
      interestRate: record.interestRate,
      maxTenureMonths: record.maxTenureMonths,
      kycVerified: record.kycVerified,
      salary: record.monthlySalary,
      employer: record.employer,
    };
  }
}
