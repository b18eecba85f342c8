import { z } from 'zod';
import { callCollaborator, type RemoteEndpoint } from './remote';
import type { CustomerLookup, LookupResult } from './types';

const optionalString = z.string().nullish().transform((value) => value ?? undefined);
const optionalNumber = z.number().nullish().transform((value) => value ?? undefined);

const LookupResponseSchema = z.discriminatedUnion('found', [
  z.object({
    found: z.literal(false),
    notFoundReason: z.string().default('No customer record found'),
  }),
  z.object({
    found: z.literal(true),
    profile: z.object({
      customerId: z.string().min(1),
      name: z.string().min(1),
      phone: z.string().min(1),
      email: optionalString,
      panNumber: optionalString,
      city: optionalString,
    }),
    creditScore: z.number().int(),
    preapprovedLimit: z.number().min(0),
    interestRate: z.number().min(0),
    maxTenureMonths: z.number().int().positive(),
    kycVerified: z.boolean(),
    salary: optionalNumber,
    employer: optionalString,
  }),
]);

export class HttpCustomerLookup implements CustomerLookup {
  constructor(private readonly endpoint: RemoteEndpoint) {}

  async lookup(phoneOrId: string): Promise<LookupResult> {
    return callCollaborator('CUSTOMER_LOOKUP', this.endpoint, '/v1/customers/lookup', {
      method: 'GET',
      query: { q: phoneOrId },
    }, LookupResponseSchema);
  }
}
