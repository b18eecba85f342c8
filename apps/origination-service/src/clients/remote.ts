import { serviceRequest, type ServiceRequestOptions } from '@lendwise/http-client';
import { AppError, BadGatewayResponseError, ServiceUnavailableError } from '@lendwise/shared-kernel';
import type { z } from 'zod';

export interface RemoteEndpoint {
  baseUrl: string;
  timeoutMs: number;
}

function unwrapEnvelope(service: string, raw: unknown): unknown {
  if (typeof raw !== 'object' || raw === null || !('data' in raw)) return raw;

  const envelope: { data?: unknown; error?: unknown } = raw;
  const { error } = envelope;
  if (typeof error === 'object' && error !== null) {
    const message = 'message' in error && typeof error.message === 'string'
      ? error.message
      : 'collaborator reported an error';
    throw new AppError(502, `${service}_ERROR`, message, error);
  }
  return envelope.data;
}

/**
 * Calls a collaborator and validates its payload. Accepts both the
 * `{ data, error }` envelope and a bare JSON body.
 */
export async function callCollaborator<S extends z.ZodTypeAny>(
  service: string,
  endpoint: RemoteEndpoint,
  path: string,
  request: Omit<ServiceRequestOptions, 'timeout'>,
  schema: S,
): Promise<z.infer<S>> {
  let raw: unknown;
  try {
    raw = await serviceRequest<unknown>(endpoint.baseUrl, path, { ...request, timeout: endpoint.timeoutMs });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ServiceUnavailableError(service, reason);
  }

  const parsed = schema.safeParse(unwrapEnvelope(service, raw));
  if (!parsed.success) {
    throw new BadGatewayResponseError(service, parsed.error.flatten());
  }
  return parsed.data;
}
