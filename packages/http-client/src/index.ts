/**
 * Small HTTP client for service-to-service calls.
 * Uses the global fetch of Node 20.
 */
export interface ServiceRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  body?: unknown;
  headers?: Record<string, string>;
  query?: Record<string, string | number | undefined>;
  timeout?: number;
}

export class ServiceRequestError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: unknown,
  ) {
    super(message);
    this.name = 'ServiceRequestError';
  }
}

function buildUrl(baseUrl: string, path: string, query?: ServiceRequestOptions['query']): string {
  const url = new URL(path, baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`);
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

function parseBody(text: string): unknown {
  if (text.length === 0) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export async function serviceRequest<T = unknown>(
  baseUrl: string,
  path: string,
  options: ServiceRequestOptions = {},
): Promise<T> {
  const { method = 'GET', body, headers = {}, query, timeout = 10_000 } = options;
  const url = buildUrl(baseUrl, path.replace(/^\//, ''), query);

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);

  try {
    const res = await fetch(url, {
      method,
      headers: {
        'Content-Type': 'application/json',
        ...headers,
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: controller.signal,
    });

    const parsed = parseBody(await res.text());
    if (!res.ok) {
      throw new ServiceRequestError(`Service ${url} responded ${res.status}`, res.status, parsed);
    }
    return parsed as T;
  } catch (error) {
    if (error instanceof ServiceRequestError) throw error;
    if (error instanceof Error && error.name === 'AbortError') {
      throw new ServiceRequestError(`Service ${url} timed out after ${timeout}ms`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ServiceRequestError(`Service ${url} unreachable: ${message}`);
  } finally {
    clearTimeout(timer);
  }
}
