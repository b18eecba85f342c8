import { createLogger } from '@lendwise/observability';

const SECRET_PATTERN = /SECRET|TOKEN|PASSWORD|API_KEY|PRIVATE/i;
const TRACKED_PATTERN = /^(NODE_ENV|PORT|LOG_LEVEL|ORIG_.+|.+_URL)$/;

let printed = false;

export function maskValue(key: string, value: string): string {
  if (!SECRET_PATTERN.test(key)) return value;
  if (value.length <= 4) return '****';
  return `${value.slice(0, 2)}****${value.slice(-2)}`;
}

/**
 * Logs a one-time summary of the critical environment variables.
 *
 * Enabled only when `ENV_DEBUG` is `true`, `1` or `yes`. Secrets are masked.
 *
 * @param serviceName  Name of the calling service (e.g. "origination-service").
 */
export function envDebug(serviceName: string, source: NodeJS.ProcessEnv = process.env): void {
  if (printed) return;
  const flag = (source.ENV_DEBUG ?? '').toLowerCase();
  if (!['true', '1', 'yes'].includes(flag)) return;
  printed = true;

  const summary: Record<string, string> = {};
  for (const key of Object.keys(source).sort()) {
    const value = source[key];
    if (value === undefined || !TRACKED_PATTERN.test(key)) continue;
    summary[key] = maskValue(key, value);
  }

  createLogger('env-debug').info({ service: serviceName, env: summary }, 'environment summary');
}
