import { config } from 'dotenv';
import { z } from 'zod';
import path from 'path';
import { existsSync, readFileSync } from 'fs';

function declaresWorkspaces(dir: string): boolean {
  const manifest = path.join(dir, 'package.json');
  if (!existsSync(manifest)) return false;
  try {
    const parsed: unknown = JSON.parse(readFileSync(manifest, 'utf8'));
    return typeof parsed === 'object' && parsed !== null && 'workspaces' in parsed;
  } catch {
    return false;
  }
}

// Walks up from cwd until the package.json that declares the npm workspaces
export function findMonorepoRoot(startDir: string): string {
  let dir = startDir;
  while (dir !== path.dirname(dir)) {
    if (declaresWorkspaces(dir)) return dir;
    dir = path.dirname(dir);
  }
  return startDir;
}

const monorepoRoot = findMonorepoRoot(process.cwd());

// 1. service-local .env wins
config();
// 2. monorepo root .env supplies the defaults
config({ path: path.resolve(monorepoRoot, '.env') });

/**
 * Validates environment variables against a zod schema.
 * Throws one readable error listing every invalid variable.
 */
export function validateEnv<T extends z.ZodRawShape>(
  schema: z.ZodObject<T>,
  source: NodeJS.ProcessEnv = process.env,
): z.infer<z.ZodObject<T>> {
  const result = schema.safeParse(source);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Invalid environment variables:\n${formatted}`);
  }
  return result.data;
}

export const BoolFromString = z.preprocess((value) => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return ['true', '1', 'yes', 'on'].includes(value.toLowerCase());
  return false;
}, z.boolean());

/** Base schema shared by every service */
export const BaseEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  ENV_DEBUG: BoolFromString.default(false),
});

export { envDebug, maskValue } from './env-debug';
