/**
 * Environment
 *
 * Imported before anything that logs: the shared logger reads LOG_LEVEL
 * when it is first loaded.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

dotenvConfig();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  CUTLINE_CONFIG: z.string().min(1).default('./cutline.config.json'),
});

export const env = envSchema.parse(process.env);

// Keep job logs from interleaving with the spinner
if (env.LOG_LEVEL === undefined && env.NODE_ENV !== 'test') {
  process.env['LOG_LEVEL'] = 'warn';
}
