import os from 'os';
import path from 'path';
import { z } from 'zod';

// Environment variable types and defaults.
export const EnvSchema = z.object({
  TERMJUDGE_HOME: z.string().min(1).default(path.join(os.homedir(), '.termjudge')),
  TERMJUDGE_API_URL: z.string().url().optional(),
  TERMJUDGE_TOKEN: z.string().min(1).optional(),
  TERMJUDGE_LOG_LEVEL: z.enum([
    'fatal',
    'error',
    'warn',
    'info',
    'debug',
    'trace',
    'silent'
  ]).default('warn')
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    console.error('Invalid environment:');
    console.error(JSON.stringify(result.error.flatten().fieldErrors, null, 2));
    process.exit(1);
  }

  return result.data;
}

const env = loadEnv();

export default env;
