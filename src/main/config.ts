// CLI configuration, validated before anything connects
import * as os from 'os';
import { z } from 'zod';

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_PORT = 21;
export const DEFAULT_TIMEOUT_SECONDS = 60;

// Sessions spend nearly all their time waiting on the network
export const defaultThreadCount = () => Math.min(32, os.availableParallelism() + 4);

export const crawlOptionsSchema = z.object({
  mode: z.enum(['host', 'file', 'nmap']).default('host'),
  port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  threads: z.coerce.number().int().positive().optional(),
  timeout: z.coerce.number().positive().default(DEFAULT_TIMEOUT_SECONDS),
  verbose: z.boolean().default(false),
  encode: z.boolean().default(false),
  input: z.string().min(1),
  output: z.string().min(1),
});

export type CrawlOptions = Omit<z.infer<typeof crawlOptionsSchema>, 'threads'> & { threads: number };

export const parseCrawlOptions = (raw: unknown): CrawlOptions => {
  const parsed = crawlOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
    );
  }
  return { ...parsed.data, threads: parsed.data.threads ?? defaultThreadCount() };
};
