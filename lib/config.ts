import os from 'os';
import { z } from 'zod';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36';

// calibre news downloads are titled "<Source> [Mon, 01 Jan 2024]"
export const DEFAULT_NEWSPAPER_TITLE_PATTERN =
  '\\[(?:mon|tue|wed|thu|fri|sat|sun)[a-z]*,? \\d{1,2} [a-z]{3,9},? \\d{4}\\]\\s*$|\\b(?:newspaper|gazette|periodical)\\b';

export const EngineConfigSchema = z
  .object({
    fetchTimeoutMs: z.number().int().min(1000).max(300_000).default(20_000),
    transferTimeoutMs: z.number().int().min(1000).max(900_000).default(60_000),
    maxFeedBytes: z.number().int().positive().default(10 * 1024 * 1024),
    maxBookBytes: z.number().int().positive().default(50 * 1024 * 1024),
    transientRetries: z.number().int().min(0).max(3).default(1),
    downloadConcurrency: z.number().int().min(1).max(3).default(1),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    newspaperTags: z.array(z.string().min(1)).default(['news', 'newspaper', 'newspapers', 'periodical', 'magazine']),
    newspaperTitlePattern: z
      .string()
      .refine(isValidPattern, { message: 'Not a valid regular expression' })
      .default(DEFAULT_NEWSPAPER_TITLE_PATTERN),
    stagingDir: z.string().min(1).default(os.tmpdir()),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}

const ENV_KEYS = {
  fetchTimeoutMs: 'OPDS_FETCH_TIMEOUT_MS',
  transferTimeoutMs: 'OPDS_TRANSFER_TIMEOUT_MS',
  maxFeedBytes: 'OPDS_MAX_FEED_BYTES',
  maxBookBytes: 'OPDS_MAX_BOOK_BYTES',
  transientRetries: 'OPDS_TRANSIENT_RETRIES',
  downloadConcurrency: 'OPDS_DOWNLOAD_CONCURRENCY',
} as const;

/**
 * Reads numeric OPDS_* variables from the environment
 */
function readEnv(env: NodeJS.ProcessEnv): EngineConfigInput {
  const fromEnv: Record<string, unknown> = {};

  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const raw = env[variable];
    if (raw === undefined || raw.trim() === '') continue;
    fromEnv[key] = Number(raw);
  }

  if (env.OPDS_USER_AGENT) fromEnv.userAgent = env.OPDS_USER_AGENT;
  if (env.OPDS_STAGING_DIR) fromEnv.stagingDir = env.OPDS_STAGING_DIR;
  if (env.OPDS_NEWSPAPER_TITLE_PATTERN) fromEnv.newspaperTitlePattern = env.OPDS_NEWSPAPER_TITLE_PATTERN;

  return EngineConfigSchema.partial().parse(fromEnv);
}

/**
 * Builds a validated config: defaults, then environment, then explicit overrides.
 * Throws a ZodError describing every invalid field.
 */
export function loadEngineConfig(overrides: EngineConfigInput = {}, env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return EngineConfigSchema.parse({ ...readEnv(env), ...overrides });
}

export function newspaperTitleRegExp(config: Pick<EngineConfig, 'newspaperTitlePattern'>): RegExp {
  return new RegExp(config.newspaperTitlePattern, 'i');
}
