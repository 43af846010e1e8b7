import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const rootPath = path.join(__dirname, '..');

// Helper for integers read from the environment
const int = (defaultValue: string, min = 0) =>
  z.string()
   .default(defaultValue)
   .transform(Number)
   .pipe(z.number().int().min(min));

// Helper for seconds -> milliseconds
const seconds = (defaultValue: string) =>
  z.string()
   .default(defaultValue)
   .transform(Number)
   .pipe(z.number().positive())
   .transform(val => Math.round(val * 1000));

// Helper for Boolean
const bool = (defaultValue: 'true' | 'false') =>
  z.enum(['true', 'false'])
   .default(defaultValue)
   .transform(val => val === 'true');

// Helper for "min-max" millisecond ranges
const range = (defaultValue: string) =>
  z.string()
   .default(defaultValue)
   .transform((val, ctx) => {
     const match = /^\s*(\d+)\s*-\s*(\d+)\s*$/.exec(val);
     if (!match || Number(match[1]) > Number(match[2])) {
       ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected "min-max", got "${val}"` });
       return z.NEVER;
     }
     return { minMs: Number(match[1]), maxMs: Number(match[2]) };
   });

const optionalString = z.string().optional().transform(val => (val && val.trim() ? val.trim() : undefined));

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36';

// Configuration Schema
const configSchema = z.object({
  // Upstream API
  upstream: z.object({
    baseUrl: z.string().url().default('https://api.example.com'),
    resolvePath: z.string().default('/items/resolve?ref={ref}'),
    viewPath: z.string().default('/items/view?ref={ref}'),
    rootPath: z.string().default('/items/{handle}/comments?page={page}&size={size}'),
    replyPath: z.string().default('/items/{handle}/comments/{root}/replies?page={page}&size={size}'),
    searchPath: z.string().default('/search?q={query}&limit={limit}'),
    userAgent: z.string().default(DEFAULT_USER_AGENT).transform(val => val || DEFAULT_USER_AGENT),
  }),

  // Comment harvesting
  harvest: z.object({
    maxConcurrentRequests: int('5', 1),
    requestTimeoutMs: seconds('10'),
    maxRetries: int('3', 1),
    baseDelayMs: seconds('1'),
    rootPageSize: int('20', 1),
    replyPageSize: int('10', 1),
    rootCap: int('50', 1),
    maxRepliesPerRoot: int('10', 1),
    minLength: int('5'),
    rootJitter: range('300-1000'),
    replyJitter: range('200-600'),
  }),

  // Pipeline
  pipeline: z.object({
    discoveryLimit: int('5', 1),
    deadlineMs: seconds('120'),
  }),

  // Summarizer (optional)
  llm: z.object({
    apiKey: optionalString,
    baseUrl: optionalString,
    model: z.string().default('gpt-4o-mini'),
  }),

  // Server
  port: int('3000'),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  logToFile: bool('true'),

  // Paths
  paths: z.object({
    root: z.string().default(rootPath),
    logs: z.string().default(path.join(rootPath, 'logs')),
    cookies: z.string().default(path.join(rootPath, 'cookies', 'upstream.json'))
      .transform(val => (path.isAbsolute(val) ? val : path.join(rootPath, val))),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Empty strings count as "unset" so that blank .env entries fall back to defaults
const env = (source: NodeJS.ProcessEnv, key: string): string | undefined => {
  const value = source[key];
  return value === undefined || value === '' ? undefined : value;
};

export function parseConfig(source: NodeJS.ProcessEnv) {
  return configSchema.safeParse({
    upstream: {
      baseUrl: env(source, 'UPSTREAM_BASE_URL'),
      resolvePath: env(source, 'UPSTREAM_RESOLVE_PATH'),
      viewPath: env(source, 'UPSTREAM_VIEW_PATH'),
      rootPath: env(source, 'UPSTREAM_ROOT_PATH'),
      replyPath: env(source, 'UPSTREAM_REPLY_PATH'),
      searchPath: env(source, 'UPSTREAM_SEARCH_PATH'),
      userAgent: env(source, 'UPSTREAM_USER_AGENT'),
    },

    harvest: {
      maxConcurrentRequests: env(source, 'MAX_CONCURRENT_REQUESTS'),
      requestTimeoutMs: env(source, 'REQUEST_TIMEOUT_SECONDS'),
      maxRetries: env(source, 'MAX_RETRIES'),
      baseDelayMs: env(source, 'RETRY_DELAY_SECONDS'),
      rootPageSize: env(source, 'ROOT_PAGE_SIZE'),
      replyPageSize: env(source, 'REPLY_PAGE_SIZE'),
      rootCap: env(source, 'ROOT_COMMENT_CAP'),
      maxRepliesPerRoot: env(source, 'MAX_REPLIES_PER_ROOT'),
      minLength: env(source, 'MIN_COMMENT_LENGTH'),
      rootJitter: env(source, 'ROOT_JITTER_MS'),
      replyJitter: env(source, 'REPLY_JITTER_MS'),
    },

    pipeline: {
      discoveryLimit: env(source, 'DISCOVERY_LIMIT'),
      deadlineMs: env(source, 'PIPELINE_DEADLINE_SECONDS'),
    },

    llm: {
      apiKey: env(source, 'LLM_API_KEY'),
      baseUrl: env(source, 'LLM_BASE_URL'),
      model: env(source, 'LLM_MODEL'),
    },

    port: env(source, 'PORT'),
    logLevel: env(source, 'LOG_LEVEL'),
    logToFile: env(source, 'LOG_TO_FILE'),

    paths: {
      cookies: env(source, 'COOKIES_PATH'),
    },
  });
}

// Validate Environment
const parsed = parseConfig(process.env);

if (!parsed.success) {
  console.error('❌ Invalid Configuration:', JSON.stringify(parsed.error.format(), null, 2));
  process.exit(1);
}

export const config: Config = parsed.data;
