import { z } from 'zod';

export const BrowserSchema = z.object({
  headless: z.boolean().default(true),
  width: z.number().int().positive().default(1280),
  height: z.number().int().positive().default(720),
  /** Default Playwright action timeout in milliseconds */
  timeout: z.number().int().positive().default(30000),
  maxRetries: z.number().int().positive().default(3),
  retryBaseDelay: z.number().int().nonnegative().default(1000),
});

export const OutputSchema = z.object({
  dir: z.string().min(1).default('./output'),
});

export const ExecutorSchema = z.object({
  maxConsecutiveErrors: z.number().int().positive().default(2),
  settleTimeout: z.number().int().nonnegative().default(3000),
  pollInterval: z.number().int().positive().default(500),
  stabilityTimeout: z.number().int().nonnegative().default(3000),
  menuRetryDelay: z.number().int().nonnegative().default(500),
  menuProbeDelay: z.number().int().nonnegative().default(500),
  errorPause: z.number().int().nonnegative().default(1000),
  defaultWaitSeconds: z.number().nonnegative().default(1.0),
  defaultFillText: z.string().default('sample text'),
});

export const ResolverSchema = z.object({
  menuRenderDelay: z.number().int().nonnegative().default(300),
});

export const LoggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  json: z.boolean().default(false),
});

export const AppConfigSchema = z.object({
  browser: BrowserSchema.default({}),
  output: OutputSchema.default({}),
  executor: ExecutorSchema.default({}),
  resolver: ResolverSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Partial config accepted as explicit overrides on top of the environment.
 */
export type AppConfigOverrides = {
  [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};
