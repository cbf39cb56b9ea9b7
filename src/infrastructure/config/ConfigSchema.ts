import { z } from 'zod';

export const BrowserSchema = z.object({
  headless: z.boolean().default(true),
  timeout: z.number().int().positive().default(30000),
  width: z.number().int().positive().default(1280),
  height: z.number().int().positive().default(720),
  maxRetries: z.number().int().positive().default(3),
  retryBaseDelay: z.number().int().nonnegative().default(1000),
});

export const ReplaySchema = z.object({
  maxDepth: z.number().int().nonnegative().default(10),
  stopOnFailure: z.boolean().default(true),
});

export const LoggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  json: z.boolean().default(false),
});

export const AppConfigSchema = z.object({
  browser: BrowserSchema.default({}),
  replay: ReplaySchema.default({}),
  logging: LoggingSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type BrowserConfig = z.infer<typeof BrowserSchema>;
export type ReplayConfig = z.infer<typeof ReplaySchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;
