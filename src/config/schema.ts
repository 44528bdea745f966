import { z } from 'zod';
import { DEFAULT_USER_AGENT, SEARCH_TIMEFRAMES } from '../providers/types.js';

export const TimeframeSchema = z.enum(SEARCH_TIMEFRAMES);

export const SearchConfigSchema = z.object({
  numResults: z.number().int().positive().default(10),
  language: z.string().min(1).default('en'),
  safeMode: z.string().min(1).default('active'),
  timeframe: TimeframeSchema.optional(),
  timeoutMs: z.number().int().positive().default(10000),
  readPageText: z.boolean().default(true),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  concurrency: z.number().int().positive().optional(),
});

export const OutputConfigSchema = z.object({
  format: z.enum(['markdown', 'json']).default('markdown'),
  pageTextLength: z.number().int().nonnegative().default(300),
});

export const ConfigSchema = z.object({
  search: SearchConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type OutputFormat = OutputConfig['format'];
