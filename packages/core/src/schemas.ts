/**
 * Configuration schemas for errstack
 * Using Zod for runtime validation and type inference
 */

import { z } from 'zod';

export const DEFAULT_SEPARATOR = '\n';
export const DEFAULT_LOGGER_NAME = 'errstack';

/**
 * Rendering of a chain as text
 */
export const RenderOptionsSchema = z
  .object({
    numbered: z
      .boolean()
      .optional()
      .default(false)
      .describe('Prefix each line with its zero-based position, oldest first'),
    separator: z
      .string()
      .optional()
      .default(DEFAULT_SEPARATOR)
      .describe('Text placed between two rendered messages')
  })
  .strict();

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']);

export const LogConfigSchema = z
  .object({
    level: LogLevelSchema.optional().default('info').describe('Minimum level written'),
    name: z.string().min(1).optional().default(DEFAULT_LOGGER_NAME).describe('Logger name')
  })
  .strict();

export const StackErrorConfigSchema = z
  .object({
    render: RenderOptionsSchema.optional().default({}),
    log: LogConfigSchema.optional().default({})
  })
  .strict();

export type RenderOptions = z.infer<typeof RenderOptionsSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogConfig = z.infer<typeof LogConfigSchema>;
export type StackErrorConfig = z.infer<typeof StackErrorConfigSchema>;
