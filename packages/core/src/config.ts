/**
 * Configuration loading for errstack
 *
 * Values come from a plain object or from ERRSTACK_* environment
 * variables, and are validated against the schemas in schemas.ts.
 */

import { ErrorCode } from './codes/index.js';
import { type Result, err, ok } from './result.js';
import { type StackErrorConfig, StackErrorConfigSchema } from './schemas.js';
import { StackError } from './stack-error.js';

/**
 * Type for environment variable getter function
 */
export type GetEnv = (key: string) => string | undefined;

const defaultGetEnv: GetEnv = (key) => process.env[key];

export const ENV_KEYS = {
  renderNumbered: 'ERRSTACK_RENDER_NUMBERED',
  renderSeparator: 'ERRSTACK_RENDER_SEPARATOR',
  logLevel: 'ERRSTACK_LOG_LEVEL',
  logName: 'ERRSTACK_LOG_NAME'
} as const;

/**
 * Validate a configuration object, applying defaults
 */
export function parseConfig(input: unknown): Result<StackErrorConfig, StackError> {
  const parsed = StackErrorConfigSchema.safeParse(input);
  if (parsed.success) {
    return ok(parsed.data);
  }

  const issues = parsed.error.issues.map(
    (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
  );
  return err(
    StackError.from(issues.join('; '))
      .withCode(ErrorCode.RuntimeInvalidValue)
      .stackErr('Invalid errstack configuration')
  );
}

// Unrecognised spellings are passed through so validation reports them
const parseBoolean = (value: string): boolean | string => {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
    case '':
      return false;
    default:
      return value;
  }
};

const unescape = (value: string): string => value.replace(/\\n/g, '\n').replace(/\\t/g, '\t');

/**
 * Build configuration from ERRSTACK_* environment variables
 */
export function configFromEnv(getEnv: GetEnv = defaultGetEnv): Result<StackErrorConfig, StackError> {
  const render: Record<string, unknown> = {};
  const log: Record<string, unknown> = {};

  const numbered = getEnv(ENV_KEYS.renderNumbered);
  if (numbered !== undefined) {
    render.numbered = parseBoolean(numbered);
  }
  const separator = getEnv(ENV_KEYS.renderSeparator);
  if (separator !== undefined) {
    render.separator = unescape(separator);
  }
  const level = getEnv(ENV_KEYS.logLevel);
  if (level !== undefined) {
    log.level = level.trim().toLowerCase();
  }
  const name = getEnv(ENV_KEYS.logName);
  if (name !== undefined) {
    log.name = name;
  }

  return parseConfig({ render, log });
}
