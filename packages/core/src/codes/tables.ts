/**
 * Lookup tables between ErrorCode and the external namespaces
 *
 * The tables are data (data/code-tables.json), validated once at load.
 * Each mapping is partial and one-to-one on its mapped subset.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ErrorCode, type ErrorCodeType } from './codes.js';

/**
 * Raised when the code table data cannot be read or fails validation
 */
export class CodeTableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CodeTableError';
  }
}

const CodeSchema = z.nativeEnum(ErrorCode);

const oneToOne = (table: Record<string, ErrorCodeType>, ctx: z.RefinementCtx): void => {
  const seen = new Map<ErrorCodeType, string>();
  for (const [key, code] of Object.entries(table)) {
    const previous = seen.get(code);
    if (previous !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${code} is mapped by both ${previous} and ${key}`,
        path: [key]
      });
    }
    seen.set(code, key);
  }
};

/**
 * Schema of data/code-tables.json
 */
export const CodeTablesSchema = z.object({
  http: z
    .record(z.string().regex(/^[1-5]\d{2}$/), CodeSchema)
    .superRefine(oneToOne)
    .describe('HTTP status to code'),
  io: z
    .record(z.string().regex(/^[A-Z][A-Z0-9_]*$/), CodeSchema)
    .superRefine(oneToOne)
    .describe('Node error code (errno name) to code')
});

export type CodeTables = z.infer<typeof CodeTablesSchema>;

/**
 * Validate raw table data
 * @throws CodeTableError if the data does not match the schema
 */
export function parseCodeTables(raw: unknown): CodeTables {
  const result = CodeTablesSchema.safeParse(raw);
  if (!result.success) {
    throw new CodeTableError(`Invalid code tables: ${result.error.message}`, {
      cause: result.error
    });
  }
  return result.data;
}

const TABLES_URL = new URL('../../data/code-tables.json', import.meta.url);

function loadCodeTables(): CodeTables {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(TABLES_URL, 'utf-8'));
  } catch (error) {
    throw new CodeTableError(`Failed to read code tables from ${TABLES_URL.pathname}`, {
      cause: error
    });
  }
  return parseCodeTables(raw);
}

type CodeIndex = {
  from: ReadonlyMap<string, ErrorCodeType>;
  to: ReadonlyMap<ErrorCodeType, string>;
};

const indexTable = (table: Record<string, ErrorCodeType>): CodeIndex => {
  const entries = Object.entries(table);
  return {
    from: new Map(entries),
    to: new Map(entries.map(([key, code]): [ErrorCodeType, string] => [code, key]))
  };
};

const tables = loadCodeTables();
const http = indexTable(tables.http);
const io = indexTable(tables.io);

/**
 * Code for an HTTP status, if the status is in the table
 */
export function codeFromHttpStatus(status: number): ErrorCodeType | undefined {
  if (!Number.isInteger(status)) {
    return undefined;
  }
  return http.from.get(String(status));
}

/**
 * HTTP status for a code, if the code is an HTTP code
 */
export function codeToHttpStatus(code: ErrorCodeType): number | undefined {
  const status = http.to.get(code);
  return status === undefined ? undefined : Number(status);
}

/**
 * Code for a Node I/O error kind (`error.code`, e.g. `ENOENT`)
 */
export function codeFromIoKind(kind: string): ErrorCodeType | undefined {
  return io.from.get(kind);
}

/**
 * Node I/O error kind for a code, if the code has one
 */
export function codeToIoKind(code: ErrorCodeType): string | undefined {
  return io.to.get(code);
}

/**
 * Every HTTP status present in the table
 */
export function mappedHttpStatuses(): number[] {
  return [...http.from.keys()].map(Number);
}

/**
 * Every I/O kind present in the table
 */
export function mappedIoKinds(): string[] {
  return [...io.from.keys()];
}
