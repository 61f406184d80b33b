/**
 * Source-location prefixes for error messages
 *
 * `fmtLoc('Error %d occurred', 42)` called from src/db.ts line 12 returns
 * `src/db.ts:12 Error 42 occurred`. Formatting follows `util.format`.
 */

import { isAbsolute, relative } from 'node:path';
import { fileURLToPath } from 'node:url';
import { format } from 'node:util';

export type SourceLocation = {
  file: string;
  line: number;
};

const FRAME_PATTERN = /\(?((?:file:\/\/)?[^\s()]+?):(\d+):\d+\)?$/;

/**
 * Read the file and line out of one V8 stack frame line
 */
export function parseStackFrame(frame: string, cwd: string = process.cwd()): SourceLocation | undefined {
  const match = FRAME_PATTERN.exec(frame.trim());
  if (!match) {
    return undefined;
  }
  const [, rawFile = '', rawLine = ''] = match;
  const path = rawFile.startsWith('file://') ? fileURLToPath(rawFile) : rawFile;
  return {
    file: isAbsolute(path) ? relative(cwd, path) : path,
    line: Number(rawLine)
  };
}

function callerLocation(below: (...args: never[]) => unknown): SourceLocation | undefined {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, below);
  const frame = holder.stack?.split('\n')[1];
  return frame === undefined ? undefined : parseStackFrame(frame);
}

/**
 * Prefix a formatted message with an explicit location
 */
export function fmtAt(location: SourceLocation, template: string, ...args: unknown[]): string {
  return `${location.file}:${location.line} ${format(template, ...args)}`;
}

/**
 * Prefix a formatted message with the caller's file and line
 */
export function fmtLoc(template: string, ...args: unknown[]): string {
  const location = callerLocation(fmtLoc);
  const message = format(template, ...args);
  return location ? `${location.file}:${location.line} ${message}` : message;
}
