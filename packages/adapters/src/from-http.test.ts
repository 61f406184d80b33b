import { ErrorCode, codeToHttpStatus, createLogger, mappedHttpStatuses } from '@errstack/core';
import { describe, expect, it } from 'vitest';
import { fromHttpStatus } from './from-http.js';

describe('fromHttpStatus', () => {
  it('should build a classified root with the reason phrase', () => {
    const error = fromHttpStatus(404);

    expect(error.code).toBe(ErrorCode.HttpNotFound);
    expect(error.render()).toBe('404 Not Found');
    expect(error.cause).toBeUndefined();
  });

  it('should round-trip every mapped status', () => {
    for (const status of mappedHttpStatuses()) {
      const code = fromHttpStatus(status).code;
      expect(code).toBeDefined();
      if (code !== undefined) {
        expect(codeToHttpStatus(code)).toBe(status);
      }
    }
  });

  it('should leave unmapped statuses unclassified', () => {
    const success = fromHttpStatus(200);
    expect(success.code).toBeUndefined();
    expect(success.render()).toBe('200 OK');

    const unknown = fromHttpStatus(299);
    expect(unknown.code).toBeUndefined();
    expect(unknown.render()).toBe('299');
  });

  it('should log unmapped statuses at debug level', () => {
    const lines: string[] = [];
    const logger = createLogger({
      level: 'debug',
      destination: {
        write(msg: string) {
          lines.push(msg);
        }
      }
    });

    fromHttpStatus(299, { logger });

    expect(lines).toHaveLength(1);
    const record = JSON.parse(lines[0] ?? '{}');
    expect(record.status).toBe(299);
    expect(record.msg).toBe('unmapped HTTP status');
  });
});
