/**
 * StackError - the base error chain
 *
 * Each node holds one message payload, an optional code and URI, and the
 * node it was stacked on (`cause`). Nodes are never mutated: builders and
 * `stackErr` return a new node, so a chain is an append-only history.
 */

import type { ErrorCodeType } from './codes/index.js';
import {
  type Displayable,
  type ErrorChain,
  type ErrorStacks,
  displayString,
  formatMessage
} from './contract.js';
import { DEFAULT_SEPARATOR, type RenderOptions } from './schemas.js';

type StackErrorFields = {
  cause?: StackError;
  code?: ErrorCodeType;
  uri?: string;
};

export class StackError extends Error implements ErrorStacks<StackError>, ErrorChain {
  declare readonly cause: StackError | undefined;
  readonly payload: Displayable | undefined;
  readonly code: ErrorCodeType | undefined;
  readonly uri: string | undefined;

  constructor(message?: Displayable, fields: StackErrorFields = {}) {
    super(message === undefined ? '' : formatMessage(message));
    this.name = 'StackError';
    this.payload = message;
    this.cause = fields.cause;
    this.code = fields.code;
    this.uri = fields.uri;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  static from(message: Displayable): StackError {
    return new StackError(message);
  }

  /**
   * A root without a message, for attaching metadata first
   */
  static empty(): StackError {
    return new StackError();
  }

  /**
   * Wrap a thrown value. StackErrors pass through unchanged.
   */
  static fromUnknown(error: unknown): StackError {
    if (error instanceof StackError) {
      return error;
    }
    if (error instanceof Error) {
      return new StackError(error);
    }
    return new StackError(displayString(error));
  }

  private fields(): StackErrorFields {
    return { cause: this.cause, code: this.code, uri: this.uri };
  }

  withCode(code: ErrorCodeType): StackError {
    return new StackError(this.payload, { ...this.fields(), code });
  }

  clearCode(): StackError {
    return new StackError(this.payload, { ...this.fields(), code: undefined });
  }

  withUri(uri: string): StackError {
    return new StackError(this.payload, { ...this.fields(), uri });
  }

  clearUri(): StackError {
    return new StackError(this.payload, { ...this.fields(), uri: undefined });
  }

  withMessage(message: Displayable): StackError {
    return new StackError(message, this.fields());
  }

  clearMessage(): StackError {
    return new StackError(undefined, this.fields());
  }

  stackErr(message?: Displayable): StackError {
    return new StackError(message, { cause: this, code: this.code, uri: this.uri });
  }

  /**
   * Chain nodes, root first
   */
  nodes(): StackError[] {
    const nodes: StackError[] = [];
    for (let node: StackError | undefined = this; node; node = node.cause) {
      nodes.push(node);
    }
    return nodes.reverse();
  }

  /**
   * Messages of the nodes that carry one, root first
   */
  messages(): string[] {
    return this.nodes()
      .filter((node) => node.payload !== undefined)
      .map((node) => node.message);
  }

  /**
   * One line per node, root first. A node without a message renders an
   * empty line.
   */
  render(options: Partial<RenderOptions> = {}): string {
    const { numbered = false, separator = DEFAULT_SEPARATOR } = options;
    return this.nodes()
      .map((node, index) => (numbered ? `${index}: ${node.message}` : node.message))
      .join(separator);
  }

  toString(): string {
    return this.render();
  }
}
