import type { Logger } from '@errstack/core';

export type AdapterOptions = {
  /**
   * Receives a debug record when a value has no code mapping
   */
  logger?: Logger;
};
