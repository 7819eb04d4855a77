import type { OutputSink } from '@/types';
import { info } from '@actions/core';

/**
 * Writes success notices to the log.
 */
export const logOutput: OutputSink = {
  success(message: string): void {
    info(message);
  },
};
