import { pino } from 'pino';

import type { Logger } from 'pino';

/** Logger used when none is passed in. */
export const defaultLogger: Logger = pino({ name: 'gtx' });

/** Serialize an error into JSON for JSON logging. */
export function errorJson(error: unknown): { name: string; msg: string; stack?: string } {
  if (error instanceof Error) {
    return { name: error.name, msg: error.message, stack: error.stack };
  }

  return { name: 'unknown', msg: String(error) };
}
