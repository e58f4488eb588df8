/**
 * Builds the logpoint documents that debug agents pick up from the database.
 */

import type { FileLine } from '../breakpoint/utils';
import { splitLogExpressions } from './template';

/** Levels are accepted in lower case and stored in upper case. */
export const LOG_LEVELS = {
  info: 'INFO',
  warning: 'WARNING',
  error: 'ERROR',
} as const;

export type LogLevelArg = keyof typeof LOG_LEVELS;
export type LogLevel = (typeof LOG_LEVELS)[LogLevelArg];

function isLogLevelArg(value: string): value is LogLevelArg {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * @throws Error if the level is not one of info, warning or error
 */
export function parseLogLevel(arg: string): LogLevel {
  if (!isLogLevelArg(arg)) {
    throw new Error(`Invalid log-level argument provided: ${arg}`);
  }
  return LOG_LEVELS[arg];
}

export interface LogpointRequest {
  id: string;
  location: FileLine;
  logFormatString: string;
  logLevel?: LogLevel;
  condition?: string;
  userEmail: string;
}

/** Firebase server value replaced with the write time in milliseconds. */
export const SERVER_TIMESTAMP = { '.sv': 'timestamp' } as const;

export interface LogpointDocument {
  id: string;
  action: 'LOG';
  logMessageFormat: string;
  expressions?: string[];
  location: FileLine;
  logLevel: LogLevel;
  userEmail: string;
  condition?: string;
  createTimeUnixMsec: typeof SERVER_TIMESTAMP;
}

/**
 * Compiles the user's template and assembles a new logpoint.
 *
 * @throws LogTemplateError if the template has unbalanced braces
 */
export function buildLogpoint(request: LogpointRequest): LogpointDocument {
  const { logMessageFormat, expressions } = splitLogExpressions(request.logFormatString);

  const logpoint: LogpointDocument = {
    id: request.id,
    action: 'LOG',
    logMessageFormat,
    location: request.location,
    logLevel: request.logLevel || 'INFO',
    userEmail: request.userEmail,
    createTimeUnixMsec: SERVER_TIMESTAMP,
  };

  if (expressions.length > 0) {
    logpoint.expressions = expressions;
  }

  if (request.condition) {
    logpoint.condition = request.condition;
  }

  return logpoint;
}
