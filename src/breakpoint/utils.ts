/**
 * Helpers shared by the snapshot and logpoint commands: location parsing,
 * timestamp conversion, and normalization of breakpoint documents.
 */

import { mergeLogExpressions } from '../logpoint/template';
import { StatusMessage } from '../snapshot/statusMessage';
import type { Breakpoint, SourceLocation } from '../snapshot/types';

export const MAX_LINE_NUMBER = 2147483647;

export const LOCATION_ERROR_MSG =
  `Location must be in the format file:line, with the maximum line number being ${MAX_LINE_NUMBER}`;

const LOCATION_REGEX = /^[^:]+:[1-9][0-9]*$/;

export interface FileLine {
  path: string;
  line: number;
}

/**
 * Parses a `file:line` argument.
 *
 * @returns The location, or null if it is malformed or the line is too large
 */
export function parseAndValidateLocation(fileLine: string): FileLine | null {
  if (!LOCATION_REGEX.test(fileLine)) {
    return null;
  }

  const [path, lineText] = fileLine.split(':');
  const line = parseInt(lineText, 10);

  if (line > MAX_LINE_NUMBER) {
    return null;
  }

  return { path, line };
}

export function transformLocationToFileLine(location: SourceLocation | undefined): string | null {
  if (!location || location.path === undefined || location.line === undefined) {
    return null;
  }

  return `${location.path}:${location.line}`;
}

/**
 * Formats milliseconds since the epoch as RFC 3339 with microsecond
 * precision, e.g. `2022-04-14T18:50:15.426000Z`. Values that are not a
 * valid time give the epoch.
 */
export function convertUnixMsecToRfc3339(unixMsec: unknown): string {
  const date = typeof unixMsec === 'number' ? new Date(unixMsec) : new Date(NaN);
  const time = date.getTime();

  if (!Number.isFinite(time)) {
    return convertUnixMsecToRfc3339(0);
  }

  // toISOString gives YYYY-MM-DDTHH:MM:SS.mmmZ for years 0-9999
  const iso = date.toISOString();
  if (iso.length !== 24) {
    return convertUnixMsecToRfc3339(0);
  }

  return `${iso.slice(0, 23)}000Z`;
}

export function setConvertedTimestamps(bp: Breakpoint): Breakpoint {
  if (bp.createTime === undefined && bp.createTimeUnixMsec !== undefined) {
    bp.createTime = convertUnixMsecToRfc3339(bp.createTimeUnixMsec);
  }

  if (bp.finalTime === undefined && bp.finalTimeUnixMsec !== undefined) {
    bp.finalTime = convertUnixMsecToRfc3339(bp.finalTimeUnixMsec);
  }

  return bp;
}

function isBreakpointDocument(value: unknown): value is Breakpoint {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Fills in every field the commands rely on. The breakpoint is updated in
 * place and returned.
 *
 * @param bp - A breakpoint as read from the database
 * @param bpid - Id to use when the document has none
 * @returns The breakpoint, or null when a required field is missing
 */
export function normalizeBreakpoint(bp: unknown, bpid?: string): Breakpoint | null {
  if (!isBreakpointDocument(bp)) {
    return null;
  }

  if (bp.id === undefined && bpid !== undefined) {
    bp.id = bpid;
  }

  const location = bp.location;
  if (bp.id === undefined || typeof location !== 'object' || location === null) {
    return null;
  }

  if (location.path === undefined || location.line === undefined) {
    return null;
  }

  if (bp.action === undefined) {
    bp.action = 'CAPTURE';
  }

  if (bp.isFinalState === undefined) {
    bp.isFinalState = false;
  }

  if (bp.createTimeUnixMsec === undefined) {
    // Should always be set by the server; 0 shows the time was never known.
    bp.createTimeUnixMsec = 0;
  }

  if (bp.finalTimeUnixMsec === undefined && bp.isFinalState) {
    bp.finalTimeUnixMsec = 0;
  }

  if (bp.userEmail === undefined) {
    bp.userEmail = 'unknown';
  }

  if (bp.action === 'LOG') {
    if (bp.logLevel === undefined) {
      bp.logLevel = 'INFO';
    }

    if (typeof bp.logMessageFormat !== 'string') {
      bp.logMessageFormat = '';
    }

    if (bp.logMessageFormatString === undefined) {
      bp.logMessageFormatString = mergeLogExpressions(
        bp.logMessageFormat,
        Array.isArray(bp.expressions) ? bp.expressions : []
      );
    }
  }

  return setConvertedTimestamps(bp);
}

/**
 * One word (or short phrase) status of a logpoint for listings:
 * ACTIVE, COMPLETED, EXPIRED, or `<REASON>: <message>` on failure.
 */
export function getLogpointShortStatus(logpoint: Breakpoint): string {
  if (!logpoint.isFinalState) {
    return 'ACTIVE';
  }

  const status = new StatusMessage(logpoint);
  if (!status.isError) {
    return 'COMPLETED';
  }

  if (status.refersTo === 'BREAKPOINT_AGE') {
    return 'EXPIRED';
  }

  const reason = status.refersTo !== null ? status.refersTo.replace(/^BREAKPOINT_/, '') : 'FAILED';
  const message = status.parsedMessage ?? 'Unknown failure reason';

  return `${reason}: ${message}`;
}

/** ACTIVE, COMPLETED, EXPIRED or FAILED. */
export function getSnapshotState(snapshot: Breakpoint): string {
  if (!snapshot.isFinalState) {
    return 'ACTIVE';
  }

  const status = new StatusMessage(snapshot);
  if (!status.isError) {
    return 'COMPLETED';
  }

  return status.refersTo === 'BREAKPOINT_AGE' ? 'EXPIRED' : 'FAILED';
}
