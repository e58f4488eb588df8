/**
 * Renders breakpoint documents the way the snapshot and logpoint commands
 * print them. Each renderer returns the output lines; printing is left to
 * the CLI.
 */

import {
  getLogpointShortStatus,
  getSnapshotState,
  normalizeBreakpoint,
  transformLocationToFileLine,
} from '../breakpoint/utils';
import { SnapshotParser } from '../snapshot/parser';
import type { StatusMessage } from '../snapshot/statusMessage';
import type { Breakpoint, BreakpointAction, ResolvedEntry } from '../snapshot/types';
import { buildTable, toJsonString } from './format';

export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

const ACTION_NAMES: Record<BreakpointAction, string> = {
  CAPTURE: 'Snapshot',
  LOG: 'Logpoint',
};

/**
 * Normalizes a single breakpoint document and checks it is of the expected
 * kind.
 *
 * @throws CommandError if the document is not a valid breakpoint of that kind
 */
export function expectBreakpoint(document: unknown, action: BreakpointAction, id?: string): Breakpoint {
  const bp = normalizeBreakpoint(document, id);

  if (bp === null || bp.action !== action) {
    const found = bp === null ? 'an invalid breakpoint' : `a breakpoint with action ${bp.action}`;
    throw new CommandError(`${ACTION_NAMES[action]} not found: input is ${found}`);
  }

  return bp;
}

export interface BreakpointFilter {
  action: BreakpointAction;
  includeInactive?: boolean;
  userEmail?: string;
}

/**
 * Reads a collection of breakpoints, either keyed by id as the database
 * stores them or as a plain array, keeping the valid ones that match the
 * filter.
 */
export function selectBreakpoints(document: unknown, filter: BreakpointFilter): Breakpoint[] {
  let entries: Array<[string | undefined, unknown]>;

  if (Array.isArray(document)) {
    entries = document.map((bp): [string | undefined, unknown] => [undefined, bp]);
  } else if (typeof document === 'object' && document !== null) {
    entries = Object.entries(document);
  } else {
    entries = [];
  }

  const selected: Breakpoint[] = [];
  for (const [id, value] of entries) {
    const bp = normalizeBreakpoint(value, id);
    if (bp === null || bp.action !== filter.action) {
      continue;
    }
    if (!filter.includeInactive && bp.isFinalState) {
      continue;
    }
    if (filter.userEmail !== undefined && bp.userEmail !== filter.userEmail) {
      continue;
    }
    selected.push(bp);
  }

  return selected;
}

function header(title: string): string[] {
  const rule = '-'.repeat(80);
  return ['', rule, `| ${title}`, rule, ''];
}

function snapshotSummary(snapshot: Breakpoint, statusMessage: StatusMessage): string[] {
  const location = transformLocationToFileLine(snapshot.location);
  const condition = snapshot.condition || 'No condition set';
  const expressions =
    snapshot.expressions && snapshot.expressions.length > 0
      ? JSON.stringify(snapshot.expressions)
      : 'No expressions set';

  let status = snapshot.isFinalState ? 'Complete' : 'Active';
  if (statusMessage.parsedMessage !== null) {
    if (statusMessage.isError && statusMessage.refersTo !== 'BREAKPOINT_AGE') {
      status = `ERROR: ${statusMessage.parsedMessage} (refers to: ${statusMessage.refersTo})`;
    } else {
      status = statusMessage.parsedMessage;
    }
  }

  return [
    ...header('Summary'),
    `Location:    ${location}`,
    `Condition:   ${condition}`,
    `Expressions: ${expressions}`,
    `Status:      ${status}`,
    `Create Time: ${snapshot.createTime || ''}`,
    `Final Time:  ${cell(snapshot.finalTime)}`,
  ];
}

function localsSection(locals: ResolvedEntry[], frameIndex: number): string[] {
  return [
    ...header(`Local Variables For Stack Frame Index ${frameIndex}:`),
    locals.length > 0 ? toJsonString(locals, true) : 'There are no local variables.',
  ];
}

export interface SnapshotRenderOptions {
  frameIndex: number;
  maxLevel: number;
}

/**
 * Summary, evaluated expressions, locals and call stack of a snapshot. For
 * a frame other than the top one only that frame's locals are shown.
 *
 * @throws CommandError if the frame index is past the end of the stack
 */
export function renderSnapshot(snapshot: Breakpoint, options: SnapshotRenderOptions): string[] {
  const { frameIndex, maxLevel } = options;
  const parser = new SnapshotParser(snapshot, maxLevel);
  const lines: string[] = [];

  if (frameIndex === 0) {
    lines.push(...snapshotSummary(snapshot, parser.statusMessage));
  }

  // Nothing was captured yet, or the capture failed.
  if (!snapshot.isFinalState || parser.statusMessage.isError) {
    return lines;
  }

  if (frameIndex > 0 && frameIndex >= parser.stackFrames.length) {
    throw new CommandError(
      `Stack frame index ${frameIndex} too big, there are only ${parser.stackFrames.length} stack frames.`
    );
  }

  if (frameIndex === 0) {
    const expressions = parser.parseExpressions();
    lines.push(
      ...header('Evaluated Expressions'),
      expressions.length > 0 ? toJsonString(expressions, true) : 'There were no expressions specified.',
      ...localsSection(parser.parseLocals(frameIndex), frameIndex),
      ...header('CallStack:'),
      buildTable(['Function', 'Location'], parser.parseCallStack())
    );
  } else {
    lines.push(...localsSection(parser.parseLocals(frameIndex), frameIndex));
  }

  return lines;
}

export function renderLogpoint(logpoint: Breakpoint): string[] {
  return [
    `Logpoint ID:        ${logpoint.id}`,
    `Log Message Format: ${logpoint.logMessageFormatString}`,
    `Location:           ${transformLocationToFileLine(logpoint.location)}`,
    `Condition:          ${logpoint.condition || 'No condition set'}`,
    `Status:             ${getLogpointShortStatus(logpoint)}`,
    `Create Time:        ${logpoint.createTime || ''}`,
    `Final Time:         ${logpoint.finalTime || ''}`,
    `User Email:         ${cell(logpoint.userEmail)}`,
  ];
}

export const SNAPSHOT_SUMMARY_HEADERS = ['Status', 'Location', 'Condition', 'CompletedTime', 'ID'];

export const LOGPOINT_SUMMARY_HEADERS = [
  'User Email',
  'Location',
  'Condition',
  'Log Level',
  'Log Message Format',
  'ID',
  'Status',
];

// Documents are not type checked, so a field may hold a number or boolean.
function cell(value: unknown): string {
  return value === undefined || value === null ? '' : String(value);
}

export function renderSnapshotList(snapshots: Breakpoint[]): string {
  return buildTable(
    SNAPSHOT_SUMMARY_HEADERS,
    snapshots.map((snapshot) => [
      getSnapshotState(snapshot),
      cell(transformLocationToFileLine(snapshot.location)),
      cell(snapshot.condition),
      cell(snapshot.finalTime),
      cell(snapshot.id),
    ])
  );
}

export function renderLogpointList(logpoints: Breakpoint[]): string {
  return buildTable(
    LOGPOINT_SUMMARY_HEADERS,
    logpoints.map((logpoint) => [
      cell(logpoint.userEmail),
      cell(transformLocationToFileLine(logpoint.location)),
      cell(logpoint.condition),
      cell(logpoint.logLevel),
      cell(logpoint.logMessageFormatString),
      cell(logpoint.id),
      getLogpointShortStatus(logpoint),
    ])
  );
}
