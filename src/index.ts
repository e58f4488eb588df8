/**
 * snapdbg
 *
 * Display and authoring helpers for Snapshot Debugger breakpoints: resolve a
 * snapshot's captured variables into nested name/value mappings, and convert
 * logpoint message templates to and from the positional form agents read.
 *
 * @example Resolving a snapshot
 * ```ts
 * import { SnapshotParser } from 'snapdbg';
 *
 * const parser = new SnapshotParser(snapshot, 3);
 * console.log(JSON.stringify(parser.parseLocals(0), null, 2));
 * ```
 *
 * @example Logpoint templates
 * ```ts
 * import { splitLogExpressions, mergeLogExpressions } from 'snapdbg';
 *
 * const { logMessageFormat, expressions } = splitLogExpressions('a={a}, b={b}');
 * // logMessageFormat === 'a=$0, b=$1', expressions === ['a', 'b']
 * mergeLogExpressions(logMessageFormat, expressions); // 'a={a}, b={b}'
 * ```
 *
 * @example CLI
 * ```bash
 * npx snapdbg get-snapshot ./snapshot.json --frame-index 1
 * ```
 *
 * @packageDocumentation
 */

export {
  VariableGraphResolver,
  DEFAULT_MAX_EXPANSION_LEVEL,
  DBG_MSG_SUFFIX,
  cycleMessage,
  maxExpansionLevelMessage,
  getVariableNameAndType,
  type CapturedVariables,
} from './snapshot/resolver';

export { SnapshotParser, type CallStackRow } from './snapshot/parser';

export { StatusMessage, formatStatusDescription } from './snapshot/statusMessage';

export type {
  Breakpoint,
  BreakpointAction,
  ResolvedEntry,
  ResolvedMembers,
  ResolvedValue,
  SourceLocation,
  StackFrame,
  StatusDescription,
  StatusDescriptor,
  VariableRecord,
} from './snapshot/types';

export {
  splitLogExpressions,
  mergeLogExpressions,
  LogTemplateError,
  type CompiledLogMessage,
} from './logpoint/template';

export {
  buildLogpoint,
  parseLogLevel,
  LOG_LEVELS,
  SERVER_TIMESTAMP,
  type LogLevel,
  type LogpointDocument,
  type LogpointRequest,
} from './logpoint/logpoint';

export {
  parseAndValidateLocation,
  transformLocationToFileLine,
  convertUnixMsecToRfc3339,
  normalizeBreakpoint,
  getLogpointShortStatus,
  getSnapshotState,
  type FileLine,
} from './breakpoint/utils';
