/**
 * Breakpoint document shapes as stored in the Firebase Realtime Database.
 * Everything is optional: documents come from many agent versions.
 */

export interface StatusDescription {
  format?: string;
  parameters?: string[];
}

export interface StatusDescriptor {
  description?: StatusDescription;
  isError?: boolean;
  refersTo?: string;
}

export interface VariableRecord {
  name?: string;
  value?: string;
  type?: string;
  varTableIndex?: number;
  members?: VariableRecord[];
  status?: StatusDescriptor;
}

export interface SourceLocation {
  path?: string;
  line?: number;
}

export interface StackFrame {
  function?: string;
  location?: SourceLocation;
  arguments?: VariableRecord[];
  locals?: VariableRecord[];
}

export type BreakpointAction = 'CAPTURE' | 'LOG';

export interface Breakpoint {
  id?: string;
  action?: BreakpointAction;
  location?: SourceLocation;
  condition?: string;
  expressions?: string[];
  isFinalState?: boolean;
  createTimeUnixMsec?: number;
  finalTimeUnixMsec?: number;
  createTime?: string;
  finalTime?: string;
  userEmail?: string;
  status?: StatusDescriptor;
  // Snapshot capture data
  stackFrames?: StackFrame[];
  variableTable?: VariableRecord[];
  evaluatedExpressions?: VariableRecord[];
  // Logpoint fields
  logLevel?: string;
  logMessageFormat?: string;
  logMessageFormatString?: string;
}

/** A resolved variable value: a scalar, a nested member mapping, or null. */
export type ResolvedValue = string | null | ResolvedMembers;

export interface ResolvedMembers {
  [displayName: string]: ResolvedValue;
}

/** One `{ displayName: value }` entry of resolver output. */
export type ResolvedEntry = Record<string, ResolvedValue>;
