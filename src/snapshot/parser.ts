import { transformLocationToFileLine } from '../breakpoint/utils';
import { DEFAULT_MAX_EXPANSION_LEVEL, VariableGraphResolver } from './resolver';
import { StatusMessage } from './statusMessage';
import type { Breakpoint, ResolvedEntry, StackFrame } from './types';

/** `[function, "file:line"]` */
export type CallStackRow = [string, string];

/**
 * Read-only view of a captured snapshot for display: call stack, evaluated
 * expressions and per-frame locals.
 */
export class SnapshotParser {
  readonly stackFrames: StackFrame[];
  readonly statusMessage: StatusMessage;
  private readonly snapshot: Breakpoint;
  private readonly maxExpansionLevel: number;

  constructor(snapshot: Breakpoint, maxExpansionLevel: number = DEFAULT_MAX_EXPANSION_LEVEL) {
    this.snapshot = snapshot;
    this.stackFrames = Array.isArray(snapshot.stackFrames) ? snapshot.stackFrames : [];
    this.maxExpansionLevel = maxExpansionLevel;
    this.statusMessage = new StatusMessage(snapshot);
  }

  parseCallStack(): CallStackRow[] {
    return this.stackFrames.map((frame): CallStackRow => [
      frame.function ?? 'unknown',
      transformLocationToFileLine(frame.location) || 'unknown',
    ]);
  }

  parseExpressions(): ResolvedEntry[] {
    const expressions = this.snapshot.evaluatedExpressions;
    return this.newResolver().resolveExpressions(Array.isArray(expressions) ? expressions : []);
  }

  parseLocals(stackFrameIndex: number): ResolvedEntry[] {
    return this.newResolver().resolveLocals(stackFrameIndex);
  }

  private newResolver(): VariableGraphResolver {
    return new VariableGraphResolver(
      { variableTable: this.snapshot.variableTable, stackFrames: this.stackFrames },
      this.maxExpansionLevel
    );
  }
}
