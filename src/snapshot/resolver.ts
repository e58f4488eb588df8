/**
 * Resolves the variables captured in a snapshot into nested, displayable
 * name/value mappings.
 *
 * Composite values live in the snapshot's shared variable table and are
 * referenced by `varTableIndex`. The table may alias entries and may contain
 * cycles (self referential objects in the debugged program), so expansion is
 * bounded by a maximum level and by the set of table indexes on the current
 * path.
 */

import { StatusMessage } from './statusMessage';
import type {
  ResolvedEntry,
  ResolvedMembers,
  ResolvedValue,
  StackFrame,
  VariableRecord,
} from './types';

export const DEFAULT_MAX_EXPANSION_LEVEL = 3;

/** Suffix of the sibling key carrying a variable's status message. */
export const DBG_MSG_SUFFIX = ' - DBG_MSG';

export function maxExpansionLevelMessage(maxLevel: number): string {
  return (
    `DBG_MSG: Max expansion level of ${maxLevel} hit. ` +
    'Specify a larger value for --max-level to see more.'
  );
}

export function cycleMessage(ancestorName: string): string {
  return ancestorName
    ? `DBG_MSG: Cycle, refers to same instance as ancestor field '${ancestorName}'.`
    : 'DBG_MSG: Cycle, refers to same instance as an ancestor field.';
}

interface ResolvedVariable {
  name: string;
  value: ResolvedValue;
  message: string | null;
}

// Plain assignment would treat a member named "__proto__" as the prototype.
function setEntry(target: ResolvedMembers, key: string, value: ResolvedValue): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

function entry(key: string, value: ResolvedValue): ResolvedEntry {
  const result: ResolvedEntry = {};
  setEntry(result, key, value);
  return result;
}

function nameOf(variable: VariableRecord): string {
  return typeof variable.name === 'string' ? variable.name : '';
}

// Sparse arrays in the database come back with null holes.
function isVariableRecord(value: unknown): value is VariableRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function membersOf(variable: VariableRecord): VariableRecord[] {
  return Array.isArray(variable.members) ? variable.members.filter(isVariableRecord) : [];
}

/**
 * Display name of a variable: its name followed by the type in parentheses.
 * Some agents (Node.js) put the type of a composite in `value`.
 */
export function getVariableNameAndType(variable: VariableRecord, members: VariableRecord[]): string {
  let nameAndType = nameOf(variable);

  if (variable.type !== undefined) {
    nameAndType += ` (${variable.type})`;
  } else if (variable.value !== undefined && members.length > 0) {
    nameAndType += ` (${variable.value})`;
  }

  return nameAndType;
}

/** The parts of a snapshot the resolver reads. */
export interface CapturedVariables {
  variableTable?: VariableRecord[];
  stackFrames?: StackFrame[];
}

export class VariableGraphResolver {
  private readonly variableTable: VariableRecord[];
  private readonly stackFrames: StackFrame[];
  private readonly maxLevel: number;

  constructor(snapshot: CapturedVariables, maxLevel: number = DEFAULT_MAX_EXPANSION_LEVEL) {
    this.variableTable = Array.isArray(snapshot.variableTable) ? snapshot.variableTable : [];
    this.stackFrames = Array.isArray(snapshot.stackFrames) ? snapshot.stackFrames : [];
    this.maxLevel = maxLevel;
  }

  /** Resolves top level records such as a snapshot's evaluated expressions. */
  resolveExpressions(expressions: VariableRecord[]): ResolvedEntry[] {
    const resolved: ResolvedEntry[] = [];

    const records = Array.isArray(expressions) ? expressions.filter(isVariableRecord) : [];
    for (const variable of records) {
      const { name, value, message } = this.resolveOne(variable, 0, new Map());
      resolved.push(entry(name, value));
      if (message !== null) {
        resolved.push(entry(`${name}${DBG_MSG_SUFFIX}`, message));
      }
    }

    return resolved;
  }

  /**
   * Resolves the arguments followed by the locals of one stack frame.
   * An index past the end of the stack gives an empty list.
   */
  resolveLocals(frameIndex: number): ResolvedEntry[] {
    const frame: StackFrame | undefined = this.stackFrames[frameIndex];
    if (frame === undefined || frame === null) {
      return [];
    }

    const variables: VariableRecord[] = [];
    for (const group of [frame.arguments, frame.locals]) {
      if (Array.isArray(group)) {
        variables.push(...group);
      }
    }

    return this.resolveExpressions(variables);
  }

  private resolveOne(
    record: VariableRecord,
    level: number,
    ancestors: Map<number, string>
  ): ResolvedVariable {
    if (level > this.maxLevel) {
      return { name: nameOf(record), value: maxExpansionLevelMessage(this.maxLevel), message: null };
    }

    const varTableIndex = record.varTableIndex;
    const isReference = varTableIndex !== undefined && varTableIndex !== null;
    let variable = record;

    if (isReference) {
      const ancestorName = ancestors.get(varTableIndex);
      if (ancestorName !== undefined) {
        return { name: nameOf(record), value: cycleMessage(ancestorName), message: null };
      }

      ancestors.set(varTableIndex, nameOf(record));
      const tableEntry: unknown = this.variableTable[varTableIndex];
      if (isVariableRecord(tableEntry)) {
        // Fields from the table entry win over the inline record.
        variable = { ...record, ...tableEntry };
      }
    }

    const members = membersOf(variable);
    const name = getVariableNameAndType(variable, members);
    const message = new StatusMessage(variable).parsedMessage;
    let value: ResolvedValue = isReference ? null : '';

    if (members.length > 0) {
      const resolvedMembers: ResolvedMembers = {};
      for (const member of members) {
        const resolved = this.resolveOne(member, level + 1, ancestors);
        setEntry(resolvedMembers, resolved.name, resolved.value);
        if (resolved.message !== null) {
          setEntry(resolvedMembers, `${resolved.name}${DBG_MSG_SUFFIX}`, resolved.message);
        }
      }
      value = resolvedMembers;
    } else if (variable.value !== undefined) {
      value = variable.value;
    }

    if (isReference) {
      ancestors.delete(varTableIndex);
    }

    return { name, value, message };
  }
}
