/**
 * Decodes the StatusMessage an agent attaches to a breakpoint, debuggee or
 * variable into human readable text.
 */

import type { StatusDescription, StatusDescriptor } from './types';

/**
 * Substitutes `$N` placeholders in a status format with its parameters.
 * `$$` is a literal `$`. Only a single digit is read as an index; any `$`
 * that is not a valid reference is kept verbatim.
 *
 * @returns The decoded message, or null when there is no format
 */
export function formatStatusDescription(description: StatusDescription): string | null {
  if (typeof description.format !== 'string') {
    return null;
  }

  const format = description.format;
  const parameters = Array.isArray(description.parameters) ? description.parameters : [];
  let output = '';
  let i = 0;

  while (i < format.length) {
    const c = format[i];
    if (c !== '$') {
      output += c;
      i += 1;
      continue;
    }

    const next = format.charAt(i + 1);
    if (next === '$') {
      output += '$';
      i += 2;
    } else if (next >= '0' && next <= '9' && Number(next) < parameters.length) {
      output += String(parameters[Number(next)]);
      i += 2;
    } else {
      output += '$';
      i += 1;
    }
  }

  return output;
}

/**
 * Human readable view of the `status` field of a breakpoint, debuggee or
 * variable. All fields are null when the parent carries no status.
 */
export class StatusMessage {
  readonly parsedMessage: string | null = null;
  readonly isError: boolean | null = null;
  readonly refersTo: string | null = null;

  constructor(parent: { status?: StatusDescriptor | null }) {
    const status = parent.status;
    if (status === undefined || status === null || typeof status !== 'object') {
      return;
    }

    const description = status.description;
    this.parsedMessage =
      description !== null && typeof description === 'object'
        ? formatStatusDescription(description)
        : null;
    this.isError = status.isError === true;
    this.refersTo = typeof status.refersTo === 'string' ? status.refersTo : null;
  }
}
