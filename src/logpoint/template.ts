/**
 * Conversion between the log message template a user types, such as
 * `"a={a}, b={b}"`, and the positional form debug agents consume:
 * `logMessageFormat: "a=$0, b=$1"` plus `expressions: ["a", "b"]`.
 */

export class LogTemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LogTemplateError';
  }
}

export interface CompiledLogMessage {
  logMessageFormat: string;
  expressions: string[];
}

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

/**
 * Extracts each `{expression}` of a log template into a list and replaces it
 * with `$N`, N being the expression's index in that list. Identical
 * expressions share an index. Braces may nest inside an expression, and a
 * `$` outside any expression is escaped as `$$`.
 *
 * @throws LogTemplateError if the braces are unbalanced
 */
export function splitLogExpressions(template: string): CompiledLogMessage {
  const expressions: string[] = [];
  let logMessageFormat = '';
  let currentExpression = '';
  let braceCount = 0;
  let needSeparator = false;

  for (const c of template) {
    // Keeps the agent from reading "$0" followed by "1" as "$01".
    if (needSeparator && isDigit(c)) {
      logMessageFormat += ' ';
    }
    needSeparator = false;

    if (c === '{') {
      if (braceCount > 0) {
        currentExpression += c;
      } else {
        currentExpression = '';
      }
      braceCount += 1;
    } else if (braceCount === 0) {
      if (c === '}') {
        throw new LogTemplateError('There are too many "}" characters in the log format string');
      }
      logMessageFormat += c === '$' ? '$$' : c;
    } else if (c !== '}') {
      currentExpression += c;
    } else {
      braceCount -= 1;
      if (braceCount > 0) {
        currentExpression += c;
        continue;
      }

      let index = expressions.indexOf(currentExpression);
      if (index === -1) {
        index = expressions.length;
        expressions.push(currentExpression);
      }
      logMessageFormat += `$${index}`;
      needSeparator = true;
    }
  }

  if (braceCount > 0) {
    throw new LogTemplateError('There are too many "{" characters in the log format string');
  }

  return { logMessageFormat, expressions };
}

/**
 * Inverse of {@link splitLogExpressions}: puts each expression back in
 * braces where its `$N` reference appears and unescapes `$$`. References
 * past the end of `expressions` are left as they are.
 */
export function mergeLogExpressions(logMessageFormat: string, expressions: string[]): string {
  return logMessageFormat
    .split('$$')
    .map((segment) =>
      segment.replace(/\$(\d+)/g, (token: string, digits: string) => {
        const index = Number(digits);
        return index < expressions.length ? `{${expressions[index]}}` : token;
      })
    )
    .join('$');
}
