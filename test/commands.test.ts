import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  CommandError,
  expectBreakpoint,
  renderLogpoint,
  renderLogpointList,
  renderSnapshot,
  renderSnapshotList,
  selectBreakpoints,
} from '../src/cli/commands';

const RULE = '-'.repeat(80);

function header(title: string): string[] {
  return ['', RULE, `| ${title}`, RULE, ''];
}

function completedSnapshot(): Record<string, unknown> {
  return {
    id: 'b-1649962215',
    action: 'CAPTURE',
    isFinalState: true,
    location: { path: 'index.js', line: 26 },
    createTimeUnixMsec: 1649962215426,
    finalTimeUnixMsec: 1649962230637,
    expressions: ['a'],
    evaluatedExpressions: [{ name: 'a', value: '1' }],
    stackFrames: [
      { function: 'main', location: { path: 'index.js', line: 26 }, locals: [{ name: 'b', value: '2' }] },
      { function: 'start', location: { path: 'boot.js', line: 3 }, arguments: [{ name: 'argv', value: '[]' }] },
    ],
  };
}

const SUMMARY = [
  ...header('Summary'),
  'Location:    index.js:26',
  'Condition:   No condition set',
  'Expressions: ["a"]',
  'Status:      Complete',
  'Create Time: 2022-04-14T18:50:15.426000Z',
  'Final Time:  2022-04-14T18:50:30.637000Z',
];

describe('expectBreakpoint', () => {
  it('should return the normalized breakpoint', () => {
    const snapshot = expectBreakpoint(completedSnapshot(), 'CAPTURE');
    assert.strictEqual(snapshot.userEmail, 'unknown');
    assert.strictEqual(snapshot.createTime, '2022-04-14T18:50:15.426000Z');
  });

  it('should reject a breakpoint of the other kind', () => {
    assert.throws(() => expectBreakpoint({ ...completedSnapshot(), action: 'LOG' }, 'CAPTURE'), {
      name: 'CommandError',
      message: 'Snapshot not found: input is a breakpoint with action LOG',
    });
  });

  it('should reject an invalid document', () => {
    assert.throws(() => expectBreakpoint({ id: 'b-1' }, 'LOG'), {
      message: 'Logpoint not found: input is an invalid breakpoint',
    });
  });
});

describe('renderSnapshot', () => {
  it('should show summary, expressions, locals and call stack for the top frame', () => {
    const lines = renderSnapshot(expectBreakpoint(completedSnapshot(), 'CAPTURE'), { frameIndex: 0, maxLevel: 3 });

    assert.deepStrictEqual(lines, [
      ...SUMMARY,
      ...header('Evaluated Expressions'),
      '[\n  {\n    "a": "1"\n  }\n]',
      ...header('Local Variables For Stack Frame Index 0:'),
      '[\n  {\n    "b": "2"\n  }\n]',
      ...header('CallStack:'),
      'Function  Location   \n' +
        '--------  -----------\n' +
        'main      index.js:26\n' +
        'start     boot.js:3  \n',
    ]);
  });

  it('should show only the locals of another frame', () => {
    const lines = renderSnapshot(expectBreakpoint(completedSnapshot(), 'CAPTURE'), { frameIndex: 1, maxLevel: 3 });

    assert.deepStrictEqual(lines, [
      ...header('Local Variables For Stack Frame Index 1:'),
      '[\n  {\n    "argv": "[]"\n  }\n]',
    ]);
  });

  it('should say when there are no expressions or locals', () => {
    const snapshot = { ...completedSnapshot(), evaluatedExpressions: [], stackFrames: [{ function: 'main' }] };
    const lines = renderSnapshot(expectBreakpoint(snapshot, 'CAPTURE'), { frameIndex: 0, maxLevel: 3 });

    assert.strictEqual(lines[SUMMARY.length + 5], 'There were no expressions specified.');
    assert.strictEqual(lines[SUMMARY.length + 11], 'There are no local variables.');
  });

  it('should stop after the summary of an active snapshot', () => {
    const snapshot = { ...completedSnapshot(), isFinalState: false, finalTimeUnixMsec: undefined };
    const lines = renderSnapshot(expectBreakpoint(snapshot, 'CAPTURE'), { frameIndex: 0, maxLevel: 3 });

    assert.deepStrictEqual(lines.slice(5), [
      'Location:    index.js:26',
      'Condition:   No condition set',
      'Expressions: ["a"]',
      'Status:      Active',
      'Create Time: 2022-04-14T18:50:15.426000Z',
      'Final Time:  ',
    ]);
  });

  it('should show the error of a failed snapshot and stop', () => {
    const snapshot = {
      ...completedSnapshot(),
      status: {
        isError: true,
        refersTo: 'BREAKPOINT_SOURCE_LOCATION',
        description: { format: 'No code found at line $0', parameters: ['26'] },
      },
    };
    const lines = renderSnapshot(expectBreakpoint(snapshot, 'CAPTURE'), { frameIndex: 0, maxLevel: 3 });

    assert.strictEqual(lines.length, SUMMARY.length);
    assert.strictEqual(
      lines[8],
      'Status:      ERROR: No code found at line 26 (refers to: BREAKPOINT_SOURCE_LOCATION)'
    );
  });

  it('should show an expiry message without the error prefix', () => {
    const snapshot = {
      ...completedSnapshot(),
      status: { isError: true, refersTo: 'BREAKPOINT_AGE', description: { format: 'The snapshot has expired' } },
    };
    const lines = renderSnapshot(expectBreakpoint(snapshot, 'CAPTURE'), { frameIndex: 0, maxLevel: 3 });

    assert.strictEqual(lines[8], 'Status:      The snapshot has expired');
  });

  it('should reject a frame index past the end of the stack', () => {
    assert.throws(
      () => renderSnapshot(expectBreakpoint(completedSnapshot(), 'CAPTURE'), { frameIndex: 2, maxLevel: 3 }),
      (error: unknown) =>
        error instanceof CommandError &&
        error.message === 'Stack frame index 2 too big, there are only 2 stack frames.'
    );
  });
});

describe('renderLogpoint', () => {
  it('should describe the logpoint', () => {
    const logpoint = expectBreakpoint(
      {
        id: 'b-1649962216',
        action: 'LOG',
        location: { path: 'index.js', line: 27 },
        logMessageFormat: 'b: $0',
        expressions: ['b'],
        logLevel: 'WARNING',
        createTimeUnixMsec: 1649962216426,
        isFinalState: false,
        userEmail: 'user_b@example.com',
      },
      'LOG'
    );

    assert.deepStrictEqual(renderLogpoint(logpoint), [
      'Logpoint ID:        b-1649962216',
      'Log Message Format: b: {b}',
      'Location:           index.js:27',
      'Condition:          No condition set',
      'Status:             ACTIVE',
      'Create Time:        2022-04-14T18:50:16.426000Z',
      'Final Time:         ',
      'User Email:         user_b@example.com',
    ]);
  });
});

describe('selectBreakpoints', () => {
  const stored = {
    'b-1': { action: 'CAPTURE', location: { path: 'a.js', line: 1 }, userEmail: 'one@example.com' },
    'b-2': { action: 'CAPTURE', location: { path: 'a.js', line: 2 }, isFinalState: true },
    'b-3': { action: 'LOG', location: { path: 'a.js', line: 3 }, logMessageFormat: 'x' },
    'b-4': { action: 'CAPTURE' },
  };

  it('should keep active breakpoints of the requested kind', () => {
    const ids = selectBreakpoints(stored, { action: 'CAPTURE' }).map((bp) => bp.id);
    assert.deepStrictEqual(ids, ['b-1']);
  });

  it('should include completed breakpoints on request', () => {
    const ids = selectBreakpoints(stored, { action: 'CAPTURE', includeInactive: true }).map((bp) => bp.id);
    assert.deepStrictEqual(ids, ['b-1', 'b-2']);
  });

  it('should filter by user', () => {
    const ids = selectBreakpoints(stored, { action: 'CAPTURE', includeInactive: true, userEmail: 'unknown' }).map(
      (bp) => bp.id
    );
    assert.deepStrictEqual(ids, ['b-2']);
  });

  it('should accept an array of breakpoints', () => {
    const ids = selectBreakpoints([{ id: 'b-9', action: 'LOG', location: { path: 'a.js', line: 9 } }], {
      action: 'LOG',
    }).map((bp) => bp.id);
    assert.deepStrictEqual(ids, ['b-9']);
  });

  it('should return nothing for other values', () => {
    assert.deepStrictEqual(selectBreakpoints(null, { action: 'LOG' }), []);
  });
});

describe('list rendering', () => {
  it('should tabulate snapshots', () => {
    const snapshots = selectBreakpoints(
      { 'b-2': { location: { path: 'a.js', line: 2 }, isFinalState: true, finalTimeUnixMsec: 1649962230637 } },
      { action: 'CAPTURE', includeInactive: true }
    );

    assert.strictEqual(
      renderSnapshotList(snapshots),
      'Status     Location  Condition  CompletedTime                ID \n' +
        '---------  --------  ---------  ---------------------------  ---\n' +
        'COMPLETED  a.js:2               2022-04-14T18:50:30.637000Z  b-2\n'
    );
  });

  it('should print an id that is not a string', () => {
    const snapshots = selectBreakpoints([{ id: 17, location: { path: 'a.js', line: 3 } }], { action: 'CAPTURE' });

    assert.strictEqual(
      renderSnapshotList(snapshots),
      'Status  Location  Condition  CompletedTime  ID\n' +
        '------  --------  ---------  -------------  --\n' +
        'ACTIVE  a.js:3                              17\n'
    );
  });

  it('should print logpoint fields that are not strings', () => {
    const logpoints = selectBreakpoints(
      [{ id: 'b-5', action: 'LOG', location: { path: 'a.js', line: 5 }, logLevel: 3, condition: true, logMessageFormat: 7 }],
      { action: 'LOG' }
    );

    assert.strictEqual(
      renderLogpointList(logpoints),
      'User Email  Location  Condition  Log Level  Log Message Format  ID   Status\n' +
        '----------  --------  ---------  ---------  ------------------  ---  ------\n' +
        'unknown     a.js:5    true       3                              b-5  ACTIVE\n'
    );
  });

  it('should tabulate logpoints', () => {
    const logpoints = selectBreakpoints(
      {
        'b-3': {
          action: 'LOG',
          location: { path: 'a.js', line: 3 },
          logMessageFormat: 'x=$0',
          expressions: ['x'],
          userEmail: 'u@example.com',
          condition: 'x > 1',
        },
      },
      { action: 'LOG' }
    );

    assert.strictEqual(
      renderLogpointList(logpoints),
      'User Email     Location  Condition  Log Level  Log Message Format  ID   Status\n' +
        '-------------  --------  ---------  ---------  ------------------  ---  ------\n' +
        'u@example.com  a.js:3    x > 1      INFO       x={x}               b-3  ACTIVE\n'
    );
  });
});
