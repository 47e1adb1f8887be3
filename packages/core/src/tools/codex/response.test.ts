import { describe, expect, it } from 'vitest';
import { ExecutionCancelledError, ProcessExitError } from '../../utils/errors';
import { describeTaskFailure, describeTaskOutput } from './response';

describe('describeTaskOutput', () => {
  it('returns the agent output', () => {
    expect(describeTaskOutput({ output: 'All good', errorMessages: ['ignored'] })).toBe('All good');
  });

  it('lists errors when there is no output', () => {
    expect(describeTaskOutput({ output: '', errorMessages: ['rate limited', 'retry failed'] })).toBe(
      '❌ **Task failed with errors:**\n\n1. rate limited\n2. retry failed\n'
    );
  });

  it('reports an empty run', () => {
    expect(describeTaskOutput({ output: '', errorMessages: [] })).toBe('✅ Task completed (no output)');
  });
});

describe('describeTaskFailure', () => {
  it('reports cancellation plainly', () => {
    expect(describeTaskFailure(new ExecutionCancelledError(), ['x'])).toBe('⚠️ Task was canceled');
  });

  it('appends the agent error list', () => {
    expect(describeTaskFailure(new ProcessExitError(1, null), ['quota exceeded'])).toBe(
      '❌ Error executing task: codex exited with exit status 1\n\n**Errors:**\n1. quota exceeded\n'
    );
  });

  it('omits the list when empty', () => {
    expect(describeTaskFailure('boom')).toBe('❌ Error executing task: boom');
  });

  it('hides source locations', () => {
    expect(describeTaskFailure(new Error('Error: broke at /srv/triage/src/run.ts:42'))).toBe(
      '❌ Error executing task: broke at [source]'
    );
  });
});
