/**
 * Observer protocol tests.
 */

import { describe, expect, it } from 'vitest';
import { ArrayLineSource, BufferedLineSink } from '../../../src/io/line-io.js';
import { runObserverScenario } from '../../../src/scenarios/observer-scenario.js';
import type { ScenarioOptions } from '../../../src/scenarios/types.js';
import { ErrorCode } from '../../../src/types/error-type.js';

function run(text: string, options: ScenarioOptions = {}) {
  const sink = new BufferedLineSink();
  const outcome = runObserverScenario(ArrayLineSource.fromText(text), sink, options);
  return { outcome, lines: sink.lines };
}

describe('runObserverScenario', () => {
  it('prints every participant for every advance, in registration order', () => {
    const { outcome, lines } = run('2\nAmy\nBob\n3\n');

    expect(outcome).toEqual({ status: 'completed', skipped: 0 });
    expect(lines).toEqual(['Amy 1', 'Bob 1', 'Amy 2', 'Bob 2', 'Amy 3', 'Bob 3']);
  });

  it('accepts names on one line and ignores trigger tokens', () => {
    const { lines } = run('3 Zoe Amy Max\n1\ntick\n');

    expect(lines).toEqual(['Zoe 1', 'Amy 1', 'Max 1']);
  });

  it('wraps past midnight', () => {
    const { lines } = run('1\nAmy\n25\n');

    expect(lines.slice(-3)).toEqual(['Amy 23', 'Amy 0', 'Amy 1']);
    expect(lines).toHaveLength(25);
  });

  it('prints nothing with zero participants or zero updates', () => {
    expect(run('0\n5\n').lines).toEqual([]);
    expect(run('1\nAmy\n0\n').lines).toEqual([]);
  });

  it('halts with Invalid input on a non-numeric count', () => {
    const { outcome, lines } = run('two\nAmy\nBob\n3\n');

    expect(lines).toEqual(['Invalid input']);
    expect(outcome.status).toBe('halted');
  });

  it('halts when names run out', () => {
    const { outcome, lines } = run('3\nAmy\nBob\n');

    expect(lines).toEqual(['Invalid input']);
    expect(outcome.status === 'halted' && outcome.error.code).toBe(ErrorCode.MALFORMED_INPUT);
  });

  it('halts when the update count is missing', () => {
    expect(run('1\nAmy\n').lines).toEqual(['Invalid input']);
  });

  it('halts on a duplicate name by default', () => {
    const { outcome, lines } = run('2\nAmy\nAmy\n1\n');

    expect(lines).toEqual(['Invalid input']);
    expect(outcome.status === 'halted' && outcome.error.code).toBe(ErrorCode.DUPLICATE_PARTICIPANT);
  });

  it('lets a duplicate replace the earlier participant when configured to', () => {
    const { outcome, lines } = run('2\nAmy\nAmy\n1\n', { duplicatePolicy: 'replace' });

    expect(outcome.status).toBe('completed');
    expect(lines).toEqual(['Amy 1']);
  });
});
