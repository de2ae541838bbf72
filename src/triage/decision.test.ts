import { describe, it, expect } from '@jest/globals';
import { ConfigError } from '../config/index.js';
import { normalizeDecision, parseDecision, resolveDecisionMode } from './decision.js';

describe('parseDecision', () => {
  it.each([
    ['k', 'keep'],
    ['KEEP', 'keep'],
    [' r ', 'remove'],
    ['Remove', 'remove'],
    ['s', 'skip'],
    ['skip\n', 'skip'],
  ])('parses %j as %s', (input, expected) => {
    expect(parseDecision(input)).toBe(expected);
  });

  it.each(['', 'o', 'delete', 'constructor', 'kk'])('rejects %j', (input) => {
    expect(parseDecision(input)).toBeNull();
  });
});

describe('normalizeDecision', () => {
  it('returns the canonical decision', () => {
    expect(normalizeDecision('R')).toBe('remove');
  });

  it('throws a ConfigError for anything else', () => {
    expect(() => normalizeDecision('archive')).toThrow(ConfigError);
    expect(() => normalizeDecision('archive')).toThrow(
      "Unsupported automatic decision 'archive' (expected keep, remove, skip or k, r, s)"
    );
  });
});

describe('resolveDecisionMode', () => {
  const disabled = { enabled: false, default: 'keep' };

  it('is interactive without override or automatic mode', () => {
    expect(resolveDecisionMode({ autoDecision: disabled })).toEqual({ kind: 'interactive' });
  });

  it('uses the configured default when automatic mode is enabled', () => {
    expect(resolveDecisionMode({ autoDecision: { enabled: true, default: 'S' } })).toEqual({
      kind: 'fixed',
      decision: 'skip',
      source: 'config',
    });
  });

  it('prefers the per-run override', () => {
    expect(
      resolveDecisionMode({
        decisionOverride: 'remove',
        autoDecision: { enabled: true, default: 'keep' },
      })
    ).toEqual({ kind: 'fixed', decision: 'remove', source: 'override' });
  });

  it('ignores a bad configured default when the override applies', () => {
    expect(
      resolveDecisionMode({
        decisionOverride: 'keep',
        autoDecision: { enabled: true, default: 'bogus' },
      })
    ).toEqual({ kind: 'fixed', decision: 'keep', source: 'override' });
  });

  it('fails on an unrecognized configured default', () => {
    expect(() => resolveDecisionMode({ autoDecision: { enabled: true, default: 'maybe' } })).toThrow(
      ConfigError
    );
  });

  it('ignores the configured default while automatic mode is off', () => {
    expect(resolveDecisionMode({ autoDecision: { enabled: false, default: 'maybe' } })).toEqual({
      kind: 'interactive',
    });
  });
});
