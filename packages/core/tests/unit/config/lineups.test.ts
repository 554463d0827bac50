import { describe, expect, it } from 'vitest';
import { buildLineup, isLineupName } from '../../../src/config/lineups.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('buildLineup', () => {
  it('builds the mixed lineup', () => {
    const agents = buildLineup('mixed');
    expect(agents.map((a) => [a.name, a.role, a.provider, a.modelId])).toEqual([
      ['Claude FOR', 'FOR', 'claude', 'claude-haiku-4-5-20251001'],
      ['Gemini AGAINST', 'AGAINST', 'gemini', 'gemini-2.5-flash'],
      ['Claude SYNTHESIS', 'SYNTHESIS', 'claude', 'claude-haiku-4-5-20251001'],
    ]);
  });

  it('uses one provider for the single-provider lineups', () => {
    expect(buildLineup('claude').map((a) => a.modelName)).toEqual(['haiku', 'haiku', 'haiku']);
    expect(buildLineup('gemini').map((a) => a.name)).toEqual([
      'Gemini FOR',
      'Gemini AGAINST',
      'Gemini SYNTHESIS',
    ]);
  });

  it('applies agent defaults to every seat', () => {
    const agents = buildLineup('claude', { temperature: 0.2, maxTokens: 500, timeoutSeconds: 30 });
    for (const agent of agents) {
      expect(agent).toMatchObject({ temperature: 0.2, maxTokens: 500, timeoutSeconds: 30 });
    }
  });

  it('rejects an unknown lineup', () => {
    expect(() => buildLineup('openai')).toThrow(ConfigError);
    expect(() => buildLineup('openai')).toThrow('Unknown lineup "openai". Expected one of: claude, gemini, mixed');
  });
});

describe('isLineupName', () => {
  it('ignores inherited keys', () => {
    expect(isLineupName('mixed')).toBe(true);
    expect(isLineupName('constructor')).toBe(false);
  });
});
