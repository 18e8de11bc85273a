import { describe, expect, test } from 'vitest';
import { s, validateAgainstSchema } from './schema';

const pullSchema = s.object(
  {
    source: s.string({ enum: ['huggingface', 'ollama'] }),
    repo: s.string({ min_length: 1, pattern: '^[\\w.-]+(/[\\w.-]+)?$' }),
    limit: s.number({ min: 1, max: 50 }),
    tags: s.array(s.string()),
    profile: s.object({ vram_min_gb: s.number({ min: 0 }) }, ['vram_min_gb']),
  },
  ['repo'],
);

describe('validateAgainstSchema', () => {
  test('accepts a valid value and ignores unknown fields', () => {
    expect(validateAgainstSchema(pullSchema, { repo: 'org/model', extra: true })).toEqual([]);
  });

  test('reports missing required fields', () => {
    expect(validateAgainstSchema(pullSchema, {})).toEqual([{ path: 'repo', message: 'is required' }]);
  });

  test('treats null on an optional field as absent', () => {
    expect(validateAgainstSchema(pullSchema, { repo: 'a', source: null })).toEqual([]);
  });

  test('checks enum, bounds, length and pattern', () => {
    const issues = validateAgainstSchema(pullSchema, { repo: 'a b', source: 'ftp', limit: 51 });
    expect(issues).toEqual([
      { path: 'source', message: 'must be one of: huggingface, ollama' },
      { path: 'repo', message: 'must match ^[\\w.-]+(/[\\w.-]+)?$' },
      { path: 'limit', message: 'must be <= 50' },
    ]);
  });

  test('walks array items and nested objects', () => {
    const issues = validateAgainstSchema(pullSchema, { repo: 'a', tags: ['x', 3], profile: {} });
    expect(issues).toEqual([
      { path: 'tags[1]', message: 'expected string, got number' },
      { path: 'profile.vram_min_gb', message: 'is required' },
    ]);
  });

  test('rejects a non-object input', () => {
    expect(validateAgainstSchema(pullSchema, [])).toEqual([{ path: 'input', message: 'expected object, got array' }]);
  });
});
