/**
 * Unit Tests: tag matching and the value provider variants.
 */
import { describe, it, expect } from 'vitest';
import { validate as isUuid } from 'uuid';
import {
  createGeneratorProvider,
  matchProvider,
  weightedProvider,
  type ProviderContext,
  type ValueProvider,
} from '../../src/providers.js';
import { createSeededRng } from '../../src/random.js';
import type { TemplateValue } from '../../src/types.js';

function context(seed = 42): ProviderContext {
  return {
    rng: createSeededRng(seed),
    tables: {
      variables: { item_id: 12345 },
      generators: {
        search_term: { type: 'choice', values: ['test', 'demo', 'query'] },
      },
      datasets: {
        categories: ['Electronics', 'Books', 'Home'],
      },
      ranges: {
        user_age: { min: 18, max: 80 },
        price_range: { min: 10, max: 1000, step: 50 },
        broken: { min: 'low', max: 5 },
      },
    },
  };
}

function provider(template: TemplateValue, ctx = context()): ValueProvider {
  const match = matchProvider(template, ctx);
  if (!match) throw new Error(`no provider for ${String(template)}`);
  return match;
}

function samples(p: ValueProvider, count: number): TemplateValue[] {
  return Array.from({ length: count }, () => p.resolve());
}

function decimalPlaces(value: number): number {
  const [, fraction = ''] = String(value).split('.');
  return fraction.length;
}

describe('matchProvider: not a template', () => {
  const nonStrings: TemplateValue[] = [42, true, null, ['$uuid'], { id: '$uuid' }];

  it('ignores non-string values', () => {
    for (const value of nonStrings) {
      expect(matchProvider(value, context())).toBeUndefined();
    }
  });

  it('ignores strings without a leading $', () => {
    expect(matchProvider('plain text', context())).toBeUndefined();
  });

  it('leaves ${name} references to the resolver', () => {
    expect(matchProvider('${item_id}', context())).toBeUndefined();
  });
});

describe('$random{a,b}', () => {
  it('gives integers within inclusive integer bounds', () => {
    const p = provider('$random{1,10}');
    expect(p.kind).toBe('integer');
    for (const value of samples(p, 1000)) {
      expect(typeof value).toBe('number');
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(1);
      expect(value).toBeLessThanOrEqual(10);
    }
  });

  it('gives floats with at most 2 decimals when a bound has a decimal point', () => {
    const p = provider('$random{10.0,1000}');
    expect(p.kind).toBe('float');
    for (const value of samples(p, 1000)) {
      expect(typeof value).toBe('number');
      const n = Number(value);
      expect(n).toBeGreaterThanOrEqual(10);
      expect(n).toBeLessThanOrEqual(1000);
      expect(decimalPlaces(n)).toBeLessThanOrEqual(2);
    }
  });

  it('picks among non-numeric tokens', () => {
    const p = provider('$random{red,green,blue}');
    expect(p.kind).toBe('choice');
    for (const value of samples(p, 100)) {
      expect(['red', 'green', 'blue']).toContain(value);
    }
  });

  it('trims whitespace around tokens', () => {
    const values = new Set(samples(provider('$random{ S , M }'), 100));
    expect(values).toEqual(new Set(['S', 'M']));
  });

  it('treats a numeric and a non-numeric token as a choice', () => {
    const p = provider('$random{1,many}');
    expect(p.kind).toBe('choice');
    for (const value of samples(p, 50)) {
      expect(['1', 'many']).toContain(value);
    }
  });

  it('uses a generator named by a single token', () => {
    for (const value of samples(provider('$random{search_term}'), 50)) {
      expect(['test', 'demo', 'query']).toContain(value);
    }
  });

  it('picks from a dataset named by a single token', () => {
    for (const value of samples(provider('$random{categories}'), 50)) {
      expect(['Electronics', 'Books', 'Home']).toContain(value);
    }
  });

  it('is a literal when empty', () => {
    const p = provider('$random{}');
    expect(p.kind).toBe('literal');
    expect(p.resolve()).toBe('$random{}');
  });
});

describe('$uuid and $now', () => {
  it('$uuid gives a fresh valid UUID per call', () => {
    const p = provider('$uuid');
    const first = p.resolve();
    const second = p.resolve();
    expect(typeof first).toBe('string');
    expect(isUuid(String(first))).toBe(true);
    expect(isUuid(String(second))).toBe(true);
    expect(first).not.toBe(second);
  });

  it('$now reads the clock at call time', () => {
    let ms = Date.UTC(2024, 0, 1);
    const ctx = { ...context(), clock: () => new Date(ms) };
    const p = provider('$now', ctx);
    expect(p.resolve()).toBe('2024-01-01T00:00:00.000Z');
    ms += 1500;
    expect(p.resolve()).toBe('2024-01-01T00:00:01.500Z');
  });

  it('$now is non-decreasing across calls', () => {
    const values = samples(provider('$now'), 50).map(v => Date.parse(String(v)));
    for (let i = 1; i < values.length; i++) {
      expect(values[i]).toBeGreaterThanOrEqual(values[i - 1]);
    }
  });

  it('a bare tag with arguments is a literal', () => {
    expect(provider('$uuid{4}').resolve()).toBe('$uuid{4}');
  });
});

describe('$lorem{N}', () => {
  it('gives exactly N words', () => {
    const value = provider('$lorem{10}').resolve();
    expect(String(value).split(' ')).toHaveLength(10);
  });

  it('gives an empty string for zero words', () => {
    expect(provider('$lorem{0}').resolve()).toBe('');
  });

  it('is a literal for a non-numeric count', () => {
    expect(provider('$lorem{many}').resolve()).toBe('$lorem{many}');
  });
});

describe('$range', () => {
  it('$range{min,max} gives integers within bounds', () => {
    const p = provider('$range{5,8}');
    expect(p.kind).toBe('integer');
    for (const value of samples(p, 200)) {
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(5);
      expect(value).toBeLessThanOrEqual(8);
    }
  });

  it('$range{name} reads bounds from the ranges table', () => {
    for (const value of samples(provider('$range{user_age}'), 200)) {
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(18);
      expect(value).toBeLessThanOrEqual(80);
    }
  });

  it('$range{name} honours a configured step', () => {
    for (const value of samples(provider('$range{price_range}'), 200)) {
      const n = Number(value);
      expect((n - 10) % 50).toBe(0);
      expect(n).toBeGreaterThanOrEqual(10);
      expect(n).toBeLessThanOrEqual(1000);
    }
  });

  it('is a literal for an unknown or malformed range', () => {
    expect(provider('$range{unknown}').resolve()).toBe('$range{unknown}');
    expect(provider('$range{broken}').resolve()).toBe('$range{broken}');
  });
});

describe('unrecognised tags', () => {
  it.each(['$custom{x}', '$foo', '$', '$random{1,2} extra'])('passes %s through unchanged', template => {
    const p = provider(template);
    expect(p.kind).toBe('literal');
    expect(p.resolve()).toBe(template);
  });
});

describe('createGeneratorProvider', () => {
  const ctx = context(11);

  it('randint', () => {
    const p = createGeneratorProvider({ type: 'randint', min: 1, max: 3 }, ctx);
    for (const value of samples(p, 100)) {
      expect([1, 2, 3]).toContain(value);
    }
  });

  it('string with a custom alphabet', () => {
    const p = createGeneratorProvider({ type: 'string', length: 8, chars: 'ab' }, ctx);
    expect(String(p.resolve())).toMatch(/^[ab]{8}$/);
  });

  it('email', () => {
    const p = createGeneratorProvider({ type: 'email' }, ctx);
    expect(String(p.resolve())).toMatch(/^[a-z0-9]{10}@example\.(com|org|net)$/);
  });

  it('boolean', () => {
    const values = new Set(samples(createGeneratorProvider({ type: 'boolean' }, ctx), 100));
    expect(values).toEqual(new Set([true, false]));
  });

  it('weighted_choice skips zero weights', () => {
    const p = createGeneratorProvider(
      {
        type: 'weighted_choice',
        choices: [
          { value: 'never', weight: 0 },
          { value: 'always', weight: 1 },
        ],
      },
      ctx,
    );
    expect(p.kind).toBe('weighted');
    expect(new Set(samples(p, 50))).toEqual(new Set(['always']));
  });

  it('static returns its value', () => {
    expect(createGeneratorProvider({ type: 'static', value: 'fixed' }, ctx).resolve()).toBe('fixed');
  });

  it('serves an unknown definition as a literal', () => {
    const def = { type: 'mystery', size: 3 };
    const p = createGeneratorProvider(def, ctx);
    expect(p.kind).toBe('literal');
    expect(p.resolve()).toEqual(def);
  });
});

describe('weightedProvider', () => {
  it('walks cumulative weights', () => {
    const rng = { next: () => 0.5 };
    const p = weightedProvider(rng, [
      { value: 'a', weight: 1 },
      { value: 'b', weight: 3 },
    ]);
    // 0.5 * 4 = 2 lands past the first weight
    expect(p.resolve()).toBe('b');
  });
});
