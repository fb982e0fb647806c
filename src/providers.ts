import { v4 as uuidv4 } from 'uuid';
import type { LookupTables, TemplateMap, TemplateValue } from './types.js';
import { type Rng, pick, randomBytes, randomFloat, randomInt } from './random.js';

export type ProviderKind =
  | 'literal'
  | 'integer'
  | 'float'
  | 'choice'
  | 'weighted'
  | 'uuid'
  | 'now'
  | 'lorem'
  | 'string'
  | 'email'
  | 'boolean';

/**
 * Produces one value per call. Providers never cache a previous result, and
 * values drawn from configuration tables are copies, never the table's own
 * objects.
 */
export interface ValueProvider {
  readonly kind: ProviderKind;
  resolve(): TemplateValue;
}

export interface ProviderContext {
  rng: Rng;
  tables: LookupTables;
  clock?: () => Date;
}

export interface WeightedChoice {
  value: TemplateValue;
  weight: number;
}

const LOREM_WORDS = [
  'lorem', 'ipsum', 'dolor', 'sit', 'amet', 'consectetur', 'adipiscing', 'elit',
  'sed', 'do', 'eiusmod', 'tempor', 'incididunt', 'ut', 'labore', 'et', 'dolore',
  'magna', 'aliqua', 'enim', 'ad', 'minim', 'veniam', 'quis', 'nostrud',
  'exercitation', 'ullamco', 'laboris', 'nisi', 'aliquip',
];

const DEFAULT_CHARS = 'abcdefghijklmnopqrstuvwxyz0123456789';
const EMAIL_DOMAINS = ['example.com', 'example.org', 'example.net'];

const TAG_PATTERN = /^\$([A-Za-z_]+)(?:\{([^{}]*)\})?$/;
const NUMERIC_PATTERN = /^[-+]?(?:\d+\.?\d*|\.\d+)$/;

export function isTemplateMap(value: TemplateValue | undefined): value is TemplateMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Provider variants
// ============================================================================

export function literalProvider(value: TemplateValue): ValueProvider {
  return { kind: 'literal', resolve: () => structuredClone(value) };
}

export function integerProvider(rng: Rng, min: number, max: number): ValueProvider {
  return { kind: 'integer', resolve: () => randomInt(rng, min, max) };
}

export function floatProvider(rng: Rng, min: number, max: number, decimals = 2): ValueProvider {
  return { kind: 'float', resolve: () => randomFloat(rng, min, max, decimals) };
}

export function steppedProvider(rng: Rng, min: number, max: number, step: number): ValueProvider {
  const steps = Math.floor((max - min) / step);
  return { kind: 'integer', resolve: () => min + step * randomInt(rng, 0, steps) };
}

export function choiceProvider(rng: Rng, values: readonly TemplateValue[]): ValueProvider {
  return { kind: 'choice', resolve: () => structuredClone(pick(rng, values)) };
}

export function weightedProvider(rng: Rng, choices: readonly WeightedChoice[]): ValueProvider {
  const total = choices.reduce((sum, c) => sum + c.weight, 0);
  return {
    kind: 'weighted',
    resolve: () => {
      let target = rng.next() * total;
      for (const choice of choices) {
        target -= choice.weight;
        if (target < 0) return structuredClone(choice.value);
      }
      return structuredClone(choices[choices.length - 1].value);
    },
  };
}

export function uuidProvider(rng: Rng): ValueProvider {
  return { kind: 'uuid', resolve: () => uuidv4({ random: randomBytes(rng, 16) }) };
}

export function nowProvider(clock: () => Date = () => new Date()): ValueProvider {
  return { kind: 'now', resolve: () => clock().toISOString() };
}

export function loremProvider(rng: Rng, count: number): ValueProvider {
  return {
    kind: 'lorem',
    resolve: () => Array.from({ length: count }, () => pick(rng, LOREM_WORDS)).join(' '),
  };
}

export function stringProvider(rng: Rng, length: number, chars = DEFAULT_CHARS): ValueProvider {
  const alphabet = Array.from(chars);
  return {
    kind: 'string',
    resolve: () => Array.from({ length }, () => pick(rng, alphabet)).join(''),
  };
}

export function emailProvider(rng: Rng): ValueProvider {
  const local = stringProvider(rng, 10);
  return {
    kind: 'email',
    resolve: () => `${String(local.resolve())}@${pick(rng, EMAIL_DOMAINS)}`,
  };
}

export function booleanProvider(rng: Rng): ValueProvider {
  return { kind: 'boolean', resolve: () => rng.next() < 0.5 };
}

// ============================================================================
// Tag matching
// ============================================================================

/**
 * Selects the provider for a template string.
 *
 * Returns `undefined` for anything that is not a dynamic tag: non-strings,
 * strings without a leading `$`, and `${name}` variable references. A string
 * with a leading `$` that matches no known tag gets a literal provider that
 * hands the original text back.
 */
export function matchProvider(value: TemplateValue, ctx: ProviderContext): ValueProvider | undefined {
  if (typeof value !== 'string' || !value.startsWith('$') || value.startsWith('${')) {
    return undefined;
  }

  const match = TAG_PATTERN.exec(value);
  if (!match) {
    return literalProvider(value);
  }

  const tag = match[1];
  const args: string | undefined = match[2];
  const provider = args === undefined ? matchBareTag(tag, ctx) : matchArgTag(tag, args, ctx);
  return provider ?? literalProvider(value);
}

function matchBareTag(tag: string, ctx: ProviderContext): ValueProvider | undefined {
  switch (tag) {
    case 'uuid':
      return uuidProvider(ctx.rng);
    case 'now':
      return nowProvider(ctx.clock);
    default:
      return undefined;
  }
}

function matchArgTag(tag: string, args: string, ctx: ProviderContext): ValueProvider | undefined {
  switch (tag) {
    case 'random':
      return matchRandom(args, ctx);
    case 'range':
      return matchRange(args, ctx);
    case 'lorem': {
      const count = args.trim();
      return /^\d+$/.test(count) ? loremProvider(ctx.rng, parseInt(count, 10)) : undefined;
    }
    default:
      return undefined;
  }
}

function splitTokens(args: string): string[] {
  return args.split(',').map(token => token.trim());
}

function numericRange(rng: Rng, low: string, high: string): ValueProvider {
  if (low.includes('.') || high.includes('.')) {
    return floatProvider(rng, parseFloat(low), parseFloat(high));
  }
  return integerProvider(rng, parseInt(low, 10), parseInt(high, 10));
}

function matchRandom(args: string, ctx: ProviderContext): ValueProvider | undefined {
  if (args.trim() === '') return undefined;
  const tokens = splitTokens(args);

  if (tokens.length === 2 && tokens.every(t => NUMERIC_PATTERN.test(t))) {
    return numericRange(ctx.rng, tokens[0], tokens[1]);
  }

  if (tokens.length === 1) {
    const [name] = tokens;
    const generator = ctx.tables.generators[name];
    if (generator !== undefined) {
      return createGeneratorProvider(generator, ctx);
    }
    const dataset = ctx.tables.datasets[name];
    if (Array.isArray(dataset) && dataset.length > 0) {
      return choiceProvider(ctx.rng, dataset);
    }
  }

  return choiceProvider(ctx.rng, tokens);
}

function matchRange(args: string, ctx: ProviderContext): ValueProvider | undefined {
  const tokens = splitTokens(args);

  if (tokens.length === 2 && tokens.every(t => NUMERIC_PATTERN.test(t))) {
    return numericRange(ctx.rng, tokens[0], tokens[1]);
  }

  if (tokens.length === 1) {
    const bounds = ctx.tables.ranges[tokens[0]];
    if (isTemplateMap(bounds)) {
      return namedRange(bounds, ctx.rng);
    }
  }
  return undefined;
}

function namedRange(bounds: TemplateMap, rng: Rng): ValueProvider | undefined {
  const { min, max, step } = bounds;
  if (typeof min !== 'number' || typeof max !== 'number') return undefined;

  if (typeof step === 'number' && step > 0) {
    return steppedProvider(rng, min, max, step);
  }
  if (Number.isInteger(min) && Number.isInteger(max)) {
    return integerProvider(rng, min, max);
  }
  return floatProvider(rng, min, max);
}

// ============================================================================
// Generator definitions
// ============================================================================

function numberField(def: TemplateMap, key: string, fallback: number): number {
  const value = def[key];
  return typeof value === 'number' ? value : fallback;
}

function weightedChoices(raw: TemplateValue | undefined): WeightedChoice[] {
  if (!Array.isArray(raw)) return [];
  const choices: WeightedChoice[] = [];
  for (const entry of raw) {
    if (isTemplateMap(entry) && entry.value !== undefined) {
      const weight = typeof entry.weight === 'number' ? entry.weight : 1;
      if (weight > 0) choices.push({ value: entry.value, weight });
    }
  }
  return choices;
}

/**
 * Compiles a `generators` table entry such as
 * `{ type: 'randint', min: 1, max: 10 }` into a provider.
 * Entries without a recognised `type` are served as literals.
 */
export function createGeneratorProvider(def: TemplateValue, ctx: ProviderContext): ValueProvider {
  if (!isTemplateMap(def) || typeof def.type !== 'string') {
    return literalProvider(def);
  }

  const { rng } = ctx;

  switch (def.type) {
    case 'choice':
      return Array.isArray(def.values) && def.values.length > 0
        ? choiceProvider(rng, def.values)
        : literalProvider(def);
    case 'randint':
      return integerProvider(rng, numberField(def, 'min', 0), numberField(def, 'max', 100));
    case 'random_float':
    case 'float':
      return floatProvider(
        rng,
        numberField(def, 'min', 0),
        numberField(def, 'max', 1),
        numberField(def, 'decimals', 2),
      );
    case 'string':
      return stringProvider(
        rng,
        numberField(def, 'length', 10),
        typeof def.chars === 'string' && def.chars.length > 0 ? def.chars : DEFAULT_CHARS,
      );
    case 'email':
      return emailProvider(rng);
    case 'boolean':
      return booleanProvider(rng);
    case 'timestamp':
    case 'now':
      return nowProvider(ctx.clock);
    case 'uuid':
      return uuidProvider(rng);
    case 'lorem':
      return loremProvider(rng, numberField(def, 'words', 10));
    case 'weighted_choice': {
      const choices = weightedChoices(def.choices);
      return choices.length > 0 ? weightedProvider(rng, choices) : literalProvider(def);
    }
    case 'static':
      return literalProvider(def.value ?? null);
    default:
      return literalProvider(def);
  }
}
