import type { LookupTables, TemplateValue } from './types.js';
import { type Rng, mathRandom } from './random.js';
import { type ProviderContext, createGeneratorProvider, matchProvider } from './providers.js';

export interface ResolverOptions {
  rng?: Rng;
  clock?: () => Date;
}

const TABLE_ORDER = ['variables', 'generators', 'datasets', 'ranges'] as const;

const WHOLE_REFERENCE = /^\$\{([^{}]+)\}$/;
const VARIABLE_REFERENCE = /\$\{([^{}]+)\}/g;
const INLINE_TAG = /\$(?:random|range|lorem)\{[^{}]*\}|\$(?:uuid|now)\b/g;

function render(value: TemplateValue): string {
  if (typeof value === 'string') return value;
  if (value === null || typeof value !== 'object') return String(value);
  return JSON.stringify(value);
}

/**
 * Turns raw configuration values into concrete request data.
 *
 * Every call walks the input and builds a new structure; dynamic tags are
 * evaluated once per occurrence, so resolving the same template twice can
 * give different values.
 */
export class TemplateResolver {
  private readonly ctx: ProviderContext;

  constructor(tables: LookupTables, options: ResolverOptions = {}) {
    this.ctx = {
      tables,
      rng: options.rng ?? mathRandom,
      clock: options.clock,
    };
  }

  resolve(value: TemplateValue): TemplateValue {
    if (Array.isArray(value)) {
      return value.map(item => this.resolve(item));
    }
    if (value !== null && typeof value === 'object') {
      const resolved: { [key: string]: TemplateValue } = {};
      for (const [key, item] of Object.entries(value)) {
        resolved[key] = this.resolve(item);
      }
      return resolved;
    }
    if (typeof value === 'string') {
      return this.resolveString(value);
    }
    return value;
  }

  /** Resolves a template and renders the result as text. */
  resolveText(value: TemplateValue): string {
    return render(this.resolve(value));
  }

  /**
   * Finds `name` in variables, generators, datasets and ranges, in that
   * order. Generator entries are evaluated rather than returned as-is.
   */
  lookup(name: string): TemplateValue | undefined {
    for (const table of TABLE_ORDER) {
      const entries = this.ctx.tables[table];
      if (!Object.hasOwn(entries, name)) continue;

      const entry = entries[name];
      if (table === 'generators') {
        return createGeneratorProvider(entry, this.ctx).resolve();
      }
      return structuredClone(entry);
    }
    return undefined;
  }

  private resolveString(value: string): TemplateValue {
    const provider = matchProvider(value, this.ctx);
    if (provider && provider.kind !== 'literal') {
      return provider.resolve();
    }

    const whole = WHOLE_REFERENCE.exec(value);
    if (whole) {
      return this.lookup(whole[1].trim()) ?? value;
    }

    if (!value.includes('$')) {
      return value;
    }

    const expanded = value.replace(INLINE_TAG, tag => {
      const inline = matchProvider(tag, this.ctx);
      return inline && inline.kind !== 'literal' ? render(inline.resolve()) : tag;
    });

    return expanded.replace(VARIABLE_REFERENCE, (placeholder, name: string) => {
      const found = this.lookup(name.trim());
      return found === undefined ? placeholder : render(found);
    });
  }
}
