import { OPTIONAL_SELECTOR_NAMES, REQUIRED_SELECTOR_NAMES, formatIssues, selectorMapSchema } from "./contracts.js";
import { ConfigurationError } from "./errors.js";
import type { LocatorDescriptor, ResolvedLocator } from "./types.js";

const PLACEHOLDER = /\{([a-zA-Z][a-zA-Z0-9_]*)\}/g;

const KNOWN_NAMES = new Set<string>([...REQUIRED_SELECTOR_NAMES, ...OPTIONAL_SELECTOR_NAMES]);

/**
 * Symbolic element names mapped to locator descriptors.
 *
 * Immutable once constructed. Portal UI changes are absorbed by editing the
 * configured map, never the code that drives the portal.
 */
export class SelectorMap {
  private readonly entries: ReadonlyMap<string, Readonly<LocatorDescriptor>>;

  private constructor(entries: Map<string, LocatorDescriptor>) {
    for (const descriptor of entries.values()) {
      Object.freeze(descriptor);
    }
    this.entries = entries;
    Object.freeze(this);
  }

  static from(raw: unknown): SelectorMap {
    const parsed = selectorMapSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid selector map: ${formatIssues(parsed.error)}`);
    }

    const entries = new Map<string, LocatorDescriptor>();
    for (const [name, descriptor] of Object.entries(parsed.data)) {
      if (descriptor) {
        entries.set(name, { ...descriptor });
      }
    }
    return new SelectorMap(entries);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort((left, right) => left.localeCompare(right));
  }

  resolve(name: string, params: Record<string, string> = {}): ResolvedLocator {
    if (!KNOWN_NAMES.has(name)) {
      throw new ConfigurationError(`Unknown selector name '${name}'`);
    }

    const descriptor = this.entries.get(name);
    if (!descriptor) {
      throw new ConfigurationError(`Selector '${name}' is not configured`);
    }

    const value = descriptor.value.replace(PLACEHOLDER, (_match, key: string) => {
      const replacement = params[key];
      if (replacement === undefined) {
        throw new ConfigurationError(`Selector '${name}' needs parameter '${key}'`);
      }
      return replacement;
    });

    return {
      name,
      strategy: descriptor.strategy,
      value,
      attribute: descriptor.attribute
    };
  }
}
