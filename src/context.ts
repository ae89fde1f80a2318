/**
 * Process-wide registry of shared services
 *
 * Services are registered by a typed ServiceKey while the ContextBuilder is open.
 * build() seals the registry: the resulting Context accepts no further values and is
 * shared read-only by every dispatched update.
 */

/**
 * Contexts still being filled by ContextBuilder.build(); only these accept values
 */
const openContexts = new WeakSet<Context>();

/**
 * A stable, typed tag for a service stored in a Context
 */
export class ServiceKey<T> {
  readonly #values = new WeakMap<Context, T>();

  constructor(readonly name: string) {}

  /** @internal */
  read(context: Context): T | undefined {
    return this.#values.get(context);
  }

  /** @internal */
  isBound(context: Context): boolean {
    return this.#values.has(context);
  }

  /**
   * @internal
   * Throws unless `context` is being built.
   */
  bind(context: Context, value: T): void {
    if (!openContexts.has(context)) {
      throw new Error(`Cannot register "${this.name}": context is already built`);
    }
    this.#values.set(context, value);
  }

  toString(): string {
    return `ServiceKey(${this.name})`;
  }
}

export function createServiceKey<T>(name: string): ServiceKey<T> {
  return new ServiceKey<T>(name);
}

export class Context {
  private readonly names: string[] = [];

  get<T>(key: ServiceKey<T>): T | undefined {
    return key.read(this);
  }

  has(key: ServiceKey<unknown>): boolean {
    return key.isBound(this);
  }

  /** Names of registered services, in registration order */
  keys(): string[] {
    return [...this.names];
  }

  /** @internal */
  register<T>(key: ServiceKey<T>, value: T): void {
    key.bind(this, value);
    this.names.push(key.name);
  }
}

interface PendingEntry {
  bind(context: Context): void;
}

export class ContextBuilder {
  private entries = new Map<object, PendingEntry>();
  private built = false;

  /**
   * Register a service. Registering the same key twice replaces the earlier value.
   */
  insert<T>(key: ServiceKey<T>, value: T): this {
    if (this.built) {
      throw new Error(`Cannot register "${key.name}": context is already built`);
    }
    this.entries.set(key, {
      bind: (context) => {
        context.register(key, value);
      },
    });
    return this;
  }

  build(): Context {
    this.built = true;
    const context = new Context();
    openContexts.add(context);
    try {
      for (const entry of this.entries.values()) {
        entry.bind(context);
      }
    } finally {
      openContexts.delete(context);
    }
    Object.freeze(context);
    return context;
  }
}
