/**
 * allocation-core - Dependency Registry
 *
 * A named mapping from capability name (`uow`, `notifications`, `publish`)
 * to the object implementing it. Built once per message bus at the
 * composition root and frozen; handlers receive only the entries they
 * declare.
 *
 * @module application/di/IDependencyInjection
 */

/**
 * Error thrown when a handler declares a capability the registry lacks.
 *
 * @remarks
 * Raised while the message bus binds its handlers, i.e. at construction
 * time, so a wiring bug never reaches message dispatch.
 *
 * Example dependency graph:
 * ```
 * sendOutOfStockNotification
 * ├─ uow (OK)
 * └─ notifications (UNREGISTERED)
 * ```
 */
export class DependencyResolutionError extends Error {
  /**
   * A string representation of the dependency graph leading to the failure.
   */
  public readonly dependencyGraph: string;

  /**
   * @param message - The error message describing the failure
   * @param dependencyGraph - Optional visual dependency graph for debugging
   */
  constructor(message: string, dependencyGraph: string = '') {
    super(message);
    this.name = 'DependencyResolutionError';
    this.dependencyGraph = dependencyGraph;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, DependencyResolutionError.prototype);
  }
}

function hasEntries<TDeps extends object, TKey extends keyof TDeps>(
  candidate: Partial<Pick<TDeps, TKey>>,
  names: readonly TKey[],
): candidate is Pick<TDeps, TKey> {
  return names.every((name) => Object.prototype.hasOwnProperty.call(candidate, name));
}

function buildGraph(requester: string, lines: readonly string[]): string {
  const branches = lines.map((line, index) =>
    index === lines.length - 1 ? `└─ ${line}` : `├─ ${line}`,
  );
  return [requester, ...branches].join('\n');
}

/**
 * Immutable capability registry.
 *
 * @template TDeps - Shape of the registry: capability name → implementation
 *
 * @example
 * ```typescript
 * const registry = new DependencyRegistry({
 *   uow,
 *   notifications: new EmailNotifications(config.smtp),
 *   publish: new RedisEventPublisher(redis),
 * });
 *
 * registry.resolve(['notifications'], 'sendOutOfStockNotification');
 * // { notifications: EmailNotifications }
 * ```
 */
export class DependencyRegistry<TDeps extends object> {
  private readonly entries: TDeps;

  constructor(entries: TDeps) {
    const copy = { ...entries };
    Object.freeze(copy);
    this.entries = copy;
  }

  /**
   * Registered capability names.
   */
  get names(): string[] {
    return Object.keys(this.entries);
  }

  has(name: keyof TDeps): boolean {
    return name in this.entries && this.entries[name] !== undefined;
  }

  get<TKey extends keyof TDeps>(name: TKey): TDeps[TKey] {
    if (!this.has(name)) {
      throw new DependencyResolutionError(`Dependency '${String(name)}' is not registered`);
    }
    return this.entries[name];
  }

  /**
   * Build the dependency object for one handler, holding exactly the
   * requested entries.
   *
   * @param names - Capability names the handler declares
   * @param requester - Handler name, for the error graph
   * @throws {DependencyResolutionError} If any name is not registered
   */
  resolve<TKey extends keyof TDeps>(
    names: readonly TKey[],
    requester: string,
  ): Pick<TDeps, TKey> {
    const resolved: Partial<Pick<TDeps, TKey>> = {};
    const missing: string[] = [];
    const graph: string[] = [];

    for (const name of names) {
      if (this.has(name)) {
        resolved[name] = this.entries[name];
        graph.push(`${String(name)} (OK)`);
      } else {
        missing.push(String(name));
        graph.push(`${String(name)} (UNREGISTERED)`);
      }
    }

    if (missing.length > 0 || !hasEntries(resolved, names)) {
      throw new DependencyResolutionError(
        `Handler '${requester}' requires unregistered ${missing.length === 1 ? 'dependency' : 'dependencies'} ` +
          `${missing.map((name) => `'${name}'`).join(', ')}. Registered: ${this.names.join(', ') || '(none)'}`,
        buildGraph(requester, graph),
      );
    }
    return resolved;
  }
}
