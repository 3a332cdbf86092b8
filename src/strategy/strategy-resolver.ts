/**
 * Strategy selection: map an identifier to one algorithm from a closed
 * catalog.
 *
 * @example
 * ```typescript
 * const resolver = new StrategyResolver();
 *
 * resolver.resolve('flat-percentage').apply(120); // 108
 * resolver.resolve('2').apply(120);               // 115
 * resolver.resolve('3');                          // throws UnknownStrategyError
 * ```
 */

import { DispatchEventEmitter } from '../events/event-emitter.js';
import { createLogger } from '../logging/index.js';
import { UnknownStrategyError } from '../types/errors.js';
import { DEFAULT_CATALOG, type Strategy } from './catalog.js';

const log = createLogger({ component: 'strategy-resolver' });

export interface StrategyResolverOptions {
  /** Catalog to resolve against (default: {@link DEFAULT_CATALOG}) */
  catalog?: readonly Strategy[];
  events?: DispatchEventEmitter;
}

/**
 * Resolves catalog ids and their numeric codes to strategies.
 */
export class StrategyResolver {
  readonly events: DispatchEventEmitter;

  private readonly strategies: readonly Strategy[];
  private readonly byIdentifier: Map<string, Strategy> = new Map();

  /**
   * @throws Error if two catalog entries share an id or code
   */
  constructor(options: StrategyResolverOptions = {}) {
    this.events = options.events ?? new DispatchEventEmitter();
    this.strategies = [...(options.catalog ?? DEFAULT_CATALOG)];

    for (const strategy of this.strategies) {
      for (const key of [strategy.id, strategy.code]) {
        if (this.byIdentifier.has(key)) {
          throw new Error(`Strategy catalog has two entries for '${key}'`);
        }
        this.byIdentifier.set(key, strategy);
      }
    }
  }

  /**
   * Look up a strategy by catalog id or numeric code.
   *
   * @throws UnknownStrategyError for anything not in the catalog
   */
  resolve(identifier: string): Strategy {
    const strategy = this.byIdentifier.get(identifier.trim());
    if (!strategy) {
      log.debug('Unknown strategy', { operation: 'resolve', identifier });
      this.events.emitStrategyRejected(identifier);
      throw new UnknownStrategyError(identifier, this.identifiers());
    }

    this.events.emitStrategyResolved(identifier, strategy.id);
    return strategy;
  }

  /**
   * Resolve and apply in one step.
   */
  apply(identifier: string, price: number): number {
    return this.resolve(identifier).apply(price);
  }

  has(identifier: string): boolean {
    return this.byIdentifier.has(identifier.trim());
  }

  /**
   * Catalog entries in catalog order.
   */
  list(): readonly Strategy[] {
    return this.strategies;
  }

  /**
   * Every accepted identifier: each id followed by its code.
   */
  identifiers(): string[] {
    return this.strategies.flatMap((strategy) => [strategy.id, strategy.code]);
  }
}
