/**
 * Strategy registry: indexes the static registration table by name and hands out
 * fresh strategy instances. The table is fixed at construction and never mutated.
 */

import type { RandomSource } from "../domain/types.js";
import {
  duplicateStrategyError,
  noStrategiesError,
  strategyNotFoundError,
} from "../domain/errors.js";
import type {
  ShippingStrategy,
  StrategyDependencies,
  StrategyFactory,
  StrategyRegistration,
} from "./types.js";
import { UpsStrategy } from "../ups/strategy.js";
import { FedExStrategy } from "../fedex/strategy.js";
import { EmsStrategy } from "../ems/strategy.js";

/** Every carrier this build knows about, in display order */
export const builtInStrategies: readonly StrategyRegistration[] = [
  { name: UpsStrategy.strategyName, create: () => new UpsStrategy() },
  { name: FedExStrategy.strategyName, create: () => new FedExStrategy() },
  { name: EmsStrategy.strategyName, create: ({ random }) => new EmsStrategy(random) },
];

export interface StrategyRegistryConfig {
  /** Registration table (default: builtInStrategies) */
  strategies?: readonly StrategyRegistration[];
  /** Random source passed to factories (default: Math.random) */
  random?: RandomSource;
}

export class StrategyRegistry {
  private readonly factories: ReadonlyMap<string, StrategyFactory>;
  private readonly deps: StrategyDependencies;

  constructor(config: StrategyRegistryConfig = {}) {
    const table = new Map<string, StrategyFactory>();
    for (const { name, create } of config.strategies ?? builtInStrategies) {
      if (table.has(name)) throw duplicateStrategyError(name);
      table.set(name, create);
    }
    this.factories = table;
    this.deps = { random: config.random ?? Math.random };
  }

  /**
   * Build a registry holding only the named built-in strategies, in the order given.
   * Throws NOT_FOUND for a name the build does not know.
   */
  static fromNames(names: readonly string[], random?: RandomSource): StrategyRegistry {
    const strategies = names.map((name) => {
      const registration = builtInStrategies.find((r) => r.name === name);
      if (!registration) throw strategyNotFoundError(name);
      return registration;
    });
    return new StrategyRegistry({ strategies, random });
  }

  /** Fresh instance of the strategy registered under `name` (exact match) */
  get(name: string): ShippingStrategy {
    const create = this.factories.get(name);
    if (!create) throw strategyNotFoundError(name);
    return create(this.deps);
  }

  /** One fresh instance per registered strategy, in registration order */
  listAll(): ShippingStrategy[] {
    if (this.factories.size === 0) throw noStrategiesError();
    return Array.from(this.factories.values(), (create) => create(this.deps));
  }

  names(): string[] {
    return Array.from(this.factories.keys());
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }
}
