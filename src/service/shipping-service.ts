/**
 * Shipping cost facade: validates input, picks strategies from the registry,
 * returns quotes as results. Registry and validation failures come back as errors.
 */

import type { ShippingQuote } from "../domain/types.js";
import { isShippingStrategyError, toValidOrder, validationError } from "../domain/index.js";
import type { ShippingStrategyError } from "../domain/errors.js";
import { StrategyRegistry } from "../carriers/registry.js";
import type { Config } from "../config.js";

/** Result of an operation that can fail with a structured error */
export type ShippingResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ShippingStrategyError };

export interface ShippingCostServiceConfig {
  registry: StrategyRegistry;
  /** Strategy used by quote() when the caller names none */
  defaultStrategy?: string;
}

export class ShippingCostService {
  constructor(private readonly config: ShippingCostServiceConfig) {}

  /** Price `order` with one strategy (the named one, or the configured default). */
  quote(order: unknown, strategyName?: string): ShippingResult<ShippingQuote> {
    return this.run(() => {
      const validOrder = toValidOrder(order);
      const name = strategyName ?? this.config.defaultStrategy;
      if (name === undefined) {
        throw validationError("No strategy specified and no default strategy configured");
      }
      const strategy = this.config.registry.get(name);
      return { strategyName: strategy.name, cost: strategy.calculate(validOrder) };
    });
  }

  /** Price `order` with every registered strategy. All quotes or one error, never a partial list. */
  compareAll(order: unknown): ShippingResult<ShippingQuote[]> {
    return this.run(() => {
      const validOrder = toValidOrder(order);
      return this.config.registry
        .listAll()
        .map((s) => ({ strategyName: s.name, cost: s.calculate(validOrder) }));
    });
  }

  private run<T>(fn: () => T): ShippingResult<T> {
    try {
      return { ok: true, value: fn() };
    } catch (err) {
      if (isShippingStrategyError(err)) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }
}

/** Wire the registry (all built-ins, or the configured subset) and default strategy from config. */
export function createServiceFromConfig(config: Config): ShippingCostService {
  const registry = config.SHIPPING_STRATEGIES
    ? StrategyRegistry.fromNames(config.SHIPPING_STRATEGIES)
    : new StrategyRegistry();
  return new ShippingCostService({ registry, defaultStrategy: config.DEFAULT_STRATEGY });
}
