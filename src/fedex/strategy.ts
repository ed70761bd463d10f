/**
 * FedEx divides the order value by a country-dependent divisor.
 * Country names are compared exactly: "russia" or "US" fall into the default bucket.
 */

import type { ShippingStrategy } from "../carriers/types.js";
import type { Order } from "../domain/types.js";

const DISCOUNTED_COUNTRIES: ReadonlySet<string> = new Set(["Russia", "USA"]);
const DISCOUNTED_DIVISOR = 7;
const DEFAULT_DIVISOR = 5;

export class FedExStrategy implements ShippingStrategy {
  static readonly strategyName = "FedEx";
  readonly name = FedExStrategy.strategyName;

  calculate(order: Order): number {
    const divisor = DISCOUNTED_COUNTRIES.has(order.destination.country)
      ? DISCOUNTED_DIVISOR
      : DEFAULT_DIVISOR;
    return order.cost / divisor;
  }
}
