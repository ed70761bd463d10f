import type { ShippingStrategy } from "../carriers/types.js";
import type { Order, RandomSource } from "../domain/types.js";

/**
 * EMS charges a random share of the order value, drawn fresh on every call.
 * The random source is injected so tests can pin the result.
 */
export class EmsStrategy implements ShippingStrategy {
  static readonly strategyName = "EMS";
  readonly name = EmsStrategy.strategyName;

  constructor(private readonly random: RandomSource = Math.random) {}

  calculate(order: Order): number {
    return order.cost * this.random();
  }
}
