/**
 * Strategy abstraction: each carrier prices an order through this contract.
 * Adding a carrier means one new class and one row in the registration table.
 */

import type { Order, RandomSource } from "../domain/types.js";

/** A named, stateless shipping cost calculation */
export interface ShippingStrategy {
  /** Registry key and display name (e.g. "UPS") */
  readonly name: string;
  /** Cost to ship `order`, in the currency unit of `order.cost`. No side effects. */
  calculate(order: Order): number;
}

/** Collaborators handed to every strategy factory */
export interface StrategyDependencies {
  random: RandomSource;
}

export type StrategyFactory = (deps: StrategyDependencies) => ShippingStrategy;

/** One row of the static registration table */
export interface StrategyRegistration {
  readonly name: string;
  readonly create: StrategyFactory;
}
