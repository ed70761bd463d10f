import type { ShippingStrategy } from "../carriers/types.js";
import type { Order } from "../domain/types.js";

const SHIPPING_COST_RATIO = 0.3;

/** Flat share of the order value, whatever the destination */
export class UpsStrategy implements ShippingStrategy {
  static readonly strategyName = "UPS";
  readonly name = UpsStrategy.strategyName;

  calculate(order: Order): number {
    return order.cost * SHIPPING_COST_RATIO;
  }
}
