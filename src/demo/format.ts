import type { ShippingQuote } from "../domain/types.js";

/** One console line per quote, e.g. "Shipping cost from UPS is: 300" */
export function formatQuote(quote: ShippingQuote): string {
  return `Shipping cost from ${quote.strategyName} is: ${quote.cost}`;
}
