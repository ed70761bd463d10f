#!/usr/bin/env node
/**
 * CLI demo: price one order with the default strategy, then with every strategy.
 * Run: npm run demo
 * Override the order with DEMO_ORDER_COST / DEMO_DESTINATION_COUNTRY, the set with SHIPPING_STRATEGIES.
 */

import { createServiceFromConfig, loadConfig } from "../index.js";
import type { Order } from "../index.js";
import { formatQuote } from "./format.js";

function main(): void {
  const config = loadConfig(process.env);
  const service = createServiceFromConfig(config);

  const order: Order = {
    cost: config.DEMO_ORDER_COST,
    destination: { country: config.DEMO_DESTINATION_COUNTRY },
  };

  const single = service.quote(order);
  if (!single.ok) {
    console.error("Error:", single.error.toJSON());
    process.exit(1);
  }
  console.log(formatQuote(single.value));

  const all = service.compareAll(order);
  if (!all.ok) {
    console.error("Error:", all.error.toJSON());
    process.exit(1);
  }
  for (const quote of all.value) {
    console.log(formatQuote(quote));
  }
}

try {
  main();
} catch (e) {
  console.error(e);
  process.exit(1);
}
