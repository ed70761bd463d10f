/**
 * Shipping cost strategies
 *
 * Public API: domain types, strategy registry, cost service, and errors.
 * Carriers (UPS, FedEx, EMS) are registered in a static table.
 */

export * from "./domain/index.js";
export * from "./carriers/types.js";
export { StrategyRegistry, builtInStrategies } from "./carriers/registry.js";
export type { StrategyRegistryConfig } from "./carriers/registry.js";
export { UpsStrategy } from "./ups/strategy.js";
export { FedExStrategy } from "./fedex/strategy.js";
export { EmsStrategy } from "./ems/strategy.js";
export { ShippingCostService, createServiceFromConfig } from "./service/shipping-service.js";
export type { ShippingCostServiceConfig, ShippingResult } from "./service/shipping-service.js";
export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
