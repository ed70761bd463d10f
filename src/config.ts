/**
 * Configuration loaded from environment variables.
 * Which strategies are enabled and the demo order live here, not in business logic.
 */

import { z } from "zod";
import { builtInStrategies } from "./carriers/registry.js";

const knownStrategies = builtInStrategies.map((r) => r.name);

const strategyListSchema = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((name) => name.trim())
      .filter((name) => name.length > 0)
  );

const configSchema = z
  .object({
    // Comma-separated subset of built-in strategies; unset means all
    SHIPPING_STRATEGIES: strategyListSchema.optional(),
    DEFAULT_STRATEGY: z.string().min(1).default("FedEx"),

    // Demo order
    DEMO_ORDER_COST: z.coerce.number().finite().nonnegative().default(1000),
    DEMO_DESTINATION_COUNTRY: z.string().default("Russia"),
  })
  .superRefine((config, ctx) => {
    const enabled = config.SHIPPING_STRATEGIES ?? knownStrategies;
    enabled.forEach((name, index) => {
      if (!knownStrategies.includes(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["SHIPPING_STRATEGIES", index],
          message: `Unknown strategy "${name}". Available: ${knownStrategies.join(", ")}`,
        });
      }
    });
    if (!enabled.includes(config.DEFAULT_STRATEGY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DEFAULT_STRATEGY"],
        message: `Default strategy "${config.DEFAULT_STRATEGY}" is not enabled`,
      });
    }
  });

export type Config = z.infer<typeof configSchema>;

/** Unset and empty variables both fall back to the schema default */
function presentOrUndefined(value: string | undefined): string | undefined {
  return value === "" ? undefined : value;
}

/** Load and validate config from process.env. Throws ZodError on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    SHIPPING_STRATEGIES: presentOrUndefined(env.SHIPPING_STRATEGIES),
    DEFAULT_STRATEGY: env.DEFAULT_STRATEGY,
    DEMO_ORDER_COST: presentOrUndefined(env.DEMO_ORDER_COST),
    DEMO_DESTINATION_COUNTRY: env.DEMO_DESTINATION_COUNTRY,
  };
  return configSchema.parse(raw);
}
