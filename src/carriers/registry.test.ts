import { describe, it, expect } from "vitest";
import { StrategyRegistry, builtInStrategies } from "./registry.js";
import { ShippingStrategyError } from "../domain/errors.js";
import type { Order } from "../domain/types.js";

const order: Order = { cost: 1000, destination: { country: "Russia" } };

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}

describe("StrategyRegistry", () => {
  const registry = new StrategyRegistry();

  it("registers UPS, FedEx and EMS in order", () => {
    expect(registry.names()).toEqual(["UPS", "FedEx", "EMS"]);
  });

  it("returns a strategy whose name matches the lookup key", () => {
    for (const name of registry.names()) {
      expect(registry.get(name).name).toBe(name);
    }
  });

  it("constructs a fresh instance on every get", () => {
    expect(registry.get("UPS")).not.toBe(registry.get("UPS"));
  });

  it("prices the reference order", () => {
    expect(registry.get("FedEx").calculate(order)).toBe(1000 / 7);
    expect(registry.get("UPS").calculate(order)).toBe(300);
  });

  it("throws NOT_FOUND for an unregistered name", () => {
    expect(() => registry.get("DHL")).toThrow(ShippingStrategyError);
    expect(thrownBy(() => registry.get("DHL"))).toMatchObject({
      name: "ShippingStrategyError",
      details: { code: "NOT_FOUND", strategyName: "DHL", message: "Strategy not found: DHL" },
    });
  });

  it("does not fold case on lookup", () => {
    expect(registry.has("fedex")).toBe(false);
    expect(() => registry.get("fedex")).toThrow("Strategy not found: fedex");
  });

  it("lists one instance per registered strategy", () => {
    const all = registry.listAll();
    expect(all).toHaveLength(3);
    expect(all.map((s) => s.name)).toEqual(["UPS", "FedEx", "EMS"]);
    expect(new Set(all).size).toBe(3);
  });

  it("prices a frozen order without touching it", () => {
    const frozen: Order = Object.freeze({
      cost: 1000,
      destination: Object.freeze({ country: "USA" }),
    });
    const costs = registry.listAll().map((s) => s.calculate(frozen));
    expect(costs).toHaveLength(3);
    expect(frozen).toEqual({ cost: 1000, destination: { country: "USA" } });
  });

  it("passes the injected random source to EMS", () => {
    const seeded = new StrategyRegistry({ random: () => 0.5 });
    expect(seeded.get("EMS").calculate(order)).toBe(500);
  });

  it("throws CONFIGURATION_ERROR from listAll when nothing is registered", () => {
    const empty = new StrategyRegistry({ strategies: [] });
    expect(thrownBy(() => empty.listAll())).toMatchObject({
      details: { code: "CONFIGURATION_ERROR", message: "No strategies registered" },
    });
  });

  it("rejects duplicate registrations", () => {
    const ups = builtInStrategies[0];
    expect(() => new StrategyRegistry({ strategies: [ups, ups] })).toThrow(
      "Duplicate strategy registration: UPS"
    );
  });

  describe("fromNames", () => {
    it("keeps only the named strategies, in the order given", () => {
      const subset = StrategyRegistry.fromNames(["EMS", "UPS"]);
      expect(subset.names()).toEqual(["EMS", "UPS"]);
      expect(() => subset.get("FedEx")).toThrow("Strategy not found: FedEx");
    });

    it("throws NOT_FOUND for a name the build does not know", () => {
      expect(() => StrategyRegistry.fromNames(["UPS", "DHL"])).toThrow(
        "Strategy not found: DHL"
      );
    });
  });
});
