/**
 * Domain types for shipping cost estimation.
 * Strategies read only these shapes; nothing carrier-specific lives here.
 */

/** Postal address. All fields are opaque strings; only `country` drives pricing. */
export interface Address {
  /** Country name as entered (e.g. "Russia", "USA"). Matched exactly, no normalization. */
  readonly country: string;
  readonly region?: string;
  readonly city?: string;
  readonly postalCode?: string;
  readonly contactName?: string;
}

/** The shipment being costed */
export interface Order {
  /** Declared order value; shipping cost is expressed in the same currency unit */
  readonly cost: number;
  readonly destination: Address;
  /** Carried for completeness; no strategy prices on origin */
  readonly origin?: Address;
}

/** A computed cost from one named strategy */
export interface ShippingQuote {
  strategyName: string;
  cost: number;
}

/** Source of uniformly distributed values in [0, 1) */
export type RandomSource = () => number;
