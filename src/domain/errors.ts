/**
 * Structured errors for strategy lookup and order validation.
 * Registry failures are thrown; the service wraps them in a result.
 */

export type ShippingErrorCode = "CONFIGURATION_ERROR" | "NOT_FOUND" | "VALIDATION_ERROR";

export interface ShippingErrorDetails {
  code: ShippingErrorCode;
  message: string;
  /** Requested strategy name, for NOT_FOUND and duplicate registrations */
  strategyName?: string;
  /** Underlying cause for logging (e.g. ZodError) */
  cause?: unknown;
}

export class ShippingStrategyError extends Error {
  readonly details: ShippingErrorDetails;

  constructor(details: ShippingErrorDetails) {
    super(details.message);
    this.name = "ShippingStrategyError";
    this.details = details;
    Object.setPrototypeOf(this, ShippingStrategyError.prototype);
  }

  get code(): ShippingErrorCode {
    return this.details.code;
  }

  get strategyName(): string | undefined {
    return this.details.strategyName;
  }

  toJSON(): ShippingErrorDetails {
    return { ...this.details, cause: undefined };
  }
}

export function isShippingStrategyError(e: unknown): e is ShippingStrategyError {
  return e instanceof ShippingStrategyError;
}

/** Registration table is empty */
export function noStrategiesError(): ShippingStrategyError {
  return new ShippingStrategyError({
    code: "CONFIGURATION_ERROR",
    message: "No strategies registered",
  });
}

export function duplicateStrategyError(name: string): ShippingStrategyError {
  return new ShippingStrategyError({
    code: "CONFIGURATION_ERROR",
    message: `Duplicate strategy registration: ${name}`,
    strategyName: name,
  });
}

/** Lookup by a name that is not registered */
export function strategyNotFoundError(name: string): ShippingStrategyError {
  return new ShippingStrategyError({
    code: "NOT_FOUND",
    message: `Strategy not found: ${name}`,
    strategyName: name,
  });
}

/** Validation error (order rejected before any strategy runs) */
export function validationError(message: string, cause?: unknown): ShippingStrategyError {
  return new ShippingStrategyError({
    code: "VALIDATION_ERROR",
    message,
    cause,
  });
}
