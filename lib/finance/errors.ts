import type { OptionParameters } from '@/types/options';

export type PricingField =
  | Exclude<keyof OptionParameters, 'optionType'>
  | 'purchasePrice'
  | 'spotRange.min'
  | 'spotRange.max'
  | 'volatilityRange.min'
  | 'volatilityRange.max'
  | 'samples';

export class InvalidParameterError extends Error {
  readonly field: PricingField;
  readonly value: unknown;

  constructor(field: PricingField, value: unknown, reason: string) {
    super(`Invalid ${field} (${String(value)}): ${reason}`);
    this.name = 'InvalidParameterError';
    this.field = field;
    this.value = value;
  }
}

/**
 * Thrown when an option type outside `call | put` reaches the pricer.
 * Only untyped callers can trigger it, so it signals a bug rather than bad input.
 */
export class UnsupportedOptionKindError extends Error {
  readonly optionType: unknown;

  constructor(optionType: unknown) {
    super(`Unsupported option type: ${String(optionType)}`);
    this.name = 'UnsupportedOptionKindError';
    this.optionType = optionType;
  }
}
