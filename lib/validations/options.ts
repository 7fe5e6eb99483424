import { z } from 'zod';

// blank form fields mean "not provided", not zero
const blankToUndefined = (value: unknown) =>
  value === '' || value === null ? undefined : value;

const positiveNumber = (label: string) =>
  z.coerce
    .number({ invalid_type_error: `${label} must be a number` })
    .finite(`${label} must be finite`)
    .positive(`${label} must be positive`);

const rangeSchema = (label: string) =>
  z.object(
    {
      min: positiveNumber(`Minimum ${label}`),
      max: positiveNumber(`Maximum ${label}`),
    },
    { required_error: `A ${label} range is required` }
  );

export const optionTypeSchema = z.enum(['call', 'put']);

export const optionQuoteSchema = z.object({
  spotPrice: positiveNumber('Spot price'),
  strikePrice: positiveNumber('Strike'),
  timeToExpiration: positiveNumber('Time to expiry'),
  riskFreeRate: z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: 'Risk-free rate must be a number' })
      .finite('Risk-free rate must be finite')
      .optional()
  ),
  volatility: positiveNumber('Volatility'),
  purchasePrice: z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: 'Purchase price must be a number' })
      .finite('Purchase price must be finite')
      .min(0, 'Purchase price cannot be negative')
      .default(0)
  ),
});

export const pnlSurfaceSchema = optionQuoteSchema.extend({
  optionType: optionTypeSchema,
  spotRange: rangeSchema('spot price'),
  volatilityRange: rangeSchema('volatility'),
  samples: z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: 'Samples must be a number' })
      .int('Samples must be a whole number')
      .min(1, 'At least one sample')
      .optional()
  ),
});

export type OptionQuoteSchema = z.infer<typeof optionQuoteSchema>;
export type PnlSurfaceSchema = z.infer<typeof pnlSurfaceSchema>;
