import { linspace } from './math';
import { InvalidParameterError } from './errors';
import {
  assertOptionParameters,
  priceOption,
  requireNonNegative,
  requirePositive,
} from './optionPricing';
import type { OptionParameters, PnlSurface, ValueRange } from '@/types/options';

export const DEFAULT_SURFACE_SAMPLES = 10;

const requireSampleCount = (samples: number) => {
  if (!Number.isInteger(samples) || samples < 1) {
    throw new InvalidParameterError('samples', samples, 'must be a whole number of at least 1');
  }
};

/**
 * Profit and loss of holding the option, swept over spot (columns) and
 * volatility (rows). Strike, time, rate and option type come from `params`;
 * its own spot and volatility are ignored.
 *
 * Both ranges are sampled with `linspace`, so a zero-width range gives a
 * constant axis and `min > max` gives a descending one. Every bound must be
 * strictly positive since the grid includes the endpoints.
 */
export const generatePnlSurface = (
  params: OptionParameters,
  spotRange: ValueRange,
  volatilityRange: ValueRange,
  purchasePrice: number,
  samples = DEFAULT_SURFACE_SAMPLES
): PnlSurface => {
  assertOptionParameters(params);
  requirePositive('spotRange.min', spotRange.min);
  requirePositive('spotRange.max', spotRange.max);
  requirePositive('volatilityRange.min', volatilityRange.min);
  requirePositive('volatilityRange.max', volatilityRange.max);
  requireNonNegative('purchasePrice', purchasePrice);
  requireSampleCount(samples);

  const spotPrices = linspace(spotRange.min, spotRange.max, samples);
  const volatilities = linspace(volatilityRange.min, volatilityRange.max, samples);

  const pnl = volatilities.map((volatility) =>
    spotPrices.map(
      (spotPrice) => priceOption({ ...params, spotPrice, volatility }) - purchasePrice
    )
  );

  return {
    optionType: params.optionType,
    purchasePrice,
    spotPrices,
    volatilities,
    pnl,
  };
};
