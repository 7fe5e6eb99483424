import { discountFactor, normCdf } from './math';
import { InvalidParameterError, UnsupportedOptionKindError, type PricingField } from './errors';
import type {
  MarketParameters,
  OptionParameters,
  OptionQuote,
  OptionQuotePair,
} from '@/types/options';

export const requirePositive = (field: PricingField, value: number) => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(field, value, 'must be a finite number greater than 0');
  }
};

export const requireFinite = (field: PricingField, value: number) => {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(field, value, 'must be a finite number');
  }
};

export const requireNonNegative = (field: PricingField, value: number) => {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidParameterError(field, value, 'must be a finite number of at least 0');
  }
};

export const assertOptionParameters = (params: MarketParameters) => {
  requirePositive('spotPrice', params.spotPrice);
  requirePositive('strikePrice', params.strikePrice);
  requirePositive('timeToExpiration', params.timeToExpiration);
  requireFinite('riskFreeRate', params.riskFreeRate);
  requirePositive('volatility', params.volatility);
};

const computeD1D2 = ({
  spotPrice,
  strikePrice,
  timeToExpiration,
  riskFreeRate,
  volatility,
}: MarketParameters) => {
  const sigmaSqrtT = volatility * Math.sqrt(timeToExpiration);
  const d1 =
    (Math.log(spotPrice / strikePrice) +
      (riskFreeRate + 0.5 * volatility * volatility) * timeToExpiration) /
    sigmaSqrtT;
  return { d1, d2: d1 - sigmaSqrtT };
};

/**
 * Black-Scholes price of a European option.
 *
 * @throws InvalidParameterError when spot, strike, time or volatility is not
 * strictly positive, or the rate is not finite.
 * @throws UnsupportedOptionKindError for an option type other than call or put.
 */
export const priceOption = (params: OptionParameters): number => {
  assertOptionParameters(params);

  const { spotPrice, strikePrice, timeToExpiration, riskFreeRate, optionType } = params;
  const { d1, d2 } = computeD1D2(params);
  const discountedStrike = strikePrice * discountFactor(riskFreeRate, timeToExpiration);

  switch (optionType) {
    case 'call':
      return spotPrice * normCdf(d1) - discountedStrike * normCdf(d2);
    case 'put':
      return discountedStrike * normCdf(-d2) - spotPrice * normCdf(-d1);
    default:
      throw new UnsupportedOptionKindError(optionType satisfies never);
  }
};

export const quoteOption = (params: OptionParameters, purchasePrice: number): OptionQuote => {
  requireNonNegative('purchasePrice', purchasePrice);
  const price = priceOption(params);
  return {
    optionType: params.optionType,
    price,
    delta: price - purchasePrice,
  };
};

export const quoteOptionPair = (
  params: MarketParameters,
  purchasePrice: number
): OptionQuotePair => ({
  call: quoteOption({ ...params, optionType: 'call' }, purchasePrice),
  put: quoteOption({ ...params, optionType: 'put' }, purchasePrice),
});
