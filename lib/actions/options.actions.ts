'use server';

import { getPricingConfig } from '@/lib/config';
import { InvalidParameterError } from '@/lib/finance/errors';
import { buildPnlSurfaceLabels, toPnlCells } from '@/lib/finance/heatmap';
import { quoteOption, quoteOptionPair } from '@/lib/finance/optionPricing';
import { generatePnlSurface } from '@/lib/finance/pnlSurface';
import {
  optionQuoteSchema,
  pnlSurfaceSchema,
  type OptionQuoteSchema,
} from '@/lib/validations/options';
import type {
  MarketParameters,
  OptionParameters,
  OptionQuoteResponsePayload,
  PnlSurfaceResponsePayload,
} from '@/types/options';

const resolveMarketParameters = (payload: OptionQuoteSchema): MarketParameters => ({
  spotPrice: payload.spotPrice,
  strikePrice: payload.strikePrice,
  timeToExpiration: payload.timeToExpiration,
  riskFreeRate: payload.riskFreeRate ?? getPricingConfig().defaultRiskFreeRate,
  volatility: payload.volatility,
});

const resolveSamples = (requested: number | undefined) => {
  const { defaultSamples, maxSamples } = getPricingConfig();
  const samples = requested ?? defaultSamples;
  if (samples > maxSamples) {
    throw new InvalidParameterError('samples', samples, `must be at most ${maxSamples}`);
  }
  return samples;
};

// reachable from the client without the route, so input is parsed here (ZodError on bad payloads)
export async function quoteOptionPrices(input: unknown): Promise<OptionQuoteResponsePayload> {
  const payload = optionQuoteSchema.parse(input);
  const parameters = resolveMarketParameters(payload);
  const { purchasePrice } = payload;

  return {
    parameters,
    purchasePrice,
    quotes: quoteOptionPair(parameters, purchasePrice),
  };
}

export async function buildPnlSurface(input: unknown): Promise<PnlSurfaceResponsePayload> {
  const payload = pnlSurfaceSchema.parse(input);
  const parameters: OptionParameters = {
    ...resolveMarketParameters(payload),
    optionType: payload.optionType,
  };
  const { purchasePrice } = payload;
  const samples = resolveSamples(payload.samples);

  const quote = quoteOption(parameters, purchasePrice);
  const surface = generatePnlSurface(
    parameters,
    payload.spotRange,
    payload.volatilityRange,
    purchasePrice,
    samples
  );

  return {
    parameters,
    quote,
    surface,
    labels: buildPnlSurfaceLabels(surface),
    cells: toPnlCells(surface),
  };
}
