import { z } from 'zod';

const envSchema = z.object({
  OPTIONS_DEFAULT_RISK_FREE_RATE: z.coerce.number().finite().default(0.05),
  PNL_SURFACE_DEFAULT_SAMPLES: z.coerce.number().int().min(1).default(10),
  PNL_SURFACE_MAX_SAMPLES: z.coerce.number().int().min(1).default(50),
});

export type PricingConfig = {
  defaultRiskFreeRate: number;
  defaultSamples: number;
  maxSamples: number;
};

export const loadPricingConfig = (
  env: Record<string, string | undefined> = process.env
): PricingConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid pricing configuration: ${details}`);
  }

  const {
    OPTIONS_DEFAULT_RISK_FREE_RATE,
    PNL_SURFACE_DEFAULT_SAMPLES,
    PNL_SURFACE_MAX_SAMPLES,
  } = parsed.data;

  if (PNL_SURFACE_DEFAULT_SAMPLES > PNL_SURFACE_MAX_SAMPLES) {
    throw new Error(
      'Invalid pricing configuration: PNL_SURFACE_DEFAULT_SAMPLES exceeds PNL_SURFACE_MAX_SAMPLES'
    );
  }

  return {
    defaultRiskFreeRate: OPTIONS_DEFAULT_RISK_FREE_RATE,
    defaultSamples: PNL_SURFACE_DEFAULT_SAMPLES,
    maxSamples: PNL_SURFACE_MAX_SAMPLES,
  };
};

let cachedConfig: PricingConfig | undefined;

export const getPricingConfig = (): PricingConfig => {
  cachedConfig ??= loadPricingConfig();
  return cachedConfig;
};
