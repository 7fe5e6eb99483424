import { describe, expect, it } from 'vitest';
import { loadPricingConfig } from './config';

describe('loadPricingConfig', () => {
  it('falls back to the defaults', () => {
    expect(loadPricingConfig({})).toEqual({
      defaultRiskFreeRate: 0.05,
      defaultSamples: 10,
      maxSamples: 50,
    });
  });

  it('reads overrides from the environment', () => {
    expect(
      loadPricingConfig({
        OPTIONS_DEFAULT_RISK_FREE_RATE: '0.031',
        PNL_SURFACE_DEFAULT_SAMPLES: '12',
        PNL_SURFACE_MAX_SAMPLES: '40',
      })
    ).toEqual({ defaultRiskFreeRate: 0.031, defaultSamples: 12, maxSamples: 40 });
  });

  it('names the variable that fails to parse', () => {
    expect(() => loadPricingConfig({ PNL_SURFACE_MAX_SAMPLES: 'lots' })).toThrow(
      /PNL_SURFACE_MAX_SAMPLES/
    );
  });

  it('rejects a default grid larger than the maximum', () => {
    expect(() =>
      loadPricingConfig({ PNL_SURFACE_DEFAULT_SAMPLES: '20', PNL_SURFACE_MAX_SAMPLES: '15' })
    ).toThrow('PNL_SURFACE_DEFAULT_SAMPLES exceeds PNL_SURFACE_MAX_SAMPLES');
  });
});
