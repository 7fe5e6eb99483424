const erfc = (x: number): number => {
  // Numerical Recipes Chebyshev fit, valid for x >= 0 with relative error < 1.2e-7.
  // The fit gives erfc(0) = exp(3e-8), so cap at 1 to keep Φ(0) = 0.5 and Φ monotone.
  const t = 1 / (1 + 0.5 * x);
  const tau =
    t *
    Math.exp(
      -x * x -
        1.26551223 +
        1.00002368 * t +
        0.37409196 * t * t +
        0.09678418 * t ** 3 -
        0.18628806 * t ** 4 +
        0.27886807 * t ** 5 -
        1.13520398 * t ** 6 +
        1.48851587 * t ** 7 -
        0.82215223 * t ** 8 +
        0.17087277 * t ** 9
    );
  return Math.min(tau, 1);
};

/**
 * Standard normal cumulative distribution function, Φ(x).
 * Both tails share one `erfc` evaluation, so Φ(x) + Φ(-x) = 1 up to rounding.
 */
export const normCdf = (x: number): number => {
  const tail = 0.5 * erfc(Math.abs(x) / Math.SQRT2);
  return x < 0 ? tail : 1 - tail;
};

export const discountFactor = (rate: number, years: number): number =>
  Math.exp(-rate * years);

/**
 * Evenly spaced samples from `start` to `stop`, both included.
 * The last sample is `stop` exactly; a single sample is `[start]`.
 */
export const linspace = (start: number, stop: number, samples: number): number[] => {
  if (samples === 1) return [start];
  const step = (stop - start) / (samples - 1);
  return Array.from({ length: samples }, (_, i) =>
    i === samples - 1 ? stop : start + step * i
  );
};

export const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};
