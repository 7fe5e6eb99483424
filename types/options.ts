export type OptionType = 'call' | 'put';

export type OptionParameters = Readonly<{
  spotPrice: number;
  strikePrice: number;
  timeToExpiration: number; // in years
  riskFreeRate: number; // annualized, as decimal (e.g., 0.05)
  volatility: number; // annualized, as decimal (e.g., 0.2)
  optionType: OptionType;
}>;

export type MarketParameters = Omit<OptionParameters, 'optionType'>;

export type OptionQuote = {
  optionType: OptionType;
  price: number;
  // theoretical price minus purchase price, not the Greek
  delta: number;
};

export type OptionQuotePair = Record<OptionType, OptionQuote>;

export type ValueRange = {
  min: number;
  max: number;
};

export type PnlSurface = Readonly<{
  optionType: OptionType;
  purchasePrice: number;
  spotPrices: readonly number[];
  volatilities: readonly number[];
  // indexed [volatility row][spot column]
  pnl: readonly (readonly number[])[];
}>;

export type PnlSurfaceLabels = {
  title: string;
  xAxisLabel: string;
  yAxisLabel: string;
  xTicks: number[];
  yTicks: number[];
};

export type PnlTone = 'profit' | 'loss' | 'flat';

export type PnlCell = {
  row: number;
  column: number;
  spotPrice: number;
  volatility: number;
  value: number;
  text: string;
  tone: PnlTone;
};

export type OptionQuoteResponsePayload = {
  parameters: MarketParameters;
  purchasePrice: number;
  quotes: OptionQuotePair;
};

export type PnlSurfaceResponsePayload = {
  parameters: OptionParameters;
  quote: OptionQuote;
  surface: PnlSurface;
  labels: PnlSurfaceLabels;
  cells: PnlCell[];
};
