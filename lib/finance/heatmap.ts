import { roundTo } from './math';
import type { OptionType, PnlCell, PnlSurface, PnlSurfaceLabels, PnlTone } from '@/types/options';

const TICK_DIGITS = 2;

const OPTION_TYPE_LABELS: Record<OptionType, string> = {
  call: 'Call',
  put: 'Put',
};

export const formatPnl = (value: number) => value.toFixed(2);

// diverging scale centred on zero; anything that prints as 0.00 is flat
export const classifyPnl = (value: number): PnlTone => {
  if (Math.abs(value) < 0.005) return 'flat';
  return value > 0 ? 'profit' : 'loss';
};

export const buildPnlSurfaceLabels = (surface: PnlSurface): PnlSurfaceLabels => ({
  title: `PnL Heat Map for ${OPTION_TYPE_LABELS[surface.optionType]} Option`,
  xAxisLabel: 'Spot Price (S)',
  yAxisLabel: 'Volatility (vol)',
  xTicks: surface.spotPrices.map((spot) => roundTo(spot, TICK_DIGITS)),
  yTicks: surface.volatilities.map((vol) => roundTo(vol, TICK_DIGITS)),
});

export const toPnlCells = (surface: PnlSurface): PnlCell[] =>
  surface.pnl.flatMap((rowValues, row) =>
    rowValues.map((value, column) => ({
      row,
      column,
      spotPrice: surface.spotPrices[column],
      volatility: surface.volatilities[row],
      value,
      text: formatPnl(value),
      tone: classifyPnl(value),
    }))
  );
