import type { PricePoint, PriceSeries } from "../../prices/types.js";

const HOUR_MS = 60 * 60 * 1000;

// Market prices in EUR/kWh for 24 consecutive hours
export const TODAY_MARKET_PRICES = [
  0.10, 0.09, 0.08, 0.07, 0.08, 0.09, 0.12, 0.15,
  0.18, 0.16, 0.14, 0.12, 0.11, 0.10, 0.11, 0.13,
  0.17, 0.21, 0.24, 0.22, 0.19, 0.16, 0.13, 0.11,
];

export const TOMORROW_MARKET_PRICES = [
  0.05, 0.04, 0.04, 0.03, 0.04, 0.06, 0.10, 0.13,
  0.15, 0.12, 0.09, 0.06, 0.02, 0.01, 0.03, 0.07,
  0.12, 0.18, 0.26, 0.25, 0.20, 0.14, 0.10, 0.08,
];

// Fixed components so that total = market + 0.14
export const VAT = 0.02;
export const SOURCING_MARKUP = 0.02;
export const ENERGY_TAX = 0.1;

export const hourlySeries = (startIso: string, marketPrices: readonly number[]): PriceSeries =>
  marketPrices.map((marketPrice, hour): PricePoint => {
    const from = new Date(Date.parse(startIso) + hour * HOUR_MS);
    return {
      from,
      till: new Date(from.getTime() + HOUR_MS),
      marketPrice,
      marketPriceTax: VAT,
      sourcingMarkup: SOURCING_MARKUP,
      energyTax: ENERGY_TAX,
    };
  });
