export type Commodity = "electricity" | "gas";

export const COMMODITIES: readonly Commodity[] = ["electricity", "gas"];

export type PricePoint = {
  readonly from: Date;
  readonly till: Date;
  readonly marketPrice: number;
  readonly marketPriceTax: number; // VAT on the market price
  readonly sourcingMarkup: number;
  readonly energyTax: number;
};

// Sorted by `from`, one entry per hour, no duplicates.
export type PriceSeries = readonly PricePoint[];

// Sorted ascending; on duplicate start times the later point wins
export const toSortedSeries = (points: readonly PricePoint[]): PriceSeries => {
  const byStart = new Map<number, PricePoint>();
  for (const point of points) {
    byStart.set(point.from.getTime(), point);
  }

  return [...byStart.values()].sort((a, b) => a.from.getTime() - b.from.getTime());
};

export type PriceComponent =
  | "total"
  | "market"
  | "marketWithTax"
  | "marketWithTaxAndMarkup"
  | "tax"
  | "vat"
  | "markup"
  | "energyTax"
  | "fixed";

export const priceOf = (point: PricePoint, component: PriceComponent): number => {
  switch (component) {
    case "total":
      return point.marketPrice + point.marketPriceTax + point.energyTax + point.sourcingMarkup;

    case "market":
      return point.marketPrice;

    case "marketWithTax":
      return point.marketPrice + point.marketPriceTax;

    case "marketWithTaxAndMarkup":
      return point.marketPrice + point.marketPriceTax + point.sourcingMarkup;

    case "tax":
      return point.marketPriceTax + point.energyTax;

    case "vat":
      return point.marketPriceTax;

    case "markup":
      return point.sourcingMarkup;

    case "energyTax":
      return point.energyTax;

    case "fixed":
      // Components that do not follow the market
      return point.sourcingMarkup + point.energyTax;
  }
};
