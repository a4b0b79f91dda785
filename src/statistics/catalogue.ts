import { Option } from "effect";
import { priceOf, type PriceComponent, type PriceSeries } from "../prices/types.js";
import { average, count, maximum, minimum } from "./reducers.js";
import { pointAtHourOffset, selectWindow, type PriceWindow, type StatisticContext } from "./windows.js";

export type Statistic = (series: PriceSeries, context: StatisticContext) => Option.Option<number>;

const hourPrice = (component: PriceComponent, offsetHours = 0): Statistic =>
  (series, { now }) => Option.map(pointAtHourOffset(series, now, offsetHours), (point) => priceOf(point, component));

const overWindow = (
  window: PriceWindow,
  reduce: (points: PriceSeries, component: PriceComponent) => Option.Option<number>,
  component: PriceComponent = "total"
): Statistic =>
  (series, context) => reduce(selectWindow(series, window, context), component);

const hoursIn = (window: PriceWindow): Statistic =>
  (series, context) => count(selectWindow(series, window, context));

const marketPercentTax: Statistic = (series, { now }) =>
  Option.flatMap(pointAtHourOffset(series, now, 0), (point) =>
    point.marketPrice === 0 || point.marketPriceTax === 0
      ? Option.none()
      : Option.some((100 * point.marketPriceTax) / point.marketPrice)
  );

export const STATISTICS = {
  current_hour: hourPrice("total"),
  current_hour_market: hourPrice("market"),
  current_hour_market_tax: hourPrice("marketWithTax"),
  current_hour_market_tax_markup: hourPrice("marketWithTaxAndMarkup"),
  current_hour_vat: hourPrice("vat"),
  current_hour_markup: hourPrice("markup"),
  current_hour_energy_tax: hourPrice("energyTax"),
  current_hour_fixed: hourPrice("fixed"),
  current_hour_market_percent_tax: marketPercentTax,

  previous_hour: hourPrice("total", -1),
  previous_hour_market: hourPrice("market", -1),
  next_hour: hourPrice("total", 1),
  next_hour_market: hourPrice("market", 1),

  today_min: overWindow("today", minimum),
  today_max: overWindow("today", maximum),
  today_avg: overWindow("today", average),
  today_avg_market: overWindow("today", average, "market"),
  today_avg_market_tax: overWindow("today", average, "marketWithTax"),
  today_avg_market_tax_markup: overWindow("today", average, "marketWithTaxAndMarkup"),

  tomorrow_min: overWindow("tomorrow", minimum),
  tomorrow_max: overWindow("tomorrow", maximum),
  tomorrow_avg: overWindow("tomorrow", average),
  tomorrow_avg_market: overWindow("tomorrow", average, "market"),
  tomorrow_avg_market_tax: overWindow("tomorrow", average, "marketWithTax"),
  tomorrow_avg_market_tax_markup: overWindow("tomorrow", average, "marketWithTaxAndMarkup"),

  upcoming_min: overWindow("upcoming", minimum),
  upcoming_max: overWindow("upcoming", maximum),
  upcoming_avg: overWindow("upcoming", average),
  upcoming_avg_market: overWindow("upcoming", average, "market"),

  all_min: overWindow("all", minimum),
  all_max: overWindow("all", maximum),
  all_avg: overWindow("all", average),

  hour_count: hoursIn("all"),
  tomorrow_hour_count: hoursIn("tomorrow"),

  today_before6am_avg: overWindow("todayBefore6am", average),
  today_before6am_hour_count: hoursIn("todayBefore6am"),
  today_after6am_avg: overWindow("todayAfter6am", average),
  today_after6am_hour_count: hoursIn("todayAfter6am"),
  tomorrow_before6am_avg: overWindow("tomorrowBefore6am", average),
  tomorrow_before6am_hour_count: hoursIn("tomorrowBefore6am"),
  tomorrow_after6am_avg: overWindow("tomorrowAfter6am", average),
  tomorrow_after6am_hour_count: hoursIn("tomorrowAfter6am"),
} satisfies Record<string, Statistic>;

export type StatisticName = keyof typeof STATISTICS;

export const isStatisticName = (name: string): name is StatisticName =>
  Object.prototype.hasOwnProperty.call(STATISTICS, name);

export const STATISTIC_NAMES: readonly StatisticName[] = Object.keys(STATISTICS).filter(isStatisticName);

// Only meaningful for a commodity traded per gas day
export const GAS_DAY_STATISTICS: ReadonlySet<StatisticName> = new Set<StatisticName>([
  "today_before6am_avg",
  "today_before6am_hour_count",
  "today_after6am_avg",
  "today_after6am_hour_count",
  "tomorrow_before6am_avg",
  "tomorrow_before6am_hour_count",
  "tomorrow_after6am_avg",
  "tomorrow_after6am_hour_count",
]);

export const computeStatistic = (
  name: StatisticName,
  series: PriceSeries,
  context: StatisticContext
): Option.Option<number> => STATISTICS[name](series, context);
