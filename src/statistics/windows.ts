import { Option } from "effect";
import { fromDate, toCalendarDate, toZoned, type CalendarDate } from "@internationalized/date";
import type { PricePoint, PriceSeries } from "../prices/types.js";

export const HOUR_MS = 60 * 60 * 1000;

// Gas is traded per gas day, which starts at 06:00 local time
export const GAS_DAY_START_HOUR = 6;

export type PriceWindow =
  | "today"
  | "todayBefore6am"
  | "todayAfter6am"
  | "tomorrow"
  | "tomorrowBefore6am"
  | "tomorrowAfter6am"
  | "upcoming"
  | "all";

export type StatisticContext = {
  readonly now: Date;
  readonly timeZone: string;
};

export const localDate = (instant: Date, timeZone: string, offsetDays = 0): CalendarDate =>
  toCalendarDate(fromDate(instant, timeZone)).add({ days: offsetDays });

// [start, end) of the local day `offsetDays` away from `instant`
export const dayBounds = (
  instant: Date,
  timeZone: string,
  offsetDays = 0
): { readonly start: Date; readonly end: Date } => {
  const day = localDate(instant, timeZone, offsetDays);
  return {
    start: toZoned(day, timeZone).toDate(),
    end: toZoned(day.add({ days: 1 }), timeZone).toDate(),
  };
};

export const isTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch (err) {
    if (err instanceof RangeError) {
      return false;
    }
    throw err;
  }
};

// Splits a local day at the start of the gas day
const gasDayBounds = (
  instant: Date,
  timeZone: string,
  offsetDays: number
): { readonly start: Date; readonly split: Date; readonly end: Date } => {
  const day = localDate(instant, timeZone, offsetDays);
  const midnight = toZoned(day, timeZone);
  return {
    start: midnight.toDate(),
    split: midnight.set({ hour: GAS_DAY_START_HOUR }).toDate(),
    end: toZoned(day.add({ days: 1 }), timeZone).toDate(),
  };
};

const startsWithin = (point: PricePoint, start: Date, end: Date): boolean =>
  point.from.getTime() >= start.getTime() && point.from.getTime() < end.getTime();

export const selectWindow = (series: PriceSeries, window: PriceWindow, { now, timeZone }: StatisticContext): PriceSeries => {
  switch (window) {
    case "today": {
      const { start, end } = dayBounds(now, timeZone);
      return series.filter((point) => startsWithin(point, start, end));
    }

    case "tomorrow": {
      const { start, end } = dayBounds(now, timeZone, 1);
      return series.filter((point) => startsWithin(point, start, end));
    }

    case "todayBefore6am":
    case "tomorrowBefore6am": {
      const { start, split } = gasDayBounds(now, timeZone, window === "todayBefore6am" ? 0 : 1);
      return series.filter((point) => startsWithin(point, start, split));
    }

    case "todayAfter6am":
    case "tomorrowAfter6am": {
      const { split, end } = gasDayBounds(now, timeZone, window === "todayAfter6am" ? 0 : 1);
      return series.filter((point) => startsWithin(point, split, end));
    }

    case "upcoming":
      return series.filter((point) => point.till.getTime() > now.getTime());

    case "all":
      return series;
  }
};

export const pointAt = (series: PriceSeries, instant: Date): Option.Option<PricePoint> =>
  Option.fromNullable(
    series.find((point) => point.from.getTime() <= instant.getTime() && instant.getTime() < point.till.getTime())
  );

export const pointAtHourOffset = (series: PriceSeries, now: Date, offsetHours: number): Option.Option<PricePoint> =>
  pointAt(series, new Date(now.getTime() + offsetHours * HOUR_MS));
