import { Option } from "effect";
import { priceOf, type PriceComponent, type PricePoint, type PriceSeries } from "../prices/types.js";

// Every reducer yields none for an empty window, never zero.

export const minimum = (points: PriceSeries, component: PriceComponent = "total"): Option.Option<number> =>
  Option.map(cheapestPoint(points, component), (point) => priceOf(point, component));

export const maximum = (points: PriceSeries, component: PriceComponent = "total"): Option.Option<number> =>
  Option.map(priciestPoint(points, component), (point) => priceOf(point, component));

export const average = (points: PriceSeries, component: PriceComponent = "total"): Option.Option<number> => {
  if (points.length === 0) {
    return Option.none();
  }

  const sum = points.reduce((acc, point) => acc + priceOf(point, component), 0);
  return Option.some(sum / points.length);
};

export const count = (points: PriceSeries): Option.Option<number> =>
  points.length === 0 ? Option.none() : Option.some(points.length);

const pickBy = (
  points: PriceSeries,
  component: PriceComponent,
  better: (candidate: number, current: number) => boolean
): Option.Option<PricePoint> => {
  let best: PricePoint | undefined;
  for (const point of points) {
    if (best === undefined || better(priceOf(point, component), priceOf(best, component))) {
      best = point;
    }
  }
  return Option.fromNullable(best);
};

// First occurrence wins on ties
export const cheapestPoint = (points: PriceSeries, component: PriceComponent = "total"): Option.Option<PricePoint> =>
  pickBy(points, component, (candidate, current) => candidate < current);

export const priciestPoint = (points: PriceSeries, component: PriceComponent = "total"): Option.Option<PricePoint> =>
  pickBy(points, component, (candidate, current) => candidate > current);

export type TimelineEntry = {
  readonly from: Date;
  readonly till: Date;
  readonly price: number;
};

export const priceTimeline = (points: PriceSeries, component: PriceComponent = "total"): readonly TimelineEntry[] =>
  points.map((point) => ({ from: point.from, till: point.till, price: priceOf(point, component) }));
