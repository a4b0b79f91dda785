import { Context, Data, type Duration, type Effect, type Option } from "effect";
import type { Commodity, PriceComponent, PriceSeries } from "../prices/types.js";
import type { PriceRepositoryError } from "../price-repository/types.js";
import type { StatisticName } from "../statistics/catalogue.js";
import type { TimelineEntry } from "../statistics/reducers.js";
import type { PriceWindow } from "../statistics/windows.js";

export type CommodityCache = {
  readonly series: PriceSeries;
  readonly lastFetchTime: Option.Option<Date>;
  readonly lastError: Option.Option<PriceRepositoryError>;
};

export type CacheState = "Empty" | "Populated" | "Stale";

export type CommodityFreshness = {
  readonly commodity: Commodity;
  readonly state: CacheState;
  readonly lastFetchTime: Option.Option<Date>;
  readonly lastError: Option.Option<PriceRepositoryError>;
  readonly ageMs: Option.Option<number>;
  readonly expired: boolean; // no successful refresh within the staleness threshold
};

export type RefreshFailure = {
  readonly commodity: Commodity;
  readonly error: PriceRepositoryError;
};

export type RefreshResult = {
  readonly updated: readonly Commodity[];
  readonly failed: readonly RefreshFailure[];
};

// Every commodity failed before any of them was ever populated
export class ColdStartRefreshError extends Data.TaggedError("ColdStartRefresh")<{
  readonly message: string;
  readonly failures: readonly RefreshFailure[];
}> {}

export type PriceCoordinatorOptions = {
  readonly timeZone: string;
  readonly tomorrowPublicationHourUtc: number;
  readonly stalenessThreshold: Duration.Duration;
  readonly retry: {
    readonly times: number;
    readonly baseDelay: Duration.Duration;
  };
};

/**
 * One commodity's cache as read at a single instant. Statistics, timelines and
 * freshness all derive from the same cache value.
 */
export type CommodityView = {
  readonly readAt: Date;
  readonly cache: CommodityCache;
  readonly freshness: CommodityFreshness;
  readonly statistic: (name: StatisticName) => Option.Option<number>;
  readonly timeline: (window: PriceWindow, component: PriceComponent) => readonly TimelineEntry[];
};

export class PriceCoordinator extends Context.Tag("PriceCoordinator")<
  PriceCoordinator,
  {
    readonly refresh: () => Effect.Effect<RefreshResult, ColdStartRefreshError>;
    readonly getStatistic: (commodity: Commodity, name: StatisticName) => Effect.Effect<Option.Option<number>>;
    readonly getCache: (commodity: Commodity) => Effect.Effect<CommodityCache>;
    readonly freshness: (commodity: Commodity) => Effect.Effect<CommodityFreshness>;
    readonly view: (commodity: Commodity) => Effect.Effect<CommodityView>;
  }
>() {}

export type IPriceCoordinator = Context.Tag.Service<typeof PriceCoordinator>;
