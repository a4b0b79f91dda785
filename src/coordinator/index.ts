import { Clock, Duration, Effect, Either, Layer, Option, Ref, Schedule } from "effect";
import { AppConfig } from "../config.js";
import { EventLogger } from "../event-logger/index.js";
import type { IEventLogger } from "../event-logger/types.js";
import { COMMODITIES, toSortedSeries, type Commodity, type PriceSeries } from "../prices/types.js";
import { PriceRepository, type DateRange } from "../price-repository/types.js";
import { computeStatistic, type StatisticName } from "../statistics/catalogue.js";
import { priceTimeline } from "../statistics/reducers.js";
import { localDate, selectWindow } from "../statistics/windows.js";
import {
  ColdStartRefreshError,
  PriceCoordinator,
  type CacheState,
  type CommodityCache,
  type CommodityFreshness,
  type CommodityView,
  type PriceCoordinatorOptions,
  type RefreshFailure,
  type RefreshResult,
} from "./types.js";

const EMPTY_CACHE: CommodityCache = {
  series: [],
  lastFetchTime: Option.none(),
  lastError: Option.none(),
};

export type RequestedRanges = {
  readonly today: DateRange;
  readonly tomorrow: Option.Option<DateRange>;
};

// One query per day: the gas query only answers for the first day of its range.
// Tomorrow is only requested once the day-ahead auction has been published.
export const requestedRanges = (
  now: Date,
  options: Pick<PriceCoordinatorOptions, "timeZone" | "tomorrowPublicationHourUtc">
): RequestedRanges => {
  const today = localDate(now, options.timeZone);
  const tomorrow = today.add({ days: 1 });

  return {
    today: { start: today, end: tomorrow },
    tomorrow: now.getUTCHours() >= options.tomorrowPublicationHourUtc
      ? Option.some({ start: tomorrow, end: tomorrow.add({ days: 1 }) })
      : Option.none(),
  };
};

export const makePriceCoordinator = (
  options: PriceCoordinatorOptions,
  eventLogger: IEventLogger = new EventLogger(),
) => Effect.gen(function* () {
  const repository = yield* PriceRepository;

  const caches: Record<Commodity, Ref.Ref<CommodityCache>> = {
    electricity: yield* Ref.make(EMPTY_CACHE),
    gas: yield* Ref.make(EMPTY_CACHE),
  };

  const fetchWithRetry = (commodity: Commodity, range: DateRange) =>
    repository.fetch(commodity, range).pipe(
      Effect.retry({
        schedule: Schedule.compose(
          Schedule.recurs(options.retry.times),
          Schedule.exponential(options.retry.baseDelay, 2)
        ),
        while: (err) => err._tag === "TransportError",
      }),
    );

  // A failed tomorrow leaves today usable
  const fetchTomorrow = (commodity: Commodity, range: Option.Option<DateRange>): Effect.Effect<PriceSeries> =>
    Option.match(range, {
      onNone: () => Effect.succeed([]),
      onSome: (tomorrow) => fetchWithRetry(commodity, tomorrow).pipe(
        Effect.catchAll((err) => eventLogger.onTomorrowUnavailable(commodity, err).pipe(Effect.as([]))),
      ),
    });

  // The cache is only replaced once a complete series has been parsed
  const refreshCommodity = (
    commodity: Commodity,
    ranges: RequestedRanges
  ): Effect.Effect<Either.Either<Commodity, RefreshFailure>> => Effect.gen(function* () {
    const outcome = yield* Effect.either(
      Effect.all(
        [fetchWithRetry(commodity, ranges.today), fetchTomorrow(commodity, ranges.tomorrow)],
        { concurrency: "unbounded" }
      )
    );
    const ref = caches[commodity];

    if (Either.isRight(outcome)) {
      const fetchedAt = yield* Clock.currentTimeMillis;
      const [today, tomorrow] = outcome.right;
      const series = toSortedSeries([...today, ...tomorrow]);
      yield* Ref.set(ref, {
        series,
        lastFetchTime: Option.some(new Date(fetchedAt)),
        lastError: Option.none(),
      });
      yield* eventLogger.onCommodityUpdated(commodity, series.length);
      return Either.right(commodity);
    }

    const error = outcome.left;
    const kept = yield* Ref.updateAndGet(ref, (cache) => ({ ...cache, lastError: Option.some(error) }));
    yield* eventLogger.onCommodityRefreshFailed(commodity, error, kept.series.length);
    return Either.left({ commodity, error });
  });

  const refresh = (): Effect.Effect<RefreshResult, ColdStartRefreshError> => Effect.gen(function* () {
    const now = new Date(yield* Clock.currentTimeMillis);
    const ranges = requestedRanges(now, options);

    const before = yield* Effect.forEach(COMMODITIES, (commodity) => Ref.get(caches[commodity]));
    const neverPopulated = before.every((cache) => Option.isNone(cache.lastFetchTime));

    yield* Effect.logDebug(
      `Refreshing prices for ${ranges.today.start.toString()}${Option.isSome(ranges.tomorrow) ? " and tomorrow" : ""}`
    );

    const outcomes = yield* Effect.forEach(
      COMMODITIES,
      (commodity) => refreshCommodity(commodity, ranges),
      { concurrency: "unbounded" }
    );

    const updated: Commodity[] = [];
    const failed: RefreshFailure[] = [];
    for (const outcome of outcomes) {
      Either.match(outcome, {
        onLeft: (failure) => failed.push(failure),
        onRight: (commodity) => updated.push(commodity),
      });
    }

    if (updated.length === 0 && neverPopulated) {
      return yield* new ColdStartRefreshError({
        message: `No prices available: ${failed.map(({ commodity, error }) => `${commodity} (${error.message})`).join(", ")}`,
        failures: failed,
      });
    }

    return { updated, failed };
  }).pipe(Effect.withSpan("refreshPrices"));

  const getCache = (commodity: Commodity) => Ref.get(caches[commodity]);

  const freshnessOf = (commodity: Commodity, cache: CommodityCache, now: number): CommodityFreshness => {
    const ageMs = Option.map(cache.lastFetchTime, (fetchedAt) => now - fetchedAt.getTime());
    const expired = Option.match(ageMs, {
      onNone: () => false,
      onSome: (age) => age > Duration.toMillis(options.stalenessThreshold),
    });

    const state: CacheState = Option.isNone(cache.lastFetchTime)
      ? "Empty"
      : Option.isSome(cache.lastError) || expired
        ? "Stale"
        : "Populated";

    return {
      commodity,
      state,
      lastFetchTime: cache.lastFetchTime,
      lastError: cache.lastError,
      ageMs,
      expired,
    };
  };

  const view = (commodity: Commodity) => Effect.gen(function* () {
    const cache = yield* Ref.get(caches[commodity]);
    const readAt = new Date(yield* Clock.currentTimeMillis);
    const context = { now: readAt, timeZone: options.timeZone };
    const populated = Option.isSome(cache.lastFetchTime);

    const result: CommodityView = {
      readAt,
      cache,
      freshness: freshnessOf(commodity, cache, readAt.getTime()),
      statistic: (name) => populated ? computeStatistic(name, cache.series, context) : Option.none(),
      timeline: (window, component) => priceTimeline(selectWindow(cache.series, window, context), component),
    };
    return result;
  });

  const getStatistic = (commodity: Commodity, name: StatisticName) =>
    Effect.map(view(commodity), ({ statistic }) => statistic(name));

  const freshness = (commodity: Commodity) =>
    Effect.map(view(commodity), (snapshot) => snapshot.freshness);

  return PriceCoordinator.of({
    refresh,
    getStatistic,
    getCache,
    freshness,
    view,
  });
});

export const PriceCoordinatorLayer = (
  options: PriceCoordinatorOptions,
  eventLogger?: IEventLogger,
): Layer.Layer<PriceCoordinator, never, PriceRepository> =>
  Layer.effect(PriceCoordinator, makePriceCoordinator(options, eventLogger));

export const PriceCoordinatorLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = AppConfig.coordinator;
    const refreshInterval = Duration.minutes(yield* config.refreshIntervalMinutes);

    return PriceCoordinatorLayer({
      timeZone: yield* config.timeZone,
      tomorrowPublicationHourUtc: yield* config.tomorrowPublicationHourUtc,
      stalenessThreshold: Duration.times(refreshInterval, yield* config.stalenessFactor),
      retry: {
        times: yield* config.retryAttempts,
        baseDelay: Duration.millis(yield* config.retryBaseDelayMs),
      },
    });
  })
);
