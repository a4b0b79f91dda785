import { Clock, Data, Effect, Option } from "effect";
import type { CommodityFreshness, IPriceCoordinator } from "../coordinator/types.js";
import { COMMODITIES, type Commodity, type PriceComponent } from "../prices/types.js";
import { GAS_DAY_STATISTICS, STATISTIC_NAMES, type StatisticName } from "../statistics/catalogue.js";
import type { TimelineEntry } from "../statistics/reducers.js";
import type { PriceWindow } from "../statistics/windows.js";

// Price list exposed next to a sensor's value
export type SensorTimeline = {
  readonly window: PriceWindow;
  readonly component: PriceComponent;
};

export type SensorDescription = {
  readonly key: string;
  readonly name: string;
  readonly commodity: Commodity;
  readonly statistic: StatisticName;
  readonly unit: string;
  readonly precision: number;
  readonly timeline?: SensorTimeline;
};

export type SensorReading = {
  readonly key: string;
  readonly name: string;
  readonly unit: string;
  readonly value: number | null;
  readonly available: boolean;
  readonly stale: boolean;
  readonly timeline?: readonly TimelineEntry[];
};

export type SensorSnapshot = {
  readonly readAt: Date;
  readonly commodities: Record<Commodity, CommodityFreshness>;
  readonly readings: readonly SensorReading[];
};

export class UnknownSensorError extends Data.TaggedError("UnknownSensor")<{
  readonly key: string;
}> {
  public override readonly message = `Unknown sensor key "${this.key}" in display options`;
}

const KEY_PREFIXES: Record<Commodity, string> = {
  electricity: "elec",
  gas: "gas",
};

const COMMODITY_LABELS: Record<Commodity, string> = {
  electricity: "Electricity",
  gas: "Gas",
};

const PRICE_UNITS: Record<Commodity, string> = {
  electricity: "EUR/kWh",
  gas: "EUR/m³",
};

const STATISTIC_LABELS: Record<StatisticName, string> = {
  current_hour: "current price (all-in)",
  current_hour_market: "current market price",
  current_hour_market_tax: "current price including tax",
  current_hour_market_tax_markup: "current price including tax and markup",
  current_hour_vat: "current VAT price",
  current_hour_markup: "current sourcing markup",
  current_hour_energy_tax: "current energy tax",
  current_hour_fixed: "current fixed cost",
  current_hour_market_percent_tax: "market percent tax",
  previous_hour: "previous hour price (all-in)",
  previous_hour_market: "previous hour market price",
  next_hour: "next hour price (all-in)",
  next_hour_market: "next hour market price",
  today_min: "lowest price today (all-in)",
  today_max: "highest price today (all-in)",
  today_avg: "average price today (all-in)",
  today_avg_market: "average market price today",
  today_avg_market_tax: "average price today including tax",
  today_avg_market_tax_markup: "average price today including tax and markup",
  tomorrow_min: "lowest price tomorrow (all-in)",
  tomorrow_max: "highest price tomorrow (all-in)",
  tomorrow_avg: "average price tomorrow (all-in)",
  tomorrow_avg_market: "average market price tomorrow",
  tomorrow_avg_market_tax: "average price tomorrow including tax",
  tomorrow_avg_market_tax_markup: "average price tomorrow including tax and markup",
  upcoming_min: "lowest upcoming price (all-in)",
  upcoming_max: "highest upcoming price (all-in)",
  upcoming_avg: "average upcoming price (all-in)",
  upcoming_avg_market: "average upcoming market price",
  all_min: "lowest known price (all-in)",
  all_max: "highest known price (all-in)",
  all_avg: "average known price (all-in)",
  hour_count: "number of priced hours",
  tomorrow_hour_count: "number of priced hours tomorrow",
  today_before6am_avg: "average price today before 6:00 (all-in)",
  today_before6am_hour_count: "number of priced hours today before 6:00",
  today_after6am_avg: "average price today from 6:00 (all-in)",
  today_after6am_hour_count: "number of priced hours today from 6:00",
  tomorrow_before6am_avg: "average price tomorrow before 6:00 (all-in)",
  tomorrow_before6am_hour_count: "number of priced hours tomorrow before 6:00",
  tomorrow_after6am_avg: "average price tomorrow from 6:00 (all-in)",
  tomorrow_after6am_hour_count: "number of priced hours tomorrow from 6:00",
};

const TIMELINES: Partial<Record<StatisticName, SensorTimeline>> = {
  current_hour: { window: "all", component: "total" },
  current_hour_market: { window: "all", component: "market" },
  current_hour_market_tax: { window: "all", component: "marketWithTax" },
  current_hour_market_tax_markup: { window: "all", component: "marketWithTaxAndMarkup" },
  tomorrow_avg: { window: "tomorrow", component: "total" },
  upcoming_avg: { window: "upcoming", component: "total" },
  upcoming_avg_market: { window: "upcoming", component: "market" },
  all_avg: { window: "all", component: "total" },
  today_before6am_avg: { window: "todayBefore6am", component: "total" },
  today_after6am_avg: { window: "todayAfter6am", component: "total" },
  tomorrow_before6am_avg: { window: "tomorrowBefore6am", component: "total" },
  tomorrow_after6am_avg: { window: "tomorrowAfter6am", component: "total" },
};

const unitFor = (commodity: Commodity, statistic: StatisticName): { unit: string; precision: number } => {
  switch (statistic) {
    case "current_hour_market_percent_tax":
      return { unit: "%", precision: 0 };

    case "hour_count":
    case "tomorrow_hour_count":
    case "today_before6am_hour_count":
    case "today_after6am_hour_count":
    case "tomorrow_before6am_hour_count":
    case "tomorrow_after6am_hour_count":
      return { unit: "h", precision: 0 };

    default:
      return { unit: PRICE_UNITS[commodity], precision: 3 };
  }
};

const statisticsFor = (commodity: Commodity): readonly StatisticName[] =>
  commodity === "gas" ? STATISTIC_NAMES : STATISTIC_NAMES.filter((statistic) => !GAS_DAY_STATISTICS.has(statistic));

export const SENSOR_DESCRIPTIONS: readonly SensorDescription[] = COMMODITIES.flatMap((commodity) =>
  statisticsFor(commodity).map((statistic): SensorDescription => {
    const description: SensorDescription = {
      key: `${KEY_PREFIXES[commodity]}_${statistic}`,
      name: `${COMMODITY_LABELS[commodity]} ${STATISTIC_LABELS[statistic]}`,
      commodity,
      statistic,
      ...unitFor(commodity, statistic),
    };
    const timeline = TIMELINES[statistic];
    return timeline ? { ...description, timeline } : description;
  })
);

/**
 * Resolves the configured display options to sensor descriptions.
 * An empty selection exposes every sensor.
 */
export const selectSensors = (keys: ReadonlyArray<string>): Effect.Effect<readonly SensorDescription[], UnknownSensorError> =>
  Effect.gen(function* () {
    const wanted = keys.map((key) => key.trim()).filter((key) => key.length > 0);
    if (wanted.length === 0) {
      return SENSOR_DESCRIPTIONS;
    }

    const selected: SensorDescription[] = [];
    for (const key of wanted) {
      const sensor = SENSOR_DESCRIPTIONS.find((description) => description.key === key);
      if (!sensor) {
        return yield* new UnknownSensorError({ key });
      }
      selected.push(sensor);
    }
    return selected;
  });

const round = (value: number, precision: number): number => {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
};

/**
 * Reads every commodity's cache once and derives all readings from that
 * value, so a concurrent refresh cannot mix two series into one snapshot.
 */
export const readSensors = (
  coordinator: IPriceCoordinator,
  sensors: readonly SensorDescription[]
): Effect.Effect<SensorSnapshot> =>
  Effect.gen(function* () {
    const readAt = new Date(yield* Clock.currentTimeMillis);

    const views = {
      electricity: yield* coordinator.view("electricity"),
      gas: yield* coordinator.view("gas"),
    };

    const commodities: Record<Commodity, CommodityFreshness> = {
      electricity: views.electricity.freshness,
      gas: views.gas.freshness,
    };

    const readings = sensors.map((sensor): SensorReading => {
      const view = views[sensor.commodity];
      const value = view.statistic(sensor.statistic);
      const reading: SensorReading = {
        key: sensor.key,
        name: sensor.name,
        unit: sensor.unit,
        value: Option.match(value, {
          onNone: () => null,
          onSome: (v) => round(v, sensor.precision),
        }),
        available: Option.isSome(value),
        stale: view.freshness.state === "Stale",
      };

      return sensor.timeline
        ? { ...reading, timeline: view.timeline(sensor.timeline.window, sensor.timeline.component) }
        : reading;
    });

    return { readAt, commodities, readings };
  });
