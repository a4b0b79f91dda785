import type { Effect } from "effect";
import type { Commodity } from "../prices/types.js";
import type { PriceRepositoryError } from "../price-repository/types.js";

export type IEventLogger = {
  onCommodityUpdated: (commodity: Commodity, hours: number) => Effect.Effect<void>;
  onCommodityRefreshFailed: (commodity: Commodity, error: PriceRepositoryError, keptHours: number) => Effect.Effect<void>;
  onTomorrowUnavailable: (commodity: Commodity, error: PriceRepositoryError) => Effect.Effect<void>;
};
