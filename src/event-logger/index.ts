import type { IEventLogger } from "./types.js";
import type { Commodity } from "../prices/types.js";
import type { PriceRepositoryError } from "../price-repository/types.js";
import { Effect } from "effect";

export class EventLogger implements IEventLogger {

  public onCommodityUpdated(commodity: Commodity, hours: number) {
    return Effect.log(`Updated ${commodity} prices: ${hours} hours cached`);
  }

  public onCommodityRefreshFailed(commodity: Commodity, error: PriceRepositoryError, keptHours: number) {
    return Effect.logWarning(`Failed to refresh ${commodity} prices (${error._tag}: ${error.message}). Keeping ${keptHours} cached hours`);
  }

  public onTomorrowUnavailable(commodity: Commodity, error: PriceRepositoryError) {
    return Effect.logWarning(`Tomorrow's ${commodity} prices could not be fetched (${error._tag}: ${error.message}). Keeping today only`);
  }
}
