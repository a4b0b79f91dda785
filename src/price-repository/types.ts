import { Context, Data, type Effect } from "effect";
import type { CalendarDate } from "@internationalized/date";
import type { Commodity, PriceSeries } from "../prices/types.js";

// End is exclusive, both dates are local to the price area.
export type DateRange = {
  readonly start: CalendarDate;
  readonly end: CalendarDate;
};

export class TransportError extends Data.TaggedError("TransportError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class SchemaError extends Data.TaggedError("SchemaError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export type PriceRepositoryError = TransportError | SchemaError;

export class PriceRepository extends Context.Tag("PriceRepository")<
  PriceRepository,
  {
    readonly fetch: (commodity: Commodity, range: DateRange) => Effect.Effect<PriceSeries, PriceRepositoryError>;
  }
>() {}

export type IPriceRepository = Context.Tag.Service<typeof PriceRepository>;
