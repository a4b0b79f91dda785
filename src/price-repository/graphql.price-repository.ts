import { Duration, Effect, Layer, Schema } from "effect";
import { HttpClient } from "@effect/platform";
import { raw } from "@effect/platform/HttpBody";
import { AppConfig } from "../config.js";
import { toSortedSeries, type Commodity, type PricePoint, type PriceSeries } from "../prices/types.js";
import { MarketPricesResponseSchema, type MarketPrice } from "./schema.js";
import {
  PriceRepository,
  SchemaError,
  TransportError,
  type DateRange,
  type IPriceRepository,
  type PriceRepositoryError,
} from "./types.js";

export type PriceApiConfig = {
  readonly url: string;
  readonly timeoutMs: number;
};

const MARKET_PRICE_FIELDS = {
  electricity: "marketPricesElectricity",
  gas: "marketPricesGas",
} as const satisfies Record<Commodity, string>;

const buildQuery = (field: string): string => `
  query MarketPrices($startDate: Date!, $endDate: Date!) {
    ${field}(startDate: $startDate, endDate: $endDate) {
      from
      till
      marketPrice
      marketPriceTax
      sourcingMarkupPrice
      energyTaxPrice
    }
  }
`;

const toPricePoint = (entry: MarketPrice): PricePoint => ({
  from: entry.from,
  till: entry.till,
  marketPrice: entry.marketPrice,
  marketPriceTax: entry.marketPriceTax,
  sourcingMarkup: entry.sourcingMarkupPrice,
  energyTax: entry.energyTaxPrice,
});

export const toPriceSeries = (entries: readonly MarketPrice[]): PriceSeries =>
  toSortedSeries(entries.map(toPricePoint));

export class GraphQLPriceRepository implements IPriceRepository {
  constructor(
    private readonly config: PriceApiConfig,
    private readonly httpClient: HttpClient.HttpClient,
  ) { }

  public fetch(commodity: Commodity, range: DateRange): Effect.Effect<PriceSeries, PriceRepositoryError> {
    const config = this.config;
    const httpClient = this.httpClient;
    const field = MARKET_PRICE_FIELDS[commodity];

    return Effect.gen(function* () {
      const response = yield* httpClient.post(config.url, {
        headers: {
          "Content-Type": "application/json",
          "Accept": "application/json",
        },
        body: raw(JSON.stringify({
          query: buildQuery(field),
          variables: {
            startDate: range.start.toString(),
            endDate: range.end.toString(),
          },
        })),
      });

      if (response.status !== 200) {
        const responseText = yield* response.text;
        return yield* new TransportError({
          message: `Price API returned status ${response.status}. Body: ${responseText}`,
        });
      }

      const responseBody = yield* response.json;
      const parsed = yield* Schema.decodeUnknown(MarketPricesResponseSchema)(responseBody);

      if (parsed.errors && parsed.errors.length > 0) {
        const errorMessages = parsed.errors.map(({ message }) => message).join(", ");
        return yield* new SchemaError({ message: `Price API errors: ${errorMessages}` });
      }

      const entries = parsed.data?.[field];
      if (!entries) {
        return yield* new SchemaError({ message: `Price API response is missing ${field}` });
      }

      yield* Effect.logDebug(`Received ${entries.length} ${commodity} prices for ${range.start.toString()}..${range.end.toString()}`);

      return toPriceSeries(entries);
    }).pipe(
      // Releases the response once the body has been read
      Effect.scoped,
      Effect.timeout(Duration.millis(config.timeoutMs)),
      Effect.catchTags({
        TimeoutException: () => Effect.fail(
          new TransportError({ message: `Price API did not respond within ${config.timeoutMs}ms` })
        ),
        RequestError: (error) => Effect.fail(
          new TransportError({ message: `Price API request failed: ${error.message}`, cause: error })
        ),
        ResponseError: (error) => Effect.fail(
          error.reason === "Decode"
            ? new SchemaError({ message: `Price API returned an unreadable body: ${error.message}`, cause: error })
            : new TransportError({ message: `Price API response failed: ${error.message}`, cause: error })
        ),
        ParseError: (error) => Effect.fail(
          new SchemaError({ message: `Unrecognized response from price API: ${error.message}`, cause: error })
        ),
      }),
      Effect.withSpan("fetchMarketPrices", { attributes: { commodity } }),
    );
  }
}

export const GraphQLPriceRepositoryLayer = Layer.effect(
  PriceRepository,
  Effect.gen(function* () {
    const config = AppConfig.priceApi;

    return new GraphQLPriceRepository(
      {
        url: yield* config.url,
        timeoutMs: yield* config.timeoutMs,
      },
      yield* HttpClient.HttpClient
    );
  })
);
