import { Schema } from "effect";

export const MarketPriceSchema = Schema.Struct({
  from: Schema.Date,
  till: Schema.Date,
  marketPrice: Schema.Number,
  marketPriceTax: Schema.Number,
  sourcingMarkupPrice: Schema.Number,
  energyTaxPrice: Schema.Number,
});

export type MarketPrice = typeof MarketPriceSchema.Type;

const MarketPriceListSchema = Schema.optional(Schema.NullOr(Schema.Array(MarketPriceSchema)));

export const MarketPricesResponseSchema = Schema.Struct({
  data: Schema.optional(
    Schema.NullOr(
      Schema.Struct({
        marketPricesElectricity: MarketPriceListSchema,
        marketPricesGas: MarketPriceListSchema,
      })
    )
  ),
  errors: Schema.optional(Schema.Array(Schema.Struct({ message: Schema.String }))),
});

export type MarketPricesResponse = typeof MarketPricesResponseSchema.Encoded;
