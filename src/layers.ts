import { Layer } from "effect";
import { PriceCoordinatorLive } from "./coordinator/index.js";
import { GraphQLPriceRepositoryLayer } from "./price-repository/graphql.price-repository.js";

export const serviceLayers = PriceCoordinatorLive.pipe(
    Layer.provide(GraphQLPriceRepositoryLayer),
);
