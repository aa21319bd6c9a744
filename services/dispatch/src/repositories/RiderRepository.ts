import { Context, Effect, Option } from "effect"
import { SqlError } from "@effect/sql"
import type { UserId } from "../domain/DeliveryOrder.js"
import type { RiderProfile } from "../domain/Rider.js"

export class RiderRepository extends Context.Tag("RiderRepository")<
  RiderRepository,
  {
    readonly findById: (id: UserId) => Effect.Effect<Option.Option<RiderProfile>, SqlError.SqlError>

    /**
     * Marks the rider busy only if it is currently eligible
     * (RIDER, online, not busy, not blocked). Option.none() means the
     * profile is missing or failed one of those checks at write time.
     */
    readonly reserve: (id: UserId) => Effect.Effect<Option.Option<RiderProfile>, SqlError.SqlError>

    readonly setHasDelivery: (
      id: UserId,
      hasDelivery: boolean
    ) => Effect.Effect<Option.Option<RiderProfile>, SqlError.SqlError>

    readonly incrementCancelCount: (id: UserId) => Effect.Effect<Option.Option<RiderProfile>, SqlError.SqlError>
  }
>() {}
