import { Context, Effect } from "effect"
import { SqlError } from "@effect/sql"
import type { UserId } from "../domain/DeliveryOrder.js"
import type { RiderProfile } from "../domain/Rider.js"
import type { RiderNotFoundError, RiderReservationError } from "../domain/errors.js"

export class RiderAvailability extends Context.Tag("RiderAvailability")<
  RiderAvailability,
  {
    /**
     * Marks an eligible rider busy. The eligibility check and the write are
     * one statement, so a rider already taken by a concurrent transition
     * fails with RiderNotEligibleError (reason BUSY).
     */
    readonly reserve: (
      riderId: UserId
    ) => Effect.Effect<RiderProfile, RiderReservationError | SqlError.SqlError>

    readonly markBusy: (riderId: UserId) => Effect.Effect<RiderProfile, RiderNotFoundError | SqlError.SqlError>

    readonly markFree: (riderId: UserId) => Effect.Effect<RiderProfile, RiderNotFoundError | SqlError.SqlError>

    readonly incrementCancelCount: (
      riderId: UserId
    ) => Effect.Effect<RiderProfile, RiderNotFoundError | SqlError.SqlError>

    readonly findById: (riderId: UserId) => Effect.Effect<RiderProfile, RiderNotFoundError | SqlError.SqlError>
  }
>() {}
