import { Layer, Effect, Option } from "effect"
import { RiderAvailability } from "./RiderAvailability.js"
import { RiderRepository } from "../repositories/RiderRepository.js"
import { RiderNotEligibleError, RiderNotFoundError } from "../domain/errors.js"
import { ineligibilityReason, type RiderProfile } from "../domain/Rider.js"
import type { UserId } from "../domain/DeliveryOrder.js"

export const RiderAvailabilityLive = Layer.effect(
  RiderAvailability,
  Effect.gen(function* () {
    const repo = yield* RiderRepository

    const requireRider = (riderId: UserId) =>
      Effect.flatMap(
        Option.match({
          onNone: () => Effect.fail(new RiderNotFoundError({ riderId })),
          onSome: (rider: RiderProfile) => Effect.succeed(rider)
        })
      )

    const findById = (riderId: UserId) => repo.findById(riderId).pipe(requireRider(riderId))

    return {
      reserve: (riderId: UserId) =>
        Effect.gen(function* () {
          const reserved = yield* repo.reserve(riderId)
          if (Option.isSome(reserved)) {
            return reserved.value
          }

          const rider = yield* findById(riderId)
          // Eligible on re-read means a concurrent reservation won and was released since
          const reason = ineligibilityReason(rider) ?? "BUSY"
          yield* Effect.logInfo("Rider reservation refused", { riderId, reason })
          return yield* Effect.fail(new RiderNotEligibleError({ riderId, reason }))
        }),

      markBusy: (riderId: UserId) => repo.setHasDelivery(riderId, true).pipe(requireRider(riderId)),

      markFree: (riderId: UserId) => repo.setHasDelivery(riderId, false).pipe(requireRider(riderId)),

      incrementCancelCount: (riderId: UserId) =>
        repo.incrementCancelCount(riderId).pipe(requireRider(riderId)),

      findById
    }
  })
)
