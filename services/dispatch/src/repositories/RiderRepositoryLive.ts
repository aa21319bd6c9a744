import { Layer, Effect, Option, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import { RiderRepository } from "./RiderRepository.js"
import { UserId } from "../domain/DeliveryOrder.js"
import { RiderProfile, UserType } from "../domain/Rider.js"

interface ProfileRow {
  id: string
  user_type: string
  full_name: string
  email: string | null
  phone_number: string | null
  is_online: boolean
  has_delivery: boolean
  is_blocked: boolean
  dispatcher_id: string | null
  order_cancel_count: number
}

const decodeUserId = Schema.decodeUnknownSync(UserId)

const mapRowToProfile = (row: ProfileRow): RiderProfile =>
  new RiderProfile({
    id: decodeUserId(row.id),
    userType: Schema.decodeUnknownSync(UserType)(row.user_type),
    fullName: row.full_name,
    email: row.email,
    phoneNumber: row.phone_number,
    isOnline: row.is_online,
    hasDelivery: row.has_delivery,
    isBlocked: row.is_blocked,
    dispatcherId: row.dispatcher_id === null ? null : decodeUserId(row.dispatcher_id),
    orderCancelCount: row.order_cancel_count
  })

const firstProfile = (rows: ReadonlyArray<ProfileRow>): Option.Option<RiderProfile> =>
  rows.length > 0 ? Option.some(mapRowToProfile(rows[0])) : Option.none()

export const RiderRepositoryLive = Layer.effect(
  RiderRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    return {
      findById: (id: UserId) =>
        Effect.gen(function* () {
          const rows = yield* sql<ProfileRow>`
            SELECT * FROM profiles WHERE id = ${id}
          `
          return firstProfile(rows)
        }),

      reserve: (id: UserId) =>
        Effect.gen(function* () {
          // Eligibility is re-checked by the UPDATE so two orders cannot take the same rider
          const rows = yield* sql<ProfileRow>`
            UPDATE profiles
            SET has_delivery = TRUE
            WHERE id = ${id}
              AND user_type = 'RIDER'
              AND is_online = TRUE
              AND has_delivery = FALSE
              AND is_blocked = FALSE
            RETURNING *
          `
          return firstProfile(rows)
        }),

      setHasDelivery: (id: UserId, hasDelivery: boolean) =>
        Effect.gen(function* () {
          const rows = yield* sql<ProfileRow>`
            UPDATE profiles
            SET has_delivery = ${hasDelivery}
            WHERE id = ${id}
            RETURNING *
          `
          return firstProfile(rows)
        }),

      incrementCancelCount: (id: UserId) =>
        Effect.gen(function* () {
          const rows = yield* sql<ProfileRow>`
            UPDATE profiles
            SET order_cancel_count = order_cancel_count + 1
            WHERE id = ${id}
            RETURNING *
          `
          return firstProfile(rows)
        })
    }
  })
)
