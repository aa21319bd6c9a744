import { Layer, Effect, Option, DateTime, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import { DeliveryOrderRepository, type RiderClaim, type StatusGuard } from "./DeliveryOrderRepository.js"
import {
  DeliveryOrder,
  DeliveryStatus,
  OrderId,
  PaymentStatus,
  TxRef,
  UserId,
  type DeliveryStatus as DeliveryStatusType,
  type PaymentStatus as PaymentStatusType
} from "../domain/DeliveryOrder.js"

// Database row type (snake_case)
interface DeliveryOrderRow {
  id: string
  tx_ref: string
  payment_status: string
  delivery_status: string
  sender_id: string
  rider_id: string | null
  dispatch_id: string | null
  rider_phone_number: string | null
  delivery_fee: number
  amount_due_dispatch: number
  total_price: number
  is_sender_cancelled: boolean
  cancel_reason: string | null
  created_at: Date
  updated_at: Date
}

const decodeUserId = Schema.decodeUnknownSync(UserId)

const mapRowToOrder = (row: DeliveryOrderRow): DeliveryOrder =>
  new DeliveryOrder({
    id: Schema.decodeUnknownSync(OrderId)(row.id),
    txRef: Schema.decodeUnknownSync(TxRef)(row.tx_ref),
    paymentStatus: Schema.decodeUnknownSync(PaymentStatus)(row.payment_status),
    deliveryStatus: Schema.decodeUnknownSync(DeliveryStatus)(row.delivery_status),
    senderId: decodeUserId(row.sender_id),
    riderId: row.rider_id === null ? null : decodeUserId(row.rider_id),
    dispatchId: row.dispatch_id === null ? null : decodeUserId(row.dispatch_id),
    riderPhoneNumber: row.rider_phone_number,
    deliveryFee: row.delivery_fee,
    amountDueDispatch: row.amount_due_dispatch,
    totalPrice: row.total_price,
    isSenderCancelled: row.is_sender_cancelled,
    cancelReason: row.cancel_reason,
    createdAt: DateTime.unsafeFromDate(row.created_at),
    updatedAt: DateTime.unsafeFromDate(row.updated_at)
  })

const firstOrder = (rows: ReadonlyArray<DeliveryOrderRow>): Option.Option<DeliveryOrder> =>
  rows.length > 0 ? Option.some(mapRowToOrder(rows[0])) : Option.none()

export const DeliveryOrderRepositoryLive = Layer.effect(
  DeliveryOrderRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    // Rider condition of a guard; matches every row when no rider is expected
    const riderCondition = (guard: StatusGuard) =>
      guard.riderId === undefined ? sql`TRUE` : sql`rider_id = ${guard.riderId}`

    return {
      findById: (id: OrderId) =>
        Effect.gen(function* () {
          const rows = yield* sql<DeliveryOrderRow>`
            SELECT * FROM delivery_orders WHERE id = ${id}
          `
          return firstOrder(rows)
        }),

      findByTxRef: (txRef: TxRef) =>
        Effect.gen(function* () {
          const rows = yield* sql<DeliveryOrderRow>`
            SELECT * FROM delivery_orders WHERE tx_ref = ${txRef}
          `
          return firstOrder(rows)
        }),

      claimRider: (
        orderId: OrderId,
        claim: RiderClaim,
        transition: { readonly from: ReadonlyArray<DeliveryStatusType>; readonly to: DeliveryStatusType }
      ) =>
        Effect.gen(function* () {
          // Only one concurrent claim can see rider_id IS NULL
          const rows = yield* sql<DeliveryOrderRow>`
            UPDATE delivery_orders
            SET rider_id = ${claim.riderId},
                dispatch_id = ${claim.dispatchId},
                rider_phone_number = ${claim.riderPhoneNumber},
                delivery_status = ${transition.to},
                updated_at = NOW()
            WHERE id = ${orderId}
              AND rider_id IS NULL
              AND payment_status = 'PAID'
              AND delivery_status IN ${sql.in(transition.from)}
            RETURNING *
          `
          return firstOrder(rows)
        }),

      transitionStatus: (orderId: OrderId, guard: StatusGuard, to: DeliveryStatusType) =>
        Effect.gen(function* () {
          const rows = yield* sql<DeliveryOrderRow>`
            UPDATE delivery_orders
            SET delivery_status = ${to},
                updated_at = NOW()
            WHERE id = ${orderId}
              AND delivery_status IN ${sql.in(guard.from)}
              AND ${riderCondition(guard)}
            RETURNING *
          `
          return firstOrder(rows)
        }),

      releaseRider: (orderId: OrderId, guard: StatusGuard, paymentStatus: PaymentStatusType) =>
        Effect.gen(function* () {
          const rows = yield* sql<DeliveryOrderRow>`
            UPDATE delivery_orders
            SET rider_id = NULL,
                dispatch_id = NULL,
                rider_phone_number = NULL,
                delivery_status = 'PAID_NEEDS_RIDER',
                payment_status = ${paymentStatus},
                updated_at = NOW()
            WHERE id = ${orderId}
              AND delivery_status IN ${sql.in(guard.from)}
              AND ${riderCondition(guard)}
            RETURNING *
          `
          return firstOrder(rows)
        }),

      cancelBySender: (orderId: OrderId, guard: StatusGuard, reason: string | null) =>
        Effect.gen(function* () {
          const rows = yield* sql<DeliveryOrderRow>`
            UPDATE delivery_orders
            SET delivery_status = 'CANCELLED',
                rider_id = NULL,
                dispatch_id = NULL,
                rider_phone_number = NULL,
                is_sender_cancelled = TRUE,
                cancel_reason = ${reason},
                updated_at = NOW()
            WHERE id = ${orderId}
              AND delivery_status IN ${sql.in(guard.from)}
              AND ${riderCondition(guard)}
            RETURNING *
          `
          return firstOrder(rows)
        }),

      flagForReturn: (orderId: OrderId, guard: StatusGuard, reason: string | null) =>
        Effect.gen(function* () {
          const rows = yield* sql<DeliveryOrderRow>`
            UPDATE delivery_orders
            SET is_sender_cancelled = TRUE,
                cancel_reason = ${reason},
                updated_at = NOW()
            WHERE id = ${orderId}
              AND delivery_status IN ${sql.in(guard.from)}
              AND ${riderCondition(guard)}
            RETURNING *
          `
          return firstOrder(rows)
        })
    }
  })
)
