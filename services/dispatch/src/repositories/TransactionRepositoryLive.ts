import { Layer, Effect, DateTime, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import { TransactionRepository } from "./TransactionRepository.js"
import { OrderId, TxRef, UserId } from "../domain/DeliveryOrder.js"
import {
  TransactionDetails,
  TransactionId,
  TransactionRecord,
  TransactionType,
  type NewTransactionRecord
} from "../domain/Transaction.js"

interface TransactionRow {
  id: string
  tx_ref: string
  order_id: string
  wallet_id: string
  amount: number
  from_user_id: string | null
  to_user_id: string | null
  transaction_type: string
  payment_status: string
  order_type: string
  balance_delta: number
  escrow_delta: number
  details: unknown // JSONB
  created_at: Date
}

// JSONB shape of the details column
const StoredDetails = Schema.Struct({
  label: Schema.String,
  reason: Schema.String,
  actor_id: Schema.NullOr(Schema.String)
})

const decodeUserId = Schema.decodeUnknownSync(UserId)

const mapRowToRecord = (row: TransactionRow): TransactionRecord => {
  const details = Schema.decodeUnknownSync(StoredDetails)(row.details)
  return new TransactionRecord({
    id: Schema.decodeUnknownSync(TransactionId)(row.id),
    txRef: Schema.decodeUnknownSync(TxRef)(row.tx_ref),
    orderId: Schema.decodeUnknownSync(OrderId)(row.order_id),
    walletId: decodeUserId(row.wallet_id),
    amount: row.amount,
    fromUserId: row.from_user_id === null ? null : decodeUserId(row.from_user_id),
    toUserId: row.to_user_id === null ? null : decodeUserId(row.to_user_id),
    transactionType: Schema.decodeUnknownSync(TransactionType)(row.transaction_type),
    paymentStatus: Schema.decodeUnknownSync(Schema.Literal("SUCCESS"))(row.payment_status),
    orderType: Schema.decodeUnknownSync(Schema.Literal("DELIVERY"))(row.order_type),
    balanceDelta: row.balance_delta,
    escrowDelta: row.escrow_delta,
    details: Schema.decodeUnknownSync(TransactionDetails)({
      label: details.label,
      reason: details.reason,
      actorId: details.actor_id
    }),
    createdAt: DateTime.unsafeFromDate(row.created_at)
  })
}

export const TransactionRepositoryLive = Layer.effect(
  TransactionRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    return {
      insert: (record: NewTransactionRecord) =>
        Effect.gen(function* () {
          const details = JSON.stringify({
            label: record.label,
            reason: record.reason,
            actor_id: record.actorId
          })
          const rows = yield* sql<TransactionRow>`
            INSERT INTO transactions (
              tx_ref,
              order_id,
              wallet_id,
              amount,
              from_user_id,
              to_user_id,
              transaction_type,
              payment_status,
              order_type,
              balance_delta,
              escrow_delta,
              details
            )
            VALUES (
              ${record.txRef},
              ${record.orderId},
              ${record.walletId},
              ${record.amount},
              ${record.fromUserId},
              ${record.toUserId},
              ${record.transactionType},
              'SUCCESS',
              'DELIVERY',
              ${record.balanceDelta},
              ${record.escrowDelta},
              ${details}::jsonb
            )
            RETURNING *
          `
          return mapRowToRecord(rows[0])
        }),

      findByTxRef: (txRef: TxRef) =>
        Effect.gen(function* () {
          const rows = yield* sql<TransactionRow>`
            SELECT * FROM transactions
            WHERE tx_ref = ${txRef}
            ORDER BY created_at ASC, seq ASC
          `
          return rows.map(mapRowToRecord)
        }),

      findByOrderId: (orderId: OrderId) =>
        Effect.gen(function* () {
          const rows = yield* sql<TransactionRow>`
            SELECT * FROM transactions
            WHERE order_id = ${orderId}
            ORDER BY created_at ASC, seq ASC
          `
          return rows.map(mapRowToRecord)
        })
    }
  })
)
