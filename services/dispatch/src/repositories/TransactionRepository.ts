import { Context, Effect } from "effect"
import { SqlError } from "@effect/sql"
import type { OrderId, TxRef } from "../domain/DeliveryOrder.js"
import type { NewTransactionRecord, TransactionRecord } from "../domain/Transaction.js"

export class TransactionRepository extends Context.Tag("TransactionRepository")<
  TransactionRepository,
  {
    /**
     * Inserts one audit record. There is deliberately no update or delete.
     */
    readonly insert: (record: NewTransactionRecord) => Effect.Effect<TransactionRecord, SqlError.SqlError>

    /**
     * All records for a transaction reference, oldest first.
     */
    readonly findByTxRef: (txRef: TxRef) => Effect.Effect<ReadonlyArray<TransactionRecord>, SqlError.SqlError>

    /**
     * All records for an order, oldest first.
     */
    readonly findByOrderId: (orderId: OrderId) => Effect.Effect<ReadonlyArray<TransactionRecord>, SqlError.SqlError>
  }
>() {}
