import { Context, Effect, Option } from "effect"
import { SqlError } from "@effect/sql"
import type { OrderId, TxRef, UserId } from "../domain/DeliveryOrder.js"
import type { NewTransactionRecord, TransactionRecord } from "../domain/Transaction.js"

export class TransactionRecorder extends Context.Tag("TransactionRecorder")<
  TransactionRecorder,
  {
    /**
     * Appends one immutable audit record. Runs inside the caller's unit of work.
     */
    readonly append: (
      record: NewTransactionRecord
    ) => Effect.Effect<TransactionRecord, SqlError.SqlError>

    /**
     * The ESCROW_HOLD for `txRef` on `walletId` that has not yet been refunded
     * or released.
     */
    readonly findOpenHold: (
      txRef: TxRef,
      walletId: UserId
    ) => Effect.Effect<Option.Option<TransactionRecord>, SqlError.SqlError>

    readonly hasRefund: (orderId: OrderId) => Effect.Effect<boolean, SqlError.SqlError>

    readonly listByOrder: (
      orderId: OrderId
    ) => Effect.Effect<ReadonlyArray<TransactionRecord>, SqlError.SqlError>
  }
>() {}
