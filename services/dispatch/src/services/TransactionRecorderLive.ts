import { Layer, Effect, Option } from "effect"
import { TransactionRecorder } from "./TransactionRecorder.js"
import { TransactionRepository } from "../repositories/TransactionRepository.js"
import type { OrderId, TxRef, UserId } from "../domain/DeliveryOrder.js"
import { findOpenHold, type NewTransactionRecord } from "../domain/Transaction.js"

export const TransactionRecorderLive = Layer.effect(
  TransactionRecorder,
  Effect.gen(function* () {
    const repo = yield* TransactionRepository

    return {
      append: (record: NewTransactionRecord) =>
        repo.insert(record).pipe(
          Effect.tap((stored) =>
            Effect.logDebug("Transaction recorded", {
              transactionId: stored.id,
              txRef: stored.txRef,
              walletId: stored.walletId,
              transactionType: stored.transactionType,
              amount: stored.amount
            })
          )
        ),

      findOpenHold: (txRef: TxRef, walletId: UserId) =>
        repo.findByTxRef(txRef).pipe(
          Effect.map((records) => Option.fromNullable(findOpenHold(records, walletId)))
        ),

      hasRefund: (orderId: OrderId) =>
        repo.findByOrderId(orderId).pipe(
          Effect.map((records) => records.some((record) => record.transactionType === "REFUNDED"))
        ),

      listByOrder: (orderId: OrderId) => repo.findByOrderId(orderId)
    }
  })
)
