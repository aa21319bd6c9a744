import { Schema } from "effect"
import { OrderId, TxRef, UserId } from "./DeliveryOrder.js"

export const TransactionId = Schema.UUID.pipe(Schema.brand("TransactionId"))
export type TransactionId = typeof TransactionId.Type

export const TransactionType = Schema.Literal(
  "ESCROW_HOLD",
  "ESCROW_RELEASE",
  "PAYOUT",
  "REFUNDED"
)
export type TransactionType = typeof TransactionType.Type

export const EntryLabel = Schema.Literal("CREDIT", "DEBIT")
export type EntryLabel = typeof EntryLabel.Type

// Why the ledger moved; stored with every record for dispute resolution
export const PostingReason = Schema.Literal(
  "PAYMENT_CAPTURED",
  "DELIVERY_PICKED_UP",
  "DELIVERY_COMPLETED",
  "SENDER_ESCROW_RELEASED",
  "RIDER_DECLINED",
  "SENDER_CANCELLED"
)
export type PostingReason = typeof PostingReason.Type

export class TransactionDetails extends Schema.Class<TransactionDetails>("TransactionDetails")({
  label: EntryLabel,
  reason: PostingReason,
  actorId: Schema.NullOr(UserId)
}) {}

export class TransactionRecord extends Schema.Class<TransactionRecord>("TransactionRecord")({
  id: TransactionId,
  txRef: TxRef,
  orderId: OrderId,
  walletId: UserId,
  amount: Schema.Int.pipe(Schema.nonNegative()),
  fromUserId: Schema.NullOr(UserId),
  toUserId: Schema.NullOr(UserId),
  transactionType: TransactionType,
  paymentStatus: Schema.Literal("SUCCESS"),
  orderType: Schema.Literal("DELIVERY"),
  balanceDelta: Schema.Int,
  escrowDelta: Schema.Int,
  details: TransactionDetails,
  createdAt: Schema.DateTimeUtc
}) {}

// Everything the caller decides about a record; ids, deltas and timestamps are filled in on append
export interface LedgerEntry {
  readonly txRef: TxRef
  readonly orderId: OrderId
  readonly amount: number
  readonly fromUserId: UserId | null
  readonly toUserId: UserId | null
  readonly transactionType: TransactionType
  readonly label: EntryLabel
  readonly reason: PostingReason
  readonly actorId: UserId | null
}

export interface NewTransactionRecord extends LedgerEntry {
  readonly walletId: UserId
  readonly balanceDelta: number
  readonly escrowDelta: number
}

const CLOSES_HOLD: ReadonlyArray<TransactionType> = ["REFUNDED", "ESCROW_RELEASE"]

/**
 * The latest ESCROW_HOLD on `walletId` that no later REFUNDED or
 * ESCROW_RELEASE record on the same wallet has closed. Records must be in
 * insertion order.
 */
export const findOpenHold = (
  records: ReadonlyArray<TransactionRecord>,
  walletId: UserId
): TransactionRecord | undefined => {
  let open: TransactionRecord | undefined
  for (const record of records) {
    if (record.walletId !== walletId) continue
    if (record.transactionType === "ESCROW_HOLD") open = record
    else if (CLOSES_HOLD.includes(record.transactionType)) open = undefined
  }
  return open
}
