import { Schema } from "effect"

// Branded types for type safety
export const OrderId = Schema.UUID.pipe(Schema.brand("OrderId"))
export type OrderId = typeof OrderId.Type

// Senders, riders and dispatchers all share the user id space
export const UserId = Schema.UUID.pipe(Schema.brand("UserId"))
export type UserId = typeof UserId.Type

// External correlation key issued when payment is initiated
export const TxRef = Schema.NonEmptyTrimmedString.pipe(
  Schema.maxLength(128),
  Schema.brand("TxRef")
)
export type TxRef = typeof TxRef.Type

// Integer minor currency units (kobo / cents)
export const MinorUnits = Schema.Int.pipe(Schema.nonNegative())

export const PaymentStatus = Schema.Literal("UNPAID", "PAID")
export type PaymentStatus = typeof PaymentStatus.Type

// Delivery status enum - use Schema.Literal for exhaustive matching
export const DeliveryStatus = Schema.Literal(
  "PENDING",
  "PAID_NEEDS_RIDER",
  "ASSIGNED",
  "ACCEPTED",
  "PICKED_UP",
  "IN_TRANSIT",
  "DELIVERED",
  "COMPLETED",
  "CANCELLED"
)
export type DeliveryStatus = typeof DeliveryStatus.Type

export class DeliveryOrder extends Schema.Class<DeliveryOrder>("DeliveryOrder")({
  id: OrderId,
  txRef: TxRef,
  paymentStatus: PaymentStatus,
  deliveryStatus: DeliveryStatus,
  senderId: UserId,
  riderId: Schema.NullOr(UserId),
  dispatchId: Schema.NullOr(UserId),
  riderPhoneNumber: Schema.NullOr(Schema.String),
  deliveryFee: MinorUnits,
  amountDueDispatch: MinorUnits,
  totalPrice: MinorUnits,
  isSenderCancelled: Schema.Boolean,
  cancelReason: Schema.NullOr(Schema.String),
  createdAt: Schema.DateTimeUtc,
  updatedAt: Schema.DateTimeUtc
}) {
  /** Sender cancelled after pickup; the parcel goes back instead of terminating. */
  get isFlaggedForReturn(): boolean {
    return this.isSenderCancelled && this.deliveryStatus !== "CANCELLED"
  }
}

// Request schemas for API input
export class AssignRiderRequest extends Schema.Class<AssignRiderRequest>("AssignRiderRequest")({
  rider_id: UserId
}) {}

export class SenderCancellationRequest extends Schema.Class<SenderCancellationRequest>("SenderCancellationRequest")({
  reason: Schema.optionalWith(
    Schema.NullOr(
      Schema.String.pipe(
        Schema.maxLength(500, { message: () => "Cancellation reason cannot exceed 500 characters" })
      )
    ),
    { default: () => null }
  )
}) {}

// Path parameter schemas for routes
export const TxRefParams = Schema.Struct({
  tx_ref: TxRef
})

export const OrderIdParams = Schema.Struct({
  order_id: OrderId
})

// Caller identity supplied by the upstream auth layer
export const ActorId = UserId
