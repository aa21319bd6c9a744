import { Context, Effect, Option } from "effect"
import { SqlError } from "@effect/sql"
import type {
  DeliveryOrder,
  DeliveryStatus,
  OrderId,
  PaymentStatus,
  TxRef,
  UserId
} from "../domain/DeliveryOrder.js"

// Rider snapshot written onto the order when it is claimed
export interface RiderClaim {
  readonly riderId: UserId
  readonly dispatchId: UserId
  readonly riderPhoneNumber: string | null
}

// Compare-and-set guard evaluated by the UPDATE itself
export interface StatusGuard {
  readonly from: ReadonlyArray<DeliveryStatus>
  readonly riderId?: UserId
}

export class DeliveryOrderRepository extends Context.Tag("DeliveryOrderRepository")<
  DeliveryOrderRepository,
  {
    /**
     * Finds an order by its ID.
     * Returns Option.none() if not found.
     */
    readonly findById: (
      id: OrderId
    ) => Effect.Effect<Option.Option<DeliveryOrder>, SqlError.SqlError>

    /**
     * Finds an order by its transaction reference.
     * Returns Option.none() if not found.
     */
    readonly findByTxRef: (
      txRef: TxRef
    ) => Effect.Effect<Option.Option<DeliveryOrder>, SqlError.SqlError>

    /**
     * Attaches a rider to a paid, unassigned order and moves it to `to`.
     * Matches only while rider_id IS NULL, payment is PAID and the status is
     * one of `from`, so of two concurrent claims exactly one gets a row back.
     */
    readonly claimRider: (
      orderId: OrderId,
      claim: RiderClaim,
      transition: { readonly from: ReadonlyArray<DeliveryStatus>; readonly to: DeliveryStatus }
    ) => Effect.Effect<Option.Option<DeliveryOrder>, SqlError.SqlError>

    /**
     * Moves the order to `to` if the guard still holds.
     * Returns Option.none() when another writer got there first.
     */
    readonly transitionStatus: (
      orderId: OrderId,
      guard: StatusGuard,
      to: DeliveryStatus
    ) => Effect.Effect<Option.Option<DeliveryOrder>, SqlError.SqlError>

    /**
     * Clears rider, dispatcher and phone snapshot and returns the order to
     * PAID_NEEDS_RIDER with the given payment status. UNPAID after a refunded
     * hold keeps the order from being claimed until it is paid again.
     */
    readonly releaseRider: (
      orderId: OrderId,
      guard: StatusGuard,
      paymentStatus: PaymentStatus
    ) => Effect.Effect<Option.Option<DeliveryOrder>, SqlError.SqlError>

    /**
     * Terminates the order as CANCELLED by its sender, clearing rider fields.
     */
    readonly cancelBySender: (
      orderId: OrderId,
      guard: StatusGuard,
      reason: string | null
    ) => Effect.Effect<Option.Option<DeliveryOrder>, SqlError.SqlError>

    /**
     * Flags a picked-up order for return without changing its status.
     */
    readonly flagForReturn: (
      orderId: OrderId,
      guard: StatusGuard,
      reason: string | null
    ) => Effect.Effect<Option.Option<DeliveryOrder>, SqlError.SqlError>
  }
>() {}
