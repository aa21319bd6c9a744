import { Context, Effect } from "effect"
import { SqlError } from "@effect/sql"
import type {
  DeliveryOrder,
  DeliveryStatus,
  OrderId,
  TxRef,
  UserId
} from "../domain/DeliveryOrder.js"
import type {
  InsufficientFundsError,
  InvalidDeliveryStatusError,
  OrderAlreadyAssignedError,
  OrderNotFoundError,
  PaymentNotCompletedError,
  RiderMismatchError,
  RiderNotAttachedError,
  RiderNotEligibleError,
  RiderNotFoundError,
  UnauthorizedActorError,
  WalletNotFoundError
} from "../domain/errors.js"

// Per-operation result records

export interface AssignRiderResult {
  readonly orderId: OrderId
  readonly riderId: UserId
  readonly dispatchId: UserId
  readonly riderName: string
  readonly riderPhone: string | null
  readonly riderEmail: string | null
  readonly status: "ASSIGNED"
}

export interface StatusResult {
  readonly orderId: OrderId
  readonly status: DeliveryStatus
}

export interface DeclineResult {
  readonly orderId: OrderId
  readonly previousRiderId: UserId | null
  // 0 when no open hold was found
  readonly refundedAmount: number
}

export interface CompletionResult {
  readonly orderId: OrderId
  readonly status: "COMPLETED"
  readonly amountPaidOut: number
  readonly platformCommission: number
}

export type SenderCancellationResult =
  | { readonly _tag: "MarkedForReturn"; readonly orderId: OrderId }
  | { readonly _tag: "CancelledAndRefunded"; readonly orderId: OrderId; readonly refundedAmount: number }

type ClaimError =
  | OrderNotFoundError
  | PaymentNotCompletedError
  | InvalidDeliveryStatusError
  | OrderAlreadyAssignedError
  | RiderNotFoundError
  | RiderNotEligibleError

type RiderStepError = OrderNotFoundError | InvalidDeliveryStatusError | UnauthorizedActorError

export class DeliveryService extends Context.Tag("DeliveryService")<
  DeliveryService,
  {
    /**
     * Attaches an eligible rider to a paid, unassigned order.
     * Of two concurrent assignments exactly one succeeds; the other fails with
     * OrderAlreadyAssignedError (different order winner) or
     * RiderNotEligibleError (same rider taken elsewhere).
     */
    readonly assignRider: (
      txRef: TxRef,
      riderId: UserId
    ) => Effect.Effect<AssignRiderResult, ClaimError | SqlError.SqlError>

    /**
     * Rider accepts the order. From PAID_NEEDS_RIDER this claims the order
     * directly; repeating an accept that already succeeded is a no-op.
     */
    readonly acceptDelivery: (
      txRef: TxRef,
      riderId: UserId
    ) => Effect.Effect<StatusResult, ClaimError | RiderMismatchError | SqlError.SqlError>

    /**
     * Returns the order to the unassigned pool, frees the rider and refunds
     * the sender's open hold if there is one.
     */
    readonly declineDelivery: (
      txRef: TxRef
    ) => Effect.Effect<
      DeclineResult,
      | OrderNotFoundError
      | InvalidDeliveryStatusError
      | RiderNotFoundError
      | WalletNotFoundError
      | InsufficientFundsError
      | SqlError.SqlError
    >

    /**
     * Moves the delivery fee into the dispatcher's escrow.
     */
    readonly pickupDelivery: (
      txRef: TxRef,
      riderId: UserId
    ) => Effect.Effect<
      StatusResult,
      RiderStepError | WalletNotFoundError | InsufficientFundsError | SqlError.SqlError
    >

    readonly markInTransit: (
      txRef: TxRef,
      riderId: UserId
    ) => Effect.Effect<StatusResult, RiderStepError | SqlError.SqlError>

    readonly markDelivered: (
      txRef: TxRef,
      riderId: UserId
    ) => Effect.Effect<StatusResult, RiderStepError | SqlError.SqlError>

    /**
     * Sender confirms receipt. Pays the dispatcher, releases the sender's
     * escrow and frees the rider in one unit of work.
     */
    readonly markCompleted: (
      txRef: TxRef,
      senderId: UserId
    ) => Effect.Effect<
      CompletionResult,
      | RiderStepError
      | RiderNotAttachedError
      | RiderNotFoundError
      | WalletNotFoundError
      | InsufficientFundsError
      | SqlError.SqlError
    >

    /**
     * Before pickup: cancels and refunds the total price once.
     * After pickup: flags the order for return and moves no money.
     */
    readonly cancelBySender: (
      orderId: OrderId,
      senderId: UserId,
      reason: string | null
    ) => Effect.Effect<
      SenderCancellationResult,
      RiderStepError | RiderNotFoundError | WalletNotFoundError | InsufficientFundsError | SqlError.SqlError
    >

    /**
     * Counts a cancellation against the attached rider. The order itself is
     * left as is.
     */
    readonly cancelByRider: (
      orderId: OrderId,
      riderId: UserId
    ) => Effect.Effect<
      void,
      OrderNotFoundError | RiderNotAttachedError | UnauthorizedActorError | RiderNotFoundError | SqlError.SqlError
    >

    readonly getDelivery: (
      txRef: TxRef
    ) => Effect.Effect<DeliveryOrder, OrderNotFoundError | SqlError.SqlError>
  }
>() {}
