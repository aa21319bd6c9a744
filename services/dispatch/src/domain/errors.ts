import { Data } from "effect"
import type { IneligibilityReason } from "./Rider.js"

/**
 * Delivery order was not found.
 * Context includes how the search was performed to aid debugging.
 */
export class OrderNotFoundError extends Data.TaggedError("OrderNotFoundError")<{
  readonly reference: string
  readonly searchedBy: "id" | "txRef"
}> {}

export class RiderNotFoundError extends Data.TaggedError("RiderNotFoundError")<{
  readonly riderId: string
}> {}

/**
 * No wallet exists for the user. Wallet provisioning is expected to run
 * before any order reaches the engine, so this points at bad upstream data.
 */
export class WalletNotFoundError extends Data.TaggedError("WalletNotFoundError")<{
  readonly walletId: string
}> {}

export class PaymentNotCompletedError extends Data.TaggedError("PaymentNotCompletedError")<{
  readonly orderId: string
  readonly paymentStatus: string
}> {}

/**
 * The requested event is not allowed from the order's current status.
 * Carries the statuses the event accepts so callers can explain the refusal.
 */
export class InvalidDeliveryStatusError extends Data.TaggedError("InvalidDeliveryStatusError")<{
  readonly orderId: string
  readonly currentStatus: string
  readonly attemptedStatus: string
  readonly allowedFrom: ReadonlyArray<string>
}> {}

export class RiderNotEligibleError extends Data.TaggedError("RiderNotEligibleError")<{
  readonly riderId: string
  readonly reason: IneligibilityReason
}> {}

export class RiderNotAttachedError extends Data.TaggedError("RiderNotAttachedError")<{
  readonly orderId: string
  readonly currentStatus: string
}> {}

/**
 * Another rider already holds the order.
 * Raised to the loser of a concurrent assignment.
 */
export class OrderAlreadyAssignedError extends Data.TaggedError("OrderAlreadyAssignedError")<{
  readonly orderId: string
  readonly assignedRiderId: string
}> {}

/**
 * The caller tried to accept an order held by a different rider.
 */
export class RiderMismatchError extends Data.TaggedError("RiderMismatchError")<{
  readonly orderId: string
  readonly assignedRiderId: string
  readonly requestedRiderId: string
}> {}

export class UnauthorizedActorError extends Data.TaggedError("UnauthorizedActorError")<{
  readonly orderId: string
  readonly actorId: string
  readonly requiredRole: "sender" | "assigned_rider"
}> {}

/**
 * A posting would drive a wallet balance or escrow balance below zero.
 * Includes both current balances and the requested deltas.
 */
export class InsufficientFundsError extends Data.TaggedError("InsufficientFundsError")<{
  readonly walletId: string
  readonly balance: number
  readonly escrowBalance: number
  readonly balanceDelta: number
  readonly escrowDelta: number
}> {}

// ═══════════════════════════════════════════════════════════════════════════
// Aggregate Error Types for Pattern Matching
// ═══════════════════════════════════════════════════════════════════════════

export type LedgerError = WalletNotFoundError | InsufficientFundsError

export type RiderReservationError = RiderNotFoundError | RiderNotEligibleError

export type TransitionError =
  | OrderNotFoundError
  | RiderNotFoundError
  | WalletNotFoundError
  | PaymentNotCompletedError
  | InvalidDeliveryStatusError
  | RiderNotEligibleError
  | RiderNotAttachedError
  | OrderAlreadyAssignedError
  | RiderMismatchError
  | UnauthorizedActorError
  | InsufficientFundsError

export type ErrorKind =
  | "NotFound"
  | "PreconditionFailed"
  | "Conflict"
  | "Unauthorized"
  | "InvariantViolation"

const ERROR_KINDS: Record<TransitionError["_tag"], ErrorKind> = {
  OrderNotFoundError: "NotFound",
  RiderNotFoundError: "NotFound",
  WalletNotFoundError: "NotFound",
  PaymentNotCompletedError: "PreconditionFailed",
  InvalidDeliveryStatusError: "PreconditionFailed",
  RiderNotEligibleError: "PreconditionFailed",
  RiderNotAttachedError: "PreconditionFailed",
  OrderAlreadyAssignedError: "Conflict",
  RiderMismatchError: "Conflict",
  UnauthorizedActorError: "Unauthorized",
  InsufficientFundsError: "InvariantViolation"
}

export const errorKind = (error: TransitionError): ErrorKind => ERROR_KINDS[error._tag]
