import { HttpServerResponse } from "@effect/platform"
import type { HttpBody, HttpServerError } from "@effect/platform"
import { SqlError } from "@effect/sql"
import { Effect, Match, type ParseResult } from "effect"
import { errorKind, type ErrorKind, type TransitionError } from "../domain/errors.js"
import type { IneligibilityReason } from "../domain/Rider.js"
import type { MissingActorError } from "./actor.js"

export type ApiError =
  | TransitionError
  | MissingActorError
  | ParseResult.ParseError
  | HttpServerError.RequestError
  | HttpBody.HttpBodyError
  | SqlError.SqlError

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  NotFound: 404,
  PreconditionFailed: 422,
  Conflict: 409,
  Unauthorized: 403,
  InvariantViolation: 409
}

const CODE_BY_KIND: Record<ErrorKind, string> = {
  NotFound: "not_found",
  PreconditionFailed: "precondition_failed",
  Conflict: "conflict",
  Unauthorized: "forbidden",
  InvariantViolation: "invariant_violation"
}

const INELIGIBLE_MESSAGES: Record<IneligibilityReason, string> = {
  NOT_A_RIDER: "User is not a rider",
  OFFLINE: "Rider is offline",
  BUSY: "Rider already has an active delivery",
  BLOCKED: "Rider is blocked"
}

export const describeError = (error: TransitionError): string =>
  Match.value(error).pipe(
    Match.tagsExhaustive({
      OrderNotFoundError: (e) => `Delivery order ${e.reference} not found`,
      RiderNotFoundError: (e) => `Rider ${e.riderId} not found`,
      WalletNotFoundError: (e) => `Wallet for user ${e.walletId} not found`,
      PaymentNotCompletedError: () => "Payment has not been completed for this order",
      InvalidDeliveryStatusError: (e) => `Cannot move order from ${e.currentStatus} to ${e.attemptedStatus}`,
      RiderNotEligibleError: (e) => INELIGIBLE_MESSAGES[e.reason],
      RiderNotAttachedError: () => "No rider is attached to this order",
      OrderAlreadyAssignedError: () => "Order already has a rider assigned",
      RiderMismatchError: () => "Order is held by a different rider",
      UnauthorizedActorError: (e) =>
        e.requiredRole === "sender"
          ? "Only the sender can perform this action"
          : "Only the assigned rider can perform this action",
      InsufficientFundsError: () => "Insufficient funds to complete this transaction"
    })
  )

/**
 * Turns any failure of a delivery route into its HTTP response.
 */
export const toErrorResponse = (
  error: ApiError
): Effect.Effect<HttpServerResponse.HttpServerResponse, HttpBody.HttpBodyError> => {
  switch (error._tag) {
    case "ParseError":
      return HttpServerResponse.json(
        { error: "validation_error", message: "Invalid request data", details: error.message },
        { status: 400 }
      )
    case "RequestError":
      return HttpServerResponse.json(
        { error: "request_error", message: "Failed to parse request body" },
        { status: 400 }
      )
    case "MissingActorError":
      return HttpServerResponse.json(
        { error: "unauthenticated", message: `A user id is required in the ${error.header} header` },
        { status: 401 }
      )
    case "SqlError":
    case "HttpBodyError":
      return Effect.logError("Unexpected error in delivery route", { error }).pipe(
        Effect.zipRight(
          HttpServerResponse.json(
            { error: "internal_error", message: "An unexpected error occurred" },
            { status: 500 }
          )
        )
      )
    default: {
      const kind = errorKind(error)
      return HttpServerResponse.json(
        { error: CODE_BY_KIND[kind], code: error._tag, message: describeError(error) },
        { status: STATUS_BY_KIND[kind] }
      )
    }
  }
}
