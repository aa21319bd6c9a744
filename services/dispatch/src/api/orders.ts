import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { Effect, Match, Schema } from "effect"
import { DeliveryService } from "../services/DeliveryService.js"
import { OrderIdParams, SenderCancellationRequest } from "../domain/DeliveryOrder.js"
import { currentActor } from "./actor.js"
import { toErrorResponse } from "./responses.js"

const decodeCancellation = Schema.decodeUnknown(Schema.parseJson(SenderCancellationRequest))

// The body is optional: no body means no reason
const cancellationBody = Effect.gen(function* () {
  const request = yield* HttpServerRequest.HttpServerRequest
  const text = yield* request.text
  return text.trim() === "" ? new SenderCancellationRequest({ reason: null }) : yield* decodeCancellation(text)
})

// POST /orders/:order_id/sender-cancellation
export const cancelBySender = Effect.gen(function* () {
  const { order_id: orderId } = yield* HttpRouter.schemaPathParams(OrderIdParams)
  const senderId = yield* currentActor
  const body = yield* cancellationBody
  const service = yield* DeliveryService

  const result = yield* service.cancelBySender(orderId, senderId, body.reason)

  return Match.value(result).pipe(
    Match.tag("MarkedForReturn", ({ orderId }) =>
      HttpServerResponse.json({
        order_id: orderId,
        outcome: "marked_for_return",
        message: "Order has been picked up and is now marked for return"
      })
    ),
    Match.tag("CancelledAndRefunded", ({ orderId, refundedAmount }) =>
      HttpServerResponse.json({
        order_id: orderId,
        outcome: "cancelled_and_refunded",
        refunded_amount: refundedAmount,
        message: refundedAmount > 0 ? "Order cancelled and refunded" : "Order cancelled with nothing to refund"
      })
    ),
    Match.exhaustive
  )
}).pipe(
  Effect.withSpan("POST /orders/:order_id/sender-cancellation"),
  Effect.flatten,
  Effect.catchAll(toErrorResponse)
)

// POST /orders/:order_id/rider-cancellation
export const cancelByRider = Effect.gen(function* () {
  const { order_id: orderId } = yield* HttpRouter.schemaPathParams(OrderIdParams)
  const riderId = yield* currentActor
  const service = yield* DeliveryService

  yield* service.cancelByRider(orderId, riderId)

  return HttpServerResponse.json({
    order_id: orderId,
    message: "Cancellation recorded"
  })
}).pipe(
  Effect.withSpan("POST /orders/:order_id/rider-cancellation"),
  Effect.flatten,
  Effect.catchAll(toErrorResponse)
)

export const OrderRoutes = HttpRouter.empty.pipe(
  HttpRouter.post("/orders/:order_id/sender-cancellation", cancelBySender),
  HttpRouter.post("/orders/:order_id/rider-cancellation", cancelByRider)
)
