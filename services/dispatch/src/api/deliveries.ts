import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform"
import { DateTime, Effect } from "effect"
import { DeliveryService, type StatusResult } from "../services/DeliveryService.js"
import { AssignRiderRequest, TxRefParams, type DeliveryOrder } from "../domain/DeliveryOrder.js"
import { currentActor } from "./actor.js"
import { toErrorResponse } from "./responses.js"

// Map domain order to snake_case API response
export const toDeliveryResponse = (order: DeliveryOrder) => ({
  id: order.id,
  tx_ref: order.txRef,
  payment_status: order.paymentStatus,
  delivery_status: order.deliveryStatus,
  sender_id: order.senderId,
  rider_id: order.riderId,
  dispatch_id: order.dispatchId,
  rider_phone_number: order.riderPhoneNumber,
  delivery_fee: order.deliveryFee,
  amount_due_dispatch: order.amountDueDispatch,
  total_price: order.totalPrice,
  is_sender_cancelled: order.isSenderCancelled,
  flagged_for_return: order.isFlaggedForReturn,
  cancel_reason: order.cancelReason,
  created_at: DateTime.formatIso(order.createdAt),
  updated_at: DateTime.formatIso(order.updatedAt)
})

const toStatusResponse = (result: StatusResult) => ({
  order_id: result.orderId,
  status: result.status
})

// GET /deliveries/:tx_ref
export const getDelivery = Effect.gen(function* () {
  const { tx_ref: txRef } = yield* HttpRouter.schemaPathParams(TxRefParams)
  const service = yield* DeliveryService

  const order = yield* service.getDelivery(txRef)

  return HttpServerResponse.json(toDeliveryResponse(order))
}).pipe(
  Effect.withSpan("GET /deliveries/:tx_ref"),
  Effect.flatten,
  Effect.catchAll(toErrorResponse)
)

// POST /deliveries/:tx_ref/assignment - Dispatcher or sender picks a rider
export const assignRider = Effect.gen(function* () {
  const { tx_ref: txRef } = yield* HttpRouter.schemaPathParams(TxRefParams)
  const body = yield* HttpServerRequest.schemaBodyJson(AssignRiderRequest)
  const service = yield* DeliveryService

  const result = yield* service.assignRider(txRef, body.rider_id)

  return HttpServerResponse.json({
    order_id: result.orderId,
    rider_id: result.riderId,
    dispatch_id: result.dispatchId,
    rider_name: result.riderName,
    rider_phone: result.riderPhone,
    rider_email: result.riderEmail,
    status: result.status
  })
}).pipe(
  Effect.withSpan("POST /deliveries/:tx_ref/assignment"),
  Effect.flatten,
  Effect.catchAll(toErrorResponse)
)

// POST /deliveries/:tx_ref/acceptance - Rider accepts (idempotent)
export const acceptDelivery = Effect.gen(function* () {
  const { tx_ref: txRef } = yield* HttpRouter.schemaPathParams(TxRefParams)
  const riderId = yield* currentActor
  const service = yield* DeliveryService

  const result = yield* service.acceptDelivery(txRef, riderId)

  return HttpServerResponse.json(toStatusResponse(result))
}).pipe(
  Effect.withSpan("POST /deliveries/:tx_ref/acceptance"),
  Effect.flatten,
  Effect.catchAll(toErrorResponse)
)

// POST /deliveries/:tx_ref/decline - Assignment returns to the pool
export const declineDelivery = Effect.gen(function* () {
  const { tx_ref: txRef } = yield* HttpRouter.schemaPathParams(TxRefParams)
  const service = yield* DeliveryService

  const result = yield* service.declineDelivery(txRef)

  return HttpServerResponse.json({
    order_id: result.orderId,
    previous_rider_id: result.previousRiderId,
    refunded_amount: result.refundedAmount
  })
}).pipe(
  Effect.withSpan("POST /deliveries/:tx_ref/decline"),
  Effect.flatten,
  Effect.catchAll(toErrorResponse)
)

// POST /deliveries/:tx_ref/pickup
export const pickupDelivery = Effect.gen(function* () {
  const { tx_ref: txRef } = yield* HttpRouter.schemaPathParams(TxRefParams)
  const riderId = yield* currentActor
  const service = yield* DeliveryService

  const result = yield* service.pickupDelivery(txRef, riderId)

  return HttpServerResponse.json(toStatusResponse(result))
}).pipe(
  Effect.withSpan("POST /deliveries/:tx_ref/pickup"),
  Effect.flatten,
  Effect.catchAll(toErrorResponse)
)

// POST /deliveries/:tx_ref/in-transit
export const markInTransit = Effect.gen(function* () {
  const { tx_ref: txRef } = yield* HttpRouter.schemaPathParams(TxRefParams)
  const riderId = yield* currentActor
  const service = yield* DeliveryService

  const result = yield* service.markInTransit(txRef, riderId)

  return HttpServerResponse.json(toStatusResponse(result))
}).pipe(
  Effect.withSpan("POST /deliveries/:tx_ref/in-transit"),
  Effect.flatten,
  Effect.catchAll(toErrorResponse)
)

// POST /deliveries/:tx_ref/delivery
export const markDelivered = Effect.gen(function* () {
  const { tx_ref: txRef } = yield* HttpRouter.schemaPathParams(TxRefParams)
  const riderId = yield* currentActor
  const service = yield* DeliveryService

  const result = yield* service.markDelivered(txRef, riderId)

  return HttpServerResponse.json(toStatusResponse(result))
}).pipe(
  Effect.withSpan("POST /deliveries/:tx_ref/delivery"),
  Effect.flatten,
  Effect.catchAll(toErrorResponse)
)

// POST /deliveries/:tx_ref/completion - Sender confirms receipt
export const markCompleted = Effect.gen(function* () {
  const { tx_ref: txRef } = yield* HttpRouter.schemaPathParams(TxRefParams)
  const senderId = yield* currentActor
  const service = yield* DeliveryService

  const result = yield* service.markCompleted(txRef, senderId)

  return HttpServerResponse.json({
    order_id: result.orderId,
    status: result.status,
    amount_paid_out: result.amountPaidOut,
    platform_commission: result.platformCommission
  })
}).pipe(
  Effect.withSpan("POST /deliveries/:tx_ref/completion"),
  Effect.flatten,
  Effect.catchAll(toErrorResponse)
)

export const DeliveryRoutes = HttpRouter.empty.pipe(
  HttpRouter.get("/deliveries/:tx_ref", getDelivery),
  HttpRouter.post("/deliveries/:tx_ref/assignment", assignRider),
  HttpRouter.post("/deliveries/:tx_ref/acceptance", acceptDelivery),
  HttpRouter.post("/deliveries/:tx_ref/decline", declineDelivery),
  HttpRouter.post("/deliveries/:tx_ref/pickup", pickupDelivery),
  HttpRouter.post("/deliveries/:tx_ref/in-transit", markInTransit),
  HttpRouter.post("/deliveries/:tx_ref/delivery", markDelivered),
  HttpRouter.post("/deliveries/:tx_ref/completion", markCompleted)
)
