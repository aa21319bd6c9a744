import { Layer, Effect, Option } from "effect"
import {
  DeliveryService,
  type AssignRiderResult,
  type CompletionResult,
  type DeclineResult,
  type SenderCancellationResult,
  type StatusResult
} from "./DeliveryService.js"
import { RiderAvailability } from "./RiderAvailability.js"
import { TransactionRecorder } from "./TransactionRecorder.js"
import { WalletLedger } from "./WalletLedger.js"
import { DeliveryOrderRepository } from "../repositories/DeliveryOrderRepository.js"
import { UnitOfWork } from "../repositories/UnitOfWork.js"
import {
  EVENT_SOURCES,
  EVENT_TARGETS,
  RETURN_ON_CANCEL_STATUSES,
  canApply,
  type DeliveryEvent
} from "../domain/DeliveryTransitions.js"
import { ineligibilityReason } from "../domain/Rider.js"
import {
  InvalidDeliveryStatusError,
  OrderAlreadyAssignedError,
  OrderNotFoundError,
  PaymentNotCompletedError,
  RiderMismatchError,
  RiderNotAttachedError,
  RiderNotEligibleError,
  UnauthorizedActorError
} from "../domain/errors.js"
import type {
  DeliveryOrder,
  DeliveryStatus,
  OrderId,
  TxRef,
  UserId
} from "../domain/DeliveryOrder.js"

export const DeliveryServiceLive = Layer.effect(
  DeliveryService,
  Effect.gen(function* () {
    const orders = yield* DeliveryOrderRepository
    const availability = yield* RiderAvailability
    const ledger = yield* WalletLedger
    const recorder = yield* TransactionRecorder
    const uow = yield* UnitOfWork

    // ═══════════════════════════════════════════════════════════════════════
    // Lookups and guards
    // ═══════════════════════════════════════════════════════════════════════

    const orderByTxRef = (txRef: TxRef) =>
      orders.findByTxRef(txRef).pipe(
        Effect.flatMap(
          Option.match({
            onNone: () => Effect.fail(new OrderNotFoundError({ reference: txRef, searchedBy: "txRef" })),
            onSome: (order: DeliveryOrder) => Effect.succeed(order)
          })
        )
      )

    const orderById = (orderId: OrderId) =>
      orders.findById(orderId).pipe(
        Effect.flatMap(
          Option.match({
            onNone: () => Effect.fail(new OrderNotFoundError({ reference: orderId, searchedBy: "id" })),
            onSome: (order: DeliveryOrder) => Effect.succeed(order)
          })
        )
      )

    const invalidStatus = (order: DeliveryOrder, event: DeliveryEvent) =>
      new InvalidDeliveryStatusError({
        orderId: order.id,
        currentStatus: order.deliveryStatus,
        attemptedStatus: EVENT_TARGETS[event],
        allowedFrom: EVENT_SOURCES[event]
      })

    const requireEvent = (
      order: DeliveryOrder,
      event: DeliveryEvent
    ): Effect.Effect<void, InvalidDeliveryStatusError> =>
      canApply(event, order.deliveryStatus) ? Effect.void : Effect.fail(invalidStatus(order, event))

    const requirePaid = (order: DeliveryOrder): Effect.Effect<void, PaymentNotCompletedError> =>
      order.paymentStatus === "PAID"
        ? Effect.void
        : Effect.fail(new PaymentNotCompletedError({ orderId: order.id, paymentStatus: order.paymentStatus }))

    const requireAssignedRider = (
      order: DeliveryOrder,
      actorId: UserId
    ): Effect.Effect<void, UnauthorizedActorError> =>
      order.riderId === actorId
        ? Effect.void
        : Effect.fail(new UnauthorizedActorError({ orderId: order.id, actorId, requiredRole: "assigned_rider" }))

    const requireSender = (order: DeliveryOrder, actorId: UserId): Effect.Effect<void, UnauthorizedActorError> =>
      order.senderId === actorId
        ? Effect.void
        : Effect.fail(new UnauthorizedActorError({ orderId: order.id, actorId, requiredRole: "sender" }))

    // A guarded write matched no row: report the status another writer left behind
    const staleWrite = (orderId: OrderId, event: DeliveryEvent) =>
      Effect.gen(function* () {
        const current = yield* orderById(orderId)
        yield* Effect.logWarning("Order changed before the write applied", {
          orderId,
          event,
          currentStatus: current.deliveryStatus
        })
        return yield* Effect.fail(invalidStatus(current, event))
      })

    const updatedOrStale = (orderId: OrderId, event: DeliveryEvent) =>
      Effect.flatMap(
        Option.match({
          onNone: () => staleWrite(orderId, event),
          onSome: (order: DeliveryOrder) => Effect.succeed(order)
        })
      )

    // The claim statement matched no row: explain which precondition moved
    const claimLost = (orderId: OrderId, event: DeliveryEvent) =>
      Effect.gen(function* () {
        const current = yield* orderById(orderId)
        if (current.riderId !== null) {
          return yield* Effect.fail(
            new OrderAlreadyAssignedError({ orderId, assignedRiderId: current.riderId })
          )
        }
        yield* requirePaid(current)
        return yield* Effect.fail(invalidStatus(current, event))
      })

    // ═══════════════════════════════════════════════════════════════════════
    // Shared transition steps
    // ═══════════════════════════════════════════════════════════════════════

    // Order first, then rider: both compare-and-set, so the loser of a race writes nothing
    const claimOrder = (
      order: DeliveryOrder,
      riderId: UserId,
      event: "ASSIGN" | "ACCEPT",
      from: ReadonlyArray<DeliveryStatus>
    ) =>
      Effect.gen(function* () {
        const candidate = yield* availability.findById(riderId)
        const reason = ineligibilityReason(candidate)
        if (reason !== null) {
          return yield* Effect.fail(new RiderNotEligibleError({ riderId, reason }))
        }

        const claimed = yield* orders.claimRider(
          order.id,
          {
            riderId,
            dispatchId: candidate.dispatchId,
            riderPhoneNumber: candidate.phoneNumber
          },
          { from, to: EVENT_TARGETS[event] }
        )
        if (Option.isNone(claimed)) {
          return yield* claimLost(order.id, event)
        }

        const rider = yield* availability.reserve(riderId)
        return { order: claimed.value, rider }
      })

    const refundSender = (order: DeliveryOrder, actorId: UserId) =>
      Effect.gen(function* () {
        if (order.paymentStatus !== "PAID") {
          return 0
        }
        if (yield* recorder.hasRefund(order.id)) {
          yield* Effect.logInfo("Order already refunded", { orderId: order.id })
          return 0
        }

        const hold = yield* recorder.findOpenHold(order.txRef, order.senderId)
        yield* ledger.postAdjustment({
          walletId: order.senderId,
          balanceDelta: order.totalPrice,
          escrowDelta: Option.match(hold, { onNone: () => 0, onSome: (record) => -record.amount }),
          entry: {
            txRef: order.txRef,
            orderId: order.id,
            amount: order.totalPrice,
            fromUserId: null,
            toUserId: order.senderId,
            transactionType: "REFUNDED",
            label: "CREDIT",
            reason: "SENDER_CANCELLED",
            actorId
          }
        })
        return order.totalPrice
      })

    // Status-only rider steps after pickup
    const riderStep = (
      txRef: TxRef,
      riderId: UserId,
      event: "START_TRANSIT" | "DELIVER"
    ) =>
      uow.transactional(
        Effect.gen(function* () {
          const order = yield* orderByTxRef(txRef)
          yield* requireEvent(order, event)
          yield* requireAssignedRider(order, riderId)

          const updated = yield* orders
            .transitionStatus(order.id, { from: EVENT_SOURCES[event], riderId }, EVENT_TARGETS[event])
            .pipe(updatedOrStale(order.id, event))

          yield* Effect.logInfo("Delivery status updated", {
            txRef,
            riderId,
            from: order.deliveryStatus,
            to: updated.deliveryStatus
          })
          return { orderId: updated.id, status: updated.deliveryStatus } satisfies StatusResult
        })
      )

    // ═══════════════════════════════════════════════════════════════════════
    // Operations
    // ═══════════════════════════════════════════════════════════════════════

    return {
      assignRider: (txRef: TxRef, riderId: UserId) =>
        uow.transactional(
          Effect.gen(function* () {
            const order = yield* orderByTxRef(txRef)
            yield* requirePaid(order)
            if (order.riderId !== null) {
              return yield* Effect.fail(
                new OrderAlreadyAssignedError({ orderId: order.id, assignedRiderId: order.riderId })
              )
            }
            yield* requireEvent(order, "ASSIGN")

            const { rider } = yield* claimOrder(order, riderId, "ASSIGN", EVENT_SOURCES.ASSIGN)

            yield* Effect.logInfo("Rider assigned", { txRef, orderId: order.id, riderId, dispatchId: rider.dispatchId })

            return {
              orderId: order.id,
              riderId: rider.id,
              dispatchId: rider.dispatchId,
              riderName: rider.fullName,
              riderPhone: rider.phoneNumber,
              riderEmail: rider.email,
              status: "ASSIGNED"
            } satisfies AssignRiderResult
          })
        ).pipe(Effect.withSpan("DeliveryService.assignRider", { attributes: { txRef, riderId } })),

      acceptDelivery: (txRef: TxRef, riderId: UserId) =>
        uow.transactional(
          Effect.gen(function* () {
            const order = yield* orderByTxRef(txRef)
            yield* requireEvent(order, "ACCEPT")

            if (order.riderId !== null && order.riderId !== riderId) {
              return yield* Effect.fail(
                new RiderMismatchError({
                  orderId: order.id,
                  assignedRiderId: order.riderId,
                  requestedRiderId: riderId
                })
              )
            }

            // Retried accept from the holding rider
            if (order.deliveryStatus === "ACCEPTED") {
              yield* Effect.logDebug("Accept repeated by holding rider", { txRef, riderId })
              return { orderId: order.id, status: order.deliveryStatus } satisfies StatusResult
            }

            if (order.deliveryStatus === "ASSIGNED") {
              const accepted = yield* orders
                .transitionStatus(order.id, { from: ["ASSIGNED"], riderId }, "ACCEPTED")
                .pipe(updatedOrStale(order.id, "ACCEPT"))
              yield* Effect.logInfo("Delivery accepted", { txRef, riderId })
              return { orderId: accepted.id, status: accepted.deliveryStatus } satisfies StatusResult
            }

            // Unassigned: the accepting rider claims the order directly
            yield* requirePaid(order)
            const claimed = yield* claimOrder(order, riderId, "ACCEPT", ["PAID_NEEDS_RIDER"])
            yield* Effect.logInfo("Delivery accepted without prior assignment", { txRef, riderId })
            return { orderId: claimed.order.id, status: claimed.order.deliveryStatus } satisfies StatusResult
          })
        ).pipe(Effect.withSpan("DeliveryService.acceptDelivery", { attributes: { txRef, riderId } })),

      declineDelivery: (txRef: TxRef) =>
        uow.transactional(
          Effect.gen(function* () {
            const order = yield* orderByTxRef(txRef)
            yield* requireEvent(order, "DECLINE")
            const previousRiderId = order.riderId
            const hold = yield* recorder.findOpenHold(order.txRef, order.senderId)

            // A refunded order has no money behind it until it is paid again
            yield* orders
              .releaseRider(
                order.id,
                { from: EVENT_SOURCES.DECLINE },
                Option.isSome(hold) ? "UNPAID" : order.paymentStatus
              )
              .pipe(updatedOrStale(order.id, "DECLINE"))

            if (previousRiderId !== null) {
              yield* availability.markFree(previousRiderId)
            }

            if (Option.isNone(hold)) {
              yield* Effect.logWarning("Delivery declined without an open hold; nothing refunded", {
                txRef,
                orderId: order.id,
                previousRiderId
              })
              return { orderId: order.id, previousRiderId, refundedAmount: 0 } satisfies DeclineResult
            }

            const amount = hold.value.amount
            yield* ledger.postAdjustment({
              walletId: order.senderId,
              balanceDelta: amount,
              escrowDelta: -amount,
              entry: {
                txRef: order.txRef,
                orderId: order.id,
                amount,
                fromUserId: null,
                toUserId: order.senderId,
                transactionType: "REFUNDED",
                label: "CREDIT",
                reason: "RIDER_DECLINED",
                actorId: previousRiderId
              }
            })

            yield* Effect.logInfo("Delivery declined and hold refunded", { txRef, previousRiderId, amount })
            return { orderId: order.id, previousRiderId, refundedAmount: amount } satisfies DeclineResult
          })
        ).pipe(Effect.withSpan("DeliveryService.declineDelivery", { attributes: { txRef } })),

      pickupDelivery: (txRef: TxRef, riderId: UserId) =>
        uow.transactional(
          Effect.gen(function* () {
            const order = yield* orderByTxRef(txRef)
            yield* requireEvent(order, "PICKUP")
            yield* requireAssignedRider(order, riderId)

            const updated = yield* orders
              .transitionStatus(order.id, { from: EVENT_SOURCES.PICKUP, riderId }, "PICKED_UP")
              .pipe(updatedOrStale(order.id, "PICKUP"))

            const dispatchId = order.dispatchId ?? riderId
            yield* ledger.postAdjustment({
              walletId: dispatchId,
              balanceDelta: 0,
              escrowDelta: order.deliveryFee,
              entry: {
                txRef: order.txRef,
                orderId: order.id,
                amount: order.deliveryFee,
                fromUserId: order.senderId,
                toUserId: dispatchId,
                transactionType: "ESCROW_HOLD",
                label: "CREDIT",
                reason: "DELIVERY_PICKED_UP",
                actorId: riderId
              }
            })

            yield* Effect.logInfo("Delivery picked up", { txRef, riderId, dispatchId, fee: order.deliveryFee })
            return { orderId: updated.id, status: updated.deliveryStatus } satisfies StatusResult
          })
        ).pipe(Effect.withSpan("DeliveryService.pickupDelivery", { attributes: { txRef, riderId } })),

      markInTransit: (txRef: TxRef, riderId: UserId) =>
        riderStep(txRef, riderId, "START_TRANSIT").pipe(
          Effect.withSpan("DeliveryService.markInTransit", { attributes: { txRef, riderId } })
        ),

      markDelivered: (txRef: TxRef, riderId: UserId) =>
        riderStep(txRef, riderId, "DELIVER").pipe(
          Effect.withSpan("DeliveryService.markDelivered", { attributes: { txRef, riderId } })
        ),

      markCompleted: (txRef: TxRef, senderId: UserId) =>
        uow.transactional(
          Effect.gen(function* () {
            const order = yield* orderByTxRef(txRef)
            yield* requireEvent(order, "COMPLETE")
            yield* requireSender(order, senderId)
            if (order.riderId === null) {
              return yield* Effect.fail(
                new RiderNotAttachedError({ orderId: order.id, currentStatus: order.deliveryStatus })
              )
            }
            const riderId = order.riderId
            const dispatchId = order.dispatchId ?? riderId

            yield* orders
              .transitionStatus(order.id, { from: EVENT_SOURCES.COMPLETE }, "COMPLETED")
              .pipe(updatedOrStale(order.id, "COMPLETE"))

            yield* availability.markFree(riderId)

            // Dispatcher payout and sender escrow release commit together
            yield* ledger.postAdjustment({
              walletId: dispatchId,
              balanceDelta: order.amountDueDispatch,
              escrowDelta: -order.deliveryFee,
              entry: {
                txRef: order.txRef,
                orderId: order.id,
                amount: order.amountDueDispatch,
                fromUserId: order.senderId,
                toUserId: dispatchId,
                transactionType: "PAYOUT",
                label: "CREDIT",
                reason: "DELIVERY_COMPLETED",
                actorId: senderId
              }
            })
            yield* ledger.postAdjustment({
              walletId: order.senderId,
              balanceDelta: 0,
              escrowDelta: -order.deliveryFee,
              entry: {
                txRef: order.txRef,
                orderId: order.id,
                amount: order.deliveryFee,
                fromUserId: order.senderId,
                toUserId: dispatchId,
                transactionType: "ESCROW_RELEASE",
                label: "DEBIT",
                reason: "SENDER_ESCROW_RELEASED",
                actorId: senderId
              }
            })

            const platformCommission = order.deliveryFee - order.amountDueDispatch
            yield* Effect.logInfo("Delivery completed", {
              txRef,
              dispatchId,
              amountPaidOut: order.amountDueDispatch,
              platformCommission
            })

            return {
              orderId: order.id,
              status: "COMPLETED",
              amountPaidOut: order.amountDueDispatch,
              platformCommission
            } satisfies CompletionResult
          })
        ).pipe(Effect.withSpan("DeliveryService.markCompleted", { attributes: { txRef, senderId } })),

      cancelBySender: (orderId: OrderId, senderId: UserId, reason: string | null) =>
        uow.transactional(
          Effect.gen(function* () {
            const order = yield* orderById(orderId)
            yield* requireSender(order, senderId)
            yield* requireEvent(order, "SENDER_CANCEL")

            if (RETURN_ON_CANCEL_STATUSES.includes(order.deliveryStatus)) {
              yield* orders
                .flagForReturn(order.id, { from: RETURN_ON_CANCEL_STATUSES }, reason)
                .pipe(updatedOrStale(order.id, "SENDER_CANCEL"))
              yield* Effect.logInfo("Order flagged for return", { orderId, status: order.deliveryStatus })
              const result: SenderCancellationResult = { _tag: "MarkedForReturn", orderId: order.id }
              return result
            }

            const beforePickup = EVENT_SOURCES.SENDER_CANCEL.filter(
              (status) => !RETURN_ON_CANCEL_STATUSES.includes(status)
            )
            yield* orders
              .cancelBySender(order.id, { from: beforePickup }, reason)
              .pipe(updatedOrStale(order.id, "SENDER_CANCEL"))

            if (order.riderId !== null) {
              yield* availability.markFree(order.riderId)
            }

            const refundedAmount = yield* refundSender(order, senderId)

            yield* Effect.logInfo("Order cancelled by sender", { orderId, refundedAmount })
            const result: SenderCancellationResult = {
              _tag: "CancelledAndRefunded",
              orderId: order.id,
              refundedAmount
            }
            return result
          })
        ).pipe(Effect.withSpan("DeliveryService.cancelBySender", { attributes: { orderId, senderId } })),

      cancelByRider: (orderId: OrderId, riderId: UserId) =>
        uow.transactional(
          Effect.gen(function* () {
            const order = yield* orderById(orderId)
            if (order.riderId === null) {
              return yield* Effect.fail(
                new RiderNotAttachedError({ orderId: order.id, currentStatus: order.deliveryStatus })
              )
            }
            yield* requireAssignedRider(order, riderId)

            const rider = yield* availability.incrementCancelCount(riderId)
            yield* Effect.logInfo("Rider cancellation counted", {
              orderId,
              riderId,
              orderCancelCount: rider.orderCancelCount
            })
          })
        ).pipe(Effect.withSpan("DeliveryService.cancelByRider", { attributes: { orderId, riderId } })),

      getDelivery: (txRef: TxRef) =>
        orderByTxRef(txRef).pipe(Effect.withSpan("DeliveryService.getDelivery", { attributes: { txRef } }))
    }
  })
)
