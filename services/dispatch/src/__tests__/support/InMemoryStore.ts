import { DateTime, Effect, Exit, Layer, Option, Schema } from "effect"
import { randomUUID } from "node:crypto"
import { DeliveryOrderRepository, type StatusGuard } from "../../repositories/DeliveryOrderRepository.js"
import { RiderRepository } from "../../repositories/RiderRepository.js"
import { WalletRepository } from "../../repositories/WalletRepository.js"
import { TransactionRepository } from "../../repositories/TransactionRepository.js"
import { UnitOfWork } from "../../repositories/UnitOfWork.js"
import { DeliveryOrder, type OrderId, type TxRef, type UserId } from "../../domain/DeliveryOrder.js"
import { RIDER_ATTACHED_STATUSES, isValidTransition } from "../../domain/DeliveryTransitions.js"
import { RiderProfile } from "../../domain/Rider.js"
import { Wallet, wouldOverdraw } from "../../domain/Wallet.js"
import {
  TransactionDetails,
  TransactionId,
  TransactionRecord,
  type NewTransactionRecord
} from "../../domain/Transaction.js"

export interface StoreState {
  orders: Map<OrderId, DeliveryOrder>
  riders: Map<UserId, RiderProfile>
  wallets: Map<UserId, Wallet>
  transactions: Array<TransactionRecord>
}

export interface StoreSeed {
  readonly orders?: ReadonlyArray<DeliveryOrder>
  readonly riders?: ReadonlyArray<RiderProfile>
  readonly wallets?: ReadonlyArray<Wallet>
  readonly transactions?: ReadonlyArray<TransactionRecord>
}

const snapshot = (state: StoreState): StoreState => ({
  orders: new Map(state.orders),
  riders: new Map(state.riders),
  wallets: new Map(state.wallets),
  transactions: [...state.transactions]
})

// Status edges follow the transition table; the rider check mirrors rider_matches_status in schema.sql
const assertOrderWrite = (before: DeliveryOrder, after: DeliveryOrder) => {
  if (after.deliveryStatus !== before.deliveryStatus && !isValidTransition(before.deliveryStatus, after.deliveryStatus)) {
    throw new Error(`Order ${after.id} moved ${before.deliveryStatus} -> ${after.deliveryStatus}, which is not a valid edge`)
  }
  if ((after.riderId !== null) !== RIDER_ATTACHED_STATUSES.includes(after.deliveryStatus)) {
    throw new Error(`Order ${after.id} is ${after.deliveryStatus} with rider ${after.riderId ?? "none"}`)
  }
}

const matchesGuard = (order: DeliveryOrder, guard: StatusGuard) =>
  guard.from.includes(order.deliveryStatus) &&
  (guard.riderId === undefined || order.riderId === guard.riderId)

/**
 * In-process stand-in for the Postgres repositories.
 * Conditional updates are checked at write time like their SQL
 * counterparts, and an order write that breaks the status table dies.
 * `transactional` serialises units of work and restores the
 * pre-transaction state when the wrapped effect fails.
 */
export const makeInMemoryStore = (seed: StoreSeed = {}) => {
  const state: StoreState = {
    orders: new Map((seed.orders ?? []).map((order) => [order.id, order])),
    riders: new Map((seed.riders ?? []).map((rider) => [rider.id, rider])),
    wallets: new Map((seed.wallets ?? []).map((wallet) => [wallet.ownerId, wallet])),
    transactions: [...(seed.transactions ?? [])]
  }

  // Runs once, right before the next order write; simulates a concurrent writer
  let pendingInterleave: ((state: StoreState) => void) | undefined
  const interleaveNextWrite = (fn: (state: StoreState) => void) => {
    pendingInterleave = fn
  }
  const runInterleave = () => {
    const fn = pendingInterleave
    pendingInterleave = undefined
    if (fn) fn(state)
  }

  const lock = Effect.unsafeMakeSemaphore(1)

  const updateOrder = (
    orderId: OrderId,
    guard: (order: DeliveryOrder) => boolean,
    patch: (order: DeliveryOrder) => Partial<DeliveryOrder>
  ) =>
    Effect.sync(() => {
      runInterleave()
      const current = state.orders.get(orderId)
      if (current === undefined || !guard(current)) {
        return Option.none<DeliveryOrder>()
      }
      const updated = new DeliveryOrder({
        ...current,
        ...patch(current),
        updatedAt: DateTime.unsafeNow()
      })
      assertOrderWrite(current, updated)
      state.orders.set(orderId, updated)
      return Option.some(updated)
    })

  const updateRider = (riderId: UserId, guard: (rider: RiderProfile) => boolean, patch: (rider: RiderProfile) => Partial<RiderProfile>) =>
    Effect.sync(() => {
      const current = state.riders.get(riderId)
      if (current === undefined || !guard(current)) {
        return Option.none<RiderProfile>()
      }
      const updated = new RiderProfile({ ...current, ...patch(current) })
      state.riders.set(riderId, updated)
      return Option.some(updated)
    })

  const ordersLayer = Layer.succeed(DeliveryOrderRepository, {
    findById: (id: OrderId) => Effect.sync(() => Option.fromNullable(state.orders.get(id))),

    findByTxRef: (txRef: TxRef) =>
      Effect.sync(() =>
        Option.fromNullable([...state.orders.values()].find((order) => order.txRef === txRef))
      ),

    claimRider: (orderId, claim, transition) =>
      updateOrder(
        orderId,
        (order) =>
          order.riderId === null &&
          order.paymentStatus === "PAID" &&
          transition.from.includes(order.deliveryStatus),
        () => ({
          riderId: claim.riderId,
          dispatchId: claim.dispatchId,
          riderPhoneNumber: claim.riderPhoneNumber,
          deliveryStatus: transition.to
        })
      ),

    transitionStatus: (orderId, guard, to) =>
      updateOrder(orderId, (order) => matchesGuard(order, guard), () => ({ deliveryStatus: to })),

    releaseRider: (orderId, guard, paymentStatus) =>
      updateOrder(orderId, (order) => matchesGuard(order, guard), () => ({
        riderId: null,
        dispatchId: null,
        riderPhoneNumber: null,
        deliveryStatus: "PAID_NEEDS_RIDER",
        paymentStatus
      })),

    cancelBySender: (orderId, guard, reason) =>
      updateOrder(orderId, (order) => matchesGuard(order, guard), () => ({
        deliveryStatus: "CANCELLED",
        riderId: null,
        dispatchId: null,
        riderPhoneNumber: null,
        isSenderCancelled: true,
        cancelReason: reason
      })),

    flagForReturn: (orderId, guard, reason) =>
      updateOrder(orderId, (order) => matchesGuard(order, guard), () => ({
        isSenderCancelled: true,
        cancelReason: reason
      }))
  })

  const ridersLayer = Layer.succeed(RiderRepository, {
    findById: (id: UserId) => Effect.sync(() => Option.fromNullable(state.riders.get(id))),

    reserve: (id: UserId) =>
      updateRider(
        id,
        (rider) => rider.userType === "RIDER" && rider.isOnline && !rider.hasDelivery && !rider.isBlocked,
        () => ({ hasDelivery: true })
      ),

    setHasDelivery: (id: UserId, hasDelivery: boolean) =>
      updateRider(id, () => true, () => ({ hasDelivery })),

    incrementCancelCount: (id: UserId) =>
      updateRider(id, () => true, (rider) => ({ orderCancelCount: rider.orderCancelCount + 1 }))
  })

  const walletsLayer = Layer.succeed(WalletRepository, {
    findByOwner: (ownerId: UserId) => Effect.sync(() => Option.fromNullable(state.wallets.get(ownerId))),

    applyDelta: (ownerId, delta) =>
      Effect.sync(() => {
        const current = state.wallets.get(ownerId)
        if (current === undefined || wouldOverdraw(current, delta)) {
          return Option.none<Wallet>()
        }
        const updated = new Wallet({
          ownerId,
          balance: current.balance + delta.balanceDelta,
          escrowBalance: current.escrowBalance + delta.escrowDelta,
          updatedAt: DateTime.unsafeNow()
        })
        state.wallets.set(ownerId, updated)
        return Option.some(updated)
      })
  })

  const transactionsLayer = Layer.succeed(TransactionRepository, {
    insert: (record: NewTransactionRecord) =>
      Effect.sync(() => {
        const stored = new TransactionRecord({
          id: Schema.decodeUnknownSync(TransactionId)(randomUUID()),
          txRef: record.txRef,
          orderId: record.orderId,
          walletId: record.walletId,
          amount: record.amount,
          fromUserId: record.fromUserId,
          toUserId: record.toUserId,
          transactionType: record.transactionType,
          paymentStatus: "SUCCESS",
          orderType: "DELIVERY",
          balanceDelta: record.balanceDelta,
          escrowDelta: record.escrowDelta,
          details: new TransactionDetails({
            label: record.label,
            reason: record.reason,
            actorId: record.actorId
          }),
          createdAt: DateTime.unsafeNow()
        })
        state.transactions.push(stored)
        return stored
      }),

    findByTxRef: (txRef: TxRef) =>
      Effect.sync(() => state.transactions.filter((record) => record.txRef === txRef)),

    findByOrderId: (orderId: OrderId) =>
      Effect.sync(() => state.transactions.filter((record) => record.orderId === orderId))
  })

  const unitOfWorkLayer = Layer.succeed(UnitOfWork, {
    transactional: <A, E, R>(effect: Effect.Effect<A, E, R>) =>
      lock.withPermits(1)(
        Effect.suspend(() => {
          const before = snapshot(state)
          return effect.pipe(
            Effect.onExit((exit) =>
              Exit.isFailure(exit)
                ? Effect.sync(() => {
                    state.orders = before.orders
                    state.riders = before.riders
                    state.wallets = before.wallets
                    state.transactions = before.transactions
                  })
                : Effect.void
            )
          )
        })
      )
  })

  const layer = Layer.mergeAll(ordersLayer, ridersLayer, walletsLayer, transactionsLayer, unitOfWorkLayer)

  return {
    state,
    layer,
    interleaveNextWrite,
    order: (id: OrderId) => state.orders.get(id),
    rider: (id: UserId) => state.riders.get(id),
    wallet: (id: UserId) => state.wallets.get(id)
  }
}

export type InMemoryStore = ReturnType<typeof makeInMemoryStore>
