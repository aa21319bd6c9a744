import { describe, it, expect } from "vitest"
import { Effect, Either } from "effect"
import { setupEngine, failureOf } from "./support/engine.js"
import {
  DISPATCHER_ID,
  ORDER_ID,
  OTHER_ORDER_ID,
  OTHER_RIDER_ID,
  OTHER_TX_REF,
  RIDER_ID,
  SENDER_ID,
  TX_REF,
  makeOrder,
  makeRider,
  makeWallet
} from "./support/fixtures.js"

const baseSeed = () => ({
  orders: [makeOrder()],
  riders: [makeRider(), makeRider({ id: OTHER_RIDER_ID, fullName: "Bola Rider", dispatcherId: null })],
  wallets: [makeWallet(SENDER_ID, 0, 2500), makeWallet(DISPATCHER_ID)]
})

describe("DeliveryService.assignRider", () => {
  it("should attach the rider, snapshot contact details and mark the rider busy", async () => {
    const { store, run } = setupEngine(baseSeed())

    const result = await run((engine) => engine.assignRider(TX_REF, RIDER_ID))

    expect(result).toEqual({
      orderId: ORDER_ID,
      riderId: RIDER_ID,
      dispatchId: DISPATCHER_ID,
      riderName: "Ada Rider",
      riderPhone: "+2348000000001",
      riderEmail: "ada@example.com",
      status: "ASSIGNED"
    })

    const order = store.order(ORDER_ID)
    expect(order?.deliveryStatus).toBe("ASSIGNED")
    expect(order?.riderId).toBe(RIDER_ID)
    expect(order?.dispatchId).toBe(DISPATCHER_ID)
    expect(order?.riderPhoneNumber).toBe("+2348000000001")
    expect(store.rider(RIDER_ID)?.hasDelivery).toBe(true)
  })

  it("should use the rider as dispatcher when the rider has none", async () => {
    const { store, run } = setupEngine(baseSeed())

    const result = await run((engine) => engine.assignRider(TX_REF, OTHER_RIDER_ID))

    expect(result.dispatchId).toBe(OTHER_RIDER_ID)
    expect(store.order(ORDER_ID)?.dispatchId).toBe(OTHER_RIDER_ID)
  })

  it("should accept a PENDING order once it is paid", async () => {
    const { store, run } = setupEngine({ ...baseSeed(), orders: [makeOrder({ deliveryStatus: "PENDING" })] })

    await run((engine) => engine.assignRider(TX_REF, RIDER_ID))

    expect(store.order(ORDER_ID)?.deliveryStatus).toBe("ASSIGNED")
  })

  it("should fail with PaymentNotCompletedError for an unpaid order", async () => {
    const { store, runExit } = setupEngine({
      ...baseSeed(),
      orders: [makeOrder({ deliveryStatus: "PENDING", paymentStatus: "UNPAID" })]
    })

    const error = failureOf(await runExit((engine) => engine.assignRider(TX_REF, RIDER_ID)))

    expect(error._tag).toBe("PaymentNotCompletedError")
    expect(store.order(ORDER_ID)?.riderId).toBeNull()
    expect(store.rider(RIDER_ID)?.hasDelivery).toBe(false)
  })

  it("should fail with OrderNotFoundError for an unknown tx_ref", async () => {
    const { runExit } = setupEngine(baseSeed())

    const error = failureOf(await runExit((engine) => engine.assignRider(OTHER_TX_REF, RIDER_ID)))

    expect(error).toMatchObject({ _tag: "OrderNotFoundError", reference: "TX-1002", searchedBy: "txRef" })
  })

  it("should fail with RiderNotFoundError for an unknown rider", async () => {
    const { store, runExit } = setupEngine({ ...baseSeed(), riders: [] })

    const error = failureOf(await runExit((engine) => engine.assignRider(TX_REF, RIDER_ID)))

    expect(error).toMatchObject({ _tag: "RiderNotFoundError", riderId: RIDER_ID })
    expect(store.order(ORDER_ID)?.deliveryStatus).toBe("PAID_NEEDS_RIDER")
  })

  it.each([
    ["OFFLINE", { isOnline: false }],
    ["BUSY", { hasDelivery: true }],
    ["BLOCKED", { isBlocked: true }],
    ["NOT_A_RIDER", { userType: "SENDER" as const }]
  ])("should fail with RiderNotEligibleError (%s) and leave the order untouched", async (reason, overrides) => {
    const { store, runExit } = setupEngine({ ...baseSeed(), riders: [makeRider(overrides)] })

    const error = failureOf(await runExit((engine) => engine.assignRider(TX_REF, RIDER_ID)))

    expect(error).toMatchObject({ _tag: "RiderNotEligibleError", riderId: RIDER_ID, reason })
    expect(store.order(ORDER_ID)?.riderId).toBeNull()
    expect(store.order(ORDER_ID)?.deliveryStatus).toBe("PAID_NEEDS_RIDER")
  })

  it("should fail with OrderAlreadyAssignedError when a rider is attached", async () => {
    const { store, runExit } = setupEngine({
      ...baseSeed(),
      orders: [makeOrder({ deliveryStatus: "ASSIGNED", riderId: OTHER_RIDER_ID, dispatchId: OTHER_RIDER_ID })]
    })

    const error = failureOf(await runExit((engine) => engine.assignRider(TX_REF, RIDER_ID)))

    expect(error).toMatchObject({ _tag: "OrderAlreadyAssignedError", assignedRiderId: OTHER_RIDER_ID })
    expect(store.rider(RIDER_ID)?.hasDelivery).toBe(false)
  })

  it("should fail with InvalidDeliveryStatusError for a cancelled order", async () => {
    const { runExit } = setupEngine({ ...baseSeed(), orders: [makeOrder({ deliveryStatus: "CANCELLED" })] })

    const error = failureOf(await runExit((engine) => engine.assignRider(TX_REF, RIDER_ID)))

    expect(error).toMatchObject({
      _tag: "InvalidDeliveryStatusError",
      currentStatus: "CANCELLED",
      attemptedStatus: "ASSIGNED",
      allowedFrom: ["PENDING", "PAID_NEEDS_RIDER"]
    })
  })

  describe("concurrency", () => {
    it("should let exactly one of two riders claim the same order", async () => {
      const { store, run } = setupEngine(baseSeed())

      const [first, second] = await run((engine) =>
        Effect.all(
          [
            Effect.either(engine.assignRider(TX_REF, RIDER_ID)),
            Effect.either(engine.assignRider(TX_REF, OTHER_RIDER_ID))
          ],
          { concurrency: "unbounded" }
        )
      )

      const outcomes = [first, second]
      expect(outcomes.filter(Either.isRight)).toHaveLength(1)
      const losers = outcomes.filter(Either.isLeft)
      expect(losers).toHaveLength(1)
      expect(losers[0].left._tag).toBe("OrderAlreadyAssignedError")

      const winner = store.order(ORDER_ID)?.riderId
      const loser = winner === RIDER_ID ? OTHER_RIDER_ID : RIDER_ID
      expect(store.rider(loser)?.hasDelivery).toBe(false)
    })

    it("should not hand the same rider two orders", async () => {
      const { store, run } = setupEngine({
        ...baseSeed(),
        orders: [makeOrder(), makeOrder({ id: OTHER_ORDER_ID, txRef: OTHER_TX_REF })]
      })

      const results = await run((engine) =>
        Effect.all(
          [
            Effect.either(engine.assignRider(TX_REF, RIDER_ID)),
            Effect.either(engine.assignRider(OTHER_TX_REF, RIDER_ID))
          ],
          { concurrency: "unbounded" }
        )
      )

      expect(results.filter(Either.isRight)).toHaveLength(1)
      const losers = results.filter(Either.isLeft)
      expect(losers[0].left).toMatchObject({ _tag: "RiderNotEligibleError", reason: "BUSY" })

      const assigned = [store.order(ORDER_ID), store.order(OTHER_ORDER_ID)].filter(
        (order) => order?.riderId === RIDER_ID
      )
      expect(assigned).toHaveLength(1)
    })

    it("should report the winner when the claim loses a race after the read", async () => {
      const { store, runExit } = setupEngine(baseSeed())
      // Another rider wins between our read and our claim
      store.interleaveNextWrite((state) => {
        state.orders.set(
          ORDER_ID,
          makeOrder({ deliveryStatus: "ASSIGNED", riderId: OTHER_RIDER_ID, dispatchId: OTHER_RIDER_ID })
        )
      })

      const error = failureOf(await runExit((engine) => engine.assignRider(TX_REF, RIDER_ID)))

      expect(error).toMatchObject({ _tag: "OrderAlreadyAssignedError", assignedRiderId: OTHER_RIDER_ID })
      expect(store.rider(RIDER_ID)?.hasDelivery).toBe(false)
    })
  })
})
