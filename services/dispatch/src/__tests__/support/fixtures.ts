import { DateTime, Schema } from "effect"
import { DeliveryOrder, OrderId, TxRef, UserId } from "../../domain/DeliveryOrder.js"
import { RiderProfile } from "../../domain/Rider.js"
import { Wallet } from "../../domain/Wallet.js"
import { TransactionDetails, TransactionId, TransactionRecord } from "../../domain/Transaction.js"

const userId = Schema.decodeUnknownSync(UserId)

export const ORDER_ID = Schema.decodeUnknownSync(OrderId)("660e8400-e29b-41d4-a716-446655440001")
export const OTHER_ORDER_ID = Schema.decodeUnknownSync(OrderId)("660e8400-e29b-41d4-a716-446655440002")
export const TX_REF = Schema.decodeUnknownSync(TxRef)("TX-1001")
export const OTHER_TX_REF = Schema.decodeUnknownSync(TxRef)("TX-1002")

export const SENDER_ID = userId("770e8400-e29b-41d4-a716-446655440010")
export const RIDER_ID = userId("770e8400-e29b-41d4-a716-446655440020")
export const OTHER_RIDER_ID = userId("770e8400-e29b-41d4-a716-446655440021")
export const DISPATCHER_ID = userId("770e8400-e29b-41d4-a716-446655440030")
export const STRANGER_ID = userId("770e8400-e29b-41d4-a716-446655440099")

const HOLD_ID = Schema.decodeUnknownSync(TransactionId)("880e8400-e29b-41d4-a716-446655440001")

export const fixedTime = DateTime.unsafeMake(new Date("2024-01-15T10:30:00Z"))

// Order O1: fee 500, dispatcher due 400, total 2500
export const makeOrder = (overrides: Partial<ConstructorParameters<typeof DeliveryOrder>[0]> = {}) =>
  new DeliveryOrder({
    id: ORDER_ID,
    txRef: TX_REF,
    paymentStatus: "PAID",
    deliveryStatus: "PAID_NEEDS_RIDER",
    senderId: SENDER_ID,
    riderId: null,
    dispatchId: null,
    riderPhoneNumber: null,
    deliveryFee: 500,
    amountDueDispatch: 400,
    totalPrice: 2500,
    isSenderCancelled: false,
    cancelReason: null,
    createdAt: fixedTime,
    updatedAt: fixedTime,
    ...overrides
  })

export const makeRider = (overrides: Partial<ConstructorParameters<typeof RiderProfile>[0]> = {}) =>
  new RiderProfile({
    id: RIDER_ID,
    userType: "RIDER",
    fullName: "Ada Rider",
    email: "ada@example.com",
    phoneNumber: "+2348000000001",
    isOnline: true,
    hasDelivery: false,
    isBlocked: false,
    dispatcherId: DISPATCHER_ID,
    orderCancelCount: 0,
    ...overrides
  })

export const makeWallet = (ownerId: UserId, balance = 0, escrowBalance = 0) =>
  new Wallet({ ownerId, balance, escrowBalance, updatedAt: fixedTime })

// Hold written when the sender's payment was captured
export const makeSenderHold = (amount = 2500) =>
  new TransactionRecord({
    id: HOLD_ID,
    txRef: TX_REF,
    orderId: ORDER_ID,
    walletId: SENDER_ID,
    amount,
    fromUserId: SENDER_ID,
    toUserId: null,
    transactionType: "ESCROW_HOLD",
    paymentStatus: "SUCCESS",
    orderType: "DELIVERY",
    balanceDelta: 0,
    escrowDelta: amount,
    details: new TransactionDetails({ label: "DEBIT", reason: "PAYMENT_CAPTURED", actorId: SENDER_ID }),
    createdAt: fixedTime
  })
