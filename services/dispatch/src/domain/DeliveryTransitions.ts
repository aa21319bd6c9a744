import type { DeliveryStatus } from "./DeliveryOrder.js"

/**
 * Valid status transitions for a delivery order.
 * The lattice is linear so each ledger posting can rely on the previous one
 * having happened; the only backward edge is a decline returning an
 * assignment to the unassigned pool.
 */
export const VALID_TRANSITIONS: Record<DeliveryStatus, readonly DeliveryStatus[]> = {
  PENDING: ["ASSIGNED", "CANCELLED"],
  PAID_NEEDS_RIDER: ["ASSIGNED", "ACCEPTED", "CANCELLED"],
  ASSIGNED: ["ACCEPTED", "PAID_NEEDS_RIDER", "CANCELLED"],
  ACCEPTED: ["PICKED_UP", "CANCELLED"],
  PICKED_UP: ["IN_TRANSIT", "DELIVERED"],
  IN_TRANSIT: ["DELIVERED"],
  DELIVERED: ["COMPLETED"],
  COMPLETED: [], // Terminal state
  CANCELLED: [] // Terminal state
}

export const isValidTransition = (
  from: DeliveryStatus,
  to: DeliveryStatus
): boolean => VALID_TRANSITIONS[from].includes(to)

// Business events, one per engine operation
export type DeliveryEvent =
  | "ASSIGN"
  | "ACCEPT"
  | "DECLINE"
  | "PICKUP"
  | "START_TRANSIT"
  | "DELIVER"
  | "COMPLETE"
  | "SENDER_CANCEL"

/**
 * Statuses each event may start from.
 * ACCEPT lists ACCEPTED so a retried accept by the holding rider is a no-op.
 */
export const EVENT_SOURCES: Record<DeliveryEvent, readonly DeliveryStatus[]> = {
  ASSIGN: ["PENDING", "PAID_NEEDS_RIDER"],
  ACCEPT: ["PAID_NEEDS_RIDER", "ASSIGNED", "ACCEPTED"],
  DECLINE: ["PAID_NEEDS_RIDER", "ASSIGNED"],
  PICKUP: ["ACCEPTED"],
  START_TRANSIT: ["PICKED_UP"],
  DELIVER: ["PICKED_UP", "IN_TRANSIT"],
  COMPLETE: ["DELIVERED"],
  SENDER_CANCEL: ["PENDING", "PAID_NEEDS_RIDER", "ASSIGNED", "ACCEPTED", "PICKED_UP", "IN_TRANSIT"]
}

export const EVENT_TARGETS: Record<DeliveryEvent, DeliveryStatus> = {
  ASSIGN: "ASSIGNED",
  ACCEPT: "ACCEPTED",
  DECLINE: "PAID_NEEDS_RIDER",
  PICKUP: "PICKED_UP",
  START_TRANSIT: "IN_TRANSIT",
  DELIVER: "DELIVERED",
  COMPLETE: "COMPLETED",
  SENDER_CANCEL: "CANCELLED"
}

export const canApply = (event: DeliveryEvent, status: DeliveryStatus): boolean =>
  EVENT_SOURCES[event].includes(status)

// Statuses in which a rider is attached to the order
export const RIDER_ATTACHED_STATUSES: readonly DeliveryStatus[] = [
  "ASSIGNED",
  "ACCEPTED",
  "PICKED_UP",
  "IN_TRANSIT",
  "DELIVERED",
  "COMPLETED"
]

// After pickup a sender cancellation flags the parcel for return instead of terminating
export const RETURN_ON_CANCEL_STATUSES: readonly DeliveryStatus[] = ["PICKED_UP", "IN_TRANSIT"]

export const TERMINAL_STATUSES: readonly DeliveryStatus[] = ["COMPLETED", "CANCELLED"]
