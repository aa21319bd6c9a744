import { Schema } from "effect"
import { UserId } from "./DeliveryOrder.js"

export const UserType = Schema.Literal("RIDER", "SENDER", "DISPATCHER", "ADMIN")
export type UserType = typeof UserType.Type

// Why a rider could not be reserved; surfaced to callers for messaging
export const IneligibilityReason = Schema.Literal("NOT_A_RIDER", "OFFLINE", "BUSY", "BLOCKED")
export type IneligibilityReason = typeof IneligibilityReason.Type

export class RiderProfile extends Schema.Class<RiderProfile>("RiderProfile")({
  id: UserId,
  userType: UserType,
  fullName: Schema.String,
  email: Schema.NullOr(Schema.String),
  phoneNumber: Schema.NullOr(Schema.String),
  isOnline: Schema.Boolean,
  hasDelivery: Schema.Boolean,
  isBlocked: Schema.Boolean,
  dispatcherId: Schema.NullOr(UserId),
  orderCancelCount: Schema.Int.pipe(Schema.nonNegative())
}) {
  /** Independent riders act as their own dispatcher. */
  get dispatchId(): UserId {
    return this.dispatcherId ?? this.id
  }
}

/**
 * Returns the first rule a profile breaks for new assignments, or null when
 * the rider can take one. Checked in the same order the reserve statement
 * filters on.
 */
export const ineligibilityReason = (rider: RiderProfile): IneligibilityReason | null => {
  if (rider.userType !== "RIDER") return "NOT_A_RIDER"
  if (rider.isBlocked) return "BLOCKED"
  if (!rider.isOnline) return "OFFLINE"
  if (rider.hasDelivery) return "BUSY"
  return null
}

export const isEligibleForAssignment = (rider: RiderProfile): boolean =>
  ineligibilityReason(rider) === null
