import { Schema } from "effect"
import { UserId } from "./DeliveryOrder.js"

// Wallets are provisioned one per user and keyed by their owner
export class Wallet extends Schema.Class<Wallet>("Wallet")({
  ownerId: UserId,
  balance: Schema.Int.pipe(Schema.nonNegative()),
  escrowBalance: Schema.Int.pipe(Schema.nonNegative()),
  updatedAt: Schema.DateTimeUtc
}) {}

// A signed change to both sides of one wallet, applied atomically
export interface WalletDelta {
  readonly balanceDelta: number
  readonly escrowDelta: number
}

export const wouldOverdraw = (wallet: Wallet, delta: WalletDelta): boolean =>
  wallet.balance + delta.balanceDelta < 0 ||
  wallet.escrowBalance + delta.escrowDelta < 0
