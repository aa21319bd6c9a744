import { Layer, Effect, Option, DateTime, Schema } from "effect"
import { SqlClient } from "@effect/sql"
import { WalletRepository } from "./WalletRepository.js"
import { UserId } from "../domain/DeliveryOrder.js"
import { Wallet, type WalletDelta } from "../domain/Wallet.js"

interface WalletRow {
  owner_id: string
  balance: number
  escrow_balance: number
  updated_at: Date
}

const mapRowToWallet = (row: WalletRow): Wallet =>
  new Wallet({
    ownerId: Schema.decodeUnknownSync(UserId)(row.owner_id),
    balance: row.balance,
    escrowBalance: row.escrow_balance,
    updatedAt: DateTime.unsafeFromDate(row.updated_at)
  })

export const WalletRepositoryLive = Layer.effect(
  WalletRepository,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    return {
      findByOwner: (ownerId: UserId) =>
        Effect.gen(function* () {
          const rows = yield* sql<WalletRow>`
            SELECT owner_id, balance, escrow_balance, updated_at
            FROM wallets
            WHERE owner_id = ${ownerId}
          `
          return rows.length > 0 ? Option.some(mapRowToWallet(rows[0])) : Option.none()
        }),

      applyDelta: (ownerId: UserId, delta: WalletDelta) =>
        Effect.gen(function* () {
          const rows = yield* sql<WalletRow>`
            UPDATE wallets
            SET balance = balance + ${delta.balanceDelta},
                escrow_balance = escrow_balance + ${delta.escrowDelta},
                updated_at = NOW()
            WHERE owner_id = ${ownerId}
              AND balance + ${delta.balanceDelta} >= 0
              AND escrow_balance + ${delta.escrowDelta} >= 0
            RETURNING owner_id, balance, escrow_balance, updated_at
          `
          return rows.length > 0 ? Option.some(mapRowToWallet(rows[0])) : Option.none()
        })
    }
  })
)
