import { Context, Effect, Option } from "effect"
import { SqlError } from "@effect/sql"
import type { UserId } from "../domain/DeliveryOrder.js"
import type { Wallet, WalletDelta } from "../domain/Wallet.js"

export class WalletRepository extends Context.Tag("WalletRepository")<
  WalletRepository,
  {
    readonly findByOwner: (ownerId: UserId) => Effect.Effect<Option.Option<Wallet>, SqlError.SqlError>

    /**
     * Applies both deltas in one conditional UPDATE that refuses to leave
     * either balance negative. Option.none() means no row matched: the
     * wallet is missing or the posting would overdraw it.
     */
    readonly applyDelta: (
      ownerId: UserId,
      delta: WalletDelta
    ) => Effect.Effect<Option.Option<Wallet>, SqlError.SqlError>
  }
>() {}
