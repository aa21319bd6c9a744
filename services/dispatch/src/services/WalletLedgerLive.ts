import { Layer, Effect, Option } from "effect"
import { WalletLedger, type Posting } from "./WalletLedger.js"
import { TransactionRecorder } from "./TransactionRecorder.js"
import { WalletRepository } from "../repositories/WalletRepository.js"
import { InsufficientFundsError, WalletNotFoundError } from "../domain/errors.js"
import type { UserId } from "../domain/DeliveryOrder.js"

export const WalletLedgerLive = Layer.effect(
  WalletLedger,
  Effect.gen(function* () {
    const wallets = yield* WalletRepository
    const recorder = yield* TransactionRecorder

    const getWallet = (walletId: UserId) =>
      wallets.findByOwner(walletId).pipe(
        Effect.flatMap(
          Option.match({
            onNone: () => Effect.fail(new WalletNotFoundError({ walletId })),
            onSome: Effect.succeed
          })
        )
      )

    return {
      postAdjustment: (posting: Posting) =>
        Effect.gen(function* () {
          const { walletId, balanceDelta, escrowDelta, entry } = posting
          const updated = yield* wallets.applyDelta(walletId, { balanceDelta, escrowDelta })

          if (Option.isNone(updated)) {
            // No row matched: tell a missing wallet apart from an overdraw
            const current = yield* getWallet(walletId)
            yield* Effect.logWarning("Posting rejected: insufficient funds", {
              walletId,
              balance: current.balance,
              escrowBalance: current.escrowBalance,
              balanceDelta,
              escrowDelta
            })
            return yield* Effect.fail(
              new InsufficientFundsError({
                walletId,
                balance: current.balance,
                escrowBalance: current.escrowBalance,
                balanceDelta,
                escrowDelta
              })
            )
          }

          const record = yield* recorder.append({ ...entry, walletId, balanceDelta, escrowDelta })

          return { wallet: updated.value, record }
        }).pipe(Effect.withSpan("WalletLedger.postAdjustment")),

      getWallet
    }
  })
)
