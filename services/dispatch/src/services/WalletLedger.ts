import { Context, Effect } from "effect"
import { SqlError } from "@effect/sql"
import type { UserId } from "../domain/DeliveryOrder.js"
import type { LedgerEntry, TransactionRecord } from "../domain/Transaction.js"
import type { Wallet } from "../domain/Wallet.js"
import type { LedgerError, WalletNotFoundError } from "../domain/errors.js"

export interface Posting {
  readonly walletId: UserId
  readonly balanceDelta: number
  readonly escrowDelta: number
  readonly entry: LedgerEntry
}

export interface PostingResult {
  readonly wallet: Wallet
  readonly record: TransactionRecord
}

export class WalletLedger extends Context.Tag("WalletLedger")<
  WalletLedger,
  {
    /**
     * Applies both deltas to one wallet and appends the matching audit record.
     * Fails with InsufficientFundsError if either balance would go negative,
     * leaving the wallet untouched. Postings of one transition must share the
     * caller's unit of work.
     */
    readonly postAdjustment: (
      posting: Posting
    ) => Effect.Effect<PostingResult, LedgerError | SqlError.SqlError>

    readonly getWallet: (
      walletId: UserId
    ) => Effect.Effect<Wallet, WalletNotFoundError | SqlError.SqlError>
  }
>() {}
