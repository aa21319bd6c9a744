import { Context, Effect } from "effect"
import { SqlError } from "@effect/sql"

/**
 * Transaction boundary for one state transition.
 * Every repository call made inside `transactional` commits or rolls back
 * together; a failure of the wrapped effect rolls everything back.
 */
export class UnitOfWork extends Context.Tag("UnitOfWork")<
  UnitOfWork,
  {
    readonly transactional: <A, E, R>(
      effect: Effect.Effect<A, E, R>
    ) => Effect.Effect<A, E | SqlError.SqlError, R>
  }
>() {}
