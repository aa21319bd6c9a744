import { Layer, Effect } from "effect"
import { SqlClient } from "@effect/sql"
import { UnitOfWork } from "./UnitOfWork.js"

// Statements issued inside share the transaction connection; nested calls become savepoints
export const UnitOfWorkLive = Layer.effect(
  UnitOfWork,
  Effect.gen(function* () {
    const sql = yield* SqlClient.SqlClient

    return {
      transactional: <A, E, R>(effect: Effect.Effect<A, E, R>) => sql.withTransaction(effect)
    }
  })
)
