import { Headers, HttpServerRequest } from "@effect/platform"
import { Data, Effect, Option, Schema } from "effect"
import { DispatchConfig } from "../config.js"
import { ActorId } from "../domain/DeliveryOrder.js"

/**
 * The actor header was absent or did not carry a user id.
 */
export class MissingActorError extends Data.TaggedError("MissingActorError")<{
  readonly header: string
}> {}

// Caller identity as set by the upstream auth layer
export const currentActor = Effect.gen(function* () {
  const { actorHeader } = yield* DispatchConfig
  const request = yield* HttpServerRequest.HttpServerRequest

  const raw = Headers.get(request.headers, actorHeader)
  if (Option.isNone(raw)) {
    return yield* Effect.fail(new MissingActorError({ header: actorHeader }))
  }

  return yield* Schema.decodeUnknown(ActorId)(raw.value).pipe(
    Effect.mapError(() => new MissingActorError({ header: actorHeader }))
  )
})
