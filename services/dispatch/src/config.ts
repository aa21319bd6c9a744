import { Config, Context, Effect, Layer } from "effect"

export class DispatchConfig extends Context.Tag("DispatchConfig")<
  DispatchConfig,
  {
    readonly port: number
    // Header the upstream auth layer fills with the caller's user id
    readonly actorHeader: string
  }
>() {}

export const DispatchConfigLive = Layer.effect(
  DispatchConfig,
  Effect.gen(function* () {
    return {
      port: yield* Config.number("PORT").pipe(Config.withDefault(3004)),
      actorHeader: yield* Config.string("ACTOR_HEADER").pipe(
        Config.withDefault("x-actor-id"),
        Config.map((header) => header.toLowerCase())
      )
    }
  })
)
