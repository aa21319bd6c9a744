import { PgClient } from "@effect/sql-pg"
import { Config, Duration, Redacted } from "effect"

// Each transition holds one connection for its whole unit of work
export const DatabaseLive = PgClient.layerConfig({
  host: Config.string("DATABASE_HOST").pipe(Config.withDefault("localhost")),
  port: Config.number("DATABASE_PORT").pipe(Config.withDefault(5432)),
  database: Config.string("DATABASE_NAME").pipe(Config.withDefault("dispatch")),
  username: Config.string("DATABASE_USER").pipe(Config.withDefault("dispatch")),
  password: Config.redacted("DATABASE_PASSWORD").pipe(Config.withDefault(Redacted.make("dispatch"))),
  maxConnections: Config.integer("DATABASE_MAX_CONNECTIONS").pipe(Config.withDefault(10)),
  idleTimeout: Config.duration("DATABASE_IDLE_TIMEOUT").pipe(Config.withDefault(Duration.seconds(30))),
  applicationName: Config.succeed("dispatch-service")
})
