import { HttpRouter, HttpServer, HttpServerResponse } from "@effect/platform"
import { NodeHttpServer, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"
import { createServer } from "node:http"
import { HealthRoutes } from "./api/health.js"
import { DeliveryRoutes } from "./api/deliveries.js"
import { OrderRoutes } from "./api/orders.js"
import { AppLive } from "./layers.js"
import { DispatchConfig } from "./config.js"
import { TelemetryLive } from "./telemetry.js"

// Root route - service identification
const rootRoute = HttpRouter.empty.pipe(
  HttpRouter.get(
    "/",
    Effect.succeed(
      HttpServerResponse.text("Dispatch Service - Delivery transitions and ledger")
    )
  )
)

// Compose all routes
const router = HttpRouter.empty.pipe(
  HttpRouter.mount("/", rootRoute),
  HttpRouter.mount("/", HealthRoutes),
  HttpRouter.concat(DeliveryRoutes),
  HttpRouter.concat(OrderRoutes)
)

// Create HTTP server with dynamic port from config
const HttpLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* DispatchConfig

    return router.pipe(
      HttpServer.serve(),
      HttpServer.withLogAddress,
      Layer.provide(
        NodeHttpServer.layer(createServer, { port: config.port })
      )
    )
  })
)

// Compose final application layer
const MainLive = HttpLive.pipe(
  Layer.provide(AppLive),
  Layer.provide(TelemetryLive)
)

// Launch the server
Layer.launch(MainLive).pipe(NodeRuntime.runMain)
