import { Layer } from "effect"
import { DatabaseLive } from "./db.js"
import { DispatchConfigLive } from "./config.js"
import { DeliveryOrderRepositoryLive } from "./repositories/DeliveryOrderRepositoryLive.js"
import { RiderRepositoryLive } from "./repositories/RiderRepositoryLive.js"
import { WalletRepositoryLive } from "./repositories/WalletRepositoryLive.js"
import { TransactionRepositoryLive } from "./repositories/TransactionRepositoryLive.js"
import { UnitOfWorkLive } from "./repositories/UnitOfWorkLive.js"
import { TransactionRecorderLive } from "./services/TransactionRecorderLive.js"
import { WalletLedgerLive } from "./services/WalletLedgerLive.js"
import { RiderAvailabilityLive } from "./services/RiderAvailabilityLive.js"
import { DeliveryServiceLive } from "./services/DeliveryServiceLive.js"

// Repository layer depends on database
export const RepositoryLive = Layer.mergeAll(
  DeliveryOrderRepositoryLive,
  RiderRepositoryLive,
  WalletRepositoryLive,
  TransactionRepositoryLive,
  UnitOfWorkLive
).pipe(Layer.provide(DatabaseLive))

// Engine services, leaves first; shares whatever repositories it is given
export const EngineLive = DeliveryServiceLive.pipe(
  Layer.provideMerge(WalletLedgerLive),
  Layer.provideMerge(Layer.merge(TransactionRecorderLive, RiderAvailabilityLive))
)

// Export composed application layer
export const AppLive = Layer.mergeAll(
  DatabaseLive,
  DispatchConfigLive,
  EngineLive.pipe(Layer.provide(RepositoryLive))
)
