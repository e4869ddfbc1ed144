import type { MTurkClient } from "@aws-sdk/client-mturk"
import type { Clock } from "@stowage/clock"
import type { Logger } from "@stowage/logger"
import { createDataStore, type DataStore, type SessionOptions } from "@stowage/storage"
import { type CrowdEnvironment, createMturkClient } from "../environment/environment"
import { TaskClient } from "./task-client"

export interface CreateTaskClientOptions {
  session?: SessionOptions
  /** Default: sandbox */
  environment?: CrowdEnvironment
  client?: MTurkClient
  /** Default: a data store on the same session */
  store?: DataStore
  clock?: Clock
  logger?: Logger
}

export function createTaskClient(options: CreateTaskClientOptions = {}): TaskClient {
  const environment = options.environment ?? "sandbox"

  return new TaskClient({
    client: options.client ?? createMturkClient(options.session, environment),
    environment,
    store:
      options.store ??
      createDataStore({
        ...(options.session && { session: options.session }),
        ...(options.logger && { logger: options.logger }),
      }),
    ...(options.clock && { clock: options.clock }),
    ...(options.logger && { logger: options.logger }),
  })
}
