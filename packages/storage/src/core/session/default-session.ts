import type { Logger } from "@stowage/logger"
import type { DataStore } from "../data-store/data-store"
import { createDataStore, type SessionOptions } from "./session"

type DefaultState = {
  session: SessionOptions
  logger?: Logger
}

let state: DefaultState = { session: {} }

/**
 * Set the process-wide session used by `defaultDataStore()`. Stores obtained
 * earlier keep the session they were created with.
 */
export function configureSession(session: SessionOptions, logger?: Logger): void {
  state = { session: { ...session }, ...(logger && { logger }) }
}

export function currentSession(): SessionOptions {
  return { ...state.session }
}

/** Back to SDK defaults. */
export function resetSession(): void {
  state = { session: {} }
}

/** A store bound to the session configured at call time. */
export function defaultDataStore(): DataStore {
  return createDataStore({
    session: state.session,
    ...(state.logger && { logger: state.logger }),
  })
}
