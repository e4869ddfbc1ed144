import { type ConfigSource, EnvSource, loadConfig } from "@stowage/config"
import { type LoggerOptions, logLevelNames } from "@stowage/logger"
import { z } from "zod"
import type { SessionOptions } from "./session"

export const sessionEnvSchema = z.object({
  AWS_ACCESS_KEY_ID: z.string().min(1).optional(),
  AWS_SECRET_ACCESS_KEY: z.string().min(1).optional(),
  AWS_SESSION_TOKEN: z.string().min(1).optional(),
  AWS_PROFILE: z.string().min(1).optional(),
  AWS_REGION: z.string().min(1).optional(),

  S3_ENDPOINT: z.url().optional(),
  S3_FORCE_PATH_STYLE: z.stringbool().optional(),

  MTURK_ENVIRONMENT: z.enum(["production", "sandbox"]).default("sandbox"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type SessionEnv = z.infer<typeof sessionEnvSchema>

export type SessionConfig = {
  session: SessionOptions
  crowdEnvironment: SessionEnv["MTURK_ENVIRONMENT"]
  logging: LoggerOptions
}

/**
 * Session, crowd environment and logging options from configuration
 * sources (the process environment by default).
 */
export async function loadSessionConfig(sources?: ConfigSource[]): Promise<SessionConfig> {
  const config = await loadConfig({
    schema: sessionEnvSchema,
    sources: sources ?? [new EnvSource()],
  })

  return toSessionConfig(config.value)
}

export function toSessionConfig(env: SessionEnv): SessionConfig {
  const credentials =
    env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY
      ? {
          accessKeyId: env.AWS_ACCESS_KEY_ID,
          secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
          ...(env.AWS_SESSION_TOKEN && { sessionToken: env.AWS_SESSION_TOKEN }),
        }
      : undefined

  return {
    session: {
      ...(env.AWS_REGION && { region: env.AWS_REGION }),
      ...(env.S3_ENDPOINT && { endpoint: env.S3_ENDPOINT }),
      ...(env.AWS_PROFILE && { profile: env.AWS_PROFILE }),
      ...(credentials && { credentials }),
      ...(env.S3_FORCE_PATH_STYLE !== undefined && { forcePathStyle: env.S3_FORCE_PATH_STYLE }),
    },
    crowdEnvironment: env.MTURK_ENVIRONMENT,
    logging: { level: env.LOG_LEVEL, prettify: env.LOG_PRETTY },
  }
}
