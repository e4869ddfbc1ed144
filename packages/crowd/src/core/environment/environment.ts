import { MTurkClient, type MTurkClientConfig } from "@aws-sdk/client-mturk"
import type { SessionOptions } from "@stowage/storage"

export const crowdEnvironments = ["production", "sandbox"] as const

export type CrowdEnvironment = (typeof crowdEnvironments)[number]

/** Mechanical Turk only runs in us-east-1. */
export const MTURK_REGION = "us-east-1"

export const MTURK_ENDPOINTS: Record<CrowdEnvironment, string> = {
  production: "https://mturk-requester.us-east-1.amazonaws.com",
  sandbox: "https://mturk-requester-sandbox.us-east-1.amazonaws.com",
}

const PREVIEW_HOSTS: Record<CrowdEnvironment, string> = {
  production: "https://worker.mturk.com",
  sandbox: "https://workersandbox.mturk.com",
}

/** Worker-facing preview page for a HIT group. */
export function previewUrl(hitGroupId: string, environment: CrowdEnvironment): string {
  const url = new URL("/mturk/preview", PREVIEW_HOSTS[environment])
  url.searchParams.set("groupId", hitGroupId)

  return url.toString()
}

export function environmentOfEndpoint(endpoint: string): CrowdEnvironment | undefined {
  return crowdEnvironments.find((env) => MTURK_ENDPOINTS[env] === endpoint.replace(/\/+$/, ""))
}

export function mturkClientConfig(
  session: SessionOptions,
  environment: CrowdEnvironment,
): MTurkClientConfig {
  return {
    region: MTURK_REGION,
    endpoint: MTURK_ENDPOINTS[environment],
    ...(session.profile && { profile: session.profile }),
    ...(session.credentials && { credentials: session.credentials }),
  }
}

export function createMturkClient(
  session: SessionOptions = {},
  environment: CrowdEnvironment = "sandbox",
): MTurkClient {
  return new MTurkClient(mturkClientConfig(session, environment))
}
