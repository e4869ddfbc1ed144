import type { GetObjectCommand } from "@aws-sdk/client-s3"

/**
 * Stand-in for `@aws-sdk/s3-request-presigner` that builds a deterministic
 * URL instead of signing.
 */
export function fakePresignerModule() {
  async function getSignedUrl(
    _client: unknown,
    command: GetObjectCommand,
    options?: { expiresIn?: number },
  ): Promise<string> {
    const { Bucket, Key } = command.input
    const url = new URL(`https://${Bucket}.s3.amazonaws.com/`)
    url.pathname = `/${Key ?? ""}`
    url.searchParams.set("X-Amz-Expires", String(options?.expiresIn ?? 900))

    return url.toString()
  }

  return { getSignedUrl }
}
