import {
  environmentOfEndpoint,
  MTURK_ENDPOINTS,
  mturkClientConfig,
  previewUrl,
} from "../environment"

describe("crowd environment", () => {
  it("builds worker preview URLs per environment", () => {
    expect(previewUrl("GROUP1", "production")).toBe(
      "https://worker.mturk.com/mturk/preview?groupId=GROUP1",
    )
    expect(previewUrl("GROUP1", "sandbox")).toBe(
      "https://workersandbox.mturk.com/mturk/preview?groupId=GROUP1",
    )
  })

  it("identifies the environment of an endpoint", () => {
    expect(environmentOfEndpoint(`${MTURK_ENDPOINTS.sandbox}/`)).toBe("sandbox")
    expect(environmentOfEndpoint("https://mturk-requester.us-east-1.amazonaws.com")).toBe(
      "production",
    )
    expect(environmentOfEndpoint("https://example.com")).toBeUndefined()
  })

  it("targets us-east-1 and carries session credentials", () => {
    const config = mturkClientConfig(
      {
        region: "eu-west-1",
        credentials: { accessKeyId: "test-key", secretAccessKey: "test-secret" },
      },
      "production",
    )

    expect(config).toEqual({
      region: "us-east-1",
      endpoint: "https://mturk-requester.us-east-1.amazonaws.com",
      credentials: { accessKeyId: "test-key", secretAccessKey: "test-secret" },
    })
  })

  it("passes a profile through", () => {
    expect(mturkClientConfig({ profile: "labeling" }, "sandbox")).toEqual({
      region: "us-east-1",
      endpoint: "https://mturk-requester-sandbox.us-east-1.amazonaws.com",
      profile: "labeling",
    })
  })
})
