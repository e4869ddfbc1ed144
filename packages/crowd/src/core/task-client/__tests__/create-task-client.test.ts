import type { MTurkClient } from "@aws-sdk/client-mturk"
import { createMemoryStorage, DataStore } from "@stowage/storage"
import { FakeMturkClient } from "../../../tests/utils/fake-mturk-client"
import { createTaskClient } from "../create-task-client"
import { TaskClient } from "../task-client"

describe("createTaskClient", () => {
  it("defaults to the sandbox", () => {
    const client = createTaskClient({ session: { region: "eu-west-1" } })

    expect(client).toBeInstanceOf(TaskClient)
    expect(client.environment).toBe("sandbox")
  })

  it("uses the given client and store", async () => {
    const fake = new FakeMturkClient()
    const store = new DataStore({ storage: createMemoryStorage() })
    await store.write("<p>{{n}}</p>", "s3://templates/q.html")

    const client = createTaskClient({
      environment: "production",
      client: fake as unknown as MTurkClient,
      store,
    })
    const handle = await client.createTask({
      title: "t",
      description: "d",
      reward: "0.01",
      question: { kind: "template-location", location: "s3://templates/q.html", args: { n: 1 } },
    })

    expect(handle.environment).toBe("production")
    expect(handle.previewUrl).toBe("https://worker.mturk.com/mturk/preview?groupId=GROUP1")
  })
})
