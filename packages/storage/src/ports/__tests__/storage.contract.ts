import { Readable } from "node:stream"
import { isDataError } from "../../model/data.errors"
import type { StoragePort } from "../storage"
import type { StorageBucket } from "../storage-object"

export const describeStorageContractTests = (
  name: string,
  createAdapter: () => Promise<{
    bucket: string
    storage: StoragePort
  }>,
  cleanup?: () => Promise<void>,
) => {
  describe(`StoragePort contract: ${name}`, () => {
    let storage: StoragePort
    let bucket: StorageBucket

    beforeAll(async () => {
      const setup = await createAdapter()

      storage = setup.storage
      bucket = setup.bucket
    })

    afterAll(async () => {
      await cleanup?.()
    })

    describe("put / get / head / exists", () => {
      it("stores and retrieves an object", async () => {
        const ref = { bucket, key: "contract/basic.txt" }
        const data = Buffer.from("hello world")

        await storage.put(ref, data, { contentType: "text/plain" })

        const obj = await storage.get(ref)

        expect(obj).toMatchObject({
          key: ref.key,
          contentType: "text/plain",
          sizeInBytes: data.length,
          lastModified: expect.any(Date),
        })
        expect(obj!.body.toString("utf8")).toBe("hello world")
      })

      it("accepts Readable stream as input", async () => {
        const ref = { bucket, key: "contract/stream-input.txt" }
        const stream = Readable.from([Buffer.from("stream "), Buffer.from("input")])

        await storage.put(ref, stream)

        const obj = await storage.get(ref)
        expect(obj!.body.toString("utf8")).toBe("stream input")
      })

      it("accepts Uint8Array as input", async () => {
        const ref = { bucket, key: "contract/uint8.txt" }

        await storage.put(ref, new Uint8Array([104, 101, 108, 108, 111]))

        const obj = await storage.get(ref)
        expect(obj!.sizeInBytes).toBe(5)
      })

      it("handles empty file", async () => {
        const ref = { bucket, key: "contract/empty.txt" }
        await storage.put(ref, Buffer.alloc(0))

        const obj = await storage.get(ref)
        expect(obj!.sizeInBytes).toBe(0)
        expect(obj!.body.length).toBe(0)
      })

      it("reads only the leading bytes when byteCount is given", async () => {
        const ref = { bucket, key: "contract/partial.txt" }
        await storage.put(ref, Buffer.from("0123456789"))

        const obj = await storage.get(ref, { byteCount: 4 })
        expect(obj!.body.toString("utf8")).toBe("0123")
      })

      it("returns the whole object when byteCount exceeds its size", async () => {
        const ref = { bucket, key: "contract/partial-short.txt" }
        await storage.put(ref, Buffer.from("abc"))

        const obj = await storage.get(ref, { byteCount: 100 })
        expect(obj!.body.toString("utf8")).toBe("abc")
      })

      it("head returns metadata without body", async () => {
        const ref = { bucket, key: "contract/head.txt" }
        await storage.put(ref, Buffer.from("head test"))

        const meta = await storage.head(ref)
        expect(meta!.key).toBe(ref.key)
        expect(meta!.sizeInBytes).toBe(9)
        expect(meta!.lastModified).toBeInstanceOf(Date)
        expect(meta!.etag).toMatch(/^"[a-f0-9]{32}"$/)
        expect(meta).not.toHaveProperty("body")
      })

      it("exists reflects presence", async () => {
        const ref = { bucket, key: "contract/exists.txt" }
        expect(await storage.exists(ref)).toBe(false)

        await storage.put(ref, Buffer.from("exists"))

        expect(await storage.exists(ref)).toBe(true)
      })

      it("get and head return null for missing object", async () => {
        const ref = { bucket, key: "contract/missing.txt" }

        expect(await storage.get(ref)).toBeNull()
        expect(await storage.head(ref)).toBeNull()
      })

      it("put overwrites existing object", async () => {
        const ref = { bucket, key: "contract/overwrite.txt" }
        await storage.put(ref, Buffer.from("v1"))
        await storage.put(ref, Buffer.from("version2"))

        const obj = await storage.get(ref)
        expect(obj!.body.toString("utf8")).toBe("version2")
      })

      it("preserves custom metadata", async () => {
        const ref = { bucket, key: "contract/metadata.txt" }
        await storage.put(ref, Buffer.from("meta"), { metadata: { source: "survey" } })

        const meta = await storage.head(ref)
        expect(meta!.metadata).toEqual({ source: "survey" })
      })

      it("handles unicode in key", async () => {
        const ref = { bucket, key: "contract/こんにちは/文件.txt" }
        await storage.put(ref, Buffer.from("unicode"))

        expect(await storage.exists(ref)).toBe(true)
      })
    })

    describe("delete", () => {
      it("deletes an existing object", async () => {
        const ref = { bucket, key: "contract/delete-me.txt" }
        await storage.put(ref, Buffer.from("delete"))

        await storage.delete(ref)

        expect(await storage.exists(ref)).toBe(false)
      })

      it("is a no-op for a missing object", async () => {
        const ref = { bucket, key: "contract/never-existed.txt" }
        await expect(storage.delete(ref)).resolves.toBeUndefined()
      })
    })

    describe("list", () => {
      beforeAll(async () => {
        await storage.put({ bucket, key: "list/a.txt" }, Buffer.from("a"))
        await storage.put({ bucket, key: "list/b.txt" }, Buffer.from("b"))
        await storage.put({ bucket, key: "list/nested/c.txt" }, Buffer.from("c"))
      })

      it("lists objects under a prefix in key order", async () => {
        const result = await storage.list(bucket, { prefix: "list/" })

        expect(result.objects.map((o) => o.key)).toEqual([
          "list/a.txt",
          "list/b.txt",
          "list/nested/c.txt",
        ])
        expect(result.cursor).toBeUndefined()
      })

      it("respects maxKeys and paginates with cursor", async () => {
        const page1 = await storage.list(bucket, { prefix: "list/", maxKeys: 2 })
        expect(page1.objects.map((o) => o.key)).toEqual(["list/a.txt", "list/b.txt"])
        expect(page1.cursor).toBeDefined()

        const page2 = await storage.list(bucket, {
          prefix: "list/",
          maxKeys: 2,
          cursor: page1.cursor!,
        })
        expect(page2.objects.map((o) => o.key)).toEqual(["list/nested/c.txt"])
        expect(page2.cursor).toBeUndefined()
      })

      it("returns empty for no matches", async () => {
        const result = await storage.list(bucket, { prefix: "nonexistent-prefix/" })

        expect(result.objects).toEqual([])
        expect(result.cursor).toBeUndefined()
      })
    })

    describe("copy", () => {
      it("copies an object to a new key", async () => {
        const src = { bucket, key: "contract/copy-src.txt" }
        const dst = { bucket, key: "contract/copy-dst.txt" }
        await storage.put(src, Buffer.from("copy me"))

        await storage.copy(src, dst)

        const obj = await storage.get(dst)
        expect(obj!.body.toString("utf8")).toBe("copy me")
        expect(await storage.exists(src)).toBe(true)
      })

      it("preserves metadata by default", async () => {
        const src = { bucket, key: "contract/copy-meta-src.txt" }
        const dst = { bucket, key: "contract/copy-meta-dst.txt" }
        await storage.put(src, Buffer.from("meta"), { metadata: { foo: "bar" } })

        await storage.copy(src, dst)

        const meta = await storage.head(dst)
        expect(meta!.metadata?.foo).toBe("bar")
      })

      it("replaces metadata when provided", async () => {
        const src = { bucket, key: "contract/copy-replace-src.txt" }
        const dst = { bucket, key: "contract/copy-replace-dst.txt" }
        await storage.put(src, Buffer.from("x"), { metadata: { old: "value" } })

        await storage.copy(src, dst, { metadata: { new: "value" } })

        const meta = await storage.head(dst)
        expect(meta!.metadata).toEqual({ new: "value" })
      })

      it("rejects with not_found for a missing source", async () => {
        const src = { bucket, key: "contract/copy-missing-src.txt" }
        const dst = { bucket, key: "contract/copy-missing-dst.txt" }

        const err = await storage.copy(src, dst).catch((e: unknown) => e)

        expect(isDataError(err, "not_found")).toBe(true)
      })
    })

    describe("presigned URLs", () => {
      it("generates a download URL naming the key", async () => {
        const ref = { bucket, key: "contract/presign-dl.txt" }
        await storage.put(ref, Buffer.from("download me"))

        const url = await storage.getPresignedDownloadUrl(ref)

        expect(url).toBeInstanceOf(URL)
        expect(url.pathname).toContain("contract/presign-dl.txt")
      })
    })
  })
}
