// src/tests/unit/blob-store.test.ts
import { describe, expect, it } from "vitest";
import { s3ClientFromEnv } from "../../libs/aws.js";
import { BlobNotFoundError, S3BlobStore } from "../../libs/blob-store.js";
import { parseEnv } from "../../libs/env.js";
import { fakeS3, s3Error, type FakeResponse, type SeenRequest } from "../support/fake-aws.js";

function storeWith(respond: (req: SeenRequest) => FakeResponse) {
  const { client, handler } = fakeS3(respond);
  return { store: new S3BlobStore(client, "test-bucket"), handler };
}

function listing(keys: string[], nextToken?: string): FakeResponse {
  const contents = keys
    .map(
      (key) =>
        `<Contents><Key>${key}</Key><LastModified>2026-01-01T00:00:00.000Z</LastModified><Size>3</Size></Contents>`,
    )
    .join("");
  const truncation = nextToken
    ? `<IsTruncated>true</IsTruncated><NextContinuationToken>${nextToken}</NextContinuationToken>`
    : "<IsTruncated>false</IsTruncated>";
  return {
    statusCode: 200,
    headers: { "content-type": "application/xml" },
    body:
      '<?xml version="1.0" encoding="UTF-8"?>' +
      '<ListBucketResult xmlns="http://s3.amazonaws.com/doc/2006-03-01/">' +
      `<Name>test-bucket</Name>${truncation}${contents}</ListBucketResult>`,
  };
}

const JAN_FIRST = new Date("2026-01-01T00:00:00.000Z");

describe("S3BlobStore", () => {
  it("puts an object with its sha256 in the metadata", async () => {
    const { store, handler } = storeWith(() => ({ statusCode: 200, headers: { etag: '"abc123"' } }));

    const result = await store.put("tenants/t1/hello.txt", "hello", { contentType: "text/plain" });

    expect(result).toEqual({
      key: "tenants/t1/hello.txt",
      size: 5,
      checksum: "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824",
      etag: '"abc123"',
    });
    expect(handler.seen[0]?.method).toBe("PUT");
    expect(handler.seen[0]?.path).toBe("/test-bucket/tenants/t1/hello.txt");
    expect(handler.seen[0]?.headers["x-amz-meta-sha256"]).toBe(result.checksum);
  });

  it("tells existing and missing keys apart", async () => {
    const { store } = storeWith((req) => ({ statusCode: req.path.endsWith("/there") ? 200 : 404 }));

    await expect(store.exists("there")).resolves.toBe(true);
    await expect(store.exists("gone")).resolves.toBe(false);
  });

  it("reads an object's bytes", async () => {
    const { store } = storeWith(() => ({ statusCode: 200, body: "payload" }));

    const bytes = await store.get("tenants/t1/hello.txt");

    expect(Buffer.from(bytes).toString("utf8")).toBe("payload");
  });

  it("throws BlobNotFoundError for a missing key", async () => {
    const { store } = storeWith(() => s3Error(404, "NoSuchKey"));

    await expect(store.get("tenants/t1/missing.txt")).rejects.toBeInstanceOf(BlobNotFoundError);
  });

  it("deletes by key", async () => {
    const { store, handler } = storeWith(() => ({ statusCode: 204 }));

    await expect(store.delete("tenants/t1/old.txt")).resolves.toBeUndefined();
    expect(handler.seen.map((r) => `${r.method} ${r.path}`)).toEqual(["DELETE /test-bucket/tenants/t1/old.txt"]);
  });

  it("follows continuation tokens until the listing ends", async () => {
    const { store, handler } = storeWith((req) =>
      req.query["continuation-token"] === "page-2"
        ? listing(["tenants/t1/c.txt"])
        : listing(["tenants/t1/a.txt", "tenants/t1/b.txt"], "page-2"),
    );

    const items = await store.list("tenants/t1/");

    expect(items).toEqual([
      { key: "tenants/t1/a.txt", size: 3, lastModified: JAN_FIRST },
      { key: "tenants/t1/b.txt", size: 3, lastModified: JAN_FIRST },
      { key: "tenants/t1/c.txt", size: 3, lastModified: JAN_FIRST },
    ]);
    expect(handler.seen).toHaveLength(2);
    expect(handler.seen[0]?.query.prefix).toBe("tenants/t1/");
  });

  it("stops once maxKeys items are listed", async () => {
    const { store, handler } = storeWith(() => listing(["tenants/t1/a.txt", "tenants/t1/b.txt"], "page-2"));

    const items = await store.list("tenants/t1/", { maxKeys: 2 });

    expect(items.map((item) => item.key)).toEqual(["tenants/t1/a.txt", "tenants/t1/b.txt"]);
    expect(handler.seen).toHaveLength(1);
    expect(handler.seen[0]?.query["max-keys"]).toBe("2");
  });

  it("signs download URLs without a request", async () => {
    const { store, handler } = storeWith(() => ({ statusCode: 500 }));

    const url = new URL(await store.presignedUrl("tenants/t1/report.csv", { expiresIn: 900 }));

    expect(url.pathname).toBe("/test-bucket/tenants/t1/report.csv");
    expect(url.searchParams.get("X-Amz-Expires")).toBe("900");
    expect(handler.seen).toEqual([]);
  });
});

describe("s3ClientFromEnv", () => {
  it("uses path-style addressing only against a custom endpoint", async () => {
    const local = s3ClientFromEnv(parseEnv({ NODE_ENV: "test", AWS_ENDPOINT_URL: "http://localhost:4566" }));
    const aws = s3ClientFromEnv(parseEnv({ NODE_ENV: "test" }));

    expect(local.config.forcePathStyle).toBe(true);
    expect(aws.config.forcePathStyle).toBe(false);
  });
});
