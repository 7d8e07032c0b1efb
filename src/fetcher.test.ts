import { describe, it, expect, vi } from "vitest";
import { RetrievalError } from "./errors.js";
import { HttpMetadataSource } from "./fetcher.js";
import { Roles } from "./types.js";

describe("HttpMetadataSource", () => {
  it("should name plain and versioned documents", () => {
    const source = new HttpMetadataSource("https://example.com/metadata", {
      timeout: 1000,
    });

    expect(source.urlFor(Roles.Timestamp)).toBe(
      "https://example.com/metadata/timestamp.json",
    );
    expect(source.urlFor(Roles.Root, 3)).toBe(
      "https://example.com/metadata/3.root.json",
    );
  });

  it("should return the response body", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("{}"));
    const source = new HttpMetadataSource("https://example.com/metadata/", {
      timeout: 1000,
      fetch: fetchImpl,
    });

    const raw = await source.version(Roles.Snapshot, 2);

    expect(new TextDecoder().decode(raw)).toBe("{}");
    expect(fetchImpl).toHaveBeenCalledWith(
      "https://example.com/metadata/2.snapshot.json",
      { signal: expect.any(AbortSignal) },
    );
  });

  it("should report a missing document as not found", async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      async () => new Response("", { status: 404 }),
    );
    const source = new HttpMetadataSource("https://example.com/metadata/", {
      timeout: 1000,
      fetch: fetchImpl,
    });

    const error = await source.version(Roles.Root, 2).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error instanceof RetrievalError && error.notFound).toBe(true);
  });

  it("should not treat a server error as not found", async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      async () => new Response("", { status: 500 }),
    );
    const source = new HttpMetadataSource("https://example.com/metadata/", {
      timeout: 1000,
      fetch: fetchImpl,
    });

    const error = await source.latest(Roles.Timestamp).catch((e: unknown) => e);

    expect(error).toMatchObject({
      url: "https://example.com/metadata/timestamp.json",
      status: 500,
    });
    expect(error instanceof RetrievalError && error.notFound).toBe(false);
  });

  describe("maximum length", () => {
    it("should return a body within the limit", async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => new Response("{}"));
      const source = new HttpMetadataSource("https://example.com/metadata/", {
        timeout: 1000,
        fetch: fetchImpl,
      });

      const raw = await source.latest(Roles.Timestamp, 2);

      expect(new TextDecoder().decode(raw)).toBe("{}");
    });

    it("should stop reading an oversize body", async () => {
      const fetchImpl = vi.fn<typeof fetch>(
        async () => new Response("x".repeat(20_000)),
      );
      const source = new HttpMetadataSource("https://example.com/metadata/", {
        timeout: 1000,
        fetch: fetchImpl,
      });

      await expect(source.latest(Roles.Timestamp, 16_384)).rejects.toThrow(
        "https://example.com/metadata/timestamp.json exceeds the maximum length of 16384 bytes",
      );
    });

    it("should refuse an oversize declared content-length", async () => {
      const fetchImpl = vi.fn<typeof fetch>(
        async () =>
          new Response("x".repeat(100), { headers: { "content-length": "100" } }),
      );
      const source = new HttpMetadataSource("https://example.com/metadata/", {
        timeout: 1000,
        fetch: fetchImpl,
      });

      const error = await source.version(Roles.Root, 2, 10).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetrievalError);
      expect(error).toMatchObject({
        url: "https://example.com/metadata/2.root.json",
        status: 200,
      });
    });
  });
});
