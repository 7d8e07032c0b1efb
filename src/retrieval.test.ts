import { createHash } from "node:crypto";

import { describe, it, expect, vi } from "vitest";
import { IntegrityError } from "./errors.js";
import { HashedRetrieval, verifyLengthAndHashes } from "./retrieval.js";
import type { TargetFile } from "./types.js";

const CONTENT = new TextEncoder().encode("target bytes");
const SHA256 = createHash("sha256").update(CONTENT).digest("hex");

describe("verifyLengthAndHashes", () => {
  it("should skip the content address", async () => {
    await expect(
      verifyLengthAndHashes(
        { path: "a.txt", length: 12, hashes: { ipfs: "bafyone", sha256: SHA256 } },
        CONTENT,
      ),
    ).resolves.toBeUndefined();
  });

  it("should compare hashes case-insensitively", async () => {
    await expect(
      verifyLengthAndHashes(
        { path: "a.txt", hashes: { sha256: SHA256.toUpperCase() } },
        CONTENT,
      ),
    ).resolves.toBeUndefined();
  });

  it("should reject a length mismatch", async () => {
    await expect(
      verifyLengthAndHashes({ path: "a.txt", length: 3, hashes: {} }, CONTENT),
    ).rejects.toThrow("a.txt length 12 does not match the declared 3");
  });
});

describe("HashedRetrieval", () => {
  const retrieval = new HashedRetrieval("https://example.com/targets", {
    timeout: 1000,
  });
  const nested: TargetFile = {
    path: "dir/sub/file.txt",
    hashes: { sha256: "aa", sha512: "bb" },
  };

  it("should use the plain path without consistent snapshots", () => {
    expect(retrieval.urlFor(nested, { consistentSnapshot: false })).toBe(
      "https://example.com/targets/dir/sub/file.txt",
    );
  });

  it("should prefix the file name with its sha256", () => {
    expect(retrieval.urlFor(nested, { consistentSnapshot: true })).toBe(
      "https://example.com/targets/dir/sub/aa.file.txt",
    );
  });

  it("should fall back to sha512 for the prefix", () => {
    const target: TargetFile = { path: "file.txt", hashes: { sha512: "bb" } };

    expect(retrieval.urlFor(target, { consistentSnapshot: true })).toBe(
      "https://example.com/targets/bb.file.txt",
    );
  });

  it("should require a hash it can verify", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const ipfsOnly = new HashedRetrieval("https://example.com/targets/", {
      timeout: 1000,
      fetch: fetchImpl,
    });

    await expect(
      ipfsOnly.retrieve(
        { path: "file.txt", hashes: { ipfs: "bafyone" } },
        { consistentSnapshot: false },
      ),
    ).rejects.toThrow(IntegrityError);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("should download and verify", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("target bytes"));
    const hashed = new HashedRetrieval("https://example.com/targets/", {
      timeout: 1000,
      fetch: fetchImpl,
    });

    const data = await hashed.retrieve(
      { path: "file.txt", length: 12, hashes: { sha256: SHA256 } },
      { consistentSnapshot: false },
    );

    expect(new TextDecoder().decode(data)).toBe("target bytes");
    expect(fetchImpl).toHaveBeenCalledWith("https://example.com/targets/file.txt", {
      signal: expect.any(AbortSignal),
    });
  });
});
