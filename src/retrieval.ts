import { digest } from "./crypto.js";
import { IntegrityError } from "./errors.js";
import { ensureTrailingSlash, fetchBytes } from "./http.js";
import type { HttpOptions } from "./http.js";
import { CONTENT_ADDRESS_KEY, legacyHashAlgorithm } from "./types.js";
import type { TargetFile } from "./types.js";

export interface RetrievalContext {
  // Whether the trusted root enables hash-prefixed target names
  consistentSnapshot: boolean;
}

/**
 * How target bytes are obtained and checked once the trusted record of a
 * target is known. Implementations return only bytes that passed their
 * integrity checks.
 */
export interface TargetRetrieval {
  retrieve(target: TargetFile, context: RetrievalContext): Promise<Uint8Array>;
}

/**
 * Cross-checks the declared length and every legacy hash of `target`.
 * The content address entry is bound by the transport and skipped here;
 * any other algorithm is rejected since it cannot be checked.
 */
export async function verifyLengthAndHashes(
  target: TargetFile,
  data: Uint8Array,
): Promise<void> {
  if (target.length !== undefined && data.length !== target.length) {
    throw new IntegrityError(
      `${target.path} length ${data.length} does not match the declared ${target.length}`,
    );
  }

  for (const [algorithmName, expected] of Object.entries(target.hashes)) {
    if (algorithmName === CONTENT_ADDRESS_KEY) {
      continue;
    }
    const algorithm = legacyHashAlgorithm(algorithmName);
    if (algorithm === undefined) {
      throw new IntegrityError(
        `${target.path} lists unsupported hash algorithm ${algorithmName}`,
      );
    }
    if ((await digest(algorithm, data)) !== expected.toLowerCase()) {
      throw new IntegrityError(
        `${target.path} ${algorithmName} hash does not match the value in the targets role.`,
      );
    }
  }
}

/**
 * Conventional TUF target download from a target base URL, verified against
 * the sha256 or sha512 hash in the targets role.
 */
export class HashedRetrieval implements TargetRetrieval {
  private readonly targetBaseUrl: string;
  private readonly options: HttpOptions;

  constructor(targetBaseUrl: string, options: HttpOptions) {
    this.targetBaseUrl = ensureTrailingSlash(targetBaseUrl);
    this.options = options;
  }

  urlFor(target: TargetFile, context: RetrievalContext): string {
    const name = target.path;
    if (!context.consistentSnapshot) {
      return `${this.targetBaseUrl}${name}`;
    }

    // Prefer sha256 over sha512 for the consistent name
    const hashValue = target.hashes.sha256 ?? target.hashes.sha512;
    if (hashValue === undefined) {
      throw new IntegrityError(
        `No supported hash algorithm found for ${name}. Available: ${Object.keys(target.hashes).join(", ")}`,
      );
    }

    // Keep the directory structure: dir/subdir/HASH.filename
    const lastSlash = name.lastIndexOf("/");
    return lastSlash === -1
      ? `${this.targetBaseUrl}${hashValue}.${name}`
      : `${this.targetBaseUrl}${name.substring(0, lastSlash + 1)}${hashValue}.${name.substring(lastSlash + 1)}`;
  }

  async retrieve(
    target: TargetFile,
    context: RetrievalContext,
  ): Promise<Uint8Array> {
    const verifiable = Object.keys(target.hashes).some(
      (name) => legacyHashAlgorithm(name) !== undefined,
    );
    if (!verifiable) {
      throw new IntegrityError(
        `No supported hash algorithm found for ${target.path}. Available: ${Object.keys(target.hashes).join(", ")}`,
      );
    }

    const data = await fetchBytes(this.urlFor(target, context), this.options);
    await verifyLengthAndHashes(target, data);
    return data;
  }
}
