import { MissingContentAddressError } from "./errors.js";
import { ensureTrailingSlash, fetchBytes } from "./http.js";
import type { HttpOptions } from "./http.js";
import { verifyLengthAndHashes } from "./retrieval.js";
import type { TargetRetrieval } from "./retrieval.js";
import { CONTENT_ADDRESS_KEY } from "./types.js";
import type { TargetFile } from "./types.js";

export interface GatewayOptions extends HttpOptions {
  // Path segment between the gateway and the CID, "ipfs" on every public gateway
  prefix: string;
}

export function contentAddressOf(target: TargetFile): string {
  const cid = target.hashes[CONTENT_ADDRESS_KEY];
  if (cid === undefined || cid === "") {
    throw new MissingContentAddressError(
      `${target.path} has no "${CONTENT_ADDRESS_KEY}" content address in its hashes`,
    );
  }
  return cid;
}

/**
 * Retrieves targets by CID from an IPFS HTTP gateway.
 *
 * The address binds the content, so the CID itself is not recomputed; the
 * declared length and any legacy hashes are still cross-checked.
 */
export class ContentAddressedRetrieval implements TargetRetrieval {
  private readonly gateway: string;
  private readonly options: GatewayOptions;

  constructor(gateway: string, options: GatewayOptions) {
    this.gateway = ensureTrailingSlash(gateway);
    this.options = options;
  }

  urlFor(cid: string): string {
    return `${this.gateway}${this.options.prefix}/${cid}`;
  }

  async retrieve(target: TargetFile): Promise<Uint8Array> {
    const cid = contentAddressOf(target);
    const data = await fetchBytes(this.urlFor(cid), this.options, { status: 200 });
    await verifyLengthAndHashes(target, data);
    return data;
  }
}
