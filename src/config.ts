import type { MetadataSource } from "./fetcher.js";
import type { FetchFunction } from "./http.js";
import type { Logger } from "./logger.js";
import type { TargetRetrieval } from "./retrieval.js";
import type { FileBackend } from "./storage.js";

export interface UpdaterConfig {
  // Milliseconds before a metadata or target request is abandoned
  timeout: number;
  // Root versions accepted in one refresh before it is treated as an attack
  maxRootRotations: number;
  // Path segment between the gateway URL and the CID
  gatewayPrefix: string;
  // Byte limits for metadata downloads; snapshot and targets use the length
  // their parent declares when it has one
  rootMaxLength: number;
  timestampMaxLength: number;
  snapshotMaxLength: number;
  targetsMaxLength: number;
}

export const DEFAULT_CONFIG: UpdaterConfig = {
  timeout: 5000,
  maxRootRotations: 256,
  gatewayPrefix: "ipfs",
  rootMaxLength: 512_000,
  timestampMaxLength: 16_384,
  snapshotMaxLength: 2_000_000,
  targetsMaxLength: 5_000_000,
};

export interface TUFClientOptions {
  /**
   * Local metadata directory. Must be writable and contain a trusted
   * root.json before the first refresh.
   */
  metadataDir: string;

  /**
   * Base URL for remote metadata, e.g. https://example.com/metadata/.
   * Ignored when `metadataSource` is given.
   */
  metadataBaseUrl?: string;

  metadataSource?: MetadataSource;

  /**
   * IPFS gateway targets are retrieved from, e.g. http://127.0.0.1:8080
   */
  gateway?: string;

  /**
   * Default download directory for downloadTarget() and findCachedTarget()
   */
  targetDir?: string;

  /**
   * Base URL for conventional, hash-verified target downloads. Only used
   * when no gateway is configured.
   */
  targetBaseUrl?: string;

  retrieval?: TargetRetrieval;
  backend?: FileBackend;
  logger?: Logger;
  now?: () => Date;
  fetch?: FetchFunction;
  config?: Partial<UpdaterConfig>;
}
