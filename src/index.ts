export { TUFClient, type RefreshState } from "./tuf.js";
export { DEFAULT_CONFIG, type TUFClientOptions, type UpdaterConfig } from "./config.js";
export { TrustStore } from "./trust.js";
export { Envelope, type TrustedRoot } from "./metadata.js";
export { TargetResolver } from "./resolver.js";
export { ContentAddressedRetrieval, contentAddressOf } from "./ipfs.js";
export {
  HashedRetrieval,
  verifyLengthAndHashes,
  type RetrievalContext,
  type TargetRetrieval,
} from "./retrieval.js";
export { HttpMetadataSource, type MetadataSource } from "./fetcher.js";
export { LocalCache, escapeTargetPath } from "./cache.js";
export { FSBackend } from "./storage/filesystem.js";
export type { FileBackend } from "./storage.js";
export { consoleLogger, silentLogger, type Logger } from "./logger.js";
export * from "./errors.js";
export { CONTENT_ADDRESS_KEY, Roles } from "./types.js";
export type { TargetFile, MetaFile, Signed } from "./types.js";
