import type { Signed, TargetFileInfo } from "./schema.js";

export enum KeyTypes {
  Ecdsa = "ECDSA",
  Ed25519 = "Ed25519",
}

export enum EcdsaTypes {
  P256 = "P-256",
  P384 = "P-384",
  P521 = "P-521",
}

export enum HashAlgorithms {
  SHA256 = "SHA-256",
  SHA384 = "SHA-384",
  SHA512 = "SHA-512",
}

export enum Roles {
  Root = "root",
  Timestamp = "timestamp",
  Snapshot = "snapshot",
  Targets = "targets",
}

export const TOP_LEVEL_ROLES = [
  Roles.Root,
  Roles.Timestamp,
  Roles.Snapshot,
  Roles.Targets,
] as const;

// Reserved key in a target's hashes holding its IPFS content identifier
export const CONTENT_ADDRESS_KEY = "ipfs";

// Names of the legacy hash entries in metadata and their Web Crypto algorithm
const LEGACY_HASHES: Readonly<Record<string, HashAlgorithms>> = {
  sha256: HashAlgorithms.SHA256,
  sha512: HashAlgorithms.SHA512,
};

export function legacyHashAlgorithm(name: string): HashAlgorithms | undefined {
  return Object.hasOwn(LEGACY_HASHES, name) ? LEGACY_HASHES[name] : undefined;
}

export type {
  Key,
  MetaFile,
  TargetFileInfo,
  Signature,
  RootSigned,
  TimestampSigned,
  SnapshotSigned,
  TargetsSigned,
  Signed,
} from "./schema.js";

export type SignedFor<R extends Roles> = Extract<Signed, { _type: R }>;

// A trusted target record, addressed by its logical path
export interface TargetFile extends TargetFileInfo {
  path: string;
}
