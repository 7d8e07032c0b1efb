import { digest } from "./crypto.js";
import {
  ExpiredMetadataError,
  IntegrityError,
  MetadataError,
  RollbackError,
  SignatureThresholdError,
  VersionMismatchError,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { Envelope, loadRoot } from "./metadata.js";
import type { TrustedRoot } from "./metadata.js";
import { legacyHashAlgorithm, Roles, TOP_LEVEL_ROLES } from "./types.js";
import type {
  MetaFile,
  SnapshotSigned,
  TargetsSigned,
  TimestampSigned,
} from "./types.js";

// Checks fetched metadata bytes against the length and hashes its parent declared
export async function verifyMetaFile(
  name: string,
  meta: MetaFile,
  data: Uint8Array,
): Promise<void> {
  if (meta.length !== undefined && meta.length !== data.length) {
    throw new IntegrityError(
      `${name} length ${data.length} does not match the expected ${meta.length}`,
    );
  }

  for (const [algorithmName, expected] of Object.entries(meta.hashes ?? {})) {
    const algorithm = legacyHashAlgorithm(algorithmName);
    if (algorithm === undefined) {
      throw new IntegrityError(
        `${name} lists unsupported hash algorithm ${algorithmName}`,
      );
    }
    if ((await digest(algorithm, data)) !== expected.toLowerCase()) {
      throw new IntegrityError(`${name} ${algorithmName} hash does not match`);
    }
  }
}

/**
 * The currently trusted top-level metadata and the rules for replacing each
 * document. A document is adopted only once every check on it has passed;
 * a failed update leaves the previously trusted one in place.
 */
export class TrustStore {
  private trustedRoot?: TrustedRoot;
  private trustedTimestamp?: Envelope<TimestampSigned>;
  private trustedSnapshot?: Envelope<SnapshotSigned>;
  private trustedTargets?: Envelope<TargetsSigned>;
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  get root(): TrustedRoot {
    if (!this.trustedRoot) {
      throw new MetadataError("No trusted root has been loaded");
    }
    return this.trustedRoot;
  }

  get timestamp(): Envelope<TimestampSigned> | undefined {
    return this.trustedTimestamp;
  }

  get snapshot(): Envelope<SnapshotSigned> | undefined {
    return this.trustedSnapshot;
  }

  get targets(): Envelope<TargetsSigned> | undefined {
    return this.trustedTargets;
  }

  // The locally trusted root is its own trust anchor
  async bootstrap(raw: Uint8Array): Promise<TrustedRoot> {
    const envelope = Envelope.parseAs(raw, Roles.Root);
    const root = await loadRoot(envelope, this.logger);

    if (!(await envelope.verify(root))) {
      throw new SignatureThresholdError(
        "Trusted root is not signed by the threshold of its own root keys.",
      );
    }

    this.trustedRoot = root;
    this.trustedTimestamp = undefined;
    this.trustedSnapshot = undefined;
    this.trustedTargets = undefined;
    return root;
  }

  /**
   * Replaces the trusted root with its immediate successor. The new root
   * must be signed by the threshold of the old root keys (rotation proof)
   * and by the threshold of its own keys.
   */
  async updateRoot(raw: Uint8Array): Promise<TrustedRoot> {
    const current = this.root;
    const envelope = Envelope.parseAs(raw, Roles.Root);

    if (!(await envelope.verify(current))) {
      throw new SignatureThresholdError(
        `Root v${envelope.version} is not signed by the threshold of root v${current.version} keys.`,
      );
    }

    if (envelope.version !== current.version + 1) {
      throw new VersionMismatchError(
        `Root version must be exactly ${current.version + 1}, got ${envelope.version}.`,
      );
    }

    const root = await loadRoot(envelope, this.logger);
    if (!(await envelope.verify(root))) {
      throw new SignatureThresholdError(
        `Root v${envelope.version} is not signed by the threshold of its own root keys.`,
      );
    }

    this.trustedRoot = root;
    return root;
  }

  checkRootExpiry(now: Date): void {
    if (this.root.envelope.isExpired(now)) {
      throw new ExpiredMetadataError(
        `Root v${this.root.version} expired at ${this.root.expires.toISOString()}.`,
      );
    }
  }

  // Roles whose key ids differ between `previous` and the trusted root
  rolesWithRotatedKeys(previous: TrustedRoot): Roles[] {
    const current = this.root;
    return TOP_LEVEL_ROLES.filter((role) => {
      const before = [...previous.roles[role].keyids].sort();
      const after = [...current.roles[role].keyids].sort();
      return (
        before.length !== after.length ||
        before.some((keyid, index) => keyid !== after[index])
      );
    });
  }

  /**
   * Adopts a previously persisted document as the baseline for rollback
   * checks. Only the type and signatures are checked here; expiry matters
   * when the document is used, not when it is remembered.
   */
  async loadLocal(
    role: Roles.Timestamp | Roles.Snapshot | Roles.Targets,
    raw: Uint8Array,
  ): Promise<void> {
    const envelope = Envelope.parse(raw);

    if (!envelope.isRole(role)) {
      throw new MetadataError(
        `Local ${role} metadata has type ${envelope.signed._type}`,
      );
    }
    if (!(await envelope.verify(this.root))) {
      throw new SignatureThresholdError(
        `Local ${role} metadata is not signed by the threshold of trusted ${role} keys.`,
      );
    }

    if (envelope.isRole(Roles.Timestamp)) {
      this.trustedTimestamp = envelope;
    } else if (envelope.isRole(Roles.Snapshot)) {
      this.trustedSnapshot = envelope;
    } else if (envelope.isRole(Roles.Targets)) {
      this.trustedTargets = envelope;
    }
  }

  /**
   * A fetched timestamp equal to the trusted one is a no-op rather than an
   * error so that clients can re-poll; `changed` is false in that case.
   */
  async updateTimestamp(
    raw: Uint8Array,
    now: Date,
  ): Promise<{ timestamp: Envelope<TimestampSigned>; changed: boolean }> {
    const envelope = Envelope.parseAs(raw, Roles.Timestamp);

    if (!(await envelope.verify(this.root))) {
      throw new SignatureThresholdError(
        "Failed verifying timestamp role signature(s).",
      );
    }

    const cached = this.trustedTimestamp;
    if (cached !== undefined) {
      if (envelope.version < cached.version) {
        throw new RollbackError(
          `New timestamp v${envelope.version} is lower than the trusted v${cached.version}.`,
        );
      }
      if (envelope.version === cached.version) {
        if (cached.isExpired(now)) {
          throw new ExpiredMetadataError(
            `Timestamp v${cached.version} expired at ${cached.expires.toISOString()}.`,
          );
        }
        this.logger.debug(`Timestamp v${envelope.version} is unchanged`);
        return { timestamp: cached, changed: false };
      }

      const newSnapshotVersion = envelope.signed.meta["snapshot.json"].version;
      const oldSnapshotVersion = cached.signed.meta["snapshot.json"].version;
      if (newSnapshotVersion < oldSnapshotVersion) {
        throw new RollbackError(
          `Timestamp has been updated, but snapshot version has been rolled back from ${oldSnapshotVersion} to ${newSnapshotVersion}.`,
        );
      }
    }

    if (envelope.isExpired(now)) {
      throw new ExpiredMetadataError(
        `Timestamp v${envelope.version} expired at ${envelope.expires.toISOString()}.`,
      );
    }

    this.trustedTimestamp = envelope;
    return { timestamp: envelope, changed: true };
  }

  // The snapshot reference of the trusted timestamp
  get snapshotMeta(): MetaFile {
    if (!this.trustedTimestamp) {
      throw new MetadataError("Cannot update snapshot before timestamp");
    }
    return this.trustedTimestamp.signed.meta["snapshot.json"];
  }

  // The targets reference of the trusted snapshot
  get targetsMeta(): MetaFile {
    if (!this.trustedSnapshot) {
      throw new MetadataError("Cannot update targets before snapshot");
    }
    return this.trustedSnapshot.signed.meta["targets.json"];
  }

  async updateSnapshot(
    raw: Uint8Array,
    now: Date,
  ): Promise<Envelope<SnapshotSigned>> {
    const expected = this.snapshotMeta;
    await verifyMetaFile("snapshot.json", expected, raw);

    const envelope = Envelope.parseAs(raw, Roles.Snapshot);

    if (!(await envelope.verify(this.root))) {
      throw new SignatureThresholdError(
        "Failed verifying snapshot role signature(s).",
      );
    }

    if (envelope.version !== expected.version) {
      throw new VersionMismatchError(
        `Snapshot version mismatch: expected ${expected.version} but file contains version ${envelope.version}`,
      );
    }

    const cached = this.trustedSnapshot;
    if (cached !== undefined) {
      for (const [filename, previous] of Object.entries(cached.signed.meta)) {
        const next = envelope.signed.meta[filename];
        if (next === undefined) {
          throw new RollbackError(
            `${filename} was listed in an older snapshot but dropped in a newer one.`,
          );
        }
        if (next.version < previous.version) {
          throw new RollbackError(
            `${filename} version ${next.version} in the new snapshot is lower than the trusted ${previous.version}.`,
          );
        }
      }
    }

    if (envelope.isExpired(now)) {
      throw new ExpiredMetadataError(
        `Snapshot v${envelope.version} expired at ${envelope.expires.toISOString()}.`,
      );
    }

    this.trustedSnapshot = envelope;
    return envelope;
  }

  async updateTargets(
    raw: Uint8Array,
    now: Date,
  ): Promise<Envelope<TargetsSigned>> {
    const expected = this.targetsMeta;
    await verifyMetaFile("targets.json", expected, raw);

    const envelope = Envelope.parseAs(raw, Roles.Targets);

    if (!(await envelope.verify(this.root))) {
      throw new SignatureThresholdError(
        "Failed verifying targets role signature(s).",
      );
    }

    if (envelope.version !== expected.version) {
      throw new VersionMismatchError(
        `Targets version mismatch: expected ${expected.version} but file contains version ${envelope.version}`,
      );
    }

    const cached = this.trustedTargets;
    if (cached !== undefined && envelope.version < cached.version) {
      throw new RollbackError(
        `Targets v${envelope.version} is lower than the trusted v${cached.version}.`,
      );
    }

    if (envelope.isExpired(now)) {
      throw new ExpiredMetadataError(
        `Targets v${envelope.version} expired at ${envelope.expires.toISOString()}.`,
      );
    }

    this.trustedTargets = envelope;
    return envelope;
  }
}
