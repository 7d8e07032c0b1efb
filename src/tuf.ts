import * as path from "node:path";

import { LocalCache } from "./cache.js";
import { DEFAULT_CONFIG } from "./config.js";
import type { TUFClientOptions, UpdaterConfig } from "./config.js";
import {
  ConfigurationError,
  IntegrityError,
  RetrievalError,
  RollbackError,
} from "./errors.js";
import { HttpMetadataSource } from "./fetcher.js";
import type { MetadataSource } from "./fetcher.js";
import type { FetchFunction } from "./http.js";
import { ContentAddressedRetrieval } from "./ipfs.js";
import { consoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { Envelope, TrustedRoot } from "./metadata.js";
import { TargetResolver } from "./resolver.js";
import { HashedRetrieval } from "./retrieval.js";
import type { TargetRetrieval } from "./retrieval.js";
import type { FileBackend } from "./storage.js";
import { FSBackend } from "./storage/filesystem.js";
import { TrustStore, verifyMetaFile } from "./trust.js";
import { Roles } from "./types.js";
import type { MetaFile, Signed, TargetFile } from "./types.js";

export type RefreshState =
  | { kind: "uninitialized" }
  | { kind: "rootLoaded"; rootVersion: number }
  | { kind: "rootUpdated"; rootVersion: number }
  | { kind: "timestampUpdated"; timestampVersion: number }
  | { kind: "snapshotUpdated"; snapshotVersion: number }
  | { kind: "targetsUpdated"; targetsVersion: number }
  | { kind: "failed"; error: Error };

// Dropping the keys of a role invalidates what it signed and everything below it
const ROTATION_CASCADE: Record<Roles, Roles[]> = {
  [Roles.Root]: [],
  [Roles.Timestamp]: [Roles.Timestamp, Roles.Snapshot, Roles.Targets],
  [Roles.Snapshot]: [Roles.Snapshot, Roles.Targets],
  [Roles.Targets]: [Roles.Targets],
};

const LOCAL_ROLES = [Roles.Timestamp, Roles.Snapshot, Roles.Targets] as const;

/**
 * TUF client whose targets are retrieved by content address.
 *
 * Example usage:
 * ```typescript
 * const client = new TUFClient({
 *   metadataDir: "/var/lib/app/metadata",
 *   metadataBaseUrl: "https://example.com/metadata/",
 *   gateway: "http://127.0.0.1:8080",
 *   targetDir: "/var/lib/app/targets",
 * });
 * const info = await client.getTargetInfo("file.txt");
 * if (info) {
 *   await client.downloadTarget(info);
 * }
 * ```
 */
export class TUFClient {
  private readonly metadataDir: string;
  private readonly source: MetadataSource;
  private readonly retrieval?: TargetRetrieval;
  private readonly cache: LocalCache;
  private readonly backend: FileBackend;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly config: UpdaterConfig;

  private trusted?: TrustStore;
  private currentState: RefreshState = { kind: "uninitialized" };

  constructor(options: TUFClientOptions) {
    if (!options.metadataDir) {
      throw new ConfigurationError("metadataDir is required");
    }

    this.metadataDir = options.metadataDir;
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.logger = options.logger ?? consoleLogger();
    this.now = options.now ?? (() => new Date());
    this.backend = options.backend ?? new FSBackend();
    this.cache = new LocalCache(options.targetDir);

    const http = { timeout: this.config.timeout, fetch: options.fetch };
    this.source = options.metadataSource ?? this.createSource(options.metadataBaseUrl, http);
    this.retrieval = options.retrieval ?? this.createRetrieval(options, http);
  }

  private createSource(
    metadataBaseUrl: string | undefined,
    http: { timeout: number; fetch?: FetchFunction },
  ): MetadataSource {
    if (!metadataBaseUrl) {
      throw new ConfigurationError(
        "Either metadataBaseUrl or metadataSource must be set",
      );
    }
    return new HttpMetadataSource(metadataBaseUrl, http);
  }

  private createRetrieval(
    options: TUFClientOptions,
    http: { timeout: number; fetch?: FetchFunction },
  ): TargetRetrieval | undefined {
    if (options.gateway) {
      return new ContentAddressedRetrieval(options.gateway, {
        ...http,
        prefix: this.config.gatewayPrefix,
      });
    }
    if (options.targetBaseUrl) {
      return new HashedRetrieval(options.targetBaseUrl, http);
    }
    return undefined;
  }

  get state(): RefreshState {
    return this.currentState;
  }

  private metadataPath(role: Roles): string {
    return path.join(this.metadataDir, `${role}.json`);
  }

  private async persist(envelope: Envelope<Signed>): Promise<void> {
    await this.backend.writeRaw(this.metadataPath(envelope.role), envelope.raw);
  }

  /**
   * Runs the full update: root chain, timestamp, snapshot, targets.
   *
   * The trusted view used by getTargetInfo() is replaced only when every
   * step succeeded; on failure the previous view stays in force and the
   * error is rethrown after moving to the `failed` state.
   */
  async refresh(): Promise<void> {
    try {
      this.trusted = await this.runRefresh();
    } catch (error) {
      this.currentState = {
        kind: "failed",
        error: error instanceof Error ? error : new Error(String(error)),
      };
      throw error;
    }
  }

  private async runRefresh(): Promise<TrustStore> {
    // Every expiry check of this cycle uses the same reference time
    const now = this.now();
    const store = new TrustStore(this.logger);

    const rootRaw = await this.backend.readRaw(this.metadataPath(Roles.Root));
    if (rootRaw === undefined) {
      throw new ConfigurationError(
        `No trusted root metadata found at ${this.metadataPath(Roles.Root)}`,
      );
    }
    const initialRoot = await store.bootstrap(rootRaw);
    this.currentState = { kind: "rootLoaded", rootVersion: initialRoot.version };

    await this.updateRoot(store);
    store.checkRootExpiry(now);
    await this.discardRotatedMetadata(store, initialRoot);
    await this.loadLocalMetadata(store);

    await this.updateTimestamp(store, now);
    await this.updateSnapshot(store, now);
    await this.updateTargets(store, now);

    return store;
  }

  private async updateRoot(store: TrustStore): Promise<void> {
    for (let rotations = 0; ; rotations++) {
      const nextVersion = store.root.version + 1;

      let raw: Uint8Array;
      try {
        raw = await this.source.version(
          Roles.Root,
          nextVersion,
          this.config.rootMaxLength,
        );
      } catch (error) {
        if (error instanceof RetrievalError && error.notFound) {
          this.logger.debug(`No root v${nextVersion} published`);
          break;
        }
        throw error;
      }

      if (rotations >= this.config.maxRootRotations) {
        throw new RollbackError(
          `Root v${nextVersion} exceeds the maximum of ${this.config.maxRootRotations} root updates in one refresh.`,
        );
      }

      const root = await store.updateRoot(raw);
      await this.persist(root.envelope);
      this.logger.debug(`Updated root to v${root.version}`);
      this.currentState = { kind: "rootUpdated", rootVersion: root.version };
    }
  }

  // Recovery from fast-forward attacks: metadata signed by rotated keys is no baseline
  private async discardRotatedMetadata(
    store: TrustStore,
    initialRoot: TrustedRoot,
  ): Promise<void> {
    if (store.root.version === initialRoot.version) {
      return;
    }

    const stale = new Set<Roles>();
    for (const role of store.rolesWithRotatedKeys(initialRoot)) {
      for (const affected of ROTATION_CASCADE[role]) {
        stale.add(affected);
      }
    }

    for (const role of stale) {
      this.logger.debug(`Deleting local ${role} metadata after key rotation`);
      await this.backend.delete(this.metadataPath(role));
    }
  }

  private async loadLocalMetadata(store: TrustStore): Promise<void> {
    for (const role of LOCAL_ROLES) {
      const raw = await this.backend.readRaw(this.metadataPath(role));
      if (raw === undefined) {
        continue;
      }
      try {
        await store.loadLocal(role, raw);
      } catch (error) {
        // An unusable local copy only loses its rollback baseline
        this.logger.warn(
          `Discarding local ${role} metadata: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
  }

  private async updateTimestamp(store: TrustStore, now: Date): Promise<void> {
    const raw = await this.source.latest(
      Roles.Timestamp,
      this.config.timestampMaxLength,
    );
    const { timestamp, changed } = await store.updateTimestamp(raw, now);

    if (changed) {
      await this.persist(timestamp);
      this.logger.debug(`Updated timestamp to v${timestamp.version}`);
    }
    this.currentState = {
      kind: "timestampUpdated",
      timestampVersion: timestamp.version,
    };
  }

  // A trusted copy is reused when it is the referenced version and still valid
  private async isCurrent(
    envelope: Envelope<Signed> | undefined,
    name: string,
    meta: MetaFile,
    now: Date,
  ): Promise<boolean> {
    if (
      envelope === undefined ||
      envelope.version !== meta.version ||
      envelope.isExpired(now)
    ) {
      return false;
    }
    try {
      await verifyMetaFile(name, meta, envelope.raw);
      return true;
    } catch (error) {
      if (error instanceof IntegrityError) {
        this.logger.debug(`Local ${name} does not match its reference: ${error.message}`);
        return false;
      }
      throw error;
    }
  }

  private async fetchRole(
    role: Roles.Snapshot | Roles.Targets,
    meta: MetaFile,
    consistentSnapshot: boolean,
  ): Promise<Uint8Array> {
    const maxLength =
      meta.length ??
      (role === Roles.Snapshot
        ? this.config.snapshotMaxLength
        : this.config.targetsMaxLength);
    return consistentSnapshot
      ? await this.source.version(role, meta.version, maxLength)
      : await this.source.latest(role, maxLength);
  }

  private async updateSnapshot(store: TrustStore, now: Date): Promise<void> {
    const meta = store.snapshotMeta;

    if (await this.isCurrent(store.snapshot, "snapshot.json", meta, now)) {
      this.logger.debug(`Snapshot v${meta.version} is already trusted`);
    } else {
      const raw = await this.fetchRole(
        Roles.Snapshot,
        meta,
        store.root.consistentSnapshot,
      );
      await this.persist(await store.updateSnapshot(raw, now));
      this.logger.debug(`Updated snapshot to v${meta.version}`);
    }

    this.currentState = { kind: "snapshotUpdated", snapshotVersion: meta.version };
  }

  private async updateTargets(store: TrustStore, now: Date): Promise<void> {
    const meta = store.targetsMeta;

    if (await this.isCurrent(store.targets, "targets.json", meta, now)) {
      this.logger.debug(`Targets v${meta.version} is already trusted`);
    } else {
      const raw = await this.fetchRole(
        Roles.Targets,
        meta,
        store.root.consistentSnapshot,
      );
      await this.persist(await store.updateTargets(raw, now));
      this.logger.debug(`Updated targets to v${meta.version}`);
    }

    this.currentState = { kind: "targetsUpdated", targetsVersion: meta.version };
  }

  private async resolver(): Promise<TargetResolver> {
    if (this.trusted === undefined) {
      await this.refresh();
    }
    return new TargetResolver(this.trusted?.targets);
  }

  /**
   * Returns the trusted record of `targetPath`, or undefined when the
   * targets role does not list it. Refreshes first if this client never
   * completed a refresh.
   */
  async getTargetInfo(targetPath: string): Promise<TargetFile | undefined> {
    return (await this.resolver()).resolve(targetPath);
  }

  async listTargets(): Promise<string[]> {
    return (await this.resolver()).list();
  }

  /**
   * Downloads and verifies `target`, then writes it to `filePath` (by
   * default the escaped target path inside targetDir). Nothing is written
   * unless every check passed.
   */
  async downloadTarget(target: TargetFile, filePath?: string): Promise<string> {
    if (this.retrieval === undefined) {
      throw new ConfigurationError(
        "A gateway, targetBaseUrl or retrieval must be configured to download targets",
      );
    }
    const destination = filePath ?? this.cache.pathFor(target);

    const data = await this.retrieval.retrieve(target, {
      consistentSnapshot: this.trusted?.root.consistentSnapshot ?? false,
    });
    await this.cache.write(destination, data);

    this.logger.info(`Downloaded target ${target.path}`);
    return destination;
  }

  async findCachedTarget(
    target: TargetFile,
    filePath?: string,
  ): Promise<string | undefined> {
    const destination = filePath ?? this.cache.pathFor(target);
    return (await this.cache.exists(destination)) ? destination : undefined;
  }
}
