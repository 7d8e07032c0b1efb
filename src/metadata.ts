import { canonicalize } from "./canonicalize.js";
import { checkSignatures, loadKeys } from "./crypto.js";
import type { PublicKey } from "./crypto.js";
import { stringToUint8Array, Uint8ArrayToString } from "./encoding.js";
import { MetadataError } from "./errors.js";
import type { Logger } from "./logger.js";
import { MetafileSchema } from "./schema.js";
import { Roles } from "./types.js";
import type {
  RootSigned,
  Signature,
  Signed,
  SignedFor,
} from "./types.js";

/**
 * A signed metadata document: the typed payload, its detached signatures,
 * and the exact bytes it was read from.
 *
 * Signatures are checked against the canonical form of the `signed` value as
 * it appeared on the wire, so fields this client does not model still count.
 */
export class Envelope<T extends Signed = Signed> {
  readonly signed: T;
  readonly signatures: Signature[];
  readonly raw: Uint8Array;
  private readonly signedJson: unknown;

  private constructor(
    signed: T,
    signatures: Signature[],
    raw: Uint8Array,
    signedJson: unknown,
  ) {
    this.signed = signed;
    this.signatures = signatures;
    this.raw = raw;
    this.signedJson = signedJson;
  }

  static parse(raw: Uint8Array): Envelope {
    let json: unknown;
    try {
      json = JSON.parse(Uint8ArrayToString(raw));
    } catch (error) {
      throw new MetadataError("Metadata is not valid JSON", { cause: error });
    }

    const result = MetafileSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new MetadataError(`Malformed metadata: ${issues}`);
    }

    // The schema accepted it, so it is an object with a `signed` member
    const signedJson =
      typeof json === "object" && json !== null && "signed" in json
        ? json.signed
        : undefined;

    return new Envelope(
      result.data.signed,
      result.data.signatures,
      raw,
      signedJson,
    );
  }

  static parseAs<R extends Roles>(
    raw: Uint8Array,
    role: R,
  ): Envelope<SignedFor<R>> {
    const envelope = Envelope.parse(raw);
    if (!envelope.isRole(role)) {
      throw new MetadataError(
        `Invalid metadata type: expected ${role}, got ${envelope.signed._type}`,
      );
    }
    return envelope;
  }

  isRole<R extends Roles>(role: R): this is Envelope<SignedFor<R>> {
    return this.signed._type === role;
  }

  get role(): Roles {
    return this.signed._type;
  }

  get version(): number {
    return this.signed.version;
  }

  get expires(): Date {
    return new Date(this.signed.expires);
  }

  isExpired(now: Date): boolean {
    return this.expires <= now;
  }

  canonicalBytes(): Uint8Array {
    return stringToUint8Array(canonicalize(this.signedJson));
  }

  /**
   * Checks that this document carries at least the threshold of valid
   * signatures that `delegator` assigns to its role.
   */
  async verify(delegator: TrustedRoot): Promise<boolean> {
    const role = delegator.roles[this.role];
    return await checkSignatures(
      delegator.keys,
      role.keyids,
      this.canonicalBytes(),
      this.signatures,
      role.threshold,
    );
  }
}

/**
 * A Root document whose keys have been imported, ready to verify the
 * documents it delegates to.
 */
export interface TrustedRoot {
  envelope: Envelope<RootSigned>;
  version: number;
  expires: Date;
  consistentSnapshot: boolean;
  keys: Map<string, PublicKey>;
  roles: RootSigned["roles"];
}

export async function loadRoot(
  envelope: Envelope<RootSigned>,
  logger?: Logger,
): Promise<TrustedRoot> {
  return {
    envelope,
    version: envelope.version,
    expires: envelope.expires,
    consistentSnapshot: envelope.signed.consistent_snapshot ?? false,
    keys: await loadKeys(envelope.signed.keys, logger),
    roles: envelope.signed.roles,
  };
}
