import { webcrypto } from "node:crypto";

import { canonicalize } from "./canonicalize.js";
import {
  base64ToUint8Array,
  hexToUint8Array,
  stringToUint8Array,
  toArrayBuffer,
  Uint8ArrayToHex,
} from "./encoding.js";
import { CryptoError, SignatureThresholdError } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { EcdsaTypes, HashAlgorithms, KeyTypes } from "./types.js";
import type { Key, Signature } from "./types.js";

const { subtle } = webcrypto;

export type PublicKey = webcrypto.CryptoKey;

export async function digest(
  algorithm: HashAlgorithms,
  data: Uint8Array,
): Promise<string> {
  return Uint8ArrayToHex(
    new Uint8Array(await subtle.digest(algorithm, toArrayBuffer(data))),
  );
}

export async function loadKeys(
  keys: Record<string, Key>,
  logger: Logger = silentLogger,
): Promise<Map<string, PublicKey>> {
  const importedKeys = new Map<string, PublicKey>();
  const computedKeyIds = new Set<string>();

  for (const [keyid, key] of Object.entries(keys)) {
    // A keyid must be the hash of the canonical key, and only one key may own it
    const computedKeyId = await digest(
      HashAlgorithms.SHA256,
      stringToUint8Array(canonicalize(key)),
    );

    if (computedKeyIds.has(computedKeyId)) {
      throw new CryptoError(`Duplicate key found for keyid ${keyid}`);
    }
    computedKeyIds.add(computedKeyId);

    if (computedKeyId !== keyid) {
      // Deployed repositories compute keyids in incompatible ways, reference the declared one
      logger.warn(
        `KeyId ${keyid} does not match the expected ${computedKeyId}, importing the provided one.`,
      );
    }

    importedKeys.set(
      keyid,
      await importKey(key.keytype, key.scheme, key.keyval.public),
    );
  }

  return importedKeys;
}

export function pemToDer(pem: string): Uint8Array {
  const body = pem
    .replace(/-----(BEGIN|END)[^-]*-----/g, "")
    .replace(/\s+/g, "");
  return base64ToUint8Array(body);
}

function decodeKeyMaterial(key: string): {
  format: "raw" | "spki";
  keyData: ArrayBuffer;
} {
  try {
    if (key.includes("BEGIN")) {
      return { format: "spki", keyData: toArrayBuffer(pemToDer(key)) };
    }
    if (/^[0-9A-Fa-f]+$/.test(key)) {
      return { format: "raw", keyData: toArrayBuffer(hexToUint8Array(key)) };
    }
    // Bare base64 SPKI, without the PEM armor
    return { format: "spki", keyData: toArrayBuffer(base64ToUint8Array(key)) };
  } catch (error) {
    throw new CryptoError("Cannot decode public key material", { cause: error });
  }
}

function curveForScheme(scheme: string): EcdsaTypes {
  if (scheme.includes("256")) {
    return EcdsaTypes.P256;
  } else if (scheme.includes("384")) {
    return EcdsaTypes.P384;
  } else if (scheme.includes("521")) {
    return EcdsaTypes.P521;
  }
  throw new CryptoError(`Cannot determine ECDSA curve for scheme ${scheme}`);
}

export async function importKey(
  keytype: string,
  scheme: string,
  key: string,
): Promise<PublicKey> {
  const { format, keyData } = decodeKeyMaterial(key);
  let algorithm: webcrypto.EcKeyImportParams | webcrypto.Algorithm;

  const type = keytype.toLowerCase();
  if (type.includes("ecdsa")) {
    algorithm = { name: KeyTypes.Ecdsa, namedCurve: curveForScheme(scheme) };
  } else if (type.includes("ed25519")) {
    algorithm = { name: KeyTypes.Ed25519 };
  } else if (type.includes("rsa")) {
    throw new CryptoError("RSA keys are not supported");
  } else {
    throw new CryptoError(`Unsupported key type ${keytype}`);
  }

  try {
    return await subtle.importKey(format, keyData, algorithm, true, ["verify"]);
  } catch (error) {
    throw new CryptoError(`Failed to import ${keytype} key`, { cause: error });
  }
}

function readDerLength(der: Uint8Array, offset: number): [number, number] {
  const first = der[offset];
  if (first === undefined) {
    throw new CryptoError("Truncated DER signature");
  }
  if (first < 0x80) {
    return [first, offset + 1];
  }
  const count = first & 0x7f;
  if (count === 0 || count > 2) {
    throw new CryptoError("Unsupported DER length encoding");
  }
  let length = 0;
  for (let i = 1; i <= count; i++) {
    const byte = der[offset + i];
    if (byte === undefined) {
      throw new CryptoError("Truncated DER signature");
    }
    length = (length << 8) | byte;
  }
  return [length, offset + 1 + count];
}

function readDerInteger(
  der: Uint8Array,
  offset: number,
  size: number,
): [Uint8Array, number] {
  if (der[offset] !== 0x02) {
    throw new CryptoError("Expected DER INTEGER in signature");
  }
  const [length, start] = readDerLength(der, offset + 1);
  let value = der.subarray(start, start + length);
  if (value.length !== length) {
    throw new CryptoError("Truncated DER signature");
  }
  // Strip the sign padding, then left pad to the curve size
  while (value.length > size && value[0] === 0) {
    value = value.subarray(1);
  }
  if (value.length > size) {
    throw new CryptoError("DER INTEGER is larger than the curve size");
  }
  const padded = new Uint8Array(size);
  padded.set(value, size - value.length);
  return [padded, start + length];
}

// Web Crypto only takes IEEE P1363 (r || s), TUF ECDSA signatures are DER
export function derToP1363(der: Uint8Array, size: number): Uint8Array {
  if (der[0] !== 0x30) {
    throw new CryptoError("Expected DER SEQUENCE in signature");
  }
  const [, start] = readDerLength(der, 1);
  const [r, next] = readDerInteger(der, start, size);
  const [s] = readDerInteger(der, next, size);

  const raw = new Uint8Array(size * 2);
  raw.set(r, 0);
  raw.set(s, size);
  return raw;
}

const CURVE_PARAMS: Record<string, { size: number; hash: HashAlgorithms }> = {
  [EcdsaTypes.P256]: { size: 32, hash: HashAlgorithms.SHA256 },
  [EcdsaTypes.P384]: { size: 48, hash: HashAlgorithms.SHA384 },
  [EcdsaTypes.P521]: { size: 66, hash: HashAlgorithms.SHA512 },
};

function isEcKeyAlgorithm(
  algorithm: webcrypto.KeyAlgorithm,
): algorithm is webcrypto.EcKeyAlgorithm {
  return "namedCurve" in algorithm;
}

export async function verifySignature(
  key: PublicKey,
  signed: Uint8Array,
  sig: Uint8Array,
): Promise<boolean> {
  const algorithm = key.algorithm;

  if (algorithm.name === KeyTypes.Ed25519) {
    return await subtle.verify(
      { name: KeyTypes.Ed25519 },
      key,
      toArrayBuffer(sig),
      toArrayBuffer(signed),
    );
  }

  if (algorithm.name === KeyTypes.Ecdsa && isEcKeyAlgorithm(algorithm)) {
    const params = CURVE_PARAMS[algorithm.namedCurve];
    if (params === undefined) {
      throw new CryptoError(`Unsupported curve ${algorithm.namedCurve}`);
    }
    const raw = derToP1363(sig, params.size);
    return await subtle.verify(
      { name: KeyTypes.Ecdsa, hash: { name: params.hash } },
      key,
      toArrayBuffer(raw),
      toArrayBuffer(signed),
    );
  }

  throw new CryptoError(`Unsupported key algorithm ${algorithm.name}`);
}

/**
 * Counts distinct valid signatures over `signed` from the keys authorized by
 * `roleKeys`, and compares the count with `threshold`.
 *
 * Signatures from keyids outside the role are ignored, and a keyid listed
 * more than once is only attempted the first time.
 */
export async function checkSignatures(
  keys: Map<string, PublicKey>,
  roleKeys: string[],
  signed: Uint8Array,
  signatures: Signature[],
  threshold: number,
): Promise<boolean> {
  const keyIds = new Set(roleKeys);

  if (threshold > keyIds.size) {
    throw new SignatureThresholdError(
      `Threshold ${threshold} is bigger than the ${keyIds.size} keys assigned to the role.`,
    );
  }

  let validSignatures = 0;
  for (const signature of signatures) {
    if (!keyIds.has(signature.keyid)) {
      continue;
    }
    keyIds.delete(signature.keyid);

    const key = keys.get(signature.keyid);
    if (!key) {
      throw new CryptoError(`No public key loaded for keyid ${signature.keyid}`);
    }

    let sig: Uint8Array;
    try {
      sig = hexToUint8Array(signature.sig);
    } catch (error) {
      throw new CryptoError(
        `Signature for keyid ${signature.keyid} is not valid hex`,
        { cause: error },
      );
    }

    if (await verifySignature(key, signed, sig)) {
      validSignatures++;
    }
  }

  return validSignatures >= threshold;
}
