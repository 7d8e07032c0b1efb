import { generateKeyPairSync, sign } from "node:crypto";
import { describe, it, expect } from "vitest";
import {
  checkSignatures,
  derToP1363,
  digest,
  importKey,
  loadKeys,
  verifySignature,
} from "./crypto.js";
import type { PublicKey } from "./crypto.js";
import { stringToUint8Array } from "./encoding.js";
import { CryptoError, SignatureThresholdError } from "./errors.js";
import { HashAlgorithms } from "./types.js";
import { createSigner } from "./testing/simulator.js";
import type { Signer } from "./testing/simulator.js";

const message = stringToUint8Array('{"_type":"timestamp"}');

function signHex(signer: Signer, data: Uint8Array): string {
  return sign(null, data, signer.privateKey).toString("hex");
}

async function keyMap(signers: Signer[]): Promise<Map<string, PublicKey>> {
  const keys = new Map<string, PublicKey>();
  for (const signer of signers) {
    keys.set(
      signer.keyid,
      await importKey(signer.key.keytype, signer.key.scheme, signer.key.keyval.public),
    );
  }
  return keys;
}

describe("digest", () => {
  it("should produce lowercase hex sha256", async () => {
    expect(await digest(HashAlgorithms.SHA256, stringToUint8Array("abc"))).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });
});

describe("loadKeys", () => {
  it("should import keys under their declared keyid", async () => {
    const signer = createSigner();
    const keys = await loadKeys({ [signer.keyid]: signer.key });
    expect([...keys.keys()]).toEqual([signer.keyid]);
  });

  it("should reject the same key listed under two keyids", async () => {
    const signer = createSigner();
    await expect(
      loadKeys({ [signer.keyid]: signer.key, other: signer.key }),
    ).rejects.toThrow(CryptoError);
  });

  it("should reject rsa keys", async () => {
    await expect(importKey("rsa", "rsassa-pss-sha256", "abcd")).rejects.toThrow(
      "RSA keys are not supported",
    );
  });
});

describe("verifySignature", () => {
  it("should verify ed25519 signatures", async () => {
    const signer = createSigner();
    const [key] = (await keyMap([signer])).values();
    const sig = sign(null, message, signer.privateKey);
    expect(await verifySignature(key, message, sig)).toBe(true);
    expect(await verifySignature(key, stringToUint8Array("other"), sig)).toBe(false);
  });

  it("should verify DER encoded ECDSA P-256 signatures with a PEM key", async () => {
    const { publicKey, privateKey } = generateKeyPairSync("ec", {
      namedCurve: "P-256",
    });
    const pem = publicKey.export({ type: "spki", format: "pem" }).toString();
    const key = await importKey("ecdsa", "ecdsa-sha2-nistp256", pem);
    const sig = sign("sha256", message, privateKey);

    expect(await verifySignature(key, message, sig)).toBe(true);
  });
});

describe("derToP1363", () => {
  it("should strip sign padding and left pad each integer", () => {
    // SEQUENCE { INTEGER 0x00ff, INTEGER 0x01 }
    const der = new Uint8Array([0x30, 0x07, 0x02, 0x02, 0x00, 0xff, 0x02, 0x01, 0x01]);
    expect([...derToP1363(der, 1)]).toEqual([0xff, 0x01]);
    expect([...derToP1363(der, 2)]).toEqual([0x00, 0xff, 0x00, 0x01]);
  });

  it("should reject input that is not a DER sequence", () => {
    expect(() => derToP1363(new Uint8Array([0x02, 0x01, 0x01]), 32)).toThrow(
      CryptoError,
    );
  });
});

describe("checkSignatures", () => {
  it("should accept when the threshold of role keys signed", async () => {
    const [a, b] = [createSigner(), createSigner()];
    const keys = await keyMap([a, b]);
    const signatures = [
      { keyid: a.keyid, sig: signHex(a, message) },
      { keyid: b.keyid, sig: signHex(b, message) },
    ];

    expect(
      await checkSignatures(keys, [a.keyid, b.keyid], message, signatures, 2),
    ).toBe(true);
  });

  it("should count a repeated keyid once", async () => {
    const [a, b] = [createSigner(), createSigner()];
    const keys = await keyMap([a, b]);
    const sig = signHex(a, message);
    const signatures = [
      { keyid: a.keyid, sig },
      { keyid: a.keyid, sig },
    ];

    expect(
      await checkSignatures(keys, [a.keyid, b.keyid], message, signatures, 2),
    ).toBe(false);
  });

  it("should ignore signatures from keys outside the role", async () => {
    const [a, outsider] = [createSigner(), createSigner()];
    const keys = await keyMap([a, outsider]);
    const signatures = [{ keyid: outsider.keyid, sig: signHex(outsider, message) }];

    expect(await checkSignatures(keys, [a.keyid], message, signatures, 1)).toBe(
      false,
    );
  });

  it("should not count an invalid signature", async () => {
    const a = createSigner();
    const keys = await keyMap([a]);
    const signatures = [
      { keyid: a.keyid, sig: signHex(a, stringToUint8Array("tampered")) },
    ];

    expect(await checkSignatures(keys, [a.keyid], message, signatures, 1)).toBe(
      false,
    );
  });

  it("should raise CryptoError for a signature that is not hex", async () => {
    const a = createSigner();
    const keys = await keyMap([a]);

    await expect(
      checkSignatures(keys, [a.keyid], message, [{ keyid: a.keyid, sig: "zz" }], 1),
    ).rejects.toThrow(CryptoError);
  });

  it("should refuse a threshold larger than the role", async () => {
    const a = createSigner();
    const keys = await keyMap([a]);

    await expect(
      checkSignatures(keys, [a.keyid], message, [], 2),
    ).rejects.toThrow(SignatureThresholdError);
  });
});
