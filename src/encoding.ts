export function toArrayBuffer(view: ArrayBufferView): ArrayBuffer {
  const { byteLength } = view;

  if (byteLength === 0) {
    return new ArrayBuffer(0);
  }

  const { buffer, byteOffset } = view;

  if (
    buffer instanceof ArrayBuffer &&
    byteOffset === 0 &&
    byteLength === buffer.byteLength
  ) {
    return buffer;
  }

  const clone = new Uint8Array(byteLength);
  clone.set(new Uint8Array(buffer, byteOffset, byteLength));
  return clone.buffer;
}

export function base64ToUint8Array(base64: string): Uint8Array {
  const binaryString = atob(base64);
  const length = binaryString.length;
  const bytes = new Uint8Array(length);

  for (let i = 0; i < length; i++) {
    bytes[i] = binaryString.charCodeAt(i);
  }

  return bytes;
}

export function hexToUint8Array(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new Error("Hex string must have an even length");
  }
  if (!/^[0-9A-Fa-f]*$/.test(hex)) {
    throw new Error("Hex string contains non-hex characters");
  }

  const length = hex.length / 2;
  const uint8Array = new Uint8Array(length);

  for (let i = 0; i < length; i++) {
    uint8Array[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }

  return uint8Array;
}

export function Uint8ArrayToHex(uint8Array: Uint8Array): string {
  let hexString = "";

  for (let i = 0; i < uint8Array.length; i++) {
    hexString += uint8Array[i].toString(16).padStart(2, "0");
  }

  return hexString;
}

export function stringToUint8Array(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

// Metadata and target paths may carry non-ascii characters, decode as utf-8
export function Uint8ArrayToString(uint8Array: Uint8Array): string {
  return new TextDecoder("utf-8").decode(uint8Array);
}
