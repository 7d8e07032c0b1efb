import { ensureTrailingSlash, fetchBytes } from "./http.js";
import type { HttpOptions } from "./http.js";
import type { Roles } from "./types.js";

/**
 * Where signed metadata comes from. Implementations fail with a
 * RetrievalError (404 for a document that does not exist, or a body longer
 * than `maxLength` bytes).
 */
export interface MetadataSource {
  // The non-versioned document, e.g. timestamp.json
  latest(role: Roles, maxLength?: number): Promise<Uint8Array>;
  // A version-prefixed document, e.g. 3.root.json
  version(role: Roles, version: number, maxLength?: number): Promise<Uint8Array>;
}

export class HttpMetadataSource implements MetadataSource {
  private readonly baseUrl: string;
  private readonly options: HttpOptions;

  constructor(baseUrl: string, options: HttpOptions) {
    this.baseUrl = ensureTrailingSlash(baseUrl);
    this.options = options;
  }

  urlFor(role: Roles, version?: number): string {
    const name = encodeURIComponent(role);
    return version === undefined
      ? `${this.baseUrl}${name}.json`
      : `${this.baseUrl}${version}.${name}.json`;
  }

  async latest(role: Roles, maxLength?: number): Promise<Uint8Array> {
    return await fetchBytes(this.urlFor(role), this.options, { maxLength });
  }

  async version(
    role: Roles,
    version: number,
    maxLength?: number,
  ): Promise<Uint8Array> {
    return await fetchBytes(this.urlFor(role, version), this.options, {
      maxLength,
    });
  }
}
