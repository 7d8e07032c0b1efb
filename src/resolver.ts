import type { Envelope } from "./metadata.js";
import type { TargetFile, TargetsSigned } from "./types.js";

// Exact-path lookups in the trusted targets role
export class TargetResolver {
  private readonly targets?: Envelope<TargetsSigned>;

  constructor(targets?: Envelope<TargetsSigned>) {
    this.targets = targets;
  }

  resolve(targetPath: string): TargetFile | undefined {
    const entries = this.targets?.signed.targets;
    if (entries === undefined || !Object.hasOwn(entries, targetPath)) {
      return undefined;
    }
    const entry = entries[targetPath];
    return { ...entry, hashes: { ...entry.hashes }, path: targetPath };
  }

  list(): string[] {
    return Object.keys(this.targets?.signed.targets ?? {});
  }
}
