// Persisted metadata is stored as the exact bytes it was verified from
export interface FileBackend {
  readRaw(key: string): Promise<Uint8Array | undefined>;
  writeRaw(key: string, value: Uint8Array): Promise<void>;
  delete(key: string): Promise<void>;
}
