/**
 * Storage layer interfaces.
 *
 * The Artifact Store is the only shared mutable resource of a run. Every
 * read and write goes through schema validation; writes are atomic.
 */

import { ArtifactEntry, ArtifactPayloads, ArtifactSlot } from '../domain/artifact';

/** Store interface for artifacts. */
export interface ArtifactStore {
  /** Directory holding the artifact files. */
  readonly directory: string;
  /** Absolute path of the file backing a slot. */
  locate(slot: ArtifactSlot): string;
  exists(slot: ArtifactSlot): Promise<boolean>;
  /** Read and validate a slot. Missing or invalid slots raise ArtifactValidationError. */
  read<S extends ArtifactSlot>(slot: S): Promise<ArtifactPayloads[S]>;
  /** Read a slot as a tagged entry, the form stages receive as input. */
  readEntry(slot: ArtifactSlot): Promise<ArtifactEntry>;
  /**
   * Validate and atomically commit a payload. When `schemaVersion` is given
   * it must match the version registered for the slot.
   */
  write<S extends ArtifactSlot>(slot: S, payload: ArtifactPayloads[S], schemaVersion?: number): Promise<string>;
  /**
   * Validate every entry, then commit them in order. Nothing is written
   * unless all entries validate.
   */
  commit(entries: readonly ArtifactEntry[]): Promise<Partial<Record<ArtifactSlot, string>>>;
  /** Create the directory if needed and check it is writable. */
  ensureWritable(): Promise<void>;
}

/** Filesystem operations the file store needs; injectable for tests. */
export interface ArtifactFileSystem {
  readFile(path: string): Promise<string>;
  writeFile(path: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
  mkdir(path: string): Promise<void>;
  /** Resolves when `path` exists and is writable. */
  checkWritable(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
}
