/**
 * File-backed artifact store.
 *
 * One file per slot under the output directory. Commits write a uniquely
 * named temporary file beside the target and rename it into place, so a
 * reader sees either the previous committed document or the new one.
 */

import { constants, promises as fs } from 'fs';
import path from 'path';
import { v4 as uuid } from 'uuid';
import { ArtifactEntry, ArtifactPayloads, ArtifactSlot } from '../domain/artifact';
import { ArtifactValidationError, StorageError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { ARTIFACT_DEFINITIONS } from './artifact-schemas';
import { ArtifactFileSystem, ArtifactStore } from './store';

/** ArtifactFileSystem over node's fs/promises. */
export const nodeFileSystem: ArtifactFileSystem = {
  readFile: (file) => fs.readFile(file, 'utf8'),
  writeFile: (file, data) => fs.writeFile(file, data, { encoding: 'utf8', flag: 'wx' }),
  rename: (from, to) => fs.rename(from, to),
  remove: (file) => fs.rm(file, { force: true }),
  mkdir: async (dir) => {
    await fs.mkdir(dir, { recursive: true });
  },
  checkWritable: (target) => fs.access(target, constants.W_OK),
  exists: async (target) => {
    try {
      await fs.access(target, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  },
};

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export interface FileArtifactStoreOptions {
  fs?: ArtifactFileSystem;
  logger?: Logger;
}

export class FileArtifactStore implements ArtifactStore {
  public readonly directory: string;
  private readonly fs: ArtifactFileSystem;
  private readonly logger: Logger;

  constructor(directory: string, options: FileArtifactStoreOptions = {}) {
    this.directory = path.resolve(directory);
    this.fs = options.fs ?? nodeFileSystem;
    this.logger = (options.logger ?? rootLogger).child({ store: this.directory });
  }

  locate(slot: ArtifactSlot): string {
    return path.join(this.directory, ARTIFACT_DEFINITIONS[slot].fileName);
  }

  exists(slot: ArtifactSlot): Promise<boolean> {
    return this.fs.exists(this.locate(slot));
  }

  async read<S extends ArtifactSlot>(slot: S): Promise<ArtifactPayloads[S]> {
    const definition = ARTIFACT_DEFINITIONS[slot];
    const file = this.locate(slot);
    let raw: string;
    try {
      raw = await this.fs.readFile(file);
    } catch (err) {
      if (isNotFound(err)) {
        throw new ArtifactValidationError('ARTIFACT.MISSING', slot, `Missing ${slot} artifact: ${file} does not exist`, { path: file });
      }
      throw new StorageError(`Failed to read ${file}: ${err instanceof Error ? err.message : String(err)}`, file, err);
    }
    return definition.parse(raw);
  }

  async readEntry(slot: ArtifactSlot): Promise<ArtifactEntry> {
    switch (slot) {
      case 'collected':
        return { slot, payload: await this.read(slot) };
      case 'explained':
        return { slot, payload: await this.read(slot) };
      case 'report-markdown':
        return { slot, payload: await this.read(slot) };
      case 'report-html':
        return { slot, payload: await this.read(slot) };
    }
  }

  async write<S extends ArtifactSlot>(slot: S, payload: ArtifactPayloads[S], schemaVersion?: number): Promise<string> {
    const contents = this.serialize(slot, payload, schemaVersion);
    return this.commitFile(slot, contents);
  }

  async commit(entries: readonly ArtifactEntry[]): Promise<Partial<Record<ArtifactSlot, string>>> {
    // validate everything before the first byte is written
    const serialized = entries.map((entry) => ({
      slot: entry.slot,
      contents: this.serialize(entry.slot, entry.payload),
    }));
    const locations: Partial<Record<ArtifactSlot, string>> = {};
    for (const { slot, contents } of serialized) {
      locations[slot] = await this.commitFile(slot, contents);
    }
    return locations;
  }

  async ensureWritable(): Promise<void> {
    try {
      await this.fs.mkdir(this.directory);
      await this.fs.checkWritable(this.directory);
    } catch (err) {
      throw new StorageError(
        `Output directory ${this.directory} is not writable: ${err instanceof Error ? err.message : String(err)}`,
        this.directory,
        err,
      );
    }
  }

  private serialize(slot: ArtifactSlot, payload: unknown, schemaVersion?: number): string {
    const definition = ARTIFACT_DEFINITIONS[slot];
    if (schemaVersion !== undefined && schemaVersion !== definition.schemaVersion) {
      throw new ArtifactValidationError(
        'ARTIFACT.SCHEMA_VERSION',
        slot,
        `Cannot write ${slot} with schema version ${schemaVersion}; store expects ${definition.schemaVersion}`,
        { found: schemaVersion, expected: definition.schemaVersion },
      );
    }
    return definition.serialize(payload);
  }

  private async commitFile(slot: ArtifactSlot, contents: string): Promise<string> {
    const target = this.locate(slot);
    const temp = path.join(this.directory, `.${path.basename(target)}.${uuid()}.tmp`);
    try {
      await this.fs.mkdir(this.directory);
      await this.fs.writeFile(temp, contents);
      await this.fs.rename(temp, target);
    } catch (err) {
      await this.discard(temp);
      throw new StorageError(
        `Failed to commit ${slot} artifact to ${target}: ${err instanceof Error ? err.message : String(err)}`,
        target,
        err,
      );
    }
    this.logger.debug('Artifact committed', { slot, path: target, bytes: Buffer.byteLength(contents) });
    return target;
  }

  private async discard(temp: string): Promise<void> {
    try {
      await this.fs.remove(temp);
    } catch (err) {
      this.logger.warn('Could not remove temporary artifact file', {
        path: temp,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
