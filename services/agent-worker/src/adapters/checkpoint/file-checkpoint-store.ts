// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/adapters/checkpoint/file-checkpoint-store`
 * Purpose: Durable CheckpointStore backed by one JSON file per source key.
 * Scope: Atomic writes, checksum verification, backup rotation and fallback. Does not interpret checkpoint contents.
 * Invariants:
 * - A save is complete only after the temp file is fsync'ed, renamed over the target and the directory is fsync'ed.
 * - Readers see either the previous or the new checkpoint, never a partial one.
 * - Operations on one key run one at a time; different keys proceed independently.
 * - A corrupt current file falls back to the newest valid backup; with none, load throws.
 * Side-effects: IO (filesystem under the configured directory)
 * Links: adapters/checkpoint/checkpoint-schema.ts
 * @public
 */

import { createHash } from "node:crypto";
import {
  copyFile,
  mkdir,
  open,
  readdir,
  readFile,
  rename,
  rm,
} from "node:fs/promises";
import { join } from "node:path";

import {
  CHECKPOINT_SCHEMA_VERSION,
  type CheckpointStore,
  type RunCheckpoint,
} from "@attestor/run-core";

import { EVENT_NAMES } from "../../observability/events.js";
import type { Logger } from "../../observability/logger.js";
import {
  type CheckpointEnvelope,
  CheckpointEnvelopeSchema,
  RunCheckpointSchema,
} from "./checkpoint-schema.js";

const EXTENSION = ".json";
const BACKUP_DIR = "backups";
export const DEFAULT_BACKUPS_KEPT = 5;

export class CheckpointCorruptError extends Error {
  public readonly code = "CHECKPOINT_CORRUPT" as const;
  constructor(
    public readonly sourceKey: string,
    public readonly detail: string
  ) {
    super(`Checkpoint for ${sourceKey} is corrupt: ${detail}`);
    this.name = "CheckpointCorruptError";
  }
}

export function isCheckpointCorruptError(
  error: unknown
): error is CheckpointCorruptError {
  return error instanceof Error && error.name === "CheckpointCorruptError";
}

/** Encodes a source key into a file name that cannot escape the directory. */
export function toFileStem(sourceKey: string): string {
  return encodeURIComponent(sourceKey).replace(
    /[!'()*.~]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase().padStart(2, "0")}`
  );
}

export function fromFileStem(stem: string): string {
  return decodeURIComponent(stem);
}

function checksumOf(serializedData: string): string {
  return createHash("sha256").update(serializedData).digest("hex");
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

export interface FileCheckpointStoreConfig {
  readonly directory: string;
  readonly backupsKept?: number;
  readonly logger: Logger;
}

export class FileCheckpointStore implements CheckpointStore {
  private readonly queues = new Map<string, Promise<unknown>>();
  private readonly backupsKept: number;
  private readonly log: Logger;
  private sequence = 0;

  constructor(private readonly config: FileCheckpointStoreConfig) {
    this.backupsKept = config.backupsKept ?? DEFAULT_BACKUPS_KEPT;
    this.log = config.logger.child({ component: "file-checkpoint-store" });
  }

  load(sourceKey: string): Promise<RunCheckpoint | null> {
    return this.serialize(sourceKey, () => this.loadNow(sourceKey));
  }

  save(sourceKey: string, checkpoint: RunCheckpoint): Promise<void> {
    return this.serialize(sourceKey, () => this.saveNow(sourceKey, checkpoint));
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.config.directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
    return entries
      .filter((name) => name.endsWith(EXTENSION))
      .map((name) => fromFileStem(name.slice(0, -EXTENSION.length)))
      .sort();
  }

  /** Resolves once every queued operation has settled. */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.queues.values()]);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private serialize<T>(sourceKey: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(sourceKey) ?? Promise.resolve();
    const next = previous.then(task, task);
    const settled = next.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(sourceKey, settled);
    void settled.then(() => {
      if (this.queues.get(sourceKey) === settled) this.queues.delete(sourceKey);
    });
    return next;
  }

  private pathFor(sourceKey: string): string {
    return join(this.config.directory, `${toFileStem(sourceKey)}${EXTENSION}`);
  }

  private backupDir(): string {
    return join(this.config.directory, BACKUP_DIR);
  }

  private async loadNow(sourceKey: string): Promise<RunCheckpoint | null> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(sourceKey), "utf8");
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    try {
      return this.decode(sourceKey, raw);
    } catch (error) {
      if (!isCheckpointCorruptError(error)) throw error;
      this.log.error(
        { event: EVENT_NAMES.CHECKPOINT_CORRUPT, sourceKey, detail: error.detail },
        EVENT_NAMES.CHECKPOINT_CORRUPT
      );
      return this.restoreFromBackup(sourceKey, error);
    }
  }

  private async restoreFromBackup(
    sourceKey: string,
    original: CheckpointCorruptError
  ): Promise<RunCheckpoint> {
    for (const name of await this.backupsFor(sourceKey)) {
      const file = join(this.backupDir(), name);
      try {
        const checkpoint = this.decode(
          sourceKey,
          await readFile(file, "utf8")
        );
        this.log.warn(
          { event: EVENT_NAMES.CHECKPOINT_BACKUP_RESTORED, sourceKey, backup: name },
          EVENT_NAMES.CHECKPOINT_BACKUP_RESTORED
        );
        return checkpoint;
      } catch (error) {
        if (!isCheckpointCorruptError(error)) throw error;
      }
    }
    throw original;
  }

  /** Parses and verifies one file's contents. */
  private decode(sourceKey: string, raw: string): RunCheckpoint {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new CheckpointCorruptError(sourceKey, "not valid JSON");
    }

    const envelope = CheckpointEnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new CheckpointCorruptError(sourceKey, "missing envelope fields");
    }
    const { schemaVersion, checksum, data } = envelope.data;
    if (schemaVersion > CHECKPOINT_SCHEMA_VERSION) {
      throw new Error(
        `Checkpoint for ${sourceKey} was written by schema version ${schemaVersion}; this build reads up to ${CHECKPOINT_SCHEMA_VERSION}`
      );
    }
    if (checksumOf(JSON.stringify(data)) !== checksum) {
      throw new CheckpointCorruptError(sourceKey, "checksum mismatch");
    }

    const parsed = RunCheckpointSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw new CheckpointCorruptError(
        sourceKey,
        issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid data"
      );
    }
    return parsed.data;
  }

  private async saveNow(
    sourceKey: string,
    checkpoint: RunCheckpoint
  ): Promise<void> {
    const { directory } = this.config;
    await mkdir(this.backupDir(), { recursive: true });

    const serializedData = JSON.stringify(checkpoint);
    const envelope: CheckpointEnvelope = {
      schemaVersion: CHECKPOINT_SCHEMA_VERSION,
      savedAt: new Date().toISOString(),
      checksum: checksumOf(serializedData),
      data: checkpoint,
    };

    const target = this.pathFor(sourceKey);
    const tmp = `${target}.${process.pid}.${this.sequence++}.tmp`;

    const handle = await open(tmp, "w");
    try {
      await handle.writeFile(JSON.stringify(envelope, null, 2), "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }

    try {
      await this.backupCurrent(sourceKey, target);
      await rename(tmp, target);
    } catch (error) {
      await rm(tmp, { force: true });
      throw error;
    }

    const dir = await open(directory, "r");
    try {
      await dir.sync();
    } finally {
      await dir.close();
    }

    await this.pruneBackups(sourceKey);
  }

  private async backupCurrent(sourceKey: string, target: string): Promise<void> {
    const stamp = `${String(Date.now()).padStart(15, "0")}-${String(this.sequence++).padStart(6, "0")}`;
    try {
      await copyFile(
        target,
        join(this.backupDir(), `${toFileStem(sourceKey)}.${stamp}${EXTENSION}`)
      );
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }

  /** Backup file names for a key, newest first. */
  private async backupsFor(sourceKey: string): Promise<string[]> {
    const prefix = `${toFileStem(sourceKey)}.`;
    let entries: string[];
    try {
      entries = await readdir(this.backupDir());
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
    return entries
      .filter((name) => name.startsWith(prefix) && name.endsWith(EXTENSION))
      .sort()
      .reverse();
  }

  private async pruneBackups(sourceKey: string): Promise<void> {
    const stale = (await this.backupsFor(sourceKey)).slice(this.backupsKept);
    await Promise.all(
      stale.map((name) => rm(join(this.backupDir(), name), { force: true }))
    );
  }
}
