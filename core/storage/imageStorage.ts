import path from "path";
import {
  PermissionDeniedError,
  StorageFailureError,
  ValidationError,
  errorMessage,
  isPlotvaultError,
} from "../errors.js";
import { type AppLogger, type LogLevel, logWith } from "../logging/createLogger.js";
import { sanitizeFormat } from "../security/sanitizer.js";
import type { Clock } from "../utils/clock.js";
import { isValidGuid, newGuid } from "../utils/guid.js";
import { Mutex } from "../utils/mutex.js";
import { type BlobRepository, FileBlobRepository } from "./blobRepository.js";
import { JsonMetadataRepository, type MetadataRepository } from "./metadataRepository.js";
import type { ImageGuid, ImageMetadata, StoredImage } from "./types.js";

export const DEFAULT_MAX_IMAGE_BYTES = 10 * 1024 * 1024;

export interface ImageStorageOptions {
  logger?: AppLogger;
  maxImageBytes?: number;
  clock?: Clock;
}

/**
 * GUID-addressed image store with group-based access control.
 *
 * Blob bytes and metadata live in separate repositories. Saves write the blob
 * first and the metadata second, without a transaction; a failure in between
 * leaves an orphaned blob, which purge deliberately leaves alone.
 *
 * Metadata mutations (save, delete, purge) run one at a time under a single
 * lock held for the whole logical operation. Blob writes for different GUIDs
 * run in parallel.
 */
export class ImageStorage {
  private readonly metadataLock = new Mutex();
  private readonly maxImageBytes: number;
  private readonly clock: Clock;

  constructor(
    private blobs: BlobRepository,
    private metadata: MetadataRepository,
    private options: ImageStorageOptions = {}
  ) {
    this.maxImageBytes = options.maxImageBytes ?? DEFAULT_MAX_IMAGE_BYTES;
    this.clock = options.clock ?? Date.now;
  }

  private log(level: LogLevel, msg: string, fields?: Record<string, unknown>) {
    logWith(this.options.logger, level, msg, fields);
  }

  // ===== PRIVATE VALIDATION =====

  private requireGuid(guid: string): ImageGuid {
    if (!isValidGuid(guid)) {
      this.log("warn", "Invalid GUID format", { event: "INVALID_GUID", guid });
      throw new ValidationError(`Invalid GUID format: ${guid}`);
    }
    return guid;
  }

  private validateSave(data: Buffer, group?: string) {
    if (!Buffer.isBuffer(data)) {
      throw new ValidationError("Image data must be a Buffer");
    }
    if (data.length > this.maxImageBytes) {
      throw new ValidationError(`Image exceeds maximum size of ${this.maxImageBytes} bytes`);
    }
    if (group !== undefined && group.trim() === "") {
      throw new ValidationError("group must be a non-empty string if provided");
    }
  }

  private assertGroup(metadata: ImageMetadata, group: string | undefined, action: string) {
    if (group === undefined || metadata.group === group) return;

    this.log("warn", "Image access denied", {
      event: "ACCESS_DENIED",
      guid: metadata.guid,
      action,
      requesterGroup: group,
      ownerGroup: metadata.group,
    });
    throw new PermissionDeniedError(`Access denied to image ${metadata.guid}`, metadata.guid, action);
  }

  private wrapFailure(err: unknown, operation: string): never {
    if (isPlotvaultError(err)) throw err;
    throw new StorageFailureError(`Failed to ${operation}: ${errorMessage(err)}`, { cause: err });
  }

  // ===== PUBLIC METHODS =====

  async saveImage(data: Buffer, format: string, group?: string): Promise<ImageGuid> {
    this.validateSave(data, group);
    const fmt = sanitizeFormat(format);

    const guid = newGuid();

    try {
      await this.blobs.save(guid, data, fmt);
    } catch (err) {
      this.log("error", "Image save failed", { event: "SAVE_FAIL", guid, stage: "blob", error: errorMessage(err) });
      this.wrapFailure(err, "save image");
    }

    const record: ImageMetadata = {
      guid,
      format: fmt,
      size: data.length,
      createdAt: new Date(this.clock()).toISOString(),
      group,
      extra: {},
    };

    try {
      await this.metadataLock.runExclusive(() => this.metadata.save(record));
    } catch (err) {
      // blob stays behind as an orphan; no rollback
      this.log("error", "Image metadata save failed", {
        event: "SAVE_FAIL",
        guid,
        stage: "metadata",
        orphanedBlob: true,
        error: errorMessage(err),
      });
      this.wrapFailure(err, "save image metadata");
    }

    this.log("info", "Image saved", {
      event: "SAVE_SUCCESS",
      guid,
      format: fmt,
      size: data.length,
      group,
    });

    return guid;
  }

  /**
   * Returns null when nothing is stored under `guid`. Throws
   * PermissionDeniedError when `group` is given and differs from the stored
   * group; omitting `group` is ungated internal access.
   */
  async getImage(guid: string, group?: string): Promise<StoredImage | null> {
    const id = this.requireGuid(guid);

    try {
      const metadata = await this.metadata.get(id);
      if (!metadata) {
        this.log("info", "Image not found", { event: "GET_NOT_FOUND", guid: id });
        return null;
      }

      this.assertGroup(metadata, group, "read");

      const data = await this.blobs.get(id, metadata.format);
      if (!data) {
        this.log("warn", "Image blob missing", {
          event: "GET_NOT_FOUND",
          guid: id,
          reason: "storage-missing",
        });
        return null;
      }

      this.log("debug", "Image retrieved", { event: "GET_SUCCESS", guid: id, format: metadata.format, size: data.length });
      return { data, format: metadata.format };
    } catch (err) {
      this.wrapFailure(err, "read image");
    }
  }

  async getMetadata(guid: string, group?: string): Promise<ImageMetadata | null> {
    const id = this.requireGuid(guid);
    const metadata = await this.metadata.get(id);
    if (!metadata) return null;

    this.assertGroup(metadata, group, "read");
    return metadata;
  }

  async deleteImage(guid: string, group?: string): Promise<boolean> {
    const id = this.requireGuid(guid);

    try {
      return await this.metadataLock.runExclusive(async () => {
        const metadata = await this.metadata.get(id);

        if (!metadata) {
          // without metadata there is no group to check against
          if (group !== undefined) return false;
          return this.blobs.delete(id);
        }

        this.assertGroup(metadata, group, "delete");

        const blobDeleted = await this.blobs.delete(id);
        const metadataDeleted = await this.metadata.delete(id);

        this.log("info", "Image deleted", { event: "DELETE_SUCCESS", guid: id, group: metadata.group });
        return blobDeleted || metadataDeleted;
      });
    } catch (err) {
      this.log("error", "Image delete failed", { event: "DELETE_FAIL", guid: id, error: errorMessage(err) });
      this.wrapFailure(err, "delete image");
    }
  }

  /**
   * GUIDs that have both metadata and a blob, optionally limited to a group.
   */
  async listImages(group?: string): Promise<ImageGuid[]> {
    const listed: ImageGuid[] = [];

    for (const guid of await this.metadata.listAll(group)) {
      if (!isValidGuid(guid)) continue;
      const metadata = await this.metadata.get(guid);
      if (metadata && (await this.blobs.exists(guid, metadata.format))) {
        listed.push(guid);
      }
    }

    return listed.sort();
  }

  async exists(guid: string, group?: string): Promise<boolean> {
    if (!isValidGuid(guid)) return false;

    const metadata = await this.metadata.get(guid);
    if (!metadata) return false;
    if (group !== undefined && metadata.group !== group) return false;

    return this.blobs.exists(guid, metadata.format);
  }

  /**
   * Deletes records older than `ageDays` (0 = all), plus every record in the
   * group filter whose blob is gone. Records under a key that is not a GUID
   * can have no blob and count as gone. Blobs without metadata are not
   * touched. Returns the number of records removed.
   */
  async purge(ageDays: number, group?: string): Promise<number> {
    if (!Number.isInteger(ageDays) || ageDays < 0) {
      throw new ValidationError(`age_days must be a non-negative integer, got ${ageDays}`);
    }

    try {
      return await this.metadataLock.runExclusive(async () => {
        const targets = new Map<ImageGuid, ImageMetadata>();

        for (const metadata of await this.metadata.filterByAge(ageDays, group)) {
          targets.set(metadata.guid, metadata);
        }

        let orphaned = 0;
        for (const guid of await this.metadata.listAll(group)) {
          if (targets.has(guid)) continue;

          const metadata = await this.metadata.get(guid);
          if (!metadata) continue;
          if (!isValidGuid(guid) || !(await this.blobs.exists(guid, metadata.format))) {
            targets.set(guid, metadata);
            orphaned++;
          }
        }

        let deleted = 0;
        for (const metadata of targets.values()) {
          if (isValidGuid(metadata.guid)) {
            await this.blobs.delete(metadata.guid, metadata.format);
          }
          await this.metadata.delete(metadata.guid);
          deleted++;
        }

        this.log("info", "Purge completed", {
          event: "PURGE",
          ageDays,
          group,
          deleted,
          orphaned,
        });
        return deleted;
      });
    } catch (err) {
      this.log("error", "Purge failed", { event: "PURGE_FAIL", ageDays, group, error: errorMessage(err) });
      this.wrapFailure(err, "purge images");
    }
  }
}

/**
 * File-backed storage: blobs in `storageDir`, index at
 * `<storageDir>/metadata.json`.
 */
export async function createFileImageStorage(
  storageDir: string,
  options: ImageStorageOptions = {}
): Promise<ImageStorage> {
  const blobs = await FileBlobRepository.create(storageDir, options.logger);
  const metadata = await JsonMetadataRepository.open(path.join(storageDir, "metadata.json"), {
    logger: options.logger,
    clock: options.clock,
  });
  return new ImageStorage(blobs, metadata, options);
}
