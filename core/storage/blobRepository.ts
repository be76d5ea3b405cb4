import { promises as fs, type Dirent } from "fs";
import path from "path";
import { StorageFailureError, ValidationError, errorMessage } from "../errors.js";
import { type AppLogger, logWith } from "../logging/createLogger.js";
import { isNotFound } from "../utils/fsErrors.js";
import { isValidGuid } from "../utils/guid.js";
import type { ImageGuid } from "./types.js";

export interface BlobRepository {
  save(guid: ImageGuid, data: Buffer, format: string): Promise<void>;
  get(guid: ImageGuid, format: string): Promise<Buffer | null>;
  // every supported format when `format` is omitted
  delete(guid: ImageGuid, format?: string): Promise<boolean>;
  exists(guid: ImageGuid, format?: string): Promise<boolean>;
  listAll(): Promise<ImageGuid[]>;
}

/**
 * One file per (guid, format): `<storageDir>/<guid>.<format>`.
 */
export class FileBlobRepository implements BlobRepository {
  static readonly SUPPORTED_FORMATS: readonly string[] = ["png", "jpg", "jpeg", "svg", "pdf"];

  private constructor(
    readonly storageDir: string,
    private logger?: AppLogger
  ) { }

  static async create(storageDir: string, logger?: AppLogger): Promise<FileBlobRepository> {
    const dir = path.resolve(storageDir);
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (err) {
      logWith(logger, "error", "Failed to create blob storage directory", {
        event: "BLOB_INIT_FAIL",
        directory: dir,
        error: errorMessage(err),
      });
      throw new StorageFailureError(`Failed to create storage directory: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    logWith(logger, "info", "Blob storage initialized", { event: "BLOB_INIT", directory: dir });
    return new FileBlobRepository(dir, logger);
  }

  private filePath(guid: ImageGuid, format: string): string {
    if (!isValidGuid(guid)) {
      throw new ValidationError(`Invalid GUID format: ${guid}`);
    }
    const ext = format.toLowerCase();
    if (!/^[a-z0-9]+$/.test(ext)) {
      throw new ValidationError(`Invalid image format: ${format}`);
    }
    return path.join(this.storageDir, `${guid}.${ext}`);
  }

  async save(guid: ImageGuid, data: Buffer, format: string): Promise<void> {
    const file = this.filePath(guid, format);

    try {
      await fs.writeFile(file, data);
    } catch (err) {
      logWith(this.logger, "error", "Failed to save blob", {
        event: "BLOB_SAVE_FAIL",
        guid,
        format,
        error: errorMessage(err),
      });
      throw new StorageFailureError(`Failed to save blob: ${errorMessage(err)}`, { cause: err });
    }

    logWith(this.logger, "debug", "Blob saved", { event: "BLOB_SAVE", guid, format, size: data.length });
  }

  async get(guid: ImageGuid, format: string): Promise<Buffer | null> {
    const file = this.filePath(guid, format);

    try {
      return await fs.readFile(file);
    } catch (err) {
      if (isNotFound(err)) return null;

      logWith(this.logger, "error", "Failed to read blob", {
        event: "BLOB_READ_FAIL",
        guid,
        format,
        error: errorMessage(err),
      });
      throw new StorageFailureError(`Failed to read blob: ${errorMessage(err)}`, { cause: err });
    }
  }

  async delete(guid: ImageGuid, format?: string): Promise<boolean> {
    const formats = format ? [format] : FileBlobRepository.SUPPORTED_FORMATS;
    let deleted = false;

    for (const fmt of formats) {
      const file = this.filePath(guid, fmt);
      try {
        await fs.unlink(file);
        deleted = true;
        logWith(this.logger, "debug", "Blob deleted", { event: "BLOB_DELETE", guid, format: fmt });
      } catch (err) {
        if (isNotFound(err)) continue;

        logWith(this.logger, "error", "Failed to delete blob", {
          event: "BLOB_DELETE_FAIL",
          guid,
          format: fmt,
          error: errorMessage(err),
        });
        throw new StorageFailureError(`Failed to delete blob: ${errorMessage(err)}`, { cause: err });
      }
    }

    return deleted;
  }

  private async fileExists(file: string): Promise<boolean> {
    try {
      const stat = await fs.stat(file);
      return stat.isFile();
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new StorageFailureError(`Failed to stat blob: ${errorMessage(err)}`, { cause: err });
    }
  }

  async exists(guid: ImageGuid, format?: string): Promise<boolean> {
    if (format) return this.fileExists(this.filePath(guid, format));
    return (await this.getFormat(guid)) !== null;
  }

  async getFormat(guid: ImageGuid): Promise<string | null> {
    for (const fmt of FileBlobRepository.SUPPORTED_FORMATS) {
      if (await this.fileExists(this.filePath(guid, fmt))) return fmt;
    }
    return null;
  }

  async listAll(): Promise<ImageGuid[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.storageDir, { withFileTypes: true });
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new StorageFailureError(`Failed to list blobs: ${errorMessage(err)}`, { cause: err });
    }

    const guids = new Set<ImageGuid>();
    for (const entry of entries) {
      if (!entry.isFile()) continue;

      const ext = path.extname(entry.name).slice(1);
      const stem = path.basename(entry.name, path.extname(entry.name));

      // foreign files (metadata.json, editor droppings) are skipped
      if (FileBlobRepository.SUPPORTED_FORMATS.includes(ext) && isValidGuid(stem)) {
        guids.add(stem);
      }
    }

    return [...guids].sort();
  }
}
