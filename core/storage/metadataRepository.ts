import { promises as fs } from "fs";
import path from "path";
import { StorageFailureError, errorMessage } from "../errors.js";
import { type AppLogger, logWith } from "../logging/createLogger.js";
import type { Clock } from "../utils/clock.js";
import { isNotFound } from "../utils/fsErrors.js";
import {
  type ImageGuid,
  type ImageMetadata,
  type MetadataFields,
  fromMetadataFields,
  toMetadataFields,
} from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface MetadataRepository {
  save(metadata: ImageMetadata): Promise<void>;
  get(guid: ImageGuid): Promise<ImageMetadata | null>;
  delete(guid: ImageGuid): Promise<boolean>;
  listAll(group?: string): Promise<ImageGuid[]>;
  exists(guid: ImageGuid): Promise<boolean>;
  /**
   * Records created more than `ageDays` days ago. `ageDays === 0` matches
   * every record. Records with a missing or unparseable `created_at` always
   * match, so corrupt entries can still be purged.
   */
  filterByAge(ageDays: number, group?: string): Promise<ImageMetadata[]>;
}

function isFieldMap(value: unknown): value is MetadataFields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Whole index in one JSON object, loaded once and rewritten in full after
 * every mutation. Callers serialize mutations; this class holds no lock.
 */
export class JsonMetadataRepository implements MetadataRepository {
  private constructor(
    readonly metadataFile: string,
    private records: Map<ImageGuid, MetadataFields>,
    private logger?: AppLogger,
    private clock: Clock = Date.now
  ) { }

  static async open(
    metadataFile: string,
    options: { logger?: AppLogger; clock?: Clock } = {}
  ): Promise<JsonMetadataRepository> {
    const file = path.resolve(metadataFile);
    const records = await JsonMetadataRepository.load(file, options.logger);
    return new JsonMetadataRepository(file, records, options.logger, options.clock);
  }

  private static async load(
    file: string,
    logger?: AppLogger
  ): Promise<Map<ImageGuid, MetadataFields>> {
    const records = new Map<ImageGuid, MetadataFields>();

    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (err) {
      if (!isNotFound(err)) {
        logWith(logger, "error", "Failed to read metadata, starting empty", {
          event: "METADATA_LOAD_FAIL",
          file,
          error: errorMessage(err),
        });
      }
      return records;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      logWith(logger, "info", "Metadata file is not valid JSON, starting empty", {
        event: "METADATA_CORRUPT",
        file,
        error: errorMessage(err),
      });
      return records;
    }

    if (!isFieldMap(parsed)) {
      logWith(logger, "info", "Metadata has unexpected structure, starting empty", {
        event: "METADATA_CORRUPT",
        file,
      });
      return records;
    }

    for (const [guid, fields] of Object.entries(parsed)) {
      if (isFieldMap(fields)) records.set(guid, fields);
    }

    logWith(logger, "debug", "Metadata loaded", { event: "METADATA_LOAD", count: records.size });
    return records;
  }

  private async persist(): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.metadataFile), { recursive: true });
      await fs.writeFile(
        this.metadataFile,
        JSON.stringify(Object.fromEntries(this.records), null, 2)
      );
    } catch (err) {
      logWith(this.logger, "error", "Failed to save metadata", {
        event: "METADATA_SAVE_FAIL",
        file: this.metadataFile,
        error: errorMessage(err),
      });
      throw new StorageFailureError(`Failed to save metadata: ${errorMessage(err)}`, { cause: err });
    }
  }

  async save(metadata: ImageMetadata): Promise<void> {
    const previous = this.records.get(metadata.guid);
    this.records.set(metadata.guid, toMetadataFields(metadata));

    try {
      await this.persist();
    } catch (err) {
      // keep memory and disk in agreement
      if (previous) this.records.set(metadata.guid, previous);
      else this.records.delete(metadata.guid);
      throw err;
    }
  }

  async get(guid: ImageGuid): Promise<ImageMetadata | null> {
    const fields = this.records.get(guid);
    return fields ? fromMetadataFields(guid, fields) : null;
  }

  async delete(guid: ImageGuid): Promise<boolean> {
    const previous = this.records.get(guid);
    if (!previous) return false;

    this.records.delete(guid);
    try {
      await this.persist();
    } catch (err) {
      this.records.set(guid, previous);
      throw err;
    }
    return true;
  }

  async listAll(group?: string): Promise<ImageGuid[]> {
    const guids: ImageGuid[] = [];
    for (const [guid, fields] of this.records) {
      if (group === undefined || fields.group === group) guids.push(guid);
    }
    return guids;
  }

  async exists(guid: ImageGuid): Promise<boolean> {
    return this.records.has(guid);
  }

  async filterByAge(ageDays: number, group?: string): Promise<ImageMetadata[]> {
    const cutoff = this.clock() - ageDays * DAY_MS;
    const matches: ImageMetadata[] = [];

    for (const [guid, fields] of this.records) {
      if (group !== undefined && fields.group !== group) continue;

      if (ageDays === 0) {
        matches.push(fromMetadataFields(guid, fields));
        continue;
      }

      const createdAt =
        typeof fields.created_at === "string" ? Date.parse(fields.created_at) : NaN;

      if (Number.isNaN(createdAt) || createdAt < cutoff) {
        matches.push(fromMetadataFields(guid, fields));
      }
    }

    return matches;
  }
}
