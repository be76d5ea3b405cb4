import { promises as fs } from "fs";
import path from "path";
import { StorageFailureError, errorMessage } from "../errors.js";
import { type AppLogger, logWith } from "../logging/createLogger.js";
import { isNotFound } from "../utils/fsErrors.js";
import { Mutex } from "../utils/mutex.js";

/**
 * Persisted token state, keyed by token id (the JWT `jti`). Fields the
 * service does not know about are carried through untouched.
 */
export interface TokenRecord {
  group: string;
  issued_at: number; // unix seconds
  expires_at: number; // unix seconds
  revoked: boolean;
  fingerprint?: string;
  [field: string]: unknown;
}

export type TokenRecords = Map<string, TokenRecord>;

export interface TokenStore {
  // fresh snapshot of the persisted state on every call
  load(): Promise<TokenRecords>;
  // load, mutate, persist; one writer at a time
  update<T>(mutator: (records: TokenRecords) => T | Promise<T>): Promise<T>;
}

function isFieldMap(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toTokenRecord(value: unknown): TokenRecord | null {
  if (!isFieldMap(value)) return null;

  const { group, issued_at, expires_at, revoked, fingerprint } = value;
  if (typeof group !== "string" || typeof issued_at !== "number" || typeof expires_at !== "number") {
    return null;
  }

  const record: TokenRecord = {
    ...value,
    group,
    issued_at,
    expires_at,
    revoked: revoked === true,
  };
  if (typeof fingerprint === "string") record.fingerprint = fingerprint;
  else delete record.fingerprint;

  return record;
}

/* ----------------------------------
 * JSON file store
 * ---------------------------------- */

/**
 * Re-reads the file on every `load`, so tokens issued or revoked by another
 * process sharing the file are visible immediately. Writes go through a
 * temporary file and a rename so readers never see a half-written store.
 */
export class JsonFileTokenStore implements TokenStore {
  private readonly writeLock = new Mutex();
  readonly file: string;

  constructor(
    file: string,
    private logger?: AppLogger
  ) {
    this.file = path.resolve(file);
  }

  async load(): Promise<TokenRecords> {
    const records: TokenRecords = new Map();

    let raw: string;
    try {
      raw = await fs.readFile(this.file, "utf8");
    } catch (err) {
      if (isNotFound(err)) return records;
      logWith(this.logger, "error", "Failed to read token store", {
        event: "TOKEN_STORE_READ_FAIL",
        file: this.file,
        error: errorMessage(err),
      });
      throw new StorageFailureError(`Failed to read token store: ${errorMessage(err)}`, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      logWith(this.logger, "warn", "Token store is not valid JSON, treating as empty", {
        event: "TOKEN_STORE_CORRUPT",
        file: this.file,
        error: errorMessage(err),
      });
      return records;
    }

    if (!isFieldMap(parsed)) {
      logWith(this.logger, "warn", "Token store has unexpected structure, treating as empty", {
        event: "TOKEN_STORE_CORRUPT",
        file: this.file,
      });
      return records;
    }

    for (const [tokenId, value] of Object.entries(parsed)) {
      const record = toTokenRecord(value);
      if (record) records.set(tokenId, record);
    }
    return records;
  }

  private async persist(records: TokenRecords): Promise<void> {
    const tmp = `${this.file}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.file), { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(Object.fromEntries(records), null, 2));
      await fs.rename(tmp, this.file);
    } catch (err) {
      logWith(this.logger, "error", "Failed to save token store", {
        event: "TOKEN_STORE_SAVE_FAIL",
        file: this.file,
        error: errorMessage(err),
      });
      throw new StorageFailureError(`Failed to save token store: ${errorMessage(err)}`, { cause: err });
    }
  }

  update<T>(mutator: (records: TokenRecords) => T | Promise<T>): Promise<T> {
    return this.writeLock.runExclusive(async () => {
      const records = await this.load();
      const result = await mutator(records);
      await this.persist(records);
      return result;
    });
  }
}

/* ----------------------------------
 * In-memory store (tests, single process)
 * ---------------------------------- */

export class MemoryTokenStore implements TokenStore {
  private readonly writeLock = new Mutex();
  private records: TokenRecords = new Map();

  async load(): Promise<TokenRecords> {
    return structuredClone(this.records);
  }

  update<T>(mutator: (records: TokenRecords) => T | Promise<T>): Promise<T> {
    return this.writeLock.runExclusive(async () => {
      const records = await this.load();
      const result = await mutator(records);
      this.records = records;
      return result;
    });
  }
}
