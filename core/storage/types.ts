export type ImageGuid = string;

/**
 * One stored artifact's metadata. `group` is the access-control label and
 * never changes after the record is written. `extra` carries attributes this
 * version does not know about, so they survive a round-trip.
 */
export interface ImageMetadata {
  readonly guid: ImageGuid;
  readonly format: string;
  readonly size: number;
  readonly createdAt?: string; // ISO-8601, UTC
  readonly group?: string;
  readonly extra: Readonly<Record<string, unknown>>;
}

export type StoredImage = {
  data: Buffer;
  format: string;
};

/* ----------------------------------
 * Persisted shape: { guid: { format, size, created_at, group?, ...extra } }
 * ---------------------------------- */

export type MetadataFields = Record<string, unknown>;

const KNOWN_FIELDS = new Set(["format", "size", "created_at", "group"]);

export function toMetadataFields(metadata: ImageMetadata): MetadataFields {
  return {
    ...metadata.extra,
    format: metadata.format,
    size: metadata.size,
    ...(metadata.createdAt !== undefined ? { created_at: metadata.createdAt } : {}),
    ...(metadata.group !== undefined ? { group: metadata.group } : {}),
  };
}

export function fromMetadataFields(guid: ImageGuid, fields: MetadataFields): ImageMetadata {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (!KNOWN_FIELDS.has(key)) extra[key] = value;
  }

  return {
    guid,
    format: typeof fields.format === "string" ? fields.format : "png",
    size: typeof fields.size === "number" ? fields.size : 0,
    createdAt: typeof fields.created_at === "string" ? fields.created_at : undefined,
    group: typeof fields.group === "string" ? fields.group : undefined,
    extra,
  };
}

const MIME_TYPES: Record<string, string> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  svg: "image/svg+xml",
  pdf: "application/pdf",
};

export function mimeTypeFor(format: string): string {
  return MIME_TYPES[format.toLowerCase()] ?? "application/octet-stream";
}
