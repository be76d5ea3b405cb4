import { randomUUID } from "crypto";

const GUID_REGEX =
  /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;

export function newGuid(): string {
  return randomUUID();
}

// canonical 8-4-4-4-12 hex form; version nibble is not checked
export function isValidGuid(value: unknown): value is string {
  return typeof value === "string" && GUID_REGEX.test(value);
}
