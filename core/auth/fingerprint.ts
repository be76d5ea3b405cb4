import crypto from "crypto";

function sha256(value: string) {
  return crypto.createHash("sha256").update(value).digest("hex");
}

/**
 * Binding hash for a client: sha256 of `<user-agent>:<address>`, with
 * "unknown" standing in for either part when absent.
 */
export function deviceFingerprint(userAgent?: string, clientAddress?: string): string {
  return sha256(`${userAgent || "unknown"}:${clientAddress || "unknown"}`);
}

// Safe to log: lets two processes confirm they share a secret.
export function secretFingerprint(secret: string | undefined): string {
  if (!secret) return "none";
  return `sha256:${sha256(secret).slice(0, 12)}`;
}
