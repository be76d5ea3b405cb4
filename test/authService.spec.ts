import crypto from "crypto";
import { promises as fs } from "fs";
import jwt from "jsonwebtoken";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AuthService } from "../core/auth/authService.js";
import { deviceFingerprint } from "../core/auth/fingerprint.js";
import { JsonFileTokenStore, MemoryTokenStore } from "../core/auth/tokenStore.js";
import { AuthenticationError, ConfigError, ValidationError } from "../core/errors.js";
import { SecurityAuditor } from "../core/security/securityAuditor.js";
import { GUID_A, makeTempDir, manualClock, removeDir } from "./helpers.js";

const SECRET = "test-secret";

async function reasonOf(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof AuthenticationError) return err.reason;
    throw err;
  }
  throw new Error("expected an authentication failure");
}

describe("AuthService", () => {
  let dir: string;
  let storeFile: string;
  let time: ReturnType<typeof manualClock>;

  function service(secret = SECRET, extra: { auditor?: SecurityAuditor } = {}) {
    return new AuthService({
      secret,
      store: new JsonFileTokenStore(storeFile),
      clock: time.clock,
      ...extra,
    });
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    storeFile = path.join(dir, "tokens.json");
    time = manualClock();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe("verifyToken", () => {
    it("accepts a token issued by another instance sharing the store", async () => {
      const issuer = service();
      const verifier = service();

      const token = await issuer.createToken("team1", 3600);
      const info = await verifier.verifyToken(token);

      const issuedAt = Math.floor(time.clock() / 1000);
      expect(info.group).toBe("team1");
      expect(info.issuedAt).toBe(issuedAt);
      expect(info.expiresAt).toBe(issuedAt + 3600);
    });

    it("rejects an expired token", async () => {
      const auth = service();
      const token = await auth.createToken("team1", 60);

      time.advance(61_000);

      expect(await reasonOf(auth.verifyToken(token))).toBe("expired");
    });

    it("rejects a token signed with another secret", async () => {
      const auth = service();
      const forged = jwt.sign({ group: "team1", iat: 1000 }, "other-secret", {
        algorithm: "HS256",
        expiresIn: 3600,
        jwtid: GUID_A,
      });

      expect(await reasonOf(auth.verifyToken(forged))).toBe("invalid_signature");
    });

    it("rejects malformed and empty tokens", async () => {
      const auth = service();

      expect(await reasonOf(auth.verifyToken("not.a.token"))).toBe("malformed");
      expect(await reasonOf(auth.verifyToken(""))).toBe("malformed");
    });

    it("rejects a validly signed token the store has never seen", async () => {
      const auth = service();
      const stray = jwt.sign({ group: "team1", iat: Math.floor(time.clock() / 1000) }, SECRET, {
        algorithm: "HS256",
        expiresIn: 3600,
        jwtid: GUID_A,
      });

      expect(await reasonOf(auth.verifyToken(stray))).toBe("unknown_token");
    });

    it("treats a corrupt store as empty", async () => {
      const auth = service();
      const token = await auth.createToken("team1", 3600);
      await fs.writeFile(storeFile, "{oops");

      expect(await reasonOf(auth.verifyToken(token))).toBe("unknown_token");
    });

    it("enforces a bound fingerprint only when one is presented", async () => {
      const auth = service();
      const bound = deviceFingerprint("curl/8", "10.0.0.1");
      const token = await auth.createToken("team1", 3600, { fingerprint: bound });

      await expect(auth.verifyToken(token, bound)).resolves.toMatchObject({ group: "team1" });
      await expect(auth.verifyToken(token)).resolves.toMatchObject({ group: "team1" });
      expect(await reasonOf(auth.verifyToken(token, deviceFingerprint("curl/8", "10.0.0.2")))).toBe(
        "fingerprint_mismatch"
      );
    });

    it("ignores a presented fingerprint when the token is unbound", async () => {
      const auth = service();
      const token = await auth.createToken("team1", 3600);

      await expect(auth.verifyToken(token, "anything")).resolves.toMatchObject({ group: "team1" });
    });
  });

  describe("revokeToken", () => {
    it("revokes across instances and keeps a tombstone", async () => {
      const issuer = service();
      const admin = service();
      const token = await issuer.createToken("team1", 3600);

      expect(await admin.revokeToken(token)).toBe(true);

      expect(await reasonOf(issuer.verifyToken(token))).toBe("revoked");
      const [summary] = await issuer.listTokens();
      expect(summary).toMatchObject({ group: "team1", revoked: true, fingerprintBound: false });
    });

    it("revokes by token id", async () => {
      const auth = service();
      const token = await auth.createToken("team1", 3600);
      const { tokenId } = await auth.verifyToken(token);

      expect(await auth.revokeToken(tokenId)).toBe(true);
      expect(await reasonOf(auth.verifyToken(token))).toBe("revoked");
    });

    it("revokes an expired token", async () => {
      const auth = service();
      const token = await auth.createToken("team1", 60);
      time.advance(120_000);

      expect(await auth.revokeToken(token)).toBe(true);
    });

    it("returns false for an unknown id", async () => {
      expect(await service().revokeToken(GUID_A)).toBe(false);
    });

    it("refuses to revoke with a forged token", async () => {
      const auth = service();
      const forged = jwt.sign({ group: "team1", iat: 1000 }, "other-secret", {
        algorithm: "HS256",
        expiresIn: 3600,
        jwtid: GUID_A,
      });

      await expect(auth.revokeToken(forged)).rejects.toBeInstanceOf(AuthenticationError);
    });

    it("keeps unknown record fields", async () => {
      const auth = service();
      const token = await auth.createToken("team1", 3600);
      const { tokenId } = await auth.verifyToken(token);

      const raw = JSON.parse(await fs.readFile(storeFile, "utf8"));
      raw[tokenId].note = "ci runner";
      await fs.writeFile(storeFile, JSON.stringify(raw));

      await auth.revokeToken(tokenId);

      const after = JSON.parse(await fs.readFile(storeFile, "utf8"));
      expect(after[tokenId]).toMatchObject({ note: "ci runner", revoked: true, group: "team1" });
    });

    it("reports the revocation to the auditor", async () => {
      const auditor = new SecurityAuditor({ console: false });
      const spy = vi.spyOn(auditor, "logTokenRevoked").mockImplementation(() => undefined);
      const auth = service(SECRET, { auditor });
      const token = await auth.createToken("team1", 3600);
      const { tokenId } = await auth.verifyToken(token);

      await auth.revokeToken(token, "key rotation");

      expect(spy).toHaveBeenCalledWith("team1", "key rotation", tokenId);
    });
  });

  describe("housekeeping", () => {
    it("lists tokens in issue order", async () => {
      const auth = service();
      await auth.createToken("early", 3600);
      time.advance(5_000);
      await auth.createToken("late", 3600, { fingerprint: "abc" });

      const tokens = await auth.listTokens();

      expect(tokens.map((t) => [t.group, t.revoked, t.fingerprintBound])).toEqual([
        ["early", false, false],
        ["late", false, true],
      ]);
    });

    it("exposes a short fingerprint of the secret", () => {
      const digest = crypto.createHash("sha256").update(SECRET).digest("hex");

      expect(service().getSecretFingerprint()).toBe(`sha256:${digest.slice(0, 12)}`);
    });

    it("requires a secret", () => {
      expect(() => service("")).toThrow(ConfigError);
    });

    it("validates token parameters", async () => {
      const auth = service();

      await expect(auth.createToken(" ", 60)).rejects.toBeInstanceOf(ValidationError);
      await expect(auth.createToken("team1", 0)).rejects.toBeInstanceOf(ValidationError);
      await expect(auth.createToken("team1", 1.5)).rejects.toBeInstanceOf(ValidationError);
    });

    it("works against the in-memory store", async () => {
      const auth = new AuthService({ secret: SECRET, store: new MemoryTokenStore(), clock: time.clock });
      const token = await auth.createToken("team1", 3600);

      await expect(auth.verifyToken(token)).resolves.toMatchObject({ group: "team1" });
      await auth.revokeToken(token);
      expect(await reasonOf(auth.verifyToken(token))).toBe("revoked");
    });
  });
});
