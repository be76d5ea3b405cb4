import { beforeEach, describe, expect, it } from "vitest";
import { AuthService } from "../core/auth/authService.js";
import { MemoryTokenStore } from "../core/auth/tokenStore.js";
import { DEFAULT_TOKEN_TTL_SECONDS, USAGE, runTokenAdmin } from "../server/tokenAdmin.js";
import { GUID_A, manualClock } from "./helpers.js";

describe("runTokenAdmin", () => {
  let auth: AuthService;
  let output: string[];
  const print = (line: string) => {
    output.push(line);
  };

  beforeEach(() => {
    auth = new AuthService({ secret: "test-secret", store: new MemoryTokenStore(), clock: manualClock().clock });
    output = [];
  });

  it("creates a token that verifies", async () => {
    expect(await runTokenAdmin(["create", "team1", "3600"], auth, print)).toBe(0);

    expect(output).toHaveLength(1);
    await expect(auth.verifyToken(output[0])).resolves.toMatchObject({ group: "team1" });
  });

  it("defaults to a thirty day lifetime", async () => {
    await runTokenAdmin(["create", "team1"], auth, print);

    const info = await auth.verifyToken(output[0]);
    expect(info.expiresAt - info.issuedAt).toBe(DEFAULT_TOKEN_TTL_SECONDS);
  });

  it("binds a fingerprint given anywhere in the arguments", async () => {
    await runTokenAdmin(["create", "--fingerprint", "abc123", "team1", "60"], auth, print);

    const info = await auth.verifyToken(output[0]);
    expect(info.expiresAt - info.issuedAt).toBe(60);
    expect((await auth.listTokens())[0].fingerprintBound).toBe(true);
  });

  it("lists tokens one per line", async () => {
    await runTokenAdmin(["create", "team1", "3600"], auth, print);
    const { tokenId } = await auth.verifyToken(output[0]);
    output = [];

    expect(await runTokenAdmin(["list"], auth, print)).toBe(0);

    expect(output).toEqual([
      `${tokenId}  team1  issued=2026-01-31T00:00:00.000Z  expires=2026-01-31T01:00:00.000Z  active`,
    ]);
  });

  it("says so when there are no tokens", async () => {
    await runTokenAdmin(["list"], auth, print);

    expect(output).toEqual(["no tokens"]);
  });

  it("revokes and reports unknown tokens", async () => {
    await runTokenAdmin(["create", "team1", "3600"], auth, print);
    const token = output[0];
    output = [];

    expect(await runTokenAdmin(["revoke", token, "left", "the", "team"], auth, print)).toBe(0);
    expect(await runTokenAdmin(["revoke", GUID_A], auth, print)).toBe(1);

    expect(output).toEqual(["revoked", "not found"]);
    expect((await auth.listTokens())[0].revoked).toBe(true);
  });

  it("prints domain errors instead of throwing", async () => {
    expect(await runTokenAdmin(["create", "team1", "soon"], auth, print)).toBe(1);

    expect(output).toEqual(["Error: expiresInSeconds must be a positive integer, got NaN"]);
  });

  it("prints the secret fingerprint", async () => {
    await runTokenAdmin(["fingerprint"], auth, print);

    expect(output).toEqual([auth.getSecretFingerprint()]);
  });

  it("prints usage for help and unknown commands", async () => {
    expect(await runTokenAdmin(["--help"], auth, print)).toBe(0);
    expect(await runTokenAdmin(["rotate"], auth, print)).toBe(1);
    expect(await runTokenAdmin(["create"], auth, print)).toBe(1);

    expect(output).toEqual([USAGE, USAGE, USAGE]);
  });
});
