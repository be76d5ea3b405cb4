import type { AuthService } from "../core/auth/authService.js";
import { errorMessage, isPlotvaultError } from "../core/errors.js";

export const DEFAULT_TOKEN_TTL_SECONDS = 30 * 24 * 60 * 60;

export const USAGE = [
  "Usage: plotvault-tokens <command>",
  "",
  "  create <group> [expiresInSeconds] [--fingerprint <hash>]",
  "  revoke <token|tokenId> [reason]",
  "  list",
  "  fingerprint",
].join("\n");

function iso(seconds: number) {
  return new Date(seconds * 1000).toISOString();
}

function takeOption(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const [, value] = args.splice(index, 2);
  return value;
}

/**
 * Token administration commands. Returns the process exit code.
 */
export async function runTokenAdmin(
  argv: string[],
  auth: AuthService,
  print: (line: string) => void
): Promise<number> {
  const [command, ...rest] = argv;
  const args = [...rest];

  try {
    switch (command) {
      case "create": {
        const fingerprint = takeOption(args, "--fingerprint");
        const [group, ttl] = args;
        if (!group) {
          print(USAGE);
          return 1;
        }
        const expiresIn = ttl === undefined ? DEFAULT_TOKEN_TTL_SECONDS : Number(ttl);
        print(await auth.createToken(group, expiresIn, { fingerprint }));
        return 0;
      }

      case "revoke": {
        const [token, ...reason] = args;
        if (!token) {
          print(USAGE);
          return 1;
        }
        const revoked = await auth.revokeToken(token, reason.length > 0 ? reason.join(" ") : undefined);
        print(revoked ? "revoked" : "not found");
        return revoked ? 0 : 1;
      }

      case "list": {
        const tokens = await auth.listTokens();
        if (tokens.length === 0) print("no tokens");
        for (const token of tokens) {
          print(
            [
              token.tokenId,
              token.group,
              `issued=${iso(token.issuedAt)}`,
              `expires=${iso(token.expiresAt)}`,
              token.revoked ? "revoked" : "active",
              ...(token.fingerprintBound ? ["bound"] : []),
            ].join("  ")
          );
        }
        return 0;
      }

      case "fingerprint":
        print(auth.getSecretFingerprint());
        return 0;

      case "help":
      case "--help":
        print(USAGE);
        return 0;

      default:
        print(USAGE);
        return 1;
    }
  } catch (err) {
    if (!isPlotvaultError(err)) throw err;
    print(`Error: ${errorMessage(err)}`);
    return 1;
  }
}
