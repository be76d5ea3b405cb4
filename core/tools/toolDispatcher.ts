import { z } from "zod";
import type { AuthService } from "../auth/authService.js";
import {
  AuthenticationError,
  PermissionDeniedError,
  RateLimitExceededError,
  ValidationError,
  errorMessage,
} from "../errors.js";
import { type AppLogger, type LogLevel, logWith } from "../logging/createLogger.js";
import type { RateLimiter } from "../rateLimiter/rateLimiter.js";
import { parseGraphParams } from "../render/parseGraphParams.js";
import { CHART_DESCRIPTIONS, type RenderService } from "../render/renderService.js";
import { listThemes } from "../render/themes.js";
import { auditFailure } from "../security/auditFailure.js";
import type { SecurityAuditor } from "../security/securityAuditor.js";
import type { ImageStorage } from "../storage/imageStorage.js";
import { mimeTypeFor } from "../storage/types.js";
import type { Clock } from "../utils/clock.js";
import { TOOL_CATALOG, type ToolDescriptor, type ToolName, isToolName } from "./toolCatalog.js";

export type ToolContent =
  | { type: "text"; text: string }
  | { type: "image"; data: string; mimeType: string };

export interface ToolResult {
  content: ToolContent[];
  isError?: boolean;
}

export interface ToolDispatcherOptions {
  renderService: RenderService;
  storage: ImageStorage;
  auth?: AuthService;
  auditor?: SecurityAuditor;
  limiter?: RateLimiter;
  logger?: AppLogger;
  clock?: Clock;
  serviceName?: string;
}

const argsSchema = z.record(z.string(), z.unknown());
const tokenSchema = z.object({ token: z.string().min(1, "must be a non-empty string").optional() });
const getImageSchema = z.object({ guid: z.string({ required_error: "Missing required argument 'guid'" }) });

function text(value: string): ToolContent {
  return { type: "text", text: value };
}

function failure(value: string): ToolResult {
  return { content: [text(value)], isError: true };
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/**
 * Tool-call surface (MCP style). Calls never throw: every failure becomes a
 * result with `isError: true`, and security outcomes are audited under
 * `tool:<name>`.
 */
export class ToolDispatcher {
  private readonly clock: Clock;

  constructor(private options: ToolDispatcherOptions) {
    this.clock = options.clock ?? Date.now;
  }

  private log(level: LogLevel, msg: string, fields?: Record<string, unknown>) {
    logWith(this.options.logger, level, msg, fields);
  }

  listTools(): ToolDescriptor[] {
    return TOOL_CATALOG;
  }

  async call(name: string, rawArgs: unknown, clientId = "mcp"): Promise<ToolResult> {
    const endpoint = `tool:${name}`;

    if (!isToolName(name)) {
      this.log("warn", "Unknown tool requested", { event: "TOOL_UNKNOWN", tool: name, clientId });
      return failure(
        `Error: Unknown tool '${name}'\n\nAvailable tools:\n${TOOL_CATALOG.map((t) => `- ${t.name}`).join("\n")}`
      );
    }

    this.log("info", "Tool called", { event: "TOOL_CALL", tool: name, clientId });

    try {
      const parsed = argsSchema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        throw new ValidationError("Tool arguments must be a JSON object");
      }
      this.options.limiter?.checkLimit(clientId, endpoint);
      return await this.dispatch(name, parsed.data);
    } catch (err) {
      return this.toFailure(err, name, clientId, endpoint);
    }
  }

  private async dispatch(name: ToolName, args: Record<string, unknown>): Promise<ToolResult> {
    switch (name) {
      case "ping":
        return {
          content: [
            text(
              `Server is running\nTimestamp: ${new Date(this.clock()).toISOString()}\nService: ${this.options.serviceName ?? "plotvault"}`
            ),
          ],
        };

      case "list_themes":
        return {
          content: [
            text(
              [
                "Available Themes:\n",
                ...listThemes()
                  .sort((a, b) => a.name.localeCompare(b.name))
                  .map((theme) => `• ${theme.name}: ${theme.description}`),
              ].join("\n")
            ),
          ],
        };

      case "list_handlers":
        return {
          content: [
            text(
              [
                "Available Graph Types:\n",
                ...Object.entries(CHART_DESCRIPTIONS)
                  .sort(([a], [b]) => a.localeCompare(b))
                  .map(([type, description]) => `• ${type}: ${description}`),
              ].join("\n")
            ),
          ],
        };

      case "render_graph":
        return this.renderGraph(args);

      case "get_image":
        return this.getImage(args);
    }
  }

  // group for the caller, or undefined when authentication is disabled
  private async authenticate(args: Record<string, unknown>): Promise<string | undefined> {
    const { auth } = this.options;
    if (!auth) return undefined;

    const parsed = tokenSchema.safeParse(args);
    if (!parsed.success || parsed.data.token === undefined) {
      throw new AuthenticationError("malformed", "missing token argument");
    }

    // no request context here, so no fingerprint check
    const info = await auth.verifyToken(parsed.data.token);
    return info.group;
  }

  private async renderGraph(args: Record<string, unknown>): Promise<ToolResult> {
    const group = await this.authenticate(args);
    const params = parseGraphParams(args);
    const result = await this.options.renderService.render(params, group);

    if (result.kind === "guid") {
      return {
        content: [
          text(
            `Image saved with GUID: ${result.guid}\n\n` +
            `Chart: ${params.type} - '${params.title}'\n` +
            `Format: ${result.format}\n` +
            `Use get_image tool with guid='${result.guid}' to retrieve the image.`
          ),
        ],
      };
    }

    return {
      content: [
        { type: "image", data: result.data.toString("base64"), mimeType: mimeTypeFor(result.format) },
        text(`Successfully rendered ${params.type} chart: '${params.title}'`),
      ],
    };
  }

  private async getImage(args: Record<string, unknown>): Promise<ToolResult> {
    const group = await this.authenticate(args);

    const parsed = getImageSchema.safeParse(args);
    if (!parsed.success) {
      throw new ValidationError(firstIssue(parsed.error));
    }
    const { guid } = parsed.data;
    const image = await this.options.storage.getImage(guid, group);
    if (!image) {
      return failure(`Error: Image not found for GUID: ${guid}`);
    }

    return {
      content: [
        { type: "image", data: image.data.toString("base64"), mimeType: mimeTypeFor(image.format) },
        text(`Successfully retrieved image: ${guid}.${image.format}`),
      ],
    };
  }

  private toFailure(err: unknown, name: string, clientId: string, endpoint: string): ToolResult {
    auditFailure(this.options.auditor, err, clientId, endpoint);

    if (err instanceof AuthenticationError) {
      return failure("Authentication Error: Authentication failed");
    }
    if (err instanceof RateLimitExceededError) {
      return failure(`Rate Limit Error: ${err.message}`);
    }
    if (err instanceof PermissionDeniedError) {
      return failure(`Permission Denied: ${err.message}`);
    }
    if (err instanceof ValidationError) {
      return failure(`Validation Error: ${err.message}`);
    }

    this.log("error", "Tool call failed", { event: "TOOL_FAIL", tool: name, clientId, error: errorMessage(err) });
    return failure(`Error: ${name} failed due to an internal error`);
  }
}
