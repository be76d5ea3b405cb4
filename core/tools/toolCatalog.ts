import { CHART_TYPES, IMAGE_FORMATS, THEME_NAMES } from "../security/sanitizer.js";

export const TOOL_NAMES = ["ping", "render_graph", "get_image", "list_themes", "list_handlers"] as const;
export type ToolName = typeof TOOL_NAMES[number];

export function isToolName(value: string): value is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(value);
}

type JsonSchema = Record<string, unknown>;

export interface ToolDescriptor {
  name: ToolName;
  description: string;
  inputSchema: JsonSchema;
}

const numbers = (description: string): JsonSchema => ({
  type: "array",
  items: { type: "number" },
  description,
});

const token: JsonSchema = {
  type: "string",
  description: "Bearer token; required when the server runs with authentication",
};

const ORDINALS = ["First", "Second", "Third", "Fourth", "Fifth"];

function datasetProperties(): Record<string, JsonSchema> {
  const properties: Record<string, JsonSchema> = {};
  ORDINALS.forEach((ordinal, i) => {
    const n = i + 1;
    properties[`y${n}`] = numbers(`${ordinal} dataset Y values${n === 1 ? " (required unless 'y' is given)" : ""}`);
    properties[`label${n}`] = { type: "string", description: `Legend label for dataset ${n}` };
    properties[`color${n}`] = { type: "string", description: `Colour for dataset ${n}: hex, rgb(), rgba() or a name` };
  });
  return properties;
}

export const TOOL_CATALOG: ToolDescriptor[] = [
  {
    name: "ping",
    description: "Health check that returns the current server timestamp.",
    inputSchema: { type: "object", properties: {}, required: [] },
  },
  {
    name: "render_graph",
    description:
      "Render a line, scatter or bar chart. Returns the image inline, or with proxy=true stores it and returns a GUID for get_image.",
    inputSchema: {
      type: "object",
      properties: {
        title: { type: "string", description: "Chart title" },
        x: numbers("X values (defaults to 0, 1, 2, ...)"),
        y: numbers("Alias of y1"),
        ...datasetProperties(),
        xlabel: { type: "string" },
        ylabel: { type: "string" },
        type: { type: "string", enum: [...CHART_TYPES], default: "line" },
        format: { type: "string", enum: [...IMAGE_FORMATS], default: "svg" },
        theme: { type: "string", enum: [...THEME_NAMES], default: "light" },
        proxy: { type: "boolean", default: false },
        line_width: { type: "number", default: 2 },
        marker_size: { type: "number", default: 36 },
        alpha: { type: "number", minimum: 0, maximum: 1, default: 1 },
        xmin: { type: "number" },
        xmax: { type: "number" },
        ymin: { type: "number" },
        ymax: { type: "number" },
        token,
      },
      required: [],
    },
  },
  {
    name: "get_image",
    description: "Fetch a stored chart by GUID (from render_graph with proxy=true).",
    inputSchema: {
      type: "object",
      properties: {
        guid: { type: "string", description: "Image GUID" },
        token,
      },
      required: ["guid"],
    },
  },
  {
    name: "list_themes",
    description: "List the available chart themes.",
    inputSchema: { type: "object", properties: {}, required: [] },
  },
  {
    name: "list_handlers",
    description: "List the supported chart types.",
    inputSchema: { type: "object", properties: {}, required: [] },
  },
];
