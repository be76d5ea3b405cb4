import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ValidationError } from "../core/errors.js";
import { isColor, parseGraphParams } from "../core/render/parseGraphParams.js";
import { RenderService } from "../core/render/renderService.js";
import { SvgChartRenderer } from "../core/render/svgRenderer.js";
import { getTheme, listThemes } from "../core/render/themes.js";
import { SanitizationError } from "../core/security/sanitizer.js";
import { createFileImageStorage } from "../core/storage/imageStorage.js";
import { makeTempDir, removeDir } from "./helpers.js";

describe("parseGraphParams", () => {
  it("applies defaults to a minimal request", () => {
    expect(parseGraphParams({ y1: [1, 2, 3] })).toEqual({
      title: "",
      x: undefined,
      datasets: [{ values: [1, 2, 3], label: undefined, color: undefined }],
      xlabel: "",
      ylabel: "",
      type: "line",
      format: "svg",
      theme: "light",
      proxy: false,
      lineWidth: 2,
      markerSize: 36,
      alpha: 1,
      xmin: undefined,
      xmax: undefined,
      ymin: undefined,
      ymax: undefined,
    });
  });

  it("treats y as an alias of y1 but not alongside it", () => {
    expect(parseGraphParams({ y: [4, 5] }).datasets[0].values).toEqual([4, 5]);
    expect(() => parseGraphParams({ y: [1, 2], y1: [1, 2] })).toThrow("Provide either y or y1, not both");
  });

  it("keeps datasets in slot order with labels and colours", () => {
    const params = parseGraphParams({
      y1: [1, 2],
      y3: [5, 6],
      label1: "Revenue",
      color3: " #00ff00 ",
      type: "Bar",
    });

    expect(params.type).toBe("bar");
    expect(params.datasets).toEqual([
      { values: [1, 2], label: "Revenue", color: undefined },
      { values: [5, 6], label: undefined, color: "#00ff00" },
    ]);
  });

  it("requires at least one dataset", () => {
    expect(() => parseGraphParams({ title: "empty" })).toThrow("At least one dataset (y1) is required");
  });

  it("requires equal series lengths and a matching x", () => {
    expect(() => parseGraphParams({ y1: [1, 2], y2: [1, 2, 3] })).toThrow(
      "All datasets must have the same length: the first has 2 points, dataset 2 has 3"
    );
    expect(() => parseGraphParams({ x: [1, 2, 3], y1: [1, 2] })).toThrow("x has 3 points, datasets have 2");
  });

  it("requires two points for a line chart", () => {
    expect(() => parseGraphParams({ y1: [1] })).toThrow("Line charts require at least 2 data points");
    expect(parseGraphParams({ y1: [1], type: "scatter" }).datasets).toHaveLength(1);
  });

  it("rejects inverted axis bounds", () => {
    expect(() => parseGraphParams({ y1: [1, 2], ymin: 5, ymax: 5 })).toThrow("ymin must be less than ymax");
  });

  it("reports schema failures with the field path", () => {
    expect(() => parseGraphParams({ y1: [1, "two"] })).toThrow(/^Invalid y1\.1: /);
    expect(() => parseGraphParams({ y1: [1, 2], alpha: 2 })).toThrow(/^Invalid alpha: /);
    expect(() => parseGraphParams({ y1: [1, 2], proxy: "yes" })).toThrow(ValidationError);
  });

  it("rejects unknown enums and bad colours as sanitization failures", () => {
    expect(() => parseGraphParams({ y1: [1, 2], format: "gif" })).toThrow(SanitizationError);
    expect(() => parseGraphParams({ y1: [1, 2], theme: "neon" })).toThrow("Invalid theme: neon");
    expect(() => parseGraphParams({ y1: [1, 2], color1: "not-a-colour" })).toThrow(
      "Invalid color1 'not-a-colour'"
    );
  });

  it("allows ordinary words in titles but not script", () => {
    expect(parseGraphParams({ y1: [1, 2], title: "Update\nfrequency" }).title).toBe("Update frequency");
    expect(() => parseGraphParams({ y1: [1, 2], title: "<script>x</script>" })).toThrow(SanitizationError);
  });
});

describe("isColor", () => {
  it("accepts hex, rgb and names", () => {
    expect(isColor("#abc")).toBe(true);
    expect(isColor("rgba(1, 2, 3, 0.5)")).toBe(true);
    expect(isColor("Magenta")).toBe(true);
    expect(isColor("#abcd")).toBe(false);
    expect(isColor("url(#x)")).toBe(false);
  });
});

describe("themes", () => {
  it("lists every theme with a description", () => {
    expect(listThemes().map((t) => t.name)).toEqual(["light", "dark", "bizlight", "bizdark"]);
    expect(getTheme("dark").description).toBe("Dark background with light text");
  });
});

describe("SvgChartRenderer", () => {
  const renderer = new SvgChartRenderer();

  function draw(input: Record<string, unknown>): string {
    return renderer.render(parseGraphParams(input)).data.toString("utf8");
  }

  it("draws a line across the plot area", () => {
    const svg = draw({ y1: [0, 10] });

    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="640" height="480"')).toBe(true);
    expect(svg).toContain(
      '<polyline points="72,420 616,50" fill="none" stroke="#1f77b4" stroke-width="2" stroke-opacity="1"/>'
    );
    expect(svg.endsWith("</svg>")).toBe(true);
  });

  it("sizes scatter markers from the marker area", () => {
    const svg = draw({ y1: [0, 10], type: "scatter", marker_size: 36, alpha: 0.5, color1: "red" });

    expect(svg).toContain('<circle cx="72" cy="420" r="3" fill="red" fill-opacity="0.5"/>');
    expect(svg).toContain('<circle cx="616" cy="50" r="3" fill="red" fill-opacity="0.5"/>');
  });

  it("draws bars from the zero line", () => {
    const svg = draw({ y1: [3], type: "bar" });

    expect(svg).toContain('<rect x="72" y="50" width="544" height="370" fill="#1f77b4" fill-opacity="1"/>');
  });

  it("escapes the title and adds a legend for labelled series", () => {
    const svg = draw({ y1: [1, 2], title: "A & B", label1: "Sales" });

    expect(svg).toContain('font-size="16" text-anchor="middle">A &amp; B</text>');
    expect(svg).toContain('<rect x="486" y="56" width="12" height="12" fill="#1f77b4"/>');
    expect(svg).toContain('font-size="11">Sales</text>');
  });

  it("uses the theme background", () => {
    const svg = draw({ y1: [1, 2], theme: "bizdark" });

    expect(svg).toContain('<rect width="640" height="480" fill="#14213d"/>');
  });

  it("rejects formats it cannot produce", () => {
    expect(() => renderer.render(parseGraphParams({ y1: [1, 2], format: "png" }))).toThrow(
      "Format 'png' is not supported by this renderer. Supported: svg"
    );
  });
});

describe("RenderService", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("returns bytes inline without touching storage", async () => {
    const storage = await createFileImageStorage(path.join(dir, "storage"));
    const service = new RenderService(new SvgChartRenderer(), storage);

    const result = await service.render(parseGraphParams({ y1: [1, 2] }));

    expect(result.kind).toBe("inline");
    expect(await storage.listImages()).toEqual([]);
  });

  it("stores the image under the caller's group in proxy mode", async () => {
    const storage = await createFileImageStorage(path.join(dir, "storage"));
    const service = new RenderService(new SvgChartRenderer(), storage);

    const result = await service.render(parseGraphParams({ y1: [1, 2], proxy: true }), "team1");

    expect(result).toMatchObject({ kind: "guid", format: "svg" });
    if (result.kind !== "guid") return;
    expect(await storage.listImages("team1")).toEqual([result.guid]);
    const stored = await storage.getImage(result.guid, "team1");
    expect(stored?.data.toString("utf8").startsWith("<svg")).toBe(true);
  });
});
