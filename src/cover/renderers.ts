import fs from "node:fs";
import puppeteer from "puppeteer-core";
import sharp from "sharp";

import type { CommandRunner } from "../lib/commands.js";
import { CommandError } from "../lib/commands.js";
import { deleteFileIfExists, fileSize } from "../lib/fs.js";
import type { Renderer, RendererName, VectorDocument } from "./types.js";

export interface RendererTools {
  runner: CommandRunner;
  inkscapePath: string;
  rsvgConvertPath: string;
  magickPath: string;
  chromePath?: string;
}

const SVG_DENSITY = 72;

const assertRasterWritten = (rendererName: string, outputPath: string): void => {
  if (fileSize(outputPath) === 0) {
    throw new Error(`${rendererName} produced no output at ${outputPath}`);
  }
};

/** Run an external SVG converter against a scratch copy of the document. */
const withSvgFile = async (
  document: VectorDocument,
  outputPngPath: string,
  convert: (svgPath: string) => Promise<void>,
): Promise<void> => {
  const svgPath = `${outputPngPath}.svg`;
  try {
    fs.writeFileSync(svgPath, document.svg, "utf8");
    await convert(svgPath);
  } finally {
    deleteFileIfExists(svgPath);
  }
};

/** In-process librsvg through sharp. Deterministic for a given sharp release. */
export const createSharpRenderer = (): Renderer => ({
  name: "sharp",
  render: async (document, outputPngPath) => {
    await sharp(Buffer.from(document.svg, "utf8"), {
      density: SVG_DENSITY,
      // The inlined art easily exceeds libxml2's default attribute limit.
      unlimited: true,
    })
      .resize(document.width, document.height, { fit: "fill" })
      .png()
      .toFile(outputPngPath);
    assertRasterWritten("sharp", outputPngPath);
  },
});

/** Inkscape headless export: 1.x flags first, then the 0.92 flag set. */
export const createInkscapeRenderer = (tools: RendererTools): Renderer => ({
  name: "inkscape",
  render: async (document, outputPngPath) => {
    await withSvgFile(document, outputPngPath, async (svgPath) => {
      try {
        await tools.runner.run(tools.inkscapePath, [
          svgPath,
          "--export-type=png",
          `--export-filename=${outputPngPath}`,
          `--export-width=${document.width}`,
          `--export-height=${document.height}`,
        ]);
      } catch (error: unknown) {
        if (error instanceof CommandError && error.missing) {
          throw error;
        }
        await tools.runner.run(tools.inkscapePath, [
          svgPath,
          `--export-png=${outputPngPath}`,
          "-w",
          String(document.width),
          "-h",
          String(document.height),
        ]);
      }
    });
    assertRasterWritten("inkscape", outputPngPath);
  },
});

export const createRsvgConvertRenderer = (tools: RendererTools): Renderer => ({
  name: "rsvg-convert",
  render: async (document, outputPngPath) => {
    await withSvgFile(document, outputPngPath, async (svgPath) => {
      await tools.runner.run(tools.rsvgConvertPath, [
        "-w",
        String(document.width),
        "-h",
        String(document.height),
        "-o",
        outputPngPath,
        svgPath,
      ]);
    });
    assertRasterWritten("rsvg-convert", outputPngPath);
  },
});

export const createMagickRenderer = (tools: RendererTools): Renderer => ({
  name: "magick",
  render: async (document, outputPngPath) => {
    await withSvgFile(document, outputPngPath, async (svgPath) => {
      await tools.runner.run(tools.magickPath, [
        "-density",
        String(SVG_DENSITY),
        "-background",
        "none",
        svgPath,
        "-resize",
        `${document.width}x${document.height}!`,
        "-strip",
        outputPngPath,
      ]);
    });
    assertRasterWritten("magick", outputPngPath);
  },
});

/** Headless Chrome screenshot of the inline SVG. Needs CHROME_PATH. */
export const createChromeRenderer = (tools: RendererTools): Renderer => ({
  name: "chrome",
  render: async (document, outputPngPath) => {
    if (!tools.chromePath) {
      throw new Error("CHROME_PATH is not set");
    }
    const browser = await puppeteer.launch({
      headless: true,
      executablePath: tools.chromePath,
      args: ["--no-sandbox", "--disable-setuid-sandbox"],
    });
    try {
      const page = await browser.newPage();
      await page.setViewport({
        width: document.width,
        height: document.height,
        deviceScaleFactor: 1,
      });
      await page.setContent(
        `<!doctype html><html><body style="margin:0;">${document.svg}</body></html>`,
        { waitUntil: "load" },
      );
      await page.screenshot({
        path: outputPngPath,
        type: "png",
        clip: { x: 0, y: 0, width: document.width, height: document.height },
      });
    } finally {
      await browser.close();
    }
    assertRasterWritten("chrome", outputPngPath);
  },
});

const RENDERER_FACTORIES: Record<RendererName, (tools: RendererTools) => Renderer> = {
  sharp: () => createSharpRenderer(),
  inkscape: createInkscapeRenderer,
  "rsvg-convert": createRsvgConvertRenderer,
  magick: createMagickRenderer,
  chrome: createChromeRenderer,
};

/** Build the renderer chain in the given priority order. */
export const createRenderers = (
  order: RendererName[],
  tools: RendererTools,
): Renderer[] => order.map((name) => RENDERER_FACTORIES[name](tools));
