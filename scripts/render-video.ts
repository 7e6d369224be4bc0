#!/usr/bin/env npx tsx
/**
 * render-video.ts — Render the frames of a scrolling slide video.
 *
 * Usage:
 *   npx tsx scripts/render-video.ts [render] [info.json]
 *   npx tsx scripts/render-video.ts example [dir]
 *
 * info.json holds the slide operations, the video config and the path of the
 * data file (one array of strings per slide). Defaults to ./info.json.
 * `example` writes an example job, data file and three placeholder images to
 * [dir] (default: ./example).
 *
 * Output:
 *   Frames (cover.png, 00.png, …, ending.png) and plan.json in the work dir;
 *   the plan is also printed to stdout. Progress goes to stderr.
 *
 * Exit codes:
 *   0 — frames rendered
 *   1 — invalid job, config or data, or a render failure
 *   2 — usage error or file not found
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ZodError } from "zod";
import {
  BLACK,
  COLOR_2_1,
  COLOR_3_1,
  POSITION_3_1,
  PngFrameSink,
  RgbaImage,
  SharpImageSource,
  VideoConfigSchema,
  buildVideoConfig,
  drawFilledEllipse,
  drawFilledRoundedRect,
  generateSlides,
  isDirectory,
  isFile,
  isRenderError,
  loadFont,
  parseInfo,
  parseCommand,
  parseSlideData,
  readJSON,
  rectAt,
  renderVideoFrames,
  toRgba,
  writeJSON,
  type InfoDocument,
} from "../src/index.js";

class UsageError extends Error {}

// ── Example job ──
async function writeExample(dir: string): Promise<void> {
  await fs.mkdir(path.join(dir, "work"), { recursive: true });
  const sink = new PngFrameSink();

  const pictures: string[] = [];
  for (const [i, color] of COLOR_3_1.entries()) {
    const file = path.join(dir, `${i + 1}.png`);
    const image = new RgbaImage(400, 400);
    drawFilledRoundedRect(image, rectAt(0, 0).ofSize(400, 400), 40, toRgba(color));
    drawFilledEllipse(image, { x: 200, y: 200 }, 150 - i * 30, 100 + i * 20, toRgba(BLACK));
    await sink.save(image, file);
    pictures.push(file);
  }

  const rows = Array.from({ length: 30 }, (_, i) => [
    pictures[i % pictures.length] ?? "",
    `slide ${i + 1}`,
    `caption ${i + 1}`,
  ]);
  const dataFile = path.join(dir, "data.json");
  await writeJSON(dataFile, rows);

  const [imagePos, titlePos, captionPos] = POSITION_3_1;
  const info: InfoDocument = {
    operations: [
      { kind: "color", color: COLOR_2_1[0], position: titlePos, zIndex: 1 },
      { kind: "color", color: COLOR_2_1[1], position: captionPos, zIndex: 1 },
      { kind: "image", position: imagePos, zIndex: 2 },
      { kind: "text", maxScale: 100, color: BLACK, position: titlePos, zIndex: 2 },
      { kind: "text", maxScale: 100, color: BLACK, position: captionPos, zIndex: 2 },
    ],
    config: VideoConfigSchema.parse({
      workDir: path.join(dir, "work"),
      font: path.join(dir, "font.ttf"),
    }),
    data: dataFile,
  };
  await writeJSON(path.join(dir, "info.json"), info);
  console.error(`Example written to ${dir}/ (put a TrueType font at ${info.config.font})`);
}

// ── Render job ──
async function render(infoPath: string, signal: AbortSignal): Promise<void> {
  if (!(await isFile(infoPath))) {
    throw new UsageError(`Info file not found: ${infoPath}`);
  }
  const info = parseInfo(await readJSON(infoPath));
  const config = buildVideoConfig(info.config);

  if (!config.font) {
    throw new UsageError("Font not set in config");
  }
  if (!(await isFile(config.font))) {
    throw new UsageError(`Font file not found: ${config.font}`);
  }
  if (info.config.workDir !== undefined) {
    if (!(await isDirectory(config.workDir))) {
      throw new UsageError(`Work dir is set but does not exist: ${config.workDir}`);
    }
  } else {
    console.error(`Using default work dir: ${config.workDir}`);
    await fs.mkdir(config.workDir, { recursive: true });
  }
  if (!(await isFile(info.data))) {
    throw new UsageError(`Data file not found: ${info.data}`);
  }

  const rows = parseSlideData(await readJSON(info.data));
  const slides = generateSlides(info.operations, rows);
  const glyphs = await loadFont(config.font);

  const started = Date.now();
  const plan = await renderVideoFrames(
    slides,
    config,
    { images: new SharpImageSource(), glyphs, sink: new PngFrameSink() },
    { signal, log: (message) => console.error(message) }
  );
  await writeJSON(path.join(config.workDir, "plan.json"), plan);
  console.error(`${plan.segments.length} segments planned in ${Date.now() - started} ms`);
  console.log(JSON.stringify(plan, null, 2));
}

// ── Run ──
async function main(): Promise<void> {
  const command = parseCommand(process.argv.slice(2));
  if (command.kind === "example") {
    await writeExample(path.resolve(command.dir));
    return;
  }

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  await render(path.resolve(command.infoPath), controller.signal);
}

main().catch((err: unknown) => {
  if (err instanceof UsageError) {
    console.error(`Error: ${err.message}`);
    process.exit(2);
  }
  if (err instanceof ZodError) {
    console.error("Error: invalid document");
    for (const issue of err.issues) {
      console.error(`  ${issue.path.join(".") || "(root)"}: ${issue.message}`);
    }
  } else if (isRenderError(err)) {
    console.error(`Error [${err.kind}]: ${err.message}`);
  } else {
    console.error("Error:", err instanceof Error ? err.message : err);
  }
  process.exit(1);
});
