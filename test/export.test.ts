import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import sharp from "sharp";
import type { ExportReport, ScreenConfig, SourceImage } from "@/types";
import { exportScreens, summarizeExportReport } from "@/composables/useExport";
import { InvalidParameterError } from "@/utils/errors";
import { loadImage } from "@/utils/image";
import { writeGradientPng, writeGrey16Png } from "./helpers";

function makeScreen(
  id: number,
  ratioW: number,
  ratioH: number,
  x: number,
  y: number,
  width: number,
  height: number,
): ScreenConfig {
  return { id, ratioW, ratioH, x, y, width, height };
}

describe("exportScreens", () => {
  let dir = "";
  let image: SourceImage;

  beforeEach(async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    dir = await mkdtemp(join(tmpdir(), "wallpaper-export-"));
    const src = join(dir, "source.png");
    await writeGradientPng(src, 200, 100);
    image = await loadImage(src);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("加载后的源图保留尺寸与格式", () => {
    expect(image.width).toBe(200);
    expect(image.height).toBe(100);
    expect(image.channels).toBe(3);
    expect(image.format).toBe("png");
    expect(image.name).toBe("source.png");
  });

  it("越界屏幕记录失败，其余屏幕照常导出", async () => {
    const screens = [
      makeScreen(0, 16, 9, 0, 0, 160, 90),
      makeScreen(1, 1, 1, 150, 0, 100, 100),
      makeScreen(2, 4, 3, 10, 10, 80, 60),
    ];
    const report = await exportScreens(image, screens, dir, "wallpaper", ".png");

    expect(report.succeededCount).toBe(2);
    expect(report.outputs).toEqual([
      { screenId: 0, path: join(dir, "wallpaper_screen_16-9.png") },
      { screenId: 2, path: join(dir, "wallpaper_screen_4-3.png") },
    ]);
    expect(report.failures).toEqual([
      { screenId: 1, kind: "OutOfBounds", message: "屏幕 2 超出图片边界" },
    ]);
    expect(await readdir(dir)).not.toContain("wallpaper_screen_1-1.png");
  });

  it("输出是原图像素的精确拷贝", async () => {
    await exportScreens(image, [makeScreen(0, 4, 3, 10, 20, 80, 60)], dir, "wallpaper", ".png");
    const { data, info } = await sharp(join(dir, "wallpaper_screen_4-3.png"))
      .raw()
      .toBuffer({ resolveWithObject: true });

    expect(info.width).toBe(80);
    expect(info.height).toBe(60);
    expect(Array.from(data.subarray(0, 3))).toEqual([10, 20, 0]);
    const last = (59 * 80 + 79) * info.channels;
    expect(Array.from(data.subarray(last, last + 3))).toEqual([89, 79, 0]);
  });

  it("同名文件已存在时追加 _2，不覆盖旧文件", async () => {
    const screens = [makeScreen(0, 16, 9, 0, 0, 160, 90)];
    await exportScreens(image, screens, dir, "wallpaper", ".png");
    const before = await readFile(join(dir, "wallpaper_screen_16-9.png"));

    const report = await exportScreens(image, [makeScreen(0, 16, 9, 40, 10, 160, 90)], dir, "wallpaper", ".png");
    expect(report.outputs).toEqual([{ screenId: 0, path: join(dir, "wallpaper_screen_16-9_2.png") }]);

    const after = await readFile(join(dir, "wallpaper_screen_16-9.png"));
    expect(after.equals(before)).toBe(true);
  });

  it("同一批中比例相同的屏幕依次编号", async () => {
    const screens = [makeScreen(0, 16, 9, 0, 0, 16, 9), makeScreen(1, 16, 9, 20, 0, 16, 9)];
    const report = await exportScreens(image, screens, dir, "desk", ".png");
    expect(report.outputs.map(o => o.path)).toEqual([
      join(dir, "desk_screen_16-9.png"),
      join(dir, "desk_screen_16-9_2.png"),
    ]);
  });

  it("按扩展名决定输出格式", async () => {
    await exportScreens(image, [makeScreen(0, 1, 1, 0, 0, 50, 50)], dir, "wallpaper", "jpg");
    const meta = await sharp(join(dir, "wallpaper_screen_1-1.jpg")).metadata();
    expect(meta.format).toBe("jpeg");
    expect(meta.width).toBe(50);
  });

  it("写入失败按屏幕记录 IOFailure，不留下文件", async () => {
    const missing = join(dir, "missing");
    const report = await exportScreens(
      image,
      [makeScreen(0, 16, 9, 0, 0, 16, 9), makeScreen(1, 4, 3, 0, 0, 4, 3)],
      missing,
      "wallpaper",
      ".png",
    );
    expect(report.succeededCount).toBe(0);
    expect(report.failures.map(f => [f.screenId, f.kind])).toEqual([
      [0, "IOFailure"],
      [1, "IOFailure"],
    ]);
    expect(report.failures[0].message.startsWith("屏幕 1 导出失败：")).toBe(true);
    expect(await readdir(dir)).toEqual(["source.png"]);
  });

  it("不支持的扩展名或空前缀直接拒绝", async () => {
    const screens = [makeScreen(0, 16, 9, 0, 0, 16, 9)];
    await expect(exportScreens(image, screens, dir, "wallpaper", ".bmp")).rejects.toThrow(
      InvalidParameterError,
    );
    await expect(exportScreens(image, screens, dir, "  ", ".png")).rejects.toThrow(InvalidParameterError);
  });

  it("前缀包含路径分隔符时拒绝，不写出输出目录之外", async () => {
    const screens = [makeScreen(0, 16, 9, 0, 0, 16, 9)];
    await expect(exportScreens(image, screens, dir, "../evil", ".png")).rejects.toThrow(InvalidParameterError);
    await expect(exportScreens(image, screens, dir, "a/b", ".png")).rejects.toThrow(InvalidParameterError);
    await expect(exportScreens(image, screens, dir, "a\\b", ".png")).rejects.toThrow(InvalidParameterError);
    expect(await readdir(dir)).toEqual(["source.png"]);
  });

  it("16 位 PNG 导出后保持 16 位像素值", async () => {
    const src = join(dir, "deep.png");
    await writeGrey16Png(src, 4, 2);
    const deep = await loadImage(src);
    expect(deep.depth).toBe("ushort");

    const rect = { x: 1, y: 0, width: 2, height: 2 };
    const report = await exportScreens(deep, [makeScreen(0, 1, 1, rect.x, rect.y, rect.width, rect.height)], dir, "deep", ".png");
    expect(report.succeededCount).toBe(1);

    const out = join(dir, "deep_screen_1-1.png");
    const meta = await sharp(out).metadata();
    expect(meta.depth).toBe("ushort");

    const expected = await sharp(src)
      .extract({ left: rect.x, top: rect.y, width: rect.width, height: rect.height })
      .raw({ depth: "ushort" })
      .toBuffer();
    const actual = await sharp(out).raw({ depth: "ushort" }).toBuffer();
    expect(actual.equals(expected)).toBe(true);

    const values: number[] = [];
    for (let i = 0; i + 1 < actual.length; i += 2) values.push(actual.readUInt16LE(i));
    expect(values).toHaveLength(4);
    expect(Math.max(...values)).toBeGreaterThan(255);
  });

  it("回调导出进度", async () => {
    const progress: number[] = [];
    await exportScreens(image, [makeScreen(0, 16, 9, 0, 0, 16, 9)], dir, "wallpaper", ".png", {
      onProgress: p => progress.push(p.done),
    });
    expect(progress).toEqual([0, 0, 1]);
  });
});

describe("summarizeExportReport", () => {
  const failure = (n: number) => ({
    screenId: n - 1,
    kind: "OutOfBounds" as const,
    message: `屏幕 ${n} 超出图片边界`,
  });

  it("成功数量、输出目录与错误明细", () => {
    const report: ExportReport = {
      succeededCount: 2,
      outputs: [],
      failures: [failure(3)],
    };
    expect(summarizeExportReport(report, "/out")).toBe(
      ["已导出 2 个屏幕", "", "保存位置：/out", "", "1 个错误", "", "屏幕 3 超出图片边界"].join("\n"),
    );
  });

  it("全部失败时只展示前 3 条错误", () => {
    const report: ExportReport = {
      succeededCount: 0,
      outputs: [],
      failures: [failure(1), failure(2), failure(3), failure(4), failure(5)],
    };
    expect(summarizeExportReport(report, "/out")).toBe(
      ["没有成功导出的屏幕", "", "屏幕 1 超出图片边界", "屏幕 2 超出图片边界", "屏幕 3 超出图片边界"].join("\n"),
    );
  });
});
