import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { copyFile, mkdtemp, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  commandRuns,
  detectThumbnailer,
  generateThumbnail,
  thumbnailName,
  type Thumbnailer,
} from "./thumbnails.js";

describe("generateThumbnail", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "folio-thumbs-"));
    await writeFile(join(dir, "20261019_083005_pic.png"), "image");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reports unavailable without a thumbnailer", async () => {
    const result = await generateThumbnail(null, dir, "20261019_083005_pic.png", 1200);
    assert.deepEqual(result, { status: "unavailable" });
  });

  it("writes thumb_ beside the original", async () => {
    const sizes: number[] = [];
    const copier: Thumbnailer = {
      name: "copy",
      async create(src, dest, maxSize) {
        sizes.push(maxSize);
        await copyFile(src, dest);
      },
    };

    const result = await generateThumbnail(copier, dir, "20261019_083005_pic.png", 1200);

    assert.deepEqual(result, { status: "created", filename: "thumb_20261019_083005_pic.png" });
    assert.deepEqual(sizes, [1200]);
    assert.deepEqual((await readdir(dir)).sort(), [
      "20261019_083005_pic.png",
      "thumb_20261019_083005_pic.png",
    ]);
  });

  it("turns a failure into a result and cleans up", async () => {
    const broken: Thumbnailer = {
      name: "broken",
      async create(_src, dest) {
        await writeFile(dest, "partial");
        throw new Error("decode failed");
      },
    };

    const result = await generateThumbnail(broken, dir, "20261019_083005_pic.png", 1200);

    assert.deepEqual(result, { status: "failed", error: "decode failed" });
    assert.deepEqual(await readdir(dir), ["20261019_083005_pic.png"]);
  });
});

describe("thumbnailName", () => {
  it("prefixes the stored name", () => {
    assert.equal(thumbnailName("a.png"), "thumb_a.png");
  });
});

describe("capability detection", () => {
  it("finds a runnable command", async () => {
    assert.equal(await commandRuns(process.execPath, ["--version"]), true);
  });

  it("treats a non-zero exit as not runnable", async () => {
    assert.equal(await commandRuns(process.execPath, ["-e", "process.exit(3)"]), false);
  });

  it("returns null when ffmpeg is missing", async () => {
    assert.equal(await detectThumbnailer(join(tmpdir(), "no-such-ffmpeg-binary")), null);
  });
});
