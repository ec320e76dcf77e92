import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import { copyFile, mkdir, readdir, symlink, writeFile } from "fs/promises";
import { join } from "path";
import type { FastifyInstance } from "fastify";
import type { AppConfig } from "../../config.js";
import type { Thumbnailer } from "../../services/thumbnails.js";
import { buildApp } from "../../app.js";
import { multipartPayload, tempConfig } from "../../testing/helpers.js";

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 1, 2, 3]);

describe("upload routes", () => {
  let app: FastifyInstance;
  let config: AppConfig;
  let cleanup: () => Promise<void>;

  async function start(overrides: Partial<AppConfig> = {}, thumbnailer: Thumbnailer | null = null) {
    const temp = await tempConfig(overrides);
    config = temp.config;
    cleanup = temp.cleanup;
    app = await buildApp(config, { thumbnailer });
  }

  function upload(filename: string, content: Buffer | string = PNG_BYTES) {
    const { payload, headers } = multipartPayload([
      { name: "file", filename, contentType: "image/png", content },
    ]);
    return app.inject({ method: "POST", url: "/api/uploads", payload, headers });
  }

  afterEach(async () => {
    await app.close();
    await cleanup();
  });

  it("stores one timestamped file and serves it back", async () => {
    await start();
    const res = await upload("My Photo.png");

    assert.equal(res.statusCode, 201);
    const body = res.json<{ url: string; thumbnail_url: string | null }>();
    assert.match(body.url, /^\/api\/uploads\/\d{8}_\d{6}_My_Photo\.png$/);
    assert.equal(body.thumbnail_url, null);

    const files = await readdir(config.uploadsDir);
    assert.deepEqual(files, [body.url.slice("/api/uploads/".length)]);

    const served = await app.inject({ method: "GET", url: body.url });
    assert.equal(served.statusCode, 200);
    assert.equal(served.headers["content-type"], "image/png");
    assert.deepEqual(served.rawPayload, PNG_BYTES);
  });

  it("stores a file with a very long name", async () => {
    await start();
    const res = await upload(`${"a".repeat(250)}.png`);

    assert.equal(res.statusCode, 201);
    const body = res.json<{ url: string; thumbnail_url: string | null }>();
    assert.match(body.url, /^\/api\/uploads\/\d{8}_\d{6}_a{225}\.png$/);
    const served = await app.inject({ method: "GET", url: body.url });
    assert.equal(served.statusCode, 200);
  });

  it("returns a thumbnail url when a thumbnail is made", async () => {
    const copier: Thumbnailer = {
      name: "copy",
      async create(src, dest) {
        await copyFile(src, dest);
      },
    };
    await start({}, copier);

    const body = (await upload("pic.jpg")).json<{ url: string; thumbnail_url: string | null }>();
    const stored = body.url.slice("/api/uploads/".length);
    assert.equal(body.thumbnail_url, `/api/uploads/thumb_${stored}`);

    const thumb = await app.inject({ method: "GET", url: body.thumbnail_url ?? "" });
    assert.equal(thumb.statusCode, 200);
    assert.equal(thumb.headers["content-type"], "image/jpeg");
  });

  it("still succeeds when thumbnailing fails", async () => {
    const broken: Thumbnailer = {
      name: "broken",
      async create() {
        throw new Error("unsupported pixel format");
      },
    };
    await start({}, broken);

    const res = await upload("pic.webp");
    assert.equal(res.statusCode, 201);
    assert.equal(res.json<{ thumbnail_url: string | null }>().thumbnail_url, null);
    assert.equal((await readdir(config.uploadsDir)).length, 1);
  });

  it("rejects disallowed extensions without writing", async () => {
    await start();
    for (const name of ["setup.exe", "anim.gif"]) {
      const res = await upload(name);
      assert.equal(res.statusCode, 400);
      assert.deepEqual(res.json(), { error: "File type not allowed" });
    }
    await assert.rejects(readdir(config.uploadsDir), { code: "ENOENT" });
  });

  it("honours a configured allow-set case-insensitively", async () => {
    await start({ allowedExtensions: ["gif"] });
    assert.equal((await upload("ANIM.GIF")).statusCode, 201);
    assert.equal((await upload("pic.png")).statusCode, 400);
  });

  it("rejects an oversized file without writing", async () => {
    await start({ maxUploadBytes: 10, maxUploadMb: 1 });
    const res = await upload("big.png", Buffer.alloc(64, 1));

    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json(), { error: "File too large (max 1MB)" });
    assert.deepEqual(await readdir(config.uploadsDir), []);
  });

  it("rejects a request without a file part", async () => {
    await start();
    const { payload, headers } = multipartPayload([{ name: "note", content: "hi" }]);
    const res = await app.inject({ method: "POST", url: "/api/uploads", payload, headers });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json(), { error: "No file uploaded" });
  });

  it("rejects a non-multipart request", async () => {
    await start();
    const res = await app.inject({ method: "POST", url: "/api/uploads", payload: { file: "x" } });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json(), { error: "No file uploaded" });
  });

  describe("serving", () => {
    it("rejects traversal and hidden names", async () => {
      await start();
      for (const url of ["/api/uploads/..%2F..%2Fsecret.json", "/api/uploads/.env", "/api/uploads/a/b.png"]) {
        const res = await app.inject({ method: "GET", url });
        assert.equal(res.statusCode, 400, url);
        assert.deepEqual(res.json(), { error: "Invalid path" });
      }
    });

    it("returns 404 for a missing file", async () => {
      await start();
      const res = await app.inject({ method: "GET", url: "/api/uploads/20260101_000000_none.png" });
      assert.equal(res.statusCode, 404);
    });

    it("does not follow a symlink out of the uploads directory", async () => {
      await start();
      await mkdir(config.uploadsDir, { recursive: true });
      const outside = join(config.dataDir, "private.png");
      await writeFile(outside, "secret");
      await symlink(outside, join(config.uploadsDir, "link.png"));

      const res = await app.inject({ method: "GET", url: "/api/uploads/link.png" });
      assert.equal(res.statusCode, 404);
    });
  });
});
