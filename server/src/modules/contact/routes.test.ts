import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import { readFile, readdir } from "fs/promises";
import { join } from "path";
import type { FastifyInstance } from "fastify";
import type { AppConfig } from "../../config.js";
import type { Mailer, MailMessage } from "../../services/email.js";
import { buildApp } from "../../app.js";
import { tempConfig } from "../../testing/helpers.js";

describe("POST /contact", () => {
  let app: FastifyInstance;
  let config: AppConfig;
  let cleanup: () => Promise<void>;

  async function start(overrides: Partial<AppConfig>, mailer: Mailer | null = null) {
    const temp = await tempConfig(overrides);
    config = temp.config;
    cleanup = temp.cleanup;
    app = await buildApp(config, { mailer });
  }

  afterEach(async () => {
    await app.close();
    await cleanup();
  });

  it("saves the message and reports saved", async () => {
    await start({});
    const res = await app.inject({
      method: "POST",
      url: "/api/contact",
      payload: { name: " Alice ", email: "a@example.com", message: "hello" },
    });

    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), { status: "saved" });

    const files = await readdir(config.messagesDir);
    assert.equal(files.length, 1);
    assert.match(files[0] ?? "", /^\d{8}_\d{6}\.json$/);
    const saved = JSON.parse(await readFile(join(config.messagesDir, files[0] ?? ""), "utf8")) as Record<string, unknown>;
    assert.equal(saved.name, "Alice");
    assert.equal(saved.email, "a@example.com");
    assert.equal(saved.message, "hello");
    assert.match(String(saved.received_at), /Z$/);
  });

  it("rejects a blank field and writes nothing", async () => {
    await start({});
    const res = await app.inject({
      method: "POST",
      url: "/api/contact",
      payload: { name: "Alice", email: "a@example.com", message: "  " },
    });

    assert.equal(res.statusCode, 400);
    const body = res.json<{ error: string; fields: string[] }>();
    assert.equal(body.error, "name, email and message are required");
    assert.deepEqual(body.fields, ["name", "email", "message"]);
    await assert.rejects(readdir(config.messagesDir), { code: "ENOENT" });
  });

  it("rejects a request without a body", async () => {
    await start({});
    const res = await app.inject({ method: "POST", url: "/api/contact" });
    assert.equal(res.statusCode, 400);
    assert.equal(res.json<{ error: string }>().error, "name, email and message are required");
  });

  it("reports sent when the relay succeeds", async () => {
    const sent: MailMessage[] = [];
    const mailer: Mailer = {
      async send(message) {
        sent.push(message);
        return { sent: true };
      },
    };
    await start({ adminEmail: "owner@example.com" }, mailer);

    const res = await app.inject({
      method: "POST",
      url: "/api/contact",
      payload: { name: "Alice", email: "a@example.com", message: "hello" },
    });

    assert.deepEqual(res.json(), { status: "sent" });
    assert.equal(sent.length, 1);
    assert.equal(sent[0]?.subject, "Contact from Alice");
    assert.equal(sent[0]?.to, "owner@example.com");
  });

  it("still reports saved with a note when the relay fails", async () => {
    const mailer: Mailer = {
      async send() {
        return { sent: false, error: "smtp down" };
      },
    };
    await start({ adminEmail: "owner@example.com" }, mailer);

    const res = await app.inject({
      method: "POST",
      url: "/api/contact",
      payload: { name: "Alice", email: "a@example.com", message: "hello" },
    });

    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), { status: "saved", note: "Email delivery failed: smtp down" });
    assert.equal((await readdir(config.messagesDir)).length, 1);
  });

  it("does not relay without an admin address", async () => {
    let calls = 0;
    const mailer: Mailer = {
      async send() {
        calls++;
        return { sent: true };
      },
    };
    await start({ adminEmail: null }, mailer);

    const res = await app.inject({
      method: "POST",
      url: "/api/contact",
      payload: { name: "Alice", email: "a@example.com", message: "hello" },
    });

    assert.deepEqual(res.json(), { status: "saved" });
    assert.equal(calls, 0);
  });
});
