import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { buildServer } from "../../src/server";
import { MemoryConversationStore } from "../../src/services/conversations/store";
import { ScriptedCompletionClient, testConfig } from "../support/chat.fakes";

const chatOptions = () => ({
  config: testConfig(),
  store: new MemoryConversationStore(),
  completionClient: new ScriptedCompletionClient([]),
});

test("GET / serves the bundled landing page", async () => {
  const app = await buildServer({ chat: chatOptions() });

  const response = await app.inject({ method: "GET", url: "/" });

  assert.equal(response.statusCode, 200);
  assert.match(String(response.headers["content-type"]), /^text\/html; charset=utf-8$/i);
  assert.match(response.payload, /<title>Amigo<\/title>/);

  await app.close();
});

test("GET / does not depend on the working directory", async () => {
  const previousCwd = process.cwd();
  process.chdir(os.tmpdir());

  try {
    const app = await buildServer({ chat: chatOptions() });

    const response = await app.inject({ method: "GET", url: "/" });

    assert.equal(response.statusCode, 200);
    assert.match(response.payload, /<title>Amigo<\/title>/);

    await app.close();
  } finally {
    process.chdir(previousCwd);
  }
});

test("GET / serves index.html from a configured root", async () => {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "chat-relay-home-"));
  fs.writeFileSync(path.join(root, "index.html"), "<p>test landing</p>", "utf8");

  const app = await buildServer({ chat: chatOptions(), home: { root } });

  const response = await app.inject({ method: "GET", url: "/" });

  assert.equal(response.statusCode, 200);
  assert.equal(response.payload, "<p>test landing</p>");

  await app.close();
});
