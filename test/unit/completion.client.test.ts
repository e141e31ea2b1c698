import assert from "node:assert/strict";
import test from "node:test";
import { ConfigurationError } from "../../src/errors";
import { AzureOpenAiCompletionClient } from "../../src/services/llm/completion.client";
import { ApiKeyCredentialProvider } from "../../src/services/llm/credentials";
import { collect } from "../support/chat.fakes";

const ENDPOINT = "https://relay-test.openai.azure.com/";

function sseChunk(delta: Record<string, unknown>, finishReason: string | null = null): string {
  return `data: ${JSON.stringify({
    id: "chatcmpl-test",
    object: "chat.completion.chunk",
    created: 1767225600,
    model: "gpt-test",
    choices: [{ index: 0, delta, finish_reason: finishReason }],
  })}\n\n`;
}

interface CapturedRequest {
  url: string;
  headers: Headers;
  body: Record<string, unknown>;
}

function fakeFetch(respond: () => Response): {
  fetch: typeof fetch;
  requests: CapturedRequest[];
} {
  const requests: CapturedRequest[] = [];
  const fetchStub: typeof fetch = async (input, init) => {
    requests.push({
      url: String(input),
      headers: new Headers(init?.headers),
      body: JSON.parse(String(init?.body)) as Record<string, unknown>,
    });
    return respond();
  };

  return { fetch: fetchStub, requests };
}

function buildClient(fetchStub: typeof fetch, endpoint = ENDPOINT) {
  return new AzureOpenAiCompletionClient({
    endpoint,
    apiVersion: "2024-02-15-preview",
    credentials: new ApiKeyCredentialProvider("test-key"),
    fetch: fetchStub,
  });
}

test("streamChat yields one data event per provider delta, then end", async () => {
  const { fetch: fetchStub, requests } = fakeFetch(
    () =>
      new Response(
        sseChunk({ role: "assistant", content: "¡" })
          + sseChunk({ content: "Hola!" })
          + sseChunk({}, "stop")
          + "data: [DONE]\n\n",
        { status: 200, headers: { "content-type": "text/event-stream" } },
      ),
  );

  const events = await collect(
    buildClient(fetchStub).streamChat({
      model: "gpt-test",
      messages: [
        { role: "system", content: "You are a test coach." },
        { role: "user", content: "Hola" },
      ],
    }),
  );

  assert.deepEqual(events, [
    { type: "data", content: "¡" },
    { type: "data", content: "Hola!" },
    { type: "end" },
  ]);

  assert.equal(requests.length, 1);
  const url = new URL(requests[0].url);
  assert.equal(url.origin, "https://relay-test.openai.azure.com");
  assert.equal(url.pathname, "/openai/deployments/gpt-test/chat/completions");
  assert.equal(url.searchParams.get("api-version"), "2024-02-15-preview");
  assert.equal(requests[0].headers.get("api-key"), "test-key");
  assert.equal(requests[0].body.stream, true);
  assert.deepEqual(requests[0].body.messages, [
    { role: "system", content: "You are a test coach." },
    { role: "user", content: "Hola" },
  ]);
});

test("streamChat reports a provider failure as a final error event without retrying", async () => {
  const { fetch: fetchStub, requests } = fakeFetch(
    () =>
      new Response(
        JSON.stringify({ error: { message: "deployment overloaded", type: "server_error" } }),
        { status: 500, headers: { "content-type": "application/json" } },
      ),
  );

  const events = await collect(
    buildClient(fetchStub).streamChat({
      model: "gpt-test",
      messages: [{ role: "user", content: "Hola" }],
    }),
  );

  assert.equal(requests.length, 1);
  assert.equal(events.length, 1);
  const [event] = events;
  assert.equal(event.type, "error");
  assert.match(event.type === "error" ? event.reason : "", /deployment overloaded/);
});

test("streamChat rejects unknown roles in-band without calling the provider", async () => {
  const { fetch: fetchStub, requests } = fakeFetch(() => new Response("", { status: 200 }));

  const events = await collect(
    buildClient(fetchStub).streamChat({
      model: "gpt-test",
      messages: [{ role: "tool", content: "{}" }],
    }),
  );

  assert.deepEqual(events, [{ type: "error", reason: "Unsupported message role: tool" }]);
  assert.equal(requests.length, 0);
});

test("streamChat throws ConfigurationError at call time when the endpoint or deployment is missing", () => {
  const { fetch: fetchStub, requests } = fakeFetch(() => new Response("", { status: 200 }));

  assert.throws(
    () => buildClient(fetchStub, "").streamChat({ model: "gpt-test", messages: [] }),
    (error: unknown) =>
      error instanceof ConfigurationError
      && error.message === "AZURE_OPENAI_ENDPOINT is required for Azure OpenAI",
  );
  assert.throws(
    () => buildClient(fetchStub).streamChat({ model: " ", messages: [] }),
    (error: unknown) =>
      error instanceof ConfigurationError
      && error.message === "AZURE_OPENAI_CHAT_DEPLOYMENT is required for Azure OpenAI",
  );
  assert.equal(requests.length, 0);
});
