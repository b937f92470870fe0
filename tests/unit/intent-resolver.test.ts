import test from "node:test";
import assert from "node:assert/strict";
import { IntentResolver } from "../../src/llm/client";
import { SYSTEM_PROMPT } from "../../src/llm/tools";
import { silentLogger } from "../../src/utils/logger";
import { FakeChatBackend, completion, toolCall } from "../helpers/fakes";

const settings = { model: "test-model", temperature: 0.3, maxTokens: 1024 };

function resolverWith(backend: FakeChatBackend): IntentResolver {
  return new IntentResolver(backend, settings, silentLogger);
}

test("resolver sends system prompt, context and user text in order", async () => {
  const backend = new FakeChatBackend(completion({ content: "Hi there" }));
  await resolverWith(backend).resolve("what's next?", [
    { role: "user", content: "play something" },
    { role: "assistant", content: "Playing music" },
  ]);

  assert.equal(backend.requests.length, 1);
  assert.deepEqual(backend.requests[0].messages, [
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: "play something" },
    { role: "assistant", content: "Playing music" },
    { role: "user", content: "what's next?" },
  ]);
});

test("resolver registers the three tools with automatic choice", async () => {
  const backend = new FakeChatBackend(completion({ content: "ok" }));
  await resolverWith(backend).resolve("hello");

  const request = backend.requests[0];
  assert.equal(request.model, "test-model");
  assert.equal(request.temperature, 0.3);
  assert.equal(request.max_tokens, 1024);
  assert.equal(request.tool_choice, "auto");
  assert.deepEqual(
    request.tools?.map((t) => t.function.name),
    ["control_spotify", "manage_calendar", "general_query"]
  );
});

test("resolver returns plain text as a direct response", async () => {
  const backend = new FakeChatBackend(completion({ content: "It is sunny." }));
  assert.deepEqual(await resolverWith(backend).resolve("weather?"), {
    type: "direct_response",
    content: "It is sunny.",
  });
});

test("resolver treats a null message body as empty text", async () => {
  const backend = new FakeChatBackend(completion({ content: null }));
  assert.deepEqual(await resolverWith(backend).resolve("..."), { type: "direct_response", content: "" });
});

test("resolver parses the tool call arguments", async () => {
  const backend = new FakeChatBackend(
    completion({ tool_calls: [toolCall("control_spotify", '{"action":"search","query":"Imagine","type":"track"}')] })
  );
  assert.deepEqual(await resolverWith(backend).resolve("play Imagine"), {
    type: "tool_call",
    tool: "control_spotify",
    arguments: { action: "search", query: "Imagine", type: "track" },
  });
});

test("resolver honors only the first tool call", async () => {
  const backend = new FakeChatBackend(
    completion({
      tool_calls: [
        toolCall("control_spotify", '{"action":"pause"}', "call_1"),
        toolCall("manage_calendar", '{"action":"list"}', "call_2"),
      ],
    })
  );
  const intent = await resolverWith(backend).resolve("pause and show my calendar");
  assert.deepEqual(intent, { type: "tool_call", tool: "control_spotify", arguments: { action: "pause" } });
});

test("resolver keeps text sent alongside a tool call", async () => {
  const backend = new FakeChatBackend(
    completion({ content: "Pausing now", tool_calls: [toolCall("control_spotify", '{"action":"pause"}')] })
  );
  assert.deepEqual(await resolverWith(backend).resolve("pause"), {
    type: "tool_call",
    tool: "control_spotify",
    arguments: { action: "pause" },
    content: "Pausing now",
  });
});

test("resolver treats empty argument text as no arguments", async () => {
  const backend = new FakeChatBackend(completion({ tool_calls: [toolCall("general_query", "")] }));
  assert.deepEqual(await resolverWith(backend).resolve("hm"), {
    type: "tool_call",
    tool: "general_query",
    arguments: {},
  });
});

test("resolver reports malformed tool arguments as an error", async () => {
  const backend = new FakeChatBackend(completion({ tool_calls: [toolCall("control_spotify", '{"action":')] }));
  const intent = await resolverWith(backend).resolve("play");
  if (intent.type !== "error") assert.fail(`expected error, got ${intent.type}`);
  assert.match(intent.message, /^Invalid arguments for control_spotify: /);
});

test("resolver rejects tool arguments that are not an object", async () => {
  const backend = new FakeChatBackend(completion({ tool_calls: [toolCall("general_query", '["a","b"]')] }));
  assert.deepEqual(await resolverWith(backend).resolve("list"), {
    type: "error",
    message: "Invalid arguments for general_query: expected a JSON object",
  });
});

test("resolver converts model failures into an error intent", async () => {
  const backend = new FakeChatBackend(new Error("429 Rate limit reached"));
  assert.deepEqual(await resolverWith(backend).resolve("hello"), {
    type: "error",
    message: "429 Rate limit reached",
  });
  assert.equal(backend.requests.length, 1);
});

test("resolver reports an empty choice list", async () => {
  const empty = completion({ content: "unused" });
  empty.choices = [];
  const backend = new FakeChatBackend(empty);
  assert.deepEqual(await resolverWith(backend).resolve("hello"), {
    type: "error",
    message: "Language model returned no choices",
  });
});
