/**
 * Intent: one stream per request, forwarded in engine order, strictly serialized per session, parallel across sessions, and always closed by exactly one terminal event.
 * Scope: StreamMultiplexer.streamInvoke against a real SessionStore and scripted engines.
 * Non-Goals: Reaper timing and HTTP framing.
 */
import test from "node:test";
import assert from "node:assert/strict";
import { SessionStore } from "../../src/session/session.store";
import { NO_RESPONSE_FALLBACK, StreamMultiplexer } from "../../src/stream/stream.multiplexer";
import { isTerminalEvent } from "../../src/stream/stream.types";
import {
  collect,
  deferred,
  delay,
  echoScript,
  graphEndEvent,
  rootEndEvent,
  ScriptedEngine,
  stepEvent,
  tokenEvent,
  tokensOf,
  toolEndEvent,
  toolStartEvent,
  type EngineScript,
} from "../helpers/scripted_engine";

function makeMultiplexer(script: EngineScript = echoScript) {
  const engines = new Map<string, ScriptedEngine>();
  const logs: string[] = [];
  const store = new SessionStore({
    createEngine: (sessionId) => {
      const engine = new ScriptedEngine(script);
      engines.set(sessionId, engine);
      return engine;
    },
    onLog: (message) => logs.push(message),
  });
  const multiplexer = new StreamMultiplexer({ store, onLog: (message) => logs.push(message) });
  return { store, multiplexer, engines, logs };
}

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

test("forwarding: translated events arrive in engine order and end with complete", async () => {
  const { multiplexer } = makeMultiplexer(async function* () {
    yield stepEvent("agent");
    yield toolStartEvent("lookup");
    yield toolEndEvent("lookup", "3 matches");
    yield stepEvent("agent");
    yield tokenEvent("Found ");
    yield tokenEvent("3.");
    yield rootEndEvent();
  });

  const events = await collect(multiplexer.streamInvoke("s1", "search"));

  assert.deepEqual(events, [
    { type: "stepUpdate", name: "agent" },
    { type: "toolStart", name: "lookup" },
    { type: "toolEnd", name: "lookup", preview: "3 matches" },
    { type: "stepUpdate", name: "agent" },
    { type: "token", text: "Found " },
    { type: "token", text: "3." },
    { type: "complete" },
  ]);
});

test("forwarding: unknown raw events are dropped without ending the stream", async () => {
  const { multiplexer } = makeMultiplexer(async function* () {
    yield { event: "on_custom_event", name: "progress", data: { chunk: "halfway" } };
    yield tokenEvent("done");
    yield { event: "on_retriever_start", name: "docs" };
  });

  const events = await collect(multiplexer.streamInvoke("s1", "go"));

  assert.deepEqual(events, [{ type: "token", text: "done" }, { type: "complete" }]);
});

test("forwarding: the graph run end completes the stream even if the engine keeps yielding", async () => {
  const { multiplexer, engines } = makeMultiplexer(async function* () {
    yield { event: "on_chain_start", name: "agent", metadata: { thread_id: "g", langgraph_node: "agent" } };
    yield tokenEvent("hi");
    yield {
      event: "on_chain_end",
      name: "agent",
      data: { output: {} },
      metadata: { thread_id: "g", langgraph_node: "agent" },
    };
    yield graphEndEvent("g");
    yield tokenEvent("after end");
  });

  const events = await collect(multiplexer.streamInvoke("g", "hello"));

  assert.deepEqual(events, [
    { type: "stepUpdate", name: "agent" },
    { type: "token", text: "hi" },
    { type: "complete" },
  ]);
  assert.equal(engines.get("g")?.active, 0);
});

test("fallback: a run without tokens yields the fallback text before complete", async () => {
  const { multiplexer } = makeMultiplexer(async function* () {
    yield stepEvent("agent");
    yield rootEndEvent();
  });

  const events = await collect(multiplexer.streamInvoke("quiet", "hello"));

  assert.deepEqual(events, [
    { type: "stepUpdate", name: "agent" },
    { type: "token", text: NO_RESPONSE_FALLBACK },
    { type: "complete" },
  ]);
});

test("validation: blank ids or messages yield a single error and never touch the store", async () => {
  const { multiplexer, store } = makeMultiplexer();

  assert.deepEqual(await collect(multiplexer.streamInvoke("   ", "hello")), [
    { type: "error", message: "INVALID_INPUT sessionId must be non-empty" },
  ]);
  assert.deepEqual(await collect(multiplexer.streamInvoke("s1", " \n ")), [
    { type: "error", message: "INVALID_INPUT message must be non-empty" },
  ]);
  assert.equal(store.size, 0);
});

test("counters: lastAccessedAt and messageCount are updated before the engine runs", async () => {
  let seenCount = -1;
  let seenActive = false;
  const { multiplexer, store } = makeMultiplexer(async function* () {
    const record = store.get("s1");
    seenCount = record?.messageCount ?? -1;
    seenActive = record?.active ?? false;
    yield tokenEvent("ok");
  });

  await collect(multiplexer.streamInvoke("s1", "first"));
  assert.equal(seenCount, 1);
  assert.equal(seenActive, true);

  await collect(multiplexer.streamInvoke("s1", "second"));
  assert.equal(seenCount, 2);
});

test("engine errors: a thrown engine error ends the stream with one error event and is logged", async () => {
  const { multiplexer, logs, store } = makeMultiplexer(async function* () {
    yield tokenEvent("partial");
    throw new Error("upstream 503");
  });

  const events = await collect(multiplexer.streamInvoke("s1", "hello"));

  assert.deepEqual(events, [
    { type: "token", text: "partial" },
    { type: "error", message: "upstream 503" },
  ]);
  assert.deepEqual(logs, ["ENGINE_INVOKE_ERROR session=s1: upstream 503"]);
  assert.equal(store.lockOf("s1")?.isLocked(), false);
});

test("engine errors: an error event from the engine ends the stream without complete", async () => {
  const { multiplexer, engines } = makeMultiplexer(async function* () {
    yield tokenEvent("a");
    yield { event: "on_chain_error", name: "agent", data: { error: new Error("tool exploded") } };
    yield tokenEvent("never forwarded");
  });

  const events = await collect(multiplexer.streamInvoke("s1", "hello"));

  assert.deepEqual(events, [
    { type: "token", text: "a" },
    { type: "error", message: "tool exploded" },
  ]);
  assert.equal(engines.get("s1")?.active, 0);
});

test("engine errors: a failing engine factory yields an error event and is logged", async () => {
  const logs: string[] = [];
  const store = new SessionStore({
    createEngine: () => {
      throw new Error("no model configured");
    },
  });
  const multiplexer = new StreamMultiplexer({ store, onLog: (message) => logs.push(message) });

  const events = await collect(multiplexer.streamInvoke("s1", "hello"));

  assert.deepEqual(events, [{ type: "error", message: "no model configured" }]);
  assert.deepEqual(logs, ["SESSION_ACQUIRE_ERROR session=s1: no model configured"]);
  assert.equal(store.size, 0);
});

test("serialization: N concurrent streams on one session run N invocations one at a time", async () => {
  const { multiplexer, engines, store } = makeMultiplexer(async function* (message) {
    yield tokenEvent(`${message}:start`);
    await delay(2);
    yield tokenEvent(`${message}:end`);
  });
  const messages = ["m0", "m1", "m2", "m3", "m4"];

  const results = await Promise.all(
    messages.map((message) => collect(multiplexer.streamInvoke("shared", message)))
  );

  const engine = engines.get("shared");
  assert.ok(engine);
  assert.equal(engines.size, 1);
  assert.equal(engine.messages.length, messages.length);
  assert.equal(engine.maxActive, 1);
  assert.deepEqual([...engine.messages].sort(), messages);
  results.forEach((events, index) => {
    assert.equal(tokensOf(events), `m${index}:startm${index}:end`);
    assert.equal(events.filter(isTerminalEvent).length, 1);
    assert.deepEqual(events.at(-1), { type: "complete" });
  });
  assert.equal(store.get("shared")?.messageCount, messages.length);
});

test("parallelism: a blocked session does not delay another session", async () => {
  const gate = deferred();
  const { multiplexer } = makeMultiplexer(async function* (message) {
    if (message === "slow") {
      await gate.promise;
    }
    yield tokenEvent(message);
  });

  const slow = collect(multiplexer.streamInvoke("A", "slow"));
  const fast = await collect(multiplexer.streamInvoke("B", "fast"));

  assert.deepEqual(fast, [{ type: "token", text: "fast" }, { type: "complete" }]);
  gate.resolve();
  assert.deepEqual(await slow, [{ type: "token", text: "slow" }, { type: "complete" }]);
});

test("cancellation: aborting mid-stream emits STREAM_CANCELLED and frees the session", async () => {
  const { multiplexer, store, engines } = makeMultiplexer(async function* (message, call, signal) {
    yield tokenEvent(`${message}:first`);
    if (call === 1) {
      await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
    }
    yield tokenEvent(`${message}:second`);
  });
  const controller = new AbortController();

  const stream = multiplexer.streamInvoke("c", "one", { signal: controller.signal });
  assert.deepEqual((await stream.next()).value, { type: "token", text: "one:first" });
  controller.abort();
  assert.deepEqual((await stream.next()).value, { type: "error", message: "STREAM_CANCELLED" });
  assert.equal((await stream.next()).done, true);
  await tick();

  assert.equal(store.lockOf("c")?.isLocked(), false);
  assert.equal(engines.get("c")?.active, 0);
  const next = await collect(multiplexer.streamInvoke("c", "two"));
  assert.deepEqual(next, [
    { type: "token", text: "two:first" },
    { type: "token", text: "two:second" },
    { type: "complete" },
  ]);
});

test("cancellation: aborting while queued behind another call never runs the engine", async () => {
  const gate = deferred();
  const { multiplexer, engines, store } = makeMultiplexer(async function* (message) {
    yield tokenEvent(`${message}:started`);
    await gate.promise;
  });
  const controller = new AbortController();

  const holder = multiplexer.streamInvoke("q", "holder");
  assert.deepEqual((await holder.next()).value, { type: "token", text: "holder:started" });

  const queued = multiplexer.streamInvoke("q", "queued", { signal: controller.signal });
  const pending = queued.next();
  await tick();
  controller.abort();

  assert.deepEqual((await pending).value, { type: "error", message: "STREAM_CANCELLED" });
  assert.equal((await queued.next()).done, true);

  gate.resolve();
  const rest = await collect(holder);
  await tick();
  assert.deepEqual(rest, [{ type: "complete" }]);
  assert.deepEqual(engines.get("q")?.messages, ["holder"]);
  assert.equal(store.get("q")?.messageCount, 1);
  assert.equal(store.lockOf("q")?.isLocked(), false);
});

test("cancellation: a signal aborted up front yields STREAM_CANCELLED without invoking the engine", async () => {
  const { multiplexer, engines } = makeMultiplexer();
  const controller = new AbortController();
  controller.abort();

  const events = await collect(multiplexer.streamInvoke("early", "hello", { signal: controller.signal }));

  assert.deepEqual(events, [{ type: "error", message: "STREAM_CANCELLED" }]);
  assert.deepEqual(engines.get("early")?.messages, []);
});

test("consumer return: breaking out of the loop stops the engine and releases the lock", async () => {
  const { multiplexer, store, engines } = makeMultiplexer(async function* () {
    yield tokenEvent("one");
    yield tokenEvent("two");
    yield tokenEvent("three");
  });

  const seen: string[] = [];
  for await (const event of multiplexer.streamInvoke("b", "hi")) {
    if (event.type === "token") {
      seen.push(event.text);
    }
    break;
  }

  assert.deepEqual(seen, ["one"]);
  assert.equal(store.lockOf("b")?.isLocked(), false);
  assert.equal(engines.get("b")?.active, 0);
  assert.equal(store.get("b")?.messageCount, 1);
});

test("re-resolve: a session closed while a caller waits is recreated for that caller", async () => {
  const gate = deferred();
  const { multiplexer, store, engines } = makeMultiplexer(async function* (message) {
    if (message === "holder") {
      await gate.promise;
    }
    yield tokenEvent(message);
  });

  const holder = collect(multiplexer.streamInvoke("r", "holder"));
  await tick();
  const waiter = collect(multiplexer.streamInvoke("r", "waiter"));
  await tick();

  const original = store.get("r");
  const removed = store.remove("r");
  gate.resolve();
  assert.equal(await removed, true);
  await holder;
  const events = await waiter;

  assert.deepEqual(events, [{ type: "token", text: "waiter" }, { type: "complete" }]);
  const recreated = store.get("r");
  assert.ok(recreated);
  assert.notEqual(recreated, original);
  assert.equal(recreated.messageCount, 1);
  assert.equal(original?.active, false);
  assert.ok(engines.get("r"));
});
