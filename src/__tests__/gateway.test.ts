// Tests for gateway/registry.ts and gateway/gateway.ts — routing, retries, abort handling.

import { describe, expect, it } from "vitest";

import { GatewayError } from "../core/errors.js";
import { AccessLevel, type AssembledMessage, type ModelDescriptor } from "../core/types.js";
import type { StreamEvent } from "../gateway/adapter.js";
import { ProviderGateway } from "../gateway/gateway.js";
import { ProviderRegistry } from "../gateway/registry.js";
import { reply, ScriptedAdapter, type ScriptStep } from "./fakes/scripted-adapter.js";

const MESSAGES: AssembledMessage[] = [
  { role: "system", content: [{ kind: "text", value: "sys" }] },
  { role: "user", content: [{ kind: "text", value: "hello" }] },
];

function model(name: string, provider: string, upstreamModel: string | null = null): ModelDescriptor {
  return { name, provider, upstreamModel, creditCost: 1, minAccessLevel: AccessLevel.Basic };
}

function setup(scripts: ScriptStep[][], maxRetries = 2) {
  const adapter = new ScriptedAdapter("fake", scripts);
  const registry = new ProviderRegistry([adapter]);
  registry.load([model("m1", "fake", "upstream-m1")]);
  const gateway = new ProviderGateway(registry, { maxRetries, retryBaseMs: 1 });
  return { adapter, registry, gateway };
}

async function collect(stream: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of stream) events.push(event);
  return events;
}

function run(gateway: ProviderGateway, signal = new AbortController().signal, modelName = "m1") {
  return collect(gateway.stream({ modelName, messages: MESSAGES, signal }));
}

describe("ProviderRegistry", () => {
  it("resolves routed models to their adapter and upstream id", () => {
    const { registry, adapter } = setup([]);
    expect(registry.resolve("m1")).toEqual({ adapter, upstreamModel: "upstream-m1" });
  });

  it("uses the public name when no upstream id is set", () => {
    const { registry } = setup([]);
    registry.route(model("m2", "fake"));
    expect(registry.resolve("m2")?.upstreamModel).toBe("m2");
  });

  it("leaves models of unconfigured providers unroutable", () => {
    const { registry } = setup([]);
    expect(registry.route(model("m3", "missing"))).toBe(false);
    expect(registry.resolve("m3")).toBeNull();
  });

  it("load replaces the routing table and counts routed models", () => {
    const { registry } = setup([]);
    expect(registry.load([model("a", "fake"), model("b", "missing")])).toBe(1);
    expect(registry.routedModels).toEqual(["a"]);
  });

  it("unroute removes a single model", () => {
    const { registry } = setup([]);
    registry.unroute("m1");
    expect(registry.resolve("m1")).toBeNull();
  });

  it("rejects duplicate adapter keys", () => {
    const { registry } = setup([]);
    expect(() => registry.registerAdapter(new ScriptedAdapter("fake", []))).toThrow(
      "Adapter 'fake' is already registered",
    );
  });
});

describe("ProviderGateway", () => {
  it("streams chunks then done, passing the upstream model id", async () => {
    const { gateway, adapter } = setup([reply("Hel", "lo")]);
    const events = await run(gateway);

    expect(events.map((e) => e.type)).toEqual(["chunk", "chunk", "done"]);
    expect(events[0]).toEqual({ type: "chunk", text: "Hel" });
    expect(adapter.calls).toHaveLength(1);
    expect(adapter.calls[0]?.modelName).toBe("upstream-m1");
    expect(adapter.calls[0]?.messages).toBe(MESSAGES);
  });

  it("fails with ModelUnknown for an unrouted model without calling any adapter", async () => {
    const { gateway, adapter } = setup([]);
    const events = await run(gateway, undefined, "nope");
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: "failed", error: { kind: "ModelUnknown" } });
    expect(adapter.calls).toHaveLength(0);
  });

  it("retries a retryable failure that happened before any output", async () => {
    const { gateway, adapter } = setup([[{ fail: "UpstreamUnavailable" }], reply("ok")]);
    const events = await run(gateway);
    expect(events.map((e) => e.type)).toEqual(["chunk", "done"]);
    expect(adapter.calls).toHaveLength(2);
  });

  it("classifies and retries thrown errors", async () => {
    const { gateway, adapter } = setup([[{ throws: new TypeError("socket hang up") }], reply("ok")]);
    const events = await run(gateway);
    expect(events.at(-1)?.type).toBe("done");
    expect(adapter.calls).toHaveLength(2);
  });

  it("gives up after maxRetries retries", async () => {
    const { gateway, adapter } = setup(
      [[{ fail: "RateLimited", retryAfterMs: 1 }], [{ fail: "RateLimited" }], [{ fail: "RateLimited" }]],
      2,
    );
    const events = await run(gateway);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: "failed", error: { kind: "RateLimited" } });
    expect(adapter.calls).toHaveLength(3);
  });

  it("does not retry fatal failures", async () => {
    const { gateway, adapter } = setup([[{ fail: "AuthError" }], reply("unused")]);
    const events = await run(gateway);
    expect(events[0]).toMatchObject({ type: "failed", error: { kind: "AuthError" } });
    expect(adapter.calls).toHaveLength(1);
  });

  it("does not retry once a chunk was emitted", async () => {
    const { gateway, adapter } = setup([
      [{ chunk: "a" }, { chunk: "b" }, { chunk: "c" }, { fail: "UpstreamUnavailable" }],
      reply("unused"),
    ]);
    const events = await run(gateway);
    expect(events.map((e) => e.type)).toEqual(["chunk", "chunk", "chunk", "failed"]);
    expect(adapter.calls).toHaveLength(1);
  });

  it("turns a stream that ends without a terminal event into InvalidResponse", async () => {
    const { gateway } = setup([[{ chunk: "partial" }]], 0);
    const events = await run(gateway);
    expect(events.at(-1)).toMatchObject({ type: "failed", error: { kind: "InvalidResponse" } });
  });

  it("ends with the abort reason when the signal fires mid-stream", async () => {
    const { gateway } = setup([[{ chunk: "a" }, { hang: true }]]);
    const controller = new AbortController();
    const events: StreamEvent[] = [];
    for await (const event of gateway.stream({ modelName: "m1", messages: MESSAGES, signal: controller.signal })) {
      events.push(event);
      if (event.type === "chunk") controller.abort(new GatewayError("Timeout", "too slow"));
    }
    expect(events.map((e) => e.type)).toEqual(["chunk", "failed"]);
    expect(events[1]).toMatchObject({ type: "failed", error: { kind: "Timeout" } });
  });

  it("stops waiting for a retry when aborted during backoff", async () => {
    const adapter = new ScriptedAdapter("fake", [[{ fail: "UpstreamUnavailable" }], reply("late")]);
    const registry = new ProviderRegistry([adapter]);
    registry.route(model("m1", "fake"));
    const gateway = new ProviderGateway(registry, { maxRetries: 2, retryBaseMs: 60_000 });
    const controller = new AbortController();

    const pending = run(gateway, controller.signal);
    setTimeout(() => controller.abort(), 5);
    const events = await pending;

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: "failed", error: { kind: "Cancelled" } });
    expect(adapter.calls).toHaveLength(1);
  });

  it("computes exponential backoff unless the provider asked for a delay", () => {
    const { gateway } = setup([]);
    const failure = new GatewayError("UpstreamUnavailable", "x");
    const throttled = new GatewayError("RateLimited", "x", { retryAfterMs: 250 });
    expect(gateway.backoffMs(1, failure)).toBe(1);
    expect(gateway.backoffMs(3, failure)).toBe(4);
    expect(gateway.backoffMs(2, throttled)).toBe(250);
  });
});
