import { describe, it, expect, beforeEach } from "vitest";
import { ConnectionRegistry } from "../src/connectionRegistry.mjs";
import { OversizedContentError } from "../src/errors.mjs";
import { silentLogger } from "../src/logger.mjs";
import { SyncHub, createSyncHub } from "../src/syncHub.mjs";
import type { SyncHubOptions } from "../src/syncHub.mjs";
import { FakeChannel, MemoryStore, spyLogger } from "./helpers.mjs";

function at(seconds: number): Date {
  return new Date(Date.UTC(2024, 4, 1, 10, 0, seconds));
}

function hubWith(overrides: Partial<SyncHubOptions> = {}): SyncHub {
  return new SyncHub({
    store: new MemoryStore(),
    logger: silentLogger,
    maxContentBytes: 1024,
    sendTimeoutMs: 50,
    ...overrides
  });
}

describe("SyncHub - edits", () => {
  let store: MemoryStore;
  let hub: SyncHub;

  beforeEach(() => {
    store = new MemoryStore();
    hub = hubWith({ store });
  });

  it("ends on the last edit of a sequence, whatever the number of sessions", async () => {
    for (let i = 0; i < 3; i++) await hub.connect(new FakeChannel());

    await hub.onEdit({ content: "one", userId: "a", timestamp: at(1) });
    await hub.onEdit({ content: "two", userId: "b", timestamp: at(2) });
    await hub.onEdit({ content: "three", userId: "c", timestamp: at(3) });

    expect(hub.read()).toEqual({ content: "three", lastModified: at(3), lastEditor: "c" });
    expect(store.text).toBe("three");
  });

  it("persists before resolving", async () => {
    await hub.onEdit({ content: "saved", userId: "a", timestamp: at(1) });
    expect(store.saved).toEqual(["saved"]);
  });

  it("lets B's later edit overwrite A's entirely", async () => {
    const a = new FakeChannel();
    const b = new FakeChannel();
    const sessionA = await hub.connect(a, "a");
    const sessionB = await hub.connect(b, "b");

    await hub.onEdit({ content: "hello", userId: "a", timestamp: at(1), origin: sessionA.id });

    const first = {
      type: "text_update",
      content: "hello",
      user_id: "a",
      timestamp: at(1).toISOString()
    };
    expect(a.ofType("text_update")).toEqual([{ ...first, echo: true }]);
    expect(b.ofType("text_update")).toEqual([{ ...first, echo: false }]);

    await hub.onEdit({ content: "hello world", userId: "b", timestamp: at(2), origin: sessionB.id });

    expect(hub.read()).toEqual({ content: "hello world", lastModified: at(2), lastEditor: "b" });
    expect(a.ofType("text_update").map((m) => [m.content, m.echo])).toEqual([
      ["hello", true],
      ["hello world", false]
    ]);
    expect(b.ofType("text_update").map((m) => [m.content, m.echo])).toEqual([
      ["hello", false],
      ["hello world", true]
    ]);
  });

  it("delivers one edit exactly once to each of N sessions", async () => {
    const channels = Array.from({ length: 5 }, () => new FakeChannel());
    for (const channel of channels) await hub.connect(channel);

    await hub.onEdit({ content: "fan-out", userId: "a", timestamp: at(1) });

    for (const channel of channels) {
      expect(channel.ofType("text_update").map((m) => m.content)).toEqual(["fan-out"]);
    }
  });

  it("tags nobody's copy as an echo when the edit came over HTTP", async () => {
    const a = new FakeChannel();
    await hub.connect(a, "a");

    await hub.onEdit({ content: "rest", userId: "a", timestamp: at(1) });

    expect(a.ofType("text_update")[0]?.echo).toBe(false);
  });

  it("does not replay a finished broadcast to a later session", async () => {
    await hub.connect(new FakeChannel());
    await hub.onEdit({ content: "before you came", userId: "a", timestamp: at(1) });

    const late = new FakeChannel();
    await hub.connect(late);

    expect(late.ofType("text_update")).toEqual([]);
    expect(late.ofType("initial_state")).toEqual([
      {
        type: "initial_state",
        content: "before you came",
        last_updated: at(1).toISOString(),
        last_editor: "a",
        user_count: 2
      }
    ]);
  });

  it("keeps arrival order for edits submitted without waiting", async () => {
    const slowStore = new MemoryStore("", 5);
    const slowHub = hubWith({ store: slowStore });
    const channel = new FakeChannel();
    await slowHub.connect(channel);

    await Promise.all([
      slowHub.onEdit({ content: "one", userId: "a", timestamp: at(1) }),
      slowHub.onEdit({ content: "two", userId: "b", timestamp: at(2) }),
      slowHub.onEdit({ content: "three", userId: "c", timestamp: at(3) })
    ]);

    expect(slowStore.saved).toEqual(["one", "two", "three"]);
    expect(channel.ofType("text_update").map((m) => m.content)).toEqual(["one", "two", "three"]);
    expect(slowHub.read().content).toBe("three");
  });
});

describe("SyncHub - rejected edits", () => {
  it("rejects oversized content without touching state", async () => {
    const store = new MemoryStore("seed");
    const hub = await createSyncHub({ store, logger: silentLogger, maxContentBytes: 5, sendTimeoutMs: 50 });
    const channel = new FakeChannel();
    await hub.connect(channel);

    await expect(hub.onEdit({ content: "toolong", userId: "a", timestamp: at(1) })).rejects.toBeInstanceOf(
      OversizedContentError
    );

    expect(hub.read().content).toBe("seed");
    expect(store.saved).toEqual([]);
    expect(channel.ofType("text_update")).toEqual([]);
  });

  it("measures the bound in UTF-8 bytes", async () => {
    const hub = hubWith({ maxContentBytes: 5 });

    // three characters, six bytes
    await expect(hub.onEdit({ content: "ééé", userId: "a", timestamp: at(1) })).rejects.toMatchObject({
      code: "OVERSIZED_CONTENT",
      size: 6,
      limit: 5
    });
    await expect(hub.onEdit({ content: "éé", userId: "a", timestamp: at(1) })).resolves.toMatchObject({
      content: "éé"
    });
  });

  it("keeps serving after a rejected edit", async () => {
    const hub = hubWith({ maxContentBytes: 3 });

    await expect(hub.onEdit({ content: "four", userId: "a", timestamp: at(1) })).rejects.toThrow();
    await hub.onEdit({ content: "ok", userId: "a", timestamp: at(2) });

    expect(hub.read().content).toBe("ok");
  });
});

describe("SyncHub - persistence failures", () => {
  it("broadcasts anyway and loses the update on restart", async () => {
    const store = new MemoryStore("before");
    const logger = spyLogger();
    const hub = await createSyncHub({ store, logger, maxContentBytes: 1024, sendTimeoutMs: 50 });
    const a = new FakeChannel();
    const b = new FakeChannel();
    await hub.connect(a);
    await hub.connect(b);

    store.failSaves = true;
    await hub.onEdit({ content: "after", userId: "a", timestamp: at(1) });

    expect(hub.read().content).toBe("after");
    expect(a.ofType("text_update").map((m) => m.content)).toEqual(["after"]);
    expect(b.ofType("text_update").map((m) => m.content)).toEqual(["after"]);
    expect(logger.error).toHaveBeenCalledTimes(1);

    const restarted = await createSyncHub({ store, logger: silentLogger, maxContentBytes: 1024, sendTimeoutMs: 50 });
    expect(restarted.read().content).toBe("before");
  });

  it("starts empty when the store cannot be read", async () => {
    const store = new MemoryStore("unreachable");
    store.failLoads = true;
    const logger = spyLogger();

    const hub = await createSyncHub({ store, logger, maxContentBytes: 1024, sendTimeoutMs: 50 });

    expect(hub.read().content).toBe("");
    expect(logger.warn).toHaveBeenCalledWith("Cannot read memory, starting from an empty document");
  });

  it("does not hide unexpected load failures", async () => {
    const store = new MemoryStore();
    store.load = () => Promise.reject(new TypeError("bug"));

    await expect(
      createSyncHub({ store, logger: silentLogger, maxContentBytes: 1024, sendTimeoutMs: 50 })
    ).rejects.toBeInstanceOf(TypeError);
  });
});

describe("SyncHub - sessions", () => {
  let registry: ConnectionRegistry;
  let hub: SyncHub;

  beforeEach(() => {
    registry = new ConnectionRegistry();
    hub = hubWith({ registry, sendTimeoutMs: 20 });
  });

  it("greets a new session with the state and tells everyone the count", async () => {
    const a = new FakeChannel();
    await hub.connect(a, "a");
    const b = new FakeChannel();
    const session = await hub.connect(b, "b");

    expect(a.messages().map((m) => m.type)).toEqual(["initial_state", "user_count_update", "user_count_update"]);
    expect(a.last()).toEqual({ type: "user_count_update", user_count: 2 });
    expect(b.messages().map((m) => m.type)).toEqual(["initial_state", "user_count_update"]);
    expect(registry.get(session.id)?.userId).toBe("b");
  });

  it("announces a disconnect to the others", async () => {
    const a = new FakeChannel();
    const b = new FakeChannel();
    await hub.connect(a);
    const session = await hub.connect(b);

    await hub.disconnect(session.id);

    expect(hub.sessionCount).toBe(1);
    expect(a.last()).toEqual({ type: "user_count_update", user_count: 1 });
  });

  it("ignores a disconnect for an unknown session", async () => {
    const a = new FakeChannel();
    await hub.connect(a);
    const before = a.sent.length;

    await hub.disconnect("nobody");

    expect(a.sent.length).toBe(before);
  });

  it("drops a session whose send fails and keeps delivering to the rest", async () => {
    const logger = spyLogger();
    hub = hubWith({ registry, logger, sendTimeoutMs: 20 });
    const broken = new FakeChannel();
    const healthy = new FakeChannel();
    await hub.connect(broken);
    await hub.connect(healthy);

    broken.mode = "fail";
    await hub.onEdit({ content: "still here", userId: "a", timestamp: at(1) });

    expect(hub.sessionCount).toBe(1);
    expect(broken.closed).toEqual({ code: 1013, reason: "unreachable" });
    expect(healthy.ofType("text_update").map((m) => m.content)).toEqual(["still here"]);
    expect(healthy.last()).toEqual({ type: "user_count_update", user_count: 1 });
    expect(logger.warn).toHaveBeenCalledWith(expect.stringMatching(/^Dropping session .*: connection reset$/));
  });

  it("drops a session that does not accept a message in time", async () => {
    const slow = new FakeChannel();
    const healthy = new FakeChannel();
    await hub.connect(slow);
    await hub.connect(healthy);

    slow.mode = "hang";
    await hub.onEdit({ content: "no waiting", userId: "a", timestamp: at(1) });

    expect(hub.sessionCount).toBe(1);
    expect(slow.closed?.code).toBe(1013);
    expect(healthy.ofType("text_update").map((m) => m.content)).toEqual(["no waiting"]);
  });

  it("never registers a session that cannot take its greeting", async () => {
    const other = new FakeChannel();
    await hub.connect(other);
    const broken = new FakeChannel();
    broken.mode = "fail";

    const session = await hub.connect(broken);

    expect(hub.isConnected(session.id)).toBe(false);
    expect(other.last()).toEqual({ type: "user_count_update", user_count: 1 });
  });

  it("records the label a client sends", async () => {
    const session = await hub.connect(new FakeChannel(), "first");

    hub.identify(session.id, "renamed");

    expect(registry.get(session.id)?.userId).toBe("renamed");
  });

  it("reports its status", async () => {
    await hub.connect(new FakeChannel());
    await hub.onEdit({ content: "four", userId: "x", timestamp: at(4) });

    expect(hub.status()).toEqual({
      connectedSessions: 1,
      textLength: 4,
      lastModified: at(4),
      lastEditor: "x"
    });
    expect(hub.storeLocation).toBe("memory");
  });

  it("counts characters, not UTF-16 units, in its status", async () => {
    await hub.onEdit({ content: "é😀", userId: "x", timestamp: at(1) });

    expect(hub.status().textLength).toBe(2);
  });

  it("logs how many sessions an update reached", async () => {
    const logger = spyLogger();
    hub = hubWith({ registry, logger, sendTimeoutMs: 20 });
    const broken = new FakeChannel();
    await hub.connect(new FakeChannel());
    await hub.connect(new FakeChannel());
    await hub.connect(broken);

    broken.mode = "fail";
    await hub.onEdit({ content: "counted", userId: "a", timestamp: at(1) });

    expect(logger.debug).toHaveBeenCalledWith("Update delivered to 2 session(s), dropped 1");
  });

  it("closes every session on shutdown", async () => {
    const a = new FakeChannel();
    const b = new FakeChannel();
    await hub.connect(a);
    await hub.connect(b);

    await hub.close();

    expect(hub.sessionCount).toBe(0);
    expect(a.closed).toEqual({ code: 1001, reason: "server shutting down" });
    expect(b.closed).toEqual({ code: 1001, reason: "server shutting down" });
  });
});
