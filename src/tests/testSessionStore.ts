import assert from "assert";
import { beforeEach, describe, it } from "node:test";
import { detectBotPattern } from "../core/antiBot";
import { ArtifactGraph } from "../core/artifactGraph";
import { extractIntelligence } from "../core/extractor";
import { SessionStore, snapshotIntelligence } from "../core/sessionStore";

let clock = 0;
let store: SessionStore;

beforeEach(() => {
  clock = 1_000;
  store = new SessionStore({
    ttlMs: 1_000,
    rateLimitWindowMs: 500,
    rateLimitMax: 3,
    artifactGraphCapacity: 100,
    now: () => clock
  });
});

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("session lifecycle", () => {
  it("creates a session on first access", () => {
    const session = store.getOrCreateSession("s1");
    assert.strictEqual(session.id, "s1");
    assert.strictEqual(session.createdAt, 1_000);
    assert.deepStrictEqual(session.history, []);
    assert.strictEqual(session.escalationSent, false);
  });

  it("refreshes lastActiveAt while the session is live", () => {
    store.appendMessage("s1", "hello");
    clock += 1_000;
    const session = store.getOrCreateSession("s1");
    assert.deepStrictEqual(session.history, ["hello"]);
    assert.strictEqual(session.lastActiveAt, 2_000);
  });

  it("starts fresh after the TTL elapses", () => {
    store.appendMessage("s1", "pay rahul@upi");
    store.mergeIntelligence("s1", extractIntelligence("pay rahul@upi"));
    store.markEscalated("s1");
    clock += 1_001;
    const session = store.getOrCreateSession("s1");
    assert.deepStrictEqual(session.history, []);
    assert.deepStrictEqual(snapshotIntelligence(session).upiIds, []);
    assert.strictEqual(session.escalationSent, false);
    assert.strictEqual(session.createdAt, 2_001);
  });

  it("sweeps expired sessions and stale buckets", () => {
    store.getOrCreateSession("old");
    store.checkRateLimit("10.0.0.1");
    clock += 600;
    store.getOrCreateSession("recent");
    clock += 500;
    assert.deepStrictEqual(store.sweepExpired(), { sessions: 1, buckets: 1 });
    assert.strictEqual(store.get("old"), undefined);
    assert.ok(store.get("recent"));
  });
});

describe("intelligence merge", () => {
  it("is idempotent", () => {
    const extracted = extractIntelligence("send to rahul@upi via http://pay.example");
    const first = store.mergeIntelligence("s1", extracted);
    const second = store.mergeIntelligence("s1", extracted);
    assert.deepStrictEqual(second, first);
  });

  it("never drops an artifact", () => {
    store.mergeIntelligence("s1", extractIntelligence("pay rahul@upi"));
    store.mergeIntelligence("s1", extractIntelligence("call 9876543210"));
    const intel = snapshotIntelligence(store.getOrCreateSession("s1"));
    assert.deepStrictEqual(intel.upiIds, ["rahul@upi"]);
    assert.deepStrictEqual(intel.phoneNumbers, ["9876543210"]);
  });

  it("counts payment ids across sessions", () => {
    store.mergeIntelligence("s1", extractIntelligence("pay rahul@upi"));
    store.mergeIntelligence("s2", extractIntelligence("pay RAHUL@upi or rahul@upi"));
    store.mergeIntelligence("s2", extractIntelligence("pay rahul@upi"), { recordArtifacts: false });
    assert.strictEqual(store.artifacts.count("rahul@upi"), 2);
  });
});

describe("rate limiting", () => {
  it("rejects the request after the ceiling within one window", () => {
    assert.deepStrictEqual(
      [1, 2, 3, 4].map(() => store.checkRateLimit("10.0.0.1")),
      [false, false, false, true]
    );
    assert.strictEqual(store.rateLimitBucket("10.0.0.1")?.count, 4);
  });

  it("keeps counting at the window boundary", () => {
    for (let i = 0; i < 3; i += 1) store.checkRateLimit("10.0.0.1");
    clock += 500;
    assert.strictEqual(store.checkRateLimit("10.0.0.1"), true);
  });

  it("resets the counter once the window elapses", () => {
    for (let i = 0; i < 4; i += 1) store.checkRateLimit("10.0.0.1");
    clock += 501;
    assert.strictEqual(store.checkRateLimit("10.0.0.1"), false);
    assert.deepStrictEqual(store.rateLimitBucket("10.0.0.1"), { windowStart: 1_501, count: 1 });
  });

  it("tracks clients independently", () => {
    for (let i = 0; i < 4; i += 1) store.checkRateLimit("10.0.0.1");
    assert.strictEqual(store.checkRateLimit("10.0.0.2"), false);
  });
});

describe("escalation flag", () => {
  it("flips exactly once", () => {
    assert.strictEqual(store.markEscalated("s1"), true);
    assert.strictEqual(store.markEscalated("s1"), false);
    assert.strictEqual(store.getOrCreateSession("s1").escalationSent, true);
  });
});

describe("bot pattern", () => {
  it("needs three messages of equal length", () => {
    assert.strictEqual(detectBotPattern([]), false);
    assert.strictEqual(detectBotPattern(["one two", "three four"]), false);
    assert.strictEqual(detectBotPattern(["x", "one two", "three four", "five, six!"]), true);
    assert.strictEqual(detectBotPattern(["one two", "three four", "five"]), false);
  });

  it("reads the session history", () => {
    for (const text of ["one two", "three four", "five six"]) store.appendMessage("s1", text);
    assert.strictEqual(store.isLikelyAutomated("s1"), true);
    store.appendMessage("s1", "seven");
    assert.strictEqual(store.isLikelyAutomated("s1"), false);
    assert.strictEqual(store.isLikelyAutomated("unknown"), false);
  });
});

describe("withSession", () => {
  it("serialises work on the same session", async () => {
    const order: string[] = [];
    const gate = deferred();
    const first = store.withSession("s1", async (session) => {
      order.push("a-start");
      await gate.promise;
      session.history.push("a");
      order.push("a-end");
    });
    const second = store.withSession("s1", (session) => {
      order.push("b-start");
      session.history.push("b");
      order.push("b-end");
    });
    await Promise.resolve();
    gate.resolve();
    await Promise.all([first, second]);
    assert.deepStrictEqual(order, ["a-start", "a-end", "b-start", "b-end"]);
    assert.deepStrictEqual(store.getOrCreateSession("s1").history, ["a", "b"]);
  });

  it("does not block other sessions", async () => {
    const gate = deferred();
    const slow = store.withSession("x", async () => {
      await gate.promise;
      return "x";
    });
    const fast = await store.withSession("y", () => "y");
    assert.strictEqual(fast, "y");
    gate.resolve();
    assert.strictEqual(await slow, "x");
  });
});

describe("ArtifactGraph", () => {
  it("evicts the least recently seen identifier at capacity", () => {
    const graph = new ArtifactGraph(2);
    graph.record("a@upi");
    graph.record("b@upi");
    graph.record("b@upi");
    graph.record("c@upi");
    assert.strictEqual(graph.size, 2);
    assert.strictEqual(graph.count("a@upi"), 0);
    assert.deepStrictEqual(graph.top(5), [
      { identifier: "b@upi", count: 2 },
      { identifier: "c@upi", count: 1 }
    ]);
  });
});
