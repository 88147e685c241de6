import assert from "assert";
import { describe, it } from "node:test";
import { parseHoneypotBody } from "../utils/requestBody";
import { makeFullSchema } from "../utils/responseSchema";

describe("parseHoneypotBody", () => {
  it("reads a structured message and history", () => {
    const parsed = parseHoneypotBody({
      sessionId: " s1 ",
      message: { sender: "scammer", text: "share otp" },
      conversationHistory: [{ sender: "scammer", text: "hello" }, "call 9876543210", { sender: "user" }]
    });
    assert.deepStrictEqual(parsed, {
      sessionId: "s1",
      text: "share otp",
      history: ["hello", "call 9876543210"]
    });
  });

  it("accepts a plain message and conversation_id", () => {
    assert.deepStrictEqual(parseHoneypotBody({ conversation_id: "c9", message: "hi" }), {
      sessionId: "c9",
      text: "hi",
      history: []
    });
  });

  it("falls back to a top-level text field", () => {
    assert.deepStrictEqual(parseHoneypotBody({ text: "refund pending" }), {
      sessionId: undefined,
      text: "refund pending",
      history: []
    });
  });

  it("tolerates garbage", () => {
    assert.deepStrictEqual(parseHoneypotBody("raw"), { text: "", history: [] });
    assert.deepStrictEqual(parseHoneypotBody({ message: 42, sessionId: "" }), {
      sessionId: undefined,
      text: "",
      history: []
    });
  });
});

describe("makeFullSchema", () => {
  it("fills every field and merges nested overrides", () => {
    const schema = makeFullSchema({
      scamDetected: true,
      engagement: { turnCount: 2, responseLatencyMs: 900, likelyAutomated: false, conversationScamDetected: true }
    });
    assert.strictEqual(schema.status, "success");
    assert.strictEqual(schema.scamDetected, true);
    assert.strictEqual(schema.engagement.turnCount, 2);
    assert.strictEqual(schema.engagement.conversationScamDetected, true);
    assert.strictEqual(makeFullSchema().engagement.conversationScamDetected, false);
    assert.deepStrictEqual(schema.extractedIntelligence.upiIds, []);
  });
});
