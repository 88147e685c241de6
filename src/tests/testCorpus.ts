import assert from "assert";
import fs from "fs";
import os from "os";
import path from "path";
import { describe, it } from "node:test";
import { KEYWORDS_FILE, SENTENCES_FILE, expandKeywords, loadCorpus, parseSentences } from "../core/corpus";
import {
  generateSentences,
  loadTemplatePools,
  parseTemplatePools,
  type TemplatePools
} from "../core/sentenceGenerator";

const DATA_DIR = path.resolve(__dirname, "..", "..", "data");

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "scamshield-corpus-"));
}

describe("corpus", () => {
  it("expands base keywords with urgency suffixes", () => {
    assert.deepStrictEqual(expandKeywords(["OTP", " "]), [
      "otp",
      "otp please",
      "otp immediately",
      "otp now",
      "otp urgently"
    ]);
  });

  it("strips numbering and blank lines from sentences", () => {
    assert.deepStrictEqual(parseSentences("1. Your KYC is pending.\n\n2. Click here\r\n"), [
      "your kyc is pending.",
      "click here"
    ]);
  });

  it("loads the shipped data files", () => {
    const corpus = loadCorpus(DATA_DIR);
    assert.strictEqual(corpus.keywords.length, 130);
    assert.strictEqual(corpus.sentences.length, 20);
    assert.ok(corpus.keywords.includes("send money now"));
  });

  it("degrades to empty lists when files are missing", () => {
    const corpus = loadCorpus(path.join(tempDir(), "missing"));
    assert.deepStrictEqual(corpus, { keywords: [], sentences: [] });
  });

  it("keeps the sentences when the keyword file is malformed", () => {
    const dir = tempDir();
    fs.writeFileSync(path.join(dir, KEYWORDS_FILE), "{ not json");
    fs.writeFileSync(path.join(dir, SENTENCES_FILE), "Share OTP now\n");
    const corpus = loadCorpus(dir);
    assert.deepStrictEqual(corpus.keywords, []);
    assert.deepStrictEqual(corpus.sentences, ["share otp now"]);
  });
});

describe("sentence generator", () => {
  const pools: TemplatePools = {
    templates: ["Refund of Rs {amount} for {entity}: {action} {unknown}"],
    entities: ["account", "card"],
    statuses: ["blocked", "held"],
    actions: ["verify", "call"],
    rewards: ["prize", "bonus"],
    amountRange: [500, 600]
  };

  it("fills placeholders from the pools", () => {
    assert.deepStrictEqual(generateSentences(2, pools, () => 0.5), [
      "Refund of Rs 550 for card: call {unknown}",
      "Refund of Rs 550 for card: call {unknown}"
    ]);
  });

  it("rejects empty pools", () => {
    assert.throws(() => parseTemplatePools({ ...pools, templates: [] }), /templates/);
    assert.throws(() => parseTemplatePools("nope"), /JSON object/);
  });

  it("reads the shipped template pools", () => {
    const shipped = loadTemplatePools(path.join(DATA_DIR, "scam_templates.json"));
    assert.strictEqual(shipped.templates.length, 8);
    assert.deepStrictEqual(shipped.amountRange, [500, 50000]);
    assert.deepStrictEqual(generateSentences(1, shipped, () => 0), [
      "Your bank account is blocked. Please click the link."
    ]);
  });
});
