import { clamp01 } from "../utils/mask";
import { DEFAULT_THRESHOLDS, type ClassifierThresholds } from "./config";
import type { Corpus } from "./corpus";
import { PAYMENT_ID_PATTERN, URL_PATTERN, containsPhrase, normalizeText, stripLinks } from "./extractor";

export type Classification = {
  isScam: boolean;
  confidence: number;
  score: number;
  /** Name of the terminal rule, or "weighted-score" when scoring decided. */
  rule: string;
  reasons: string[];
};

export type RuleContext = {
  text: string;
  /** `text` with URLs blanked, the same view the extractor reads payment ids from. */
  withoutLinks: string;
  raw: string;
  words: string[];
  externalProbability?: number;
};

export type RuleOutcome =
  | { kind: "verdict"; isScam: boolean; confidence: number }
  | { kind: "score"; points: number }
  | null;

export type Rule = {
  name: string;
  evaluate: (ctx: RuleContext) => RuleOutcome;
};

export const GREETING_WHITELIST = [
  "hi",
  "hii",
  "hello",
  "hey",
  "ok",
  "okay",
  "thanks",
  "thank you",
  "thx",
  "good morning",
  "good afternoon",
  "good evening",
  "good night",
  "bye",
  "yes",
  "no",
  "sure",
  "fine",
  "hmm"
];

export const FINANCIAL_TRIGGERS = [
  "otp",
  "upi",
  "pay",
  "payment",
  "money",
  "amount",
  "bank",
  "account",
  "send",
  "transfer",
  "verify",
  "kyc",
  "card",
  "cvv",
  "pin",
  "link",
  "refund",
  "prize",
  "lottery",
  "fee",
  "blocked",
  "click"
];

export const ACTION_KEYWORDS = ["verify", "verification", "click", "login", "update", "confirm", "kyc", "claim"];

export const SHORT_MESSAGE_MAX_WORDS = 3;
export const GREETING_CONFIDENCE = 0.05;
export const SHORT_MESSAGE_CONFIDENCE = 0.08;
export const HARD_TRIGGER_CONFIDENCE = 0.9;
export const KEYWORD_WEIGHT = 2;
export const TEMPLATE_BONUS = 5;
export const LINK_WITH_ACTION_BONUS = 6;
export const BARE_LINK_BONUS = 4;
export const EXTERNAL_WEIGHT = 6;
export const TEMPLATE_SCAN_LIMIT = 200;

function stripPunctuation(text: string): string {
  return text.replace(/[^a-z0-9\s]/g, " ").replace(/\s+/g, " ").trim();
}

function hasArtifactPattern(ctx: RuleContext): boolean {
  return PAYMENT_ID_PATTERN.test(ctx.withoutLinks) || URL_PATTERN.test(ctx.raw);
}

export const greetingRule: Rule = {
  name: "greeting-bypass",
  evaluate: (ctx) => {
    const bare = stripPunctuation(ctx.text);
    const isFiller = GREETING_WHITELIST.some((entry) => entry === bare || entry.includes(bare));
    return isFiller ? { kind: "verdict", isScam: false, confidence: GREETING_CONFIDENCE } : null;
  }
};

export const shortMessageRule: Rule = {
  name: "short-message-bypass",
  evaluate: (ctx) => {
    if (ctx.words.length > SHORT_MESSAGE_MAX_WORDS) return null;
    if (hasArtifactPattern(ctx)) return null;
    if (FINANCIAL_TRIGGERS.some((word) => containsPhrase(ctx.text, word))) return null;
    return { kind: "verdict", isScam: false, confidence: SHORT_MESSAGE_CONFIDENCE };
  }
};

export const paymentIdentifierRule: Rule = {
  name: "payment-identifier",
  evaluate: (ctx) =>
    PAYMENT_ID_PATTERN.test(ctx.withoutLinks)
      ? { kind: "verdict", isScam: true, confidence: HARD_TRIGGER_CONFIDENCE }
      : null
};

export const otpRule: Rule = {
  name: "otp-token",
  evaluate: (ctx) =>
    containsPhrase(ctx.text, "otp")
      ? { kind: "verdict", isScam: true, confidence: HARD_TRIGGER_CONFIDENCE }
      : null
};

export const sendMoneyRule: Rule = {
  name: "send-money",
  evaluate: (ctx) => {
    const imperative = containsPhrase(ctx.text, "send");
    const monetary = containsPhrase(ctx.text, "money") || containsPhrase(ctx.text, "amount");
    return imperative && monetary
      ? { kind: "verdict", isScam: true, confidence: HARD_TRIGGER_CONFIDENCE }
      : null;
  }
};

export function keywordRule(keywords: readonly string[]): Rule {
  return {
    name: "keyword-match",
    evaluate: (ctx) => {
      const matched = keywords.filter((kw) => containsPhrase(ctx.text, kw)).length;
      return matched > 0 ? { kind: "score", points: matched * KEYWORD_WEIGHT } : null;
    }
  };
}

export function templateRule(sentences: readonly string[], scanLimit: number = TEMPLATE_SCAN_LIMIT): Rule {
  const window = sentences.slice(0, scanLimit);
  return {
    name: "known-template",
    evaluate: (ctx) => {
      // a message shorter than three words would sit inside almost any template
      const canBeContained = ctx.words.length >= 3;
      const hit = window.find(
        (sentence) => ctx.text.includes(sentence) || (canBeContained && sentence.includes(ctx.text))
      );
      return hit ? { kind: "score", points: TEMPLATE_BONUS } : null;
    }
  };
}

export const linkRule: Rule = {
  name: "link",
  evaluate: (ctx) => {
    if (!URL_PATTERN.test(ctx.raw)) return null;
    const withAction = ACTION_KEYWORDS.some((kw) => containsPhrase(ctx.text, kw));
    return { kind: "score", points: withAction ? LINK_WITH_ACTION_BONUS : BARE_LINK_BONUS };
  }
};

export const externalProbabilityRule: Rule = {
  name: "external-probability",
  evaluate: (ctx) => {
    if (ctx.externalProbability === undefined) return null;
    return { kind: "score", points: Math.floor(ctx.externalProbability * EXTERNAL_WEIGHT) };
  }
};

/**
 * Rules in evaluation order. The first `verdict` outcome ends evaluation;
 * `score` outcomes accumulate until the table is exhausted.
 */
export function buildRuleTable(corpus: Corpus): Rule[] {
  return [
    greetingRule,
    shortMessageRule,
    paymentIdentifierRule,
    otpRule,
    sendMoneyRule,
    keywordRule(corpus.keywords),
    templateRule(corpus.sentences),
    linkRule,
    externalProbabilityRule
  ];
}

function normalizeProbability(value: number | undefined): number | undefined {
  if (value === undefined || !Number.isFinite(value)) return undefined;
  return clamp01(value);
}

export function evaluateRules(
  rules: readonly Rule[],
  text: string,
  externalProbability: number | undefined,
  thresholds: ClassifierThresholds
): Classification {
  const normalized = normalizeText(text);
  const probability = normalizeProbability(externalProbability);
  const ctx: RuleContext = {
    text: normalized,
    withoutLinks: stripLinks(normalized),
    raw: text,
    words: normalized.split(" ").filter(Boolean),
    externalProbability: probability
  };

  let score = 0;
  const reasons: string[] = [];
  for (const rule of rules) {
    const outcome = rule.evaluate(ctx);
    if (!outcome) continue;
    if (outcome.kind === "verdict") {
      return {
        isScam: outcome.isScam,
        confidence: clamp01(outcome.confidence),
        score,
        rule: rule.name,
        reasons: [...reasons, rule.name]
      };
    }
    score += outcome.points;
    reasons.push(`${rule.name}:+${outcome.points}`);
  }

  const normalizedScore = score / thresholds.scoreDenominator;
  const confidence = clamp01(
    probability === undefined ? normalizedScore : (normalizedScore + probability) / 2
  );
  const isScam =
    score >= thresholds.scoreThreshold ||
    (probability !== undefined && probability > thresholds.externalCutover);

  return { isScam, confidence, score, rule: "weighted-score", reasons };
}

export type Classifier = {
  classify: (text: string, externalProbability?: number) => Classification;
  rules: readonly Rule[];
};

export function createClassifier(
  corpus: Corpus = { keywords: [], sentences: [] },
  thresholds: ClassifierThresholds = DEFAULT_THRESHOLDS
): Classifier {
  const rules = buildRuleTable(corpus);
  return {
    rules,
    classify: (text, externalProbability) => evaluateRules(rules, text, externalProbability, thresholds)
  };
}
