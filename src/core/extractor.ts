export type ExtractedIntelligence = {
  upiIds: string[];
  bankAccounts: string[];
  phishingLinks: string[];
  phoneNumbers: string[];
  suspiciousKeywords: string[];
};

export type IntelligenceField = keyof ExtractedIntelligence;

export const INTELLIGENCE_FIELDS: readonly IntelligenceField[] = [
  "upiIds",
  "bankAccounts",
  "phishingLinks",
  "phoneNumbers",
  "suspiciousKeywords"
];

export const SUSPICIOUS_KEYWORDS = [
  "urgent",
  "immediately",
  "verify",
  "verification",
  "otp",
  "blocked",
  "suspended",
  "kyc",
  "penalty",
  "legal notice",
  "refund",
  "reward",
  "prize",
  "lottery",
  "upi",
  "transfer",
  "send money",
  "processing fee",
  "police",
  "customs",
  "parcel",
  "courier",
  "aadhaar",
  "pan card",
  "cvv",
  "click here",
  "password",
  "pin"
];

// Non-global: shared with the classifier for `.test()`.
export const PAYMENT_ID_PATTERN = /[a-z0-9._-]{2,}@[a-z][a-z0-9.-]*/i;
export const URL_PATTERN = /https?:\/\/[^\s]+/i;

const paymentIdRegex = new RegExp(PAYMENT_ID_PATTERN.source, "gi");
const urlRegex = new RegExp(URL_PATTERN.source, "gi");
const phoneRegex = /(?<![\d+])\+?\d{10,13}(?!\d)/g;
const bankAccountRegex = /(?<!\d)\d{9,18}(?!\d)/g;
// only these phone shapes are withheld from bank accounts; other 10-13 digit runs land in both
const mobileShape = /^(?:\+\d{10,13}|[6-9]\d{9})$/;

export function emptyIntelligence(): ExtractedIntelligence {
  return {
    upiIds: [],
    bankAccounts: [],
    phishingLinks: [],
    phoneNumbers: [],
    suspiciousKeywords: []
  };
}

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function containsPhrase(normalized: string, phrase: string): boolean {
  if (!phrase) return false;
  return new RegExp(`(?<![a-z0-9])${escapeRegex(phrase)}(?![a-z0-9])`).test(normalized);
}

function unique(items: string[]): string[] {
  const set = new Set<string>();
  for (const item of items) {
    const value = item.trim();
    if (value) set.add(value);
  }
  return Array.from(set);
}

function stripTrailing(value: string): string {
  return value.replace(/[),\].}>;:!?'"-]+$/g, "");
}

function uniqueMerge(base: string[], next: string[]): string[] {
  return unique([...base, ...next]);
}

/** Blanks out URLs so `user@host` inside a link is never read as a payment id. */
export function stripLinks(text: string): string {
  return text.replace(urlRegex, " ");
}

export function extractIntelligence(
  text: string,
  keywords: readonly string[] = SUSPICIOUS_KEYWORDS
): ExtractedIntelligence {
  const normalized = normalizeText(text);

  const links = (text.match(urlRegex) || []).map(stripTrailing);
  const withoutLinks = stripLinks(normalized);
  const upiIds = (withoutLinks.match(paymentIdRegex) || []).map(stripTrailing);
  const phones = withoutLinks.match(phoneRegex) || [];
  const mobileDigits = new Set(phones.filter((p) => mobileShape.test(p)).map((p) => p.replace(/\D/g, "")));
  const bankDigits = (withoutLinks.match(bankAccountRegex) || []).filter(
    (digits) => !mobileDigits.has(digits)
  );
  const suspicious = keywords.filter((kw) => containsPhrase(normalized, kw));

  return {
    upiIds: unique(upiIds),
    bankAccounts: unique(bankDigits),
    phishingLinks: unique(links),
    phoneNumbers: unique(phones),
    suspiciousKeywords: unique(suspicious)
  };
}

export function extractFromTexts(texts: string[]): ExtractedIntelligence {
  return extractIntelligence(texts.join(" \n "));
}

export function mergeIntelligence(
  existing: ExtractedIntelligence,
  incoming: ExtractedIntelligence
): ExtractedIntelligence {
  return {
    upiIds: uniqueMerge(existing.upiIds, incoming.upiIds),
    bankAccounts: uniqueMerge(existing.bankAccounts, incoming.bankAccounts),
    phishingLinks: uniqueMerge(existing.phishingLinks, incoming.phishingLinks),
    phoneNumbers: uniqueMerge(existing.phoneNumbers, incoming.phoneNumbers),
    suspiciousKeywords: uniqueMerge(existing.suspiciousKeywords, incoming.suspiciousKeywords)
  };
}

export function countArtifacts(intel: ExtractedIntelligence): number {
  return INTELLIGENCE_FIELDS.reduce((sum, field) => sum + intel[field].length, 0);
}
