import fs from "fs";
import path from "path";
import { describeError, safeWarn } from "../utils/logging";

export type Corpus = {
  keywords: string[];
  sentences: string[];
};

export const KEYWORD_SUFFIXES = ["", " please", " immediately", " now", " urgently"];

export const KEYWORDS_FILE = "base_keywords.json";
export const SENTENCES_FILE = "scam_sentences.txt";

export function expandKeywords(base: string[]): string[] {
  const expanded = new Set<string>();
  for (const keyword of base) {
    const k = keyword.trim().toLowerCase();
    if (!k) continue;
    for (const suffix of KEYWORD_SUFFIXES) expanded.add(k + suffix);
  }
  return Array.from(expanded);
}

export function parseSentences(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim().toLowerCase().replace(/^\d+\.\s*/, ""))
    .filter(Boolean);
}

function readBaseKeywords(file: string): string[] {
  if (!fs.existsSync(file)) {
    safeWarn(`[CORPUS] keyword file missing: ${file}`);
    return [];
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
    if (!Array.isArray(parsed)) {
      safeWarn(`[CORPUS] keyword file is not a JSON array: ${file}`);
      return [];
    }
    return parsed.filter((item): item is string => typeof item === "string");
  } catch (err) {
    safeWarn(`[CORPUS] keyword file unreadable: ${describeError(err)}`);
    return [];
  }
}

function readSentences(file: string): string[] {
  if (!fs.existsSync(file)) {
    safeWarn(`[CORPUS] sentence file missing: ${file}`);
    return [];
  }
  try {
    return parseSentences(fs.readFileSync(file, "utf-8"));
  } catch (err) {
    safeWarn(`[CORPUS] sentence file unreadable: ${describeError(err)}`);
    return [];
  }
}

/**
 * Loads the keyword list and the known-sentence corpus once at start-up.
 * Missing or broken files give empty lists; the classifier then runs on its
 * pattern rules alone.
 */
export function loadCorpus(dataDir: string): Corpus {
  return {
    keywords: expandKeywords(readBaseKeywords(path.join(dataDir, KEYWORDS_FILE))),
    sentences: readSentences(path.join(dataDir, SENTENCES_FILE))
  };
}
