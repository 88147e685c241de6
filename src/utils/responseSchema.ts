import type { ExtractedIntelligence } from "../core/extractor";

export type EngagementSchema = {
  turnCount: number;
  responseLatencyMs: number;
  likelyAutomated: boolean;
  conversationScamDetected: boolean;
};

export type HoneypotSchema = {
  status: "success" | "error";
  sessionId: string;
  scamDetected: boolean;
  confidence: number;
  reply: string;
  engagement: EngagementSchema;
  extractedIntelligence: ExtractedIntelligence;
  agentNotes: string;
};

export function makeFullSchema(args: Partial<HoneypotSchema> = {}): HoneypotSchema {
  const base: HoneypotSchema = {
    status: "success",
    sessionId: "",
    scamDetected: false,
    confidence: 0,
    reply: "OK",
    engagement: {
      turnCount: 0,
      responseLatencyMs: 0,
      likelyAutomated: false,
      conversationScamDetected: false
    },
    extractedIntelligence: {
      upiIds: [],
      bankAccounts: [],
      phishingLinks: [],
      phoneNumbers: [],
      suspiciousKeywords: []
    },
    agentNotes: ""
  };

  return {
    ...base,
    ...args,
    engagement: {
      ...base.engagement,
      ...(args.engagement || {})
    },
    extractedIntelligence: {
      ...base.extractedIntelligence,
      ...(args.extractedIntelligence || {})
    }
  };
}
