import { logTurn } from "../utils/conversationLogger";
import { safeLog, safeStringify } from "../utils/logging";
import { round2 } from "../utils/mask";
import { detectBotPattern } from "./antiBot";
import { EscalationNotifier, type EscalationReport, type ReportTransport } from "./callback";
import type { AppConfig } from "./config";
import { loadCorpus, type Corpus } from "./corpus";
import { extractFromTexts, extractIntelligence, type ExtractedIntelligence } from "./extractor";
import { createProbabilityProvider, estimateProbability, type ProbabilityProvider } from "./probability";
import { chooseReply, syntheticLatencyMs } from "./replies";
import { createClassifier, type Classifier } from "./scoring";
import { SessionStore, snapshotIntelligence } from "./sessionStore";
import { StatsCounter } from "./stats";
import { logEscalationRecord, logTurnRecord, type LogTurnInput } from "./supabase";

export type InboundMessage = {
  sessionId?: string;
  clientId: string;
  text: string;
  history?: string[];
};

export type EngagementMeta = {
  turnCount: number;
  responseLatencyMs: number;
  likelyAutomated: boolean;
  /** Stays true once any turn of the conversation was judged a scam. */
  conversationScamDetected: boolean;
};

export type TurnResult = {
  kind: "ok";
  sessionId: string;
  scamDetected: boolean;
  confidence: number;
  rule: string;
  reply: string;
  extractedIntelligence: ExtractedIntelligence;
  engagement: EngagementMeta;
  escalated: boolean;
};

export type RateLimited = {
  kind: "rate_limited";
  clientId: string;
};

export type EngineDeps = {
  store: SessionStore;
  classifier: Classifier;
  notifier: EscalationNotifier;
  provider?: ProbabilityProvider | null;
  probabilityTimeoutMs?: number;
  stats?: StatsCounter;
  corpus?: Corpus;
  auditTurn?: (input: LogTurnInput) => Promise<void>;
};

export class HoneypotEngine {
  readonly store: SessionStore;
  readonly stats: StatsCounter;
  private classifier: Classifier;
  private notifier: EscalationNotifier;
  private provider: ProbabilityProvider | null;
  private probabilityTimeoutMs: number;
  private auditTurn?: (input: LogTurnInput) => Promise<void>;
  private corpus: Corpus;

  constructor(deps: EngineDeps) {
    this.store = deps.store;
    this.classifier = deps.classifier;
    this.notifier = deps.notifier;
    this.provider = deps.provider ?? null;
    this.probabilityTimeoutMs = deps.probabilityTimeoutMs ?? 1200;
    this.stats = deps.stats ?? new StatsCounter();
    this.auditTurn = deps.auditTurn;
    this.corpus = deps.corpus ?? { keywords: [], sentences: [] };
  }

  corpusSummary(): { keywords: number; sentences: number } {
    return { keywords: this.corpus.keywords.length, sentences: this.corpus.sentences.length };
  }

  async handleMessage(input: InboundMessage): Promise<TurnResult | RateLimited> {
    if (this.store.checkRateLimit(input.clientId)) {
      this.stats.recordRateLimited();
      safeLog(`[RATE_LIMIT] client=${input.clientId}`);
      return { kind: "rate_limited", clientId: input.clientId };
    }

    const sessionId = input.sessionId?.trim() || input.clientId;
    const text = input.text;
    const history = (input.history || []).filter((item) => item.trim().length > 0);

    // fetched before taking the session lock
    const probability = await estimateProbability(this.provider, text, this.probabilityTimeoutMs);

    return this.store.withSession(sessionId, (session) => {
      const turnCount = this.store.appendMessage(sessionId, text);
      this.store.mergeIntelligence(sessionId, extractIntelligence(text));
      if (history.length > 0) {
        this.store.mergeIntelligence(sessionId, extractFromTexts(history), { recordArtifacts: false });
      }

      const verdict = this.classifier.classify(text, probability);
      session.scamDetected = session.scamDetected || verdict.isScam;
      this.stats.recordVerdict(verdict.isScam);

      const report = this.notifier.maybeEscalate(session, verdict);
      if (report) this.stats.recordEscalation();

      const reply = chooseReply(verdict.isScam, turnCount);
      const result: TurnResult = {
        kind: "ok",
        sessionId,
        scamDetected: verdict.isScam,
        confidence: round2(verdict.confidence),
        rule: verdict.rule,
        reply,
        extractedIntelligence: snapshotIntelligence(session),
        engagement: {
          turnCount,
          responseLatencyMs: syntheticLatencyMs(reply),
          likelyAutomated: detectBotPattern(session.history),
          conversationScamDetected: session.scamDetected
        },
        escalated: report !== null
      };

      logTurn({
        sessionId,
        turn: turnCount,
        verdict: verdict.isScam ? "SCAM" : "SAFE",
        confidence: verdict.confidence,
        text
      });
      safeLog(`[TURN] ${safeStringify({ sessionId, turnCount, reasons: verdict.reasons }, 2000)}`);
      if (this.auditTurn) {
        void this.auditTurn({
          sessionId,
          turnIndex: turnCount,
          text,
          scamDetected: verdict.isScam,
          confidence: result.confidence,
          rule: verdict.rule
        });
      }
      return result;
    });
  }

  /** Waits for background escalation deliveries. */
  drain(): Promise<void> {
    return this.notifier.drain();
  }
}

export type EngineOverrides = {
  corpus?: Corpus;
  provider?: ProbabilityProvider | null;
  transport?: ReportTransport;
  now?: () => number;
};

export function createEngine(config: AppConfig, overrides: EngineOverrides = {}): HoneypotEngine {
  const corpus = overrides.corpus ?? loadCorpus(config.dataDir);
  safeLog(`[CORPUS] keywords=${corpus.keywords.length} sentences=${corpus.sentences.length}`);
  const store = new SessionStore({
    ttlMs: config.sessionTtlMs,
    rateLimitWindowMs: config.rateLimitWindowMs,
    rateLimitMax: config.rateLimitMax,
    artifactGraphCapacity: config.artifactGraphCapacity,
    now: overrides.now
  });
  const notifier = new EscalationNotifier(store, {
    url: config.escalationUrl,
    minTurns: config.escalationMinTurns,
    timeoutMs: config.escalationTimeoutMs,
    transport: overrides.transport,
    onDelivered: (report: EscalationReport, ok: boolean) => {
      void logEscalationRecord(report, ok);
    }
  });
  const provider = overrides.provider !== undefined ? overrides.provider : createProbabilityProvider(config);
  return new HoneypotEngine({
    store,
    classifier: createClassifier(corpus, config.thresholds),
    notifier,
    provider,
    probabilityTimeoutMs: config.probabilityTimeoutMs,
    corpus,
    auditTurn: logTurnRecord
  });
}

/** Pattern-only verdict used when the engine itself fails. */
export function fallbackClassification(text: string): { scamDetected: boolean; confidence: number } {
  const verdict = createClassifier().classify(text);
  return { scamDetected: verdict.isScam, confidence: round2(verdict.confidence) };
}
