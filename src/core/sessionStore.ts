import { ArtifactGraph } from "./artifactGraph";
import { detectBotPattern } from "./antiBot";
import { INTELLIGENCE_FIELDS, type ExtractedIntelligence, type IntelligenceField } from "./extractor";
import { KeyedLock } from "./keyedLock";

export type IntelligenceSets = Record<IntelligenceField, Set<string>>;

export type ConversationSession = {
  id: string;
  createdAt: number;
  lastActiveAt: number;
  history: string[];
  accumulatedIntelligence: IntelligenceSets;
  scamDetected: boolean;
  escalationSent: boolean;
};

export type RateLimitBucket = {
  windowStart: number;
  count: number;
};

export type SessionStoreOptions = {
  ttlMs: number;
  rateLimitWindowMs: number;
  rateLimitMax: number;
  artifactGraphCapacity: number;
  now?: () => number;
};

export type MergeOptions = {
  /** Count payment identifiers in the artifact graph. Off for re-scans of old turns. */
  recordArtifacts?: boolean;
};

export type SweepResult = {
  sessions: number;
  buckets: number;
};

function emptySets(): IntelligenceSets {
  return {
    upiIds: new Set<string>(),
    bankAccounts: new Set<string>(),
    phishingLinks: new Set<string>(),
    phoneNumbers: new Set<string>(),
    suspiciousKeywords: new Set<string>()
  };
}

export function snapshotIntelligence(session: ConversationSession): ExtractedIntelligence {
  const sets = session.accumulatedIntelligence;
  return {
    upiIds: Array.from(sets.upiIds),
    bankAccounts: Array.from(sets.bankAccounts),
    phishingLinks: Array.from(sets.phishingLinks),
    phoneNumbers: Array.from(sets.phoneNumbers),
    suspiciousKeywords: Array.from(sets.suspiciousKeywords)
  };
}

export class SessionStore {
  private sessions = new Map<string, ConversationSession>();
  private buckets = new Map<string, RateLimitBucket>();
  private locks = new KeyedLock();
  private now: () => number;
  readonly artifacts: ArtifactGraph;

  constructor(private readonly options: SessionStoreOptions) {
    this.now = options.now ?? Date.now;
    this.artifacts = new ArtifactGraph(options.artifactGraphCapacity);
  }

  private fresh(id: string, timestamp: number): ConversationSession {
    const session: ConversationSession = {
      id,
      createdAt: timestamp,
      lastActiveAt: timestamp,
      history: [],
      accumulatedIntelligence: emptySets(),
      scamDetected: false,
      escalationSent: false
    };
    this.sessions.set(id, session);
    return session;
  }

  private isExpired(session: ConversationSession, timestamp: number): boolean {
    return timestamp - session.lastActiveAt > this.options.ttlMs;
  }

  getOrCreateSession(id: string): ConversationSession {
    const timestamp = this.now();
    const existing = this.sessions.get(id);
    if (!existing || this.isExpired(existing, timestamp)) {
      return this.fresh(id, timestamp);
    }
    existing.lastActiveAt = timestamp;
    return existing;
  }

  get(id: string): ConversationSession | undefined {
    return this.sessions.get(id);
  }

  appendMessage(id: string, text: string): number {
    const session = this.getOrCreateSession(id);
    session.history.push(text);
    return session.history.length;
  }

  mergeIntelligence(id: string, extracted: ExtractedIntelligence, options: MergeOptions = {}): ExtractedIntelligence {
    const session = this.getOrCreateSession(id);
    for (const field of INTELLIGENCE_FIELDS) {
      const target = session.accumulatedIntelligence[field];
      for (const value of extracted[field]) {
        const trimmed = value.trim();
        if (trimmed) target.add(trimmed);
      }
    }
    if (options.recordArtifacts !== false) {
      for (const upiId of new Set(extracted.upiIds)) {
        this.artifacts.record(upiId);
      }
    }
    return snapshotIntelligence(session);
  }

  /** Returns true when the client is over its ceiling for the current window. */
  checkRateLimit(clientId: string): boolean {
    const timestamp = this.now();
    const bucket = this.buckets.get(clientId);
    if (!bucket || timestamp - bucket.windowStart > this.options.rateLimitWindowMs) {
      this.buckets.set(clientId, { windowStart: timestamp, count: 1 });
      return false;
    }
    bucket.count += 1;
    return bucket.count > this.options.rateLimitMax;
  }

  rateLimitBucket(clientId: string): RateLimitBucket | undefined {
    const bucket = this.buckets.get(clientId);
    return bucket ? { ...bucket } : undefined;
  }

  /** Returns true only for the call that flips `escalationSent`. */
  markEscalated(id: string): boolean {
    const session = this.getOrCreateSession(id);
    if (session.escalationSent) return false;
    session.escalationSent = true;
    return true;
  }

  isLikelyAutomated(id: string): boolean {
    const session = this.sessions.get(id);
    return session ? detectBotPattern(session.history) : false;
  }

  /** Runs `task` with exclusive access to one session; other ids are unaffected. */
  withSession<T>(id: string, task: (session: ConversationSession) => Promise<T> | T): Promise<T> {
    return this.locks.run(id, () => task(this.getOrCreateSession(id)));
  }

  sweepExpired(): SweepResult {
    const timestamp = this.now();
    let sessions = 0;
    let buckets = 0;
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session, timestamp) && !this.locks.isLocked(id)) {
        this.sessions.delete(id);
        sessions += 1;
      }
    }
    for (const [clientId, bucket] of this.buckets) {
      if (timestamp - bucket.windowStart > this.options.rateLimitWindowMs) {
        this.buckets.delete(clientId);
        buckets += 1;
      }
    }
    return { sessions, buckets };
  }

  get size(): number {
    return this.sessions.size;
  }
}
