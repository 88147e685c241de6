import axios from "axios";
import { describeError, safeLog, safeStringify, safeWarn } from "../utils/logging";
import type { ExtractedIntelligence } from "./extractor";
import { snapshotIntelligence, type ConversationSession, type SessionStore } from "./sessionStore";

export type EscalationReport = {
  sessionId: string;
  scamDetected: true;
  totalMessagesExchanged: number;
  extractedIntelligence: ExtractedIntelligence;
  agentNotes: string;
};

export type ReportTransport = (url: string, report: EscalationReport, timeoutMs: number) => Promise<void>;

export type EscalationOptions = {
  url: string;
  minTurns: number;
  timeoutMs: number;
  transport?: ReportTransport;
  onDelivered?: (report: EscalationReport, ok: boolean) => void;
};

export type EscalationVerdict = {
  isScam: boolean;
  confidence: number;
  rule: string;
};

/** axios rejects non-2xx responses, so a resolved post is a delivered report. */
export const axiosTransport: ReportTransport = async (url, report, timeoutMs) => {
  await axios.post(url, report, {
    timeout: timeoutMs,
    headers: { "Content-Type": "application/json" }
  });
};

export function buildAgentNotes(session: ConversationSession, verdict: EscalationVerdict): string {
  const intel = session.accumulatedIntelligence;
  const found: string[] = [];
  if (intel.upiIds.size > 0) found.push(`${intel.upiIds.size} payment id(s)`);
  if (intel.bankAccounts.size > 0) found.push(`${intel.bankAccounts.size} bank account(s)`);
  if (intel.phishingLinks.size > 0) found.push(`${intel.phishingLinks.size} link(s)`);
  if (intel.phoneNumbers.size > 0) found.push(`${intel.phoneNumbers.size} phone number(s)`);
  const evidence = found.length > 0 ? found.join(", ") : "no artifacts";
  return `Scam confirmed by ${verdict.rule} (confidence ${verdict.confidence.toFixed(2)}) after ${
    session.history.length
  } messages; collected ${evidence}.`;
}

export function buildReport(session: ConversationSession, verdict: EscalationVerdict): EscalationReport {
  return {
    sessionId: session.id,
    scamDetected: true,
    totalMessagesExchanged: session.history.length,
    extractedIntelligence: snapshotIntelligence(session),
    agentNotes: buildAgentNotes(session, verdict)
  };
}

export class EscalationNotifier {
  private inFlight = new Set<Promise<void>>();
  private transport: ReportTransport;

  constructor(
    private readonly store: SessionStore,
    private readonly options: EscalationOptions
  ) {
    this.transport = options.transport ?? axiosTransport;
  }

  /**
   * Reports the session once it is a confirmed scam with enough turns. Must be
   * called while holding the session lock. Delivery runs in the background.
   */
  maybeEscalate(session: ConversationSession, verdict: EscalationVerdict): EscalationReport | null {
    if (!verdict.isScam) return null;
    if (session.history.length < this.options.minTurns) return null;
    if (!this.store.markEscalated(session.id)) return null;

    const report = buildReport(session, verdict);
    this.dispatch(report);
    return report;
  }

  private dispatch(report: EscalationReport): void {
    const delivery = this.deliver(report)
      .catch((err: unknown) => {
        safeWarn(`[ESCALATION] delivery hook failed for ${report.sessionId}: ${describeError(err)}`);
      })
      .finally(() => {
        this.inFlight.delete(delivery);
      });
    this.inFlight.add(delivery);
  }

  private async deliver(report: EscalationReport): Promise<void> {
    if (!this.options.url) {
      safeLog(`[ESCALATION] no collector configured; report for ${report.sessionId} kept local`);
      this.options.onDelivered?.(report, false);
      return;
    }
    try {
      await this.transport(this.options.url, report, this.options.timeoutMs);
      safeLog(`[ESCALATION] delivered ${safeStringify(report, 2000)}`);
      this.options.onDelivered?.(report, true);
    } catch (err) {
      // best effort: the flag stays set and nothing is retried
      safeWarn(`[ESCALATION] delivery failed for ${report.sessionId}: ${describeError(err)}`);
      this.options.onDelivered?.(report, false);
    }
  }

  async drain(): Promise<void> {
    await Promise.all(Array.from(this.inFlight));
  }

  get pending(): number {
    return this.inFlight.size;
  }
}
