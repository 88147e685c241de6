import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { describeError, safeWarn } from "../utils/logging";
import type { EscalationReport } from "./callback";

export type LogTurnInput = {
  sessionId: string;
  turnIndex: number;
  text: string;
  scamDetected: boolean;
  confidence: number;
  rule: string;
};

let client: SupabaseClient | null = null;

function getClient(): SupabaseClient | null {
  if (client) return client;
  if (process.env.ENABLE_SUPABASE_LOG === "false") return null;
  const url = process.env.SUPABASE_URL;
  const key = process.env.SUPABASE_SERVICE_ROLE_KEY;
  if (!url || !key) return null;
  client = createClient(url, key, { auth: { persistSession: false } });
  return client;
}

export async function logTurnRecord(input: LogTurnInput): Promise<void> {
  const sb = getClient();
  if (!sb) return;
  try {
    const { error } = await sb.from("scam_turns").insert({
      session_id: input.sessionId,
      turn_index: input.turnIndex,
      text: input.text,
      scam_detected: input.scamDetected,
      confidence: input.confidence,
      rule: input.rule,
      ts: new Date().toISOString()
    });
    if (error) safeWarn(`[SUPABASE] turn insert failed: ${error.message}`);
  } catch (err) {
    safeWarn(`[SUPABASE] turn insert failed: ${describeError(err)}`);
  }
}

export async function logEscalationRecord(report: EscalationReport, delivered: boolean): Promise<void> {
  const sb = getClient();
  if (!sb) return;
  try {
    const { error } = await sb.from("scam_escalations").insert({
      session_id: report.sessionId,
      total_messages: report.totalMessagesExchanged,
      intelligence: report.extractedIntelligence,
      agent_notes: report.agentNotes,
      delivered,
      ts: new Date().toISOString()
    });
    if (error) safeWarn(`[SUPABASE] escalation insert failed: ${error.message}`);
  } catch (err) {
    safeWarn(`[SUPABASE] escalation insert failed: ${describeError(err)}`);
  }
}
