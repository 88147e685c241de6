import { isRecord } from "./json";

export type ParsedRequest = {
  sessionId?: string;
  text: string;
  history: string[];
};

function historyText(item: unknown): string | null {
  if (typeof item === "string") return item;
  if (isRecord(item) && typeof item.text === "string") return item.text;
  return null;
}

/** Accepts `message` as a string or `{ text }`, plus a top-level `text` fallback. */
export function parseHoneypotBody(body: unknown): ParsedRequest {
  if (!isRecord(body)) return { text: "", history: [] };

  const message = body.message;
  const text =
    isRecord(message) && typeof message.text === "string"
      ? message.text
      : typeof message === "string"
      ? message
      : typeof body.text === "string"
      ? body.text
      : "";

  const rawId = typeof body.sessionId === "string" ? body.sessionId : body.conversation_id;
  const sessionId = typeof rawId === "string" && rawId.trim() ? rawId.trim() : undefined;

  const rawHistory = Array.isArray(body.conversationHistory) ? body.conversationHistory : [];
  const history = rawHistory.map(historyText).filter((item): item is string => item !== null);

  return { sessionId, text, history };
}
