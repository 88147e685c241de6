import { redactArtifacts } from "./logging";

type LogTurnInput = {
  sessionId: string;
  turn: number;
  verdict: "SCAM" | "SAFE";
  confidence: number;
  text: string;
};

export function logTurn(input: LogTurnInput): void {
  try {
    const sessionId = input.sessionId || "unknown";
    const turn = Number.isFinite(input.turn) && input.turn > 0 ? input.turn : 1;
    const raw = input.text || "";
    const trimmed = raw.length > 500 ? raw.slice(0, 500) : raw;
    console.log(
      `[SESSION][session=${sessionId}][turn=${turn}][verdict=${input.verdict}][confidence=${input.confidence.toFixed(2)}]`
    );
    console.log(redactArtifacts(trimmed));
  } catch {
    // logging must never break a request
  }
}
