export const PROBING_REPLIES = [
  "Please explain further, I don't understand what happened.",
  "Which bank is this from? I have accounts in two places.",
  "Where do I send it? Can you share the details again?",
  "Is there a reference or case number I can note down?",
  "What is your name and employee code, sir?",
  "My son handles these things. Can you tell me the exact steps?"
];

export const NEUTRAL_REPLY = "Message looks safe. Thanks for checking.";

/** Rotates through the probing pool by turn so consecutive replies never repeat. */
export function chooseReply(isScam: boolean, turnCount: number): string {
  if (!isScam) return NEUTRAL_REPLY;
  const index = Math.max(0, turnCount - 1) % PROBING_REPLIES.length;
  return PROBING_REPLIES[index];
}

/** Synthetic human typing delay reported in engagement metadata. */
export function syntheticLatencyMs(reply: string): number {
  return 800 + reply.length * 35;
}
