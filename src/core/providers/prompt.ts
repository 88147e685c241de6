export function buildProbabilityPrompt(text: string): string {
  return [
    "You score short chat messages for financial or social-engineering scam intent.",
    "Typical signals: OTP or PIN requests, payment ids, urgent account threats, prize or refund bait, verification links.",
    "Return STRICT JSON only: {\"probability\": number between 0 and 1}.",
    `message: ${text.slice(0, 2000)}`
  ].join("\n");
}
