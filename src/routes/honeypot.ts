import { Router, Request, Response } from "express";
import type { AppConfig } from "../core/config";
import { fallbackClassification, type HoneypotEngine } from "../core/engine";
import { makeFullSchema } from "../utils/responseSchema";
import { describeError, safeLog, safeStringify, safeWarn, redactHeaders } from "../utils/logging";
import { parseHoneypotBody } from "../utils/requestBody";

function logIncoming(req: Request, body: unknown) {
  safeLog(`[INCOMING] headers: ${safeStringify(redactHeaders(req.headers), 2000)}`);
  safeLog(`[INCOMING] body: ${safeStringify(body, 2000)}`);
}

function logOutgoing(status: number, responseJson: unknown) {
  safeLog(`[OUTGOING] status: ${status} response_json: ${safeStringify(responseJson, 5000)}`);
}

function clientIdentity(req: Request): string {
  return req.ip || req.socket.remoteAddress || "unknown-client";
}

export function createHoneypotRouter(engine: HoneypotEngine, config: Pick<AppConfig, "apiKey">): Router {
  const router = Router();
  const authorized = (req: Request) => !config.apiKey || req.header("x-api-key") === config.apiKey;

  router.get("/honeypot", (_req: Request, res: Response) => {
    return res.status(200).json(makeFullSchema({ agentNotes: "probe" }));
  });

  router.post("/honeypot", async (req: Request, res: Response) => {
    const body: unknown = req.body ?? {};
    logIncoming(req, body);

    if (!authorized(req)) {
      const responseJson = makeFullSchema({ status: "error", agentNotes: "Invalid API key" });
      logOutgoing(401, responseJson);
      return res.status(401).json(responseJson);
    }

    const parsed = parseHoneypotBody(body);
    if (!parsed.text.trim()) {
      const responseJson = makeFullSchema({ status: "error", agentNotes: "Missing message text" });
      logOutgoing(400, responseJson);
      return res.status(400).json(responseJson);
    }

    const clientId = clientIdentity(req);
    try {
      const result = await engine.handleMessage({
        sessionId: parsed.sessionId,
        clientId,
        text: parsed.text,
        history: parsed.history
      });

      if (result.kind === "rate_limited") {
        const responseJson = makeFullSchema({
          status: "error",
          sessionId: parsed.sessionId || clientId,
          agentNotes: "Rate limit exceeded"
        });
        logOutgoing(429, responseJson);
        return res.status(429).json(responseJson);
      }

      const responseJson = makeFullSchema({
        sessionId: result.sessionId,
        scamDetected: result.scamDetected,
        confidence: result.confidence,
        reply: result.reply,
        engagement: result.engagement,
        extractedIntelligence: result.extractedIntelligence,
        agentNotes: `rule=${result.rule}${result.escalated ? ", escalated" : ""}`
      });
      logOutgoing(200, responseJson);
      return res.status(200).json(responseJson);
    } catch (err) {
      safeWarn(`[ERROR] honeypot turn failed: ${describeError(err)}`);
      const fallback = fallbackClassification(parsed.text);
      const responseJson = makeFullSchema({
        sessionId: parsed.sessionId || clientId,
        scamDetected: fallback.scamDetected,
        confidence: fallback.confidence,
        agentNotes: "fallback due to internal error"
      });
      logOutgoing(200, responseJson);
      return res.status(200).json(responseJson);
    }
  });

  router.get("/stats", (req: Request, res: Response) => {
    if (!authorized(req)) {
      return res.status(401).json({ status: "error", agentNotes: "Invalid API key" });
    }
    const corpus = engine.corpusSummary();
    return res.status(200).json({
      ...engine.stats.snapshot(),
      activeSessions: engine.store.size,
      keywordsUsed: corpus.keywords,
      datasetSize: corpus.sentences,
      topPaymentIds: engine.store.artifacts.top(10)
    });
  });

  return router;
}
