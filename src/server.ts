import express from "express";
import dotenv from "dotenv";
import cors from "cors";
import { loadConfig } from "./core/config";
import { createEngine } from "./core/engine";
import { createHoneypotRouter } from "./routes/honeypot";
import { describeError, safeLog, safeWarn } from "./utils/logging";

dotenv.config();

const config = loadConfig();
const engine = createEngine(config);

const app = express();
app.set("trust proxy", true);
app.use(cors());
app.use(express.json({ type: "*/*", limit: "2mb" }));
app.use(express.urlencoded({ extended: true }));

app.use("/api", createHoneypotRouter(engine, config));

app.get("/health", (_req, res) => {
  return res.json({ ok: true });
});

const sweep = setInterval(() => {
  const removed = engine.store.sweepExpired();
  if (removed.sessions > 0 || removed.buckets > 0) {
    safeLog(`[SWEEP] expired sessions=${removed.sessions} buckets=${removed.buckets}`);
  }
}, config.sessionSweepMs);
sweep.unref();

const server = app.listen(config.port, () => {
  safeLog(`Scam honeypot API listening on port ${config.port}`);
});

function shutdown(signal: string) {
  safeLog(`[SHUTDOWN] ${signal}: draining escalation deliveries`);
  clearInterval(sweep);
  server.close();
  engine
    .drain()
    .catch((err: unknown) => safeWarn(`[SHUTDOWN] drain failed: ${describeError(err)}`))
    .finally(() => process.exit(0));
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
