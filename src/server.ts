import express, { Express } from "express";
import dotenv from "dotenv";
import cors from "cors";
import { createClient } from "@supabase/supabase-js";
import { HttpReportSink } from "./core/callback";
import { HoneypotEngine } from "./core/engine";
import { createGenerationCapability } from "./core/providers";
import { InMemorySessionStore, SessionStore, SupabaseSessionStore } from "./core/sessionStore";
import { HoneypotService, createHoneypotRouter } from "./routes/honeypot";
import { ServerConfig, loadEngineConfig, loadServerConfig } from "./utils/config";
import { logEvent, maskApiKey } from "./utils/logging";

export function createSessionStore(config: ServerConfig): SessionStore {
  if (config.sessionBackend === "supabase") {
    if (!config.supabaseUrl || !config.supabaseKey) {
      throw new Error("SESSION_BACKEND=supabase needs SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY");
    }
    const client = createClient(config.supabaseUrl, config.supabaseKey, { auth: { persistSession: false } });
    return new SupabaseSessionStore(client);
  }
  return new InMemorySessionStore({ persistFile: config.sessionsFile });
}

export function buildEngine(env: NodeJS.ProcessEnv, serverConfig: ServerConfig): HoneypotEngine {
  const config = loadEngineConfig(env);
  return new HoneypotEngine({
    store: createSessionStore(serverConfig),
    capability: createGenerationCapability(env),
    sink: new HttpReportSink(config.callback.url, config.callback.timeoutMs),
    config
  });
}

export function createApp(engine: HoneypotService, options: { apiKey: string }): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ type: "*/*", limit: "2mb" }));
  app.use(express.urlencoded({ extended: true }));

  app.use("/api", createHoneypotRouter(engine, options));

  app.get("/health", (_req, res) => {
    return res.json({ ok: true });
  });

  return app;
}

if (require.main === module) {
  dotenv.config();
  const serverConfig = loadServerConfig(process.env);
  const engine = buildEngine(process.env, serverConfig);
  const app = createApp(engine, { apiKey: serverConfig.apiKey });
  app.listen(serverConfig.port, () => {
    logEvent(
      "SERVER",
      `Honeypot API listening on port ${serverConfig.port} (sessions=${serverConfig.sessionBackend}, key=${maskApiKey(serverConfig.apiKey)})`
    );
  });
}
