import { serve } from "@hono/node-server";
import { env } from "@/lib/env";
import { createApp } from "@/lib/http/app";

const server = serve({ fetch: createApp().fetch, port: env.PORT }, (info) => {
  console.info(`[server] GitHub Analyzer listening on http://localhost:${info.port}`);
});

function shutdown(signal: string) {
  console.info(`[server] ${signal} received, closing`);
  server.close();
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
