import { Hono } from "hono";
import { errorResponse } from "@/lib/http/respond";
import { MODELS } from "@/lib/genai/models";
import { users } from "@/lib/http/routes/users";
import { repos } from "@/lib/http/routes/repos";

export function createApp() {
  const app = new Hono();

  app.get("/", (c) => c.json({ message: "Welcome to GitHub Analyzer API" }));
  app.get("/api/v1/health", (c) => c.json({ status: "ok", service: "GitHub Analyzer", models: MODELS }));

  app.route("/api/v1/users", users);
  app.route("/api/v1/repos", repos);

  app.notFound((c) => c.json({ errorCode: "NOT_FOUND", error: "Not found" }, 404));
  app.onError((err) => errorResponse(err, "http"));

  return app;
}
