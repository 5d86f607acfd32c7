import { Hono } from "hono";
import { cors } from "hono/cors";
import { createTaskRoutes } from "./task/index.ts";
import type { TaskRouteDeps } from "./task/index.ts";

export interface AppOptions {
  tasks?: TaskRouteDeps;
}

export function createApp(opts?: AppOptions) {
  const app = new Hono();

  app.use("*", cors());

  app.get("/", (c) => {
    return c.json({
      status: "ready",
      note: "POST application/json to /upload-task with the task JSON body.",
    });
  });

  app.get("/health", (c) => {
    return c.json({ status: "ok" });
  });

  if (opts?.tasks) {
    app.route("/upload-task", createTaskRoutes(opts.tasks));
  } else {
    app.post("/upload-task", (c) => {
      return c.json({ error: "Task handler not configured" }, 503);
    });
  }

  return app;
}
