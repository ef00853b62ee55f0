import type { Server } from "node:http";
import { createApp } from "./app.js";
import { loadConfig, type AppConfig } from "./config.js";
import { openDatabase, type Db } from "./db/client.js";

export interface TestServer {
  db: Db;
  config: AppConfig;
  request: (method: string, path: string, options?: { body?: unknown; raw?: string; token?: string }) => Promise<{ status: number; body: unknown }>;
  stop: () => Promise<void>;
}

export const testConfig = (): AppConfig =>
  loadConfig({ NODE_ENV: "test", JWT_SECRET_KEY: "test-secret", DATABASE_FILE: ":memory:" });

/** Serves a fresh in-memory database on an ephemeral port. */
export async function startTestServer(): Promise<TestServer> {
  const config = testConfig();
  const { db, close } = openDatabase(config.databaseFile);
  const app = createApp(db, config);

  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("Test server has no TCP address");
  const baseUrl = `http://127.0.0.1:${address.port}`;

  return {
    db,
    config,
    async request(method, path, options = {}) {
      const headers: Record<string, string> = {};
      let payload: string | undefined;
      if (options.raw !== undefined) payload = options.raw;
      else if (options.body !== undefined) payload = JSON.stringify(options.body);
      if (payload !== undefined) headers["Content-Type"] = "application/json";
      if (options.token) headers["Authorization"] = `Bearer ${options.token}`;

      const res = await fetch(`${baseUrl}${path}`, { method, headers, body: payload });
      const body: unknown = await res.json();
      return { status: res.status, body };
    },
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => {
          close();
          if (err) reject(err);
          else resolve();
        });
      }),
  };
}
