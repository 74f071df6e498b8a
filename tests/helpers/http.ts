import express from 'express';
import { Server } from 'http';

export interface TestResponse {
  status: number;
  body: unknown;
}

export interface TestClient {
  request(
    method: string,
    path: string,
    options?: { json?: unknown; raw?: string; headers?: Record<string, string> },
  ): Promise<TestResponse>;
  close(): Promise<void>;
}

/** Serve the app on an ephemeral local port. */
export function startTestServer(app: express.Application): Promise<TestClient> {
  return new Promise((resolve) => {
    const server: Server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      const baseUrl = `http://127.0.0.1:${port}`;

      resolve({
        async request(method, path, options = {}) {
          const headers: Record<string, string> = { ...options.headers };
          const init: RequestInit = { method, headers };
          if (options.json !== undefined) {
            headers['Content-Type'] = 'application/json';
            init.body = JSON.stringify(options.json);
          } else if (options.raw !== undefined) {
            headers['Content-Type'] = headers['Content-Type'] ?? 'application/json';
            init.body = options.raw;
          }
          const res = await fetch(`${baseUrl}${path}`, init);
          const text = await res.text();
          return { status: res.status, body: text ? JSON.parse(text) : undefined };
        },
        close() {
          return new Promise((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
            server.closeAllConnections();
          });
        },
      });
    });
  });
}

/** Read a nested field from an untyped JSON body. */
export function field(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Object.getOwnPropertyDescriptor(current, key)?.value;
  }
  return current;
}
