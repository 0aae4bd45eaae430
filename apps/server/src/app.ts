import type { IncomingMessage, Server, ServerResponse } from "node:http";
import { createServer } from "node:http";
import { RPCHandler } from "@orpc/server/node";
import { RequestHeadersPlugin } from "@orpc/server/plugins";

import type { ApiConfig, SessionStore } from "@attendance/api";
import { router } from "@attendance/api";
import type { Repositories } from "@attendance/db";
import { createLogger } from "@attendance/shared/logger";

export const RPC_PREFIX = "/rpc";

const log = createLogger("server");

export interface ServerDeps {
  repos: Repositories;
  sessions: SessionStore;
  config: ApiConfig;
}

/**
 * HTTP server exposing the router under `/rpc`, plus a health check.
 */
export function createAppServer(deps: ServerDeps): Server {
  const handler = new RPCHandler(router, {
    plugins: [new RequestHeadersPlugin()],
  });

  const handle = async (req: IncomingMessage, res: ServerResponse) => {
    if (req.method === "GET" && req.url === "/healthz") {
      res.writeHead(200, { "content-type": "application/json" });
      res.end(JSON.stringify({ status: "ok" }));
      return;
    }

    const { matched } = await handler.handle(req, res, {
      prefix: RPC_PREFIX,
      context: {
        repos: deps.repos,
        sessions: deps.sessions,
        config: deps.config,
      },
    });

    if (!matched) {
      res.writeHead(404, { "content-type": "text/plain" });
      res.end("Not found");
    }
  };

  return createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      log.error(`Request failed: ${req.method} ${req.url}`, error);
      if (!res.headersSent) {
        res.writeHead(500, { "content-type": "text/plain" });
      }
      res.end();
    });
  });
}

export function listen(server: Server, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      const address = server.address();
      resolve(typeof address === "object" && address ? address.port : port);
    });
  });
}

export function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
