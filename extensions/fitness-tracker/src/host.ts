import http, { type IncomingMessage } from "node:http";
import type { AddressInfo } from "node:net";
import type { FitnessTrackerConfig } from "./config.js";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";

/** The part of `ServerResponse` the handlers write to. */
export type HttpResponse = {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(data?: string | Buffer): unknown;
};

export type HttpRoute = {
  path: string;
  handler: (req: IncomingMessage, res: HttpResponse) => Promise<void>;
};

/** Resolves true once it has answered the request. */
export type HttpHandler = (req: IncomingMessage, res: HttpResponse) => Promise<boolean>;

export type AppHost = {
  config: FitnessTrackerConfig;
  logger: Logger;
  registerHttpRoute(route: HttpRoute): void;
  registerHttpHandler(handler: HttpHandler): void;
};

export type HttpHost = AppHost & {
  dispatch(req: IncomingMessage, res: HttpResponse): Promise<void>;
  listen(): Promise<AddressInfo>;
  close(): Promise<void>;
};

export function createHttpHost(config: FitnessTrackerConfig, logger: Logger): HttpHost {
  const routes = new Map<string, HttpRoute>();
  const handlers: HttpHandler[] = [];

  // Exact-path routes first, then handlers in registration order.
  const dispatch = async (req: IncomingMessage, res: HttpResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const route = routes.get(url.pathname);
    if (route) {
      await route.handler(req, res);
      return;
    }
    for (const handler of handlers) {
      if (await handler(req, res)) {
        return;
      }
    }
    res.statusCode = 404;
    res.end("Not Found");
  };

  const server = http.createServer((req, res) => {
    dispatch(req, res).catch((err: unknown) => {
      logger.error(`Unhandled error for ${req.method ?? "?"} ${req.url ?? "/"}: ${describeError(err)}`);
      if (!res.headersSent) {
        res.statusCode = 500;
      }
      res.end();
    });
  });

  return {
    config,
    logger,
    registerHttpRoute(route) {
      routes.set(route.path, route);
    },
    registerHttpHandler(handler) {
      handlers.push(handler);
    },
    dispatch,

    listen() {
      return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.port, config.host, () => {
          server.off("error", reject);
          const address = server.address();
          if (address === null || typeof address === "string") {
            reject(new Error("Server is not listening on a TCP port"));
            return;
          }
          resolve(address);
        });
      });
    },

    close() {
      return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeIdleConnections();
      });
    },
  };
}
