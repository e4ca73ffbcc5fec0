// backend/services/shared/bootstrap/startHttpService.ts
import type { Express } from "express";
import type { Server } from "node:http";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  port: number; // 0 in tests for an ephemeral port
  serviceName: string;
  logger: Logger;
}

export interface StartedService {
  server: Server;
  stop: () => Promise<void>;
}

/**
 * Listen, log the bound port, and close cleanly on SIGTERM/SIGINT.
 * Resolves once the server is accepting connections.
 */
export function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const { app, port, serviceName, logger } = opts;

  return new Promise((resolve, reject) => {
    const server = app.listen(port);

    const stop = () =>
      new Promise<void>((done, fail) => {
        server.close((err) => (err ? fail(err) : done()));
      });

    let listening = false;

    // Stays attached for the server's lifetime; a late error is logged, not fatal.
    server.on("error", (err) => {
      logger.error({ err, service: serviceName }, "http server error");
      if (!listening) reject(err);
    });

    server.once("listening", () => {
      listening = true;
      const addr = server.address();
      const boundPort = typeof addr === "object" && addr ? addr.port : port;
      logger.info({ service: serviceName, port: boundPort }, "service listening");

      const shutdown = (signal: string) => {
        logger.info({ signal, service: serviceName }, "shutting down service");
        stop().then(
          () => process.exit(0),
          (err: unknown) => {
            logger.error({ err, service: serviceName }, "shutdown failed");
            process.exit(1);
          }
        );
      };
      process.once("SIGTERM", () => shutdown("SIGTERM"));
      process.once("SIGINT", () => shutdown("SIGINT"));

      resolve({ server, stop });
    });
  });
}
