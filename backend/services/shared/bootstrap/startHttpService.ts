// backend/services/shared/bootstrap/startHttpService.ts
import type { Server } from "node:http";
import type { Express } from "express";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  port: number; // allow 0 in tests for ephemeral port
  serviceName: string;
  logger: Logger;
  /** Runs after the server stops accepting connections (e.g., close the DB). */
  onShutdown?: () => Promise<void>;
}

export interface StartedService {
  server: Server;
  boundPort: number;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const { app, port, serviceName, logger, onShutdown } = opts;

  return new Promise((resolve, reject) => {
    const server = app.listen(port);

    const stop = () =>
      new Promise<void>((done, fail) => {
        server.close((err) => (err ? fail(err) : done()));
      }).then(() => onShutdown?.());

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

    server.once("listening", () => {
      const addr = server.address();
      const boundPort = addr && typeof addr === "object" ? addr.port : port;
      logger.info(
        { service: serviceName, port: boundPort },
        "service listening"
      );

      server.on("error", (err) => {
        logger.error({ err, service: serviceName }, "http server error");
      });
      process.once("SIGTERM", () => shutdown("SIGTERM"));
      process.once("SIGINT", () => shutdown("SIGINT"));

      resolve({ server, boundPort, stop });
    });

    server.once("error", reject);
  });
}
