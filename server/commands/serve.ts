import { Command } from "commander";
import { dirname } from "path";
import { z } from "zod";
import { ShellcastServer } from "../http/server.js";
import { getConfigStore, type ShellcastConfig } from "../store.js";
import { initializeLogger, logError, logInfo, setVerboseLogging } from "../utils/logger.js";

const ServeOptionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().min(1).optional(),
  verbose: z.boolean().optional(),
});

export type ServeOptions = z.infer<typeof ServeOptionsSchema>;

/** Command-line flags win over stored settings and the environment. */
export function applyServeOptions(config: ShellcastConfig, options: ServeOptions): ShellcastConfig {
  return {
    ...config,
    server: {
      ...config.server,
      port: options.port ?? config.server.port,
      host: options.host ?? config.server.host,
    },
  };
}

export function serveCommand(): Command {
  return new Command("serve")
    .description("Start the terminal and broadcast server")
    .option("-p, --port <port>", "Port to listen on")
    .option("-H, --host <host>", "Interface to bind")
    .option("-v, --verbose", "Log debug output to the console")
    .action(async (rawOptions: unknown) => {
      const options = ServeOptionsSchema.parse(rawOptions);
      if (options.verbose) {
        setVerboseLogging(true);
      }

      const store = getConfigStore();
      initializeLogger(dirname(store.path));

      const server = new ShellcastServer({
        getConfig: () => applyServeOptions(store.load(), options),
      });
      const address = await server.start();
      console.log(`shellcast listening on http://${address.address}:${address.port}`);

      let stopping = false;
      const shutdown = (signal: NodeJS.Signals) => {
        if (stopping) return;
        stopping = true;
        logInfo("Shutting down", { signal });
        server
          .stop()
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            logError("Shutdown failed", error);
            process.exit(1);
          });
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });
}
