import { Command } from "commander";
import { z } from "zod";
import { createWsTransport } from "../../src/clients/wsTransport.js";
import { ConnectionController } from "../../src/services/terminal/ConnectionController.js";
import { setClientVerboseLogging } from "../../src/utils/logger.js";

const AttachOptionsSchema = z.object({
  watch: z.boolean().optional(),
  origin: z.string().optional(),
  verbose: z.boolean().optional(),
});

/** Ctrl-] detaches, as in telnet. */
const DETACH_KEY = "\x1d";

/**
 * Bridge this process's terminal to a remote session until the connection
 * ends. Resolves with the exit code.
 */
export function runAttach(url: string, options: z.infer<typeof AttachOptionsSchema>): Promise<number> {
  const stdin = process.stdin;
  const stdout = process.stdout;

  return new Promise((resolve) => {
    const controller = new ConnectionController({
      url,
      transport: createWsTransport({ origin: options.origin }),
      rows: stdout.rows,
      cols: stdout.columns,
      promptWatcher: options.watch ?? false,
      onOutput: (data) => {
        stdout.write(data);
      },
      onStateChange: (state) => {
        if (state === "reconnecting") {
          process.stderr.write("\r\n[shellcast] connection lost, reconnecting...\r\n");
        } else if (state === "failed") {
          process.stderr.write("\r\n[shellcast] could not reconnect, giving up\r\n");
          finish(1);
        } else if (state === "disconnected") {
          finish(0);
        }
      },
      onAutoResponse: (result) => {
        process.stderr.write(`\r\n[shellcast] answered ${result.responseType} prompt\r\n`);
      },
    });

    const onData = (chunk: Buffer) => {
      const text = chunk.toString("utf8");
      if (text === DETACH_KEY) {
        controller.disconnect();
        return;
      }
      controller.sendInput(text);
    };
    const onResize = () => {
      controller.resize(stdout.rows, stdout.columns);
    };

    let finished = false;
    function finish(code: number): void {
      if (finished) return;
      finished = true;
      stdin.off("data", onData);
      stdout.off("resize", onResize);
      if (stdin.isTTY) stdin.setRawMode(false);
      stdin.pause();
      controller.dispose();
      resolve(code);
    }

    if (stdin.isTTY) stdin.setRawMode(true);
    stdin.on("data", onData);
    stdout.on("resize", onResize);
    stdin.resume();

    controller.connect();
  });
}

export function attachCommand(): Command {
  return new Command("attach")
    .description("Attach this terminal to a remote shell (Ctrl-] to detach)")
    .argument("<url>", "Terminal endpoint, e.g. ws://127.0.0.1:8080/ws/pty")
    .option("-w, --watch", "Answer confirmation prompts automatically")
    .option("--origin <origin>", "Origin header to send")
    .option("-v, --verbose", "Log connection diagnostics to stderr")
    .action(async (url: string, rawOptions: unknown) => {
      const options = AttachOptionsSchema.parse(rawOptions);
      if (options.verbose) {
        setClientVerboseLogging(true);
      }
      process.exitCode = await runAttach(url, options);
    });
}
