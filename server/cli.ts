import { Command } from "commander";
import { attachCommand } from "./commands/attach.js";
import { configCommand } from "./commands/config.js";
import { injectCommandCommand } from "./commands/inject.js";
import { serveCommand } from "./commands/serve.js";

export function createProgram(): Command {
  const program = new Command()
    .name("shellcast")
    .description("Shared shell sessions and flow events over WebSockets")
    .version("0.1.0");

  program.addCommand(serveCommand());
  program.addCommand(attachCommand());
  program.addCommand(injectCommandCommand());
  program.addCommand(configCommand());

  return program;
}
