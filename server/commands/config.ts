import { Command } from "commander";
import { z } from "zod";
import {
  ShellTypeSchema,
  loadConfig,
  resetConfig,
  updateShellConfig,
  type ShellConfig,
} from "../store.js";

const SetShellOptionsSchema = z.object({
  distro: z.string().optional(),
  user: z.string().optional(),
  rootDir: z.string().optional(),
});

export function buildShellUpdate(
  type: string,
  rawOptions: unknown
): Partial<Record<keyof ShellConfig, string>> {
  const options = SetShellOptionsSchema.parse(rawOptions);
  const update: Partial<Record<keyof ShellConfig, string>> = { type };
  if (options.distro !== undefined) update.wslDistro = options.distro;
  if (options.user !== undefined) update.wslUser = options.user;
  if (options.rootDir !== undefined) update.rootDir = options.rootDir;
  return update;
}

export function configCommand(): Command {
  const cmd = new Command("config").description("Show or change stored settings");

  cmd
    .command("show")
    .description("Print the effective configuration as JSON")
    .action(() => {
      console.log(JSON.stringify(loadConfig(), null, 2));
    });

  cmd
    .command("set-shell")
    .description(`Choose the shell for new sessions (${ShellTypeSchema.options.join(", ")})`)
    .argument("<type>", "Shell type")
    .option("--distro <name>", "WSL distribution")
    .option("--user <name>", "WSL user")
    .option("--root-dir <dir>", "Starting directory for new sessions")
    .action((type: string, rawOptions: unknown) => {
      const shell = updateShellConfig(buildShellUpdate(type, rawOptions));
      console.log(JSON.stringify(shell, null, 2));
    });

  cmd
    .command("reset")
    .description("Restore the default settings")
    .action(() => {
      resetConfig();
      console.log("Configuration reset to defaults.");
    });

  return cmd;
}
