import { existsSync, statSync } from "fs";
import { homedir } from "os";
import type { ShellConfig } from "../../store.js";

export interface ResolvedShell {
  shell: string;
  args: string[];
  /** Host-side working directory of the spawned process */
  cwd: string;
}

export interface ShellResolveOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  isDirectory?: (path: string) => boolean;
}

function defaultIsDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function getDefaultShell(env: NodeJS.ProcessEnv = process.env): string {
  if (env.SHELL) {
    return env.SHELL;
  }

  for (const shell of ["/bin/bash", "/bin/zsh", "/bin/sh"]) {
    if (existsSync(shell)) {
      return shell;
    }
  }

  return "/bin/sh";
}

export function getDefaultShellArgs(shell: string): string[] {
  const shellName = shell.toLowerCase();
  if (shellName.includes("zsh") || shellName.includes("bash")) {
    return ["-l"];
  }
  return [];
}

/**
 * `rootDir` when it names an existing directory, otherwise the home directory.
 */
export function resolveWorkingDirectory(
  rootDir: string,
  homeDir: string,
  isDirectory: (path: string) => boolean = defaultIsDirectory
): string {
  if (rootDir && isDirectory(rootDir)) {
    return rootDir;
  }
  return homeDir;
}

function resolveWindowsShell(
  config: ShellConfig,
  homeDir: string,
  isDirectory: (path: string) => boolean
): ResolvedShell {
  switch (config.type) {
    case "wsl": {
      const args: string[] = [];
      if (config.wslDistro) {
        args.push("-d", config.wslDistro);
      }
      if (config.wslUser) {
        args.push("-u", config.wslUser);
      }
      // rootDir is a path inside the distro, so it is handed to wsl.exe as is
      args.push("--cd", config.rootDir || "~", "-e", "bash", "-l");
      return { shell: "wsl.exe", args, cwd: homeDir };
    }
    case "powershell":
      return {
        shell: "powershell.exe",
        args: ["-NoLogo"],
        cwd: resolveWorkingDirectory(config.rootDir, homeDir, isDirectory),
      };
    case "cmd":
    default:
      return {
        shell: "cmd.exe",
        args: [],
        cwd: resolveWorkingDirectory(config.rootDir, homeDir, isDirectory),
      };
  }
}

/**
 * Pick the shell binary, arguments and working directory for a new session.
 * On POSIX the configured shell type is ignored and the login shell is used.
 */
export function resolveShell(config: ShellConfig, options: ShellResolveOptions = {}): ResolvedShell {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? homedir();
  const isDirectory = options.isDirectory ?? defaultIsDirectory;

  if (platform === "win32") {
    return resolveWindowsShell(config, homeDir, isDirectory);
  }

  const shell = getDefaultShell(env);
  return {
    shell,
    args: getDefaultShellArgs(shell),
    cwd: resolveWorkingDirectory(config.rootDir, homeDir, isDirectory),
  };
}

export function buildShellEnv(baseEnv: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(baseEnv)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }

  env.TERM = "xterm-256color";
  env.COLORTERM = "truecolor";

  return env;
}
