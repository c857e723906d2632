import Conf from "conf";
import { z } from "zod";
import { ConfigError } from "./utils/errorTypes.js";
import { logWarn } from "./utils/logger.js";

export const ShellTypeSchema = z.enum(["bash", "cmd", "powershell", "wsl"]);
export type ShellType = z.infer<typeof ShellTypeSchema>;

export const ShellConfigSchema = z.object({
  type: ShellTypeSchema,
  wslDistro: z.string(),
  wslUser: z.string(),
  /** Empty means the user's home directory */
  rootDir: z.string(),
});

export const ServerConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  allowedOrigins: z.array(z.string().min(1)),
});

export const HubConfigSchema = z.object({
  queueCapacity: z.number().int().positive(),
  pingIntervalMs: z.number().int().positive(),
});

export const TerminalConfigSchema = z.object({
  highWatermarkBytes: z.number().int().positive(),
  lowWatermarkBytes: z.number().int().nonnegative(),
  defaultCols: z.number().int().positive(),
  defaultRows: z.number().int().positive(),
});

export const ShellcastConfigSchema = z.object({
  shell: ShellConfigSchema,
  server: ServerConfigSchema,
  hub: HubConfigSchema,
  terminal: TerminalConfigSchema,
});

export type ShellConfig = z.infer<typeof ShellConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type HubConfig = z.infer<typeof HubConfigSchema>;
export type TerminalConfig = z.infer<typeof TerminalConfigSchema>;
export type ShellcastConfig = z.infer<typeof ShellcastConfigSchema>;

function buildDefaultOrigins(): string[] {
  const origins: string[] = [];
  for (const scheme of ["http", "https"]) {
    for (const port of [8080, 8081, 5173]) {
      for (const host of ["localhost", "127.0.0.1"]) {
        origins.push(`${scheme}://${host}:${port}`);
      }
    }
  }
  return origins;
}

export const DEFAULT_ALLOWED_ORIGINS: readonly string[] = buildDefaultOrigins();

export const DEFAULT_CONFIG: ShellcastConfig = {
  shell: {
    type: process.platform === "win32" ? "cmd" : "bash",
    wslDistro: "",
    wslUser: "",
    rootDir: "",
  },
  server: {
    host: "127.0.0.1",
    port: 8080,
    allowedOrigins: [...DEFAULT_ALLOWED_ORIGINS],
  },
  hub: {
    queueCapacity: 256,
    pingIntervalMs: 30000,
  },
  terminal: {
    highWatermarkBytes: 1024 * 1024,
    lowWatermarkBytes: 256 * 1024,
    defaultCols: 80,
    defaultRows: 24,
  },
};

type SectionName = keyof ShellcastConfig;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Merge a stored section over its defaults, replacing only the fields that
 * fail validation.
 */
function repairSection(
  section: SectionName,
  schema: z.AnyZodObject,
  stored: unknown,
  defaults: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...defaults, ...(isRecord(stored) ? stored : {}) };
  const result = schema.safeParse(merged);
  if (result.success) {
    return merged;
  }

  const invalidKeys = new Set(result.error.issues.map((issue) => String(issue.path[0])));
  logWarn("Invalid stored config values replaced with defaults", {
    section,
    keys: Array.from(invalidKeys),
  });
  for (const key of invalidKeys) {
    merged[key] = defaults[key];
  }
  return merged;
}

export function normalizeConfig(raw: unknown): ShellcastConfig {
  const stored = isRecord(raw) ? raw : {};
  return ShellcastConfigSchema.parse({
    shell: repairSection("shell", ShellConfigSchema, stored.shell, DEFAULT_CONFIG.shell),
    server: repairSection("server", ServerConfigSchema, stored.server, DEFAULT_CONFIG.server),
    hub: repairSection("hub", HubConfigSchema, stored.hub, DEFAULT_CONFIG.hub),
    terminal: repairSection("terminal", TerminalConfigSchema, stored.terminal, DEFAULT_CONFIG.terminal),
  });
}

/**
 * Environment overrides are applied on every load and never written back.
 */
export function applyEnvOverrides(
  config: ShellcastConfig,
  env: NodeJS.ProcessEnv = process.env
): ShellcastConfig {
  const server = { ...config.server };

  if (env.SHELLCAST_PORT) {
    const port = Number(env.SHELLCAST_PORT);
    if (ServerConfigSchema.shape.port.safeParse(port).success) {
      server.port = port;
    } else {
      logWarn("Ignoring invalid SHELLCAST_PORT", { value: env.SHELLCAST_PORT });
    }
  }

  if (env.SHELLCAST_HOST) {
    server.host = env.SHELLCAST_HOST;
  }

  if (env.SHELLCAST_ALLOWED_ORIGINS) {
    const origins = env.SHELLCAST_ALLOWED_ORIGINS.split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0);
    if (origins.length > 0) {
      server.allowedOrigins = origins;
    }
  }

  return { ...config, server };
}

export interface ConfigStoreOptions {
  /** Directory holding config.json; defaults to the OS config directory */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigStore {
  private readonly store: Conf<ShellcastConfig>;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ConfigStoreOptions = {}) {
    this.store = new Conf<ShellcastConfig>({
      projectName: "shellcast",
      cwd: options.cwd,
      defaults: DEFAULT_CONFIG,
    });
    this.env = options.env ?? process.env;
  }

  get path(): string {
    return this.store.path;
  }

  /** Effective configuration: stored values, repaired, with env overrides. */
  load(): ShellcastConfig {
    const raw: unknown = this.store.store;
    return applyEnvOverrides(normalizeConfig(raw), this.env);
  }

  updateShellConfig(update: Partial<Record<keyof ShellConfig, string>>): ShellConfig {
    const current = normalizeConfig(this.store.store).shell;
    const result = ShellConfigSchema.safeParse({ ...current, ...update });
    if (!result.success) {
      throw new ConfigError("Invalid shell configuration", {
        issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }

    this.store.set("shell", result.data);
    return result.data;
  }

  reset(): void {
    this.store.clear();
  }
}

let defaultStore: ConfigStore | null = null;

export function getConfigStore(): ConfigStore {
  if (!defaultStore) {
    defaultStore = new ConfigStore();
  }
  return defaultStore;
}

export function loadConfig(): ShellcastConfig {
  return getConfigStore().load();
}

export function updateShellConfig(update: Partial<Record<keyof ShellConfig, string>>): ShellConfig {
  return getConfigStore().updateShellConfig(update);
}

export function resetConfig(): void {
  getConfigStore().reset();
}
