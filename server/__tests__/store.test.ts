import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  ConfigStore,
  DEFAULT_ALLOWED_ORIGINS,
  applyEnvOverrides,
  normalizeConfig,
  DEFAULT_CONFIG,
} from "../store.js";
import { ConfigError } from "../utils/errorTypes.js";

describe("ConfigStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "shellcast-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should load defaults on first use", () => {
    const config = new ConfigStore({ cwd: dir, env: {} }).load();

    expect(config.server.port).toBe(8080);
    expect(config.server.host).toBe("127.0.0.1");
    expect(config.shell.type).toBe(process.platform === "win32" ? "cmd" : "bash");
    expect(config.hub.queueCapacity).toBe(256);
    expect(config.server.allowedOrigins).toHaveLength(12);
    expect(config.server.allowedOrigins).toContain("http://localhost:5173");
    expect(config.server.allowedOrigins).toContain("https://127.0.0.1:8081");
  });

  it("should persist shell updates", () => {
    new ConfigStore({ cwd: dir, env: {} }).updateShellConfig({ type: "wsl", wslDistro: "Ubuntu" });

    expect(new ConfigStore({ cwd: dir, env: {} }).load().shell).toEqual({
      type: "wsl",
      wslDistro: "Ubuntu",
      wslUser: "",
      rootDir: "",
    });
  });

  it("should reject an unknown shell type", () => {
    const store = new ConfigStore({ cwd: dir, env: {} });
    expect(() => store.updateShellConfig({ type: "fish" })).toThrow(ConfigError);
    expect(store.load().shell.type).toBe(DEFAULT_CONFIG.shell.type);
  });

  it("should replace invalid stored fields with defaults and keep valid ones", () => {
    writeFileSync(
      join(dir, "config.json"),
      JSON.stringify({ server: { port: -5, host: "0.0.0.0" } }),
      "utf8"
    );

    const config = new ConfigStore({ cwd: dir, env: {} }).load();
    expect(config.server.port).toBe(8080);
    expect(config.server.host).toBe("0.0.0.0");
  });

  it("should reset to defaults", () => {
    const store = new ConfigStore({ cwd: dir, env: {} });
    store.updateShellConfig({ rootDir: "/srv/projects" });
    store.reset();
    expect(store.load().shell.rootDir).toBe("");
  });
});

describe("applyEnvOverrides", () => {
  const base = normalizeConfig({});

  it("should override port, host and allowed origins", () => {
    const config = applyEnvOverrides(base, {
      SHELLCAST_PORT: "9090",
      SHELLCAST_HOST: "0.0.0.0",
      SHELLCAST_ALLOWED_ORIGINS: " https://a.test, ,http://b.test ",
    });

    expect(config.server.port).toBe(9090);
    expect(config.server.host).toBe("0.0.0.0");
    expect(config.server.allowedOrigins).toEqual(["https://a.test", "http://b.test"]);
  });

  it("should ignore an invalid port", () => {
    expect(applyEnvOverrides(base, { SHELLCAST_PORT: "abc" }).server.port).toBe(8080);
    expect(applyEnvOverrides(base, { SHELLCAST_PORT: "70000" }).server.port).toBe(8080);
  });

  it("should keep the default origins when the override is blank", () => {
    expect(applyEnvOverrides(base, { SHELLCAST_ALLOWED_ORIGINS: " , " }).server.allowedOrigins).toEqual(
      [...DEFAULT_ALLOWED_ORIGINS]
    );
  });

  it("should not mutate the input config", () => {
    applyEnvOverrides(base, { SHELLCAST_PORT: "9191" });
    expect(base.server.port).toBe(8080);
  });
});
