import { spawn } from "node:child_process";
import fs from "node:fs/promises";
import path from "node:path";

import { loadDashboardConfig } from "../config/dashboardConfig";
import {
  startDashboardServer,
  type DashboardServerHandle,
  type StartDashboardServerOptions
} from "../dashboard/server";
import { SqlitePushStore, type PushStore } from "../pushes/store";

export interface ServeArgs {
  configPath?: string;
  host?: "127.0.0.1" | "0.0.0.0";
  port?: number;
  databasePath?: string;
  openMode: "auto" | "open" | "no-open";
}

function makeError(code: string, message: string): Error {
  return new Error(`${code}: ${message}`);
}

function parsePositiveInt(value: string, optionName: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value) || !Number.isInteger(parsed) || parsed <= 0) {
    throw makeError("E_PUSHDASH_ARG_INVALID", `${optionName} must be a positive integer`);
  }

  return parsed;
}

function parseHost(value: string): "127.0.0.1" | "0.0.0.0" {
  if (value === "127.0.0.1" || value === "0.0.0.0") {
    return value;
  }

  throw makeError("E_PUSHDASH_ARG_INVALID", "--host must be 127.0.0.1|0.0.0.0");
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (!value || value.startsWith("--")) {
    throw makeError("E_PUSHDASH_ARG_REQUIRED", flag);
  }

  return value;
}

export function parseServeArgs(argv: string[]): ServeArgs {
  const args: ServeArgs = {
    openMode: "auto"
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index] ?? "";

    if (token === "--help" || token === "-h") {
      throw makeError(
        "E_PUSHDASH_HELP",
        "Usage: pushdash serve [--config <path>] [--host 127.0.0.1|0.0.0.0] [--port <n>] [--db <path>] [--open] [--no-open]"
      );
    }

    if (token === "--config") {
      args.configPath = requireValue(argv, index, "--config");
      index += 1;
      continue;
    }

    if (token === "--host") {
      args.host = parseHost(requireValue(argv, index, "--host").trim());
      index += 1;
      continue;
    }

    if (token === "--port") {
      const parsed = parsePositiveInt(requireValue(argv, index, "--port"), "--port");
      if (parsed > 65535) {
        throw makeError("E_PUSHDASH_ARG_INVALID", "--port must be <= 65535");
      }
      args.port = parsed;
      index += 1;
      continue;
    }

    if (token === "--db") {
      args.databasePath = requireValue(argv, index, "--db");
      index += 1;
      continue;
    }

    if (token === "--open") {
      args.openMode = "open";
      continue;
    }

    if (token === "--no-open") {
      args.openMode = "no-open";
      continue;
    }

    if (token.startsWith("--")) {
      throw makeError("E_PUSHDASH_ARG_UNKNOWN", token);
    }
  }

  return args;
}

function isInteractive(env: NodeJS.ProcessEnv): boolean {
  return Boolean(process.stdout.isTTY && process.stdin.isTTY && env.CI !== "true" && env.CI !== "1");
}

function shouldOpenBrowser(mode: ServeArgs["openMode"], env: NodeJS.ProcessEnv): boolean {
  if (mode === "open") {
    return true;
  }

  if (mode === "no-open") {
    return false;
  }

  return isInteractive(env);
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

async function resolveDashboardAssetRoot(cwd: string): Promise<string> {
  const candidates = [
    path.resolve(__dirname, "..", "..", "apps", "dashboard", "dist"),
    path.resolve(cwd, "dist", "dashboard"),
    path.resolve(cwd, "apps", "dashboard", "dist")
  ];

  for (const candidate of candidates) {
    if (await pathExists(path.join(candidate, "index.html"))) {
      return candidate;
    }
  }

  throw makeError(
    "E_DASHBOARD_ASSETS_MISSING",
    "Dashboard assets not found. Run 'npm run dashboard:build' before starting the dashboard."
  );
}

function openUrl(url: string): void {
  if (process.platform === "darwin") {
    spawn("open", [url], { detached: true, stdio: "ignore" }).unref();
    return;
  }

  if (process.platform === "win32") {
    spawn("cmd", ["/c", "start", "", url], { detached: true, stdio: "ignore" }).unref();
    return;
  }

  spawn("xdg-open", [url], { detached: true, stdio: "ignore" }).unref();
}

/** Starts the server over an open store; the store is closed if the server cannot start. */
export async function startServingStore(
  store: PushStore,
  options: Omit<StartDashboardServerOptions, "store">
): Promise<DashboardServerHandle> {
  try {
    return await startDashboardServer({ ...options, store });
  } catch (error) {
    store.close();
    throw error;
  }
}

export async function runServeCommand(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const args = parseServeArgs(argv);
  const resolved = await loadDashboardConfig({ configPath: args.configPath });
  const config = resolved.config;

  const assetRoot = await resolveDashboardAssetRoot(process.cwd());
  const store = new SqlitePushStore({
    databasePath: args.databasePath ?? config.storage.databasePath
  });

  const server = await startServingStore(store, {
    host: args.host ?? config.server.host,
    port: args.port ?? config.server.port,
    defaultRpp: config.listing.defaultRpp,
    maxRpp: config.listing.maxRpp,
    pushmaster: config.pushmaster,
    assetRoot
  });

  process.stdout.write(`Push dashboard running at ${server.url}/pushes\n`);
  process.stdout.write(`Config: ${resolved.configPath} (${resolved.source})\n`);

  if (shouldOpenBrowser(args.openMode, env)) {
    try {
      openUrl(`${server.url}/pushes`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`Dashboard auto-open failed: ${message}\n`);
    }
  }

  const shutdown = async (): Promise<void> => {
    try {
      await server.close();
      store.close();
      process.stdout.write("Push dashboard stopped.\n");
      process.exit(0);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`Dashboard shutdown failed: ${message}\n`);
      process.exit(1);
    }
  };

  process.once("SIGINT", () => {
    void shutdown();
  });

  process.once("SIGTERM", () => {
    void shutdown();
  });

  return 0;
}
