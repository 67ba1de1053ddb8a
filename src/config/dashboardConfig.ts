import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

const DashboardConfigSchema = z
  .object({
    version: z.literal(1),
    pushmaster: z.string().trim().min(1).max(80),
    listing: z.object({
      defaultRpp: z.number().int().min(1).max(1000),
      maxRpp: z.number().int().min(1).max(1000)
    }),
    server: z.object({
      host: z.enum(["127.0.0.1", "0.0.0.0"]),
      port: z.number().int().min(1).max(65535)
    }),
    storage: z.object({
      databasePath: z.string().min(1)
    })
  })
  .refine((config) => config.listing.defaultRpp <= config.listing.maxRpp, {
    message: "defaultRpp must be <= maxRpp",
    path: ["listing", "defaultRpp"]
  });

export type DashboardConfig = z.infer<typeof DashboardConfigSchema>;

export interface ResolvedDashboardConfig {
  config: DashboardConfig;
  configPath: string;
  source: "default" | "file";
}

export const DEFAULT_DASHBOARD_CONFIG_PATH = path.join(".pushdash", "config.json");

export const DEFAULT_DASHBOARD_CONFIG: DashboardConfig = {
  version: 1,
  pushmaster: "pushmaster",
  listing: {
    defaultRpp: 50,
    maxRpp: 500
  },
  server: {
    host: "127.0.0.1",
    port: 7788
  },
  storage: {
    databasePath: path.join(".pushdash", "pushes.db")
  }
};

function makeError(code: string, message: string): Error {
  return new Error(`${code}: ${message}`);
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }

  return undefined;
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const pathLabel = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${pathLabel} ${issue.message}`;
    })
    .join("; ")
    .slice(0, 500);
}

export function parseDashboardConfig(raw: unknown): DashboardConfig {
  const result = DashboardConfigSchema.safeParse(raw);
  if (!result.success) {
    throw makeError("E_PUSHDASH_CONFIG_INVALID", formatZodIssues(result.error));
  }

  return result.data;
}

export async function loadDashboardConfig(options: {
  configPath?: string;
  cwd?: string;
} = {}): Promise<ResolvedDashboardConfig> {
  const cwd = options.cwd ?? process.cwd();
  const requestedPath = options.configPath?.trim();
  const resolvedPath = path.resolve(cwd, requestedPath && requestedPath.length > 0 ? requestedPath : DEFAULT_DASHBOARD_CONFIG_PATH);

  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, "utf8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      if (requestedPath && requestedPath.length > 0) {
        throw makeError("E_PUSHDASH_CONFIG_NOT_FOUND", `config file not found: ${resolvedPath}`);
      }

      return {
        config: DEFAULT_DASHBOARD_CONFIG,
        configPath: resolvedPath,
        source: "default"
      };
    }

    const message = error instanceof Error ? error.message : String(error);
    throw makeError("E_PUSHDASH_CONFIG_READ", message.slice(0, 220));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw makeError("E_PUSHDASH_CONFIG_INVALID_JSON", message.slice(0, 220));
  }

  return {
    config: parseDashboardConfig(parsed),
    configPath: resolvedPath,
    source: "file"
  };
}
