import path from "node:path";

import { loadDashboardConfig } from "../config/dashboardConfig";
import { loadPushFixture } from "../pushes/fixture";
import { SqlitePushStore } from "../pushes/store";

export interface SeedArgs {
  configPath?: string;
  databasePath?: string;
  fixturePath: string;
}

export const DEFAULT_FIXTURE_PATH = path.join("fixtures", "pushes.sample.json");

function makeError(code: string, message: string): Error {
  return new Error(`${code}: ${message}`);
}

export function parseSeedArgs(argv: string[]): SeedArgs {
  const args: SeedArgs = {
    fixturePath: DEFAULT_FIXTURE_PATH
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index] ?? "";

    if (token === "--help" || token === "-h") {
      throw makeError("E_PUSHDASH_HELP", "Usage: pushdash seed [--config <path>] [--db <path>] [--fixture <path>]");
    }

    if (token === "--config" || token === "--db" || token === "--fixture") {
      const value = argv[index + 1];
      if (!value || value.startsWith("--")) {
        throw makeError("E_PUSHDASH_ARG_REQUIRED", token);
      }

      if (token === "--config") {
        args.configPath = value;
      } else if (token === "--db") {
        args.databasePath = value;
      } else {
        args.fixturePath = value;
      }

      index += 1;
      continue;
    }

    if (token.startsWith("--")) {
      throw makeError("E_PUSHDASH_ARG_UNKNOWN", token);
    }
  }

  return args;
}

export async function runSeedCommand(argv: string[] = process.argv.slice(2)): Promise<number> {
  const args = parseSeedArgs(argv);
  const { config } = await loadDashboardConfig({ configPath: args.configPath });
  const fixture = await loadPushFixture(path.resolve(args.fixturePath));

  const databasePath = args.databasePath ?? config.storage.databasePath;
  const store = new SqlitePushStore({ databasePath });

  try {
    const imported = await store.importFixture(fixture);
    process.stdout.write(`Seeded ${imported.pushes} pushes and ${imported.items} items into ${databasePath}\n`);
  } finally {
    store.close();
  }

  return 0;
}
