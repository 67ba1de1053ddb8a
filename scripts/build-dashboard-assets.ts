import fs from "node:fs/promises";
import path from "node:path";

import { build } from "vite";

async function run(): Promise<void> {
  const root = process.cwd();
  const workspaceDir = path.join(root, "apps", "dashboard");
  const sourceDir = path.join(workspaceDir, "dist");
  const destinationDir = path.join(root, "dist", "dashboard");

  await build({
    configFile: path.join(workspaceDir, "vite.config.ts"),
    logLevel: "warn"
  });

  await fs.rm(destinationDir, { recursive: true, force: true });
  await fs.mkdir(path.dirname(destinationDir), { recursive: true });
  await fs.cp(sourceDir, destinationDir, { recursive: true });

  console.log(`Dashboard assets synced to ${destinationDir}`);
}

run().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Dashboard asset build failed: ${message}`);
  process.exit(1);
});
