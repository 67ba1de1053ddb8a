import { runSeedCommand } from "./commands/seed";
import { runServeCommand } from "./commands/serve";

function renderHelp(): string {
  return [
    "Push Dashboard CLI",
    "",
    "Usage:",
    "  pushdash serve [--config path] [--host 127.0.0.1|0.0.0.0] [--port N] [--db path] [--open|--no-open]",
    "  pushdash seed [--config path] [--db path] [--fixture path]",
    ""
  ].join("\n");
}

export async function runCli(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const first = argv[0];

  if (!first) {
    process.stdout.write(renderHelp());
    return 0;
  }

  const command = first.trim().toLowerCase();
  const rest = argv.slice(1);

  if (command === "help" || command === "--help" || command === "-h") {
    process.stdout.write(renderHelp());
    return 0;
  }

  if (command === "serve") {
    return runServeCommand(rest, env);
  }

  if (command === "seed") {
    return runSeedCommand(rest);
  }

  throw new Error(`E_UNKNOWN_COMMAND: '${command}'. Use --help to view supported commands.`);
}

if (require.main === module) {
  runCli()
    .then((code) => {
      // serve keeps the process alive through its listening socket
      if (code !== 0) {
        process.exit(code);
      }
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);

      if (message.startsWith("E_PUSHDASH_HELP:")) {
        process.stdout.write(`${message.replace(/^E_PUSHDASH_HELP:\s*/, "")}\n`);
        process.exit(0);
      }

      process.stderr.write(`Push dashboard CLI failed: ${message}\n`);
      process.exit(1);
    });
}
