import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { runCli } from "../src/cli";
import { SqlitePushStore } from "../src/pushes/store";

test("runCli seed imports a fixture into the given database", async () => {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "pushdash-cli-"));

  try {
    const databasePath = path.join(tempDir, "pushes.db");
    const fixturePath = path.join(tempDir, "fixture.json");
    await fs.writeFile(
      fixturePath,
      JSON.stringify({
        version: 1,
        pushes: [
          { title: "One", user: "alice", branch: "deploy-one", created: 100 },
          { title: "Two", user: "bob", branch: "deploy-two", state: "live", created: 200 }
        ]
      }),
      "utf8"
    );

    await assert.rejects(
      runCli(["seed", "--db", databasePath, "--fixture", fixturePath, "--config", path.join(tempDir, "none.json")]),
      /E_PUSHDASH_CONFIG_NOT_FOUND/
    );

    const exitCode = await runCli(["seed", "--db", databasePath, "--fixture", fixturePath]);
    assert.equal(exitCode, 0);

    const store = new SqlitePushStore({ databasePath });
    try {
      const page = await store.listPushes({}, { rpp: 10, offset: 0 });
      assert.deepEqual(
        page.map((push) => push.title),
        ["Two", "One"]
      );
    } finally {
      store.close();
    }
  } finally {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

test("runCli rejects unknown commands", async () => {
  await assert.rejects(runCli(["launch"]), /E_UNKNOWN_COMMAND: 'launch'/);
});
