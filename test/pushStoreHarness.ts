import Database from "better-sqlite3";

import { parsePushFixture, type PushFixtureInput } from "../src/pushes/fixture";
import { SqlitePushStore, type PushStore } from "../src/pushes/store";

/**
 * Five pushes inserted as ids 1..5. Listing order (created DESC, id DESC) is
 * 5, 4, 3, 2, 1: pushes 3 and 4 share a creation time.
 */
export const harnessFixture: PushFixtureInput = {
  version: 1,
  pushes: [
    {
      title: "Monday regular",
      user: "alice",
      branch: "deploy-monday",
      state: "accepting",
      created: 1000,
      items: [{ title: "Old change", user: "dave", repo: "dave", branch: "old_change", created: 1100 }]
    },
    {
      title: "Monday urgent",
      user: "bob",
      branch: "deploy-monday-urgent",
      pushType: "urgent",
      state: "live",
      created: 2000,
      modified: 2500
    },
    {
      title: "Tuesday",
      user: "alice",
      branch: "deploy-tuesday",
      state: "live",
      created: 3000,
      items: [
        {
          title: "Add cache",
          user: "erin",
          repo: "erin",
          branch: "add_cache",
          revision: "aa11",
          created: 3100
        },
        {
          title: "Fix typo",
          user: "frank",
          repo: "frank",
          branch: "fix_typo",
          revision: "bb22",
          state: "added",
          tags: ["urgent", "buildbot"],
          reviewId: 12,
          description: "Spelling in the footer.",
          created: 3050
        }
      ]
    },
    {
      title: "Wednesday",
      user: "carol",
      branch: "deploy-wednesday",
      state: "discarded",
      created: 3000
    },
    {
      title: "Thursday",
      user: "alice",
      branch: "deploy-thursday",
      state: "accepting",
      created: 4000
    }
  ]
};

export async function createSeededStore(): Promise<SqlitePushStore> {
  const store = new SqlitePushStore({ databasePath: ":memory:", now: () => 9000 });
  await store.importFixture(parsePushFixture(harnessFixture));
  return store;
}

/** A row written by another tool, bypassing the store's own checks. */
export interface RawPushRow {
  title: string;
  user: string;
  branch: string;
  state: string;
  created: number;
}

/** Seeds a database file with the harness fixture followed by the raw rows. */
export async function createSeededFileStore(databasePath: string, rawRows: RawPushRow[] = []): Promise<SqlitePushStore> {
  const seeding = new SqlitePushStore({ databasePath });
  try {
    await seeding.importFixture(parsePushFixture(harnessFixture));
  } finally {
    seeding.close();
  }

  const raw = new Database(databasePath);
  try {
    const insert = raw.prepare(
      "INSERT INTO pushes (title, user, branch, state, pushtype, created, modified) VALUES (?, ?, ?, ?, 'regular', ?, ?)"
    );
    for (const row of rawRows) {
      insert.run(row.title, row.user, row.branch, row.state, row.created, row.created);
    }
  } finally {
    raw.close();
  }

  return new SqlitePushStore({ databasePath, now: () => 9000 });
}

function unexpected(method: string): () => Promise<never> {
  return async () => {
    throw new Error(`unexpected call to ${method}`);
  };
}

/** A store whose methods reject unless overridden. */
export function createFakeStore(overrides: Partial<PushStore> = {}): PushStore {
  return {
    countPushes: unexpected("countPushes"),
    listPushes: unexpected("listPushes"),
    getPush: unexpected("getPush"),
    listItems: unexpected("listItems"),
    createPush: unexpected("createPush"),
    importFixture: unexpected("importFixture"),
    close: () => undefined,
    ...overrides
  };
}
