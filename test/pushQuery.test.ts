import assert from "node:assert/strict";
import test from "node:test";

import { PushQuery, parseListQuery, validateFilter, validateWindow } from "../src/pushes/pushQuery";
import type { FilterState, PushSummary } from "../src/pushes/types";
import { createFakeStore, createSeededStore } from "./pushStoreHarness";

function ids(pushes: PushSummary[]): number[] {
  return pushes.map((push) => push.id);
}

test("PushQuery pages through every push newest first", async () => {
  const store = await createSeededStore();
  const query = new PushQuery({ store, maxRpp: 500 });

  try {
    const first = await query.list({}, { rpp: 2, offset: 0 });
    assert.equal(first.totalCount, 5);
    assert.deepEqual(ids(first.pushes), [5, 4]);

    assert.deepEqual(ids((await query.list({}, { rpp: 2, offset: 2 })).pushes), [3, 2]);
    assert.deepEqual(ids((await query.list({}, { rpp: 2, offset: 4 })).pushes), [1]);

    const past = await query.list({}, { rpp: 2, offset: 10 });
    assert.deepEqual(past.pushes, []);
    assert.equal(past.totalCount, 5);
  } finally {
    store.close();
  }
});

test("PushQuery applies state and pushmaster filters to rows and count", async () => {
  const store = await createSeededStore();
  const query = new PushQuery({ store, maxRpp: 500 });

  try {
    const live = await query.list({ state: "live" }, { rpp: 50, offset: 0 });
    assert.deepEqual(ids(live.pushes), [3, 2]);
    assert.equal(live.totalCount, 2);

    const alice = await query.list({ user: "alice" }, { rpp: 50, offset: 0 });
    assert.deepEqual(ids(alice.pushes), [5, 3, 1]);
    assert.equal(alice.totalCount, 3);

    const both = await query.list({ state: "accepting", user: "alice" }, { rpp: 1, offset: 1 });
    assert.deepEqual(ids(both.pushes), [1]);
    assert.equal(both.totalCount, 2);

    const nobody = await query.list({ user: "zed" }, { rpp: 50, offset: 0 });
    assert.deepEqual(nobody, { pushes: [], totalCount: 0 });
  } finally {
    store.close();
  }
});

test("PushQuery returns summary fields as stored", async () => {
  const store = await createSeededStore();
  const query = new PushQuery({ store, maxRpp: 500 });

  try {
    const page = await query.list({ user: "bob" }, { rpp: 50, offset: 0 });
    assert.deepEqual(page.pushes, [
      {
        id: 2,
        title: "Monday urgent",
        user: "bob",
        pushType: "urgent",
        branch: "deploy-monday-urgent",
        state: "live",
        stateError: null,
        created: 2000,
        modified: 2500
      }
    ]);
  } finally {
    store.close();
  }
});

test("PushQuery rejects invalid windows before touching the store", async () => {
  const query = new PushQuery({ store: createFakeStore(), maxRpp: 500 });

  await assert.rejects(query.list({}, { rpp: 0, offset: 0 }), /E_PUSH_WINDOW_INVALID: rpp must be a positive integer/);
  await assert.rejects(query.list({}, { rpp: 501, offset: 0 }), /E_PUSH_WINDOW_INVALID: rpp must be <= 500/);
  await assert.rejects(query.list({}, { rpp: 10, offset: -1 }), /E_PUSH_WINDOW_INVALID: offset must be a non-negative integer/);
  await assert.rejects(query.list({}, { rpp: 1.5, offset: 0 }), /E_PUSH_WINDOW_INVALID/);
});

test("validateFilter rejects states outside the known set and empty users", () => {
  const unknownState: FilterState = JSON.parse('{"state":"open"}');
  assert.throws(() => validateFilter(unknownState), /E_PUSH_FILTER_INVALID: state must be accepting\|live\|discarded, got 'open'/);
  assert.throws(() => validateFilter({ user: "" }), /E_PUSH_FILTER_INVALID/);
  assert.doesNotThrow(() => validateFilter({ state: "discarded", user: "carol" }));
  assert.doesNotThrow(() => validateWindow({ rpp: 500, offset: 0 }, 500));
});

test("PushQuery wraps store failures as backend unavailable", async () => {
  const query = new PushQuery({
    store: createFakeStore({
      countPushes: async () => {
        throw new Error("disk I/O error");
      },
      listPushes: async () => []
    }),
    maxRpp: 500
  });

  await assert.rejects(query.list({}, { rpp: 10, offset: 0 }), (error: unknown) => {
    assert.ok(error instanceof Error);
    assert.equal(error.message, "E_PUSH_BACKEND_UNAVAILABLE: disk I/O error");
    return true;
  });
});

test("PushQuery never returns more than rpp rows", async () => {
  const row: PushSummary = {
    id: 1,
    title: "t",
    user: "u",
    pushType: "regular",
    branch: "b",
    state: "accepting",
    stateError: null,
    created: 1,
    modified: 1
  };
  const query = new PushQuery({
    store: createFakeStore({
      countPushes: async () => 3,
      listPushes: async () => [row, { ...row, id: 2 }, { ...row, id: 3 }]
    }),
    maxRpp: 500
  });

  const page = await query.list({}, { rpp: 2, offset: 0 });
  assert.deepEqual(ids(page.pushes), [1, 2]);
  assert.equal(page.totalCount, 3);
});

test("parseListQuery treats empty values as absent and applies defaults", () => {
  const parsed = parseListQuery(new URLSearchParams("rpp=&offset=&state=&user="), { rpp: 50 });
  assert.deepEqual(parsed, { filter: {}, window: { rpp: 50, offset: 0 } });

  const full = parseListQuery(new URLSearchParams("rpp=25&offset=75&state=live&user=alice"), { rpp: 50 });
  assert.deepEqual(full, { filter: { state: "live", user: "alice" }, window: { rpp: 25, offset: 75 } });
});

test("parseListQuery rejects malformed values with the matching code", () => {
  assert.throws(() => parseListQuery(new URLSearchParams("rpp=abc"), { rpp: 50 }), /E_PUSH_WINDOW_INVALID: rpp must be a non-negative integer/);
  assert.throws(() => parseListQuery(new URLSearchParams("offset=-3"), { rpp: 50 }), /E_PUSH_WINDOW_INVALID: offset must be a non-negative integer/);
  assert.throws(() => parseListQuery(new URLSearchParams("state=open"), { rpp: 50 }), /E_PUSH_FILTER_INVALID/);
});
