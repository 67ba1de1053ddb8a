import assert from "node:assert/strict";
import test from "node:test";

import fc from "fast-check";

import { parsePushFixture } from "../../src/pushes/fixture";
import { PushQuery } from "../../src/pushes/pushQuery";
import { SqlitePushStore } from "../../src/pushes/store";
import { PUSH_STATES, type FilterState, type PushSummary } from "../../src/pushes/types";

const USERS = ["alice", "bob", "carol"] as const;

const pushArbitrary = fc.record({
  user: fc.constantFrom(...USERS),
  state: fc.constantFrom(...PUSH_STATES),
  // A narrow range forces creation-time ties.
  created: fc.integer({ min: 1, max: 6 })
});

const filterArbitrary: fc.Arbitrary<FilterState> = fc.record(
  {
    state: fc.constantFrom(...PUSH_STATES),
    user: fc.constantFrom(...USERS)
  },
  { requiredKeys: [] }
);

async function seed(pushes: Array<{ user: string; state: (typeof PUSH_STATES)[number]; created: number }>): Promise<SqlitePushStore> {
  const store = new SqlitePushStore({ databasePath: ":memory:" });
  await store.importFixture(
    parsePushFixture({
      version: 1,
      pushes: pushes.map((push, index) => ({
        title: `push ${index + 1}`,
        branch: `deploy-${index + 1}`,
        ...push
      }))
    })
  );
  return store;
}

function isListingOrder(pushes: PushSummary[]): boolean {
  return pushes.every((push, index) => {
    const previous = pushes[index - 1];
    if (!previous) {
      return true;
    }

    return previous.created > push.created || (previous.created === push.created && previous.id > push.id);
  });
}

test("walking pages visits every matching push exactly once in listing order", async () => {
  await fc.assert(
    fc.asyncProperty(
      fc.array(pushArbitrary, { maxLength: 25 }),
      fc.integer({ min: 1, max: 7 }),
      filterArbitrary,
      async (pushes, rpp, filter) => {
        const store = await seed(pushes);
        const query = new PushQuery({ store, maxRpp: 500 });

        try {
          const everything = await query.list(filter, { rpp: 500, offset: 0 });
          const visited: PushSummary[] = [];

          for (let offset = 0; offset < everything.totalCount; offset += rpp) {
            const page = await query.list(filter, { rpp, offset });
            assert.equal(page.totalCount, everything.totalCount);
            assert.ok(page.pushes.length <= rpp);
            visited.push(...page.pushes);
          }

          assert.deepEqual(
            visited.map((push) => push.id),
            everything.pushes.map((push) => push.id)
          );
          assert.equal(new Set(visited.map((push) => push.id)).size, visited.length);
          assert.ok(isListingOrder(visited));
          assert.ok(
            visited.every(
              (push) =>
                (filter.state === undefined || push.state === filter.state) &&
                (filter.user === undefined || push.user === filter.user)
            )
          );
        } finally {
          store.close();
        }
      }
    ),
    { numRuns: 60 }
  );
});
