import fs from "node:fs/promises";

import { z } from "zod";

import { PUSH_STATES, PUSH_TYPES } from "./types";

const FixtureItemSchema = z.object({
  title: z.string().min(1),
  user: z.string().min(1),
  repo: z.string().min(1),
  branch: z.string().min(1),
  revision: z.string().default(""),
  state: z.string().min(1).default("requested"),
  tags: z.array(z.string().min(1)).default([]),
  reviewId: z.number().int().positive().nullable().default(null),
  description: z.string().default(""),
  created: z.number().int().nonnegative(),
  modified: z.number().int().nonnegative().optional()
});

const FixturePushSchema = z.object({
  title: z.string().min(1),
  user: z.string().min(1),
  branch: z.string().min(1),
  pushType: z.enum(PUSH_TYPES).default("regular"),
  state: z.enum(PUSH_STATES).default("accepting"),
  created: z.number().int().nonnegative(),
  modified: z.number().int().nonnegative().optional(),
  items: z.array(FixtureItemSchema).default([])
});

const PushFixtureSchema = z.object({
  version: z.literal(1),
  pushes: z.array(FixturePushSchema)
});

export type PushFixture = z.infer<typeof PushFixtureSchema>;
export type PushFixtureInput = z.input<typeof PushFixtureSchema>;

function makeError(code: string, message: string): Error {
  return new Error(`${code}: ${message}`);
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

export function parsePushFixture(raw: unknown): PushFixture {
  const result = PushFixtureSchema.safeParse(raw);
  if (!result.success) {
    throw makeError("E_PUSHDASH_FIXTURE_INVALID", formatZodIssues(result.error));
  }

  for (const push of result.data.pushes) {
    if (push.modified !== undefined && push.modified < push.created) {
      throw makeError("E_PUSHDASH_FIXTURE_INVALID", `push '${push.title}' modified precedes created`);
    }

    for (const item of push.items) {
      if (item.modified !== undefined && item.modified < item.created) {
        throw makeError("E_PUSHDASH_FIXTURE_INVALID", `item '${item.title}' modified precedes created`);
      }
    }
  }

  return result.data;
}

export async function loadPushFixture(fixturePath: string): Promise<PushFixture> {
  let raw: string;
  try {
    raw = await fs.readFile(fixturePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw makeError("E_PUSHDASH_FIXTURE_READ", message.slice(0, 220));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw makeError("E_PUSHDASH_FIXTURE_INVALID", `invalid JSON (${message.slice(0, 220)})`);
  }

  return parsePushFixture(parsed);
}
