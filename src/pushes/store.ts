import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";
import { z } from "zod";

import { PushDashboardError } from "./errors";
import type { PushFixture } from "./fixture";
import {
  PUSH_TYPES,
  isPushState,
  type FilterState,
  type NewPushFields,
  type PageWindow,
  type PushItem,
  type PushSummary
} from "./types";

/**
 * Query interface over the external push/request records. Listing order is
 * `created DESC, id DESC`; item order is the order requests were added.
 */
export interface PushStore {
  countPushes(filter: FilterState): Promise<number>;
  listPushes(filter: FilterState, window: PageWindow): Promise<PushSummary[]>;
  getPush(pushId: number): Promise<PushSummary | null>;
  listItems(pushId: number): Promise<PushItem[]>;
  createPush(fields: NewPushFields & { user: string }): Promise<PushSummary>;
  importFixture(fixture: PushFixture): Promise<{ pushes: number; items: number }>;
  close(): void;
}

export interface SqlitePushStoreOptions {
  /** File path, or ":memory:" for a private in-process database. */
  databasePath: string;
  now?: () => number;
}

const PushRowSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  user: z.string(),
  branch: z.string(),
  state: z.string(),
  pushtype: z.enum(PUSH_TYPES),
  created: z.number().int(),
  modified: z.number().int()
});

const RequestRowSchema = z.object({
  id: z.number().int(),
  push: z.number().int(),
  title: z.string(),
  user: z.string(),
  repo: z.string(),
  branch: z.string(),
  revision: z.string(),
  state: z.string(),
  tags: z.string(),
  reviewid: z.number().int().nullable(),
  description: z.string(),
  created: z.number().int(),
  modified: z.number().int()
});

const CountRowSchema = z.object({ total: z.number().int() });

function resolveSchemaPath(): string {
  // src/pushes and dist/pushes both sit two levels below the project root.
  return path.resolve(__dirname, "..", "..", "sql", "schema.sql");
}

function openDatabase(databasePath: string): Database.Database {
  try {
    if (databasePath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
    }

    const db = new Database(databasePath);
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    db.exec(fs.readFileSync(resolveSchemaPath(), "utf8"));
    return db;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PushDashboardError("E_PUSH_BACKEND_UNAVAILABLE", `failed to open ${databasePath} (${message.slice(0, 220)})`);
  }
}

function toPushSummary(row: unknown): PushSummary {
  const parsed = PushRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new PushDashboardError("E_PUSH_BACKEND_UNAVAILABLE", "malformed push row", {
      issues: parsed.error.issues.map((issue) => issue.path.join("."))
    });
  }

  const { state } = parsed.data;
  return {
    id: parsed.data.id,
    title: parsed.data.title,
    user: parsed.data.user,
    pushType: parsed.data.pushtype,
    branch: parsed.data.branch,
    state,
    stateError: isPushState(state)
      ? null
      : { code: "E_PUSH_STATE_INVALID", message: `push ${parsed.data.id} has unknown state '${state.slice(0, 40)}'` },
    created: parsed.data.created,
    modified: parsed.data.modified
  };
}

export function splitTags(raw: string): string[] {
  return raw
    .split(",")
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

function toPushItem(row: unknown): PushItem {
  const parsed = RequestRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new PushDashboardError("E_PUSH_BACKEND_UNAVAILABLE", "malformed request row", {
      issues: parsed.error.issues.map((issue) => issue.path.join("."))
    });
  }

  const data = parsed.data;
  return {
    id: data.id,
    pushId: data.push,
    title: data.title,
    user: data.user,
    repo: data.repo,
    branch: data.branch,
    revision: data.revision,
    state: data.state,
    tags: splitTags(data.tags),
    reviewId: data.reviewid,
    description: data.description,
    created: data.created,
    modified: data.modified
  };
}

function buildWhere(filter: FilterState): { clause: string; params: string[] } {
  const conditions: string[] = [];
  const params: string[] = [];

  if (filter.state !== undefined) {
    conditions.push("state = ?");
    params.push(filter.state);
  }

  if (filter.user !== undefined) {
    conditions.push("user = ?");
    params.push(filter.user);
  }

  return {
    clause: conditions.length > 0 ? ` WHERE ${conditions.join(" AND ")}` : "",
    params
  };
}

export class SqlitePushStore implements PushStore {
  private readonly db: Database.Database;
  private readonly now: () => number;

  constructor(options: SqlitePushStoreOptions) {
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));

    this.db = openDatabase(options.databasePath);
  }

  async countPushes(filter: FilterState): Promise<number> {
    const where = buildWhere(filter);
    const row = this.db.prepare(`SELECT COUNT(*) AS total FROM pushes${where.clause}`).get(...where.params);
    return CountRowSchema.parse(row).total;
  }

  async listPushes(filter: FilterState, window: PageWindow): Promise<PushSummary[]> {
    const where = buildWhere(filter);
    const rows = this.db
      .prepare(
        `SELECT id, title, user, branch, state, pushtype, created, modified FROM pushes${where.clause}
         ORDER BY created DESC, id DESC LIMIT ? OFFSET ?`
      )
      .all(...where.params, window.rpp, window.offset);

    return rows.map(toPushSummary);
  }

  async getPush(pushId: number): Promise<PushSummary | null> {
    const row = this.db
      .prepare("SELECT id, title, user, branch, state, pushtype, created, modified FROM pushes WHERE id = ?")
      .get(pushId);

    return row === undefined ? null : toPushSummary(row);
  }

  async listItems(pushId: number): Promise<PushItem[]> {
    const rows = this.db
      .prepare(
        `SELECT r.id, c.push, r.title, r.user, r.repo, r.branch, r.revision, r.state, r.tags, r.reviewid,
                r.description, r.created, r.modified
         FROM push_contents c
         JOIN requests r ON r.id = c.request
         WHERE c.push = ?
         ORDER BY r.created ASC, r.id ASC`
      )
      .all(pushId);

    return rows.map(toPushItem);
  }

  async createPush(fields: NewPushFields & { user: string }): Promise<PushSummary> {
    const now = this.now();
    const result = this.db
      .prepare(
        "INSERT INTO pushes (title, user, branch, state, pushtype, created, modified) VALUES (?, ?, ?, 'accepting', ?, ?, ?)"
      )
      .run(fields.title, fields.user, fields.branch, fields.pushType, now, now);

    const created = await this.getPush(Number(result.lastInsertRowid));
    if (!created) {
      throw new PushDashboardError("E_PUSH_BACKEND_UNAVAILABLE", "inserted push could not be read back");
    }

    return created;
  }

  async importFixture(fixture: PushFixture): Promise<{ pushes: number; items: number }> {
    const insertPush = this.db.prepare(
      "INSERT INTO pushes (title, user, branch, state, pushtype, created, modified) VALUES (?, ?, ?, ?, ?, ?, ?)"
    );
    const insertRequest = this.db.prepare(
      `INSERT INTO requests (title, user, repo, branch, revision, state, tags, reviewid, description, created, modified)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const insertContent = this.db.prepare("INSERT INTO push_contents (request, push) VALUES (?, ?)");

    const run = this.db.transaction((input: PushFixture) => {
      let items = 0;
      for (const push of input.pushes) {
        const pushResult = insertPush.run(
          push.title,
          push.user,
          push.branch,
          push.state,
          push.pushType,
          push.created,
          push.modified ?? push.created
        );

        for (const item of push.items) {
          const requestResult = insertRequest.run(
            item.title,
            item.user,
            item.repo,
            item.branch,
            item.revision,
            item.state,
            item.tags.join(","),
            item.reviewId,
            item.description,
            item.created,
            item.modified ?? item.created
          );
          insertContent.run(requestResult.lastInsertRowid, pushResult.lastInsertRowid);
          items += 1;
        }
      }

      return { pushes: input.pushes.length, items };
    });

    return run(fixture);
  }

  close(): void {
    this.db.close();
  }
}
