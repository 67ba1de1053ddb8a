import { z } from "zod";

import { PushDashboardError } from "./errors";
import { PUSH_TYPES, type NewPushFields } from "./types";

const NewPushFormSchema = z.object({
  "push-title": z.string().trim().min(1, "is required").max(200),
  "push-branch": z
    .string()
    .trim()
    .min(1, "is required")
    .max(200)
    .regex(/^[A-Za-z0-9._/-]+$/, "must be a branch name"),
  "push-type": z.enum(PUSH_TYPES)
});

/** Validates the `POST /newpush` form fields. */
export function parseNewPushForm(form: URLSearchParams): NewPushFields {
  const result = NewPushFormSchema.safeParse({
    "push-title": form.get("push-title") ?? undefined,
    "push-branch": form.get("push-branch") ?? undefined,
    "push-type": form.get("push-type") ?? undefined
  });

  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<form>"} ${issue.message}`)
      .join("; ")
      .slice(0, 500);
    throw new PushDashboardError("E_NEWPUSH_INVALID", message);
  }

  return {
    title: result.data["push-title"],
    branch: result.data["push-branch"],
    pushType: result.data["push-type"]
  };
}
