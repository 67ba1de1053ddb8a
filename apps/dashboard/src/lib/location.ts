import type { ListQuery } from "./types";

export function readListQuery(search: string): ListQuery {
  const params = new URLSearchParams(search);

  return {
    rpp: params.get("rpp"),
    offset: params.get("offset"),
    state: params.get("state"),
    user: params.get("user")
  };
}
