import { fireEvent, render, screen } from "@testing-library/react";
import { describe, expect, test, vi } from "vitest";

import { PushListView } from "../components/PushListView";
import { initialExpansionState, type ExpansionState } from "../lib/expansion";
import type { PushItem, PushSummary } from "../lib/types";

function makePush(overrides: Partial<PushSummary> = {}): PushSummary {
  return {
    id: 42,
    title: "Tuesday afternoon",
    user: "alice",
    pushType: "regular",
    branch: "deploy-42",
    state: "live",
    stateError: null,
    created: 1000,
    modified: 1000,
    ...overrides
  };
}

const item: PushItem = {
  id: 501,
  pushId: 42,
  title: "Fix login redirect",
  user: "bob",
  repo: "bob",
  branch: "fix_login",
  revision: "0f3c9a1",
  state: "added",
  tags: ["buildbot", "tests-passed"],
  reviewId: 77,
  description: "Redirect to the requested page after login.",
  created: 900,
  modified: 950
};

function renderList(options: {
  pushes?: PushSummary[];
  totalCount?: number;
  expansion?: ExpansionState;
  onToggle?: (pushId: number) => void;
  onToggleExtended?: (itemId: number) => void;
}) {
  const pushes = options.pushes ?? [makePush()];
  return render(
    <PushListView
      pushes={pushes}
      totalCount={options.totalCount ?? pushes.length}
      window={{ rpp: 10, offset: 0 }}
      filter={{ state: "live" }}
      expansion={options.expansion ?? initialExpansionState}
      onToggle={options.onToggle ?? (() => undefined)}
      onToggleExtended={options.onToggleExtended ?? (() => undefined)}
    />
  );
}

describe("PushListView", () => {
  test("renders one unexpanded row with the filter selected and no pagination", () => {
    renderList({});

    expect(screen.getByRole("heading", { name: "Tuesday afternoon" })).toBeInTheDocument();
    expect(screen.getByText("Showing 1–1 of 1")).toBeInTheDocument();
    expect(screen.getByText("Created")).toBeInTheDocument();
    expect(screen.queryByText("Modified")).not.toBeInTheDocument();
    expect(screen.getByRole("button", { name: "Load" })).toBeInTheDocument();

    const selected = screen.getAllByRole("option").filter((option) => option instanceof HTMLOptionElement && option.selected);
    expect(selected.map((option) => option.textContent)).toEqual(["live"]);

    expect(screen.queryByRole("navigation", { name: "Push pages" })).not.toBeInTheDocument();
  });

  test("shows the modified time only when it differs from creation", () => {
    renderList({ pushes: [makePush({ modified: 2000 })] });

    expect(screen.getByText("Created")).toBeInTheDocument();
    expect(screen.getByText("Modified")).toBeInTheDocument();
  });

  test("links to older pages with the current filter", () => {
    renderList({ totalCount: 25 });

    const older = screen.getByRole("link", { name: "Older" });
    expect(older).toHaveAttribute("href", "/pushes?rpp=10&offset=10&state=live&user=");
    expect(screen.queryByRole("link", { name: "Newer" })).not.toBeInTheDocument();
  });

  test("reports an empty page", () => {
    renderList({ pushes: [], totalCount: 0 });

    expect(screen.getByText("No pushes match the current filter.")).toBeInTheDocument();
    expect(screen.getByText("No pushes on this page (0 total)")).toBeInTheDocument();
  });

  test("flags a push whose stored state is outside the known set", () => {
    renderList({
      pushes: [
        makePush({ id: 41, title: "Earlier" }),
        makePush({
          state: "frozen",
          stateError: { code: "E_PUSH_STATE_INVALID", message: "push 42 has unknown state 'frozen'" }
        })
      ]
    });

    expect(screen.getByRole("alert")).toHaveTextContent("unknown state: frozen");
    expect(screen.getByRole("heading", { name: "Earlier" })).toBeInTheDocument();
    // The healthy row's badge and the filter option.
    expect(screen.getAllByText("live")).toHaveLength(2);
  });

  test("renders loaded items and reports toggles for pushes and items", () => {
    const onToggle = vi.fn();
    const onToggleExtended = vi.fn();
    const expansion: ExpansionState = {
      pushes: new Map([[42, { status: "LOADED_VISIBLE", items: [item], error: null }]]),
      extendedItems: new Set([501])
    };

    renderList({ expansion, onToggle, onToggleExtended });

    expect(screen.getByText("Fix login redirect")).toBeVisible();
    expect(screen.getByText("#77")).toBeInTheDocument();
    expect(screen.getByText("buildbot, tests-passed")).toBeInTheDocument();

    fireEvent.click(screen.getByRole("button", { name: "Hide" }));
    expect(onToggle).toHaveBeenCalledWith(42);

    fireEvent.click(screen.getByRole("button", { name: "Hide details for Fix login redirect" }));
    expect(onToggleExtended).toHaveBeenCalledWith(501);
  });

  test("keeps hidden items in the document but not visible", () => {
    const expansion: ExpansionState = {
      pushes: new Map([[42, { status: "LOADED_HIDDEN", items: [item], error: null }]]),
      extendedItems: new Set()
    };

    renderList({ expansion });

    expect(screen.getByRole("button", { name: "Show" })).toBeInTheDocument();
    expect(screen.getByText("Fix login redirect")).not.toBeVisible();
  });
});
