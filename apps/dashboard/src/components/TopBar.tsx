import type { FilterState } from "../lib/types";

interface TopBarProps {
  filter: FilterState | null;
  totalCount: number | null;
  busy: boolean;
  onExpandAll: () => void;
  onCollapseAll: () => void;
}

function describeFilter(filter: FilterState | null): string {
  if (!filter) {
    return "resolving...";
  }

  const parts = [filter.state ? `state ${filter.state}` : "all states", filter.user ? `pushmaster ${filter.user}` : "all pushmasters"];
  return parts.join(" · ");
}

export function TopBar(props: TopBarProps): JSX.Element {
  return (
    <header className="top-bar" role="banner">
      <div>
        <p className="eyebrow">Push Dashboard</p>
        <h1>Pushes</h1>
        <p className="meta-line">
          Filter: <strong>{describeFilter(props.filter)}</strong> · Total: <strong>{props.totalCount ?? "n/a"}</strong>
        </p>
      </div>
      <div className="top-bar-actions">
        <button type="button" className="button" onClick={props.onExpandAll} disabled={props.busy}>
          Expand All
        </button>
        <button type="button" className="button button-ghost" onClick={props.onCollapseAll} disabled={props.busy}>
          Collapse All
        </button>
      </div>
    </header>
  );
}
