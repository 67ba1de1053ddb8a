import { getPushExpansion, type ExpansionState } from "../lib/expansion";
import { describeRange } from "../lib/pagination";
import type { FilterState, PageWindow, PushSummary } from "../lib/types";
import { PaginationLinks } from "./PaginationLinks";
import { PushRow } from "./PushRow";
import { StateFilter } from "./StateFilter";

interface PushListViewProps {
  pushes: PushSummary[];
  totalCount: number;
  window: PageWindow;
  filter: FilterState;
  expansion: ExpansionState;
  onToggle: (pushId: number) => void;
  onToggleExtended: (itemId: number) => void;
}

export function PushListView(props: PushListViewProps): JSX.Element {
  const range = describeRange(props.window, props.pushes.length);

  return (
    <section className="panel">
      <h2>Pushes</h2>
      <StateFilter filter={props.filter} window={props.window} />
      <p className="meta-line">
        {range ? `Showing ${range.first}–${range.last} of ${props.totalCount}` : `No pushes on this page (${props.totalCount} total)`}
      </p>

      {props.pushes.length === 0 ? (
        <p className="meta-line">No pushes match the current filter.</p>
      ) : (
        <ul className="stack-list">
          {props.pushes.map((push) => (
            <PushRow
              key={push.id}
              push={push}
              expansion={getPushExpansion(props.expansion, push.id)}
              extendedItems={props.expansion.extendedItems}
              onToggle={props.onToggle}
              onToggleExtended={props.onToggleExtended}
            />
          ))}
        </ul>
      )}

      <PaginationLinks filter={props.filter} window={props.window} totalCount={props.totalCount} />
    </section>
  );
}
