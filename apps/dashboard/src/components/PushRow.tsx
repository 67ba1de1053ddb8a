import { affordanceLabel, type PushExpansion } from "../lib/expansion";
import { formatTimestamp, shouldShowModified } from "../lib/format";
import { PUSH_STATE_OPTIONS, type PushSummary } from "../lib/types";
import { PushItemRow } from "./PushItemRow";

interface PushRowProps {
  push: PushSummary;
  expansion: PushExpansion;
  extendedItems: ReadonlySet<number>;
  onToggle: (pushId: number) => void;
  onToggleExtended: (itemId: number) => void;
}

function StateBadge(props: { push: PushSummary }): JSX.Element {
  const { state, stateError } = props.push;
  if (stateError || !PUSH_STATE_OPTIONS.some((option) => option === state)) {
    return (
      <span className="state-pill state-pill-invalid" role="alert" title={stateError?.code}>
        unknown state: {state}
      </span>
    );
  }

  return <span className={`state-pill state-pill-${state}`}>{state}</span>;
}

export function PushRow(props: PushRowProps): JSX.Element {
  const { push, expansion } = props;
  const itemsId = `push-${push.id}-items`;
  const visible = expansion.status === "LOADED_VISIBLE";

  return (
    <li className="push-row" data-push-id={push.id}>
      <div className="push-row-header">
        <h3>{push.title}</h3>
        <StateBadge push={push} />
      </div>
      <dl className="push-row-fields">
        <dt>Pushmaster</dt>
        <dd>{push.user}</dd>
        <dt>Type</dt>
        <dd>{push.pushType}</dd>
        <dt>Branch</dt>
        <dd>{push.branch}</dd>
        <dt>Created</dt>
        <dd>{formatTimestamp(push.created)}</dd>
        {shouldShowModified(push) ? (
          <>
            <dt>Modified</dt>
            <dd>{formatTimestamp(push.modified)}</dd>
          </>
        ) : null}
      </dl>

      <button
        type="button"
        className="button button-ghost"
        aria-expanded={visible}
        aria-controls={itemsId}
        aria-busy={expansion.status === "LOADING"}
        onClick={() => {
          props.onToggle(push.id);
        }}
      >
        {affordanceLabel(expansion.status)}
      </button>

      {expansion.error ? (
        <p className="error-line" role="status">
          Could not load items ({expansion.error.code}): {expansion.error.message}
        </p>
      ) : null}

      <div className="push-items" id={itemsId} hidden={!visible}>
        {expansion.items && expansion.items.length === 0 ? <p className="meta-line">No items in this push.</p> : null}
        {expansion.items && expansion.items.length > 0 ? (
          <ul className="stack-list">
            {expansion.items.map((item) => (
              <PushItemRow
                key={item.id}
                item={item}
                extended={props.extendedItems.has(item.id)}
                onToggleExtended={props.onToggleExtended}
              />
            ))}
          </ul>
        ) : null}
      </div>
    </li>
  );
}
