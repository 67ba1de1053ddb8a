import { formatTimestamp } from "../lib/format";
import type { PushItem } from "../lib/types";

interface PushItemRowProps {
  item: PushItem;
  extended: boolean;
  onToggleExtended: (itemId: number) => void;
}

export function PushItemRow(props: PushItemRowProps): JSX.Element {
  const { item } = props;
  const detailsId = `push-item-${item.id}-extended`;

  return (
    <li className="push-item" data-item-id={item.id}>
      <div className="push-item-summary">
        <button
          type="button"
          className="glyph-toggle"
          aria-expanded={props.extended}
          aria-controls={detailsId}
          aria-label={props.extended ? `Hide details for ${item.title}` : `Show details for ${item.title}`}
          onClick={() => {
            props.onToggleExtended(item.id);
          }}
        >
          {props.extended ? "▾" : "▸"}
        </button>
        <span className="push-item-title">{item.title}</span>
        <span className="meta-line">
          {item.user} · {item.repo}/{item.branch} · {item.state}
        </span>
      </div>
      {props.extended ? (
        <dl className="push-item-extended" id={detailsId}>
          <dt>Revision</dt>
          <dd>{item.revision.length > 0 ? item.revision : "n/a"}</dd>
          <dt>Review</dt>
          <dd>{item.reviewId !== null ? `#${item.reviewId}` : "n/a"}</dd>
          <dt>Tags</dt>
          <dd>{item.tags.length > 0 ? item.tags.join(", ") : "none"}</dd>
          <dt>Requested</dt>
          <dd>{formatTimestamp(item.created)}</dd>
          {item.description.length > 0 ? (
            <>
              <dt>Description</dt>
              <dd>{item.description}</dd>
            </>
          ) : null}
        </dl>
      ) : null}
    </li>
  );
}
