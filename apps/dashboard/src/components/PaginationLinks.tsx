import { buildPushesHref, computePagination } from "../lib/pagination";
import type { FilterState, PageWindow } from "../lib/types";

interface PaginationLinksProps {
  filter: FilterState;
  window: PageWindow;
  totalCount: number;
}

export function PaginationLinks(props: PaginationLinksProps): JSX.Element | null {
  const links = computePagination(props.window, props.totalCount);
  if (!links.hasNewer && !links.hasOlder) {
    return null;
  }

  return (
    <nav className="pagination" aria-label="Push pages">
      {links.hasNewer ? (
        <a className="button button-ghost" href={buildPushesHref(props.filter, { rpp: props.window.rpp, offset: links.newerOffset })}>
          Newer
        </a>
      ) : null}
      {links.hasOlder ? (
        <a className="button button-ghost" href={buildPushesHref(props.filter, { rpp: props.window.rpp, offset: links.olderOffset })}>
          Older
        </a>
      ) : null}
    </nav>
  );
}
