import { useEffect, useMemo, useState } from "react";

import { ErrorBanner } from "./components/ErrorBanner";
import { PushListView } from "./components/PushListView";
import { TopBar } from "./components/TopBar";
import { DashboardApiError, listPushes, loadPushItems } from "./lib/api";
import { ExpansionController, type ItemFetcher } from "./lib/expansion";
import { readListQuery } from "./lib/location";
import type { DashboardError, PushListResponse } from "./lib/types";
import { useExpansion } from "./lib/useExpansion";

interface AppProps {
  /** Query string of the page; defaults to the browser location. */
  search?: string;
  fetchItems?: ItemFetcher;
}

function toDashboardError(error: unknown): DashboardError {
  if (error instanceof DashboardApiError) {
    return { code: error.code, message: error.message.replace(/^[A-Z0-9_]+:\s*/, "").slice(0, 260) };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { code: "E_PUSH_BACKEND_UNAVAILABLE", message: message.slice(0, 260) };
}

export function App(props: AppProps): JSX.Element {
  const search = props.search ?? window.location.search;
  const fetchItems = props.fetchItems ?? loadPushItems;

  const [page, setPage] = useState<PushListResponse | null>(null);
  const [listError, setListError] = useState<DashboardError | null>(null);

  // A new query string is a new page: expansion state starts over.
  const controller = useMemo(() => new ExpansionController(fetchItems), [fetchItems, search]);
  const expansion = useExpansion(controller);

  useEffect(() => {
    return () => {
      controller.reset();
    };
  }, [controller]);

  useEffect(() => {
    let cancelled = false;

    setPage(null);
    setListError(null);

    void (async () => {
      try {
        const payload = await listPushes(readListQuery(search));
        if (cancelled) {
          return;
        }

        setPage(payload);
      } catch (error) {
        if (cancelled) {
          return;
        }

        setListError(toDashboardError(error));
      }
    })();

    return () => {
      cancelled = true;
    };
  }, [search]);

  return (
    <div className="app-shell">
      <TopBar
        filter={page?.filter ?? null}
        totalCount={page?.totalCount ?? null}
        busy={page === null}
        onExpandAll={() => {
          controller.expandAll(page?.pushes.map((push) => push.id) ?? []);
        }}
        onCollapseAll={() => {
          controller.collapseAll();
        }}
      />

      <ErrorBanner error={listError} />

      <main>
        {page ? (
          <PushListView
            pushes={page.pushes}
            totalCount={page.totalCount}
            window={page.window}
            filter={page.filter}
            expansion={expansion}
            onToggle={(pushId) => {
              controller.toggle(pushId);
            }}
            onToggleExtended={(itemId) => {
              controller.toggleExtended(itemId);
            }}
          />
        ) : null}

        {!page && !listError ? (
          <section className="panel">
            <h2>Loading</h2>
            <p className="meta-line">Fetching pushes...</p>
          </section>
        ) : null}
      </main>
    </div>
  );
}
