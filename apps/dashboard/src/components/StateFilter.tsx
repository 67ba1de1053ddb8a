import { PUSH_STATE_OPTIONS, type FilterState, type PageWindow } from "../lib/types";

interface StateFilterProps {
  filter: FilterState;
  window: PageWindow;
}

/**
 * Plain GET form: submitting navigates to a fresh `/pushes` page, which drops
 * the offset and every piece of expansion state.
 */
export function StateFilter(props: StateFilterProps): JSX.Element {
  return (
    <form className="filter-bar" method="get" action="/pushes" aria-label="Push filters">
      <input type="hidden" name="rpp" value={String(props.window.rpp)} />
      <label>
        State{" "}
        <select name="state" defaultValue={props.filter.state ?? ""}>
          <option value="">All states</option>
          {PUSH_STATE_OPTIONS.map((state) => (
            <option key={state} value={state}>
              {state}
            </option>
          ))}
        </select>
      </label>
      <label>
        Pushmaster <input type="text" name="user" defaultValue={props.filter.user ?? ""} />
      </label>
      <button type="submit" className="button button-ghost">
        Filter
      </button>
    </form>
  );
}
