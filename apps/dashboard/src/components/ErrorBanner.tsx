import type { DashboardError } from "../lib/types";

interface ErrorBannerProps {
  error: DashboardError | null;
}

export function ErrorBanner(props: ErrorBannerProps): JSX.Element | null {
  if (!props.error) {
    return null;
  }

  return (
    <div className="error-banner" role="alert">
      <p>
        Push listing failed with <strong>{props.error.code}</strong>.
      </p>
      <p className="meta-line">{props.error.message}</p>
    </div>
  );
}
