export interface DashboardError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface DashboardHealth {
  ok: true;
}
