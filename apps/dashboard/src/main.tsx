import { StrictMode } from "react";
import { createRoot } from "react-dom/client";

import { App } from "./App";

const container = document.getElementById("root");
if (!container) {
  throw new Error("E_DASHBOARD_ROOT_MISSING: #root element not found");
}

createRoot(container).render(
  <StrictMode>
    <App />
  </StrictMode>
);
