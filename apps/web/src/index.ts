import { IncomingMessage, ServerResponse, createServer } from "node:http";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

const port = Number(process.env.WEB_PORT ?? 5173);
const defaultApiBase = process.env.API_BASE_URL ?? "http://localhost:8080";

function scriptLiteral(value: string): string {
  return JSON.stringify(value).replace(/</g, "\\u003c");
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function renderViewerHtml(apiBase: string): string {
  const base = apiBase.replace(/\/+$/u, "");
  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width,initial-scale=1" />
    <title>Campus Items</title>
    <style>
      * { box-sizing: border-box; margin: 0; padding: 0; }
      body { font-family: "Segoe UI", Tahoma, Geneva, Verdana, sans-serif; background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); min-height: 100vh; padding: 2rem; }
      #app-root { max-width: 800px; margin: 0 auto; background: white; border-radius: 12px; box-shadow: 0 10px 40px rgba(0, 0, 0, 0.2); padding: 2rem; }
      h1 { color: #333; margin-bottom: 1.5rem; font-size: 2rem; }
      button { background: #667eea; color: white; border: none; padding: 12px 24px; border-radius: 6px; font-size: 1rem; cursor: pointer; }
      button:hover { background: #5568d3; }
      .results { margin-top: 2rem; padding-top: 2rem; border-top: 2px solid #eee; }
      .stat { margin-bottom: 1rem; padding: 1rem; background: #f8f9fa; border-radius: 6px; }
      .label { font-weight: 600; color: #666; margin-bottom: 0.5rem; }
      .value { color: #333; font-size: 1.1rem; }
      .muted { color: #6b7280; font-size: 12px; margin-bottom: 1rem; }
      .loading { display: none; margin-top: 1rem; color: #667eea; font-style: italic; }
      .loading.active { display: block; }
    </style>
  </head>
  <body>
    <div id="app-root" data-testid="app-root">
      <h1>Campus Items Viewer</h1>
      <p class="muted">API: ${escapeHtml(base || "same origin")}</p>
      <button id="load-button" data-testid="load-button" type="button">Load Items</button>
      <div class="loading" id="loading">Loading...</div>
      <div class="results">
        <div class="stat">
          <div class="label">Number of Items:</div>
          <div class="value" id="items-count" data-testid="items-count">-</div>
        </div>
        <div class="stat">
          <div class="label">First Item Title:</div>
          <div class="value" id="first-item-title" data-testid="first-item-title">-</div>
        </div>
      </div>
    </div>
    <script>
      const API_BASE = ${scriptLiteral(base)};
      const loadButton = document.getElementById("load-button");
      const loading = document.getElementById("loading");
      const itemsCount = document.getElementById("items-count");
      const firstItemTitle = document.getElementById("first-item-title");

      loadButton.addEventListener("click", async () => {
        loading.classList.add("active");
        try {
          const response = await fetch(API_BASE + "/api/v1/items");
          const result = await response.json();
          if (result.status === "ok" && Array.isArray(result.data)) {
            itemsCount.textContent = String(result.data.length);
            firstItemTitle.textContent = result.data.length > 0 ? result.data[0].title : "No items";
          } else {
            itemsCount.textContent = "Error";
            firstItemTitle.textContent = "Error loading data";
          }
        } catch (error) {
          itemsCount.textContent = "Error";
          firstItemTitle.textContent = "Failed to load items";
        } finally {
          loading.classList.remove("active");
        }
      });
    </script>
  </body>
</html>`;
}

export function createWebHandler(apiBase = defaultApiBase): (req: IncomingMessage, res: ServerResponse) => void {
  const html = renderViewerHtml(apiBase);
  return (req, res) => {
    const pathname = (req.url ?? "/").split("?")[0] || "/";
    if (pathname === "/favicon.ico") {
      res.writeHead(204);
      res.end();
      return;
    }
    if (req.method !== "GET" && req.method !== "HEAD") {
      res.writeHead(405, { "content-type": "text/plain; charset=utf-8", allow: "GET, HEAD" });
      res.end("Method Not Allowed");
      return;
    }
    res.writeHead(200, { "content-type": "text/html; charset=utf-8" });
    res.end(req.method === "HEAD" ? undefined : html);
  };
}

export function startWebServer(listenPort = port, apiBase = defaultApiBase) {
  const server = createServer(createWebHandler(apiBase));
  return server.listen(listenPort, "0.0.0.0", () => {
    // eslint-disable-next-line no-console
    console.log(`Viewer running on http://localhost:${listenPort} (API: ${apiBase})`);
  });
}

const isMain = process.argv[1] ? resolve(process.argv[1]) === fileURLToPath(import.meta.url) : false;
if (isMain) {
  startWebServer();
}
