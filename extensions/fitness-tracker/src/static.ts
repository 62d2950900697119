import fs from "node:fs";
import path from "node:path";
import type { HttpHandler, HttpResponse } from "./host.js";

const MIME_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".js": "application/javascript; charset=utf-8",
  ".css": "text/css; charset=utf-8",
  ".json": "application/json; charset=utf-8",
  ".png": "image/png",
  ".svg": "image/svg+xml",
  ".ico": "image/x-icon",
};

function serveIndex(res: HttpResponse, dashboardDir: string): boolean {
  const indexPath = path.join(dashboardDir, "index.html");
  if (!fs.existsSync(indexPath)) {
    return false;
  }
  res.setHeader("Content-Type", "text/html; charset=utf-8");
  res.end(fs.readFileSync(indexPath, "utf-8"));
  return true;
}

/** Serves the dashboard files, falling back to index.html for unknown paths. */
export function createDashboardHandler(dir: string): HttpHandler {
  const dashboardDir = path.resolve(dir);

  return async (req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const pathname = url.pathname;

    if (pathname.startsWith("/api/") || pathname.startsWith("/assets/")) {
      return false;
    }
    if (req.method !== "GET" && req.method !== "HEAD") {
      return false;
    }

    const filePath = pathname === "/" ? "/index.html" : pathname;

    let decoded: string;
    try {
      decoded = decodeURIComponent(filePath);
    } catch {
      res.statusCode = 400;
      res.end("Bad Request");
      return true;
    }

    // Prevent directory traversal
    const resolved = path.resolve(dashboardDir, `.${decoded}`);
    if (resolved !== dashboardDir && !resolved.startsWith(dashboardDir + path.sep)) {
      res.statusCode = 403;
      res.end("Forbidden");
      return true;
    }

    let stat: fs.Stats;
    try {
      stat = fs.statSync(resolved);
    } catch {
      // Not found: let the dashboard script handle routing
      return serveIndex(res, dashboardDir);
    }

    if (!stat.isFile()) {
      return serveIndex(res, dashboardDir);
    }

    const ext = path.extname(resolved).toLowerCase();
    res.setHeader("Content-Type", MIME_TYPES[ext] ?? "application/octet-stream");
    res.end(fs.readFileSync(resolved));
    return true;
  };
}
