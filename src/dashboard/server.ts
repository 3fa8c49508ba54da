/**
 * Dashboard HTTP server
 *
 * Read-only status page and JSON endpoint. Every request runs a fresh
 * evaluation pass; the escalation state is never consulted.
 */

import * as http from "node:http";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { StatusHistory } from "../monitoring/history.js";
import type { StatusRecord } from "../types.js";
import { renderDashboardHtml, toStatusJson } from "./render.js";

const log = logger.child({ component: "dashboard" });

export interface DashboardServerOptions {
  port: number;
  host: string;
  /** One evaluation pass over the dashboard's pipelines. */
  evaluate: () => Promise<StatusRecord[]>;
  title?: string;
  refreshSeconds?: number;
  /** When given, each pass is recorded and rows show how long a status has held. */
  history?: StatusHistory;
  now?: () => Date;
}

export class DashboardServer {
  private server: http.Server | null = null;
  private readonly options: DashboardServerOptions;

  constructor(options: DashboardServerOptions) {
    this.options = options;
  }

  /** Bound port; differs from the configured one when that was 0. */
  get port(): number {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : this.options.port;
  }

  async start(): Promise<void> {
    const { port, host } = this.options;
    const server = http.createServer((req, res) => {
      this.handleHttp(req, res).catch((err: unknown) => {
        log.error({ error: errorMessage(err) }, "unhandled dashboard request error");
        if (!res.headersSent) res.writeHead(500);
        res.end();
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        log.info({ host, port: this.port }, "Dashboard listening");
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private async handleHttp(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname !== "/" && url.pathname !== "/api/status") {
      sendJson(res, 404, { error: "Not found" });
      return;
    }
    if (req.method !== "GET" && req.method !== "HEAD") {
      res.setHeader("Allow", "GET, HEAD");
      sendJson(res, 405, { error: "Method not allowed" });
      return;
    }

    let records: StatusRecord[];
    try {
      records = await this.options.evaluate();
    } catch (err: unknown) {
      log.error({ error: errorMessage(err) }, "dashboard evaluation failed");
      sendJson(res, 500, { error: "Evaluation failed" });
      return;
    }
    this.options.history?.add(records);

    if (url.pathname === "/api/status") {
      sendJson(res, 200, toStatusJson(records));
      return;
    }

    const history = this.options.history;
    const html = renderDashboardHtml({
      title: this.options.title ?? "Pipeline Monitor",
      records,
      refreshSeconds: this.options.refreshSeconds ?? 60,
      generatedAt: this.options.now?.() ?? new Date(),
      since: history ? (pipeline) => history.since(pipeline) : undefined,
    });
    res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
    res.end(html);
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}
