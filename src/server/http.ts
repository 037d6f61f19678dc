import http, { type IncomingMessage, type ServerResponse } from 'node:http';
import { URL } from 'node:url';
import type { AppLifecycle } from '../lifecycle.js';
import type { Logger } from '../logger.js';
import type { MetricsRegistry } from '../metrics/index.js';

export interface HttpServerOptions {
  port: number;
  host: string;
  metrics: MetricsRegistry;
  lifecycle: AppLifecycle;
  logger: Logger;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

function sendJson(res: ServerResponse, statusCode: number, body: unknown) {
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(body));
}

/** Serves `GET /metrics` (Prometheus text) and `GET /health` (JSON). */
export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const { metrics, lifecycle } = options;
  const logger = options.logger.child({ component: 'http' });

  const handle = async (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      sendJson(res, 405, { error: 'Method not allowed' });
      return;
    }

    if (url.pathname === '/metrics') {
      res.statusCode = 200;
      res.setHeader('Content-Type', PROMETHEUS_CONTENT_TYPE);
      res.end(req.method === 'HEAD' ? undefined : metrics.exportPrometheus());
      return;
    }

    if (url.pathname === '/health') {
      const payload = await lifecycle.buildHealthPayload();
      sendJson(res, payload.status === 'ok' ? 200 : 503, payload);
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch(error => {
      logger.error({ err: error }, 'HTTP request failed');
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'Internal server error' });
      } else {
        res.end();
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : options.port;

  logger.info({ port: actualPort, host: options.host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        server.closeAllConnections();
      })
  };
}
