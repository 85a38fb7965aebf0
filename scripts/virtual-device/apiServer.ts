import {
  createServer, IncomingMessage, Server, ServerResponse,
} from 'http';

import { Logger, consoleLogger, logError } from '../../lib/logger';
import { toNumber } from '../../lib/numeric';
import { PointValue } from '../../lib/point';
import { PointKind, isPointKind, parsePointKind } from '../../lib/pointKinds';
import { SIMULATION_PRIORITY } from '../../lib/priorityResolver';
import { PointFailure } from '../../lib/results';
import { VirtualDevice } from '../../lib/virtualDevice';

const MAX_BODY_BYTES = 512_000;
const MAX_ADVANCE_TICKS = 100_000;

export interface VirtualApiServerOptions {
  host: string;
  /** 0 picks a free port; see `port` after start. */
  port: number;
  logger?: Logger;
}

class RequestTooLargeError extends Error {
  constructor() {
    super('Request body too large');
    this.name = 'RequestTooLargeError';
  }
}

async function readJson(req: IncomingMessage): Promise<Record<string, unknown>> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let length = 0;

    req.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
      length += chunk.length;
      if (length > MAX_BODY_BYTES) {
        reject(new RequestTooLargeError());
      }
    });

    req.on('error', reject);
    req.on('end', () => {
      if (chunks.length === 0) {
        resolve({});
        return;
      }
      try {
        const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString('utf8'));
        if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
          reject(new SyntaxError('Request body must be a JSON object'));
          return;
        }
        resolve(Object.fromEntries(Object.entries(parsed)));
      } catch (error) {
        reject(error);
      }
    });
  });
}

function sendJson(res: ServerResponse, statusCode: number, payload: unknown) {
  res.statusCode = statusCode;
  res.setHeader('content-type', 'application/json');
  res.end(JSON.stringify(payload));
}

function sendFailure(res: ServerResponse, result: PointFailure) {
  sendJson(res, result.error === 'NotFound' ? 404 : 409, {
    ok: false,
    error: result.error,
    message: result.message,
  });
}

function toKind(value: unknown): PointKind | null {
  if (isPointKind(value)) return value;
  if (typeof value === 'string') return parsePointKind(value) ?? null;
  return null;
}

function toPointValue(value: unknown): PointValue | null | undefined {
  if (value === null) return null;
  if (typeof value === 'boolean') return value;
  return toNumber(value) ?? undefined;
}

export class VirtualApiServer {
  private readonly device: VirtualDevice;

  private readonly options: VirtualApiServerOptions;

  private readonly logger: Logger;

  private server: Server | null = null;

  constructor(device: VirtualDevice, options: VirtualApiServerOptions) {
    this.device = device;
    this.options = options;
    this.logger = options.logger ?? consoleLogger;
  }

  get port(): number | null {
    const address = this.server?.address();
    if (!address || typeof address === 'string') return null;
    return address.port;
  }

  async start() {
    if (this.server) return;
    const server = createServer((req, res) => {
      this.route(req, res).catch((error: unknown) => {
        if (error instanceof SyntaxError) {
          sendJson(res, 400, { ok: false, error: 'invalid_json' });
          return;
        }
        if (error instanceof RequestTooLargeError) {
          sendJson(res, 413, { ok: false, error: 'request_too_large' });
          return;
        }
        logError(this.logger, '[ApiServer] route error', error);
        sendJson(res, 500, { ok: false, error: 'internal_error' });
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    this.logger.log(`[ApiServer] Listening on http://${this.options.host}:${this.port ?? this.options.port}`);
  }

  async stop() {
    const { server } = this;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private async route(req: IncomingMessage, res: ServerResponse) {
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');
    const { pathname } = url;

    if (method === 'GET' && pathname === '/health') {
      sendJson(res, 200, { ok: true });
      return;
    }

    if (method === 'GET' && pathname === '/summary') {
      sendJson(res, 200, { ok: true, summary: this.device.summary() });
      return;
    }

    if (method === 'GET' && pathname === '/debug/state') {
      sendJson(res, 200, { ok: true, state: this.device.snapshot() });
      return;
    }

    if (method === 'GET' && pathname === '/points') {
      const kindParam = url.searchParams.get('kind');
      const kind = kindParam === null ? undefined : toKind(kindParam);
      if (kind === null) {
        sendJson(res, 400, { ok: false, error: `unknown kind "${kindParam}"` });
        return;
      }
      sendJson(res, 200, { ok: true, points: this.device.listPoints(kind) });
      return;
    }

    const pointMatch = pathname.match(/^\/points\/([^/]+)\/(\d+)$/);
    if (method === 'GET' && pointMatch) {
      const kind = toKind(decodeURIComponent(pointMatch[1]));
      if (!kind) {
        sendJson(res, 400, { ok: false, error: `unknown kind "${pointMatch[1]}"` });
        return;
      }
      const result = this.device.describePoint(kind, Number(pointMatch[2]));
      if (!result.ok) {
        sendFailure(res, result);
        return;
      }
      sendJson(res, 200, { ok: true, point: result.value });
      return;
    }

    if (method === 'POST' && (pathname === '/points/write' || pathname === '/points/relinquish')) {
      const body = await readJson(req);
      const kind = toKind(body.kind);
      const instance = toNumber(body.instance);
      const relinquish = pathname === '/points/relinquish';
      const value = relinquish ? null : toPointValue(body.value);
      const priority = body.priority === undefined ? SIMULATION_PRIORITY : toNumber(body.priority);
      if (!kind || instance === null) {
        sendJson(res, 400, { ok: false, error: 'kind and numeric instance are required' });
        return;
      }
      if (value === undefined) {
        sendJson(res, 400, { ok: false, error: 'value must be numeric, boolean or null' });
        return;
      }
      if (priority === null) {
        sendJson(res, 400, { ok: false, error: 'priority must be numeric' });
        return;
      }
      const result = this.device.writePriority(kind, instance, priority, value);
      if (!result.ok) {
        sendFailure(res, result);
        return;
      }
      const detail = this.device.describePoint(kind, instance);
      sendJson(res, 200, { ok: true, point: detail.ok ? detail.value : null });
      return;
    }

    if (method === 'POST' && pathname === '/debug/advance') {
      const body = await readJson(req);
      const ticks = toNumber(body.ticks);
      if (ticks === null || !Number.isInteger(ticks) || ticks <= 0 || ticks > MAX_ADVANCE_TICKS) {
        sendJson(res, 400, { ok: false, error: `ticks must be an integer in [1, ${MAX_ADVANCE_TICKS}]` });
        return;
      }
      const report = this.device.advance(ticks);
      sendJson(res, 200, { ok: true, report, summary: this.device.summary() });
      return;
    }

    sendJson(res, 404, { ok: false, error: 'not_found' });
  }
}
