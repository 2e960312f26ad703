import { createServer, IncomingMessage, ServerResponse } from 'http';
import type { Configurator } from './Configurator.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import type { RawSettings } from '../domain/ports/ISettingsStore.js';
import type { GenerationFailure } from '../application/index.js';

export interface HttpServerConfig {
  port: number;
  host?: string;
}

const MAX_BODY_BYTES = 256 * 1024;

class BadRequestError extends Error {}

function isRecord(value: unknown): value is RawSettings {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * HTTP API behind the add-on's Ingress panel
 */
export class HttpServer {
  private server: ReturnType<typeof createServer> | null = null;
  private readonly startTime: number = Date.now();

  constructor(
    private readonly configurator: Configurator,
    private readonly logger: ILogger,
    private readonly config: HttpServerConfig
  ) {}

  /**
   * Port actually bound (differs from the configured one when that is 0)
   */
  get port(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  /**
   * Start the HTTP server
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = createServer((req, res) => {
        this.handleRequest(req, res).catch((error) => {
          this.logger.error('Unhandled error in request handler', error);
          if (!res.headersSent) {
            this.sendJson(res, 500, { error: 'Internal Server Error' });
          }
        });
      });

      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host ?? '0.0.0.0', () => {
        this.logger.info('HTTP Server started', {
          port: this.port,
          host: this.config.host ?? '0.0.0.0',
        });
        resolve();
      });
    });
  }

  /**
   * Stop the HTTP server
   */
  stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => {
          this.logger.info('HTTP Server stopped');
          resolve();
        });
      } else {
        resolve();
      }
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname;
    const method = req.method ?? 'GET';

    this.logger.debug('HTTP Request', { method, path });

    try {
      if (path === '/health' && method === 'GET') {
        return this.sendJson(res, 200, {
          status: 'healthy',
          timestamp: new Date().toISOString(),
          uptime: Math.floor((Date.now() - this.startTime) / 1000),
        });
      }

      if (path === '/api/settings' && method === 'GET') {
        return this.sendJson(res, 200, await this.configurator.getSettings());
      }

      if (path === '/api/settings' && (method === 'PUT' || method === 'POST')) {
        return await this.handleSaveSettings(req, res);
      }

      if (path === '/api/preview' && method === 'POST') {
        return await this.handlePreview(req, res);
      }

      if (path === '/api/apply' && method === 'POST') {
        return await this.handleApply(res);
      }

      return this.sendJson(res, 404, { error: 'Not Found', path });
    } catch (error) {
      if (error instanceof BadRequestError) {
        return this.sendJson(res, 400, { error: error.message });
      }
      this.logger.error('HTTP Request error', error);
      return this.sendJson(res, 500, {
        error: 'Internal Server Error',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  private async handleSaveSettings(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.parseBody(req);
    if (!body) {
      return this.sendJson(res, 400, { error: 'settings object is required' });
    }

    const result = await this.configurator.saveSettings(body);
    if (result.success) {
      return this.sendJson(res, 200, { success: true });
    }
    this.sendJson(res, 400, { success: false, error: result.error });
  }

  private async handlePreview(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.parseBody(req);
    const result = await this.configurator.preview(body ?? undefined);

    if (result.success) {
      res.writeHead(200, { 'Content-Type': 'text/yaml; charset=utf-8' });
      res.end(result.yaml);
      return;
    }
    this.sendJson(res, this.statusFor(result.error), { success: false, error: result.error });
  }

  private async handleApply(res: ServerResponse): Promise<void> {
    const result = await this.configurator.apply();

    if (result.success) {
      return this.sendJson(res, 200, {
        success: true,
        path: result.path,
        bytes: result.bytes,
        message:
          'Package written. Restart Home Assistant if packages were just enabled, otherwise reload automations and helpers.',
      });
    }
    this.sendJson(res, this.statusFor(result.error), { success: false, error: result.error });
  }

  private statusFor(error: GenerationFailure): number {
    return error.kind === 'validation' ? 400 : 500;
  }

  /**
   * Reads a JSON object body; an empty body yields null
   */
  private parseBody(req: IncomingMessage): Promise<RawSettings | null> {
    return new Promise((resolve, reject) => {
      let body = '';
      req.on('data', (chunk: Buffer) => {
        body += chunk.toString();
        if (body.length > MAX_BODY_BYTES) {
          reject(new BadRequestError('Request body too large'));
          req.destroy();
        }
      });
      req.on('end', () => {
        if (!body.trim()) {
          resolve(null);
          return;
        }
        try {
          const parsed: unknown = JSON.parse(body);
          if (!isRecord(parsed)) {
            reject(new BadRequestError('Body must be a JSON object'));
            return;
          }
          resolve(parsed);
        } catch {
          reject(new BadRequestError('Invalid JSON body'));
        }
      });
      req.on('error', reject);
    });
  }

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data, null, 2));
  }
}
