import express, { Request, Response, NextFunction } from 'express';
import * as http from 'http';
import { TIMEOUTS } from '../common/Config';
import {
  InternalFailureError,
  MethodNotAllowedError,
  PayloadTooLargeError,
  RequestAbortedError,
  RouteNotFoundError,
  ServiceError,
  ValidationError,
} from '../common/Errors';
import { getLogger } from '../common/Logger';
import { ErrorResponse } from '../common/Types';
import { IKeyValueStore } from '../interfaces/Store';
import { HandlerTimeouts, KeyHandlers } from './KeyHandlers';
import { createRouter, defineRoutes } from './Router';

const log = getLogger('http');

export enum ServerState {
  STARTING = 'starting',
  SERVING = 'serving',
  DRAINING = 'draining',
  STOPPED = 'stopped',
}

export interface TransportTimeouts {
  readonly read: number;
  readonly write: number;
  readonly idle: number;
  readonly shutdownGrace: number;
}

export interface HTTPServerOptions {
  readonly port: number;
  readonly host: string;
  readonly authToken: string;
  readonly bodyLimit: string;
  readonly transportTimeouts?: Partial<TransportTimeouts>;
  readonly handlerTimeouts?: Partial<HandlerTimeouts>;
}

export interface ShutdownResult {
  /** True when connections outlived the grace period and were destroyed. */
  readonly forced: boolean;
}

/**
 * Map anything thrown on the request path onto the public error taxonomy.
 * body-parser tags its errors with a `type` such as 'entity.too.large'.
 */
export function toServiceError(err: unknown): ServiceError {
  if (err instanceof ServiceError) {
    return err;
  }

  if (typeof err === 'object' && err !== null) {
    if ('type' in err && err.type === 'entity.too.large') {
      return new PayloadTooLargeError();
    }
    if ('type' in err && typeof err.type === 'string') {
      return new ValidationError('invalid request body');
    }
    if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
      return new ValidationError('bad request');
    }
  }

  return new InternalFailureError(err);
}

export class HTTPServer {
  private readonly app: express.Application;
  private readonly options: HTTPServerOptions;
  private readonly transportTimeouts: TransportTimeouts;
  private readonly responseTimeout: number;
  private server: http.Server | null = null;
  private state: ServerState = ServerState.STARTING;
  private draining: Promise<ShutdownResult> | null = null;

  constructor(store: IKeyValueStore, options: HTTPServerOptions) {
    this.options = options;
    this.transportTimeouts = {
      read: TIMEOUTS.read,
      write: TIMEOUTS.write,
      idle: TIMEOUTS.idle,
      shutdownGrace: TIMEOUTS.shutdownGrace,
      ...options.transportTimeouts,
    };
    const handlers = new KeyHandlers(store, { timeouts: options.handlerTimeouts });
    // The write budget starts once the longest handler deadline has passed,
    // so a deadline's error response is written before the socket is cut.
    const { keyOperation, list, health } = handlers.getTimeouts();
    this.responseTimeout = Math.max(keyOperation, list, health) + this.transportTimeouts.write;

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes(handlers);
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.disable('x-powered-by');
    this.app.set('etag', false);

    this.app.use((_req: Request, res: Response, next: NextFunction) => {
      res.setTimeout(this.responseTimeout, () => {
        log.warn('Response write timed out, closing connection');
        res.destroy();
      });
      // Responses written while draining tell the client not to reuse the socket.
      if (this.state === ServerState.DRAINING) {
        res.setHeader('Connection', 'close');
      }
      // A keep-alive socket that finishes its request mid-drain would otherwise idle until the grace period ends.
      res.once('finish', () => {
        if (this.state === ServerState.DRAINING) {
          setImmediate(() => this.server?.closeIdleConnections());
        }
      });
      next();
    });
  }

  private setupRoutes(handlers: KeyHandlers): void {
    this.app.use(createRouter(defineRoutes(handlers, this.options.bodyLimit), this.options.authToken));
  }

  private setupErrorHandling(): void {
    this.app.use((_req: Request, _res: Response, next: NextFunction) => {
      next(new RouteNotFoundError());
    });

    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      const serviceError = toServiceError(err);

      if (serviceError.cause instanceof RequestAbortedError) {
        log.debug({ method: req.method, path: req.path }, 'Client disconnected before response');
      } else if (serviceError.statusCode >= 500) {
        log.error({ err: serviceError.cause ?? serviceError, method: req.method, path: req.path }, 'Request failed');
      }

      if (res.headersSent || res.destroyed) {
        return;
      }

      if (serviceError instanceof MethodNotAllowedError) {
        res.setHeader('Allow', serviceError.allowed.join(', '));
      }

      const body: ErrorResponse = { error: serviceError.message };
      res.status(serviceError.statusCode).json(body);
    });
  }

  public getApp(): express.Application {
    return this.app;
  }

  public getState(): ServerState {
    return this.state;
  }

  public getPort(): number {
    const address = this.server?.address();
    return typeof address === 'object' && address !== null ? address.port : this.options.port;
  }

  async start(): Promise<void> {
    if (this.state !== ServerState.STARTING) {
      throw new Error(`Cannot start server in state ${this.state}`);
    }

    const server = http.createServer(this.app);
    server.requestTimeout = this.transportTimeouts.read;
    server.headersTimeout = this.transportTimeouts.read;
    server.keepAliveTimeout = this.transportTimeouts.idle;
    this.server = server;

    return new Promise((resolve, reject) => {
      const onError = (err: Error): void => {
        this.state = ServerState.STOPPED;
        reject(err);
      };

      server.once('error', onError);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', onError);
        server.on('error', (err: Error) => log.error({ err }, 'HTTP server error'));
        this.state = ServerState.SERVING;
        log.info({ host: this.options.host, port: this.getPort() }, 'HTTP server listening');
        resolve();
      });
    });
  }

  /**
   * Stop accepting connections and let in-flight requests finish. Once the
   * grace period runs out the remaining connections are destroyed and the
   * result reports `forced`. Calling stop() again while draining returns
   * the same result.
   */
  async stop(): Promise<ShutdownResult> {
    if (this.draining) {
      return this.draining;
    }

    const server = this.server;
    if (!server || this.state !== ServerState.SERVING) {
      this.state = ServerState.STOPPED;
      return { forced: false };
    }

    this.state = ServerState.DRAINING;
    log.info({ graceMs: this.transportTimeouts.shutdownGrace }, 'Draining HTTP server');

    this.draining = new Promise<ShutdownResult>((resolve) => {
      let forced = false;

      const timer = setTimeout(() => {
        forced = true;
        log.warn('Grace period expired, closing remaining connections');
        server.closeAllConnections();
      }, this.transportTimeouts.shutdownGrace);

      server.close((err?: Error) => {
        clearTimeout(timer);
        if (err) {
          log.error({ err }, 'HTTP server close failed');
        }
        this.state = ServerState.STOPPED;
        log.info({ forced }, 'HTTP server stopped');
        resolve({ forced });
      });

      server.closeIdleConnections();
    });

    return this.draining;
  }
}
