import { Request, Response, NextFunction } from 'express';
import { LIST_LIMITS, TIMEOUTS } from '../common/Config';
import { throwIfAborted, withDeadline } from '../common/Deadline';
import {
  InternalFailureError,
  KeyNotFoundError,
  ServiceError,
  UpstreamUnavailableError,
  ValidationError,
} from '../common/Errors';
import {
  GetResponse,
  HealthResponse,
  ListQuery,
  ListResponse,
  SetRequestBody,
  StatusResponse,
} from '../common/Types';
import { IKeyValueStore, SCAN_START } from '../interfaces/Store';

export interface HandlerTimeouts {
  readonly keyOperation: number;
  readonly list: number;
  readonly health: number;
}

export interface KeyHandlersOptions {
  readonly timeouts?: Partial<HandlerTimeouts>;
}

type Handler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Parse a set request body. Any JSON shape problem is reported as one
 * fixed message; only a missing or empty value gets its own.
 */
export function parseSetRequest(raw: string): SetRequestBody {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ValidationError('invalid request body');
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError('invalid request body');
  }

  const value: unknown = 'value' in parsed ? parsed.value : undefined;
  const expiration: unknown = 'expiration' in parsed ? parsed.expiration : undefined;

  if (value !== undefined && value !== null && typeof value !== 'string') {
    throw new ValidationError('invalid request body');
  }
  if (expiration !== undefined && expiration !== null && !Number.isSafeInteger(expiration)) {
    throw new ValidationError('invalid request body');
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError('value is required');
  }

  return typeof expiration === 'number' ? { value, expiration } : { value };
}

/**
 * Read `limit` leniently: a leading integer is taken as-is, and anything
 * unreadable or outside [min, max] falls back to the default.
 */
export function parseLimit(raw: string | undefined): number {
  if (raw === undefined || raw.length === 0) {
    return LIST_LIMITS.default;
  }

  const match = /^\s*([+-]?\d+)/.exec(raw);
  if (!match?.[1]) {
    return LIST_LIMITS.default;
  }

  const limit = Number.parseInt(match[1], 10);
  if (limit < LIST_LIMITS.min || limit > LIST_LIMITS.max) {
    return LIST_LIMITS.default;
  }
  return limit;
}

function firstQueryValue(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0];
  }
  return undefined;
}

export function parseListQuery(query: Request['query']): ListQuery {
  const pattern = firstQueryValue(query['pattern']);
  return {
    pattern: pattern !== undefined && pattern.length > 0 ? pattern : '*',
    limit: parseLimit(firstQueryValue(query['limit'])),
  };
}

/**
 * Aborts when the client goes away before the response is complete.
 */
function disconnectSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

function requireKey(req: Request): string {
  const key = req.params['key'] ?? '';
  if (key.length === 0) {
    throw new ValidationError('key is required');
  }
  return key;
}

function asServiceError(err: unknown): ServiceError {
  return err instanceof ServiceError ? err : new InternalFailureError(err);
}

export class KeyHandlers {
  private readonly store: IKeyValueStore;
  private readonly timeouts: HandlerTimeouts;

  constructor(store: IKeyValueStore, options: KeyHandlersOptions = {}) {
    this.store = store;
    this.timeouts = {
      keyOperation: TIMEOUTS.keyOperation,
      list: TIMEOUTS.list,
      health: TIMEOUTS.health,
      ...options.timeouts,
    };
  }

  public getTimeouts(): HandlerTimeouts {
    return this.timeouts;
  }

  public readonly handleHealth: Handler = async (_req, res, next) => {
    try {
      await withDeadline('PING', this.timeouts.health, disconnectSignal(res), () => this.store.ping());
      const body: HealthResponse = { status: 'healthy' };
      res.status(200).json(body);
    } catch (err) {
      next(new UpstreamUnavailableError(err));
    }
  };

  public readonly handleGet: Handler = async (req, res, next) => {
    try {
      const key = requireKey(req);
      const value = await withDeadline('GET', this.timeouts.keyOperation, disconnectSignal(res), () =>
        this.store.get(key)
      );

      if (value === null) {
        throw new KeyNotFoundError();
      }

      const body: GetResponse = { key, value };
      res.status(200).json(body);
    } catch (err) {
      next(asServiceError(err));
    }
  };

  public readonly handleSet: Handler = async (req, res, next) => {
    try {
      const key = requireKey(req);
      const raw: unknown = req.body;
      const request = parseSetRequest(typeof raw === 'string' ? raw : '');

      await withDeadline('SET', this.timeouts.keyOperation, disconnectSignal(res), () =>
        this.store.set(key, request.value, request.expiration)
      );

      const body: StatusResponse = { status: 'created', key };
      res.status(201).json(body);
    } catch (err) {
      next(asServiceError(err));
    }
  };

  public readonly handleDelete: Handler = async (req, res, next) => {
    try {
      const key = requireKey(req);
      const removed = await withDeadline('DEL', this.timeouts.keyOperation, disconnectSignal(res), () =>
        this.store.delete(key)
      );

      if (removed === 0) {
        throw new KeyNotFoundError();
      }

      const body: StatusResponse = { status: 'deleted', key };
      res.status(200).json(body);
    } catch (err) {
      next(asServiceError(err));
    }
  };

  public readonly handleList: Handler = async (req, res, next) => {
    try {
      const { pattern, limit } = parseListQuery(req.query);
      // One deadline for the whole scan, however many batches it takes.
      const keys = await withDeadline('SCAN', this.timeouts.list, disconnectSignal(res), (signal) =>
        this.collectKeys(pattern, limit, signal)
      );

      const body: ListResponse = { keys, count: keys.length };
      res.status(200).json(body);
    } catch (err) {
      next(asServiceError(err));
    }
  };

  private async collectKeys(pattern: string, limit: number, signal: AbortSignal): Promise<string[]> {
    let cursor = SCAN_START;
    const keys: string[] = [];

    do {
      throwIfAborted(signal, 'SCAN');
      const batch = await this.store.scan(cursor, pattern, limit);
      keys.push(...batch.keys);
      cursor = batch.cursor;
    } while (cursor !== SCAN_START && keys.length < limit);

    return keys.slice(0, limit);
  }
}
