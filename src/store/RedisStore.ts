import Redis from 'ioredis';
import { parseStoreAddress } from '../common/Config';
import { StoreError } from '../common/Errors';
import { getLogger } from '../common/Logger';
import { IKeyValueStore, ScanBatch, ScanCursor } from '../interfaces/Store';

const log = getLogger('store');

/**
 * The subset of the ioredis client the adapter calls. An ioredis `Redis`
 * instance satisfies it; tests pass a stub.
 */
export interface RedisCommandClient {
  connect(): Promise<void>;
  ping(): Promise<string>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  scan(
    cursor: string,
    matchToken: 'MATCH',
    pattern: string,
    countToken: 'COUNT',
    count: number
  ): Promise<[cursor: string, elements: string[]]>;
  quit(): Promise<unknown>;
  disconnect(): void;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export interface RedisStoreOptions {
  readonly address: string;
  readonly password: string;
  readonly connectTimeoutMs: number;
}

export function createRedisClient(options: RedisStoreOptions): Redis {
  const { host, port } = parseStoreAddress(options.address);

  return new Redis({
    host,
    port,
    password: options.password.length > 0 ? options.password : undefined,
    lazyConnect: true,
    connectTimeout: options.connectTimeoutMs,
    // Fail commands immediately while disconnected; nothing is retried.
    enableOfflineQueue: false,
    maxRetriesPerRequest: 0,
    retryStrategy: (attempt: number) => Math.min(attempt * 200, 2000),
  });
}

export class RedisStore implements IKeyValueStore {
  private readonly client: RedisCommandClient;

  constructor(client: RedisCommandClient) {
    this.client = client;
    this.client.on('error', (err: Error) => {
      log.warn({ err }, 'Store connection error');
    });
  }

  async connect(): Promise<void> {
    await this.run('CONNECT', () => this.client.connect());
  }

  async ping(): Promise<void> {
    const reply = await this.run('PING', () => this.client.ping());
    if (reply !== 'PONG') {
      throw new StoreError(`Unexpected PING reply: ${reply}`);
    }
  }

  async get(key: string): Promise<string | null> {
    return this.run('GET', () => this.client.get(key));
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds !== undefined && ttlSeconds > 0) {
      await this.run('SETEX', () => this.client.setex(key, ttlSeconds, value));
      return;
    }
    await this.run('SET', () => this.client.set(key, value));
  }

  async delete(key: string): Promise<number> {
    return this.run('DEL', () => this.client.del(key));
  }

  async scan(cursor: ScanCursor, pattern: string, count: number): Promise<ScanBatch> {
    const [next, keys] = await this.run('SCAN', () =>
      this.client.scan(cursor, 'MATCH', pattern, 'COUNT', count)
    );
    return { cursor: next, keys };
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch (err) {
      log.warn({ err }, 'QUIT failed, dropping store connection');
      this.client.disconnect();
    }
  }

  private async run<T>(command: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      throw new StoreError(`${command} failed`, { cause: err });
    }
  }
}
