import { describe, it, expect, vi } from 'vitest';
import { StoreError } from '../../src/common/Errors';
import { RedisCommandClient, RedisStore, createRedisClient } from '../../src/store/RedisStore';

function createStubClient() {
  return {
    connect: vi.fn(async (): Promise<void> => {}),
    ping: vi.fn(async (): Promise<string> => 'PONG'),
    get: vi.fn(async (_key: string): Promise<string | null> => null),
    set: vi.fn(async (_key: string, _value: string): Promise<unknown> => 'OK'),
    setex: vi.fn(async (_key: string, _seconds: number, _value: string): Promise<unknown> => 'OK'),
    del: vi.fn(async (_key: string): Promise<number> => 0),
    scan: vi.fn(
      async (
        _cursor: string,
        _matchToken: 'MATCH',
        _pattern: string,
        _countToken: 'COUNT',
        _count: number
      ): Promise<[cursor: string, elements: string[]]> => ['0', []]
    ),
    quit: vi.fn(async (): Promise<unknown> => 'OK'),
    disconnect: vi.fn((): void => {}),
    on: vi.fn((_event: 'error', _listener: (err: Error) => void): unknown => undefined),
  } satisfies RedisCommandClient;
}

describe('RedisStore', () => {
  it('listens for connection errors', () => {
    const client = createStubClient();
    new RedisStore(client);
    expect(client.on).toHaveBeenCalledWith('error', expect.any(Function));
  });

  it('returns the stored value from GET', async () => {
    const client = createStubClient();
    client.get.mockResolvedValueOnce('v');
    const store = new RedisStore(client);

    await expect(store.get('k')).resolves.toBe('v');
    expect(client.get).toHaveBeenCalledWith('k');
  });

  it('returns null for a missing key', async () => {
    const store = new RedisStore(createStubClient());
    await expect(store.get('missing')).resolves.toBeNull();
  });

  it('uses SET without a positive ttl', async () => {
    const client = createStubClient();
    const store = new RedisStore(client);

    await store.set('k', 'v');
    await store.set('k', 'v', 0);
    await store.set('k', 'v', -1);

    expect(client.set).toHaveBeenCalledTimes(3);
    expect(client.set).toHaveBeenLastCalledWith('k', 'v');
    expect(client.setex).not.toHaveBeenCalled();
  });

  it('uses SETEX with a positive ttl', async () => {
    const client = createStubClient();
    const store = new RedisStore(client);

    await store.set('session', 'abc', 3600);

    expect(client.setex).toHaveBeenCalledWith('session', 3600, 'abc');
    expect(client.set).not.toHaveBeenCalled();
  });

  it('returns the removed count from DEL', async () => {
    const client = createStubClient();
    client.del.mockResolvedValueOnce(1);
    const store = new RedisStore(client);

    await expect(store.delete('k')).resolves.toBe(1);
  });

  it('maps a SCAN reply into a batch', async () => {
    const client = createStubClient();
    client.scan.mockResolvedValueOnce(['17', ['user:1', 'user:2']]);
    const store = new RedisStore(client);

    await expect(store.scan('0', 'user:*', 100)).resolves.toEqual({ cursor: '17', keys: ['user:1', 'user:2'] });
    expect(client.scan).toHaveBeenCalledWith('0', 'MATCH', 'user:*', 'COUNT', 100);
  });

  it('wraps command failures in StoreError and keeps the cause', async () => {
    const client = createStubClient();
    const failure = new Error('READONLY You can not write against a read only replica.');
    client.setex.mockRejectedValueOnce(failure);
    const store = new RedisStore(client);

    const err: unknown = await store.set('k', 'v', 10).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StoreError);
    expect(err).toHaveProperty('message', 'SETEX failed');
    expect(err).toHaveProperty('cause', failure);
  });

  it('rejects an unexpected PING reply', async () => {
    const client = createStubClient();
    client.ping.mockResolvedValueOnce('LOADING');
    const store = new RedisStore(client);

    await expect(store.ping()).rejects.toThrow('Unexpected PING reply: LOADING');
  });

  it('falls back to disconnect when QUIT fails', async () => {
    const client = createStubClient();
    client.quit.mockRejectedValueOnce(new Error('Connection is closed.'));
    const store = new RedisStore(client);

    await store.close();

    expect(client.disconnect).toHaveBeenCalledTimes(1);
  });

  it('closes with QUIT when the connection is healthy', async () => {
    const client = createStubClient();
    const store = new RedisStore(client);

    await store.close();

    expect(client.quit).toHaveBeenCalledTimes(1);
    expect(client.disconnect).not.toHaveBeenCalled();
  });
});

describe('createRedisClient', () => {
  it('builds a lazily connecting client for the configured address', () => {
    const client = createRedisClient({ address: 'cache.internal:6380', password: '', connectTimeoutMs: 5000 });

    expect(client.options.host).toBe('cache.internal');
    expect(client.options.port).toBe(6380);
    expect(client.options.password).toBeNull();
    expect(client.options.enableOfflineQueue).toBe(false);
    expect(client.status).toBe('wait');

    client.disconnect();
  });

  it('passes a non-empty password through', () => {
    const client = createRedisClient({ address: 'localhost:6379', password: 'test-password', connectTimeoutMs: 5000 });
    expect(client.options.password).toBe('test-password');
    client.disconnect();
  });
});
