import { RedisProber, parseRedisOptions, redisProber, type RedisProbeClient } from './RedisProber';

function fakeClient(overrides: Partial<RedisProbeClient> = {}) {
  const client = {
    connect: jest.fn<Promise<void>, []>(async () => undefined),
    ping: jest.fn<Promise<string>, []>(async () => 'PONG'),
    disconnect: jest.fn<void, []>(),
    ...overrides,
  };
  return client;
}

describe('RedisProber', () => {
  const options = parseRedisOptions({ host: 'cache', port: 6380 });

  it('should report UP on PONG and always disconnect', async () => {
    const client = fakeClient();
    const prober = new RedisProber(options, () => client);

    const result = await prober.probe(new AbortController().signal);

    expect(result).toMatchObject({ status: 'UP', metadata: { host: 'cache', port: 6380, database: 0 } });
    expect(client.disconnect).toHaveBeenCalled();
  });

  it('should report DOWN with the connection error', async () => {
    const client = fakeClient({
      connect: jest.fn(async () => {
        throw new Error('connect ECONNREFUSED 10.0.0.5:6380');
      }),
    });

    const result = await new RedisProber(options, () => client).probe(new AbortController().signal);

    expect(result).toMatchObject({ status: 'DOWN', error: 'connect ECONNREFUSED 10.0.0.5:6380' });
    expect(client.disconnect).toHaveBeenCalled();
  });

  it('should report DOWN on an unexpected reply', async () => {
    const client = fakeClient({ ping: jest.fn(async () => 'LOADING') });

    const result = await new RedisProber(options, () => client).probe(new AbortController().signal);

    expect(result).toMatchObject({ status: 'DOWN', error: 'Unexpected PING reply "LOADING"' });
  });

  it('should disconnect when aborted during PING', async () => {
    const controller = new AbortController();
    let markPingStarted: () => void = () => undefined;
    const pingStarted = new Promise<void>(resolve => {
      markPingStarted = resolve;
    });
    const client = fakeClient({
      ping: jest.fn(() => new Promise<string>((_, reject) => {
        controller.signal.addEventListener('abort', () => reject(new Error('Connection is closed.')));
        markPingStarted();
      })),
    });

    const pending = new RedisProber(options, () => client).probe(controller.signal);
    await pingStarted;
    controller.abort(new Error('timeout'));

    await expect(pending).rejects.toThrow('Connection is closed.');
    expect(client.disconnect).toHaveBeenCalled();
  });

  it('should not PING when aborted while connecting', async () => {
    const controller = new AbortController();
    const client = fakeClient();

    const pending = new RedisProber(options, () => client).probe(controller.signal);
    controller.abort(new Error('timeout'));

    await expect(pending).rejects.toThrow('timeout');
    expect(client.ping).not.toHaveBeenCalled();
    expect(client.disconnect).toHaveBeenCalled();
  });

  it('should apply defaults when parsing options', () => {
    expect(parseRedisOptions({})).toEqual({
      host: 'localhost',
      port: 6379,
      password: undefined,
      database: 0,
      degradedLatencyMs: undefined,
    });
  });

  it('should validate params', () => {
    expect(redisProber.validate({ host: 'cache', database: 3 }, 'p')).toEqual([]);
    expect(redisProber.validate({ port: 'x', database: 16, password: 1 }, 'p').map(i => i.path)).toEqual([
      'p.port',
      'p.password',
      'p.database',
    ]);
  });
});
