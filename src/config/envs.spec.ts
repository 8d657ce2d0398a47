describe('Validator envs', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    jest.resetModules();
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('parses environment variables', async () => {
    process.env['NATS_SERVERS'] = 'nats://localhost:4222, nats://localhost:4223';
    process.env['ONLY_NIF_BY_DEFAULT'] = 'true';
    process.env['LOG_LEVEL'] = 'debug';

    const { envs } = await import('./envs');

    expect(envs.natsServers).toEqual(['nats://localhost:4222', 'nats://localhost:4223']);
    expect(envs.onlyNifByDefault).toBe(true);
    expect(envs.logLevels).toEqual(['error', 'warn', 'log', 'debug']);
  });

  it('applies defaults', async () => {
    process.env['NATS_SERVERS'] = 'nats://localhost:4222';
    delete process.env['ONLY_NIF_BY_DEFAULT'];
    delete process.env['LOG_LEVEL'];

    const { envs } = await import('./envs');

    expect(envs.onlyNifByDefault).toBe(false);
    expect(envs.logLevels).toEqual(['error', 'warn', 'log']);
  });

  it('rejects a missing NATS_SERVERS', async () => {
    delete process.env['NATS_SERVERS'];

    await expect(import('./envs')).rejects.toThrow(/^Config validation error: /);
  });

  it('rejects an unknown log level', async () => {
    process.env['NATS_SERVERS'] = 'nats://localhost:4222';
    process.env['LOG_LEVEL'] = 'trace';

    await expect(import('./envs')).rejects.toThrow('Config validation error');
  });
});
