import { StoreError } from './errors';
import { buildDataSourceOptions, connectWithRetry, isConnectionError } from './database';
import { RetryConfig } from './retry';

const noDelay: RetryConfig = { maxAttempts: 3, initialDelayMs: 0, maxDelayMs: 0, multiplier: 2 };
const quietLogger = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };

function refused(): Error {
  return Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:3306'), { code: 'ECONNREFUSED' });
}

describe('connectWithRetry', () => {
  it('initializes after fewer transient failures than the retry limit', async () => {
    const initialize = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(refused())
      .mockRejectedValueOnce(refused())
      .mockResolvedValueOnce('connected');
    const create = jest.fn(() => ({ initialize }));

    await expect(connectWithRetry(create, noDelay, quietLogger)).resolves.toBe('connected');
    expect(create).toHaveBeenCalledTimes(3);
    expect(quietLogger.warn).toHaveBeenCalledTimes(2);
  });

  it('surfaces StorageUnavailable once the retry limit is exceeded', async () => {
    const initialize = jest.fn<Promise<string>, []>().mockRejectedValue(refused());

    const attempt = connectWithRetry(() => ({ initialize }), noDelay, quietLogger);

    await expect(attempt).rejects.toBeInstanceOf(StoreError);
    await expect(attempt).rejects.toMatchObject({ code: 'StorageUnavailable' });
    expect(initialize).toHaveBeenCalledTimes(3);
  });
});

describe('isConnectionError', () => {
  it('recognises driver connection codes, also when wrapped', () => {
    expect(isConnectionError(refused())).toBe(true);
    const wrapped = Object.assign(new Error('query failed'), { driverError: { code: 'PROTOCOL_CONNECTION_LOST' } });
    expect(isConnectionError(wrapped)).toBe(true);
  });

  it('ignores ordinary query errors', () => {
    expect(isConnectionError(Object.assign(new Error('dup'), { code: 'ER_DUP_ENTRY' }))).toBe(false);
    expect(isConnectionError('boom')).toBe(false);
  });
});

describe('buildDataSourceOptions', () => {
  it('builds a pooled mysql data source from the connection string', () => {
    const options = buildDataSourceOptions({
      DATABASE_URL: 'mysql://assistant:test-secret@db:3306/assistant',
      DB_TYPE: 'mysql',
      NODE_ENV: 'test',
    });

    expect(options).toMatchObject({
      type: 'mysql',
      url: 'mysql://assistant:test-secret@db:3306/assistant',
      synchronize: true,
      logging: false,
      poolSize: 10,
    });
  });

  it('keeps an in-memory sql.js database for :memory:', () => {
    const options = buildDataSourceOptions({ DATABASE_URL: ':memory:', DB_TYPE: 'sqljs', NODE_ENV: 'development' });

    expect(options).toMatchObject({ type: 'sqljs', logging: true });
    expect(options).not.toHaveProperty('location');
  });

  it('saves a sql.js database to the file named by the connection string', () => {
    const options = buildDataSourceOptions({ DATABASE_URL: './data/assistant.sqlite', DB_TYPE: 'sqljs', NODE_ENV: 'test' });

    expect(options).toMatchObject({ type: 'sqljs', location: './data/assistant.sqlite', autoSave: true, logging: false });
  });
});
