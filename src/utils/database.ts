import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSourceOptions } from 'typeorm';
import { ENTITIES } from '../entities';
import { DbType, Env } from './env';
import { StoreError, errorMessage } from './errors';
import { RetryConfig, withRetry } from './retry';

/** Startup connection policy: 3 attempts, waiting 1 s then 2 s. */
export const DB_CONNECT_RETRY: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  multiplier: 2,
};

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENOTFOUND',
  'EPIPE',
  'PROTOCOL_CONNECTION_LOST',
  'PROTOCOL_SEQUENCE_TIMEOUT',
  'ER_CON_COUNT_ERROR',
  'ER_ACCESS_DENIED_ERROR',
  'ER_BAD_DB_ERROR',
]);

const NOT_CONNECTED_ERRORS = new Set(['CannotExecuteNotConnectedError', 'ConnectionIsNotSetError']);

export type DatabaseEnv = Pick<Env, 'DB_TYPE' | 'DATABASE_URL' | 'NODE_ENV'>;

export function databaseEnvFrom(config: ConfigService): DatabaseEnv {
  return {
    DB_TYPE: config.get<DbType>('DB_TYPE', 'mysql'),
    DATABASE_URL: config.getOrThrow<string>('DATABASE_URL'),
    NODE_ENV: config.get<Env['NODE_ENV']>('NODE_ENV', 'development'),
  };
}

export function buildDataSourceOptions(env: DatabaseEnv): DataSourceOptions {
  const type = env.DB_TYPE;
  const url = env.DATABASE_URL;
  const logging = env.NODE_ENV === 'development';

  if (type === 'sqljs') {
    // `:memory:` keeps the database in process; any other value is a file saved after each write.
    const file = url === ':memory:' ? {} : { location: url, autoSave: true };
    return { type, ...file, entities: ENTITIES, synchronize: true, logging };
  }

  return {
    type: 'mysql',
    url,
    entities: ENTITIES,
    synchronize: true,
    logging,
    charset: 'utf8mb4',
    poolSize: 10,
  };
}

export interface Initializable<T> {
  initialize(): Promise<T>;
}

/**
 * Creates and initializes a data source, retrying with backoff while the
 * database is still coming up. A fresh instance is built for every attempt.
 */
export async function connectWithRetry<T>(
  create: () => Initializable<T>,
  config: RetryConfig = DB_CONNECT_RETRY,
  logger: Pick<Logger, 'warn' | 'log' | 'error'> = new Logger('Database'),
): Promise<T> {
  try {
    const connected = await withRetry(() => create().initialize(), config, {
      onFailedAttempt: ({ attempt, error, nextDelayMs }) => {
        if (nextDelayMs === undefined) {
          logger.error(`Database connection attempt ${attempt} failed: ${errorMessage(error)}`);
        } else {
          logger.warn(`Database connection attempt ${attempt} failed: ${errorMessage(error)}; retrying in ${nextDelayMs}ms`);
        }
      },
    });
    logger.log('Database connection established');
    return connected;
  } catch (error) {
    throw new StoreError('StorageUnavailable', `Database unreachable after ${config.maxAttempts} attempts`, { cause: error });
  }
}

function stringProp(value: unknown, key: string): string | undefined {
  if (typeof value === 'object' && value !== null && key in value) {
    const prop: unknown = Reflect.get(value, key);
    return typeof prop === 'string' ? prop : undefined;
  }
  return undefined;
}

/** True for driver errors that mean the database itself cannot be reached. */
export function isConnectionError(error: unknown): boolean {
  if (error instanceof Error && NOT_CONNECTED_ERRORS.has(error.name)) {
    return true;
  }
  const driverError: unknown = error instanceof Error ? Reflect.get(error, 'driverError') : undefined;
  const code = stringProp(error, 'code') ?? stringProp(driverError, 'code');
  return code !== undefined && CONNECTION_ERROR_CODES.has(code);
}
