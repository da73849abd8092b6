import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import {
  ConfigurationError,
  OperationalError,
  StoreError,
  handleOperationalError,
} from '../errors';

describe('OperationalError', () => {
  it('should serialize to an error body', () => {
    const error = new OperationalError('store_failure', 'database is locked', 503);

    expect(error.toJSON()).toEqual({
      error: 'store_failure',
      error_description: 'database is locked',
    });
    expect(error.statusCode).toBe(503);
  });

  it('should expose configuration issues', () => {
    const error = new ConfigurationError('Invalid options', ['batchSize: too small']);

    expect(error).toBeInstanceOf(OperationalError);
    expect(error.code).toBe('configuration_invalid');
    expect(error.statusCode).toBe(400);
    expect(error.issues).toEqual(['batchSize: too small']);
  });

  it('should keep the cause of store errors', () => {
    const cause = new Error('SQLITE_IOERR');
    const error = new StoreError('query failed', { cause });

    expect(error.cause).toBe(cause);
    expect(error.statusCode).toBe(503);
  });
});

describe('handleOperationalError', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createTestApp(error: Error): Hono {
    const app = new Hono();
    app.get('/fail', () => {
      throw error;
    });
    app.onError(handleOperationalError);
    return app;
  }

  it('should render operational errors with their status', async () => {
    const res = await createTestApp(new ConfigurationError('bad batch size')).request('/fail');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'configuration_invalid',
      error_description: 'bad batch size',
    });
  });

  it('should hide details of unknown errors', async () => {
    const res = await createTestApp(new Error('secret internals')).request('/fail');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: 'server_error',
      error_description: 'Internal server error',
    });
  });

  it('should pass HTTP exceptions through', async () => {
    const res = await createTestApp(new HTTPException(401, { message: 'Unauthorized' })).request(
      '/fail'
    );

    expect(res.status).toBe(401);
  });
});
