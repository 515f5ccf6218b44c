import express, { ErrorRequestHandler } from 'express';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { errorHandler } from '../../../src/middleware/errorHandler.js';
import { createHttpError } from '../../../src/utils/httpError.js';
import { startServer, type TestServer } from '../../helpers/server.js';

describe('errorHandler', () => {
  let server: TestServer;
  const forwarded: unknown[] = [];

  beforeAll(async () => {
    const app = express();

    app.get('/http-error', () => {
      throw createHttpError(409, 'CONFLICT', 'Already taken');
    });
    app.get('/crash', () => {
      throw new Error('connection string postgres://internal');
    });
    app.get('/late-failure', (_req, res, next) => {
      res.status(200).type('text/plain');
      res.write('partial');
      next(new Error('failed after streaming'));
    });

    app.use(errorHandler);

    const recordForwarded: ErrorRequestHandler = (err, _req, res, _next) => {
      forwarded.push(err);
      res.end();
    };
    app.use(recordForwarded);

    server = await startServer(app);
  });

  afterAll(async () => {
    await server.close();
  });

  it('renders an HttpError with its status and code', async () => {
    const response = await fetch(`${server.baseUrl}/http-error`);

    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({ status: 'error', code: 'CONFLICT', message: 'Already taken' });
  });

  it('answers 500 INTERNAL_ERROR for any other error without leaking its message', async () => {
    const response = await fetch(`${server.baseUrl}/crash`);
    const body = await response.text();

    expect(response.status).toBe(500);
    expect(JSON.parse(body)).toEqual({ status: 'error', code: 'INTERNAL_ERROR', message: 'Internal server error' });
    expect(body).not.toContain('postgres://internal');
  });

  it('hands the error on when the response has already started', async () => {
    const response = await fetch(`${server.baseUrl}/late-failure`);

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('partial');
    expect(forwarded).toHaveLength(1);
    expect(forwarded[0]).toBeInstanceOf(Error);
    expect(forwarded[0]).toHaveProperty('message', 'failed after streaming');
  });
});
