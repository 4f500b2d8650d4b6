import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import {
  AuthenticationError,
  NotFoundError,
  StoreError,
  TransactionClosedError,
  ValidationError,
} from '@gatehouse/core';
import { errorHandler, notFoundHandler } from './error-handler.js';
import { requestContext } from './request-context.js';

function appThrowing(error: Error) {
  const app = new Hono();
  app.use('*', requestContext);
  app.onError(errorHandler);
  app.notFound(notFoundHandler);
  app.get('/boom', () => {
    throw error;
  });
  return app;
}

async function fail(error: Error) {
  const res = await appThrowing(error).request('/boom', { headers: { 'X-Request-ID': 'req-1' } });
  return { status: res.status, body: await res.json() };
}

describe('errorHandler', () => {
  it('maps ValidationError to 400 with issue details', async () => {
    const { status, body } = await fail(
      new ValidationError('Validation failed: name: Required', { errors: [{ path: ['name'], message: 'Required' }] })
    );
    expect(status).toBe(400);
    expect(body.success).toBe(false);
    expect(body.error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Validation failed: name: Required',
      details: { errors: [{ path: ['name'], message: 'Required' }] },
    });
    expect(body.meta.requestId).toBe('req-1');
  });

  it('maps AuthenticationError to 401', async () => {
    const { status, body } = await fail(new AuthenticationError());
    expect(status).toBe(401);
    expect(body.error).toEqual({ code: 'AUTHENTICATION_ERROR', message: 'Authentication required' });
  });

  it('maps NotFoundError to 404', async () => {
    const { status, body } = await fail(new NotFoundError('User', 'u1'));
    expect(status).toBe(404);
    expect(body.error.message).toBe('User not found: u1');
  });

  it('maps constraint violations to 409 and other store failures to 500', async () => {
    expect((await fail(new StoreError('insertUser', 'duplicate key', { driverCode: '23505' }))).status).toBe(409);
    const { status, body } = await fail(new StoreError('listUsers', 'connection terminated', { driverCode: '57P01' }));
    expect(status).toBe(500);
    expect(body.error.code).toBe('STORE_ERROR');
  });

  it('maps a closed transaction to 500', async () => {
    const { status, body } = await fail(new TransactionClosedError('committed'));
    expect(status).toBe(500);
    expect(body.error.code).toBe('TRANSACTION_CLOSED');
  });

  it('maps Hono HTTP exceptions by status', async () => {
    const { status, body } = await fail(new HTTPException(413, { message: 'Payload too large' }));
    expect(status).toBe(413);
    expect(body.error).toEqual({ code: 'PAYLOAD_TOO_LARGE', message: 'Payload too large' });
  });

  it('maps malformed JSON to 400', async () => {
    const { status, body } = await fail(new SyntaxError('Unexpected token } in JSON at position 1'));
    expect(status).toBe(400);
    expect(body.error.message).toBe('Invalid JSON in request body');
  });

  it('hides unexpected errors behind a generic message', async () => {
    const { status, body } = await fail(new Error('secret detail'));
    expect(status).toBe(500);
    expect(body.error.code).toBe('INTERNAL_ERROR');
    expect(body.error.message).toBe('An unexpected error occurred');
  });
});

describe('notFoundHandler', () => {
  it('returns 404 with the route', async () => {
    const res = await appThrowing(new Error('unused')).request('/missing');
    expect(res.status).toBe(404);
    expect((await res.json()).error).toEqual({ code: 'NOT_FOUND', message: 'Route not found: GET /missing' });
  });
});
