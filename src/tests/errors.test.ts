import assert from 'node:assert/strict';
import { test } from 'node:test';
import { z } from 'zod';
import { HttpError, upstreamError } from '../errors.js';
import { describeError } from '../utils/describe-error.js';

test('errors: upstreamError keeps status and url', () => {
  const error = upstreamError(404, 'Not Found', 'https://api.test/users');
  assert.ok(error instanceof HttpError);
  assert.equal(error.statusCode, 404);
  assert.equal(error.message, 'Not Found');
  assert.deepEqual(error.details, { url: 'https://api.test/users' });
});

test('errors: upstreamError without status text', () => {
  assert.equal(upstreamError(502, '', 'https://api.test/posts').message, 'upstream request failed');
});

test('errors: describeError formats http errors', () => {
  assert.equal(describeError(new HttpError(503, 'Service Unavailable')), 'HTTP 503 Service Unavailable');
});

test('errors: describeError lists zod issues with their path', () => {
  const nested = z.object({ a: z.number() }).safeParse({ a: 'x' });
  assert.equal(nested.success, false);
  if (!nested.success) {
    assert.equal(describeError(nested.error), 'validation_failed: a: Expected number, received string');
  }

  const root = z.array(z.string()).safeParse(5);
  assert.equal(root.success, false);
  if (!root.success) {
    assert.equal(describeError(root.error), 'validation_failed: (root): Expected array, received number');
  }
});

test('errors: describeError falls back to message or string', () => {
  assert.equal(describeError(new Error('boom')), 'boom');
  assert.equal(describeError('plain'), 'plain');
});
