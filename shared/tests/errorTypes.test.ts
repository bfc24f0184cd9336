/**
 * Tests for refresh error classes.
 * Covers error construction, type guards, normalization, and user-facing
 * descriptions.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  RefreshError,
  NetworkError,
  DecodingError,
  CacheConfigError,
  isRefreshError,
  isNetworkError,
  isDecodingError,
  getStatusCode,
  getErrorCode,
  getErrorMessage,
  toRefreshError,
  describeRefreshError,
} from '../src/utils/errorTypes.js';

describe('NetworkError', () => {
  describe('Constructor', () => {
    it('should default to status 0 with no code', () => {
      const error = new NetworkError('Request to /api/notes failed: fetch failed');

      assert.strictEqual(error.message, 'Request to /api/notes failed: fetch failed');
      assert.strictEqual(error.statusCode, 0);
      assert.strictEqual(error.code, undefined);
      assert.strictEqual(error.kind, 'network');
      assert.strictEqual(error.name, 'NetworkError');
    });

    it('should keep status, code, and cause', () => {
      const cause = new Error('boom');
      const error = new NetworkError('failed', { statusCode: 502, code: 'EPROTO', cause });

      assert.strictEqual(error.statusCode, 502);
      assert.strictEqual(error.code, 'EPROTO');
      assert.strictEqual(error.cause, cause);
    });

    it('should be an instance of RefreshError and Error', () => {
      const error = new NetworkError('failed');

      assert.ok(error instanceof RefreshError);
      assert.ok(error instanceof Error);
    });
  });

  describe('isRetryable', () => {
    it('should retry connection failures, rate limits, and server errors', () => {
      assert.strictEqual(new NetworkError('x').isRetryable, true);
      assert.strictEqual(new NetworkError('x', { statusCode: 429 }).isRetryable, true);
      assert.strictEqual(new NetworkError('x', { statusCode: 503 }).isRetryable, true);
    });

    it('should not retry other client errors', () => {
      assert.strictEqual(new NetworkError('x', { statusCode: 400 }).isRetryable, false);
      assert.strictEqual(new NetworkError('x', { statusCode: 404 }).isRetryable, false);
    });
  });
});

describe('DecodingError', () => {
  it('should carry schema issues', () => {
    const error = new DecodingError('Unexpected response shape from /api/notes', {
      issues: ['data.0.title: Required'],
    });

    assert.strictEqual(error.kind, 'decoding');
    assert.strictEqual(error.name, 'DecodingError');
    assert.deepStrictEqual(error.issues, ['data.0.title: Required']);
  });

  it('should default to no issues', () => {
    assert.deepStrictEqual(new DecodingError('bad').issues, []);
  });
});

describe('CacheConfigError', () => {
  it('should not be a refresh error', () => {
    const error = new CacheConfigError('bad window');

    assert.strictEqual(error.name, 'CacheConfigError');
    assert.strictEqual(isRefreshError(error), false);
  });
});

describe('Type Guards', () => {
  it('should classify refresh errors', () => {
    const network = new NetworkError('x');
    const decoding = new DecodingError('y');

    assert.strictEqual(isRefreshError(network), true);
    assert.strictEqual(isRefreshError(decoding), true);
    assert.strictEqual(isNetworkError(network), true);
    assert.strictEqual(isNetworkError(decoding), false);
    assert.strictEqual(isDecodingError(decoding), true);
    assert.strictEqual(isRefreshError(new Error('z')), false);
    assert.strictEqual(isRefreshError('z'), false);
  });
});

describe('Helpers', () => {
  it('should read status codes from network errors only', () => {
    assert.strictEqual(getStatusCode(new NetworkError('x', { statusCode: 401 })), 401);
    assert.strictEqual(getStatusCode(new DecodingError('x')), undefined);
  });

  it('should read string codes from any error', () => {
    const error = Object.assign(new Error('refused'), { code: 'ECONNREFUSED' });

    assert.strictEqual(getErrorCode(error), 'ECONNREFUSED');
    assert.strictEqual(getErrorCode(Object.assign(new Error('x'), { code: 42 })), undefined);
    assert.strictEqual(getErrorCode('ECONNREFUSED'), undefined);
  });

  it('should extract messages from errors and strings', () => {
    assert.strictEqual(getErrorMessage(new Error('from error')), 'from error');
    assert.strictEqual(getErrorMessage('from string'), 'from string');
    assert.strictEqual(getErrorMessage({ message: 'object' }), 'Unknown error');
  });
});

describe('toRefreshError', () => {
  it('should return refresh errors unchanged', () => {
    const error = new DecodingError('bad');

    assert.strictEqual(toRefreshError(error), error);
  });

  it('should wrap other errors as network errors', () => {
    const original = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });

    const wrapped = toRefreshError(original);

    assert.ok(wrapped instanceof NetworkError);
    assert.strictEqual(wrapped.message, 'socket hang up');
    assert.strictEqual(wrapped.code, 'ECONNRESET');
    assert.strictEqual(wrapped.statusCode, 0);
    assert.strictEqual(wrapped.cause, original);
  });

  it('should wrap non-error values', () => {
    const wrapped = toRefreshError(undefined);

    assert.strictEqual(wrapped.kind, 'network');
    assert.strictEqual(wrapped.message, 'Unknown error');
  });
});

describe('describeRefreshError', () => {
  const describeStatus = (statusCode: number) => describeRefreshError(new NetworkError('x', { statusCode }));

  it('should describe a missing connection', () => {
    assert.deepStrictEqual(describeStatus(0), {
      message: 'No internet connection',
      recoverySuggestion: 'Check your internet connection and try again',
    });
  });

  it('should describe permission problems', () => {
    assert.strictEqual(describeStatus(401).message, 'Please check your permissions');
    assert.strictEqual(describeStatus(403).recoverySuggestion, 'Sign out and sign back in');
  });

  it('should describe missing items', () => {
    assert.deepStrictEqual(describeStatus(404), {
      message: 'The requested item was not found',
      recoverySuggestion: 'Refresh the list to see current items',
    });
  });

  it('should describe server errors', () => {
    assert.strictEqual(describeStatus(500).message, 'Server is experiencing issues');
    assert.strictEqual(describeStatus(503).recoverySuggestion, 'Wait a moment and try again');
  });

  it('should fall back for other statuses', () => {
    assert.strictEqual(describeStatus(418).message, 'Network request failed');
  });

  it('should describe decoding failures', () => {
    assert.deepStrictEqual(describeRefreshError(new DecodingError('bad')), {
      message: 'Received an unexpected response',
      recoverySuggestion: 'Try again or contact support if the problem persists',
    });
  });
});
