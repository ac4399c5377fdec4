import { describe, it, expect } from 'vitest';
import {
  CacheError,
  InvalidQueryError,
  ParseError,
  ProviderUnavailableError,
  SearchBridgeError,
  publicErrorCode,
  toError,
} from './errors.js';

describe('errors', () => {
  it('should report parse failures as provider unavailability with their own code', () => {
    const error = new ParseError('bad body', 2);

    expect(error).toBeInstanceOf(ProviderUnavailableError);
    expect(error).toBeInstanceOf(SearchBridgeError);
    expect(error.code).toBe('PARSE_ERROR');
    expect(error.attempts).toBe(2);
    expect(error.name).toBe('ParseError');
  });

  it('should carry codes and causes', () => {
    const cause = new Error('socket closed');

    expect(new InvalidQueryError('empty').code).toBe('INVALID_QUERY');
    expect(new ProviderUnavailableError('down', 3, cause)).toMatchObject({
      code: 'PROVIDER_UNAVAILABLE',
      attempts: 3,
      cause,
    });
    expect(new CacheError('write failed', cause).cause).toBe(cause);
  });

  it('should wrap non-error values', () => {
    const original = new Error('kept');

    expect(toError(original)).toBe(original);
    expect(toError('plain').message).toBe('plain');
  });

  it('should expose parse failures to callers as an unavailable provider', () => {
    expect(publicErrorCode(new ParseError('bad body', 1))).toBe('PROVIDER_UNAVAILABLE');
    expect(publicErrorCode(new ProviderUnavailableError('down', 3))).toBe('PROVIDER_UNAVAILABLE');
    expect(publicErrorCode(new InvalidQueryError('empty'))).toBe('INVALID_QUERY');
    expect(publicErrorCode(new Error('boom'))).toBe('INTERNAL_ERROR');
  });
});
