import { describe, expect, it } from 'vitest';
import {
  DeserializationFailureError,
  formatResponseError,
  InvalidArgumentError,
  InvalidResponseStatusError,
  ResponseError,
  RestClientError,
} from './error';

describe('formatResponseError', () => {
  it('includes the status line and body', () => {
    expect(formatResponseError('Invalid status code', 500, 'Internal Server Error', 'boom')).toBe(
      'Invalid status code: [500 Internal Server Error] boom'
    );
  });

  it('formats a missing message or body as empty', () => {
    expect(formatResponseError(null, 404, 'Not Found', undefined)).toBe(': [404 Not Found] ');
  });

  it('requires a status phrase', () => {
    expect(() => formatResponseError('x', 500, null, 'body')).toThrow(
      new InvalidArgumentError('statusPhrase is null')
    );
  });
});

describe('error classes', () => {
  it('keep their names and prototype chain', () => {
    const err = new InvalidResponseStatusError({
      statusCode: 409,
      reasonPhrase: 'Conflict',
      rawBody: 'already running',
    });

    expect(err).toBeInstanceOf(InvalidResponseStatusError);
    expect(err).toBeInstanceOf(ResponseError);
    expect(err).toBeInstanceOf(RestClientError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('InvalidResponseStatusError');
    expect(err.message).toBe('Invalid status code: [409 Conflict] already running');
  });

  it('attach the parse error as cause', () => {
    const cause = new SyntaxError('Unexpected end of JSON input');
    const err = new DeserializationFailureError(
      { statusCode: 200, reasonPhrase: 'OK', rawBody: '{' },
      cause
    );

    expect(err.cause).toBe(cause);
    expect(err.statusCode).toBe(200);
    expect(err.message).toBe('Failed to de-serialize response body: [200 OK] {');
  });
});
