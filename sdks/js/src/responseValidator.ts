import type { z } from 'zod';
import { DeserializationFailureError, InvalidResponseStatusError } from './error';
import { notNull } from './guards';
import { type HttpResponse, withResponse } from './http';

/**
 * Turns parsed JSON into the result type. Zod object schemas drop keys they do
 * not declare, so fields the server adds later are ignored.
 */
export type ResponseDecoder<T> =
  | z.ZodType<T, z.ZodTypeDef, unknown>
  | ((data: unknown) => T);

export type StatusCodes = ReadonlySet<number> | readonly number[];

const isAllowed = (statusCode: number, validStatusCodes: StatusCodes): boolean => {
  return new Set<number>(validStatusCodes).has(statusCode);
};

const decode = <T>(body: string, decoder: ResponseDecoder<T>): T => {
  const data: unknown = JSON.parse(body);
  return typeof decoder === 'function' ? decoder(data) : decoder.parse(data);
};

/**
 * Check a terminal response against the allowed status codes and decode its
 * JSON body. The response is released once its body has been read.
 *
 * Fails with InvalidResponseStatusError when the status is not allowed (the
 * body is not decoded), or DeserializationFailureError when the body does not
 * parse into the expected shape.
 */
export const parseTyped = async <T>(
  response: HttpResponse,
  validStatusCodes: StatusCodes,
  decoder: ResponseDecoder<T>
): Promise<T> => {
  notNull(response, 'response');
  notNull(validStatusCodes, 'validStatusCodes');
  notNull(decoder, 'decoder');

  const { statusCode, reasonPhrase } = response;
  const rawBody = await withResponse(response, (r) => r.readBody());

  if (!isAllowed(statusCode, validStatusCodes)) {
    throw new InvalidResponseStatusError({ statusCode, reasonPhrase, rawBody });
  }

  try {
    return decode(rawBody, decoder);
  } catch (err) {
    throw new DeserializationFailureError({ statusCode, reasonPhrase, rawBody }, err);
  }
};
