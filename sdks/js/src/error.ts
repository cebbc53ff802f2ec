// Base class for every error raised by the SDK itself. Transport errors from
// axios are not wrapped and reach the caller as-is.
export class RestClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidArgumentError extends RestClientError {}

/**
 * The backoff wait of a long request was cancelled.
 */
export class InterruptedOperationError extends RestClientError {
  constructor(options?: { cause?: unknown }) {
    super('Long request interrupted!', options);
  }
}

export class ResponseConsumedError extends RestClientError {
  constructor() {
    super('Response body has already been read');
  }
}

export interface ResponseErrorDetails {
  statusCode: number;
  reasonPhrase: string;
  rawBody: string;
}

/**
 * Carries the status line and raw body of the response that failed, so the
 * failure can be diagnosed without re-running the request.
 */
export class ResponseError extends RestClientError {
  readonly statusCode: number;
  readonly reasonPhrase: string;
  readonly rawBody: string;

  constructor(context: string, details: ResponseErrorDetails, options?: { cause?: unknown }) {
    super(
      formatResponseError(context, details.statusCode, details.reasonPhrase, details.rawBody),
      options
    );
    this.statusCode = details.statusCode;
    this.reasonPhrase = details.reasonPhrase;
    this.rawBody = details.rawBody;
  }
}

export class InvalidResponseStatusError extends ResponseError {
  constructor(details: ResponseErrorDetails) {
    super('Invalid status code', details);
  }
}

export class DeserializationFailureError extends ResponseError {
  constructor(details: ResponseErrorDetails, cause: unknown) {
    super('Failed to de-serialize response body', details, { cause });
  }
}

/**
 * Builds an error message which includes the response http status and body.
 */
export function formatResponseError(
  errMsg: string | null | undefined,
  statusCode: number,
  statusPhrase: string | null | undefined,
  responseBody: string | null | undefined
): string {
  if (statusPhrase === null || statusPhrase === undefined) {
    throw new InvalidArgumentError('statusPhrase is null');
  }

  return `${errMsg ?? ''}: [${statusCode} ${statusPhrase}] ${responseBody ?? ''}`;
}
