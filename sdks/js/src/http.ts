import type { AxiosInstance, AxiosRequestConfig } from 'axios';
import type { Readable } from 'node:stream';
import { ResponseConsumedError } from './error';

// HTTP status the server answers with while a long request is still running
export const HTTP_STATUS_ACCEPTED = 202;

/**
 * A response obtained from the transport. The body may be read once, and the
 * response must be released once it is no longer needed.
 */
export interface HttpResponse {
  readonly statusCode: number;
  readonly reasonPhrase: string;
  readBody(): Promise<string>;
  release(): void;
}

/**
 * Performs one HTTP call. Every invocation is a fresh request.
 */
export type HttpAttempt = () => Promise<HttpResponse>;

/**
 * Run `fn` against the response and release it afterwards, whether `fn`
 * returns or throws.
 */
export async function withResponse<T>(
  response: HttpResponse,
  fn: (response: HttpResponse) => Promise<T>
): Promise<T> {
  try {
    return await fn(response);
  } finally {
    response.release();
  }
}

const readText = async (stream: Readable): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
};

class StreamHttpResponse implements HttpResponse {
  private consumed = false;
  private released = false;

  constructor(
    readonly statusCode: number,
    readonly reasonPhrase: string,
    private readonly body: Readable
  ) {}

  async readBody(): Promise<string> {
    if (this.consumed || this.released) {
      throw new ResponseConsumedError();
    }
    this.consumed = true;
    return readText(this.body);
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.body.destroy();
  }
}

/**
 * Wrap an axios request as an HttpAttempt. The body is streamed so that a
 * response which is never read (such as a 202) can be discarded without
 * downloading it. Status codes are not checked here; every status resolves.
 */
export const axiosAttempt = (instance: AxiosInstance, config: AxiosRequestConfig): HttpAttempt => {
  return async () => {
    const response = await instance.request<Readable>({
      ...config,
      responseType: 'stream',
      validateStatus: () => true,
    });
    return new StreamHttpResponse(response.status, response.statusText, response.data);
  };
};
