import { RetrievalError, RetrievalTimeoutError } from "./errors.js";

export type FetchFunction = typeof fetch;

export interface HttpOptions {
  // Milliseconds before the request is abandoned
  timeout: number;
  fetch?: FetchFunction;
}

function isTimeout(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    error.name === "TimeoutError"
  );
}

export interface FetchExpectations {
  // Only this status is accepted; any 2xx when not given
  status?: number;
  // Bodies longer than this are abandoned
  maxLength?: number;
}

function tooLong(url: string, maxLength: number, status: number): RetrievalError {
  return new RetrievalError(
    `${url} exceeds the maximum length of ${maxLength} bytes`,
    url,
    status,
  );
}

async function readBody(
  response: Response,
  url: string,
  maxLength: number | undefined,
): Promise<Uint8Array> {
  if (maxLength === undefined || response.body === null) {
    return new Uint8Array(await response.arrayBuffer());
  }

  const declared = Number(response.headers.get("content-length"));
  if (declared > maxLength) {
    await response.body.cancel();
    throw tooLong(url, maxLength, response.status);
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let received = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    if (!(value instanceof Uint8Array)) {
      await reader.cancel();
      throw new RetrievalError(`Unexpected body chunk from ${url}`, url, response.status);
    }
    received += value.byteLength;
    if (received > maxLength) {
      await reader.cancel();
      throw tooLong(url, maxLength, response.status);
    }
    chunks.push(value);
  }

  const body = new Uint8Array(received);
  let offset = 0;
  for (const chunk of chunks) {
    body.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return body;
}

/**
 * GETs `url` and returns the body. A status other than `expected.status`
 * (or any non-2xx when not given), or a body over `expected.maxLength`, is a
 * RetrievalError carrying the url and status.
 */
export async function fetchBytes(
  url: string,
  options: HttpOptions,
  expected: FetchExpectations = {},
): Promise<Uint8Array> {
  const fetchImpl = options.fetch ?? fetch;
  const signal = AbortSignal.timeout(options.timeout);

  let response: Response;
  try {
    response = await fetchImpl(url, { signal });
  } catch (error) {
    if (isTimeout(error)) {
      throw new RetrievalTimeoutError(
        `Timed out after ${options.timeout}ms fetching ${url}`,
        url,
        undefined,
        { cause: error },
      );
    }
    throw new RetrievalError(`Failed to fetch ${url}`, url, undefined, {
      cause: error,
    });
  }

  const accepted =
    expected.status === undefined ? response.ok : response.status === expected.status;
  if (!accepted) {
    throw new RetrievalError(
      `Failed to fetch ${url}: ${response.status} ${response.statusText}`,
      url,
      response.status,
    );
  }

  try {
    return await readBody(response, url, expected.maxLength);
  } catch (error) {
    if (error instanceof RetrievalError) {
      throw error;
    }
    if (isTimeout(error)) {
      throw new RetrievalTimeoutError(
        `Timed out after ${options.timeout}ms reading ${url}`,
        url,
        response.status,
        { cause: error },
      );
    }
    throw new RetrievalError(`Failed to read body of ${url}`, url, response.status, {
      cause: error,
    });
  }
}

export function ensureTrailingSlash(url: string): string {
  return url.endsWith("/") ? url : `${url}/`;
}
