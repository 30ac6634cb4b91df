import { Agent, Dispatcher, request } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';
import { errorCode } from '../core/errors.js';

export interface HttpRequestOptions {
  url: string;
  totalTimeoutMs?: number;
  firstByteTimeoutMs?: number;
  idleSocketTimeoutMs?: number;
  maxBodyBytes?: number;
  dispatcher?: Dispatcher;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  body: Uint8Array;
}

const DEFAULTS = {
  totalTimeoutMs: 10_000,
  connectTimeoutMs: 3_000,
  firstByteTimeoutMs: 5_000,
  idleSocketTimeoutMs: 5_000,
  maxBodyBytes: 2_000_000,
} as const;

// Geo lookups hit one host many times over the scan, so keep connections warm.
const sharedAgent = new Agent({
  connect: {
    timeout: DEFAULTS.connectTimeoutMs,
  },
  bodyTimeout: DEFAULTS.idleSocketTimeoutMs,
  headersTimeout: DEFAULTS.firstByteTimeoutMs,
  keepAliveTimeout: 5000,
  keepAliveMaxTimeout: 10000,
  pipelining: 0,
});

export async function httpGet(opts: HttpRequestOptions): Promise<HttpResponse> {
  const {
    url,
    totalTimeoutMs = DEFAULTS.totalTimeoutMs,
    firstByteTimeoutMs = DEFAULTS.firstByteTimeoutMs,
    idleSocketTimeoutMs = DEFAULTS.idleSocketTimeoutMs,
    maxBodyBytes = DEFAULTS.maxBodyBytes,
    dispatcher = sharedAgent,
  } = opts;

  const abortController = new AbortController();
  const totalTimer = setTimeout(() => abortController.abort(), totalTimeoutMs);

  try {
    const { statusCode, body: respBody } = await request(url, {
      method: 'GET',
      headers: { accept: 'application/json' },
      dispatcher,
      signal: abortController.signal,
      bodyTimeout: idleSocketTimeoutMs,
      headersTimeout: firstByteTimeoutMs,
    });

    // Read the body with size limit
    const chunks: Uint8Array[] = [];
    let received = 0;

    for await (const chunk of respBody) {
      const data = chunk instanceof Uint8Array ? chunk : new TextEncoder().encode(String(chunk));
      received += data.byteLength;

      if (received > maxBodyBytes) {
        respBody.destroy();
        throw new Error(`Body too large (> ${maxBodyBytes} bytes)`);
      }

      chunks.push(data);
    }

    const bodyData = new Uint8Array(received);
    let offset = 0;
    for (const chunk of chunks) {
      bodyData.set(chunk, offset);
      offset += chunk.byteLength;
    }

    return {
      status: statusCode,
      ok: statusCode >= 200 && statusCode < 300,
      body: bodyData,
    };
  } catch (err: unknown) {
    const code = errorCode(err);
    if ((err instanceof Error && err.name === 'AbortError') || code === 'UND_ERR_ABORTED') {
      throw new Error(`Request timeout after ${totalTimeoutMs}ms`, { cause: err });
    }
    if (code === 'UND_ERR_HEADERS_TIMEOUT') {
      throw new Error(`First byte timeout after ${firstByteTimeoutMs}ms`, { cause: err });
    }
    if (code === 'UND_ERR_BODY_TIMEOUT') {
      throw new Error(`Body read timeout after ${idleSocketTimeoutMs}ms`, { cause: err });
    }
    if (code === 'UND_ERR_CONNECT_TIMEOUT') {
      throw new Error(`Connection timeout after ${DEFAULTS.connectTimeoutMs}ms`, { cause: err });
    }
    throw err;
  } finally {
    clearTimeout(totalTimer);
  }
}

/**
 * GET a JSON document and validate it against `schema`. Non-2xx statuses,
 * unparsable bodies and schema mismatches all reject.
 */
export async function httpGetJson<T>(
  url: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  opt?: Omit<HttpRequestOptions, 'url'>
): Promise<T> {
  const response = await httpGet({ url, ...(opt ?? {}) });
  if (!response.ok) {
    throw new Error(`Request failed with status code ${response.status}`);
  }

  const text = new TextDecoder('utf-8').decode(response.body);
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (err) {
    throw new Error(`Response from ${url} is not valid JSON`, { cause: err });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Unexpected response shape from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}
