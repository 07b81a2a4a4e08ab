import type { ZodType, ZodTypeDef } from 'zod';
import { TokenResponseSchema } from '../schemas/index.ts';
import type { FetchFn } from '../types.ts';
import { AuthError, errorCode } from './errors.ts';
import { Token } from './token.ts';

export interface JsonRequest {
  fetch: FetchFn;
  url: string;
  init: RequestInit;
  /** Provider name used to prefix errors */
  provider: string;
}

/**
 * Send a request and parse its JSON body with `schema`.
 *
 * - fetch rejections become `Transport` errors carrying the socket error code
 * - non-2xx statuses become `TokenEndpoint` errors (see {@link AuthError.fromResponse})
 * - bodies that are not JSON or do not match `schema` become `BadResponse`
 */
export async function requestJson<T>(request: JsonRequest, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  const { url, init, provider } = request;

  let response: Response;
  try {
    response = await request.fetch(url, init);
  } catch (error) {
    const code = errorCode(error);
    const detail = error instanceof Error ? error.message : String(error);
    throw new AuthError('Transport', `Request to ${url} failed: ${detail}${code ? ` (${code})` : ''}`, { provider, uri: url, code, cause: error });
  }

  const text = await readBody(response, url, provider);
  if (!response.ok) throw AuthError.fromResponse(url, response.status, text, provider);

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new AuthError('BadResponse', `${url} returned a body that is not JSON`, { provider, uri: url, status: response.status, cause: error });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new AuthError('BadResponse', `${url} returned an unexpected payload: ${issues}`, { provider, uri: url, status: response.status, cause: parsed.error });
  }
  return parsed.data;
}

/** Response body as text; a failed read is a `Transport` error */
export async function readBody(response: Response, url: string, provider: string): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new AuthError('Transport', `Reading response from ${url} failed`, { provider, uri: url, code: errorCode(error), cause: error });
  }
}

/** Request an OAuth-style `{ access_token, expires_in }` payload and turn it into a {@link Token} */
export async function requestToken(request: JsonRequest, now: () => number): Promise<Token> {
  const body = await requestJson(request, TokenResponseSchema);
  return Token.fromResponse(body, now());
}

/** `application/x-www-form-urlencoded` POST init */
export function formPost(params: Record<string, string>, signal?: AbortSignal): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams(params).toString(),
    signal,
  };
}
