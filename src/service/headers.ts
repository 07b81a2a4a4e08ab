import type { FetchFn, HeaderSource, HttpService, Layer, Logger } from '../types.ts';
import { authLayer } from './auth-service.ts';

export const REQUEST_PARAMS_HEADER = 'x-goog-request-params';
export const USER_PROJECT_HEADER = 'x-goog-user-project';

/** Value for a request, or undefined to leave the header off */
export type HeaderValue = string | ((url: URL) => string | undefined);

function withHeader(request: Request, name: string, value: string | undefined): Request {
  if (value === undefined || request.headers.has(name)) return request;
  const next = new Request(request);
  next.headers.set(name, value);
  return next;
}

function resolve(value: HeaderValue, request: Request): string | undefined {
  return typeof value === 'string' ? value : value(new URL(request.url));
}

/** Set fixed headers on every request, unless the request already has them */
export function attachHeaders(headers: Record<string, string>): Layer {
  const entries = Object.entries(headers);
  return (inner) => (request) => inner(entries.reduce((current, [name, value]) => withHeader(current, name, value), request));
}

/**
 * `x-goog-request-params` routing header, e.g. `name=projects/p/topics/t`.
 * A function value is called with each request's URL.
 */
export function googRequestParams(value: HeaderValue): Layer {
  return (inner) => (request) => inner(withHeader(request, REQUEST_PARAMS_HEADER, resolve(value, request)));
}

/** Bill requests to `projectId` (`x-goog-user-project`) */
export function userProject(projectId: string): Layer {
  return (inner) => (request) => inner(withHeader(request, USER_PROJECT_HEADER, projectId));
}

export function userAgent(value: string): Layer {
  return (inner) => (request) => inner(withHeader(request, 'user-agent', value));
}

/** First layer is the outermost */
export function composeLayers(...layers: Layer[]): Layer {
  return (inner) => layers.reduceRight<HttpService>((service, layer) => layer(service), inner);
}

export interface AuthServiceStackOptions {
  headers?: Record<string, string>;
  requestParams?: HeaderValue;
  userProject?: string;
  userAgent?: string;
  logger?: Logger;
}

/**
 * Stack, outermost first: user agent, fixed headers, request params,
 * user project, authentication, `inner`.
 */
export function buildAuthService(auth: HeaderSource, inner: HttpService, options: AuthServiceStackOptions = {}): HttpService {
  const layers: Layer[] = [];
  if (options.userAgent) layers.push(userAgent(options.userAgent));
  if (options.headers) layers.push(attachHeaders(options.headers));
  if (options.requestParams) layers.push(googRequestParams(options.requestParams));
  if (options.userProject) layers.push(userProject(options.userProject));
  layers.push(authLayer(auth, { logger: options.logger }));
  return composeLayers(...layers)(inner);
}

export interface AuthorizedFetchOptions extends AuthServiceStackOptions {
  /** Transport under the stack; defaults to global fetch */
  fetch?: FetchFn;
}

/** fetch-compatible function whose requests go through {@link buildAuthService} */
export function authorizedFetch(auth: HeaderSource, options: AuthorizedFetchOptions = {}): FetchFn {
  const transport = options.fetch ?? fetch;
  const service = buildAuthService(auth, (request) => transport(request), options);
  return (input, init) => service(new Request(input, init));
}
