/**
 * HTTP Source
 *
 * Sends one request and renders the response as text: status line,
 * headers, a blank line, then the body. JSON bodies are pretty-printed.
 */

import type { HttpMethod } from '../core/buffer.ts';
import { LoadFailureError } from '../core/errors.ts';
import { debugLog } from '../debug.ts';
import type { LanguageTag } from '../features/syntax/languages.ts';
import type { DescriptorOf, SourceResult, TextSource } from './text-source.ts';

export type FetchLike = (url: string, init: { method: string; headers: Record<string, string> }) => Promise<Response>;

const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'];

function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

export interface HttpRequestSpec {
  method: HttpMethod;
  url: string;
}

/**
 * Parse a `METHOD URL` prompt. A bare URL means GET; a URL without a
 * scheme gets `https://`.
 */
export function parseHttpRequest(input: string): HttpRequestSpec | null {
  const parts = input.trim().split(/\s+/).filter((part) => part.length > 0);
  if (parts.length === 0 || parts.length > 2) return null;

  let method: HttpMethod = 'GET';
  let url = parts[0] ?? '';
  if (parts.length === 2) {
    const candidate = url.toUpperCase();
    if (!isHttpMethod(candidate)) return null;
    method = candidate;
    url = parts[1] ?? '';
  }

  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) {
    url = `https://${url}`;
  }
  return { method, url };
}

/**
 * Language implied by a content type header.
 */
export function languageForContentType(contentType: string): LanguageTag {
  const mime = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  if (mime === 'application/json' || mime.endsWith('+json')) return 'json';
  if (mime === 'text/html') return 'html';
  if (mime === 'application/xml' || mime === 'text/xml' || mime.endsWith('+xml')) return 'xml';
  if (mime === 'text/css') return 'css';
  if (mime === 'text/javascript' || mime === 'application/javascript') return 'javascript';
  if (mime === 'text/markdown') return 'markdown';
  if (mime === 'application/yaml' || mime === 'text/yaml') return 'yaml';
  return 'none';
}

function prettyJson(body: string): string | null {
  try {
    return JSON.stringify(JSON.parse(body), null, 2);
  } catch {
    return null;
  }
}

export interface HttpResponseParts {
  status: number;
  statusText: string;
  headers: ReadonlyArray<[string, string]>;
  body: string;
}

/**
 * Render a response as the lines shown in the buffer.
 */
export function formatHttpResponse(response: HttpResponseParts): SourceResult {
  const contentType =
    response.headers.find(([name]) => name.toLowerCase() === 'content-type')?.[1] ?? '';
  let language = languageForContentType(contentType);
  let body = response.body;

  if (language === 'json') {
    const pretty = prettyJson(body);
    if (pretty !== null) {
      body = pretty;
    } else {
      language = 'none';
    }
  }

  const head = [
    `HTTP ${response.status} ${response.statusText}`.trimEnd(),
    ...response.headers.map(([name, value]) => `${name}: ${value}`),
    '',
  ];
  return { text: `${head.join('\n')}\n${body}`, language };
}

export interface HttpSourceOptions {
  userAgent: string;
  fetch?: FetchLike;
}

export class HttpSource implements TextSource<DescriptorOf<'http'>> {
  private readonly fetchImpl: FetchLike;
  private readonly userAgent: string;

  constructor(options: HttpSourceOptions) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.userAgent = options.userAgent;
  }

  async read(descriptor: DescriptorOf<'http'>): Promise<SourceResult> {
    const { method, url } = descriptor;
    debugLog(`[HttpSource] ${method} ${url}`);

    let response: Response;
    let body: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: { 'user-agent': this.userAgent },
      });
      body = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new LoadFailureError(`${method} ${url}`, reason, { cause: error });
    }

    const headers: Array<[string, string]> = [];
    response.headers.forEach((value, name) => {
      headers.push([name, value]);
    });

    return formatHttpResponse({
      status: response.status,
      statusText: response.statusText,
      headers,
      body,
    });
  }
}
