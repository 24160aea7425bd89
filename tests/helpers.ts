import { AxiosError, AxiosHeaders, type InternalAxiosRequestConfig } from 'axios';
import type { HttpRequestOptions, HttpResponse, HttpTransport } from '../src/services/http-transport';
import type { FetchedPage } from '../src/types';

type Route = HttpResponse | Error;
type GetRoute = Route | { headed: Route; headless: Route };

export interface TransportCall {
  method: 'GET' | 'HEAD';
  url: string;
  options: HttpRequestOptions;
}

/**
 * In-memory transport. Unknown GET targets fail like an unresolvable host;
 * unknown HEAD targets answer 404.
 */
export class FakeTransport implements HttpTransport {
  readonly calls: TransportCall[] = [];

  constructor(
    private readonly routes: {
      get?: Record<string, GetRoute>;
      head?: Record<string, Route>;
    } = {}
  ) {}

  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    this.calls.push({ method: 'GET', url, options });

    const route = this.routes.get?.[url];
    if (!route) throw networkError('ENOTFOUND');

    const selected = 'headed' in route ? (options.headers ? route.headed : route.headless) : route;
    if (selected instanceof Error) throw selected;
    return selected;
  }

  async head(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    this.calls.push({ method: 'HEAD', url, options });

    const route = this.routes.head?.[url];
    if (!route) return { url, statusCode: 404, contentType: 'text/html', body: '' };
    if (route instanceof Error) throw route;
    return route;
  }

  urls(method: TransportCall['method']): string[] {
    return this.calls.filter((c) => c.method === method).map((c) => c.url);
  }
}

export function htmlResponse(url: string, html: string): HttpResponse {
  return { url, statusCode: 200, contentType: 'text/html; charset=utf-8', body: html };
}

export function imageResponse(url: string, contentType = 'image/png'): HttpResponse {
  return { url, statusCode: 200, contentType, body: '' };
}

export function fetchedPage(url: string, html: string): FetchedPage {
  return { requestedUrl: url, url, statusCode: 200, contentType: 'text/html', html };
}

export function httpError(status: number): AxiosError {
  const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, undefined, {
    data: '',
    status,
    statusText: '',
    headers: {},
    config,
  });
}

export function networkError(code: string): AxiosError {
  return new AxiosError(`connect failed (${code})`, code);
}
