import axios, { type AxiosInstance, type AxiosResponse } from 'axios';

export interface HttpRequestOptions {
  headers?: Readonly<Record<string, string>>;
  timeoutMs: number;
}

export interface HttpResponse {
  url: string;
  statusCode: number;
  contentType?: string;
  body: string;
}

/**
 * Network boundary of the crawler.
 * `get` follows redirects and rejects unless it obtains a usable (2xx)
 * response; `head` does not follow redirects and resolves for any status.
 */
export interface HttpTransport {
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
  head(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}

export class AxiosTransport implements HttpTransport {
  private client: AxiosInstance;

  constructor(client?: AxiosInstance) {
    this.client = client || axios.create({ maxRedirects: 10 });
  }

  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const response = await this.client.get<string>(url, {
      headers: { ...options.headers },
      timeout: options.timeoutMs,
      responseType: 'text',
    });

    return this.toHttpResponse(response, url);
  }

  async head(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const response = await this.client.head<string>(url, {
      headers: { ...options.headers },
      timeout: options.timeoutMs,
      // A redirect is an answer of its own, never followed
      maxRedirects: 0,
      validateStatus: () => true,
    });

    return this.toHttpResponse(response, url);
  }

  private toHttpResponse(response: AxiosResponse<string>, requestedUrl: string): HttpResponse {
    const contentType: unknown = response.headers['content-type'];

    return {
      url: resolveFinalUrl(response, requestedUrl),
      statusCode: response.status,
      contentType: typeof contentType === 'string' ? contentType : undefined,
      body: typeof response.data === 'string' ? response.data : '',
    };
  }
}

/**
 * Final URL after redirects, as recorded by follow-redirects on the
 * underlying response. Falls back to the requested URL.
 */
export function resolveFinalUrl(response: AxiosResponse, fallback: string): string {
  const request: unknown = response.request;
  if (typeof request === 'object' && request !== null && 'res' in request) {
    const res: unknown = request.res;
    if (typeof res === 'object' && res !== null && 'responseUrl' in res && typeof res.responseUrl === 'string') {
      return res.responseUrl;
    }
  }
  return fallback;
}

/**
 * Failure reason for a single attempt: the HTTP status when the server
 * answered, otherwise the transport error kind.
 */
export function describeFailure(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) return String(error.response.status);
    return `Error ${error.code || error.name}`;
  }
  if (error instanceof Error) return `Error ${error.name}`;
  return 'Error Unknown';
}
