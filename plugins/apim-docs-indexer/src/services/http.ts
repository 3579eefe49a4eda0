import http from 'http';
import https from 'https';

export type HttpMethod = 'GET' | 'POST' | 'PUT';

export type HttpRequest = {
  url: string | URL;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  rejectUnauthorized?: boolean;
};

export type HttpResponse = {
  status: number;
  body: string;
};

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    readonly url: string,
  ) {
    super(`HTTP ${status} from ${url}: ${body.slice(0, 500)}`);
    this.name = 'HttpError';
  }
}

/** One request, no retries; non-2xx responses reject with {@link HttpError}. */
export function sendRequest(req: HttpRequest): Promise<HttpResponse> {
  const url = typeof req.url === 'string' ? new URL(req.url) : req.url;
  const isHttps = url.protocol === 'https:';

  const headers: Record<string, string> = { ...(req.headers ?? {}) };
  if (req.body !== undefined) headers['content-length'] = Buffer.byteLength(req.body).toString();

  const options: https.RequestOptions = {
    protocol: url.protocol,
    hostname: url.hostname,
    port: url.port,
    path: url.pathname + url.search,
    method: req.method,
    headers,
  };
  if (isHttps && req.rejectUnauthorized === false) {
    options.rejectUnauthorized = false;
  }

  return new Promise<HttpResponse>((resolve, reject) => {
    const onResponse = (res: http.IncomingMessage) => {
      const chunks: Buffer[] = [];
      res.on('data', (d: Buffer | string) => chunks.push(Buffer.isBuffer(d) ? d : Buffer.from(d)));
      res.on('error', reject);
      res.on('end', () => {
        const raw = Buffer.concat(chunks).toString('utf-8');
        const status = res.statusCode ?? 0;
        if (status >= 200 && status < 300) {
          resolve({ status, body: raw });
        } else {
          reject(new HttpError(status, raw, url.toString()));
        }
      });
    };
    const request = isHttps ? https.request(options, onResponse) : http.request(options, onResponse);
    request.on('error', reject);
    if (req.body !== undefined) request.write(req.body);
    request.end();
  });
}

export async function fetchJson(url: string): Promise<unknown> {
  const res = await sendRequest({ url, method: 'GET', headers: { accept: 'application/json' } });
  return JSON.parse(res.body);
}
