import { JSDOM } from 'jsdom';
import superagent from 'superagent';
import { type Logger, Size, Time } from '@cfkit/utils';
import { CancelledError, ResponseTooLargeError, TransportError } from './error';

export type HttpMethod = 'GET' | 'POST';
export type HttpHeaders = Record<string, string | string[] | undefined>;

export interface HttpRequest {
    method: HttpMethod;
    url: string;
    headers: Record<string, string>;
    form?: Record<string, string>;
    /** Defaults to true. With false a 3xx response is handed back as-is. */
    followRedirects?: boolean;
    maxSize?: number;
    timeout?: number;
    signal?: AbortSignal;
}

export interface HttpResponse {
    status: number;
    headers: HttpHeaders;
    text: string;
}

/**
 * Carries one HTTP exchange. Implementations resolve for every status code
 * and reject only when no response was received.
 */
export type Transport = (request: HttpRequest) => Promise<HttpResponse>;

function normalizeHeaders(raw: Record<string, unknown> = {}): HttpHeaders {
    const headers: HttpHeaders = {};
    for (const [key, value] of Object.entries(raw)) {
        if (typeof value === 'string') headers[key.toLowerCase()] = value;
        else if (Array.isArray(value)) headers[key.toLowerCase()] = value.map(String);
    }
    return headers;
}

export async function superagentTransport(request: HttpRequest): Promise<HttpResponse> {
    const { signal } = request;
    if (signal?.aborted) throw new CancelledError();
    const req = request.method === 'POST'
        ? superagent.post(request.url).type('form').send(request.form || {})
        : superagent.get(request.url);
    req.set(request.headers).ok(() => true).buffer(true);
    if (request.followRedirects === false) req.redirects(0);
    if (request.maxSize) req.maxResponseSize(request.maxSize);
    if (request.timeout) req.timeout(request.timeout);
    let onAbort = () => { };
    // An aborted superagent request never settles, so race it against the signal.
    const aborted = new Promise<never>((_, reject) => {
        onAbort = () => {
            req.abort();
            reject(new CancelledError());
        };
    });
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
        const res = await Promise.race([req, aborted]);
        if (request.maxSize && Buffer.byteLength(res.text || '') > request.maxSize) throw new ResponseTooLargeError(request.maxSize);
        return {
            status: res.status,
            headers: normalizeHeaders(res.headers),
            text: res.text || '',
        };
    } catch (e) {
        if (e instanceof CancelledError || signal?.aborted) throw new CancelledError();
        if (e instanceof ResponseTooLargeError) throw e;
        const message = e instanceof Error ? e.message : String(e);
        if (/maximum response size/i.test(message)) throw new ResponseTooLargeError(request.maxSize);
        throw new TransportError(request.url, message);
    } finally {
        signal?.removeEventListener('abort', onAbort);
    }
}

export interface FetcherOptions {
    endpoint: string;
    transport?: Transport;
    userAgent?: string;
    headers?: Record<string, string>;
    timeout?: number;
    maxPageSize?: number;
}

export interface FetchOptions {
    signal?: AbortSignal;
    followRedirects?: boolean;
    headers?: Record<string, string>;
    /** With false, `Set-Cookie` headers of the response are ignored. */
    persistCookies?: boolean;
}

export interface HtmlPage {
    document: Document;
    html: string;
    response: HttpResponse;
}

export class BasicFetcher {
    transport: Transport;
    UA: string;

    constructor(public options: FetcherOptions, public logger: Logger) {
        this.transport = options.transport || superagentTransport;
        this.UA = options.userAgent || '';
    }

    get endpoint() {
        return this.options.endpoint;
    }

    resolve(url: string) {
        return new URL(url, this.endpoint).toString();
    }

    /** User agent attached to the next request. */
    userAgent() {
        return this.UA;
    }

    cookieHeader(url: string): string {
        return '';
    }

    /** Runs before anything is sent; throwing here cancels the request. */
    beforeRequest(url: string) { }

    afterResponse(url: string, response: HttpResponse, options: FetchOptions) { }

    async request(method: HttpMethod, url: string, form?: Record<string, string>, options: FetchOptions = {}) {
        url = this.resolve(url);
        this.beforeRequest(url);
        this.logger.debug('%s %s', method.toLowerCase(), url);
        const headers: Record<string, string> = {
            'User-Agent': this.userAgent(),
            ...this.options.headers,
            ...options.headers,
        };
        const cookie = this.cookieHeader(url);
        if (cookie) headers.Cookie = cookie;
        const maxSize = this.options.maxPageSize || 5 * Size.MiB;
        const response = await this.transport({
            method,
            url,
            headers,
            form,
            followRedirects: options.followRedirects,
            maxSize,
            timeout: this.options.timeout || 30 * Time.second,
            signal: options.signal,
        });
        if (Buffer.byteLength(response.text) > maxSize) throw new ResponseTooLargeError(maxSize);
        this.afterResponse(url, response, options);
        return response;
    }

    get(url: string, options?: FetchOptions) {
        return this.request('GET', url, undefined, options);
    }

    post(url: string, form: Record<string, string>, options?: FetchOptions) {
        return this.request('POST', url, form, options);
    }

    async html(url: string, options?: FetchOptions): Promise<HtmlPage> {
        const response = await this.get(url, options);
        return { document: parseDocument(response.text), html: response.text, response };
    }
}

export function parseDocument(html: string): Document {
    return new JSDOM(html).window.document;
}

export function isSuccess(status: number) {
    return status >= 200 && status < 300;
}

export function isRedirect(status: number) {
    return status >= 300 && status < 400;
}
