import { readFileSync } from 'node:fs';
import { CancelledError } from '../src/error';
import type {
    HttpHeaders, HttpRequest, HttpResponse, Transport,
} from '../src/fetch';

export type Responder = Partial<HttpResponse> | Error | ((request: HttpRequest) => Partial<HttpResponse> | Promise<Partial<HttpResponse>>);

interface Route {
    match: string | RegExp;
    responses: Responder[];
}

/**
 * In-process stand-in for the network. Routes match the request path (a
 * string) or the full URL (a RegExp). Queued responses are served in order
 * and the last one repeats.
 */
export class StubTransport {
    requests: HttpRequest[] = [];
    private routes: Route[] = [];

    on(match: string | RegExp, ...responses: Responder[]) {
        this.routes.push({ match, responses });
        return this;
    }

    count(match: string | RegExp) {
        return this.requests.filter((r) => matches(match, r.url)).length;
    }

    transport: Transport = async (request) => {
        if (request.signal?.aborted) throw new CancelledError();
        this.requests.push(request);
        const route = this.routes.find((r) => matches(r.match, request.url));
        if (!route) return { status: 404, headers: {}, text: 'Not Found' };
        const responder = route.responses.length > 1 ? route.responses.shift() : route.responses[0];
        if (!responder) return { status: 404, headers: {}, text: 'Not Found' };
        if (responder instanceof Error) throw responder;
        const partial = typeof responder === 'function' ? await responder(request) : responder;
        const headers: HttpHeaders = partial.headers || {};
        return { status: partial.status ?? 200, headers, text: partial.text ?? '' };
    };
}

function matches(match: string | RegExp, url: string) {
    if (typeof match === 'string') return new URL(url).pathname === match;
    return match.test(url);
}

export function fixture(name: string) {
    return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8');
}

export function envelope(result: unknown) {
    return { status: 200, text: JSON.stringify({ status: 'OK', result }) };
}

export interface ListingRow {
    id: number;
    status: string;
    problem?: string;
    time?: string;
    memory?: string;
}

export function listingPage(contestId: number, rows: ListingRow[]) {
    const body = rows.map((row) => `<tr data-submission-id="${row.id}">`
        + `<td class="id-cell"><a href="/contest/${contestId}/submission/${row.id}">${row.id}</a></td>`
        + '<td class="status-small"><span class="format-time" data-locale="en">Oct/19/2026 14:05</span></td>'
        + `<td class="status-small"><a href="/contest/${contestId}/problem/${row.problem || 'A'}">${row.problem || 'A'}</a></td>`
        + `<td class="status-cell status-small status-verdict-cell">${row.status}</td>`
        + `<td class="time-consumed-cell">${row.time || '0 ms'}</td>`
        + `<td class="memory-consumed-cell">${row.memory || '0 KB'}</td>`
        + '</tr>').join('\n');
    return `<html><body><table class="status-frame-datatable">
<tr class="first-row"><th>#</th><th>When</th><th>Problem</th><th>Verdict</th><th>Time</th><th>Memory</th></tr>
${body}
</table></body></html>`;
}

export function homePage(options: { handle?: string, csrf?: string } = {}) {
    const header = options.handle
        ? `<div class="lang-chooser"><a href="/profile/${options.handle}">${options.handle}</a> | <a href="/0123/logout">Logout</a></div>`
        : '<div class="lang-chooser"><a href="/enter">Enter</a> | <a href="/register">Register</a></div>';
    const meta = options.csrf ? `<meta name="X-Csrf-Token" content="${options.csrf}"/>` : '';
    return `<html><head>${meta}</head><body><div id="header">${header}</div></body></html>`;
}

/** Resolves to the rejection reason of `promise`; fails if it resolves. */
export async function caught(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (e) {
        return e;
    }
    throw new Error('Expected the promise to reject.');
}
