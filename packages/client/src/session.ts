import { CookieJar } from 'tough-cookie';
import { createLogger, type Logger, Size } from '@cfkit/utils';
import {
    BotChallengeError, BypassCookieExpiredError, CsrfTokenNotFoundError, HandleMismatchError,
    HttpStatusError, NotAuthenticatedError,
} from './error';
import {
    BasicFetcher, type FetcherOptions, type FetchOptions, type HttpResponse, isSuccess, parseDocument,
} from './fetch';
import type { BypassCookie } from './interface';

export const SITE_ENDPOINT = 'https://codeforces.com';
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';
export const BYPASS_COOKIE = 'cf_clearance';
const SESSION_COOKIES = ['JSESSIONID', 'X-User'];

export interface SessionOptions extends Partial<FetcherOptions> {
    handle?: string;
    /** Browser cookie string, e.g. `JSESSIONID=...; 39ce7=...`. */
    cookie?: string;
    bypass?: BypassCookie;
    logger?: Logger;
}

const csrfScriptPatterns = [
    /Codeforces\.getCsrfToken[^"]*"([^"]+)"/,
    /csrf_token\s*=\s*["']([^"']+)["']/,
];

/** Meta tag first, then the hidden form input, then an inline script assignment. */
export function findCsrfToken(document: Document, html: string) {
    const meta = document.querySelector('meta[name="X-Csrf-Token"]')?.getAttribute('content');
    if (meta) return meta;
    const span = document.querySelector('span.csrf-token')?.getAttribute('data-csrf');
    if (span) return span;
    const input = document.querySelector('input[name="csrf_token"]')?.getAttribute('value');
    if (input) return input;
    for (const pattern of csrfScriptPatterns) {
        const match = pattern.exec(html);
        if (match) return match[1];
    }
    return null;
}

export function extractCsrfToken(html: string) {
    const token = findCsrfToken(parseDocument(html), html);
    if (!token) throw new CsrfTokenNotFoundError();
    return token;
}

export function extractHiddenInput(document: Document, name: string) {
    for (const input of document.querySelectorAll('input')) {
        if (input.getAttribute('name') === name) return input.getAttribute('value') || '';
    }
    return '';
}

/** Handle of the account a page was rendered for, if any. */
export function findLoggedInHandle(document: Document, html: string) {
    const script = /var\s+handle\s*=\s*"([^"]+)"/.exec(html);
    if (script) return script[1];
    const link = document.querySelector('.lang-chooser a[href^="/profile/"], #header a[href^="/profile/"]');
    const text = link?.textContent?.trim();
    return text || null;
}

export function isBotChallenge(response: HttpResponse) {
    const mitigated = response.headers['cf-mitigated'];
    if (mitigated === 'challenge' || (Array.isArray(mitigated) && mitigated.includes('challenge'))) return true;
    if (response.status !== 403 && response.status !== 503) return false;
    return /Just a moment\.\.\.|challenge-platform|cf-chl-/.test(response.text);
}

function setCookieHeaders(response: HttpResponse) {
    const raw = response.headers['set-cookie'];
    if (!raw) return [];
    return Array.isArray(raw) ? raw : [raw];
}

/**
 * Cookie jar, handle, CSRF token and bypass cookie for the HTML surface.
 * One owner at a time; nothing here is guarded against concurrent mutation.
 */
export class AuthSession extends BasicFetcher {
    jar = new CookieJar();
    handle: string;
    csrfToken = '';
    bypass: BypassCookie | null = null;

    constructor(options: SessionOptions = {}) {
        super({
            ...options,
            endpoint: options.endpoint || SITE_ENDPOINT,
            userAgent: options.userAgent || DEFAULT_USER_AGENT,
            maxPageSize: options.maxPageSize || 5 * Size.MiB,
            headers: {
                Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'Accept-Language': 'en-US,en;q=0.5',
                ...options.headers,
            },
        }, options.logger || createLogger('client/session'));
        this.handle = options.handle || '';
        if (options.cookie) this.setCookie(options.cookie);
        if (options.bypass) this.setBypassCookie(options.bypass);
    }

    /** Parses a browser-style `k=v; k2=v2` string into the jar. */
    setCookie(raw: string) {
        for (const pair of raw.split(';')) {
            const eq = pair.indexOf('=');
            if (eq <= 0) continue;
            const name = pair.slice(0, eq).trim();
            const value = pair.slice(eq + 1).trim();
            if (!name) continue;
            this.jar.setCookieSync(`${name}=${value}; Path=/`, this.endpoint, { ignoreError: true });
        }
    }

    getCookie(name: string) {
        return this.jar.getCookiesSync(this.endpoint).find((c) => c.key === name)?.value;
    }

    setHandle(handle: string) {
        this.handle = handle;
    }

    setBypassCookie(bypass: BypassCookie) {
        this.bypass = { ...bypass };
        if (bypass.value) this.setCookie(`${BYPASS_COOKIE}=${bypass.value}`);
        else this.jar.setCookieSync(`${BYPASS_COOKIE}=; Path=/; Expires=Thu, 01 Jan 1970 00:00:00 GMT`, this.endpoint, { ignoreError: true });
    }

    /**
     * A bypass cookie only works together with the user agent it was issued
     * to, so a missing user agent makes it invalid as well.
     */
    hasValidBypassCookie(now = new Date()) {
        if (!this.bypass) return false;
        return !!this.bypass.value && !!this.bypass.userAgent
            && this.bypass.expiresAt.getTime() > now.getTime();
    }

    hasCookies() {
        return this.jar.getCookiesSync(this.endpoint).length > 0;
    }

    isAuthenticated() {
        return this.jar.getCookiesSync(this.endpoint).some((c) => SESSION_COOKIES.includes(c.key));
    }

    isReadyForSubmission() {
        return this.isAuthenticated() && !!this.handle;
    }

    userAgent() {
        if (this.bypass?.value && this.bypass.userAgent) return this.bypass.userAgent;
        return this.UA;
    }

    cookieHeader(url: string) {
        return this.jar.getCookieStringSync(url);
    }

    beforeRequest(url: string) {
        if (this.bypass?.value && !this.hasValidBypassCookie()) {
            throw new BypassCookieExpiredError(this.bypass.expiresAt.toISOString());
        }
    }

    afterResponse(url: string, response: HttpResponse, options: FetchOptions) {
        if (isBotChallenge(response)) throw new BotChallengeError(url);
        if (options.persistCookies === false) return;
        for (const cookie of setCookieHeaders(response)) {
            this.jar.setCookieSync(cookie, url, { ignoreError: true });
        }
    }

    async refreshCsrfToken(options: FetchOptions = {}) {
        const { response, html } = await this.html('/', options);
        if (!isSuccess(response.status)) throw new HttpStatusError(response.status, html);
        this.csrfToken = extractCsrfToken(html);
        return this.csrfToken;
    }

    /**
     * Confirms the cookies still belong to a live login of the configured
     * handle. Resolves to the handle shown on the page. Leaves the jar and
     * token untouched.
     */
    async validate(options: Omit<FetchOptions, 'persistCookies'> = {}) {
        if (!this.hasCookies()) throw new NotAuthenticatedError('no cookies set');
        const { document, html, response } = await this.html('/', { ...options, persistCookies: false });
        if (!isSuccess(response.status)) throw new HttpStatusError(response.status, html);
        const found = findLoggedInHandle(document, html);
        if (!found) throw new NotAuthenticatedError('not logged in');
        if (this.handle && found.toLowerCase() !== this.handle.toLowerCase()) {
            throw new HandleMismatchError(this.handle, found);
        }
        return found;
    }
}
