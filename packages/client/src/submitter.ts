/* eslint-disable no-await-in-loop */
import {
    createLogger, isAbortError, type Logger, parseMemoryBytes, parseTimeMS, sleep, Time,
} from '@cfkit/utils';
import {
    CancelledError, ContestOverError, CsrfTokenNotFoundError, DuplicateSubmissionError, type ErrorClass,
    HttpStatusError, NotAuthenticatedError, ParseError, SourceTooLongError, SubmissionNotFoundError,
    SubmitFailedError, SubmitNotAllowedError, VerdictTimeoutError,
} from './error';
import { type HttpResponse, isRedirect, isSuccess } from './fetch';
import type {
    JudgeState, RequestOptions, SubmissionResult, SubmissionStatus,
} from './interface';
import { collapseWhitespace, extractProblemIndex } from './parser';
import { CURRENT_SELECTORS, type SelectorSet, type SubmissionSelectors } from './selectors';
import { type AuthSession, extractHiddenInput, findCsrfToken } from './session';
import {
    classifyStatus, parsePassedTests, statusFor,
} from './verdict';

export interface SubmitterOptions {
    selectors?: SelectorSet;
    /** Delay between verdict polls. */
    pollInterval?: number;
    /** Default deadline for `waitForVerdict`. */
    verdictTimeout?: number;
    logger?: Logger;
}

export interface ContestOptions extends RequestOptions {
    /** Address the gym namespace (`/gym/{id}`) instead of `/contest/{id}`. */
    gym?: boolean;
}

export interface WaitOptions extends ContestOptions {
    timeout?: number;
    interval?: number;
}

const REJECTIONS: [string, ErrorClass][] = [
    ['You have submitted exactly the same code before', DuplicateSubmissionError],
    ['Source code is too long', SourceTooLongError],
    ['You are not allowed to submit', SubmitNotAllowedError],
    ['Contest is over', ContestOverError],
];

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];
const SERVER_UTC_OFFSET = 3;

/** Checksum the submit form expects in `_tta`, computed from the `39ce7` cookie. */
export function tta(_39ce7: string) {
    let _tta = 0;
    for (let c = 0; c < _39ce7.length; c++) {
        _tta = (_tta + (c + 1) * (c + 2) * _39ce7.charCodeAt(c)) % 1009;
        if (c % 3 === 0) _tta++;
        if (c % 2 === 0) _tta *= 2;
        if (c > 0) _tta -= Math.floor(_39ce7.charCodeAt(Math.floor(c / 2)) / 2) * (_tta % 5);
        _tta = ((_tta % 1009) + 1009) % 1009;
    }
    return _tta;
}

/** `"Jan/02/2024 18:35"` in Moscow time. */
export function parseSubmittedAt(text: string) {
    const match = /([A-Za-z]{3})\/(\d{1,2})\/(\d{4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?/.exec(text);
    if (!match) return null;
    const month = MONTHS.indexOf(match[1].toLowerCase());
    if (month < 0) return null;
    return new Date(Date.UTC(+match[3], month, +match[2], +match[4] - SERVER_UTC_OFFSET, +match[5], +(match[6] || 0)));
}

/**
 * Throws the typed failure for a submit POST response and returns quietly
 * when the submission was accepted for judging.
 */
export function classifySubmitResponse(response: HttpResponse, contestId: number, index: string) {
    if (isRedirect(response.status)) {
        if (response.headers.location) return;
        throw new SubmitFailedError(response.status, response.text);
    }
    if (response.status === 200) {
        const rejection = REJECTIONS.find(([phrase]) => response.text.includes(phrase));
        if (rejection) throw new rejection[1](contestId, index);
        return;
    }
    throw new SubmitFailedError(response.status, response.text);
}

function isTerminalStatus(status: SubmissionStatus) {
    return status === 'Accepted' || status === 'Judged';
}

function buildResult(
    submissionId: number, contestId: number, scope: Element, statusText: string,
    state: JudgeState, sel: SubmissionSelectors,
): SubmissionResult {
    const text = (selector: string) => collapseWhitespace(scope.querySelector(selector)?.textContent || '');
    // Result tables without cell classes carry time and memory as plain cells.
    const cells = Array.from(scope.querySelectorAll('td')).map((td) => collapseWhitespace(td.textContent || ''));
    const measure = (selector: string, parse: (str: string) => number) => {
        const value = parse(text(selector));
        if (value) return value;
        for (const cell of cells) {
            const parsed = parse(cell);
            if (parsed) return parsed;
        }
        return 0;
    };
    const href = scope.querySelector(sel.problem)?.getAttribute('href') || '';
    return {
        submissionId,
        contestId,
        problemIndex: extractProblemIndex(href),
        verdict: state.kind === 'terminal' ? state.verdict : '',
        verdictText: statusText,
        time: measure(sel.time, parseTimeMS),
        memory: measure(sel.memory, parseMemoryBytes),
        passedTests: parsePassedTests(statusText),
        submittedAt: parseSubmittedAt(text(sel.submittedAt)) || new Date(),
        status: statusFor(state),
    };
}

/** Reads one row of a "my submissions" listing. */
export function parseSubmissionRow(row: Element, contestId: number, sel: SubmissionSelectors = CURRENT_SELECTORS.submission) {
    const raw = row.getAttribute('data-submission-id') || '';
    if (!/^\d+$/.test(raw)) throw new ParseError(`invalid submission id "${raw}"`);
    const statusText = collapseWhitespace(row.querySelector(sel.status)?.textContent || '');
    return buildResult(+raw, contestId, row, statusText, classifyStatus(statusText), sel);
}

function bannerState(banner: Element, text: string): JudgeState {
    if (banner.classList.contains('verdict-accepted')) return { kind: 'terminal', verdict: 'OK' };
    const state = classifyStatus(text);
    if (banner.classList.contains('verdict-waiting') && state.kind === 'terminal') return { kind: 'running' };
    return state;
}

/**
 * Submits solutions through the HTML form and follows them to a verdict.
 * The submit endpoint does not return the new id, so the newest row of the
 * caller's listing is taken as the submission just made. That holds only
 * while one identity submits one solution at a time.
 */
export class SubmissionEngine {
    selectors: SelectorSet;
    logger: Logger;
    pollInterval: number;
    verdictTimeout: number;

    constructor(public session: AuthSession, options: SubmitterOptions = {}) {
        if (!session.handle) throw new NotAuthenticatedError('handle is not set');
        if (!session.isAuthenticated()) throw new NotAuthenticatedError('no session cookie');
        this.selectors = options.selectors || CURRENT_SELECTORS;
        this.logger = options.logger || createLogger('client/submit');
        this.pollInterval = options.pollInterval ?? 2 * Time.second;
        this.verdictTimeout = options.verdictTimeout ?? 2 * Time.minute;
    }

    private base(contestId: number, gym = false) {
        return `/${gym ? 'gym' : 'contest'}/${contestId}`;
    }

    async submit(contestId: number, index: string, languageId: number | string, source: string, options: ContestOptions = {}) {
        const { signal, gym } = options;
        const formPath = `${this.base(contestId, gym)}/submit`;
        const form = await this.session.html(formPath, { signal });
        if (!isSuccess(form.response.status)) throw new HttpStatusError(form.response.status, form.html);
        const csrf = findCsrfToken(form.document, form.html);
        if (!csrf) throw new CsrfTokenNotFoundError();
        this.session.csrfToken = csrf;
        const body: Record<string, string> = {
            csrf_token: csrf,
            action: 'submitSolutionFormSubmitted',
            submittedProblemIndex: index,
            programTypeId: String(languageId),
            source,
            tabSize: '4',
            sourceFile: '',
            ftaa: extractHiddenInput(form.document, 'ftaa') || this.session.getCookie('70a7c28f3de') || 'n/a',
            bfaa: extractHiddenInput(form.document, 'bfaa') || this.session.getCookie('raa') || this.session.getCookie('bfaa') || 'n/a',
            contestId: String(contestId),
        };
        const cookie = this.session.getCookie('39ce7');
        if (cookie) body._tta = String(tta(cookie));
        this.logger.debug('submit %d%s (language %s)', contestId, index, languageId);
        const response = await this.session.post(`${formPath}?csrf_token=${encodeURIComponent(csrf)}`, body, {
            signal,
            followRedirects: false,
        });
        classifySubmitResponse(response, contestId, index);
        return await this.getLatestSubmission(contestId, { gym, signal });
    }

    async submitToGym(contestId: number, index: string, languageId: number | string, source: string, options: RequestOptions = {}) {
        return await this.submit(contestId, index, languageId, source, { ...options, gym: true });
    }

    private async listing(contestId: number, options: ContestOptions) {
        const { document, html, response } = await this.session.html(`${this.base(contestId, options.gym)}/my`, { signal: options.signal });
        if (!isSuccess(response.status)) throw new HttpStatusError(response.status, html);
        return Array.from(document.querySelectorAll(this.selectors.submission.row));
    }

    async getLatestSubmission(contestId: number, options: ContestOptions = {}) {
        const [row] = await this.listing(contestId, options);
        if (!row) throw new SubmissionNotFoundError('latest', contestId);
        return parseSubmissionRow(row, contestId, this.selectors.submission);
    }

    async findSubmission(submissionId: number, contestId: number, options: ContestOptions = {}) {
        const rows = await this.listing(contestId, options);
        const row = rows.find((r) => r.getAttribute('data-submission-id') === String(submissionId));
        if (!row) throw new SubmissionNotFoundError(submissionId, contestId);
        return parseSubmissionRow(row, contestId, this.selectors.submission);
    }

    /**
     * Polls the listing until the submission leaves the queue and finishes
     * running. Transport failures end the wait at once.
     */
    async waitForVerdict(submissionId: number, contestId: number, options: WaitOptions = {}) {
        const timeout = options.timeout ?? this.verdictTimeout;
        const interval = options.interval ?? this.pollInterval;
        const deadline = Date.now() + timeout;
        const { signal } = options;
        while (true) {
            if (signal?.aborted) throw new CancelledError();
            const result = await this.findSubmission(submissionId, contestId, options);
            this.logger.debug('submission %d: %s', submissionId, result.verdictText || result.status);
            if (isTerminalStatus(result.status)) return result;
            const remaining = deadline - Date.now();
            if (remaining <= 0) throw new VerdictTimeoutError(submissionId, timeout);
            try {
                await sleep(Math.min(interval, remaining), signal);
            } catch (e) {
                if (isAbortError(e)) throw new CancelledError();
                throw e;
            }
        }
    }

    async getSubmission(submissionId: number, contestId: number, options: ContestOptions = {}) {
        const sel = this.selectors.submission;
        const { document, html, response } = await this.session.html(
            `${this.base(contestId, options.gym)}/submission/${submissionId}`,
            { signal: options.signal },
        );
        if (!isSuccess(response.status)) throw new HttpStatusError(response.status, html);
        const banner = document.querySelector(sel.verdict);
        // A page still judging may show the banner without any results table.
        const scope = banner?.closest('table') || document.querySelector(sel.resultTable) || banner;
        if (!scope) throw new SubmissionNotFoundError(submissionId, contestId);
        const statusElement = banner || scope.querySelector(sel.status);
        const statusText = collapseWhitespace(statusElement?.textContent || '');
        const state = banner ? bannerState(banner, statusText) : classifyStatus(statusText);
        return buildResult(submissionId, contestId, scope, statusText, state, sel);
    }
}
