import {
    createLogger, type Logger, Size, Time,
} from '@cfkit/utils';
import { cacheKey, DEFAULT_TTL, ResponseCache } from './cache';
import {
    ApiError, ContestNotFoundError, DecodeError, HttpStatusError, ProblemNotFoundError,
    ResponseTooLargeError, UnauthorizedApiCallError,
} from './error';
import { isSuccess, superagentTransport, type Transport } from './fetch';
import type {
    ApiEnvelope, Contest, ContestStandings, Problem, ProblemFilter, Problemset,
    RatingChange, RequestOptions, StandingsOptions, Submission, User,
} from './interface';
import { RateLimiter } from './limiter';
import { signRequest } from './sign';

export const API_ENDPOINT = 'https://codeforces.com/api';
export const MAX_RESPONSE_SIZE = 10 * Size.MiB;

export interface ApiClientOptions {
    endpoint?: string;
    transport?: Transport;
    apiKey?: string;
    apiSecret?: string;
    /** Requests per second. */
    rate?: number;
    cacheTTL?: number;
    maxResponseSize?: number;
    timeout?: number;
    userAgent?: string;
    logger?: Logger;
}

interface CachedResults {
    'problemset.problems': Problemset;
    'user.info': User[];
    'user.status': Submission[];
    'user.rating': RatingChange[];
    'user.friends': string[];
    'contest.list': Contest[];
    'contest.standings': ContestStandings;
    'contest.ratingChanges': RatingChange[];
}

type ApiMethod = keyof CachedResults;
type Caches = { [M in ApiMethod]: ResponseCache<CachedResults[M]> };

interface CallOptions extends RequestOptions {
    auth?: boolean;
    cache?: boolean;
}

export function problemId(problem: Pick<Problem, 'contestId' | 'index'>) {
    return `${problem.contestId ?? ''}${problem.index}`;
}

/** Problems without a rating always pass. Bounds of 0 or less are ignored. */
export function filterByRating(problems: Problem[], minRating = 0, maxRating = 0) {
    return problems.filter((p) => {
        if (!p.rating) return true;
        if (minRating > 0 && p.rating < minRating) return false;
        if (maxRating > 0 && p.rating > maxRating) return false;
        return true;
    });
}

/** Keeps problems carrying every one of `tags`. */
export function filterByTags(problems: Problem[], tags: string[] = []) {
    if (!tags.length) return problems;
    return problems.filter((p) => tags.every((tag) => p.tags.includes(tag)));
}

export function excludeSolved(problems: Problem[], solved: Iterable<Pick<Problem, 'contestId' | 'index'>>) {
    const ids = new Set<string>();
    for (const p of solved) ids.add(problemId(p));
    return problems.filter((p) => !ids.has(problemId(p)));
}

export function isAccepted(submission: Submission) {
    return submission.verdict === 'OK';
}

export class ApiClient {
    readonly endpoint: string;
    readonly limiter: RateLimiter;
    private transport: Transport;
    private caches: Caches;
    private logger: Logger;

    constructor(private options: ApiClientOptions = {}) {
        this.endpoint = (options.endpoint || API_ENDPOINT).replace(/\/$/, '');
        this.transport = options.transport || superagentTransport;
        this.limiter = new RateLimiter({ rate: options.rate ?? 5 });
        this.logger = options.logger || createLogger('client/api');
        const ttl = options.cacheTTL ?? DEFAULT_TTL;
        this.caches = {
            'problemset.problems': new ResponseCache({ ttl }),
            'user.info': new ResponseCache({ ttl }),
            'user.status': new ResponseCache({ ttl }),
            'user.rating': new ResponseCache({ ttl }),
            'user.friends': new ResponseCache({ ttl }),
            'contest.list': new ResponseCache({ ttl }),
            'contest.standings': new ResponseCache({ ttl }),
            'contest.ratingChanges': new ResponseCache({ ttl }),
        };
    }

    hasCredentials() {
        return !!(this.options.apiKey && this.options.apiSecret);
    }

    clearCache() {
        for (const cache of Object.values(this.caches)) cache.clear();
    }

    /** Entries currently held across all method caches. */
    get cacheSize() {
        let size = 0;
        for (const cache of Object.values(this.caches)) size += cache.size;
        return size;
    }

    async call<M extends ApiMethod>(method: M, params: Record<string, string> = {}, options: CallOptions = {}): Promise<CachedResults[M]> {
        const cache: ResponseCache<CachedResults[M]> = this.caches[method];
        const key = cacheKey(method, params);
        if (options.cache !== false) {
            const cached = cache.get(key);
            if (cached !== undefined) return cached;
        }
        await this.limiter.acquire(options.signal);
        let query = params;
        if (options.auth && this.options.apiKey && this.options.apiSecret) {
            query = signRequest(method, params, { key: this.options.apiKey, secret: this.options.apiSecret });
        }
        const search = new URLSearchParams(query).toString();
        const url = `${this.endpoint}/${method}${search ? `?${search}` : ''}`;
        this.logger.debug('get %s', method);
        const maxSize = this.options.maxResponseSize || MAX_RESPONSE_SIZE;
        const response = await this.transport({
            method: 'GET',
            url,
            headers: { 'User-Agent': this.options.userAgent || 'cfkit/1.0' },
            maxSize,
            timeout: this.options.timeout || 30 * Time.second,
            signal: options.signal,
        });
        if (Buffer.byteLength(response.text) > maxSize) throw new ResponseTooLargeError(maxSize);
        if (!isSuccess(response.status)) throw new HttpStatusError(response.status, response.text);
        const result = decodeEnvelope<CachedResults[M]>(method, response.text);
        if (options.cache !== false) cache.set(key, result);
        return result;
    }

    async getProblems(tags: string[] = [], options: RequestOptions = {}) {
        const params: Record<string, string> = {};
        if (tags.length) params.tags = tags.join(';');
        return await this.call('problemset.problems', params, options);
    }

    async getProblem(contestId: number, index: string, options: RequestOptions = {}) {
        const { problems } = await this.getProblems([], options);
        const problem = problems.find((p) => p.contestId === contestId && p.index === index);
        if (!problem) throw new ProblemNotFoundError(contestId, index);
        return problem;
    }

    async filterProblems(filter: ProblemFilter = {}) {
        const { problems } = await this.getProblems(filter.tags, filter);
        let result = filterByRating(problems, filter.minRating, filter.maxRating);
        if (filter.excludeSolvedBy) {
            const solved = await this.getSolvedProblems(filter.excludeSolvedBy, filter);
            result = excludeSolved(result, solved);
        }
        return result;
    }

    async getUserInfo(handles: string[], options: RequestOptions = {}) {
        if (!handles.length) throw new RangeError('No handles provided.');
        return await this.call('user.info', { handles: handles.join(';') }, options);
    }

    async getUserSubmissions(handle: string, from = 1, count = 0, options: RequestOptions = {}) {
        const params: Record<string, string> = { handle };
        if (from > 0) params.from = String(from);
        if (count > 0) params.count = String(count);
        return await this.call('user.status', params, options);
    }

    async getUserRating(handle: string, options: RequestOptions = {}) {
        return await this.call('user.rating', { handle }, options);
    }

    /** Distinct accepted problems of `handle`, most recent first. */
    async getSolvedProblems(handle: string, options: RequestOptions = {}) {
        const submissions = await this.getUserSubmissions(handle, 1, 10000, options);
        const seen = new Set<string>();
        const solved: Problem[] = [];
        for (const submission of submissions) {
            if (!isAccepted(submission)) continue;
            const id = problemId(submission.problem);
            if (seen.has(id)) continue;
            seen.add(id);
            solved.push(submission.problem);
        }
        return solved;
    }

    async getContests(gym = false, options: RequestOptions = {}) {
        return await this.call('contest.list', { gym: String(gym) }, options);
    }

    async getContest(contestId: number, options: RequestOptions = {}) {
        const contests = await this.getContests(contestId >= 100000, options);
        const contest = contests.find((c) => c.id === contestId);
        if (!contest) throw new ContestNotFoundError(contestId);
        return contest;
    }

    async getContestStandings(contestId: number, options: StandingsOptions = {}) {
        const params: Record<string, string> = { contestId: String(contestId) };
        if (options.from && options.from > 0) params.from = String(options.from);
        if (options.count && options.count > 0) params.count = String(options.count);
        if (options.handles?.length) params.handles = options.handles.join(';');
        params.showUnofficial = String(!!options.showUnofficial);
        return await this.call('contest.standings', params, { signal: options.signal });
    }

    async getRatingChanges(contestId: number, options: RequestOptions = {}) {
        return await this.call('contest.ratingChanges', { contestId: String(contestId) }, options);
    }

    async getUserFriends(onlyOnline = false, options: RequestOptions = {}) {
        if (!this.hasCredentials()) throw new UnauthorizedApiCallError('user.friends');
        return await this.call('user.friends', { onlyOnline: String(onlyOnline) }, { ...options, auth: true });
    }

    /** Uncached reachability probe. */
    async ping(options: RequestOptions = {}) {
        await this.call('contest.list', { gym: 'false' }, { ...options, cache: false });
    }
}

export function decodeEnvelope<T>(method: string, text: string): T {
    let envelope: ApiEnvelope<T>;
    try {
        envelope = JSON.parse(text);
    } catch (e) {
        throw new DecodeError(e instanceof Error ? e.message : String(e));
    }
    if (!envelope || typeof envelope !== 'object') throw new DecodeError('envelope is not an object');
    if (envelope.status === 'FAILED') throw new ApiError(method, envelope.comment || '');
    if (envelope.status !== 'OK') throw new DecodeError(`unexpected status ${String(envelope.status)}`);
    if (envelope.result === undefined) throw new DecodeError('missing result');
    return envelope.result;
}
