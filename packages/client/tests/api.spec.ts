import { expect } from 'chai';
import { describe, it } from 'node:test';
import { sleep } from '@cfkit/utils';
import {
    ApiClient, excludeSolved, filterByRating, filterByTags, problemId,
} from '../src/api';
import {
    ApiError, CancelledError, ContestNotFoundError, DecodeError, HttpStatusError, ProblemNotFoundError,
    ResponseTooLargeError, TransportError, UnauthorizedApiCallError,
} from '../src/error';
import type { Problem, Submission } from '../src/interface';
import { caught, envelope, StubTransport } from './helpers';

function problem(contestId: number, index: string, rating?: number, tags: string[] = []): Problem {
    return {
        contestId, index, name: `${contestId}${index}`, type: 'PROGRAMMING', rating, tags,
    };
}

function submission(id: number, p: Problem, verdict?: string): Submission {
    return {
        id,
        contestId: p.contestId,
        creationTimeSeconds: 1700000000 + id,
        relativeTimeSeconds: 0,
        problem: p,
        author: { members: [{ handle: 'test-user' }], participantType: 'PRACTICE', ghost: false },
        programmingLanguage: 'GNU C++17',
        verdict,
        testset: 'TESTS',
        passedTestCount: 1,
        timeConsumedMillis: 15,
        memoryConsumedBytes: 1024,
    };
}

const problems = [
    problem(1, 'A', 800, ['math']),
    problem(2, 'B', 1500, ['dp', 'greedy']),
    problem(3, 'C', undefined, ['dp']),
    problem(4, 'D', 2400, ['dp', 'graphs']),
];

function setup(options: { apiKey?: string, apiSecret?: string, cacheTTL?: number, maxResponseSize?: number } = {}) {
    const stub = new StubTransport();
    const client = new ApiClient({ transport: stub.transport, rate: 1000, ...options });
    return { stub, client };
}

describe('ApiClient', () => {
    it('serves a repeated call from the cache', async () => {
        const { stub, client } = setup();
        stub.on('/api/problemset.problems', envelope({ problems, problemStatistics: [] }));
        const first = await client.getProblems();
        const second = await client.getProblems();
        expect(second).to.deep.equal(first);
        expect(stub.count('/api/problemset.problems')).to.equal(1);
        expect(client.cacheSize).to.equal(1);
    });

    it('refetches after the ttl passes', async () => {
        const { stub, client } = setup({ cacheTTL: 30 });
        stub.on('/api/user.rating', envelope([]));
        await client.getUserRating('test-user');
        await sleep(60);
        await client.getUserRating('test-user');
        expect(stub.count('/api/user.rating')).to.equal(2);
    });

    it('refetches after clearCache', async () => {
        const { stub, client } = setup();
        stub.on('/api/user.rating', envelope([]));
        await client.getUserRating('test-user');
        client.clearCache();
        expect(client.cacheSize).to.equal(0);
        await client.getUserRating('test-user');
        expect(stub.count('/api/user.rating')).to.equal(2);
    });

    it('keeps caches of separate clients apart', async () => {
        const stub = new StubTransport().on('/api/user.rating', envelope([]));
        const a = new ApiClient({ transport: stub.transport, rate: 1000 });
        const b = new ApiClient({ transport: stub.transport, rate: 1000 });
        await a.getUserRating('test-user');
        await b.getUserRating('test-user');
        expect(stub.count('/api/user.rating')).to.equal(2);
    });

    it('joins tags with semicolons', async () => {
        const { stub, client } = setup();
        stub.on('/api/problemset.problems', envelope({ problems: [], problemStatistics: [] }));
        await client.getProblems(['dp', 'greedy']);
        expect(stub.requests[0].url).to.equal('https://codeforces.com/api/problemset.problems?tags=dp%3Bgreedy');
    });

    it('reports a non-2xx status with its body', async () => {
        const { stub, client } = setup();
        stub.on('/api/user.info', { status: 503, text: 'maintenance' });
        const err = await caught(client.getUserInfo(['test-user']));
        expect(err).to.be.instanceOf(HttpStatusError);
        if (!(err instanceof HttpStatusError)) return;
        expect(err.status).to.equal(503);
        expect(err.body).to.equal('maintenance');
    });

    it('reports a FAILED envelope as ApiError', async () => {
        const { stub, client } = setup();
        stub.on('/api/user.info', { status: 200, text: JSON.stringify({ status: 'FAILED', comment: 'handles: User with handle nobody not found' }) });
        const err = await caught(client.getUserInfo(['nobody']));
        expect(err).to.be.instanceOf(ApiError);
        if (!(err instanceof ApiError)) return;
        expect(err.method).to.equal('user.info');
        expect(err.comment).to.equal('handles: User with handle nobody not found');
    });

    it('reports malformed JSON as DecodeError', async () => {
        const { stub, client } = setup();
        stub.on('/api/user.info', { status: 200, text: '<html>' });
        expect(await caught(client.getUserInfo(['test-user']))).to.be.instanceOf(DecodeError);
    });

    it('refuses bodies over the size limit', async () => {
        const { stub, client } = setup({ maxResponseSize: 16 });
        stub.on('/api/user.info', envelope([{ handle: 'a-rather-long-handle' }]));
        const err = await caught(client.getUserInfo(['test-user']));
        expect(err).to.be.instanceOf(ResponseTooLargeError);
        expect(err).to.be.instanceOf(DecodeError);
    });

    it('passes transport failures through', async () => {
        const { stub, client } = setup();
        const failure = new TransportError('https://codeforces.com/api/user.info', 'ECONNRESET');
        stub.on('/api/user.info', failure);
        expect(await caught(client.getUserInfo(['test-user']))).to.equal(failure);
    });

    it('does not cache failures', async () => {
        const { stub, client } = setup();
        stub.on('/api/user.rating', { status: 500, text: '' }, envelope([]));
        await caught(client.getUserRating('test-user'));
        expect(await client.getUserRating('test-user')).to.deep.equal([]);
        expect(stub.count('/api/user.rating')).to.equal(2);
    });

    it('sends nothing once the signal is aborted', async () => {
        const { stub, client } = setup();
        stub.on('/api/user.rating', envelope([]));
        const err = await caught(client.getUserRating('test-user', { signal: AbortSignal.abort() }));
        expect(err).to.be.instanceOf(CancelledError);
        expect(stub.requests).to.have.length(0);
    });

    it('cancels a call waiting for the rate limiter', async () => {
        const stub = new StubTransport().on('/api/user.rating', envelope([]));
        const client = new ApiClient({ transport: stub.transport, rate: 1 });
        await client.getUserRating('first-user');
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 20);
        const err = await caught(client.getUserRating('second-user', { signal: controller.signal }));
        expect(err).to.be.instanceOf(CancelledError);
        expect(stub.count('/api/user.rating')).to.equal(1);
    });

    it('refuses an empty handle list', async () => {
        const { client } = setup();
        expect(await caught(client.getUserInfo([]))).to.be.instanceOf(RangeError);
    });

    it('finds a single problem', async () => {
        const { stub, client } = setup();
        stub.on('/api/problemset.problems', envelope({ problems, problemStatistics: [] }));
        expect((await client.getProblem(2, 'B')).rating).to.equal(1500);
        expect(await caught(client.getProblem(2, 'Z'))).to.be.instanceOf(ProblemNotFoundError);
    });

    it('filters by rating and drops solved problems', async () => {
        const { stub, client } = setup();
        stub.on('/api/problemset.problems', envelope({ problems, problemStatistics: [] }));
        stub.on('/api/user.status', envelope([submission(1, problems[1], 'OK')]));
        const result = await client.filterProblems({ minRating: 1000, maxRating: 2000, excludeSolvedBy: 'test-user' });
        expect(result.map(problemId)).to.deep.equal(['3C']);
    });

    it('collects distinct accepted problems', async () => {
        const { stub, client } = setup();
        stub.on('/api/user.status', envelope([
            submission(5, problems[0], 'OK'),
            submission(4, problems[1], 'WRONG_ANSWER'),
            submission(3, problems[0], 'OK'),
            submission(2, problems[3]),
            submission(1, problems[2], 'OK'),
        ]));
        const solved = await client.getSolvedProblems('test-user');
        expect(solved.map(problemId)).to.deep.equal(['1A', '3C']);
        expect(stub.requests[0].url).to.equal('https://codeforces.com/api/user.status?handle=test-user&from=1&count=10000');
    });

    it('looks gyms up in the gym list', async () => {
        const { stub, client } = setup();
        stub.on(/contest\.list\?gym=true/, envelope([{ id: 100001, name: 'Training', type: 'ICPC', phase: 'FINISHED', frozen: false, durationSeconds: 18000 }]));
        stub.on(/contest\.list\?gym=false/, envelope([]));
        expect((await client.getContest(100001)).name).to.equal('Training');
        expect(await caught(client.getContest(1999))).to.be.instanceOf(ContestNotFoundError);
    });

    it('builds standings parameters', async () => {
        const { stub, client } = setup();
        stub.on('/api/contest.standings', envelope({ contest: {}, problems: [], rows: [] }));
        await client.getContestStandings(1999, { from: 1, count: 5, handles: ['a', 'b'] });
        expect(stub.requests[0].url).to.equal('https://codeforces.com/api/contest.standings?contestId=1999&from=1&count=5&handles=a%3Bb&showUnofficial=false');
    });

    it('pings without the cache', async () => {
        const { stub, client } = setup();
        stub.on('/api/contest.list', envelope([]));
        await client.ping();
        await client.ping();
        expect(stub.count('/api/contest.list')).to.equal(2);
        expect(client.cacheSize).to.equal(0);
    });

    it('signs calls that need credentials', async () => {
        const { stub, client } = setup({ apiKey: 'test-key', apiSecret: 'test-secret' });
        stub.on('/api/user.friends', envelope(['friend-one']));
        expect(await client.getUserFriends()).to.deep.equal(['friend-one']);
        const url = new URL(stub.requests[0].url);
        expect(url.searchParams.get('onlyOnline')).to.equal('false');
        expect(url.searchParams.get('apiKey')).to.equal('test-key');
        expect(url.searchParams.get('time')).to.match(/^\d+$/);
        expect(url.searchParams.get('apiSig')).to.match(/^\d{6}[0-9a-f]{128}$/);
    });

    it('refuses signed calls without credentials', async () => {
        const { stub, client } = setup();
        expect(client.hasCredentials()).to.equal(false);
        expect(await caught(client.getUserFriends())).to.be.instanceOf(UnauthorizedApiCallError);
        expect(stub.requests).to.have.length(0);
    });
});

describe('problem filters', () => {
    it('lets unrated problems through the rating filter', () => {
        expect(filterByRating(problems, 1000, 2000).map(problemId)).to.deep.equal(['2B', '3C']);
    });

    it('ignores bounds of zero', () => {
        expect(filterByRating(problems, 0, 0)).to.have.length(4);
        expect(filterByRating(problems, 1600).map(problemId)).to.deep.equal(['3C', '4D']);
    });

    it('requires every tag', () => {
        expect(filterByTags(problems, ['dp']).map(problemId)).to.deep.equal(['2B', '3C', '4D']);
        expect(filterByTags(problems, ['dp', 'graphs']).map(problemId)).to.deep.equal(['4D']);
        expect(filterByTags(problems)).to.have.length(4);
    });

    it('excludes solved problems by id', () => {
        expect(excludeSolved(problems, [{ contestId: 1, index: 'A' }, { contestId: 4, index: 'D' }]).map(problemId))
            .to.deep.equal(['2B', '3C']);
    });
});
