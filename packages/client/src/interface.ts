export type ProblemType = 'PROGRAMMING' | 'QUESTION';

export interface Problem {
    contestId?: number;
    problemsetName?: string;
    index: string;
    name: string;
    type: ProblemType;
    points?: number;
    rating?: number;
    tags: string[];
}

export interface ProblemStatistics {
    contestId?: number;
    index: string;
    solvedCount: number;
}

export interface Problemset {
    problems: Problem[];
    problemStatistics: ProblemStatistics[];
}

export interface User {
    handle: string;
    email?: string;
    firstName?: string;
    lastName?: string;
    country?: string;
    city?: string;
    organization?: string;
    contribution: number;
    rank?: string;
    rating?: number;
    maxRank?: string;
    maxRating?: number;
    lastOnlineTimeSeconds: number;
    registrationTimeSeconds: number;
    friendOfCount: number;
    avatar: string;
    titlePhoto: string;
}

export type ParticipantType = 'CONTESTANT' | 'PRACTICE' | 'VIRTUAL' | 'MANAGER' | 'OUT_OF_COMPETITION';

export interface Member {
    handle: string;
    name?: string;
}

export interface Party {
    contestId?: number;
    members: Member[];
    participantType: ParticipantType;
    teamId?: number;
    teamName?: string;
    ghost: boolean;
    room?: number;
    startTimeSeconds?: number;
}

export interface Submission {
    id: number;
    contestId?: number;
    creationTimeSeconds: number;
    relativeTimeSeconds: number;
    problem: Problem;
    author: Party;
    programmingLanguage: string;
    /** Absent while the submission is waiting in the queue. */
    verdict?: string;
    testset: string;
    passedTestCount: number;
    timeConsumedMillis: number;
    memoryConsumedBytes: number;
    points?: number;
}

export interface RatingChange {
    contestId: number;
    contestName: string;
    handle: string;
    rank: number;
    ratingUpdateTimeSeconds: number;
    oldRating: number;
    newRating: number;
}

export type ContestPhase = 'BEFORE' | 'CODING' | 'PENDING_SYSTEM_TEST' | 'SYSTEM_TEST' | 'FINISHED';

export interface Contest {
    id: number;
    name: string;
    type: 'CF' | 'IOI' | 'ICPC';
    phase: ContestPhase;
    frozen: boolean;
    durationSeconds: number;
    startTimeSeconds?: number;
    relativeTimeSeconds?: number;
    preparedBy?: string;
    websiteUrl?: string;
    description?: string;
    difficulty?: number;
    kind?: string;
}

export interface ProblemResult {
    points: number;
    penalty?: number;
    rejectedAttemptCount: number;
    type: 'PRELIMINARY' | 'FINAL';
    bestSubmissionTimeSeconds?: number;
}

export interface RanklistRow {
    party: Party;
    rank: number;
    points: number;
    penalty: number;
    successfulHackCount: number;
    unsuccessfulHackCount: number;
    problemResults: ProblemResult[];
    lastSubmissionTimeSeconds?: number;
}

export interface ContestStandings {
    contest: Contest;
    problems: Problem[];
    rows: RanklistRow[];
}

export interface ApiEnvelope<T> {
    status: 'OK' | 'FAILED';
    comment?: string;
    result?: T;
}

export interface RequestOptions {
    signal?: AbortSignal;
}

export interface StandingsOptions extends RequestOptions {
    from?: number;
    count?: number;
    handles?: string[];
    showUnofficial?: boolean;
}

export interface ProblemFilter extends RequestOptions {
    minRating?: number;
    maxRating?: number;
    tags?: string[];
    /** Drop problems this handle has already solved. */
    excludeSolvedBy?: string;
}

export interface Sample {
    index: number;
    input: string;
    output: string;
}

export interface ParsedProblem {
    contestId: number;
    index: string;
    name: string;
    timeLimit: string;
    memoryLimit: string;
    statement: string;
    /** Unclassed paragraphs of the statement body. */
    legend: string;
    inputSpec: string;
    outputSpec: string;
    note: string;
    samples: Sample[];
    tags: string[];
    rating?: number;
    url: string;
}

export interface ContestProblemEntry {
    contestId: number;
    index: string;
    name: string;
    url: string;
}

export const VERDICTS = [
    'OK',
    'WRONG_ANSWER',
    'TIME_LIMIT_EXCEEDED',
    'MEMORY_LIMIT_EXCEEDED',
    'RUNTIME_ERROR',
    'COMPILATION_ERROR',
    'PRESENTATION_ERROR',
    'IDLENESS_LIMIT_EXCEEDED',
    'CHALLENGED',
] as const;

export type Verdict = typeof VERDICTS[number];

export type JudgeState =
    | { kind: 'queued' }
    | { kind: 'running' }
    | { kind: 'terminal', verdict: Verdict | string };

export type SubmissionStatus = 'In queue' | 'Running' | 'Accepted' | 'Judged';

export interface SubmissionResult {
    submissionId: number;
    contestId: number;
    problemIndex: string;
    /** Canonical code when recognized, otherwise the judge text as-is. */
    verdict: Verdict | string;
    verdictText: string;
    /** Milliseconds. */
    time: number;
    /** Bytes. */
    memory: number;
    passedTests: number;
    submittedAt: Date;
    status: SubmissionStatus;
}

export interface BypassCookie {
    value: string;
    userAgent: string;
    expiresAt: Date;
}

export interface Credentials {
    handle?: string;
    apiKey?: string;
    apiSecret?: string;
    /** Browser cookie string, e.g. `JSESSIONID=...; 39ce7=...`. */
    cookie?: string;
    bypass?: BypassCookie;
}
