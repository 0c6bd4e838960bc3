import type { JudgeState, SubmissionStatus, Verdict } from './interface';

const VERDICT: Record<string, Verdict> = {
    accepted: 'OK',
    'pretests passed': 'OK',
    'perfect result': 'OK',
    'wrong answer': 'WRONG_ANSWER',
    'time limit exceeded': 'TIME_LIMIT_EXCEEDED',
    'memory limit exceeded': 'MEMORY_LIMIT_EXCEEDED',
    'runtime error': 'RUNTIME_ERROR',
    'compilation error': 'COMPILATION_ERROR',
    'presentation error': 'PRESENTATION_ERROR',
    'idleness limit exceeded': 'IDLENESS_LIMIT_EXCEEDED',
    hacked: 'CHALLENGED',
    challenged: 'CHALLENGED',
};

const QUEUED = ['in queue', 'pending', 'waiting'];
const RUNNING = ['running', 'testing', 'compiling', 'judging'];

function normalize(text: string) {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Maps judge text such as `"Wrong answer on test 3"` to its canonical code.
 * Unrecognized text comes back trimmed but otherwise unchanged.
 */
export function normalizeVerdict(text: string): Verdict | string {
    const lower = normalize(text).toLowerCase();
    const key = Object.keys(VERDICT).find((k) => lower.startsWith(k));
    return key ? VERDICT[key] : text.trim();
}

export function classifyStatus(text: string): JudgeState {
    const lower = normalize(text).toLowerCase();
    if (!lower || QUEUED.some((k) => lower.startsWith(k))) return { kind: 'queued' };
    if (RUNNING.some((k) => lower.startsWith(k))) return { kind: 'running' };
    return { kind: 'terminal', verdict: normalizeVerdict(text) };
}

export function isTerminal(state: JudgeState) {
    return state.kind === 'terminal';
}

export function statusFor(state: JudgeState): SubmissionStatus {
    if (state.kind === 'queued') return 'In queue';
    if (state.kind === 'running') return 'Running';
    return state.verdict === 'OK' ? 'Accepted' : 'Judged';
}

/** `"Wrong answer on test 4"` → 3. Accepted runs report no test number. */
export function parsePassedTests(text: string) {
    const match = /on (?:pre)?test (\d+)/i.exec(text);
    return match ? Math.max(0, +match[1] - 1) : 0;
}
