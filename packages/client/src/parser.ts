import { createLogger, type Logger } from '@cfkit/utils';
import { HttpStatusError, StructureError } from './error';
import { type FetchOptions, isSuccess, parseDocument } from './fetch';
import type {
    ContestProblemEntry, ParsedProblem, RequestOptions, Sample,
} from './interface';
import { CURRENT_SELECTORS, type ProblemSelectors, type SelectorSet } from './selectors';
import type { AuthSession } from './session';

export const REFERENCE_PROBLEM = '/problemset/problem/1/A';

const TITLE_PREFIX_RE = /^[A-Z]\d*\.\s*/;
const PROBLEM_INDEX_RE = /\/problem\/([A-Z]\d*)$/;
const RATING_RE = /\*(\d+)/;

function isElement(node: Node): node is Element {
    return node.nodeType === 1;
}

const BLOCK_TAGS = new Set([
    'P', 'DIV', 'UL', 'OL', 'LI', 'PRE', 'TABLE', 'TR', 'TD', 'TH', 'CENTER', 'BR',
    'H1', 'H2', 'H3', 'H4', 'H5', 'H6', 'BLOCKQUOTE',
]);

/** Like `textContent`, but block elements are padded with spaces so paragraphs stay apart. */
function spacedText(node: Node): string {
    if (!isElement(node)) return node.nodeType === 3 ? node.textContent || '' : '';
    const inner = Array.from(node.childNodes).map(spacedText).join('');
    return BLOCK_TAGS.has(node.tagName) ? ` ${inner} ` : inner;
}

export function collapseWhitespace(text: string) {
    return text.replace(/\s+/g, ' ').trim();
}

export function cleanTitle(title: string) {
    return title.trim().replace(TITLE_PREFIX_RE, '').trim();
}

export function extractLimit(text: string, prefix: string) {
    const trimmed = text.trim();
    return (trimmed.startsWith(prefix) ? trimmed.slice(prefix.length) : trimmed).trim();
}

export function parseRating(text: string) {
    const match = RATING_RE.exec(text);
    return match ? +match[1] : undefined;
}

export function extractProblemIndex(href: string) {
    return PROBLEM_INDEX_RE.exec(href)?.[1] || '';
}

/**
 * Text of a sample `<pre>`. Line breaks may come as `<br>` tags or as one
 * `.test-example-line` block per line. Trailing spaces and tabs are cut from
 * every line; indentation is kept.
 */
export function extractPreText(pre: Element) {
    const lineBlocks = pre.querySelectorAll('.test-example-line');
    let text: string;
    if (lineBlocks.length) {
        text = Array.from(lineBlocks).map((line) => line.textContent || '').join('\n');
    } else {
        const holder = pre.ownerDocument.createElement('div');
        holder.innerHTML = pre.innerHTML.replace(/<br\s*\/?>/gi, '\n');
        text = holder.textContent || '';
    }
    return text
        .replace(/\r\n?/g, '\n')
        .split('\n')
        .map((line) => line.replace(/[ \t]+$/, ''))
        .join('\n')
        .replace(/^\n+/, '')
        .trimEnd();
}

/** Section text with its heading (`.section-title`) dropped. */
function sectionText(element: Element | null, titleSelector: string) {
    if (!element) return '';
    const parts: string[] = [];
    for (const node of element.childNodes) {
        if (isElement(node) && node.matches(titleSelector)) continue;
        parts.push(spacedText(node));
    }
    return collapseWhitespace(parts.join(' '));
}

export function parseSamples(container: Element | null, selectors: ProblemSelectors): Sample[] {
    if (!container) return [];
    const samples: Sample[] = [];
    const pair = (scope: Element) => {
        const inputs = scope.querySelectorAll(selectors.sampleInput);
        const outputs = scope.querySelectorAll(selectors.sampleOutput);
        const count = Math.min(inputs.length, outputs.length);
        for (let i = 0; i < count; i++) {
            samples.push({ index: samples.length + 1, input: extractPreText(inputs[i]), output: extractPreText(outputs[i]) });
        }
    };
    // A block may hold several input/output pairs.
    for (const block of container.querySelectorAll(selectors.sampleTest)) pair(block);
    if (!samples.length) pair(container);
    return samples;
}

export interface PageParserOptions {
    selectors?: SelectorSet;
    logger?: Logger;
}

export class PageParser {
    selectors: SelectorSet;
    logger: Logger;

    constructor(public session: AuthSession, options: PageParserOptions = {}) {
        this.selectors = options.selectors || CURRENT_SELECTORS;
        this.logger = options.logger || createLogger('client/parser');
    }

    private async fetchPage(url: string, options: FetchOptions) {
        const page = await this.session.html(url, options);
        if (!isSuccess(page.response.status)) throw new HttpStatusError(page.response.status, page.html);
        return page;
    }

    async parseProblem(contestId: number, index: string, options: RequestOptions = {}) {
        const path = `/contest/${contestId}/problem/${index}`;
        const { html } = await this.fetchPage(path, options);
        return this.parseProblemPage(html, contestId, index, this.session.resolve(path));
    }

    async parseProblemset(contestId: number, index: string, options: RequestOptions = {}) {
        const path = `/problemset/problem/${contestId}/${index}`;
        const { html } = await this.fetchPage(path, options);
        return this.parseProblemPage(html, contestId, index, this.session.resolve(path));
    }

    /** Every field is read on its own; a field whose markup is missing comes back empty. */
    parseProblemPage(html: string, contestId: number, index: string, url: string): ParsedProblem {
        const document = parseDocument(html);
        const sel = this.selectors.problem;
        const text = (selector: string) => document.querySelector(selector)?.textContent || '';
        const tagTexts = Array.from(document.querySelectorAll(sel.tags)).map((e) => (e.textContent || '').trim());
        const ratingTag = Array.from(document.querySelectorAll(sel.rating))
            .map((e) => (e.textContent || '').trim())
            .find((t) => t.startsWith('*'));
        const samples = parseSamples(document.querySelector(sel.sampleTests), sel);
        const problem: ParsedProblem = {
            contestId,
            index,
            name: cleanTitle(text(sel.title)),
            timeLimit: extractLimit(text(sel.timeLimit), 'time limit per test'),
            memoryLimit: extractLimit(text(sel.memoryLimit), 'memory limit per test'),
            statement: this.buildStatement(document.querySelector(sel.statement)),
            legend: this.buildLegend(document.querySelector(sel.statement)),
            inputSpec: sectionText(document.querySelector(sel.inputSpec), sel.sectionTitle),
            outputSpec: sectionText(document.querySelector(sel.outputSpec), sel.sectionTitle),
            note: sectionText(document.querySelector(sel.note), sel.sectionTitle),
            samples: samples.map((s) => Object.freeze(s)),
            tags: tagTexts.filter((t) => t && !t.startsWith('*')),
            rating: ratingTag ? parseRating(ratingTag) : undefined,
            url,
        };
        Object.freeze(problem.samples);
        Object.freeze(problem.tags);
        return Object.freeze(problem);
    }

    /** Direct text nodes of the statement container only. */
    buildStatement(container: Element | null) {
        if (!container) return '';
        const parts: string[] = [];
        for (const node of container.childNodes) {
            if (node.nodeType === 3) parts.push(node.textContent || '');
        }
        return collapseWhitespace(parts.join(' '));
    }

    /** Unclassed children of the statement container. Children matched by another selector group are skipped. */
    buildLegend(container: Element | null) {
        if (!container) return '';
        const sel = this.selectors.problem;
        const others = [sel.title, sel.timeLimit, sel.memoryLimit, sel.inputSpec, sel.outputSpec, sel.note, sel.sampleTests];
        const parts: string[] = [];
        for (const node of container.childNodes) {
            if (!isElement(node) || node.getAttribute('class')) continue;
            if (others.some((selector) => node.matches(selector) || node.querySelector(selector))) continue;
            parts.push(spacedText(node));
        }
        return collapseWhitespace(parts.join(' '));
    }

    async parseContestProblems(contestId: number, options: RequestOptions = {}) {
        const { html } = await this.fetchPage(`/contest/${contestId}`, options);
        return this.parseContestPage(html, contestId);
    }

    parseContestPage(html: string, contestId: number): ContestProblemEntry[] {
        const document = parseDocument(html);
        const sel = this.selectors.contest;
        const entries: ContestProblemEntry[] = [];
        const rows = Array.from(document.querySelectorAll(sel.problemRow)).slice(1);
        for (const row of rows) {
            const link = Array.from(row.querySelectorAll(sel.problemLink))
                .find((a) => extractProblemIndex(a.getAttribute('href') || ''));
            const href = link?.getAttribute('href');
            if (!href) continue;
            const name = row.querySelectorAll('td')[1]?.querySelector('a')?.textContent || '';
            entries.push({
                contestId,
                index: extractProblemIndex(href),
                name: name.trim(),
                url: this.session.resolve(href),
            });
        }
        return entries;
    }

    /** Names of probed selector groups that match nothing in `document`. */
    missingSelectors(document: Document) {
        return this.selectors.probe.filter((group) => !document.querySelector(this.selectors.problem[group]));
    }

    /**
     * Fetches the reference problem and fails with `StructureError` when any
     * probed selector group matches nothing. Leaves the session untouched.
     */
    async verifyPageStructure(options: RequestOptions = {}) {
        const { document } = await this.fetchPage(REFERENCE_PROBLEM, { ...options, persistCookies: false });
        const missing = this.missingSelectors(document);
        if (missing.length) throw new StructureError(missing, this.selectors.version);
        this.logger.debug('page structure ok (selectors %s)', this.selectors.version);
    }
}
