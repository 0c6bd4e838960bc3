export interface ProblemSelectors {
    title: string;
    timeLimit: string;
    memoryLimit: string;
    statement: string;
    inputSpec: string;
    outputSpec: string;
    note: string;
    sampleTests: string;
    sampleTest: string;
    sampleInput: string;
    sampleOutput: string;
    sectionTitle: string;
    tags: string;
    rating: string;
}

export interface ContestSelectors {
    problemRow: string;
    problemLink: string;
}

export interface SubmissionSelectors {
    row: string;
    status: string;
    time: string;
    memory: string;
    submittedAt: string;
    problem: string;
    verdict: string;
    resultTable: string;
}

/**
 * Markup contract for one revision of the site. Extraction code only ever
 * reads selectors through this table, so a layout change is absorbed by
 * shipping a new set.
 */
export interface SelectorSet {
    version: string;
    problem: ProblemSelectors;
    contest: ContestSelectors;
    submission: SubmissionSelectors;
    /** Groups `verifyPageStructure` requires on the reference problem page. */
    probe: (keyof ProblemSelectors)[];
}

export const SELECTORS_2024: SelectorSet = {
    version: '2024.1',
    problem: {
        title: '.problem-statement .header .title',
        timeLimit: '.problem-statement .header .time-limit',
        memoryLimit: '.problem-statement .header .memory-limit',
        statement: '.problem-statement',
        inputSpec: '.problem-statement .input-specification',
        outputSpec: '.problem-statement .output-specification',
        note: '.problem-statement .note',
        sampleTests: '.problem-statement .sample-tests',
        sampleTest: '.sample-test',
        sampleInput: '.input pre',
        sampleOutput: '.output pre',
        sectionTitle: '.section-title',
        tags: '.tag-box',
        rating: '.tag-box',
    },
    contest: {
        problemRow: 'table.problems tr',
        problemLink: 'a[href*="/problem/"]',
    },
    submission: {
        row: 'tr[data-submission-id]',
        status: '.status-cell',
        time: '.time-consumed-cell',
        memory: '.memory-consumed-cell',
        submittedAt: '.format-time',
        problem: 'a[href*="/problem/"]',
        verdict: '.verdict-accepted, .verdict-rejected, .verdict-waiting, .verdict-failed',
        resultTable: 'table.datatable',
    },
    probe: ['title', 'timeLimit', 'memoryLimit', 'statement', 'sampleTests'],
};

export const CURRENT_SELECTORS = SELECTORS_2024;
