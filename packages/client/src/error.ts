import {
    AuthError, ClientError, CreateError, DecodeError, NotFoundError,
    ParseError, SubmitError, TimeoutError,
} from '@cfkit/utils';

export * from '@cfkit/utils/lib/error';

export class HttpStatusError extends CreateError('HttpStatusError', ClientError, 'Server responded with status {0}.', 'http') {
    constructor(public status: number, public body: string) {
        super(status, body);
    }
}

export class ApiError extends CreateError('ApiError', ClientError, 'API call {0} failed: {1}', 'api') {
    constructor(public method: string, public comment: string) {
        super(method, comment);
    }
}

export const ResponseTooLargeError = CreateError('ResponseTooLargeError', DecodeError, 'Response body exceeds {0} bytes.');

export class StructureError extends CreateError('StructureError', ParseError, 'Selectors not found: {0} (selector version: {1})') {
    constructor(public missing: string[], public version: string) {
        super(missing.join(', '), version);
    }
}

export const CsrfTokenNotFoundError = CreateError('CsrfTokenNotFoundError', AuthError, 'CSRF token not found.');
export const BypassCookieExpiredError = CreateError('BypassCookieExpiredError', AuthError, 'Bypass cookie expired at {0}; copy a fresh one from the browser.');
export const BotChallengeError = CreateError('BotChallengeError', AuthError, 'Bot challenge served for {0}; the bypass cookie is missing, expired or used with another user agent.');
export const UnauthorizedApiCallError = CreateError('UnauthorizedApiCallError', AuthError, 'API method {0} requires an API key and secret.');
export const NotAuthenticatedError = CreateError('NotAuthenticatedError', AuthError, 'Session is not authenticated: {0}');

export class HandleMismatchError extends CreateError('HandleMismatchError', AuthError, 'Logged in as {1}, expected {0}.') {
    constructor(public expected: string, public found: string) {
        super(expected, found || '(nobody)');
    }
}

export const DuplicateSubmissionError = CreateError('DuplicateSubmissionError', SubmitError, 'Duplicate submission: the same source was submitted before to {0}{1}.');
export const SourceTooLongError = CreateError('SourceTooLongError', SubmitError, 'Source code is too long for {0}{1}.');
export const SubmitNotAllowedError = CreateError('SubmitNotAllowedError', SubmitError, 'You are not allowed to submit to {0}{1}.');
export const ContestOverError = CreateError('ContestOverError', SubmitError, 'Submission rejected: contest is over for {0}{1}.');

export class SubmitFailedError extends CreateError('SubmitFailedError', SubmitError, 'Submission failed with status {0}.') {
    constructor(public status: number, public body: string) {
        super(status, body);
    }
}

export const ContestNotFoundError = CreateError('ContestNotFoundError', NotFoundError, 'Contest {0} not found.');
export const ProblemNotFoundError = CreateError('ProblemNotFoundError', NotFoundError, 'Problem {0}{1} not found.');
export const SubmissionNotFoundError = CreateError('SubmissionNotFoundError', NotFoundError, 'Submission {0} not found in contest {1}.');

export class VerdictTimeoutError extends CreateError('VerdictTimeoutError', TimeoutError, 'No verdict for submission {0} within {1} ms.') {
    constructor(public submissionId: number, public timeout: number) {
        super(submissionId, timeout);
    }
}
