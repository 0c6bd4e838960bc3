export type ErrorCategory =
    | 'internal'
    | 'transport'
    | 'cancelled'
    | 'http'
    | 'api'
    | 'decode'
    | 'parse'
    | 'auth'
    | 'submit'
    | 'notfound'
    | 'timeout';

export function formatMessage(template: string, params: unknown[]) {
    return template.replace(/\{(\d+)\}/g, (match, index: string) => {
        const value = params[+index];
        return value === undefined ? match : String(value);
    });
}

export class ClientError extends Error {
    params: unknown[];
    category: ErrorCategory = 'internal';

    constructor(...params: unknown[]) {
        super();
        this.name = 'ClientError';
        this.params = params;
    }
}

// A mixin base has to take `any[]`; `params` keeps the arguments as `unknown`.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ErrorClass = new (...args: any[]) => ClientError;
type Message = string | ((this: ClientError) => string);

const Err = <T extends ErrorClass>(name: string, Class: T, message?: Message, category?: ErrorCategory) =>
    class extends Class {
        // eslint-disable-next-line @typescript-eslint/no-explicit-any
        constructor(...args: any[]) {
            super(...args);
            this.name = name;
            if (category) this.category = category;
            if (message) {
                const template = typeof message === 'function' ? message.call(this) : message;
                this.message = formatMessage(template, this.params);
            }
        }
    };

export const CreateError = Err;

export const TransportError = Err('TransportError', ClientError, 'Request to {0} failed: {1}', 'transport');
export const CancelledError = Err('CancelledError', ClientError, 'Operation was cancelled.', 'cancelled');
export const DecodeError = Err('DecodeError', ClientError, 'Failed to decode response: {0}', 'decode');
export const ParseError = Err('ParseError', ClientError, 'Failed to parse page: {0}', 'parse');
export const AuthError = Err('AuthError', ClientError, 'Authentication required.', 'auth');
export const SubmitError = Err('SubmitError', ClientError, 'Submission rejected.', 'submit');
export const NotFoundError = Err('NotFoundError', ClientError, '{0} not found.', 'notfound');
export const TimeoutError = Err('TimeoutError', ClientError, 'Operation timed out.', 'timeout');

export function isClientError(e: unknown): e is ClientError {
    return e instanceof ClientError;
}
