import { createHash, randomInt } from 'node:crypto';

export interface SignOptions {
    key: string;
    secret: string;
    /** Unix seconds; defaults to now. */
    time?: number;
    /** Six characters; random by default. */
    rand?: string;
}

export function randomNonce() {
    return randomInt(100000, 1000000).toString();
}

export function canonicalString(rand: string, method: string, params: Record<string, string>, secret: string) {
    const pairs = Object.keys(params)
        .sort()
        .map((key) => `${key}=${params[key]}`)
        .join('&');
    return `${rand}/${method}?${pairs}#${secret}`;
}

/**
 * Adds `apiKey`, `time` and `apiSig` to a copy of `params`. The signature is
 * `rand` followed by the hex SHA-512 of the canonical request string.
 */
export function signRequest(method: string, params: Record<string, string>, options: SignOptions) {
    const rand = options.rand ?? randomNonce();
    const signed: Record<string, string> = {
        ...params,
        apiKey: options.key,
        time: String(options.time ?? Math.floor(Date.now() / 1000)),
    };
    delete signed.apiSig;
    const digest = createHash('sha512').update(canonicalString(rand, method, signed, options.secret)).digest('hex');
    signed.apiSig = rand + digest;
    return signed;
}
