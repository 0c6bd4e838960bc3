import type { Logger } from '@cfkit/utils';
import { ApiClient } from './api';
import type { Transport } from './fetch';
import {
    ApiCheck, HandleCheck, type HealthCheck, SessionCheck, WebStructureCheck,
} from './health';
import type { Credentials } from './interface';
import { PageParser } from './parser';
import type { SelectorSet } from './selectors';
import { AuthSession } from './session';
import { SubmissionEngine } from './submitter';

export * from './api';
export * from './cache';
export * from './error';
export * from './fetch';
export * from './health';
export * from './interface';
export * from './limiter';
export * from './parser';
export * from './selectors';
export * from './session';
export * from './sign';
export * from './submitter';
export * from './verdict';

export interface ClientConfig {
    credentials?: Credentials;
    transport?: Transport;
    /** API requests per second. */
    rate?: number;
    cacheTTL?: number;
    selectors?: SelectorSet;
    userAgent?: string;
    pollInterval?: number;
    verdictTimeout?: number;
    logger?: Logger;
}

export interface Client {
    api: ApiClient;
    session: AuthSession;
    parser: PageParser;
    health: HealthCheck[];
    /** Throws `NotAuthenticatedError` until the session has a handle and a session cookie. */
    submitter(): SubmissionEngine;
}

/** Wires one set of credentials into independent API, session, parser and submitter instances. */
export function createClient(config: ClientConfig = {}): Client {
    const credentials = config.credentials || {};
    const api = new ApiClient({
        transport: config.transport,
        apiKey: credentials.apiKey,
        apiSecret: credentials.apiSecret,
        rate: config.rate,
        cacheTTL: config.cacheTTL,
        logger: config.logger,
    });
    const session = new AuthSession({
        transport: config.transport,
        handle: credentials.handle,
        cookie: credentials.cookie,
        bypass: credentials.bypass,
        userAgent: config.userAgent,
        logger: config.logger,
    });
    const parser = new PageParser(session, { selectors: config.selectors, logger: config.logger });
    let engine: SubmissionEngine | null = null;
    return {
        api,
        session,
        parser,
        health: [
            new ApiCheck(api),
            new WebStructureCheck(parser),
            new HandleCheck(api, credentials.handle || ''),
            new SessionCheck(session),
        ],
        submitter() {
            engine ||= new SubmissionEngine(session, {
                selectors: config.selectors,
                pollInterval: config.pollInterval,
                verdictTimeout: config.verdictTimeout,
                logger: config.logger,
            });
            return engine;
        },
    };
}
