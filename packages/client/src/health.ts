import type { ApiClient } from './api';
import {
    ApiError, AuthError, BotChallengeError, HandleMismatchError, HttpStatusError, StructureError,
} from './error';
import type { RequestOptions } from './interface';
import type { PageParser } from './parser';
import type { AuthSession } from './session';

export type CheckStatus = 'healthy' | 'degraded' | 'critical';
export type CheckAction = 'retry' | 'manual_fix' | 'user_prompt' | 'reauthenticate';

export interface CheckResult {
    name: string;
    category: string;
    status: CheckStatus;
    message: string;
    details?: string;
    action?: CheckAction;
    /** Milliseconds. */
    duration: number;
}

/** Read-only probe. Implementations never change client state. */
export interface HealthCheck {
    readonly name: string;
    readonly category: string;
    readonly critical: boolean;
    check(options?: RequestOptions): Promise<CheckResult>;
}

function describe(e: unknown) {
    return e instanceof Error ? e.message : String(e);
}

abstract class BaseCheck implements HealthCheck {
    abstract readonly name: string;
    readonly category = 'external';
    readonly critical: boolean = false;

    protected abstract run(options: RequestOptions): Promise<Omit<CheckResult, 'name' | 'category' | 'duration'>>;

    async check(options: RequestOptions = {}): Promise<CheckResult> {
        const start = Date.now();
        const result = await this.run(options);
        return {
            name: this.name,
            category: this.category,
            ...result,
            duration: Date.now() - start,
        };
    }
}

export class ApiCheck extends BaseCheck {
    readonly name = 'CF API';

    constructor(private client: ApiClient) {
        super();
    }

    protected async run(options: RequestOptions) {
        try {
            await this.client.ping(options);
        } catch (e) {
            return {
                status: 'degraded', message: 'CF API unreachable', details: describe(e), action: 'retry',
            } as const;
        }
        return { status: 'healthy', message: 'CF API OK' } as const;
    }
}

export class WebStructureCheck extends BaseCheck {
    readonly name = 'CF Web Structure';

    constructor(private parser: PageParser) {
        super();
    }

    protected async run(options: RequestOptions) {
        const { version } = this.parser.selectors;
        try {
            await this.parser.verifyPageStructure(options);
        } catch (e) {
            if (e instanceof StructureError) {
                return {
                    status: 'degraded', message: 'CF page structure changed', details: e.message, action: 'manual_fix',
                } as const;
            }
            if (e instanceof BotChallengeError) {
                return {
                    status: 'degraded', message: 'Blocked by bot challenge', details: e.message, action: 'user_prompt',
                } as const;
            }
            return {
                status: 'degraded', message: 'CF web unreachable', details: describe(e), action: 'retry',
            } as const;
        }
        return { status: 'healthy', message: `CF web structure OK (v${version})` } as const;
    }
}

export class HandleCheck extends BaseCheck {
    readonly name = 'CF Handle';

    constructor(private client: ApiClient, private handle: string) {
        super();
    }

    protected async run(options: RequestOptions) {
        if (!this.handle) {
            return { status: 'degraded', message: 'CF handle not configured', action: 'user_prompt' } as const;
        }
        try {
            const [user] = await this.client.getUserInfo([this.handle], options);
            if (!user) {
                return {
                    status: 'critical', message: 'Handle not found on CF', details: this.handle, action: 'manual_fix',
                } as const;
            }
            return { status: 'healthy', message: `${user.handle} (${user.rank || 'unrated'}, ${user.rating ?? 'unrated'})` } as const;
        } catch (e) {
            const missing = (e instanceof ApiError && /not found/i.test(e.comment))
                || (e instanceof HttpStatusError && e.status === 400 && /not found/i.test(e.body));
            if (missing) {
                return {
                    status: 'critical', message: 'Handle not found on CF', details: this.handle, action: 'manual_fix',
                } as const;
            }
            return {
                status: 'degraded', message: 'Cannot verify handle', details: describe(e), action: 'retry',
            } as const;
        }
    }
}

export class SessionCheck extends BaseCheck {
    readonly name = 'CF Session';

    constructor(private session: AuthSession) {
        super();
    }

    protected async run(options: RequestOptions) {
        if (!this.session.hasCookies()) {
            return { status: 'degraded', message: 'CF session cookie not configured', action: 'user_prompt' } as const;
        }
        try {
            const handle = await this.session.validate(options);
            return { status: 'healthy', message: `Logged in as ${handle}` } as const;
        } catch (e) {
            if (e instanceof HandleMismatchError) {
                return {
                    status: 'critical', message: 'Session belongs to another handle', details: e.message, action: 'reauthenticate',
                } as const;
            }
            if (e instanceof AuthError) {
                return {
                    status: 'critical', message: 'CF session invalid', details: e.message, action: 'reauthenticate',
                } as const;
            }
            return {
                status: 'degraded', message: 'Cannot validate session', details: describe(e), action: 'retry',
            } as const;
        }
    }
}
