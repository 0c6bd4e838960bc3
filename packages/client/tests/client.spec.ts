import { expect } from 'chai';
import { describe, it } from 'node:test';
import { createClient, NotAuthenticatedError } from '../src/index';
import { envelope, StubTransport } from './helpers';

describe('createClient', () => {
    it('wires the four health checks', () => {
        const client = createClient({ transport: new StubTransport().transport });
        expect(client.health.map((c) => c.name)).to.deep.equal(['CF API', 'CF Web Structure', 'CF Handle', 'CF Session']);
    });

    it('refuses a submitter without a login', () => {
        const client = createClient({ transport: new StubTransport().transport });
        expect(() => client.submitter()).to.throw(NotAuthenticatedError);
    });

    it('reuses one submitter for a logged-in session', () => {
        const client = createClient({
            transport: new StubTransport().transport,
            credentials: { handle: 'test-user', cookie: 'JSESSIONID=abc' },
        });
        expect(client.submitter()).to.equal(client.submitter());
        expect(client.session.isReadyForSubmission()).to.equal(true);
    });

    it('passes credentials to the API client', async () => {
        const stub = new StubTransport().on('/api/user.friends', envelope([]));
        const client = createClient({
            transport: stub.transport,
            rate: 1000,
            credentials: { apiKey: 'test-key', apiSecret: 'test-secret' },
        });
        expect(client.api.hasCredentials()).to.equal(true);
        await client.api.getUserFriends(true);
        expect(new URL(stub.requests[0].url).searchParams.get('apiKey')).to.equal('test-key');
    });
});
