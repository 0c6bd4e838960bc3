import { expect } from 'chai';
import { describe, it } from 'node:test';
import {
    AuthError, CancelledError, ClientError, CreateError, formatMessage,
    isClientError, NotFoundError, TransportError,
} from '../lib/error';

describe('formatMessage', () => {
    it('replaces positional placeholders', () => {
        expect(formatMessage('{0} of {1}', ['page', 'contest'])).to.equal('page of contest');
    });
    it('keeps placeholders without a value', () => {
        expect(formatMessage('{0} and {2}', ['a'])).to.equal('a and {2}');
    });
});

describe('CreateError', () => {
    it('sets name, category and message', () => {
        const err = new TransportError('https://example.test/', 'socket hang up');
        expect(err).to.be.instanceOf(ClientError);
        expect(err).to.be.instanceOf(Error);
        expect(err.name).to.equal('TransportError');
        expect(err.category).to.equal('transport');
        expect(err.message).to.equal('Request to https://example.test/ failed: socket hang up');
        expect(err.params).to.deep.equal(['https://example.test/', 'socket hang up']);
    });

    it('inherits the category of its parent', () => {
        const SessionExpiredError = CreateError('SessionExpiredError', AuthError, 'Session of {0} expired.');
        const err = new SessionExpiredError('tourist');
        expect(err).to.be.instanceOf(AuthError);
        expect(err.category).to.equal('auth');
        expect(err.message).to.equal('Session of tourist expired.');
    });

    it('keeps the parent message when none is given', () => {
        const PageNotFoundError = CreateError('PageNotFoundError', NotFoundError);
        const err = new PageNotFoundError('Page');
        expect(err.name).to.equal('PageNotFoundError');
        expect(err.message).to.equal('Page not found.');
    });

    it('accepts message functions', () => {
        const CountError = CreateError('CountError', ClientError, function (this: ClientError) {
            return this.params.length > 1 ? '{0} items' : 'one item';
        });
        expect(new CountError(3, 'x').message).to.equal('3 items');
        expect(new CountError(1).message).to.equal('one item');
    });

    it('keeps sibling categories apart', () => {
        const err = new CancelledError();
        expect(isClientError(err)).to.equal(true);
        expect(err).not.to.be.instanceOf(TransportError);
        expect(isClientError(new Error('plain'))).to.equal(false);
    });
});
