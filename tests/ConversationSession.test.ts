import { expect } from 'chai';
import { describe, it, beforeEach } from 'mocha';
import { ConversationSession } from '../src/conversation/ConversationSession';
import { PreconditionViolation } from '../src/errors';

describe('ConversationSession', () => {
    let session: ConversationSession;

    beforeEach(() => {
        session = new ConversationSession();
    });

    it('should start idle', () => {
        expect(session.state).to.equal('Idle');
        expect(session.pendingEntityRef).to.be.null;
    });

    it('should hold one pending attribute question', () => {
        session.askProperty('dog', 'can_do');

        expect(session.state).to.equal('AwaitingPropertyAnswer');
        expect(session.pendingEntityRef).to.equal('dog');
        expect(session.pendingAttributeName).to.equal('can_do');

        session.clearProperty();
        expect(session.state).to.equal('Idle');
    });

    it('should replace a pending attribute question with a part of speech question', () => {
        session.askProperty('dog', 'can_do');

        expect(session.askPos(['saturday'])).to.equal('saturday');
        expect(session.state).to.equal('AwaitingPosAnswer');
        expect(session.awaitingPropertyAnswer).to.be.false;
    });

    it('should refuse an attribute question while a part of speech is pending', () => {
        session.askPos(['saturday']);

        expect(() => session.askProperty('dog', 'can_do')).to.throw(PreconditionViolation);
    });

    it('should ask queued words first in, first out and skip duplicates', () => {
        expect(session.askPos(['saturday', 'zesty', 'saturday'])).to.equal('saturday');
        expect(session.askPos(['zesty', 'blorp'])).to.equal('saturday');
        expect(session.posQuestionQueue).to.deep.equal(['zesty', 'blorp']);

        expect(session.nextPos()).to.equal('zesty');
        expect(session.nextPos()).to.equal('blorp');
        expect(session.nextPos()).to.be.undefined;
        expect(session.state).to.equal('Idle');
        expect(session.pendingPosWord).to.be.null;
    });

    it('should keep the most recent subjects, newest last', () => {
        const short = new ConversationSession(undefined, 3);
        ['dog', 'cat', 'bird', 'dog', 'fish'].forEach(s => short.rememberSubject(s));

        expect(short.recentSubjects).to.deep.equal(['bird', 'dog', 'fish']);
    });

    it('should restore a snapshot', () => {
        session.askProperty('dog', 'can_do');
        session.rememberSubject('dog');
        const snapshot = session.snapshot();

        session.askPos(['saturday', 'zesty']);
        session.rememberSubject('cat');
        session.restore(snapshot);

        expect(session.state).to.equal('AwaitingPropertyAnswer');
        expect(session.pendingEntityRef).to.equal('dog');
        expect(session.posQuestionQueue).to.deep.equal([]);
        expect(session.recentSubjects).to.deep.equal(['dog']);
    });
});
