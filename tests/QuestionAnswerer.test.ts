import { expect } from 'chai';
import { describe, it, beforeEach } from 'mocha';
import { QuestionAnswerer } from '../src/knowledge/QuestionAnswerer';
import { InputParser } from '../src/language/InputParser';
import { QuestionParse } from '../src/language/types';
import { ConceptStore } from '../src/memory/ConceptStore';
import { PhraseService } from '../src/services/PhraseService';

const parser = new InputParser();

function question(text: string): QuestionParse {
    const parsed = parser.parse(text);
    if (parsed.sentenceType !== 'Question') {
        throw new Error(`"${text}" did not parse as a question`);
    }
    return parsed;
}

describe('QuestionAnswerer', () => {
    const first = { next: () => 0 };
    let store: ConceptStore;
    let answerer: QuestionAnswerer;

    const teach = (identity: string, facts: Array<[string, string]>) => {
        const entity = store.createOrGet(identity, 'Noun');
        facts.forEach(([name, value]) => entity.learn(name, value));
        store.save(entity);
    };

    beforeEach(() => {
        store = ConceptStore.fromState();
        answerer = new QuestionAnswerer(store, new PhraseService(), first);
    });

    it('should answer a definition from the "is" attribute', () => {
        teach('dog', [['is', 'animal']]);

        const result = answerer.answerQuestion(question('What is a dog?'));

        expect(result).to.deep.equal({
            answered: true,
            answer: 'Dog is animal.',
            concept: 'dog',
            attribute: 'is',
            values: ['animal'],
            confidence: 0.9,
        });
    });

    it('should include the numbered slots of an attribute', () => {
        teach('dog', [['is', 'animal'], ['is_2', 'pet']]);

        expect(answerer.answerQuestion(question('What is a dog?')).values).to.deep.equal(['animal', 'pet']);
    });

    it('should answer an ability question from "can_do"', () => {
        teach('dog', [['can_do', 'bark']]);

        const result = answerer.answerQuestion(question('What can a dog do?'));

        expect(result.answer).to.equal('Dog can bark.');
        expect(result.confidence).to.equal(0.85);
    });

    it('should fall back to any stored attribute', () => {
        teach('cat', [['can_have', 'whiskers']]);

        const result = answerer.answerQuestion(question('What is a cat?'));

        expect(result.answer).to.equal('Cat can have whiskers.');
        expect(result.attribute).to.equal('can_have');
        expect(result.confidence).to.equal(0.7);
    });

    it('should say so when a known concept has no attributes', () => {
        store.createOrGet('cat', 'Noun');

        const result = answerer.answerQuestion(question('What is a cat?'));

        expect(result.answered).to.be.true;
        expect(result.answer).to.equal("I know about cat, but I don't have many details yet.");
        expect(result.confidence).to.equal(0.5);
    });

    it('should admit it does not know an unknown concept', () => {
        const result = answerer.answerQuestion(question('What is a unicorn?'));

        expect(result).to.deep.equal({
            answered: false,
            answer: "I don't know about unicorn yet. Can you tell me?",
            concept: 'unicorn',
            confidence: 0,
        });
    });

    it('should confirm a yes/no question', () => {
        teach('dog', [['is', 'friendly']]);

        const result = answerer.answerQuestion(question('Is a dog friendly?'));

        expect(result.answer).to.equal('Yes, dog is friendly!');
        expect(result.confirmed).to.be.true;
        expect(result.confidence).to.equal(0.95);
    });

    it('should deny a yes/no question with what it knows instead', () => {
        teach('dog', [['is', 'friendly']]);

        const result = answerer.answerQuestion(question('Is a dog blue?'));

        expect(result.answer).to.equal("I don't think so. I know dog is friendly.");
        expect(result.confirmed).to.be.false;
        expect(result.confidence).to.equal(0.7);
    });

    it('should answer "how are you" without a concept', () => {
        const result = answerer.answerQuestion(question('How are you?'));

        expect(result.answer).to.equal("I'm doing well, thank you for asking!");
        expect(result.concept).to.equal('you');
        expect(result.confidence).to.equal(0.5);
    });

    it('should pick the template with the random source', () => {
        teach('dog', [['is', 'animal']]);
        const last = new QuestionAnswerer(store, new PhraseService(), { next: () => 0.99 });

        expect(last.answerQuestion(question('What is a dog?')).answer).to.equal("From what I've learned, dog is animal.");
    });

    describe('describe', () => {
        it('should describe a known concept', () => {
            teach('cats', [['is', 'pet']]);

            expect(answerer.describe('cats').answer).to.equal('Cats is pet.');
        });

        it('should report an unknown concept', () => {
            expect(answerer.describe('unicorn').answered).to.be.false;
        });
    });
});
