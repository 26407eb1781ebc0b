import { expect } from 'chai';
import { describe, it } from 'mocha';
import { QuestionGenerator } from '../src/knowledge/QuestionGenerator';
import { PhraseService } from '../src/services/PhraseService';

describe('QuestionGenerator', () => {
    const generator = new QuestionGenerator(new PhraseService());

    describe('generateQuestion', () => {
        it('should use the template for the attribute and kind', () => {
            expect(generator.generateQuestion('dog', 'can_do', 'Noun')).to.equal('What can dog do?');
            expect(generator.generateQuestion('run', 'performed_by', 'Verb')).to.equal('Who or what can run?');
            expect(generator.generateQuestion('cold', 'opposite', 'Adjective')).to.equal('What is the opposite of cold?');
        });

        it('should ask numbered slots like their base attribute', () => {
            expect(generator.generateQuestion('dog', 'is_2', 'Noun')).to.equal('What is dog?');
        });

        it('should fall back to the description of the relation', () => {
            expect(generator.generateQuestion('dog', 'affects', 'Noun')).to.equal('Tell me about the target of action of dog?');
        });

        it('should describe an attribute outside the schema by its name', () => {
            expect(generator.generateQuestion('dog', 'favorite_food', 'Noun')).to.equal('Tell me about the favorite food of dog?');
        });
    });

    describe('generateConfirmation', () => {
        it('should confirm with the template of the attribute', () => {
            expect(generator.generateConfirmation('dog', 'can_do', 'bark')).to.equal('Got it, dog can bark.');
            expect(generator.generateConfirmation('dog', 'is_2', 'pet')).to.equal('I see, dog is pet.');
        });

        it('should use the generic confirmation for other attributes', () => {
            expect(generator.generateConfirmation('dog', 'color', 'brown')).to.equal('I learned that dog has color: brown.');
        });
    });

    describe('part of speech', () => {
        it('should ask for the part of speech of an unknown word', () => {
            expect(generator.generatePosQuestion('saturday')).to.equal(
                "I don't know the word 'saturday' yet. What part of speech is it: a noun, a verb, or an adjective?");
        });

        it('should confirm with the right article', () => {
            expect(generator.generatePosConfirmation('saturday', 'Noun')).to.equal("Thank you! Now I know 'saturday' is a noun.");
            expect(generator.generatePosConfirmation('zesty', 'Adjective')).to.equal("Thank you! Now I know 'zesty' is an adjective.");
        });

        it('should ask again when the answer names no part of speech', () => {
            expect(generator.generatePosClarification('saturday')).to.equal(
                "Sorry, I need to know if 'saturday' is a noun, a verb, or an adjective.");
        });
    });
});
