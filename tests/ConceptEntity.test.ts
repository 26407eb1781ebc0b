import { expect } from 'chai';
import { describe, it } from 'mocha';
import { AttributeBag } from '../src/memory/AttributeBag';
import { ConceptEntity } from '../src/memory/ConceptEntity';

describe('AttributeBag', () => {
    it('should keep distinct values in insertion order', () => {
        const bag = new AttributeBag();
        expect(bag.add('is', 'animal')).to.be.true;
        expect(bag.add('is', 'pet')).to.be.true;
        expect(bag.add('is', 'animal')).to.be.false;

        expect(bag.get('is')).to.deep.equal(['animal', 'pet']);
    });

    it('should flatten to name/value pairs', () => {
        const bag = AttributeBag.from([['is', 'animal'], ['can_do', 'bark'], ['is', 'pet']]);

        expect(bag.entries()).to.deep.equal([['is', 'animal'], ['is', 'pet'], ['can_do', 'bark']]);
        expect(bag.size).to.equal(2);
    });
});

describe('ConceptEntity', () => {
    it('should record every learn call as a pending write', () => {
        const dog = new ConceptEntity('dog', 'Noun');
        dog.learn('is', 'animal');
        dog.learn('is', 'animal');

        expect(dog.getAttribute('is')).to.deep.equal(['animal']);
        expect(dog.takePendingWrites()).to.deep.equal([
            { attributeName: 'is', attributeValue: 'animal' },
            { attributeName: 'is', attributeValue: 'animal' },
        ]);
        expect(dog.takePendingWrites()).to.deep.equal([]);
    });

    it('should use numbered slots for further values of the same relation', () => {
        const dog = new ConceptEntity('dog', 'Noun');

        expect(dog.learnInNextSlot('is', 'friendly')).to.equal('is');
        expect(dog.learnInNextSlot('is', 'furry')).to.equal('is_2');
        expect(dog.learnInNextSlot('is', 'loyal')).to.equal('is_3');

        expect(dog.getAttribute('is')).to.deep.equal(['friendly']);
        expect(dog.getAttribute('is_2')).to.deep.equal(['furry']);
        expect(dog.valuesOf('is')).to.deep.equal(['friendly', 'furry', 'loyal']);
    });

    it('should not write a value already held in one of the slots', () => {
        const dog = new ConceptEntity('dog', 'Noun');
        dog.learnInNextSlot('is', 'friendly');
        dog.learnInNextSlot('is', 'furry');

        expect(dog.learnInNextSlot('is', 'furry')).to.be.undefined;
        expect(dog.slotsOf('is')).to.deep.equal(['is', 'is_2']);
    });

    it('should print its attributes sorted by name', () => {
        const dog = new ConceptEntity('dog', 'Noun');
        dog.learn('is', 'animal');
        dog.learn('can_do', 'bark');

        expect(dog.toString()).to.equal('dog (Noun)\n  can_do: bark\n  is: animal');
    });
});
