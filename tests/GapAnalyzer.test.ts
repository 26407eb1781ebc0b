import { expect } from 'chai';
import { describe, it } from 'mocha';
import { GapAnalyzer } from '../src/knowledge/GapAnalyzer';
import { KnowledgeSchema, DEFAULT_SCHEMA } from '../src/knowledge/knowledgeSchema';
import { ConceptEntity } from '../src/memory/ConceptEntity';

function noun(identity: string, facts: Array<[string, string]> = []): ConceptEntity {
    const entity = new ConceptEntity(identity, 'Noun');
    facts.forEach(([name, value]) => entity.learn(name, value));
    return entity;
}

describe('GapAnalyzer', () => {
    const analyzer = new GapAnalyzer();

    describe('findNextGap', () => {
        it('should return the first missing priority attribute', () => {
            expect(analyzer.findNextGap(noun('dog'))).to.equal('is');
            expect(analyzer.findNextGap(noun('dog', [['is', 'animal']]))).to.equal('can_do');
        });

        it('should keep asking the earlier attribute until it is filled', () => {
            const dog = noun('dog', [['is', 'animal'], ['can_have', 'fur']]);

            expect(analyzer.findNextGap(dog)).to.equal('can_do');
            dog.learn('can_do', 'bark');
            expect(analyzer.findNextGap(dog)).to.equal('feels_like');
        });

        it('should return undefined when every expected attribute is filled', () => {
            const facts = DEFAULT_SCHEMA.priorityFields.Noun.map((name): [string, string] => [name, 'x']);

            expect(analyzer.findNextGap(noun('dog', facts))).to.be.undefined;
        });

        it('should scan the standard fields once the priority list is complete', () => {
            const schema: KnowledgeSchema = {
                ...DEFAULT_SCHEMA,
                priorityFields: { Noun: ['is'], Verb: [], Adjective: [] },
                standardFields: { Noun: ['is', 'color'], Verb: [], Adjective: [] },
            };

            expect(new GapAnalyzer(schema).findNextGap(noun('dog', [['is', 'animal']]))).to.equal('color');
        });

        it('should use the verb schedule for verbs', () => {
            expect(analyzer.findNextGap(new ConceptEntity('run', 'Verb'))).to.equal('performed_by');
        });
    });

    describe('completeness', () => {
        it('should be the share of filled expected attributes', () => {
            expect(analyzer.completeness(noun('dog'))).to.equal(0);
            expect(analyzer.completeness(noun('dog', [['is', 'animal']]))).to.be.closeTo(1 / 7, 1e-9);
        });

        it('should be 1.0 when nothing is expected for the kind', () => {
            const schema: KnowledgeSchema = {
                ...DEFAULT_SCHEMA,
                priorityFields: { ...DEFAULT_SCHEMA.priorityFields, Noun: [] },
                standardFields: { ...DEFAULT_SCHEMA.standardFields, Noun: [] },
            };

            expect(new GapAnalyzer(schema).completeness(noun('dog'))).to.equal(1.0);
        });

        it('should ignore numbered slots', () => {
            expect(analyzer.getAllGaps(noun('dog', [['is_2', 'pet']]))).to.include('is');
        });
    });

    describe('rank', () => {
        it('should order concepts by how incomplete they are and drop complete ones', () => {
            const full = noun('full', DEFAULT_SCHEMA.priorityFields.Noun.map((name): [string, string] => [name, 'x']));
            const half = noun('half', [['is', 'a'], ['can_do', 'b'], ['can_have', 'c']]);
            const empty = noun('empty');

            const ranked = analyzer.rank([full, half, empty]);

            expect(ranked.map(r => r.entity.identity)).to.deep.equal(['empty', 'half']);
            expect(ranked[0].priorityScore).to.equal(100);
            expect(ranked[1].gaps).to.deep.equal(['feels_like', 'used_for', 'part_of', 'can_be']);
        });
    });

    describe('findFirstGap', () => {
        it('should pick the first concept in order that has a gap', () => {
            const full = noun('full', DEFAULT_SCHEMA.priorityFields.Noun.map((name): [string, string] => [name, 'x']));
            const dog = noun('dog', [['is', 'animal']]);

            const finding = analyzer.findFirstGap([full, dog]);

            expect(finding?.entity.identity).to.equal('dog');
            expect(finding?.attributeName).to.equal('can_do');
        });

        it('should return undefined for no concepts', () => {
            expect(analyzer.findFirstGap([])).to.be.undefined;
        });
    });
});
