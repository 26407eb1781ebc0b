import { NotFoundError } from '../errors';
import { QuestionParse } from '../language/types';
import { ConceptEntity } from '../memory/ConceptEntity';
import { ConceptStore } from '../memory/ConceptStore';
import { PhraseService } from '../services/PhraseService';
import { PhraseContext } from '../services/phraseTypes';
import { RandomSource, capitalize } from '../utils';
import { DEFAULT_SCHEMA, KnowledgeSchema, baseAttributeName, relationPhrase } from './knowledgeSchema';

export interface AnswerResult {
    /** False only when nothing is known about the concept. */
    answered: boolean;
    answer: string;
    concept: string;
    attribute?: string;
    values?: string[];
    /** Set for yes/no questions. */
    confirmed?: boolean;
    confidence: number;
}

/**
 * Answers questions from the attributes stored for the concept a question is about.
 */
export class QuestionAnswerer {
    constructor(
        private readonly store: ConceptStore,
        private readonly phrases: PhraseService,
        private readonly random: RandomSource,
        private readonly schema: KnowledgeSchema = DEFAULT_SCHEMA,
    ) {}

    answerQuestion(parsed: QuestionParse): AnswerResult {
        if (parsed.questionType === 'wellbeing') {
            return { answered: true, answer: this.say('wellbeing', {}), concept: 'you', confidence: 0.5 };
        }
        const fallbackName = parsed.questionTarget ?? parsed.subject ?? parsed.object ?? 'that';
        let entity: ConceptEntity;
        try {
            entity = this.resolve(parsed);
        } catch (error) {
            if (error instanceof NotFoundError) {
                return this.unknown(fallbackName);
            }
            throw error;
        }

        switch (parsed.questionType) {
            case 'definition':
                return this.fromAttribute(entity, 'is', 'definition', 0.9) ?? this.anyAttribute(entity) ?? this.noProperties(entity);
            case 'confirmation':
                return this.confirm(entity, parsed.object) ?? this.anyAttribute(entity) ?? this.unknown(entity.identity);
            case 'ability':
                return this.fromAttribute(entity, 'can_do', 'property', 0.85) ?? this.anyAttribute(entity) ?? this.unknown(entity.identity);
            case 'manner':
                return this.fromAttribute(entity, 'is', 'property', 0.85) ?? this.anyAttribute(entity) ?? this.unknown(entity.identity);
            default:
                return this.anyAttribute(entity) ?? this.unknown(entity.identity);
        }
    }

    /**
     * Answer for a "tell me about X" command.
     */
    describe(identity: string): AnswerResult {
        const entity = this.store.load(identity);
        if (!entity) return this.unknown(identity);
        return this.fromAttribute(entity, 'is', 'definition', 0.9) ?? this.anyAttribute(entity) ?? this.noProperties(entity);
    }

    /** Looks up the question target, then the subject, then the object. */
    private resolve(parsed: QuestionParse): ConceptEntity {
        for (const candidate of [parsed.questionTarget, parsed.subject, parsed.object]) {
            if (!candidate) continue;
            const entity = this.store.load(candidate);
            if (entity) return entity;
        }
        throw new NotFoundError(parsed.questionTarget ?? parsed.subject ?? parsed.object ?? '');
    }

    private fromAttribute(entity: ConceptEntity, attribute: string, pool: 'definition' | 'property', confidence: number): AnswerResult | undefined {
        const values = entity.valuesOf(attribute);
        if (values.length === 0) return undefined;
        const answer = this.say(pool, {
            concept: entity.identity,
            relation: relationPhrase(attribute, this.schema),
            value: values[0],
        });
        return { answered: true, answer, concept: entity.identity, attribute, values, confidence };
    }

    private confirm(entity: ConceptEntity, queried: string | null): AnswerResult | undefined {
        if (!queried) return undefined;
        const values = entity.valuesOf('is');
        if (values.some(v => v.toLowerCase() === queried.toLowerCase())) {
            return {
                answered: true,
                answer: this.say('confirmationYes', { concept: entity.identity, value: queried }),
                concept: entity.identity,
                attribute: 'is',
                values,
                confirmed: true,
                confidence: 0.95,
            };
        }
        if (values.length > 0) {
            return {
                answered: true,
                answer: this.say('confirmationNo', { concept: entity.identity, otherValue: values[0] }),
                concept: entity.identity,
                attribute: 'is',
                values,
                confirmed: false,
                confidence: 0.7,
            };
        }
        return undefined;
    }

    /** First stored attribute of the concept, numbered slots folded into their base name. */
    private anyAttribute(entity: ConceptEntity): AnswerResult | undefined {
        for (const name of entity.attributes.names()) {
            const base = baseAttributeName(name);
            const values = entity.valuesOf(base);
            if (values.length === 0) continue;
            const answer = this.say('property', {
                concept: entity.identity,
                relation: relationPhrase(base, this.schema),
                value: values[0],
            });
            return { answered: true, answer, concept: entity.identity, attribute: base, values, confidence: 0.7 };
        }
        return undefined;
    }

    private noProperties(entity: ConceptEntity): AnswerResult {
        return { answered: true, answer: this.say('noProperties', { concept: entity.identity }), concept: entity.identity, confidence: 0.5 };
    }

    private unknown(concept: string): AnswerResult {
        return { answered: false, answer: this.say('unknown', { concept }), concept, confidence: 0.0 };
    }

    private say(key: string, context: PhraseContext): string {
        return capitalize(this.phrases.pick('answers', key, this.random, context));
    }
}
