import { ConceptKind } from '../memory/concept_types';
import { PhraseService } from '../services/PhraseService';
import { DEFAULT_SCHEMA, KnowledgeSchema, baseAttributeName, describeRelation } from './knowledgeSchema';

/**
 * Builds the questions Curio asks and the confirmations it gives after learning something.
 */
export class QuestionGenerator {
    constructor(
        private readonly phrases: PhraseService,
        private readonly schema: KnowledgeSchema = DEFAULT_SCHEMA,
    ) {}

    /**
     * Question about a missing attribute, e.g. ("dog", "can_do", "Noun") -> "What can dog do?".
     * Attributes without a template for the kind get the generic "Tell me about the ... of ...?" form.
     */
    generateQuestion(word: string, attributeName: string, kind: ConceptKind): string {
        const base = baseAttributeName(attributeName);
        if (this.phrases.has('questions', base, kind)) {
            return this.phrases.format('questions', base, { word }, kind);
        }
        return this.phrases.format('questions', 'fallback', {
            word,
            description: describeRelation(base, this.schema),
        });
    }

    generateConfirmation(word: string, attributeName: string, value: string): string {
        const base = baseAttributeName(attributeName);
        const key = this.phrases.has('confirmations', base) && base !== 'fallback' ? base : 'fallback';
        return this.phrases.format('confirmations', key, { word, value, attribute: base });
    }

    generatePosQuestion(word: string): string {
        return this.phrases.format('pos', 'question', { word });
    }

    generatePosConfirmation(word: string, kind: ConceptKind): string {
        const kindName = kind.toLowerCase();
        return this.phrases.format('pos', 'confirmation', {
            word,
            kind: kindName,
            article: /^[aeiou]/.test(kindName) ? 'an' : 'a',
        });
    }

    generatePosClarification(word: string): string {
        return this.phrases.format('pos', 'clarification', { word });
    }
}
