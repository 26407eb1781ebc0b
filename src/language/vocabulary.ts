import data from '../data/vocabulary.json';
import { ConceptKind } from '../memory/concept_types';
import { Lexicon, VerbRelation } from './types';

export interface Vocabulary {
    stopWords: ReadonlySet<string>;
    determiners: ReadonlySet<string>;
    conjunctions: ReadonlySet<string>;
    pronouns: ReadonlySet<string>;
    /** Pronouns that can stand for a concept being talked about. */
    referringPronouns: ReadonlySet<string>;
    questionWords: ReadonlySet<string>;
    auxiliaries: ReadonlySet<string>;
    greetings: ReadonlySet<string>;
    commandVerbs: ReadonlySet<string>;
    passWords: ReadonlySet<string>;
    relationVerbs: ReadonlyMap<string, Exclude<VerbRelation, 'action'>>;
    verbs: ReadonlySet<string>;
    adjectives: ReadonlySet<string>;
    nouns: ReadonlySet<string>;
    contractions: ReadonlyMap<string, readonly string[]>;
}

function isLinkingRelation(value: string): value is Exclude<VerbRelation, 'action'> {
    return value === 'is' || value === 'can_have' || value === 'can_do' || value === 'feels_like';
}

function buildVocabulary(): Vocabulary {
    const relationVerbs = new Map<string, Exclude<VerbRelation, 'action'>>();
    for (const [verb, relation] of Object.entries(data.relationVerbs)) {
        if (!isLinkingRelation(relation)) {
            throw new Error(`vocabulary.json: "${verb}" maps to unknown relation "${relation}".`);
        }
        relationVerbs.set(verb, relation);
    }
    return {
        stopWords: new Set(data.stopWords),
        determiners: new Set(data.determiners),
        conjunctions: new Set(data.conjunctions),
        pronouns: new Set(data.pronouns),
        referringPronouns: new Set(data.referringPronouns),
        questionWords: new Set(data.questionWords),
        auxiliaries: new Set(data.auxiliaries),
        greetings: new Set(data.greetings),
        commandVerbs: new Set(data.commandVerbs),
        passWords: new Set(data.passWords),
        relationVerbs,
        verbs: new Set(data.verbs),
        adjectives: new Set(data.adjectives),
        nouns: new Set(data.nouns),
        contractions: new Map(Object.entries(data.contractions)),
    };
}

export const VOCABULARY: Vocabulary = buildVocabulary();

/**
 * Built-in word knowledge. Pronouns count as nouns so "I" can carry attributes.
 */
export class VocabularyLexicon implements Lexicon {
    constructor(private readonly vocabulary: Vocabulary = VOCABULARY) {}

    kindOf(word: string): ConceptKind | undefined {
        if (this.vocabulary.adjectives.has(word)) return 'Adjective';
        if (this.vocabulary.verbs.has(word)) return 'Verb';
        if (this.vocabulary.nouns.has(word) || this.vocabulary.pronouns.has(word)) return 'Noun';
        return undefined;
    }
}

/**
 * Looks a word up in each lexicon in turn; the first answer wins.
 */
export function composeLexicons(...lexicons: Lexicon[]): Lexicon {
    return {
        kindOf(word: string): ConceptKind | undefined {
            for (const lexicon of lexicons) {
                const kind = lexicon.kindOf(word);
                if (kind) return kind;
            }
            return undefined;
        }
    };
}
