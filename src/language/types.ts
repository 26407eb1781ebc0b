import { ConceptKind } from '../memory/concept_types';

export type SentenceType = 'Statement' | 'Question' | 'Command';

export type QuestionType = 'definition' | 'confirmation' | 'ability' | 'manner' | 'wellbeing' | 'general';

/** Attribute named by a linking verb, or `action` for any other verb. */
export type VerbRelation = 'is' | 'can_have' | 'can_do' | 'feels_like' | 'action';

export interface Modifier {
    adjective: string;
    noun: string;
}

interface ParseBase {
    original: string;
    tokens: string[];
    /** First subject head; `subjects` holds every conjoined one. */
    subject: string | null;
    subjects: string[];
    verb: string | null;
    verbRelation: VerbRelation | null;
    object: string | null;
    objects: string[];
    adjectives: string[];
    modifiers: Modifier[];
    /** Part of speech of each content word, from the lexicon or from the word's slot in the sentence. */
    wordKinds: ReadonlyMap<string, ConceptKind>;
    unknownWords: string[];
    greeting: string | null;
}

export interface StatementParse extends ParseBase {
    sentenceType: 'Statement';
}

export interface QuestionParse extends ParseBase {
    sentenceType: 'Question';
    questionType: QuestionType;
    questionTarget: string | null;
}

export interface CommandParse extends ParseBase {
    sentenceType: 'Command';
    commandVerb: string;
    commandTarget: string | null;
}

export type ParsedUtterance = StatementParse | QuestionParse | CommandParse;

export interface Relation {
    source: string;
    sourceKind: ConceptKind;
    attribute: string;
    target: string;
    targetKind: ConceptKind;
}

/**
 * Part-of-speech lookup for known words.
 */
export interface Lexicon {
    kindOf(word: string): ConceptKind | undefined;
}
