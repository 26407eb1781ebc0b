import { ConceptKind } from '../memory/concept_types';
import { words } from '../utils';
import {
    Lexicon, Modifier, ParsedUtterance, QuestionType, Relation, VerbRelation,
} from './types';
import { VOCABULARY, Vocabulary, VocabularyLexicon } from './vocabulary';

interface NounPhrase {
    head: string;
    modifiers: string[];
    /** Introduced by an article or possessive ("an animal", "my morning"). */
    determined: boolean;
}

interface Clause {
    subjectPhrases: NounPhrase[];
    verb: string | null;
    verbRelation: VerbRelation | null;
    objectPhrases: NounPhrase[];
}

/**
 * Rule-based sentence parser. Pure: the result depends only on the text, the lexicon and the vocabulary.
 */
export class InputParser {
    private readonly vocabulary: Vocabulary;
    private readonly lexicon: Lexicon;

    constructor(lexicon: Lexicon = new VocabularyLexicon(), vocabulary: Vocabulary = VOCABULARY) {
        this.lexicon = lexicon;
        this.vocabulary = vocabulary;
    }

    /**
     * Lower-cased words with contractions expanded ("i'm" -> "i am") and possessive "'s" removed.
     */
    tokenize(text: string): string[] {
        const tokens: string[] = [];
        for (const word of words(text)) {
            const expansion = this.vocabulary.contractions.get(word);
            if (expansion) {
                tokens.push(...expansion);
            } else {
                const stripped = word.replace(/'s$/, '');
                if (stripped) tokens.push(stripped);
            }
        }
        return tokens;
    }

    isPassWord(word: string): boolean {
        return this.vocabulary.passWords.has(word);
    }

    /**
     * Whether a word can stand for a concept: the concept itself, a third-person pronoun,
     * or a plural form ("dogs", "foxes", "puppies").
     */
    refersTo(word: string, identity: string): boolean {
        if (word === identity || this.vocabulary.referringPronouns.has(word)) return true;
        const plurals = [`${identity}s`, `${identity}es`];
        if (identity.endsWith('y')) plurals.push(`${identity.slice(0, -1)}ies`);
        return plurals.includes(word);
    }

    /** Base form of a third-person verb: "barks" -> "bark", "watches" -> "watch", "flies" -> "fly". */
    verbStem(word: string): string {
        if (word.length <= 3 || !word.endsWith('s') || /(ss|us|is)$/.test(word)) return word;
        if (word.endsWith('ies')) return `${word.slice(0, -3)}y`;
        if (/(sh|ch|x|z|o)es$/.test(word)) return word.slice(0, -2);
        return word.slice(0, -1);
    }

    /** First token that is not a stop word. */
    firstContentToken(tokens: readonly string[]): string | undefined {
        return tokens.find(t => !this.vocabulary.stopWords.has(t) && !this.vocabulary.pronouns.has(t));
    }

    parse(text: string, lexicon: Lexicon = this.lexicon): ParsedUtterance {
        const original = text.trim();
        const tokens = this.tokenize(original);
        const greeting = tokens.length > 0 && this.vocabulary.greetings.has(tokens[0]) ? tokens[0] : null;
        const content = greeting ? tokens.slice(1) : tokens;

        const questionWord = content.length > 0 && this.vocabulary.questionWords.has(content[0]) ? content[0] : null;
        const isQuestion = original.endsWith('?') || questionWord !== null;
        const commandVerb = !isQuestion && content.length > 0 && this.vocabulary.commandVerbs.has(content[0]) ? content[0] : null;
        const body = questionWord || commandVerb ? content.slice(1) : content;

        const leadingAux = isQuestion && body.length > 0 && this.vocabulary.auxiliaries.has(body[0]) ? body[0] : null;
        const clause = leadingAux
            ? this.questionClause(leadingAux, body.slice(1), lexicon)
            : this.statementClause(body, lexicon);

        const wordKinds = new Map<string, ConceptKind>();
        const unknownWords: string[] = [];
        const assign = (word: string, slotKind?: ConceptKind) => {
            if (wordKinds.has(word)) return;
            const kind = lexicon.kindOf(word) ?? slotKind;
            if (kind) {
                wordKinds.set(word, kind);
            } else if (!unknownWords.includes(word)) {
                unknownWords.push(word);
            }
        };

        for (const phrase of clause.subjectPhrases) {
            phrase.modifiers.forEach(m => assign(m));
            assign(phrase.head, 'Noun');
        }
        if (clause.verb && clause.verbRelation === 'action') {
            assign(clause.verb, 'Verb');
        }
        for (const phrase of clause.objectPhrases) {
            phrase.modifiers.forEach(m => assign(m));
            assign(phrase.head, this.objectSlotKind(clause.verbRelation, phrase));
        }

        const adjectives: string[] = [];
        const modifiers: Modifier[] = [];
        for (const phrase of [...clause.subjectPhrases, ...clause.objectPhrases]) {
            for (const m of phrase.modifiers) {
                if (wordKinds.get(m) === 'Adjective') {
                    adjectives.push(m);
                    modifiers.push({ adjective: m, noun: phrase.head });
                }
            }
            if (wordKinds.get(phrase.head) === 'Adjective' && clause.objectPhrases.includes(phrase)) {
                adjectives.push(phrase.head);
            }
        }

        const subjects = clause.subjectPhrases.map(p => p.head);
        const objects = clause.objectPhrases.map(p => p.head);
        const base = {
            original,
            tokens,
            subject: subjects[0] ?? null,
            subjects,
            verb: clause.verb,
            verbRelation: clause.verbRelation,
            object: objects[0] ?? null,
            objects,
            adjectives,
            modifiers,
            wordKinds,
            unknownWords,
            greeting,
        };

        if (isQuestion) {
            return {
                ...base,
                sentenceType: 'Question',
                questionType: this.questionType(questionWord, leadingAux, body),
                questionTarget: base.subject ?? base.object,
            };
        }
        if (commandVerb) {
            return { ...base, sentenceType: 'Command', commandVerb, commandTarget: base.object ?? base.subject };
        }
        return { ...base, sentenceType: 'Statement' };
    }

    /**
     * Subject-verb-object triples and adjective-noun pairs carried by a parse.
     */
    extractRelations(parsed: ParsedUtterance): Relation[] {
        const kindOf = (word: string): ConceptKind => parsed.wordKinds.get(word) ?? 'Noun';
        const relations: Relation[] = [];
        const relate = (source: string, attribute: string, target: string) => {
            if (source === target) return;
            relations.push({ source, sourceKind: kindOf(source), attribute, target, targetKind: kindOf(target) });
        };

        const { verb, verbRelation } = parsed;
        if (verbRelation && verbRelation !== 'action') {
            for (const subject of parsed.subjects) {
                for (const object of parsed.objects) {
                    relate(subject, verbRelation, object);
                }
            }
        } else if (verbRelation === 'action' && verb) {
            for (const subject of parsed.subjects) {
                relate(subject, 'can_do', verb);
                relate(verb, 'performed_by', subject);
            }
            for (const object of parsed.objects) {
                relate(verb, 'affects', object);
            }
        }
        for (const { adjective, noun } of parsed.modifiers) {
            relate(noun, 'is', adjective);
            relate(adjective, 'can_describe', noun);
        }
        return relations;
    }

    private statementClause(body: string[], lexicon: Lexicon): Clause {
        const linkIndex = body.findIndex(t => this.vocabulary.relationVerbs.has(t));
        if (linkIndex >= 0) {
            const linkingVerb = body[linkIndex];
            const relation = this.vocabulary.relationVerbs.get(linkingVerb) ?? 'is';
            const subjectPhrases = this.nounPhrases(body.slice(0, linkIndex));
            const nextIndex = body.findIndex((t, i) => i > linkIndex && !this.vocabulary.stopWords.has(t));
            const next = nextIndex >= 0 ? body[nextIndex] : undefined;

            if (next && relation === 'is' && this.isVerbForm(next, lexicon)) {
                // "i am enjoying my morning": the -ing form is the real verb
                return { subjectPhrases, verb: next, verbRelation: 'action', objectPhrases: this.nounPhrases(body.slice(nextIndex + 1)) };
            }
            if (next && relation === 'can_do' && this.isVerbForm(next, lexicon)) {
                return { subjectPhrases, verb: linkingVerb, verbRelation: 'can_do', objectPhrases: [{ head: next, modifiers: [], determined: false }] };
            }
            return { subjectPhrases, verb: linkingVerb, verbRelation: relation, objectPhrases: this.nounPhrases(body.slice(linkIndex + 1)) };
        }

        const verbIndex = body.findIndex(t => this.isVerbForm(t, lexicon) && !this.vocabulary.auxiliaries.has(t));
        if (verbIndex >= 0) {
            return {
                subjectPhrases: this.nounPhrases(body.slice(0, verbIndex)),
                verb: body[verbIndex],
                verbRelation: 'action',
                objectPhrases: this.nounPhrases(body.slice(verbIndex + 1)),
            };
        }
        return { subjectPhrases: this.nounPhrases(body), verb: null, verbRelation: null, objectPhrases: [] };
    }

    /**
     * Clause of a question that starts with an auxiliary: "is a dog friendly", "can a dog bark", "(what) can a dog do".
     */
    private questionClause(aux: string, rest: string[], lexicon: Lexicon): Clause {
        const auxRelation = this.vocabulary.relationVerbs.get(aux) ?? null;
        const verbIndex = rest.findIndex(t => this.isVerbForm(t, lexicon) && !this.vocabulary.auxiliaries.has(t));
        if (verbIndex >= 0) {
            const verb = rest[verbIndex];
            const subjectPhrases = this.nounPhrases(rest.slice(0, verbIndex));
            const objectPhrases = this.nounPhrases(rest.slice(verbIndex + 1));
            // a lone verb ("what is bark") falls through and becomes the subject
            if (subjectPhrases.length > 0 || objectPhrases.length > 0 || auxRelation === 'can_do') {
                if (objectPhrases.length === 0 && auxRelation === 'can_do' && verb !== 'do') {
                    objectPhrases.push({ head: verb, modifiers: [], determined: false });
                }
                return { subjectPhrases, verb, verbRelation: auxRelation ?? 'action', objectPhrases };
            }
        }
        const contentWords = rest.filter(t => !this.vocabulary.stopWords.has(t));
        const [first, ...others] = contentWords;
        const last = others[others.length - 1];
        return {
            subjectPhrases: first ? [{ head: first, modifiers: [], determined: false }] : [],
            verb: aux,
            verbRelation: auxRelation,
            objectPhrases: last ? [{ head: last, modifiers: [], determined: false }] : [],
        };
    }

    /**
     * Splits tokens on conjunctions into noun phrases; the last content word of each is its head.
     */
    private nounPhrases(tokens: readonly string[]): NounPhrase[] {
        const phrases: NounPhrase[] = [];
        let current: string[] = [];
        let determined = false;
        const flush = () => {
            if (current.length > 0) {
                phrases.push({ head: current[current.length - 1], modifiers: current.slice(0, -1), determined });
            }
            current = [];
            determined = false;
        };
        for (const token of tokens) {
            if (this.vocabulary.conjunctions.has(token)) {
                flush();
            } else if (this.vocabulary.determiners.has(token)) {
                determined = true;
            } else if (!this.vocabulary.stopWords.has(token) && !this.vocabulary.questionWords.has(token)
                && !this.vocabulary.auxiliaries.has(token)) {
                current.push(token);
            }
        }
        flush();
        return phrases;
    }

    private objectSlotKind(relation: VerbRelation | null, phrase: NounPhrase): ConceptKind {
        if (relation === 'can_do') return 'Verb';
        if ((relation === 'is' || relation === 'feels_like') && !phrase.determined) return 'Adjective';
        return 'Noun';
    }

    private isVerbForm(word: string, lexicon: Lexicon): boolean {
        if (this.vocabulary.verbs.has(word)) return true;
        const known = lexicon.kindOf(word);
        if (known) return known === 'Verb';
        return word.length > 4 && word.endsWith('ing');
    }

    private questionType(questionWord: string | null, aux: string | null, body: readonly string[]): QuestionType {
        const auxRelation = aux ? this.vocabulary.relationVerbs.get(aux) : undefined;
        if (questionWord === 'how' && aux === 'are' && body[1] === 'you') return 'wellbeing';
        if ((questionWord === 'what' || questionWord === 'who') && auxRelation === 'is') return 'definition';
        if (auxRelation === 'can_do') return 'ability';
        if (!questionWord && auxRelation === 'is') return 'confirmation';
        if (questionWord === 'how') return 'manner';
        return 'general';
    }
}
