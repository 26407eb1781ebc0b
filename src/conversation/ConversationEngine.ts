import { DEFAULT_CONFIG, RELATED_CONCEPTS_LIMIT, ScoringWeights } from '../config';
import { GameEngine } from '../engine/GameEngine';
import { GapContext } from '../engine/types';
import { AmbiguousInputError, PreconditionViolation, errorMessage } from '../errors';
import { GapAnalyzer } from '../knowledge/GapAnalyzer';
import { DEFAULT_SCHEMA, KnowledgeSchema, baseAttributeName } from '../knowledge/knowledgeSchema';
import { AnswerResult, QuestionAnswerer } from '../knowledge/QuestionAnswerer';
import { QuestionGenerator } from '../knowledge/QuestionGenerator';
import { InputParser } from '../language/InputParser';
import { SentimentClassifier } from '../language/SentimentClassifier';
import { Lexicon, ParsedUtterance, Relation } from '../language/types';
import { VocabularyLexicon, composeLexicons } from '../language/vocabulary';
import { ConceptEntity } from '../memory/ConceptEntity';
import { ConceptStore } from '../memory/ConceptStore';
import { ConceptKind } from '../memory/concept_types';
import { PhraseService } from '../services/PhraseService';
import { Logger, RandomSource, mathRandom } from '../utils';
import { ConversationSession } from './ConversationSession';

export type ResponseKind =
    | 'empty' | 'quit' | 'stats' | 'help' | 'command' | 'greeting'
    | 'asking' | 'nothing_to_ask'
    | 'asking_pos' | 'pos_answered' | 'pos_answered_asking_next' | 'pos_clarification'
    | 'pass' | 'clarification' | 'learned_answer'
    | 'learned' | 'learned_and_asking'
    | 'answered' | 'answered_and_asking'
    | 'error';

export interface TurnResponse {
    kind: ResponseKind;
    message: string;
    /** The question now pending, if this turn asked one. */
    question?: string;
    objectsUpdated: number;
}

export interface ConversationEngineOptions {
    logger?: Logger;
    random?: RandomSource;
    useGameEngine?: boolean;
    weights?: ScoringWeights;
    historyLimit?: number;
    schema?: KnowledgeSchema;
}

const QUIT_COMMANDS = ['quit', 'exit', 'bye'];

/**
 * Routes each utterance through the conversation state machine and produces the reply.
 */
export class ConversationEngine {
    readonly session: ConversationSession;
    readonly game: GameEngine;
    private readonly parser: InputParser;
    private readonly lexicon: Lexicon;
    private readonly gaps: GapAnalyzer;
    private readonly questions: QuestionGenerator;
    private readonly answerer: QuestionAnswerer;
    private readonly useGameEngine: boolean;

    constructor(
        private readonly store: ConceptStore,
        private readonly phrases: PhraseService,
        options: ConversationEngineOptions = {},
    ) {
        const random = options.random ?? mathRandom;
        const schema = options.schema ?? DEFAULT_SCHEMA;
        this.session = new ConversationSession(options.logger ?? new Logger(false));
        this.lexicon = composeLexicons(store, new VocabularyLexicon());
        this.parser = new InputParser(this.lexicon);
        this.gaps = new GapAnalyzer(schema);
        this.questions = new QuestionGenerator(phrases, schema);
        this.answerer = new QuestionAnswerer(store, phrases, random, schema);
        this.game = new GameEngine(phrases, new SentimentClassifier(), random, {
            weights: options.weights ?? DEFAULT_CONFIG.weights,
            historyLimit: options.historyLimit ?? DEFAULT_CONFIG.historyLimit,
            logger: this.session.logger,
        });
        this.useGameEngine = options.useGameEngine ?? DEFAULT_CONFIG.useGameEngine;
    }

    private get logger(): Logger {
        return this.session.logger;
    }

    /**
     * Handles one utterance. Recoverable failures become an apologetic `error` reply and leave
     * the session as it was before the turn; a PreconditionViolation propagates.
     */
    processTurn(rawText: string): TurnResponse {
        const text = rawText.trim();
        const control = this.handleControl(text);
        if (control) return control;

        const snapshot = this.session.snapshot();
        try {
            if (this.session.awaitingPosAnswer) return this.handlePosAnswer(text);
            if (this.session.awaitingPropertyAnswer) return this.handlePropertyAnswer(text);
            if (!text) return this.reply('empty', this.phrases.format('system', 'empty'));
            return this.handleUtterance(this.parser.parse(text, this.lexicon));
        } catch (error) {
            if (error instanceof PreconditionViolation) throw error;
            this.session.restore(snapshot);
            this.logger.dbg(`turn failed: ${errorMessage(error)}`);
            return this.reply('error', this.phrases.format('system', 'error'));
        }
    }

    /** Store counts and game score as a printable summary. */
    describeStats(): string {
        const counts = this.store.countByKind();
        const game = this.game.getStats();
        return [
            this.phrases.format('system', 'stats', {
                total: this.store.size,
                nouns: counts.Noun,
                verbs: counts.Verb,
                adjectives: counts.Adjective,
                facts: this.store.attributeCount,
            }),
            this.phrases.format('system', 'gameStats', {
                total: game.totalScore.toFixed(1),
                turns: game.turnCount,
                average: game.averageScore.toFixed(1),
            }),
        ].join('\n');
    }

    private handleControl(text: string): TurnResponse | undefined {
        const command = text.toLowerCase();
        if (QUIT_COMMANDS.includes(command)) return this.reply('quit', this.phrases.format('system', 'goodbye'));
        if (command === 'stats') return this.reply('stats', this.describeStats());
        if (command === 'help') return this.reply('help', this.phrases.format('system', 'help'));
        if (command === 'debug on' || command === 'debug off') {
            const enabled = command === 'debug on';
            this.logger.setDebug(enabled);
            return this.reply('command', this.phrases.format('system', enabled ? 'debugOn' : 'debugOff'));
        }
        if (command === '?') return this.askSomething();
        return undefined;
    }

    /**
     * Bare "?": asks about the first stored concept with a gap. A question already pending is asked again.
     */
    private askSomething(): TurnResponse {
        const { pendingPosWord, pendingEntityRef, pendingAttributeName } = this.session;
        if (pendingPosWord) {
            const question = this.questions.generatePosQuestion(pendingPosWord);
            return this.reply('asking_pos', question, question);
        }
        if (pendingEntityRef && pendingAttributeName) {
            const question = this.questions.generateQuestion(
                pendingEntityRef, pendingAttributeName, this.store.kindOf(pendingEntityRef) ?? 'Noun');
            return this.reply('asking', question, question);
        }
        const gap = this.gaps.findFirstGap(this.store.listAll());
        if (!gap) return this.reply('nothing_to_ask', this.phrases.format('system', 'nothingToAsk'));
        const question = this.questions.generateQuestion(gap.entity.identity, gap.attributeName, gap.entity.kind);
        this.session.askProperty(gap.entity.identity, gap.attributeName);
        return this.reply('asking', question, question);
    }

    private handlePosAnswer(text: string): TurnResponse {
        const word = this.session.pendingPosWord;
        if (!word) {
            throw new PreconditionViolation('ConversationSession: awaiting a part of speech without a pending word.');
        }
        const kind = ConversationEngine.matchPartOfSpeech(text);
        if (!kind) {
            this.logger.dbg(`pos: no part of speech in "${text}" for "${word}"`);
            return this.reply('pos_clarification', this.questions.generatePosClarification(word), this.questions.generatePosQuestion(word));
        }

        this.store.assignKind(word, kind);
        const confirmation = this.questions.generatePosConfirmation(word, kind);
        const next = this.session.nextPos();
        if (next) {
            const question = this.questions.generatePosQuestion(next);
            return this.reply('pos_answered_asking_next', `${confirmation} ${question}`, question, 1);
        }
        return this.reply('pos_answered', `${confirmation} ${this.phrases.format('pos', 'retry')}`, undefined, 1);
    }

    private handlePropertyAnswer(text: string): TurnResponse {
        const identity = this.session.pendingEntityRef;
        const attributeName = this.session.pendingAttributeName;
        if (!identity || !attributeName) {
            throw new PreconditionViolation('ConversationSession: awaiting an answer without a pending question.');
        }
        if (!text || this.parser.isPassWord(text.toLowerCase())) {
            this.session.clearProperty();
            return this.reply('pass', this.phrases.format('system', 'pass'));
        }

        const parsed = this.resolvePendingSubject(this.parser.parse(text, this.lexicon), identity);
        if (this.isNewStatement(parsed, identity, attributeName)) {
            this.logger.dbg(`answer "${text}" is a new statement, dropping the question about ${identity}.${attributeName}`);
            this.session.clearProperty();
            return this.handleUtterance(parsed);
        }

        let value: string;
        try {
            value = this.extractAnswerValue(parsed, identity, attributeName);
        } catch (error) {
            if (!(error instanceof AmbiguousInputError)) throw error;
            this.logger.dbg(error.message);
            const question = this.questions.generateQuestion(identity, attributeName, this.store.kindOf(identity) ?? 'Noun');
            return this.reply('clarification', this.phrases.format('system', 'clarification'), question);
        }

        const entity = this.store.load(identity) ?? this.store.createOrGet(identity, 'Noun');
        entity.learn(attributeName, value);
        this.store.save(entity);
        this.session.clearProperty();
        this.session.rememberSubject(entity.identity);
        this.logger.dbg(`learned ${entity.identity}.${attributeName} = ${value} (weight ${this.store.getWeight(entity.identity, attributeName, value)})`);
        return this.reply('learned_answer', this.questions.generateConfirmation(entity.identity, attributeName, value), undefined, 1);
    }

    private handleUtterance(parsed: ParsedUtterance): TurnResponse {
        this.logger.dbg(`parse: ${parsed.sentenceType} subject=${parsed.subject} verb=${parsed.verb} object=${parsed.object} unknown=[${parsed.unknownWords.join(', ')}]`);
        const greeting = parsed.greeting ? this.phrases.format('system', 'greeting') : null;
        const withGreeting = (message: string) => greeting ? `${greeting} ${message}` : message;

        if (greeting && !parsed.subject && !parsed.object && !parsed.verb) {
            return this.reply('greeting', withGreeting(this.phrases.format('system', 'welcome')));
        }

        if (parsed.sentenceType === 'Statement' && parsed.unknownWords.length > 0) {
            const word = this.session.askPos(parsed.unknownWords);
            if (word) {
                const question = this.questions.generatePosQuestion(word);
                return this.reply('asking_pos', withGreeting(question), question);
            }
        }

        if (parsed.sentenceType === 'Command' && !parsed.commandTarget) {
            return this.reply('clarification', withGreeting(this.phrases.format('system', 'clarification')));
        }

        let touched: ConceptEntity[];
        let baseMessage: string;
        let answer: AnswerResult | null = null;
        if (parsed.sentenceType === 'Statement') {
            const relations = this.parser.extractRelations(parsed);
            touched = this.learnStatement(parsed, relations);
            baseMessage = this.confirm(relations);
        } else {
            answer = parsed.sentenceType === 'Question'
                ? this.answerer.answerQuestion(parsed)
                : this.answerer.describe(parsed.commandTarget ?? '');
            const concept = answer.answered ? this.store.load(answer.concept) : undefined;
            touched = concept ? [concept] : [];
            baseMessage = answer.answer;
        }

        const finding = this.gaps.findFirstGap(touched);
        const gap: GapContext | null = finding ? {
            concept: finding.entity.identity,
            kind: finding.entity.kind,
            attributeName: finding.attributeName,
            question: this.questions.generateQuestion(finding.entity.identity, finding.attributeName, finding.entity.kind),
        } : null;

        let message = baseMessage;
        if (this.useGameEngine) {
            const outcome = this.game.playTurn({
                userText: parsed.original,
                parsed,
                gap,
                relatedConcepts: this.relatedConcepts(parsed.subject),
                baseConfirmation: parsed.sentenceType === 'Statement' ? baseMessage : null,
                answer,
            });
            message = outcome.chosenText;
        }

        for (const subject of parsed.subjects) {
            if (this.store.has(subject)) this.session.rememberSubject(subject);
        }

        const learnedKind = parsed.sentenceType === 'Statement' ? 'learned' : 'answered';
        if (!gap) {
            return this.reply(learnedKind, withGreeting(message), undefined, parsed.sentenceType === 'Statement' ? touched.length : 0);
        }
        if (!message.toLowerCase().includes(gap.question.toLowerCase())) {
            message = `${message} ${gap.question}`;
        }
        this.session.askProperty(gap.concept, gap.attributeName);
        this.logger.dbg(`gap: ${gap.concept}.${gap.attributeName}`);
        return this.reply(
            learnedKind === 'learned' ? 'learned_and_asking' : 'answered_and_asking',
            withGreeting(message),
            gap.question,
            parsed.sentenceType === 'Statement' ? touched.length : 0,
        );
    }

    /**
     * Writes the statement's relations with numbered keys and saves every concept it mentions.
     * Returns the touched concepts in order of first mention.
     */
    private learnStatement(parsed: ParsedUtterance, relations: readonly Relation[]): ConceptEntity[] {
        const touched = new Map<string, ConceptEntity>();
        const touch = (identity: string, kind: ConceptKind): ConceptEntity => {
            const existing = touched.get(identity);
            if (existing) return existing;
            const entity = this.store.createOrGet(identity, kind);
            touched.set(entity.identity, entity);
            return entity;
        };
        const kindOf = (word: string): ConceptKind => parsed.wordKinds.get(word) ?? 'Noun';

        parsed.subjects.forEach(s => touch(s, kindOf(s)));
        parsed.objects.forEach(o => touch(o, kindOf(o)));
        if (parsed.verb && parsed.verbRelation === 'action') {
            touch(parsed.verb, 'Verb');
        }
        for (const relation of relations) {
            const source = touch(relation.source, relation.sourceKind);
            touch(relation.target, relation.targetKind);
            const slot = source.learnInNextSlot(relation.attribute, relation.target);
            this.logger.dbg(slot
                ? `relation: ${relation.source}.${slot} = ${relation.target}`
                : `relation: ${relation.source} already has ${relation.attribute} = ${relation.target}`);
        }
        for (const entity of touched.values()) {
            this.store.save(entity);
        }
        return [...touched.values()];
    }

    private confirm(relations: readonly Relation[]): string {
        const first = relations[0];
        if (!first) return this.phrases.format('confirmations', 'nothingLearned');
        return this.questions.generateConfirmation(first.source, first.attribute, first.target);
    }

    /**
     * Reads a statement whose subject is a pronoun or a plural of the pending concept ("It can bark.",
     * "Dogs can bark.") as a statement about the pending concept.
     */
    private resolvePendingSubject(parsed: ParsedUtterance, identity: string): ParsedUtterance {
        if (parsed.sentenceType !== 'Statement' || !parsed.subjects.some(s => this.parser.refersTo(s, identity))) {
            return parsed;
        }
        const subjects = [...new Set(parsed.subjects.map(s => this.parser.refersTo(s, identity) ? identity : s))];
        const wordKinds = new Map(parsed.wordKinds);
        wordKinds.set(identity, this.store.kindOf(identity) ?? 'Noun');
        return { ...parsed, subject: subjects[0] ?? null, subjects, wordKinds };
    }

    /**
     * A statement given while an answer is pending is an answer unless it has a subject and a verb
     * and is about another concept (a stored one, or one with an object) or another relation.
     */
    private isNewStatement(parsed: ParsedUtterance, identity: string, attributeName: string): boolean {
        if (parsed.sentenceType !== 'Statement') return true;
        if (!parsed.subject || !parsed.verbRelation) return false;
        if (parsed.subject !== identity) return parsed.object !== null || this.store.has(parsed.subject);
        if (!parsed.object && parsed.verbRelation !== 'action') return false;
        const relation = parsed.verbRelation === 'action' ? 'can_do' : parsed.verbRelation;
        return relation !== baseAttributeName(attributeName);
    }

    /**
     * The answer's object, else its action verb, else its first content word.
     * For a `can_do` question the action verb comes first, in its base form.
     */
    private extractAnswerValue(parsed: ParsedUtterance, identity: string, attributeName: string): string {
        const action = parsed.verbRelation === 'action' ? parsed.verb : null;
        const ability = baseAttributeName(attributeName) === 'can_do';
        const [first, second] = ability ? [action, parsed.object] : [parsed.object, action];
        const value = first
            ?? second
            ?? this.parser.firstContentToken(parsed.tokens.filter(t => !this.parser.refersTo(t, identity)));
        if (!value) {
            throw new AmbiguousInputError(parsed.original);
        }
        return ability ? this.parser.verbStem(value) : value;
    }

    /**
     * Recent subjects and concepts linked to the subject through stored attributes, excluding the subject.
     */
    private relatedConcepts(subject: string | null): string[] {
        if (!subject) return [];
        const related: string[] = [];
        const add = (identity: string) => {
            if (identity !== subject && !related.includes(identity) && this.store.has(identity)) {
                related.push(identity);
            }
        };
        this.session.recentSubjects.forEach(add);
        this.store.load(subject)?.attributes.entries().forEach(([, value]) => add(value));
        this.store.findByValue(subject).forEach(add);
        return related.slice(0, RELATED_CONCEPTS_LIMIT);
    }

    private reply(kind: ResponseKind, message: string, question?: string, objectsUpdated = 0): TurnResponse {
        return question === undefined ? { kind, message, objectsUpdated } : { kind, message, question, objectsUpdated };
    }

    /** Case-insensitive substring match, checked as noun, verb, adjective. */
    static matchPartOfSpeech(text: string): ConceptKind | undefined {
        const lower = text.toLowerCase();
        if (lower.includes('noun')) return 'Noun';
        if (lower.includes('verb')) return 'Verb';
        if (lower.includes('adjective') || lower.includes('adj')) return 'Adjective';
        return undefined;
    }
}
