import { DEFAULT_HISTORY_LIMIT, DEFAULT_WEIGHTS, ScoringWeights } from '../config';
import { AnswerResult } from '../knowledge/QuestionAnswerer';
import { SentimentClassifier, SentimentResult } from '../language/SentimentClassifier';
import { ParsedUtterance } from '../language/types';
import { PhraseService } from '../services/PhraseService';
import { Logger, RandomSource, capitalize, lowerFirst, pickOne } from '../utils';
import { ScoringContext, scoreCandidate } from './scoring';
import {
    GameStats, GameTurnRecord, GapContext, ResponseCandidate, Strategy, TurnInput, TurnOutcome,
} from './types';

const STATS_HISTORY = 10;
const SUPPORTIVE_OPENERS = ['sorry', 'understand', 'difficult'];

export interface GameEngineOptions {
    weights?: ScoringWeights;
    historyLimit?: number;
    logger?: Logger;
}

/**
 * Picks each reply by generating candidates from several strategies and scoring them.
 * Keeps a running score across turns for the statistics display.
 */
export class GameEngine {
    private readonly weights: ScoringWeights;
    private readonly historyLimit: number;
    private readonly logger: Logger;
    private totalScore = 0;
    private turnCount = 0;
    private history: GameTurnRecord[] = [];

    constructor(
        private readonly phrases: PhraseService,
        private readonly sentiment: SentimentClassifier,
        private readonly random: RandomSource,
        options: GameEngineOptions = {},
    ) {
        this.weights = options.weights ?? DEFAULT_WEIGHTS;
        this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
        this.logger = options.logger ?? new Logger(false);
    }

    playTurn(input: TurnInput): TurnOutcome {
        this.turnCount += 1;
        const sentiment = this.sentiment.classify(input.userText);
        const isQuestion = GameEngine.expectsAnswer(input.parsed);
        const context: ScoringContext = {
            sentiment: sentiment.label,
            hasGap: input.gap !== null,
            isQuestion,
            weights: this.weights,
        };

        const candidates = this.generateCandidates(input, sentiment);
        for (const candidate of candidates) {
            const { total, breakdown } = scoreCandidate(candidate.text, candidate.strategy, context);
            candidate.score = total;
            candidate.breakdown = breakdown;
            this.logger.dbg(`game: ${candidate.strategy} scored ${total.toFixed(1)}: "${candidate.text}"`);
        }
        // Array sort is stable, so equal scores keep generation order.
        const ranked = [...candidates].sort((a, b) => b.score - a.score);
        const eligible = ranked.filter(c => c.breakdown.evil === undefined);

        if (eligible.length === 0) {
            const text = input.baseConfirmation ?? this.phrases.format('system', 'listening');
            return this.record('fallback', text, 0, sentiment, ranked);
        }

        const best = eligible[0];
        const answerer = eligible.find(c => c.strategy === 'answerer');
        if (isQuestion && answerer && answerer.score > 0) {
            return this.record('answerer', answerer.text, answerer.score, sentiment, ranked);
        }
        return this.record(best.strategy, this.hybridize(best, eligible, input.baseConfirmation), best.score, sentiment, ranked);
    }

    /**
     * Candidates in generation order: answerer, learner, empath, connector, elaborator.
     */
    generateCandidates(input: TurnInput, sentiment: SentimentResult): ResponseCandidate[] {
        const candidates: ResponseCandidate[] = [];
        const add = (strategy: Strategy, text: string | undefined, opener?: string) => {
            if (text) candidates.push({ strategy, text, score: 0, breakdown: {}, opener });
        };

        if (input.answer) {
            add('answerer', this.answererText(input.answer, input.gap));
        }
        if (input.gap) {
            add('learner', input.gap.question);
        }
        const empath = this.empathText(sentiment, input.gap);
        add('empath', empath.text, empath.opener);
        add('connector', this.connectorText(input.parsed, input.relatedConcepts));
        if (input.parsed.sentenceType === 'Statement') {
            add('elaborator', this.elaboratorText(input.parsed, input.relatedConcepts));
        }
        return candidates;
    }

    getStats(): GameStats {
        return {
            totalScore: this.totalScore,
            turnCount: this.turnCount,
            averageScore: this.totalScore / Math.max(this.turnCount, 1),
            history: this.history.slice(-STATS_HISTORY),
        };
    }

    reset(): void {
        this.totalScore = 0;
        this.turnCount = 0;
        this.history = [];
    }

    /** Questions and "tell me about" commands both ask for an answer. */
    static expectsAnswer(parsed: ParsedUtterance): boolean {
        return parsed.sentenceType === 'Question' || parsed.sentenceType === 'Command';
    }

    private hybridize(best: ResponseCandidate, eligible: ResponseCandidate[], baseConfirmation: string | null): string {
        const learner = eligible.find(c => c.strategy === 'learner');
        const empath = eligible.find(c => c.strategy === 'empath');

        if (best.strategy === 'empath' && learner && learner.score > 0) {
            // the empath text already carries the learner's question
            return best.text;
        }
        if (best.strategy === 'learner' && empath?.opener && empath.opener.endsWith('.')
            && SUPPORTIVE_OPENERS.some(word => empath.text.toLowerCase().includes(word))) {
            return `${empath.opener} ${best.text}`;
        }
        if (baseConfirmation && (best.strategy === 'learner' || best.strategy === 'elaborator')) {
            return `${baseConfirmation} ${best.text}`;
        }
        return best.text;
    }

    private record(strategy: GameTurnRecord['chosenStrategy'], text: string, score: number,
        sentiment: SentimentResult, candidates: ResponseCandidate[]): TurnOutcome {
        this.totalScore += score;
        const entry: GameTurnRecord = {
            turnNumber: this.turnCount,
            chosenStrategy: strategy,
            score,
            runningTotal: this.totalScore,
        };
        this.history.push(entry);
        if (this.history.length > this.historyLimit) {
            this.history.splice(0, this.history.length - this.historyLimit);
        }
        this.logger.dbg(`game: turn ${entry.turnNumber} -> ${strategy} (${score.toFixed(1)}), total ${this.totalScore.toFixed(1)}`);
        return {
            chosenText: text,
            chosenStrategy: strategy,
            score,
            sentiment,
            candidates,
            turnNumber: entry.turnNumber,
            runningTotal: entry.runningTotal,
        };
    }

    private answererText(answer: AnswerResult, gap: GapContext | null): string {
        if (!answer.answered || answer.confidence <= 0.5) {
            return answer.answer;
        }
        const followUp = gap
            ? this.phrases.format('answerer', 'gapFollowUp', { question: lowerFirst(gap.question) })
            : this.phrases.pick('answerer', 'elaborations', this.random, { concept: answer.concept });
        return answer.answer + followUp;
    }

    private empathText(sentiment: SentimentResult, gap: GapContext | null): { text: string; opener: string } {
        const template = pickOne(this.phrases.templates('empathy', sentiment.label), this.random) ?? '{{continuation}}';
        const continuation = gap
            ? this.phrases.format('empathy', 'gapContinuation', { question: lowerFirst(gap.question) })
            : this.phrases.format('empathy', 'defaultContinuation');
        return {
            text: PhraseService.fill(template, { continuation }).trim(),
            opener: PhraseService.fill(template, { continuation: '' }).trim(),
        };
    }

    private connectorText(parsed: ParsedUtterance, related: readonly string[]): string | undefined {
        const subject = parsed.subject;
        if (!subject || related.length === 0) return undefined;
        const relatedConcept = pickOne(related, this.random);
        if (!relatedConcept) return undefined;
        return this.phrases.pick('connector', 'templates', this.random, {
            subject,
            Subject: capitalize(subject),
            related: relatedConcept,
        });
    }

    private elaboratorText(parsed: ParsedUtterance, related: readonly string[]): string | undefined {
        const topic = parsed.subject ?? parsed.object;
        if (!topic) return undefined;
        const templates = this.phrases.templates('elaborator', 'templates');
        const relatedConcept = pickOne(related, this.random);
        if (relatedConcept) {
            templates.push(this.phrases.format('elaborator', 'related', { related: relatedConcept }));
        }
        const template = pickOne(templates, this.random) ?? '';
        return PhraseService.fill(template, { topic, Topic: capitalize(topic) });
    }
}
