import { AnswerResult } from '../knowledge/QuestionAnswerer';
import { SentimentResult } from '../language/SentimentClassifier';
import { ParsedUtterance } from '../language/types';
import { ConceptKind } from '../memory/concept_types';

/** Candidate strategies in generation order, which is also the tie-break order. */
export const STRATEGIES = ['answerer', 'learner', 'empath', 'connector', 'elaborator'] as const;

export type Strategy = typeof STRATEGIES[number];

export type ChosenStrategy = Strategy | 'fallback';

export interface ScoreBreakdown {
    evil?: number;
    happiness?: number;
    knowledge?: number;
    flow?: number;
    personality?: number;
    answererBonus?: number;
}

export interface ResponseCandidate {
    strategy: Strategy;
    text: string;
    score: number;
    breakdown: ScoreBreakdown;
    /** Empath only: the sympathetic sentence without its continuation. */
    opener?: string;
}

/** A missing attribute the turn could ask about. */
export interface GapContext {
    concept: string;
    kind: ConceptKind;
    attributeName: string;
    question: string;
}

export interface TurnInput {
    userText: string;
    parsed: ParsedUtterance;
    gap: GapContext | null;
    /** Identities of concepts related to the turn's subject. */
    relatedConcepts: readonly string[];
    baseConfirmation: string | null;
    answer: AnswerResult | null;
}

export interface TurnOutcome {
    chosenText: string;
    chosenStrategy: ChosenStrategy;
    score: number;
    sentiment: SentimentResult;
    /** Every generated candidate, best first, vetoed ones included. */
    candidates: ResponseCandidate[];
    turnNumber: number;
    runningTotal: number;
}

export interface GameTurnRecord {
    turnNumber: number;
    chosenStrategy: ChosenStrategy;
    score: number;
    runningTotal: number;
}

export interface GameStats {
    totalScore: number;
    turnCount: number;
    averageScore: number;
    /** Most recent records, oldest first. */
    history: GameTurnRecord[];
}
