import { ScoringWeights } from '../config';
import { SentimentLabel } from '../language/SentimentClassifier';
import { words } from '../utils';
import { ScoreBreakdown, Strategy } from './types';

export const EVIL_WORDS: ReadonlySet<string> = new Set(['hate', 'hurt', 'kill', 'destroy', 'stupid', 'ugly', 'die']);
export const GOOD_WORDS: ReadonlySet<string> = new Set(['help', 'good', 'friend', 'happy', 'love', 'care', 'kind']);
export const SUPPORTIVE_PHRASES = ['sorry', 'understand', 'difficult', 'hard', 'hope', 'better', 'here for you'];
export const CELEBRATORY_PHRASES = ['great', 'wonderful', 'glad', 'excited', 'congratulations', 'amazing'];
export const DEAD_END_RESPONSES: ReadonlySet<string> = new Set(['okay', 'ok', 'yes', 'no', 'sure', 'fine', 'alright']);
export const CONNECTIVE_PHRASES = ['reminds me', 'speaking of', 'that makes me think', 'related to'];

export const EVIL_PENALTY = -1000;
export const ANSWERER_BONUS = 15;
const HAPPINESS_CAP = 10;

export interface ScoringContext {
    sentiment: SentimentLabel;
    hasGap: boolean;
    isQuestion: boolean;
    weights: ScoringWeights;
}

export interface Score {
    total: number;
    breakdown: ScoreBreakdown;
}

export function containsEvil(text: string): boolean {
    return words(text).some(word => EVIL_WORDS.has(word));
}

/** +3 for each supportive (negative mood) or celebratory (positive mood) phrase, at most 10. */
export function happinessScore(text: string, sentiment: SentimentLabel): number {
    const lower = text.toLowerCase();
    const phrases = sentiment === 'negative' ? SUPPORTIVE_PHRASES : sentiment === 'positive' ? CELEBRATORY_PHRASES : [];
    const hits = phrases.filter(phrase => lower.includes(phrase)).length;
    return Math.min(hits * 3, HAPPINESS_CAP);
}

export function knowledgeScore(text: string, hasGap: boolean): number {
    if (!text.includes('?')) return 0;
    return hasGap ? 10 : 5;
}

export function flowScore(text: string): number {
    const lower = text.trim().toLowerCase();
    const wordCount = lower.split(/\s+/).filter(w => w.length > 0).length;
    let score = 0;
    if (DEAD_END_RESPONSES.has(lower) || wordCount <= 2) score -= 5;
    if (text.trim().endsWith('?')) score += 5;
    if (wordCount > 10) score += 2;
    if (CONNECTIVE_PHRASES.some(phrase => lower.includes(phrase))) score += 3;
    return score;
}

export function personalityBonus(text: string): number {
    const found = new Set(words(text).filter(word => GOOD_WORDS.has(word)));
    return found.size * 2;
}

/**
 * Utility of one candidate. A banned word short-circuits to the evil penalty.
 */
export function scoreCandidate(text: string, strategy: Strategy, context: ScoringContext): Score {
    if (containsEvil(text)) {
        return { total: EVIL_PENALTY, breakdown: { evil: EVIL_PENALTY } };
    }
    const breakdown: ScoreBreakdown = {
        happiness: happinessScore(text, context.sentiment) * context.weights.happiness,
        knowledge: knowledgeScore(text, context.hasGap) * context.weights.knowledge,
        flow: flowScore(text) * context.weights.flow,
        personality: personalityBonus(text),
    };
    if (context.isQuestion && strategy === 'answerer') {
        breakdown.answererBonus = ANSWERER_BONUS;
    }
    const total = Object.values(breakdown).reduce((sum: number, value) => sum + (value ?? 0), 0);
    return { total, breakdown };
}
