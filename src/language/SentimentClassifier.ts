import lexicon from '../data/sentiment_lexicon.json';
import { words } from '../utils';

export type SentimentLabel = 'positive' | 'negative' | 'neutral';

export interface SentimentResult {
    label: SentimentLabel;
    /** (positive - negative) / max(positive + negative, 1), in [-1, 1]. */
    score: number;
    positive: number;
    negative: number;
}

export interface SentimentLexicon {
    positive: readonly string[];
    negative: readonly string[];
    intensifiers: readonly string[];
    negators: readonly string[];
}

export const DEFAULT_SENTIMENT_LEXICON: SentimentLexicon = lexicon;

const INTENSIFIER_WEIGHT = 1.5;
const LABEL_THRESHOLD = 0.2;

/**
 * Word-list polarity classifier.
 * An intensifier scales the next sentiment word by 1.5; a negator flips the polarity of the next one.
 * Both reset once a sentiment word has been counted.
 */
export class SentimentClassifier {
    private readonly positive: ReadonlySet<string>;
    private readonly negative: ReadonlySet<string>;
    private readonly intensifiers: ReadonlySet<string>;
    private readonly negators: ReadonlySet<string>;

    constructor(wordLists: SentimentLexicon = DEFAULT_SENTIMENT_LEXICON) {
        this.positive = new Set(wordLists.positive);
        this.negative = new Set(wordLists.negative);
        this.intensifiers = new Set(wordLists.intensifiers);
        this.negators = new Set(wordLists.negators);
    }

    classify(text: string): SentimentResult {
        let positive = 0;
        let negative = 0;
        let intensity = 1.0;
        let negated = false;

        for (const token of words(text)) {
            if (this.intensifiers.has(token)) {
                intensity = INTENSIFIER_WEIGHT;
                continue;
            }
            if (this.negators.has(token)) {
                negated = true;
                continue;
            }
            const isPositive = this.positive.has(token);
            if (!isPositive && !this.negative.has(token)) {
                continue;
            }
            if (isPositive !== negated) {
                positive += intensity;
            } else {
                negative += intensity;
            }
            intensity = 1.0;
            negated = false;
        }

        const score = (positive - negative) / Math.max(positive + negative, 1);
        const label: SentimentLabel = score > LABEL_THRESHOLD ? 'positive' : score < -LABEL_THRESHOLD ? 'negative' : 'neutral';
        return { label, score, positive, negative };
    }
}
