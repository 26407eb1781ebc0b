import { RECENT_SUBJECTS_LIMIT } from '../config';
import { PreconditionViolation } from '../errors';
import { Logger } from '../utils';

export type SessionState = 'Idle' | 'AwaitingPropertyAnswer' | 'AwaitingPosAnswer';

export interface SessionSnapshot {
    awaitingPropertyAnswer: boolean;
    pendingEntityRef: string | null;
    pendingAttributeName: string | null;
    awaitingPosAnswer: boolean;
    pendingPosWord: string | null;
    posQuestionQueue: string[];
    recentSubjects: string[];
}

/**
 * Transient state of one conversation. At most one question is pending at a time:
 * either an attribute of a concept or the part of speech of a word.
 */
export class ConversationSession {
    private awaitingProperty = false;
    private entityRef: string | null = null;
    private attributeName: string | null = null;
    private awaitingPos = false;
    private posWord: string | null = null;
    private posQueue: string[] = [];
    private recent: string[] = [];

    constructor(
        readonly logger: Logger = new Logger(false),
        private readonly recentLimit: number = RECENT_SUBJECTS_LIMIT,
    ) {}

    get state(): SessionState {
        if (this.awaitingPos) return 'AwaitingPosAnswer';
        if (this.awaitingProperty) return 'AwaitingPropertyAnswer';
        return 'Idle';
    }

    get awaitingPropertyAnswer(): boolean {
        return this.awaitingProperty;
    }

    get pendingEntityRef(): string | null {
        return this.entityRef;
    }

    get pendingAttributeName(): string | null {
        return this.attributeName;
    }

    get awaitingPosAnswer(): boolean {
        return this.awaitingPos;
    }

    get pendingPosWord(): string | null {
        return this.posWord;
    }

    get posQuestionQueue(): readonly string[] {
        return this.posQueue;
    }

    /** Subjects of recent turns, newest last. */
    get recentSubjects(): readonly string[] {
        return this.recent;
    }

    askProperty(identity: string, attributeName: string): void {
        if (this.awaitingPos) {
            throw new PreconditionViolation('ConversationSession: cannot ask about an attribute while a part of speech is pending.');
        }
        this.awaitingProperty = true;
        this.entityRef = identity;
        this.attributeName = attributeName;
    }

    clearProperty(): void {
        this.awaitingProperty = false;
        this.entityRef = null;
        this.attributeName = null;
    }

    /**
     * Queues words whose part of speech is unknown and makes the first one pending.
     * Returns the pending word.
     */
    askPos(words: readonly string[]): string | undefined {
        this.clearProperty();
        for (const word of words) {
            if (word !== this.posWord && !this.posQueue.includes(word)) {
                this.posQueue.push(word);
            }
        }
        return this.posWord ?? this.nextPos();
    }

    /**
     * Pops the next queued word into the pending slot; with an empty queue the session returns to Idle.
     */
    nextPos(): string | undefined {
        const next = this.posQueue.shift();
        this.awaitingPos = next !== undefined;
        this.posWord = next ?? null;
        return next;
    }

    rememberSubject(identity: string): void {
        this.recent = this.recent.filter(s => s !== identity);
        this.recent.push(identity);
        if (this.recent.length > this.recentLimit) {
            this.recent.shift();
        }
    }

    snapshot(): SessionSnapshot {
        return {
            awaitingPropertyAnswer: this.awaitingProperty,
            pendingEntityRef: this.entityRef,
            pendingAttributeName: this.attributeName,
            awaitingPosAnswer: this.awaitingPos,
            pendingPosWord: this.posWord,
            posQuestionQueue: [...this.posQueue],
            recentSubjects: [...this.recent],
        };
    }

    restore(snapshot: SessionSnapshot): void {
        this.awaitingProperty = snapshot.awaitingPropertyAnswer;
        this.entityRef = snapshot.pendingEntityRef;
        this.attributeName = snapshot.pendingAttributeName;
        this.awaitingPos = snapshot.awaitingPosAnswer;
        this.posWord = snapshot.pendingPosWord;
        this.posQueue = [...snapshot.posQuestionQueue];
        this.recent = [...snapshot.recentSubjects];
    }
}
