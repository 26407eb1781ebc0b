export type SayFn = (s: string) => void;
export type DbgFn = (s: string) => void;

export function dbg(s: string) {
    console.debug(s);
}

export function say(s: string) {
    console.log(s);
}

/**
 * A logger handle owned by a conversation session.
 * `say` always prints; `dbg` prints only while debug output is enabled for that session.
 */
export class Logger {
    private debugEnabled: boolean;

    constructor(debugEnabled = false, private readonly sayFn: SayFn = say, private readonly dbgFn: DbgFn = dbg) {
        this.debugEnabled = debugEnabled;
    }

    get debug(): boolean {
        return this.debugEnabled;
    }

    setDebug(enabled: boolean): void {
        this.debugEnabled = enabled;
    }

    say(s: string): void {
        this.sayFn(s);
    }

    dbg(s: string): void {
        if (this.debugEnabled) {
            this.dbgFn(`[debug] ${s}`);
        }
    }
}

/**
 * Source of pseudo-random numbers in [0, 1). Injected wherever a template or a related concept is picked.
 */
export interface RandomSource {
    next(): number;
}

/**
 * Seeded pseudo-random number generator (Mulberry32).
 */
export function mulberry32(seed: number): RandomSource {
    let state = seed >>> 0;
    return {
        next(): number {
            let t = state += 0x6D2B79F5;
            t = Math.imul(t ^ t >>> 15, t | 1);
            t ^= t + Math.imul(t ^ t >>> 7, t | 61);
            return ((t ^ t >>> 14) >>> 0) / 4294967296;
        }
    };
}

export const mathRandom: RandomSource = { next: () => Math.random() };

export function createRandomSource(seed?: number): RandomSource {
    return seed === undefined ? mathRandom : mulberry32(seed);
}

/**
 * Picks one element using the given random source. Returns undefined for an empty list.
 */
export function pickOne<T>(items: readonly T[], random: RandomSource): T | undefined {
    if (items.length === 0) return undefined;
    const index = Math.min(Math.floor(random.next() * items.length), items.length - 1);
    return items[index];
}

export function capitalize(s: string): string {
    return s.length === 0 ? s : s[0].toUpperCase() + s.slice(1);
}

/**
 * Lower-cased words of a text with surrounding punctuation trimmed. Inner apostrophes are kept ("don't").
 */
export function words(text: string): string[] {
    return text
        .toLowerCase()
        .split(/\s+/)
        .map(w => w.replace(/^[^a-z0-9']+|[^a-z0-9']+$/g, '').replace(/^'+|'+$/g, ''))
        .filter(w => w.length > 0);
}

export function lowerFirst(s: string): string {
    return s.length === 0 ? s : s[0].toLowerCase() + s.slice(1);
}
