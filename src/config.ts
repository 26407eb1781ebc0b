// Default paths and constants
export const DEFAULT_MEMORY_FILE_PATH = 'curio_memory.json';
export const DEFAULT_STORE_TIMEOUT_MS = 5000;
export const DEFAULT_HISTORY_LIMIT = 50;
export const RECENT_SUBJECTS_LIMIT = 5;
export const RELATED_CONCEPTS_LIMIT = 5;

export interface ScoringWeights {
    happiness: number;
    knowledge: number;
    flow: number;
}

export const DEFAULT_WEIGHTS: ScoringWeights = {
    happiness: 1.5,
    knowledge: 2.0,
    flow: 1.0,
};

export interface CurioConfig {
    memoryFile: string;
    phrasesConfig?: string;
    debug: boolean;
    seed?: number;
    useGameEngine: boolean;
    storeTimeoutMs: number;
    historyLimit: number;
    weights: ScoringWeights;
}

export const DEFAULT_CONFIG: CurioConfig = {
    memoryFile: DEFAULT_MEMORY_FILE_PATH,
    debug: false,
    useGameEngine: true,
    storeTimeoutMs: DEFAULT_STORE_TIMEOUT_MS,
    historyLimit: DEFAULT_HISTORY_LIMIT,
    weights: DEFAULT_WEIGHTS,
};

type Env = Record<string, string | undefined>;

function numberFrom(value: string | undefined, name: string): number | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        throw new Error(`Invalid numeric value for ${name}: "${value}"`);
    }
    return parsed;
}

function booleanFrom(value: string | undefined): boolean | undefined {
    if (value === undefined) return undefined;
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Builds the configuration from environment variables (after dotenv has populated them) on top of the defaults.
 * Command line options are applied later by the caller.
 */
export function loadConfigFromEnv(env: Env = process.env): CurioConfig {
    return {
        memoryFile: env.CURIO_MEMORY_FILE || DEFAULT_CONFIG.memoryFile,
        phrasesConfig: env.CURIO_PHRASES_CONFIG || undefined,
        debug: booleanFrom(env.CURIO_DEBUG) ?? DEFAULT_CONFIG.debug,
        seed: numberFrom(env.CURIO_SEED, 'CURIO_SEED'),
        useGameEngine: booleanFrom(env.CURIO_GAME_ENGINE) ?? DEFAULT_CONFIG.useGameEngine,
        storeTimeoutMs: numberFrom(env.CURIO_STORE_TIMEOUT_MS, 'CURIO_STORE_TIMEOUT_MS') ?? DEFAULT_CONFIG.storeTimeoutMs,
        historyLimit: DEFAULT_CONFIG.historyLimit,
        weights: {
            happiness: numberFrom(env.CURIO_WEIGHT_HAPPINESS, 'CURIO_WEIGHT_HAPPINESS') ?? DEFAULT_WEIGHTS.happiness,
            knowledge: numberFrom(env.CURIO_WEIGHT_KNOWLEDGE, 'CURIO_WEIGHT_KNOWLEDGE') ?? DEFAULT_WEIGHTS.knowledge,
            flow: numberFrom(env.CURIO_WEIGHT_FLOW, 'CURIO_WEIGHT_FLOW') ?? DEFAULT_WEIGHTS.flow,
        },
    };
}

/** Global command line options; every one is optional and overrides the environment. */
export interface CliOptions {
    memoryFile?: string;
    phrasesConfig?: string;
    seed?: number;
    debug?: boolean;
    /** False when `--no-game` is given. */
    game?: boolean;
}

export function applyCliOptions(config: CurioConfig, options: CliOptions): CurioConfig {
    return {
        ...config,
        memoryFile: options.memoryFile ?? config.memoryFile,
        phrasesConfig: options.phrasesConfig ?? config.phrasesConfig,
        seed: options.seed ?? config.seed,
        debug: options.debug ?? config.debug,
        useGameEngine: options.game === false ? false : config.useGameEngine,
    };
}
