import { CurioConfig } from '../config';
import { ConversationEngine } from '../conversation/ConversationEngine';
import { GapAnalyzer } from '../knowledge/GapAnalyzer';
import { ConceptStore, ConceptStoreOptions } from '../memory/ConceptStore';
import { PhraseService, PhraseServiceDependencies } from '../services/PhraseService';
import { Logger, createRandomSource } from '../utils';

export interface Runtime {
    config: CurioConfig;
    logger: Logger;
    store: ConceptStore;
    phrases: PhraseService;
    engine: ConversationEngine;
}

export interface RuntimeDependencies {
    storeOptions?: Omit<ConceptStoreOptions, 'logger' | 'timeoutMs'>;
    phraseDeps?: PhraseServiceDependencies;
    logger?: Logger;
}

/**
 * Wires the store, phrases and conversation engine for one CLI invocation and loads the memory file.
 */
export async function createRuntime(config: CurioConfig, deps: RuntimeDependencies = {}): Promise<Runtime> {
    const logger = deps.logger ?? new Logger(config.debug);
    const phrases = new PhraseService(config.phrasesConfig, deps.phraseDeps);
    await phrases.loadOverrides();

    const store = ConceptStore.fromState(null, { ...deps.storeOptions, logger, timeoutMs: config.storeTimeoutMs });
    await store.loadMemory(config.memoryFile);

    const engine = new ConversationEngine(store, phrases, {
        logger,
        random: createRandomSource(config.seed),
        useGameEngine: config.useGameEngine,
        weights: config.weights,
        historyLimit: config.historyLimit,
    });
    return { config, logger, store, phrases, engine };
}

/**
 * One line per incomplete concept, most incomplete first.
 */
export function formatGapReport(store: ConceptStore, limit?: number, analyzer: GapAnalyzer = new GapAnalyzer()): string[] {
    const ranked = analyzer.rank(store.listAll());
    const shown = limit === undefined ? ranked : ranked.slice(0, limit);
    return shown.map(({ entity, gaps, completeness }) =>
        `${entity.identity} (${entity.kind}): ${Math.round(completeness * 100)}% complete, missing ${gaps.join(', ')}`);
}
