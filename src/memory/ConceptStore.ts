import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { AttributeBag } from './AttributeBag';
import { ConceptEntity } from './ConceptEntity';
import {
    AttributeRecord, ConceptKind, ConceptRecord, ConceptStoreState, DEFAULT_STORE_STATE,
    isConceptKind, normalizeIdentity,
} from './concept_types';
import { PreconditionViolation, TransientStoreFailure, errorMessage } from '../errors';
import { Logger } from '../utils';
import { DEFAULT_STORE_TIMEOUT_MS } from '../config';

type ReadFileFn = (path: string) => Promise<string>;
type WriteFileFn = (path: string, data: string) => Promise<void>;

export interface ConceptStoreOptions {
    /** Function used to read files, allowing for dependency injection (e.g., for testing). */
    readFile?: ReadFileFn;
    /** Function used to write files, allowing for dependency injection (e.g., for testing). */
    writeFile?: WriteFileFn;
    logger?: Logger;
    /** Upper bound for a single persistence call. */
    timeoutMs?: number;
    newId?: () => string;
    now?: () => Date;
}

function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
    });
    return Promise.race([operation, timeout]).finally(() => clearTimeout(timer));
}

function cloneState(state: ConceptStoreState): ConceptStoreState {
    return structuredClone(state);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasErrorCode(error: unknown, code: string): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/**
 * Validates a parsed memory file. Unknown kinds and malformed rows are rejected rather than silently dropped.
 */
function validateState(data: unknown, source: string): ConceptStoreState {
    if (typeof data !== 'object' || data === null || !('concepts' in data) || !('attributes' in data)
        || !Array.isArray(data.concepts) || !Array.isArray(data.attributes)) {
        throw new Error(`ConceptStore: ${source} does not contain "concepts" and "attributes" lists.`);
    }
    const concepts: ConceptRecord[] = data.concepts.map((row: unknown, i: number) => {
        if (!isRecord(row)) throw new Error(`ConceptStore: concept #${i} in ${source} is not an object.`);
        const { id, identity, kind, createdAt, updatedAt } = row;
        if (typeof identity !== 'string' || !isConceptKind(kind)) {
            throw new Error(`ConceptStore: concept #${i} in ${source} has no identity or an unknown kind.`);
        }
        return {
            id: typeof id === 'string' ? id : uuidv4(),
            identity: normalizeIdentity(identity),
            kind,
            createdAt: typeof createdAt === 'string' ? createdAt : new Date(0).toISOString(),
            updatedAt: typeof updatedAt === 'string' ? updatedAt : new Date(0).toISOString(),
        };
    });
    const attributes: AttributeRecord[] = data.attributes.map((row: unknown, i: number) => {
        if (!isRecord(row)) throw new Error(`ConceptStore: attribute #${i} in ${source} is not an object.`);
        const { parentIdentity, attributeName, attributeValue, weight, createdAt } = row;
        if (typeof parentIdentity !== 'string' || typeof attributeName !== 'string' || typeof attributeValue !== 'string') {
            throw new Error(`ConceptStore: attribute #${i} in ${source} is missing its parent, name or value.`);
        }
        return {
            parentIdentity: normalizeIdentity(parentIdentity),
            attributeName,
            attributeValue,
            weight: typeof weight === 'number' && weight > 0 ? weight : 1,
            createdAt: typeof createdAt === 'string' ? createdAt : new Date(0).toISOString(),
        };
    });
    return { concepts, attributes };
}

/**
 * Owns every concept and attribute row. Reads and writes are synchronous against the in-memory tables;
 * the tables are loaded from and saved to a JSON file at the session boundary.
 */
export class ConceptStore {
    /** The file path where the store is persisted. Null if not yet loaded. */
    private memoryFilePath: string | null = null;
    /** Concept and attribute rows, in insertion order. */
    private state: ConceptStoreState;
    /** Function used to read files, allowing for dependency injection (e.g., for testing). */
    private readonly readFile: ReadFileFn;
    /** Function used to write files, allowing for dependency injection (e.g., for testing). */
    private readonly writeFile: WriteFileFn;
    private readonly logger: Logger;
    private readonly timeoutMs: number;
    private readonly newId: () => string;
    private readonly now: () => Date;

    /**
     * Creates a new ConceptStore from a given state.
     * If no state is provided, it starts with the empty state. The state is copied, so later
     * changes to the store never reach the caller's object.
     * @param state - The initial rows. Defaults to `DEFAULT_STORE_STATE` if null or undefined.
     * @param options - File access, logging, timeout, id and clock overrides, mostly for testing.
     * @returns A new instance of ConceptStore.
     */
    static fromState(state?: ConceptStoreState | null, options: ConceptStoreOptions = {}): ConceptStore {
        return new ConceptStore(state ?? DEFAULT_STORE_STATE, options);
    }

    private constructor(state: ConceptStoreState, options: ConceptStoreOptions) {
        this.readFile = options.readFile ?? ((p: string) => fs.readFile(p, 'utf-8'));
        this.writeFile = options.writeFile ?? ((p: string, data: string) => fs.writeFile(p, data, 'utf-8'));
        this.logger = options.logger ?? new Logger(false);
        this.timeoutMs = options.timeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
        this.newId = options.newId ?? uuidv4;
        this.now = options.now ?? (() => new Date());
        this.state = cloneState(state);
    }

    /**
     * Loads the store from the specified JSON file and remembers the path for `saveMemory`.
     * If the file doesn't exist, the store starts empty.
     * Any other I/O, parse or validation error is re-thrown; a read that takes longer than the
     * configured timeout fails.
     * @param filePath - The path to the memory file to load.
     * @returns A promise that resolves when the store is loaded.
     */
    async loadMemory(filePath: string): Promise<void> {
        this.memoryFilePath = path.resolve(filePath);
        this.logger.dbg(`ConceptStore: loading ${this.memoryFilePath}`);
        let data: string;
        try {
            data = await withTimeout(this.readFile(this.memoryFilePath), this.timeoutMs, 'Reading memory file');
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                this.logger.dbg(`ConceptStore: no memory file at ${this.memoryFilePath}, starting empty.`);
                this.state = cloneState(DEFAULT_STORE_STATE);
                return;
            }
            throw error;
        }
        this.state = validateState(JSON.parse(data), this.memoryFilePath);
        this.logger.dbg(`ConceptStore: loaded ${this.state.concepts.length} concepts and ${this.state.attributes.length} attributes.`);
    }

    /**
     * Saves every row to the JSON file.
     * The file path must have been set by a prior call to `loadMemory`, otherwise a
     * PreconditionViolation is thrown. A failed write is retried once.
     * @returns A promise that resolves when the store is saved.
     * @throws TransientStoreFailure if the retry fails as well.
     */
    async saveMemory(): Promise<void> {
        if (!this.memoryFilePath) {
            throw new PreconditionViolation('ConceptStore: cannot save, file path not set (loadMemory was not called).');
        }
        const filePath = this.memoryFilePath;
        const data = JSON.stringify(this.state, null, 2);
        try {
            await withTimeout(this.writeFile(filePath, data), this.timeoutMs, 'Writing memory file');
        } catch (firstError) {
            this.logger.dbg(`ConceptStore: write failed (${errorMessage(firstError)}), retrying once.`);
            try {
                await withTimeout(this.writeFile(filePath, data), this.timeoutMs, 'Writing memory file');
            } catch (secondError) {
                throw new TransientStoreFailure(`Could not save memory to ${filePath}: ${errorMessage(secondError)}`, secondError);
            }
        }
        this.logger.dbg(`ConceptStore: saved ${this.state.concepts.length} concepts to ${filePath}.`);
    }

    /**
     * Returns the stored concept for an identity, creating it with `kind` when absent.
     * Identities are matched case-insensitively. An existing concept keeps its stored kind.
     * @param identity - The word naming the concept. Must not be blank.
     * @param kind - Part of speech for a new concept.
     * @returns A detached entity; changes reach the store through `save`.
     */
    createOrGet(identity: string, kind: ConceptKind): ConceptEntity {
        const key = this.requireIdentity(identity, 'createOrGet');
        const existing = this.findRecord(key);
        if (existing) {
            return this.toEntity(existing);
        }
        const timestamp = this.now().toISOString();
        const record: ConceptRecord = { id: this.newId(), identity: key, kind, createdAt: timestamp, updatedAt: timestamp };
        this.state.concepts.push(record);
        this.logger.dbg(`ConceptStore: created ${kind} "${key}".`);
        return this.toEntity(record);
    }

    /**
     * Finds a concept by its identity.
     * @param identity - The word naming the concept, in any case.
     * @returns The concept with its attributes if found, otherwise `undefined`.
     */
    load(identity: string): ConceptEntity | undefined {
        const record = this.findRecord(normalizeIdentity(identity));
        return record ? this.toEntity(record) : undefined;
    }

    /** Stored kind of a concept; lets the store act as the parser's lexicon. */
    kindOf(identity: string): ConceptKind | undefined {
        return this.findRecord(normalizeIdentity(identity))?.kind;
    }

    has(identity: string): boolean {
        return this.findRecord(normalizeIdentity(identity)) !== undefined;
    }

    /**
     * Persists an entity additively.
     * Every pending write becomes an insert-or-increment on its attribute row, and any pair
     * held by the entity but not stored yet is inserted. Nothing is ever deleted.
     * @param entity - The entity to write. A blank identity throws a PreconditionViolation.
     */
    save(entity: ConceptEntity): void {
        const key = this.requireIdentity(entity.identity, 'save');
        const timestamp = this.now().toISOString();
        let record = this.findRecord(key);
        if (!record) {
            record = {
                id: entity.id ?? this.newId(),
                identity: key,
                kind: entity.kind,
                createdAt: entity.createdAt.toISOString(),
                updatedAt: timestamp,
            };
            this.state.concepts.push(record);
        } else {
            record.updatedAt = timestamp;
        }

        for (const write of entity.takePendingWrites()) {
            this.upsertAttribute(key, write.attributeName, write.attributeValue, timestamp);
        }
        for (const [name, value] of entity.attributes.entries()) {
            if (!this.findAttribute(key, name, value)) {
                this.upsertAttribute(key, name, value, timestamp);
            }
        }
        this.logger.dbg(`ConceptStore: saved "${key}" with ${entity.attributes.size} attributes.`);
    }

    /**
     * Creates the concept with the given kind, or changes the kind of an existing one.
     * Used when the user states the part of speech of a word.
     * @param identity - The word whose part of speech is now known.
     * @param kind - The part of speech to record.
     * @returns The created or updated concept.
     */
    assignKind(identity: string, kind: ConceptKind): ConceptEntity {
        const key = this.requireIdentity(identity, 'assignKind');
        const record = this.findRecord(key);
        if (!record) {
            return this.createOrGet(key, kind);
        }
        if (record.kind !== kind) {
            this.logger.dbg(`ConceptStore: "${key}" changes kind ${record.kind} -> ${kind}.`);
            record.kind = kind;
            record.updatedAt = this.now().toISOString();
        }
        return this.toEntity(record);
    }

    /**
     * Lists stored concepts in insertion order.
     * @param kindFilter - Only concepts of this kind, when given.
     */
    listAll(kindFilter?: ConceptKind): ConceptEntity[] {
        return this.state.concepts
            .filter(record => !kindFilter || record.kind === kindFilter)
            .map(record => this.toEntity(record));
    }

    /**
     * How many times a fact was taught.
     * @returns The weight of the attribute row, or 0 when the fact is not stored.
     */
    getWeight(identity: string, attributeName: string, attributeValue: string): number {
        return this.findAttribute(normalizeIdentity(identity), attributeName, attributeValue)?.weight ?? 0;
    }

    /** Stored attribute rows of one concept, in insertion order. */
    attributesOf(identity: string): AttributeRecord[] {
        const key = normalizeIdentity(identity);
        return this.state.attributes.filter(a => a.parentIdentity === key).map(a => ({ ...a }));
    }

    /** Identities of concepts that hold `value` under any attribute. */
    findByValue(value: string): string[] {
        const target = normalizeIdentity(value);
        const parents = this.state.attributes
            .filter(a => normalizeIdentity(a.attributeValue) === target)
            .map(a => a.parentIdentity);
        return [...new Set(parents)];
    }

    countByKind(): Record<ConceptKind, number> {
        const counts: Record<ConceptKind, number> = { Noun: 0, Verb: 0, Adjective: 0 };
        for (const record of this.state.concepts) {
            counts[record.kind] += 1;
        }
        return counts;
    }

    get size(): number {
        return this.state.concepts.length;
    }

    get attributeCount(): number {
        return this.state.attributes.length;
    }

    getCurrentState(): Readonly<ConceptStoreState> {
        return this.state;
    }

    private requireIdentity(identity: string, operation: string): string {
        const key = typeof identity === 'string' ? normalizeIdentity(identity) : '';
        if (!key) {
            throw new PreconditionViolation(`ConceptStore.${operation}: a concept needs a non-empty identity.`);
        }
        return key;
    }

    private findRecord(identity: string): ConceptRecord | undefined {
        return this.state.concepts.find(c => c.identity === identity);
    }

    private findAttribute(identity: string, name: string, value: string): AttributeRecord | undefined {
        return this.state.attributes.find(a =>
            a.parentIdentity === identity && a.attributeName === name && a.attributeValue === value);
    }

    private upsertAttribute(identity: string, name: string, value: string, timestamp: string): void {
        const existing = this.findAttribute(identity, name, value);
        if (existing) {
            existing.weight += 1;
            return;
        }
        this.state.attributes.push({
            parentIdentity: identity,
            attributeName: name,
            attributeValue: value,
            weight: 1,
            createdAt: timestamp,
        });
    }

    private toEntity(record: ConceptRecord): ConceptEntity {
        const attributes = AttributeBag.from(
            this.state.attributes
                .filter(a => a.parentIdentity === record.identity)
                .map((a): [string, string] => [a.attributeName, a.attributeValue])
        );
        return new ConceptEntity(
            record.identity,
            record.kind,
            record.id,
            attributes,
            new Date(record.createdAt),
            new Date(record.updatedAt),
        );
    }
}
