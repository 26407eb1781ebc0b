import * as fs from 'fs/promises';
import * as path from 'path';
import defaultPhrases from '../data/phrases.json';
import { PhraseBook, PhraseContext, PhraseEntry, PhraseGroup } from './phraseTypes';
import { RandomSource, pickOne } from '../utils';
import { errorMessage } from '../errors';

export interface PhraseServiceDependencies {
    readFileFn?: (path: string, encoding: BufferEncoding) => Promise<string>;
    resolvePathFn?: (...paths: string[]) => string;
}

function isPhraseEntry(value: unknown): value is PhraseEntry {
    if (typeof value === 'string') return true;
    if (Array.isArray(value)) return value.every(v => typeof v === 'string');
    return typeof value === 'object' && value !== null && Object.values(value).every(v => typeof v === 'string');
}

/**
 * Supplies every sentence Curio says. Templates come from the bundled phrase book and can be
 * replaced group by group from a JSON override file; `{{key}}` slots are filled from a context object.
 */
export class PhraseService {
    private readonly phrases: PhraseBook;
    private overridesLoaded = false;
    private readonly configFilePath?: string;

    private readonly readFileFn: (path: string, encoding: BufferEncoding) => Promise<string>;
    private readonly resolvePathFn: (...paths: string[]) => string;

    /**
     * Creates a phrase service over the bundled phrase book.
     * @param configFilePath - Optional path of a JSON override file, resolved immediately; read by `loadOverrides`.
     * @param deps - Optional file reading and path resolving functions, for testing.
     */
    constructor(configFilePath?: string, deps?: PhraseServiceDependencies) {
        this.readFileFn = deps?.readFileFn || fs.readFile;
        this.resolvePathFn = deps?.resolvePathFn || path.resolve;
        this.configFilePath = configFilePath ? this.resolvePathFn(configFilePath) : undefined;
        this.phrases = PhraseService.copyBook(defaultPhrases);
    }

    /**
     * Reads the override file, if one was configured, and merges it into the phrase book.
     * Entries in the file replace the bundled ones key by key; new groups are added. The file is
     * read at most once per instance.
     * @returns A promise that resolves when the overrides are in place.
     * @throws Error if the file cannot be read or parsed, or holds an entry of the wrong shape.
     */
    async loadOverrides(): Promise<void> {
        if (!this.configFilePath || this.overridesLoaded) return;
        let parsed: unknown;
        try {
            const content = await this.readFileFn(this.configFilePath, 'utf-8');
            parsed = JSON.parse(content);
        } catch (error) {
            throw new Error(`Failed to load or parse phrase configuration file: ${this.configFilePath}. Original error: ${errorMessage(error)}`);
        }
        if (typeof parsed !== 'object' || parsed === null) {
            throw new Error(`Phrase configuration file ${this.configFilePath} must contain a JSON object.`);
        }
        for (const [groupName, group] of Object.entries(parsed)) {
            if (typeof group !== 'object' || group === null) {
                throw new Error(`Phrase group "${groupName}" in ${this.configFilePath} must be an object.`);
            }
            const target = Object.hasOwn(this.phrases, groupName) ? this.phrases[groupName] : (this.phrases[groupName] = {});
            for (const [key, entry] of Object.entries(group)) {
                if (!isPhraseEntry(entry)) {
                    throw new Error(`Phrase "${groupName}.${key}" in ${this.configFilePath} must be a string, a list of strings or a map of strings.`);
                }
                target[key] = entry;
            }
        }
        this.overridesLoaded = true;
    }

    /**
     * Checks whether a template exists.
     * @param variant - When given, the entry must be a variant map holding this variant.
     */
    has(group: string, key: string, variant?: string): boolean {
        const entry = this.lookup(group, key);
        if (entry === undefined) return false;
        if (variant === undefined) return true;
        return typeof entry === 'object' && !Array.isArray(entry) && entry[variant] !== undefined;
    }

    /** All templates of a pool (a single template yields a one-element list). */
    templates(group: string, key: string): string[] {
        const entry = this.entry(group, key);
        if (typeof entry === 'string') return [entry];
        if (Array.isArray(entry)) return [...entry];
        return Object.values(entry);
    }

    /**
     * Formats a template.
     * Pools use their first template; variant maps require `variant`.
     * @param group - Phrase group, e.g. "system" or "questions".
     * @param key - Entry within the group.
     * @param context - Values for the `{{key}}` slots.
     * @param variant - Variant to use for a variant map, such as a part of speech.
     * @returns The filled template.
     * @throws Error if the entry or the variant does not exist.
     */
    format(group: string, key: string, context: PhraseContext = {}, variant?: string): string {
        const entry = this.entry(group, key);
        let template: string | undefined;
        if (typeof entry === 'string') {
            template = entry;
        } else if (Array.isArray(entry)) {
            template = entry[0];
        } else if (variant !== undefined) {
            template = entry[variant];
        }
        if (template === undefined) {
            throw new Error(`No phrase "${group}.${key}"${variant ? ` for variant "${variant}"` : ''}.`);
        }
        return PhraseService.fill(template, context);
    }

    /**
     * Formats a randomly chosen template of a pool.
     * @param random - Source of the choice; `next()` of 0 picks the first template.
     * @returns The filled template.
     * @throws Error if the entry does not exist or the pool is empty.
     */
    pick(group: string, key: string, random: RandomSource, context: PhraseContext = {}): string {
        const template = pickOne(this.templates(group, key), random);
        if (template === undefined) {
            throw new Error(`Phrase pool "${group}.${key}" is empty.`);
        }
        return PhraseService.fill(template, context);
    }

    /**
     * Replaces every `{{key}}` slot present in the context. Unknown slots are left untouched.
     */
    static fill(template: string, context: PhraseContext): string {
        let text = template;
        for (const key in context) {
            if (Object.prototype.hasOwnProperty.call(context, key)) {
                // Using a RegExp for global replacement. Escape special characters in the key.
                const escapedKey = key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
                const regex = new RegExp(`{{${escapedKey}}}`, 'g');
                text = text.replace(regex, () => String(context[key]));
            }
        }
        return text;
    }

    private lookup(group: string, key: string): PhraseEntry | undefined {
        if (!Object.hasOwn(this.phrases, group)) return undefined;
        const entries = this.phrases[group];
        return Object.hasOwn(entries, key) ? entries[key] : undefined;
    }

    private entry(group: string, key: string): PhraseEntry {
        const entry = this.lookup(group, key);
        if (entry === undefined) {
            throw new Error(`No phrase "${group}.${key}".`);
        }
        return entry;
    }

    private static copyBook(book: PhraseBook): PhraseBook {
        const copy: PhraseBook = {};
        for (const [groupName, group] of Object.entries(book)) {
            const groupCopy: PhraseGroup = {};
            for (const [key, entry] of Object.entries(group)) {
                groupCopy[key] = typeof entry === 'string' ? entry : Array.isArray(entry) ? [...entry] : { ...entry };
            }
            copy[groupName] = groupCopy;
        }
        return copy;
    }
}
