import schema from '../data/knowledge_schema.json';
import { ConceptKind } from '../memory/concept_types';

export type FieldTable = Record<ConceptKind, readonly string[]>;

export interface KnowledgeSchema {
    /** Expected attributes per kind, in the order questions are asked. */
    priorityFields: FieldTable;
    /** The same expectations in storage order, scanned when the priority list is exhausted. */
    standardFields: FieldTable;
    relationDescriptions: Record<string, string>;
    /** How an attribute name reads in a sentence ("can_have" -> "can have"). */
    relationPhrases: Record<string, string>;
}

export const DEFAULT_SCHEMA: KnowledgeSchema = schema;

function lookup(table: Record<string, string>, key: string): string | undefined {
    return Object.hasOwn(table, key) ? table[key] : undefined;
}

/** Strips a numbered slot suffix: `is_2` -> `is`. */
export function baseAttributeName(name: string): string {
    return name.replace(/_\d+$/, '');
}

export function describeRelation(name: string, knowledgeSchema: KnowledgeSchema = DEFAULT_SCHEMA): string {
    const base = baseAttributeName(name);
    return lookup(knowledgeSchema.relationDescriptions, base) ?? base.replace(/_/g, ' ');
}

export function relationPhrase(name: string, knowledgeSchema: KnowledgeSchema = DEFAULT_SCHEMA): string {
    const base = baseAttributeName(name);
    return lookup(knowledgeSchema.relationPhrases, base) ?? base.replace(/_/g, ' ');
}
