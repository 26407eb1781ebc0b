export const CONCEPT_KINDS = ['Noun', 'Verb', 'Adjective'] as const;

export type ConceptKind = typeof CONCEPT_KINDS[number];

export function isConceptKind(value: unknown): value is ConceptKind {
    return CONCEPT_KINDS.some(kind => kind === value);
}

/**
 * A stored concept row. `identity` is lower-cased and unique.
 */
export interface ConceptRecord {
    id: string;
    identity: string;
    kind: ConceptKind;
    createdAt: string;
    updatedAt: string;
}

/**
 * A stored attribute row, unique on (parentIdentity, attributeName, attributeValue).
 * `weight` counts how many times the fact was taught.
 */
export interface AttributeRecord {
    parentIdentity: string;
    attributeName: string;
    attributeValue: string;
    weight: number;
    createdAt: string;
}

/**
 * Defines the overall structure of the concept store persisted in the memory file.
 */
export interface ConceptStoreState {
    concepts: ConceptRecord[];
    attributes: AttributeRecord[];
}

export const DEFAULT_STORE_STATE: ConceptStoreState = {
    concepts: [],
    attributes: [],
};

export function normalizeIdentity(identity: string): string {
    return identity.trim().toLowerCase();
}
