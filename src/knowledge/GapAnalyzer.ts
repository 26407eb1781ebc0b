import { ConceptEntity } from '../memory/ConceptEntity';
import { DEFAULT_SCHEMA, KnowledgeSchema } from './knowledgeSchema';

export interface GapPriority {
    entity: ConceptEntity;
    gaps: string[];
    completeness: number;
    priorityScore: number;
}

export interface GapFinding {
    entity: ConceptEntity;
    attributeName: string;
}

/**
 * Finds the expected attributes a concept is still missing.
 * Question order is fixed by the schema's priority lists so the same concept always yields the same next question.
 */
export class GapAnalyzer {
    constructor(private readonly schema: KnowledgeSchema = DEFAULT_SCHEMA) {}

    /**
     * First missing attribute in priority order, then in standard order; undefined when nothing is missing.
     */
    findNextGap(entity: ConceptEntity): string | undefined {
        const missing = (fields: readonly string[]) => fields.find(field => !entity.hasAttribute(field));
        return missing(this.schema.priorityFields[entity.kind]) ?? missing(this.schema.standardFields[entity.kind]);
    }

    getAllGaps(entity: ConceptEntity): string[] {
        return this.expectedFields(entity).filter(field => !entity.hasAttribute(field));
    }

    /**
     * Share of expected attributes that hold at least one value; 1.0 when nothing is expected for the kind.
     */
    completeness(entity: ConceptEntity): number {
        const expected = this.expectedFields(entity);
        if (expected.length === 0) return 1.0;
        const filled = expected.filter(field => entity.hasAttribute(field)).length;
        return filled / expected.length;
    }

    /**
     * Concepts with at least one gap, most incomplete first.
     */
    rank(entities: readonly ConceptEntity[]): GapPriority[] {
        return entities
            .map(entity => {
                const completeness = this.completeness(entity);
                return {
                    entity,
                    gaps: this.getAllGaps(entity),
                    completeness,
                    priorityScore: (1 - completeness) * 100,
                };
            })
            .filter(priority => priority.gaps.length > 0)
            .sort((a, b) => b.priorityScore - a.priorityScore);
    }

    /**
     * The first concept, in the given order, that has a gap.
     */
    findFirstGap(entities: Iterable<ConceptEntity>): GapFinding | undefined {
        for (const entity of entities) {
            const attributeName = this.findNextGap(entity);
            if (attributeName) {
                return { entity, attributeName };
            }
        }
        return undefined;
    }

    private expectedFields(entity: ConceptEntity): string[] {
        return [...new Set([...this.schema.priorityFields[entity.kind], ...this.schema.standardFields[entity.kind]])];
    }
}
