import { AttributeBag } from './AttributeBag';
import { ConceptKind } from './concept_types';

export interface PendingWrite {
    attributeName: string;
    attributeValue: string;
}

/**
 * One lexical concept ("dog", "run", "cold") with a growing set of attributes.
 * Instances are transient views handed out by the ConceptStore; changes are persisted with `ConceptStore.save`.
 */
export class ConceptEntity {
    readonly attributes: AttributeBag;
    private pending: PendingWrite[] = [];

    constructor(
        readonly identity: string,
        readonly kind: ConceptKind,
        readonly id: string | null = null,
        attributes: AttributeBag = new AttributeBag(),
        readonly createdAt: Date = new Date(),
        private updated: Date = createdAt,
    ) {
        this.attributes = attributes;
    }

    get updatedAt(): Date {
        return this.updated;
    }

    /**
     * Records a fact. Teaching a value that is already present is still recorded as a pending write,
     * so the store can increase its weight.
     */
    learn(attributeName: string, attributeValue: string): boolean {
        const added = this.attributes.add(attributeName, attributeValue);
        this.pending.push({ attributeName, attributeValue });
        this.updated = new Date();
        return added;
    }

    /**
     * Records a fact under the first free numbered slot of `baseName` (`is`, `is_2`, `is_3`, ...).
     * Returns the slot used, or undefined when the value is already held under one of the slots.
     */
    learnInNextSlot(baseName: string, attributeValue: string): string | undefined {
        const slots = this.slotsOf(baseName);
        if (slots.some(slot => this.attributes.has(slot, attributeValue))) {
            return undefined;
        }
        const slot = slots.length === 0 ? baseName : `${baseName}_${slots.length + 1}`;
        this.learn(slot, attributeValue);
        return slot;
    }

    /** Base name plus its numbered variants that currently hold values, in slot order. */
    slotsOf(baseName: string): string[] {
        const slots: string[] = [];
        if (!this.attributes.has(baseName)) return slots;
        slots.push(baseName);
        for (let n = 2; this.attributes.has(`${baseName}_${n}`); n++) {
            slots.push(`${baseName}_${n}`);
        }
        return slots;
    }

    hasAttribute(name: string): boolean {
        return this.attributes.has(name);
    }

    getAttribute(name: string): readonly string[] {
        return this.attributes.get(name);
    }

    /** Values of a base attribute and all of its numbered slots. */
    valuesOf(baseName: string): string[] {
        return this.slotsOf(baseName).flatMap(slot => [...this.attributes.get(slot)]);
    }

    takePendingWrites(): PendingWrite[] {
        const writes = this.pending;
        this.pending = [];
        return writes;
    }

    toString(): string {
        const lines = [`${this.identity} (${this.kind})`];
        for (const name of [...this.attributes.names()].sort()) {
            lines.push(`  ${name}: ${this.attributes.get(name).join(', ')}`);
        }
        return lines.join('\n');
    }
}
