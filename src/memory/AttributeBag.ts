/**
 * Ordered multi-valued attribute map: name -> distinct values in insertion order.
 * A name never maps to an empty list.
 */
export class AttributeBag {
    private readonly values = new Map<string, string[]>();

    static from(entries: Iterable<[string, string]>): AttributeBag {
        const bag = new AttributeBag();
        for (const [name, value] of entries) {
            bag.add(name, value);
        }
        return bag;
    }

    /**
     * Adds a value under a name. Returns false when the value was already present.
     */
    add(name: string, value: string): boolean {
        const list = this.values.get(name);
        if (!list) {
            this.values.set(name, [value]);
            return true;
        }
        if (list.includes(value)) return false;
        list.push(value);
        return true;
    }

    has(name: string, value?: string): boolean {
        const list = this.values.get(name);
        if (!list) return false;
        return value === undefined || list.includes(value);
    }

    get(name: string): readonly string[] {
        return this.values.get(name) ?? [];
    }

    names(): string[] {
        return [...this.values.keys()];
    }

    entries(): Array<[string, string]> {
        const result: Array<[string, string]> = [];
        for (const [name, list] of this.values) {
            for (const value of list) {
                result.push([name, value]);
            }
        }
        return result;
    }

    get size(): number {
        return this.values.size;
    }
}
