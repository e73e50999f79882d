/**
 * Authoritative mapping from canonical result key to the identity that claimed it.
 * Insert is the only mutation; an existing key is never overwritten or removed.
 */
export class ResultLedger {
    private readonly entries: Map<string, string>;

    constructor(initial: Record<string, string> = {}) {
        this.entries = new Map(Object.entries(initial));
    }

    get size(): number {
        return this.entries.size;
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    claimant(key: string): string | undefined {
        return this.entries.get(key);
    }

    /**
     * Records `key -> identity`.
     * @returns false, leaving the ledger untouched, when the key is already claimed.
     */
    insert(key: string, identity: string): boolean {
        if (this.entries.has(key)) return false;
        this.entries.set(key, identity);
        return true;
    }

    /**
     * A fresh copy of the ledger; mutating it never affects the ledger.
     */
    snapshot(): Map<string, string> {
        return new Map(this.entries);
    }

    toJSON(): Record<string, string> {
        return Object.fromEntries(this.entries);
    }
}
