/**
 * Bearer keys for participant identities.
 * NOTE: keys are held in memory and in plain form. A deployment would keep hashed keys in
 * persistent storage.
 */
export class IdentityStore {
    private readonly identitiesByKey = new Map<string, string>(); // key -> identity
    private readonly keysByIdentity = new Map<string, string>(); // identity -> key

    /**
     * Associates a secret key with an identity.
     */
    register(identity: string, key: string): void {
        this.identitiesByKey.set(key, identity);
        this.keysByIdentity.set(identity, key);
    }

    /**
     * Resolves a secret key to its identity, or undefined if the key is unknown.
     */
    identityByKey(key: string): string | undefined {
        return this.identitiesByKey.get(key);
    }

    exists(identity: string): boolean {
        return this.keysByIdentity.has(identity);
    }

    list(): string[] {
        return Array.from(this.keysByIdentity.keys());
    }
}
