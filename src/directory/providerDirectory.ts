// src/directory/providerDirectory.ts

import type { Provider } from '../models/Provider';

/**
 * Provider directory the engine validates against
 *
 * Used only to reject unknown provider ids on intake; matching compares ids.
 */
export interface ProviderDirectory {
    exists(id: string): Promise<boolean>;
    list(): Promise<Provider[]>;
}

/**
 * Fixed in-process directory, seeded from configuration or tests
 */
export class InMemoryProviderDirectory implements ProviderDirectory {
    private providers: Map<string, Provider>;

    constructor(providers: readonly Provider[] = []) {
        this.providers = new Map(providers.map(p => [p.id, { ...p }]));
    }

    static fromIds(ids: readonly string[]): InMemoryProviderDirectory {
        return new InMemoryProviderDirectory(ids.map(id => ({ id, name: id })));
    }

    async exists(id: string): Promise<boolean> {
        return this.providers.has(id);
    }

    async list(): Promise<Provider[]> {
        return Array.from(this.providers.values(), p => ({ ...p }));
    }
}
