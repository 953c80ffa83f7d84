// src/models/Provider.ts

/**
 * Provider directory entry
 *
 * The engine only checks that an id exists; names are for display.
 */
export interface Provider {
    id: string;
    name: string;
}
