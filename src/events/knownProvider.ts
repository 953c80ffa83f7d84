// src/events/knownProvider.ts

import type { ProviderDirectory } from '../directory/providerDirectory';
import { ValidationError } from '../errors';

/**
 * Reject a provider id the directory does not know
 *
 * @param field Input field the id came from, for the error's fieldErrors
 */
export async function assertKnownProvider(
    providers: ProviderDirectory,
    providerId: string,
    field: string
): Promise<void> {
    if (!(await providers.exists(providerId))) {
        throw new ValidationError(`Unknown provider ${providerId}`, {
            formErrors: [],
            fieldErrors: { [field]: ['Unknown provider'] }
        });
    }
}
