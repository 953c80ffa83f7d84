// src/events/handlerDeps.ts

import type { Clock } from '../clock';
import type { ProviderDirectory } from '../directory/providerDirectory';
import type { ProposalStateMachine } from '../engine/proposalStateMachine';
import type { WaitlistStore } from '../store/waitlistStore';

/**
 * Collaborators the event handlers are wired with
 */
export interface HandlerDeps {
    store: WaitlistStore;
    providers: ProviderDirectory;
    proposals: ProposalStateMachine;
    clock: Clock;
}
