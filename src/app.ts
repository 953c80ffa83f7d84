// src/app.ts

import express from 'express';
import { Clock, systemClock } from './clock';
import type { ProviderDirectory } from './directory/providerDirectory';
import { AvailabilityMatcher } from './engine/availabilityMatcher';
import { ProposalStateMachine } from './engine/proposalStateMachine';
import { ConflictError, ValidationError, WaitlistError } from './errors';
import type { HandlerDeps } from './events/handlerDeps';
import { logger } from './logger';
import { createPatientRoutes } from './routes/patientRoutes';
import { createSlotRoutes } from './routes/slotRoutes';
import { asyncRoute } from './routes/asyncRoute';
import type { WaitlistStore } from './store/waitlistStore';

const log = logger.child({ module: 'http' });

export interface AppOptions {
    store: WaitlistStore;
    providers: ProviderDirectory;
    clock?: Clock;
}

/**
 * Express application setup
 *
 * Everything stateful is passed in:
 * - store: slots and waitlist entries
 * - providers: directory used to validate provider ids
 * - clock: "now" for wait times
 */
export function createApp(options: AppOptions): express.Express {
    const clock = options.clock ?? systemClock;
    const deps: HandlerDeps = {
        store: options.store,
        providers: options.providers,
        proposals: new ProposalStateMachine(options.store, clock),
        clock
    };
    const matcher = new AvailabilityMatcher();

    const app = express();

    // Middleware
    app.use(express.json());
    app.use((req, res, next) => {
        const startedAt = process.hrtime.bigint();
        res.on('finish', () => {
            const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
            log.info({ method: req.method, url: req.originalUrl, status: res.statusCode, durationMs }, 'request');
        });
        next();
    });

    // Routes
    app.use('/slots', createSlotRoutes(deps, matcher));
    app.use('/patients', createPatientRoutes(deps, matcher));

    app.get('/providers', asyncRoute(async (_req, res) => {
        res.json({ providers: await deps.providers.list() });
    }));

    // Health check
    app.get('/health', asyncRoute(async (_req, res) => {
        const [slots, patients] = await Promise.all([
            deps.store.listSlots(),
            deps.store.listPatients()
        ]);
        res.json({
            status: 'healthy',
            slots: slots.length,
            patients: patients.length
        });
    }));

    // Error handling
    app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
        if (err instanceof WaitlistError) {
            const details =
                err instanceof ConflictError ? err.details :
                err instanceof ValidationError ? err.issues :
                undefined;
            res.status(err.statusCode).json({ error: err.message, code: err.code, details });
            return;
        }

        // Malformed JSON bodies from express.json()
        if (err instanceof SyntaxError && 'body' in err) {
            res.status(400).json({ error: 'Malformed JSON body', code: 'validation' });
            return;
        }

        // Other body-parser failures (413, 415...) carry their own status
        if (isHttpError(err) && err.status >= 400 && err.status < 500) {
            res.status(err.status).json({ error: err.expose ? err.message : 'Bad request', code: 'request' });
            return;
        }

        log.error({ err, method: req.method, url: req.originalUrl }, 'unhandled error');
        res.status(500).json({ error: 'Internal server error' });
    });

    return app;
}

function isHttpError(err: unknown): err is Error & { status: number; expose: boolean } {
    return (
        err instanceof Error &&
        'status' in err && typeof err.status === 'number' &&
        'expose' in err && typeof err.expose === 'boolean'
    );
}
