// src/server.ts

import { createApp } from './app';
import { env } from './config';
import { InMemoryProviderDirectory } from './directory/providerDirectory';
import { logger } from './logger';
import { InMemoryWaitlistStore } from './store/inMemoryWaitlistStore';

const app = createApp({
    store: new InMemoryWaitlistStore(),
    providers: InMemoryProviderDirectory.fromIds(env.PROVIDERS)
});

const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, providers: env.PROVIDERS.length }, 'waitlist engine listening');
});

function shutdown(signal: string): void {
    logger.info({ signal }, 'shutting down');
    server.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
