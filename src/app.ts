import express, { Express } from 'express';
import { Config } from './config';
import { createIdentityRoutes } from './identity/routes';
import { IdentityStore } from './identity/state';
import { setLogLevel } from './logger';
import { createSessionRoutes } from './session/routes';
import { SessionStore } from './session/state';

export type AppContext = {
    app: Express;
    sessions: SessionStore;
    identities: IdentityStore;
};

/**
 * Builds the Express application with fresh, empty stores.
 */
export function createApp(config: Config): AppContext {
    setLogLevel(config.logLevel);
    const sessions = new SessionStore();
    const identities = new IdentityStore();

    const app = express();
    // Middleware to parse JSON bodies. A 2048-bit ciphertext is 344 base64 characters.
    app.use(express.json({ limit: '64kb' }));

    // A simple health check endpoint.
    app.get('/health', (_req, res) => {
        res.status(200).json({ ok: true });
    });

    // Identity registration issues the Bearer keys participants submit with.
    app.use('/identity', createIdentityRoutes(identities));

    // Session lifecycle: create, join, submit, evaluate, inspect.
    app.use('/session', createSessionRoutes({ sessions, identities, config }));

    return { app, sessions, identities };
}
