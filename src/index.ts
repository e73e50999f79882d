import { createApp } from './app';
import { loadConfig } from './config';
import { log } from './logger';

/**
 * Main application entry point.
 */
async function main() {
    // Throws, and the process exits, when required environment variables are missing.
    const config = loadConfig();
    const { app, sessions } = createApp(config);

    const server = app.listen(config.port, () => {
        log('INFO', `Sealed results server (Express) listening on :${config.port}`);
    });

    const shutdown = () => {
        sessions.dispose();
        server.close();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

main().catch(err => {
    log('ERROR', 'server failed to start', { error: err instanceof Error ? err.message : String(err) });
    process.exitCode = 1;
});
