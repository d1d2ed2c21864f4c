import 'dotenv/config';
import { loadConfig } from '../Platform/Config.js';
import { SQLiteLabelRepository } from '../infrastructure/persistence/SQLiteLabelRepository.js';
import { LabelKernel } from '../kernel-core/Kernel.js';
import { LabelServer } from './Server.js';

async function bootstrap() {
    const config = loadConfig();

    console.log(`[LabelServer] Opening store ${config.database} (level key: ${config.levelKey})`);
    const repo = new SQLiteLabelRepository(config.database);
    const kernel = new LabelKernel(repo, { levelKey: config.levelKey });
    const server = new LabelServer(kernel, {
        port: config.port,
        host: config.host,
        logRequests: config.logRequests
    });

    await server.start();

    const shutdown = () => {
        console.log('[LabelServer] Shutting down.');
        server.stop()
            .then(() => repo.close())
            .catch(e => console.error('[LabelServer] Shutdown failed:', e))
            .finally(() => process.exit(0));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

bootstrap().catch(e => {
    console.error(e);
    process.exit(1);
});
