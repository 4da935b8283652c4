import { loadConfig } from '../kernel-core/Config.js';
import { ControlPlane } from '../kernel-core/Kernel.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';
import { RegistryServer } from './Server.js';

async function main() {
    const config = loadConfig();
    const store = new SQLiteEventStore(config.databasePath);

    console.log('[RegistryServer] Replaying history...');
    const { plane, report } = await ControlPlane.restore(config, { store });
    const seeded = await plane.bootstrap();
    console.log(`[RegistryServer] Control plane active (${report.applied} events applied${seeded ? ', roles seeded' : ''}).`);

    const server = await new RegistryServer(plane).listen();

    const shutdown = () => {
        server.close(() => {
            store.close();
            process.exit(0);
        });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch((e: unknown) => {
    console.error('[RegistryServer] Failed to start:', e);
    process.exitCode = 1;
});
