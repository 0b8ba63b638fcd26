/**
 * Retry remote deletes for registrations left orphaned by a failed release.
 */

import dotenv from 'dotenv';
import { loadConfig } from '../src/config';
import { buildContainer } from '../src/container';
import { createPostgresPool } from '../src/db/pool';
import { RegistrationState } from '../src/types';

dotenv.config();

async function main() {
    const config = loadConfig();
    const pool = createPostgresPool(config.databaseUrl, 2);
    const container = buildContainer(config, pool, null);

    try {
        const orphans = await container.registrations.listByState(RegistrationState.ORPHANED_PENDING_DELETE);
        console.log(`Found ${orphans.length} orphaned registrations`);

        const cleaned: number[] = [];
        for (const orphan of orphans) {
            if (orphan.externalId) {
                const client = container.providers.get(orphan.provider);
                if (!client) {
                    console.warn(`  #${orphan.id}: ${orphan.provider} is not configured, skipped`);
                    continue;
                }
                try {
                    await client.deleteMonitor(orphan.externalId);
                } catch (err) {
                    console.warn(`  #${orphan.id}: delete of ${orphan.provider}/${orphan.externalId} failed: ${err instanceof Error ? err.message : String(err)}`);
                    continue;
                }
            }
            cleaned.push(orphan.id);
        }

        await container.registrations.markState(cleaned, RegistrationState.DELETED);
        console.log(`Marked ${cleaned.length} of ${orphans.length} as deleted`);
    } finally {
        container.providers.closeAll();
        await container.queue.shutdown();
        await pool.end();
    }
}

main().catch(e => {
    console.error(e);
    process.exit(1);
});
