/**
 * Push every monitored domain's active flag to its remote monitors.
 *
 * Run after provider outages: a failed push during a settings change leaves
 * the remote monitor in the old state until this runs.
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
        const active = await container.registrations.listByState(RegistrationState.ACTIVE);
        const domainIds = [...new Set(active.map(registration => registration.domainId))];
        console.log(`Found ${active.length} active registrations across ${domainIds.length} domains`);

        let synced = 0;
        let missing = 0;
        for (const domainId of domainIds) {
            const domain = await container.domains.findById(domainId);
            if (!domain) {
                missing++;
                continue;
            }
            await container.orchestrator.onActiveChanged(domain, domain.active);
            synced++;
        }

        console.log(`Synced ${synced} domains (${missing} without a domain row)`);
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
