import { Pool } from 'pg';
import { withTransaction } from '../db/pool';
import { MonitorRegistration, ProviderName, RegistrationDraft, RegistrationState } from '../types';
import { RegistrationRepository } from './types';

interface RegistrationRow {
    id: number;
    domain_id: number;
    provider: string;
    external_id: string | null;
    regions: string[] | null;
    state: string;
    created_at: Date;
    updated_at: Date;
}

const PROVIDERS: readonly string[] = Object.values(ProviderName);
const STATES: readonly string[] = Object.values(RegistrationState);

function parseProvider(value: string): ProviderName {
    const provider = Object.values(ProviderName).find(candidate => candidate === value);
    if (!provider) {
        throw new Error(`unknown provider "${value}" in monitor_registrations (known: ${PROVIDERS.join(', ')})`);
    }
    return provider;
}

function parseState(value: string): RegistrationState {
    const state = Object.values(RegistrationState).find(candidate => candidate === value);
    if (!state) {
        throw new Error(`unknown registration state "${value}" (known: ${STATES.join(', ')})`);
    }
    return state;
}

function toRegistration(row: RegistrationRow): MonitorRegistration {
    return {
        id: row.id,
        domainId: row.domain_id,
        provider: parseProvider(row.provider),
        externalId: row.external_id,
        regions: row.regions ?? [],
        state: parseState(row.state),
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

const COLUMNS = 'id, domain_id, provider, external_id, regions, state, created_at, updated_at';

export class PgRegistrationRepository implements RegistrationRepository {
    constructor(private readonly pool: Pool) {}

    async listLiveByDomain(domainId: number): Promise<MonitorRegistration[]> {
        const { rows } = await this.pool.query<RegistrationRow>(
            `SELECT ${COLUMNS} FROM monitor_registrations
             WHERE domain_id = $1 AND state = ANY($2::text[])
             ORDER BY id`,
            [domainId, [RegistrationState.PENDING, RegistrationState.ACTIVE]]
        );
        return rows.map(toRegistration);
    }

    async listByState(state: RegistrationState): Promise<MonitorRegistration[]> {
        const { rows } = await this.pool.query<RegistrationRow>(
            `SELECT ${COLUMNS} FROM monitor_registrations WHERE state = $1 ORDER BY id`,
            [state]
        );
        return rows.map(toRegistration);
    }

    async saveAll(domainId: number, drafts: RegistrationDraft[]): Promise<MonitorRegistration[]> {
        if (drafts.length === 0) return [];

        return withTransaction(this.pool, async client => {
            const saved: MonitorRegistration[] = [];
            for (const draft of drafts) {
                const { rows } = await client.query<RegistrationRow>(
                    `INSERT INTO monitor_registrations (domain_id, provider, external_id, regions, state)
                     VALUES ($1, $2, $3, $4, $5)
                     RETURNING ${COLUMNS}`,
                    [domainId, draft.provider, draft.externalId, draft.regions, draft.state]
                );
                saved.push(toRegistration(rows[0]));
            }
            return saved;
        });
    }

    async markState(ids: number[], state: RegistrationState): Promise<void> {
        if (ids.length === 0) return;
        await this.pool.query(
            'UPDATE monitor_registrations SET state = $1, updated_at = NOW() WHERE id = ANY($2::int[])',
            [state, ids]
        );
    }
}
