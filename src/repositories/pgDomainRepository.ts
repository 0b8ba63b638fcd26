import { DatabaseError, Pool } from 'pg';
import { withTransaction } from '../db/pool';
import { CheckResult, Domain, DomainSettingsPatch, NewDomain, RegistrationState } from '../types';
import { DomainRepository, UniqueViolationError } from './types';

interface DomainRow {
    id: number;
    user_id: number;
    name: string;
    active: boolean;
    check_interval: number;
    region: string;
    last_status: number;
    error_code: number;
    error_description: string;
    total_time: number;
    last_check: Date | null;
    created_at: Date;
    updated_at: Date;
}

const DOMAIN_COLUMNS = `
    d.id, d.user_id, d.name, d.active, d.check_interval, d.region,
    d.last_status, d.error_code, d.error_description, d.total_time,
    d.last_check, d.created_at, d.updated_at`;

function toDomain(row: DomainRow): Domain {
    return {
        id: row.id,
        userId: row.user_id,
        name: row.name,
        active: row.active,
        interval: row.check_interval,
        region: row.region,
        lastStatus: row.last_status,
        errorCode: row.error_code,
        errorDescription: row.error_description,
        totalTime: row.total_time,
        lastCheck: row.last_check,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

export function isUniqueViolation(err: unknown): boolean {
    return err instanceof DatabaseError && err.code === '23505';
}

export class PgDomainRepository implements DomainRepository {
    constructor(private readonly pool: Pool) {}

    async listByUser(userId: number): Promise<Domain[]> {
        const { rows } = await this.pool.query<DomainRow>(
            `SELECT ${DOMAIN_COLUMNS} FROM domains d WHERE d.user_id = $1 ORDER BY d.id`,
            [userId]
        );
        return rows.map(toDomain);
    }

    async findById(id: number): Promise<Domain | null> {
        const { rows } = await this.pool.query<DomainRow>(
            `SELECT ${DOMAIN_COLUMNS} FROM domains d WHERE d.id = $1`,
            [id]
        );
        return rows[0] ? toDomain(rows[0]) : null;
    }

    async findByIdForUser(userId: number, id: number): Promise<Domain | null> {
        const { rows } = await this.pool.query<DomainRow>(
            `SELECT ${DOMAIN_COLUMNS} FROM domains d WHERE d.id = $1 AND d.user_id = $2`,
            [id, userId]
        );
        return rows[0] ? toDomain(rows[0]) : null;
    }

    async countByUser(userId: number): Promise<number> {
        const { rows } = await this.pool.query<{ count: string }>(
            'SELECT COUNT(*) AS count FROM domains WHERE user_id = $1',
            [userId]
        );
        return Number(rows[0]?.count ?? 0);
    }

    async getDomainLimit(userId: number): Promise<number | null> {
        const { rows } = await this.pool.query<{ domain_limit: number | null }>(
            'SELECT domain_limit FROM users WHERE id = $1',
            [userId]
        );
        return rows[0]?.domain_limit ?? null;
    }

    async create(input: NewDomain): Promise<Domain> {
        try {
            const { rows } = await this.pool.query<DomainRow>(
                `INSERT INTO domains AS d (user_id, name, check_interval, region)
                 VALUES ($1, $2, $3, $4)
                 RETURNING ${DOMAIN_COLUMNS}`,
                [input.userId, input.name, input.interval, input.region]
            );
            return toDomain(rows[0]);
        } catch (err) {
            if (isUniqueViolation(err)) {
                throw new UniqueViolationError(`domain ${input.name} already exists in region ${input.region}`);
            }
            throw err;
        }
    }

    async updateSettings(userId: number, id: number, patch: DomainSettingsPatch): Promise<Domain | null> {
        const sets: string[] = [];
        const values: unknown[] = [];

        if (patch.active !== undefined) {
            values.push(patch.active);
            sets.push(`active = $${values.length}`);
        }
        if (patch.interval !== undefined) {
            values.push(patch.interval);
            sets.push(`check_interval = $${values.length}`);
        }
        if (patch.region !== undefined) {
            values.push(patch.region);
            sets.push(`region = $${values.length}`);
        }
        if (sets.length === 0) {
            return this.findByIdForUser(userId, id);
        }

        values.push(id, userId);
        try {
            const { rows } = await this.pool.query<DomainRow>(
                `UPDATE domains AS d SET ${sets.join(', ')}, updated_at = NOW()
                 WHERE d.id = $${values.length - 1} AND d.user_id = $${values.length}
                 RETURNING ${DOMAIN_COLUMNS}`,
                values
            );
            return rows[0] ? toDomain(rows[0]) : null;
        } catch (err) {
            if (isUniqueViolation(err)) {
                throw new UniqueViolationError(`domain ${id} would duplicate another domain in region ${patch.region}`);
            }
            throw err;
        }
    }

    async setActiveForUser(userId: number, active: boolean): Promise<Domain[]> {
        const { rows } = await this.pool.query<DomainRow>(
            `UPDATE domains AS d SET active = $1, updated_at = NOW()
             WHERE d.user_id = $2 AND d.active <> $1
             RETURNING ${DOMAIN_COLUMNS}`,
            [active, userId]
        );
        return rows.map(toDomain);
    }

    async updateStatus(id: number, result: CheckResult): Promise<void> {
        await this.pool.query(
            `UPDATE domains
             SET last_status = $1, error_code = $2, error_description = $3,
                 total_time = $4, last_check = $5, updated_at = NOW()
             WHERE id = $6`,
            [result.statusCode, result.errorCode, result.errorDescription, result.totalTimeMs, result.checkedAt, id]
        );
    }

    async listMonitored(): Promise<Domain[]> {
        const { rows } = await this.pool.query<DomainRow>(
            `SELECT ${DOMAIN_COLUMNS} FROM domains d
             WHERE d.active = TRUE
               AND EXISTS (
                   SELECT 1 FROM monitor_registrations r
                   WHERE r.domain_id = d.id AND r.state = $1 AND r.external_id IS NOT NULL
               )
             ORDER BY d.id`,
            [RegistrationState.ACTIVE]
        );
        return rows.map(toDomain);
    }

    async deleteWithRelations(userId: number, ids: number[]): Promise<number[]> {
        if (ids.length === 0) return [];

        return withTransaction(this.pool, async client => {
            const owned = await client.query<{ id: number }>(
                'SELECT id FROM domains WHERE user_id = $1 AND id = ANY($2::int[]) FOR UPDATE',
                [userId, ids]
            );
            const ownedIds = owned.rows.map(row => row.id);
            if (ownedIds.length === 0) return [];

            await client.query('DELETE FROM notification_history WHERE domain_id = ANY($1::int[])', [ownedIds]);
            await client.query(
                'DELETE FROM monitor_registrations WHERE domain_id = ANY($1::int[]) AND state <> $2',
                [ownedIds, RegistrationState.ORPHANED_PENDING_DELETE]
            );
            const deleted = await client.query<{ id: number }>(
                'DELETE FROM domains WHERE id = ANY($1::int[]) RETURNING id',
                [ownedIds]
            );
            return deleted.rows.map(row => row.id);
        });
    }
}
