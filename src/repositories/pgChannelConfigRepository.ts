import { Pool, PoolClient } from 'pg';
import { withTransaction } from '../db/pool';
import { ChannelConfig, ChannelConfigInput, ChannelConfigPatch, ChannelType } from '../types';
import { isUniqueViolation } from './pgDomainRepository';
import { ChannelConfigRepository, UniqueViolationError } from './types';

interface ChannelConfigRow {
    id: number;
    user_id: number;
    address: string;
    name: string;
    language: string;
    active: boolean;
    notify_on_down: boolean;
    notify_on_up: boolean;
    monitor_regions: string[];
    created_at: Date;
    updated_at: Date;
}

const SELECT_CONFIGS = `
    SELECT c.id, c.user_id, c.address, c.name, c.language, c.active,
           c.notify_on_down, c.notify_on_up, c.created_at, c.updated_at,
           COALESCE(array_agg(r.region ORDER BY r.region) FILTER (WHERE r.region IS NOT NULL), '{}') AS monitor_regions
    FROM channel_configs c
    LEFT JOIN channel_config_regions r ON r.channel_config_id = c.id`;

function toChannelConfig(channelType: ChannelType, row: ChannelConfigRow): ChannelConfig {
    return {
        id: row.id,
        userId: row.user_id,
        channelType,
        address: row.address,
        name: row.name,
        language: row.language,
        active: row.active,
        notifyOnDown: row.notify_on_down,
        notifyOnUp: row.notify_on_up,
        monitorRegions: row.monitor_regions,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

async function replaceRegions(client: PoolClient, configId: number, regions: string[]): Promise<void> {
    await client.query('DELETE FROM channel_config_regions WHERE channel_config_id = $1', [configId]);
    if (regions.length > 0) {
        await client.query(
            `INSERT INTO channel_config_regions (channel_config_id, region)
             SELECT $1, UNNEST($2::text[])`,
            [configId, [...new Set(regions)]]
        );
    }
}

export class PgChannelConfigRepository implements ChannelConfigRepository {
    constructor(private readonly pool: Pool) {}

    async listByUser(userId: number, channelType: ChannelType): Promise<ChannelConfig[]> {
        const { rows } = await this.pool.query<ChannelConfigRow>(
            `${SELECT_CONFIGS}
             WHERE c.user_id = $1 AND c.channel_type = $2
             GROUP BY c.id
             ORDER BY c.id`,
            [userId, channelType]
        );
        return rows.map(row => toChannelConfig(channelType, row));
    }

    async findByIdForUser(userId: number, channelType: ChannelType, id: number): Promise<ChannelConfig | null> {
        return this.findWith(this.pool, userId, channelType, id);
    }

    async create(userId: number, channelType: ChannelType, input: ChannelConfigInput): Promise<ChannelConfig> {
        try {
            return await withTransaction(this.pool, async client => {
                const { rows } = await client.query<{ id: number }>(
                    `INSERT INTO channel_configs
                         (user_id, channel_type, address, name, language, active, notify_on_down, notify_on_up)
                     VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
                     RETURNING id`,
                    [
                        userId,
                        channelType,
                        input.address,
                        input.name ?? '',
                        input.language ?? 'en',
                        input.active ?? true,
                        input.notifyOnDown ?? true,
                        input.notifyOnUp ?? true,
                    ]
                );
                const id = rows[0].id;
                await replaceRegions(client, id, input.monitorRegions ?? []);

                const created = await this.findWith(client, userId, channelType, id);
                if (!created) throw new Error(`channel config ${id} vanished after insert`);
                return created;
            });
        } catch (err) {
            if (isUniqueViolation(err)) {
                throw new UniqueViolationError(`${channelType} address ${input.address} is already configured`);
            }
            throw err;
        }
    }

    async update(userId: number, channelType: ChannelType, id: number, patch: ChannelConfigPatch): Promise<ChannelConfig | null> {
        const columns: Array<[string, unknown]> = [];
        if (patch.address !== undefined) columns.push(['address', patch.address]);
        if (patch.name !== undefined) columns.push(['name', patch.name]);
        if (patch.language !== undefined) columns.push(['language', patch.language]);
        if (patch.active !== undefined) columns.push(['active', patch.active]);
        if (patch.notifyOnDown !== undefined) columns.push(['notify_on_down', patch.notifyOnDown]);
        if (patch.notifyOnUp !== undefined) columns.push(['notify_on_up', patch.notifyOnUp]);

        try {
            return await withTransaction(this.pool, async client => {
                const sets = columns.map(([column], index) => `${column} = $${index + 4}`);
                const { rowCount } = await client.query(
                    `UPDATE channel_configs SET ${[...sets, 'updated_at = NOW()'].join(', ')}
                     WHERE id = $1 AND user_id = $2 AND channel_type = $3`,
                    [id, userId, channelType, ...columns.map(([, value]) => value)]
                );
                if (!rowCount) return null;

                if (patch.monitorRegions !== undefined) {
                    await replaceRegions(client, id, patch.monitorRegions);
                }
                return this.findWith(client, userId, channelType, id);
            });
        } catch (err) {
            if (isUniqueViolation(err)) {
                throw new UniqueViolationError(`${channelType} address ${patch.address} is already configured`);
            }
            throw err;
        }
    }

    async delete(userId: number, channelType: ChannelType, id: number): Promise<boolean> {
        const { rowCount } = await this.pool.query(
            'DELETE FROM channel_configs WHERE id = $1 AND user_id = $2 AND channel_type = $3',
            [id, userId, channelType]
        );
        return (rowCount ?? 0) > 0;
    }

    async replaceAddress(channelType: ChannelType, oldAddress: string, newAddress: string): Promise<number> {
        const { rowCount } = await this.pool.query(
            `UPDATE channel_configs SET address = $1, updated_at = NOW()
             WHERE channel_type = $2 AND address = $3`,
            [newAddress, channelType, oldAddress]
        );
        return rowCount ?? 0;
    }

    private async findWith(
        db: Pool | PoolClient,
        userId: number,
        channelType: ChannelType,
        id: number
    ): Promise<ChannelConfig | null> {
        const { rows } = await db.query<ChannelConfigRow>(
            `${SELECT_CONFIGS}
             WHERE c.id = $1 AND c.user_id = $2 AND c.channel_type = $3
             GROUP BY c.id`,
            [id, userId, channelType]
        );
        return rows[0] ? toChannelConfig(channelType, rows[0]) : null;
    }
}
