import { Pool } from 'pg';
import { ChannelType, NotificationHistoryRecord, NotificationType } from '../types';
import { NotificationHistoryRepository } from './types';

export class PgNotificationHistoryRepository implements NotificationHistoryRepository {
    constructor(private readonly pool: Pool) {}

    async lastNotifiedAt(
        domainId: number,
        channelType: ChannelType,
        channelConfigId: number,
        notificationType: NotificationType
    ): Promise<Date | null> {
        const { rows } = await this.pool.query<{ last: Date | null }>(
            `SELECT MAX(notified_at) AS last
             FROM notification_history
             WHERE domain_id = $1 AND channel_type = $2 AND channel_config_id = $3 AND notification_type = $4`,
            [domainId, channelType, channelConfigId, notificationType]
        );
        return rows[0]?.last ?? null;
    }

    async append(record: NotificationHistoryRecord): Promise<void> {
        await this.pool.query(
            `INSERT INTO notification_history
                 (domain_id, channel_type, channel_config_id, status_code, error_code,
                  error_description, notification_type, notified_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
            [
                record.domainId,
                record.channelType,
                record.channelConfigId,
                record.statusCode,
                record.errorCode,
                record.errorDescription,
                record.notificationType,
                record.notifiedAt,
            ]
        );
    }
}
