/**
 * Repository contracts.
 *
 * Services depend on these interfaces only. Production uses the pg
 * implementations in this directory; tests use in-memory fakes.
 */

import {
    ChannelConfig,
    ChannelConfigInput,
    ChannelConfigPatch,
    ChannelType,
    CheckResult,
    Domain,
    DomainSettingsPatch,
    MonitorRegistration,
    NewDomain,
    NotificationHistoryRecord,
    NotificationType,
    RegistrationDraft,
    RegistrationState,
} from '../types';

/**
 * A write hit a unique constraint (duplicate domain, duplicate address).
 */
export class UniqueViolationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UniqueViolationError';
    }
}

export interface DomainRepository {
    listByUser(userId: number): Promise<Domain[]>;
    findById(id: number): Promise<Domain | null>;
    findByIdForUser(userId: number, id: number): Promise<Domain | null>;
    countByUser(userId: number): Promise<number>;
    /** Stored per-user limit, or null when the user has none. */
    getDomainLimit(userId: number): Promise<number | null>;
    create(input: NewDomain): Promise<Domain>;
    updateSettings(userId: number, id: number, patch: DomainSettingsPatch): Promise<Domain | null>;
    setActiveForUser(userId: number, active: boolean): Promise<Domain[]>;
    updateStatus(id: number, result: CheckResult): Promise<void>;
    /** Active domains with at least one active registration that has an external id. */
    listMonitored(): Promise<Domain[]>;
    /**
     * Delete domains, their notification history and their registrations
     * (orphaned rows excepted) in one transaction. Returns deleted ids.
     */
    deleteWithRelations(userId: number, ids: number[]): Promise<number[]>;
}

export interface RegistrationRepository {
    /** Pending and active registrations of a domain. */
    listLiveByDomain(domainId: number): Promise<MonitorRegistration[]>;
    listByState(state: RegistrationState): Promise<MonitorRegistration[]>;
    /** Insert every draft atomically; all or nothing. */
    saveAll(domainId: number, drafts: RegistrationDraft[]): Promise<MonitorRegistration[]>;
    markState(ids: number[], state: RegistrationState): Promise<void>;
}

export interface ChannelConfigRepository {
    listByUser(userId: number, channelType: ChannelType): Promise<ChannelConfig[]>;
    findByIdForUser(userId: number, channelType: ChannelType, id: number): Promise<ChannelConfig | null>;
    create(userId: number, channelType: ChannelType, input: ChannelConfigInput): Promise<ChannelConfig>;
    update(userId: number, channelType: ChannelType, id: number, patch: ChannelConfigPatch): Promise<ChannelConfig | null>;
    delete(userId: number, channelType: ChannelType, id: number): Promise<boolean>;
    /** Rewrite an address everywhere it is used (Telegram chat migration). */
    replaceAddress(channelType: ChannelType, oldAddress: string, newAddress: string): Promise<number>;
}

export interface NotificationHistoryReader {
    lastNotifiedAt(
        domainId: number,
        channelType: ChannelType,
        channelConfigId: number,
        notificationType: NotificationType
    ): Promise<Date | null>;
}

export interface NotificationHistoryRepository extends NotificationHistoryReader {
    append(record: NotificationHistoryRecord): Promise<void>;
}
