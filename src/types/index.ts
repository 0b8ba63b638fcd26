/**
 * Shared domain types.
 *
 * Rows come out of the repositories in these shapes; services never see raw
 * pg rows.
 */

// ============================================================================
// ENUMS
// ============================================================================

export enum ProviderName {
    UPTRENDS = 'uptrends',
    SITE24X7 = 'site24x7',
}

export enum RegistrationState {
    PENDING = 'pending',
    ACTIVE = 'active',
    ORPHANED_PENDING_DELETE = 'orphaned_pending_delete',
    DELETED = 'deleted',
}

export enum NotificationType {
    DOWN = 'down',
    UP = 'up',
    STATUS = 'status',
}

export enum ChannelType {
    TELEGRAM = 'telegram',
    EMAIL = 'email',
}

export const ALLOWED_INTERVALS = [10, 20, 30, 60, 120] as const;
export type CheckInterval = typeof ALLOWED_INTERVALS[number];
export const DEFAULT_INTERVAL: CheckInterval = 20;

/** Region code from the closed set in config/regions.json (CN, VN, ...). */
export type RegionCode = string;

export type Clock = () => Date;

// ============================================================================
// ENTITIES
// ============================================================================

export interface Domain {
    id: number;
    userId: number;
    name: string;
    active: boolean;
    interval: number;
    region: RegionCode;
    lastStatus: number;
    errorCode: number;
    errorDescription: string;
    totalTime: number;
    lastCheck: Date | null;
    createdAt: Date;
    updatedAt: Date;
}

export interface MonitorRegistration {
    id: number;
    domainId: number;
    provider: ProviderName;
    externalId: string | null;
    regions: RegionCode[];
    state: RegistrationState;
    createdAt: Date;
    updatedAt: Date;
}

export interface ChannelConfig {
    id: number;
    userId: number;
    channelType: ChannelType;
    /** Telegram chat id or email address. */
    address: string;
    name: string;
    language: string;
    active: boolean;
    notifyOnDown: boolean;
    notifyOnUp: boolean;
    /** Empty means every region. */
    monitorRegions: RegionCode[];
    createdAt: Date;
    updatedAt: Date;
}

export interface CheckResult {
    statusCode: number;
    totalTimeMs: number;
    errorCode: number;
    errorDescription: string;
    available: boolean;
    checkedAt: Date;
}

export interface NotificationHistoryRecord {
    domainId: number;
    channelType: ChannelType;
    channelConfigId: number;
    statusCode: number;
    errorCode: number;
    errorDescription: string;
    notificationType: NotificationType;
    notifiedAt: Date;
}

// ============================================================================
// SERVICE INPUTS / OUTPUTS
// ============================================================================

export interface NewDomain {
    userId: number;
    name: string;
    interval: number;
    region: RegionCode;
}

export interface DomainSettingsPatch {
    active?: boolean;
    interval?: number;
    region?: RegionCode;
}

export interface DomainBatchItem {
    name: string;
    region: string;
}

export interface DomainBatchAddResult {
    success: { name: string; region: RegionCode; id: number }[];
    failed: { name: string; region: string; reason: string }[];
    added: number;
    total: number;
}

export interface DomainBatchDeleteResult {
    deletedCount: number;
    deleted: number[];
    failed: { id: number; reason: string }[];
}

export interface RegistrationDraft {
    provider: ProviderName;
    externalId: string | null;
    regions: RegionCode[];
    state: RegistrationState;
}

export interface ChannelConfigInput {
    address: string;
    name?: string;
    language?: string;
    active?: boolean;
    notifyOnDown?: boolean;
    notifyOnUp?: boolean;
    monitorRegions?: RegionCode[];
}

export type ChannelConfigPatch = Partial<ChannelConfigInput>;

export interface FormattedMessage {
    subject: string;
    text: string;
    html: string;
}

export interface UserContext {
    userId: number;
}
