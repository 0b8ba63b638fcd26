/**
 * Domain Service
 *
 * Owner-facing domain operations. Local rows are authoritative: every
 * operation succeeds or fails on persistence alone, and provider side
 * effects go through the MonitorOrchestrator.
 */

import { DomainRepository, UniqueViolationError } from '../repositories/types';
import {
    ALLOWED_INTERVALS,
    DEFAULT_INTERVAL,
    Domain,
    DomainBatchAddResult,
    DomainBatchDeleteResult,
    DomainBatchItem,
    DomainSettingsPatch,
    RegionCode,
} from '../types';
import { AppError } from '../utils/appError';
import { MonitorOrchestrator } from './monitorOrchestrator';
import { logger } from './observabilityService';
import { RegionResolver } from './regionResolver';

// ============================================================================
// CONSTANTS
// ============================================================================

export const MAX_BATCH_SIZE = 100;

const HOSTNAME_PATTERN = /^([a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/;
const MIN_HOSTNAME_LENGTH = 3;
const MAX_HOSTNAME_LENGTH = 253;

// ============================================================================
// HOSTNAME HELPERS
// ============================================================================

/**
 * Strip scheme, path, query and port, then validate. Returns the bare
 * lowercase hostname or null.
 */
export function normalizeHostname(input: string): string | null {
    let host = input.trim().replace(/^https?:\/\//i, '');
    host = host.split(/[/?#]/)[0] ?? '';
    host = host.replace(/:\d+$/, '').replace(/\.$/, '').toLowerCase();

    if (host.length < MIN_HOSTNAME_LENGTH || host.length > MAX_HOSTNAME_LENGTH) return null;
    return HOSTNAME_PATTERN.test(host) ? host : null;
}

export function isAllowedInterval(value: number): boolean {
    return ALLOWED_INTERVALS.some(interval => interval === value);
}

function dedupeKey(name: string, region: RegionCode): string {
    return `${name.toLowerCase()}|${region}`;
}

// ============================================================================
// SERVICE
// ============================================================================

export interface DomainServiceOptions {
    domains: DomainRepository;
    orchestrator: MonitorOrchestrator;
    regionResolver: RegionResolver;
    defaultDomainLimit: number;
}

export interface AddDomainInput {
    name: string;
    region?: string;
    interval?: number;
}

export class DomainService {
    private readonly domains: DomainRepository;
    private readonly orchestrator: MonitorOrchestrator;
    private readonly regionResolver: RegionResolver;
    private readonly defaultDomainLimit: number;

    constructor(options: DomainServiceOptions) {
        this.domains = options.domains;
        this.orchestrator = options.orchestrator;
        this.regionResolver = options.regionResolver;
        this.defaultDomainLimit = options.defaultDomainLimit;
    }

    listDomains(userId: number): Promise<Domain[]> {
        return this.domains.listByUser(userId);
    }

    async getDomainLimit(userId: number): Promise<{ limit: number; used: number }> {
        const [limit, used] = await Promise.all([this.resolveLimit(userId), this.domains.countByUser(userId)]);
        return { limit, used };
    }

    /**
     * Persist a domain and schedule its remote monitors. Resolves before any
     * registration exists.
     */
    async addDomain(userId: number, input: AddDomainInput): Promise<Domain> {
        const name = this.requireHostname(input.name);
        const region = this.requireRegion(input.region);
        const interval = this.requireInterval(input.interval);

        const limit = await this.resolveLimit(userId);
        const used = await this.domains.countByUser(userId);
        if (used >= limit) {
            throw new AppError(`Domain limit reached (${limit})`, 403);
        }

        const domain = await this.createOrConflict(userId, name, region, interval);
        logger.info('[DOMAINS] Domain added', { userId, domainId: domain.id, domain: domain.name, region });

        await this.orchestrator.onDomainCreated(domain);
        return domain;
    }

    /**
     * Add up to MAX_BATCH_SIZE domains. Items are independent: one failure
     * never affects another.
     */
    async addDomainsBatch(userId: number, items: DomainBatchItem[], interval?: number): Promise<DomainBatchAddResult> {
        if (items.length === 0) {
            throw new AppError('At least one domain is required', 400);
        }
        if (items.length > MAX_BATCH_SIZE) {
            throw new AppError(`At most ${MAX_BATCH_SIZE} domains per batch`, 400);
        }
        const checkedInterval = this.requireInterval(interval);

        const result: DomainBatchAddResult = { success: [], failed: [], added: 0, total: items.length };

        const [limit, existing] = await Promise.all([this.resolveLimit(userId), this.domains.listByUser(userId)]);
        const seen = new Set(existing.map(domain => dedupeKey(domain.name, domain.region)));
        let used = existing.length;

        for (const item of items) {
            const name = normalizeHostname(item.name);
            if (!name) {
                result.failed.push({ name: item.name, region: item.region, reason: 'invalid domain name' });
                continue;
            }
            const region = this.regionResolver.normalize(item.region);
            if (!region) {
                result.failed.push({ name: item.name, region: item.region, reason: 'invalid region' });
                continue;
            }

            const key = dedupeKey(name, region);
            if (seen.has(key)) {
                result.failed.push({ name: item.name, region: item.region, reason: 'duplicate domain' });
                continue;
            }
            if (used >= limit) {
                result.failed.push({ name: item.name, region: item.region, reason: `domain limit reached (${limit})` });
                continue;
            }

            try {
                const domain = await this.domains.create({ userId, name, region, interval: checkedInterval });
                seen.add(key);
                used++;
                result.success.push({ name: domain.name, region: domain.region, id: domain.id });
                await this.orchestrator.onDomainCreated(domain);
            } catch (err) {
                const reason = err instanceof UniqueViolationError ? 'duplicate domain' : 'failed to save domain';
                if (!(err instanceof UniqueViolationError)) {
                    logger.error('[DOMAINS] Batch item failed', err instanceof Error ? err : undefined, { userId, name, region });
                }
                result.failed.push({ name: item.name, region: item.region, reason });
            }
        }

        result.added = result.success.length;
        logger.info('[DOMAINS] Batch add processed', { userId, added: result.added, failed: result.failed.length, total: result.total });
        return result;
    }

    /**
     * Change settings. A region change recreates the remote monitors; an
     * active change alone is pushed to the existing ones.
     */
    async updateDomain(userId: number, id: number, patch: DomainSettingsPatch): Promise<Domain> {
        if (patch.active === undefined && patch.interval === undefined && patch.region === undefined) {
            throw new AppError('No settings to update', 400);
        }

        const existing = await this.domains.findByIdForUser(userId, id);
        if (!existing) {
            throw new AppError('Domain not found', 404);
        }

        const normalized: DomainSettingsPatch = { active: patch.active };
        if (patch.interval !== undefined) {
            normalized.interval = this.requireInterval(patch.interval);
        }
        if (patch.region !== undefined) {
            normalized.region = this.requireRegion(patch.region);
        }

        let updated: Domain | null;
        try {
            updated = await this.domains.updateSettings(userId, id, normalized);
        } catch (err) {
            if (err instanceof UniqueViolationError) {
                throw new AppError('Domain already exists in that region', 409);
            }
            throw err;
        }
        if (!updated) {
            throw new AppError('Domain not found', 404);
        }

        if (normalized.region !== undefined && normalized.region !== existing.region) {
            await this.orchestrator.onRegionChanged(updated, existing.region, normalized.region);
        } else if (normalized.active !== undefined && normalized.active !== existing.active) {
            await this.orchestrator.onActiveChanged(updated, normalized.active);
        }

        logger.info('[DOMAINS] Domain updated', { userId, domainId: id, ...normalized });
        return updated;
    }

    async setActiveForAll(userId: number, active: boolean): Promise<{ updated: number }> {
        const changed = await this.domains.setActiveForUser(userId, active);
        for (const domain of changed) {
            await this.orchestrator.onActiveChanged(domain, active);
        }
        logger.info('[DOMAINS] Active flag set for all domains', { userId, active, updated: changed.length });
        return { updated: changed.length };
    }

    async deleteDomain(userId: number, id: number): Promise<void> {
        const result = await this.deleteDomains(userId, [id]);
        if (result.deletedCount === 0) {
            throw new AppError('Domain not found', 404);
        }
    }

    async deleteDomainsBatch(userId: number, ids: number[]): Promise<DomainBatchDeleteResult> {
        if (ids.length === 0) {
            throw new AppError('At least one domain id is required', 400);
        }
        if (ids.length > MAX_BATCH_SIZE) {
            throw new AppError(`At most ${MAX_BATCH_SIZE} domains per batch`, 400);
        }
        return this.deleteDomains(userId, [...new Set(ids)]);
    }

    async deleteAllDomains(userId: number): Promise<DomainBatchDeleteResult> {
        const owned = await this.domains.listByUser(userId);
        return this.deleteDomains(userId, owned.map(domain => domain.id));
    }

    // ------------------------------------------------------------------------
    // Internals
    // ------------------------------------------------------------------------

    /**
     * Release remote monitors for every owned domain, then delete the rows
     * and their history in one transaction.
     */
    private async deleteDomains(userId: number, ids: number[]): Promise<DomainBatchDeleteResult> {
        const result: DomainBatchDeleteResult = { deletedCount: 0, deleted: [], failed: [] };
        const found: number[] = [];

        for (const id of ids) {
            const domain = await this.domains.findByIdForUser(userId, id);
            if (!domain) {
                result.failed.push({ id, reason: 'domain not found' });
                continue;
            }

            try {
                const released = await this.orchestrator.onDomainDeleted(domain);
                if (released.orphaned > 0) {
                    logger.warn('[DOMAINS] Domain deleted with orphaned remote monitors', { userId, domainId: id, orphaned: released.orphaned });
                }
                found.push(id);
            } catch (err) {
                logger.error('[DOMAINS] Failed to release monitors', err instanceof Error ? err : undefined, { userId, domainId: id });
                result.failed.push({ id, reason: 'failed to release monitors' });
            }
        }

        const deleted = await this.domains.deleteWithRelations(userId, found);
        const deletedSet = new Set(deleted);
        for (const id of found) {
            if (!deletedSet.has(id)) {
                result.failed.push({ id, reason: 'domain not found' });
            }
        }

        result.deleted = deleted;
        result.deletedCount = deleted.length;
        if (deleted.length > 0) {
            logger.info('[DOMAINS] Domains deleted', { userId, deleted: deleted.length, failed: result.failed.length });
        }
        return result;
    }

    private async resolveLimit(userId: number): Promise<number> {
        const stored = await this.domains.getDomainLimit(userId);
        return stored ?? this.defaultDomainLimit;
    }

    private async createOrConflict(userId: number, name: string, region: RegionCode, interval: number): Promise<Domain> {
        try {
            return await this.domains.create({ userId, name, region, interval });
        } catch (err) {
            if (err instanceof UniqueViolationError) {
                throw new AppError(`Domain ${name} already exists in region ${region}`, 409);
            }
            throw err;
        }
    }

    private requireHostname(input: string): string {
        const name = normalizeHostname(input);
        if (!name) {
            throw new AppError(`Invalid domain name: ${input}`, 400);
        }
        return name;
    }

    private requireRegion(input: string | undefined): RegionCode {
        if (input === undefined) return this.regionResolver.defaultRegion;
        const region = this.regionResolver.normalize(input);
        if (!region) {
            throw new AppError(`Unknown region: ${input}`, 400);
        }
        return region;
    }

    private requireInterval(input: number | undefined): number {
        if (input === undefined) return DEFAULT_INTERVAL;
        if (!isAllowedInterval(input)) {
            throw new AppError(`Interval must be one of ${ALLOWED_INTERVALS.join(', ')}`, 400);
        }
        return input;
    }
}
