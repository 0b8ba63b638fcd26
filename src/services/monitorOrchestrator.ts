/**
 * Monitor Orchestrator
 *
 * Owns the lifecycle of a domain's monitor registrations across every
 * configured provider.
 *
 * Creation sequence (run from the monitor queue):
 *   1. createMonitor on every provider in parallel; failures are per provider
 *   2. persist all registrations in one transaction
 *   3. if persisting fails, delete every remote monitor just created
 *
 * Jobs for one domain run one at a time in queue order, so a recreate never
 * overlaps the create it replaces. This holds within one process only.
 *
 * A remote monitor whose delete fails is logged as an orphan and, where a
 * local row exists, left in state `orphaned_pending_delete` for
 * scripts/cleanup_orphaned_monitors.ts.
 */

import { ProviderClient } from '../adapters/providerAdapter';
import { ProviderRegistry } from '../adapters/providerRegistry';
import { DomainRepository, RegistrationRepository } from '../repositories/types';
import { Domain, MonitorRegistration, RegionCode, RegistrationDraft, RegistrationState } from '../types';
import { KeyedMutex } from '../utils/mutex';
import { MonitorJob, MonitorQueue } from './monitorQueue';
import { logger } from './observabilityService';
import { RegionResolver } from './regionResolver';

// ============================================================================
// TYPES
// ============================================================================

export interface MonitorOrchestratorOptions {
    domains: DomainRepository;
    registrations: RegistrationRepository;
    providers: ProviderRegistry;
    regionResolver: RegionResolver;
    queue: MonitorQueue;
}

export interface ReleaseSummary {
    deleted: number;
    orphaned: number;
}

interface CreatedMonitor {
    client: ProviderClient;
    externalId: string;
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export function monitorUrl(domain: Pick<Domain, 'name'>): string {
    return `https://${domain.name}`;
}

export function monitorDisplayName(domain: Pick<Domain, 'name'>): string {
    return `Domain Check - ${domain.name}`;
}

// ============================================================================
// ORCHESTRATOR
// ============================================================================

export class MonitorOrchestrator {
    private readonly domains: DomainRepository;
    private readonly registrations: RegistrationRepository;
    private readonly providers: ProviderRegistry;
    private readonly regionResolver: RegionResolver;
    private readonly queue: MonitorQueue;
    private readonly jobLocks = new KeyedMutex<number>();

    constructor(options: MonitorOrchestratorOptions) {
        this.domains = options.domains;
        this.registrations = options.registrations;
        this.providers = options.providers;
        this.regionResolver = options.regionResolver;
        this.queue = options.queue;
    }

    // ------------------------------------------------------------------------
    // Lifecycle hooks (called by the domain service)
    // ------------------------------------------------------------------------

    /**
     * Schedule remote creation. Returns once the job is queued; the domain is
     * already durable, so a queue failure is logged rather than thrown.
     */
    async onDomainCreated(domain: Domain): Promise<void> {
        await this.schedule({ kind: 'create', domainId: domain.id });
    }

    /**
     * Schedule release of the old monitors and creation in the new region.
     * The domain has no live monitor between the two steps.
     */
    async onRegionChanged(domain: Domain, oldRegion: RegionCode, newRegion: RegionCode): Promise<void> {
        logger.info('[ORCHESTRATOR] Region changed, scheduling monitor recreation', {
            domainId: domain.id,
            oldRegion,
            newRegion,
        });
        await this.schedule({ kind: 'recreate', domainId: domain.id });
    }

    /**
     * Push the active flag to every live remote monitor. Failures are logged
     * per provider and never reach the caller.
     */
    async onActiveChanged(domain: Domain, active: boolean): Promise<void> {
        // TODO: a failed push leaves the provider out of sync until the next
        // region change; scripts/sync_monitor_status.ts is the manual remedy
        // until a periodic drift check exists.
        let live: MonitorRegistration[];
        try {
            live = await this.registrations.listLiveByDomain(domain.id);
        } catch (err) {
            logger.error('[ORCHESTRATOR] Could not load registrations for active sync', err instanceof Error ? err : undefined, {
                domainId: domain.id,
                active,
            });
            return;
        }

        await Promise.all(
            live.map(async registration => {
                const externalId = registration.externalId;
                if (!externalId) return;

                const client = this.providers.get(registration.provider);
                if (!client) {
                    logger.warn('[ORCHESTRATOR] No client for registered provider, active flag not pushed', {
                        domainId: domain.id,
                        provider: registration.provider,
                        externalId,
                    });
                    return;
                }

                try {
                    await client.updateMonitorStatus(externalId, active);
                } catch (err) {
                    logger.error('[ORCHESTRATOR] Failed to update remote monitor status', err instanceof Error ? err : undefined, {
                        domainId: domain.id,
                        provider: registration.provider,
                        externalId,
                        active,
                    });
                }
            })
        );
    }

    /**
     * Delete every live remote monitor of a domain, independently per
     * provider. Successful deletes are marked `deleted`; failed ones are kept
     * as `orphaned_pending_delete` so the row outlives the domain.
     */
    async onDomainDeleted(domain: Domain): Promise<ReleaseSummary> {
        const live = await this.registrations.listLiveByDomain(domain.id);
        return this.release(domain.id, live);
    }

    // ------------------------------------------------------------------------
    // Queue processor
    // ------------------------------------------------------------------------

    processJob(job: MonitorJob): Promise<void> {
        return this.jobLocks.runExclusive(job.domainId, () => this.runJob(job));
    }

    // ------------------------------------------------------------------------
    // Internals
    // ------------------------------------------------------------------------

    private async runJob(job: MonitorJob): Promise<void> {
        const domain = await this.domains.findById(job.domainId);
        if (!domain) {
            logger.info('[ORCHESTRATOR] Domain gone before monitor job ran', { kind: job.kind, domainId: job.domainId });
            return;
        }

        const live = await this.registrations.listLiveByDomain(domain.id);
        if (job.kind === 'recreate') {
            await this.release(domain.id, live);
        } else if (live.length > 0) {
            logger.info('[ORCHESTRATOR] Domain already has live registrations, skipping create', {
                domainId: domain.id,
                registrations: live.length,
            });
            return;
        }

        await this.createRegistrations(domain);
    }

    private async schedule(job: MonitorJob): Promise<void> {
        try {
            await this.queue.enqueue(job);
        } catch (err) {
            logger.error('[ORCHESTRATOR] Failed to enqueue monitor job', err instanceof Error ? err : undefined, {
                kind: job.kind,
                domainId: job.domainId,
            });
        }
    }

    private async createRegistrations(domain: Domain): Promise<void> {
        const clients = this.providers.list();
        if (clients.length === 0) {
            logger.warn('[ORCHESTRATOR] No provider configured, domain stays unmonitored', { domainId: domain.id });
            return;
        }

        const url = monitorUrl(domain);
        const displayName = monitorDisplayName(domain);

        const drafts: RegistrationDraft[] = await Promise.all(
            clients.map(async (client): Promise<RegistrationDraft> => {
                const regions = this.regionResolver.submittedRegions(client.provider, domain.region);
                try {
                    const externalId = await client.createMonitor(url, displayName, regions);
                    logger.info('[ORCHESTRATOR] Remote monitor created', {
                        domainId: domain.id,
                        provider: client.provider,
                        externalId,
                        regions,
                    });
                    return { provider: client.provider, externalId, regions, state: RegistrationState.ACTIVE };
                } catch (err) {
                    logger.error('[ORCHESTRATOR] Remote monitor creation failed', err instanceof Error ? err : undefined, {
                        domainId: domain.id,
                        provider: client.provider,
                        regions,
                    });
                    return { provider: client.provider, externalId: null, regions, state: RegistrationState.PENDING };
                }
            })
        );

        const created: CreatedMonitor[] = [];
        for (const draft of drafts) {
            const client = this.providers.get(draft.provider);
            if (client && draft.externalId) {
                created.push({ client, externalId: draft.externalId });
            }
        }

        try {
            await this.registrations.saveAll(domain.id, drafts);
        } catch (err) {
            logger.error('[ORCHESTRATOR] Failed to persist registrations, deleting remote monitors', err instanceof Error ? err : undefined, {
                domainId: domain.id,
                created: created.length,
            });
            await this.compensate(domain.id, created);
            throw err;
        }

        if (created.length === 0) return;

        // The owner may have paused or deleted the domain while we were creating
        const current = await this.domains.findById(domain.id);
        if (!current) {
            const saved = await this.registrations.listLiveByDomain(domain.id);
            await this.release(domain.id, saved);
            return;
        }
        if (!current.active) {
            await this.onActiveChanged(current, false);
        }
    }

    /**
     * Undo remote creations whose ids could not be stored. Nothing is retried;
     * a failed delete leaves a remote orphan with no local row.
     */
    private async compensate(domainId: number, created: CreatedMonitor[]): Promise<void> {
        await Promise.all(
            created.map(async ({ client, externalId }) => {
                try {
                    await client.deleteMonitor(externalId);
                    logger.info('[ORCHESTRATOR] Compensating delete succeeded', {
                        domainId,
                        provider: client.provider,
                        externalId,
                    });
                } catch (err) {
                    logger.warn('[ORCHESTRATOR] Orphaned remote monitor', {
                        domainId,
                        provider: client.provider,
                        externalId,
                        error: errorMessage(err),
                    });
                }
            })
        );
    }

    private async release(domainId: number, registrations: MonitorRegistration[]): Promise<ReleaseSummary> {
        const outcomes = await Promise.all(
            registrations.map(async registration => ({
                registration,
                released: await this.deleteRemote(domainId, registration),
            }))
        );

        const deletedIds = outcomes.filter(outcome => outcome.released).map(outcome => outcome.registration.id);
        const orphanedIds = outcomes.filter(outcome => !outcome.released).map(outcome => outcome.registration.id);

        await this.registrations.markState(deletedIds, RegistrationState.DELETED);
        await this.registrations.markState(orphanedIds, RegistrationState.ORPHANED_PENDING_DELETE);

        return { deleted: deletedIds.length, orphaned: orphanedIds.length };
    }

    /** True when no remote object remains for this registration. */
    private async deleteRemote(domainId: number, registration: MonitorRegistration): Promise<boolean> {
        const externalId = registration.externalId;
        if (!externalId) return true;

        const client = this.providers.get(registration.provider);
        if (!client) {
            logger.warn('[ORCHESTRATOR] Orphaned remote monitor', {
                domainId,
                provider: registration.provider,
                externalId,
                error: 'provider not configured',
            });
            return false;
        }

        try {
            await client.deleteMonitor(externalId);
            return true;
        } catch (err) {
            logger.warn('[ORCHESTRATOR] Orphaned remote monitor', {
                domainId,
                provider: registration.provider,
                externalId,
                error: errorMessage(err),
            });
            return false;
        }
    }
}
