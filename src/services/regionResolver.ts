/**
 * Region Resolver
 *
 * Maps a logical region code to a provider's location identifier, plus the
 * neighbouring region a provider gets as a fallback where its checkpoint
 * coverage is thin. Both tables live in config/regions.json; this module
 * only validates and reads them.
 */

import { z } from 'zod';
import regionData from '../config/regions.json';
import { ProviderName, RegionCode } from '../types';

// ============================================================================
// TABLE SCHEMA
// ============================================================================

const providerTableSchema = z.object({
    locations: z.record(z.string(), z.string().min(1)),
    sparseFallbacks: z.record(z.string(), z.string()),
});

const regionTableSchema = z
    .object({
        defaultRegion: z.string(),
        regions: z.array(z.string()).min(1),
        aliases: z.record(z.string(), z.string()),
        providers: z.object({
            uptrends: providerTableSchema,
            site24x7: providerTableSchema,
        }),
    })
    .superRefine((table, ctx) => {
        const known = new Set(table.regions);
        const requireKnown = (code: string, path: (string | number)[]) => {
            if (!known.has(code)) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: `unknown region "${code}"` });
            }
        };

        requireKnown(table.defaultRegion, ['defaultRegion']);
        for (const [alias, code] of Object.entries(table.aliases)) {
            requireKnown(code, ['aliases', alias]);
        }
        for (const [provider, providerTable] of Object.entries(table.providers)) {
            for (const region of table.regions) {
                if (!providerTable.locations[region]) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        path: ['providers', provider, 'locations', region],
                        message: 'missing location id',
                    });
                }
            }
            for (const [sparse, fallback] of Object.entries(providerTable.sparseFallbacks)) {
                requireKnown(sparse, ['providers', provider, 'sparseFallbacks']);
                requireKnown(fallback, ['providers', provider, 'sparseFallbacks', sparse]);
            }
        }
    });

type ProviderRegionTable = z.infer<typeof providerTableSchema>;

export interface RegionTable {
    defaultRegion: RegionCode;
    regions: RegionCode[];
    aliases: Record<string, RegionCode>;
    providers: Record<ProviderName, ProviderRegionTable>;
}

export interface ResolvedRegion {
    region: RegionCode;
    locationId: string;
    fallbackRegions: RegionCode[];
}

/**
 * Validate a raw region table. Throws on an inconsistent table so a bad
 * edit fails at startup rather than at the first monitor creation.
 */
export function loadRegionTable(raw: unknown = regionData): RegionTable {
    const parsed = regionTableSchema.parse(raw);
    return {
        defaultRegion: parsed.defaultRegion,
        regions: parsed.regions,
        aliases: parsed.aliases,
        providers: {
            [ProviderName.UPTRENDS]: parsed.providers.uptrends,
            [ProviderName.SITE24X7]: parsed.providers.site24x7,
        },
    };
}

// ============================================================================
// RESOLVER
// ============================================================================

export class RegionResolver {
    private readonly known: Set<RegionCode>;

    constructor(private readonly table: RegionTable = loadRegionTable()) {
        this.known = new Set(table.regions);
    }

    get defaultRegion(): RegionCode {
        return this.table.defaultRegion;
    }

    knownRegions(): RegionCode[] {
        return [...this.table.regions];
    }

    /**
     * Accepts codes or country names in any case ("th", "Thailand").
     * Returns null when the input names no known region.
     */
    normalize(input: string): RegionCode | null {
        const key = input.trim().toUpperCase();
        if (this.known.has(key)) return key;
        return this.table.aliases[key] ?? null;
    }

    /**
     * Unknown regions resolve to the default region; this never throws.
     */
    resolve(provider: ProviderName, region: string): ResolvedRegion {
        const code = this.normalize(region) ?? this.table.defaultRegion;
        const providerTable = this.table.providers[provider];
        const fallback = providerTable.sparseFallbacks[code];

        return {
            region: code,
            locationId: providerTable.locations[code] ?? providerTable.locations[this.table.defaultRegion] ?? '',
            fallbackRegions: fallback ? [fallback] : [],
        };
    }

    /** Primary region followed by its fallbacks, in submission order. */
    submittedRegions(provider: ProviderName, region: string): RegionCode[] {
        const resolved = this.resolve(provider, region);
        return [resolved.region, ...resolved.fallbackRegions];
    }

    locationIdFor(provider: ProviderName, region: string): string {
        return this.resolve(provider, region).locationId;
    }
}
