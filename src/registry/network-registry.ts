/**
 * Network Registry - bounded in-memory store of capacitated graphs
 *
 * Features:
 * - UUIDv7 ids, so listing order follows creation time
 * - LRU eviction once `maxNetworks` is reached
 * - TTL expiry, refreshed on every access
 * - Eviction statistics for monitoring
 */

import { LRUCache } from 'lru-cache';
import { v7 as uuidv7 } from 'uuid';
import { CapacitatedGraph, NetworkNotFoundError, type Edge } from '../flow/index.js';

export interface NetworkEntry {
    id: string;
    name: string;
    graph: CapacitatedGraph;
    createdAt: number;
    updatedAt: number;
}

export interface NetworkSummary {
    id: string;
    name: string;
    nodeCount: number;
    edgeCount: number;
    createdAt: number;
    updatedAt: number;
}

export interface NetworkRegistryOptions {
    /** Maximum number of networks held (default: 64) */
    maxNetworks?: number;
    /** Idle time before a network expires in ms (default: 30 minutes) */
    ttlMs?: number;
}

const DEFAULT_OPTIONS: Required<NetworkRegistryOptions> = {
    maxNetworks: 64,
    ttlMs: 30 * 60 * 1000,
};

export class NetworkRegistry {
    private cache: LRUCache<string, NetworkEntry>;
    private evictions = 0;

    constructor(options: NetworkRegistryOptions = {}) {
        const resolved = { ...DEFAULT_OPTIONS, ...options };
        this.cache = new LRUCache<string, NetworkEntry>({
            max: resolved.maxNetworks,
            ttl: resolved.ttlMs,
            updateAgeOnGet: true,
            dispose: (_value, _key, reason) => {
                if (reason === 'evict' || reason === 'expire') this.evictions++;
            },
        });
    }

    create(name?: string, edges: Edge[] = []): NetworkEntry {
        const id = uuidv7();
        const now = Date.now();
        const entry: NetworkEntry = {
            id,
            name: name ?? `network-${id.slice(0, 8)}`,
            graph: CapacitatedGraph.fromEdges(edges),
            createdAt: now,
            updatedAt: now,
        };
        this.cache.set(id, entry);
        return entry;
    }

    get(id: string): NetworkEntry {
        const entry = this.cache.get(id);
        if (!entry) throw new NetworkNotFoundError(id);
        return entry;
    }

    has(id: string): boolean {
        return this.cache.has(id);
    }

    /**
     * Accumulate edges into a stored network. A rejected batch leaves the
     * stored graph as it was.
     */
    addEdges(id: string, edges: Edge[]): NetworkEntry {
        const entry = this.get(id);
        entry.graph.addEdges(edges);
        entry.updatedAt = Date.now();
        return entry;
    }

    delete(id: string): boolean {
        return this.cache.delete(id);
    }

    list(): NetworkSummary[] {
        const summaries: NetworkSummary[] = [];
        for (const entry of this.cache.values()) {
            summaries.push(summarize(entry));
        }
        return summaries.sort((a, b) => a.id.localeCompare(b.id));
    }

    get size(): number {
        return this.cache.size;
    }

    get evictionCount(): number {
        return this.evictions;
    }

    clear(): void {
        this.cache.clear();
    }
}

export function summarize(entry: NetworkEntry): NetworkSummary {
    return {
        id: entry.id,
        name: entry.name,
        nodeCount: entry.graph.nodeCount,
        edgeCount: entry.graph.edgeCount,
        createdAt: entry.createdAt,
        updatedAt: entry.updatedAt,
    };
}
