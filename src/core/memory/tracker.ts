/**
 * Entity Context Tracker
 *
 * Process-local reinforcement: entities that keep coming back across turns
 * earn a boost that fades after 15 minutes of silence. Not persisted; a
 * restart starts from scratch. Entities idle past tracker.idleSeconds are
 * forgotten, and beyond tracker.maxTracked the least recently seen go.
 */

import { type MemoryConfig, memoryDefaults } from './config';

interface TrackedEntity {
  importance: number;
  mentions: number;
  lastAccessed: number;
}

export interface TrackerStats {
  trackedEntities: number;
  areaPatterns: number;
  domainPatterns: number;
}

export class EntityContextTracker {
  /** Least recently seen first */
  private readonly entities = new Map<string, TrackedEntity>();
  private readonly areaPatterns = new Map<string, Set<string>>();
  private readonly domainPatterns = new Map<string, Set<string>>();

  constructor(
    private readonly config: MemoryConfig = memoryDefaults,
    private readonly clock: () => number = Date.now
  ) {}

  updateEntity(entityId: string, relevance: number, area?: string | null, domain?: string | null): void {
    if (!entityId) return;

    const existing = this.entities.get(entityId);
    const retain = this.config.tracker.emaRetain;
    this.entities.delete(entityId);
    this.entities.set(entityId, {
      importance: existing
        ? retain * existing.importance + (1 - retain) * relevance
        : relevance,
      mentions: (existing?.mentions ?? 0) + 1,
      lastAccessed: this.clock()
    });

    if (area) addTo(this.areaPatterns, area, entityId);
    if (domain) addTo(this.domainPatterns, domain, entityId);
    this.prune();
  }

  /**
   * importance × frequency × recency; 1.0 for unknown entities.
   */
  getEntityBoost(entityId: string): number {
    const tracked = this.entities.get(entityId);
    if (!tracked) return 1.0;

    const t = this.config.tracker;
    const frequency = Math.min(t.frequencyCap, 1 + (tracked.mentions - 1) * t.frequencyStep);
    const elapsedSeconds = Math.max(0, this.clock() - tracked.lastAccessed) / 1000;
    const recency = Math.max(t.recencyFloor, 1 - elapsedSeconds / t.recencyWindowSeconds);

    return tracked.importance * frequency * recency;
  }

  /**
   * Boosts of every tracked entity above `threshold`.
   */
  getSignificantBoosts(threshold = this.config.tracker.reportThreshold): Map<string, number> {
    const boosts = new Map<string, number>();
    for (const entityId of this.entities.keys()) {
      const boost = this.getEntityBoost(entityId);
      if (boost > threshold) boosts.set(entityId, boost);
    }
    return boosts;
  }

  entitiesInArea(area: string): string[] {
    return Array.from(this.areaPatterns.get(area) ?? []);
  }

  entitiesInDomain(domain: string): string[] {
    return Array.from(this.domainPatterns.get(domain) ?? []);
  }

  private prune(): void {
    const { idleSeconds, maxTracked } = this.config.tracker;
    const idleBefore = this.clock() - idleSeconds * 1000;

    for (const [entityId, tracked] of this.entities) {
      if (tracked.lastAccessed >= idleBefore && this.entities.size <= maxTracked) break;
      this.forget(entityId);
    }
  }

  private forget(entityId: string): void {
    this.entities.delete(entityId);
    for (const index of [this.areaPatterns, this.domainPatterns]) {
      for (const [key, ids] of index) {
        ids.delete(entityId);
        if (ids.size === 0) index.delete(key);
      }
    }
  }

  stats(): TrackerStats {
    return {
      trackedEntities: this.entities.size,
      areaPatterns: this.areaPatterns.size,
      domainPatterns: this.domainPatterns.size
    };
  }
}

function addTo(index: Map<string, Set<string>>, key: string, entityId: string): void {
  const set = index.get(key);
  if (set) set.add(entityId);
  else index.set(key, new Set([entityId]));
}
