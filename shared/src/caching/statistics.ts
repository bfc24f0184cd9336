/**
 * Cache statistics.
 *
 * Builds a read-only snapshot of every slot and renders it as the text summary
 * shown in diagnostics.
 */
import type { SlotWindows } from './CacheSlot.js';
import type { CacheStatistics, DomainCounters, DomainStatistics, SlotState } from './types.js';

/** The parts of a CacheSlot a snapshot reads */
export interface SlotView {
  readonly size: number;
  ageAt(now: number): number;
  state(now: number, windows: SlotWindows): SlotState;
}

export interface DomainSample<D extends string> {
  domain: D;
  slot: SlotView;
  counters: DomainCounters;
}

export function buildStatistics<D extends string>(
  samples: readonly DomainSample<D>[],
  windows: SlotWindows,
  now: number
): CacheStatistics<D> {
  const domains = {} as Record<D, DomainStatistics>;
  for (const { domain, slot, counters } of samples) {
    const ageMs = slot.ageAt(now);
    domains[domain] = {
      ...counters,
      count: slot.size,
      ageMs,
      isFresh: ageMs < windows.freshWindowMs,
      state: slot.state(now, windows),
    };
  }

  return {
    takenAt: now,
    freshWindowMs: windows.freshWindowMs,
    backgroundThresholdMs: windows.backgroundThresholdMs,
    domains,
  };
}

/**
 * Render a snapshot as one line per domain, e.g.
 * `• Tasks: 5 cached (age: 12.0s, valid: true)`.
 */
export function formatStatistics<D extends string>(
  statistics: CacheStatistics<D>,
  labels: Partial<Record<D, string>> = {}
): string {
  const lines = ['Cache Statistics:'];
  for (const [domain, entry] of entriesOf(statistics.domains)) {
    const label = labels[domain] ?? defaultLabel(domain);
    lines.push(`• ${label}: ${entry.count} cached (age: ${formatAge(entry.ageMs)}, valid: ${entry.isFresh})`);
  }
  lines.push(`• Cache duration: ${(statistics.freshWindowMs / 1000).toFixed(0)}s`);
  return lines.join('\n');
}

export function formatAge(ageMs: number): string {
  if (!Number.isFinite(ageMs)) {
    return 'never';
  }
  return `${(ageMs / 1000).toFixed(1)}s`;
}

function defaultLabel(domain: string): string {
  return domain.charAt(0).toUpperCase() + domain.slice(1);
}

function entriesOf<D extends string>(record: Record<D, DomainStatistics>): [D, DomainStatistics][] {
  const keys = Object.keys(record).filter((key): key is D => key in record);
  return keys.map((key) => [key, record[key]]);
}
