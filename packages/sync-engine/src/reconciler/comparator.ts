/**
 * Pack Comparator
 * Classifies how packs that vanished between scrapes relate to packs that
 * newly appeared: split, merge, shrink, or an ambiguous transformation.
 * Only packs sharing zone and row are ever related.
 */

import { ValidationError } from '../errors.js';
import type {
  CandidatePack,
  PackStructure,
  PackTransformation,
  SeatPack,
  TransformationType,
} from '../types.js';
import {
  comparePackStructure,
  locationKey,
  parseSeatRange,
  rangeContains,
  rangesOverlap,
  rangeUnionCovers,
  type SeatRange,
} from './seat-range.js';

// ============================================================================
// Internal Types
// ============================================================================

interface RangedPack<T extends PackStructure> {
  pack: T;
  range: SeatRange;
  keys: ReadonlySet<string>;
}

type RangedVanished = RangedPack<SeatPack>;
type RangedAdded = RangedPack<CandidatePack>;

export interface PackComparatorOptions {
  debug?: boolean;
}

// ============================================================================
// Seat Relations
// ============================================================================

function hasKeys(packs: RangedPack<PackStructure>[]): boolean {
  return packs.every((p) => p.keys.size > 0);
}

function overlaps(a: RangedPack<PackStructure>, b: RangedPack<PackStructure>): boolean {
  if (!rangesOverlap(a.range, b.range)) {
    return false;
  }
  // Interleaved (odd/even) packs share a numeric span but no seats
  if (hasKeys([a, b])) {
    for (const key of a.keys) {
      if (b.keys.has(key)) {
        return true;
      }
    }
    return false;
  }
  return true;
}

function contains(outer: RangedPack<PackStructure>, inner: RangedPack<PackStructure>): boolean {
  if (hasKeys([outer, inner])) {
    for (const key of inner.keys) {
      if (!outer.keys.has(key)) {
        return false;
      }
    }
    return true;
  }
  return rangeContains(outer.range, inner.range);
}

function covers(target: RangedPack<PackStructure>, parts: RangedPack<PackStructure>[]): boolean {
  if (hasKeys([target, ...parts])) {
    const union = new Set<string>();
    for (const part of parts) {
      part.keys.forEach((key) => union.add(key));
    }
    for (const key of target.keys) {
      if (!union.has(key)) {
        return false;
      }
    }
    return true;
  }
  return rangeUnionCovers(
    target.range,
    parts.map((p) => p.range)
  );
}

function classify(vanished: RangedVanished[], added: RangedAdded[]): TransformationType {
  if (vanished.length === 1 && added.length === 1) {
    const [before] = vanished;
    const [after] = added;
    return contains(before, after) && !contains(after, before) ? 'shrink' : 'transformed';
  }

  if (vanished.length === 1 && added.length >= 2) {
    const [before] = vanished;
    const inside = added.every((a) => contains(before, a));
    return inside && covers(before, added) ? 'split' : 'transformed';
  }

  if (vanished.length >= 2 && added.length === 1) {
    const [after] = added;
    return vanished.every((v) => contains(after, v)) ? 'merge' : 'transformed';
  }

  return 'transformed';
}

// ============================================================================
// Pack Comparator Class
// ============================================================================

export class PackComparator {
  private readonly debug: boolean;

  constructor(options: PackComparatorOptions = {}) {
    this.debug = options.debug ?? false;
  }

  /**
   * Relate vanished packs to newly added packs. Packs left out of every
   * transformation are plain vanishes and creations.
   */
  compare(vanishedPacks: SeatPack[], newPacks: CandidatePack[]): PackTransformation[] {
    const vanishedByLocation = this.groupByLocation(
      [...vanishedPacks].sort(
        (a, b) =>
          comparePackStructure(a, b) ||
          (a.internalPackId < b.internalPackId ? -1 : a.internalPackId > b.internalPackId ? 1 : 0)
      )
    );
    const addedByLocation = this.groupByLocation([...newPacks].sort(comparePackStructure));

    const transformations: PackTransformation[] = [];
    const locations = [...vanishedByLocation.keys()].sort();

    for (const location of locations) {
      const added = addedByLocation.get(location);
      const vanished = vanishedByLocation.get(location);
      if (!added || !vanished) {
        continue;
      }
      transformations.push(...this.compareLocation(vanished, added));
    }

    this.log(
      `Compared ${vanishedPacks.length} vanished with ${newPacks.length} new packs: ${transformations.length} transformations`
    );
    return transformations;
  }

  private compareLocation(
    vanishedPacks: RangedVanished[],
    addedPacks: RangedAdded[]
  ): PackTransformation[] {
    // Union-find over vanished packs [0, v) and added packs [v, v + a)
    const offset = vanishedPacks.length;
    const parent = Array.from({ length: offset + addedPacks.length }, (_, i) => i);
    const root = (i: number): number => {
      let node = i;
      while (parent[node] !== node) {
        parent[node] = parent[parent[node]];
        node = parent[node];
      }
      return node;
    };

    vanishedPacks.forEach((v, vi) => {
      addedPacks.forEach((a, ai) => {
        if (overlaps(v, a)) {
          const left = root(vi);
          const right = root(offset + ai);
          if (left !== right) {
            parent[Math.max(left, right)] = Math.min(left, right);
          }
        }
      });
    });

    const groups = new Map<number, { vanished: RangedVanished[]; added: RangedAdded[] }>();
    const groupFor = (node: number) => {
      const key = root(node);
      let group = groups.get(key);
      if (!group) {
        group = { vanished: [], added: [] };
        groups.set(key, group);
      }
      return group;
    };
    vanishedPacks.forEach((v, vi) => groupFor(vi).vanished.push(v));
    addedPacks.forEach((a, ai) => groupFor(offset + ai).added.push(a));

    const transformations: PackTransformation[] = [];
    // Map keys are roots, the lowest member index, so iteration follows seat order
    const roots = [...groups.keys()].sort((a, b) => a - b);
    for (const key of roots) {
      const group = groups.get(key);
      if (!group || group.vanished.length === 0 || group.added.length === 0) {
        continue;
      }
      transformations.push({
        transformationType: classify(group.vanished, group.added),
        consumedPackIds: group.vanished.map((v) => v.pack.internalPackId).sort(),
        resultingPacks: group.added.map((a) => a.pack),
      });
    }
    return transformations;
  }

  private groupByLocation<T extends PackStructure>(packs: T[]): Map<string, RangedPack<T>[]> {
    const grouped = new Map<string, RangedPack<T>[]>();
    for (const pack of packs) {
      const ranged = this.toRanged(pack);
      if (!ranged) {
        continue;
      }
      const location = locationKey(pack);
      const list = grouped.get(location) ?? [];
      list.push(ranged);
      grouped.set(location, list);
    }
    return grouped;
  }

  /** Packs with unparseable seats take part in no transformation */
  private toRanged<T extends PackStructure>(pack: T): RangedPack<T> | null {
    try {
      return { pack, range: parseSeatRange(pack), keys: new Set(pack.seatKeys) };
    } catch (error) {
      if (error instanceof ValidationError) {
        this.log(`Skipping ${locationKey(pack)}: ${error.message}`, 'warn');
        return null;
      }
      throw error;
    }
  }

  private log(message: string, level: 'info' | 'warn' | 'error' = 'info'): void {
    if (!this.debug && level === 'info') {
      return;
    }

    const timestamp = new Date().toISOString();
    const prefix = `${timestamp} [PackComparator]`;

    switch (level) {
      case 'error':
        console.error(`${prefix} ERROR: ${message}`);
        break;
      case 'warn':
        console.warn(`${prefix} WARN: ${message}`);
        break;
      default:
        console.log(`${prefix} INFO: ${message}`);
    }
  }
}
