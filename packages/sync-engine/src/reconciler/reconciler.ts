/**
 * Pack Reconciler
 * Diffs the active packs of a performance against a fresh scrape and
 * produces a SyncPlan. Pure and deterministic: no I/O, same inputs give
 * the same plan.
 *
 * Planning runs in two phases. `classify` matches packs by structure and
 * runs the comparator; `buildPlan` only accepts its output, so creations
 * and the delists they replace always come from the same pass.
 */

import { ValidationError } from '../errors.js';
import type {
  CandidatePack,
  CreationAction,
  DelistAction,
  PackChanges,
  PackStructure,
  PackTransformation,
  SeatPack,
  SyncAction,
  SyncPlan,
  UpdatableField,
  UpdateAction,
} from '../types.js';
import { PackComparator } from './comparator.js';
import {
  comparePackStructure,
  locationKey,
  parseSeatRange,
  rangeKey,
  rangesOverlap,
  type SeatRange,
} from './seat-range.js';

// ============================================================================
// Classification
// ============================================================================

const classificationToken: unique symbol = Symbol('PackClassification');

interface MatchedPack {
  existing: SeatPack;
  candidate: CandidatePack;
  changes: PackChanges;
}

interface ClassificationData {
  performanceId: string;
  posEnabled: boolean;
  matched: MatchedPack[];
  vanished: SeatPack[];
  duplicateExisting: SeatPack[];
  added: CandidatePack[];
  transformations: PackTransformation[];
  suspectEmptyScrape: boolean;
  warnings: string[];
}

/**
 * Output of the classify phase. Only the reconciler can construct one.
 */
export class PackClassification {
  constructor(
    token: typeof classificationToken,
    readonly data: Readonly<ClassificationData>
  ) {
    if (token !== classificationToken) {
      throw new TypeError('PackClassification is created by PackReconciler.classify');
    }
  }
}

const UPDATABLE_FIELDS: UpdatableField[] = ['packSize', 'packPrice', 'totalPrice'];

function diffFields(existing: PackStructure, candidate: PackStructure): PackChanges {
  const changes: PackChanges = {};
  for (const field of UPDATABLE_FIELDS) {
    if (existing[field] !== candidate[field]) {
      changes[field] = { from: existing[field], to: candidate[field] };
    }
  }
  return changes;
}

function byPackId(a: SeatPack, b: SeatPack): number {
  return a.internalPackId < b.internalPackId ? -1 : a.internalPackId > b.internalPackId ? 1 : 0;
}

function tryRange(pack: PackStructure): SeatRange | null {
  try {
    return parseSeatRange(pack);
  } catch (error) {
    if (error instanceof ValidationError) {
      return null;
    }
    throw error;
  }
}

export interface PackReconcilerOptions {
  comparator?: PackComparator;
  debug?: boolean;
}

// ============================================================================
// Pack Reconciler Class
// ============================================================================

export class PackReconciler {
  private readonly comparator: PackComparator;
  private readonly debug: boolean;

  constructor(options: PackReconcilerOptions = {}) {
    this.debug = options.debug ?? false;
    this.comparator = options.comparator ?? new PackComparator({ debug: this.debug });
  }

  /**
   * Compute the plan that takes the existing active packs to the new scrape.
   */
  diff(
    existingActivePacks: SeatPack[],
    newlyGeneratedPacks: CandidatePack[],
    posEnabled: boolean,
    performanceId: string
  ): SyncPlan {
    const classification = this.classify(
      existingActivePacks,
      newlyGeneratedPacks,
      posEnabled,
      performanceId
    );
    return this.buildPlan(classification);
  }

  /**
   * Plan a first scrape: every candidate becomes an organic creation.
   */
  planCreations(candidates: CandidatePack[], posEnabled: boolean, performanceId: string): SyncPlan {
    const warnings: string[] = [];
    const unique = this.dedupeCandidates(candidates, warnings);
    const accepted = this.dropOverlapping(unique, [], warnings);

    return {
      performanceId,
      posEnabled,
      creations: accepted.map((packData): CreationAction => ({
        kind: 'create',
        packData,
        actionType: 'create',
        sourcePackIds: [],
      })),
      updates: [],
      delists: [],
      syncs: [],
      warnings,
      suspectEmptyScrape: false,
    };
  }

  // ==========================================================================
  // Phase 1: classify
  // ==========================================================================

  classify(
    existingActivePacks: SeatPack[],
    newlyGeneratedPacks: CandidatePack[],
    posEnabled: boolean,
    performanceId: string
  ): PackClassification {
    const warnings: string[] = [];

    const candidates = this.dedupeCandidates(newlyGeneratedPacks, warnings);

    // One retained pack per range; extra active packs on the same range are retired
    const existingByRange = new Map<string, SeatPack>();
    const duplicateExisting: SeatPack[] = [];
    const active = existingActivePacks
      .filter((pack) => pack.existence.status === 'active')
      .sort(byPackId);
    for (const pack of active) {
      const key = rangeKey(pack);
      if (existingByRange.has(key)) {
        duplicateExisting.push(pack);
      } else {
        existingByRange.set(key, pack);
      }
    }
    if (duplicateExisting.length > 0) {
      warnings.push(
        `${duplicateExisting.length} duplicate active packs share a seat range and will be delisted`
      );
    }

    const matched: MatchedPack[] = [];
    const unmatchedCandidates: CandidatePack[] = [];
    const matchedIds = new Set<string>();

    for (const candidate of candidates) {
      const existing = existingByRange.get(rangeKey(candidate));
      if (existing) {
        matched.push({ existing, candidate, changes: diffFields(existing, candidate) });
        matchedIds.add(existing.internalPackId);
      } else {
        unmatchedCandidates.push(candidate);
      }
    }

    const vanished = [...existingByRange.values()]
      .filter((pack) => !matchedIds.has(pack.internalPackId))
      .sort(byPackId);

    const added = this.dropOverlapping(
      unmatchedCandidates,
      matched.map((m) => m.existing),
      warnings
    );

    const transformations = this.comparator.compare(vanished, added);

    const suspectEmptyScrape = newlyGeneratedPacks.length === 0 && active.length > 0;
    if (suspectEmptyScrape) {
      warnings.push(
        `Empty scrape for performance ${performanceId} with ${active.length} active packs: delists withheld`
      );
      this.log(`Suspect empty scrape for ${performanceId}, withholding delists`, 'warn');
    }

    return new PackClassification(classificationToken, {
      performanceId,
      posEnabled,
      matched,
      vanished,
      duplicateExisting,
      added,
      transformations,
      suspectEmptyScrape,
      warnings,
    });
  }

  // ==========================================================================
  // Phase 2: build
  // ==========================================================================

  buildPlan(classification: PackClassification): SyncPlan {
    const data = classification.data;

    const creations: CreationAction[] = [];
    const delists: DelistAction[] = [];
    const consumed = new Set<string>();
    const transformed = new Set<CandidatePack>();

    for (const transformation of data.transformations) {
      for (const packData of transformation.resultingPacks) {
        transformed.add(packData);
        creations.push({
          kind: 'create',
          packData,
          actionType: transformation.transformationType,
          sourcePackIds: [...transformation.consumedPackIds],
        });
      }
      for (const packId of transformation.consumedPackIds) {
        consumed.add(packId);
        delists.push({ kind: 'delist', packId, reason: 'transformed' });
      }
    }

    for (const packData of data.added) {
      if (!transformed.has(packData)) {
        creations.push({ kind: 'create', packData, actionType: 'create', sourcePackIds: [] });
      }
    }

    for (const pack of data.vanished) {
      if (!consumed.has(pack.internalPackId)) {
        delists.push({ kind: 'delist', packId: pack.internalPackId, reason: 'vanished' });
      }
    }
    for (const pack of data.duplicateExisting) {
      delists.push({ kind: 'delist', packId: pack.internalPackId, reason: 'vanished' });
    }

    const updates: UpdateAction[] = [];
    const syncs: SyncAction[] = [];

    for (const { existing, candidate, changes } of data.matched) {
      const changedFields = UPDATABLE_FIELDS.filter((field) => changes[field] !== undefined);
      if (changedFields.length > 0) {
        const updatedData: UpdateAction['updatedData'] = {};
        for (const field of changedFields) {
          updatedData[field] = candidate[field];
        }
        updates.push({ kind: 'update', packId: existing.internalPackId, updatedData, changes });
      }

      if (data.posEnabled && existing.pos.status === 'pending') {
        syncs.push({
          kind: 'sync',
          packId: existing.internalPackId,
          packData: changedFields.length > 0 ? candidate : existing,
          confirmation: null,
        });
      }
    }

    const plan: SyncPlan = {
      performanceId: data.performanceId,
      posEnabled: data.posEnabled,
      creations,
      updates,
      delists: data.suspectEmptyScrape ? [] : delists,
      syncs,
      warnings: [...data.warnings],
      suspectEmptyScrape: data.suspectEmptyScrape,
    };

    this.log(
      `Plan for ${data.performanceId}: ${plan.creations.length} creations, ${plan.updates.length} updates, ` +
        `${plan.delists.length} delists, ${plan.syncs.length} syncs`
    );
    return plan;
  }

  // ==========================================================================
  // Candidate Hygiene
  // ==========================================================================

  /** Sort candidates and keep the first of each seat range */
  private dedupeCandidates(candidates: CandidatePack[], warnings: string[]): CandidatePack[] {
    const seen = new Set<string>();
    const unique: CandidatePack[] = [];
    for (const candidate of [...candidates].sort(comparePackStructure)) {
      const key = rangeKey(candidate);
      if (!seen.has(key)) {
        seen.add(key);
        unique.push(candidate);
      }
    }
    const dropped = candidates.length - unique.length;
    if (dropped > 0) {
      warnings.push(`${dropped} duplicate candidate packs ignored`);
    }
    return unique;
  }

  /**
   * Drop candidates overlapping a retained pack or an earlier candidate in
   * the same row, so at most one active pack covers any seat.
   */
  private dropOverlapping(
    candidates: CandidatePack[],
    retained: PackStructure[],
    warnings: string[]
  ): CandidatePack[] {
    const occupied = new Map<string, { range: SeatRange; keys: ReadonlySet<string> }[]>();
    const occupy = (pack: PackStructure, range: SeatRange) => {
      const location = locationKey(pack);
      const list = occupied.get(location) ?? [];
      list.push({ range, keys: new Set(pack.seatKeys) });
      occupied.set(location, list);
    };

    for (const pack of retained) {
      const range = tryRange(pack);
      if (range) {
        occupy(pack, range);
      }
    }

    const accepted: CandidatePack[] = [];
    let dropped = 0;
    for (const candidate of candidates) {
      const range = tryRange(candidate);
      if (!range) {
        accepted.push(candidate);
        continue;
      }
      const keys = new Set(candidate.seatKeys);
      const clash = (occupied.get(locationKey(candidate)) ?? []).some((other) => {
        if (!rangesOverlap(other.range, range)) {
          return false;
        }
        if (other.keys.size > 0 && keys.size > 0) {
          return [...keys].some((key) => other.keys.has(key));
        }
        return true;
      });
      if (clash) {
        dropped++;
        continue;
      }
      occupy(candidate, range);
      accepted.push(candidate);
    }

    if (dropped > 0) {
      warnings.push(`${dropped} candidate packs overlap other packs in their row and were ignored`);
    }
    return accepted;
  }

  private log(message: string, level: 'info' | 'warn' | 'error' = 'info'): void {
    const prefix = `[PackReconciler]`;
    const timestamp = new Date().toISOString();

    switch (level) {
      case 'error':
        console.error(`${timestamp} ${prefix} ERROR: ${message}`);
        break;
      case 'warn':
        console.warn(`${timestamp} ${prefix} WARN: ${message}`);
        break;
      default:
        if (this.debug) {
          console.log(`${timestamp} ${prefix} ${message}`);
        }
    }
  }
}
