/**
 * Pack Reconciler Tests
 * Tests plan building from existing packs and a fresh scrape
 */

import { describe, it, expect } from 'vitest';
import { PackClassification, PackReconciler } from '../reconciler/reconciler.js';
import { PERF_ID, candidate, seatPack } from './helpers.js';

describe('PackReconciler', () => {
  const reconciler = new PackReconciler();

  describe('diff', () => {
    it('produces an empty plan when the scrape matches the stored packs', () => {
      const existing = [seatPack('P1', { start: 1, end: 4 }), seatPack('P2', { start: 5, end: 6 })];
      const plan = reconciler.diff(
        existing,
        [candidate({ start: 5, end: 6 }), candidate({ start: 1, end: 4 })],
        true,
        PERF_ID
      );

      expect(plan.creations).toEqual([]);
      expect(plan.updates).toEqual([]);
      expect(plan.delists).toEqual([]);
      expect(plan.syncs).toEqual([]);
      expect(plan.warnings).toEqual([]);
    });

    it('delists the parent and creates split children', () => {
      const plan = reconciler.diff(
        [seatPack('P1', { start: 1, end: 4, price: 50 })],
        [candidate({ start: 1, end: 2, price: 50 }), candidate({ start: 3, end: 4, price: 50 })],
        true,
        PERF_ID
      );

      expect(plan.delists).toEqual([{ kind: 'delist', packId: 'P1', reason: 'transformed' }]);
      expect(plan.creations).toHaveLength(2);
      expect(plan.creations.map((c) => [c.actionType, c.sourcePackIds, c.packData.startSeatNumber])).toEqual([
        ['split', ['P1'], '1'],
        ['split', ['P1'], '3'],
      ]);
    });

    it('delists both parents and creates one merged pack', () => {
      const plan = reconciler.diff(
        [seatPack('P1', { start: 1, end: 2 }), seatPack('P2', { start: 3, end: 4 })],
        [candidate({ start: 1, end: 4 })],
        true,
        PERF_ID
      );

      expect(plan.creations).toHaveLength(1);
      expect(plan.creations[0].actionType).toBe('merge');
      expect(plan.creations[0].sourcePackIds).toEqual(['P1', 'P2']);
      expect(plan.delists).toEqual([
        { kind: 'delist', packId: 'P1', reason: 'transformed' },
        { kind: 'delist', packId: 'P2', reason: 'transformed' },
      ]);
    });

    it('updates changed prices in place', () => {
      const plan = reconciler.diff(
        [seatPack('P1', { start: 1, end: 4, price: 50 })],
        [candidate({ start: 1, end: 4, price: 60 })],
        true,
        PERF_ID
      );

      expect(plan.updates).toEqual([
        {
          kind: 'update',
          packId: 'P1',
          updatedData: { packPrice: 60, totalPrice: 240 },
          changes: {
            packPrice: { from: 50, to: 60 },
            totalPrice: { from: 200, to: 240 },
          },
        },
      ]);
      expect(plan.creations).toEqual([]);
      expect(plan.delists).toEqual([]);
    });

    it('delists vanished packs and creates unrelated new ones', () => {
      const plan = reconciler.diff(
        [seatPack('P1', { row: 'A', start: 1, end: 2 })],
        [candidate({ row: 'B', start: 1, end: 2 })],
        true,
        PERF_ID
      );

      expect(plan.delists).toEqual([{ kind: 'delist', packId: 'P1', reason: 'vanished' }]);
      expect(plan.creations.map((c) => [c.actionType, c.packData.rowLabel])).toEqual([['create', 'B']]);
    });

    it('withholds delists for an empty scrape over existing packs', () => {
      const plan = reconciler.diff(
        [seatPack('P1', { start: 1, end: 2 }), seatPack('P2', { start: 3, end: 4 })],
        [],
        true,
        PERF_ID
      );

      expect(plan.suspectEmptyScrape).toBe(true);
      expect(plan.delists).toEqual([]);
      expect(plan.warnings).toEqual([
        'Empty scrape for performance perf-1 with 2 active packs: delists withheld',
      ]);
    });

    it('plans syncs for matched packs still pending at the vendor', () => {
      const pending = seatPack(
        'P1',
        { start: 1, end: 2 },
        { pos: { status: 'pending', attempts: 2, lastError: 'timeout' } }
      );

      const enabled = reconciler.diff([pending], [candidate({ start: 1, end: 2 })], true, PERF_ID);
      const disabled = reconciler.diff([pending], [candidate({ start: 1, end: 2 })], false, PERF_ID);

      expect(enabled.syncs.map((s) => [s.packId, s.confirmation])).toEqual([['P1', null]]);
      expect(disabled.syncs).toEqual([]);
    });

    it('ignores duplicate candidates and candidates overlapping a kept pack', () => {
      const plan = reconciler.diff(
        [seatPack('P1', { start: 1, end: 4 })],
        [
          candidate({ start: 1, end: 4 }),
          candidate({ start: 1, end: 4 }),
          candidate({ start: 3, end: 6 }),
        ],
        true,
        PERF_ID
      );

      expect(plan.creations).toEqual([]);
      expect(plan.delists).toEqual([]);
      expect(plan.warnings).toEqual([
        '1 duplicate candidate packs ignored',
        '1 candidate packs overlap other packs in their row and were ignored',
      ]);
    });

    it('retires extra active packs sharing one seat range', () => {
      const plan = reconciler.diff(
        [seatPack('P2', { start: 1, end: 2 }), seatPack('P1', { start: 1, end: 2 })],
        [candidate({ start: 1, end: 2 })],
        true,
        PERF_ID
      );

      expect(plan.delists).toEqual([{ kind: 'delist', packId: 'P2', reason: 'vanished' }]);
      expect(plan.warnings).toEqual([
        '1 duplicate active packs share a seat range and will be delisted',
      ]);
    });

    it('is deterministic regardless of input order', () => {
      const existing = [seatPack('P1', { start: 1, end: 4 }), seatPack('P2', { row: 'B', start: 1, end: 2 })];
      const scrape = [
        candidate({ start: 1, end: 2 }),
        candidate({ start: 3, end: 4 }),
        candidate({ row: 'C', start: 1, end: 2 }),
      ];

      const forward = reconciler.diff(existing, scrape, true, PERF_ID);
      const reversed = reconciler.diff([...existing].reverse(), [...scrape].reverse(), true, PERF_ID);

      expect(reversed).toEqual(forward);
    });
  });

  describe('planCreations', () => {
    it('turns every candidate into an organic creation', () => {
      const plan = reconciler.planCreations(
        [candidate({ start: 3, end: 4 }), candidate({ start: 1, end: 2 })],
        false,
        PERF_ID
      );

      expect(plan.creations.map((c) => [c.actionType, c.packData.startSeatNumber])).toEqual([
        ['create', '1'],
        ['create', '3'],
      ]);
      expect(plan.delists).toEqual([]);
      expect(plan.posEnabled).toBe(false);
    });
  });

  describe('classify', () => {
    it('feeds buildPlan the same plan diff returns', () => {
      const existing = [seatPack('P1', { start: 1, end: 4 })];
      const scrape = [candidate({ start: 1, end: 2 }), candidate({ start: 3, end: 4 })];

      const classification = reconciler.classify(existing, scrape, true, PERF_ID);

      expect(classification).toBeInstanceOf(PackClassification);
      expect(classification.data.transformations.map((t) => t.transformationType)).toEqual(['split']);
      expect(reconciler.buildPlan(classification)).toEqual(
        reconciler.diff(existing, scrape, true, PERF_ID)
      );
    });
  });
});
