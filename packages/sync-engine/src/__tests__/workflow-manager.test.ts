/**
 * Workflow Manager Tests
 * Tests full passes over an in-memory store and vendor
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LockUnavailableError } from '../errors.js';
import { createEventBus, type PackSyncEventBus } from '../events.js';
import { SyncExecutor } from '../executor/sync-executor.js';
import { InventoryPusher } from '../pos/inventory-pusher.js';
import type { PerformanceLock } from '../workflow/performance-lock.js';
import { InProcessPerformanceLock } from '../workflow/performance-lock.js';
import { WorkflowManager, WorkflowStageMachine } from '../workflow/workflow-manager.js';
import {
  FIXED_NOW,
  FakePosVendor,
  MemoryPerformanceDirectory,
  MemorySeatPackRepository,
  PERF_ID,
  RecordingNotifier,
  candidate,
  performanceContext,
  seatPack,
} from './helpers.js';

const id = (seq: number) => `SRC_PACK_${PERF_ID}_${String(seq).padStart(4, '0')}`;

describe('WorkflowManager', () => {
  let repository: MemorySeatPackRepository;
  let directory: MemoryPerformanceDirectory;
  let vendor: FakePosVendor;
  let notifier: RecordingNotifier;
  let eventBus: PackSyncEventBus;
  let workflow: WorkflowManager;

  function build(lock: PerformanceLock = new InProcessPerformanceLock()): WorkflowManager {
    const executor = new SyncExecutor({ repository, now: () => FIXED_NOW });
    const pusher = new InventoryPusher({ vendor, executor, repository, directory, eventBus });
    return new WorkflowManager({
      repository,
      directory,
      executor,
      pusher,
      notifier,
      lock,
      eventBus,
    });
  }

  beforeEach(() => {
    repository = new MemorySeatPackRepository();
    directory = new MemoryPerformanceDirectory();
    vendor = new FakePosVendor();
    notifier = new RecordingNotifier();
    eventBus = createEventBus();
    workflow = build();
  });

  describe('initial scrape', () => {
    it('creates and lists every candidate', async () => {
      const result = await workflow.processInitialScrape(PERF_ID, [
        candidate({ start: 1, end: 2 }),
        candidate({ start: 3, end: 4 }),
      ]);

      expect(result.success).toBe(true);
      expect(result.stages).toEqual(['START', 'EXECUTE', 'PUSH_POS', 'SWEEP_PENDING', 'DONE']);
      expect(result.packsCreated).toBe(2);
      expect(result.posInventoriesCreated).toBe(2);
      expect(repository.get(id(1))?.pos).toEqual({ status: 'synced', vendorInventoryId: `INV-${id(1)}` });
    });

    it('reports a partial vendor failure and keeps the pack pending', async () => {
      vendor.failPushFor.add(id(2));

      const result = await workflow.processInitialScrape(PERF_ID, [
        candidate({ start: 1, end: 2 }),
        candidate({ start: 3, end: 4 }),
        candidate({ start: 5, end: 6 }),
      ]);

      expect(result.packsCreated).toBe(3);
      expect(result.posInventoriesCreated).toBe(2);
      expect(result.success).toBe(false);
      expect(result.warnings).toEqual(['1 new pack inventory creations failed']);
      expect(repository.get(id(2))?.pos).toEqual({
        status: 'pending',
        attempts: 1,
        lastError: 'Vendor rejected listing',
      });
      expect(vendor.push).toHaveBeenCalledTimes(3);
    });

    it('stores packs without listing them when POS is disabled', async () => {
      directory = new MemoryPerformanceDirectory([performanceContext(PERF_ID, false)]);
      workflow = build();

      const result = await workflow.processInitialScrape(PERF_ID, [candidate({ start: 1, end: 2 })]);

      expect(result.success).toBe(true);
      expect(result.packsCreated).toBe(1);
      expect(vendor.push).not.toHaveBeenCalled();
      expect(repository.get(id(1))?.pos.status).toBe('pending');
    });
  });

  describe('subsequent scrape', () => {
    it('converges: repeating a scrape changes nothing', async () => {
      const scrape = [candidate({ start: 1, end: 2 }), candidate({ start: 3, end: 4 })];
      await workflow.processInitialScrape(PERF_ID, scrape);

      const result = await workflow.processSubsequentScrape(PERF_ID, scrape);

      expect(result.success).toBe(true);
      expect(result.stages).toEqual(['START', 'RECONCILE', 'EXECUTE', 'PUSH_POS', 'SWEEP_PENDING', 'DONE']);
      expect([result.packsCreated, result.packsUpdated, result.packsDelisted]).toEqual([0, 0, 0]);
      expect(result.posInventoriesCreated).toBe(0);
    });

    it('splits a pack and withdraws its listing', async () => {
      await workflow.processInitialScrape(PERF_ID, [candidate({ start: 1, end: 4, price: 50 })]);

      const result = await workflow.processSubsequentScrape(PERF_ID, [
        candidate({ start: 1, end: 2, price: 50 }),
        candidate({ start: 3, end: 4, price: 50 }),
      ]);

      expect(result.success).toBe(true);
      expect(result.packsDelisted).toBe(1);
      expect(result.packsCreated).toBe(2);
      expect(result.posInventoriesCreated).toBe(2);
      expect(result.posInventoriesDeleted).toBe(1);
      expect(vendor.deleted).toEqual([`INV-${id(1)}`]);
      expect(repository.get(id(2))).toMatchObject({ packState: 'split', sourcePackIds: [id(1)] });
      expect(repository.get(id(1))).toMatchObject({
        existence: { status: 'inactive', reason: 'transformed' },
        pos: { status: 'inactive', deletion: 'settled' },
      });
    });

    it('never reactivates a delisted pack', async () => {
      await workflow.processInitialScrape(PERF_ID, [candidate({ start: 1, end: 4 })]);
      await workflow.processSubsequentScrape(PERF_ID, [
        candidate({ start: 1, end: 2 }),
        candidate({ start: 3, end: 4 }),
      ]);

      const result = await workflow.processSubsequentScrape(PERF_ID, [candidate({ start: 1, end: 4 })]);

      expect(result.packsCreated).toBe(1);
      expect(repository.get(id(1))?.existence.status).toBe('inactive');
      expect(repository.get(id(4))).toMatchObject({
        existence: { status: 'active' },
        packState: 'merge',
        sourcePackIds: [id(2), id(3)],
      });
    });

    it('keeps every pack when the scrape comes back empty', async () => {
      await workflow.processInitialScrape(PERF_ID, [candidate({ start: 1, end: 2 }), candidate({ start: 3, end: 4 })]);

      const result = await workflow.processSubsequentScrape(PERF_ID, []);

      expect(result.packsDelisted).toBe(0);
      expect(result.warnings).toEqual([
        'Empty scrape for performance perf-1 with 2 active packs: delists withheld',
      ]);
      expect(await repository.findActiveByPerformance(PERF_ID)).toHaveLength(2);
    });

    it('pushes matched packs a previous pass failed to list', async () => {
      vendor.failPushFor.add(id(1));
      await workflow.processInitialScrape(PERF_ID, [candidate({ start: 1, end: 2 })]);
      vendor.failPushFor.clear();

      const result = await workflow.processSubsequentScrape(PERF_ID, [candidate({ start: 1, end: 2 })]);

      expect(result.success).toBe(true);
      expect(result.posInventoriesCreated).toBe(1);
      expect(repository.get(id(1))?.pos).toEqual({ status: 'synced', vendorInventoryId: `INV-${id(1)}` });
    });
  });

  describe('processAutoDetectScenario', () => {
    it('picks the initial scenario, then the subsequent one', async () => {
      const scrape = [candidate({ start: 1, end: 2 })];

      const first = await workflow.processAutoDetectScenario(PERF_ID, scrape);
      const second = await workflow.processAutoDetectScenario(PERF_ID, scrape);

      expect(first.scenario).toBe('initial');
      expect(second.scenario).toBe('subsequent');
      expect(second.packsCreated).toBe(0);
    });
  });

  describe('delist scenarios', () => {
    beforeEach(async () => {
      await workflow.processInitialScrape(PERF_ID, [candidate({ start: 1, end: 2 }), candidate({ start: 3, end: 4 })]);
    });

    it('delists the requested packs on behalf of an operator', async () => {
      const result = await workflow.processManualDelist(PERF_ID, [id(1), 'unknown-pack'], 'ops-user');

      expect(result.stages).toEqual(['START', 'RECONCILE', 'EXECUTE', 'PUSH_POS', 'DONE']);
      expect(result.packsDelisted).toBe(1);
      expect(result.posInventoriesDeleted).toBe(1);
      expect(result.warnings).toEqual(['1 packs are not active and were not delisted']);
      expect(repository.get(id(1))).toMatchObject({
        existence: { status: 'inactive', reason: 'manual_delist' },
        manualDelist: { by: 'ops-user', at: FIXED_NOW },
      });
      expect(repository.get(id(2))?.existence.status).toBe('active');
    });

    it('retires every pack of a disabled performance', async () => {
      directory = new MemoryPerformanceDirectory([performanceContext(PERF_ID, false)]);
      workflow = build();

      const result = await workflow.processPerformanceDisabled(PERF_ID);

      expect(result.scenario).toBe('performance_disabled');
      expect(result.packsDelisted).toBe(2);
      expect(result.posInventoriesDeleted).toBe(2);
      expect(await repository.hasActivePacks(PERF_ID)).toBe(false);
    });
  });

  describe('failures', () => {
    it('fails the pass for an unknown performance', async () => {
      const result = await workflow.processSubsequentScrape('perf-404', [candidate({ start: 1, end: 2 })]);

      expect(result.success).toBe(false);
      expect(result.errorCode).toBe('PERFORMANCE_NOT_FOUND');
      expect(result.stages).toEqual(['START', 'FAILED']);
    });

    it('reports a rolled back execution', async () => {
      await workflow.processInitialScrape(PERF_ID, [candidate({ row: 'A', start: 1, end: 2 })]);
      repository.failUpdatesWith = new Error('connection reset');

      const result = await workflow.processSubsequentScrape(PERF_ID, [candidate({ row: 'B', start: 1, end: 2 })]);

      expect(result.success).toBe(false);
      expect(result.errorCode).toBe('EXECUTION_FAILED');
      expect(result.stages).toEqual(['START', 'RECONCILE', 'EXECUTE', 'FAILED']);
      expect(repository.all().map((p) => p.internalPackId)).toEqual([id(1)]);
    });

    it('is not affected by a failing notifier', async () => {
      notifier.failing = true;

      const result = await workflow.processInitialScrape(PERF_ID, [candidate({ start: 1, end: 2 })]);

      expect(result.success).toBe(true);
    });

    it('propagates a busy lock to the caller', async () => {
      const busy: PerformanceLock = {
        withLock: () => Promise.reject(new LockUnavailableError(PERF_ID)),
      };
      workflow = build(busy);

      await expect(workflow.processInitialScrape(PERF_ID, [])).rejects.toBeInstanceOf(LockUnavailableError);
    });
  });

  describe('notifications and events', () => {
    it('announces the start and the outcome of a pass', async () => {
      const completed = vi.fn();
      eventBus.onWorkflowCompleted(completed);

      const result = await workflow.processInitialScrape(PERF_ID, [candidate({ start: 1, end: 2 })]);

      expect(notifier.notifications.map((n) => n.type)).toEqual(['sync-started', 'sync-completed']);
      expect(notifier.notifications[1]).toMatchObject({
        operationId: result.operationId,
        success: true,
        counts: { created: 1, posCreated: 1 },
      });
      expect(completed).toHaveBeenCalledTimes(1);
    });
  });

  describe('runSweep', () => {
    it('lists packs left pending by an earlier pass', async () => {
      vendor.failPushFor.add(id(1));
      await workflow.processInitialScrape(PERF_ID, [candidate({ start: 1, end: 2 })]);
      vendor.failPushFor.clear();

      const result = await workflow.runSweep();

      expect(result).toEqual({ created: 1, deleted: 0, failed: 0, skipped: 0, errors: [] });
      expect(repository.get(id(1))?.pos.status).toBe('synced');
    });

    it('skips performances whose lock is held', async () => {
      vendor.failPushFor.add(id(1));
      await workflow.processInitialScrape(PERF_ID, [candidate({ start: 1, end: 2 })]);
      workflow = build({ withLock: () => Promise.reject(new LockUnavailableError(PERF_ID)) });

      const result = await workflow.runSweep();

      expect(result.created).toBe(0);
      expect(vendor.push).toHaveBeenCalledTimes(1);
    });
  });
});

describe('WorkflowStageMachine', () => {
  it('rejects transitions outside the pass order', () => {
    const machine = new WorkflowStageMachine();
    machine.advance('RECONCILE');

    expect(() => machine.advance('PUSH_POS')).toThrow('Illegal workflow transition RECONCILE -> PUSH_POS');
  });

  it('fails from any live stage once', () => {
    const machine = new WorkflowStageMachine();
    machine.advance('EXECUTE');
    machine.fail();
    machine.fail();

    expect(machine.stages).toEqual(['START', 'EXECUTE', 'FAILED']);
  });
});
