/**
 * @fileoverview Tests for TaskStore
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { TaskStore, UnsavedSweepError } from '../../src/tasks/store.js';
import { ExpirySweeper } from '../../src/tasks/sweeper.js';
import { TaskFileRepository, parseDocument } from '../../src/tasks/persistence.js';
import {
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from '../../src/utils/errors.js';
import { GatedPersistence, InMemoryPersistence, ManualClock, sequentialIds } from '../fixtures/index.js';

const HOUR = 60 * 60 * 1000;

describe('TaskStore', () => {
  let clock: ManualClock;
  let persistence: InMemoryPersistence;
  let store: TaskStore;

  beforeEach(async () => {
    clock = new ManualClock();
    persistence = new InMemoryPersistence();
    store = await TaskStore.open({ persistence, clock, generateId: sequentialIds() });
  });

  describe('createTask', () => {
    it('should create a pending task with zeroed timers', async () => {
      const task = await store.createTask({ title: 'Write report', category: 'Work' });

      expect(task.id).toBe('task0001-0000-4000-8000-000000000001');
      expect(task.shortId).toBe('task0001');
      expect(task.seq).toBe(1);
      expect(task.status).toBe('pending');
      expect(task.timerState).toBe('stopped');
      expect(task.totalElapsedMs).toBe(0);
      expect(task.createdAt).toEqual(new Date('2026-03-01T09:00:00.000Z'));
    });

    it('should use the default category when none is given', async () => {
      const task = await store.createTask({ title: 'Water plants' });

      expect(task.category).toBe('general');
    });

    it('should honor a configured default category', async () => {
      const custom = await TaskStore.open({
        persistence: new InMemoryPersistence(),
        clock,
        defaultCategory: 'inbox',
      });

      const task = await custom.createTask({ title: 'Water plants', category: '  ' });

      expect(task.category).toBe('inbox');
    });

    it('should reject an empty title without saving', async () => {
      await expect(store.createTask({ title: '   ' })).rejects.toBeInstanceOf(ValidationError);
      expect(persistence.saveCount).toBe(0);
      await expect(store.listAll()).resolves.toEqual([]);
    });

    it('should reject an unparseable deadline', async () => {
      await expect(store.createTask({ title: 'Report', deadline: 'next tuesday' })).rejects.toThrow(
        ValidationError
      );
    });

    it('should write through on every mutation', async () => {
      await store.createTask({ title: 'Write report' });

      expect(persistence.saveCount).toBe(1);
      const saved = parseDocument(persistence.saved ?? '', 'memory');
      expect(saved.nextSeq).toBe(2);
      expect(saved.tasks.map((task) => task.title)).toEqual(['Write report']);
    });

    it('should regenerate ids that collide with an existing task', async () => {
      const ids = [
        'dup00000-0000-4000-8000-000000000001',
        'dup00000-0000-4000-8000-000000000001',
        'fresh000-0000-4000-8000-000000000002',
      ];
      let call = 0;
      const colliding = await TaskStore.open({
        persistence: new InMemoryPersistence(),
        clock,
        generateId: () => ids[call++] ?? 'exhausted',
      });

      const first = await colliding.createTask({ title: 'One' });
      const second = await colliding.createTask({ title: 'Two' });

      expect(first.id).toBe('dup00000-0000-4000-8000-000000000001');
      expect(second.id).toBe('fresh000-0000-4000-8000-000000000002');
    });
  });

  describe('timer and completion workflow', () => {
    it('should time, complete and list a task', async () => {
      const task = await store.createTask({
        title: 'Write report',
        deadline: new Date(clock.now().getTime() + HOUR),
      });

      await store.startTimer(task.id);
      clock.advance(2000);
      const stopped = await store.stopTimer(task.id);
      await store.completeTask(task.id);

      expect(stopped.elapsedMs).toBe(2000);
      expect(stopped.task.lastElapsedMs).toBe(2000);
      expect(stopped.task.totalElapsedMs).toBe(2000);

      const completed = await store.listCompleted();
      expect(completed).toHaveLength(1);
      expect(completed[0]?.id).toBe(task.id);
      expect(completed[0]?.totalElapsedMs).toBe(2000);
      expect(completed[0]?.completedAt).toEqual(new Date('2026-03-01T09:00:02.000Z'));
      await expect(store.listPending()).resolves.toEqual([]);
    });

    it('should reject starting a running timer', async () => {
      const task = await store.createTask({ title: 'Practice' });
      await store.startTimer(task.id);

      await expect(store.startTimer(task.id)).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('should reject stopping a stopped timer', async () => {
      const task = await store.createTask({ title: 'Practice' });

      await expect(store.stopTimer(task.id)).rejects.toThrow(
        'Timer is not running for task task0001-0000-4000-8000-000000000001'
      );
    });

    it('should report live elapsed time while running', async () => {
      const task = await store.createTask({ title: 'Practice' });
      await store.startTimer(task.id);
      clock.advance(1500);

      await expect(store.elapsedNow(task.id)).resolves.toBe(1500);
      const summary = await store.getTask(task.id);
      expect(summary.elapsedNowMs).toBe(1500);
      expect(summary.totalElapsedMs).toBe(0);
    });

    it('should treat completing twice as a no-op', async () => {
      const task = await store.createTask({ title: 'Practice' });
      const first = await store.completeTask(task.id);
      clock.advance(5000);
      const second = await store.completeTask(task.id);

      expect(second.completedAt).toEqual(first.completedAt);
      expect(persistence.saveCount).toBe(2);
    });

    it('should reopen a completed task', async () => {
      const task = await store.createTask({ title: 'Practice' });
      await store.completeTask(task.id);

      const reopened = await store.reopenTask(task.id);

      expect(reopened.status).toBe('pending');
      expect(reopened.completedAt).toBeNull();
      await expect(store.listPending()).resolves.toHaveLength(1);
    });

    it('should keep a timer running across a reload', async () => {
      const task = await store.createTask({ title: 'Practice' });
      await store.startTimer(task.id);
      clock.advance(3000);

      const reloaded = await TaskStore.open({ persistence, clock });
      clock.advance(1000);

      const summary = await reloaded.getTask(task.id);
      expect(summary.timerState).toBe('running');
      expect(summary.runStartedAt).toEqual(new Date('2026-03-01T09:00:00.000Z'));
      const { elapsedMs } = await reloaded.stopTimer(task.id);
      expect(elapsedMs).toBe(4000);
    });
  });

  describe('editTask', () => {
    it('should apply only the given fields', async () => {
      const task = await store.createTask({ title: 'Write report', category: 'Work', quantity: 2 });

      const updated = await store.editTask(task.id, { title: 'Write final report', quantity: null });

      expect(updated.title).toBe('Write final report');
      expect(updated.category).toBe('Work');
      expect(updated.quantity).toBeNull();
    });

    it('should leave the task untouched on invalid input', async () => {
      const task = await store.createTask({ title: 'Write report' });

      await expect(store.editTask(task.id, { title: '' })).rejects.toBeInstanceOf(ValidationError);

      const current = await store.getTask(task.id);
      expect(current.title).toBe('Write report');
      expect(persistence.saveCount).toBe(1);
    });
  });

  describe('deleteTask', () => {
    it('should remove the task', async () => {
      const task = await store.createTask({ title: 'Write report' });

      await store.deleteTask(task.id);

      await expect(store.getTask(task.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should fail with NotFoundError for an unknown id', async () => {
      await expect(store.deleteTask('missing')).rejects.toThrow('Task not found: missing');
    });
  });

  describe('sweepExpired', () => {
    it('should remove tasks whose deadline has passed', async () => {
      const expired = await store.createTask({
        title: 'Old errand',
        deadline: new Date(clock.now().getTime() - 1000),
      });
      const future = await store.createTask({
        title: 'Future errand',
        deadline: new Date(clock.now().getTime() + HOUR),
      });

      const removed = await store.sweepExpired();

      expect(removed.map((task) => task.id)).toEqual([expired.id]);
      await expect(store.search(expired.id)).resolves.toEqual([]);
      await expect(store.getTask(future.id)).resolves.toMatchObject({ title: 'Future errand' });
    });

    it('should remove completed and running tasks too, in creation order', async () => {
      const deadline = new Date(clock.now().getTime() + 1000);
      const first = await store.createTask({ title: 'First', deadline });
      const second = await store.createTask({ title: 'Second', deadline });
      await store.completeTask(first.id);
      await store.startTimer(second.id);
      clock.advance(1000);

      const removed = await store.sweepExpired();

      expect(removed.map((task) => task.title)).toEqual(['First', 'Second']);
      await expect(store.listAll()).resolves.toEqual([]);
    });

    it('should not save when nothing expired', async () => {
      await store.createTask({ title: 'No deadline' });

      await expect(store.sweepExpired()).resolves.toEqual([]);
      expect(persistence.saveCount).toBe(1);
    });
  });

  describe('queries', () => {
    it('should find every task sharing an id prefix in creation order', async () => {
      const prefixed = await TaskStore.open({
        persistence: new InMemoryPersistence(),
        clock,
        generateId: sequentialIds(['abcd0001', 'ffff0002', 'abcd0003']),
      });
      await prefixed.createTask({ title: 'One' });
      await prefixed.createTask({ title: 'Two' });
      await prefixed.createTask({ title: 'Three' });

      const matches = await prefixed.findByIdPrefix('ABCD');

      expect(matches.map((task) => task.title)).toEqual(['One', 'Three']);
    });

    it('should match titles case-insensitively by default', async () => {
      await store.createTask({ title: 'Write Report' });
      await store.createTask({ title: 'Read book' });

      const loose = await store.findByTitle('report');
      const strict = await store.findByTitle('report', false);

      expect(loose.map((task) => task.title)).toEqual(['Write Report']);
      expect(strict).toEqual([]);
    });

    it('should return nothing for blank queries', async () => {
      await store.createTask({ title: 'Write report' });

      await expect(store.search('  ')).resolves.toEqual([]);
      await expect(store.findByIdPrefix('')).resolves.toEqual([]);
      await expect(store.findByTitle(' ')).resolves.toEqual([]);
    });

    it('should search by id prefix or title', async () => {
      await store.createTask({ title: 'Write report' });
      await store.createTask({ title: 'Task list cleanup' });

      const byId = await store.search('task0001');
      const byTitle = await store.search('TASK LIST');

      expect(byId.map((task) => task.title)).toEqual(['Write report']);
      expect(byTitle.map((task) => task.title)).toEqual(['Task list cleanup']);
    });

    it('should order pending tasks by deadline with undated tasks last', async () => {
      const now = clock.now().getTime();
      await store.createTask({ title: 'Undated' });
      await store.createTask({ title: 'Later', deadline: new Date(now + 2 * HOUR) });
      await store.createTask({ title: 'Sooner', deadline: new Date(now + HOUR) });

      const pending = await store.listPending();

      expect(pending.map((task) => task.title)).toEqual(['Sooner', 'Later', 'Undated']);
    });
  });

  describe('save failures', () => {
    it('should reject with the save error and keep the in-memory change', async () => {
      persistence.failSaves = true;

      await expect(store.createTask({ title: 'Unsaved' })).rejects.toThrow('disk full');

      const all = await store.listAll();
      expect(all.map((task) => task.title)).toEqual(['Unsaved']);
    });

    it('should persist the kept change on the next successful save', async () => {
      persistence.failSaves = true;
      await expect(store.createTask({ title: 'Unsaved' })).rejects.toThrow('disk full');
      persistence.failSaves = false;

      await store.createTask({ title: 'Saved' });

      const saved = parseDocument(persistence.saved ?? '', 'memory');
      expect(saved.tasks.map((task) => task.title)).toEqual(['Unsaved', 'Saved']);
    });

    it('should release the lock after a failure', async () => {
      persistence.failSaves = true;
      await expect(store.createTask({ title: 'Unsaved' })).rejects.toThrow('disk full');

      await expect(store.listAll()).resolves.toHaveLength(1);
    });
  });

  describe('returned summaries', () => {
    it('should not expose the stored Date objects', async () => {
      const created = await store.createTask({
        title: 'Write report',
        deadline: new Date(clock.now().getTime() + HOUR),
      });

      created.deadline?.setTime(0);
      created.createdAt.setTime(0);

      const current = await store.getTask(created.id);
      expect(current.deadline).toEqual(new Date('2026-03-01T10:00:00.000Z'));
      expect(current.createdAt).toEqual(new Date('2026-03-01T09:00:00.000Z'));
      await expect(store.sweepExpired()).resolves.toEqual([]);
    });

    it('should not expose the running timer start instant', async () => {
      const task = await store.createTask({ title: 'Practice' });
      const started = await store.startTimer(task.id);

      started.runStartedAt?.setTime(clock.now().getTime() - HOUR);
      clock.advance(2000);

      await expect(store.stopTimer(task.id)).resolves.toMatchObject({ elapsedMs: 2000 });
    });
  });

  describe('far-future deadlines', () => {
    it('should reject deadlines the store file cannot hold', async () => {
      await expect(
        store.createTask({ title: 'Far', deadline: new Date(Date.UTC(10000, 0, 1)) })
      ).rejects.toBeInstanceOf(ValidationError);
      expect(persistence.saveCount).toBe(0);
    });

    it('should reload the latest storable deadline', async () => {
      const task = await store.createTask({ title: 'Far', deadline: '9999-12-31T23:59:59.999Z' });

      const reloaded = await TaskStore.open({ persistence, clock });

      const loaded = await reloaded.getTask(task.id);
      expect(loaded.deadline?.toISOString()).toBe('9999-12-31T23:59:59.999Z');
    });
  });

  describe('sweep save failures', () => {
    it('should keep the removal and carry the removed tasks on the error', async () => {
      const task = await store.createTask({
        title: 'Old errand',
        deadline: new Date(clock.now().getTime() + 1000),
      });
      clock.advance(1000);
      persistence.failSaves = true;

      const failure = await store.sweepExpired().then(
        () => null,
        (error: unknown) => error
      );

      expect(failure).toBeInstanceOf(UnsavedSweepError);
      const removed = failure instanceof UnsavedSweepError ? failure.removed : [];
      expect(removed.map((t) => t.id)).toEqual([task.id]);
      await expect(store.listAll()).resolves.toEqual([]);
    });
  });

  describe('concurrency', () => {
    it('should serialize concurrent mutations', async () => {
      const titles = ['a', 'b', 'c', 'd', 'e'];

      await Promise.all(titles.map((title) => store.createTask({ title })));

      const all = await store.listAll();
      expect(all.map((task) => task.seq)).toEqual([1, 2, 3, 4, 5]);
      expect(persistence.saveCount).toBe(5);
    });
  });
});

describe('TaskStore with a file repository', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'taskforge-store-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should reload what it saved', async () => {
    const clock = new ManualClock();
    const repository = new TaskFileRepository(path.join(testDir, 'tasks.json'));
    const store = await TaskStore.open({ persistence: repository, clock });
    const task = await store.createTask({ title: 'Write report', description: 'quarterly', quantity: 1 });
    await store.startTimer(task.id);
    clock.advance(2000);
    await store.stopTimer(task.id);

    const reopened = await TaskStore.open({ persistence: repository, clock });
    const loaded = await reopened.getTask(task.id);

    expect(loaded.title).toBe('Write report');
    expect(loaded.description).toBe('quarterly');
    expect(loaded.quantity).toBe(1);
    expect(loaded.totalElapsedMs).toBe(2000);

    const next = await reopened.createTask({ title: 'Second' });
    expect(next.seq).toBe(2);
  });
});

describe('TaskStore with a sweep racing a foreground save', () => {
  let clock: ManualClock;
  let persistence: GatedPersistence;
  let store: TaskStore;
  let sweeper: ExpirySweeper;

  beforeEach(async () => {
    clock = new ManualClock();
    persistence = new GatedPersistence();
    store = await TaskStore.open({ persistence, clock, generateId: sequentialIds() });
    sweeper = new ExpirySweeper(store);
  });

  afterEach(async () => {
    persistence.releaseAll();
    await sweeper.stop();
  });

  function savedTitles(): string[][] {
    return persistence.history.map((document) => document.tasks.map((task) => task.title));
  }

  it('should run the sweep only after the edit has been saved', async () => {
    const expiring = await store.createTask({
      title: 'Old errand',
      deadline: new Date(clock.now().getTime() + 1000),
    });
    await store.createTask({ title: 'Kept' });
    persistence.gated = true;

    const edit = store.editTask(expiring.id, { title: 'Renamed errand' });
    await vi.waitFor(() => expect(persistence.getWaitingCount()).toBe(1));
    clock.advance(1000);
    const sweep = sweeper.runOnce();
    await Promise.resolve();
    expect(persistence.getWaitingCount()).toBe(1);

    persistence.releaseAll();
    const [edited, removed] = await Promise.all([edit, sweep]);

    expect(edited.title).toBe('Renamed errand');
    expect(removed.map((task) => task.title)).toEqual(['Renamed errand']);
    expect(savedTitles()).toEqual([
      ['Old errand'],
      ['Old errand', 'Kept'],
      ['Renamed errand', 'Kept'],
      ['Kept'],
    ]);
    const reloaded = await TaskStore.open({ persistence, clock });
    const remaining = await reloaded.listAll();
    expect(remaining.map((task) => task.title)).toEqual(['Kept']);
  });

  it('should sweep a task whose timer is being stopped after the stop is saved', async () => {
    const task = await store.createTask({
      title: 'Practice',
      deadline: new Date(clock.now().getTime() + 5000),
    });
    await store.startTimer(task.id);
    clock.advance(5000);
    persistence.gated = true;

    const stop = store.stopTimer(task.id);
    await vi.waitFor(() => expect(persistence.getWaitingCount()).toBe(1));
    const sweep = sweeper.runOnce();

    persistence.releaseAll();
    const [stopped, removed] = await Promise.all([stop, sweep]);

    expect(stopped.elapsedMs).toBe(5000);
    expect(removed).toHaveLength(1);
    expect(removed[0]?.totalElapsedMs).toBe(5000);
    expect(removed[0]?.timerState).toBe('stopped');
    expect(persistence.history.at(-1)?.tasks).toEqual([]);
  });
});
