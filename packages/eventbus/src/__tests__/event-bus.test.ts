import { describe, it, expect, vi } from 'vitest';
import { Events } from '@lifeline/core';
import { EventBus } from '../event-bus.js';

describe('EventBus', () => {
  describe('emit / on', () => {
    it('calls handler with the payload when event is emitted', () => {
      const bus = new EventBus();
      const handler = vi.fn();
      bus.on(Events.BRANCH_DELETED, handler);
      bus.emit(Events.BRANCH_DELETED, { branchId: 'b-1' });
      expect(handler).toHaveBeenCalledWith({ branchId: 'b-1' });
    });

    it('calls multiple handlers for the same event in registration order', () => {
      const bus = new EventBus();
      const calls: string[] = [];
      bus.on(Events.BRANCH_DELETED, () => calls.push('first'));
      bus.on(Events.BRANCH_DELETED, () => calls.push('second'));
      bus.emit(Events.BRANCH_DELETED, { branchId: 'b-1' });
      expect(calls).toEqual(['first', 'second']);
    });

    it('does not call handler for a different event', () => {
      const bus = new EventBus();
      const handler = vi.fn();
      bus.on(Events.BRANCH_DELETED, handler);
      bus.emit(Events.COMMIT_CREATED, {
        commit: {
          id: 'c-1',
          branchId: 'b-1',
          message: 'read a chapter',
          type: 'reading',
          timestamp: '2026-01-01T00:00:00.000Z',
        },
      });
      expect(handler).not.toHaveBeenCalled();
    });

    it('catches and logs errors from handlers and keeps calling the rest', () => {
      const bus = new EventBus();
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const error = new Error('handler failure');
      const after = vi.fn();
      bus.on(Events.BRANCH_DELETED, () => { throw error; });
      bus.on(Events.BRANCH_DELETED, after);
      bus.emit(Events.BRANCH_DELETED, { branchId: 'b-1' });
      expect(consoleSpy).toHaveBeenCalledWith(
        '[EventBus] Error in handler for "branch:deleted":',
        error,
      );
      expect(after).toHaveBeenCalledOnce();
      consoleSpy.mockRestore();
    });
  });

  describe('unsubscribe', () => {
    it('removes handler when unsubscribe is called', () => {
      const bus = new EventBus();
      const handler = vi.fn();
      const unsub = bus.on(Events.BRANCH_DELETED, handler);
      unsub();
      bus.emit(Events.BRANCH_DELETED, { branchId: 'b-1' });
      expect(handler).not.toHaveBeenCalled();
      expect(bus.listenerCount(Events.BRANCH_DELETED)).toBe(0);
    });

    it('does not affect other handlers when one is unsubscribed', () => {
      const bus = new EventBus();
      const h1 = vi.fn();
      const h2 = vi.fn();
      const unsub1 = bus.on(Events.BRANCH_DELETED, h1);
      bus.on(Events.BRANCH_DELETED, h2);
      unsub1();
      bus.emit(Events.BRANCH_DELETED, { branchId: 'b-1' });
      expect(h1).not.toHaveBeenCalled();
      expect(h2).toHaveBeenCalledOnce();
    });
  });

  describe('once', () => {
    it('fires handler exactly once', () => {
      const bus = new EventBus();
      const handler = vi.fn();
      bus.once(Events.BRANCH_DELETED, handler);
      bus.emit(Events.BRANCH_DELETED, { branchId: 'first' });
      bus.emit(Events.BRANCH_DELETED, { branchId: 'second' });
      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith({ branchId: 'first' });
    });
  });

  describe('removeAllListeners', () => {
    it('removes all listeners for a specific event only', () => {
      const bus = new EventBus();
      const deleted = vi.fn();
      const created = vi.fn();
      bus.on(Events.BRANCH_DELETED, deleted);
      bus.on(Events.PLAN_UPDATED, created);
      bus.removeAllListeners(Events.BRANCH_DELETED);
      expect(bus.listenerCount(Events.BRANCH_DELETED)).toBe(0);
      expect(bus.listenerCount(Events.PLAN_UPDATED)).toBe(1);
    });

    it('removes all listeners for all events when no arg', () => {
      const bus = new EventBus();
      const handler = vi.fn();
      bus.on(Events.BRANCH_DELETED, handler);
      bus.removeAllListeners();
      bus.emit(Events.BRANCH_DELETED, { branchId: 'b-1' });
      expect(handler).not.toHaveBeenCalled();
    });

    it('keeps delivering to handlers subscribed after a reset', () => {
      const bus = new EventBus();
      const stale = bus.on(Events.PLAN_UPDATED, vi.fn());
      bus.removeAllListeners();
      const handler = vi.fn();
      bus.on(Events.BRANCH_DELETED, handler);
      stale();

      bus.emit(Events.BRANCH_DELETED, { branchId: 'b-1' });

      expect(handler).toHaveBeenCalledWith({ branchId: 'b-1' });
      expect(bus.listenerCount(Events.BRANCH_DELETED)).toBe(1);
      expect(bus.listenerCount(Events.PLAN_UPDATED)).toBe(0);
    });
  });
});
