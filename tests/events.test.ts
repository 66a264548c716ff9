import { describe, it, expect, vi } from 'vitest';
import { GearmanEventEmitter, type GearmanEvent, type JobCompletedData } from '../src/events.js';

function completedEvent(): GearmanEvent<JobCompletedData> {
  return GearmanEventEmitter.createEvent(
    'job.completed',
    'gearman://workers/test',
    { function_name: 'resize', duration_ms: 3, result_bytes: 10 },
    'H:1',
  );
}

describe('GearmanEventEmitter', () => {
  describe('on()', () => {
    it('calls listeners for the matching type', async () => {
      const emitter = new GearmanEventEmitter();
      const listener = vi.fn();
      emitter.on('job.completed', listener);

      const event = completedEvent();
      await emitter.emit(event);

      expect(listener).toHaveBeenCalledOnce();
      expect(listener).toHaveBeenCalledWith(event);
    });

    it('does not call listeners for other types', async () => {
      const emitter = new GearmanEventEmitter();
      const listener = vi.fn();
      emitter.on('job.failed', listener);

      await emitter.emit(completedEvent());
      expect(listener).not.toHaveBeenCalled();
    });

    it('returns an unsubscribe function', async () => {
      const emitter = new GearmanEventEmitter();
      const listener = vi.fn();
      const off = emitter.on('job.completed', listener);
      off();

      await emitter.emit(completedEvent());
      expect(listener).not.toHaveBeenCalled();
    });

    it('passes typed data', async () => {
      const emitter = new GearmanEventEmitter();
      let bytes = 0;
      emitter.on('job.completed', (event) => {
        bytes = event.data.result_bytes;
      });

      await emitter.emit(completedEvent());
      expect(bytes).toBe(10);
    });
  });

  describe('onAny()', () => {
    it('receives every event after the typed listeners', async () => {
      const emitter = new GearmanEventEmitter();
      const order: string[] = [];
      emitter.onAny((event) => {
        order.push(`any:${event.type}`);
      });
      emitter.on('job.completed', () => {
        order.push('typed');
      });

      await emitter.emit(completedEvent());
      expect(order).toEqual(['typed', 'any:job.completed']);
    });
  });

  it('waits for async listeners', async () => {
    const emitter = new GearmanEventEmitter();
    let done = false;
    emitter.on('job.completed', async () => {
      await new Promise((resolve) => setImmediate(resolve));
      done = true;
    });

    await emitter.emit(completedEvent());
    expect(done).toBe(true);
  });

  it('rejects when a listener rejects', async () => {
    const emitter = new GearmanEventEmitter();
    emitter.on('job.completed', async () => {
      throw new Error('listener failed');
    });
    await expect(emitter.emit(completedEvent())).rejects.toThrow('listener failed');
  });

  it('removeAllListeners() drops every subscription', async () => {
    const emitter = new GearmanEventEmitter();
    const listener = vi.fn();
    emitter.on('job.completed', listener);
    emitter.onAny(listener);
    emitter.removeAllListeners();

    await emitter.emit(completedEvent());
    expect(listener).not.toHaveBeenCalled();
  });

  describe('createEvent()', () => {
    it('builds the envelope', () => {
      const event = completedEvent();
      expect(event.id).toMatch(/^evt_[0-9a-f-]{36}$/);
      expect(event.type).toBe('job.completed');
      expect(event.source).toBe('gearman://workers/test');
      expect(event.subject).toBe('H:1');
      expect(new Date(event.time).toISOString()).toBe(event.time);
    });

    it('omits the subject when none is given', () => {
      const event = GearmanEventEmitter.createEvent('worker.started', 'gearman://workers/w', {
        worker_id: 'w',
        functions: [],
      });
      expect('subject' in event).toBe(false);
    });
  });
});
