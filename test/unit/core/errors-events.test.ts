import { describe, it, expect, vi } from 'vitest';
import {
  AuditError,
  ConfigError,
  GateOrderError,
  GatehouseError,
  InvariantError,
  SealViolationError,
  errorMessage,
} from '../../../src/core/errors.js';
import { EventBus } from '../../../src/core/events.js';

describe('errors', () => {
  it('carries code and stage through the hierarchy', () => {
    const err = new ConfigError('bad config');
    expect(err).toBeInstanceOf(GatehouseError);
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe('CONFIG_ERROR');
    expect(err.stage).toBe('config');
    expect(err.name).toBe('ConfigError');
  });

  it('keeps the cause', () => {
    const cause = new Error('disk full');
    const err = new AuditError('write failed', cause);
    expect(err.cause).toBe(cause);
  });

  it('names the offending gates in GateOrderError', () => {
    const err = new GateOrderError('meaning', 'ethics');
    expect(err.message).toBe('Gate "meaning" evaluated out of order after "ethics"');
    expect(err.gate).toBe('meaning');
  });

  it('exposes seal and invariant details', () => {
    expect(new SealViolationError('nope', 'rfl').layer).toBe('rfl');
    expect(new InvariantError('broken', ['a', 'b']).details).toEqual(['a', 'b']);
  });

  it('errorMessage handles non-errors', () => {
    expect(errorMessage(new Error('x'))).toBe('x');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('EventBus', () => {
  it('delivers typed payloads to listeners', () => {
    const bus = new EventBus();
    const listener = vi.fn();
    bus.on('run:complete', listener);
    bus.emit('run:complete', { runId: 'r1', decision: 'RUN', durationMs: 5 });
    expect(listener).toHaveBeenCalledWith({ runId: 'r1', decision: 'RUN', durationMs: 5 });
    expect(bus.listenerCount('run:complete')).toBe(1);
  });

  it('once fires a single time and off removes', () => {
    const bus = new EventBus();
    const once = vi.fn();
    const on = vi.fn();
    bus.once('run:start', once);
    bus.on('run:start', on);
    const payload = { runId: 'r1', prompt: 'p', tasks: [] };
    bus.emit('run:start', payload);
    bus.off('run:start', on);
    bus.emit('run:start', payload);
    expect(once).toHaveBeenCalledTimes(1);
    expect(on).toHaveBeenCalledTimes(1);
  });

  it('removeAllListeners clears everything', () => {
    const bus = new EventBus();
    bus.on('audit:row', vi.fn());
    bus.removeAllListeners();
    expect(bus.listenerCount('audit:row')).toBe(0);
  });
});
