import { describe, it, expect, beforeEach } from 'vitest';
import { FallbackMonitor } from '../src/fallback-monitor.js';

describe('FallbackMonitor', () => {
  let monitor: FallbackMonitor;

  beforeEach(() => {
    monitor = new FallbackMonitor();
  });

  it('starts empty and healthy', () => {
    expect(monitor.getStats()).toEqual({
      semanticCount: 0,
      fallbackCount: 0,
      fallbackRate: 0,
      byReason: { 'no-encoder': 0, 'shape-mismatch': 0, 'encoder-error': 0 },
    });
    expect(monitor.getHealth()).toBe('ok');
  });

  it('counts fallbacks per reason and keeps the latest message', () => {
    monitor.recordPrimary();
    monitor.recordPrimary();
    monitor.recordPrimary();
    monitor.recordFallback('shape-mismatch', 'expected 3 equal-width numeric rows, got 2 rows');
    monitor.recordFallback('encoder-error', 'model offline');

    expect(monitor.getStats()).toEqual({
      semanticCount: 3,
      fallbackCount: 2,
      fallbackRate: 0.4,
      byReason: { 'no-encoder': 0, 'shape-mismatch': 1, 'encoder-error': 1 },
      lastFallback: { reason: 'encoder-error', message: 'model offline' },
    });
  });

  it('is degraded when only some documents fell back', () => {
    monitor.recordPrimary();
    monitor.recordFallback('encoder-error', 'timeout');
    expect(monitor.getHealth()).toBe('degraded');
  });

  it('is broken when every semantic attempt fell back', () => {
    monitor.recordFallback('no-encoder', 'no sentence encoder configured');
    monitor.recordFallback('no-encoder', 'no sentence encoder configured');
    expect(monitor.getHealth()).toBe('broken');
    expect(monitor.getStats().fallbackRate).toBe(1);
  });

  it('returns copies that later records do not change', () => {
    monitor.recordFallback('shape-mismatch', 'expected 2 equal-width numeric rows, got 1 rows');
    const before = monitor.getStats();
    monitor.recordFallback('encoder-error', 'model offline');
    expect(before.byReason['encoder-error']).toBe(0);
    expect(before.lastFallback?.reason).toBe('shape-mismatch');
  });
});
