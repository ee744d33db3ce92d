import { describe, it, expect, vi, afterEach } from 'vitest';
import { StreamRegistry } from './registry.js';
import { RecordingListener } from '../testing/fakes.js';

describe('StreamRegistry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('acknowledges an attached listener with a connected event', () => {
    const registry = new StreamRegistry();
    const listener = new RecordingListener();

    registry.attach('t1', listener);

    expect(listener.events).toHaveLength(1);
    expect(listener.events[0]).toMatchObject({ type: 'connected', thread_id: 't1' });
    expect(Number.isNaN(Date.parse(listener.events[0].timestamp))).toBe(false);
  });

  it('stamps published events with thread id and timestamp', () => {
    const registry = new StreamRegistry();
    const listener = new RecordingListener();
    registry.attach('t1', listener);

    const delivered = registry.publish('t1', { type: 'tool_error', tool_name: 'x', error: 'boom' });

    expect(delivered).toBe(true);
    expect(listener.events[1]).toMatchObject({ type: 'tool_error', tool_name: 'x', error: 'boom', thread_id: 't1' });
  });

  it('drops events for threads without a listener', () => {
    const registry = new StreamRegistry();
    expect(registry.publish('nobody', { type: 'connected' })).toBe(false);
  });

  it('delivers events only to the listener of their own thread', () => {
    const registry = new StreamRegistry();
    const other = new RecordingListener('other');
    registry.attach('b', other);

    expect(registry.publish('a', { type: 'tool_error', tool_name: 'x', error: 'e' })).toBe(false);
    expect(other.types()).toEqual(['connected']);
  });

  it('ends a thread by detaching and closing its listener', () => {
    const registry = new StreamRegistry();
    const listener = new RecordingListener();
    registry.attach('t1', listener);

    registry.end('t1');

    expect(registry.has('t1')).toBe(false);
    expect(listener.closed).toBe(1);
    registry.end('t1');
    expect(listener.closed).toBe(1);
  });

  it('replaces the previous listener on re-attach', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const registry = new StreamRegistry();
    const first = new RecordingListener('first');
    const second = new RecordingListener('second');

    registry.attach('t1', first);
    registry.attach('t1', second);
    registry.publish('t1', { type: 'tool_error', tool_name: 'x', error: 'e' });

    expect(first.types()).toEqual(['connected']);
    expect(second.types()).toEqual(['connected', 'tool_error']);
    expect(registry.size).toBe(1);
  });

  it('detaches only the listener given', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const registry = new StreamRegistry();
    const stale = new RecordingListener('stale');
    const current = new RecordingListener('current');
    registry.attach('t1', stale);
    registry.attach('t1', current);

    expect(registry.detach('t1', stale)).toBe(false);
    expect(registry.has('t1')).toBe(true);
    expect(registry.detach('t1', current)).toBe(true);
    expect(registry.has('t1')).toBe(false);
  });

  it('removes a listener whose send throws', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const registry = new StreamRegistry();
    const listener = new RecordingListener();
    registry.attach('t1', listener);
    listener.failing = true;

    expect(registry.publish('t1', { type: 'tool_error', tool_name: 'x', error: 'e' })).toBe(false);
    expect(registry.has('t1')).toBe(false);
  });
});
