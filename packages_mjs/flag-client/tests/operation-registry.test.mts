/**
 * Tests for OperationRegistry
 */

import { describe, it, expect } from 'vitest';
import { OperationRegistry } from '../src/core/operation-registry.mjs';

describe('OperationRegistry', () => {
  it('should accumulate chunks until taken', () => {
    const registry = new OperationRegistry<string>();
    registry.register(1, 'flags');

    expect(registry.append(1, Buffer.from('[{"a"'))).toBe(true);
    expect(registry.append(1, Buffer.from(':1}]'))).toBe(true);

    const completed = registry.take(1);
    expect(completed?.context).toBe('flags');
    expect(completed?.body.toString()).toBe('[{"a":1}]');
    expect(registry.has(1)).toBe(false);
    expect(registry.size).toBe(0);
  });

  it('should give an empty body when nothing was appended', () => {
    const registry = new OperationRegistry<number>();
    registry.register(7, 0);
    expect(registry.take(7)?.body.length).toBe(0);
  });

  it('should ignore unknown ids', () => {
    const registry = new OperationRegistry<string>();
    expect(registry.append(42, Buffer.from('x'))).toBe(false);
    expect(registry.get(42)).toBeUndefined();
    expect(registry.take(42)).toBeUndefined();
  });

  it('should remove an operation exactly once', () => {
    const registry = new OperationRegistry<string>();
    registry.register(3, 'identity');

    expect(registry.take(3)).toBeDefined();
    expect(registry.take(3)).toBeUndefined();
  });

  it('should refuse a live id', () => {
    const registry = new OperationRegistry<string>();
    registry.register(5, 'a');
    expect(() => registry.register(5, 'b')).toThrow('Operation 5 is already registered');
    expect(registry.get(5)).toBe('a');
  });

  it('should keep operations apart', () => {
    const registry = new OperationRegistry<string>();
    for (let id = 1; id <= 10; id++) registry.register(id, `op-${id}`);
    for (let id = 10; id >= 1; id--) registry.append(id, Buffer.from(String(id)));

    expect(registry.size).toBe(10);
    for (let id = 1; id <= 10; id++) {
      expect(registry.take(id)).toEqual({ context: `op-${id}`, body: Buffer.from(String(id)) });
    }
    expect(registry.size).toBe(0);
  });
});
