/**
 * Tests for CacheSlot.
 * Covers reads, wholesale writes, invalidation, optimistic mutations, and state.
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { CacheSlot } from '../../src/caching/CacheSlot.js';
import { makeItems, seconds, type Item } from '../helpers/cacheFixtures.js';

const windows = { freshWindowMs: seconds(300), backgroundThresholdMs: seconds(60) };

describe('CacheSlot', () => {
  let slot: CacheSlot<Item>;

  beforeEach(() => {
    slot = new CacheSlot<Item>((item) => item.id);
  });

  describe('read', () => {
    it('should report an infinite age before the first write', () => {
      const { items, ageMs } = slot.read(seconds(10));

      assert.deepStrictEqual(items, []);
      assert.strictEqual(ageMs, Infinity);
      assert.strictEqual(slot.fetchedAt, null);
    });

    it('should measure age from the last write', () => {
      slot.write(makeItems('a', 2), seconds(5));

      assert.strictEqual(slot.read(seconds(17)).ageMs, seconds(12));
    });

    it('should return a copy of the items', () => {
      slot.write(makeItems('a', 2), 0);

      const { items } = slot.read(0);
      items.pop();

      assert.strictEqual(slot.size, 2);
    });
  });

  describe('write', () => {
    it('should replace the collection wholesale', () => {
      slot.write(makeItems('a', 3), 0);
      slot.write(makeItems('b', 1), seconds(1));

      assert.deepStrictEqual(slot.read(seconds(1)).items, [{ id: 'b-1', label: 'b 1' }]);
      assert.strictEqual(slot.fetchedAt, seconds(1));
    });

    it('should not keep a reference to the caller array', () => {
      const batch = makeItems('a', 2);
      slot.write(batch, 0);
      batch.push({ id: 'x', label: 'x' });

      assert.strictEqual(slot.size, 2);
    });
  });

  describe('invalidate', () => {
    it('should clear items and reset the fetch time', () => {
      slot.write(makeItems('a', 2), seconds(1));
      slot.invalidate();

      assert.strictEqual(slot.isEmpty, true);
      assert.strictEqual(slot.fetchedAt, null);
      assert.strictEqual(slot.state(seconds(2), windows), 'empty');
    });
  });

  describe('optimistic mutations', () => {
    it('should append by default', () => {
      slot.write(makeItems('a', 2), 0);
      slot.insertOptimistic({ id: 'new', label: 'new' });

      assert.deepStrictEqual(
        slot.read(0).items.map((item) => item.id),
        ['a-1', 'a-2', 'new']
      );
    });

    it('should prepend when asked', () => {
      slot.write(makeItems('a', 2), 0);
      slot.insertOptimistic({ id: 'new', label: 'new' }, 'start');

      assert.deepStrictEqual(
        slot.read(0).items.map((item) => item.id),
        ['new', 'a-1', 'a-2']
      );
    });

    it('should leave the fetch time alone', () => {
      slot.write(makeItems('a', 1), seconds(3));
      slot.insertOptimistic({ id: 'new', label: 'new' });
      slot.updateOptimistic({ id: 'a-1', label: 'renamed' });
      slot.removeOptimistic('new');

      assert.strictEqual(slot.fetchedAt, seconds(3));
    });

    it('should allow inserts into a slot that was never fetched', () => {
      slot.insertOptimistic({ id: 'draft', label: 'draft' });

      assert.strictEqual(slot.size, 1);
      assert.strictEqual(slot.fetchedAt, null);
      assert.strictEqual(slot.read(0).ageMs, Infinity);
    });

    it('should replace a matching item in place', () => {
      slot.write(makeItems('a', 3), 0);

      const updated = slot.updateOptimistic({ id: 'a-2', label: 'renamed' });

      assert.strictEqual(updated, true);
      assert.deepStrictEqual(slot.read(0).items[1], { id: 'a-2', label: 'renamed' });
      assert.strictEqual(slot.size, 3);
    });

    it('should ignore updates for unknown keys', () => {
      slot.write(makeItems('a', 2), 0);

      assert.strictEqual(slot.updateOptimistic({ id: 'missing', label: 'x' }), false);
      assert.deepStrictEqual(slot.read(0).items, makeItems('a', 2));
    });

    it('should remove every item with the key', () => {
      slot.write([...makeItems('a', 2), { id: 'a-1', label: 'duplicate' }], 0);

      assert.strictEqual(slot.removeOptimistic('a-1'), 2);
      assert.deepStrictEqual(slot.read(0).items, [{ id: 'a-2', label: 'a 2' }]);
    });

    it('should return zero when removing an unknown key', () => {
      slot.write(makeItems('a', 2), 0);

      assert.strictEqual(slot.removeOptimistic('missing'), 0);
    });

    it('should reject keyed mutations when the slot has no key', () => {
      const keyless = new CacheSlot<Item>();

      assert.throws(() => keyless.updateOptimistic({ id: 'a', label: 'a' }), TypeError);
      assert.throws(() => keyless.removeOptimistic('a'), TypeError);
    });
  });

  describe('state', () => {
    beforeEach(() => {
      slot.write(makeItems('a', 1), 0);
    });

    it('should be fresh below the background threshold', () => {
      assert.strictEqual(slot.state(seconds(59), windows), 'fresh');
    });

    it('should be stale-servable from the threshold up to the fresh window', () => {
      assert.strictEqual(slot.state(seconds(60), windows), 'stale-servable');
      assert.strictEqual(slot.state(seconds(299), windows), 'stale-servable');
    });

    it('should expire at the fresh window', () => {
      assert.strictEqual(slot.state(seconds(300), windows), 'expired');
    });

    it('should return to fresh after a new write', () => {
      slot.write(makeItems('b', 1), seconds(400));

      assert.strictEqual(slot.state(seconds(400), windows), 'fresh');
    });
  });
});
