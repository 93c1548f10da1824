import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  createSessionStore,
  Session,
  startSessionSweep,
} from '../src/session.js';
import { createClock } from './helpers.js';

describe('SessionStore', () => {
  describe('resolve', () => {
    it('refuses a blank client key instead of sharing one session', () => {
      const store = createSessionStore({ expirationSeconds: 60 });

      assert.throws(() => store.resolve(''), /blank client key/);
      assert.equal(store.size(), 0);
    });

    it('creates a session on first contact and returns it afterwards', () => {
      const clock = createClock(1_000);
      const store = createSessionStore({
        expirationSeconds: 60,
        nowMs: clock.now,
      });

      const first = store.resolve('10.0.0.1');
      clock.advance(500);
      const second = store.resolve('10.0.0.1');

      assert.equal(first, second);
      assert.equal(first.createdAt, 1_000);
      assert.equal(first.lastSeen, 1_000);
      assert.equal(store.size(), 1);
    });

    it('keeps sessions for different clients apart', () => {
      const store = createSessionStore({ expirationSeconds: 60 });

      const a = store.resolve('10.0.0.1');
      const b = store.resolve('10.0.0.2');

      assert.notEqual(a, b);
      assert.equal(store.size(), 2);
    });

    it('creates exactly one session for concurrent lookups of one key', async () => {
      const store = createSessionStore({ expirationSeconds: 60 });

      const sessions = await Promise.all(
        Array.from({ length: 50 }, async () => {
          await Promise.resolve();
          return store.resolve('203.0.113.7');
        })
      );

      assert.equal(store.size(), 1);
      assert.equal(new Set(sessions).size, 1);
    });
  });

  describe('isExpired', () => {
    it('is false right after touch and true once the TTL has elapsed', () => {
      const clock = createClock();
      const store = createSessionStore({
        expirationSeconds: 60,
        nowMs: clock.now,
      });
      const session = store.resolve('client');

      clock.advance(90_000);
      store.touch(session);
      assert.equal(store.isExpired(session, 60), false);

      clock.advance(60_000);
      assert.equal(store.isExpired(session, 60), false, 'exactly at the TTL');

      clock.advance(1);
      assert.equal(store.isExpired(session, 60), true);
    });

    it('uses the store TTL when none is given', () => {
      const clock = createClock();
      const store = createSessionStore({
        expirationSeconds: 5,
        nowMs: clock.now,
      });
      const session = store.resolve('client');

      clock.advance(5_001);

      assert.equal(store.isExpired(session), true);
      assert.equal(store.isExpired(session, 10), false);
    });
  });

  describe('touch', () => {
    it('never moves the activity clock backwards', () => {
      const session = new Session('client', 5_000);

      session.markSeen(4_000);

      assert.equal(session.lastSeen, 5_000);
    });
  });

  describe('evictIdle', () => {
    it('removes only sessions idle longer than the window', () => {
      const clock = createClock();
      const store = createSessionStore({
        expirationSeconds: 60,
        nowMs: clock.now,
      });
      const stale = store.resolve('stale');
      clock.advance(10_000);
      store.resolve('fresh');

      clock.advance(5_000);
      const evicted = store.evictIdle(10_000);

      assert.deepEqual(evicted, [stale]);
      assert.equal(store.get('stale'), undefined);
      assert.ok(store.get('fresh'));
    });

    it('gives an evicted client a new, empty session', () => {
      const clock = createClock();
      const store = createSessionStore({
        expirationSeconds: 1,
        nowMs: clock.now,
      });
      const old = store.resolve('client');
      old.set('user', 'alice');

      clock.advance(20_000);
      store.evictIdle(10_000);
      const renewed = store.resolve('client');

      assert.notEqual(renewed, old);
      assert.equal(renewed.get('user'), undefined);
    });
  });

  describe('remove and clear', () => {
    it('remove returns the dropped session', () => {
      const store = createSessionStore({ expirationSeconds: 60 });
      const session = store.resolve('client');

      assert.equal(store.remove('client'), session);
      assert.equal(store.remove('client'), undefined);
      assert.equal(store.size(), 0);
    });

    it('clear empties the store', () => {
      const store = createSessionStore({ expirationSeconds: 60 });
      store.resolve('a');
      store.resolve('b');

      assert.equal(store.clear().length, 2);
      assert.equal(store.size(), 0);
    });
  });
});

describe('Session values', () => {
  it('stores typed values by name', () => {
    const session = new Session('client', 0);

    session.set('token', 'abc');
    session.set('visits', 3);
    session.set('admin', false);

    assert.equal(session.get('token'), 'abc');
    assert.equal(session.getString('token'), 'abc');
    assert.equal(session.getString('visits'), undefined);
    assert.equal(session.get('admin'), false);
    assert.equal(session.has('visits'), true);
    assert.equal(session.delete('visits'), true);
    assert.equal(session.has('visits'), false);
  });
});

describe('startSessionSweep', () => {
  it('evicts sessions idle past the retention window until aborted', async () => {
    const clock = createClock(0);
    const store = createSessionStore({ expirationSeconds: 60, nowMs: clock.now });
    store.resolve('stale');
    clock.advance(700_000);
    store.resolve('fresh');

    const sweep = startSessionSweep(store, 600_000, 5);
    try {
      for (let attempt = 0; attempt < 100 && store.size() > 1; attempt += 1) {
        await new Promise((resolve) => setTimeout(resolve, 5));
      }

      assert.equal(store.size(), 1);
      assert.equal(store.get('stale'), undefined);
      assert.ok(store.get('fresh'));
    } finally {
      sweep.abort();
    }
  });
});
