import { ErrorCode } from '../../core/errors';
import { CrawlEventBus, SessionEventData } from '../../core/event-bus';
import { SessionBinder } from '../../core/session-binder';
import { credential, FakePool, FakeProbe } from '../helpers/fakes';

describe('SessionBinder', () => {
  const credentials = [credential('a'), credential('b'), credential('c'), credential('d')];

  describe('ensureValid', () => {
    it('should invalidate each credential that fails the probe and bind the first one that passes', async () => {
      const pool = new FakePool(credentials);
      const probe = new FakeProbe(['a', 'b']);
      const binder = new SessionBinder(pool, probe);

      const session = await binder.ensureValid();

      expect(session.credential.id).toBe('c');
      expect(session.identity).toEqual({ uid: 'uid-c', name: 'user-c' });
      expect(session.valid).toBe(true);
      expect(pool.invalidatedCredentials).toEqual(['a', 'b']);
      expect(pool.invalidatedProxies).toEqual([]);
      expect(probe.checked).toEqual(['a', 'b', 'c']);
      expect(binder.state).toBe('valid');
    });

    it('should reuse a valid session without probing again', async () => {
      const pool = new FakePool(credentials);
      const probe = new FakeProbe();
      const binder = new SessionBinder(pool, probe);

      const first = await binder.ensureValid();
      const second = await binder.ensureValid();

      expect(second).toBe(first);
      expect(probe.checked).toEqual(['a']);
    });

    it('should refresh an already expired proxy before probing', async () => {
      const pool = new FakePool(credentials, () => 0);
      const binder = new SessionBinder(pool, new FakeProbe(), { now: () => 10 });

      const session = await binder.ensureValid();

      expect(pool.refreshed).toEqual(['a']);
      expect(session.proxy.id).toBe('proxy-2');
    });

    it('should stop after maxBindAttempts candidates', async () => {
      const pool = new FakePool(credentials);
      const binder = new SessionBinder(pool, new FakeProbe(['a', 'b', 'c', 'd']), { maxBindAttempts: 2 });

      await expect(binder.ensureValid()).rejects.toMatchObject({ code: ErrorCode.SESSION_UNAVAILABLE });
      expect(pool.invalidatedCredentials).toEqual(['a', 'b']);
      expect(binder.state).toBe('unbound');
    });

    it('should propagate pool exhaustion', async () => {
      const pool = new FakePool([credential('a')]);
      const binder = new SessionBinder(pool, new FakeProbe(['a']));

      await expect(binder.ensureValid()).rejects.toMatchObject({ code: ErrorCode.POOL_EXHAUSTED });
      expect(pool.invalidatedCredentials).toEqual(['a']);
    });

    it('should honour the stop signal between candidates', async () => {
      const pool = new FakePool(credentials);
      let checks = 0;
      const binder = new SessionBinder(pool, new FakeProbe(['a', 'b', 'c', 'd']), {
        shouldStop: () => ++checks > 1,
      });

      await expect(binder.ensureValid()).rejects.toMatchObject({ code: ErrorCode.CANCELLED });
      expect(pool.acquired).toEqual(['a']);
    });
  });

  describe('rotate', () => {
    it('should invalidate both credential and proxy, then bind a fresh session', async () => {
      const pool = new FakePool(credentials);
      const binder = new SessionBinder(pool, new FakeProbe());
      await binder.ensureValid();

      const session = await binder.rotate('three failures');

      expect(pool.invalidatedCredentials).toEqual(['a']);
      expect(pool.invalidatedProxies).toEqual(['proxy-1']);
      expect(session.credential.id).toBe('b');
      expect(binder.state).toBe('valid');
    });
  });

  describe('refreshProxyIfExpired', () => {
    it('should replace the session object when the proxy expires', async () => {
      let clock = 0;
      const pool = new FakePool(credentials, () => 100);
      const binder = new SessionBinder(pool, new FakeProbe(), { now: () => clock });
      const original = await binder.ensureValid();

      expect(await binder.refreshProxyIfExpired()).toBe(original);

      clock = 100;
      const refreshed = await binder.refreshProxyIfExpired();

      expect(refreshed).not.toBe(original);
      expect(refreshed.credential).toBe(original.credential);
      expect(refreshed.proxy.id).toBe('proxy-2');
      expect(original.proxy.id).toBe('proxy-1');
      expect(pool.refreshed).toEqual(['a']);
    });

    it('should require a bound session', async () => {
      const binder = new SessionBinder(new FakePool(credentials), new FakeProbe());

      await expect(binder.refreshProxyIfExpired()).rejects.toMatchObject({
        code: ErrorCode.SESSION_UNAVAILABLE,
      });
    });
  });

  describe('invalidate and release', () => {
    it('should drop the session and bind a new one on the next ensureValid', async () => {
      const pool = new FakePool(credentials);
      const binder = new SessionBinder(pool, new FakeProbe());
      await binder.ensureValid();

      await binder.invalidate('logged out');
      expect(binder.state).toBe('degraded');
      expect(binder.current()).toBeNull();

      const next = await binder.ensureValid();
      expect(next.credential.id).toBe('b');
      expect(pool.invalidatedCredentials).toEqual(['a']);
    });

    it('should return a healthy credential to the pool on release', async () => {
      const pool = new FakePool(credentials);
      const binder = new SessionBinder(pool, new FakeProbe());
      await binder.ensureValid();

      await binder.release();

      expect(pool.released).toEqual(['a']);
      expect(pool.invalidatedCredentials).toEqual([]);
      expect(binder.state).toBe('unbound');
    });
  });

  describe('close', () => {
    it('should release the session and refuse further use', async () => {
      const pool = new FakePool(credentials);
      const binder = new SessionBinder(pool, new FakeProbe());
      await binder.ensureValid();

      await binder.close();
      await binder.close();

      expect(pool.released).toEqual(['a']);
      expect(binder.state).toBe('closed');
      await expect(binder.ensureValid()).rejects.toMatchObject({ code: ErrorCode.CLIENT_CLOSED });
      await expect(binder.rotate('late')).rejects.toMatchObject({ code: ErrorCode.CLIENT_CLOSED });
    });
  });

  describe('events', () => {
    it('should publish state transitions on the event bus', async () => {
      const bus = new CrawlEventBus();
      const seen: SessionEventData[] = [];
      bus.on(bus.events.SESSION, (data: SessionEventData) => seen.push(data));
      const binder = new SessionBinder(new FakePool(credentials), new FakeProbe(), { eventBus: bus });

      await binder.ensureValid();
      await binder.close();

      expect(seen.map((e) => e.state)).toEqual(['binding', 'valid', 'closed']);
      expect(seen[1].credential).toBe('user-a');
    });
  });
});
