import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConnectionManager, computeReconnectDelay } from './connection-manager';
import { ConnectionError, TransientDisconnectError, type StreamError } from '../errors';
import { FakeSocketServer, flushMicrotasks } from '../__tests__/fake-socket';
import type { StreamConfig } from '../config/websocket-config';
import type { ConnectionState, FrameProcessor } from './types';

const testConfig: StreamConfig = {
  url: 'ws://localhost:8999/api/v1/ws',
  connectionTimeout: 5000,
  pingInterval: 0,
  reconnectDelays: { base: 1000, max: 8000, jitter: 0 },
};

describe('computeReconnectDelay', () => {
  const delays = { base: 1000, max: 60000, jitter: 0.2 };

  it('should double the delay per attempt', () => {
    expect(computeReconnectDelay(1, delays, () => 0.5)).toBe(1000);
    expect(computeReconnectDelay(2, delays, () => 0.5)).toBe(2000);
    expect(computeReconnectDelay(4, delays, () => 0.5)).toBe(8000);
  });

  it('should cap the delay at the maximum', () => {
    expect(computeReconnectDelay(10, delays, () => 0.5)).toBe(60000);
  });

  it('should spread the delay by the jitter fraction', () => {
    expect(computeReconnectDelay(1, delays, () => 0)).toBe(800);
    expect(computeReconnectDelay(1, delays, () => 0.75)).toBe(1100);
  });
});

describe('ConnectionManager', () => {
  let server: FakeSocketServer;
  let frames: string[];
  let onFrame: FrameProcessor;
  let manager: ConnectionManager;
  let states: ConnectionState[];
  let errors: StreamError[];

  function createManager(config: StreamConfig = testConfig): ConnectionManager {
    const created = new ConnectionManager({ config, onFrame: (text, id) => onFrame(text, id), socketFactory: server.factory });
    created.on('state', (state) => states.push(state));
    created.on('error', (error) => errors.push(error));
    return created;
  }

  async function connectOpen(): Promise<void> {
    const connecting = manager.connect();
    server.latest.open();
    await connecting;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    server = new FakeSocketServer();
    frames = [];
    onFrame = (text) => {
      frames.push(text);
    };
    states = [];
    errors = [];
    manager = createManager();
  });

  afterEach(() => {
    manager.destroy();
    vi.useRealTimers();
  });

  describe('connect', () => {
    it('should open a socket to the configured url', async () => {
      await connectOpen();

      expect(server.sockets).toHaveLength(1);
      expect(server.latest.url).toBe('ws://localhost:8999/api/v1/ws');
      expect(states).toEqual(['connecting', 'connected']);
      expect(manager.isConnected()).toBe(true);
      expect(manager.getConnectionId()).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should return the in-flight promise while connecting', async () => {
      const first = manager.connect();
      const second = manager.connect();

      expect(second).toBe(first);
      server.latest.open();
      await first;
      expect(server.sockets).toHaveLength(1);
    });

    it('should resolve without a new socket when already connected', async () => {
      await connectOpen();

      await manager.connect();

      expect(server.sockets).toHaveLength(1);
    });

    it('should reject with ConnectionError and not retry when the first attempt fails', async () => {
      const connecting = manager.connect();
      server.latest.fail();

      await expect(connecting).rejects.toBeInstanceOf(ConnectionError);
      await expect(connecting).rejects.toThrow('Failed to connect to ws://localhost:8999/api/v1/ws');
      expect(manager.getState()).toBe('disconnected');
      expect(server.latest.terminated).toBe(true);

      await vi.advanceTimersByTimeAsync(60000);
      expect(server.sockets).toHaveLength(1);
    });

    it('should time out an attempt that never opens', async () => {
      const connecting = manager.connect();
      const outcome = connecting.catch((error: unknown) => error);

      await vi.advanceTimersByTimeAsync(5000);

      const error = await outcome;
      expect(error).toBeInstanceOf(ConnectionError);
      if (error instanceof ConnectionError) {
        expect(error.cause).toEqual(new Error('Connection timed out after 5000ms'));
      }
      expect(manager.getState()).toBe('disconnected');
    });

    it('should allow connecting again after a failed first attempt', async () => {
      const failed = manager.connect();
      server.latest.fail();
      await expect(failed).rejects.toBeInstanceOf(ConnectionError);

      await connectOpen();

      expect(server.sockets).toHaveLength(2);
      expect(manager.isConnected()).toBe(true);
    });
  });

  describe('disconnect', () => {
    it('should close the socket normally and settle in closed', async () => {
      await connectOpen();

      manager.disconnect();

      expect(server.latest.closed).toEqual({ code: 1000, reason: 'Client disconnect' });
      expect(manager.getState()).toBe('closed');
      expect(manager.getConnectionId()).toBeNull();
    });

    it('should be a no-op when already closed or never connected', async () => {
      manager.disconnect();
      expect(states).toEqual([]);

      await connectOpen();
      manager.disconnect();
      manager.disconnect();

      expect(states).toEqual(['connecting', 'connected', 'closed']);
    });

    it('should reject a pending connect when called while connecting', async () => {
      const connecting = manager.connect();
      const socket = server.latest;

      manager.disconnect();

      await expect(connecting).rejects.toBeInstanceOf(ConnectionError);
      expect(socket.terminated).toBe(true);
      expect(manager.getState()).toBe('closed');

      socket.open();
      expect(manager.getState()).toBe('closed');
    });

    it('should cancel a scheduled reconnect', async () => {
      await connectOpen();
      server.latest.drop();
      expect(manager.getState()).toBe('reconnecting');

      manager.disconnect();
      await vi.advanceTimersByTimeAsync(60000);

      expect(server.sockets).toHaveLength(1);
      expect(manager.getState()).toBe('closed');
    });
  });

  describe('reconnection', () => {
    it('should report the drop and reconnect after the base delay', async () => {
      const reconnecting = vi.fn();
      const opened = vi.fn();
      manager.on('reconnecting', reconnecting);
      manager.on('open', opened);
      await connectOpen();

      server.latest.drop(1006, 'upstream restart');

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(TransientDisconnectError);
      expect(errors[0].message).toBe('Connection lost (code 1006: upstream restart)');
      expect(reconnecting).toHaveBeenCalledWith({ attempt: 1, delayMs: 1000 });

      await vi.advanceTimersByTimeAsync(999);
      expect(server.sockets).toHaveLength(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(server.sockets).toHaveLength(2);

      server.latest.open();
      await flushMicrotasks();

      expect(manager.getState()).toBe('connected');
      expect(opened).toHaveBeenLastCalledWith({ connectionId: manager.getConnectionId(), reconnect: true });
    });

    it('should back off exponentially up to the maximum and reset after success', async () => {
      const delays: number[] = [];
      manager.on('reconnecting', ({ delayMs }) => delays.push(delayMs));
      await connectOpen();
      server.latest.drop();

      for (const delay of [1000, 2000, 4000, 8000]) {
        await vi.advanceTimersByTimeAsync(delay);
        server.latest.fail();
        await flushMicrotasks();
      }

      expect(delays).toEqual([1000, 2000, 4000, 8000, 8000]);
      expect(errors.at(-1)?.message).toBe('Reconnect attempt 4 failed: connect ECONNREFUSED 127.0.0.1:8999');

      await vi.advanceTimersByTimeAsync(8000);
      server.latest.open();
      await flushMicrotasks();
      server.latest.drop();

      expect(delays.at(-1)).toBe(1000);
    });

    it('should keep retrying without a limit', async () => {
      await connectOpen();
      server.latest.drop();

      for (let attempt = 0; attempt < 12; attempt++) {
        await vi.advanceTimersByTimeAsync(8000);
        server.latest.fail();
        await flushMicrotasks();
      }

      expect(manager.getState()).toBe('reconnecting');
      expect(server.sockets).toHaveLength(13);
    });

    it('should ignore connect() while reconnecting', async () => {
      await connectOpen();
      server.latest.drop();

      await manager.connect();

      expect(server.sockets).toHaveLength(1);
      expect(manager.getState()).toBe('reconnecting');
    });
  });

  describe('frames', () => {
    it('should hand frames to the processor in arrival order', async () => {
      await connectOpen();

      server.latest.receive('{"a":1}');
      server.latest.receive('{"b":2}');
      await manager.drain();

      expect(frames).toEqual(['{"a":1}', '{"b":2}']);
    });

    it('should pause reading while frames are queued and resume once processed', async () => {
      let release = (): void => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const processed: string[] = [];
      onFrame = async (text) => {
        await gate;
        processed.push(text);
      };
      await connectOpen();

      server.latest.receive('first');
      server.latest.receive('second');
      await flushMicrotasks();

      expect(server.latest.paused).toBe(true);
      expect(processed).toEqual([]);

      release();
      await manager.drain();

      expect(processed).toEqual(['first', 'second']);
      expect(server.latest.paused).toBe(false);
    });

    it('should discard queued frames once the connection drops', async () => {
      let release = (): void => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const processed: string[] = [];
      onFrame = async (text) => {
        processed.push(text);
        await gate;
      };
      await connectOpen();

      server.latest.receive('before-drop');
      await flushMicrotasks();
      server.latest.receive('queued');
      server.latest.drop();
      release();
      await manager.drain();

      expect(processed).toEqual(['before-drop']);
    });

    it('should pause a reconnected socket while frames of the dropped one are still queued', async () => {
      let release = (): void => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const processed: string[] = [];
      onFrame = async (text) => {
        await gate;
        processed.push(text);
      };
      await connectOpen();

      server.latest.receive('a');
      server.latest.receive('b');
      await flushMicrotasks();
      server.latest.drop();
      await vi.advanceTimersByTimeAsync(1000);
      server.latest.open();
      await flushMicrotasks();

      server.latest.receive('c');
      server.latest.receive('d');

      expect(server.sockets).toHaveLength(2);
      expect(server.latest.paused).toBe(true);

      release();
      await manager.drain();

      expect(processed).toEqual(['a', 'c', 'd']);
      expect(server.latest.paused).toBe(false);
    });

    it('should keep processing after a processor failure', async () => {
      onFrame = (text) => {
        if (text === 'bad') {
          throw new Error('processor failure');
        }
        frames.push(text);
      };
      await connectOpen();

      server.latest.receive('bad');
      server.latest.receive('good');
      await manager.drain();

      expect(frames).toEqual(['good']);
    });
  });

  describe('send and keepalive', () => {
    it('should refuse to send while not connected', () => {
      expect(manager.send('{"action":"ping"}')).toBe(false);
    });

    it('should ping on the configured interval', async () => {
      manager.destroy();
      manager = createManager({ ...testConfig, pingInterval: 1000 });
      await connectOpen();

      await vi.advanceTimersByTimeAsync(2000);

      expect(server.latest.sent).toEqual(['{"action":"ping"}', '{"action":"ping"}']);
    });

    it('should stop pinging after a drop', async () => {
      manager.destroy();
      manager = createManager({ ...testConfig, pingInterval: 1000, reconnectDelays: { base: 60000, max: 60000, jitter: 0 } });
      await connectOpen();
      const socket = server.latest;

      socket.drop();
      await vi.advanceTimersByTimeAsync(5000);

      expect(socket.sent).toEqual([]);
    });
  });
});
