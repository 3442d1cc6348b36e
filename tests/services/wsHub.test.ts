import { describe, expect, it, vi } from 'vitest';
import { WsHub, type HubSocket } from '../../src/services/wsHub.js';

class FakeSocket implements HubSocket {
  readonly sent: string[] = [];
  readonly pending: Array<(err?: Error) => void> = [];
  closed?: number;

  /** When false, sends never complete, like a peer that stopped reading. */
  constructor(private readonly autoAck = true) {}

  send(data: string, cb?: (err?: Error) => void) {
    this.sent.push(data);
    if (!cb) return;
    if (this.autoAck) cb();
    else this.pending.push(cb);
  }

  close(code?: number) {
    this.closed = code;
  }
}

describe('WsHub', () => {
  it('delivers a broadcast to every client', () => {
    const hub = new WsHub<{ n: number }>();
    const a = new FakeSocket();
    const b = new FakeSocket();
    hub.addClient(a);
    hub.addClient(b);

    expect(hub.broadcast({ n: 1 })).toEqual({ delivered: 2, dropped: 0 });
    expect(a.sent).toEqual(['{"n":1}']);
    expect(b.sent).toEqual(['{"n":1}']);
  });

  it('drops updates for a stalled client without holding back the others', () => {
    const hub = new WsHub<{ n: number }>();
    const stalled = new FakeSocket(false);
    const healthy = new FakeSocket();
    hub.addClient(stalled);
    hub.addClient(healthy);

    hub.broadcast({ n: 1 });
    expect(hub.broadcast({ n: 2 })).toEqual({ delivered: 1, dropped: 1 });

    expect(stalled.sent).toEqual(['{"n":1}']);
    expect(healthy.sent).toEqual(['{"n":1}', '{"n":2}']);
  });

  it('resumes a client once its send completes', () => {
    const hub = new WsHub<{ n: number }>();
    const slow = new FakeSocket(false);
    hub.addClient(slow);

    hub.broadcast({ n: 1 });
    hub.broadcast({ n: 2 });
    slow.pending[0]();
    hub.broadcast({ n: 3 });

    expect(slow.sent).toEqual(['{"n":1}', '{"n":3}']);
  });

  it('reports send errors', () => {
    const onError = vi.fn();
    const hub = new WsHub<{ n: number }>(onError);
    const socket = new FakeSocket(false);
    const id = hub.addClient(socket);

    hub.broadcast({ n: 1 });
    const boom = new Error('socket hang up');
    socket.pending[0](boom);

    expect(onError).toHaveBeenCalledWith(id, boom);
  });

  it('sends to a single client', () => {
    const hub = new WsHub<{ n: number }>();
    const a = new FakeSocket();
    const b = new FakeSocket();
    const id = hub.addClient(a);
    hub.addClient(b);

    expect(hub.send(id, { n: 7 })).toBe(true);
    expect(hub.send(999, { n: 7 })).toBe(false);
    expect(a.sent).toEqual(['{"n":7}']);
    expect(b.sent).toEqual([]);
  });

  it('removes clients once', () => {
    const hub = new WsHub<{ n: number }>();
    const socket = new FakeSocket();
    const id = hub.addClient(socket);

    expect(hub.removeClient(id)).toBe(true);
    expect(hub.removeClient(id)).toBe(false);
    expect(hub.size).toBe(0);
    hub.broadcast({ n: 1 });
    expect(socket.sent).toEqual([]);
  });

  it('closes everyone on shutdown', () => {
    const hub = new WsHub<{ n: number }>();
    const a = new FakeSocket();
    hub.addClient(a);
    hub.closeAll();
    expect(a.closed).toBe(1001);
    expect(hub.size).toBe(0);
  });
});
