import { afterEach, describe, expect, it } from 'vitest';
import { WebSocketServer, type WebSocket } from 'ws';
import { silentLogger } from '../../src/logger.js';
import { WsPullReceiver, abortableSleep, type Sleep } from '../../src/receivers/wsPull.js';
import { RecordingExporter } from '../helpers.js';

type Script = (ws: WebSocket, attempt: number) => void;

function startPeer(script: Script) {
  const wss = new WebSocketServer({ port: 0, host: '127.0.0.1' });
  let attempt = 0;
  wss.on('connection', (ws) => script(ws, ++attempt));
  return new Promise<{ wss: WebSocketServer; url: string }>((resolve) => {
    wss.on('listening', () => {
      const addr = wss.address();
      const port = addr !== null && typeof addr === 'object' ? addr.port : 0;
      resolve({ wss, url: `ws://127.0.0.1:${port}` });
    });
  });
}

function closePeer(wss: WebSocketServer) {
  for (const ws of wss.clients) ws.terminate();
  return new Promise<void>((resolve) => wss.close(() => resolve()));
}

/** Records each wait; after `limit` waits it parks until the receiver stops. */
function recordingSleep(limit: number) {
  const waits: number[] = [];
  let reached: () => void = () => undefined;
  const done = new Promise<void>((resolve) => {
    reached = resolve;
  });
  const sleep: Sleep = (ms, signal) => {
    waits.push(ms);
    if (waits.length < limit) return Promise.resolve();
    reached();
    return abortableSleep(60_000, signal);
  };
  return { waits, sleep, done };
}

const frame = (heartRate: number, updatedKey = 'heartRate') =>
  JSON.stringify({
    data: {
      time: '2024-05-01T10:00:00Z',
      heartRate,
      stepCount: 10,
      distanceTraveled: 5.5,
      speed: 1.25,
      calories: 3
    },
    updatedKey
  });

describe('WsPullReceiver', () => {
  let receiver: WsPullReceiver | undefined;
  let peer: WebSocketServer | undefined;

  afterEach(async () => {
    await receiver?.stop();
    if (peer) await closePeer(peer);
    receiver = undefined;
    peer = undefined;
  });

  it('re-exports every frame it reads', async () => {
    const exporter = new RecordingExporter();
    const { wss, url } = await startPeer((ws) => {
      ws.send(frame(80));
      ws.send(frame(81, 'all'));
      ws.close(1000);
    });
    peer = wss;
    const { sleep, done } = recordingSleep(1);

    receiver = new WsPullReceiver({ url, exporters: [exporter], logger: silentLogger(), sleep });
    await receiver.start();
    await done;

    expect(exporter.calls.map((c) => c.key)).toEqual(['heartRate', 'all']);
    expect(exporter.calls[0].data).toEqual({
      time: new Date('2024-05-01T10:00:00Z'),
      heartRate: 80,
      stepCount: 10,
      distanceTraveled: 5.5,
      speed: 1.25,
      calories: 3
    });
  });

  it('doubles the wait after failures and resets after a clean session', async () => {
    const exporter = new RecordingExporter();
    const { wss, url } = await startPeer((ws, attempt) => {
      if (attempt === 3) {
        ws.send(frame(90));
        ws.close(1000);
      } else {
        ws.send('not json');
      }
    });
    peer = wss;
    const { waits, sleep, done } = recordingSleep(4);

    receiver = new WsPullReceiver({ url, exporters: [exporter], logger: silentLogger(), sleep });
    await receiver.start();
    await done;

    expect(waits).toEqual([1000, 2000, 1000, 1000]);
    expect(exporter.calls.map((c) => c.data.heartRate)).toEqual([90]);
  });

  it('treats an abnormal close as a failure', async () => {
    const { wss, url } = await startPeer((ws, attempt) => {
      if (attempt === 1) ws.terminate();
      else ws.close(1000);
    });
    peer = wss;
    const { waits, sleep, done } = recordingSleep(3);

    receiver = new WsPullReceiver({ url, exporters: [], logger: silentLogger(), sleep });
    await receiver.start();
    await done;

    expect(waits).toEqual([1000, 1000, 1000]);
  });

  it('caps the wait when the peer is unreachable', async () => {
    const { wss, url } = await startPeer(() => undefined);
    await closePeer(wss);
    const { waits, sleep, done } = recordingSleep(4);

    receiver = new WsPullReceiver({
      url,
      exporters: [],
      logger: silentLogger(),
      maxBackoffMs: 3000,
      sleep
    });
    await receiver.start();
    await done;

    expect(waits).toEqual([1000, 2000, 3000, 3000]);
    expect(receiver.state).toBe('connecting');
  });

  it('backs off when the URL cannot be dialed', async () => {
    const { waits, sleep, done } = recordingSleep(2);

    receiver = new WsPullReceiver({ url: 'ftp://10.0.0.5/ws', exporters: [], logger: silentLogger(), sleep });
    await receiver.start();
    await done;

    expect(waits).toEqual([1000, 2000]);
    expect(receiver.state).toBe('connecting');
  });

  it('skips frames with an unknown key but keeps the session', async () => {
    const exporter = new RecordingExporter();
    const { wss, url } = await startPeer((ws) => {
      ws.send(frame(70, 'oxygen'));
      ws.send(frame(71));
      ws.close(1000);
    });
    peer = wss;
    const { waits, sleep, done } = recordingSleep(1);

    receiver = new WsPullReceiver({ url, exporters: [exporter], logger: silentLogger(), sleep });
    await receiver.start();
    await done;

    expect(exporter.calls.map((c) => c.data.heartRate)).toEqual([71]);
    expect(waits).toEqual([1000]);
  });

  it('stops cleanly', async () => {
    const { wss, url } = await startPeer(() => undefined);
    peer = wss;
    receiver = new WsPullReceiver({ url, exporters: [], logger: silentLogger() });
    await receiver.start();
    await receiver.stop();
    expect(receiver.state).toBe('stopped');
  });
});
