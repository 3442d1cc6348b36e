export interface HubSocket {
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

type Client = {
  id: number;
  socket: HubSocket;
  inFlight: boolean;
};

export type DeliveryResult = {
  delivered: number;
  dropped: number;
};

/**
 * Live subscriber registry. Each client holds at most one message in flight;
 * anything broadcast while that send is pending is dropped for that client.
 */
export class WsHub<T> {
  private clients = new Map<number, Client>();
  private seq = 0;

  constructor(private readonly onSendError?: (id: number, err: Error) => void) {}

  get size() {
    return this.clients.size;
  }

  addClient(socket: HubSocket): number {
    const id = ++this.seq;
    this.clients.set(id, { id, socket, inFlight: false });
    return id;
  }

  /** Returns false when the client was already gone. */
  removeClient(id: number): boolean {
    return this.clients.delete(id);
  }

  send(id: number, data: T): boolean {
    const client = this.clients.get(id);
    if (!client || client.inFlight) return false;
    this.deliver(client, JSON.stringify(data));
    return true;
  }

  broadcast(data: T): DeliveryResult {
    const payload = JSON.stringify(data);
    const result: DeliveryResult = { delivered: 0, dropped: 0 };
    for (const c of this.clients.values()) {
      if (c.inFlight) {
        result.dropped++;
        continue;
      }
      this.deliver(c, payload);
      result.delivered++;
    }
    return result;
  }

  closeAll(code = 1001, reason = 'server shutting down') {
    for (const c of this.clients.values()) {
      c.socket.close(code, reason);
    }
    this.clients.clear();
  }

  private deliver(client: Client, payload: string) {
    client.inFlight = true;
    client.socket.send(payload, (err) => {
      client.inFlight = false;
      if (err) this.onSendError?.(client.id, err);
    });
  }
}
