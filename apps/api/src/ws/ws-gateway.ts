import { WebSocketServer, WebSocket } from 'ws';
import type { Server, IncomingMessage } from 'http';
import type { DomainEvent, EventTopic, EventTransportPort } from '@cargotrace/domain';

interface WsMessage {
  type: 'event';
  topic: EventTopic;
  partitionKey: string;
  data: DomainEvent;
}

interface Client {
  socket: WebSocket;
  /** `null` means every topic. */
  topics: ReadonlySet<string> | null;
}

/** `/ws?topics=shipment.created,location.updates` narrows what a client receives. */
function topicsOf(req: IncomingMessage): ReadonlySet<string> | null {
  const raw = new URL(req.url ?? '/ws', 'http://localhost').searchParams.get('topics');
  if (!raw) return null;
  const topics = raw
    .split(',')
    .map((t) => t.trim())
    .filter(Boolean);
  return topics.length ? new Set(topics) : null;
}

/**
 * Event transport that broadcasts every published domain event to connected
 * WebSocket clients. Events published before `attach` reach nobody.
 */
export class WsGateway implements EventTransportPort {
  private wss: WebSocketServer | null = null;
  private readonly clients = new Set<Client>();

  attach(server: Server): void {
    if (this.wss) throw new Error('[ws-gateway] already attached');
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (socket, req) => {
      const client: Client = { socket, topics: topicsOf(req) };
      this.clients.add(client);
      socket.on('close', () => this.clients.delete(client));
      socket.on('error', () => this.clients.delete(client));
    });

    console.log('[ws-gateway] listening on /ws');
  }

  get connectedClients(): number {
    return this.clients.size;
  }

  async publish(topic: EventTopic, partitionKey: string, event: DomainEvent): Promise<void> {
    const msg: WsMessage = { type: 'event', topic, partitionKey, data: event };
    const payload = JSON.stringify(msg);
    for (const client of this.clients) {
      if (client.topics && !client.topics.has(topic)) continue;
      if (client.socket.readyState === WebSocket.OPEN) {
        client.socket.send(payload);
      }
    }
  }

  async close(): Promise<void> {
    for (const client of this.clients) client.socket.close();
    this.clients.clear();
    const wss = this.wss;
    this.wss = null;
    if (!wss) return;
    await new Promise<void>((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
  }
}
