import { randomUUID } from 'node:crypto';
import { WebSocket } from 'ws';
import { z } from 'zod';
import type { GatewayMessage } from '../types/index.js';

/** The part of a ws socket the hub talks to. */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
  close(): void;
}

export interface SocketClient {
  id: string;
  socket: ClientSocket;
  subscriptions: Set<string>;
}

const incomingSchema = z.object({
  type: z.string(),
  payload: z.object({ channels: z.array(z.string()).optional() }).passthrough().nullish(),
});

/**
 * Tracks connected WebSocket clients and the channels each one follows.
 * New clients follow every channel (`*`) until they unsubscribe.
 */
export class SocketHub {
  private clients = new Map<string, SocketClient>();

  constructor(private log: (message: string) => void = console.log) {}

  get size(): number {
    return this.clients.size;
  }

  broadcast(channel: string, message: GatewayMessage): void {
    const data = JSON.stringify({
      ...message,
      id: message.id ?? randomUUID(),
      timestamp: message.timestamp ?? Date.now(),
    });

    for (const client of this.clients.values()) {
      if (!client.subscriptions.has(channel) && !client.subscriptions.has('*')) continue;
      if (client.socket.readyState === WebSocket.OPEN) {
        client.socket.send(data);
      }
    }
  }

  handleConnection(socket: WebSocket): void {
    const client = this.accept(socket);

    socket.on('message', (data) => {
      this.receive(client, data.toString());
    });

    socket.on('close', () => {
      this.clients.delete(client.id);
    });

    socket.on('error', (err) => {
      this.log(`[gateway] WebSocket error for client ${client.id}: ${err.message}`);
      this.clients.delete(client.id);
    });
  }

  accept(socket: ClientSocket): SocketClient {
    const client: SocketClient = { id: randomUUID(), socket, subscriptions: new Set(['*']) };
    this.clients.set(client.id, client);
    send(socket, { type: 'connected', payload: { clientId: client.id }, timestamp: Date.now() });
    return client;
  }

  receive(client: SocketClient, raw: string): void {
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      send(client.socket, { type: 'error', payload: { message: 'Invalid JSON' } });
      return;
    }

    const parsed = incomingSchema.safeParse(decoded);
    if (!parsed.success) {
      send(client.socket, { type: 'error', payload: { message: 'Message needs a type' } });
      return;
    }

    const message = parsed.data;
    const channels = message.payload?.channels ?? [];
    switch (message.type) {
      case 'subscribe':
        for (const channel of channels) client.subscriptions.add(channel);
        send(client.socket, { type: 'subscribed', payload: { channels: Array.from(client.subscriptions) } });
        break;

      case 'unsubscribe':
        for (const channel of channels) client.subscriptions.delete(channel);
        send(client.socket, { type: 'unsubscribed', payload: { channels: Array.from(client.subscriptions) } });
        break;

      case 'ping':
        send(client.socket, { type: 'pong', payload: {}, timestamp: Date.now() });
        break;

      default:
        send(client.socket, { type: 'error', payload: { message: `Unknown message type: ${message.type}` } });
    }
  }

  closeAll(): void {
    for (const client of this.clients.values()) {
      client.socket.close();
    }
    this.clients.clear();
  }
}

function send(socket: ClientSocket, message: GatewayMessage): void {
  socket.send(JSON.stringify(message));
}
