import { describe, it, expect, vi } from 'vitest';
import { SocketHub, type ClientSocket } from './sockets.js';

function fakeSocket(readyState = 1) {
  const sent: unknown[] = [];
  const socket: ClientSocket = {
    readyState,
    send: (data: string) => {
      sent.push(JSON.parse(data));
    },
    close: vi.fn(),
  };
  return { socket, sent };
}

describe('SocketHub', () => {
  it('greets a new client with its id', () => {
    const hub = new SocketHub(vi.fn());
    const { socket, sent } = fakeSocket();

    const client = hub.accept(socket);

    expect(sent[0]).toMatchObject({ type: 'connected', payload: { clientId: client.id } });
    expect(hub.size).toBe(1);
  });

  it('delivers broadcasts by channel once a client narrows its subscriptions', () => {
    const hub = new SocketHub(vi.fn());
    const { socket, sent } = fakeSocket();
    const client = hub.accept(socket);

    hub.receive(client, JSON.stringify({ type: 'subscribe', payload: { channels: ['events'] } }));
    hub.receive(client, JSON.stringify({ type: 'unsubscribe', payload: { channels: ['*'] } }));
    expect(sent[2]).toEqual({ type: 'unsubscribed', payload: { channels: ['events'] } });

    hub.broadcast('oauth', { type: 'oauth.completed', payload: {} });
    hub.broadcast('events', { type: 'notion.webhook.page_created', payload: { id: 'p1' }, id: 'm1', timestamp: 5 });

    expect(sent).toHaveLength(4);
    expect(sent[3]).toEqual({ type: 'notion.webhook.page_created', payload: { id: 'p1' }, id: 'm1', timestamp: 5 });
  });

  it('skips sockets that are not open', () => {
    const hub = new SocketHub(vi.fn());
    const { socket, sent } = fakeSocket(3);
    hub.accept(socket);

    hub.broadcast('events', { type: 'x', payload: {} });

    expect(sent).toHaveLength(1);
  });

  it('answers ping, bad JSON and unknown types', () => {
    const hub = new SocketHub(vi.fn());
    const { socket, sent } = fakeSocket();
    const client = hub.accept(socket);

    hub.receive(client, '{"type":"ping"}');
    hub.receive(client, '{oops');
    hub.receive(client, '{"type":"dance"}');
    hub.receive(client, '{"payload":{}}');

    expect(sent.slice(1)).toEqual([
      { type: 'pong', payload: {}, timestamp: expect.any(Number) },
      { type: 'error', payload: { message: 'Invalid JSON' } },
      { type: 'error', payload: { message: 'Unknown message type: dance' } },
      { type: 'error', payload: { message: 'Message needs a type' } },
    ]);
  });

  it('closes every client', () => {
    const hub = new SocketHub(vi.fn());
    const { socket } = fakeSocket();
    hub.accept(socket);

    hub.closeAll();

    expect(socket.close).toHaveBeenCalled();
    expect(hub.size).toBe(0);
  });
});
