// ============================================
// VOTESHIELD - WebSocket Plugin
// ============================================

import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import websocket from '@fastify/websocket';
import type { WebSocket } from 'ws';
import { z } from 'zod';

declare module 'fastify' {
  interface FastifyInstance {
    wsClients: Set<WebSocket>;
    broadcastToPoll: (pollId: string, event: string, data: unknown) => void;
    clientPolls: Map<WebSocket, Set<string>>;
  }
}

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('subscribe_poll'), pollId: z.string().min(1) }),
  z.object({ type: z.literal('unsubscribe_poll'), pollId: z.string().min(1) }),
]);

const websocketPluginImpl: FastifyPluginAsync = async (fastify) => {
  // Register WebSocket support
  await fastify.register(websocket, {
    options: {
      clientTracking: true,
    },
  });

  const wsClients = new Set<WebSocket>();
  fastify.decorate('wsClients', wsClients);

  // Polls each client follows
  const clientPolls = new Map<WebSocket, Set<string>>();
  fastify.decorate('clientPolls', clientPolls);

  fastify.decorate('broadcastToPoll', (pollId: string, event: string, data: unknown) => {
    const message = JSON.stringify({ event, data });
    for (const client of wsClients) {
      if (client.readyState === 1 && clientPolls.get(client)?.has(pollId)) {
        client.send(message);
      }
    }
  });

  const forget = (socket: WebSocket) => {
    wsClients.delete(socket);
    clientPolls.delete(socket);
  };

  fastify.get('/ws', { websocket: true }, (socket) => {
    wsClients.add(socket);
    clientPolls.set(socket, new Set());
    fastify.log.info(`WebSocket client connected. Total: ${wsClients.size}`);

    socket.on('close', () => {
      forget(socket);
      fastify.log.info(`WebSocket client disconnected. Total: ${wsClients.size}`);
    });

    socket.on('error', (err) => {
      fastify.log.error({ err }, 'WebSocket error');
      forget(socket);
    });

    socket.on('message', (raw) => {
      let payload: unknown;
      try {
        payload = JSON.parse(raw.toString());
      } catch {
        fastify.log.warn('Invalid WebSocket message received');
        return;
      }

      const parsed = clientMessageSchema.safeParse(payload);
      if (!parsed.success) {
        fastify.log.warn('Unsupported WebSocket message received');
        return;
      }

      const message = parsed.data;
      switch (message.type) {
        case 'ping':
          socket.send(JSON.stringify({ type: 'pong' }));
          break;
        case 'subscribe_poll':
          clientPolls.get(socket)?.add(message.pollId);
          socket.send(JSON.stringify({ event: 'poll_subscribed', data: { pollId: message.pollId } }));
          break;
        case 'unsubscribe_poll':
          clientPolls.get(socket)?.delete(message.pollId);
          break;
      }
    });

    socket.send(JSON.stringify({
      event: 'connected',
      data: { message: 'Connected to VoteShield results channel' },
    }));
  });

  // Push fresh counters to poll subscribers after every accepted or retracted vote
  const unsubscribe = fastify.services.events.on('poll_results_changed', async ({ pollId }) => {
    const results = await fastify.services.polls.getResults(pollId);
    if (results) {
      fastify.broadcastToPoll(pollId, 'poll_results_changed', results);
    }
  });

  fastify.addHook('onClose', async () => {
    unsubscribe();
    for (const client of wsClients) {
      client.close();
    }
    wsClients.clear();
    clientPolls.clear();
  });
};

// Export with fastify-plugin to share decorators across encapsulation boundaries
export const websocketPlugin = fp(websocketPluginImpl, {
  name: 'voteshield-websocket',
  dependencies: ['voteshield-services'],
});
