// ============================================
// VOTESHIELD - HTTP Surface Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { RawData } from 'ws';
import { buildApp } from '../src/app.js';
import { signToken } from '../src/plugins/auth.plugin.js';
import { MemoryCache } from '../src/cache/volatile-cache.js';
import type { Poll, PollOption } from '../src/repositories/poll.repository.js';
import { FP_A, FP_B } from './helpers.js';

const userToken = (userId: string) => signToken({ userId, email: `${userId}@example.test`, role: 'user' });
const adminToken = () => signToken({ userId: 'admin-1', email: 'admin@example.test', role: 'admin' });

describe('HTTP API', () => {
  let app: FastifyInstance;
  let pending: Array<Promise<void>>;
  let poll: Poll;
  let options: PollOption[];

  beforeEach(async () => {
    pending = [];
    app = await buildApp({
      dbPath: ':memory:',
      logger: false,
      patternAnalysis: false,
      cache: new MemoryCache(),
      schedule: (job) => {
        pending.push(job());
      },
    });
    await app.ready();

    const created = await app.services.polls.createPoll({ title: 'Favourite colour', options: ['Red', 'Blue'] });
    poll = created.poll;
    options = created.options;
  });

  afterEach(async () => {
    await Promise.all(pending);
    await app.close();
  });

  const castVote = (headers: Record<string, string>, payload: Record<string, unknown> = {}) =>
    app.inject({
      method: 'POST',
      url: '/api/votes/cast',
      headers: { 'user-agent': 'test-agent', ...headers },
      payload: { pollId: poll.id, optionId: options[0].id, ...payload },
    });

  it('should answer the health check', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('ok');
  });

  describe('POST /api/votes/cast', () => {
    it('should create a vote, then replay it', async () => {
      const first = await castVote({ 'x-fingerprint': FP_A });
      const second = await castVote({ 'x-fingerprint': FP_A });

      expect(first.statusCode).toBe(201);
      expect(first.json()).toMatchObject({
        success: true,
        isNew: true,
        vote: { pollId: poll.id, optionId: options[0].id, isValid: true, riskScore: 0 },
      });
      expect(second.statusCode).toBe(200);
      expect(second.json().isNew).toBe(false);
      expect(second.json().vote.id).toBe(first.json().vote.id);
    });

    it('should take the idempotency key from the header', async () => {
      const key = 'e'.repeat(64);
      const first = await castVote({ 'x-fingerprint': FP_A, 'idempotency-key': key });
      const second = await castVote({ 'x-fingerprint': FP_A, 'idempotency-key': key }, { optionId: options[1].id });

      expect(first.statusCode).toBe(201);
      expect(second.statusCode).toBe(200);
      expect(second.json().vote.optionId).toBe(options[0].id);
    });

    it('should derive a fingerprint for anonymous voters who send none', async () => {
      const response = await castVote({ 'accept-language': 'en-GB' });

      expect(response.statusCode).toBe(201);
    });

    it('should reject a malformed fingerprint header', async () => {
      const response = await castVote({ 'x-fingerprint': 'not-a-fingerprint' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: { code: 'FINGERPRINT_INVALID', message: 'Fingerprint must be 64 characters long' },
      });
    });

    it('should reject a body without an option', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/votes/cast',
        headers: { 'x-fingerprint': FP_A },
        payload: { pollId: poll.id },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('VALIDATION_ERROR');
      expect(response.json().error.details[0].path).toBe('optionId');
    });

    it('should reject a second vote from a signed-in user', async () => {
      const headers = { authorization: `Bearer ${userToken('user-1')}` };
      await castVote(headers);

      const response = await castVote(headers, { optionId: options[1].id });

      expect(response.statusCode).toBe(409);
      expect(response.json().error.code).toBe('DUPLICATE_VOTE');
    });

    it('should block one device shared by two accounts', async () => {
      await castVote({
        authorization: `Bearer ${userToken('user-1')}`,
        'x-fingerprint': FP_B,
        'x-forwarded-for': '198.51.100.1',
      });

      const response = await castVote({
        authorization: `Bearer ${userToken('user-2')}`,
        'x-fingerprint': FP_B,
        'x-forwarded-for': '198.51.100.2',
      });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toEqual({
        error: {
          code: 'FRAUD_DETECTED',
          message: 'Vote blocked due to suspicious activity',
          details: {
            reasons: [
              'Fingerprint used by 2 different users',
              'Fingerprint used from 2 different IP addresses',
            ],
          },
        },
      });
    });

    it('should refuse an invalid token', async () => {
      const response = await castVote({ authorization: 'Bearer not-a-token' });

      expect(response.statusCode).toBe(401);
      expect(response.json().error.message).toBe('Invalid or expired token');
    });
  });

  describe('votes of the caller', () => {
    it('should require authentication', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/votes/mine' });

      expect(response.statusCode).toBe(401);
      expect(response.json().error.message).toBe('Missing or invalid authorization header');
    });

    it('should list and retract the caller\'s vote', async () => {
      const retractable = await app.services.polls.createPoll({
        title: 'Lunch',
        options: ['Soup', 'Salad'],
        settings: { allowVoteRetraction: true },
      });
      const authorization = `Bearer ${userToken('user-1')}`;
      const cast = await app.inject({
        method: 'POST',
        url: '/api/votes/cast',
        headers: { authorization },
        payload: { pollId: retractable.poll.id, optionId: retractable.options[1].id },
      });
      const voteId: string = cast.json().vote.id;

      const mine = await app.inject({ method: 'GET', url: '/api/votes/mine', headers: { authorization } });
      expect(mine.json().votes.map((v: { id: string }) => v.id)).toEqual([voteId]);

      const retracted = await app.inject({ method: 'DELETE', url: `/api/votes/${voteId}`, headers: { authorization } });
      expect(retracted.statusCode).toBe(200);
      expect(retracted.json()).toEqual({ success: true });

      const after = await app.inject({ method: 'GET', url: '/api/votes/mine', headers: { authorization } });
      expect(after.json().votes).toEqual([]);
    });
  });

  describe('fingerprint block administration', () => {
    const authorization = () => `Bearer ${adminToken()}`;

    it('should refuse non-admin users', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/admin/fingerprint-blocks',
        headers: { authorization: `Bearer ${userToken('user-1')}` },
      });

      expect(response.statusCode).toBe(403);
      expect(response.json().error.message).toBe('Admin access required');
    });

    it('should block, list, unblock and show history', async () => {
      const blocked = await app.inject({
        method: 'POST',
        url: '/api/admin/fingerprint-blocks',
        headers: { authorization: authorization() },
        payload: { fingerprint: FP_A.toUpperCase(), reason: 'ballot stuffing' },
      });
      expect(blocked.statusCode).toBe(201);
      expect(blocked.json().block).toMatchObject({ fingerprint: FP_A, blockedBy: 'admin-1', isActive: true });

      const vote = await castVote({ 'x-fingerprint': FP_A });
      expect(vote.statusCode).toBe(403);
      expect(vote.json().error.message).toBe('This device has been blocked from voting');

      const list = await app.inject({
        method: 'GET',
        url: '/api/admin/fingerprint-blocks',
        headers: { authorization: authorization() },
      });
      expect(list.json()).toMatchObject({ activeCount: 1, limit: 50, offset: 0 });
      expect(list.json().blocks[0].reason).toBe('ballot stuffing');

      const lifted = await app.inject({
        method: 'DELETE',
        url: `/api/admin/fingerprint-blocks/${FP_A}`,
        headers: { authorization: authorization() },
      });
      expect(lifted.statusCode).toBe(200);
      expect(lifted.json().block.unblockedBy).toBe('admin-1');

      const again = await app.inject({
        method: 'DELETE',
        url: `/api/admin/fingerprint-blocks/${FP_A}`,
        headers: { authorization: authorization() },
      });
      expect(again.statusCode).toBe(404);

      const history = await app.inject({
        method: 'GET',
        url: `/api/admin/fingerprint-blocks/${FP_A}/history`,
        headers: { authorization: authorization() },
      });
      expect(history.json().events.map((e: { action: string }) => e.action)).toEqual(['blocked', 'unblocked']);
    });
  });

  describe('fraud analysis administration', () => {
    it('should run analysis on demand and list alerts', async () => {
      const authorization = `Bearer ${adminToken()}`;
      for (const digit of ['1', '2', '3']) {
        const response = await castVote({ 'x-fingerprint': digit.repeat(64), 'x-forwarded-for': '203.0.113.50' });
        expect(response.statusCode).toBe(201);
      }

      const analysis = await app.inject({
        method: 'POST',
        url: '/api/admin/fraud/analyze',
        headers: { authorization },
        payload: { pollId: poll.id },
      });
      expect(analysis.statusCode).toBe(200);
      expect(analysis.json().summary).toMatchObject({ pollsAnalyzed: 1, alertsGenerated: 1, votesFlagged: 0 });

      const alerts = await app.inject({
        method: 'GET',
        url: `/api/admin/fraud/alerts?pollId=${poll.id}`,
        headers: { authorization },
      });
      expect(alerts.json().alerts).toHaveLength(1);
      expect(alerts.json().alerts[0]).toMatchObject({
        patternType: 'ip_cluster',
        ipAddress: '203.0.113.50',
        reasons: ['IP cluster: 3 voters from 203.0.113.50'],
        riskScore: 60,
      });
    });
  });

  describe('vote rate limits', () => {
    let limited: FastifyInstance;
    let limitedPoll: Poll;
    let limitedOptions: PollOption[];

    beforeEach(async () => {
      limited = await buildApp({
        dbPath: ':memory:',
        logger: false,
        patternAnalysis: false,
        cache: new MemoryCache(),
        schedule: (job) => {
          pending.push(job());
        },
        voteRateLimit: { anonymousPerHour: 2, authenticatedPerHour: 3 },
      });
      await limited.ready();
      const created = await limited.services.polls.createPoll({ title: 'Limited', options: ['Red', 'Blue'] });
      limitedPoll = created.poll;
      limitedOptions = created.options;
    });

    afterEach(async () => {
      await Promise.all(pending);
      await limited.close();
    });

    const castLimited = (headers: Record<string, string>) =>
      limited.inject({
        method: 'POST',
        url: '/api/votes/cast',
        headers: { 'user-agent': 'test-agent', 'x-forwarded-for': '198.51.100.23', ...headers },
        payload: { pollId: limitedPoll.id, optionId: limitedOptions[0].id },
      });

    it('should refuse anonymous casts past the hourly limit', async () => {
      const first = await castLimited({ 'x-fingerprint': FP_A });
      const second = await castLimited({ 'x-fingerprint': FP_A });
      const third = await castLimited({ 'x-fingerprint': FP_A });

      expect(first.statusCode).toBe(201);
      expect(first.headers['x-ratelimit-limit']).toBe('2');
      expect(first.headers['x-ratelimit-remaining']).toBe('1');
      expect(second.statusCode).toBe(200);
      expect(second.headers['x-ratelimit-remaining']).toBe('0');
      expect(third.statusCode).toBe(429);
      expect(third.json().error.code).toBe('RATE_LIMITED');
      expect(third.json().error.message).toMatch(/^Too many vote attempts\. Try again in \d+ seconds\.$/);
    });

    it('should count signed-in voters separately from their address', async () => {
      await castLimited({ 'x-fingerprint': FP_A });
      await castLimited({ 'x-fingerprint': FP_A });
      expect((await castLimited({ 'x-fingerprint': FP_A })).statusCode).toBe(429);

      const member = await castLimited({ authorization: `Bearer ${userToken('user-1')}` });

      expect(member.statusCode).toBe(201);
      expect(member.headers['x-ratelimit-limit']).toBe('3');
      expect(member.headers['x-ratelimit-remaining']).toBe('2');
    });

    it('should not count requests to other routes', async () => {
      for (let i = 0; i < 3; i++) {
        await limited.inject({ method: 'GET', url: '/health' });
      }

      expect((await castLimited({ 'x-fingerprint': FP_A })).statusCode).toBe(201);
    });
  });

  describe('GET /ws', () => {
    it('should push new counters to poll subscribers', async () => {
      const socket = await app.injectWS('/ws');
      const nextMessage = (event: string) =>
        new Promise<{ event: string; data: unknown }>((resolve) => {
          const onMessage = (raw: RawData) => {
            const message: { event: string; data: unknown } = JSON.parse(raw.toString());
            if (message.event === event) {
              socket.off('message', onMessage);
              resolve(message);
            }
          };
          socket.on('message', onMessage);
        });

      const subscribed = nextMessage('poll_subscribed');
      socket.send(JSON.stringify({ type: 'subscribe_poll', pollId: poll.id }));
      expect((await subscribed).data).toEqual({ pollId: poll.id });

      const changed = nextMessage('poll_results_changed');
      await castVote({ 'x-fingerprint': FP_A });
      await Promise.all(pending);

      expect((await changed).data).toEqual({
        pollId: poll.id,
        totalVotes: 1,
        uniqueVoters: 1,
        options: [
          { id: options[0].id, text: 'Red', voteCount: 1 },
          { id: options[1].id, text: 'Blue', voteCount: 0 },
        ],
      });
      socket.terminate();
    });
  });

  it('should answer unknown routes with a typed 404', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/nowhere' });

    expect(response.statusCode).toBe(404);
    expect(response.json().error.code).toBe('NOT_FOUND');
  });
});
