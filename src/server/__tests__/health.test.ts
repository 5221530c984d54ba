import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import express from 'express';
import type { AddressInfo } from 'net';
import type { Server } from 'http';
import { createAPIRouter } from '../api/router';
import { InsultService } from '../services/insult.service';
import type { WordStore } from '../services/word-store.service';
import type { ReplySink } from '../services/reply.service';

/**
 * Router tests against an in-process server on an ephemeral port.
 */

interface HealthResponse {
  ok: boolean;
  wordCache: string;
  store: string;
  timestamp: number;
}

const store: WordStore = {
  scan: async () => [
    { word: 'awful', category: 'descriptor' },
    { word: 'jerk', category: 'subject' },
  ],
  put: async () => {},
};

describe('API router', () => {
  const sent: Array<{ channel: string; text: string }> = [];
  const replies: ReplySink = {
    send: async (channel, text) => {
      sent.push({ channel, text });
    },
  };
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = express();
    app.use(
      '/api',
      createAPIRouter({
        insults: new InsultService({ store, replies }),
        storeHealth: async () => 'ok',
      })
    );
    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const { port } = server.address() as AddressInfo;
    baseUrl = `http://127.0.0.1:${port}/api`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  const postEvent = (body: string) =>
    fetch(`${baseUrl}/slack/events`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });

  it('should report health before the word cache is loaded', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const data = (await response.json()) as HealthResponse;

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('application/json');
    expect(data).toEqual({
      ok: true,
      wordCache: 'uninitialized',
      store: 'ok',
      timestamp: expect.any(Number),
    });
  });

  it('should answer the url_verification handshake', async () => {
    const response = await postEvent(
      JSON.stringify({ type: 'url_verification', challenge: 'abc123' })
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ challenge: 'abc123' });
  });

  it('should dispatch a message and reply in its channel', async () => {
    const response = await postEvent(
      JSON.stringify({
        type: 'event_callback',
        event: { type: 'message', channel: 'C1', user: 'U123', text: 'insult me' },
      })
    );

    expect(response.status).toBe(200);
    expect(sent).toEqual([{ channel: 'C1', text: '<@U123> is an awful jerk' }]);

    const health = (await (await fetch(`${baseUrl}/health`)).json()) as HealthResponse;
    expect(health.wordCache).toBe('ready');
  });

  it('should return 400 for a body that is not JSON', async () => {
    const response = await postEvent('{not json');

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      error: { code: 'INVALID_EVENT', message: 'Request body is not valid JSON' },
    });
  });

  it('should return 404 for unknown routes', async () => {
    const response = await fetch(`${baseUrl}/pick`);

    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({
      error: { code: 'NOT_FOUND', message: 'API route not found: GET /pick' },
    });
  });
});
