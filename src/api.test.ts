import fs from 'fs';
import os from 'os';
import path from 'path';
import { once } from 'events';
import { Server } from 'http';
import { KarmaBotAPI } from './api';
import { KarmaBot } from './KarmaBot';
import { KarmaLedger } from './KarmaLedger';
import { LeaderboardBuilder } from './Leaderboard';
import { ResponseComposer } from './ResponseComposer';
import { KarmaStore } from './services/KarmaStore';
import { ChatPoster } from './types';

class RecordingPoster implements ChatPoster {
  messages: Array<{ channel: string; text: string }> = [];

  async postMessage(channel: string, text: string): Promise<void> {
    this.messages.push({ channel, text });
  }
}

describe('KarmaBotAPI', () => {
  let dir: string;
  let filePath: string;
  let ledger: KarmaLedger;
  let poster: RecordingPoster;
  let server: Server;
  let baseUrl: string;

  const postEvent = (body: unknown, headers: Record<string, string> = {}) =>
    fetch(`${baseUrl}/slack/events`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...headers },
      body: JSON.stringify(body)
    });

  const messageEvent = (event: Record<string, unknown>) => ({
    type: 'event_callback',
    event: { type: 'message', channel: 'C1', ...event }
  });

  const postCommand = (fields: Record<string, string>) =>
    fetch(`${baseUrl}/slack/commands`, {
      method: 'POST',
      body: new URLSearchParams(fields)
    });

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'karma-api-'));
    filePath = path.join(dir, 'karma.json');
    const store = new KarmaStore(filePath);
    ledger = await KarmaLedger.open(store);
    const leaderboard = new LeaderboardBuilder(store);
    const bot = new KarmaBot({
      ledger,
      leaderboard,
      composer: new ResponseComposer({ positive: () => 'Bravo.', negative: () => 'Oof.' })
    });
    poster = new RecordingPoster();

    const api = new KarmaBotAPI({ bot, ledger, leaderboard, poster });
    server = api.app.listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.close();
    server.closeAllConnections();
    await once(server, 'close');
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('POST /slack/events', () => {
    it('should answer the URL verification challenge', async () => {
      const res = await postEvent({ type: 'url_verification', challenge: 'abc123' });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ challenge: 'abc123' });
    });

    it('should apply karma and post the reply to the channel', async () => {
      const res = await postEvent(messageEvent({ user: 'U2', text: 'widget++ nice work' }));

      expect(res.status).toBe(200);
      expect(await res.text()).toBe('ok');
      expect(poster.messages).toEqual([{ channel: 'C1', text: 'Bravo. widget now has 1 points.' }]);
      expect(ledger.get('widget')).toEqual({ name: 'widget', pluses: 1, minuses: 0 });
    });

    it('should post the admonishment for self-karma', async () => {
      await postEvent(messageEvent({ user: 'U2', text: '<@U2>++' }));

      expect(poster.messages).toEqual([{ channel: 'C1', text: 'Ahem, no self-karma please!' }]);
      expect(ledger.all()).toEqual([]);
    });

    it('should post nothing for -- inside a URL', async () => {
      const res = await postEvent(messageEvent({ user: 'U2', text: 'https://example.com/a-- broke' }));

      expect(res.status).toBe(200);
      expect(poster.messages).toEqual([]);
    });

    it('should ignore bot messages and retries', async () => {
      await postEvent(messageEvent({ subtype: 'bot_message', text: 'widget++' }));
      await postEvent(messageEvent({ bot_id: 'B1', user: 'U3', text: 'widget++' }));
      await postEvent(messageEvent({ user: 'U2', text: 'widget++' }), { 'x-slack-retry-num': '1' });

      expect(poster.messages).toEqual([]);
      expect(ledger.all()).toEqual([]);
    });

    it('should ignore message events without a user', async () => {
      const res = await postEvent(messageEvent({ text: 'widget++' }));

      expect(res.status).toBe(200);
      expect(ledger.all()).toEqual([]);
    });

    it('should reject unknown payloads', async () => {
      const res = await postEvent({ type: 'something_else' });
      expect(res.status).toBe(400);
    });
  });

  describe('POST /slack/commands', () => {
    it('should run /k in channel', async () => {
      const res = await postCommand({ command: '/k', text: 'widget ++ thanks', user_id: 'U2' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        response_type: 'in_channel',
        text: 'Bravo. widget now has 1 points.'
      });
    });

    it('should run /leaderboard', async () => {
      const res = await postCommand({ command: '/leaderboard', user_id: 'U2' });
      expect(await res.json()).toEqual({ response_type: 'in_channel', text: 'No karma yet!' });
    });

    it('should answer an empty 200 when /k has nothing to say', async () => {
      const res = await postCommand({
        command: '/k',
        text: 'https://example.com/a-- is broken',
        user_id: 'U2'
      });

      expect(res.status).toBe(200);
      expect(await res.text()).toBe('');
      expect(ledger.all()).toEqual([]);
    });

    it('should reject commands without a user', async () => {
      const res = await postCommand({ command: '/k', text: 'widget++' });
      expect(res.status).toBe(400);
    });
  });

  describe('GET /leaderboard', () => {
    it('should return the structured leaderboard', async () => {
      await ledger.applyIncrement('widget');
      await ledger.applyDecrement('<!here>');

      const res = await fetch(`${baseUrl}/leaderboard`);
      expect(await res.json()).toEqual({
        kind: 'tables',
        people: [{ name: 'here', pluses: 0, minuses: 1, netScore: -1 }],
        things: [{ name: 'widget', pluses: 1, minuses: 0, netScore: 1 }]
      });
    });

    it('should fail with 500 when the file is corrupted', async () => {
      fs.writeFileSync(filePath, '{broken');

      const res = await fetch(`${baseUrl}/leaderboard`);
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: 'Internal server error' });
    });
  });

  describe('GET /karma/:name', () => {
    it('should return the record with its total', async () => {
      await ledger.applyDecrement('widget');

      const res = await fetch(`${baseUrl}/karma/widget`);
      expect(await res.json()).toEqual({ name: 'widget', pluses: 0, minuses: 1, totalScore: -1 });
    });

    it('should 404 for unknown subjects', async () => {
      const res = await fetch(`${baseUrl}/karma/nothing`);
      expect(res.status).toBe(404);
    });
  });
});
