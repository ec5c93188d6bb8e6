import express, { Request, Response } from 'express';
import { Server } from 'http';
import { KarmaBot } from './KarmaBot';
import { KarmaLedger } from './KarmaLedger';
import { LeaderboardBuilder } from './Leaderboard';
import { createLogger, describeError } from './logger';
import { MessageEventSchema, SlackEnvelopeSchema, SlashCommandSchema } from './schemas';
import { ChatPoster, totalScore } from './types';
import { appConfig } from './config';

const logger = createLogger('karma.api');

export interface KarmaBotAPIOptions {
  bot: KarmaBot;
  ledger: KarmaLedger;
  leaderboard: LeaderboardBuilder;
  /** Where replies to channel messages go; without one, replies are only logged. */
  poster?: ChatPoster;
}

export class KarmaBotAPI {
  readonly app: express.Application;
  private bot: KarmaBot;
  private ledger: KarmaLedger;
  private leaderboard: LeaderboardBuilder;
  private poster?: ChatPoster;

  constructor(options: KarmaBotAPIOptions) {
    this.bot = options.bot;
    this.ledger = options.ledger;
    this.leaderboard = options.leaderboard;
    this.poster = options.poster;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware() {
    this.app.use(express.json());
    this.app.use(express.urlencoded({ extended: false }));
  }

  private setupRoutes() {
    // Slack Events API
    this.app.post('/slack/events', async (req: Request, res: Response) => {
      try {
        const envelope = SlackEnvelopeSchema.safeParse(req.body);
        if (!envelope.success) {
          return res.status(400).json({ error: 'Unrecognized event payload' });
        }

        if (envelope.data.type === 'url_verification') {
          return res.json({ challenge: envelope.data.challenge });
        }

        // Slack retries slow deliveries; the first delivery already counted
        if (req.header('x-slack-retry-num')) {
          return res.status(200).send('Ignoring retried event');
        }

        const { event } = envelope.data;
        if (event.type !== 'message' || event.subtype || event.bot_id || !event.channel) {
          return res.status(200).send('Ignoring event');
        }

        const message = MessageEventSchema.safeParse(event);
        if (!message.success) {
          return res.status(200).send('Ignoring event without user or text');
        }

        logger.debug('Received message', { user: message.data.user, channel: event.channel });
        const reply = await this.bot.handleText(message.data);
        if (reply) {
          if (this.poster) {
            await this.poster.postMessage(event.channel, reply);
          } else {
            logger.info('No chat client configured, reply not sent', { reply });
          }
        }
        res.status(200).send('ok');
      } catch (error) {
        this.fail(res, error);
      }
    });

    // Slash commands
    this.app.post('/slack/commands', async (req: Request, res: Response) => {
      try {
        const command = SlashCommandSchema.safeParse(req.body);
        if (!command.success) {
          return res.status(400).json({ error: 'Unrecognized command payload' });
        }

        const text = await this.bot.handleCommand({
          command: command.data.command,
          text: command.data.text,
          user: command.data.user_id
        });
        if (!text) {
          return res.status(200).end();
        }
        res.json({ response_type: 'in_channel', text });
      } catch (error) {
        this.fail(res, error);
      }
    });

    // Structured leaderboard
    this.app.get('/leaderboard', async (_req: Request, res: Response) => {
      try {
        res.json(await this.leaderboard.build());
      } catch (error) {
        this.fail(res, error);
      }
    });

    // Karma for one subject
    this.app.get('/karma/:name', (req: Request, res: Response) => {
      const record = this.ledger.get(req.params.name);
      if (!record) {
        return res.status(404).json({ error: 'Subject not found' });
      }
      res.json({ ...record, totalScore: totalScore(record) });
    });
  }

  private fail(res: Response, error: unknown) {
    logger.error('Request failed', describeError(error));
    res.status(500).json({ error: 'Internal server error' });
  }

  public start(port: number = appConfig.port): Server {
    return this.app.listen(port, () => {
      logger.info(`Karma bot API listening on port ${port}`);
    });
  }
}
