/**
 * Stack Server - HTTP + WebSocket front for a StackRuntime
 *
 * - REST API for stacks, spawns, commands and memory
 * - WebSocket at /ws streaming every output event
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import { WebSocketServer, WebSocket } from 'ws';
import { createServer } from 'http';
import type { Outcome } from '../outcome/outcome';
import type { StackweaveConfig } from '../core/config/config';
import { DEFAULT_CONFIG } from '../core/config/config';
import { parseElemType, formatValue } from '../core/value/value';
import { parsePerspectiveMode } from '../core/stack/perspective';
import type { MailboxPolicy } from '../core/spawn/spawn';
import type { OutputEvent, OutputSink } from '../ports/sink';
import { TeeSink, toWire } from '../ports/sink';
import { StackRuntime } from '../runtime';
import type { CommandResponse, ServerEvent, StackView } from './stackService';
import {
  badRequest,
  booleanField,
  errorBody,
  numberField,
  parseClientCommand,
  serverError,
  statusFor,
  stringField,
} from './stackService';

// ============================================================
// BROADCAST SINK
// ============================================================

/**
 * Sends each output event to every open WebSocket client.
 */
export class BroadcastSink implements OutputSink {
  readonly clients = new Set<WebSocket>();

  emit(event: OutputEvent): void {
    this.broadcast({ type: 'output', event: toWire(event) });
  }

  broadcast(event: ServerEvent): void {
    const msg = JSON.stringify(event);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(msg);
      }
    }
  }
}

export type StackServerOptions = {
  config?: StackweaveConfig;
  /** Port to listen on; 0 picks a free one. Defaults to config.server.port */
  port?: number;
  /** Extra sink alongside the WebSocket broadcast (console, memory) */
  sink?: OutputSink;
};

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// ============================================================
// STACK SERVER
// ============================================================

export class StackServer {
  readonly runtime: StackRuntime;
  readonly broadcaster: BroadcastSink;
  private app: express.Application;
  private server: ReturnType<typeof createServer>;
  private wss: WebSocketServer;
  private port: number;

  private constructor(runtime: StackRuntime, broadcaster: BroadcastSink, port: number) {
    this.runtime = runtime;
    this.broadcaster = broadcaster;
    this.port = port;
    this.app = express();
    this.app.use(express.json());
    this.app.use(this.corsMiddleware);

    this.server = createServer(this.app);
    this.wss = new WebSocketServer({ server: this.server, path: '/ws' });

    this.setupRoutes();
    this.setupWebSocket();
  }

  /**
   * Build the runtime (default stacks included) and the server around it.
   */
  static async create(options: StackServerOptions = {}): Promise<StackServer> {
    const config = options.config ?? DEFAULT_CONFIG;
    const broadcaster = new BroadcastSink();
    const sink = options.sink ? new TeeSink(broadcaster, options.sink) : broadcaster;
    const runtime = await StackRuntime.create({ config, sink });
    return new StackServer(runtime, broadcaster, options.port ?? config.server.port);
  }

  /** Port actually bound, once started. */
  get boundPort(): number {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address.port : this.port;
  }

  get url(): string {
    return `http://127.0.0.1:${this.boundPort}`;
  }

  // ─────────────────────────────────────────────────────────────
  // MIDDLEWARE
  // ─────────────────────────────────────────────────────────────

  private corsMiddleware = (req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  };

  private reply<A>(res: Response, outcome: Outcome<A>, okStatus = 200): void {
    if (outcome.tag === 'Done') {
      res.status(okStatus).json(typeof outcome.value === 'string' ? { message: outcome.value } : outcome.value);
    } else {
      res.status(statusFor(outcome.failure)).json(errorBody(outcome.failure));
    }
  }

  // ─────────────────────────────────────────────────────────────
  // HTTP ROUTES
  // ─────────────────────────────────────────────────────────────

  private setupRoutes() {
    const app = this.app;
    const rt = this.runtime;

    // Health check
    app.get('/health', (_req, res) => {
      res.json({ status: 'ok', stacks: rt.listStacks().length, spawns: rt.listSpawns().length });
    });

    // ─── Stacks ───
    app.get('/stacks', (_req, res) => {
      res.json(rt.listStacks());
    });

    app.post('/stacks', async (req, res) => {
      try {
        const name = stringField(req.body, 'name');
        const type = parseElemType(stringField(req.body, 'type') ?? 'int');
        const perspectiveText = stringField(req.body, 'perspective');
        const perspective = perspectiveText === undefined ? undefined : parsePerspectiveMode(perspectiveText);
        if (!name || !type || (perspectiveText !== undefined && !perspective)) {
          res.status(400).json(badRequest('expected { name, type?: int|float|str, perspective?: lifo|fifo }'));
          return;
        }
        const created = await rt.createStack(name, type, {
          perspective,
          capacity: numberField(req.body, 'capacity'),
          replace: booleanField(req.body, 'replace'),
        });
        this.reply(res, created, 201);
      } catch (e) {
        res.status(500).json(serverError(errorMessage(e)));
      }
    });

    app.get('/stacks/:name', (req, res) => {
      const found = rt.stacks.resolve(req.params.name);
      if (found.tag === 'Fail') {
        this.reply(res, found);
        return;
      }
      const stack = found.value;
      const view: StackView = {
        ...stack.info(),
        items: stack.snapshot().map(formatValue),
        rendering: stack.render(),
      };
      res.json(view);
    });

    app.delete('/stacks/:name', async (req, res) => {
      try {
        this.reply(res, await rt.destroyStack(req.params.name));
      } catch (e) {
        res.status(500).json(serverError(errorMessage(e)));
      }
    });

    // ─── Commands ───
    app.post('/command', async (req, res) => {
      try {
        const line = stringField(req.body, 'line');
        if (line === undefined) {
          res.status(400).json(badRequest('expected { line }'));
          return;
        }
        const result = await rt.execute(line);
        const response: CommandResponse = {
          ok: result.ok,
          target: result.report.target,
          kind: result.report.kind,
          lines: result.lines,
        };
        res.json(response);
      } catch (e) {
        res.status(500).json(serverError(errorMessage(e)));
      }
    });

    // ─── Spawns ───
    app.get('/spawns', (_req, res) => {
      res.json(rt.listSpawns());
    });

    app.post('/spawns', async (req, res) => {
      try {
        const name = stringField(req.body, 'name');
        const stackTypeText = stringField(req.body, 'stackType');
        const stackType = stackTypeText === undefined ? undefined : parseElemType(stackTypeText);
        const mailbox = readMailbox(stringField(req.body, 'mailbox'));
        if (!name || (stackTypeText !== undefined && !stackType) || mailbox === null) {
          res.status(400).json(badRequest('expected { name, stackType?: int|float|str, mailbox?: reject|queue }'));
          return;
        }
        this.reply(res, await rt.createSpawn(name, { stackType, mailbox }), 201);
      } catch (e) {
        res.status(500).json(serverError(errorMessage(e)));
      }
    });

    app.post('/spawns/:name/script', async (req, res) => {
      try {
        const script = stringField(req.body, 'script');
        if (script === undefined) {
          res.status(400).json(badRequest('expected { script }'));
          return;
        }
        this.reply(res, await rt.deposit(req.params.name, script), 202);
      } catch (e) {
        res.status(500).json(serverError(errorMessage(e)));
      }
    });

    app.post('/spawns/:name/pause', (req, res) => {
      this.reply(res, rt.pauseSpawn(req.params.name));
    });

    app.post('/spawns/:name/resume', (req, res) => {
      this.reply(res, rt.resumeSpawn(req.params.name));
    });

    app.post('/spawns/:name/stop', (req, res) => {
      this.reply(res, rt.stopSpawn(req.params.name));
    });

    app.delete('/spawns/:name', async (req, res) => {
      try {
        this.reply(res, await rt.destroySpawn(req.params.name));
      } catch (e) {
        res.status(500).json(serverError(errorMessage(e)));
      }
    });

    // ─── Memory ───
    app.get('/memory/:addr', (req, res) => {
      if (!/^\d+$/.test(req.params.addr)) {
        res.status(400).json(badRequest('address must be a non-negative integer'));
        return;
      }
      const addr = BigInt(req.params.addr);
      const cell = rt.peekMemory(addr);
      if (cell.tag === 'Fail') {
        this.reply(res, cell);
        return;
      }
      res.json({ address: Number(addr), value: cell.value.toString() });
    });
  }

  // ─────────────────────────────────────────────────────────────
  // WEBSOCKET
  // ─────────────────────────────────────────────────────────────

  private setupWebSocket() {
    this.wss.on('connection', (ws) => {
      this.broadcaster.clients.add(ws);
      this.send(ws, { type: 'hello', stacks: this.runtime.listStacks(), spawns: this.runtime.listSpawns() });

      ws.on('message', (data) => {
        this.handleClientMessage(ws, data.toString()).catch((e: unknown) => {
          this.send(ws, { type: 'error', error: errorMessage(e) });
        });
      });

      ws.on('close', () => {
        this.broadcaster.clients.delete(ws);
      });
    });
  }

  private async handleClientMessage(ws: WebSocket, raw: string): Promise<void> {
    const cmd = parseClientCommand(raw);
    if (!cmd) {
      this.send(ws, { type: 'error', error: 'unrecognised message' });
      return;
    }

    switch (cmd.type) {
      case 'command': {
        const result = await this.runtime.execute(cmd.line);
        this.send(ws, {
          type: 'result',
          response: { ok: result.ok, target: result.report.target, kind: result.report.kind, lines: result.lines },
        });
        return;
      }
      case 'deposit': {
        const deposited = await this.runtime.deposit(cmd.spawn, cmd.script);
        const lines = [deposited.tag === 'Done' ? deposited.value : errorBody(deposited.failure).error];
        this.send(ws, {
          type: 'result',
          response: { ok: deposited.tag === 'Done', target: cmd.spawn, kind: 'spawn', lines },
        });
        return;
      }
      case 'list':
        this.send(ws, { type: 'hello', stacks: this.runtime.listStacks(), spawns: this.runtime.listSpawns() });
        return;
    }
  }

  private send(ws: WebSocket, event: ServerEvent): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(event));
    }
  }

  // ─────────────────────────────────────────────────────────────
  // SERVER LIFECYCLE
  // ─────────────────────────────────────────────────────────────

  /** Listen on 127.0.0.1; rejects when the port cannot be bound. */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      // ws re-emits the HTTP server's errors on the WebSocket server
      const fail = (err: Error) => {
        this.wss.off('error', fail);
        reject(err);
      };
      this.wss.on('error', fail);
      this.server.listen(this.port, '127.0.0.1', () => {
        this.wss.off('error', fail);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    for (const client of this.broadcaster.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
    if (this.server.listening) {
      await new Promise<void>((resolve, reject) =>
        this.server.close((err) => (err ? reject(err) : resolve()))
      );
    }
    await this.runtime.shutdown();
  }
}

/** undefined when absent, null when present but not a policy. */
function readMailbox(text: string | undefined): MailboxPolicy | undefined | null {
  if (text === undefined) return undefined;
  return text === 'reject' || text === 'queue' ? text : null;
}
