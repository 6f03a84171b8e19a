import WebSocket, { type RawData } from 'ws';

import type { EnvConfig } from '../config/env.js';
import { UserStore } from '../storage/userStore.js';
import type { UserRecord } from '../storage/userStore.js';
import { createCommandRegistry } from './commands/builtinCommands.js';
import { CommandDispatcher } from './commands/commandDispatcher.js';
import type { DispatchOutcome } from './commands/commandDispatcher.js';
import type { CommandRegistry } from './commands/commandRegistry.js';
import type { Envelope } from './commands/envelope.js';
import type { UserLookup } from './commands/statsCommand.js';
import {
  GatewayOp,
  heartbeatInterval,
  intentMask,
  isMessageEvent,
  parseGatewayPayload,
  parseMessageEvent,
  readySessionId,
  toEnvelope,
} from './gatewayEvents.js';
import type { GatewayPayload, InboundMessage, OutboundSender } from './gatewayEvents.js';
import { OpenApiClient } from './openApi.js';

const RECONNECT_DELAY_MS = 1500;
const ERROR_REPLY = 'Command error, try again later.';

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface GatewayApi extends OutboundSender {
  getAccessToken(): Promise<string>;
  getGatewayUrl(): Promise<string>;
}

export interface MessageLog extends UserLookup {
  recordMessage(envelope: Envelope): UserRecord;
  flush(): void;
}

export interface ChatBotDeps {
  api: GatewayApi;
  users: MessageLog;
  dispatcher: Pick<CommandDispatcher, 'dispatch'>;
}

export class ChatBot {
  readonly registry: CommandRegistry;
  private readonly api: GatewayApi;
  private readonly dispatcher: Pick<CommandDispatcher, 'dispatch'>;
  private readonly users: MessageLog;
  private ws?: WebSocket;
  private heartbeatTimer?: NodeJS.Timeout;
  private reconnectTimer?: NodeJS.Timeout;
  private sessionId?: string;
  private lastSeq: number | null = null;
  private stopping = false;

  constructor(
    private readonly config: EnvConfig,
    deps: Partial<ChatBotDeps> = {},
  ) {
    this.api =
      deps.api ??
      new OpenApiClient({
        appId: config.appId,
        appSecret: config.appSecret,
        sandbox: config.sandbox,
      });
    this.users = deps.users ?? new UserStore();
    this.registry = createCommandRegistry(this.users, config.prefixes);
    this.dispatcher =
      deps.dispatcher ??
      new CommandDispatcher(this.registry, {
        handlerTimeoutMs: config.handlerTimeoutMs,
        debug: config.debugDispatch,
      });
  }

  async start(): Promise<void> {
    this.stopping = false;
    console.log(`[BOT] Registered ${this.registry.size} command(s).`);
    await this.connect();
  }

  stop(): void {
    this.stopping = true;
    this.stopHeartbeat();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    this.ws?.close(1000);
    this.ws = undefined;
    this.users.flush();
  }

  private async connect(): Promise<void> {
    const url = await this.api.getGatewayUrl();
    console.log('[GATEWAY] Connecting to', url);
    const ws = new WebSocket(url);
    this.ws = ws;

    ws.on('open', () => {
      console.log('[GATEWAY] Connected, waiting for hello...');
    });

    ws.on('close', (code) => {
      this.stopHeartbeat();
      if (this.ws === ws) this.ws = undefined;
      if (this.stopping) return;
      console.warn(`[GATEWAY] Socket closed (${code}). Attempting reconnect...`);
      this.scheduleReconnect();
    });

    ws.on('error', (err) => {
      console.error('[GATEWAY] Socket error:', err);
    });

    ws.on('message', (payload: RawData) => {
      const raw = typeof payload === 'string' ? payload : payload.toString();
      this.handlePayload(ws, raw).catch((err) => {
        console.error('[GATEWAY] Failed to handle payload:', err);
      });
    });
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.connect().catch((err) => {
        console.error('[GATEWAY] Reconnect failed:', describeError(err));
        this.scheduleReconnect();
      });
    }, RECONNECT_DELAY_MS);
  }

  private async handlePayload(ws: WebSocket, raw: string): Promise<void> {
    const payload = parseGatewayPayload(raw);
    if (!payload) return;
    if (payload.s !== undefined) {
      this.lastSeq = payload.s;
    }

    switch (payload.op) {
      case GatewayOp.HELLO:
        this.startHeartbeat(ws, heartbeatInterval(payload.d));
        await this.identify(ws);
        return;
      case GatewayOp.HEARTBEAT_ACK:
        return;
      case GatewayOp.RECONNECT:
        console.warn('[GATEWAY] Server asked for a reconnect.');
        ws.close(4000);
        return;
      case GatewayOp.INVALID_SESSION:
        console.warn('[GATEWAY] Session invalidated, identifying from scratch.');
        this.sessionId = undefined;
        this.lastSeq = null;
        ws.close(4000);
        return;
      case GatewayOp.DISPATCH:
        await this.handleDispatch(payload);
        return;
      default:
        return;
    }
  }

  private async identify(ws: WebSocket): Promise<void> {
    const token = `QQBot ${await this.api.getAccessToken()}`;
    if (ws.readyState !== WebSocket.OPEN) return;
    if (this.sessionId) {
      ws.send(
        JSON.stringify({
          op: GatewayOp.RESUME,
          d: { token, session_id: this.sessionId, seq: this.lastSeq ?? 0 },
        }),
      );
      console.log('[GATEWAY] Resuming session', this.sessionId);
      return;
    }
    ws.send(
      JSON.stringify({
        op: GatewayOp.IDENTIFY,
        d: { token, intents: intentMask(this.config.intents), shard: [0, 1] },
      }),
    );
  }

  private startHeartbeat(ws: WebSocket, intervalMs: number | null): void {
    this.stopHeartbeat();
    if (!intervalMs) return;
    this.heartbeatTimer = setInterval(() => {
      if (ws.readyState !== WebSocket.OPEN) return;
      ws.send(JSON.stringify({ op: GatewayOp.HEARTBEAT, d: this.lastSeq }));
    }, intervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
  }

  /** Handles one op 0 frame: session bookkeeping or a chat message. */
  async handleDispatch(payload: GatewayPayload): Promise<void> {
    if (payload.t === 'READY' || payload.t === 'RESUMED') {
      this.sessionId = readySessionId(payload.d) ?? this.sessionId;
      console.log(`[GATEWAY] ${payload.t}, session ${this.sessionId ?? '(unknown)'}`);
      return;
    }
    if (!payload.t || !isMessageEvent(payload.t)) return;

    let message: InboundMessage;
    try {
      message = parseMessageEvent(payload.t, payload.d);
    } catch (err) {
      console.warn('[GATEWAY] Dropped message event:', describeError(err));
      return;
    }
    if (message.isBot) return;

    const envelope = toEnvelope(message, this.api, this.config.appId);
    this.users.recordMessage(envelope);
    const outcome = await this.dispatcher.dispatch(envelope);
    await this.afterDispatch(envelope, outcome);
  }

  private async afterDispatch(envelope: Envelope, outcome: DispatchOutcome): Promise<void> {
    if (outcome.status === 'failed' && this.config.replyOnError) {
      try {
        await envelope.send(ERROR_REPLY);
      } catch (replyErr) {
        console.error('[BOT] Failed to send error reply', describeError(replyErr));
      }
      return;
    }
    if (outcome.status === 'ignored' && this.config.logChatEvents) {
      console.log(
        `[CHAT EVENT][${envelope.conversationKind}:${envelope.conversationId ?? '-'}] ${envelope.senderId}: ${envelope.rawText}`,
      );
    }
  }
}
