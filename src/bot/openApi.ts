import axios, { type RawAxiosRequestHeaders } from 'axios';

import type { MediaKind } from './commands/envelope.js';
import { IncompatibilityError } from './commands/errors.js';
import type { InboundMessage, OutboundSender } from './gatewayEvents.js';

export const API_BASE = 'https://api.sgroup.qq.com';
export const SANDBOX_API_BASE = 'https://sandbox.api.sgroup.qq.com';
export const TOKEN_URL = 'https://bots.qq.com/app/getAppAccessToken';

const REQUEST_TIMEOUT_MS = 8000;
const TOKEN_REFRESH_MARGIN_MS = 60000;
const MAX_TRACKED_REPLIES = 500;
const TEXT_MSG_TYPE = 0;
const MEDIA_MSG_TYPE = 7;

const MEDIA_FILE_TYPES: Record<MediaKind, number> = {
  image: 1,
  video: 2,
  voice: 3,
};

interface HttpResponse {
  data: unknown;
}

export interface OpenApiDeps {
  httpGet: (url: string, headers: RawAxiosRequestHeaders) => Promise<HttpResponse>;
  httpPost: (
    url: string,
    body: Record<string, unknown>,
    headers: RawAxiosRequestHeaders,
  ) => Promise<HttpResponse>;
  now: () => number;
}

const defaultDeps: OpenApiDeps = {
  httpGet: (url, headers) => axios.get(url, { headers, timeout: REQUEST_TIMEOUT_MS }),
  httpPost: (url, body, headers) => axios.post(url, body, { headers, timeout: REQUEST_TIMEOUT_MS }),
  now: () => Date.now(),
};

export interface OpenApiOptions {
  appId: string;
  appSecret: string;
  sandbox?: boolean;
}

function field(data: unknown, key: string): unknown {
  if (data === null || typeof data !== 'object') return undefined;
  return Reflect.get(data, key);
}

export class OpenApiClient implements OutboundSender {
  private readonly deps: OpenApiDeps;
  private readonly base: string;
  private token?: { value: string; expiresAt: number };
  private pendingToken?: Promise<string>;
  private readonly seqByMessage = new Map<string, number>();

  constructor(
    private readonly options: OpenApiOptions,
    deps?: Partial<OpenApiDeps>,
  ) {
    this.deps = { ...defaultDeps, ...deps };
    this.base = options.sandbox ? SANDBOX_API_BASE : API_BASE;
  }

  async getAccessToken(): Promise<string> {
    if (this.token && this.deps.now() < this.token.expiresAt - TOKEN_REFRESH_MARGIN_MS) {
      return this.token.value;
    }
    // Concurrent replies share one refresh.
    const pending =
      this.pendingToken ??
      this.refreshToken().finally(() => {
        this.pendingToken = undefined;
      });
    this.pendingToken = pending;
    return pending;
  }

  async getGatewayUrl(): Promise<string> {
    const { data } = await this.deps.httpGet(`${this.base}/gateway`, await this.authHeaders());
    const url = field(data, 'url');
    if (typeof url !== 'string' || !url) {
      throw new Error('Gateway lookup returned no url');
    }
    return url;
  }

  async sendText(message: InboundMessage, text: string): Promise<void> {
    if (message.kind === 'channel') {
      await this.post(`/channels/${encodeURIComponent(message.conversationId)}/messages`, {
        content: text,
        msg_id: message.id,
      });
      return;
    }
    await this.post(`${this.conversationPath(message)}/messages`, {
      msg_type: TEXT_MSG_TYPE,
      content: text,
      msg_id: message.id,
      msg_seq: this.nextSeq(message.id),
    });
  }

  async sendMedia(
    message: InboundMessage,
    kind: MediaKind,
    url: string,
    caption = '',
  ): Promise<void> {
    if (message.kind === 'channel') {
      if (kind !== 'image') {
        throw new IncompatibilityError(`Guild channels cannot receive ${kind} messages.`);
      }
      await this.post(`/channels/${encodeURIComponent(message.conversationId)}/messages`, {
        content: caption,
        image: url,
        msg_id: message.id,
      });
      return;
    }

    const path = this.conversationPath(message);
    const media = await this.post(`${path}/files`, {
      file_type: MEDIA_FILE_TYPES[kind],
      url,
      srv_send_msg: false,
    });
    await this.post(`${path}/messages`, {
      msg_type: MEDIA_MSG_TYPE,
      content: caption,
      media,
      msg_id: message.id,
      msg_seq: this.nextSeq(message.id),
    });
  }

  private async refreshToken(): Promise<string> {
    const { data } = await this.deps.httpPost(
      TOKEN_URL,
      { appId: this.options.appId, clientSecret: this.options.appSecret },
      { 'Content-Type': 'application/json' },
    );
    const value = field(data, 'access_token');
    const expiresIn = Number(field(data, 'expires_in'));
    if (typeof value !== 'string' || !value || !Number.isFinite(expiresIn)) {
      throw new Error('Access token response was missing access_token or expires_in');
    }
    this.token = { value, expiresAt: this.deps.now() + expiresIn * 1000 };
    return value;
  }

  private async authHeaders(): Promise<RawAxiosRequestHeaders> {
    return {
      Authorization: `QQBot ${await this.getAccessToken()}`,
      'X-Union-Appid': this.options.appId,
      'Content-Type': 'application/json',
    };
  }

  private async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    const { data } = await this.deps.httpPost(`${this.base}${path}`, body, await this.authHeaders());
    return data;
  }

  private conversationPath(message: InboundMessage): string {
    const id = encodeURIComponent(message.conversationId);
    return message.kind === 'group' ? `/v2/groups/${id}` : `/v2/users/${id}`;
  }

  // Replies to the same message need distinct, increasing sequence numbers.
  private nextSeq(messageId: string): number {
    const next = (this.seqByMessage.get(messageId) ?? 0) + 1;
    this.seqByMessage.delete(messageId);
    this.seqByMessage.set(messageId, next);
    if (this.seqByMessage.size > MAX_TRACKED_REPLIES) {
      const oldest = this.seqByMessage.keys().next().value;
      if (oldest !== undefined) this.seqByMessage.delete(oldest);
    }
    return next;
  }
}
