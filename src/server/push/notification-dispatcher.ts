import { z } from 'zod';
import { describeCause } from '../errors.js';
import type { Logger } from '../logger.js';
import { relayUrl } from '../relay/relay-client.js';
import type { Clock } from '../relay/wait.js';
import type { FetchLike, NotifyResult } from '../types.js';
import type { ChannelRegistry } from './channel-registry.js';
import type { TokenProvider } from './token-provider.js';

export interface NotificationDispatcherOptions {
  relayBaseUrl: string;
  serverId?: string;
  channels: ChannelRegistry;
  tokens: TokenProvider;
  clock: Clock;
  fetch: FetchLike;
  logger: Logger;
}

export interface WakePayload {
  callback: string;
  serverId: string | null;
  timestamp: string;
}

const DIAGNOSTIC_HEADERS: Array<[string, string]> = [
  ['x-wns-status', 'X-WNS-Status'],
  ['x-wns-error-description', 'Error'],
  ['x-wns-deviceconnectionstatus', 'Device'],
  ['x-wns-notificationstatus', 'NotifStatus']
];

const mintedSessionSchema = z.object({
  sessionId: z.string().min(1),
  callbackUrl: z.string().min(1).optional()
});

export class NotificationDispatcher {
  private readonly logger: Logger;

  constructor(private readonly opts: NotificationDispatcherOptions) {
    this.logger = opts.logger.child({ module: 'notification-dispatcher' });
  }

  /**
   * Mints a relay session for `clientName` and pushes a raw wake notification to its channel.
   * Delivery failures come back as `{ ok: false }`; credential and network failures throw.
   */
  async notify(clientName: string, signal?: AbortSignal): Promise<NotifyResult> {
    const channel = this.opts.channels.get(clientName);
    if (!channel) {
      this.logger.warn({ clientName }, 'no push channel registered');
      return { ok: false, diagnostic: `no push channel registered for '${clientName}'` };
    }

    const minted = await this.mintSession(clientName, signal);
    if (!minted.ok) return minted;

    const payload: WakePayload = {
      callback: minted.callbackUrl,
      serverId: this.opts.serverId ?? null,
      timestamp: new Date(this.opts.clock.now()).toISOString()
    };
    const delivered = await this.sendRaw(channel.channelUri, payload, signal);
    if (!delivered.ok) return delivered;

    this.opts.channels.touch(clientName, this.opts.clock.now());
    return minted;
  }

  async sendRaw(channelUri: string, payload: WakePayload, signal?: AbortSignal): Promise<{ ok: true } | { ok: false; diagnostic: string }> {
    const body = JSON.stringify(payload);
    const size = Buffer.byteLength(body, 'utf8');

    this.logger.info({ channel: `${channelUri.slice(0, 60)}...`, callback: payload.callback, size }, 'sending raw push');
    let res = await this.postRaw(channelUri, body, size, signal);
    if (res.status === 401) {
      this.logger.warn('push token rejected; refreshing once');
      this.opts.tokens.invalidate();
      res = await this.postRaw(channelUri, body, size, signal);
    }

    if (res.ok) {
      this.logger.info({ notificationStatus: res.headers.get('x-wns-notificationstatus') }, 'push accepted');
      return { ok: true };
    }

    let diagnostic = `push service returned ${res.status}`;
    for (const [header, label] of DIAGNOSTIC_HEADERS) {
      const value = res.headers.get(header);
      if (value) diagnostic += ` | ${label}: ${value}`;
    }
    const text = await res.text();
    if (text) diagnostic += ` | Body: ${text}`;

    this.logger.error({ diagnostic }, 'push rejected');
    return { ok: false, diagnostic };
  }

  private async postRaw(channelUri: string, body: string, size: number, signal?: AbortSignal): Promise<Response> {
    const { token } = await this.opts.tokens.getToken();
    return this.opts.fetch(channelUri, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': 'application/octet-stream',
        'Content-Length': String(size),
        'X-WNS-Type': 'wns/raw',
        'X-WNS-RequestForStatus': 'true'
      },
      body,
      signal
    });
  }

  private async mintSession(clientName: string, signal?: AbortSignal): Promise<NotifyResult> {
    const res = await this.opts.fetch(relayUrl(this.opts.relayBaseUrl, 'notify', clientName), { method: 'POST', signal });
    const text = await res.text();
    if (!res.ok) {
      return { ok: false, diagnostic: `relay refused to mint a session (${res.status})${text ? `: ${text}` : ''}` };
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      return { ok: false, diagnostic: `relay returned a non-JSON session: ${describeCause(error)}` };
    }
    const parsed = mintedSessionSchema.safeParse(body);
    if (!parsed.success) {
      return { ok: false, diagnostic: 'relay response carries no sessionId' };
    }

    const { sessionId } = parsed.data;
    const callbackUrl = parsed.data.callbackUrl ?? this.callbackUrlFor(sessionId);
    this.logger.info({ clientName, sessionId }, 'relay session minted');
    return { ok: true, sessionId, callbackUrl };
  }

  private callbackUrlFor(sessionId: string): string {
    const url = new URL(`/ws/mcp/${encodeURIComponent(sessionId)}`, this.opts.relayBaseUrl);
    url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
    if (this.opts.serverId) url.searchParams.set('serverId', this.opts.serverId);
    return url.toString();
  }
}
