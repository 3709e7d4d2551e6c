/**
 * HTTP peer transport: reaches other nodes' peer servers by callsign.
 */

import { z } from 'zod';
import { errorMessage } from './errors.js';
import type { Logger } from './log.js';
import type { ControlMessage } from './messages.js';
import { normalizeCallsign } from './models.js';
import { FROM_HEADER, MESSAGES_PATH } from './server.js';
import type { PeerDirectory, PeerInfo, PeerRequest, PeerResponse, PeerTransport } from './transport.js';

export interface PeerEndpoint {
  callsign: string;
  url: string;
}

export interface HttpPeerTransportOptions {
  /** Callsign this node announces as the sender */
  self: string;
  token: string;
  peers: PeerEndpoint[];
  timeoutMs?: number;
  logger?: Logger;
}

const PeerHealthSchema = z.object({
  ok: z.literal(true),
  callsign: z.string().default(''),
  protocol: z.string().default(''),
});

export type PeerHealth = z.infer<typeof PeerHealthSchema>;

interface CallOptions {
  method?: string;
  body?: string;
  headers?: Record<string, string>;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

export class HttpPeerTransport implements PeerTransport, PeerDirectory {
  private readonly self: string;
  private readonly token: string;
  private readonly peers = new Map<string, string>();
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(opts: HttpPeerTransportOptions) {
    this.self = normalizeCallsign(opts.self);
    this.token = opts.token;
    for (const peer of opts.peers) {
      this.peers.set(normalizeCallsign(peer.callsign), peer.url.replace(/\/$/, ''));
    }
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = opts.logger ?? console;
  }

  private baseUrl(callsign: string): string {
    const url = this.peers.get(normalizeCallsign(callsign));
    if (!url) throw new Error(`Unknown peer ${callsign}`);
    return url;
  }

  private async call(callsign: string, path: string, opts: CallOptions = {}): Promise<Response> {
    return fetch(`${this.baseUrl(callsign)}${path}`, {
      method: opts.method,
      body: opts.body,
      signal: AbortSignal.timeout(this.timeoutMs),
      headers: {
        Authorization: `Bearer ${this.token}`,
        [FROM_HEADER]: this.self,
        ...opts.headers,
      },
    });
  }

  async send(target: string, message: ControlMessage): Promise<boolean> {
    try {
      const res = await this.call(target, MESSAGES_PATH, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ from: this.self, message }),
      });
      if (!res.ok) this.logger.warn(`${message.type} to ${target} rejected: ${res.status}`);
      return res.ok;
    } catch (err) {
      this.logger.warn(`${message.type} to ${target} failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async request(target: string, req: PeerRequest): Promise<PeerResponse> {
    const res = await this.call(target, req.path, {
      method: req.method,
      ...(req.body === undefined
        ? {}
        : { headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(req.body) }),
    });
    let body: unknown = null;
    try {
      body = await res.json();
    } catch (err) {
      this.logger.warn(`Unreadable response from ${target}${req.path}: ${errorMessage(err)}`);
    }
    return { status: res.status, body };
  }

  /** Check if a peer is alive */
  async health(callsign: string): Promise<PeerHealth | null> {
    try {
      const res = await fetch(`${this.baseUrl(callsign)}/health`, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!res.ok) return null;
      const health = PeerHealthSchema.safeParse(await res.json());
      return health.success ? health.data : null;
    } catch {
      return null;
    }
  }

  async list(): Promise<PeerInfo[]> {
    return Promise.all(
      [...this.peers.keys()].map(async callsign => ({ callsign, online: (await this.health(callsign)) !== null })),
    );
  }

  isKnown(callsign: string): boolean {
    return this.peers.has(normalizeCallsign(callsign));
  }
}
