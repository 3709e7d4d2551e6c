/**
 * Peer server: the HTTP face of a backup node.
 *
 * Endpoints:
 *   GET  /health : liveness, no auth
 *   POST /api/backup/messages : control message `{from, message}`
 *   GET  /api/backup/clients/{callsign}/snapshots : list snapshots
 *   GET  /api/backup/clients/{callsign}/snapshots/{id} : download manifest
 *   PUT  /api/backup/clients/{callsign}/snapshots/{id} : upload manifest
 *   DELETE /api/backup/clients/{callsign}/snapshots/{id} : delete snapshot
 *   GET  /api/backup/clients/{callsign}/snapshots/{id}/files/{blob}
 *   PUT  /api/backup/clients/{callsign}/snapshots/{id}/files/{blob}
 *
 * Auth: Bearer token in Authorization header. Storage requests name the
 * calling peer in the `X-Peerbak-From` header.
 */

import { createServer, IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import { errorMessage } from './errors.js';
import type { Logger } from './log.js';
import type { BackupNode } from './node.js';
import type { PeerMethod } from './transport.js';

export const PROTOCOL = 'peerbak/1.0';
export const FROM_HEADER = 'x-peerbak-from';
export const MESSAGES_PATH = '/api/backup/messages';
const STORAGE_PREFIX = '/api/backup/clients/';
const STORAGE_METHODS: readonly PeerMethod[] = ['GET', 'PUT', 'DELETE'];

const EnvelopeSchema = z.object({ from: z.string().min(1), message: z.unknown() });

export interface PeerServerOptions {
  port: number;
  node: BackupNode;
  token: string;
  logger?: Logger;
}

function checkAuth(req: IncomingMessage, token: string): boolean {
  const auth = req.headers.authorization;
  if (!auth) return false;
  const [scheme, value] = auth.split(' ', 2);
  return scheme === 'Bearer' && value === token;
}

function readBody(req: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const body = await readBody(req);
  if (body.length === 0) return undefined;
  try {
    return JSON.parse(body.toString('utf8'));
  } catch {
    return undefined;
  }
}

function json(res: ServerResponse, status: number, data: unknown): void {
  const body = JSON.stringify(data);
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(body);
}

export function createPeerServer(opts: PeerServerOptions) {
  const { port, node, token } = opts;
  const logger = opts.logger ?? console;

  const server = createServer(async (req, res) => {
    const url = new URL(req.url || '/', 'http://localhost');
    const method = req.method || 'GET';

    // Health check needs no auth
    if (url.pathname === '/health' && method === 'GET') {
      return json(res, 200, { ok: true, callsign: node.callsign, protocol: PROTOCOL });
    }

    // Everything else requires auth
    if (!checkAuth(req, token)) {
      return json(res, 401, { error: 'Unauthorized' });
    }

    try {
      if (url.pathname === MESSAGES_PATH && method === 'POST') {
        return await handleMessage(req, res);
      }
      const storageMethod = STORAGE_METHODS.find(m => m === method);
      if (url.pathname.startsWith(STORAGE_PREFIX) && storageMethod) {
        return await handleStorage(req, res, url.pathname, storageMethod);
      }

      json(res, 404, { error: 'Not found' });
    } catch (err) {
      logger.error(`Peer server error: ${errorMessage(err)}`);
      json(res, 500, { error: errorMessage(err) });
    }
  });

  async function handleMessage(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const envelope = EnvelopeSchema.safeParse(await readJsonBody(req));
    if (!envelope.success) {
      return json(res, 400, { error: 'Expected {from, message}' });
    }
    await node.receive(envelope.data.from, envelope.data.message);
    json(res, 202, { ok: true });
  }

  async function handleStorage(
    req: IncomingMessage,
    res: ServerResponse,
    path: string,
    method: PeerMethod,
  ): Promise<void> {
    const from = req.headers[FROM_HEADER];
    if (typeof from !== 'string' || from === '') {
      return json(res, 400, { error: `Missing ${FROM_HEADER} header` });
    }
    const body = method === 'PUT' ? await readJsonBody(req) : undefined;
    const response = await node.serve(from, { method, path, body });
    json(res, response.status, response.body);
  }

  return {
    listen: () => new Promise<void>((resolve) => {
      server.listen(port, () => {
        logger.info(`Peer server listening on port ${port}`);
        logger.info(`  Callsign: ${node.callsign}`);
        logger.info(`  Data: ${node.context.dataDir}`);
        resolve();
      });
    }),
    close: () => new Promise<void>((resolve) => {
      server.close(() => resolve());
    }),
    server,
  };
}

export type PeerServer = ReturnType<typeof createPeerServer>;
