import type { NodeContext } from './context.js';
import { normalizeCallsign } from './models.js';
import { decodeTransfer, encodeTransfer, parseBackupPath, type PeerRequest, type PeerResponse } from './transport.js';

function reply(status: number, body: unknown): PeerResponse {
  return { status, body };
}

/**
 * Provider side of the file transfer paths. A peer may only touch the
 * storage of its own, active client relationship.
 */
export class StorageEndpoint {
  constructor(private readonly ctx: NodeContext) {}

  async handle(from: string, req: PeerRequest): Promise<PeerResponse> {
    const path = parseBackupPath(req.path);
    if (!path) return reply(400, { error: 'Invalid backup path' });

    const sender = normalizeCallsign(from);
    if (path.client !== sender) return reply(403, { error: 'Forbidden' });
    const client = this.ctx.relationships.getClient(sender);
    if (client?.status !== 'active') return reply(403, { error: 'No active backup relationship' });

    const { snapshots } = this.ctx;
    switch (path.kind) {
      case 'snapshots':
        if (req.method !== 'GET') return reply(405, { error: 'Method not allowed' });
        return reply(200, { snapshots: await snapshots.listSnapshots(sender) });

      case 'manifest': {
        if (req.method === 'GET') {
          const data = await snapshots.readManifest(sender, path.snapshotId);
          return data ? reply(200, encodeTransfer(data)) : reply(404, { error: 'Not found' });
        }
        if (req.method === 'DELETE') {
          const deleted = await snapshots.deleteSnapshot(sender, path.snapshotId);
          return deleted ? reply(200, { ok: true }) : reply(404, { error: 'Not found' });
        }
        const data = decodeTransfer(req.body);
        if (!data) return reply(400, { error: 'Missing data' });
        await snapshots.saveManifest(sender, path.snapshotId, data);
        return reply(200, { ok: true });
      }

      case 'file': {
        if (req.method === 'DELETE') return reply(405, { error: 'Method not allowed' });
        if (req.method === 'GET') {
          const data = await snapshots.readBlob(sender, path.snapshotId, path.blobName);
          return data ? reply(200, encodeTransfer(data)) : reply(404, { error: 'Not found' });
        }
        const data = decodeTransfer(req.body);
        if (!data) return reply(400, { error: 'Missing data' });
        await snapshots.saveBlob(sender, path.snapshotId, path.blobName, data);
        return reply(200, { ok: true });
      }
    }
  }
}
