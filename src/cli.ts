#!/usr/bin/env node
/**
 * peerbak: peer-to-peer encrypted backups
 *
 * Every command works on a data directory (--data, default: current dir)
 * holding peerbak.json and the identity file.
 *
 *   peerbak keygen --callsign <name> [--force]
 *   peerbak serve [--port 7225] [--token <secret>]
 *   peerbak settings [--enable|--disable] [--auto-accept on|off] [--max-total <bytes>]
 *                    [--max-client <bytes>] [--max-snapshots <n>]
 *   peerbak invite <provider> [--interval <days>]
 *   peerbak accept <client> [--max-storage <bytes>] [--max-snapshots <n>]
 *   peerbak decline <client>
 *   peerbak clients | providers
 *   peerbak remove-client <client> [--erase]
 *   peerbak remove-provider <provider>
 *   peerbak backup <provider>
 *   peerbak restore <provider> <snapshot-id>
 *   peerbak snapshots <provider> | snapshots --client <client>
 *   peerbak delete-snapshot <provider> <snapshot-id> | delete-snapshot --client <client> <snapshot-id>
 *   peerbak discover [--timeout <seconds>] [--adopt]
 *
 * invite and discover listen on the configured port while they wait for
 * answers, so they cannot run next to `serve` on the same data directory.
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import { HttpPeerTransport } from './client.js';
import {
  backupExclusions,
  identityPath,
  loadConfig,
  loadIdentity,
  writeConfig,
  writeIdentityFile,
  type PeerbakConfig,
} from './config.js';
import { readFileOrNull } from './fs-json.js';
import { Identity } from './identity.js';
import { SnapshotSchema, type ProviderSettings, type Snapshot, type TransferStatus } from './models.js';
import { BackupNode } from './node.js';
import { createPeerServer } from './server.js';
import type { StatusChannel } from './status-channel.js';
import { backupPaths } from './transport.js';

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

function getNumber(args: string[], flag: string): number | undefined {
  const value = getFlag(args, flag);
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    console.error(`✗ ${flag} expects a non-negative number, got "${value}"`);
    process.exit(1);
  }
  return n;
}

function dataDirOf(args: string[]): string {
  return resolve(getFlag(args, '--data') ?? process.cwd());
}

function formatBytes(bytes: number): string {
  if (bytes >= 1024 ** 3) return `${(bytes / 1024 ** 3).toFixed(1)} GiB`;
  if (bytes >= 1024 ** 2) return `${(bytes / 1024 ** 2).toFixed(1)} MiB`;
  return `${(bytes / 1024).toFixed(1)} KiB`;
}

interface Session {
  config: PeerbakConfig;
  node: BackupNode;
  transport: HttpPeerTransport;
}

async function openSession(args: string[]): Promise<Session> {
  const dataDir = dataDirOf(args);
  const loaded = await loadConfig(dataDir);
  const config: PeerbakConfig = {
    ...loaded,
    token: getFlag(args, '--token') ?? loaded.token,
    port: getNumber(args, '--port') ?? loaded.port,
  };
  const identity = await loadIdentity(identityPath(dataDir, config));
  const transport = new HttpPeerTransport({ self: identity.callsign, token: config.token, peers: config.peers });
  const node = await BackupNode.open({
    dataDir,
    identity,
    transport,
    directory: transport,
    exclude: backupExclusions(config),
  });
  return { config, node, transport };
}

/** Runs a task with the peer server up, for commands that wait on answers. */
async function withListener<T>(session: Session, task: () => Promise<T>): Promise<T> {
  if (!session.config.token) {
    console.error('✗ A token is required (--token or "token" in peerbak.json)');
    process.exit(1);
  }
  const server = createPeerServer({ port: session.config.port, node: session.node, token: session.config.token });
  await server.listen();
  try {
    return await task();
  } finally {
    await server.close();
  }
}

async function followTransfer(label: string, channel: StatusChannel<TransferStatus>, started: TransferStatus): Promise<void> {
  if (started.status === 'failed' || started.errorCode) {
    console.error(`✗ ${label} not started: ${started.error}`);
    process.exit(1);
  }
  let lastPercent = -1;
  const unsubscribe = channel.subscribe(s => {
    if (s.status === 'in_progress' && s.progressPercent !== lastPercent) {
      lastPercent = s.progressPercent;
      console.log(`  ${String(s.progressPercent).padStart(3)}%  ${s.filesTransferred}/${s.filesTotal} files`);
    }
  });
  const done = await channel.waitFor(s => s.status === 'complete' || s.status === 'failed');
  unsubscribe();

  if (done.status === 'failed') {
    console.error(`✗ ${label} failed [${done.errorCode}]: ${done.error}`);
    process.exit(1);
  }
  console.log(`✓ ${label} complete`);
  console.log(`  Snapshot: ${done.snapshotId}`);
  console.log(`  Files: ${done.filesTransferred}`);
  console.log(`  Size: ${formatBytes(done.bytesTransferred)}`);
}

// ── Identity & settings ──────────────────────────────────────

async function keygen(args: string[]): Promise<void> {
  const callsign = getFlag(args, '--callsign');
  if (!callsign) {
    console.error('Usage: peerbak keygen --callsign <name> [--data <dir>]');
    process.exit(1);
  }

  const dataDir = dataDirOf(args);
  const config = { ...(await loadConfig(dataDir)), callsign };
  const keyFile = identityPath(dataDir, config);
  if ((await readFileOrNull(keyFile)) && !args.includes('--force')) {
    console.error(`✗ ${keyFile} already exists; pass --force to replace it (the old key cannot restore afterwards)`);
    process.exit(1);
  }
  const identity = Identity.generate(callsign);
  await writeIdentityFile(keyFile, identity);
  await writeConfig(dataDir, config);

  console.log(`✓ Identity created for ${identity.callsign}`);
  console.log(`  Public key: ${identity.publicKey}`);
  console.log(`  Key file: ${keyFile}`);
}

async function settings(args: string[]): Promise<void> {
  const { node } = await openSession(args);
  const changes: Partial<ProviderSettings> = {};
  if (args.includes('--enable')) changes.enabled = true;
  if (args.includes('--disable')) changes.enabled = false;
  const autoAccept = getFlag(args, '--auto-accept');
  if (autoAccept !== undefined) changes.autoAcceptFromContacts = autoAccept === 'on';
  const maxTotal = getNumber(args, '--max-total');
  if (maxTotal !== undefined) changes.maxTotalStorageBytes = maxTotal;
  const maxClient = getNumber(args, '--max-client');
  if (maxClient !== undefined) changes.defaultMaxClientStorageBytes = maxClient;
  const maxSnapshots = getNumber(args, '--max-snapshots');
  if (maxSnapshots !== undefined) changes.defaultMaxSnapshots = maxSnapshots;

  const current = Object.keys(changes).length > 0
    ? await node.relationships.updateProviderSettings(changes)
    : node.relationships.getSettings();

  console.log(`Provider mode: ${current.enabled ? 'enabled' : 'disabled'}`);
  console.log(`  Total storage: ${formatBytes(current.maxTotalStorageBytes)}`);
  console.log(`  Per client: ${formatBytes(current.defaultMaxClientStorageBytes)}`);
  console.log(`  Snapshots per client: ${current.defaultMaxSnapshots}`);
  console.log(`  Auto-accept contacts: ${current.autoAcceptFromContacts ? 'on' : 'off'}`);
}

// ── Relationships ────────────────────────────────────────────

async function invite(args: string[]): Promise<void> {
  const provider = args[0];
  if (!provider) {
    console.error('Usage: peerbak invite <provider> [--interval <days>]');
    process.exit(1);
  }
  const session = await openSession(args);
  console.log(`✉  Inviting ${provider} to hold backups...`);
  const result = await withListener(session, () =>
    session.node.relationships.sendInvite(provider, getNumber(args, '--interval')),
  );
  if (!result.ok) {
    console.error(`✗ ${result.error.message}`);
    process.exit(1);
  }
  console.log(`✓ ${result.provider.providerCallsign} accepted`);
  console.log(`  Storage: ${formatBytes(result.provider.maxStorageBytes)}`);
  console.log(`  Snapshots: ${result.provider.maxSnapshots}`);
}

async function accept(args: string[]): Promise<void> {
  const client = args[0];
  if (!client) {
    console.error('Usage: peerbak accept <client> [--max-storage <bytes>] [--max-snapshots <n>]');
    process.exit(1);
  }
  const { node } = await openSession(args);
  const accepted = await node.relationships.acceptInvite(
    client,
    getNumber(args, '--max-storage'),
    getNumber(args, '--max-snapshots'),
  );
  if (!accepted) {
    console.error(`✗ No pending invite from ${client}`);
    process.exit(1);
  }
  console.log(`✓ ${accepted.clientCallsign} can now back up here (${formatBytes(accepted.maxStorageBytes)})`);
}

async function decline(args: string[]): Promise<void> {
  const client = args[0];
  if (!client) {
    console.error('Usage: peerbak decline <client>');
    process.exit(1);
  }
  const { node } = await openSession(args);
  if (!(await node.relationships.declineInvite(client))) {
    console.error(`✗ No pending invite from ${client}`);
    process.exit(1);
  }
  console.log(`✓ Declined ${client}`);
}

async function clients(args: string[]): Promise<void> {
  const { node } = await openSession(args);
  const list = node.relationships.listClients();
  if (list.length === 0) {
    console.log('No backup clients.');
    return;
  }
  for (const c of list) {
    const usage = `${formatBytes(c.currentStorageBytes)} / ${formatBytes(c.maxStorageBytes)}`;
    console.log(`  ${c.clientCallsign.padEnd(12)} ${c.status.padEnd(10)} ${usage.padStart(22)}  ${c.snapshotCount} snapshots`);
  }
}

async function providers(args: string[]): Promise<void> {
  const { node } = await openSession(args);
  const list = node.relationships.listProviders();
  if (list.length === 0) {
    console.log('No backup providers.');
    return;
  }
  for (const p of list) {
    const last = p.lastSuccessfulBackup ?? 'never';
    console.log(`  ${p.providerCallsign.padEnd(12)} ${p.status.padEnd(10)} every ${p.backupIntervalDays}d  last: ${last}`);
  }
}

async function removeClient(args: string[]): Promise<void> {
  const client = args[0];
  if (!client) {
    console.error('Usage: peerbak remove-client <client> [--erase]');
    process.exit(1);
  }
  const { node } = await openSession(args);
  if (!(await node.relationships.removeClient(client, args.includes('--erase')))) {
    console.error(`✗ Unknown client ${client}`);
    process.exit(1);
  }
  console.log(`✓ Removed ${client}`);
}

async function removeProvider(args: string[]): Promise<void> {
  const provider = args[0];
  if (!provider) {
    console.error('Usage: peerbak remove-provider <provider>');
    process.exit(1);
  }
  const { node } = await openSession(args);
  if (!(await node.relationships.removeProvider(provider))) {
    console.error(`✗ Unknown provider ${provider}`);
    process.exit(1);
  }
  console.log(`✓ Removed ${provider}`);
}

// ── Transfers ────────────────────────────────────────────────

async function backup(args: string[]): Promise<void> {
  const provider = args[0];
  if (!provider) {
    console.error('Usage: peerbak backup <provider>');
    process.exit(1);
  }
  const { node } = await openSession(args);
  console.log(`⬆  Backing up to ${provider}...`);
  await followTransfer('Backup', node.backup.status, node.backup.startBackup(provider));
}

async function restore(args: string[]): Promise<void> {
  const provider = args[0];
  const snapshotId = args[1];
  if (!provider || !snapshotId) {
    console.error('Usage: peerbak restore <provider> <snapshot-id>');
    process.exit(1);
  }
  const { node } = await openSession(args);
  console.log(`⬇  Restoring ${snapshotId} from ${provider}...`);
  await followTransfer('Restore', node.restore.status, node.restore.startRestore(provider, snapshotId));
}

function printSnapshots(list: Snapshot[]): void {
  if (list.length === 0) {
    console.log('No snapshots.');
    return;
  }
  for (const s of list) {
    console.log(`  ${s.snapshotId}  ${s.status.padEnd(11)} ${String(s.totalFiles).padStart(6)} files  ${formatBytes(s.totalBytes)}`);
  }
}

async function snapshots(args: string[]): Promise<void> {
  const client = getFlag(args, '--client');
  const provider = client ? undefined : args[0];
  if (!client && !provider) {
    console.error('Usage: peerbak snapshots <provider> | peerbak snapshots --client <client>');
    process.exit(1);
  }
  const { node, transport } = await openSession(args);
  if (client) {
    printSnapshots(await node.relationships.getSnapshots(client));
    return;
  }

  const res = await transport.request(provider ?? '', { method: 'GET', path: backupPaths.snapshots(node.callsign) });
  const listed = SnapshotListSchema.safeParse(res.body);
  if (res.status !== 200 || !listed.success) {
    console.error(`✗ ${provider} answered ${res.status}`);
    process.exit(1);
  }
  printSnapshots(listed.data.snapshots);
}

const SnapshotListSchema = z.object({ snapshots: z.array(SnapshotSchema) });

async function deleteSnapshot(args: string[]): Promise<void> {
  const client = getFlag(args, '--client');
  const positional = args.filter((arg, i) => !arg.startsWith('--') && !args[i - 1]?.startsWith('--'));
  const [provider, snapshotId] = client ? [undefined, positional[0]] : positional;
  if (!snapshotId || (!client && !provider)) {
    console.error('Usage: peerbak delete-snapshot <provider> <snapshot-id> | delete-snapshot --client <client> <snapshot-id>');
    process.exit(1);
  }
  const { node } = await openSession(args);
  const deleted = client
    ? await node.relationships.deleteSnapshot(client, snapshotId)
    : await node.relationships.deleteRemoteSnapshot(provider ?? '', snapshotId);
  if (!deleted) {
    console.error(`✗ Snapshot ${snapshotId} was not deleted`);
    process.exit(1);
  }
  console.log(`✓ Deleted snapshot ${snapshotId}`);
}

async function discover(args: string[]): Promise<void> {
  const timeout = getNumber(args, '--timeout') ?? 10;
  const session = await openSession(args);
  const { node } = session;
  console.log(`🔍 Asking online peers for backups of ${node.callsign} (${timeout}s)...`);

  const result = await withListener(session, async () => {
    const id = node.discovery.startDiscovery(timeout);
    return node.discovery.whenComplete(id);
  });
  if (!result) return;

  console.log(`✓ ${result.devicesResponded}/${result.devicesQueried} peers answered`);
  for (const p of result.providersFound) {
    console.log(`  ${p.callsign.padEnd(12)} ${p.snapshotCount} snapshots  latest: ${p.latestSnapshotId ?? '-'}`);
    if (args.includes('--adopt')) {
      await node.relationships.adoptProvider(p);
      console.log(`    adopted as provider`);
    }
  }
}

// ── Server ───────────────────────────────────────────────────

async function serve(args: string[]): Promise<void> {
  const session = await openSession(args);
  if (!session.config.token) {
    console.error('Usage: peerbak serve [--data <dir>] [--port 7225] --token <secret>');
    process.exit(1);
  }
  const server = createPeerServer({ port: session.config.port, node: session.node, token: session.config.token });
  await server.listen();
}

// ── Main ─────────────────────────────────────────────────────

const [command, ...args] = process.argv.slice(2);

const commands: Record<string, (args: string[]) => Promise<void>> = {
  keygen, settings, serve,
  invite, accept, decline, clients, providers,
  'remove-client': removeClient, 'remove-provider': removeProvider,
  backup, restore, snapshots, 'delete-snapshot': deleteSnapshot, discover,
};

const run = command && Object.hasOwn(commands, command) ? commands[command] : undefined;

if (!run) {
  console.log(`peerbak: peer-to-peer encrypted backups

Setup:
  peerbak keygen --callsign <name>
  peerbak serve [--port 7225] [--token <secret>]
  peerbak settings [--enable|--disable] [--auto-accept on|off]

Relationships:
  peerbak invite <provider> [--interval <days>]
  peerbak accept <client> | decline <client>
  peerbak clients | providers
  peerbak remove-client <client> [--erase] | remove-provider <provider>

Transfers:
  peerbak backup <provider>
  peerbak restore <provider> <snapshot-id>
  peerbak snapshots <provider> | snapshots --client <client>
  peerbak delete-snapshot <provider> <snapshot-id> | delete-snapshot --client <client> <snapshot-id>
  peerbak discover [--timeout <seconds>] [--adopt]

All commands take --data <dir> (default: current directory).`);
  process.exit(command ? 1 : 0);
}

run(args).catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
