import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { Identity } from '../../src/identity.js';
import type { Logger } from '../../src/log.js';
import { BackupNode } from '../../src/node.js';
import type { MemoryNetwork } from './memory-network.js';

/** 2026-02-02 10:00 local time; snapshot id "2026-02-02". */
export const FIXED_NOW = new Date(2026, 1, 2, 10, 0, 0);
export const SNAPSHOT_ID = '2026-02-02';

export interface RecordingLogger extends Logger {
  infos: string[];
  warnings: string[];
  errors: string[];
}

export function recordingLogger(): RecordingLogger {
  const infos: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    infos,
    warnings,
    errors,
    info: (message: string) => {
      infos.push(message);
    },
    warn: (message: string) => {
      warnings.push(message);
    },
    error: (message: string) => {
      errors.push(message);
    },
  };
}

export async function makeTmpRoot(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `peerbak-${prefix}-`));
}

export async function removeTmpRoot(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const full = join(root, ...relativePath.split('/'));
    await mkdir(dirname(full), { recursive: true });
    await writeFile(full, content);
  }
}

export interface TestNodeOptions {
  identity?: Identity;
  contacts?: string[];
  dataDir?: string;
  inviteTimeoutMs?: number;
  clock?: () => Date;
  logger?: Logger;
}

export interface TestNode {
  node: BackupNode;
  identity: Identity;
  dataDir: string;
  logger: RecordingLogger;
}

/** A node with its own data directory under `root`, attached to the network. */
export async function makeNode(
  network: MemoryNetwork,
  root: string,
  callsign: string,
  opts: TestNodeOptions = {},
): Promise<TestNode> {
  const identity = opts.identity ?? Identity.generate(callsign);
  const dataDir = opts.dataDir ?? join(root, callsign.toLowerCase());
  await mkdir(dataDir, { recursive: true });
  const logger = recordingLogger();
  const node = await BackupNode.open({
    dataDir,
    identity,
    transport: network.peer(identity.callsign, opts.contacts),
    directory: network.peer(identity.callsign, opts.contacts),
    inviteTimeoutMs: opts.inviteTimeoutMs ?? 200,
    clock: opts.clock ?? (() => FIXED_NOW),
    logger: opts.logger ?? logger,
  });
  network.attach(node);
  return { node, identity, dataDir, logger };
}
