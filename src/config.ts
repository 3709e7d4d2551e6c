import { basename, isAbsolute, join } from 'node:path';
import { z } from 'zod';
import { BackupError } from './errors.js';
import { readFileOrNull, writeJson } from './fs-json.js';
import { Identity } from './identity.js';

export const CONFIG_FILE = 'peerbak.json';
export const DEFAULT_IDENTITY_FILE = 'identity.json';

/** 7225 = "PBAK" on a phone keypad. */
export const DEFAULT_PORT = 7225;

const PORT_MESSAGE = 'port must be an integer between 0 and 65535';
const PEER_MESSAGE = 'every peer needs a callsign and a url';
const EXCLUDE_MESSAGE = 'exclude must be a list of names';

function text(message: string) {
  return z.string({ error: message }).min(1, message);
}

/** `peerbak.json`. Absent fields take their defaults. */
export const ConfigSchema = z.object(
  {
    callsign: z.string().default(''),
    port: z
      .number({ error: PORT_MESSAGE })
      .int(PORT_MESSAGE)
      .min(0, PORT_MESSAGE)
      .max(65535, PORT_MESSAGE)
      .default(DEFAULT_PORT),
    token: z.string().default(''),
    /** Relative paths resolve against the data directory */
    identityFile: z.string().min(1).default(DEFAULT_IDENTITY_FILE),
    peers: z
      .array(
        z.object({ callsign: text(PEER_MESSAGE), url: text(PEER_MESSAGE) }, { error: PEER_MESSAGE }),
        { error: 'peers must be a list' },
      )
      .default([]),
    exclude: z
      .array(z.string({ error: EXCLUDE_MESSAGE }), { error: EXCLUDE_MESSAGE })
      .default([]),
  },
  { error: 'expected an object' },
);

export type PeerbakConfig = z.infer<typeof ConfigSchema>;

const IdentityFileSchema = z.object({
  callsign: z.string().min(1),
  secretKey: z.string().min(1),
});

export function defaultConfig(callsign = ''): PeerbakConfig {
  return { ...ConfigSchema.parse({}), callsign };
}

class ConfigError extends Error {
  constructor(path: string, detail: string) {
    super(`Invalid ${path}: ${detail}`);
    this.name = 'ConfigError';
  }
}

async function readJsonFile(path: string): Promise<unknown> {
  const data = await readFileOrNull(path);
  if (!data) return null;
  try {
    return JSON.parse(data.toString('utf8'));
  } catch {
    throw new ConfigError(path, 'not valid JSON');
  }
}

/**
 * Load `peerbak.json` from the data directory. A missing file gives the
 * defaults; present fields are type-checked.
 */
export async function loadConfig(dataDir: string): Promise<PeerbakConfig> {
  const path = join(dataDir, CONFIG_FILE);
  const raw = await readJsonFile(path);
  if (raw === null) return defaultConfig();

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = [...new Set(parsed.error.issues.map(issue => issue.message))];
    throw new ConfigError(path, details.join('; '));
  }
  return parsed.data;
}

export async function writeConfig(dataDir: string, config: PeerbakConfig): Promise<void> {
  await writeJson(join(dataDir, CONFIG_FILE), config);
}

export function identityPath(dataDir: string, config: PeerbakConfig): string {
  return isAbsolute(config.identityFile) ? config.identityFile : join(dataDir, config.identityFile);
}

/** Names that never leave the device: the config and the key file. */
export function backupExclusions(config: PeerbakConfig): string[] {
  return [...config.exclude, CONFIG_FILE, basename(config.identityFile)];
}

/** Identity file: `{ callsign, secretKey }`, the secret as 64 hex chars. */
export async function loadIdentity(path: string): Promise<Identity> {
  const raw = await readJsonFile(path);
  if (raw === null) {
    throw new BackupError('IdentityUnavailable', `No identity at ${path}; run "peerbak keygen" first`);
  }
  const parsed = IdentityFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BackupError('IdentityUnavailable', `${path} needs a callsign and a secretKey`);
  }
  return Identity.fromSecret(parsed.data.callsign, parsed.data.secretKey);
}

export async function writeIdentityFile(path: string, identity: Identity): Promise<void> {
  await writeJson(path, {
    callsign: identity.callsign,
    publicKey: identity.publicKey,
    secretKey: identity.secretKey,
  });
}
