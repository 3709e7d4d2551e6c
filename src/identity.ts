import {
  createCipheriv,
  createDecipheriv,
  createHash,
  createPrivateKey,
  createPublicKey,
  diffieHellman,
  generateKeyPairSync,
  hkdfSync,
  randomBytes,
  sign,
  verify,
  type KeyObject,
} from 'node:crypto';
import { BackupError, errorMessage } from './errors.js';
import { eventId, unixSeconds, TEXT_NOTE_KIND, type EventTemplate, type SignedEvent } from './event.js';
import { normalizeCallsign } from './models.js';

// DER wrappers around raw 32-byte keys
const ED25519_PKCS8_PREFIX = Buffer.from('302e020100300506032b657004220420', 'hex');
const X25519_PKCS8_PREFIX = Buffer.from('302e020100300506032b656e04220420', 'hex');
const ED25519_SPKI_PREFIX = Buffer.from('302a300506032b6570032100', 'hex');
const X25519_SPKI_PREFIX = Buffer.from('302a300506032b656e032100', 'hex');

const KEY_BYTES = 32;
const NONCE_BYTES = 12;
const TAG_BYTES = 16;
const FILE_KEY_INFO = 'peerbak-backup-file';
const MANIFEST_KEY_CONTEXT = 'peerbak-backup-manifest';
const AGREEMENT_KEY_INFO = 'peerbak-x25519';

function rawPublicKey(key: KeyObject): Buffer {
  const der = key.export({ format: 'der', type: 'spki' });
  return der.subarray(der.length - KEY_BYTES);
}

function importPublicKey(prefix: Buffer, hex: string): KeyObject {
  const raw = Buffer.from(hex, 'hex');
  if (raw.length !== KEY_BYTES) throw new Error('public key must be 32 bytes');
  return createPublicKey({ key: Buffer.concat([prefix, raw]), format: 'der', type: 'spki' });
}

function importPrivateKey(prefix: Buffer, raw: Buffer): KeyObject {
  return createPrivateKey({ key: Buffer.concat([prefix, raw]), format: 'der', type: 'pkcs8' });
}

function hkdf(secret: Buffer, info: string): Buffer {
  return Buffer.from(hkdfSync('sha256', secret, Buffer.alloc(KEY_BYTES), info, KEY_BYTES));
}

function aeadSeal(key: Buffer, plaintext: Buffer): Buffer {
  const nonce = randomBytes(NONCE_BYTES);
  const cipher = createCipheriv('aes-256-gcm', key, nonce);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]);
}

function aeadOpen(key: Buffer, sealed: Buffer): Buffer {
  if (sealed.length < NONCE_BYTES + TAG_BYTES) {
    throw new BackupError('DecryptFailed', 'ciphertext too short');
  }
  const nonce = sealed.subarray(0, NONCE_BYTES);
  const tag = sealed.subarray(sealed.length - TAG_BYTES);
  const ciphertext = sealed.subarray(NONCE_BYTES, sealed.length - TAG_BYTES);
  try {
    const decipher = createDecipheriv('aes-256-gcm', key, nonce);
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (err) {
    throw new BackupError('DecryptFailed', `decryption failed: ${errorMessage(err)}`);
  }
}

/**
 * Seal bytes to an X25519 public key.
 * Layout: ephemeral public key (32) || nonce (12) || ciphertext || tag (16).
 */
export function sealTo(recipientKeyHex: string, plaintext: Buffer): Buffer {
  const recipient = importPublicKey(X25519_SPKI_PREFIX, recipientKeyHex);
  const ephemeral = generateKeyPairSync('x25519');
  const shared = diffieHellman({ privateKey: ephemeral.privateKey, publicKey: recipient });
  const sealed = aeadSeal(hkdf(shared, FILE_KEY_INFO), plaintext);
  return Buffer.concat([rawPublicKey(ephemeral.publicKey), sealed]);
}

/** Checks the id against the event body and the signature against its pubkey. */
export function verifyEvent(event: SignedEvent): boolean {
  if (eventId(event) !== event.id) return false;
  if (!/^[0-9a-f]{128}$/.test(event.sig)) return false;
  try {
    const key = importPublicKey(ED25519_SPKI_PREFIX, event.pubkey);
    return verify(null, Buffer.from(event.id, 'hex'), key, Buffer.from(event.sig, 'hex'));
  } catch {
    return false;
  }
}

interface IdentityKeys {
  seed: Buffer;
  signing: KeyObject;
  agreement: KeyObject;
  agreementPublicKey: string;
}

/**
 * A device identity: an Ed25519 signing key and an X25519 agreement key,
 * both derived from one 32-byte secret seed. The public key (hex Ed25519)
 * is what other peers know the identity by.
 *
 * An identity built from a public key alone can be addressed and verified
 * against, but every operation needing the secret fails with
 * `IdentityUnavailable`.
 */
export class Identity {
  readonly callsign: string;
  readonly publicKey: string;
  private readonly keys: IdentityKeys | null;

  private constructor(callsign: string, publicKey: string, seed: Buffer | null) {
    this.callsign = normalizeCallsign(callsign);
    this.publicKey = publicKey;
    if (seed) {
      const agreement = importPrivateKey(X25519_PKCS8_PREFIX, hkdf(seed, AGREEMENT_KEY_INFO));
      this.keys = {
        seed,
        signing: importPrivateKey(ED25519_PKCS8_PREFIX, seed),
        agreement,
        agreementPublicKey: rawPublicKey(createPublicKey(agreement)).toString('hex'),
      };
    } else {
      this.keys = null;
    }
  }

  static generate(callsign: string): Identity {
    return Identity.fromSecret(callsign, randomBytes(KEY_BYTES).toString('hex'));
  }

  static fromSecret(callsign: string, secretKeyHex: string): Identity {
    const seed = Buffer.from(secretKeyHex, 'hex');
    if (seed.length !== KEY_BYTES) {
      throw new BackupError('IdentityUnavailable', 'secret key must be 32 bytes of hex');
    }
    const signing = importPrivateKey(ED25519_PKCS8_PREFIX, seed);
    const publicKey = rawPublicKey(createPublicKey(signing)).toString('hex');
    return new Identity(callsign, publicKey, seed);
  }

  static fromPublicKey(callsign: string, publicKeyHex: string): Identity {
    return new Identity(callsign, publicKeyHex, null);
  }

  get canSign(): boolean {
    return this.keys !== null;
  }

  get secretKey(): string {
    return this.requireKeys().seed.toString('hex');
  }

  /** X25519 key that files are sealed to. */
  get encryptionKey(): string {
    return this.requireKeys().agreementPublicKey;
  }

  sign(template: EventTemplate, now: Date = new Date()): SignedEvent {
    const keys = this.requireKeys();
    const unsigned = {
      pubkey: this.publicKey,
      created_at: unixSeconds(now),
      kind: template.kind ?? TEXT_NOTE_KIND,
      tags: template.tags,
      content: template.content,
    };
    const id = eventId(unsigned);
    const sig = sign(null, Buffer.from(id, 'hex'), keys.signing).toString('hex');
    return { ...unsigned, id, sig };
  }

  /** Seal file bytes so only this identity can open them. */
  sealFile(plaintext: Buffer): Buffer {
    return sealTo(this.encryptionKey, plaintext);
  }

  openFile(sealed: Buffer): Buffer {
    const keys = this.requireKeys();
    if (sealed.length < KEY_BYTES + NONCE_BYTES + TAG_BYTES) {
      throw new BackupError('DecryptFailed', 'sealed file too short');
    }
    let shared: Buffer;
    try {
      const ephemeral = importPublicKey(X25519_SPKI_PREFIX, sealed.subarray(0, KEY_BYTES).toString('hex'));
      shared = diffieHellman({ privateKey: keys.agreement, publicKey: ephemeral });
    } catch (err) {
      throw new BackupError('DecryptFailed', `invalid ephemeral key: ${errorMessage(err)}`);
    }
    return aeadOpen(hkdf(shared, FILE_KEY_INFO), sealed.subarray(KEY_BYTES));
  }

  /** Manifest key is SHA-256 over a fixed context and the secret seed. */
  encryptManifest(json: string): Buffer {
    return aeadSeal(this.manifestKey(), Buffer.from(json, 'utf8'));
  }

  decryptManifest(data: Buffer): string {
    return aeadOpen(this.manifestKey(), data).toString('utf8');
  }

  private manifestKey(): Buffer {
    const { seed } = this.requireKeys();
    return createHash('sha256').update(MANIFEST_KEY_CONTEXT).update(seed).digest();
  }

  private requireKeys(): IdentityKeys {
    if (!this.keys) {
      throw new BackupError('IdentityUnavailable', `no secret key available for ${this.callsign}`);
    }
    return this.keys;
  }
}
