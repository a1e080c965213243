import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';
import { sha256 } from 'js-sha256';
import { CREDENTIAL_REFERENCE_PREFIX, TOKEN_LIMITS, TOKEN_STORAGE_KEYS } from '../../shared/constants';
import { describeError } from '../../shared/security';
import type { KeyValueStore } from './KeyValueStore';

const ALGORITHM = 'aes-256-gcm';
const PAYLOAD_VERSION = 'v1';
const KEY_BYTES = 32;
const IV_BYTES = 12;
const REFERENCE_HEX_LENGTH = 12;

// C0 controls, DEL, C1 controls and Unicode format characters (zero-width, bidi overrides)
const CONTROL_CHARS = /[\u0000-\u001F\u007F-\u009F]|\p{Cf}/gu;
const MARKUP_CHARS = /[<>"']/g;
const WHITESPACE = /\s+/g;

export interface TokenStorageInfo {
  hasToken: boolean;
  isValid: boolean;
  hasEncryptionKey: boolean;
  reference: string | null;
  algorithm: typeof ALGORITHM;
  timestamp: string;
}

/**
 * Opaque handle to a stored token. Carries only the reference; the token itself
 * never appears in string or JSON form.
 */
export class SecureCredential {
  constructor(
    public readonly reference: string,
    public readonly isValid: boolean,
    public readonly lastValidated: number
  ) {}

  toString(): string {
    return `SecureCredential(${this.reference})`;
  }

  toJSON(): { reference: string; isValid: boolean; lastValidated: number } {
    return { reference: this.reference, isValid: this.isValid, lastValidated: this.lastValidated };
  }
}

export function isValidTokenFormat(token: string): boolean {
  return (
    token.length >= TOKEN_LIMITS.MIN_LENGTH &&
    token.length <= TOKEN_LIMITS.MAX_LENGTH &&
    TOKEN_LIMITS.FORMAT.test(token)
  );
}

export function credentialReference(payload: string): string {
  return `${CREDENTIAL_REFERENCE_PREFIX}${sha256(payload).slice(0, REFERENCE_HEX_LENGTH)}`;
}

/**
 * Stores the repository access token encrypted at rest.
 *
 * The token is AES-256-GCM encrypted with a random key kept under a separate storage key.
 * Payload format: `v1:<iv>:<tag>:<ciphertext>`, each part base64.
 * Reads never throw: missing, corrupt or undecryptable data reads as absent.
 */
export class SecureTokenStore {
  // Writes run one at a time so a token is never paired with another call's key
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly storage: KeyValueStore) {}

  /**
   * Clean raw user input. Returns '' when the result is not a plausible token.
   */
  public sanitize(raw: string): string {
    if (!raw) return '';
    const cleaned = raw
      .trim()
      .replace(CONTROL_CHARS, '')
      .replace(MARKUP_CHARS, '')
      .replace(WHITESPACE, '');
    return isValidTokenFormat(cleaned) ? cleaned : '';
  }

  public async store(raw: string): Promise<boolean> {
    return (await this.storePayload(raw)) !== null;
  }

  /**
   * Store a token and hand back a credential that references it.
   */
  public async storeCredential(raw: string): Promise<SecureCredential | null> {
    const payload = await this.storePayload(raw);
    if (payload === null) return null;
    return new SecureCredential(credentialReference(payload), true, Date.now());
  }

  public async retrieve(): Promise<string | null> {
    try {
      const payload = await this.storage.read(TOKEN_STORAGE_KEYS.TOKEN);
      if (!payload) return null;

      const key = await this.readKey();
      const token = key ? this.decrypt(payload, key) : null;
      if (token) return token;

      // Tokens written before encryption was introduced are stored as-is
      if (isValidTokenFormat(payload)) {
        return payload;
      }
      console.warn('[SecureTokenStore] Stored token could not be decrypted');
      return null;
    } catch (err) {
      console.warn(`[SecureTokenStore] Failed to read token: ${describeError(err)}`);
      return null;
    }
  }

  public remove(): Promise<boolean> {
    return this.serialize(async () => {
      try {
        await this.storage.delete(TOKEN_STORAGE_KEYS.TOKEN);
        console.debug('[SecureTokenStore] Token removed');
        return true;
      } catch (err) {
        console.warn(`[SecureTokenStore] Failed to remove token: ${describeError(err)}`);
        return false;
      }
    });
  }

  public async exists(): Promise<boolean> {
    try {
      const payload = await this.storage.read(TOKEN_STORAGE_KEYS.TOKEN);
      return !!payload;
    } catch (err) {
      console.warn(`[SecureTokenStore] Failed to check token: ${describeError(err)}`);
      return false;
    }
  }

  // True when a token is stored and decrypts
  public async validate(): Promise<boolean> {
    const token = await this.retrieve();
    return token !== null && token.length > 0;
  }

  /**
   * Remove the token and its encryption key.
   */
  public clearAll(): Promise<void> {
    return this.serialize(async () => {
      try {
        await this.storage.delete(TOKEN_STORAGE_KEYS.TOKEN);
        await this.storage.delete(TOKEN_STORAGE_KEYS.ENCRYPTION_KEY);
        console.debug('[SecureTokenStore] All secure data cleared');
      } catch (err) {
        console.error(`[SecureTokenStore] Failed to clear secure data: ${describeError(err)}`);
      }
    });
  }

  public async getStorageInfo(): Promise<TokenStorageInfo> {
    let payload: string | null = null;
    let hasEncryptionKey = false;
    try {
      payload = await this.storage.read(TOKEN_STORAGE_KEYS.TOKEN);
      hasEncryptionKey = !!(await this.storage.read(TOKEN_STORAGE_KEYS.ENCRYPTION_KEY));
    } catch (err) {
      console.warn(`[SecureTokenStore] Failed to inspect storage: ${describeError(err)}`);
    }
    const hasToken = !!payload;
    return {
      hasToken,
      isValid: hasToken ? await this.validate() : false,
      hasEncryptionKey,
      reference: payload ? credentialReference(payload) : null,
      algorithm: ALGORITHM,
      timestamp: new Date().toISOString(),
    };
  }

  // Internal

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const next = this.queue.then(task);
    this.queue = next.catch((err: unknown) => {
      console.error(`[SecureTokenStore] Queued operation failed: ${describeError(err)}`);
    });
    return next;
  }

  private async storePayload(raw: string): Promise<string | null> {
    const token = this.sanitize(raw);
    if (!token) {
      console.warn('[SecureTokenStore] Refusing to store an empty or malformed token');
      return null;
    }
    return this.serialize(async () => {
      try {
        const key = await this.getOrCreateKey();
        const payload = this.encrypt(token, key);
        await this.storage.write(TOKEN_STORAGE_KEYS.TOKEN, payload);
        console.debug('[SecureTokenStore] Token stored');
        return payload;
      } catch (err) {
        console.error(`[SecureTokenStore] Failed to store token: ${describeError(err)}`);
        return null;
      }
    });
  }

  private async readKey(): Promise<Buffer | null> {
    const encoded = await this.storage.read(TOKEN_STORAGE_KEYS.ENCRYPTION_KEY);
    if (!encoded) return null;
    const key = Buffer.from(encoded, 'base64');
    return key.length === KEY_BYTES ? key : null;
  }

  private async getOrCreateKey(): Promise<Buffer> {
    const existing = await this.readKey();
    if (existing) return existing;

    const key = randomBytes(KEY_BYTES);
    await this.storage.write(TOKEN_STORAGE_KEYS.ENCRYPTION_KEY, key.toString('base64'));
    console.debug('[SecureTokenStore] New encryption key generated');
    return key;
  }

  private encrypt(token: string, key: Buffer): string {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv(ALGORITHM, key, iv);
    const ciphertext = Buffer.concat([cipher.update(token, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();
    return [PAYLOAD_VERSION, iv, tag, ciphertext].map((p) => (typeof p === 'string' ? p : p.toString('base64'))).join(':');
  }

  // Null when the payload is malformed or fails authentication
  private decrypt(payload: string, key: Buffer): string | null {
    const parts = payload.split(':');
    if (parts.length !== 4 || parts[0] !== PAYLOAD_VERSION) return null;
    const [, ivB64, tagB64, ctB64] = parts;
    try {
      const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(ivB64, 'base64'));
      decipher.setAuthTag(Buffer.from(tagB64, 'base64'));
      const plain = Buffer.concat([decipher.update(Buffer.from(ctB64, 'base64')), decipher.final()]);
      return plain.toString('utf8');
    } catch (err) {
      console.warn(`[SecureTokenStore] Decryption failed: ${describeError(err)}`);
      return null;
    }
  }
}

export default SecureTokenStore;
