import { createCipheriv, createDecipheriv, randomBytes } from "crypto";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { DecryptFailureError, KeyMissingError } from "./errors";

const ALGORITHM = "aes-256-gcm";
const IV_LENGTH = 12;
const KEY_LENGTH = 32;
const AUTH_TAG_LENGTH = 16;
const HEX_PATTERN = /^(?:[0-9a-f]{2})*$/;

export const ENCRYPTED_MARKER = "enc:";

export type SecretProbe = {
  /** Marked values present in the input. */
  encrypted: number;
  /** Marked values that could not be decrypted with the current key. */
  unreadable: number;
  keyMissing: boolean;
};

export class SecretStore {
  private cachedKey: Buffer | null = null;

  constructor(readonly keyPath: string) {}

  isEncrypted(value: string): boolean {
    return value.startsWith(ENCRYPTED_MARKER);
  }

  hasKey(): boolean {
    return this.cachedKey !== null || existsSync(this.keyPath);
  }

  encrypt(plaintext: string): string {
    const key = this.getOrCreateKey();
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, key, iv, {
      authTagLength: AUTH_TAG_LENGTH,
    });
    const encrypted = Buffer.concat([
      cipher.update(plaintext, "utf8"),
      cipher.final(),
    ]);
    const authTag = cipher.getAuthTag();

    return `${ENCRYPTED_MARKER}${iv.toString("hex")}:${authTag.toString("hex")}:${encrypted.toString("hex")}`;
  }

  decrypt(ciphertext: string): string {
    if (!this.isEncrypted(ciphertext)) {
      throw new DecryptFailureError("Value does not carry the encrypted marker");
    }

    const parts = ciphertext.slice(ENCRYPTED_MARKER.length).split(":");
    if (parts.length !== 3 || !parts.every((part) => HEX_PATTERN.test(part))) {
      throw new DecryptFailureError("Encrypted value is malformed");
    }
    const [ivHex, authTagHex, dataHex] = parts;
    const iv = Buffer.from(ivHex, "hex");
    const authTag = Buffer.from(authTagHex, "hex");
    if (iv.length !== IV_LENGTH || authTag.length !== AUTH_TAG_LENGTH) {
      throw new DecryptFailureError("Encrypted value is malformed");
    }

    const key = this.readKey();
    try {
      const decipher = createDecipheriv(ALGORITHM, key, iv, {
        authTagLength: AUTH_TAG_LENGTH,
      });
      decipher.setAuthTag(authTag);
      return Buffer.concat([
        decipher.update(Buffer.from(dataHex, "hex")),
        decipher.final(),
      ]).toString("utf8");
    } catch {
      throw new DecryptFailureError(
        "Encrypted value failed its integrity check (wrong key or corrupted data)"
      );
    }
  }

  /**
   * Form written to durable config: empty and already-marked values are
   * kept as they are.
   */
  seal(value: string): string {
    if (!value || this.isEncrypted(value)) {
      return value;
    }
    return this.encrypt(value);
  }

  /**
   * Legacy unmarked values pass through as plaintext; marked values are
   * decrypted and fail loudly.
   */
  reveal(stored: string): string {
    return this.isEncrypted(stored) ? this.decrypt(stored) : stored;
  }

  probe(values: Array<string | undefined>): SecretProbe {
    const marked = values.filter(
      (value): value is string => typeof value === "string" && this.isEncrypted(value)
    );
    const keyMissing = !this.hasKey();
    let unreadable = 0;
    for (const value of marked) {
      try {
        this.decrypt(value);
      } catch {
        unreadable += 1;
      }
    }
    if (keyMissing) {
      console.warn(
        `[secrets] key file ${this.keyPath} not found; ${marked.length} encrypted secret(s) unreadable (degraded security)`
      );
    } else if (unreadable > 0) {
      console.warn(`[secrets] ${unreadable} stored secret(s) cannot be decrypted with ${this.keyPath}`);
    }
    return { encrypted: marked.length, unreadable, keyMissing };
  }

  private readKey(): Buffer {
    if (this.cachedKey) {
      return this.cachedKey;
    }
    if (!existsSync(this.keyPath)) {
      throw new KeyMissingError(this.keyPath);
    }
    const key = readFileSync(this.keyPath);
    if (key.length !== KEY_LENGTH) {
      throw new DecryptFailureError(`Invalid encryption key file: ${this.keyPath}`);
    }
    this.cachedKey = key;
    return key;
  }

  private getOrCreateKey(): Buffer {
    if (this.cachedKey || existsSync(this.keyPath)) {
      return this.readKey();
    }
    mkdirSync(dirname(this.keyPath), { recursive: true });
    const key = randomBytes(KEY_LENGTH);
    writeFileSync(this.keyPath, key, { mode: 0o600 });
    console.log(`[secrets] generated new encryption key at ${this.keyPath}`);
    this.cachedKey = key;
    return key;
  }
}
