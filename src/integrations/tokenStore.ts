import fs from 'fs';
import crypto from 'crypto';
import { z } from 'zod';
import { BrokerRequestError } from '../core/errors';
import { isRecord } from '../core/utils';

/**
 * Supplies the brokerage bearer token. Obtaining and refreshing tokens is done
 * by a separate login tool; this side only reads what it left behind.
 */
export interface TokenProvider {
  getAccessToken(): Promise<string>;
}

export class StaticTokenProvider implements TokenProvider {
  constructor(private readonly token: string) {}

  async getAccessToken(): Promise<string> {
    return this.token;
  }
}

const storedTokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  expires_at: z.string().optional()
});

export type StoredToken = z.infer<typeof storedTokenSchema>;

const encryptedPayloadSchema = z.object({
  iv: z.string(),
  tag: z.string(),
  data: z.string()
});

const deriveKey = (secret: string) => crypto.createHash('sha256').update(secret).digest();

const decryptTokenPayload = (payload: z.infer<typeof encryptedPayloadSchema>, secret: string): string => {
  const key = deriveKey(secret);
  const decipher = crypto.createDecipheriv('aes-256-gcm', key, Buffer.from(payload.iv, 'base64'));
  decipher.setAuthTag(Buffer.from(payload.tag, 'base64'));
  const dec = Buffer.concat([decipher.update(Buffer.from(payload.data, 'base64')), decipher.final()]);
  return dec.toString('utf8');
};

export class FileTokenProvider implements TokenProvider {
  constructor(private readonly storePath: string, private readonly encryptionKey?: string) {}

  private loadStore(): unknown {
    if (!fs.existsSync(this.storePath)) {
      throw new BrokerRequestError('Token store not found; log in to the brokerage first', {
        tokenStore: this.storePath
      });
    }
    const raw: unknown = JSON.parse(fs.readFileSync(this.storePath, 'utf-8'));
    const encrypted = encryptedPayloadSchema.safeParse(raw);
    if (encrypted.success) {
      if (!this.encryptionKey) {
        throw new BrokerRequestError('Encrypted token store present but no TOKEN_STORE_ENCRYPTION_KEY set', {
          tokenStore: this.storePath
        });
      }
      return JSON.parse(decryptTokenPayload(encrypted.data, this.encryptionKey));
    }
    return raw;
  }

  async getAccessToken(): Promise<string> {
    const store = this.loadStore();
    const parsed = storedTokenSchema.safeParse(store);
    if (!parsed.success) {
      const keys = isRecord(store) ? Object.keys(store).join(',') : typeof store;
      throw new BrokerRequestError('Token store has no access_token', { tokenStore: this.storePath, keys });
    }
    const { access_token: token, expires_at: expiresAt } = parsed.data;
    if (expiresAt && Date.parse(expiresAt) <= Date.now()) {
      console.warn(`Brokerage access token in ${this.storePath} expired at ${expiresAt}; requests may be rejected.`);
    }
    return token;
  }
}
