import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'crypto';
import { DeviceError, errorMessage } from '../sync/errors';
import type { Credentials } from '../sync/types';

const DEFAULT_TIMEOUT_MS = 5000;
const SIGNATURE_LENGTH = 32;

function sha256(...parts: Buffer[]): Buffer {
  return createHash('sha256').update(Buffer.concat(parts)).digest();
}

function sha1(value: string): Buffer {
  return createHash('sha1').update(value, 'utf8').digest();
}

function int32be(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeInt32BE(value);
  return buffer;
}

/**
 * KLAP v2 auth hash: sha256(sha1(username) + sha1(password))
 */
export function klapAuthHash(credentials: Credentials): Buffer {
  return sha256(sha1(credentials.email), sha1(credentials.password));
}

export function handshake1ServerHash(localSeed: Buffer, remoteSeed: Buffer, authHash: Buffer): Buffer {
  return sha256(localSeed, remoteSeed, authHash);
}

export function handshake2Payload(localSeed: Buffer, remoteSeed: Buffer, authHash: Buffer): Buffer {
  return sha256(remoteSeed, localSeed, authHash);
}

/**
 * Session cipher derived from both handshake seeds.
 * Each request bumps a signed 32-bit sequence that forms the IV tail.
 */
export class KlapCipher {
  private readonly key: Buffer;
  private readonly ivPrefix: Buffer;
  private readonly signatureKey: Buffer;
  private seq: number;

  constructor(localSeed: Buffer, remoteSeed: Buffer, authHash: Buffer) {
    const material = Buffer.concat([localSeed, remoteSeed, authHash]);
    const iv = sha256(Buffer.from('iv'), material);

    this.key = sha256(Buffer.from('lsk'), material).subarray(0, 16);
    this.ivPrefix = iv.subarray(0, 12);
    this.seq = iv.readInt32BE(28);
    this.signatureKey = sha256(Buffer.from('ldk'), material).subarray(0, 28);
  }

  get sequence(): number {
    return this.seq;
  }

  encrypt(plaintext: string): { body: Buffer; seq: number } {
    this.seq = (this.seq + 1) | 0;
    const seqBytes = int32be(this.seq);

    const cipher = createCipheriv('aes-128-cbc', this.key, this.ivFor(this.seq));
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const signature = sha256(this.signatureKey, seqBytes, ciphertext);

    return { body: Buffer.concat([signature, ciphertext]), seq: this.seq };
  }

  decrypt(body: Buffer, seq: number): string {
    const decipher = createDecipheriv('aes-128-cbc', this.key, this.ivFor(seq));
    const plaintext = Buffer.concat([decipher.update(body.subarray(SIGNATURE_LENGTH)), decipher.final()]);
    return plaintext.toString('utf8');
  }

  private ivFor(seq: number): Buffer {
    return Buffer.concat([this.ivPrefix, int32be(seq)]);
  }
}

export interface KlapSessionOptions {
  host: string;
  credentials: Credentials;
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseSessionCookie(header: unknown): string | null {
  const values = Array.isArray(header) ? header : [header];
  for (const value of values) {
    if (typeof value !== 'string') {
      continue;
    }
    const match = value.match(/TP_SESSIONID=([^;]+)/);
    if (match) {
      return `TP_SESSIONID=${match[1]}`;
    }
  }
  return null;
}

/**
 * Local KLAP transport to a Tapo device: two-step handshake, then
 * AES-encrypted JSON requests against /app/request.
 */
export class TapoKlapSession {
  private readonly client: AxiosInstance;
  private readonly host: string;
  private readonly credentials: Credentials;
  private cipher: KlapCipher | null = null;
  private cookie: string | null = null;

  constructor(options: KlapSessionOptions) {
    this.host = options.host;
    this.credentials = options.credentials;
    this.client = axios.create({
      baseURL: `http://${options.host}/app`,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      responseType: 'arraybuffer',
      // Devices live on the LAN; never route them through an HTTP proxy
      proxy: false,
      headers: {
        'Content-Type': 'application/octet-stream',
      },
    });
  }

  async handshake(): Promise<void> {
    this.cipher = null;
    this.cookie = null;

    const localSeed = randomBytes(16);
    const authHash = klapAuthHash(this.credentials);

    const first = await this.post('/handshake1', localSeed);
    const body = Buffer.from(first.data);
    if (body.length < 48) {
      throw new DeviceError(`Unexpected handshake response from ${this.host} (${body.length} bytes)`);
    }

    const remoteSeed = body.subarray(0, 16);
    const serverHash = body.subarray(16, 48);
    this.cookie = parseSessionCookie(first.headers['set-cookie']);

    if (!serverHash.equals(handshake1ServerHash(localSeed, remoteSeed, authHash))) {
      throw new DeviceError(`Device ${this.host} rejected the credentials`);
    }

    await this.post('/handshake2', handshake2Payload(localSeed, remoteSeed, authHash));
    this.cipher = new KlapCipher(localSeed, remoteSeed, authHash);
  }

  /**
   * Send a method call and return its `result` field.
   */
  async request(method: string, params?: Record<string, unknown>): Promise<unknown> {
    if (!this.cipher) {
      await this.handshake();
    }

    try {
      return await this.send(method, params);
    } catch (error) {
      if (!this.isSessionExpired(error)) {
        throw this.toDeviceError(error);
      }
      console.log(`[Tapo] Session with ${this.host} expired, repeating handshake`);
      await this.handshake();
      try {
        return await this.send(method, params);
      } catch (retryError) {
        throw this.toDeviceError(retryError);
      }
    }
  }

  private async send(method: string, params?: Record<string, unknown>): Promise<unknown> {
    const cipher = this.cipher;
    if (!cipher) {
      throw new DeviceError('Device not connected.');
    }

    const payload = JSON.stringify({ method, params, requestTimeMils: Date.now() });
    const { body, seq } = cipher.encrypt(payload);

    const response = await this.post('/request', body, { seq });
    const decoded: unknown = JSON.parse(cipher.decrypt(Buffer.from(response.data), seq));

    if (!isRecord(decoded)) {
      throw new DeviceError(`Malformed response to ${method}`);
    }
    const errorCode = typeof decoded.error_code === 'number' ? decoded.error_code : 0;
    if (errorCode !== 0) {
      throw new DeviceError(`${method} failed with error code ${errorCode}`, errorCode);
    }
    return decoded.result;
  }

  private async post(
    path: string,
    body: Buffer,
    params?: Record<string, number>
  ): Promise<AxiosResponse<ArrayBuffer>> {
    try {
      return await this.client.post<ArrayBuffer>(path, body, {
        params,
        headers: this.cookie ? { Cookie: this.cookie } : undefined,
      });
    } catch (error) {
      if (path === '/request') {
        throw error;
      }
      throw this.toDeviceError(error);
    }
  }

  private isSessionExpired(error: unknown): boolean {
    if (!axios.isAxiosError(error)) {
      return false;
    }
    const status = error.response?.status;
    return status === 401 || status === 403;
  }

  private toDeviceError(error: unknown): DeviceError {
    if (error instanceof DeviceError) {
      return error;
    }
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      return new DeviceError(
        status
          ? `Device ${this.host} responded with HTTP ${status}`
          : `Device ${this.host} is unreachable: ${error.message}`
      );
    }
    return new DeviceError(`Device ${this.host} request failed: ${errorMessage(error)}`);
  }
}
