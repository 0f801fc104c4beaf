import { createCipheriv, createDecipheriv, createHash, randomBytes, timingSafeEqual } from 'node:crypto';
import { isRecord } from '../../sdk/values.js';

const BLOCK_SIZE = 32;

export interface EncryptedReply {
  encrypt: string;
  msgsignature: string;
  timestamp: string;
  nonce: string;
}

function pad(data: Buffer): Buffer {
  const amount = BLOCK_SIZE - (data.length % BLOCK_SIZE);
  return Buffer.concat([data, Buffer.alloc(amount, amount)]);
}

function unpad(data: Buffer): Buffer {
  const amount = data[data.length - 1];
  if (amount === undefined || amount < 1 || amount > BLOCK_SIZE) {
    throw new Error('Invalid padding');
  }
  return data.subarray(0, data.length - amount);
}

/**
 * AES-256-CBC and SHA1 signing for WeCom callback messages.
 *
 * Plaintext layout is 16 random bytes, a 4-byte big-endian length, the
 * message, then the receive id. Padding is PKCS#7 over 32-byte blocks, so
 * Node's own padding stays off.
 */
export class WeComCryptor {
  private readonly key: Buffer;
  private readonly iv: Buffer;

  constructor(
    private readonly token: string,
    encodingAesKey: string,
    private readonly receiveId: string
  ) {
    const key = Buffer.from(`${encodingAesKey}=`, 'base64');
    if (key.length !== 32) {
      throw new Error('EncodingAESKey must decode to 32 bytes');
    }
    this.key = key;
    this.iv = key.subarray(0, 16);
  }

  signature(timestamp: string, nonce: string, ciphertext: string): string {
    const parts = [this.token, timestamp, nonce, ciphertext].sort();
    return createHash('sha1').update(parts.join('')).digest('hex');
  }

  verifySignature(signature: string, timestamp: string, nonce: string, ciphertext: string): void {
    const expected = Buffer.from(this.signature(timestamp, nonce, ciphertext));
    const received = Buffer.from(signature);
    if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
      throw new Error('Invalid msg_signature');
    }
  }

  decrypt(signature: string, timestamp: string, nonce: string, ciphertext: string): Record<string, unknown> {
    this.verifySignature(signature, timestamp, nonce, ciphertext);
    const { message, receiveId } = this.open(ciphertext);
    if (receiveId !== this.receiveId) {
      throw new Error('ReceiveId mismatch');
    }
    const parsed: unknown = JSON.parse(message);
    if (!isRecord(parsed)) {
      throw new Error('Decrypted message is not a JSON object');
    }
    return parsed;
  }

  decryptEcho(signature: string, timestamp: string, nonce: string, echostr: string): string {
    this.verifySignature(signature, timestamp, nonce, echostr);
    return this.open(echostr).message;
  }

  encrypt(message: string, random: Buffer = randomBytes(16)): string {
    const body = Buffer.from(message, 'utf8');
    const length = Buffer.alloc(4);
    length.writeUInt32BE(body.length, 0);
    const plain = pad(Buffer.concat([random, length, body, Buffer.from(this.receiveId, 'utf8')]));

    const cipher = createCipheriv('aes-256-cbc', this.key, this.iv);
    cipher.setAutoPadding(false);
    return Buffer.concat([cipher.update(plain), cipher.final()]).toString('base64');
  }

  encryptReply(message: string, timestamp: string, nonce: string): EncryptedReply {
    const encrypt = this.encrypt(message);
    return { encrypt, msgsignature: this.signature(timestamp, nonce, encrypt), timestamp, nonce };
  }

  private open(ciphertext: string): { message: string; receiveId: string } {
    const decipher = createDecipheriv('aes-256-cbc', this.key, this.iv);
    decipher.setAutoPadding(false);
    const plain = unpad(Buffer.concat([decipher.update(Buffer.from(ciphertext, 'base64')), decipher.final()]));

    const content = plain.subarray(16);
    if (content.length < 4) {
      throw new Error('Decrypted message is truncated');
    }
    const length = content.readUInt32BE(0);
    return {
      message: content.subarray(4, 4 + length).toString('utf8'),
      receiveId: content.subarray(4 + length).toString('utf8'),
    };
  }
}
