import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

import { decodeError, type DecodeError, errorMessage } from '@lib/errors';
import { isPayload, type SensorPayload } from '@lib/readings';
import { err, ok, type Result } from '@lib/result';

export type Envelope = {
  iv: Buffer;
  ciphertext: Buffer;
};

export type CipherCodec = {
  decode: (envelopeB64: string) => Result<SensorPayload, DecodeError>;
};

const ALGORITHM = 'aes-256-cbc';
const KEY_LENGTH = 32;
const BLOCK_SIZE = 16;
const KEY_FILLER = '0';
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/** UTF-8 bytes of the password, right-padded with '0' or cut to 32 bytes. */
export function deriveKey(password: string): Buffer {
  const key: Buffer = Buffer.alloc(KEY_LENGTH, KEY_FILLER);
  Buffer.from(password, 'utf8').copy(key, 0, 0, KEY_LENGTH);
  return key;
}

export function parseEnvelope(
  envelopeB64: string,
): Result<Envelope, DecodeError> {
  const compact: string = envelopeB64.replace(/\s+/g, '');
  if (0 !== compact.length % 4 || !BASE64.test(compact)) {
    return err(decodeError('malformed_base64', 'Envelope is not base64'));
  }
  const raw: Buffer = Buffer.from(compact, 'base64');
  if (raw.length < 2 * BLOCK_SIZE) {
    return err(
      decodeError(
        'cipher_failure',
        `Envelope of ${raw.length} bytes is shorter than IV and one block`,
      ),
    );
  }
  if (0 !== (raw.length - BLOCK_SIZE) % BLOCK_SIZE) {
    return err(
      decodeError(
        'cipher_failure',
        'Ciphertext is not a whole number of blocks',
      ),
    );
  }
  return ok({
    iv: raw.subarray(0, BLOCK_SIZE),
    ciphertext: raw.subarray(BLOCK_SIZE),
  });
}

export function unpad(data: Buffer): Result<Buffer, DecodeError> {
  const padding: number = data.at(-1) ?? 0;
  if (0 === padding || BLOCK_SIZE < padding || data.length < padding) {
    return err(
      decodeError('invalid_padding', `Invalid padding length ${padding}`),
    );
  }
  return ok(data.subarray(0, data.length - padding));
}

function decrypt(envelope: Envelope, key: Buffer): Result<Buffer, DecodeError> {
  try {
    const decipher = createDecipheriv(ALGORITHM, key, envelope.iv);
    decipher.setAutoPadding(false);
    return ok(
      Buffer.concat([decipher.update(envelope.ciphertext), decipher.final()]),
    );
  } catch (e) {
    return err(decodeError('cipher_failure', errorMessage(e)));
  }
}

function parsePayload(data: Buffer): Result<SensorPayload, DecodeError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(data));
  } catch (e) {
    return err(decodeError('invalid_json', errorMessage(e)));
  }
  if (!isPayload(parsed)) {
    return err(decodeError('invalid_json', 'Payload is not a JSON object'));
  }
  return ok(parsed);
}

function decodeWithKey(
  envelopeB64: string,
  key: Buffer,
): Result<SensorPayload, DecodeError> {
  const envelope = parseEnvelope(envelopeB64);
  if (!envelope.ok) return envelope;
  const decrypted = decrypt(envelope.value, key);
  if (!decrypted.ok) return decrypted;
  const unpadded = unpad(decrypted.value);
  if (!unpadded.ok) return unpadded;
  return parsePayload(unpadded.value);
}

export function decode(
  envelopeB64: string,
  password: string,
): Result<SensorPayload, DecodeError> {
  return decodeWithKey(envelopeB64, deriveKey(password));
}

export function createCipherCodec(password: string): CipherCodec {
  const key: Buffer = deriveKey(password);
  return {
    decode: (envelopeB64) => decodeWithKey(envelopeB64, key),
  };
}

/** Builds an envelope the way the sensors do (PKCS7, IV prepended). */
export function encode(
  plaintext: string,
  password: string,
  iv: Buffer = randomBytes(BLOCK_SIZE),
): string {
  const cipher = createCipheriv(ALGORITHM, deriveKey(password), iv);
  return Buffer.concat([
    iv,
    cipher.update(plaintext, 'utf8'),
    cipher.final(),
  ]).toString('base64');
}
