/**
 * Container-level sealing, independent of the block-device encryption
 *
 * A random 256-bit data key encrypts the file with AES-256-GCM; the data key
 * is wrapped once per recipient (container key, master key) through the
 * key-wrapping provider. Files are streamed, never held in memory.
 *
 * Layout: MAGIC | u32 header length | header JSON | ciphertext | auth tag
 */

import { randomBytes, createCipheriv, createDecipheriv } from 'crypto';
import { createReadStream, createWriteStream } from 'fs';
import { open, stat, rename, rm } from 'fs/promises';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { z } from 'zod';
import { SealError, errorMessage } from '../../errors.js';
import type { KeyWrappingProvider } from '../providers/types.js';

const ALGORITHM = 'aes-256-gcm';
const MAGIC_HEADER = Buffer.from('COFFER-SEAL-V1');
const LENGTH_FIELD = 4;
const IV_LENGTH = 12; // GCM standard
const AUTH_TAG_LENGTH = 16;
const KEY_LENGTH = 32; // 256 bits
const MAX_HEADER_LENGTH = 64 * 1024;

export interface SealRecipient {
  label: string;
  publicKeyPem: string;
}

const sealHeaderSchema = z.object({
  version: z.literal(1),
  iv: z.string().regex(/^[0-9a-f]{24}$/),
  recipients: z
    .array(
      z.object({
        label: z.string().min(1),
        wrappedKey: z.string().min(1),
      })
    )
    .min(1),
});

export type SealHeader = z.infer<typeof sealHeaderSchema>;

export const encodeHeader = (header: SealHeader): Buffer => {
  const json = Buffer.from(JSON.stringify(header), 'utf-8');
  const length = Buffer.alloc(LENGTH_FIELD);
  length.writeUInt32BE(json.length);
  return Buffer.concat([MAGIC_HEADER, length, json]);
};

/**
 * Read and validate the header of a sealed file.
 * Returns the header and the byte offset where the ciphertext starts.
 */
export const readSealHeader = async (path: string): Promise<{ header: SealHeader; offset: number }> => {
  const handle = await open(path, 'r');
  try {
    const prefix = Buffer.alloc(MAGIC_HEADER.length + LENGTH_FIELD);
    const { bytesRead } = await handle.read(prefix, 0, prefix.length, 0);
    if (bytesRead < prefix.length || !prefix.subarray(0, MAGIC_HEADER.length).equals(MAGIC_HEADER)) {
      throw new SealError(`${path} is not a sealed container`);
    }

    const headerLength = prefix.readUInt32BE(MAGIC_HEADER.length);
    if (headerLength === 0 || headerLength > MAX_HEADER_LENGTH) {
      throw new SealError(`${path} has a corrupted header`);
    }

    const json = Buffer.alloc(headerLength);
    await handle.read(json, 0, headerLength, prefix.length);

    let raw: unknown;
    try {
      raw = JSON.parse(json.toString('utf-8'));
    } catch {
      throw new SealError(`${path} has a corrupted header`);
    }
    const result = sealHeaderSchema.safeParse(raw);
    if (!result.success) {
      throw new SealError(`${path} has an invalid header: ${result.error.issues[0]?.message}`);
    }

    return { header: result.data, offset: prefix.length + headerLength };
  } finally {
    await handle.close();
  }
};

export const sealFile = async (
  sourcePath: string,
  destPath: string,
  recipients: SealRecipient[],
  wrapper: KeyWrappingProvider
): Promise<void> => {
  if (recipients.length === 0) {
    throw new SealError('at least one recipient is required');
  }

  const dataKey = randomBytes(KEY_LENGTH);
  const iv = randomBytes(IV_LENGTH);
  const header = encodeHeader({
    version: 1,
    iv: iv.toString('hex'),
    recipients: await Promise.all(
      recipients.map(async ({ label, publicKeyPem }) => ({
        label,
        wrappedKey: (await wrapper.wrap(dataKey, publicKeyPem)).toString('base64'),
      }))
    ),
  });

  const cipher = createCipheriv(ALGORITHM, dataKey, iv);
  const partialPath = `${destPath}.partial`;

  try {
    await pipeline(
      createReadStream(sourcePath),
      async function* (source: AsyncIterable<Buffer>) {
        yield header;
        for await (const chunk of source) {
          yield cipher.update(chunk);
        }
        yield cipher.final();
        yield cipher.getAuthTag();
      },
      createWriteStream(partialPath, { mode: 0o600 })
    );
    await rename(partialPath, destPath);
  } catch (error) {
    await rm(partialPath, { force: true });
    throw new SealError(`failed to seal ${sourcePath}: ${errorMessage(error)}`);
  }
};

export const unsealFile = async (
  sourcePath: string,
  destPath: string,
  label: string,
  privateKeyPem: string,
  wrapper: KeyWrappingProvider
): Promise<void> => {
  const { header, offset } = await readSealHeader(sourcePath);

  const recipient = header.recipients.find((r) => r.label === label);
  if (!recipient) {
    throw new SealError(`${sourcePath} was not sealed for the ${label} key`, [
      `Sealed for: ${header.recipients.map((r) => r.label).join(', ')}`,
    ]);
  }

  let dataKey: Buffer;
  try {
    dataKey = await wrapper.unwrap(Buffer.from(recipient.wrappedKey, 'base64'), privateKeyPem);
  } catch {
    throw new SealError(`the ${label} key cannot unwrap the data key of ${sourcePath}`);
  }

  const { size } = await stat(sourcePath);
  const tagStart = size - AUTH_TAG_LENGTH;
  if (tagStart < offset) {
    throw new SealError(`${sourcePath} is truncated`);
  }

  const handle = await open(sourcePath, 'r');
  const authTag = Buffer.alloc(AUTH_TAG_LENGTH);
  try {
    await handle.read(authTag, 0, AUTH_TAG_LENGTH, tagStart);
  } finally {
    await handle.close();
  }

  const decipher = createDecipheriv(ALGORITHM, dataKey, Buffer.from(header.iv, 'hex'));
  decipher.setAuthTag(authTag);
  const partialPath = `${destPath}.partial`;

  try {
    await pipeline(
      tagStart > offset
        ? createReadStream(sourcePath, { start: offset, end: tagStart - 1 })
        : Readable.from([]),
      async function* (source: AsyncIterable<Buffer>) {
        for await (const chunk of source) {
          yield decipher.update(chunk);
        }
        yield decipher.final();
      },
      createWriteStream(partialPath, { mode: 0o600 })
    );
    await rename(partialPath, destPath);
  } catch (error) {
    await rm(partialPath, { force: true });
    throw new SealError(`failed to unseal ${sourcePath}: ${errorMessage(error)}`, [
      'The sealed file may be corrupted',
    ]);
  }
};

/**
 * Check if a file starts with the seal header
 */
export const isSealedFile = async (path: string): Promise<boolean> => {
  try {
    const handle = await open(path, 'r');
    try {
      const buffer = Buffer.alloc(MAGIC_HEADER.length);
      await handle.read(buffer, 0, MAGIC_HEADER.length, 0);
      return buffer.equals(MAGIC_HEADER);
    } finally {
      await handle.close();
    }
  } catch {
    return false;
  }
};
