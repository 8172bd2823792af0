import { createCipheriv, createDecipheriv } from 'node:crypto';

/**
 * Broadlink LAN protocol framing.
 *
 * Request layout (0x38-byte header followed by the encrypted payload):
 * - 0x00..0x07 magic `5a a5 aa 55 5a a5 aa 55`
 * - 0x20..0x21 packet checksum (LE), computed last over the whole packet
 * - 0x24..0x25 device type (LE)
 * - 0x26       command
 * - 0x28..0x29 packet counter (LE)
 * - 0x2a..0x2f device MAC
 * - 0x30..0x33 device id (zero until authenticated)
 * - 0x34..0x35 payload checksum (LE), over the plaintext payload
 *
 * Responses carry an error word at 0x22 and their own encrypted payload at 0x38.
 */

export const HEADER_LENGTH = 0x38;
export const COMMAND_AUTH = 0x65;
export const COMMAND_CONTROL = 0x6a;

export const INITIAL_KEY = Buffer.from('097628343fe99e23765c1513accf8b02', 'hex');
export const INITIAL_IV = Buffer.from('562e17996d093d28ddb3ba695a2e6f58', 'hex');

const MAGIC = Buffer.from([0x5a, 0xa5, 0xaa, 0x55, 0x5a, 0xa5, 0xaa, 0x55]);
const CHECKSUM_SEED = 0xbeaf;
const BLOCK_SIZE = 16;

export interface PacketFields {
  command: number;
  count: number;
  devtype: number;
  mac: Buffer;
  deviceId: Buffer;
  payload: Buffer;
  key: Buffer;
}

export interface ParsedResponse {
  errorCode: number;
  command: number;
  payload: Buffer;
}

export function checksum(data: Buffer): number {
  let sum = CHECKSUM_SEED;
  for (const byte of data) {
    sum = (sum + byte) & 0xffff;
  }
  return sum;
}

export function padPayload(payload: Buffer): Buffer {
  const remainder = payload.length % BLOCK_SIZE;
  if (remainder === 0) {
    return payload;
  }
  return Buffer.concat([payload, Buffer.alloc(BLOCK_SIZE - remainder)]);
}

export function encryptPayload(payload: Buffer, key: Buffer): Buffer {
  const cipher = createCipheriv('aes-128-cbc', key, INITIAL_IV);
  cipher.setAutoPadding(false);
  return Buffer.concat([cipher.update(padPayload(payload)), cipher.final()]);
}

export function decryptPayload(payload: Buffer, key: Buffer): Buffer {
  if (payload.length === 0) {
    return payload;
  }
  if (payload.length % BLOCK_SIZE !== 0) {
    throw new Error(`encrypted payload length ${payload.length} is not a multiple of ${BLOCK_SIZE}`);
  }
  const decipher = createDecipheriv('aes-128-cbc', key, INITIAL_IV);
  decipher.setAutoPadding(false);
  return Buffer.concat([decipher.update(payload), decipher.final()]);
}

export function buildPacket(fields: PacketFields): Buffer {
  const plain = padPayload(fields.payload);
  const header = Buffer.alloc(HEADER_LENGTH);
  MAGIC.copy(header, 0x00);
  header.writeUInt16LE(fields.devtype & 0xffff, 0x24);
  header.writeUInt8(fields.command & 0xff, 0x26);
  header.writeUInt16LE(fields.count & 0xffff, 0x28);
  fields.mac.copy(header, 0x2a, 0, 6);
  fields.deviceId.copy(header, 0x30, 0, 4);
  header.writeUInt16LE(checksum(plain), 0x34);

  const packet = Buffer.concat([header, encryptPayload(plain, fields.key)]);
  packet.writeUInt16LE(checksum(packet), 0x20);
  return packet;
}

export function parseResponse(packet: Buffer, key: Buffer): ParsedResponse {
  if (packet.length < HEADER_LENGTH) {
    throw new Error(`response too short (${packet.length} bytes)`);
  }
  const errorCode = packet.readUInt16LE(0x22);
  const command = packet.readUInt8(0x26);
  if (errorCode !== 0) {
    return { errorCode, command, payload: Buffer.alloc(0) };
  }
  return { errorCode, command, payload: decryptPayload(packet.subarray(HEADER_LENGTH), key) };
}

export function buildAuthPayload(): Buffer {
  const payload = Buffer.alloc(0x50);
  payload.fill(0x31, 0x04, 0x14);
  payload[0x1e] = 0x01;
  payload[0x2d] = 0x01;
  payload.write('Test  1', 0x30, 'ascii');
  return payload;
}

/**
 * Extracts the device id and session key from a decrypted auth response.
 */
export function parseAuthPayload(payload: Buffer): { deviceId: Buffer; key: Buffer } {
  if (payload.length < 0x14) {
    throw new Error(`auth response payload too short (${payload.length} bytes)`);
  }
  return {
    deviceId: Buffer.from(payload.subarray(0x00, 0x04)),
    key: Buffer.from(payload.subarray(0x04, 0x14)),
  };
}

export function buildPowerQueryPayload(): Buffer {
  const payload = Buffer.alloc(BLOCK_SIZE);
  payload[0] = 0x01;
  return payload;
}

export function buildPowerSetPayload(on: boolean): Buffer {
  const payload = Buffer.alloc(BLOCK_SIZE);
  payload[0] = 0x02;
  payload[4] = on ? 0x01 : 0x00;
  return payload;
}

export function parsePowerPayload(payload: Buffer): boolean {
  if (payload.length < 5) {
    throw new Error(`power response payload too short (${payload.length} bytes)`);
  }
  return (payload[4] & 0x01) === 0x01;
}
