/**
 * IpcCodec - Datagram format for the device-management daemons' IPC
 *
 * Wire Format:
 * ┌────────────────┬───────┬─────────────────────────────────┐
 * │ Length (4 bytes│ Flags │        Payload (N bytes)        │
 * │  big-endian)   │(1 byte│      (MessagePack or JSON)      │
 * └────────────────┴───────┴─────────────────────────────────┘
 *
 * Flags byte:
 *   bit 0: reserved (compression is not used on loopback)
 *   bit 1-2: serialization format
 *            00 = MessagePack (default)
 *            01 = JSON (debug mode)
 *   bit 3-7: reserved
 *
 * One datagram carries exactly one envelope.
 */

import { encode, decode } from '@msgpack/msgpack';
import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

/** Header size: 4 bytes length + 1 byte flags */
export const HEADER_SIZE = 5;

export const FLAG_FORMAT_MASK = 0x06;
export const FLAG_FORMAT_MSGPACK = 0x00;
export const FLAG_FORMAT_JSON = 0x02;

/** Largest payload that fits a UDP datagram */
export const MAX_DATAGRAM_PAYLOAD = 65507 - HEADER_SIZE;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type SerializationFormat = 'msgpack' | 'json';

export const IpcErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
});
export type IpcError = z.infer<typeof IpcErrorSchema>;

export const IpcEnvelopeSchema = z.object({
  kind: z.enum(['request', 'response']),
  /** Correlates a response with its request */
  id: z.number().int().nonnegative(),
  /** Operation name, e.g. 'server:read' */
  type: z.string().min(1),
  payload: z.unknown().optional(),
  /** Present on failed responses only */
  error: IpcErrorSchema.optional(),
});
export type IpcEnvelope = z.infer<typeof IpcEnvelopeSchema>;

export interface IpcCodecOptions {
  defaultFormat?: SerializationFormat;
}

// ═══════════════════════════════════════════════════════════════════════════
// CODEC
// ═══════════════════════════════════════════════════════════════════════════

export class IpcCodec {
  private readonly defaultFormat: SerializationFormat;

  constructor(options?: IpcCodecOptions) {
    this.defaultFormat = options?.defaultFormat ?? 'msgpack';
  }

  encode(envelope: IpcEnvelope, format?: SerializationFormat): Buffer {
    const useFormat = format ?? this.defaultFormat;
    let payload: Buffer;
    let flags: number;

    if (useFormat === 'msgpack') {
      payload = Buffer.from(encode(envelope, { ignoreUndefined: true }));
      flags = FLAG_FORMAT_MSGPACK;
    } else {
      payload = Buffer.from(JSON.stringify(envelope), 'utf-8');
      flags = FLAG_FORMAT_JSON;
    }

    if (payload.length > MAX_DATAGRAM_PAYLOAD) {
      throw new Error(`Envelope too large: ${payload.length} bytes (max: ${MAX_DATAGRAM_PAYLOAD})`);
    }

    const datagram = Buffer.alloc(HEADER_SIZE + payload.length);
    datagram.writeUInt32BE(payload.length, 0);
    datagram.writeUInt8(flags, 4);
    payload.copy(datagram, HEADER_SIZE);
    return datagram;
  }

  decode(datagram: Buffer): IpcEnvelope {
    if (datagram.length < HEADER_SIZE) {
      throw new Error(`Datagram too short: ${datagram.length} bytes`);
    }

    const payloadLength = datagram.readUInt32BE(0);
    const flags = datagram.readUInt8(4);

    if (datagram.length !== HEADER_SIZE + payloadLength) {
      throw new Error(
        `Length mismatch: header says ${payloadLength} bytes, datagram carries ${datagram.length - HEADER_SIZE}`,
      );
    }

    const payload = datagram.subarray(HEADER_SIZE);
    const format = flags & FLAG_FORMAT_MASK;
    let parsed: unknown;

    if (format === FLAG_FORMAT_MSGPACK) {
      parsed = decode(payload);
    } else if (format === FLAG_FORMAT_JSON) {
      parsed = JSON.parse(payload.toString('utf-8'));
    } else {
      throw new Error(`Unknown format flag: ${format}`);
    }

    const result = IpcEnvelopeSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Invalid envelope: ${result.error.message}`);
    }
    return result.data;
  }
}
