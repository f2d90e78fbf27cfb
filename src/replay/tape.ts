/**
 * Replay Tape: binary format, recorder, serializer, and CRC-32.
 *
 * Tape layout (little-endian):
 *
 * HEADER (16 bytes):
 *   [0..3]   u32  magic      = 0x46425450 ("FBTP")
 *   [4]      u8   version    = 1
 *   [5]      u8   controlTag   0 = external input, 1 = single, 2 = two_pipe
 *   [6..7]   u8[2] reserved  = 0
 *   [8..11]  u32  seed
 *   [12..15] u32  tickCount
 *
 * BODY (ceil(tickCount / 8) bytes):
 *   One bit per tick, LSB first. 1 = flap, 0 = no flap.
 *   Padding bits in the last byte are 0.
 *
 * FOOTER (8 bytes):
 *   [+0..3]  u32  finalScore
 *   [+4..7]  u32  checksum (CRC-32 of header + body)
 */

import type { ControlMode } from '../ai/bot-config';
import { Action } from '../engine/types';

export const TAPE_MAGIC = 0x46425450;
export const TAPE_VERSION = 1;

const HEADER_SIZE = 16;
const FOOTER_SIZE = 8;

const CONTROL_TAGS: readonly ControlMode[] = ['none', 'single', 'two_pipe'];

export interface TapeHeader {
  magic: number;
  version: number;
  mode: ControlMode;
  seed: number;
  tickCount: number;
}

export interface Tape {
  header: TapeHeader;
  actions: Action[];
  finalScore: number;
  checksum: number;
}

const INITIAL_CAPACITY = 2048; // bytes = 16k ticks

export class TapeRecorder {
  private buffer = new Uint8Array(INITIAL_CAPACITY);
  private ticks = 0;

  record(action: Action): void {
    const byteIndex = this.ticks >> 3;
    if (byteIndex >= this.buffer.length) {
      const next = new Uint8Array(this.buffer.length * 2);
      next.set(this.buffer);
      this.buffer = next;
    }
    if (action === Action.Flap) {
      this.buffer[byteIndex] |= 1 << (this.ticks & 7);
    }
    this.ticks++;
  }

  getBody(): Uint8Array {
    return this.buffer.subarray(0, Math.ceil(this.ticks / 8));
  }

  getTickCount(): number {
    return this.ticks;
  }
}

export function packActions(actions: readonly Action[]): Uint8Array {
  const recorder = new TapeRecorder();
  for (const action of actions) recorder.record(action);
  return recorder.getBody();
}

export function serializeTape(
  seed: number,
  mode: ControlMode,
  actions: readonly Action[],
  finalScore: number,
): Uint8Array {
  const body = packActions(actions);
  const data = new Uint8Array(HEADER_SIZE + body.length + FOOTER_SIZE);
  const view = new DataView(data.buffer);

  view.setUint32(0, TAPE_MAGIC, true);
  view.setUint8(4, TAPE_VERSION);
  view.setUint8(5, CONTROL_TAGS.indexOf(mode));
  view.setUint32(8, seed >>> 0, true);
  view.setUint32(12, actions.length, true);

  data.set(body, HEADER_SIZE);

  const footerOffset = HEADER_SIZE + body.length;
  view.setUint32(footerOffset, finalScore >>> 0, true);
  view.setUint32(footerOffset + 4, crc32(data.subarray(0, footerOffset)), true);

  return data;
}

export function deserializeTape(data: Uint8Array): Tape {
  if (data.length < HEADER_SIZE + FOOTER_SIZE) {
    throw new Error('Tape too short');
  }
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  const magic = view.getUint32(0, true);
  if (magic !== TAPE_MAGIC) {
    throw new Error(`Invalid tape magic: 0x${magic.toString(16)}`);
  }
  const version = view.getUint8(4);
  if (version !== TAPE_VERSION) {
    throw new Error(`Unsupported tape version: ${version}`);
  }
  const mode = CONTROL_TAGS[view.getUint8(5)];
  if (mode === undefined) {
    throw new Error(`Unknown control tag: ${view.getUint8(5)}`);
  }
  if (view.getUint8(6) !== 0 || view.getUint8(7) !== 0) {
    throw new Error('Header reserved bytes [6..7] are non-zero');
  }

  const seed = view.getUint32(8, true);
  const tickCount = view.getUint32(12, true);
  const bodySize = Math.ceil(tickCount / 8);
  const expectedLength = HEADER_SIZE + bodySize + FOOTER_SIZE;
  if (data.length !== expectedLength) {
    throw new Error(`Tape length mismatch: expected ${expectedLength} bytes, got ${data.length}`);
  }

  const footerOffset = HEADER_SIZE + bodySize;
  const finalScore = view.getUint32(footerOffset, true);
  const checksum = view.getUint32(footerOffset + 4, true);
  const computed = crc32(data.subarray(0, footerOffset));
  if (computed !== checksum) {
    throw new Error(`CRC mismatch: stored=0x${checksum.toString(16)}, computed=0x${computed.toString(16)}`);
  }

  const actions: Action[] = [];
  for (let tick = 0; tick < tickCount; tick++) {
    const byte = data[HEADER_SIZE + (tick >> 3)];
    actions.push((byte >> (tick & 7)) & 1 ? Action.Flap : Action.NoFlap);
  }
  const padding = tickCount & 7;
  if (padding !== 0 && data[footerOffset - 1] >> padding !== 0) {
    throw new Error('Tape padding bits are non-zero');
  }

  return {
    header: { magic, version, mode, seed, tickCount },
    actions,
    finalScore,
    checksum,
  };
}

// CRC-32 (ISO 3309 / ITU-T V.42 polynomial)
const CRC_TABLE = buildCrcTable();

function buildCrcTable(): Uint32Array {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let c = i;
    for (let j = 0; j < 8; j++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[i] = c >>> 0;
  }
  return table;
}

export function crc32(data: Uint8Array): number {
  let crc = 0xffffffff;
  for (let i = 0; i < data.length; i++) {
    crc = CRC_TABLE[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}
