/**
 * RouterOS API Protocol
 *
 * Wire codec for the MikroTik RouterOS API (TCP 8728, plaintext).
 *
 * A sentence is a sequence of length-prefixed words terminated by a
 * zero-length word. Word lengths use a variable-width prefix:
 *
 *   0x00-0x7F                  1 byte   0xxxxxxx
 *   0x80-0x3FFF                2 bytes  10xxxxxx xxxxxxxx
 *   0x4000-0x1FFFFF            3 bytes  110xxxxx ...
 *   0x200000-0xFFFFFFF         4 bytes  1110xxxx ...
 *   0x10000000 and above       5 bytes  11110000 + uint32 BE
 *
 * Requests:  /queue/simple/print  =key=value  .tag=7
 * Replies:   !re (one record), !done, !trap (=message=...), !fatal <reason>
 */

export type ReplyType = '!re' | '!done' | '!trap' | '!fatal' | '!empty';

export interface RouterOSReply {
  type: ReplyType;
  tag?: string;
  /** `=key=value` words */
  attributes: Record<string, string>;
  /** Bare words after the reply type (only !fatal carries one) */
  message?: string;
}

export type RouterOSErrorKind = 'trap' | 'fatal' | 'timeout' | 'closed' | 'protocol' | 'login';

export class RouterOSError extends Error {
  readonly kind: RouterOSErrorKind;

  constructor(kind: RouterOSErrorKind, message: string) {
    super(message);
    this.name = 'RouterOSError';
    this.kind = kind;
  }
}

const REPLY_TYPES: readonly string[] = ['!re', '!done', '!trap', '!fatal', '!empty'];

function isReplyType(word: string): word is ReplyType {
  return REPLY_TYPES.includes(word);
}

// --- Length prefix ---

export function encodeLength(length: number): Buffer {
  if (length < 0x80) {
    return Buffer.from([length]);
  }
  if (length < 0x4000) {
    const buf = Buffer.alloc(2);
    buf.writeUInt16BE(length | 0x8000);
    return buf;
  }
  if (length < 0x200000) {
    const value = length | 0xc00000;
    return Buffer.from([(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff]);
  }
  if (length < 0x10000000) {
    const buf = Buffer.alloc(4);
    buf.writeUInt32BE((length | 0xe0000000) >>> 0);
    return buf;
  }
  const buf = Buffer.alloc(5);
  buf[0] = 0xf0;
  buf.writeUInt32BE(length, 1);
  return buf;
}

/**
 * Decode a length prefix at `offset`. Returns null while the prefix is
 * still incomplete.
 */
export function decodeLength(buf: Buffer, offset: number): { length: number; size: number } | null {
  if (offset >= buf.length) return null;
  const b = buf[offset];

  let size: number;
  if ((b & 0x80) === 0x00) size = 1;
  else if ((b & 0xc0) === 0x80) size = 2;
  else if ((b & 0xe0) === 0xc0) size = 3;
  else if ((b & 0xf0) === 0xe0) size = 4;
  else if (b === 0xf0) size = 5;
  else throw new RouterOSError('protocol', `Unsupported control byte 0x${b.toString(16)}`);

  if (offset + size > buf.length) return null;

  switch (size) {
    case 1:
      return { length: b, size };
    case 2:
      return { length: ((b & 0x3f) << 8) | buf[offset + 1], size };
    case 3:
      return { length: ((b & 0x1f) << 16) | (buf[offset + 1] << 8) | buf[offset + 2], size };
    case 4:
      return {
        length: (b & 0x0f) * 0x1000000 + (buf[offset + 1] << 16) + (buf[offset + 2] << 8) + buf[offset + 3],
        size,
      };
    default:
      return { length: buf.readUInt32BE(offset + 1), size };
  }
}

// --- Sentences ---

export function encodeWord(word: string): Buffer {
  const body = Buffer.from(word, 'utf-8');
  return Buffer.concat([encodeLength(body.length), body]);
}

export function encodeSentence(words: string[]): Buffer {
  return Buffer.concat([...words.map(encodeWord), Buffer.from([0x00])]);
}

/** Build the words of a command sentence. */
export function buildCommand(command: string, params: Record<string, string> = {}, tag?: string): string[] {
  const words = [command];
  for (const [key, value] of Object.entries(params)) {
    words.push(`=${key}=${value}`);
  }
  if (tag !== undefined) {
    words.push(`.tag=${tag}`);
  }
  return words;
}

/** Interpret the words of a reply sentence. */
export function parseReply(words: string[]): RouterOSReply {
  const [head, ...rest] = words;
  if (head === undefined || !isReplyType(head)) {
    throw new RouterOSError('protocol', `Unexpected reply word: ${head ?? '(empty sentence)'}`);
  }

  const reply: RouterOSReply = { type: head, attributes: {} };
  for (const word of rest) {
    if (word.startsWith('=')) {
      const sep = word.indexOf('=', 1);
      if (sep === -1) {
        reply.attributes[word.slice(1)] = '';
      } else {
        reply.attributes[word.slice(1, sep)] = word.slice(sep + 1);
      }
    } else if (word.startsWith('.tag=')) {
      reply.tag = word.slice('.tag='.length);
    } else {
      reply.message = reply.message === undefined ? word : `${reply.message} ${word}`;
    }
  }
  return reply;
}

/**
 * Reassembles sentences from a TCP byte stream. Accepts chunks of any
 * size; partial words are carried over to the next feed().
 */
export class SentenceParser {
  private pending: Buffer = Buffer.alloc(0);
  private words: string[] = [];

  feed(chunk: Buffer): string[][] {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    const sentences: string[][] = [];
    let offset = 0;

    while (offset < this.pending.length) {
      const prefix = decodeLength(this.pending, offset);
      if (!prefix) break;
      const end = offset + prefix.size + prefix.length;
      if (end > this.pending.length) break;

      if (prefix.length === 0) {
        if (this.words.length > 0) {
          sentences.push(this.words);
        }
        this.words = [];
      } else {
        this.words.push(this.pending.toString('utf-8', offset + prefix.size, end));
      }
      offset = end;
    }

    this.pending = this.pending.subarray(offset);
    return sentences;
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
    this.words = [];
  }
}
