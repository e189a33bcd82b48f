/**
 * Built-in codecs.
 */

import type { TSchema } from 'typebox';
import { compileSchema } from './validation.ts';
import type { Codec, Frame } from './types.ts';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function frameToText(frame: Frame): string {
  return typeof frame === 'string' ? frame : utf8.decode(frame);
}

/**
 * Passes text frames through untouched. Binary frames must be valid UTF-8.
 */
export const textCodec: Codec<string, string> = {
  encode: (item) => item,
  decode: frameToText,
};

/**
 * Sends and receives binary frames. Text frames are rejected.
 */
export const binaryCodec: Codec<Uint8Array, Uint8Array> = {
  encode: (item) => item,
  decode: (frame) => {
    if (typeof frame === 'string') {
      throw new TypeError('Expected a binary frame, got text');
    }
    return frame;
  },
};

/**
 * JSON over text frames.
 *
 * With a schema, decoded values are validated and frames that do not match
 * are rejected; without one they are returned as `unknown`.
 */
export function jsonCodec<I>(): Codec<I, unknown>;
export function jsonCodec<I, O>(schema: TSchema): Codec<I, O>;
export function jsonCodec<I, O>(schema?: TSchema): Codec<I, unknown> {
  const validator = schema ? compileSchema<O>(schema) : null;

  return {
    encode: (item) => {
      const text = JSON.stringify(item);
      if (text === undefined) {
        throw new TypeError(`Value of type ${typeof item} has no JSON representation`);
      }
      return text;
    },
    decode: (frame) => {
      const value: unknown = JSON.parse(frameToText(frame));
      return validator ? validator.validate(value) : value;
    },
  };
}
