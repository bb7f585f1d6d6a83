import type { Format } from './formats.js';
import type { FormatPair } from './FormatGraph.js';
import { normalizeConversionError, type ConverterFailureKind } from './errors.js';

export type PairKey = `${Format}->${Format}`;

export type ConverterContext = {
  /** Aborted when the job is abandoned (timeout or shutdown). */
  signal: AbortSignal;
};

export type ConverterFn = (input: Buffer, ctx: ConverterContext) => Promise<Buffer> | Buffer;

export type ConvertOutcome =
  | { ok: true; output: Buffer }
  | { ok: false; kind: ConverterFailureKind; message: string };

export function pairKey(from: Format, to: Format): PairKey {
  return `${from}->${to}`;
}

/**
 * Converter Registry - maps an ordered format pair to the function that performs
 * that single hop. Holds no job state; failures come back as values.
 */
export class ConverterRegistry {
  private readonly converters = new Map<PairKey, { pair: FormatPair; fn: ConverterFn }>();

  register(from: Format, to: Format, fn: ConverterFn): this {
    const key = pairKey(from, to);
    if (this.converters.has(key)) {
      throw new Error(`Converter for '${key}' is already registered`);
    }
    this.converters.set(key, { pair: { from, to }, fn });
    return this;
  }

  has(from: Format, to: Format): boolean {
    return this.converters.has(pairKey(from, to));
  }

  pairs(): FormatPair[] {
    return Array.from(this.converters.values(), ({ pair }) => ({ ...pair }));
  }

  async convert(pair: FormatPair, payload: Buffer, ctx: ConverterContext): Promise<ConvertOutcome> {
    const entry = this.converters.get(pairKey(pair.from, pair.to));
    if (!entry) {
      return {
        ok: false,
        kind: 'internal_error',
        message: `No converter registered for '${pairKey(pair.from, pair.to)}'`,
      };
    }
    try {
      const output = await entry.fn(payload, ctx);
      return { ok: true, output };
    } catch (err) {
      const { kind, message } = normalizeConversionError(err);
      return { ok: false, kind, message };
    }
  }
}
