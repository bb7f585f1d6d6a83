export type ConverterFailureKind = 'malformed_input' | 'unsupported_feature' | 'internal_error';

export type ConversionFailureKind = ConverterFailureKind | 'timeout';

export type RejectionReason = 'unsupported_conversion' | 'payload_too_large' | 'invalid_format';

export type ConversionFailure = {
  kind: ConversionFailureKind;
  message: string;
};

/**
 * Thrown by leaf converters to report a classified failure.
 */
export class ConversionError extends Error {
  readonly kind: ConverterFailureKind;

  constructor(kind: ConverterFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConversionError';
    this.kind = kind;
  }
}

export function isConversionError(error: unknown): error is ConversionError {
  return error instanceof ConversionError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error ?? 'Unknown error');
}

/**
 * Anything a converter throws becomes a classified failure. Unknown errors are
 * internal; parser complaints about structure are reported as malformed input.
 */
export function normalizeConversionError(error: unknown): { kind: ConverterFailureKind; message: string } {
  if (isConversionError(error)) return { kind: error.kind, message: error.message };
  const msg = errorMessage(error);
  const name = error instanceof Error ? error.name : '';
  if (/InvalidPDFException|FormatError/.test(name) || /invalid pdf structure/i.test(msg)) {
    return { kind: 'malformed_input', message: `Malformed PDF: ${msg}` };
  }
  if (/end of central directory|corrupted zip|not a zip|could not find file/i.test(msg)) {
    return { kind: 'malformed_input', message: `Malformed DOCX: ${msg}` };
  }
  return { kind: 'internal_error', message: msg || 'Converter failed' };
}

const REJECTION_MESSAGES: Record<RejectionReason, string> = {
  unsupported_conversion: 'No conversion path between the requested formats',
  payload_too_large: 'Payload exceeds the configured maximum size',
  invalid_format: 'Unknown document format',
};

export function rejectionMessage(reason: RejectionReason): string {
  return REJECTION_MESSAGES[reason];
}
