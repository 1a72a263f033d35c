/** Why a protocol value could not be decoded or encoded. */
export type CodecFailureCode =
  | 'OUT_OF_RANGE'
  | 'EXPECTED_MISMATCH'
  | 'INVALID_LENGTH'
  | 'INVALID_VALUE';

export type ProtocolErrorCode =
  | CodecFailureCode
  | 'INVALID_DEFINITION'
  | 'INVALID_EXPRESSION'
  | 'UNKNOWN_TYPE'
  | 'UNKNOWN_STRUCT';

/**
 * Thrown by the protocol layer: for bad definitions while building, and by
 * the high-level `ProtocolCodec` methods when a decode or encode fails.
 */
export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;
  /** Dotted field path (`header.name[2]`) where a codec failure happened. */
  readonly path?: string;

  constructor(code: ProtocolErrorCode, message: string, path?: string) {
    super(message);
    this.name = 'ProtocolError';
    this.code = code;
    this.path = path;
  }
}
