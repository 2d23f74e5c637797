/**
 * Exception classes for the badge library.
 */

import type { BadgeResponse } from './protocol/responses';
import type { FailureReason } from './transfer/state-machine';

export class BadgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BadgeError';
  }
}

/**
 * A command or data block could not be built. Always a caller error,
 * raised before anything is written to the transport.
 */
export class EncodingError extends BadgeError {
  constructor(message: string) {
    super(message);
    this.name = 'EncodingError';
  }
}

export class PayloadTooLargeError extends EncodingError {
  constructor(
    message: string,
    readonly size: number,
    readonly limit: number
  ) {
    super(message);
    this.name = 'PayloadTooLargeError';
  }
}

export class ValueOutOfRangeError extends EncodingError {
  constructor(message: string) {
    super(message);
    this.name = 'ValueOutOfRangeError';
  }
}

export class UnknownCommandError extends EncodingError {
  constructor(readonly command: string) {
    super(`Unknown badge command: ${command}`);
    this.name = 'UnknownCommandError';
  }
}

export class CryptoError extends BadgeError {
  constructor(message: string) {
    super(message);
    this.name = 'CryptoError';
  }
}

export class InvalidBlockLengthError extends CryptoError {
  constructor(readonly length: number) {
    super(`AES block must be exactly 16 bytes, got ${length}`);
    this.name = 'InvalidBlockLengthError';
  }
}

export class InvalidKeyLengthError extends CryptoError {
  constructor(readonly length: number) {
    super(`AES-128 key must be exactly 16 bytes, got ${length}`);
    this.name = 'InvalidKeyLengthError';
  }
}

export class ProtocolError extends BadgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

export class MalformedFrameError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedFrameError';
  }
}

export class UnexpectedResponseError extends ProtocolError {
  constructor(readonly response: BadgeResponse, expected: string) {
    super(`Expected ${expected}, badge replied ${JSON.stringify(response.token)}`);
    this.name = 'UnexpectedResponseError';
  }
}

export class ImageEncodingError extends BadgeError {
  constructor(message: string) {
    super(message);
    this.name = 'ImageEncodingError';
  }
}

export class UnsupportedCharacterError extends BadgeError {
  constructor(
    readonly character: string,
    readonly fontName: string
  ) {
    const codePoint = character.codePointAt(0) ?? 0;
    super(
      `Character ${JSON.stringify(character)} (U+${codePoint
        .toString(16)
        .toUpperCase()
        .padStart(4, '0')}) is not in font "${fontName}"`
    );
    this.name = 'UnsupportedCharacterError';
  }
}

export class BLEConnectionError extends BadgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BLEConnectionError';
  }
}

export class BLETimeoutError extends BadgeError {
  constructor(message: string) {
    super(message);
    this.name = 'BLETimeoutError';
  }
}

export class ConfigurationError extends BadgeError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class TransferError extends BadgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransferError';
  }
}

export class TransferInProgressError extends TransferError {
  constructor(state: string) {
    super(`A transfer is already in progress (state: ${state})`);
    this.name = 'TransferInProgressError';
  }
}

export class InvalidTransitionError extends TransferError {
  constructor(state: string, event: string) {
    super(`Event "${event}" is not valid in state "${state}"`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Terminal failure of an upload session. `reason` tells the caller what
 * went wrong; the whole operation may be re-issued from scratch.
 */
export class TransferFailedError extends TransferError {
  constructor(readonly reason: FailureReason) {
    super(describeFailure(reason), {
      cause: 'error' in reason ? reason.error : undefined,
    });
    this.name = 'TransferFailedError';
  }
}

function describeFailure(reason: FailureReason): string {
  switch (reason.kind) {
    case 'timeout':
      return `Upload failed: no ${reason.awaiting} acknowledgement within ${reason.timeoutMs}ms`;
    case 'cancelled':
      return 'Upload cancelled';
    case 'transport':
      return `Upload failed: transport error: ${reason.error.message}`;
    case 'unexpectedResponse':
      return `Upload failed: expected ${reason.awaiting}, badge replied ${JSON.stringify(
        reason.response.token
      )}`;
    case 'malformedFrame':
      return `Upload failed: ${reason.error.message}`;
  }
}
