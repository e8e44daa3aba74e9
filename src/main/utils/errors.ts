export class FirmataError extends Error {
  constructor(
    message: string,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'FirmataError';
  }
}

export class UnknownSysExError extends FirmataError {
  constructor(public command: number) {
    super(`Unknown SysEx command: 0x${command.toString(16)}`, 'UNKNOWN_SYSEX');
    this.name = 'UnknownSysExError';
  }
}

export class BadByteError extends FirmataError {
  constructor(public byte: number) {
    super(`Received a bad byte: 0x${byte.toString(16)}`, 'BAD_BYTE');
    this.name = 'BadByteError';
  }
}

export class IOError extends FirmataError {
  constructor(message: string, public source?: unknown) {
    // Surface the transport's own message, not just "Read failed"
    const innerMsg = source instanceof Error ? source.message : undefined;
    super(innerMsg ? `${message}: ${innerMsg}` : message, 'IO_ERROR', source);
    this.name = 'IOError';
  }
}

export class TextDecodeError extends FirmataError {
  constructor(public source?: unknown) {
    super('Firmware name is not valid UTF-8', 'TEXT_DECODE_ERROR', source);
    this.name = 'TextDecodeError';
  }
}

export class MessageTooShortError extends FirmataError {
  constructor(message: string = 'Message was too short') {
    super(message, 'MESSAGE_TOO_SHORT');
    this.name = 'MessageTooShortError';
  }
}

export class PinOutOfBoundsError extends FirmataError {
  constructor(
    public pin: number,
    public pinCount: number
  ) {
    super(`Pin out of bounds: ${pin} (${pinCount})`, 'PIN_OUT_OF_BOUNDS');
    this.name = 'PinOutOfBoundsError';
  }
}

export class AttemptsExceededError extends FirmataError {
  constructor(
    public attempts: number,
    public lastError: unknown
  ) {
    super(`Gave up after ${attempts} attempts: ${getErrorMessage(lastError)}`, 'ATTEMPTS_EXCEEDED', lastError);
    this.name = 'AttemptsExceededError';
  }
}

export class TimeoutExceededError extends FirmataError {
  constructor(
    public elapsedMs: number,
    public lastError: unknown
  ) {
    super(`Gave up after ${elapsedMs}ms: ${getErrorMessage(lastError)}`, 'TIMEOUT_EXCEEDED', lastError);
    this.name = 'TimeoutExceededError';
  }
}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  return String(error);
}
