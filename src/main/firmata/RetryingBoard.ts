import type { MessageType } from '../../shared/types/firmata.types';
import { getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { retryWithBackoff } from './backoff';
import type { BackoffOptions, RetryHooks } from './backoff';
import { FirmataBoard } from './FirmataBoard';
import type { BoardOptions, FirmataOperations } from './FirmataBoard';
import type { Transport } from './transport';

export interface RetryingBoardOptions extends BoardOptions {
  backoff?: Partial<BackoffOptions>;
}

/**
 * Same operations as FirmataBoard, each retried with exponential backoff.
 *
 * Any failure is retried, including malformed frames. Use the plain board to
 * see the exact error of a single attempt.
 */
export class RetryingBoard implements FirmataOperations {
  constructor(
    readonly board: FirmataBoard,
    private backoff: Partial<BackoffOptions> = {},
    private hooks: RetryHooks = {}
  ) {}

  /** Create a board, retrying the whole handshake on failure */
  static async create(
    transport: Transport,
    options: RetryingBoardOptions = {},
    hooks: RetryHooks = {}
  ): Promise<RetryingBoard> {
    const board = await retryOperation('create', () => FirmataBoard.create(transport, options), options.backoff, hooks);
    return new RetryingBoard(board, options.backoff, hooks);
  }

  setPinMode(pin: number, mode: number): Promise<void> {
    return this.retry('setPinMode', () => this.board.setPinMode(pin, mode));
  }

  digitalWrite(pin: number, level: number): Promise<void> {
    return this.retry('digitalWrite', () => this.board.digitalWrite(pin, level));
  }

  analogWrite(pin: number, level: number): Promise<void> {
    return this.retry('analogWrite', () => this.board.analogWrite(pin, level));
  }

  reportDigital(port: number, state: number): Promise<void> {
    return this.retry('reportDigital', () => this.board.reportDigital(port, state));
  }

  reportAnalog(pin: number, state: number): Promise<void> {
    return this.retry('reportAnalog', () => this.board.reportAnalog(pin, state));
  }

  queryFirmware(): Promise<void> {
    return this.retry('queryFirmware', () => this.board.queryFirmware());
  }

  queryCapabilities(): Promise<void> {
    return this.retry('queryCapabilities', () => this.board.queryCapabilities());
  }

  queryAnalogMapping(): Promise<void> {
    return this.retry('queryAnalogMapping', () => this.board.queryAnalogMapping());
  }

  queryPinState(pin: number): Promise<void> {
    return this.retry('queryPinState', () => this.board.queryPinState(pin));
  }

  setSamplingInterval(intervalMs: number): Promise<void> {
    return this.retry('setSamplingInterval', () => this.board.setSamplingInterval(intervalMs));
  }

  i2cConfig(delay: number): Promise<void> {
    return this.retry('i2cConfig', () => this.board.i2cConfig(delay));
  }

  i2cRead(address: number, size: number, register?: number): Promise<void> {
    return this.retry('i2cRead', () => this.board.i2cRead(address, size, register));
  }

  i2cWrite(address: number, data: ArrayLike<number>): Promise<void> {
    return this.retry('i2cWrite', () => this.board.i2cWrite(address, data));
  }

  readAndDecode(): Promise<MessageType> {
    return this.retry('readAndDecode', () => this.board.readAndDecode());
  }

  private retry<T>(operation: string, run: () => Promise<T>): Promise<T> {
    return retryOperation(operation, run, this.backoff, this.hooks);
  }
}

function retryOperation<T>(
  operation: string,
  run: () => Promise<T>,
  backoff: Partial<BackoffOptions> | undefined,
  hooks: RetryHooks
): Promise<T> {
  return retryWithBackoff(run, backoff, {
    ...hooks,
    onRetry: (attempt, delayMs, error) => {
      logger.warn(`${operation} failed (attempt ${attempt}), retrying in ${delayMs}ms: ${getErrorMessage(error)}`);
      hooks.onRetry?.(attempt, delayMs, error);
    }
  });
}
