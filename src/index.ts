/**
 * Host-side client for the Firmata device-control protocol.
 */

export { FirmataBoard } from './main/firmata/FirmataBoard';
export type { BoardOptions, FirmataOperations } from './main/firmata/FirmataBoard';
export { RetryingBoard } from './main/firmata/RetryingBoard';
export type { RetryingBoardOptions } from './main/firmata/RetryingBoard';
export { BoardState } from './main/firmata/BoardState';
export { FirmataDecoder } from './main/firmata/FirmataDecoder';
export { FirmataProtocol, to7BitBytes, from7BitBytes } from './main/firmata/FirmataProtocol';
export { retryWithBackoff, backoffIntervals, DEFAULT_BACKOFF } from './main/firmata/backoff';
export type { BackoffOptions, RetryHooks } from './main/firmata/backoff';
export { StreamTransport } from './main/firmata/StreamTransport';
export type { StreamTransportOptions } from './main/firmata/StreamTransport';
export { SerialTransport } from './main/firmata/SerialTransport';
export type { Transport } from './main/firmata/transport';
export { PinMode, SysExCommand, FIRMATA_PROTOCOL } from './main/firmata/types';
export * from './main/utils/errors';
export * from './shared/types/firmata.types';
export { FIRMATA, BACKOFF } from './shared/constants';
