import { MessageType } from '../../shared/types/firmata.types';
import type { I2CReply, OperationHook, Pin } from '../../shared/types/firmata.types';
import { FIRMATA } from '../../shared/constants';
import { IOError, PinOutOfBoundsError, isError } from '../utils/errors';
import { logger } from '../utils/logger';
import { BoardState } from './BoardState';
import { FirmataDecoder } from './FirmataDecoder';
import { FirmataProtocol } from './FirmataProtocol';
import type { Transport } from './transport';
import { FIRMATA_PROTOCOL } from './types';

export interface BoardOptions {
  /** Called after every primitive operation, successful or not */
  onOperation?: OperationHook;
  /** Ports to enable digital reporting on once the handshake completes */
  reportPorts?: readonly number[];
}

/** Every fallible board operation; implemented directly and with retries. */
export interface FirmataOperations {
  setPinMode(pin: number, mode: number): Promise<void>;
  digitalWrite(pin: number, level: number): Promise<void>;
  analogWrite(pin: number, level: number): Promise<void>;
  reportDigital(port: number, state: number): Promise<void>;
  reportAnalog(pin: number, state: number): Promise<void>;
  queryFirmware(): Promise<void>;
  queryCapabilities(): Promise<void>;
  queryAnalogMapping(): Promise<void>;
  queryPinState(pin: number): Promise<void>;
  setSamplingInterval(intervalMs: number): Promise<void>;
  i2cConfig(delay: number): Promise<void>;
  i2cRead(address: number, size: number, register?: number): Promise<void>;
  i2cWrite(address: number, data: ArrayLike<number>): Promise<void>;
  readAndDecode(): Promise<MessageType>;
}

const HANDSHAKE_MESSAGES = [
  MessageType.ReportFirmware,
  MessageType.CapabilityResponse,
  MessageType.AnalogMappingResponse
] as const;

/**
 * A Firmata device behind a transport.
 *
 * Owns the transport and the device state. Instances only come from
 * `create`, which runs the handshake: there is no half-initialized board.
 */
export class FirmataBoard implements FirmataOperations {
  readonly state = new BoardState();
  private protocol = new FirmataProtocol();
  private decoder: FirmataDecoder;

  private constructor(
    private transport: Transport,
    private options: BoardOptions
  ) {
    this.decoder = new FirmataDecoder(transport, this.state);
  }

  static async create(transport: Transport, options: BoardOptions = {}): Promise<FirmataBoard> {
    const board = new FirmataBoard(transport, options);
    await board.initialize();
    return board;
  }

  get pins(): readonly Pin[] {
    return this.state.pins;
  }

  get protocolVersion(): string {
    return this.state.protocolVersion;
  }

  get firmwareName(): string {
    return this.state.firmwareName;
  }

  get firmwareVersion(): string {
    return this.state.firmwareVersion;
  }

  get i2cReplies(): readonly I2CReply[] {
    return this.state.i2cReplies;
  }

  takeI2CReply(): I2CReply | undefined {
    return this.state.takeI2CReply();
  }

  async close(): Promise<void> {
    await this.transport.close?.();
  }

  toString(): string {
    return `Board { firmware=${this.firmwareName}, version=${this.firmwareVersion}, protocol=${this.protocolVersion} }`;
  }

  async setPinMode(pin: number, mode: number): Promise<void> {
    return this.instrument('setPinMode', [pin, mode], async () => {
      this.state.getPin(pin);
      await this.write(this.protocol.setPinMode(pin, mode));
      this.state.setMode(pin, mode);
    });
  }

  /**
   * The wire protocol addresses whole ports, so the frame carries the stored
   * value of all eight pins in the target pin's port. The stored level is
   * restored if the frame cannot be written.
   */
  async digitalWrite(pin: number, level: number): Promise<void> {
    return this.instrument('digitalWrite', [pin, level], async () => {
      const previous = this.state.getPin(pin).value;
      this.state.setValue(pin, level);
      const port = Math.floor(pin / FIRMATA.PINS_PER_PORT);
      try {
        await this.write(this.protocol.digitalPort(port, this.state.portValue(port)));
      } catch (error) {
        this.state.setValue(pin, previous);
        throw error;
      }
    });
  }

  async analogWrite(pin: number, level: number): Promise<void> {
    return this.instrument('analogWrite', [pin, level], async () => {
      this.state.getPin(pin);
      await this.write(this.protocol.analog(pin, level));
      this.state.setValue(pin, level);
    });
  }

  async reportDigital(port: number, state: number): Promise<void> {
    return this.instrument('reportDigital', [port, state], async () => {
      assertNibble(port);
      await this.write(this.protocol.reportDigital(port, state));
    });
  }

  async reportAnalog(pin: number, state: number): Promise<void> {
    return this.instrument('reportAnalog', [pin, state], async () => {
      assertNibble(pin);
      await this.write(this.protocol.reportAnalog(pin, state));
    });
  }

  async queryFirmware(): Promise<void> {
    return this.instrument('queryFirmware', [], () => this.write(this.protocol.queryFirmware()));
  }

  async queryCapabilities(): Promise<void> {
    return this.instrument('queryCapabilities', [], () => this.write(this.protocol.queryCapabilities()));
  }

  async queryAnalogMapping(): Promise<void> {
    return this.instrument('queryAnalogMapping', [], () => this.write(this.protocol.queryAnalogMapping()));
  }

  async queryPinState(pin: number): Promise<void> {
    return this.instrument('queryPinState', [pin], async () => {
      this.state.getPin(pin);
      await this.write(this.protocol.queryPinState(pin));
    });
  }

  async setSamplingInterval(intervalMs: number): Promise<void> {
    return this.instrument('setSamplingInterval', [intervalMs], () =>
      this.write(this.protocol.samplingInterval(intervalMs))
    );
  }

  async i2cConfig(delay: number): Promise<void> {
    return this.instrument('i2cConfig', [delay], () => this.write(this.protocol.i2cConfig(delay)));
  }

  async i2cRead(address: number, size: number, register?: number): Promise<void> {
    return this.instrument('i2cRead', [address, size, register], () =>
      this.write(this.protocol.i2cRead(address, size, register))
    );
  }

  async i2cWrite(address: number, data: ArrayLike<number>): Promise<void> {
    return this.instrument('i2cWrite', [address, Array.from(data)], () =>
      this.write(this.protocol.i2cWrite(address, data))
    );
  }

  /** Read exactly one message from the device and apply it to the board state. */
  async readAndDecode(): Promise<MessageType> {
    return this.instrument('readAndDecode', [], () => this.decoder.readAndDecode());
  }

  /**
   * Query firmware, capabilities and analog mapping, then wait until all three
   * answers have arrived. The device may interleave other messages (version
   * reports, port updates) and answer in any order.
   */
  private async initialize(): Promise<void> {
    logger.info('Starting Firmata handshake');

    await this.queryFirmware();
    await this.queryCapabilities();
    await this.queryAnalogMapping();

    const pending = new Set<MessageType>(HANDSHAKE_MESSAGES);
    while (pending.size > 0) {
      const message = await this.readAndDecode();
      if (!pending.delete(message)) {
        logger.debug(`Ignoring ${message} during handshake`);
      }
    }

    for (const port of this.options.reportPorts ?? FIRMATA.INITIAL_REPORT_PORTS) {
      await this.reportDigital(port, 1);
    }

    logger.info(`Handshake complete: ${this.toString()} with ${this.state.pinCount} pins`);
  }

  private async write(data: Buffer): Promise<void> {
    try {
      await this.transport.write(data);
    } catch (error) {
      throw error instanceof IOError ? error : new IOError('Write failed', error);
    }
  }

  private async instrument<T>(operation: string, params: readonly unknown[], run: () => Promise<T>): Promise<T> {
    const hook = this.options.onOperation;
    if (!hook) {
      return run();
    }

    const startedAt = Date.now();
    try {
      const result = await run();
      hook({ operation, params, result, durationMs: Date.now() - startedAt });
      return result;
    } catch (error) {
      hook({
        operation,
        params,
        error: isError(error) ? error : new Error(String(error)),
        durationMs: Date.now() - startedAt
      });
      throw error;
    }
  }
}

function assertNibble(index: number): void {
  if (!Number.isInteger(index) || index < 0 || index > FIRMATA_PROTOCOL.MAX_NIBBLE_INDEX) {
    throw new PinOutOfBoundsError(index, FIRMATA_PROTOCOL.MAX_NIBBLE_INDEX + 1);
  }
}
