import { TextDecoder } from 'util';
import { MessageType } from '../../shared/types/firmata.types';
import type { Pin, PinCapability } from '../../shared/types/firmata.types';
import { FIRMATA } from '../../shared/constants';
import { BadByteError, IOError, MessageTooShortError, TextDecodeError, UnknownSysExError } from '../utils/errors';
import { logger } from '../utils/logger';
import { BoardState, createPinFromCapabilities } from './BoardState';
import { from7BitBytes } from './FirmataProtocol';
import type { Transport } from './transport';
import { FIRMATA_PROTOCOL, PinMode, SysExCommand, isInputMode } from './types';

const { START_SYSEX, END_SYSEX, DATA_MASK, PIN_TERMINATOR } = FIRMATA_PROTOCOL;

/** Address, register and at least one data byte, each as a 7-bit pair */
const I2C_REPLY_MIN_PAYLOAD = 6;

/**
 * Reads one Firmata message at a time from the transport and applies it to
 * the board state.
 *
 * The caller drives it: each `readAndDecode` consumes exactly one message.
 */
export class FirmataDecoder {
  /** Bytes already pulled from the transport that belong to the next message */
  private carry: Buffer = Buffer.alloc(0);
  private utf8 = new TextDecoder('utf-8', { fatal: true });

  constructor(
    private transport: Transport,
    private state: BoardState
  ) {}

  async readAndDecode(): Promise<MessageType> {
    const frame = await this.readFrame();
    return this.decodeFrame(frame);
  }

  /**
   * Read one complete message: three bytes for fixed-size messages, or
   * everything up to and including END_SYSEX for an extended frame.
   */
  async readFrame(): Promise<Buffer> {
    const head = await this.read(FIRMATA_PROTOCOL.FRAME_SIZE);
    if (head[0] !== START_SYSEX) {
      return head;
    }

    // A short SysEx can end inside the first read; keep what follows for the next message
    const end = head.indexOf(END_SYSEX, 1);
    if (end !== -1) {
      this.carry = Buffer.concat([head.subarray(end + 1), this.carry]);
      return head.subarray(0, end + 1);
    }

    const bytes = Array.from(head);
    for (;;) {
      const [byte] = await this.read(1);
      bytes.push(byte);
      if (byte === END_SYSEX) {
        return Buffer.from(bytes);
      }
    }
  }

  /**
   * Classify a complete frame and apply its payload to the board state.
   */
  decodeFrame(frame: Buffer): MessageType {
    const command = frame[0];

    if (command === FIRMATA_PROTOCOL.PROTOCOL_VERSION) {
      this.requireLength(frame, FIRMATA_PROTOCOL.FRAME_SIZE);
      this.state.protocolVersion = `${frame[1]}.${frame[2]}`;
      return MessageType.ProtocolVersion;
    }

    if (command >= FIRMATA_PROTOCOL.ANALOG_MESSAGE && command <= FIRMATA_PROTOCOL.ANALOG_MESSAGE_BOUND) {
      this.requireLength(frame, FIRMATA_PROTOCOL.FRAME_SIZE);
      this.applyAnalogValue(command & 0x0f, from7BitBytes([frame[1], frame[2]]));
      return MessageType.AnalogValue;
    }

    if (command >= FIRMATA_PROTOCOL.DIGITAL_MESSAGE && command <= FIRMATA_PROTOCOL.DIGITAL_MESSAGE_BOUND) {
      this.requireLength(frame, FIRMATA_PROTOCOL.FRAME_SIZE);
      this.applyDigitalPort(command & 0x0f, from7BitBytes([frame[1], frame[2]]));
      return MessageType.DigitalPort;
    }

    if (command === START_SYSEX) {
      return this.decodeSysEx(frame);
    }

    logger.warn(`Unexpected byte 0x${command.toString(16)} at start of message`);
    throw new BadByteError(command);
  }

  private decodeSysEx(frame: Buffer): MessageType {
    if (frame.length < 2 || frame[frame.length - 1] !== END_SYSEX) {
      throw new MessageTooShortError('SysEx frame is not terminated');
    }

    const sysexCommand = frame[1];
    if (sysexCommand === END_SYSEX) {
      return MessageType.EmptyResponse;
    }

    const payload = frame.subarray(2, frame.length - 1);

    switch (sysexCommand) {
      case SysExCommand.ANALOG_MAPPING_RESPONSE:
        this.applyAnalogMapping(payload);
        return MessageType.AnalogMappingResponse;

      case SysExCommand.CAPABILITY_RESPONSE:
        this.applyCapabilities(payload);
        return MessageType.CapabilityResponse;

      case SysExCommand.REPORT_FIRMWARE:
        this.applyFirmware(payload);
        return MessageType.ReportFirmware;

      case SysExCommand.I2C_REPLY:
        this.applyI2CReply(payload);
        return MessageType.I2CReply;

      case SysExCommand.PIN_STATE_RESPONSE:
        this.applyPinState(payload);
        return MessageType.PinStateResponse;

      default:
        logger.warn(`Unknown SysEx command 0x${sysexCommand.toString(16)} (${payload.length} payload bytes)`);
        throw new UnknownSysExError(sysexCommand);
    }
  }

  private applyAnalogValue(channel: number, value: number): void {
    const pin = channel + FIRMATA.ANALOG_PIN_OFFSET;
    // The device may report pins the host has not enumerated yet
    if (this.state.hasPin(pin)) {
      this.state.pins[pin].value = value;
    }
  }

  private applyDigitalPort(port: number, value: number): void {
    for (let i = 0; i < FIRMATA.PINS_PER_PORT; i++) {
      const pin = this.state.pins[FIRMATA.PINS_PER_PORT * port + i];
      // Bits for pins that are not inputs are dropped
      if (pin && isInputMode(pin.mode)) {
        pin.value = (value >> i) & 0x01;
      }
    }
  }

  private applyAnalogMapping(payload: Buffer): void {
    const upper = Math.min(payload.length, this.state.pinCount);
    for (let i = 0; i < upper; i++) {
      const channel = payload[i];
      if (channel === PIN_TERMINATOR) {
        continue;
      }

      const pin = this.state.pins[i];
      pin.analogChannel = channel;
      pin.mode = PinMode.ANALOG;
      pin.resolution = FIRMATA.DEFAULT_ANALOG_RESOLUTION;
      if (!pin.supportedModes.some(c => c.mode === PinMode.ANALOG)) {
        pin.supportedModes.push({ mode: PinMode.ANALOG, resolution: FIRMATA.DEFAULT_ANALOG_RESOLUTION });
      }
    }
  }

  private applyCapabilities(payload: Buffer): void {
    const pins: Pin[] = [];
    let capabilities: PinCapability[] = [];
    let i = 0;

    while (i < payload.length) {
      if (payload[i] === PIN_TERMINATOR) {
        pins.push(createPinFromCapabilities(capabilities));
        capabilities = [];
        i += 1;
        continue;
      }

      if (i + 1 >= payload.length) {
        throw new MessageTooShortError(`Capability for mode ${payload[i]} has no resolution`);
      }
      capabilities.push({ mode: payload[i], resolution: payload[i + 1] });
      i += 2;
    }

    if (capabilities.length > 0) {
      throw new MessageTooShortError('Capability response ends before the last pin is terminated');
    }

    this.state.replacePins(pins);
  }

  private applyFirmware(payload: Buffer): void {
    if (payload.length < 2) {
      throw new MessageTooShortError('Firmware report is missing its version');
    }

    const version = `${payload[0]}.${payload[1]}`;
    let name = this.state.firmwareName;
    if (payload.length > 2) {
      try {
        name = this.utf8.decode(payload.subarray(2));
      } catch (error) {
        throw new TextDecodeError(error);
      }
    }

    this.state.firmwareVersion = version;
    this.state.firmwareName = name;
  }

  private applyI2CReply(payload: Buffer): void {
    if (payload.length < I2C_REPLY_MIN_PAYLOAD) {
      throw new MessageTooShortError(`I2C reply has ${payload.length} payload bytes, expected at least ${I2C_REPLY_MIN_PAYLOAD}`);
    }

    const data: number[] = [];
    for (let i = 4; i + 1 < payload.length; i += 2) {
      data.push((payload[i] & DATA_MASK) | ((payload[i + 1] << 7) & 0xff));
    }

    this.state.pushI2CReply({
      address: from7BitBytes([payload[0], payload[1]]),
      register: from7BitBytes([payload[2], payload[3]]),
      data
    });
  }

  private applyPinState(payload: Buffer): void {
    if (payload.length === 0) {
      throw new MessageTooShortError('Pin state response is missing the pin');
    }

    // Pin only: the device has no state to report for it
    if (payload.length === 1 || !this.state.hasPin(payload[0])) {
      return;
    }

    this.state.setMode(payload[0], payload[1]);
    const stateBytes = payload.subarray(2);
    if (stateBytes.length > 0) {
      this.state.setValue(payload[0], from7BitBytes(stateBytes));
    }
  }

  private requireLength(frame: Buffer, length: number): void {
    if (frame.length < length) {
      throw new MessageTooShortError();
    }
  }

  private async read(length: number): Promise<Buffer> {
    const fromCarry = this.carry.subarray(0, length);
    this.carry = this.carry.subarray(fromCarry.length);
    if (fromCarry.length === length) {
      return Buffer.from(fromCarry);
    }

    let rest: Buffer;
    try {
      rest = await this.transport.read(length - fromCarry.length);
    } catch (error) {
      // Carried bytes still start the next message
      this.carry = Buffer.concat([fromCarry, this.carry]);
      throw error instanceof IOError ? error : new IOError('Read failed', error);
    }
    return Buffer.concat([fromCarry, rest]);
  }
}
