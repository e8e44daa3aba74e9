import { FIRMATA_PROTOCOL, SysExCommand } from './types';

const { START_SYSEX, END_SYSEX, DATA_MASK } = FIRMATA_PROTOCOL;

/** Set on the I2C mode byte when the slave address needs more than 7 bits */
const I2C_10BIT_ADDRESS_MODE = 0x20;

/**
 * Split an integer into 7-bit groups, least significant first.
 * `minBytes` pads with zero groups so fixed-width fields keep their width.
 */
export function to7BitBytes(value: number, minBytes: number = 2): number[] {
  const bytes: number[] = [];
  let remaining = value;
  do {
    bytes.push(remaining & DATA_MASK);
    remaining = Math.floor(remaining / 128);
  } while (remaining > 0);

  while (bytes.length < minBytes) {
    bytes.push(0);
  }
  return bytes;
}

/** Reassemble an integer from 7-bit groups, least significant first. */
export function from7BitBytes(bytes: ArrayLike<number>): number {
  let value = 0;
  for (let i = bytes.length - 1; i >= 0; i--) {
    value = value * 128 + (bytes[i] & DATA_MASK);
  }
  return value;
}

/**
 * Encodes host-to-board Firmata messages.
 *
 * Every method is a pure mapping from parameters to the exact bytes to write.
 * Range checks against the pin list live in the board, which owns that state.
 */
export class FirmataProtocol {
  /** Wrap a SysEx payload in START/END markers */
  sysex(command: number, payload: number[] = []): Buffer {
    return Buffer.from([START_SYSEX, command, ...payload.map(b => b & DATA_MASK), END_SYSEX]);
  }

  setPinMode(pin: number, mode: number): Buffer {
    return Buffer.from([FIRMATA_PROTOCOL.SET_PIN_MODE, pin & DATA_MASK, mode & DATA_MASK]);
  }

  /** A whole 8-pin port: bit i carries pin `8 * port + i` */
  digitalPort(port: number, value: number): Buffer {
    return Buffer.from([
      FIRMATA_PROTOCOL.DIGITAL_MESSAGE | (port & FIRMATA_PROTOCOL.MAX_NIBBLE_INDEX),
      value & DATA_MASK,
      (value >> 7) & DATA_MASK
    ]);
  }

  /**
   * Analog/PWM/servo output.
   * The 3-byte frame only addresses pins 0-15 with 14-bit values; anything
   * beyond that goes out as an EXTENDED_ANALOG SysEx.
   */
  analog(pin: number, level: number): Buffer {
    if (pin > FIRMATA_PROTOCOL.MAX_NIBBLE_INDEX || level > FIRMATA_PROTOCOL.MAX_14BIT_VALUE) {
      return this.sysex(SysExCommand.EXTENDED_ANALOG, [pin, ...to7BitBytes(level)]);
    }

    return Buffer.from([
      FIRMATA_PROTOCOL.ANALOG_MESSAGE | pin,
      level & DATA_MASK,
      (level >> 7) & DATA_MASK
    ]);
  }

  reportDigital(port: number, state: number): Buffer {
    return Buffer.from([FIRMATA_PROTOCOL.REPORT_DIGITAL | port, state ? 1 : 0]);
  }

  reportAnalog(pin: number, state: number): Buffer {
    return Buffer.from([FIRMATA_PROTOCOL.REPORT_ANALOG | pin, state ? 1 : 0]);
  }

  queryFirmware(): Buffer {
    return this.sysex(SysExCommand.REPORT_FIRMWARE);
  }

  queryCapabilities(): Buffer {
    return this.sysex(SysExCommand.CAPABILITY_QUERY);
  }

  queryAnalogMapping(): Buffer {
    return this.sysex(SysExCommand.ANALOG_MAPPING_QUERY);
  }

  queryPinState(pin: number): Buffer {
    return this.sysex(SysExCommand.PIN_STATE_QUERY, [pin]);
  }

  samplingInterval(intervalMs: number): Buffer {
    return this.sysex(SysExCommand.SAMPLING_INTERVAL, to7BitBytes(intervalMs));
  }

  /** `delay` is in microseconds, between a register write and the matching read */
  i2cConfig(delay: number): Buffer {
    return this.sysex(SysExCommand.I2C_CONFIG, to7BitBytes(delay));
  }

  i2cRead(address: number, size: number, register?: number): Buffer {
    const payload = this.i2cHeader(address, FIRMATA_PROTOCOL.I2C_READ);
    if (register !== undefined) {
      payload.push(...to7BitBytes(register));
    }
    payload.push(...to7BitBytes(size));
    return this.sysex(SysExCommand.I2C_REQUEST, payload);
  }

  i2cWrite(address: number, data: ArrayLike<number>): Buffer {
    const payload = this.i2cHeader(address, FIRMATA_PROTOCOL.I2C_WRITE);
    for (let i = 0; i < data.length; i++) {
      payload.push(data[i] & DATA_MASK, (data[i] >> 7) & DATA_MASK);
    }
    return this.sysex(SysExCommand.I2C_REQUEST, payload);
  }

  private i2cHeader(address: number, mode: number): number[] {
    let modeByte = mode << FIRMATA_PROTOCOL.I2C_MODE_SHIFT;
    if (address > DATA_MASK) {
      modeByte |= I2C_10BIT_ADDRESS_MODE | ((address >> 7) & 0x07);
    }
    return [address & DATA_MASK, modeByte];
  }
}
