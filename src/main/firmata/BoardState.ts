import type { DeviceIdentity, I2CReply, Pin, PinCapability } from '../../shared/types/firmata.types';
import { FIRMATA } from '../../shared/constants';
import { PinOutOfBoundsError } from '../utils/errors';
import { PinMode } from './types';

export function createDefaultPin(): Pin {
  return {
    mode: PinMode.ANALOG,
    resolution: FIRMATA.DEFAULT_ANALOG_RESOLUTION,
    supportedModes: [{ mode: PinMode.ANALOG, resolution: FIRMATA.DEFAULT_ANALOG_RESOLUTION }],
    value: 0
  };
}

/**
 * Pin from a capability response: active mode and resolution follow
 * the first capability listed. A pin with no capabilities (e.g. one reserved
 * for the serial link) gets the analog default.
 */
export function createPinFromCapabilities(capabilities: PinCapability[]): Pin {
  const [first] = capabilities;
  if (!first) {
    return createDefaultPin();
  }
  return {
    mode: first.mode,
    resolution: first.resolution,
    supportedModes: capabilities.map(capability => ({ ...capability })),
    value: 0
  };
}

/**
 * Everything the host knows about the device.
 *
 * Mutated by the decoder (status messages) and by the board once a command
 * has been written. Not synchronized: callers serialize access.
 */
export class BoardState implements DeviceIdentity {
  pins: Pin[] = [];
  i2cReplies: I2CReply[] = [];
  protocolVersion = '';
  firmwareName = '';
  firmwareVersion = '';

  get pinCount(): number {
    return this.pins.length;
  }

  hasPin(pin: number): boolean {
    return Number.isInteger(pin) && pin >= 0 && pin < this.pins.length;
  }

  getPin(pin: number): Pin {
    if (!this.hasPin(pin)) {
      throw new PinOutOfBoundsError(pin, this.pins.length);
    }
    return this.pins[pin];
  }

  /** Replace the pin list wholesale, slot 0 being the unused placeholder */
  replacePins(pins: Pin[]): void {
    this.pins = [createDefaultPin(), ...pins];
  }

  /**
   * The active mode is always one of the supported modes: a mode the pin
   * did not list is added at the pin's current resolution.
   */
  setMode(pin: number, mode: number): void {
    const target = this.getPin(pin);
    let capability = target.supportedModes.find(c => c.mode === mode);
    if (!capability) {
      capability = { mode, resolution: target.resolution };
      target.supportedModes.push(capability);
    }
    target.mode = mode;
    target.resolution = capability.resolution;
  }

  setValue(pin: number, value: number): void {
    this.getPin(pin).value = value;
  }

  /** OR of every existing pin in the port, bit i set when pin `8 * port + i` is non-zero */
  portValue(port: number): number {
    let value = 0;
    for (let i = 0; i < FIRMATA.PINS_PER_PORT; i++) {
      const pin = this.pins[FIRMATA.PINS_PER_PORT * port + i];
      if (pin && pin.value !== 0) {
        value |= 1 << i;
      }
    }
    return value;
  }

  pushI2CReply(reply: I2CReply): void {
    this.i2cReplies.push(reply);
  }

  /** Remove and return the oldest queued reply */
  takeI2CReply(): I2CReply | undefined {
    return this.i2cReplies.shift();
  }
}
