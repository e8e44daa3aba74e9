/**
 * Firmata Frame Factory — builds device-to-host frames for testing.
 *
 * Byte layouts match what a StandardFirmata device sends.
 */

import type { PinCapability } from '../../../shared/types/firmata.types';
import { FirmataBoard } from '../FirmataBoard';
import type { BoardOptions } from '../FirmataBoard';
import { FIRMATA_PROTOCOL, PinMode, SysExCommand } from '../types';
import type { MockTransport } from './MockTransport';

const { START_SYSEX, END_SYSEX, PIN_TERMINATOR } = FIRMATA_PROTOCOL;

// ─── Binary helpers ──────────────────────────────────────────────────

export function push7BitPair(arr: number[], value: number): void {
  arr.push(value & 0x7f, (value >> 7) & 0x7f);
}

// ─── Frame builders ─────────────────────────────────────────────────

export function buildSysEx(command: number, payload: number[] = []): Buffer {
  return Buffer.from([START_SYSEX, command, ...payload, END_SYSEX]);
}

export function buildProtocolVersion(major: number, minor: number): Buffer {
  return Buffer.from([FIRMATA_PROTOCOL.PROTOCOL_VERSION, major, minor]);
}

export function buildAnalogMessage(channel: number, value: number): Buffer {
  return Buffer.from([FIRMATA_PROTOCOL.ANALOG_MESSAGE | channel, value & 0x7f, (value >> 7) & 0x7f]);
}

export function buildDigitalMessage(port: number, value: number): Buffer {
  return Buffer.from([FIRMATA_PROTOCOL.DIGITAL_MESSAGE | port, value & 0x7f, (value >> 7) & 0x7f]);
}

export function buildCapabilityResponse(pins: PinCapability[][]): Buffer {
  const payload: number[] = [];
  for (const capabilities of pins) {
    for (const { mode, resolution } of capabilities) {
      payload.push(mode, resolution);
    }
    payload.push(PIN_TERMINATOR);
  }
  return buildSysEx(SysExCommand.CAPABILITY_RESPONSE, payload);
}

/** `null` marks a pin without an analog channel */
export function buildAnalogMappingResponse(channels: Array<number | null>): Buffer {
  return buildSysEx(
    SysExCommand.ANALOG_MAPPING_RESPONSE,
    channels.map(channel => channel ?? PIN_TERMINATOR)
  );
}

export function buildFirmwareReport(major: number, minor: number, name: string = ''): Buffer {
  return buildSysEx(SysExCommand.REPORT_FIRMWARE, [major, minor, ...Buffer.from(name, 'utf-8')]);
}

export function buildI2CReply(address: number, register: number, data: number[]): Buffer {
  const payload: number[] = [];
  push7BitPair(payload, address);
  push7BitPair(payload, register);
  for (const byte of data) {
    push7BitPair(payload, byte);
  }
  return buildSysEx(SysExCommand.I2C_REPLY, payload);
}

export function buildPinStateResponse(pin: number, mode?: number, stateBytes: number[] = []): Buffer {
  const payload = mode === undefined ? [pin] : [pin, mode, ...stateBytes];
  return buildSysEx(SysExCommand.PIN_STATE_RESPONSE, payload);
}

// ─── Test device ────────────────────────────────────────────────────

export const DIGITAL_CAPABILITIES: PinCapability[] = [
  { mode: PinMode.INPUT, resolution: 1 },
  { mode: PinMode.OUTPUT, resolution: 1 },
  { mode: PinMode.PWM, resolution: 8 }
];

export const ANALOG_CAPABILITIES: PinCapability[] = [
  { mode: PinMode.ANALOG, resolution: 10 },
  { mode: PinMode.INPUT, resolution: 1 },
  { mode: PinMode.OUTPUT, resolution: 1 }
];

export const TEST_FIRMWARE_NAME = 'TestFirmata.ino';

/** 14 digital device pins followed by 6 analog ones */
export function testDeviceCapabilities(): PinCapability[][] {
  return [
    ...Array.from({ length: 14 }, () => DIGITAL_CAPABILITIES),
    ...Array.from({ length: 6 }, () => ANALOG_CAPABILITIES)
  ];
}

/** Analog channels 0-5 reported for the last six device pins */
export function testDeviceAnalogMapping(): Array<number | null> {
  return [...Array.from({ length: 14 }, () => null), 0, 1, 2, 3, 4, 5];
}

/** Everything a device sends in answer to the handshake */
export function buildHandshakeFrames(): Buffer {
  return Buffer.concat([
    buildProtocolVersion(2, 5),
    buildFirmwareReport(2, 5, TEST_FIRMWARE_NAME),
    buildCapabilityResponse(testDeviceCapabilities()),
    buildAnalogMappingResponse(testDeviceAnalogMapping())
  ]);
}

/**
 * Run the handshake against scripted answers and return the ready board,
 * with the handshake's own writes cleared.
 */
export async function createTestBoard(transport: MockTransport, options: BoardOptions = {}): Promise<FirmataBoard> {
  transport.injectData(buildHandshakeFrames());
  const board = await FirmataBoard.create(transport, options);
  transport.clearWritten();
  return board;
}
