export enum PinMode {
  INPUT = 0x00,
  OUTPUT = 0x01,
  ANALOG = 0x02,
  PWM = 0x03,
  SERVO = 0x04,
  I2C = 0x06,
  ONEWIRE = 0x07,
  STEPPER = 0x08,
  ENCODER = 0x09,
  INPUT_PULLUP = 0x0b
}

export enum SysExCommand {
  ANALOG_MAPPING_QUERY = 0x69,
  ANALOG_MAPPING_RESPONSE = 0x6a,
  CAPABILITY_QUERY = 0x6b,
  CAPABILITY_RESPONSE = 0x6c,
  PIN_STATE_QUERY = 0x6d,
  PIN_STATE_RESPONSE = 0x6e,
  EXTENDED_ANALOG = 0x6f,
  I2C_REQUEST = 0x76,
  I2C_REPLY = 0x77,
  I2C_CONFIG = 0x78,
  REPORT_FIRMWARE = 0x79,
  SAMPLING_INTERVAL = 0x7a
}

export const FIRMATA_PROTOCOL = {
  DIGITAL_MESSAGE: 0x90,
  DIGITAL_MESSAGE_BOUND: 0x9f,
  ANALOG_MESSAGE: 0xe0,
  ANALOG_MESSAGE_BOUND: 0xef,
  REPORT_ANALOG: 0xc0,
  REPORT_DIGITAL: 0xd0,
  SET_PIN_MODE: 0xf4,
  PROTOCOL_VERSION: 0xf9, // a.k.a. REPORT_VERSION
  START_SYSEX: 0xf0,
  END_SYSEX: 0xf7,
  /** Every in-frame data byte keeps its top bit clear */
  DATA_MASK: 0x7f,
  /** Ends one pin's capability list; also "no analog channel" in the analog mapping */
  PIN_TERMINATOR: 0x7f,
  I2C_WRITE: 0x00,
  I2C_READ: 0x01,
  I2C_MODE_SHIFT: 3,
  /** Standard frames carry the pin/port in the low nibble of the command byte */
  MAX_NIBBLE_INDEX: 0x0f,
  MAX_14BIT_VALUE: 0x3fff,
  /** Fixed-size frames are three bytes long */
  FRAME_SIZE: 3
} as const;

export function isInputMode(mode: number): boolean {
  return mode === PinMode.INPUT || mode === PinMode.INPUT_PULLUP;
}
