export interface PortInfo {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
  pnpId?: string;
  locationId?: string;
  productId?: string;
  vendorId?: string;
}

/** One way a pin can be configured: a mode and the bit resolution it runs at. */
export interface PinCapability {
  mode: number;
  resolution: number;
}

export interface Pin {
  /** Currently configured mode */
  mode: number;
  /** Bit resolution of the active mode */
  resolution: number;
  /** Modes the pin accepts, in the order the device reported them */
  supportedModes: PinCapability[];
  /** Last reported or last commanded value */
  value: number;
  /** Analog channel from the analog mapping response, if the pin has one */
  analogChannel?: number;
}

export interface I2CReply {
  address: number;
  register: number;
  data: number[];
}

export interface DeviceIdentity {
  protocolVersion: string;
  firmwareName: string;
  firmwareVersion: string;
}

/** What a single `readAndDecode` call just consumed. Payloads land in the board state. */
export enum MessageType {
  ProtocolVersion = 'protocol-version',
  AnalogValue = 'analog-value-update',
  DigitalPort = 'digital-port-update',
  ReportFirmware = 'report-firmware',
  CapabilityResponse = 'capability-response',
  AnalogMappingResponse = 'analog-mapping-response',
  PinStateResponse = 'pin-state-response',
  I2CReply = 'i2c-reply',
  EmptyResponse = 'empty-response'
}

export interface OperationEvent {
  operation: string;
  params: readonly unknown[];
  durationMs: number;
  result?: unknown;
  error?: Error;
}

export type OperationHook = (event: OperationEvent) => void;
