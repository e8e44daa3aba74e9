import { SerialPort } from 'serialport';
import type { PortInfo } from '../../shared/types/firmata.types';
import { FIRMATA } from '../../shared/constants';
import { IOError } from '../utils/errors';
import { logger } from '../utils/logger';
import { StreamTransport } from './StreamTransport';
import type { StreamTransportOptions } from './StreamTransport';

/**
 * Transport over a USB/UART serial port, 8N1 framing.
 */
export class SerialTransport extends StreamTransport {
  private constructor(
    private port: SerialPort,
    options: StreamTransportOptions
  ) {
    super(port, options);
  }

  static async open(
    portPath: string,
    baudRate: number = FIRMATA.DEFAULT_BAUD_RATE,
    options: StreamTransportOptions = {}
  ): Promise<SerialTransport> {
    return new Promise((resolve, reject) => {
      const port: SerialPort = new SerialPort({
        path: portPath,
        baudRate,
        dataBits: FIRMATA.DATA_BITS,
        stopBits: FIRMATA.STOP_BITS,
        parity: FIRMATA.PARITY
      }, (error) => {
        if (error) {
          reject(new IOError(`Failed to open ${portPath}`, error));
          return;
        }

        logger.info(`Connected to ${portPath} at ${baudRate} baud`);
        resolve(new SerialTransport(port, options));
      });
    });
  }

  static async listPorts(): Promise<PortInfo[]> {
    try {
      const ports = await SerialPort.list();
      logger.debug(`Found ${ports.length} serial ports`);
      return ports.map(port => ({
        path: port.path,
        manufacturer: port.manufacturer,
        serialNumber: port.serialNumber,
        pnpId: port.pnpId,
        locationId: port.locationId,
        productId: port.productId,
        vendorId: port.vendorId
      }));
    } catch (error) {
      logger.error('Failed to list ports:', error);
      throw new IOError('Failed to enumerate serial ports', error);
    }
  }

  get path(): string {
    return this.port.path;
  }

  async close(): Promise<void> {
    this.detach();
    this.fail(new IOError('Transport closed'));

    if (!this.port.isOpen) {
      return;
    }

    return new Promise((resolve, reject) => {
      this.port.close((error) => {
        if (error) {
          reject(new IOError('Failed to close port', error));
          return;
        }
        logger.info(`Disconnected from ${this.port.path}`);
        resolve();
      });
    });
  }
}
