#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { APP_VERSION, FIRMATA } from '../shared/constants';
import { FirmataBoard } from './firmata/FirmataBoard';
import { RetryingBoard } from './firmata/RetryingBoard';
import { SerialTransport } from './firmata/SerialTransport';
import { SKETCHES } from './sketches';
import { getErrorMessage } from './utils/errors';
import { logger } from './utils/logger';

export interface CliOptions {
  port?: string;
  baud: number;
  list?: boolean;
  retry?: boolean;
}

type Print = (line: string) => void;

function parseBaudRate(value: string): number {
  const baud = Number(value);
  if (!Number.isInteger(baud) || baud <= 0) {
    throw new InvalidArgumentError(`Invalid baud rate: ${value}`);
  }
  return baud;
}

export async function listPorts(print: Print = console.log): Promise<void> {
  const ports = await SerialTransport.listPorts();
  if (ports.length === 0) {
    print('No serial ports found');
    return;
  }
  for (const port of ports) {
    print(`${port.path} - ${port.manufacturer ?? 'Unknown'} (VID: ${port.vendorId ?? '-'}, PID: ${port.productId ?? '-'})`);
  }
}

export async function runSketch(name: string, options: CliOptions): Promise<void> {
  const sketch = SKETCHES[name];
  if (!sketch) {
    throw new Error(`Unknown sketch "${name}". Available: ${Object.keys(SKETCHES).join(', ')}`);
  }
  if (!options.port) {
    throw new Error('No port given. Use --port, or --list to see available ports.');
  }

  const transport = await SerialTransport.open(options.port, options.baud);
  try {
    const board = options.retry
      ? (await RetryingBoard.create(transport)).board
      : await FirmataBoard.create(transport);
    logger.info(`Running ${name} on ${board.toString()}`);
    await sketch(board);
  } finally {
    await transport.close();
  }
}

export function createProgram(
  actions: { list: typeof listPorts; run: typeof runSketch } = { list: listPorts, run: runSketch }
): Command {
  return new Command()
    .name('firmata-host')
    .description('Drive a Firmata device over a serial port')
    .version(APP_VERSION)
    .argument('[sketch]', `sketch to run: ${Object.keys(SKETCHES).join(', ')}`)
    .option('-p, --port <path>', 'serial port path')
    .option('-b, --baud <rate>', 'baud rate', parseBaudRate, FIRMATA.DEFAULT_BAUD_RATE)
    .option('-l, --list', 'list available serial ports')
    .option('--retry', 'retry the handshake with exponential backoff')
    .action(async (sketch: string | undefined, options: CliOptions) => {
      if (options.list || !sketch) {
        await actions.list();
        return;
      }
      await actions.run(sketch, options);
    });
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logger.error(getErrorMessage(error));
      process.exitCode = 1;
    });
}
