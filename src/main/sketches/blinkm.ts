import { delay } from '../firmata/backoff';
import type { FirmataBoard } from '../firmata/FirmataBoard';
import type { I2CReply } from '../../shared/types/firmata.types';
import { MessageType } from '../../shared/types/firmata.types';
import { loopCount } from './types';
import type { SketchOptions } from './types';

const BLINKM_ADDRESS = 0x09;
const COLORS: ReadonlyArray<readonly [number, number, number]> = [
  [255, 0, 0],
  [0, 255, 0],
  [0, 0, 255]
];

const ascii = (command: string): number[] => Array.from(Buffer.from(command, 'ascii'));

/** Cycle a BlinkM RGB LED over I2C and read each color back. */
export async function blinkm(board: FirmataBoard, options: SketchOptions = {}): Promise<void> {
  const print = options.print ?? console.log;
  const interval = options.intervalMs ?? 1000;

  await board.i2cConfig(0);
  await board.i2cWrite(BLINKM_ADDRESS, ascii('o')); // stop the LED's own script

  for (const i of loopCount(options.iterations)) {
    await board.i2cWrite(BLINKM_ADDRESS, ascii('n'));
    await board.i2cWrite(BLINKM_ADDRESS, COLORS[i % COLORS.length]);
    await board.i2cWrite(BLINKM_ADDRESS, ascii('g'));
    await board.i2cRead(BLINKM_ADDRESS, 3);

    const reply = await readReply(board);
    print(`rgb: [${reply.data.join(', ')}]`);
    await delay(interval);
  }
}

/** Decode until an I2C reply is queued; other messages still update the board */
async function readReply(board: FirmataBoard): Promise<I2CReply> {
  for (;;) {
    const reply = board.takeI2CReply();
    if (reply) {
      return reply;
    }
    let message: MessageType;
    do {
      message = await board.readAndDecode();
    } while (message !== MessageType.I2CReply);
  }
}
