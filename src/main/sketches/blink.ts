import { PinMode } from '../firmata/types';
import { delay } from '../firmata/backoff';
import type { FirmataBoard } from '../firmata/FirmataBoard';
import { loopCount, printIdentity } from './types';
import type { SketchOptions } from './types';

const LED_PIN = 13;

export async function blink(board: FirmataBoard, options: SketchOptions = {}): Promise<void> {
  const print = options.print ?? console.log;
  const interval = options.intervalMs ?? 1000;
  printIdentity(board, print);

  await board.setPinMode(LED_PIN, PinMode.OUTPUT);

  let level = 0;
  for (const _ of loopCount(options.iterations)) {
    level ^= 1;
    await board.digitalWrite(LED_PIN, level);
    print(level ? 'on' : 'off');
    await delay(interval);
  }
}
