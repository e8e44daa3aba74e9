import { PinMode } from '../firmata/types';
import { delay } from '../firmata/backoff';
import type { FirmataBoard } from '../firmata/FirmataBoard';
import { loopCount, printIdentity } from './types';
import type { SketchOptions } from './types';

const SERVO_PIN = 3;
const SWEEP_DEGREES = 180;

export async function servo(board: FirmataBoard, options: SketchOptions = {}): Promise<void> {
  const print = options.print ?? console.log;
  const interval = options.intervalMs ?? 10;
  printIdentity(board, print);

  await board.setPinMode(SERVO_PIN, PinMode.SERVO);

  for (const i of loopCount(options.iterations)) {
    const angle = i % SWEEP_DEGREES;
    await board.analogWrite(SERVO_PIN, angle);
    print(String(angle));
    await delay(interval);
  }
}
