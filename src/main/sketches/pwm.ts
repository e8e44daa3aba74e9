import { PinMode } from '../firmata/types';
import { delay } from '../firmata/backoff';
import type { FirmataBoard } from '../firmata/FirmataBoard';
import { loopCount, printIdentity } from './types';
import type { SketchOptions } from './types';

const PWM_PIN = 3;
const STEP = 5;
const MAX_DUTY = 255;

/** Ramp a PWM output up in steps, wrapping back to zero. */
export async function pwm(board: FirmataBoard, options: SketchOptions = {}): Promise<void> {
  const print = options.print ?? console.log;
  const interval = options.intervalMs ?? 500;
  printIdentity(board, print);

  await board.setPinMode(PWM_PIN, PinMode.PWM);
  await board.analogWrite(PWM_PIN, 0);

  for (const i of loopCount(options.iterations)) {
    const duty = (i * STEP) % MAX_DUTY;
    await board.analogWrite(PWM_PIN, duty);
    print(String(duty));
    await delay(interval);
  }
}
