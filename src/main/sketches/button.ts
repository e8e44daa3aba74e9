import { PinMode } from '../firmata/types';
import { delay } from '../firmata/backoff';
import type { FirmataBoard } from '../firmata/FirmataBoard';
import { loopCount, printIdentity } from './types';
import type { SketchOptions } from './types';

const LED_PIN = 13;
const BUTTON_PIN = 2;

/** Mirror a push button on the LED, driven by digital port reports. */
export async function button(board: FirmataBoard, options: SketchOptions = {}): Promise<void> {
  const print = options.print ?? console.log;
  const interval = options.intervalMs ?? 100;
  printIdentity(board, print);

  await board.setPinMode(LED_PIN, PinMode.OUTPUT);
  await board.setPinMode(BUTTON_PIN, PinMode.INPUT);
  await board.reportDigital(0, 1);

  for (const _ of loopCount(options.iterations)) {
    await board.readAndDecode();
    const pressed = board.pins[BUTTON_PIN].value !== 0;
    print(pressed ? 'on' : 'off');
    await board.digitalWrite(LED_PIN, pressed ? 1 : 0);
    await delay(interval);
  }
}
