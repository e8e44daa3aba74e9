import { PinMode } from '../firmata/types';
import { delay } from '../firmata/backoff';
import type { FirmataBoard } from '../firmata/FirmataBoard';
import { FIRMATA } from '../../shared/constants';
import { loopCount, printIdentity } from './types';
import type { SketchOptions } from './types';

/** A0 */
const ANALOG_PIN = FIRMATA.ANALOG_PIN_OFFSET;

export async function analog(board: FirmataBoard, options: SketchOptions = {}): Promise<void> {
  const print = options.print ?? console.log;
  const interval = options.intervalMs ?? 10;
  printIdentity(board, print);

  await board.setPinMode(ANALOG_PIN, PinMode.ANALOG);
  await board.reportAnalog(ANALOG_PIN - FIRMATA.ANALOG_PIN_OFFSET, 1);

  for (const _ of loopCount(options.iterations)) {
    await board.readAndDecode();
    print(`analog value: ${board.pins[ANALOG_PIN].value}`);
    await delay(interval);
  }
}
