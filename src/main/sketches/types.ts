import type { FirmataBoard } from '../firmata/FirmataBoard';

export interface SketchOptions {
  /** Stop after this many loop iterations. Runs forever by default. */
  iterations?: number;
  /** Pause between iterations, overriding the sketch's own pacing */
  intervalMs?: number;
  /** Receives the lines a sketch prints */
  print?: (line: string) => void;
}

export type Sketch = (board: FirmataBoard, options?: SketchOptions) => Promise<void>;

export function* loopCount(iterations: number = Infinity): Generator<number> {
  for (let i = 0; i < iterations; i++) {
    yield i;
  }
}

export function printIdentity(board: FirmataBoard, print: (line: string) => void): void {
  print(`firmware version ${board.firmwareVersion}`);
  print(`firmware name ${board.firmwareName}`);
  print(`protocol version ${board.protocolVersion}`);
}
