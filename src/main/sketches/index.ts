import { analog } from './analog';
import { blink } from './blink';
import { blinkm } from './blinkm';
import { button } from './button';
import { pwm } from './pwm';
import { servo } from './servo';
import type { Sketch } from './types';

export const SKETCHES: Record<string, Sketch> = {
  analog,
  blink,
  blinkm,
  button,
  pwm,
  servo
};

export type { Sketch, SketchOptions } from './types';
