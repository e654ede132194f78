import type { RandomColorSource } from '../../core/image/ImageCodecPort';

export const COLORIZE_CHANNEL_MIN = 32;
export const COLORIZE_CHANNEL_MAX = 224;
export const COLORIZE_CHANNEL_STEP = 24;

const CHANNEL_VALUE_COUNT = (COLORIZE_CHANNEL_MAX - COLORIZE_CHANNEL_MIN) / COLORIZE_CHANNEL_STEP + 1;

export function isColorizeChannel(value: number): boolean {
  return (
    Number.isInteger(value) &&
    value >= COLORIZE_CHANNEL_MIN &&
    value <= COLORIZE_CHANNEL_MAX &&
    (value - COLORIZE_CHANNEL_MIN) % COLORIZE_CHANNEL_STEP === 0
  );
}

/**
 * Uniform draw over 32, 56, ..., 224 backed by Math.random.
 */
export class MathRandomColorSource implements RandomColorSource {
  constructor(private readonly random: () => number = Math.random) {}

  nextChannelValue(): number {
    const index = Math.min(Math.floor(this.random() * CHANNEL_VALUE_COUNT), CHANNEL_VALUE_COUNT - 1);
    return COLORIZE_CHANNEL_MIN + index * COLORIZE_CHANNEL_STEP;
  }
}
