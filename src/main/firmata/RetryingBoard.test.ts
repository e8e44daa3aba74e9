import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RetryingBoard } from './RetryingBoard';
import { MessageType } from '../../shared/types/firmata.types';
import { AttemptsExceededError, IOError, PinOutOfBoundsError } from '../utils/errors';
import { logger } from '../utils/logger';
import { PinMode } from './types';
import { MockTransport } from './test/MockTransport';
import { TEST_FIRMWARE_NAME, buildHandshakeFrames, buildProtocolVersion, createTestBoard } from './test/firmataFrameFactory';

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const FAST_BACKOFF = { initialIntervalMs: 1, multiplier: 2, maxIntervalMs: 10 };

describe('RetryingBoard', () => {
  let transport: MockTransport;
  let sleeps: number[];
  const sleep = async (ms: number) => {
    sleeps.push(ms);
  };

  beforeEach(() => {
    vi.clearAllMocks();
    transport = new MockTransport();
    sleeps = [];
  });

  it('retries a failed write until it goes through', async () => {
    const retrying = new RetryingBoard(await createTestBoard(transport), FAST_BACKOFF, { sleep });
    transport.failWrites(2);

    await retrying.analogWrite(3, 200);

    expect(transport.getWrittenFrames()).toEqual([[0xe3, 72, 1]]);
    expect(sleeps).toEqual([1, 2]);
  });

  it('logs each retry', async () => {
    const retrying = new RetryingBoard(await createTestBoard(transport), FAST_BACKOFF, { sleep });
    transport.failWrites(1, new Error('EPIPE'));

    await retrying.setPinMode(13, PinMode.OUTPUT);

    expect(logger.warn).toHaveBeenCalledWith('setPinMode failed (attempt 1), retrying in 1ms: Write failed: EPIPE');
  });

  it('passes retries on to the caller hook', async () => {
    const onRetry = vi.fn();
    const retrying = new RetryingBoard(await createTestBoard(transport), FAST_BACKOFF, { sleep, onRetry });
    transport.failWrites(1);

    await retrying.queryFirmware();

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
    expect(onRetry.mock.calls[0][2]).toBeInstanceOf(IOError);
  });

  it('gives up once the attempts run out', async () => {
    const retrying = new RetryingBoard(await createTestBoard(transport), { ...FAST_BACKOFF, maxAttempts: 3 }, { sleep });
    transport.failWrites(5);

    const error = await retrying.i2cConfig(0).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AttemptsExceededError);
    expect(error).toHaveProperty('attempts', 3);
    expect(error).toHaveProperty('lastError.message', 'Write failed: Write failed');
  });

  it('retries errors that cannot succeed on retry', async () => {
    const retrying = new RetryingBoard(await createTestBoard(transport), { ...FAST_BACKOFF, maxAttempts: 2 }, { sleep });

    const error = await retrying.setPinMode(99, PinMode.OUTPUT).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AttemptsExceededError);
    expect(error).toHaveProperty('lastError');
    expect(error instanceof AttemptsExceededError && error.lastError).toBeInstanceOf(PinOutOfBoundsError);
  });

  it('reads past a malformed frame', async () => {
    const retrying = new RetryingBoard(await createTestBoard(transport), FAST_BACKOFF, { sleep });
    transport.injectData(Buffer.concat([Buffer.from([0x42, 0, 0]), buildProtocolVersion(2, 6)]));

    await expect(retrying.readAndDecode()).resolves.toBe(MessageType.ProtocolVersion);
    expect(retrying.board.protocolVersion).toBe('2.6');
    expect(sleeps).toEqual([1]);
  });

  it('forwards every operation to the board', async () => {
    const retrying = new RetryingBoard(await createTestBoard(transport), FAST_BACKOFF, { sleep });

    await retrying.digitalWrite(13, 1);
    await retrying.reportDigital(0, 1);
    await retrying.reportAnalog(1, 1);
    await retrying.queryCapabilities();
    await retrying.queryAnalogMapping();
    await retrying.queryPinState(2);
    await retrying.setSamplingInterval(50);
    await retrying.i2cRead(9, 3);
    await retrying.i2cWrite(9, [0x6f]);

    expect(transport.getWrittenFrames()).toEqual([
      [0x91, 0x20, 0x00],
      [0xd0, 0x01],
      [0xc1, 0x01],
      [0xf0, 0x6b, 0xf7],
      [0xf0, 0x69, 0xf7],
      [0xf0, 0x6d, 2, 0xf7],
      [0xf0, 0x7a, 50, 0, 0xf7],
      [0xf0, 0x76, 9, 0x08, 3, 0, 0xf7],
      [0xf0, 0x76, 9, 0x00, 0x6f, 0, 0xf7]
    ]);
    expect(sleeps).toEqual([]);
  });

  describe('create', () => {
    it('retries the whole handshake', async () => {
      transport.failWrites(1);
      transport.injectData(buildHandshakeFrames());

      const retrying = await RetryingBoard.create(transport, { backoff: FAST_BACKOFF }, { sleep });

      expect(retrying.board.firmwareName).toBe(TEST_FIRMWARE_NAME);
      expect(sleeps).toEqual([1]);
      expect(logger.warn).toHaveBeenCalledWith(
        'create failed (attempt 1), retrying in 1ms: Write failed: Write failed'
      );
    });

    it('keeps the backoff for later operations', async () => {
      transport.injectData(buildHandshakeFrames());
      const retrying = await RetryingBoard.create(transport, { backoff: { ...FAST_BACKOFF, maxAttempts: 1 } }, { sleep });
      transport.failWrites(1);

      await expect(retrying.queryFirmware()).rejects.toBeInstanceOf(AttemptsExceededError);
    });
  });
});
