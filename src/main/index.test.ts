import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Command } from 'commander';

vi.mock('serialport', () => ({
  SerialPort: { list: vi.fn() },
}));

vi.mock('./utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

// Import after mocks are set up
import { SerialPort } from 'serialport';
import { createProgram, listPorts, runSketch } from './index';

describe('firmata-host CLI', () => {
  const list = vi.fn(async () => {});
  const run = vi.fn(async () => {});
  let program: Command;

  beforeEach(() => {
    vi.clearAllMocks();
    program = createProgram({ list, run })
      .exitOverride()
      .configureOutput({ writeOut: () => {}, writeErr: () => {} });
  });

  // ─── Argument parsing ──────────────────────────────────────

  it('runs the named sketch with the default baud rate', async () => {
    await program.parseAsync(['blink', '--port', '/dev/ttyACM0'], { from: 'user' });

    expect(run).toHaveBeenCalledWith('blink', { port: '/dev/ttyACM0', baud: 57600 });
    expect(list).not.toHaveBeenCalled();
  });

  it('parses the baud rate', async () => {
    await program.parseAsync(['pwm', '-p', '/dev/ttyUSB0', '-b', '115200'], { from: 'user' });

    expect(run).toHaveBeenCalledWith('pwm', { port: '/dev/ttyUSB0', baud: 115200 });
  });

  it('passes --retry through', async () => {
    await program.parseAsync(['servo', '-p', '/dev/ttyUSB0', '--retry'], { from: 'user' });

    expect(run).toHaveBeenCalledWith('servo', { port: '/dev/ttyUSB0', baud: 57600, retry: true });
  });

  it('rejects a baud rate that is not a positive integer', async () => {
    await expect(
      program.parseAsync(['blink', '-p', '/dev/ttyACM0', '--baud', 'fast'], { from: 'user' })
    ).rejects.toThrow('Invalid baud rate: fast');
    expect(run).not.toHaveBeenCalled();
  });

  it('lists ports with --list', async () => {
    await program.parseAsync(['blink', '--list'], { from: 'user' });

    expect(list).toHaveBeenCalledTimes(1);
    expect(run).not.toHaveBeenCalled();
  });

  it('lists ports when no sketch is named', async () => {
    await program.parseAsync([], { from: 'user' });

    expect(list).toHaveBeenCalledTimes(1);
  });

  // ─── Actions ───────────────────────────────────────────────

  describe('listPorts', () => {
    it('prints one line per port', async () => {
      vi.mocked(SerialPort.list).mockResolvedValue([
        {
          path: '/dev/ttyACM0',
          manufacturer: 'Arduino',
          serialNumber: undefined,
          pnpId: undefined,
          locationId: undefined,
          productId: '0043',
          vendorId: '2341'
        },
        {
          path: '/dev/ttyS0',
          manufacturer: undefined,
          serialNumber: undefined,
          pnpId: undefined,
          locationId: undefined,
          productId: undefined,
          vendorId: undefined
        }
      ]);
      const lines: string[] = [];

      await listPorts(line => lines.push(line));

      expect(lines).toEqual([
        '/dev/ttyACM0 - Arduino (VID: 2341, PID: 0043)',
        '/dev/ttyS0 - Unknown (VID: -, PID: -)'
      ]);
    });

    it('says so when there are no ports', async () => {
      vi.mocked(SerialPort.list).mockResolvedValue([]);
      const lines: string[] = [];

      await listPorts(line => lines.push(line));

      expect(lines).toEqual(['No serial ports found']);
    });
  });

  describe('runSketch', () => {
    it('rejects an unknown sketch', async () => {
      await expect(runSketch('dance', { port: '/dev/ttyACM0', baud: 57600 })).rejects.toThrow(
        'Unknown sketch "dance". Available: analog, blink, blinkm, button, pwm, servo'
      );
    });

    it('requires a port', async () => {
      await expect(runSketch('blink', { baud: 57600 })).rejects.toThrow('No port given');
    });
  });
});
