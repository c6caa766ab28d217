import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { DataAcquisitionClient, Display } from '../../shared/types/index.js';
import type { Clock } from '../../shared/utils/timer.js';
import { TaskParameterError } from '../../shared/errors.js';

vi.mock('../../shared/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn(), task: vi.fn(),
  }),
}));

import { RsvpCalibrationTask } from './calibration.js';

// Each reading advances half a second
const createSteppingClock = (): Clock => {
  let time = 0;
  return {
    reset: () => { time = 0; },
    getTime: () => {
      const current = time;
      time += 0.5;
      return current;
    },
  };
};

const createFakeDaq = (): DataAcquisitionClient => ({
  deviceName: 'FakeDevice',
  sampleRate: 300,
  startAcquisition: vi.fn(async () => {}),
  stopAcquisition: vi.fn(async () => {}),
  getDataLength: vi.fn(() => 42),
  getData: vi.fn(() => []),
  markCalibration: vi.fn(() => 0.25),
});

const createFakeDisplay = (): Display => ({
  present: vi.fn(async () => {}),
  showText: vi.fn(async () => {}),
  clear: vi.fn(async () => {}),
});

const taskType = { mode: 'RSVP', experimentType: 'Calibration' } as const;
const parameters = {
  alphabet: ['A', 'B', 'C', 'D'],
  stim_number: 2,
  stim_length: 3,
  time_target: 0.5,
  time_cross: 0.25,
  time_flash: 0.125,
};

describe('RsvpCalibrationTask', () => {
  let saveRoot: string;
  let daq: DataAcquisitionClient;
  let display: Display;

  beforeEach(async () => {
    saveRoot = await mkdtemp(join(tmpdir(), 'bci-calibration-'));
    daq = createFakeDaq();
    display = createFakeDisplay();
  });

  afterEach(async () => {
    await rm(saveRoot, { recursive: true, force: true });
  });

  const createTask = (overrides: Record<string, unknown> = {}, path = join(saveRoot, 'session')) =>
    new RsvpCalibrationTask(daq, display, taskType, { ...parameters, ...overrides }, path, {
      clock: createSteppingClock(),
      random: () => 0,
    });

  it('presents every inquiry with prompt, fixation and symbols', async () => {
    await createTask().execute();

    expect(display.present).toHaveBeenCalledTimes(10);
    expect(display.present).toHaveBeenNthCalledWith(1, { symbol: 'A', kind: 'prompt', durationMs: 500 });
    expect(display.present).toHaveBeenNthCalledWith(2, { symbol: '+', kind: 'fixation', durationMs: 250 });
    expect(display.present).toHaveBeenNthCalledWith(3, { symbol: 'A', kind: 'symbol', durationMs: 125 });
    expect(display.present).toHaveBeenNthCalledWith(5, { symbol: 'C', kind: 'symbol', durationMs: 125 });
    expect(display.clear).toHaveBeenCalledTimes(1);
  });

  it('starts and stops acquisition once', async () => {
    await createTask().execute();
    expect(daq.startAcquisition).toHaveBeenCalledTimes(1);
    expect(daq.stopAcquisition).toHaveBeenCalledTimes(1);
  });

  it('writes the trigger log', async () => {
    const path = join(saveRoot, 'session');
    await createTask({}, path).execute();

    const content = await readFile(join(path, 'triggers.txt'), 'utf-8');
    expect(content).toBe([
      'calibration_trigger calib 0.0000',
      'A first_pres_target 0.5000',
      '+ fixation 1.0000',
      'A target 1.5000',
      'B nontarget 2.0000',
      'C nontarget 2.5000',
      'A first_pres_target 3.0000',
      '+ fixation 3.5000',
      'A target 4.0000',
      'B nontarget 4.5000',
      'C nontarget 5.0000',
      '',
    ].join('\n'));
  });

  it('returns and saves the session summary', async () => {
    const path = join(saveRoot, 'nested', 'session');
    const summary = await createTask({}, path).execute();

    expect(summary.kind).toBe('calibration');
    expect(summary.label).toBe('RSVP Calibration');
    expect(summary.fileSavePath).toBe(path);
    expect(summary.samplesAcquired).toBe(42);
    expect(summary.calibrationOffset).toBe(0.25);
    expect(summary.sessionId).toHaveLength(10);
    expect(summary.inquiries).toEqual([
      { index: 0, target: 'A', symbols: ['A', 'B', 'C'] },
      { index: 1, target: 'A', symbols: ['A', 'B', 'C'] },
    ]);

    const saved: unknown = JSON.parse(await readFile(join(path, 'session.json'), 'utf-8'));
    expect(saved).toEqual(summary);
  });

  it('emits inquiry and completion events', async () => {
    const task = createTask();
    const started = vi.fn();
    const completed = vi.fn();
    task.on('inquiry:start', started);
    task.on('complete', completed);

    const summary = await task.execute();

    expect(started).toHaveBeenCalledTimes(2);
    expect(completed).toHaveBeenCalledWith(summary);
  });

  it('accepts numeric options written as strings', async () => {
    const summary = await createTask({ stim_number: '1' }).execute();
    expect(summary.inquiries).toHaveLength(1);
  });

  it('rejects invalid parameters before touching the handles', () => {
    try {
      createTask({ stim_length: 5 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TaskParameterError);
      if (error instanceof TaskParameterError) {
        expect(error.issues).toEqual(['stim_length: stim_length cannot exceed the alphabet size']);
      }
    }
    expect(daq.startAcquisition).not.toHaveBeenCalled();
  });

  it('marks calibration on the acquisition client once', async () => {
    await createTask().execute();
    expect(daq.markCalibration).toHaveBeenCalledTimes(1);
  });

  it('rejects an alphabet with repeated symbols', () => {
    try {
      createTask({ alphabet: ['A', 'A', 'B'], stim_length: 3 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TaskParameterError);
      if (error instanceof TaskParameterError) {
        expect(error.issues).toEqual(['alphabet: symbols must be unique (repeated: A)']);
      }
    }
    expect(daq.startAcquisition).not.toHaveBeenCalled();
  });

  it('keeps the session error when releasing the handles also fails', async () => {
    vi.mocked(display.present).mockRejectedValueOnce(new Error('window closed'));
    vi.mocked(daq.stopAcquisition).mockRejectedValueOnce(new Error('amplifier offline'));

    await expect(createTask().execute()).rejects.toThrow('window closed');
    expect(display.clear).toHaveBeenCalledTimes(1);
  });

  it('clears the display and reports the failure when acquisition cannot stop', async () => {
    vi.mocked(daq.stopAcquisition).mockRejectedValueOnce(new Error('amplifier offline'));

    await expect(createTask().execute()).rejects.toThrow('amplifier offline');
    expect(display.clear).toHaveBeenCalledTimes(1);
  });

  it('stops acquisition when the display fails', async () => {
    vi.mocked(display.present).mockRejectedValueOnce(new Error('window closed'));

    await expect(createTask().execute()).rejects.toThrow('window closed');
    expect(daq.stopAcquisition).toHaveBeenCalledTimes(1);
    expect(display.clear).toHaveBeenCalledTimes(1);
  });
});
