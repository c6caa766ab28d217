import type { AcquisitionRecord, DataAcquisitionClient } from '../shared/types/index.js';
import { createLogger } from '../shared/utils/logger.js';

const log = createLogger('Acquisition');

export interface SimulatedAcquisitionOptions {
  deviceName?: string;
  sampleRate?: number;     // Hz
  channels?: string[];
  packetIntervalMs?: number;
  random?: () => number;
}

/**
 * Stand-in amplifier: while streaming, appends a packet of noise samples
 * to an in-memory buffer every `packetIntervalMs`.
 */
export class SimulatedAcquisitionClient implements DataAcquisitionClient {
  readonly deviceName: string;
  readonly sampleRate: number;
  readonly channels: string[];

  private readonly packetIntervalMs: number;
  private readonly random: () => number;
  private buffer: AcquisitionRecord[] = [];
  private timer: NodeJS.Timeout | null = null;
  private sampleCount = 0;
  private calibrationOffset: number | null = null;

  constructor(options: SimulatedAcquisitionOptions = {}) {
    this.deviceName = options.deviceName ?? 'Simulated';
    this.sampleRate = options.sampleRate ?? 300;
    this.channels = options.channels ?? ['Fz', 'Cz', 'Pz', 'Oz', 'TRG'];
    this.packetIntervalMs = options.packetIntervalMs ?? 100;
    this.random = options.random ?? Math.random;
  }

  get isStreaming(): boolean {
    return this.timer !== null;
  }

  async startAcquisition(): Promise<void> {
    if (this.timer) return;

    log.debug('Starting acquisition', { device: this.deviceName, sampleRate: this.sampleRate });
    this.sampleCount = 0;
    this.calibrationOffset = null;
    this.buffer = [];
    this.timer = setInterval(() => this.readPacket(), this.packetIntervalMs);
  }

  async stopAcquisition(): Promise<void> {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
    log.debug('Stopped acquisition', { device: this.deviceName, samples: this.buffer.length });
  }

  getDataLength(): number {
    return this.buffer.length;
  }

  // Offset of the last calibration mark, or null when none was made this run
  get offset(): number | null {
    return this.calibrationOffset;
  }

  markCalibration(): number {
    if (!this.timer) {
      throw new Error(`Cannot mark calibration on ${this.deviceName} before acquisition starts`);
    }
    this.calibrationOffset = this.sampleCount / this.sampleRate;
    log.debug('Calibration marked', { device: this.deviceName, offset: this.calibrationOffset });
    return this.calibrationOffset;
  }

  getData(start?: number, end?: number): AcquisitionRecord[] {
    if (start === undefined) return [...this.buffer];
    return this.buffer.filter(record =>
      record.timestamp >= start && (end === undefined || record.timestamp <= end)
    );
  }

  cleanup(): void {
    this.buffer = [];
  }

  private readPacket(): void {
    const samples = Math.max(1, Math.round(this.sampleRate * this.packetIntervalMs / 1000));
    for (let i = 0; i < samples; i++) {
      this.buffer.push({
        data: this.channels.map(() => this.random() * 2 - 1),
        timestamp: this.sampleCount / this.sampleRate,
      });
      this.sampleCount++;
    }
  }
}
