// BCI Task Dispatch - Core Type Definitions

// ============================================================================
// PARAMETERS
// ============================================================================

// Option name -> value, owned by the caller and read by the task that runs.
export type TaskParameters = Readonly<Record<string, unknown>>;

// ============================================================================
// COLLABORATOR HANDLES
// ============================================================================

export interface DataAcquisitionClient {
  readonly deviceName: string;
  readonly sampleRate: number;  // Hz
  startAcquisition(): Promise<void>;
  stopAcquisition(): Promise<void>;
  getDataLength(): number;
  // Records whose timestamp falls in [start, end]
  getData(start?: number, end?: number): AcquisitionRecord[];
  // Note the calibration trigger; returns its offset in seconds from acquisition start
  markCalibration(): number;
}

export interface AcquisitionRecord {
  data: number[];
  timestamp: number;  // seconds since acquisition start
}

export type StimulusKind = 'prompt' | 'fixation' | 'symbol';

export interface Stimulus {
  symbol: string;
  kind: StimulusKind;
  durationMs: number;
}

export interface Display {
  present(stimulus: Stimulus): Promise<void>;
  showText(text: string): Promise<void>;
  clear(): Promise<void>;
}

// ============================================================================
// TRIGGERS
// ============================================================================

export type TriggerType = 'calib' | 'first_pres_target' | 'fixation' | 'target' | 'nontarget';

export interface Trigger {
  symbol: string;
  type: TriggerType;
  timestamp: number;  // seconds on the task clock
}

// ============================================================================
// TASK RESULTS
// ============================================================================

export interface InquiryRecord {
  index: number;
  target: string;
  symbols: string[];
}

export interface TaskSummaryBase {
  sessionId: string;
  label: string;
  fileSavePath: string;
  startedAt: string;  // ISO timestamp
  durationMs: number;
  inquiries: InquiryRecord[];
  samplesAcquired: number;
  calibrationOffset: number;  // seconds from acquisition start to the calibration trigger
}

export interface CalibrationSummary extends TaskSummaryBase {
  kind: 'calibration';
}

export interface CopyPhraseSummary extends TaskSummaryBase {
  kind: 'copy-phrase';
  taskText: string;
  typedText: string;
  completed: boolean;
}

export type TaskSummary = CalibrationSummary | CopyPhraseSummary;
