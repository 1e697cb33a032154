/**
 * @encodeq/processing
 * 
 * Encoding layer.
 * 
 * RULES:
 * - Preset video options go to ffmpeg verbatim
 * - Copy presets never get a filter graph
 * - One engine process at a time
 * - Log every ffmpeg command executed
 */

// Encoding Presets
export {
  DEFAULT_PRESETS,
  PresetCatalog,
  loadPresetCatalog,
  presetRecordSchema,
  presetFromRecord,
  presetToRecord,
  isCopyPreset,
  targets1080p,
  usesTenBit,
  vmafModelFor,
  bitrateKbps,
  type PresetRecord,
} from './presets.js';

// Audio strategy
export {
  resolveAudioAction,
  describeAudioAction,
  audioCodecArgs,
  SURROUND_BITRATE,
  STEREO_BITRATE,
  type AudioAction,
  type CopyReason,
} from './audioStrategy.js';

// Filters
export {
  buildJobFilterChain,
  buildSampleFilterChain,
  buildReferenceChain,
  TONE_MAP_FILTER,
  type JobFilterContext,
} from './filters.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  createJobCommand,
  createReferenceClipCommand,
  createSampleEncodeCommand,
  createSampleMetricCommand,
  createQualityCommand,
  referenceClipPath,
  sampleOutputPath,
  escapeFilterPath,
  type InputOptions,
  type SampleMetric,
  type QualityMetricRequest,
} from './commandBuilder.js';

// Engine capabilities
export { hasFilter } from './engine.js';

// Progress Parser
export {
  ProgressTracker,
  computePercent,
  estimateEta,
  renderProgressBar,
  renderProgressLine,
  BAR_WIDTH,
  type ProgressSnapshot,
} from './progressParser.js';

// Piped Runner
export {
  PipedRunner,
  PROGRESS_ARGS,
  type RunOutcome,
  type EncodeRunner,
  type ProgressSink,
  type EngineProcess,
  type EngineSpawner,
  type InterruptSource,
  type PipedRunnerOptions,
} from './pipedRunner.js';

// Job Executor
export {
  JobExecutor,
  computeJobStats,
  summarize,
  type JobStats,
  type JobResult,
  type ExecutionSummary,
  type JobExecutorOptions,
} from './jobExecutor.js';

// Benchmark
export {
  BenchmarkEngine,
  efficiency,
  estimateTotalBytes,
  type BenchmarkResult,
  type BenchmarkFiles,
  type BenchmarkEngineOptions,
} from './benchmark.js';

// Quality
export {
  QualityAnalyzer,
  alignmentCrop,
  VMAF_MODELS,
  type CompareOptions,
  type QualityReport,
  type QualityAnalyzerOptions,
} from './quality.js';
