/**
 * @encodeq/media
 * 
 * Media analysis layer.
 * 
 * Responsibilities:
 * - Probe files with ffprobe into read-only stream descriptors
 * - Classify HDR sources
 * - Detect letterbox crops with cropdetect
 * - Parse VMAF/SSIM output
 */

// Probing
export { FFProbe, type FFProbeResult, type FFProbeStream } from './probes/ffprobe.js';
export { MediaProber, toMediaInfo, parseFrameRate } from './prober.js';

// HDR
export { isHdr, HDR_TRANSFERS } from './hdr.js';

// Crop detection
export {
  CropDetector,
  parseCropObservations,
  statisticalMode,
  consolidateCrops,
  formatCropFilter,
  parseCropSpec,
  type CropDetectorOptions,
} from './cropDetector.js';

// Quality metrics
export {
  parseMeanScore,
  parseVmafLog,
  qualityVerdict,
  verdictNote,
  type QualityMetric,
  type QualityVerdict,
} from './metrics.js';

// Types
export {
  primaryVideoStream,
  frameSizeOf,
  type CodecType,
  type StreamDescriptor,
  type MediaInfo,
  type FrameSize,
} from './types.js';
