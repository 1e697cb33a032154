/**
 * @encodeq/queue
 *
 * Interactive job building and the persistent job queue.
 */

// Track selection
export {
  TrackSelector,
  listCandidates,
  toTrackSelection,
  describeCandidate,
  defaultPositions,
  parsePositions,
  resolveTrackSelection,
  type TrackKind,
  type TrackCandidate,
  type ParsedPositions,
  type TrackResolution,
  type TrackSelectorOptions,
} from './trackSelector.js';

// Job building
export {
  JobBuilder,
  audioModeFor,
  outputPathFor,
  collectInputFiles,
  MEDIA_EXTENSIONS,
  type JobBuilderOptions,
} from './jobBuilder.js';

// Queue
export { JobQueue, type QueueExecutor } from './queue.js';
export {
  QUEUE_FILE_VERSION,
  queueFileSchema,
  jobRecordSchema,
  jobToRecord,
  jobFromRecord,
  serializeQueue,
  parseQueue,
  readQueueFile,
  writeQueueFile,
  type JobRecord,
  type QueueFile,
} from './queueFile.js';

// Plan summary
export { describeJob, describePlan } from './planSummary.js';
