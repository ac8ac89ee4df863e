import type {ComponentLogger} from '@authz-gateway/logging';

export type RequestCheckpoint = 'request_start' | 'headers_built' | 'request_serialized' | 'request_end';

export type RequestCheckpointSample = {
  checkpoint: RequestCheckpoint;
  /** Running estimate of the transient buffers built for the authorization call. */
  transient_bytes: number;
  /** Bytes kept past the terminal transition (the authorization message). */
  retained_bytes: number;
};

export type RequestObserver = {
  onCheckpoint: (sample: RequestCheckpointSample) => void;
};

export const DEFAULT_RETAINED_BYTES_WARNING_THRESHOLD = 16 * 1024;

export const createNoopRequestObserver = (): RequestObserver => ({
  onCheckpoint: () => undefined
});

export const createLoggingRequestObserver = ({
  logger,
  retainedBytesWarningThreshold = DEFAULT_RETAINED_BYTES_WARNING_THRESHOLD
}: {
  logger: ComponentLogger;
  retainedBytesWarningThreshold?: number;
}): RequestObserver => ({
  onCheckpoint: sample => {
    logger.debug({
      event: 'authz.memory.checkpoint',
      metadata: {...sample}
    });

    if (sample.checkpoint === 'request_end' && sample.retained_bytes > retainedBytesWarningThreshold) {
      logger.warn({
        event: 'authz.memory.retained_state_large',
        reason_code: 'retained_state_large',
        message: `Request retains ${sample.retained_bytes} bytes after authorization`,
        metadata: {retained_bytes: sample.retained_bytes, threshold: retainedBytesWarningThreshold}
      });
    }
  }
});
