/**
 * Errors that reach the HTTP boundary carry their status and a stable machine code.
 */
export class ServiceError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(400, 'invalid_request', message, options);
  }
}

export class ImageDecodeError extends ServiceError {
  constructor(message = 'Uploaded file is not a decodable image', options?: ErrorOptions) {
    super(400, 'image_decode_error', message, options);
  }
}

export class PayloadTooLargeError extends ServiceError {
  constructor(message: string) {
    super(413, 'payload_too_large', message);
  }
}

export class BatchTooLargeError extends ServiceError {
  constructor(maxBatchSize: number) {
    super(413, 'batch_too_large', `A batch may contain at most ${maxBatchSize} images`);
  }
}

export class NotReadyError extends ServiceError {
  constructor() {
    super(503, 'not_ready', 'Model is not loaded yet; call POST /warmup or retry later');
  }
}

export class InferenceError extends ServiceError {
  constructor(options?: ErrorOptions) {
    super(500, 'inference_failed', 'Prediction failed', options);
  }
}

export class RequestTimeoutError extends ServiceError {
  constructor(timeoutMs: number) {
    super(504, 'timeout', `Request did not complete within ${timeoutMs} ms`);
  }
}

// not mapped to a response status; handled where they occur
export class LoadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LoadError';
  }
}

export class TrackingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TrackingError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
