import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';

import {
  type BatchResponse,
  BatchResponseSchema,
  type HealthResponse,
  HealthResponseSchema,
  type InfoResponse,
  InfoResponseSchema,
  type PredictionResponse,
  PredictionResponseSchema,
  type WarmupResponse,
  WarmupResponseSchema,
} from '../lib/schemas';

export interface UploadImage {
  data: Buffer;
  filename: string;
  contentType?: string;
}

export type Timed<T> = T & { clientLatencyMs: number };

/** Typed client for the detection API's public endpoints. */
export class DetectionApiClient {
  private http: AxiosInstance;

  constructor(baseURL: string, config?: AxiosRequestConfig) {
    this.http = axios.create({
      baseURL,
      timeout: 60_000,
      ...config,
    });
  }

  async healthz(): Promise<HealthResponse> {
    const response = await this.http.get('/healthz');
    return HealthResponseSchema.parse(response.data);
  }

  async info(): Promise<InfoResponse> {
    const response = await this.http.get('/info');
    return InfoResponseSchema.parse(response.data);
  }

  /** A 503 means the model failed to load; it resolves with `ready: false`. */
  async warmup(): Promise<WarmupResponse> {
    const response = await this.http.post('/warmup', undefined, {
      validateStatus: (status) => status === 200 || status === 503,
    });
    return WarmupResponseSchema.parse(response.data);
  }

  async predict(image: UploadImage, conf: number): Promise<Timed<PredictionResponse>> {
    const form = new FormData();
    form.append('file', toBlob(image), image.filename);

    const started = performance.now();
    const response = await this.http.post('/predict', form, { params: { conf } });
    const clientLatencyMs = performance.now() - started;

    return { ...PredictionResponseSchema.parse(response.data), clientLatencyMs };
  }

  async predictBatch(images: UploadImage[], conf: number): Promise<Timed<BatchResponse>> {
    const form = new FormData();
    for (const image of images) {
      form.append('files', toBlob(image), image.filename);
    }

    const started = performance.now();
    const response = await this.http.post('/predict_batch', form, { params: { conf } });
    const clientLatencyMs = performance.now() - started;

    return { ...BatchResponseSchema.parse(response.data), clientLatencyMs };
  }
}

function toBlob(image: UploadImage): Blob {
  return new Blob([image.data], { type: image.contentType ?? 'image/jpeg' });
}
