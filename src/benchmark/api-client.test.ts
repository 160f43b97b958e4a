import { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';

import { DetectionApiClient } from './api-client';

// settles like axios' own adapters, so validateStatus takes effect
function fakeApi(data: unknown, status = 200) {
  const requests: InternalAxiosRequestConfig[] = [];
  const client = new DetectionApiClient('http://api.test', {
    adapter: async (config) => {
      requests.push(config);
      const response: AxiosResponse = { data, status, statusText: '', headers: {}, config };
      if (config.validateStatus && !config.validateStatus(status)) {
        const message = `Request failed with status code ${status}`;
        throw new AxiosError(message, 'ERR_BAD_RESPONSE', config, null, response);
      }
      return response;
    },
  });
  return { client, requests };
}

describe('DetectionApiClient', () => {
  it('returns the failed warmup answer instead of throwing', async () => {
    const { client, requests } = fakeApi(
      { ready: false, error: 'model_load_failed', detail: 'Model failed to load' },
      503,
    );

    const response = await client.warmup();

    expect(requests[0].url).toBe('/warmup');
    expect(response).toEqual({
      ready: false,
      error: 'model_load_failed',
      detail: 'Model failed to load',
    });
  });

  it('still throws on other warmup errors', async () => {
    const { client } = fakeApi({ error: 'internal_error', detail: 'Internal server error' }, 500);

    await expect(client.warmup()).rejects.toBeInstanceOf(AxiosError);
  });

  it('uploads one image as multipart field "file" with the threshold', async () => {
    const { client, requests } = fakeApi({
      file: 'a.jpg',
      conf_threshold: 0.3,
      detections: [{ box: [1, 2, 3, 4], class: 'Stop', score: 0.8 }],
      n_boxes: 1,
      class_counts: { Stop: 1 },
      latency_ms: 12.3,
    });

    const response = await client.predict({ data: Buffer.from('jpeg'), filename: 'a.jpg' }, 0.3);

    expect(requests[0].url).toBe('/predict');
    expect(requests[0].params).toEqual({ conf: 0.3 });
    const form = requests[0].data;
    expect(form).toBeInstanceOf(FormData);
    if (form instanceof FormData) {
      expect(form.getAll('file')).toHaveLength(1);
    }
    expect(response.n_boxes).toBe(1);
    expect(response.clientLatencyMs).toBeGreaterThanOrEqual(0);
  });

  it('sends every batch image under "files"', async () => {
    const { client, requests } = fakeApi({
      batch_size: 2,
      conf_threshold: 0.25,
      results: [
        { ok: true, file: 'a.jpg', detections: [], n_boxes: 0, class_counts: {}, latency_ms: 3 },
        { ok: false, file: 'b.jpg', error: 'image_decode_error', detail: 'bad' },
      ],
      avg_latency_ms: 4,
      batch_latency_ms: 8,
    });

    const response = await client.predictBatch(
      [
        { data: Buffer.from('a'), filename: 'a.jpg' },
        { data: Buffer.from('b'), filename: 'b.jpg' },
      ],
      0.25,
    );

    const form = requests[0].data;
    if (form instanceof FormData) {
      expect(form.getAll('files')).toHaveLength(2);
    }
    expect(response.results.map((item) => item.ok)).toEqual([true, false]);
  });

  it('rejects a response that does not match the contract', async () => {
    const { client } = fakeApi({ status: 'sleeping' });

    await expect(client.healthz()).rejects.toThrow();
  });
});
