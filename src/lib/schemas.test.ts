import { describe, expect, it } from 'vitest';

import { ValidationError } from './errors';
import { BatchItemSchema, PredictQuerySchema, parseRequest } from './schemas';

describe('PredictQuerySchema', () => {
  const parse = (query: unknown) => parseRequest(PredictQuerySchema, query);

  it('accepts the bounds of the unit interval', () => {
    expect(parse({ conf: '0' })).toEqual({ conf: 0 });
    expect(parse({ conf: '1' })).toEqual({ conf: 1 });
    expect(parse({ conf: ' 0.25 ' })).toEqual({ conf: 0.25 });
  });

  it('leaves conf undefined when absent', () => {
    expect(parse({})).toEqual({});
  });

  it.each(['-0.01', '1.5', '10', 'abc', '', 'NaN', 'Infinity'])('rejects conf=%j', (conf) => {
    expect(() => parse({ conf })).toThrow(ValidationError);
  });

  it('rejects a repeated parameter', () => {
    expect(() => parse({ conf: ['0.2', '0.3'] })).toThrow(
      'conf: conf must be given once, as a number',
    );
  });

  it('names the parameter in the message', () => {
    expect(() => parse({ conf: '1.5' })).toThrow('conf: conf must be between 0 and 1');
  });
});

describe('BatchItemSchema', () => {
  it('distinguishes successful and failed items', () => {
    expect(
      BatchItemSchema.parse({ ok: false, file: 'a.jpg', error: 'image_decode_error', detail: 'x' }),
    ).toMatchObject({ ok: false });
    expect(() => BatchItemSchema.parse({ ok: true, file: 'a.jpg' })).toThrow();
  });
});
