import { settle, toError } from '../../../src/common/utils/result.util';

describe('settle', () => {
  it('should capture a resolved value', async () => {
    expect(await settle(async () => 42)).toEqual({ ok: true, value: 42 });
  });

  it('should capture a rejection as an Error', async () => {
    const outcome = await settle(() => Promise.reject('plain string'));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(Error);
      expect(outcome.error.message).toBe('plain string');
    }
  });
});

describe('toError', () => {
  it('should pass Error instances through unchanged', () => {
    const error = new RangeError('out of range');

    expect(toError(error)).toBe(error);
  });
});
