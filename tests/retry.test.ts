import { describe, it, expect, vi } from 'vitest';
import { publishWithRetry } from '../src/bus/retry';
import { PublishError } from '../src/errors';

const options = { attempts: 3, baseDelayMs: 1 };

describe('publishWithRetry', () => {
  it('should retry a timeout and return the eventual result', async () => {
    const publish = vi.fn()
      .mockRejectedValueOnce(new PublishError('Timeout', 'trip.assigned', 'no confirm'))
      .mockResolvedValueOnce('ack');

    await expect(publishWithRetry(publish, options)).resolves.toBe('ack');
    expect(publish).toHaveBeenCalledTimes(2);
  });

  it('should report each retry', async () => {
    const onRetry = vi.fn();
    const publish = vi.fn()
      .mockRejectedValueOnce(new PublishError('ConnectionLost', 'trip.assigned', 'gone'))
      .mockResolvedValueOnce('ack');

    await publishWithRetry(publish, { ...options, onRetry });

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(2);
  });

  it('should give up after the configured attempts', async () => {
    const publish = vi.fn().mockRejectedValue(new PublishError('ConnectionLost', 'trip.assigned', 'gone'));

    await expect(publishWithRetry(publish, options)).rejects.toThrow('gone');
    expect(publish).toHaveBeenCalledTimes(3);
  });

  it('should never retry an invalid payload', async () => {
    const publish = vi.fn().mockRejectedValue(new PublishError('SchemaInvalid', 'trip.assigned', 'bad payload'));

    await expect(publishWithRetry(publish, options)).rejects.toThrow('bad payload');
    expect(publish).toHaveBeenCalledTimes(1);
  });

  it('should not retry errors that are not publish failures', async () => {
    const publish = vi.fn().mockRejectedValue(new TypeError('oops'));

    await expect(publishWithRetry(publish, options)).rejects.toThrow(TypeError);
    expect(publish).toHaveBeenCalledTimes(1);
  });
});
