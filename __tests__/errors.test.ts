import { describe, expect, it } from 'vitest';
import { describeApiError, errorMessage } from '../api/errors';

describe('describeApiError', () => {
  it('includes status and body of an HTTP failure', () => {
    const failure = Object.assign(new Error('Request failed with status code 504'), {
      isAxiosError: true,
      response: { status: 504, statusText: 'Gateway Timeout', data: { reason: 'slow' } },
    });

    expect(describeApiError('Crisp', failure).message).toBe('Crisp API error: 504 - Gateway Timeout ({"reason":"slow"})');
  });

  it('reports requests that got no response', () => {
    const failure = Object.assign(new Error('timeout of 10000ms exceeded'), { isAxiosError: true });

    expect(describeApiError('Mailgun', failure).message).toBe(
      'Mailgun API error: no response - timeout of 10000ms exceeded'
    );
  });

  it('passes other errors through', () => {
    const failure = new Error('plain');
    expect(describeApiError('Crisp', failure)).toBe(failure);
    expect(describeApiError('Crisp', 'text').message).toBe('Crisp API error: text');
  });
});

describe('errorMessage', () => {
  it('reads messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
