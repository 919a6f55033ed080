import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  claimSignature,
  clearProcessedMessages,
  computeSignature,
  getStateStats,
  isProcessed,
  setDedupCapacity,
  type SignatureSource,
} from '../state/processedMessages';

const base: SignatureSource = {
  sender: 'Casey <c@y.com>',
  sessionId: 'session_1',
  subject: 'Pricing',
  body: 'Is the blue model in stock?',
};

describe('computeSignature', () => {
  it('prefers the Message-Id without angle brackets', () => {
    expect(
      computeSignature({ ...base, messageId: '<abc@mail.example.test>', signature: 's', token: 't', timestamp: '1' })
    ).toBe('message-id:abc@mail.example.test');
  });

  it('uses the mailgun signature triple when there is no Message-Id', () => {
    expect(computeSignature({ ...base, messageId: '  ', signature: 'sig', token: 'tok', timestamp: '1700000000' })).toBe(
      'mailgun:sig:tok:1700000000'
    );
  });

  it('falls back to a content hash when the triple is incomplete', () => {
    const signature = computeSignature({ ...base, signature: 'sig', timestamp: '1700000000' });
    expect(signature).toMatch(/^fallback:[0-9a-f]{64}$/);
  });

  it('hashes the sender case-insensitively', () => {
    expect(computeSignature({ ...base, sender: 'C@Y.COM' })).toBe(computeSignature({ ...base, sender: 'c@y.com' }));
  });

  it('distinguishes different bodies', () => {
    expect(computeSignature({ ...base, body: 'yes' })).not.toBe(computeSignature({ ...base, body: 'no' }));
  });
});

describe('claimSignature', () => {
  beforeEach(() => {
    clearProcessedMessages();
  });

  afterEach(() => {
    setDedupCapacity(1000);
    clearProcessedMessages();
  });

  it('claims a signature exactly once', () => {
    expect(claimSignature('message-id:1')).toBe(true);
    expect(claimSignature('message-id:1')).toBe(false);
    expect(isProcessed('message-id:1')).toBe(true);
  });

  it('evicts the oldest signatures beyond capacity', () => {
    setDedupCapacity(3);
    for (const signature of ['a', 'b', 'c', 'd']) {
      claimSignature(signature);
    }

    expect(isProcessed('a')).toBe(false);
    expect(isProcessed('b')).toBe(true);
    expect(isProcessed('d')).toBe(true);
    expect(getStateStats()).toEqual({ processedCount: 3, capacity: 3 });
  });

  it('shrinks immediately when capacity is lowered', () => {
    for (const signature of ['a', 'b', 'c']) {
      claimSignature(signature);
    }
    setDedupCapacity(1);

    expect(isProcessed('c')).toBe(true);
    expect(getStateStats().processedCount).toBe(1);
  });
});
