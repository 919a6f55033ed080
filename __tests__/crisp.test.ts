/**
 * Tests for api/crisp.ts against a stubbed axios client
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';

const { fakeClient } = vi.hoisted(() => ({
  fakeClient: { get: vi.fn(), post: vi.fn(), patch: vi.fn() },
}));

vi.mock('axios', async (importOriginal) => {
  const actual = await importOriginal<typeof import('axios')>();
  return {
    ...actual,
    default: Object.assign(actual.default, { create: vi.fn(() => fakeClient) }),
  };
});

import {
  assignConversation,
  createConversation,
  getConversationMessages,
  getConversationMeta,
  sendMessage,
  unassignConversation,
} from '../api/crisp';

describe('crisp gateway', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  describe('sendMessage', () => {
    it('posts as the customer by email first', async () => {
      fakeClient.post.mockResolvedValueOnce({ status: 202, data: {} });

      expect(await sendMessage('session_1', 'Hello')).toEqual({ from: 'user', origin: 'email' });
      expect(fakeClient.post).toHaveBeenCalledTimes(1);
      expect(fakeClient.post).toHaveBeenCalledWith(
        '/conversation/session_1/message',
        { type: 'text', content: 'Hello', from: 'user', origin: 'email' },
        { validateStatus: expect.any(Function) }
      );
    });

    it('retries as an operator when the first sender is rejected', async () => {
      fakeClient.post
        .mockResolvedValueOnce({ status: 403, data: { error: true, reason: 'not_allowed' } })
        .mockResolvedValueOnce({ status: 202, data: {} });

      expect(await sendMessage('session_1', 'Hello', 'note')).toEqual({ from: 'operator', origin: 'chat' });
      expect(fakeClient.post).toHaveBeenLastCalledWith(
        '/conversation/session_1/message',
        { type: 'note', content: 'Hello', from: 'operator', origin: 'chat' },
        { validateStatus: expect.any(Function) }
      );
    });

    it('fails when every sender is rejected', async () => {
      fakeClient.post.mockResolvedValue({ status: 400, data: { reason: 'invalid_data' } });

      await expect(sendMessage('session_1', 'Hello')).rejects.toThrow(
        'Crisp API error: 400 - message rejected for every sender ({"reason":"invalid_data"})'
      );
      expect(fakeClient.post).toHaveBeenCalledTimes(2);
    });
  });

  describe('createConversation', () => {
    it('returns the new session id', async () => {
      fakeClient.post.mockResolvedValueOnce({ data: { error: false, reason: 'added', data: { session_id: 'session_new' } } });

      expect(await createConversation()).toBe('session_new');
      expect(fakeClient.post).toHaveBeenCalledWith('/conversation', {});
    });

    it('fails when no session id comes back', async () => {
      fakeClient.post.mockResolvedValueOnce({ data: { error: false, data: {} } });

      await expect(createConversation()).rejects.toThrow('Crisp API error: conversation created without a session_id');
    });
  });

  describe('getConversationMeta', () => {
    it('keeps known keys and drops malformed ones', async () => {
      fakeClient.get.mockResolvedValueOnce({
        data: {
          data: {
            email: 'c@y.com',
            nickname: 42,
            segments: ['ContactForm'],
            device: { geolocation: { country: 'US' } },
            data: { customer_email: 'c@y.com', count: 3 },
            unknownKey: 'x',
          },
        },
      });

      expect(await getConversationMeta('session 1')).toEqual({
        email: 'c@y.com',
        segments: ['ContactForm'],
        device: { geolocation: { country: 'US' } },
        data: { customer_email: 'c@y.com', count: 3 },
      });
      expect(fakeClient.get).toHaveBeenCalledWith('/conversation/session%201/meta');
    });

    it('drops only the non-scalar entries of the data store', async () => {
      fakeClient.get.mockResolvedValueOnce({
        data: {
          data: {
            data: {
              customer_email: 'c@y.com',
              distributor_email: 'd@x.com',
              plugin_state: { step: 2 },
              tags: ['a'],
              forwarded: false,
            },
          },
        },
      });

      expect(await getConversationMeta('session_1')).toEqual({
        data: { customer_email: 'c@y.com', distributor_email: 'd@x.com', forwarded: false },
      });
    });

    it('returns an empty record for a non-object payload', async () => {
      fakeClient.get.mockResolvedValueOnce({ data: { data: 'oops' } });

      expect(await getConversationMeta('session_1')).toEqual({});
    });
  });

  it('skips entries that are not messages', async () => {
    fakeClient.get.mockResolvedValueOnce({
      data: {
        data: [
          { type: 'text', from: 'user', content: 'hi', timestamp: 1 },
          { type: 'text' },
          'noise',
        ],
      },
    });

    expect(await getConversationMessages('session_1')).toEqual([
      { type: 'text', from: 'user', content: 'hi', timestamp: 1 },
    ]);
  });

  it('assigns and unassigns through the routing endpoint', async () => {
    fakeClient.patch.mockResolvedValue({ data: {} });

    await assignConversation('session_1', 'A1');
    await unassignConversation('session_1');

    expect(fakeClient.patch).toHaveBeenNthCalledWith(1, '/conversation/session_1/routing', {
      assigned: { user_id: 'A1' },
      silent: false,
    });
    expect(fakeClient.patch).toHaveBeenNthCalledWith(2, '/conversation/session_1/routing', {
      assigned: null,
      silent: true,
    });
  });
});
