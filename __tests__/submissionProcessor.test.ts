/**
 * Tests for src/submissionProcessor.ts
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Geolocation } from '../api/geolocation';
import type { Submission } from '../src/formFields';

// ── Hoisted mocks ────────────────────────────────────────────────────────────

const {
  mockCreateConversation,
  mockUpdateMeta,
  mockAssign,
  mockSendMessage,
  mockFindProfiles,
  mockUpdateProfile,
  mockSendEmail,
  mockSendErrorAlert,
} = vi.hoisted(() => ({
  mockCreateConversation: vi.fn(),
  mockUpdateMeta: vi.fn(),
  mockAssign: vi.fn(),
  mockSendMessage: vi.fn(),
  mockFindProfiles: vi.fn(),
  mockUpdateProfile: vi.fn(),
  mockSendEmail: vi.fn(),
  mockSendErrorAlert: vi.fn(),
}));

vi.mock('../api/crisp', () => ({
  createConversation: mockCreateConversation,
  updateConversationMeta: mockUpdateMeta,
  assignConversation: mockAssign,
  sendMessage: mockSendMessage,
  findPeopleProfiles: mockFindProfiles,
  updatePeopleProfile: mockUpdateProfile,
}));

vi.mock('../api/mailgun', () => ({ sendEmail: mockSendEmail }));

vi.mock('../api/slack', () => ({ sendErrorAlert: mockSendErrorAlert }));

import { config } from '../config/env';
import { replaceRoutingTable } from '../config/routingTable';
import { processSubmission } from '../src/submissionProcessor';

// ── Helpers ───────────────────────────────────────────────────────────────────

function geo(countryCode: string): Geolocation {
  return {
    city: 'Austin',
    region: 'Texas',
    countryCode,
    countryName: 'United States',
    zipCode: '73301',
    latitude: 30.27,
    longitude: -97.74,
  };
}

const SUBMISSION: Submission = {
  customerName: 'Casey Doe',
  email: 'c@y.com',
  message: 'Need pricing',
  country: 'United States',
  city: 'Austin',
  fileUrls: [],
};

// ── Tests ─────────────────────────────────────────────────────────────────────

describe('processSubmission', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    mockCreateConversation.mockResolvedValue('session_1');
    mockUpdateMeta.mockResolvedValue(undefined);
    mockAssign.mockResolvedValue(undefined);
    mockSendMessage.mockResolvedValue({ from: 'user', origin: 'email' });
    mockFindProfiles.mockResolvedValue([]);
    mockUpdateProfile.mockResolvedValue(undefined);
    mockSendEmail.mockResolvedValue('<msg@mail.example.test>');
    mockSendErrorAlert.mockResolvedValue(undefined);
    replaceRoutingTable([
      { countryCode: 'US', agentId: 'A1', distributorEmail: 'd@x.com' },
      { countryCode: 'GB', agentId: null, distributorEmail: 'uk@dist.example.com' },
    ]);
    config.features.autoForwardOnSubmission = false;
    config.features.syncContactProfiles = false;
  });

  afterEach(() => {
    config.features.autoForwardOnSubmission = false;
    config.features.syncContactProfiles = false;
  });

  it('creates, describes, assigns and posts a routed conversation', async () => {
    const ok = await processSubmission(SUBMISSION, geo('US'), '198.51.100.7');

    expect(ok).toBe(true);
    expect(mockUpdateMeta).toHaveBeenCalledWith('session_1', {
      email: 'c@y.com',
      nickname: 'Casey Doe',
      subject: 'Customer Inquiry - US',
      ip: '198.51.100.7',
      segments: ['ContactForm', 'Country: United States', 'DistributorAvailable'],
      device: {
        geolocation: {
          country: 'US',
          region: 'Texas',
          city: 'Austin',
          coordinates: { latitude: 30.27, longitude: -97.74 },
        },
      },
      data: {
        customer_email: 'c@y.com',
        customer_name: 'Casey Doe',
        distributor_email: 'd@x.com',
        agent_id: 'A1',
        agent_source: 'routing_table',
        routing_method: 'manual_forward',
        form_message: 'Need pricing',
        form_country: 'United States',
        form_city: 'Austin',
      },
    });
    expect(mockAssign).toHaveBeenCalledWith('session_1', 'A1');
    expect(mockSendMessage).toHaveBeenCalledWith('session_1', 'Need pricing');
    expect(mockSendEmail).not.toHaveBeenCalled();
  });

  it('routes on the IP country, not the self-reported one', async () => {
    await processSubmission({ ...SUBMISSION, country: 'Germany' }, geo('US'), '198.51.100.7');

    expect(mockAssign).toHaveBeenCalledWith('session_1', 'A1');
  });

  it('assigns the help desk when only a distributor is known', async () => {
    await processSubmission(SUBMISSION, geo('GB'), '198.51.100.7');

    expect(mockAssign).toHaveBeenCalledWith('session_1', 'agent-helpdesk');
    expect(mockUpdateMeta).toHaveBeenCalledWith(
      'session_1',
      expect.objectContaining({
        data: expect.objectContaining({
          agent_source: 'helpdesk_has_distributor',
          distributor_email: 'uk@dist.example.com',
        }),
      })
    );
  });

  it('assigns the office when geolocation failed', async () => {
    await processSubmission(SUBMISSION, geo(''), '');

    expect(mockAssign).toHaveBeenCalledWith('session_1', 'agent-office');
    expect(mockUpdateMeta).toHaveBeenCalledWith(
      'session_1',
      expect.objectContaining({
        subject: 'Customer Inquiry - Unknown',
        segments: ['ContactForm', 'Country: United States'],
        data: expect.objectContaining({ distributor_email: '', agent_source: 'office_no_distributor' }),
      })
    );
  });

  it('fails and alerts when the conversation cannot be created', async () => {
    mockCreateConversation.mockRejectedValue(new Error('Crisp API error: 500 - Internal Server Error'));

    const ok = await processSubmission(SUBMISSION, geo('US'), '198.51.100.7');

    expect(ok).toBe(false);
    expect(mockUpdateMeta).not.toHaveBeenCalled();
    expect(mockAssign).not.toHaveBeenCalled();
    expect(mockSendErrorAlert).toHaveBeenCalledWith('Could not create conversation for form submission', {
      customer_email: 'c@y.com',
      error: 'Crisp API error: 500 - Internal Server Error',
    });
  });

  it('still succeeds when later steps fail', async () => {
    mockUpdateMeta.mockRejectedValue(new Error('meta down'));
    mockAssign.mockRejectedValue(new Error('routing down'));
    mockSendMessage.mockRejectedValue(new Error('messages down'));

    await expect(processSubmission(SUBMISSION, geo('US'), '198.51.100.7')).resolves.toBe(true);
    expect(mockSendMessage).toHaveBeenCalledTimes(1);
  });

  it('posts file links after the message', async () => {
    await processSubmission(
      { ...SUBMISSION, message: '', fileUrls: ['https://files.example.test/u/a%20b.png'] },
      geo('US'),
      '198.51.100.7'
    );

    expect(mockSendMessage).toHaveBeenCalledWith(
      'session_1',
      '📎 Attachment: a b.png\nhttps://files.example.test/u/a%20b.png'
    );
  });

  it('posts nothing without a message or files', async () => {
    await processSubmission({ ...SUBMISSION, message: '' }, geo('US'), '198.51.100.7');

    expect(mockSendMessage).not.toHaveBeenCalled();
  });

  it('emails the distributor when auto-forward is on', async () => {
    config.features.autoForwardOnSubmission = true;

    await processSubmission(SUBMISSION, geo('US'), '198.51.100.7');

    expect(mockSendEmail).toHaveBeenCalledWith(
      expect.objectContaining({
        to: 'd@x.com',
        cc: 'c@y.com',
        subject: 'New Customer Inquiry - Casey Doe (US)',
        sessionId: 'session_1',
        tags: ['distributor-forwarding'],
      })
    );
    expect(mockUpdateMeta).toHaveBeenCalledWith(
      'session_1',
      expect.objectContaining({ data: expect.objectContaining({ routing_method: 'email_forwarding' }) })
    );
  });

  it('does not auto-forward without a distributor', async () => {
    config.features.autoForwardOnSubmission = true;

    await processSubmission(SUBMISSION, geo('FR'), '198.51.100.7');

    expect(mockSendEmail).not.toHaveBeenCalled();
  });

  it('updates a matching contact profile when sync is on', async () => {
    config.features.syncContactProfiles = true;
    mockFindProfiles.mockResolvedValue([{ people_id: 'p1', email: 'c@y.com' }]);

    await processSubmission(SUBMISSION, geo('US'), '198.51.100.7');

    expect(mockFindProfiles).toHaveBeenCalledWith('c@y.com');
    expect(mockUpdateProfile).toHaveBeenCalledWith('p1', 'c@y.com', {
      nickname: 'Casey Doe',
      geolocation: { city: 'Austin', country: 'US' },
    });
  });
});
