/**
 * Crisp REST API wrapper (conversation gateway)
 * Functions:
 * - createConversation(): POST /website/{id}/conversation
 * - getConversationMeta / updateConversationMeta: GET|PATCH .../conversation/{session}/meta
 * - assignConversation / unassignConversation: PATCH .../conversation/{session}/routing
 * - sendMessage / sendOperatorMessage: POST .../conversation/{session}/message
 * - getConversationMessages: GET .../conversation/{session}/messages
 * - findPeopleProfiles / updatePeopleProfile: people profile search and update
 * - checkMessagingAuth: GET /website/{id}
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { config } from '../config/env';
import { describeApiError } from './errors';

const crispClient: AxiosInstance = axios.create({
  baseURL: `${config.crisp.baseUrl}/website/${config.crisp.websiteId}`,
  auth: {
    username: config.crisp.identifier,
    password: config.crisp.apiKey,
  },
  headers: {
    'X-Crisp-Tier': 'plugin',
    'Content-Type': 'application/json',
  },
  timeout: config.httpTimeoutMs,
});

const looseString = z.string().optional().catch(undefined);
const looseNumber = z.number().optional().catch(undefined);

const dataValue = z.union([z.string(), z.number(), z.boolean()]);

/** Keeps the scalar entries of the meta data store; other values are dropped one by one */
function scalarEntries(record: Record<string, unknown>): Record<string, z.infer<typeof dataValue>> {
  const entries: Record<string, z.infer<typeof dataValue>> = {};
  for (const [key, value] of Object.entries(record)) {
    const parsed = dataValue.safeParse(value);
    if (parsed.success) {
      entries[key] = parsed.data;
    }
  }
  return entries;
}

const conversationMetaSchema = z.object({
  email: looseString,
  nickname: looseString,
  subject: looseString,
  ip: looseString,
  segments: z.array(z.string()).optional().catch(undefined),
  device: z
    .object({
      geolocation: z
        .object({
          country: looseString,
          region: looseString,
          city: looseString,
          coordinates: z
            .object({ latitude: looseNumber, longitude: looseNumber })
            .optional()
            .catch(undefined),
        })
        .optional()
        .catch(undefined),
    })
    .optional()
    .catch(undefined),
  data: z
    .record(z.unknown())
    .optional()
    .catch(undefined)
    .transform((record) => (record ? scalarEntries(record) : undefined)),
});

/**
 * Conversation metadata as stored in Crisp
 * `data` is the application key-value store (customer_email, distributor_email, ...)
 */
export type ConversationMeta = z.infer<typeof conversationMetaSchema>;

export type ConversationData = NonNullable<ConversationMeta['data']>;

const conversationMessageSchema = z.object({
  type: z.string(),
  from: z.string(),
  origin: looseString,
  content: z.unknown(),
  timestamp: looseNumber,
  fingerprint: looseNumber,
});

export type ConversationMessage = z.infer<typeof conversationMessageSchema>;

const peopleProfileSchema = z.object({
  people_id: z.string(),
  email: looseString,
});

export type PeopleProfile = z.infer<typeof peopleProfileSchema>;

export type MessageType = 'text' | 'note';

export interface MessageSender {
  from: 'user' | 'operator';
  origin: 'email' | 'chat';
}

/** Sender combinations tried in order when posting a message */
const MESSAGE_SENDERS: MessageSender[] = [
  { from: 'user', origin: 'email' },
  { from: 'operator', origin: 'chat' },
];

export interface PersonData {
  nickname?: string;
  geolocation?: {
    city?: string;
    country?: string;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Crisp wraps every payload as { error, reason, data } */
function unwrapData(body: unknown): unknown {
  return isRecord(body) ? body.data : undefined;
}

/**
 * Create a new conversation
 * @returns Crisp session_id of the new conversation
 * @throws Error if the API call fails or no session_id is returned
 */
export async function createConversation(): Promise<string> {
  try {
    const response = await crispClient.post('/conversation', {});
    const data = unwrapData(response.data);
    const sessionId = isRecord(data) && typeof data.session_id === 'string' ? data.session_id : '';
    if (!sessionId) {
      throw new Error('Crisp API error: conversation created without a session_id');
    }
    console.log(`Created new Crisp conversation: ${sessionId}`);
    return sessionId;
  } catch (error: unknown) {
    throw describeApiError('Crisp', error);
  }
}

/**
 * Read conversation metadata
 * Unrecognized or malformed keys are dropped rather than failing the read
 */
export async function getConversationMeta(sessionId: string): Promise<ConversationMeta> {
  try {
    const response = await crispClient.get(`/conversation/${encodeURIComponent(sessionId)}/meta`);
    const parsed = conversationMetaSchema.safeParse(unwrapData(response.data));
    return parsed.success ? parsed.data : {};
  } catch (error: unknown) {
    throw describeApiError('Crisp', error);
  }
}

/**
 * Update conversation metadata (Crisp merges the given keys)
 */
export async function updateConversationMeta(sessionId: string, meta: ConversationMeta): Promise<void> {
  try {
    await crispClient.patch(`/conversation/${encodeURIComponent(sessionId)}/meta`, meta);
    console.log(`Updated conversation meta for session: ${sessionId}`);
  } catch (error: unknown) {
    throw describeApiError('Crisp', error);
  }
}

/**
 * Assign a conversation to an operator
 */
export async function assignConversation(sessionId: string, agentId: string): Promise<void> {
  try {
    await crispClient.patch(`/conversation/${encodeURIComponent(sessionId)}/routing`, {
      assigned: { user_id: agentId },
      silent: false,
    });
    console.log(`Assigned conversation ${sessionId} to agent: ${agentId}`);
  } catch (error: unknown) {
    throw describeApiError('Crisp', error);
  }
}

/**
 * Clear the assigned operator, taking the conversation out of the active queue
 */
export async function unassignConversation(sessionId: string): Promise<void> {
  try {
    await crispClient.patch(`/conversation/${encodeURIComponent(sessionId)}/routing`, {
      assigned: null,
      silent: true,
    });
    console.log(`Unassigned conversation ${sessionId}`);
  } catch (error: unknown) {
    throw describeApiError('Crisp', error);
  }
}

/**
 * Post a message into a conversation
 * Tries user/email first; on a rejected status retries once as operator/chat.
 * @returns The sender combination that was accepted
 * @throws Error if both attempts are rejected or the request fails
 */
export async function sendMessage(
  sessionId: string,
  content: string,
  type: MessageType = 'text'
): Promise<MessageSender> {
  const url = `/conversation/${encodeURIComponent(sessionId)}/message`;
  let lastStatus = 0;
  let lastBody: unknown;

  for (const sender of MESSAGE_SENDERS) {
    try {
      const response = await crispClient.post(
        url,
        { type, content, from: sender.from, origin: sender.origin },
        { validateStatus: () => true }
      );
      if (response.status >= 200 && response.status < 300) {
        console.log(
          `Sent message to conversation: ${sessionId} (${sender.from}/${sender.origin}) - Status: ${response.status}`
        );
        return sender;
      }
      lastStatus = response.status;
      lastBody = response.data;
      console.warn(`Crisp rejected message as ${sender.from}/${sender.origin} (${response.status})`);
    } catch (error: unknown) {
      throw describeApiError('Crisp', error);
    }
  }

  throw new Error(
    `Crisp API error: ${lastStatus} - message rejected for every sender${lastBody ? ` (${JSON.stringify(lastBody)})` : ''}`
  );
}

/**
 * Post a message as operator (customer-facing text or internal note)
 */
export async function sendOperatorMessage(
  sessionId: string,
  content: string,
  type: MessageType
): Promise<void> {
  try {
    await crispClient.post(`/conversation/${encodeURIComponent(sessionId)}/message`, {
      type,
      content,
      from: 'operator',
      origin: 'chat',
    });
    console.log(`Posted operator ${type} to conversation: ${sessionId}`);
  } catch (error: unknown) {
    throw describeApiError('Crisp', error);
  }
}

/**
 * List messages of a conversation (oldest first, as Crisp returns them)
 * Entries that do not look like messages are skipped
 */
export async function getConversationMessages(sessionId: string): Promise<ConversationMessage[]> {
  try {
    const response = await crispClient.get(`/conversation/${encodeURIComponent(sessionId)}/messages`);
    const data = unwrapData(response.data);
    if (!Array.isArray(data)) {
      return [];
    }
    const messages: ConversationMessage[] = [];
    for (const item of data) {
      const parsed = conversationMessageSchema.safeParse(item);
      if (parsed.success) {
        messages.push(parsed.data);
      }
    }
    return messages;
  } catch (error: unknown) {
    throw describeApiError('Crisp', error);
  }
}

/**
 * Search people profiles by email
 */
export async function findPeopleProfiles(email: string): Promise<PeopleProfile[]> {
  try {
    const response = await crispClient.get('/people/profiles/1', {
      params: { search_text: email },
    });
    const data = unwrapData(response.data);
    if (!Array.isArray(data)) {
      return [];
    }
    const profiles: PeopleProfile[] = [];
    for (const item of data) {
      const parsed = peopleProfileSchema.safeParse(item);
      if (parsed.success) {
        profiles.push(parsed.data);
      }
    }
    console.log(`Found ${profiles.length} profile(s) for email: ${email}`);
    return profiles;
  } catch (error: unknown) {
    throw describeApiError('Crisp', error);
  }
}

/**
 * Update an existing people profile
 */
export async function updatePeopleProfile(
  peopleId: string,
  email: string,
  person: PersonData
): Promise<void> {
  try {
    await crispClient.patch(`/people/profile/${encodeURIComponent(peopleId)}`, { email, person });
    console.log(`Updated Crisp contact: ${peopleId}`);
  } catch (error: unknown) {
    throw describeApiError('Crisp', error);
  }
}

/**
 * Verify credentials by reading the website record
 * @returns HTTP status and response body, without throwing on non-2xx
 */
export async function checkMessagingAuth(): Promise<{ ok: boolean; status: number; body: unknown }> {
  try {
    const response = await crispClient.get('', { validateStatus: () => true });
    return { ok: response.status === 200, status: response.status, body: response.data };
  } catch (error: unknown) {
    throw describeApiError('Crisp', error);
  }
}
