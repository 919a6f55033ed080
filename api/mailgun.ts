/**
 * Mailgun API wrapper (email gateway)
 * Function: sendEmail(request): POST /v3/{domain}/messages (multipart/form-data)
 *
 * Every message sent for a conversation uses conversation+{sessionId}@{inbound domain}
 * as From and Reply-To, so whichever address a mail client replies to,
 * the reply comes back through the inbound route with the session id in it.
 */

import axios, { type AxiosInstance } from 'axios';
import FormData from 'form-data';
import { config } from '../config/env';
import { describeApiError } from './errors';

const mailgunClient: AxiosInstance = axios.create({
  baseURL: `${config.mailgun.baseUrl}/${config.mailgun.domain}`,
  auth: {
    username: 'api',
    password: config.mailgun.apiKey,
  },
  timeout: config.httpTimeoutMs,
});

/** Header carrying the conversation session id on every relayed message */
export const SESSION_HEADER = 'X-Conversation-Session-Id';

export const DEFAULT_TAG = 'form-relay';

export interface EmailAttachment {
  filename: string;
  contentType: string;
  content: Buffer;
}

/**
 * Interface for send email request
 */
export interface SendEmailRequest {
  to: string;
  subject: string;
  text: string;
  html?: string;
  cc?: string | null; // Omitted when blank - Mailgun rejects empty cc
  sessionId?: string; // Drives From/Reply-To and the session header
  attachments?: EmailAttachment[];
  tags?: string[]; // Added to the default tag
}

/**
 * Reply address that routes back to a conversation
 */
export function conversationAddress(sessionId: string): string {
  return `conversation+${sessionId}@${config.mailgun.inboundDomain}`;
}

/**
 * Build the multipart body for a Mailgun send
 */
export function buildMessageForm(request: SendEmailRequest): FormData {
  const fromAddress = request.sessionId
    ? conversationAddress(request.sessionId)
    : config.mailgun.fromEmail;

  const form = new FormData();
  form.append('from', `${config.mailgun.fromName} <${fromAddress}>`);
  form.append('to', request.to);
  form.append('subject', request.subject);
  form.append('text', request.text);

  const cc = request.cc?.trim();
  if (cc) {
    form.append('cc', cc);
  }

  if (request.html) {
    form.append('html', request.html);
  }

  if (request.sessionId) {
    form.append('h:Reply-To', fromAddress);
    form.append(`h:${SESSION_HEADER}`, request.sessionId);
  }

  for (const tag of [DEFAULT_TAG, ...(request.tags ?? [])]) {
    form.append('o:tag', tag);
  }

  for (const attachment of request.attachments ?? []) {
    form.append('attachment', attachment.content, {
      filename: attachment.filename,
      contentType: attachment.contentType,
    });
  }

  return form;
}

/**
 * Send an email through Mailgun
 * @returns Mailgun message id
 * @throws Error if API call fails
 */
export async function sendEmail(request: SendEmailRequest): Promise<string> {
  console.log(
    `📧 Sending email: to=${request.to}, cc=${request.cc?.trim() || '(none)'}, subject="${request.subject}", session=${request.sessionId ?? '(none)'}, attachments=${request.attachments?.length ?? 0}`
  );

  try {
    const form = buildMessageForm(request);
    const response = await mailgunClient.post('/messages', form, {
      headers: {
        ...form.getHeaders(),
      },
    });

    const body: unknown = response.data;
    const messageId =
      typeof body === 'object' && body !== null && 'id' in body && typeof body.id === 'string'
        ? body.id
        : '';
    console.log(`Email sent successfully via Mailgun - ID: ${messageId || '(unknown)'}`);
    return messageId;
  } catch (error: unknown) {
    throw describeApiError('Mailgun', error);
  }
}
