/**
 * Webhook handler for inbound emails routed by Mailgun
 * POST /webhook/mailgun-incoming
 *
 * Mailgun route: match_recipient("conversation+.*@<domain>") -> forward to this URL.
 * Attachments arrive as multipart parts named attachment-1 .. attachment-N.
 */

import type { Request, Response } from 'express';
import { z } from 'zod';
import { errorMessage } from '../api/errors';
import { type EmailAttachment, SESSION_HEADER } from '../api/mailgun';
import { type InboundEmailEvent, routeInboundReply } from '../src/replyRouter';

const field = z.string().catch('');

const inboundBodySchema = z.object({
  sender: field,
  from: field,
  recipient: field,
  subject: field,
  'body-plain': field,
  'body-html': field,
  'Message-Id': field,
  'message-headers': field,
  [SESSION_HEADER]: field,
  signature: field,
  token: field,
  timestamp: field,
  'attachment-count': field,
});

const headerPairsSchema = z.array(z.tuple([z.string(), z.string()]));

/**
 * Header value from Mailgun's message-headers JSON ([[name, value], ...])
 */
export function findMessageHeader(messageHeaders: string, name: string): string {
  if (!messageHeaders) {
    return '';
  }
  try {
    const parsed = headerPairsSchema.safeParse(JSON.parse(messageHeaders));
    if (!parsed.success) {
      return '';
    }
    const wanted = name.toLowerCase();
    const pair = parsed.data.find(([header]) => header.toLowerCase() === wanted);
    return pair ? pair[1] : '';
  } catch {
    return '';
  }
}

/**
 * Uploaded attachment-<n> parts, in attachment order
 * Bounded by attachment-count when Mailgun sends it.
 */
export function collectAttachments(files: Express.Multer.File[], attachmentCount: string): EmailAttachment[] {
  const limit = parseInt(attachmentCount, 10);
  const indexed: Array<{ index: number; attachment: EmailAttachment }> = [];

  for (const file of files) {
    const match = /^attachment-(\d+)$/.exec(file.fieldname);
    if (!match) continue;
    const index = parseInt(match[1], 10);
    if (Number.isFinite(limit) && index > limit) continue;
    indexed.push({
      index,
      attachment: {
        filename: file.originalname || `attachment-${index}`,
        contentType: file.mimetype || 'application/octet-stream',
        content: file.buffer,
      },
    });
  }

  return indexed.sort((a, b) => a.index - b.index).map((entry) => entry.attachment);
}

/**
 * Map the Mailgun form post to an inbound event
 */
export function toInboundEvent(body: unknown, files: Express.Multer.File[]): InboundEmailEvent {
  const parsed = inboundBodySchema.parse(typeof body === 'object' && body !== null ? body : {});
  const headers = parsed['message-headers'];

  return {
    sender: parsed.sender || parsed.from,
    recipient: parsed.recipient,
    subject: parsed.subject,
    bodyPlain: parsed['body-plain'],
    bodyHtml: parsed['body-html'],
    sessionHeader: parsed[SESSION_HEADER] || findMessageHeader(headers, SESSION_HEADER),
    messageId: parsed['Message-Id'] || findMessageHeader(headers, 'Message-Id'),
    signature: parsed.signature,
    token: parsed.token,
    timestamp: parsed.timestamp,
    attachments: collectAttachments(files, parsed['attachment-count']),
  };
}

function uploadedFiles(req: Request): Express.Multer.File[] {
  return Array.isArray(req.files) ? req.files : [];
}

export async function handleIncomingEmail(req: Request, res: Response): Promise<void> {
  try {
    const event = toInboundEvent(req.body, uploadedFiles(req));
    console.log(
      `📥 Incoming email: from=${event.sender}, to=${event.recipient}, subject="${event.subject}", attachments=${event.attachments.length}`
    );

    const result = await routeInboundReply(event);

    switch (result.outcome) {
      case 'rejected':
        res.status(400).json({ error: 'Session ID not found' });
        return;
      case 'duplicate':
        res.status(200).json({ status: 'success', outcome: result.outcome, message: 'Duplicate delivery ignored' });
        return;
      case 'posted_only':
        res.status(200).json({
          status: 'success',
          outcome: result.outcome,
          message: result.forwardError
            ? `Posted to Crisp, forward failed: ${result.forwardError}`
            : 'Posted to Crisp, sender not recognized',
        });
        return;
      case 'forwarded':
        res.status(200).json({
          status: 'success',
          outcome: result.outcome,
          message: `Email forwarded to ${result.forwardedTo ?? ''}`,
        });
        return;
    }
  } catch (error: unknown) {
    console.error('Error processing incoming email:', error);
    res.status(500).json({ error: errorMessage(error) });
  }
}
