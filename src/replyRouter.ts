/**
 * Inbound reply routing
 * An email sent to conversation+{session}@domain is posted to its Crisp conversation
 * and relayed to the other party: customer -> distributor, distributor -> customer.
 *
 * The dedup signature is claimed before any side effect, so a redelivered event
 * never posts or emails twice (at-most-once per signature).
 */

import { sendMessage } from '../api/crisp';
import { errorMessage } from '../api/errors';
import { type EmailAttachment, sendEmail } from '../api/mailgun';
import { sendErrorAlert } from '../api/slack';
import { claimSignature, computeSignature } from '../state/processedMessages';
import { loadConversationMeta, readParties } from './conversationContext';
import { buildReplySummary, REPLY_SENDER_LABELS } from './emailTemplates';
import {
  attributeSender,
  cleanReplyBody,
  extractSessionId,
  isDeliverableAddress,
  replySubject,
  type SenderRole,
} from './replyText';

export interface InboundEmailEvent {
  sender: string;
  recipient: string;
  subject: string;
  bodyPlain: string;
  bodyHtml: string;
  sessionHeader?: string;
  messageId?: string;
  signature?: string;
  token?: string;
  timestamp?: string;
  attachments: EmailAttachment[];
}

export type ReplyOutcome = 'forwarded' | 'posted_only' | 'duplicate' | 'rejected';

export interface ReplyRouteResult {
  outcome: ReplyOutcome;
  sessionId: string | null;
  senderRole?: SenderRole;
  forwardedTo?: string;
  forwardError?: string;
  reason?: string;
}

/**
 * Route one inbound email event
 * Never throws for upstream API failures; they degrade the outcome instead.
 */
export async function routeInboundReply(event: InboundEmailEvent): Promise<ReplyRouteResult> {
  const sessionId = extractSessionId(event.sessionHeader, event.recipient);
  if (!sessionId) {
    console.error(`Could not extract session ID from incoming email (recipient=${event.recipient})`);
    return { outcome: 'rejected', sessionId: null, reason: 'Session ID not found' };
  }

  const signature = computeSignature({
    messageId: event.messageId,
    signature: event.signature,
    token: event.token,
    timestamp: event.timestamp,
    sender: event.sender,
    sessionId,
    subject: event.subject,
    body: event.bodyPlain,
  });

  if (!claimSignature(signature)) {
    console.log(`Duplicate inbound email ignored: session=${sessionId}, signature=${signature}`);
    return { outcome: 'duplicate', sessionId };
  }

  const meta = await loadConversationMeta(sessionId);
  const { customerEmail, distributorEmail } = readParties(meta);
  console.log(
    `Conversation participants: session=${sessionId}, customer=${customerEmail || '(none)'}, distributor=${distributorEmail || '(none)'}`
  );

  const senderRole = attributeSender(event.sender, customerEmail, distributorEmail);
  const cleanBody = cleanReplyBody(event.bodyPlain);

  const summary = buildReplySummary(
    senderRole === 'unknown' ? event.sender : REPLY_SENDER_LABELS[senderRole],
    event.subject,
    cleanBody,
    event.attachments.map((attachment) => ({
      filename: attachment.filename,
      contentType: attachment.contentType,
    }))
  );

  try {
    await sendMessage(sessionId, summary);
    console.log(`✅ Posted email reply to Crisp (session ${sessionId})`);
  } catch (error: unknown) {
    console.error(`❌ Failed to post email reply to Crisp (session ${sessionId}): ${errorMessage(error)}`);
  }

  if (senderRole === 'unknown') {
    console.warn(`⚠️ Reply from unknown sender, not forwarding: ${event.sender}`);
    return { outcome: 'posted_only', sessionId, senderRole, reason: 'Sender not recognized' };
  }

  const forwardTo = senderRole === 'customer' ? distributorEmail : customerEmail;
  if (!isDeliverableAddress(forwardTo)) {
    const forwardError = `Invalid email address: ${forwardTo || '(empty)'}`;
    console.error(`❌ Cannot forward ${senderRole} reply: ${forwardError}`);
    return { outcome: 'posted_only', sessionId, senderRole, forwardError };
  }

  try {
    await sendEmail({
      to: forwardTo,
      cc: null,
      subject: replySubject(event.subject),
      text: cleanBody,
      html: event.bodyHtml || undefined,
      sessionId,
      attachments: event.attachments,
      tags: ['reply-forward'],
    });
    console.log(`✅ Forwarded ${senderRole} reply to: ${forwardTo}`);
    return { outcome: 'forwarded', sessionId, senderRole, forwardedTo: forwardTo };
  } catch (error: unknown) {
    const forwardError = errorMessage(error);
    console.error(`❌ Failed to forward reply to ${forwardTo}: ${forwardError}`);
    await sendErrorAlert('Failed to forward email reply', {
      session_id: sessionId,
      sender: event.sender,
      customer_email: customerEmail,
      distributor_email: distributorEmail,
      error: forwardError,
    });
    return { outcome: 'posted_only', sessionId, senderRole, forwardError };
  }
}
