/**
 * Manual "forward to distributor" action
 * Triggered by an operator for one conversation. Steps already performed are not
 * rolled back when a later step aborts the sequence.
 */

import {
  assignConversation,
  type ConversationMessage,
  getConversationMessages,
  sendOperatorMessage,
  unassignConversation,
  updateConversationMeta,
} from '../api/crisp';
import { errorMessage } from '../api/errors';
import { sendEmail } from '../api/mailgun';
import { sendErrorAlert } from '../api/slack';
import { config } from '../config/env';
import { lookupRouting } from '../config/routingTable';
import { loadConversationMeta, readFormMessage, readParties } from './conversationContext';
import {
  buildDistributorDisclosure,
  buildDistributorEmail,
  buildForwardNote,
  parseReplySummary,
  REPLY_SENDER_LABELS,
} from './emailTemplates';
import { EMPTY_BODY_PLACEHOLDER, isDeliverableAddress } from './replyText';

export type DistributorForwardOutcome = 'forwarded' | 'missing_customer' | 'no_distributor' | 'send_failed';

export interface DistributorForwardResult {
  outcome: DistributorForwardOutcome;
  sessionId: string;
  distributorEmail?: string;
  error?: string;
}

/**
 * Text the customer wrote in a user message, or null
 * Relayed email replies are posted as user messages too; only those from the customer count,
 * and only their body.
 */
function customerAuthoredText(message: ConversationMessage): string | null {
  if (message.type !== 'text' || message.from !== 'user' || typeof message.content !== 'string') {
    return null;
  }
  const summary = parseReplySummary(message.content);
  if (summary && summary.senderLabel !== REPLY_SENDER_LABELS.customer) {
    return null;
  }
  const text = summary ? summary.body : message.content.trim();
  return text && text !== EMPTY_BODY_PLACEHOLDER ? text : null;
}

/**
 * Newest text written by the customer, or null
 */
export function latestCustomerText(messages: ConversationMessage[]): string | null {
  let latest: { text: string; timestamp: number } | null = null;
  for (const message of messages) {
    const text = customerAuthoredText(message);
    if (text === null) continue;
    const timestamp = message.timestamp ?? 0;
    if (!latest || timestamp >= latest.timestamp) {
      latest = { text, timestamp };
    }
  }
  return latest ? latest.text : null;
}

async function logFailure(step: string, sessionId: string, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error: unknown) {
    console.error(`❌ ${step} failed (session ${sessionId}): ${errorMessage(error)}`);
  }
}

export async function forwardToDistributor(sessionId: string): Promise<DistributorForwardResult> {
  console.log(`📨 Forward-to-distributor requested for session ${sessionId}`);

  const meta = await loadConversationMeta(sessionId);
  const { customerEmail, distributorEmail: storedDistributor } = readParties(meta);
  if (!customerEmail) {
    console.error(`Customer email not found in metadata for session ${sessionId}`);
    return { outcome: 'missing_customer', sessionId };
  }

  await logFailure('Reassign to help desk', sessionId, () =>
    assignConversation(sessionId, config.agents.helpdesk)
  );

  let customerText: string | null = null;
  try {
    customerText = latestCustomerText(await getConversationMessages(sessionId));
  } catch (error: unknown) {
    console.error(`Could not read conversation messages for ${sessionId}: ${errorMessage(error)}`);
  }
  const message = customerText ?? readFormMessage(meta);

  const countryCode = (meta.device?.geolocation?.country ?? '').trim().toUpperCase();
  const routed = lookupRouting(countryCode).distributorEmail;
  const distributorEmail = isDeliverableAddress(routed)
    ? routed.trim()
    : isDeliverableAddress(storedDistributor)
      ? storedDistributor
      : null;

  if (!distributorEmail) {
    console.warn(`No distributor for country ${countryCode || '(unknown)'} (session ${sessionId})`);
    return { outcome: 'no_distributor', sessionId };
  }

  const customerName = meta.nickname?.trim() || customerEmail;
  const country = typeof meta.data?.form_country === 'string' ? meta.data.form_country : '';
  const city = typeof meta.data?.form_city === 'string' ? meta.data.form_city : '';
  const email = buildDistributorEmail({
    customerName,
    customerEmail,
    message,
    country,
    city,
    countryCode,
  });

  try {
    await sendEmail({
      to: distributorEmail,
      cc: customerEmail,
      subject: email.subject,
      text: email.text,
      html: email.html,
      sessionId,
      tags: ['distributor-forwarding'],
    });
  } catch (error: unknown) {
    const failure = errorMessage(error);
    console.error(`❌ Failed to send email to distributor ${distributorEmail}: ${failure}`);
    await sendErrorAlert('Manual forward to distributor failed', {
      session_id: sessionId,
      customer_email: customerEmail,
      distributor_email: distributorEmail,
      error: failure,
    });
    return { outcome: 'send_failed', sessionId, distributorEmail, error: failure };
  }

  const forwardedAt = new Date();
  await logFailure('Post distributor contact to customer', sessionId, () =>
    sendOperatorMessage(sessionId, buildDistributorDisclosure(distributorEmail), 'text')
  );
  await logFailure('Post forward note', sessionId, () =>
    sendOperatorMessage(sessionId, buildForwardNote(distributorEmail, customerEmail, forwardedAt), 'note')
  );
  await logFailure('Record forward in metadata', sessionId, () =>
    updateConversationMeta(sessionId, {
      data: { ...meta.data, forwarded_to_distributor_at: forwardedAt.toISOString() },
    })
  );
  await logFailure('Unassign conversation', sessionId, () => unassignConversation(sessionId));

  console.log(`✅ Forwarded session ${sessionId} to distributor ${distributorEmail}`);
  return { outcome: 'forwarded', sessionId, distributorEmail };
}
