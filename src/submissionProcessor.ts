/**
 * Form submission -> Crisp conversation
 * Only conversation creation is required; every later step is best-effort
 * and logged on failure, so a created conversation always counts as success.
 */

import {
  assignConversation,
  type ConversationMeta,
  createConversation,
  findPeopleProfiles,
  sendMessage,
  updateConversationMeta,
  updatePeopleProfile,
} from '../api/crisp';
import { errorMessage } from '../api/errors';
import type { Geolocation } from '../api/geolocation';
import { sendEmail } from '../api/mailgun';
import { sendErrorAlert } from '../api/slack';
import { config } from '../config/env';
import { lookupRouting } from '../config/routingTable';
import { resolveAssignment, type Assignment } from './assignmentPolicy';
import { buildDistributorEmail, buildInquiryMessage } from './emailTemplates';
import type { Submission } from './formFields';

export type RoutingMethod = 'email_forwarding' | 'manual_forward';

/**
 * Metadata blob written to a new conversation
 */
export function buildConversationMeta(
  submission: Submission,
  geolocation: Geolocation,
  clientIp: string,
  assignment: Assignment,
  distributorEmail: string | null,
  routingMethod: RoutingMethod
): ConversationMeta {
  const segments = ['ContactForm', `Country: ${submission.country}`];
  if (distributorEmail) {
    segments.push('DistributorAvailable');
  }

  return {
    email: submission.email,
    nickname: submission.customerName,
    subject: `Customer Inquiry - ${geolocation.countryCode || 'Unknown'}`,
    ip: clientIp,
    segments,
    device: {
      geolocation: {
        country: geolocation.countryCode,
        region: geolocation.region,
        city: geolocation.city,
        coordinates: {
          latitude: geolocation.latitude,
          longitude: geolocation.longitude,
        },
      },
    },
    data: {
      customer_email: submission.email,
      customer_name: submission.customerName,
      distributor_email: distributorEmail ?? '',
      agent_id: assignment.agentId,
      agent_source: assignment.source,
      routing_method: routingMethod,
      form_message: submission.message,
      form_country: submission.country,
      form_city: submission.city,
    },
  };
}

async function bestEffort(step: string, sessionId: string, action: () => Promise<unknown>): Promise<boolean> {
  try {
    await action();
    console.log(`✅ ${step} (session ${sessionId})`);
    return true;
  } catch (error: unknown) {
    console.error(`❌ ${step} failed (session ${sessionId}): ${errorMessage(error)}`);
    return false;
  }
}

/**
 * Create and enrich the conversation for one form submission
 * @returns true once the conversation exists, false if it could not be created
 */
export async function processSubmission(
  submission: Submission,
  geolocation: Geolocation,
  clientIp: string
): Promise<boolean> {
  console.log(`Customer: ${submission.customerName} (${submission.email})`);
  console.log(`Location (self-reported): ${submission.city}, ${submission.country}`);

  // Routing uses the IP country; the self-reported country is display only
  const routing = lookupRouting(geolocation.countryCode);
  const assignment = resolveAssignment(routing);
  const distributorEmail = routing.distributorEmail?.trim() || null;
  const autoForward = config.features.autoForwardOnSubmission && distributorEmail !== null;

  console.log(`Agent assignment: ${assignment.agentId} (${assignment.label})`);
  console.log(`Distributor email: ${distributorEmail ?? 'NONE'}`);

  let sessionId: string;
  try {
    sessionId = await createConversation();
  } catch (error: unknown) {
    const message = errorMessage(error);
    console.error(`Failed to create Crisp conversation: ${message}`);
    await sendErrorAlert('Could not create conversation for form submission', {
      customer_email: submission.email,
      error: message,
    });
    return false;
  }

  const meta = buildConversationMeta(
    submission,
    geolocation,
    clientIp,
    assignment,
    distributorEmail,
    autoForward ? 'email_forwarding' : 'manual_forward'
  );
  await bestEffort('Updated conversation metadata', sessionId, () => updateConversationMeta(sessionId, meta));

  await bestEffort(`Assigned to agent ${assignment.agentId}`, sessionId, () =>
    assignConversation(sessionId, assignment.agentId)
  );

  const inquiryMessage = buildInquiryMessage(submission.message, submission.fileUrls);
  if (inquiryMessage) {
    const posted = await bestEffort('Posted inquiry message', sessionId, () =>
      sendMessage(sessionId, inquiryMessage)
    );
    if (!posted) {
      console.warn('Message not posted to conversation, but stored in metadata data.form_message');
    }
  }

  if (config.features.syncContactProfiles) {
    await bestEffort('Synced contact profile', sessionId, async () => {
      const [profile] = await findPeopleProfiles(submission.email);
      if (profile) {
        await updatePeopleProfile(profile.people_id, submission.email, {
          nickname: submission.customerName,
          geolocation: { city: submission.city, country: geolocation.countryCode },
        });
      }
    });
  }

  if (autoForward && distributorEmail) {
    const email = buildDistributorEmail({
      customerName: submission.customerName,
      customerEmail: submission.email,
      message: submission.message,
      country: submission.country,
      city: submission.city,
      countryCode: geolocation.countryCode,
    });
    await bestEffort(`Sent inquiry to distributor ${distributorEmail}`, sessionId, () =>
      sendEmail({
        to: distributorEmail,
        cc: submission.email,
        subject: email.subject,
        text: email.text,
        html: email.html,
        sessionId,
        tags: ['distributor-forwarding'],
      })
    );
  }

  console.log(`✅ Successfully processed submission - Crisp session: ${sessionId}`);
  return true;
}
