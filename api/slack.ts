/**
 * Slack alert wrapper
 * Function: sendAlert(message, metadata)
 * Used for failed reply forwards, failed distributor forwards and conversations that could not be created
 */

import axios from 'axios';
import { config } from '../config/env';
import { errorMessage } from './errors';

/**
 * Interface for alert metadata
 */
export interface AlertMetadata {
  event?: string;
  session_id?: string;
  customer_email?: string;
  distributor_email?: string;
  sender?: string;
  error?: string;
}

interface AlertField {
  title: string;
  value: string;
  short: boolean;
}

const FIELD_TITLES: Array<[keyof AlertMetadata, string, boolean]> = [
  ['event', 'Event', true],
  ['session_id', 'Session ID', true],
  ['customer_email', 'Customer Email', true],
  ['distributor_email', 'Distributor Email', true],
  ['sender', 'Sender', true],
  ['error', 'Error', false],
];

/**
 * Send alert to Slack via webhook
 * No-op when SLACK_WEBHOOK_URL is not configured.
 * Never throws - alert failures are logged so they cannot break the request being handled.
 */
export async function sendAlert(message: string, metadata?: AlertMetadata): Promise<void> {
  const webhookUrl = config.slack.webhookUrl;
  if (!webhookUrl) {
    return;
  }

  try {
    const fields: AlertField[] = [];
    if (metadata) {
      for (const [key, title, short] of FIELD_TITLES) {
        const value = metadata[key];
        if (value) {
          fields.push({ title, value, short });
        }
      }
      fields.push({ title: 'Timestamp', value: new Date().toISOString(), short: true });
    }

    const payload = {
      text: message,
      blocks: [
        {
          type: 'header',
          text: {
            type: 'plain_text',
            text: '🚨 Form Relay Alert',
            emoji: true,
          },
        },
        {
          type: 'section',
          text: {
            type: 'mrkdwn',
            text: `*Message:*\n${message}`,
          },
        },
      ],
      attachments: [
        {
          color: metadata?.event === 'error' ? 'danger' : 'warning',
          fields,
        },
      ],
    };

    await axios.post(webhookUrl, payload, {
      headers: {
        'Content-Type': 'application/json',
      },
      timeout: config.httpTimeoutMs,
    });
  } catch (error: unknown) {
    console.error('Failed to send Slack alert:', errorMessage(error));
  }
}

/**
 * Helper function to send error alerts
 */
export async function sendErrorAlert(errorText: string, metadata?: AlertMetadata): Promise<void> {
  await sendAlert(`❌ Error: ${errorText}`, {
    ...metadata,
    event: 'error',
  });
}

/**
 * Helper function to send warning alerts
 */
export async function sendWarningAlert(warningText: string, metadata?: AlertMetadata): Promise<void> {
  await sendAlert(`⚠️ Warning: ${warningText}`, {
    ...metadata,
    event: 'warning',
  });
}
