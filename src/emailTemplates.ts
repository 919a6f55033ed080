/**
 * Message and email bodies
 * Conversation posts are plain text; the distributor introduction also has an HTML variant.
 */

import { fileNameFromUrl } from './formFields';

export const ATTACHMENT_MARKER = '📎 Attachment:';

export const REPLY_SUMMARY_HEADER = '📧 Email Reply Received';

/** Sender labels used in reply summaries for the two known parties */
export const REPLY_SENDER_LABELS = {
  customer: 'Customer',
  distributor: 'Distributor',
} as const;

export interface InquiryDetails {
  customerName: string;
  customerEmail: string;
  message: string;
  country: string;
  city: string;
  countryCode: string;
}

export interface DistributorEmail {
  subject: string;
  text: string;
  html: string;
}

export interface AttachmentSummary {
  filename: string;
  contentType: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function formatLocation(city: string, country: string): string {
  return [city, country].filter((part) => part.trim()).join(', ') || 'Unknown';
}

/**
 * Conversation message for a form submission: the customer's text followed by file links
 * Returns '' when there is neither text nor files.
 */
export function buildInquiryMessage(message: string, fileUrls: string[]): string {
  const fileLinks = fileUrls.map((url) => `${ATTACHMENT_MARKER} ${fileNameFromUrl(url)}\n${url}`);
  return [message.trim(), ...fileLinks].filter((block) => block.length > 0).join('\n\n');
}

/**
 * Introduction email sent to a distributor (customer in CC)
 */
export function buildDistributorEmail(inquiry: InquiryDetails): DistributorEmail {
  const location = formatLocation(inquiry.city, inquiry.country);
  const countryCode = inquiry.countryCode || 'N/A';
  const message = inquiry.message.trim() || '(No message content)';

  const text = `New Customer Inquiry

Customer Information:
- Name: ${inquiry.customerName}
- Email: ${inquiry.customerEmail}
- Location: ${location}
- Country Code: ${countryCode}

Message:
${message}

---
IMPORTANT:
- Please reply to this email to respond to the customer
- Your response will be sent to: ${inquiry.customerEmail}
- The customer is CC'd on this email and will see your reply
`;

  const html = `<!DOCTYPE html>
<html>
<head>
  <style>
    body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; }
    .container { max-width: 600px; margin: 0 auto; padding: 20px; }
    .header { background: #0066cc; color: white; padding: 15px; border-radius: 5px 5px 0 0; }
    .content { background: #f9f9f9; padding: 20px; border: 1px solid #ddd; }
    .message-box { background: white; padding: 15px; margin: 15px 0; border-left: 4px solid #0066cc; }
    .info-table td { padding: 8px; border-bottom: 1px solid #eee; }
    .important { background: #fff3cd; border: 1px solid #ffc107; padding: 15px; margin: 15px 0; border-radius: 5px; }
  </style>
</head>
<body>
  <div class="container">
    <div class="header"><h2 style="margin: 0;">New Customer Inquiry</h2></div>
    <div class="content">
      <h3>Customer Information</h3>
      <table class="info-table">
        <tr><td>Name:</td><td>${escapeHtml(inquiry.customerName)}</td></tr>
        <tr><td>Email:</td><td><a href="mailto:${escapeHtml(inquiry.customerEmail)}">${escapeHtml(inquiry.customerEmail)}</a></td></tr>
        <tr><td>Location:</td><td>${escapeHtml(location)}</td></tr>
        <tr><td>Country Code:</td><td>${escapeHtml(countryCode)}</td></tr>
      </table>
      <h3>Customer Message</h3>
      <div class="message-box">${escapeHtml(message).replace(/\n/g, '<br>')}</div>
      <div class="important">
        <strong>IMPORTANT:</strong>
        <ul>
          <li>Please <strong>reply to this email</strong> to respond to the customer</li>
          <li>Your response will be sent to: <strong>${escapeHtml(inquiry.customerEmail)}</strong></li>
          <li>The customer is CC'd on this email and will see your reply</li>
        </ul>
      </div>
    </div>
  </div>
</body>
</html>
`;

  return {
    subject: `New Customer Inquiry - ${inquiry.customerName} (${countryCode})`,
    text,
    html,
  };
}

/**
 * Conversation post for an inbound email reply
 */
export function buildReplySummary(
  senderLabel: string,
  subject: string,
  body: string,
  attachments: AttachmentSummary[]
): string {
  const lines = [REPLY_SUMMARY_HEADER, '', `From: ${senderLabel}`, `Subject: ${subject}`, '', body];
  if (attachments.length > 0) {
    lines.push('', 'Attachments:');
    for (const attachment of attachments) {
      lines.push(`- ${attachment.filename} (${attachment.contentType})`);
    }
  }
  return lines.join('\n');
}

export interface ParsedReplySummary {
  senderLabel: string;
  body: string;
}

/**
 * Reverse of buildReplySummary; null when the content is not a reply summary
 */
export function parseReplySummary(content: string): ParsedReplySummary | null {
  const lines = content.split('\n');
  if (lines[0] !== REPLY_SUMMARY_HEADER || lines.length < 5) {
    return null;
  }
  if (!lines[2].startsWith('From: ') || !lines[3].startsWith('Subject: ')) {
    return null;
  }

  let body = lines.slice(5).join('\n');
  const attachmentsAt = body.lastIndexOf('\n\nAttachments:\n');
  if (attachmentsAt >= 0) {
    body = body.slice(0, attachmentsAt);
  }
  return { senderLabel: lines[2].slice('From: '.length), body: body.trim() };
}

/**
 * Customer-facing message after the inquiry is handed to a distributor
 */
export function buildDistributorDisclosure(distributorEmail: string): string {
  return (
    'Thank you for your inquiry. It has been forwarded to our local distributor, ' +
    `who will contact you directly. You can also reach them at ${distributorEmail}.`
  );
}

/**
 * Internal note recording a manual distributor forward
 */
export function buildForwardNote(distributorEmail: string, customerEmail: string, at: Date): string {
  return [
    '📨 Forwarded to distributor',
    `Distributor: ${distributorEmail}`,
    `Customer (CC): ${customerEmail}`,
    `At: ${at.toISOString()}`,
  ].join('\n');
}
