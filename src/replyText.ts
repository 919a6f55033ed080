/**
 * Helpers for inbound email replies: correlation, sender attribution and body cleanup
 */

export type SenderRole = 'customer' | 'distributor' | 'unknown';

export const EMPTY_BODY_PLACEHOLDER = '(No message content)';

const CONVERSATION_ADDRESS = /conversation\+([^@\s<>]+)@/i;

// A line matching any of these starts quoted history or a signature
const QUOTE_MARKERS: RegExp[] = [
  /^\s*(-{3,}|_{3,})/,
  /^\s*From:/i,
  /^\s*Sent from my\b/i,
  /^\s*On\s.+\swrote:\s*$/i,
  /^\s*>/,
];

// "On <date>, <name> <address> wrote:" that mail clients wrap onto up to three lines
const ATTRIBUTION_START = /^\s*On\s/i;
const ATTRIBUTION_END = /(^|\s)wrote:\s*$/i;
const ATTRIBUTION_MAX_LINES = 3;

/**
 * Session id of the conversation an inbound email belongs to
 * From the explicit session header, else from conversation+{id}@domain in the recipient
 */
export function extractSessionId(headerValue: string | undefined, recipient: string): string | null {
  const fromHeader = (headerValue || '').trim();
  if (fromHeader) {
    return fromHeader;
  }
  const match = CONVERSATION_ADDRESS.exec(recipient);
  return match ? match[1] : null;
}

/**
 * Which party sent an email, by case-insensitive containment of the known address in the sender
 * Customer is checked first, so it wins when both match.
 */
export function attributeSender(sender: string, customerEmail: string, distributorEmail: string): SenderRole {
  const senderLower = sender.toLowerCase();
  const customer = customerEmail.trim().toLowerCase();
  const distributor = distributorEmail.trim().toLowerCase();

  if (customer && senderLower.includes(customer)) {
    return 'customer';
  }
  if (distributor && senderLower.includes(distributor)) {
    return 'distributor';
  }
  return 'unknown';
}

/**
 * Drop quoted thread history and signatures from a plain-text reply
 */
function startsWrappedAttribution(lines: string[], index: number): boolean {
  if (!ATTRIBUTION_START.test(lines[index])) {
    return false;
  }
  const last = Math.min(lines.length, index + ATTRIBUTION_MAX_LINES);
  for (let next = index + 1; next < last; next++) {
    if (!lines[next].trim()) {
      return false;
    }
    if (ATTRIBUTION_END.test(lines[next])) {
      return true;
    }
  }
  return false;
}

export function cleanReplyBody(body: string): string {
  const lines = body.split(/\r?\n/);
  const cutoff = lines.findIndex(
    (line, index) =>
      QUOTE_MARKERS.some((marker) => marker.test(line)) || startsWrappedAttribution(lines, index)
  );
  const kept = cutoff >= 0 ? lines.slice(0, cutoff) : lines;
  return kept.join('\n').trim() || EMPTY_BODY_PLACEHOLDER;
}

export function isDeliverableAddress(address: string | null | undefined): address is string {
  return !!address && address.trim().length > 0 && address.includes('@');
}

/**
 * "Re: " prefix unless the subject already has one
 */
export function replySubject(subject: string): string {
  const trimmed = subject.trim();
  return /^re:/i.test(trimmed) ? trimmed : `Re: ${trimmed}`;
}
