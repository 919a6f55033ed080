/**
 * In-memory duplicate detection for inbound email webhooks
 * Tracks signatures of inbound events already handled, bounded to a maximum size.
 * Process-local: lost on restart and not shared between instances.
 */

import { createHash } from 'crypto';

// signature -> first seen (ms); Map iteration order is insertion order
const processedSignatures = new Map<string, number>();

let capacity = 1000;

const BODY_HASH_CHARS = 1000;

/**
 * Fields of an inbound event that identify a delivery
 */
export interface SignatureSource {
  messageId?: string;
  signature?: string;
  token?: string;
  timestamp?: string;
  sender: string;
  sessionId: string;
  subject: string;
  body: string;
}

function sha256(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

/**
 * Compute the dedup signature of an inbound event
 * Priority: Message-Id header, then Mailgun signature/token/timestamp, then a content hash
 */
export function computeSignature(source: SignatureSource): string {
  const messageId = (source.messageId || '').trim().replace(/^<+|>+$/g, '').trim();
  if (messageId) {
    return `message-id:${messageId}`;
  }

  const signature = (source.signature || '').trim();
  const token = (source.token || '').trim();
  const timestamp = (source.timestamp || '').trim();
  if (signature && token && timestamp) {
    return `mailgun:${signature}:${token}:${timestamp}`;
  }

  const bodyHash = sha256(source.body.slice(0, BODY_HASH_CHARS));
  return `fallback:${sha256([source.sender.toLowerCase(), source.sessionId, source.subject, bodyHash].join('|'))}`;
}

/**
 * Check-and-insert a signature in one step
 * Runs synchronously, so no other request can interleave between the check and the insert.
 * @returns true if the signature is new (caller owns processing), false if already seen
 */
export function claimSignature(signature: string): boolean {
  if (processedSignatures.has(signature)) {
    return false;
  }
  processedSignatures.set(signature, Date.now());
  evictOverflow();
  return true;
}

/**
 * Check if a signature has already been claimed
 */
export function isProcessed(signature: string): boolean {
  return processedSignatures.has(signature);
}

function evictOverflow(): void {
  while (processedSignatures.size > capacity) {
    const oldest = processedSignatures.keys().next();
    if (oldest.done) {
      return;
    }
    processedSignatures.delete(oldest.value);
  }
}

/**
 * Set the maximum number of signatures kept; evicts immediately if over
 */
export function setDedupCapacity(maxEntries: number): void {
  capacity = Math.max(1, Math.floor(maxEntries));
  evictOverflow();
}

/**
 * Clear all processed signatures
 * Useful for testing or manual cleanup
 */
export function clearProcessedMessages(): void {
  processedSignatures.clear();
}

/**
 * Get statistics about current state
 * Useful for monitoring and debugging
 */
export function getStateStats(): { processedCount: number; capacity: number } {
  return {
    processedCount: processedSignatures.size,
    capacity,
  };
}
