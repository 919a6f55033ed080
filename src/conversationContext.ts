import { getConversationMeta, type ConversationMeta } from '../api/crisp';
import { errorMessage } from '../api/errors';

export interface ConversationParties {
  customerEmail: string;
  distributorEmail: string;
}

function dataString(meta: ConversationMeta, key: string): string {
  const value = meta.data?.[key];
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Customer and distributor addresses recorded when the conversation was created
 * customer_email falls back to the conversation email; legacy "none" means no distributor.
 */
export function readParties(meta: ConversationMeta): ConversationParties {
  const customerEmail = dataString(meta, 'customer_email') || (meta.email ?? '').trim();
  const distributorEmail = dataString(meta, 'distributor_email');
  return {
    customerEmail,
    distributorEmail: distributorEmail.toLowerCase() === 'none' ? '' : distributorEmail,
  };
}

export function readFormMessage(meta: ConversationMeta): string {
  return dataString(meta, 'form_message');
}

/**
 * Metadata read that degrades to an empty record when Crisp is unreachable
 */
export async function loadConversationMeta(sessionId: string): Promise<ConversationMeta> {
  try {
    return await getConversationMeta(sessionId);
  } catch (error: unknown) {
    console.error(`Error getting conversation meta for ${sessionId}: ${errorMessage(error)}`);
    return {};
  }
}
