/**
 * Operator action: hand a conversation to the country distributor
 * POST /action/forward-to-distributor/:sessionId
 */

import type { Request, Response } from 'express';
import { errorMessage } from '../api/errors';
import { forwardToDistributor } from '../src/distributorForward';

export async function handleForwardToDistributor(req: Request, res: Response): Promise<void> {
  try {
    const sessionId = (req.params.sessionId || '').trim();
    if (!sessionId) {
      res.status(400).json({ error: 'Session ID is required' });
      return;
    }

    const result = await forwardToDistributor(sessionId);

    switch (result.outcome) {
      case 'forwarded':
        res.status(200).json({
          status: 'success',
          distributor: result.distributorEmail,
          message: `Conversation forwarded to ${result.distributorEmail ?? 'distributor'}`,
        });
        return;
      case 'missing_customer':
        res.status(400).json({ error: 'Customer email not found' });
        return;
      case 'no_distributor':
        res.status(404).json({ error: 'No distributor found for this country' });
        return;
      case 'send_failed':
        res.status(500).json({ error: 'Failed to send email to distributor' });
        return;
    }
  } catch (error: unknown) {
    console.error('Error forwarding to distributor:', error);
    res.status(500).json({ error: errorMessage(error) });
  }
}
