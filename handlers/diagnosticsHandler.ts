/**
 * Operational endpoints: health, service descriptor, raw webhook capture, Crisp credential check
 */

import type { Request, Response } from 'express';
import { checkMessagingAuth } from '../api/crisp';
import { errorMessage } from '../api/errors';
import { config } from '../config/env';
import { getRoutingTableSize } from '../config/routingTable';
import { getStateStats } from '../state/processedMessages';

export const SERVICE_NAME = 'Contact Form Relay';
export const SERVICE_VERSION = '2.1.0';

// GET /health
export function handleHealth(_req: Request, res: Response): void {
  const stats = getStateStats();
  res.status(200).json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: config.environment,
    stats: {
      processedMessages: stats.processedCount,
      dedupCapacity: stats.capacity,
      routingEntries: getRoutingTableSize(),
    },
  });
}

// GET /
export function handleServiceInfo(_req: Request, res: Response): void {
  res.status(200).json({
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    endpoints: {
      webhook: '/webhook/jotform',
      mailgun_incoming: '/webhook/mailgun-incoming',
      forward_to_distributor: '/action/forward-to-distributor/:sessionId',
      webhook_debug: '/webhook/debug',
      messaging_check: '/diagnostics/messaging',
      health: '/health',
    },
    features: [
      'JotForm webhook processing',
      'IP geolocation lookup',
      'Crisp conversation creation',
      'Country routing to agents and distributors',
      'Email reply relay via Mailgun',
      'Manual forward to distributor',
    ],
  });
}

// POST /webhook/debug - logs and echoes whatever was posted
export function handleDebugWebhook(req: Request, res: Response): void {
  const payloadInfo = {
    method: req.method,
    content_type: req.headers['content-type'] ?? null,
    headers: req.headers,
    query: req.query,
    body: req.body ?? null,
  };
  console.log('DEBUG WEBHOOK RECEIVED:', JSON.stringify(payloadInfo, null, 2));
  res.status(200).json({
    status: 'success',
    message: 'Debug payload received and logged',
    payload: payloadInfo,
  });
}

// GET /diagnostics/messaging
export async function handleMessagingCheck(_req: Request, res: Response): Promise<void> {
  try {
    const result = await checkMessagingAuth();
    console.log(`Crisp API test - Status: ${result.status}`);
    if (result.ok) {
      res.status(200).json({ status: 'success', message: 'Crisp API authentication successful' });
    } else {
      res.status(400).json({
        status: 'error',
        message: 'Crisp API authentication failed',
        status_code: result.status,
        response: result.body,
      });
    }
  } catch (error: unknown) {
    console.error('Error testing Crisp API:', error);
    res.status(500).json({ error: errorMessage(error) });
  }
}
