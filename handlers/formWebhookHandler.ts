/**
 * Webhook handler for JotForm submissions
 * POST /webhook/jotform
 */

import type { Request, Response } from 'express';
import { errorMessage } from '../api/errors';
import { type Geolocation, lookupGeolocation, testGeolocation } from '../api/geolocation';
import { config } from '../config/env';
import { extractFormPayload, extractSubmission } from '../src/formFields';
import { processSubmission } from '../src/submissionProcessor';

export async function handleFormWebhook(req: Request, res: Response): Promise<void> {
  try {
    const contentType = req.headers['content-type'] ?? '';
    console.log(`📝 Form webhook received (content-type: ${contentType || 'none'})`);

    const payload = extractFormPayload(req.body, contentType.includes('application/json'), req.ip ?? '');
    const submission = extractSubmission(payload.fields);

    if (!submission.email) {
      console.error('No email found in form submission');
      res.status(400).json({ error: 'Email is required' });
      return;
    }

    let geolocation: Geolocation;
    if (payload.testCountryCode && config.features.testCountryOverride) {
      console.log(`🧪 TEST MODE: Overriding country code to ${payload.testCountryCode.toUpperCase()}`);
      geolocation = testGeolocation(payload.testCountryCode);
    } else {
      geolocation = await lookupGeolocation(payload.clientIp);
    }

    const success = await processSubmission(submission, geolocation, payload.clientIp);

    if (success) {
      res.status(200).json({ status: 'success', message: 'Form processed successfully' });
    } else {
      res.status(500).json({ status: 'error', message: 'Failed to process form' });
    }
  } catch (error: unknown) {
    console.error('Error processing form webhook:', error);
    res.status(500).json({ error: errorMessage(error) });
  }
}
