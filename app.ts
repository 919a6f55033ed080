/**
 * Express application
 * Routes:
 * - POST /webhook/jotform                           form submissions
 * - POST /webhook/mailgun-incoming                  email replies to conversation+{session}@domain
 * - POST /action/forward-to-distributor/:sessionId  operator action
 * - GET  /health, GET /, POST /webhook/debug, GET /diagnostics/messaging
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import multer from 'multer';
import { errorMessage } from './api/errors';
import { config } from './config/env';
import { handleFormWebhook } from './handlers/formWebhookHandler';
import { handleIncomingEmail } from './handlers/incomingEmailHandler';
import { handleForwardToDistributor } from './handlers/forwardActionHandler';
import {
  handleDebugWebhook,
  handleHealth,
  handleMessagingCheck,
  handleServiceInfo,
} from './handlers/diagnosticsHandler';

// Mailgun caps inbound messages at 25MB
const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

export function createApp(): Express {
  const app = express();

  // Multipart bodies (Mailgun inbound, JotForm) are parsed per route; files stay in memory
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_UPLOAD_BYTES },
  });

  // Middleware
  app.use(express.json({ limit: '5mb' })); // Parse JSON request bodies
  app.use(express.urlencoded({ extended: true, limit: '30mb' })); // Parse URL-encoded bodies

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    console.log(`${new Date().toISOString()} - ${req.method} ${req.path}`);
    next();
  });

  app.get('/', handleServiceInfo);
  app.get('/health', handleHealth);
  app.get('/diagnostics/messaging', handleMessagingCheck);

  // Webhook endpoints
  app.post('/webhook/jotform', upload.any(), handleFormWebhook);
  app.post('/webhook/mailgun-incoming', upload.any(), handleIncomingEmail);
  app.post('/webhook/debug', upload.any(), handleDebugWebhook);

  // Operator actions
  app.post('/action/forward-to-distributor/:sessionId', handleForwardToDistributor);

  // 404 handler for undefined routes
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Route not found' });
  });

  // Errors raised by body parsers and upload handling
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Error:', err);
    res.status(500).json({
      error: 'Internal server error',
      message: config.environment === 'development' ? errorMessage(err) : 'Something went wrong',
    });
  });

  return app;
}
