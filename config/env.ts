import path from 'path';
import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

/**
 * Environment configuration interface
 * Ensures type safety for all environment variables
 */
export interface EnvConfig {
  port: number;
  environment: string;
  httpTimeoutMs: number;
  crisp: {
    websiteId: string;
    identifier: string;
    apiKey: string;
    baseUrl: string;
  };
  ip2location: {
    apiKey: string;
    baseUrl: string;
  };
  mailgun: {
    apiKey: string;
    domain: string;
    baseUrl: string;
    fromEmail: string;
    fromName: string;
    inboundDomain: string;
  };
  agents: {
    helpdesk: string;
    office: string;
  };
  slack: {
    webhookUrl: string | null;
  };
  routingTablePath: string;
  dedupMaxEntries: number;
  features: {
    autoForwardOnSubmission: boolean;
    testCountryOverride: boolean;
    syncContactProfiles: boolean;
  };
}

const REQUIRED_VARS = [
  'CRISP_WEBSITE_ID',
  'CRISP_API_IDENTIFIER',
  'CRISP_API_KEY',
  'IP2LOCATION_API_KEY',
  'MAILGUN_API_KEY',
  'MAILGUN_DOMAIN',
  'HELPDESK_AGENT_ID',
  'OFFICE_AGENT_ID',
] as const;

type RequiredVar = (typeof REQUIRED_VARS)[number];

function optional(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function parsePositiveInt(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseFlag(name: string): boolean {
  const value = (process.env[name] || '').trim().toLowerCase();
  return value === 'true' || value === '1' || value === 'yes';
}

/**
 * Validates and returns environment configuration
 * Throws error if required variables are missing
 */
export function loadConfig(): EnvConfig {
  const missingVars = REQUIRED_VARS.filter((name) => !optional(name));

  if (missingVars.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missingVars.join(', ')}\n` +
      'Please check your .env file or .env.example for reference.'
    );
  }

  const required = (name: RequiredVar): string => optional(name) ?? '';
  const mailgunDomain = required('MAILGUN_DOMAIN');

  return {
    port: parsePositiveInt('PORT', 5000),
    environment: process.env.NODE_ENV || 'development',
    httpTimeoutMs: parsePositiveInt('HTTP_TIMEOUT_MS', 10000),
    crisp: {
      websiteId: required('CRISP_WEBSITE_ID'),
      identifier: required('CRISP_API_IDENTIFIER'),
      apiKey: required('CRISP_API_KEY'),
      baseUrl: optional('CRISP_API_BASE') ?? 'https://api.crisp.chat/v1',
    },
    ip2location: {
      apiKey: required('IP2LOCATION_API_KEY'),
      baseUrl: optional('IP2LOCATION_BASE_URL') ?? 'https://api.ip2location.io/',
    },
    mailgun: {
      apiKey: required('MAILGUN_API_KEY'),
      domain: mailgunDomain,
      baseUrl: optional('MAILGUN_API_BASE') ?? 'https://api.mailgun.net/v3',
      fromEmail: optional('MAILGUN_FROM_EMAIL') ?? `support@${mailgunDomain}`,
      fromName: optional('MAILGUN_FROM_NAME') ?? 'Customer Support',
      inboundDomain: optional('INBOUND_EMAIL_DOMAIN') ?? mailgunDomain,
    },
    agents: {
      helpdesk: required('HELPDESK_AGENT_ID'),
      office: required('OFFICE_AGENT_ID'),
    },
    slack: {
      webhookUrl: optional('SLACK_WEBHOOK_URL') ?? null,
    },
    routingTablePath:
      optional('ROUTING_TABLE_PATH') ?? path.resolve(process.cwd(), 'config', 'country_routing.csv'),
    dedupMaxEntries: parsePositiveInt('DEDUP_MAX_ENTRIES', 1000),
    features: {
      autoForwardOnSubmission: parseFlag('AUTO_FORWARD_ON_SUBMISSION'),
      testCountryOverride: parseFlag('ENABLE_TEST_COUNTRY_OVERRIDE'),
      syncContactProfiles: parseFlag('SYNC_CONTACT_PROFILES'),
    },
  };
}

// Export singleton config instance
export const config: EnvConfig = loadConfig();
