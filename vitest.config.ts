import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['__tests__/**/*.test.ts'],
    environment: 'node',
    // Placeholder credentials so config/env.ts loads; every outbound call is mocked.
    env: {
      NODE_ENV: 'test',
      CRISP_WEBSITE_ID: 'test-website',
      CRISP_API_IDENTIFIER: 'test-identifier',
      CRISP_API_KEY: 'test-secret',
      IP2LOCATION_API_KEY: 'test-secret',
      MAILGUN_API_KEY: 'test-secret',
      MAILGUN_DOMAIN: 'mail.example.test',
      HELPDESK_AGENT_ID: 'agent-helpdesk',
      OFFICE_AGENT_ID: 'agent-office',
      MAILGUN_FROM_NAME: 'Relay Support',
    },
  },
});
