/**
 * JotForm payload parsing
 * Form answers are keyed q<N>_<name>; the fields this service reads:
 * - q3_name: { first, last } or a plain string
 * - q5_country: { country, city } (self-reported, display only)
 * - q6_email
 * - q7_howCan: free-text message
 * - uploadAn: uploaded file URLs
 */

import { z } from 'zod';

export interface FormPayload {
  fields: Record<string, unknown>;
  clientIp: string;
  testCountryCode: string | null;
}

export interface Submission {
  customerName: string;
  email: string;
  message: string;
  country: string;
  city: string;
  fileUrls: string[];
}

const text = z
  .string()
  .catch('')
  .transform((value) => value.trim());

const submissionSchema = z.object({
  q3_name: z
    .union([
      z.object({ first: z.string().optional(), last: z.string().optional() }),
      z.string(),
    ])
    .optional()
    .catch(undefined),
  q5_country: z
    .object({ country: z.string().optional(), city: z.string().optional() })
    .optional()
    .catch(undefined),
  q6_email: text,
  q7_howCan: text,
  uploadAn: z
    .union([z.array(z.unknown()), z.string()])
    .optional()
    .catch(undefined),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

/**
 * Resolve the effective form fields of a webhook body
 * Form-encoded JotForm posts carry the answers as a JSON string in `rawRequest`;
 * it is parsed and kept under `request`, which then becomes the field source.
 */
export function extractFormPayload(body: unknown, isJson: boolean, remoteAddress: string): FormPayload {
  const data: Record<string, unknown> = isRecord(body) ? { ...body } : {};

  if (!isJson && typeof data.rawRequest === 'string') {
    try {
      const rawRequest: unknown = JSON.parse(data.rawRequest);
      if (isRecord(rawRequest)) {
        data.request = rawRequest;
        console.log(`Parsed rawRequest field with keys: ${Object.keys(rawRequest).join(', ')}`);
      }
    } catch (error: unknown) {
      console.warn(`Could not parse rawRequest: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  let fields: Record<string, unknown> = {};
  if (isRecord(data.request)) {
    fields = data.request;
  } else {
    for (const [key, value] of Object.entries(data)) {
      if (key.startsWith('q')) {
        fields[key] = value;
      }
    }
  }

  const requestCountry = isRecord(data.request) ? nonEmptyString(data.request.test_country_code) : null;

  return {
    fields,
    clientIp: nonEmptyString(data.ip) ?? remoteAddress,
    testCountryCode: nonEmptyString(data.test_country_code) ?? requestCountry,
  };
}

/**
 * Last path segment of a file URL, with %20 shown as spaces
 */
export function fileNameFromUrl(url: string): string {
  const segments = url.split('/');
  return (segments[segments.length - 1] || url).replace(/%20/g, ' ');
}

/**
 * Pull the fields the relay uses out of the form answers
 */
export function extractSubmission(fields: Record<string, unknown>): Submission {
  const parsed = submissionSchema.parse(fields);

  let customerName = 'Unknown';
  if (typeof parsed.q3_name === 'string') {
    customerName = parsed.q3_name.trim() || 'Unknown';
  } else if (parsed.q3_name) {
    customerName =
      [parsed.q3_name.first, parsed.q3_name.last]
        .map((part) => (part ?? '').trim())
        .filter((part) => part.length > 0)
        .join(' ') || 'Unknown';
  }

  const uploads = typeof parsed.uploadAn === 'string' ? [parsed.uploadAn] : parsed.uploadAn ?? [];
  const fileUrls = uploads
    .map((url) => (typeof url === 'string' ? url.trim() : ''))
    .filter((url) => url.length > 0);

  return {
    customerName,
    email: parsed.q6_email,
    message: parsed.q7_howCan,
    country: (parsed.q5_country?.country ?? '').trim(),
    city: (parsed.q5_country?.city ?? '').trim(),
    fileUrls,
  };
}
