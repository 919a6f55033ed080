/**
 * ip2location.io lookup
 * Function: lookupGeolocation(ip)
 * Never throws - a failed lookup yields EMPTY_GEOLOCATION so routing falls back to default agents
 */

import axios from 'axios';
import { z } from 'zod';
import { config } from '../config/env';
import { describeApiError } from './errors';

export interface Geolocation {
  city: string;
  region: string;
  countryCode: string;
  countryName: string;
  zipCode: string;
  latitude: number;
  longitude: number;
}

export const EMPTY_GEOLOCATION: Readonly<Geolocation> = Object.freeze({
  city: '',
  region: '',
  countryCode: '',
  countryName: '',
  zipCode: '',
  latitude: 0,
  longitude: 0,
});

// ip2location answers "-" for fields it cannot resolve
const field = z
  .string()
  .catch('')
  .transform((value) => (value.trim() === '-' ? '' : value.trim()));
const coordinate = z.number().catch(0);

const ip2locationSchema = z.object({
  city_name: field,
  region_name: field,
  country_code: field,
  country_name: field,
  zip_code: field,
  latitude: coordinate,
  longitude: coordinate,
});

/**
 * Look up the geolocation of a client IP
 * @returns Geolocation (all fields empty/zero when the lookup fails)
 */
export async function lookupGeolocation(ipAddress: string): Promise<Geolocation> {
  if (!ipAddress.trim()) {
    console.warn('Skipping geolocation lookup: no client IP');
    return { ...EMPTY_GEOLOCATION };
  }

  try {
    const response = await axios.get(config.ip2location.baseUrl, {
      params: {
        key: config.ip2location.apiKey,
        ip: ipAddress,
      },
      timeout: config.httpTimeoutMs,
    });

    const parsed = ip2locationSchema.safeParse(response.data);
    if (!parsed.success) {
      console.error(`Unexpected geolocation response for ${ipAddress}`);
      return { ...EMPTY_GEOLOCATION };
    }

    console.log(`IP geolocation lookup successful for ${ipAddress}: ${parsed.data.country_code || 'unknown'}`);
    return {
      city: parsed.data.city_name,
      region: parsed.data.region_name,
      countryCode: parsed.data.country_code.toUpperCase(),
      countryName: parsed.data.country_name,
      zipCode: parsed.data.zip_code,
      latitude: parsed.data.latitude,
      longitude: parsed.data.longitude,
    };
  } catch (error: unknown) {
    console.error(`Error getting IP geolocation: ${describeApiError('ip2location', error).message}`);
    return { ...EMPTY_GEOLOCATION };
  }
}

/**
 * Fixed geolocation for a forced country code (test submissions)
 */
export function testGeolocation(countryCode: string): Geolocation {
  return {
    city: 'Test City',
    region: 'Test Region',
    countryCode: countryCode.trim().toUpperCase(),
    countryName: 'Test Country',
    zipCode: '',
    latitude: 0,
    longitude: 0,
  };
}
