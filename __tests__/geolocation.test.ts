import { beforeEach, describe, expect, it, vi } from 'vitest';

const { mockGet } = vi.hoisted(() => ({ mockGet: vi.fn() }));

vi.mock('axios', async (importOriginal) => {
  const actual = await importOriginal<typeof import('axios')>();
  return {
    ...actual,
    default: Object.assign(actual.default, { get: mockGet }),
  };
});

import { EMPTY_GEOLOCATION, lookupGeolocation, testGeolocation } from '../api/geolocation';

describe('lookupGeolocation', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('maps the ip2location response', async () => {
    mockGet.mockResolvedValueOnce({
      data: {
        ip: '198.51.100.7',
        city_name: 'Austin',
        region_name: 'Texas',
        country_code: 'us',
        country_name: 'United States of America',
        zip_code: '73301',
        latitude: 30.27,
        longitude: -97.74,
      },
    });

    expect(await lookupGeolocation('198.51.100.7')).toEqual({
      city: 'Austin',
      region: 'Texas',
      countryCode: 'US',
      countryName: 'United States of America',
      zipCode: '73301',
      latitude: 30.27,
      longitude: -97.74,
    });
    expect(mockGet).toHaveBeenCalledWith('https://api.ip2location.io/', {
      params: { key: 'test-secret', ip: '198.51.100.7' },
      timeout: 10000,
    });
  });

  it('blanks fields the service could not resolve', async () => {
    mockGet.mockResolvedValueOnce({
      data: { city_name: '-', region_name: '-', country_code: 'DE', country_name: 'Germany', zip_code: '-' },
    });

    expect(await lookupGeolocation('198.51.100.8')).toEqual({
      city: '',
      region: '',
      countryCode: 'DE',
      countryName: 'Germany',
      zipCode: '',
      latitude: 0,
      longitude: 0,
    });
  });

  it('returns an empty location when the lookup fails', async () => {
    mockGet.mockRejectedValueOnce(new Error('timeout of 10000ms exceeded'));

    expect(await lookupGeolocation('198.51.100.9')).toEqual(EMPTY_GEOLOCATION);
  });

  it('skips the lookup without an IP', async () => {
    expect(await lookupGeolocation(' ')).toEqual(EMPTY_GEOLOCATION);
    expect(mockGet).not.toHaveBeenCalled();
  });
});

describe('testGeolocation', () => {
  it('forces the given country', () => {
    expect(testGeolocation(' gb ')).toEqual({
      city: 'Test City',
      region: 'Test Region',
      countryCode: 'GB',
      countryName: 'Test Country',
      zipCode: '',
      latitude: 0,
      longitude: 0,
    });
  });
});
